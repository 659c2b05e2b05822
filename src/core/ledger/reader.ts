import { readFile } from 'node:fs/promises';

import { isErrnoException } from '../../utils/fs.js';
import { LedgerEntrySchema, type LedgerEntry, type LedgerEventType } from './types.js';

export class LedgerReader {
  constructor(private ledgerPath: string) {}

  async readAll(): Promise<LedgerEntry[]> {
    const { entries } = await this.readAllSafe();
    return entries;
  }

  async readAllSafe(): Promise<{ entries: LedgerEntry[]; warnings: string[] }> {
    const warnings: string[] = [];
    const entries: LedgerEntry[] = [];

    const lines = await readJsonlLines(this.ledgerPath);
    for (let i = 0; i < lines.length; i++) {
      const isLast = i === lines.length - 1;
      const parsed = parseLine(lines[i]);
      if (parsed.ok) {
        entries.push(parsed.entry);
        continue;
      }
      // Common corruption: trailing partial line. Mid-file bad lines are skipped.
      warnings.push(`ledger parse failed at line ${i + 1}${isLast ? ' (last line)' : ''}: ${parsed.message}`);
    }

    return { entries, warnings };
  }

  async tail(n: number): Promise<LedgerEntry[]> {
    const { entries } = await this.readAllSafe();
    return entries.slice(Math.max(0, entries.length - n));
  }

  async findByType(type: LedgerEventType): Promise<LedgerEntry[]> {
    const { entries } = await this.readAllSafe();
    return entries.filter((e) => e.type === type);
  }

  async findByTask(taskId: string): Promise<LedgerEntry[]> {
    const { entries } = await this.readAllSafe();
    return entries.filter((e) => e.taskId === taskId);
  }

  async verifyIntegrity(): Promise<{ ok: boolean; message?: string }> {
    const { entries, warnings } = await this.readAllSafe();
    if (warnings.length) {
      return { ok: false, message: warnings.join('\n') };
    }
    for (let i = 0; i < entries.length; i++) {
      const expected = i + 1;
      if (entries[i].seq !== expected) {
        return { ok: false, message: `Sequence gap at index ${i} (expected seq=${expected}, got ${entries[i].seq})` };
      }
    }
    return { ok: true };
  }
}

function parseLine(line: string): { ok: true; entry: LedgerEntry } | { ok: false; message: string } {
  let json: unknown;
  try {
    json = JSON.parse(line);
  } catch (err) {
    return { ok: false, message: err instanceof Error ? err.message : String(err) };
  }
  const res = LedgerEntrySchema.safeParse(json);
  if (!res.success) return { ok: false, message: res.error.issues.map((i) => i.message).join('; ') };
  return { ok: true, entry: res.data };
}

async function readJsonlLines(path: string): Promise<string[]> {
  try {
    const content = await readFile(path, 'utf8');
    return content
      .split('\n')
      .map((l) => l.trim())
      .filter(Boolean);
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') return [];
    throw err;
  }
}
