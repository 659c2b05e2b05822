import { mkdir, open, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import { isErrnoException } from '../../utils/fs.js';
import { withFileLock } from '../../utils/lock.js';
import { LedgerEntrySchema, type AuditSink, type LedgerEntry, type LedgerEntryInput } from './types.js';

/**
 * Append-only JSONL audit ledger. Appends are serialized in-process and
 * guarded by a lock file, and each one re-derives the next `seq` from the
 * file, so several CLI processes can share one ledger without gaps.
 */
export class LedgerWriter implements AuditSink {
  private queue: Promise<unknown> = Promise.resolve();

  private constructor(private readonly ledgerPath: string) {}

  static async open(ledgerPath: string): Promise<LedgerWriter> {
    await mkdir(dirname(ledgerPath), { recursive: true });
    return new LedgerWriter(ledgerPath);
  }

  append(event: LedgerEntryInput): Promise<LedgerEntry> {
    const next = this.queue.then(() => withFileLock(`${this.ledgerPath}.lock`, () => this.appendLocked(event)));
    // Keep the chain alive after a failed append; the caller still sees the rejection.
    this.queue = next.catch(() => undefined);
    return next;
  }

  private async appendLocked(event: LedgerEntryInput): Promise<LedgerEntry> {
    const { seq, terminated } = await scanLedger(this.ledgerPath);
    const entry: LedgerEntry = LedgerEntrySchema.parse({
      ...event,
      seq,
      timestamp: new Date().toISOString()
    });

    // One JSON object per line (JSONL). Append-only; a torn last line stays on its own line.
    const fh = await open(this.ledgerPath, 'a');
    try {
      await fh.writeFile(`${terminated ? '' : '\n'}${JSON.stringify(entry)}\n`, { encoding: 'utf8' });
      await fh.sync();
    } finally {
      await fh.close();
    }
    return entry;
  }
}

/** Next seq to write, and whether the file currently ends on a line break. */
async function scanLedger(ledgerPath: string): Promise<{ seq: number; terminated: boolean }> {
  let content: string;
  try {
    content = await readFile(ledgerPath, 'utf8');
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') return { seq: 1, terminated: true };
    throw err;
  }
  const terminated = content === '' || content.endsWith('\n');

  const lines = content
    .split('\n')
    .map((l) => l.trim())
    .filter(Boolean);

  // Be resilient to a trailing partial/garbled line (e.g. crash mid-write).
  for (let i = lines.length - 1; i >= 0; i--) {
    const seq = readSeq(lines[i]);
    if (seq !== null) return { seq: seq + 1, terminated };
  }
  return { seq: 1, terminated };
}

function readSeq(line: string): number | null {
  try {
    const parsed: unknown = JSON.parse(line);
    if (typeof parsed !== 'object' || parsed === null) return null;
    const seq = Reflect.get(parsed, 'seq');
    return typeof seq === 'number' && Number.isFinite(seq) && seq > 0 ? seq : null;
  } catch {
    return null;
  }
}
