import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';

import { isErrnoException, readText, writeText, writeTextAtomic } from '../../utils/fs.js';
import { withFileLock, type FileLockOptions } from '../../utils/lock.js';
import { ConcurrencyConflictError, ValidationError } from '../task/errors.js';
import { TaskRecordSchema, type TaskRecord } from '../task/types.js';
import type { TaskRecordStore } from './record-store.js';

const SEQ_FILE = '.seq';

/**
 * One pretty-printed JSON file per task under `tasksDir` (`<id>.json`).
 *
 * Writers take a per-record lock file, re-read the stored version and only
 * then rename the new content into place, so two processes racing on the
 * same task cannot both win.
 */
export class FsTaskRecordStore implements TaskRecordStore {
  constructor(
    private readonly tasksDir: string,
    private readonly lockOptions: FileLockOptions = {}
  ) {}

  private recordPath(id: string): string {
    return join(this.tasksDir, `${id}.json`);
  }

  async get(id: string): Promise<TaskRecord | null> {
    let raw: string;
    try {
      raw = await readFile(this.recordPath(id), 'utf8');
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return null;
      throw err;
    }
    return parseRecord(id, raw);
  }

  async list(): Promise<TaskRecord[]> {
    let names: string[];
    try {
      names = await readdir(this.tasksDir);
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return [];
      throw err;
    }

    const records: TaskRecord[] = [];
    for (const name of names.filter((n) => n.endsWith('.json')).sort()) {
      const record = await this.get(name.slice(0, -'.json'.length));
      if (record) records.push(record);
    }
    return records;
  }

  async compareAndSet(record: TaskRecord, expectedVersion: number | null): Promise<void> {
    const path = this.recordPath(record.id);
    await withFileLock(
      `${path}.lock`,
      async () => {
        const current = await this.get(record.id);
        const actual = current?.version ?? null;
        if (actual !== expectedVersion) {
          throw new ConcurrencyConflictError(record.id, expectedVersion, actual);
        }
        await writeTextAtomic(path, `${JSON.stringify(record, null, 2)}\n`);
      },
      this.lockOptions
    );
  }

  async allocateSeq(): Promise<number> {
    const seqPath = join(this.tasksDir, SEQ_FILE);
    return await withFileLock(
      `${seqPath}.lock`,
      async () => {
        let current = 0;
        try {
          const parsed = Number((await readText(seqPath)).trim());
          current = Number.isInteger(parsed) && parsed >= 0 ? parsed : 0;
        } catch (err) {
          if (!isErrnoException(err) || err.code !== 'ENOENT') throw err;
          // First allocation in a store that may already hold records.
          const existing = await this.list();
          current = existing.reduce((max, r) => Math.max(max, r.seq), 0);
        }
        const next = current + 1;
        await writeText(seqPath, `${next}\n`);
        return next;
      },
      this.lockOptions
    );
  }
}

function parseRecord(id: string, raw: string): TaskRecord {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ValidationError(`task record ${id} is not valid JSON`, [err instanceof Error ? err.message : String(err)]);
  }
  const parsed = TaskRecordSchema.safeParse(json);
  if (!parsed.success) throw ValidationError.fromZod(`task record ${id} is malformed`, parsed.error);
  return parsed.data;
}
