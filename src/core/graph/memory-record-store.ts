import { ConcurrencyConflictError } from '../task/errors.js';
import type { TaskRecord } from '../task/types.js';
import type { TaskRecordStore } from './record-store.js';

export interface MemoryTaskRecordStoreOptions {
  initial?: TaskRecord[];
  /** Clone records on the way in and out (default: true). */
  deepClone?: boolean;
}

/**
 * In-memory TaskRecordStore for tests and embedded use. Single-threaded JS
 * makes the version check and the write one atomic step.
 *
 * @example
 * const records = new MemoryTaskRecordStore();
 * const store = new GraphStore({ records, audit: new MemoryAuditSink() });
 */
export class MemoryTaskRecordStore implements TaskRecordStore {
  private readonly data = new Map<string, TaskRecord>();
  private readonly deepClone: boolean;
  private seq = 0;

  constructor(options: MemoryTaskRecordStoreOptions = {}) {
    this.deepClone = options.deepClone ?? true;
    for (const r of options.initial ?? []) {
      this.data.set(r.id, this.clone(r));
      this.seq = Math.max(this.seq, r.seq);
    }
  }

  private clone(value: TaskRecord): TaskRecord {
    if (!this.deepClone) return value;
    return structuredClone(value);
  }

  async get(id: string): Promise<TaskRecord | null> {
    const value = this.data.get(id);
    return value !== undefined ? this.clone(value) : null;
  }

  async list(): Promise<TaskRecord[]> {
    return Array.from(this.data.values(), (r) => this.clone(r));
  }

  async compareAndSet(record: TaskRecord, expectedVersion: number | null): Promise<void> {
    const current = this.data.get(record.id);
    const actual = current?.version ?? null;
    if (actual !== expectedVersion) {
      throw new ConcurrencyConflictError(record.id, expectedVersion, actual);
    }
    this.data.set(record.id, this.clone(record));
  }

  async allocateSeq(): Promise<number> {
    this.seq += 1;
    return this.seq;
  }
}
