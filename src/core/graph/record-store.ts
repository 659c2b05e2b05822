import type { TaskRecord } from '../task/types.js';

/**
 * Persistence backend for task records. Implementations decide where the
 * records live (memory, one JSON file per task, ...); the GraphStore owns
 * every rule about what may be written.
 */
export interface TaskRecordStore {
  /** @returns the record, or null when no task has that id */
  get(id: string): Promise<TaskRecord | null>;

  /** All records, in no particular order. */
  list(): Promise<TaskRecord[]>;

  /**
   * Write `record` only if the stored version still equals `expectedVersion`
   * (`null`: the record must not exist yet). Throws ConcurrencyConflictError
   * otherwise. Atomic with respect to other writers of the same id.
   */
  compareAndSet(record: TaskRecord, expectedVersion: number | null): Promise<void>;

  /** Next insertion sequence number; strictly increasing per store. */
  allocateSeq(): Promise<number>;
}
