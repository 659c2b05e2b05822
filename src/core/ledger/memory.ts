import { LedgerEntrySchema, type AuditSink, type LedgerEntry, type LedgerEntryInput } from './types.js';

/** Audit sink that keeps entries in an array; used by tests and embedders without a workspace. */
export class MemoryAuditSink implements AuditSink {
  readonly entries: LedgerEntry[] = [];

  async append(event: LedgerEntryInput): Promise<LedgerEntry> {
    const entry = LedgerEntrySchema.parse({
      ...event,
      seq: this.entries.length + 1,
      timestamp: new Date().toISOString()
    });
    this.entries.push(entry);
    return entry;
  }

  ofType(type: LedgerEntry['type']): LedgerEntry[] {
    return this.entries.filter((e) => e.type === type);
  }
}
