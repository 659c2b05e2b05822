import { z } from 'zod';

export const TimestampIso = z
  .string()
  .refine((s) => !Number.isNaN(Date.parse(s)), { message: 'timestamp must be ISO datetime' });

// Canonical audit event types. This list can grow over time.
export const LedgerEventType = z.enum([
  'task_created',
  'task_updated',
  'task_claimed',
  'task_completed',
  'task_unblocked',
  'claim_reverted',
  'gate_denied',
  'gate_bypassed',
  'compliance_check',
  'merge_started',
  'merge_completed',
  'merge_failed',
  'merge_skipped',
  'index_rebuilt'
]);

export type LedgerEventType = z.infer<typeof LedgerEventType>;

export const LedgerEntrySchema = z.object({
  seq: z.number().int().positive(),
  timestamp: TimestampIso,
  type: LedgerEventType,
  /** Who caused the event: `worker:<name>`, `human:<name>`, `orchestrator`, `system`, `cli`. */
  actor: z.string().min(1),
  taskId: z.string().optional(),
  data: z.record(z.string(), z.unknown()).default({})
});

export type LedgerEntry = z.infer<typeof LedgerEntrySchema>;

export type LedgerEntryInput = Omit<z.input<typeof LedgerEntrySchema>, 'seq' | 'timestamp'>;

/** Anything the engine can append audit entries to. */
export interface AuditSink {
  append(event: LedgerEntryInput): Promise<LedgerEntry>;
}
