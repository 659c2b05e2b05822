import { z } from 'zod';

import { TASK_ID_PATTERN } from '../../utils/id.js';

export const TASK_TYPES = ['task', 'bug', 'feature', 'epic', 'project', 'goal', 'learn'] as const;
export const TaskTypeSchema = z.enum(TASK_TYPES);
export type TaskType = z.infer<typeof TaskTypeSchema>;

/** Types a worker may claim from the ready queue. */
export const CLAIMABLE_TYPES: ReadonlySet<TaskType> = new Set<TaskType>(['task', 'bug', 'feature']);

export const TASK_STATUSES = ['inbox', 'active', 'in_progress', 'blocked', 'review', 'merge_ready', 'done', 'cancelled'] as const;
export const TaskStatusSchema = z.enum(TASK_STATUSES);
export type TaskStatus = z.infer<typeof TaskStatusSchema>;

export const TERMINAL_STATUSES: ReadonlySet<TaskStatus> = new Set<TaskStatus>(['done', 'cancelled']);

export function isTerminal(status: TaskStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

export const STATUS_ALIASES = {
  'in-progress': 'in_progress',
  'merge-ready': 'merge_ready'
} as const satisfies Record<string, TaskStatus>;

/** Accepts the hyphenated spellings some callers use. */
export const StatusInputSchema = z
  .union([TaskStatusSchema, z.enum(['in-progress', 'merge-ready'])])
  .transform((v): TaskStatus => (v === 'in-progress' || v === 'merge-ready' ? STATUS_ALIASES[v] : v));

export const TaskIdSchema = z.string().regex(TASK_ID_PATTERN, 'id must contain only letters, digits, "_" and "-"');
export const PrioritySchema = z.number().int().min(0).max(4);
export const AssigneeSchema = z
  .string()
  .regex(/^(worker|human):[A-Za-z0-9._@-]+$/, 'assignee must be "worker:<name>" or "human:<name>"');

export const IsoTimestampSchema = z
  .string()
  .refine((s) => !Number.isNaN(Date.parse(s)), { message: 'must be an ISO date or datetime' });

const idList = z.array(TaskIdSchema).transform((ids) => Array.from(new Set(ids)));

export const TaskRecordSchema = z.object({
  id: TaskIdSchema,
  title: z.string().min(1),
  body: z.string(),
  type: TaskTypeSchema,
  status: TaskStatusSchema,
  priority: PrioritySchema,
  assignee: AssigneeSchema.nullable(),
  parent: TaskIdSchema.nullable(),
  project: TaskIdSchema.nullable(),
  dependsOn: z.array(TaskIdSchema),
  softDependsOn: z.array(TaskIdSchema),
  branch: z.string().min(1).nullable(),
  tags: z.array(z.string()),
  due: IsoTimestampSchema.nullable(),
  created: IsoTimestampSchema,
  updated: IsoTimestampSchema,
  version: z.number().int().nonnegative(),
  seq: z.number().int().nonnegative()
});

/** Persisted shape of a task. */
export type TaskRecord = z.infer<typeof TaskRecordSchema>;

/** A task as returned by the store: the record plus its derived weight. */
export interface Task extends TaskRecord {
  downstreamWeight: number;
}

export const CreateTaskInputSchema = z
  .object({
    id: TaskIdSchema.optional(),
    title: z.string().trim().min(1, 'title is required'),
    body: z.string().default(''),
    type: TaskTypeSchema.default('task'),
    status: z.enum(['inbox', 'active']).default('active'),
    priority: PrioritySchema.default(2),
    assignee: AssigneeSchema.nullable().default(null),
    parent: TaskIdSchema.nullable().default(null),
    project: TaskIdSchema.nullable().default(null),
    dependsOn: idList.default([]),
    softDependsOn: idList.default([]),
    branch: z.string().min(1).nullable().default(null),
    tags: z.array(z.string().min(1)).default([]),
    due: IsoTimestampSchema.nullable().default(null)
  })
  .strict();

export type CreateTaskInput = z.input<typeof CreateTaskInputSchema>;
export type ParsedCreateTaskInput = z.output<typeof CreateTaskInputSchema>;

export const TaskPatchSchema = z
  .object({
    title: z.string().trim().min(1).optional(),
    type: TaskTypeSchema.optional(),
    status: StatusInputSchema.optional(),
    priority: PrioritySchema.optional(),
    assignee: AssigneeSchema.nullable().optional(),
    parent: TaskIdSchema.nullable().optional(),
    project: TaskIdSchema.nullable().optional(),
    dependsOn: idList.optional(),
    softDependsOn: idList.optional(),
    branch: z.string().min(1).nullable().optional(),
    tags: z.array(z.string().min(1)).optional(),
    due: IsoTimestampSchema.nullable().optional(),
    /** Appended to the body as a new paragraph. Commutative, so no version check. */
    appendBody: z.string().min(1).optional(),
    /** Full body rewrite; requires `expectedVersion`. */
    body: z.string().optional(),
    expectedVersion: z.number().int().nonnegative().optional()
  })
  .strict();

export type TaskPatch = z.input<typeof TaskPatchSchema>;
export type ParsedTaskPatch = z.output<typeof TaskPatchSchema>;

export interface WriteOptions {
  /** Overrides the guards that allow it; never terminal write-once, acyclicity or claim exclusivity. */
  force?: boolean;
  /** Who is making the change; recorded in the audit trail. */
  actor?: string;
}

export const TaskFilterSchema = z
  .object({
    status: z.union([StatusInputSchema, z.literal('ready')]).optional(),
    project: TaskIdSchema.optional(),
    type: TaskTypeSchema.optional(),
    assignee: z.string().optional(),
    limit: z.number().int().positive().optional()
  })
  .strict();

export type TaskFilter = z.input<typeof TaskFilterSchema>;

export const ORCHESTRATOR_ACTOR = 'orchestrator';
export const SYSTEM_ACTOR = 'system';
export const DEFAULT_ACTOR = 'cli';
