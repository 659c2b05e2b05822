import type { z } from 'zod';

import { ValidationError } from '../../core/task/errors.js';
import {
  CreateTaskInputSchema,
  DEFAULT_ACTOR,
  TaskFilterSchema,
  TaskPatchSchema,
  TaskStatusSchema,
  TaskTypeSchema,
  type Task
} from '../../core/task/types.js';
import { getRenderer } from '../ui/renderer.js';
import { withWorkspace, type CommandResult, type WorkspaceCommandOptions } from '../workspace.js';

const HOUR_MS = 3_600_000;

export interface TaskCreateCommandOptions extends WorkspaceCommandOptions {
  title: string;
  id?: string;
  body?: string;
  type?: string;
  status?: string;
  priority?: string;
  assignee?: string;
  parent?: string;
  project?: string;
  dependsOn?: string[];
  softDependsOn?: string[];
  branch?: string;
  tags?: string[];
  due?: string;
  actor?: string;
}

/** `trellis task create <title>` */
export async function runTaskCreateCommand(opts: TaskCreateCommandOptions): Promise<CommandResult> {
  return await withWorkspace(opts, async ({ store }) => {
    const input = parseOrThrow('invalid task', CreateTaskInputSchema, {
      id: opts.id,
      title: opts.title,
      body: opts.body,
      type: opts.type,
      status: opts.status,
      priority: parsePriority(opts.priority),
      assignee: opts.assignee,
      parent: opts.parent,
      project: opts.project,
      dependsOn: opts.dependsOn,
      softDependsOn: opts.softDependsOn,
      branch: opts.branch,
      tags: opts.tags,
      due: opts.due
    });
    const task = await store.create(input, { actor: opts.actor ?? DEFAULT_ACTOR });
    const r = getRenderer();
    r.success(`Created ${task.id}: ${task.title}`);
    r.data(task);
    return { ok: true, details: task };
  });
}

export interface TaskUpdateCommandOptions extends WorkspaceCommandOptions {
  id: string;
  title?: string;
  type?: string;
  status?: string;
  priority?: string;
  assignee?: string;
  clearAssignee?: boolean;
  parent?: string;
  project?: string;
  dependsOn?: string[];
  softDependsOn?: string[];
  branch?: string;
  tags?: string[];
  due?: string;
  append?: string;
  expectedVersion?: string;
  force?: boolean;
  actor?: string;
}

/** `trellis task update <id>` */
export async function runTaskUpdateCommand(opts: TaskUpdateCommandOptions): Promise<CommandResult> {
  return await withWorkspace(opts, async ({ store }) => {
    const patch = parseOrThrow('invalid update', TaskPatchSchema, {
      title: opts.title,
      type: opts.type,
      status: opts.status,
      priority: parsePriority(opts.priority),
      assignee: opts.clearAssignee ? null : opts.assignee,
      parent: opts.parent,
      project: opts.project,
      dependsOn: opts.dependsOn?.length ? opts.dependsOn : undefined,
      softDependsOn: opts.softDependsOn?.length ? opts.softDependsOn : undefined,
      branch: opts.branch,
      tags: opts.tags?.length ? opts.tags : undefined,
      due: opts.due,
      appendBody: opts.append,
      expectedVersion: opts.expectedVersion === undefined ? undefined : Number(opts.expectedVersion)
    });
    const task = await store.update(opts.id, patch, { force: opts.force, actor: opts.actor ?? DEFAULT_ACTOR });
    const r = getRenderer();
    r.success(`Updated ${task.id} (${task.status}, v${task.version})`);
    r.data(task);
    return { ok: true, details: task };
  });
}

export interface TaskCompleteCommandOptions extends WorkspaceCommandOptions {
  id: string;
  force?: boolean;
  actor?: string;
}

/** `trellis task complete <id>` */
export async function runTaskCompleteCommand(opts: TaskCompleteCommandOptions): Promise<CommandResult> {
  return await withWorkspace(opts, async ({ store }) => {
    const task = await store.complete(opts.id, { force: opts.force, actor: opts.actor ?? DEFAULT_ACTOR });
    const r = getRenderer();
    r.success(`Completed ${task.id}: ${task.title}`);
    r.data(task);
    return { ok: true, details: task };
  });
}

export interface TaskCompleteManyCommandOptions extends WorkspaceCommandOptions {
  ids: string[];
  force?: boolean;
  actor?: string;
}

/** `trellis task complete-many <ids...>`: completes in the order given; one refusal does not stop the rest. */
export async function runTaskCompleteManyCommand(opts: TaskCompleteManyCommandOptions): Promise<CommandResult> {
  return await withWorkspace(opts, async ({ store }) => {
    const results = await store.completeMany(opts.ids, { force: opts.force, actor: opts.actor ?? DEFAULT_ACTOR });
    const r = getRenderer();
    const failed: string[] = [];
    for (const res of results) {
      if (res.ok) {
        r.success(`Completed ${res.id}: ${res.task.title}`);
      } else {
        r.warn(`${res.id}: ${res.error.message}`);
        failed.push(`${res.id} (${res.error.code})`);
      }
    }
    r.data(results);
    if (failed.length) {
      return { ok: false, details: `${failed.length} of ${results.length} tasks not completed: ${failed.join(', ')}` };
    }
    return { ok: true, details: results };
  });
}

export interface TaskDecomposeCommandOptions extends WorkspaceCommandOptions {
  id: string;
  titles: string[];
  type?: string;
  priority?: string;
  sequential?: boolean;
  actor?: string;
}

/** `trellis task decompose <id> <titles...>`: one child per title, all or none. */
export async function runTaskDecomposeCommand(opts: TaskDecomposeCommandOptions): Promise<CommandResult> {
  return await withWorkspace(opts, async ({ store }) => {
    const type = parseOrThrow('invalid --type', TaskTypeSchema.optional(), opts.type);
    const priority = parsePriority(opts.priority);
    const children = opts.titles.map((title) => ({ title, type, priority }));
    const tasks = await store.decompose(opts.id, children, {
      sequential: opts.sequential,
      actor: opts.actor ?? DEFAULT_ACTOR
    });
    const r = getRenderer();
    r.success(`Decomposed ${opts.id} into ${tasks.length} tasks`);
    r.taskList(`Children of ${opts.id}`, tasks);
    r.data(tasks);
    return { ok: true, details: tasks };
  });
}

export interface TaskDepsCommandOptions extends WorkspaceCommandOptions {
  id: string;
}

/** `trellis task deps <id>`: the task's parent, children and dependency edges in both directions. */
export async function runTaskDepsCommand(opts: TaskDepsCommandOptions): Promise<CommandResult> {
  return await withWorkspace(opts, async ({ store }) => {
    const hood = await store.neighborhood(opts.id);
    const r = getRenderer();
    r.taskDetail(hood.task);
    const sections: Array<[string, Task[]]> = [
      ['Parent', hood.parent ? [hood.parent] : []],
      ['Children', hood.children],
      ['Depends on', hood.dependsOn],
      ['Blocks', hood.blocks],
      ['Soft-depends on', hood.softDependsOn],
      ['Soft-blocks', hood.softBlocks]
    ];
    for (const [title, tasks] of sections) {
      if (tasks.length) r.taskList(title, tasks);
    }
    r.data(hood);
    return { ok: true, details: hood };
  });
}

export interface TaskListCommandOptions extends WorkspaceCommandOptions {
  status?: string;
  project?: string;
  type?: string;
  assignee?: string;
  limit?: number;
}

/** `trellis task list`; `--status ready` prints the ready queue in claim order. */
export async function runTaskListCommand(opts: TaskListCommandOptions): Promise<CommandResult> {
  return await withWorkspace(opts, async ({ store }) => {
    const filter = parseOrThrow('invalid filter', TaskFilterSchema, {
      status: opts.status,
      project: opts.project,
      type: opts.type,
      assignee: opts.assignee,
      limit: opts.limit
    });
    const tasks = await store.list(filter);
    const r = getRenderer();
    r.taskList(filter.status === 'ready' ? 'Ready queue' : filter.status ? `Tasks: ${filter.status}` : 'Tasks', tasks);
    r.data(tasks);
    return { ok: true, details: tasks };
  });
}

export interface TaskTreeCommandOptions extends WorkspaceCommandOptions {
  id: string;
  excludeStatus?: string[];
  maxDepth?: number;
}

/** `trellis task tree <id>` */
export async function runTaskTreeCommand(opts: TaskTreeCommandOptions): Promise<CommandResult> {
  return await withWorkspace(opts, async ({ store }) => {
    const excludeStatus = (opts.excludeStatus ?? []).map((s) => parseOrThrow('invalid --exclude-status', TaskStatusSchema, s));
    if (opts.maxDepth !== undefined && (!Number.isInteger(opts.maxDepth) || opts.maxDepth < 0)) {
      throw new ValidationError(`--max-depth must be a non-negative integer, got ${opts.maxDepth}`);
    }
    const tree = await store.tree(opts.id, { excludeStatus, maxDepth: opts.maxDepth });
    const r = getRenderer();
    r.taskTree(tree);
    r.data(tree);
    return { ok: true, details: tree };
  });
}

export interface TaskShowCommandOptions extends WorkspaceCommandOptions {
  id: string;
}

/** `trellis task show <id>` */
export async function runTaskShowCommand(opts: TaskShowCommandOptions): Promise<CommandResult> {
  return await withWorkspace(opts, async ({ store }) => {
    const task = await store.get(opts.id);
    const r = getRenderer();
    r.taskDetail(task);
    r.data(task);
    return { ok: true, details: task };
  });
}

export interface TaskClaimCommandOptions extends WorkspaceCommandOptions {
  /** Omit to take the head of the ready queue. */
  id?: string;
  assignee: string;
  project?: string;
  type?: string;
  actor?: string;
}

/** `trellis task claim <id>` and `trellis task claim-next` */
export async function runTaskClaimCommand(opts: TaskClaimCommandOptions): Promise<CommandResult> {
  return await withWorkspace(opts, async ({ store }) => {
    const filter = parseOrThrow('invalid filter', TaskFilterSchema, { project: opts.project, type: opts.type });
    const actor = opts.actor ?? opts.assignee;
    const r = getRenderer();
    let task: Task | null;
    if (opts.id) {
      task = await store.claim(opts.id, opts.assignee, { actor });
    } else {
      task = await store.claimNext(opts.assignee, { project: filter.project, type: filter.type }, { actor });
    }
    if (!task) {
      r.dim('No ready task to claim.');
      r.data(null);
      return { ok: true, details: null };
    }
    r.success(`${opts.assignee} claimed ${task.id}: ${task.title}`);
    r.data(task);
    return { ok: true, details: task };
  });
}

export interface TaskRevertCommandOptions extends WorkspaceCommandOptions {
  id: string;
  actor?: string;
}

/** `trellis task revert <id>`: put an abandoned claim back in the queue. */
export async function runTaskRevertCommand(opts: TaskRevertCommandOptions): Promise<CommandResult> {
  return await withWorkspace(opts, async ({ store }) => {
    const task = await store.revertClaim(opts.id, { actor: opts.actor ?? DEFAULT_ACTOR });
    const r = getRenderer();
    r.success(`Reverted claim on ${task.id}; it is ${task.status} again`);
    r.data(task);
    return { ok: true, details: task };
  });
}

export interface TaskResetStalledCommandOptions extends WorkspaceCommandOptions {
  hours?: number;
  dryRun?: boolean;
  actor?: string;
}

/** `trellis task reset-stalled`: revert every claim untouched for `--hours` (default 4). */
export async function runTaskResetStalledCommand(opts: TaskResetStalledCommandOptions): Promise<CommandResult> {
  const hours = opts.hours ?? 4;
  return await withWorkspace(opts, async ({ store }) => {
    if (!Number.isFinite(hours) || hours <= 0) {
      throw new ValidationError(`--hours must be a positive number, got ${hours}`);
    }
    const tasks = await store.resetStalled({ olderThanMs: hours * HOUR_MS, dryRun: opts.dryRun, actor: opts.actor ?? DEFAULT_ACTOR });
    const r = getRenderer();
    r.taskList(opts.dryRun ? `Stalled (dry run, older than ${hours}h)` : `Reset (older than ${hours}h)`, tasks);
    r.data(tasks);
    return { ok: true, details: tasks };
  });
}

// ── Helpers ───────────────────────────────────────────────────────────────────

function parseOrThrow<S extends z.ZodTypeAny>(context: string, schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) throw ValidationError.fromZod(context, parsed.error);
  return parsed.data;
}

/** Commander hands us strings; zod rejects anything that is not an integer 0-4. */
function parsePriority(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const trimmed = raw.trim().replace(/^p/i, '');
  return trimmed === '' ? Number.NaN : Number(trimmed);
}
