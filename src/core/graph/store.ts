import { KeyedMutex } from '../../utils/lock.js';
import { TaskIdGenerator } from '../../utils/id.js';
import { silentLogger, type Logger } from '../../utils/logger.js';
import type { AuditSink, LedgerEventType } from '../ledger/types.js';
import {
  AlreadyClaimedError,
  ConcurrencyConflictError,
  CycleDetectedError,
  HasIncompleteChildrenError,
  IncompleteChecklistError,
  NotFoundError,
  TrellisError,
  ValidationError,
  type TrellisErrorCode
} from '../task/errors.js';
import { findIncompleteMarkers } from '../task/markers.js';
import { checkTransition, terminalRefusal } from '../task/transitions.js';
import {
  CreateTaskInputSchema,
  DEFAULT_ACTOR,
  SYSTEM_ACTOR,
  TaskFilterSchema,
  TaskPatchSchema,
  isTerminal,
  type CreateTaskInput,
  type ParsedCreateTaskInput,
  type ParsedTaskPatch,
  type Task,
  type TaskFilter,
  type TaskPatch,
  type TaskRecord,
  type TaskStatus,
  type WriteOptions
} from '../task/types.js';
import { findCycleFrom, findParentCycle } from './cycles.js';
import { buildGraphIndex, writeGraphIndex, type GraphIndex } from './indices.js';
import type { TaskRecordStore } from './record-store.js';
import { buildTaskTree, type TaskTreeNode, type TreeOptions } from './tree.js';
import { buildInverseEdges, compareReady, WeightResolver, type WeightPolicy } from './weight.js';

export interface GraphStoreOptions {
  records: TaskRecordStore;
  audit: AuditSink;
  weights?: Partial<WeightPolicy>;
  /** Where to write the derived index after each mutation; omit to skip. */
  indexPath?: string;
  logger?: Logger;
  clock?: () => Date;
  ids?: TaskIdGenerator;
  /** Re-evaluation attempts when another process wins a write race. */
  maxWriteAttempts?: number;
}

export interface ResetStalledOptions {
  olderThanMs: number;
  dryRun?: boolean;
  actor?: string;
}

/** A child for {@link GraphStore.decompose}; its parent is the task being decomposed. */
export type ChildTaskInput = Omit<CreateTaskInput, 'parent'>;

export interface DecomposeOptions {
  actor?: string;
  /** Chain the children: each depends on the one before it. */
  sequential?: boolean;
}

export type CompletionResult =
  | { id: string; ok: true; task: Task }
  | { id: string; ok: false; error: { code: TrellisErrorCode; message: string } };

export interface TaskNeighborhood {
  task: Task;
  parent: Task | null;
  children: Task[];
  dependsOn: Task[];
  /** Tasks that hard-depend on this one. */
  blocks: Task[];
  softDependsOn: Task[];
  softBlocks: Task[];
}

interface Graph {
  records: TaskRecord[];
  byId: Map<string, TaskRecord>;
}

interface WriteResult {
  previous: TaskRecord;
  next: TaskRecord;
}

const AUDITED_FIELDS = [
  'title',
  'type',
  'status',
  'priority',
  'assignee',
  'parent',
  'project',
  'dependsOn',
  'softDependsOn',
  'branch',
  'tags',
  'due'
] as const satisfies ReadonlyArray<keyof TaskRecord>;

/**
 * The task graph: the only writer of task records. Every write goes through
 * a per-task mutex and a version compare-and-set on the backend, and leaves
 * an entry in the audit sink.
 */
export class GraphStore {
  private readonly records: TaskRecordStore;
  private readonly audit: AuditSink;
  private readonly resolver: WeightResolver;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly ids: TaskIdGenerator;
  private readonly indexPath: string | undefined;
  private readonly maxWriteAttempts: number;
  private readonly mutex = new KeyedMutex();

  constructor(opts: GraphStoreOptions) {
    this.records = opts.records;
    this.audit = opts.audit;
    this.logger = opts.logger ?? silentLogger;
    this.clock = opts.clock ?? (() => new Date());
    this.ids = opts.ids ?? new TaskIdGenerator();
    this.indexPath = opts.indexPath;
    this.maxWriteAttempts = opts.maxWriteAttempts ?? 5;
    this.resolver = new WeightResolver(opts.weights, this.clock);
  }

  get weightPolicy(): WeightPolicy {
    return this.resolver.policy;
  }

  // ── Reads ──────────────────────────────────────────────────────────────────

  async get(id: string): Promise<Task> {
    const tasks = await this.snapshot();
    const task = tasks.find((t) => t.id === id);
    if (!task) throw new NotFoundError(id);
    return task;
  }

  /** Every task with its current weight, in insertion order. */
  async snapshot(): Promise<Task[]> {
    const { records } = await this.loadGraph();
    const weights = this.resolver.recompute(records);
    return records
      .map((r) => ({ ...r, downstreamWeight: weights.get(r.id) ?? 0 }))
      .sort((a, b) => a.seq - b.seq);
  }

  async list(filter: TaskFilter = {}): Promise<Task[]> {
    const parsed = TaskFilterSchema.safeParse(filter);
    if (!parsed.success) throw ValidationError.fromZod('invalid task filter', parsed.error);
    const f = parsed.data;

    let tasks: Task[];
    if (f.status === 'ready') {
      const { records } = await this.loadGraph();
      tasks = this.resolver.readyQueue(records);
    } else {
      tasks = await this.snapshot();
      if (f.status) tasks = tasks.filter((t) => t.status === f.status);
      if (f.status === 'active') tasks.sort(compareReady);
    }

    if (f.project) tasks = tasks.filter((t) => t.project === f.project);
    if (f.type) tasks = tasks.filter((t) => t.type === f.type);
    if (f.assignee) tasks = tasks.filter((t) => t.assignee === f.assignee);
    return f.limit ? tasks.slice(0, f.limit) : tasks;
  }

  async ready(filter: Omit<TaskFilter, 'status'> = {}): Promise<Task[]> {
    return await this.list({ ...filter, status: 'ready' });
  }

  async tree(id: string, opts: TreeOptions = {}): Promise<TaskTreeNode> {
    const tasks = await this.snapshot();
    const root = tasks.find((t) => t.id === id);
    if (!root) throw new NotFoundError(id);
    return buildTaskTree(root, tasks, opts);
  }

  /** The task with every task it points at and every task pointing at it. */
  async neighborhood(id: string): Promise<TaskNeighborhood> {
    const tasks = await this.snapshot();
    const byId = new Map(tasks.map((t) => [t.id, t] as const));
    const task = byId.get(id);
    if (!task) throw new NotFoundError(id);

    const { blocks, softBlocks } = buildInverseEdges(tasks);
    const lookup = (refs: readonly string[]): Task[] => refs.flatMap((ref) => byId.get(ref) ?? []);
    return {
      task,
      parent: task.parent ? (byId.get(task.parent) ?? null) : null,
      children: tasks.filter((t) => t.parent === id),
      dependsOn: lookup(task.dependsOn),
      blocks: lookup(blocks.get(id) ?? []),
      softDependsOn: lookup(task.softDependsOn),
      softBlocks: lookup(softBlocks.get(id) ?? [])
    };
  }

  /** Hard dependencies of a task, in the order it lists them. */
  async dependencies(id: string): Promise<Task[]> {
    return (await this.neighborhood(id)).dependsOn;
  }

  // ── Writes ─────────────────────────────────────────────────────────────────

  async create(input: CreateTaskInput, opts: { actor?: string } = {}): Promise<Task> {
    const parsed = CreateTaskInputSchema.safeParse(input);
    if (!parsed.success) throw ValidationError.fromZod('invalid task', parsed.error);
    const data = parsed.data;
    const actor = opts.actor ?? DEFAULT_ACTOR;
    const id = data.id ?? this.ids.next(data.project);

    const record = await this.mutex.run(id, async () => {
      const graph = await this.loadGraph();
      if (graph.byId.has(id)) throw new ValidationError(`task already exists: ${id}`);

      const draft = draftRecord(id, data, this.clock().toISOString());
      this.validateGraphEdges(draft, graph, { parent: true, dependsOn: true, softDependsOn: true, project: true });

      const created: TaskRecord = { ...draft, seq: await this.records.allocateSeq() };
      try {
        await this.records.compareAndSet(created, null);
      } catch (err) {
        if (err instanceof ConcurrencyConflictError) throw new ValidationError(`task already exists: ${id}`);
        throw err;
      }
      return created;
    });

    this.logger.info('task created', { id, type: record.type, status: record.status });
    await this.audit.append({
      type: 'task_created',
      actor,
      taskId: id,
      data: { title: record.title, type: record.type, status: record.status, priority: record.priority }
    });
    await this.refreshIndex();
    return await this.get(id);
  }

  /**
   * Split a task into children. Every child is validated against the graph
   * and its earlier siblings before any is written, so a bad child leaves
   * nothing behind. Children inherit the parent's project; with `sequential`
   * each one also depends on the child before it.
   */
  async decompose(parentId: string, children: ChildTaskInput[], opts: DecomposeOptions = {}): Promise<Task[]> {
    if (children.length === 0) throw new ValidationError(`decomposing ${parentId} needs at least one child`);
    const actor = opts.actor ?? DEFAULT_ACTOR;

    const written = await this.mutex.run(parentId, async () => {
      const graph = await this.loadGraph();
      const parent = graph.byId.get(parentId);
      if (!parent) throw new NotFoundError(parentId);
      const terminal = terminalRefusal(parent.status);
      if (terminal) throw new ValidationError(`cannot decompose ${parentId}: ${terminal}`);

      const now = this.clock().toISOString();
      const drafts: TaskRecord[] = [];
      for (const [i, child] of children.entries()) {
        const parsed = CreateTaskInputSchema.safeParse({
          ...(parent.project ? { project: parent.project } : {}),
          ...child,
          parent: parentId
        });
        if (!parsed.success) throw ValidationError.fromZod(`invalid child ${i + 1} of ${parentId}`, parsed.error);
        const data = parsed.data;
        const previous = drafts[drafts.length - 1];
        if (opts.sequential && previous && !data.dependsOn.includes(previous.id)) {
          data.dependsOn = [...data.dependsOn, previous.id];
        }

        const id = data.id ?? this.ids.next(data.project);
        if (graph.byId.has(id)) throw new ValidationError(`task already exists: ${id}`);
        const draft = draftRecord(id, data, now);
        this.validateGraphEdges(draft, graph, { parent: true, dependsOn: true, softDependsOn: true, project: true });
        drafts.push(draft);
        graph.records.push(draft);
        graph.byId.set(id, draft);
      }

      const records: TaskRecord[] = [];
      for (const draft of drafts) {
        const record: TaskRecord = { ...draft, seq: await this.records.allocateSeq() };
        try {
          await this.records.compareAndSet(record, null);
        } catch (err) {
          if (err instanceof ConcurrencyConflictError) throw new ValidationError(`task already exists: ${record.id}`);
          throw err;
        }
        records.push(record);
      }
      return records;
    });

    const ids = written.map((r) => r.id);
    this.logger.info('task decomposed', { id: parentId, children: ids });
    for (const record of written) {
      await this.audit.append({
        type: 'task_created',
        actor,
        taskId: record.id,
        data: { title: record.title, type: record.type, status: record.status, priority: record.priority, parent: parentId }
      });
    }
    await this.refreshIndex();
    const tasks = await this.snapshot();
    return ids.flatMap((id) => tasks.find((t) => t.id === id) ?? []);
  }

  async update(id: string, patch: TaskPatch, opts: WriteOptions = {}): Promise<Task> {
    const parsed = TaskPatchSchema.safeParse(patch);
    if (!parsed.success) throw ValidationError.fromZod(`invalid update for ${id}`, parsed.error);
    await this.write(id, parsed.data, opts);
    return await this.get(id);
  }

  /**
   * Mark a task done. Refused while children are open or the body still
   * lists unfinished work, unless forced.
   */
  async complete(id: string, opts: WriteOptions = {}): Promise<Task> {
    return await this.update(id, { status: 'done' }, opts);
  }

  /**
   * Complete each task in order. A refusal is reported for its id and the
   * rest still run, so children listed before their parent let it close.
   */
  async completeMany(ids: readonly string[], opts: WriteOptions = {}): Promise<CompletionResult[]> {
    const results: CompletionResult[] = [];
    for (const id of ids) {
      try {
        results.push({ id, ok: true, task: await this.complete(id, opts) });
      } catch (err) {
        if (!(err instanceof TrellisError)) throw err;
        results.push({ id, ok: false, error: { code: err.code, message: err.message } });
      }
    }
    return results;
  }

  async claim(id: string, assignee: string, opts: { actor?: string } = {}): Promise<Task> {
    return await this.update(id, { status: 'in_progress', assignee }, { actor: opts.actor ?? assignee });
  }

  /**
   * Claim the best ready task. A lost race moves on to a fresh read of the
   * queue instead of retrying the same task.
   */
  async claimNext(assignee: string, filter: Omit<TaskFilter, 'status'> = {}, opts: { actor?: string } = {}): Promise<Task | null> {
    const tried = new Set<string>();
    for (;;) {
      const queue = await this.ready(filter);
      const candidate = queue.find((t) => !tried.has(t.id));
      if (!candidate) return null;
      tried.add(candidate.id);
      try {
        return await this.claim(candidate.id, assignee, opts);
      } catch (err) {
        if (err instanceof AlreadyClaimedError || err instanceof ValidationError) {
          this.logger.debug('claim lost, re-reading ready queue', { id: candidate.id, reason: err.message });
          continue;
        }
        throw err;
      }
    }
  }

  /** Operator revert of a claim: `in_progress -> active`, assignee cleared. */
  async revertClaim(id: string, opts: { actor?: string; expectedVersion?: number } = {}): Promise<Task> {
    const current = await this.get(id);
    if (current.status !== 'in_progress') {
      throw new ValidationError(`task ${id} is ${current.status}, not in_progress`);
    }
    await this.write(
      id,
      { status: 'active', assignee: null, expectedVersion: opts.expectedVersion },
      { force: true, actor: opts.actor ?? DEFAULT_ACTOR },
      'claim_reverted'
    );
    return await this.get(id);
  }

  /**
   * In-progress tasks whose last write is older than `olderThanMs`. Unless
   * `dryRun`, each is reverted to active; tasks touched meanwhile are left alone.
   */
  async resetStalled(opts: ResetStalledOptions): Promise<Task[]> {
    const cutoff = this.clock().getTime() - opts.olderThanMs;
    const stalled = (await this.list({ status: 'in_progress' })).filter((t) => Date.parse(t.updated) < cutoff);
    if (opts.dryRun) return stalled;

    const reverted: Task[] = [];
    for (const t of stalled) {
      try {
        reverted.push(await this.revertClaim(t.id, { actor: opts.actor, expectedVersion: t.version }));
      } catch (err) {
        if (!(err instanceof ConcurrencyConflictError)) throw err;
        this.logger.info('stalled task changed before reset; skipped', { id: t.id });
      }
    }
    return reverted;
  }

  /** Rebuild the derived index from the records. */
  async reindex(opts: { actor?: string } = {}): Promise<GraphIndex> {
    const index = await this.buildIndex();
    if (this.indexPath) await writeGraphIndex(this.indexPath, index);
    await this.audit.append({ type: 'index_rebuilt', actor: opts.actor ?? DEFAULT_ACTOR, data: { count: index.count } });
    return index;
  }

  // ── Internals ──────────────────────────────────────────────────────────────

  private async loadGraph(): Promise<Graph> {
    const records = await this.records.list();
    return { records, byId: new Map(records.map((r) => [r.id, r] as const)) };
  }

  private async write(id: string, patch: ParsedTaskPatch, opts: WriteOptions, event?: LedgerEventType): Promise<WriteResult> {
    const actor = opts.actor ?? DEFAULT_ACTOR;
    const force = opts.force ?? false;

    const result = await this.mutex.run(id, async () => {
      for (let attempt = 1; ; attempt++) {
        const graph = await this.loadGraph();
        const current = graph.byId.get(id);
        if (!current) throw new NotFoundError(id);
        if (patch.expectedVersion !== undefined && patch.expectedVersion !== current.version) {
          throw new ConcurrencyConflictError(id, patch.expectedVersion, current.version);
        }

        const next = this.applyPatch(current, patch, graph, { force, actor });
        try {
          await this.records.compareAndSet(next, current.version);
          return { previous: current, next };
        } catch (err) {
          // Another process wrote first: re-evaluate against its state unless the caller pinned a version.
          const retry = err instanceof ConcurrencyConflictError && patch.expectedVersion === undefined && attempt < this.maxWriteAttempts;
          if (!retry) throw err;
          this.logger.debug('write race, re-reading task', { id, attempt });
        }
      }
    });

    const { previous, next } = result;
    const type = event ?? eventFor(previous.status, next.status);
    this.logger.info(type.replace('_', ' '), { id, from: previous.status, to: next.status, actor });
    await this.audit.append({
      type,
      actor,
      taskId: id,
      data: {
        changes: diffFields(previous, next),
        ...(patch.appendBody ? { appended: patch.appendBody } : {}),
        ...(force ? { forced: true } : {})
      }
    });

    if (previous.status !== next.status && isTerminal(next.status)) {
      await this.propagateUnblocks(id);
    }
    await this.refreshIndex();
    return result;
  }

  private applyPatch(current: TaskRecord, p: ParsedTaskPatch, graph: Graph, ctx: { force: boolean; actor: string }): TaskRecord {
    if (p.body !== undefined && p.expectedVersion === undefined) {
      throw new ValidationError('a full body rewrite requires expectedVersion; use appendBody to add to the body');
    }

    let body = p.body ?? current.body;
    if (p.appendBody) body = body ? `${body}\n\n${p.appendBody}` : p.appendBody;

    const next: TaskRecord = {
      ...current,
      title: p.title ?? current.title,
      type: p.type ?? current.type,
      status: p.status ?? current.status,
      priority: p.priority ?? current.priority,
      assignee: p.assignee !== undefined ? p.assignee : current.assignee,
      parent: p.parent !== undefined ? p.parent : current.parent,
      project: p.project !== undefined ? p.project : current.project,
      dependsOn: p.dependsOn ?? current.dependsOn,
      softDependsOn: p.softDependsOn ?? current.softDependsOn,
      branch: p.branch !== undefined ? p.branch : current.branch,
      tags: p.tags ?? current.tags,
      due: p.due !== undefined ? p.due : current.due,
      body,
      updated: this.clock().toISOString(),
      version: current.version + 1
    };

    this.validateGraphEdges(next, graph, {
      parent: p.parent !== undefined,
      dependsOn: p.dependsOn !== undefined,
      softDependsOn: p.softDependsOn !== undefined,
      project: p.project !== undefined || p.type !== undefined
    });
    this.validateStatusChange(current, next, graph, ctx);
    return next;
  }

  private validateStatusChange(current: TaskRecord, next: TaskRecord, graph: Graph, ctx: { force: boolean; actor: string }): void {
    const from = current.status;
    const to = next.status;
    const openDeps = next.dependsOn.filter((dep) => {
      const d = graph.byId.get(dep);
      return d !== undefined && !isTerminal(d.status);
    });

    // Claim exclusivity: a held claim only changes hands through a revert.
    if (from === 'in_progress' && to === 'in_progress' && next.assignee !== current.assignee) {
      throw new AlreadyClaimedError(current.id, current.assignee);
    }
    if (from === to) return;

    const terminal = terminalRefusal(from);
    if (terminal) throw new ValidationError(`cannot move ${current.id}: ${terminal}`);

    if (to === 'done' && !ctx.force) {
      const children = openChildren(current.id, graph);
      if (children.length) throw new HasIncompleteChildrenError(current.id, children);
      const markers = findIncompleteMarkers(next.body);
      if (markers.length) throw new IncompleteChecklistError(current.id, markers);
    }

    const check = checkTransition(from, to, {
      force: ctx.force,
      actor: ctx.actor,
      branch: next.branch,
      priorBranch: current.branch
    });
    if (!check.ok) throw new ValidationError(`cannot move ${current.id}: ${check.reason}`);
    if (check.forced) this.logger.warn('forced status transition', { id: current.id, from, to, actor: ctx.actor });

    if (to === 'in_progress') {
      if (!next.assignee) throw new ValidationError(`claiming ${current.id} requires an assignee`);
      if (openDeps.length) {
        throw new ValidationError(`task ${current.id} is not claimable; unfinished hard dependencies: ${openDeps.join(', ')}`);
      }
    }
    if (to === 'blocked' && openDeps.length === 0) {
      throw new ValidationError(`blocking ${current.id} requires dependsOn to name an unfinished task`);
    }
    if (from === 'blocked' && to === 'active' && openDeps.length && !ctx.force) {
      throw new ValidationError(`task ${current.id} is still blocked by: ${openDeps.join(', ')}`);
    }
  }

  private validateGraphEdges(
    task: TaskRecord,
    graph: Graph,
    changed: { parent: boolean; dependsOn: boolean; softDependsOn: boolean; project: boolean }
  ): void {
    const exists = (ref: string) => ref === task.id || graph.byId.has(ref);

    if (changed.parent && task.parent) {
      if (!exists(task.parent)) throw new NotFoundError(task.parent);
      const parentOf = (id: string) => (id === task.id ? task.parent : (graph.byId.get(id)?.parent ?? null));
      const cycle = findParentCycle(task.id, parentOf);
      if (cycle) throw new CycleDetectedError(cycle, 'parent');
    }

    if (changed.dependsOn) {
      for (const dep of task.dependsOn) if (!exists(dep)) throw new NotFoundError(dep);
      const next = (id: string) => (id === task.id ? task.dependsOn : (graph.byId.get(id)?.dependsOn ?? []));
      const cycle = findCycleFrom(task.id, next);
      if (cycle) throw new CycleDetectedError(cycle, 'dependsOn');
    }

    if (changed.softDependsOn) {
      for (const dep of task.softDependsOn) {
        if (!exists(dep)) throw new NotFoundError(dep);
        if (dep === task.id) throw new ValidationError(`task ${task.id} cannot soft-depend on itself`);
      }
    }

    if (changed.project && task.project) {
      const self = task.project === task.id && task.type === 'project';
      const target = graph.byId.get(task.project);
      if (!self && (!target || target.type !== 'project')) {
        throw new ValidationError(`project "${task.project}" does not resolve to a task of type project`);
      }
    }

    if (changed.project && task.type !== 'project') {
      const members = [...graph.byId.values()].filter((t) => t.id !== task.id && t.project === task.id).map((t) => t.id);
      if (members.length) {
        throw new ValidationError(`task ${task.id} is the project of ${members.join(', ')}; it must stay type project`);
      }
    }
  }

  /**
   * After `doneId` reaches a terminal state, move each blocked dependent whose
   * hard dependencies are now all terminal back to active.
   */
  private async propagateUnblocks(doneId: string): Promise<void> {
    const graph = await this.loadGraph();
    const dependents = graph.records.filter((t) => t.status === 'blocked' && t.dependsOn.includes(doneId));
    for (const d of dependents) {
      const clear = d.dependsOn.every((dep) => {
        const r = graph.byId.get(dep);
        return r !== undefined && isTerminal(r.status);
      });
      if (!clear) continue;
      try {
        await this.write(d.id, { status: 'active', expectedVersion: d.version }, { actor: SYSTEM_ACTOR }, 'task_unblocked');
      } catch (err) {
        if (!(err instanceof ConcurrencyConflictError)) throw err;
        this.logger.info('dependent changed before unblock; left as is', { id: d.id });
      }
    }
  }

  private async buildIndex(): Promise<GraphIndex> {
    const { records } = await this.loadGraph();
    const weights = this.resolver.recompute(records);
    const tasks = records.map((r) => ({ ...r, downstreamWeight: weights.get(r.id) ?? 0 }));
    return buildGraphIndex(tasks, this.resolver.readyQueue(records, weights), this.clock());
  }

  private async refreshIndex(): Promise<void> {
    if (!this.indexPath) return;
    try {
      await writeGraphIndex(this.indexPath, await this.buildIndex());
    } catch (err) {
      // The records are already written; a stale index is rebuilt by `reindex`.
      this.logger.warn('index refresh failed', { error: err instanceof Error ? err.message : String(err) });
    }
  }
}

function openChildren(id: string, graph: Graph): string[] {
  return graph.records.filter((t) => t.parent === id && !isTerminal(t.status)).map((t) => t.id);
}

function eventFor(from: TaskStatus, to: TaskStatus): LedgerEventType {
  if (from === to) return 'task_updated';
  if (to === 'in_progress') return 'task_claimed';
  if (to === 'done') return 'task_completed';
  return 'task_updated';
}

function diffFields(a: TaskRecord, b: TaskRecord): Record<string, { from: unknown; to: unknown }> {
  const out: Record<string, { from: unknown; to: unknown }> = {};
  for (const key of AUDITED_FIELDS) {
    if (JSON.stringify(a[key]) !== JSON.stringify(b[key])) out[key] = { from: a[key], to: b[key] };
  }
  if (a.body !== b.body) out.body = { from: a.body.length, to: b.body.length };
  return out;
}

function draftRecord(id: string, data: ParsedCreateTaskInput, now: string): TaskRecord {
  return {
    id,
    title: data.title,
    body: data.body,
    type: data.type,
    status: data.status,
    priority: data.priority,
    assignee: data.assignee,
    parent: data.parent,
    project: data.project,
    dependsOn: data.dependsOn,
    softDependsOn: data.softDependsOn,
    branch: data.branch,
    tags: data.tags,
    due: data.due,
    created: now,
    updated: now,
    version: 1,
    seq: 0
  };
}
