import { z } from 'zod';

import { CLAIMABLE_TYPES, isTerminal, type TaskRecord } from '../task/types.js';

export const WeightPolicySchema = z
  .object({
    includeSoftEdges: z.boolean().default(true),
    softEdgeFactor: z.number().min(0).max(1).default(0.5),
    /** Weight reached tasks by how close their (or their nearest dated ancestor's) due date is. */
    exposure: z.boolean().default(false),
    horizonDays: z.number().positive().default(14)
  })
  .strict();

export type WeightPolicy = z.infer<typeof WeightPolicySchema>;

export const DEFAULT_WEIGHT_POLICY: WeightPolicy = WeightPolicySchema.parse({});

type WeightInput = Pick<TaskRecord, 'id' | 'status' | 'dependsOn' | 'softDependsOn' | 'parent' | 'due'>;

interface InverseEdges {
  blocks: Map<string, string[]>;
  softBlocks: Map<string, string[]>;
}

/** For A depends_on B: B blocks A. For A soft_depends_on B: B soft-blocks A. */
export function buildInverseEdges(tasks: Iterable<WeightInput>): InverseEdges {
  const blocks = new Map<string, string[]>();
  const softBlocks = new Map<string, string[]>();
  const push = (m: Map<string, string[]>, from: string, to: string) => {
    const list = m.get(from);
    if (list) list.push(to);
    else m.set(from, [to]);
  };
  for (const t of tasks) {
    for (const dep of t.dependsOn) push(blocks, dep, t.id);
    for (const dep of t.softDependsOn) push(softBlocks, dep, t.id);
  }
  return { blocks, softBlocks };
}

function bfs(start: string, edges: Array<Map<string, string[]>>): Set<string> {
  const seen = new Set<string>([start]);
  const queue = [start];
  for (let i = 0; i < queue.length; i++) {
    const cur = queue[i];
    for (const m of edges) {
      for (const n of m.get(cur) ?? []) {
        if (seen.has(n)) continue;
        seen.add(n);
        queue.push(n);
      }
    }
  }
  seen.delete(start);
  return seen;
}

/**
 * Days-to-due based multiplier in [1, 2]. Tasks without a due date in their
 * parent chain count 1.
 */
export function exposureFactor(
  task: WeightInput,
  byId: ReadonlyMap<string, WeightInput>,
  now: Date,
  horizonDays: number
): number {
  let due: string | null = null;
  const seen = new Set<string>();
  for (let cur: WeightInput | undefined = task; cur && !seen.has(cur.id); cur = cur.parent ? byId.get(cur.parent) : undefined) {
    seen.add(cur.id);
    if (cur.due) {
      due = cur.due;
      break;
    }
  }
  if (!due) return 1;

  const daysUntilDue = (Date.parse(due) - now.getTime()) / 86_400_000;
  if (daysUntilDue > horizonDays) return 1;
  const urgency = Math.max(0, (horizonDays - daysUntilDue) / horizonDays);
  return 1 + Math.min(1, urgency);
}

/**
 * Compute `downstreamWeight` for every task: the (optionally exposure
 * weighted) number of open tasks reachable along inverse dependency edges.
 * Tasks reachable only through a soft edge count `softEdgeFactor`.
 */
export function computeDownstreamWeights(
  tasks: readonly WeightInput[],
  policy: WeightPolicy = DEFAULT_WEIGHT_POLICY,
  now: Date = new Date()
): Map<string, number> {
  const byId = new Map(tasks.map((t) => [t.id, t] as const));
  const { blocks, softBlocks } = buildInverseEdges(tasks);

  const contribution = (id: string): number => {
    const t = byId.get(id);
    if (!t || isTerminal(t.status)) return 0;
    return policy.exposure ? exposureFactor(t, byId, now, policy.horizonDays) : 1;
  };

  const weights = new Map<string, number>();
  for (const t of tasks) {
    const hard = bfs(t.id, [blocks]);
    let weight = 0;
    for (const id of hard) weight += contribution(id);

    if (policy.includeSoftEdges) {
      for (const id of bfs(t.id, [blocks, softBlocks])) {
        if (!hard.has(id)) weight += policy.softEdgeFactor * contribution(id);
      }
    }
    weights.set(t.id, round(weight));
  }
  return weights;
}

function round(n: number): number {
  return Math.round(n * 1000) / 1000;
}

export interface ReadyCandidate {
  id: string;
  title: string;
  priority: number;
  seq: number;
  downstreamWeight: number;
}

/** (priority ASC, downstreamWeight DESC, seq ASC, title ASC, id ASC) */
export function compareReady(a: ReadyCandidate, b: ReadyCandidate): number {
  return (
    a.priority - b.priority ||
    b.downstreamWeight - a.downstreamWeight ||
    a.seq - b.seq ||
    compareStrings(a.title, b.title) ||
    compareStrings(a.id, b.id)
  );
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function sortReady<T extends ReadyCandidate>(tasks: readonly T[]): T[] {
  return [...tasks].sort(compareReady);
}

/**
 * Active, claimable-type tasks whose hard dependencies are all terminal and
 * that have no open children.
 */
export function isReady(task: TaskRecord, byId: ReadonlyMap<string, TaskRecord>, openChildren: ReadonlySet<string>): boolean {
  if (task.status !== 'active') return false;
  if (!CLAIMABLE_TYPES.has(task.type)) return false;
  if (openChildren.has(task.id)) return false;
  return task.dependsOn.every((dep) => {
    const d = byId.get(dep);
    return d !== undefined && isTerminal(d.status);
  });
}

/** Ids of tasks that have at least one non-terminal child. */
export function tasksWithOpenChildren(tasks: readonly TaskRecord[]): Set<string> {
  const out = new Set<string>();
  for (const t of tasks) {
    if (t.parent && !isTerminal(t.status)) out.add(t.parent);
  }
  return out;
}

export class WeightResolver {
  readonly policy: WeightPolicy;

  constructor(policy: Partial<WeightPolicy> = {}, private readonly clock: () => Date = () => new Date()) {
    this.policy = WeightPolicySchema.parse(policy);
  }

  recompute(tasks: readonly TaskRecord[]): Map<string, number> {
    return computeDownstreamWeights(tasks, this.policy, this.clock());
  }

  /** The ready queue in claim order, with weights attached. */
  readyQueue(tasks: readonly TaskRecord[], weights: ReadonlyMap<string, number> = this.recompute(tasks)): Array<TaskRecord & { downstreamWeight: number }> {
    const byId = new Map(tasks.map((t) => [t.id, t] as const));
    const openChildren = tasksWithOpenChildren(tasks);
    const ready = tasks
      .filter((t) => isReady(t, byId, openChildren))
      .map((t) => ({ ...t, downstreamWeight: weights.get(t.id) ?? 0 }));
    return sortReady(ready);
  }
}
