import { z } from 'zod';

import { isTerminal, TaskStatusSchema, type Task, type TaskStatus } from '../task/types.js';
import { readJson, writeJson } from '../../utils/fs.js';

export const GraphIndexSchema = z.object({
  version: z.literal(1),
  generatedAt: z.string(),
  count: z.number().int().nonnegative(),
  byStatus: z.record(TaskStatusSchema, z.array(z.string())),
  byProject: z.record(z.string(), z.array(z.string())),
  roots: z.array(z.string()),
  ready: z.array(z.string()),
  weights: z.record(z.string(), z.number())
});

export type GraphIndex = z.infer<typeof GraphIndexSchema>;

/**
 * Derived lookups over the whole graph. A cache for external readers only;
 * the task records stay the single source of truth and this can always be
 * rebuilt from them.
 */
export function buildGraphIndex(tasks: readonly Task[], ready: readonly Task[], now: Date = new Date()): GraphIndex {
  const byStatus: Partial<Record<TaskStatus, string[]>> = {};
  const byProject: Record<string, string[]> = {};
  const roots: string[] = [];
  const weights: Record<string, number> = {};
  const ids = new Set(tasks.map((t) => t.id));

  for (const t of [...tasks].sort((a, b) => a.seq - b.seq)) {
    (byStatus[t.status] ??= []).push(t.id);
    if (t.project) (byProject[t.project] ??= []).push(t.id);
    if ((!t.parent || !ids.has(t.parent)) && !isTerminal(t.status)) roots.push(t.id);
    weights[t.id] = t.downstreamWeight;
  }

  return {
    version: 1,
    generatedAt: now.toISOString(),
    count: tasks.length,
    byStatus,
    byProject,
    roots,
    ready: ready.map((t) => t.id),
    weights
  };
}

export async function writeGraphIndex(path: string, index: GraphIndex): Promise<void> {
  await writeJson(path, index);
}

export async function readGraphIndex(path: string): Promise<GraphIndex> {
  return GraphIndexSchema.parse(await readJson(path));
}
