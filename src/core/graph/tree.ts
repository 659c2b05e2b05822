import type { Task, TaskStatus } from '../task/types.js';

export interface TaskTreeNode {
  task: Task;
  children: TaskTreeNode[];
  /** True when `maxDepth` cut off existing children. */
  truncated: boolean;
}

export interface TreeOptions {
  excludeStatus?: readonly TaskStatus[];
  maxDepth?: number;
}

/**
 * Build the parent/child tree rooted at `root`. Children are ordered by
 * priority then insertion order. Excluded statuses prune the whole subtree.
 */
export function buildTaskTree(root: Task, tasks: readonly Task[], opts: TreeOptions = {}): TaskTreeNode {
  const exclude = new Set(opts.excludeStatus ?? []);
  const maxDepth = opts.maxDepth ?? Number.POSITIVE_INFINITY;

  const childrenOf = new Map<string, Task[]>();
  for (const t of tasks) {
    if (!t.parent) continue;
    const list = childrenOf.get(t.parent);
    if (list) list.push(t);
    else childrenOf.set(t.parent, [t]);
  }

  const build = (task: Task, depth: number, seen: Set<string>): TaskTreeNode => {
    const kids = (childrenOf.get(task.id) ?? [])
      .filter((c) => !exclude.has(c.status) && !seen.has(c.id))
      .sort((a, b) => a.priority - b.priority || a.seq - b.seq);
    if (depth >= maxDepth) {
      return { task, children: [], truncated: kids.length > 0 };
    }
    const nextSeen = new Set(seen).add(task.id);
    return { task, children: kids.map((c) => build(c, depth + 1, nextSeen)), truncated: false };
  };

  return build(root, 0, new Set());
}

/** Depth-first flattening, handy for rendering. */
export function flattenTree(node: TaskTreeNode, depth = 0): Array<{ task: Task; depth: number; truncated: boolean }> {
  return [
    { task: node.task, depth, truncated: node.truncated },
    ...node.children.flatMap((c) => flattenTree(c, depth + 1))
  ];
}
