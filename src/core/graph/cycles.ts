/**
 * Find a cycle reachable from `start` following `next` edges.
 * Returns the cycle as a path that starts and ends on the same id, or null.
 */
export function findCycleFrom(start: string, next: (id: string) => readonly string[]): string[] | null {
  const onPath = new Set<string>();
  const done = new Set<string>();
  const path: string[] = [];

  const visit = (id: string): string[] | null => {
    if (onPath.has(id)) return [...path.slice(path.indexOf(id)), id];
    if (done.has(id)) return null;

    onPath.add(id);
    path.push(id);
    for (const n of next(id)) {
      const cycle = visit(n);
      if (cycle) return cycle;
    }
    path.pop();
    onPath.delete(id);
    done.add(id);
    return null;
  };

  return visit(start);
}

/** Walk the parent chain from `start`; returns the loop if the chain revisits a task. */
export function findParentCycle(start: string, parentOf: (id: string) => string | null): string[] | null {
  const chain: string[] = [];
  const seen = new Set<string>();
  let cur: string | null = start;
  while (cur !== null) {
    if (seen.has(cur)) return [...chain.slice(chain.indexOf(cur)), cur];
    seen.add(cur);
    chain.push(cur);
    cur = parentOf(cur);
  }
  return null;
}
