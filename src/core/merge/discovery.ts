import { listLocalBranches, unmergedCommits, type GitRepo } from '../../git/operations.js';
import type { Task } from '../task/types.js';
import type { MergeCandidate } from './types.js';

/** Turn `trellis/{id}` into a matcher that extracts the id. */
export function compileBranchPattern(pattern: string): RegExp {
  const [before, after] = pattern.split('{id}');
  const escape = (s: string) => s.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
  return new RegExp(`^${escape(before)}([A-Za-z0-9_-]+)${escape(after ?? '')}$`);
}

export function taskIdForBranch(branch: string, patterns: readonly RegExp[]): string | null {
  for (const p of patterns) {
    const m = p.exec(branch);
    if (m) return m[1];
  }
  return null;
}

/**
 * Pair local branches with tasks: by name pattern, and by each task's own
 * `branch` field. Branches that name no known task are ignored. Results are
 * ordered by task insertion order so merges run deterministically.
 */
export async function discoverCandidates(
  repo: GitRepo,
  tasks: readonly Task[],
  opts: { mainBranch: string; branchPatterns: readonly string[] }
): Promise<MergeCandidate[]> {
  const branches = new Set(await listLocalBranches(repo));
  branches.delete(opts.mainBranch);
  const byId = new Map(tasks.map((t) => [t.id, t] as const));
  const patterns = opts.branchPatterns.map(compileBranchPattern);

  const pairs = new Map<string, string>(); // branch -> task id
  for (const t of tasks) {
    if (t.branch && branches.has(t.branch)) pairs.set(t.branch, t.id);
  }
  for (const b of branches) {
    if (pairs.has(b)) continue;
    const id = taskIdForBranch(b, patterns);
    if (id && byId.has(id)) pairs.set(b, id);
  }

  const candidates: MergeCandidate[] = [];
  for (const [branch, taskId] of pairs) {
    const commits = await unmergedCommits(repo, opts.mainBranch, branch);
    candidates.push({
      taskId,
      branch,
      classification: commits.length ? 'needs_merge' : 'already_merged',
      unmergedCommits: commits
    });
  }

  const seqOf = (id: string) => byId.get(id)?.seq ?? Number.MAX_SAFE_INTEGER;
  return candidates.sort((a, b) => seqOf(a.taskId) - seqOf(b.taskId) || a.branch.localeCompare(b.branch));
}
