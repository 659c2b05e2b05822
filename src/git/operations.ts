import { execa } from 'execa';

export interface GitRepo {
  repoRoot: string;
}

export function git(repoRoot: string): GitRepo {
  return { repoRoot };
}

async function run(repo: GitRepo, args: string[]): Promise<string> {
  const res = await execa('git', args, {
    cwd: repo.repoRoot,
    stdout: 'pipe',
    stderr: 'pipe'
  });
  return res.stdout;
}

export interface GitResult {
  ok: boolean;
  exitCode: number | undefined;
  /** stdout and stderr interleaved, as a user would see them. */
  output: string;
}

/** Like `run`, but a non-zero exit is a result rather than an exception. */
async function tryRun(repo: GitRepo, args: string[]): Promise<GitResult> {
  const res = await execa('git', args, {
    cwd: repo.repoRoot,
    all: true,
    reject: false
  });
  return { ok: res.exitCode === 0 && !res.failed, exitCode: res.exitCode, output: res.all ?? '' };
}

export async function getCurrentCommit(repo: GitRepo): Promise<string> {
  return (await run(repo, ['rev-parse', 'HEAD'])).trim();
}

export async function getCurrentBranch(repo: GitRepo): Promise<string> {
  return (await run(repo, ['rev-parse', '--abbrev-ref', 'HEAD'])).trim();
}

export async function listLocalBranches(repo: GitRepo): Promise<string[]> {
  const out = await run(repo, ['for-each-ref', '--format=%(refname:short)', 'refs/heads/']);
  return out
    .split('\n')
    .map((s) => s.trim())
    .filter(Boolean)
    .sort();
}

/**
 * Commits on `branch` with no patch-equivalent commit on `upstream`
 * (`git cherry` lines starting with `+`).
 */
export async function unmergedCommits(repo: GitRepo, upstream: string, branch: string): Promise<string[]> {
  const out = await run(repo, ['cherry', upstream, branch]);
  return out
    .split('\n')
    .map((l) => l.trim())
    .filter((l) => l.startsWith('+'))
    .map((l) => l.slice(1).trim());
}

/** `git merge --squash`; conflicts come back as `ok: false` with git's output. */
export async function squashMerge(repo: GitRepo, branch: string): Promise<GitResult> {
  return await tryRun(repo, ['merge', '--squash', '--no-commit', branch]);
}

export async function hasStagedChanges(repo: GitRepo): Promise<boolean> {
  const out = await run(repo, ['diff', '--cached', '--name-only']);
  return out.trim().length > 0;
}

/** Commit exactly what is staged. */
export async function commitStaged(repo: GitRepo, message: string): Promise<string> {
  await run(repo, ['commit', '--no-verify', '-m', message]);
  return await getCurrentCommit(repo);
}

/**
 * Delete a local branch.
 * Equivalent: `git branch -d <name>` (`-D` with force)
 */
export async function deleteBranch(repo: GitRepo, name: string, opts?: { force?: boolean }): Promise<void> {
  const force = opts?.force ?? false;
  await run(repo, ['branch', force ? '-D' : '-d', name]);
}

export async function listRemotes(repo: GitRepo): Promise<string[]> {
  const out = await run(repo, ['remote']);
  return out
    .split('\n')
    .map((s) => s.trim())
    .filter(Boolean);
}

export async function push(repo: GitRepo, remote: string, ref: string): Promise<GitResult> {
  return await tryRun(repo, ['push', remote, ref]);
}

export async function remoteBranchExists(repo: GitRepo, remote: string, branch: string): Promise<boolean> {
  const res = await tryRun(repo, ['ls-remote', '--exit-code', '--heads', remote, branch]);
  return res.ok;
}

export async function deleteRemoteBranch(repo: GitRepo, remote: string, branch: string): Promise<GitResult> {
  return await tryRun(repo, ['push', remote, '--delete', branch]);
}

export interface WorktreeInfo {
  path: string;
  head: string | null;
  /** Short branch name, or null when detached. */
  branch: string | null;
}

export async function listWorktrees(repo: GitRepo): Promise<WorktreeInfo[]> {
  const out = await run(repo, ['worktree', 'list', '--porcelain']);
  const trees: WorktreeInfo[] = [];
  let cur: WorktreeInfo | null = null;
  for (const line of out.split('\n')) {
    if (line.startsWith('worktree ')) {
      cur = { path: line.slice('worktree '.length), head: null, branch: null };
      trees.push(cur);
    } else if (cur && line.startsWith('HEAD ')) {
      cur.head = line.slice('HEAD '.length);
    } else if (cur && line.startsWith('branch ')) {
      cur.branch = line.slice('branch '.length).replace(/^refs\/heads\//, '');
    }
  }
  return trees;
}

/**
 * Remove a worktree. By default uses --force to be resilient to stray untracked files.
 * Equivalent: `git worktree remove <path> --force`
 */
export async function removeWorktree(repo: GitRepo, worktreePath: string, opts?: { force?: boolean }): Promise<void> {
  const force = opts?.force ?? true;
  const args = ['worktree', 'remove', worktreePath];
  if (force) args.push('--force');
  await run(repo, args);
}

export async function statusPorcelain(repo: GitRepo): Promise<string> {
  return await run(repo, ['status', '--porcelain']);
}

function isEngineArtifactPath(p: string): boolean {
  return p === '.trellis' || p.startsWith('.trellis/');
}

function extractPathsFromPorcelainLine(line: string): string[] {
  // Format: XY <path> (or "?? <path>")
  // Rename format: "R  old -> new"
  const trimmed = line.trimEnd();
  if (trimmed.length < 4) return [];
  const rest = trimmed.slice(3).trim();
  if (!rest) return [];
  const arrow = ' -> ';
  if (rest.includes(arrow)) {
    const [a, b] = rest.split(arrow);
    return [a?.trim(), b?.trim()].filter((x): x is string => !!x);
  }
  return [rest.replace(/\/$/, '')];
}

/** Paths with uncommitted changes, minus the engine's own `.trellis/` state when asked. */
export async function dirtyPaths(repo: GitRepo, opts?: { ignoreEngineArtifacts?: boolean }): Promise<string[]> {
  const out = await statusPorcelain(repo);
  const paths = out
    .split('\n')
    .filter((l) => l.trim().length > 0)
    .flatMap(extractPathsFromPorcelainLine);
  return opts?.ignoreEngineArtifacts ? paths.filter((p) => !isEngineArtifactPath(p)) : paths;
}

export async function isClean(repo: GitRepo, opts?: { ignoreEngineArtifacts?: boolean }): Promise<boolean> {
  return (await dirtyPaths(repo, opts)).length === 0;
}

export async function resetHard(repo: GitRepo, commit: string): Promise<void> {
  await run(repo, ['reset', '--hard', commit]);
}
