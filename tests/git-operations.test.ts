import { describe, expect, it } from 'vitest';
import { execa } from 'execa';
import { mkdir, mkdtemp } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { branchWithCommit, commitFile, createTempGitRepo, writeFileInRepo } from './git-fixture.js';
import {
  commitStaged,
  deleteBranch,
  dirtyPaths,
  getCurrentBranch,
  getCurrentCommit,
  git,
  hasStagedChanges,
  isClean,
  listLocalBranches,
  listRemotes,
  listWorktrees,
  removeWorktree,
  resetHard,
  squashMerge,
  unmergedCommits
} from '../src/git/operations.js';

describe('git operations', () => {
  it('reports current commit, branch and clean status', async () => {
    const { dir } = await createTempGitRepo();
    const repo = git(dir);

    expect(await getCurrentCommit(repo)).toMatch(/^[0-9a-f]{40}$/);
    expect(await getCurrentBranch(repo)).toBe('main');
    expect(await isClean(repo)).toBe(true);
    expect(await listRemotes(repo)).toEqual([]);
  });

  it('squash-merges a branch into one commit that git cherry recognises', async () => {
    const { dir } = await createTempGitRepo();
    const repo = git(dir);
    await branchWithCommit(dir, 'task/a', 'a.txt', 'a\n');
    expect(await unmergedCommits(repo, 'main', 'task/a')).toHaveLength(1);

    const merged = await squashMerge(repo, 'task/a');
    expect(merged.ok).toBe(true);
    expect(await hasStagedChanges(repo)).toBe(true);

    const commit = await commitStaged(repo, 'Add a [t-a]');
    expect(commit).toBe(await getCurrentCommit(repo));
    expect(await unmergedCommits(repo, 'main', 'task/a')).toEqual([]);
  });

  it('returns conflicts as a result and resets cleanly', async () => {
    const { dir } = await createTempGitRepo();
    const repo = git(dir);
    await branchWithCommit(dir, 'task/b', 'README.md', '# from branch\n');
    await commitFile(dir, 'README.md', '# from main\n', 'main edit');
    const preHead = await getCurrentCommit(repo);

    const merged = await squashMerge(repo, 'task/b');
    expect(merged.ok).toBe(false);
    expect(merged.output).toContain('CONFLICT');

    await resetHard(repo, preHead);
    expect(await isClean(repo)).toBe(true);
  });

  it('lists dirty paths, optionally without engine state', async () => {
    const { dir } = await createTempGitRepo();
    const repo = git(dir);
    await mkdir(join(dir, '.trellis', 'tasks'), { recursive: true });
    await writeFileInRepo(dir, '.trellis/tasks/t1.json', '{}\n');
    await writeFileInRepo(dir, 'scratch.txt', 'x\n');

    expect(await dirtyPaths(repo)).toEqual(['.trellis', 'scratch.txt']);
    expect(await dirtyPaths(repo, { ignoreEngineArtifacts: true })).toEqual(['scratch.txt']);
  });

  it('finds, removes and deletes a branch worktree', async () => {
    const { dir } = await createTempGitRepo();
    const repo = git(dir);
    await execa('git', ['branch', 'task/c'], { cwd: dir });
    const wt = join(await mkdtemp(join(tmpdir(), 'trellis-wt-')), 'c');
    await execa('git', ['worktree', 'add', wt, 'task/c'], { cwd: dir });

    expect((await listWorktrees(repo)).map((w) => w.branch)).toEqual(['main', 'task/c']);

    await removeWorktree(repo, wt);
    await deleteBranch(repo, 'task/c');
    expect(await listLocalBranches(repo)).toEqual(['main']);
  });
});
