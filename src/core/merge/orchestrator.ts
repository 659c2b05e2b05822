import { resolve } from 'node:path';
import { ExecaError } from 'execa';

import { MergeConfig } from '../../config/types.js';
import {
  commitStaged,
  deleteBranch,
  deleteRemoteBranch,
  dirtyPaths,
  getCurrentBranch,
  getCurrentCommit,
  git,
  hasStagedChanges,
  isClean,
  listRemotes,
  listWorktrees,
  push,
  remoteBranchExists,
  removeWorktree,
  resetHard,
  squashMerge,
  type GitRepo
} from '../../git/operations.js';
import { silentLogger, type Logger } from '../../utils/logger.js';
import type { GraphStore } from '../graph/store.js';
import type { AuditSink } from '../ledger/types.js';
import { errorMessage, MergeConflictError, TestFailureError, TimeoutError } from '../task/errors.js';
import { ORCHESTRATOR_ACTOR, type Task } from '../task/types.js';
import { discoverCandidates } from './discovery.js';
import type { FailureReason, MergeCandidate, MergeOutcome, MergeReport, TestRunner } from './types.js';
import { runTestCommand } from './verify.js';

export type MergeStage = 'discovered' | 'validating' | 'merging' | 'verifying' | 'cleaning';

export interface MergeOrchestratorOptions {
  repoRoot: string;
  store: GraphStore;
  config?: Partial<MergeConfig>;
  audit?: AuditSink;
  logger?: Logger;
  runTests?: TestRunner;
  /** Called as each candidate moves through the pipeline (CLI progress). */
  onStage?: (candidate: MergeCandidate, stage: MergeStage) => void;
}

/**
 * Integrates finished task branches into main, one at a time:
 * discover, validate, squash-merge, run the tests, then push and clean up.
 * Any failure after the merge resets main to where it was and sends the
 * task back to review with the literal output.
 */
export class MergeOrchestrator {
  readonly config: MergeConfig;
  private readonly repo: GitRepo;
  private readonly store: GraphStore;
  private readonly audit: AuditSink | undefined;
  private readonly logger: Logger;
  private readonly runTests: TestRunner;
  private readonly onStage: (candidate: MergeCandidate, stage: MergeStage) => void;

  constructor(opts: MergeOrchestratorOptions) {
    this.config = MergeConfig.parse(opts.config ?? {});
    this.repo = git(resolve(opts.repoRoot));
    this.store = opts.store;
    this.audit = opts.audit;
    this.logger = opts.logger ?? silentLogger;
    this.runTests = opts.runTests ?? runTestCommand;
    this.onStage = opts.onStage ?? (() => {});
  }

  async discover(): Promise<MergeCandidate[]> {
    const tasks = await this.store.snapshot();
    return await discoverCandidates(this.repo, tasks, this.config);
  }

  async run(): Promise<MergeReport> {
    const startedAt = new Date().toISOString();
    const candidates = await this.discover();
    this.logger.info('merge candidates discovered', { count: candidates.length });

    const outcomes: MergeOutcome[] = [];
    for (const candidate of candidates) {
      this.onStage(candidate, 'discovered');
      let outcome: MergeOutcome;
      try {
        outcome = await this.process(candidate);
      } catch (err) {
        // One broken candidate never stops the rest of the queue.
        this.logger.error('merge candidate failed unexpectedly', { task: candidate.taskId, error: errorMessage(err) });
        const { message, output } = failureDetail(err);
        outcome = { kind: 'failed', taskId: candidate.taskId, branch: candidate.branch, reason: 'error', message, output };
      }
      outcomes.push(outcome);
      await this.record(outcome);
    }

    return {
      mainBranch: this.config.mainBranch,
      startedAt,
      finishedAt: new Date().toISOString(),
      outcomes,
      exitCode: outcomes.some((o) => o.kind === 'failed') ? 1 : 0
    };
  }

  private async process(candidate: MergeCandidate): Promise<MergeOutcome> {
    const { taskId, branch } = candidate;
    const task = await this.store.get(taskId);

    if (candidate.classification === 'already_merged') {
      return await this.settleAlreadyMerged(task, branch);
    }
    if (task.status !== 'merge_ready') {
      return { kind: 'skipped', taskId, branch, reason: `task is ${task.status}; only merge_ready tasks are merged` };
    }

    this.onStage(candidate, 'validating');
    const problem = await this.validate(branch);
    if (problem) {
      return { kind: 'failed', taskId, branch, reason: 'validation', message: problem, output: '' };
    }

    this.onStage(candidate, 'merging');
    const preHead = await getCurrentCommit(this.repo);
    await this.audit?.append({ type: 'merge_started', actor: ORCHESTRATOR_ACTOR, taskId, data: { branch, preHead } });

    let integrated: { commit: string; pushed: boolean } | MergeOutcome;
    try {
      integrated = await this.integrate(candidate, task, preHead);
    } catch (err) {
      await resetHard(this.repo, preHead);
      const { message, output } = failureDetail(err);
      return await this.sendBack(task, branch, 'error', message, output);
    }
    if ('kind' in integrated) return integrated;
    const { commit, pushed } = integrated;

    await this.store.update(
      task.id,
      { status: 'done', appendBody: `Merged into ${this.config.mainBranch} as ${commit} from ${branch}.` },
      // The code is on main now; open children or checklists in the body cannot undo that.
      { actor: ORCHESTRATOR_ACTOR, force: true }
    );

    this.onStage(candidate, 'cleaning');
    const cleanup = await this.cleanup(branch, pushed);
    return { kind: 'merged', taskId, branch, commit, pushed, cleanup };
  }

  /**
   * Squash-merge, commit, test and push. Returns the failed outcome when a
   * step refuses; a step that throws is left to the caller to undo.
   */
  private async integrate(
    candidate: MergeCandidate,
    task: Task,
    preHead: string
  ): Promise<{ commit: string; pushed: boolean } | MergeOutcome> {
    const { branch } = candidate;
    const merged = await squashMerge(this.repo, branch);
    if (!merged.ok) {
      await resetHard(this.repo, preHead);
      const err = new MergeConflictError(branch, merged.output);
      return await this.sendBack(task, branch, 'conflict', err.message, err.output);
    }
    if (!(await hasStagedChanges(this.repo))) {
      await resetHard(this.repo, preHead);
      return await this.settleAlreadyMerged(task, branch);
    }
    const commit = await commitStaged(this.repo, `${task.title} [${task.id}]`);

    this.onStage(candidate, 'verifying');
    const verification = await this.runTests({
      cwd: this.repo.repoRoot,
      command: this.config.testCommand,
      timeoutMs: this.config.testTimeoutMs
    });
    if (verification.status !== 'passed') {
      await resetHard(this.repo, preHead);
      const { testCommand, testTimeoutMs } = this.config;
      const err =
        verification.status === 'timeout'
          ? new TimeoutError(testCommand, testTimeoutMs, verification.output)
          : new TestFailureError(testCommand, verification.exitCode, verification.output);
      return await this.sendBack(task, branch, err.code, err.message, err.output);
    }

    let pushed = false;
    if (this.config.remote && (await listRemotes(this.repo)).includes(this.config.remote)) {
      const res = await push(this.repo, this.config.remote, this.config.mainBranch);
      if (!res.ok) {
        await resetHard(this.repo, preHead);
        return await this.sendBack(task, branch, 'push', `push to ${this.config.remote} failed`, res.output);
      }
      pushed = true;
    }
    return { commit, pushed };
  }

  /** @returns a reason the branch cannot be merged right now, or null */
  private async validate(branch: string): Promise<string | null> {
    const current = await getCurrentBranch(this.repo);
    if (current !== this.config.mainBranch) {
      return `${this.config.mainBranch} is not checked out (HEAD is ${current})`;
    }
    const dirty = await dirtyPaths(this.repo, { ignoreEngineArtifacts: true });
    if (dirty.length) {
      return `uncommitted changes on ${this.config.mainBranch}: ${dirty.join(', ')}`;
    }
    const worktree = (await listWorktrees(this.repo)).find((w) => w.branch === branch);
    if (worktree && !(await isClean(git(worktree.path), { ignoreEngineArtifacts: true }))) {
      return `worktree ${worktree.path} for ${branch} has uncommitted changes`;
    }
    return null;
  }

  private async settleAlreadyMerged(task: Task, branch: string): Promise<MergeOutcome> {
    if (task.status !== 'merge_ready') {
      return { kind: 'already_merged', taskId: task.id, branch, markedDone: false };
    }
    await this.store.update(
      task.id,
      { status: 'done', appendBody: `${branch} has no changes missing from ${this.config.mainBranch}; nothing to merge.` },
      { actor: ORCHESTRATOR_ACTOR, force: true }
    );
    return { kind: 'already_merged', taskId: task.id, branch, markedDone: true };
  }

  private async sendBack(task: Task, branch: string, reason: FailureReason, message: string, output: string): Promise<MergeOutcome> {
    const body = [`Merge of ${branch} failed (${reason}): ${message}`, '', '```', output.trimEnd(), '```'].join('\n');
    await this.store.update(task.id, { status: 'review', appendBody: body }, { actor: ORCHESTRATOR_ACTOR });
    return { kind: 'failed', taskId: task.id, branch, reason, message, output };
  }

  /** Remove the branch's worktree, the local branch and its remote copy. Failures are reported, not fatal. */
  private async cleanup(branch: string, pushed: boolean): Promise<string[]> {
    const steps: string[] = [];
    const attempt = async (label: string, fn: () => Promise<void>) => {
      try {
        await fn();
        steps.push(label);
      } catch (err) {
        this.logger.warn('merge cleanup step failed', { branch, step: label, error: errorMessage(err) });
        steps.push(`${label} (failed: ${errorMessage(err)})`);
      }
    };

    const worktree = (await listWorktrees(this.repo)).find((w) => w.branch === branch);
    if (worktree && resolve(worktree.path) !== resolve(this.repo.repoRoot)) {
      await attempt(`removed worktree ${worktree.path}`, () => removeWorktree(this.repo, worktree.path));
    }
    // Squashed branches are never ancestors of main, so -d would refuse.
    await attempt(`deleted branch ${branch}`, () => deleteBranch(this.repo, branch, { force: true }));

    const remote = this.config.remote;
    if (pushed && remote && (await remoteBranchExists(this.repo, remote, branch))) {
      await attempt(`deleted ${remote}/${branch}`, async () => {
        const res = await deleteRemoteBranch(this.repo, remote, branch);
        if (!res.ok) throw new Error(res.output.trim() || `git push --delete exited ${res.exitCode ?? 'unknown'}`);
      });
    }
    return steps;
  }

  private async record(outcome: MergeOutcome): Promise<void> {
    const base = { actor: ORCHESTRATOR_ACTOR, taskId: outcome.taskId };
    switch (outcome.kind) {
      case 'merged':
        this.logger.info('merged', { task: outcome.taskId, commit: outcome.commit });
        await this.audit?.append({ ...base, type: 'merge_completed', data: { branch: outcome.branch, commit: outcome.commit, pushed: outcome.pushed } });
        return;
      case 'already_merged':
        this.logger.info('already merged', { task: outcome.taskId, branch: outcome.branch });
        await this.audit?.append({ ...base, type: 'merge_skipped', data: { branch: outcome.branch, reason: 'already merged', markedDone: outcome.markedDone } });
        return;
      case 'skipped':
        this.logger.info('skipped', { task: outcome.taskId, reason: outcome.reason });
        await this.audit?.append({ ...base, type: 'merge_skipped', data: { branch: outcome.branch, reason: outcome.reason } });
        return;
      case 'failed':
        this.logger.warn('merge failed', { task: outcome.taskId, reason: outcome.reason, message: outcome.message });
        await this.audit?.append({ ...base, type: 'merge_failed', data: { branch: outcome.branch, reason: outcome.reason, message: outcome.message } });
        return;
    }
  }
}

/** A git failure carries its command line and stderr; anything else only its message. */
function failureDetail(err: unknown): { message: string; output: string } {
  if (err instanceof ExecaError) {
    return { message: err.shortMessage, output: typeof err.stderr === 'string' ? err.stderr : '' };
  }
  return { message: errorMessage(err), output: '' };
}
