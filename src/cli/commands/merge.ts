import { MergeOrchestrator, type MergeStage } from '../../core/merge/orchestrator.js';
import type { TestRunner } from '../../core/merge/types.js';
import { getRenderer } from '../ui/renderer.js';
import type { SpinnerHandle } from '../ui/spinner.js';
import { withWorkspace, type CommandResult, type WorkspaceCommandOptions } from '../workspace.js';

export interface MergeCommandOptions extends WorkspaceCommandOptions {
  /** List candidates without merging anything. */
  dryRun?: boolean;
  runTests?: TestRunner;
}

const STAGE_TEXT: Record<MergeStage, string> = {
  discovered: 'queued',
  validating: 'checking working trees',
  merging: 'squash-merging',
  verifying: 'running tests',
  cleaning: 'cleaning up'
};

/**
 * `trellis merge`: integrate every merge-ready task branch into main, one at a
 * time. Fails (exit 1) when any candidate failed.
 */
export async function runMergeCommand(opts: MergeCommandOptions = {}): Promise<CommandResult> {
  return await withWorkspace(opts, async ({ store, config, ledger, logger, paths }) => {
    const r = getRenderer();
    const progress: { spinner: SpinnerHandle | null } = { spinner: null };

    const orchestrator = new MergeOrchestrator({
      repoRoot: paths.repoRoot,
      store,
      config: config.merge,
      audit: ledger,
      logger: logger.child('merge'),
      runTests: opts.runTests,
      onStage: (candidate, stage) => {
        const text = `${candidate.taskId} ${candidate.branch}: ${STAGE_TEXT[stage]}`;
        if (stage === 'discovered') {
          progress.spinner?.stop();
          progress.spinner = r.spinner(text);
        } else {
          progress.spinner?.update(text);
        }
      }
    });

    if (opts.dryRun) {
      const candidates = await orchestrator.discover();
      if (candidates.length === 0) r.dim('No merge candidates.');
      for (const c of candidates) r.text(`  ${c.taskId}  ${c.branch}  ${c.classification} (${c.unmergedCommits.length} commit${c.unmergedCommits.length === 1 ? '' : 's'})`);
      r.data(candidates);
      return { ok: true, details: candidates };
    }

    const report = await orchestrator.run();
    progress.spinner?.stop();

    r.mergeReport(report);
    r.data(report);
    if (report.exitCode !== 0) {
      const failed = report.outcomes.filter((o) => o.kind === 'failed').map((o) => o.taskId);
      return { ok: false, details: `merge failed for ${failed.join(', ')}; those tasks are back in review` };
    }
    return { ok: true, details: report };
  });
}
