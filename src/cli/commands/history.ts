import { getRenderer } from '../ui/renderer.js';
import { withWorkspace, type CommandResult, type WorkspaceCommandOptions } from '../workspace.js';

export interface HistoryCommandOptions extends WorkspaceCommandOptions {
  tail?: number;
  /** Only entries about this task. */
  task?: string;
}

/**
 * `trellis history`: the tail of `.trellis/audit.jsonl`, with a warning when
 * the sequence has gaps or unparsable lines.
 */
export async function runHistoryCommand(opts: HistoryCommandOptions = {}): Promise<CommandResult> {
  return await withWorkspace(opts, async ({ history }) => {
    const r = getRenderer();
    const integrity = await history.verifyIntegrity();
    if (!integrity.ok) r.warn(`Ledger integrity: ${integrity.message ?? 'failed'}`);

    const all = opts.task ? await history.findByTask(opts.task) : await history.readAll();
    const tail = opts.tail ?? 20;
    const entries = all.slice(Math.max(0, all.length - tail));

    r.ledger(entries);
    r.data(entries);
    return { ok: true, details: { entries, integrity } };
  });
}
