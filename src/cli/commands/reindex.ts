import { getRenderer } from '../ui/renderer.js';
import { withWorkspace, type CommandResult, type WorkspaceCommandOptions } from '../workspace.js';

/** `trellis reindex`: rebuild `.trellis/index.json` from the task records. */
export async function runReindexCommand(opts: WorkspaceCommandOptions = {}): Promise<CommandResult> {
  return await withWorkspace(opts, async ({ store, paths }) => {
    const index = await store.reindex();
    const r = getRenderer();
    r.success(`Indexed ${index.count} task${index.count === 1 ? '' : 's'} into ${paths.indexPath}`);
    r.dim(`${index.ready.length} ready, ${index.roots.length} root${index.roots.length === 1 ? '' : 's'}`);
    r.data(index);
    return { ok: true, details: index };
  });
}
