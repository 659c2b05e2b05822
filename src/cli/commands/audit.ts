import { auditGraph } from '../../core/graph/audit.js';
import { getRenderer } from '../ui/renderer.js';
import { withWorkspace, type CommandResult, type WorkspaceCommandOptions } from '../workspace.js';

export interface AuditCommandOptions extends WorkspaceCommandOptions {
  /** Exit non-zero when any critical finding is present. */
  strict?: boolean;
}

/** `trellis audit`: graph health findings, critical first. */
export async function runAuditCommand(opts: AuditCommandOptions = {}): Promise<CommandResult> {
  return await withWorkspace(opts, async ({ store }) => {
    const findings = auditGraph(await store.snapshot());
    const r = getRenderer();
    r.findings(findings);
    r.data(findings);
    const critical = findings.filter((f) => f.severity === 'critical').length;
    if (opts.strict && critical > 0) {
      return { ok: false, details: `${critical} critical finding${critical === 1 ? '' : 's'}` };
    }
    return { ok: true, details: findings };
  });
}
