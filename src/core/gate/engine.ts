import { GateConfig, type RiskLevel } from '../../config/types.js';
import { silentLogger, type Logger } from '../../utils/logger.js';
import { isProtectedPath } from '../../workspace/protected-paths.js';
import type { AuditSink } from '../ledger/types.js';
import { GateDeniedError } from '../task/errors.js';
import { classifyOperation, isDestructive, type ClassifiedKind } from './operations.js';
import { missingFlags } from './session.js';
import { allow, type GateDecision, type GateFlag, type SessionState, type ToolOperation } from './types.js';

const RISK_RANK: Record<RiskLevel, number> = { low: 1, medium: 2, high: 3 };

/** How to satisfy each gate; included in every denial. */
export const FLAG_REMEDIES: Record<GateFlag, string> = {
  taskBound: 'create or claim a task through the task API (create_task / claim_task)',
  hydrated: 'spawn the hydrator agent to load task context before editing',
  criticReviewed: 'spawn the critic agent to review the plan before writing files',
  qaVerified: 'spawn the QA agent to verify the work',
  handoverComplete: 'write a "## Handover" section with **Outcome**, **Accomplishments** and **Next step**'
};

export interface GateEngineOptions {
  config?: Partial<GateConfig>;
  logger?: Logger;
  /** Receives `gate_denied` / `gate_bypassed` entries when given. */
  audit?: AuditSink;
}

/**
 * Decides whether a session may run a tool call or end, from its gate flags.
 * Pure with respect to the session: it reads flags, never sets them.
 */
export class GateEngine {
  readonly config: GateConfig;
  private readonly logger: Logger;
  private readonly audit: AuditSink | undefined;

  constructor(opts: GateEngineOptions = {}) {
    this.config = GateConfig.parse(opts.config ?? {});
    this.logger = opts.logger ?? silentLogger;
    this.audit = opts.audit;
  }

  async canProceed(session: SessionState, op: ToolOperation): Promise<GateDecision> {
    const kind = classifyOperation(op);
    if (!isDestructive(kind)) return allow();

    if (session.gatesBypassed) {
      return await this.bypass(session, `${op.tool} (${kind})`);
    }

    const protectedHits = (op.paths ?? []).filter((p) => isProtectedPath(p, this.config.protectedPaths));
    if (protectedHits.length) {
      return await this.deny(session, op, {
        verdict: 'deny',
        reason: `${op.tool} touches engine-managed paths: ${protectedHits.join(', ')}`,
        missing: [],
        remedy: ['change task state through the task API instead of editing .trellis/ directly']
      });
    }

    const missing = this.requiredFor(session, kind).filter((f) => !session.flags[f]);
    if (missing.length) {
      const what = kind === 'unknown' ? `unrecognised tool ${op.tool}` : `${kind} operation ${op.tool}`;
      return await this.deny(session, op, {
        verdict: 'deny',
        reason: `${what} blocked; missing gate flags: ${missing.join(', ')}`,
        missing,
        remedy: missing.map((f) => `${f}: ${FLAG_REMEDIES[f]}`)
      });
    }

    if (this.config.hydrationMode === 'warn' && !session.flags.hydrated) {
      return {
        verdict: 'warn',
        reason: 'session is not hydrated',
        messages: [`hydrated: ${FLAG_REMEDIES.hydrated}`]
      };
    }
    return allow();
  }

  /** `canProceed` for callers that want an exception instead of a decision. */
  async assertCanProceed(session: SessionState, op: ToolOperation): Promise<void> {
    const decision = await this.canProceed(session, op);
    if (decision.verdict === 'deny') throw new GateDeniedError(decision.missing, decision.reason);
  }

  /** May the session end? Lists exactly the flags still missing. */
  async canTerminate(session: SessionState): Promise<GateDecision> {
    if (session.gatesBypassed) return await this.bypass(session, 'stop');

    const required: GateFlag[] = ['hydrated', 'handoverComplete'];
    if (session.didWork && !this.config.qaExemptWorkflows.includes(session.workflow)) {
      required.push('qaVerified');
    }
    const missing = missingFlags(session, required);
    if (!missing.length) return allow();

    const remedy = missing.map((f) => `${f}: ${FLAG_REMEDIES[f]}`);
    if (missing.includes('handoverComplete') && session.handoverMissing.length) {
      remedy.push(`handover is missing: ${session.handoverMissing.join(', ')}`);
    }
    return await this.deny(session, { tool: 'stop' }, {
      verdict: 'deny',
      reason: `session cannot end yet; missing gate flags: ${missing.join(', ')}`,
      missing,
      remedy
    });
  }

  private requiredFor(session: SessionState, kind: ClassifiedKind): GateFlag[] {
    const required: GateFlag[] = ['taskBound'];
    if (this.config.hydrationMode === 'block') required.push('hydrated');
    if (kind === 'file_write' && RISK_RANK[session.risk] >= RISK_RANK[this.config.criticRiskThreshold]) {
      required.push('criticReviewed');
    }
    return required;
  }

  private async bypass(session: SessionState, what: string): Promise<GateDecision> {
    this.logger.warn('gates bypassed', { session: session.id, what });
    await this.audit?.append({ type: 'gate_bypassed', actor: `session:${session.id}`, data: { what } });
    return allow([`gates bypassed for ${what}`]);
  }

  private async deny(session: SessionState, op: ToolOperation, decision: Extract<GateDecision, { verdict: 'deny' }>): Promise<GateDecision> {
    this.logger.info('gate denied', { session: session.id, tool: op.tool, missing: decision.missing });
    await this.audit?.append({
      type: 'gate_denied',
      actor: `session:${session.id}`,
      taskId: session.currentTask ?? undefined,
      data: { tool: op.tool, reason: decision.reason, missing: decision.missing }
    });
    return decision;
  }
}
