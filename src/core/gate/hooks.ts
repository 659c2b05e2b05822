import { silentLogger, type Logger } from '../../utils/logger.js';
import type { ComplianceSampler } from './custodiet.js';
import type { GateEngine } from './engine.js';
import { parseHandover } from './handover.js';
import { classifyOperation, inputTaskIds, isDestructive, taskBindingEffect } from './operations.js';
import { bindTask, unbindTask } from './session.js';
import type { GateDecision, GateFlag, SessionState, ToolOperation, ToolResult } from './types.js';

/** Spawned agent name fragment -> flag it sets. */
export const SUBAGENT_FLAGS: ReadonlyArray<{ match: RegExp; flag: GateFlag }> = [
  { match: /hydrat/i, flag: 'hydrated' },
  { match: /critic/i, flag: 'criticReviewed' },
  { match: /\bqa\b|qa[-_]|verifier/i, flag: 'qaVerified' }
];

const COMPLIANCE_AGENT = /custodiet|compliance/i;
const HANDOVER_HEADING = /^#{1,6}\s*Handover\b/im;

export interface HookRouterOptions {
  gates: GateEngine;
  sampler?: ComplianceSampler;
  logger?: Logger;
}

/**
 * The hook surface an agent runtime calls around each tool use. Combines the
 * gate engine with the compliance sampler and keeps the session's flags in
 * step with what the session actually did.
 */
export class HookRouter {
  private readonly gates: GateEngine;
  private readonly sampler: ComplianceSampler | undefined;
  private readonly logger: Logger;

  constructor(opts: HookRouterOptions) {
    this.gates = opts.gates;
    this.sampler = opts.sampler;
    this.logger = opts.logger ?? silentLogger;
  }

  async preToolUse(session: SessionState, op: ToolOperation): Promise<GateDecision> {
    const gate = await this.gates.canProceed(session, op);
    const sampled = this.sampler ? await this.sampler.observe(session, op) : null;
    return sampled ? combine(gate, sampled) : gate;
  }

  /** Record what a finished tool call changed about the session. */
  async postToolUse(session: SessionState, op: ToolOperation, result: ToolResult): Promise<void> {
    if (!result.ok) return;
    const kind = classifyOperation(op);

    if (kind === 'task_api') this.applyTaskBinding(session, op, result);

    if (kind === 'agent_spawn' && op.subagent) {
      const name = op.subagent;
      for (const { match, flag } of SUBAGENT_FLAGS) {
        if (match.test(name)) session.flags[flag] = true;
      }
      if (COMPLIANCE_AGENT.test(name)) this.sampler?.recordComplianceRun(session);
    }

    if (result.text && HANDOVER_HEADING.test(result.text)) {
      this.recordHandover(session, result.text);
    }

    if (isDestructive(kind)) session.didWork = true;
    this.logger.debug('post tool use', { session: session.id, tool: op.tool, kind, flags: session.flags });
  }

  async stop(session: SessionState, finalText?: string): Promise<GateDecision> {
    if (finalText && HANDOVER_HEADING.test(finalText)) this.recordHandover(session, finalText);
    return await this.gates.canTerminate(session);
  }

  private applyTaskBinding(session: SessionState, op: ToolOperation, result: ToolResult): void {
    const effect = taskBindingEffect(op);
    const named = inputTaskIds(op);
    if (effect === 'bind') {
      const taskId = result.taskId ?? named[0];
      if (taskId) bindTask(session, taskId);
      return;
    }
    if (effect === 'unbind') {
      const completed = result.taskId ? [result.taskId, ...named] : named;
      // A completion that names no task is taken to be the bound one.
      if (completed.length === 0 || (session.currentTask !== null && completed.includes(session.currentTask))) {
        unbindTask(session);
      }
    }
  }

  private recordHandover(session: SessionState, text: string): void {
    const check = parseHandover(text);
    session.flags.handoverComplete = check.ok;
    session.handoverMissing = check.ok ? [] : check.missing;
  }
}

/** Deny beats warn beats allow; messages from both sides are kept. */
export function combine(a: GateDecision, b: GateDecision): GateDecision {
  if (a.verdict === 'deny') return a;
  if (b.verdict === 'deny') return b;
  const messages = [...a.messages, ...b.messages];
  if (a.verdict === 'warn') return { ...a, messages };
  if (b.verdict === 'warn') return { ...b, messages };
  return { verdict: 'allow', messages };
}
