import { CustodietConfig } from '../../config/types.js';
import { silentLogger, type Logger } from '../../utils/logger.js';
import type { GraphStore } from '../graph/store.js';
import type { AuditSink } from '../ledger/types.js';
import { NotFoundError } from '../task/errors.js';
import { classifyOperation, isDestructive } from './operations.js';
import { allow, type GateDecision, type SessionState, type ToolOperation } from './types.js';

export type ComplianceVerdict = { status: 'ok' } | { status: 'drift'; reason: string };

/** Performs the full compliance re-evaluation when the sampler's threshold is hit. */
export interface ComplianceChecker {
  evaluate(session: SessionState, op: ToolOperation): Promise<ComplianceVerdict>;
}

export const DEFAULT_REMINDERS: readonly string[] = [
  'Reminder: keep edits within the bound task; file new work as a new task.',
  'Reminder: record progress in the task body with appendBody as you go.',
  'Reminder: a session ends only after a "## Handover" section is written.'
];

export interface ComplianceSamplerOptions {
  config?: Partial<CustodietConfig>;
  checker: ComplianceChecker;
  /** Uniform [0, 1) source; inject a fixed one in tests. */
  random?: () => number;
  reminders?: readonly string[];
  logger?: Logger;
  audit?: AuditSink;
}

/**
 * Counts tool calls per session and, every `threshold` calls, runs a full
 * compliance check. In block mode a drift verdict holds every further
 * destructive call until a compliance agent run clears it.
 */
export class ComplianceSampler {
  readonly config: CustodietConfig;
  private readonly checker: ComplianceChecker;
  private readonly random: () => number;
  private readonly reminders: readonly string[];
  private readonly logger: Logger;
  private readonly audit: AuditSink | undefined;

  constructor(opts: ComplianceSamplerOptions) {
    this.config = CustodietConfig.parse(opts.config ?? {});
    this.checker = opts.checker;
    this.random = opts.random ?? Math.random;
    this.reminders = opts.reminders ?? DEFAULT_REMINDERS;
    this.logger = opts.logger ?? silentLogger;
    this.audit = opts.audit;
  }

  thresholdFor(workflow: string): number {
    const overrides = this.config.thresholdByWorkflow;
    return Object.hasOwn(overrides, workflow) ? overrides[workflow] : this.config.threshold;
  }

  async observe(session: SessionState, op: ToolOperation): Promise<GateDecision> {
    session.toolCalls += 1;
    session.callsSinceCheck += 1;
    const destructive = isDestructive(classifyOperation(op));

    if (session.callsSinceCheck >= this.thresholdFor(session.workflow)) {
      session.callsSinceCheck = 0;
      const verdict = await this.checker.evaluate(session, op);
      this.logger.debug('compliance check', { session: session.id, verdict: verdict.status });
      await this.audit?.append({
        type: 'compliance_check',
        actor: `session:${session.id}`,
        taskId: session.currentTask ?? undefined,
        data: { ...verdict, toolCalls: session.toolCalls, mode: this.config.mode }
      });

      if (verdict.status === 'drift') {
        if (this.config.mode === 'block') session.complianceHold = verdict.reason;
        else return { verdict: 'warn', reason: `compliance drift: ${verdict.reason}`, messages: [] };
      }
    }

    if (session.complianceHold && destructive && this.config.mode === 'block') {
      return {
        verdict: 'deny',
        reason: `compliance drift: ${session.complianceHold}`,
        missing: [],
        remedy: ['spawn the custodiet agent to re-check compliance; the hold clears when it runs']
      };
    }

    if (this.reminders.length && this.random() < this.config.reminderProbability) {
      const pick = Math.min(this.reminders.length - 1, Math.floor(this.random() * this.reminders.length));
      return allow([this.reminders[pick]]);
    }
    return allow();
  }

  /** A compliance agent ran: restart the countdown and lift any hold. */
  recordComplianceRun(session: SessionState): void {
    session.callsSinceCheck = 0;
    session.complianceHold = null;
  }
}

/**
 * Built-in checker: the session must be working on a task it holds. Drift is
 * a session that did work unbound, or whose bound task left `in_progress`.
 */
export class TaskBindingChecker implements ComplianceChecker {
  constructor(private readonly store: Pick<GraphStore, 'get'>) {}

  async evaluate(session: SessionState): Promise<ComplianceVerdict> {
    const id = session.currentTask;
    if (!id) {
      return session.didWork ? { status: 'drift', reason: 'work was done without a bound task' } : { status: 'ok' };
    }
    try {
      const task = await this.store.get(id);
      if (task.status !== 'in_progress') {
        return { status: 'drift', reason: `bound task ${id} is ${task.status}, not in_progress` };
      }
      return { status: 'ok' };
    } catch (err) {
      if (err instanceof NotFoundError) return { status: 'drift', reason: `bound task ${id} does not exist` };
      throw err;
    }
  }
}
