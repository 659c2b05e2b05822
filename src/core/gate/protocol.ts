import { z } from 'zod';

import { RiskLevel } from '../../config/types.js';
import { silentLogger, type Logger } from '../../utils/logger.js';
import type { HookRouter } from './hooks.js';
import { createSessionState } from './session.js';
import { OPERATION_KINDS, type GateDecision, type GateFlags, type SessionState, type ToolOperation } from './types.js';

const SessionId = z.string().min(1);

const Operation = z.object({
  tool: z.string().min(1),
  kind: z.enum(OPERATION_KINDS).optional(),
  paths: z.array(z.string()).optional(),
  command: z.string().optional(),
  subagent: z.string().optional(),
  input: z.record(z.string(), z.unknown()).optional()
});

/** One line of the hook protocol, as an agent runtime sends it. */
export const HookEventSchema = z.discriminatedUnion('event', [
  z.object({
    event: z.literal('session_start'),
    session: SessionId,
    workflow: z.string().min(1).optional(),
    risk: RiskLevel.optional(),
    task: z.string().min(1).optional(),
    bypass: z.boolean().optional()
  }),
  Operation.extend({ event: z.literal('pre_tool_use'), session: SessionId }),
  Operation.extend({
    event: z.literal('post_tool_use'),
    session: SessionId,
    result: z.object({ ok: z.boolean(), taskId: z.string().optional(), text: z.string().optional() })
  }),
  z.object({ event: z.literal('stop'), session: SessionId, text: z.string().optional() })
]);
export type HookEvent = z.infer<typeof HookEventSchema>;

export type HookReply =
  | ({ event: HookEvent['event']; session: string } & GateDecision)
  | { event: 'post_tool_use'; session: string; verdict: 'allow'; messages: string[]; flags: GateFlags }
  | { event: 'error'; verdict: 'error'; error: string };

/**
 * Sessions for one hook process, keyed by id. Nothing here is persisted: a
 * session lives as long as the process that serves its hooks.
 */
export class HookSessionRegistry {
  private readonly sessions = new Map<string, SessionState>();

  constructor(
    private readonly router: HookRouter,
    private readonly logger: Logger = silentLogger
  ) {}

  get(id: string): SessionState | undefined {
    return this.sessions.get(id);
  }

  async handle(event: HookEvent): Promise<HookReply> {
    switch (event.event) {
      case 'session_start': {
        const session = createSessionState(event.session, {
          workflow: event.workflow,
          risk: event.risk,
          currentTask: event.task,
          gatesBypassed: event.bypass
        });
        this.sessions.set(event.session, session);
        this.logger.debug('session started', { session: event.session, workflow: session.workflow });
        return { event: event.event, session: event.session, verdict: 'allow', messages: [] };
      }
      case 'pre_tool_use': {
        const decision = await this.router.preToolUse(this.sessionFor(event.session), toOperation(event));
        return { event: event.event, session: event.session, ...decision };
      }
      case 'post_tool_use': {
        const session = this.sessionFor(event.session);
        await this.router.postToolUse(session, toOperation(event), event.result);
        return { event: event.event, session: event.session, verdict: 'allow', messages: [], flags: { ...session.flags } };
      }
      case 'stop': {
        const decision = await this.router.stop(this.sessionFor(event.session), event.text);
        if (decision.verdict === 'allow') this.sessions.delete(event.session);
        return { event: event.event, session: event.session, ...decision };
      }
    }
  }

  /** Parse and handle one protocol line; malformed input becomes an error reply. */
  async handleLine(line: string): Promise<HookReply> {
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch (err) {
      return { event: 'error', verdict: 'error', error: `invalid JSON: ${err instanceof Error ? err.message : String(err)}` };
    }
    const parsed = HookEventSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message));
      return { event: 'error', verdict: 'error', error: `invalid hook event: ${issues.join('; ')}` };
    }
    return await this.handle(parsed.data);
  }

  /** Events for a session that never announced itself start one with defaults. */
  private sessionFor(id: string): SessionState {
    const existing = this.sessions.get(id);
    if (existing) return existing;
    this.logger.warn('hook event for unknown session; starting it with defaults', { session: id });
    const session = createSessionState(id);
    this.sessions.set(id, session);
    return session;
  }
}

function toOperation(event: z.infer<typeof Operation>): ToolOperation {
  return {
    tool: event.tool,
    kind: event.kind,
    paths: event.paths,
    command: event.command,
    subagent: event.subagent,
    input: event.input
  };
}
