import { describe, expect, it } from 'vitest';

import { ComplianceSampler } from '../src/core/gate/custodiet.js';
import { GateEngine } from '../src/core/gate/engine.js';
import { combine, HookRouter } from '../src/core/gate/hooks.js';
import { HookSessionRegistry } from '../src/core/gate/protocol.js';
import { createSessionState } from '../src/core/gate/session.js';
import type { GateDecision } from '../src/core/gate/types.js';

const HANDOVER = '## Handover\n**Outcome**: success\n**Accomplishments**: parser wired\n**Next step**: merge';

function registry(): HookSessionRegistry {
  return new HookSessionRegistry(new HookRouter({ gates: new GateEngine() }));
}

describe('hook router', () => {
  it('walks a session from start to a permitted stop', async () => {
    const hooks = registry();

    expect(await hooks.handle({ event: 'session_start', session: 's1', workflow: 'feature' })).toEqual({
      event: 'session_start',
      session: 's1',
      verdict: 'allow',
      messages: []
    });

    const denied = await hooks.handle({ event: 'pre_tool_use', session: 's1', tool: 'Edit', paths: ['src/a.ts'] });
    expect(denied).toMatchObject({ verdict: 'deny', missing: ['taskBound', 'hydrated'] });

    const bound = await hooks.handle({
      event: 'post_tool_use',
      session: 's1',
      tool: 'create_task',
      result: { ok: true, taskId: 'web-00000001' }
    });
    expect(bound).toMatchObject({ verdict: 'allow', flags: { taskBound: true, hydrated: false } });
    expect(hooks.get('s1')?.currentTask).toBe('web-00000001');

    await hooks.handle({ event: 'post_tool_use', session: 's1', tool: 'Task', subagent: 'hydrator', result: { ok: true } });
    expect(await hooks.handle({ event: 'pre_tool_use', session: 's1', tool: 'Edit', paths: ['src/a.ts'] })).toMatchObject({
      verdict: 'allow'
    });
    await hooks.handle({ event: 'post_tool_use', session: 's1', tool: 'Edit', paths: ['src/a.ts'], result: { ok: true } });

    const early = await hooks.handle({ event: 'stop', session: 's1', text: 'done' });
    expect(early).toMatchObject({ verdict: 'deny', missing: ['handoverComplete', 'qaVerified'] });

    await hooks.handle({ event: 'post_tool_use', session: 's1', tool: 'Task', subagent: 'qa-verifier', result: { ok: true } });
    expect(await hooks.handle({ event: 'stop', session: 's1', text: HANDOVER })).toMatchObject({ verdict: 'allow' });
    expect(hooks.get('s1')).toBeUndefined();
  });

  it('binds on a move to in_progress and releases the task when it is completed', async () => {
    const hooks = registry();
    await hooks.handle({ event: 'session_start', session: 's2', workflow: 'feature' });
    await hooks.handle({ event: 'post_tool_use', session: 's2', tool: 'Task', subagent: 'hydrator', result: { ok: true } });

    await hooks.handle({
      event: 'post_tool_use',
      session: 's2',
      tool: 'update_task',
      input: { id: 't7', status: 'review' },
      result: { ok: true }
    });
    expect(hooks.get('s2')?.flags.taskBound).toBe(false);

    const bound = await hooks.handle({
      event: 'post_tool_use',
      session: 's2',
      tool: 'update_task',
      input: { id: 't7', status: 'in-progress', assignee: 'worker:a' },
      result: { ok: true }
    });
    expect(bound).toMatchObject({ flags: { taskBound: true } });
    expect(hooks.get('s2')?.currentTask).toBe('t7');
    expect(await hooks.handle({ event: 'pre_tool_use', session: 's2', tool: 'Edit', paths: ['src/a.ts'] })).toMatchObject({
      verdict: 'allow'
    });

    await hooks.handle({ event: 'post_tool_use', session: 's2', tool: 'complete_task', input: { id: 't8' }, result: { ok: true } });
    expect(hooks.get('s2')?.currentTask).toBe('t7');

    await hooks.handle({
      event: 'post_tool_use',
      session: 's2',
      tool: 'complete_tasks',
      input: { ids: ['t8', 't7'] },
      result: { ok: true }
    });
    expect(hooks.get('s2')?.currentTask).toBeNull();
    expect(await hooks.handle({ event: 'pre_tool_use', session: 's2', tool: 'Edit', paths: ['src/a.ts'] })).toMatchObject({
      verdict: 'deny',
      missing: ['taskBound']
    });
  });

  it('ignores failed tool calls', async () => {
    const router = new HookRouter({ gates: new GateEngine() });
    const session = createSessionState('s');
    await router.postToolUse(session, { tool: 'claim_task' }, { ok: false, taskId: 't1' });
    expect(session.flags.taskBound).toBe(false);
    expect(session.didWork).toBe(false);
  });

  it('clears a compliance hold when the compliance agent runs', async () => {
    const sampler = new ComplianceSampler({
      config: { threshold: 1, reminderProbability: 0 },
      checker: { evaluate: async () => ({ status: 'drift', reason: 'unbound work' }) }
    });
    const router = new HookRouter({ gates: new GateEngine({ config: { hydrationMode: 'warn' } }), sampler });
    const session = createSessionState('s', { currentTask: 't1' });

    const decision = await router.preToolUse(session, { tool: 'Edit' });
    expect(decision).toMatchObject({ verdict: 'deny', reason: 'compliance drift: unbound work' });

    await router.postToolUse(session, { tool: 'Task', subagent: 'custodiet' }, { ok: true });
    expect(session.complianceHold).toBeNull();
  });

  it('combines decisions with deny over warn over allow', () => {
    const warn: GateDecision = { verdict: 'warn', reason: 'w', messages: ['a'] };
    const allowB: GateDecision = { verdict: 'allow', messages: ['b'] };
    const deny: GateDecision = { verdict: 'deny', reason: 'd', missing: [], remedy: [] };
    expect(combine(warn, allowB)).toEqual({ verdict: 'warn', reason: 'w', messages: ['a', 'b'] });
    expect(combine(allowB, deny)).toBe(deny);
    expect(combine(allowB, allowB)).toEqual({ verdict: 'allow', messages: ['b', 'b'] });
  });
});

describe('hook protocol lines', () => {
  it('turns malformed input into error replies', async () => {
    const hooks = registry();
    const notJson = await hooks.handleLine('not json');
    expect(notJson.verdict).toBe('error');
    if (notJson.event === 'error') expect(notJson.error).toMatch(/^invalid JSON: /);

    const unknown = await hooks.handleLine('{"event":"nope","session":"x"}');
    if (unknown.event !== 'error') throw new Error('expected an error reply');
    expect(unknown.error).toMatch(/^invalid hook event: event: /);
  });

  it('starts sessions it has not seen with defaults', async () => {
    const hooks = registry();
    const reply = await hooks.handleLine(JSON.stringify({ event: 'pre_tool_use', session: 'ghost', tool: 'Read' }));
    expect(reply).toEqual({ event: 'pre_tool_use', session: 'ghost', verdict: 'allow', messages: [] });
    expect(hooks.get('ghost')?.workflow).toBe('default');
  });
});
