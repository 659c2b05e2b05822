import { describe, expect, it } from 'vitest';

import { findIncompleteMarkers } from '../src/core/task/markers.js';
import { checkTransition, isListedTransition } from '../src/core/task/transitions.js';
import { TaskPatchSchema } from '../src/core/task/types.js';

const ctx = { force: false, actor: 'worker:a', branch: null };

describe('status transitions', () => {
  it('allows listed transitions and refuses the rest unless forced', () => {
    expect(checkTransition('active', 'in_progress', ctx)).toEqual({ ok: true, forced: false });
    expect(isListedTransition('active', 'done')).toBe(false);

    const refused = checkTransition('active', 'done', ctx);
    expect(refused).toEqual({ ok: false, reason: 'transition active -> done is not allowed (allowed: in_progress, cancelled)' });
    expect(checkTransition('active', 'done', { ...ctx, force: true })).toEqual({ ok: true, forced: true });
  });

  it('keeps terminal statuses write-once even when forced', () => {
    const res = checkTransition('done', 'active', { ...ctx, force: true });
    expect(res.ok).toBe(false);
  });

  it('requires a branch for merge_ready', () => {
    expect(checkTransition('in_progress', 'merge_ready', ctx).ok).toBe(false);
    expect(checkTransition('in_progress', 'merge_ready', { ...ctx, branch: 'task/x' }).ok).toBe(true);
  });

  it('reserves leaving merge_ready for the orchestrator', () => {
    expect(checkTransition('merge_ready', 'done', { ...ctx, force: true, branch: 'b' }).ok).toBe(false);
    expect(checkTransition('merge_ready', 'review', { ...ctx, actor: 'orchestrator', branch: 'b' }).ok).toBe(true);
    expect(checkTransition('merge_ready', 'cancelled', { ...ctx, branch: 'b' }).ok).toBe(true);
  });

  it('leaves marking branch work done to the orchestrator, even when forced', () => {
    expect(checkTransition('in_progress', 'done', { ...ctx, branch: 'task/x' })).toEqual({
      ok: false,
      reason: 'work on branch task/x is marked done by the merge orchestrator after it merges'
    });
    expect(checkTransition('review', 'done', { ...ctx, force: true, branch: 'task/x' }).ok).toBe(false);
    expect(checkTransition('review', 'done', { ...ctx, branch: null, priorBranch: 'task/x' }).ok).toBe(false);
    expect(checkTransition('review', 'done', { ...ctx, actor: 'orchestrator', branch: 'task/x' })).toEqual({ ok: true, forced: false });
    expect(checkTransition('in_progress', 'done', ctx)).toEqual({ ok: true, forced: false });
  });

  it('normalizes hyphenated statuses in patches', () => {
    const parsed = TaskPatchSchema.parse({ status: 'merge-ready' });
    expect(parsed.status).toBe('merge_ready');
    expect(TaskPatchSchema.safeParse({ status: 'finished' }).success).toBe(false);
  });
});

describe('incomplete-work markers', () => {
  it('finds unchecked items, remaining sections, partial percentages and WIP notes', () => {
    const body = ['- [x] parser', '- [ ] printer', '## Remaining:', 'about 60% complete', 'WIP: docs'].join('\n');
    expect(findIncompleteMarkers(body)).toEqual([
      'unchecked item: printer',
      '"Remaining:" section',
      '60% complete',
      'marked WIP'
    ]);
  });

  it('accepts a finished body', () => {
    expect(findIncompleteMarkers('- [x] parser\n- [x] printer\n100% complete')).toEqual([]);
  });
});
