import { describe, expect, it } from 'vitest';
import { existsSync } from 'node:fs';
import { join } from 'node:path';

import { FsTaskRecordStore } from '../src/core/graph/fs-record-store.js';
import { readGraphIndex } from '../src/core/graph/indices.js';
import { GraphStore } from '../src/core/graph/store.js';
import { MemoryAuditSink } from '../src/core/ledger/memory.js';
import {
  AlreadyClaimedError,
  ConcurrencyConflictError,
  CycleDetectedError,
  HasIncompleteChildrenError,
  IncompleteChecklistError,
  NotFoundError,
  ValidationError
} from '../src/core/task/errors.js';
import { createStore, manualClock, sequentialIds } from './store-fixture.js';

const HOUR = 3_600_000;

describe.each(['memory', 'fs'] as const)('GraphStore (%s records)', (backend) => {
  it('creates tasks with defaults and records the creation', async () => {
    const clock = manualClock();
    const { store, audit } = await createStore(backend, { clock: clock.now });

    const task = await store.create({ title: 'Write docs' });

    expect(task).toMatchObject({
      id: 'ns-00000001',
      title: 'Write docs',
      body: '',
      type: 'task',
      status: 'active',
      priority: 2,
      assignee: null,
      parent: null,
      dependsOn: [],
      version: 1,
      seq: 1,
      downstreamWeight: 0,
      created: '2026-03-02T09:00:00.000Z',
      updated: '2026-03-02T09:00:00.000Z'
    });
    expect(audit.ofType('task_created')).toHaveLength(1);
    expect(audit.ofType('task_created')[0]).toMatchObject({ actor: 'cli', taskId: 'ns-00000001' });
    await expect(store.get('nope')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('prefixes generated ids with the project and rejects non-project targets', async () => {
    const { store } = await createStore(backend);
    await store.create({ id: 'proj', title: 'Project', type: 'project', project: 'proj' });
    await store.create({ id: 'plain', title: 'Not a project' });

    const t = await store.create({ title: 'Inside', project: 'proj' });
    expect(t.id).toBe('proj-00000001');

    await expect(store.create({ title: 'Wrong', project: 'plain' })).rejects.toBeInstanceOf(ValidationError);
    await expect(store.create({ title: 'Missing', project: 'ghost' })).rejects.toBeInstanceOf(ValidationError);
  });

  it('keeps a project that other tasks belong to typed as a project', async () => {
    const { store } = await createStore(backend);
    await store.create({ id: 'proj', title: 'Project', type: 'project', project: 'proj' });
    await store.create({ id: 'c1', title: 'Inside', project: 'proj' });
    await store.create({ id: 'empty', title: 'Unused project', type: 'project' });

    await expect(store.update('proj', { type: 'epic' })).rejects.toThrow('task proj is the project of c1; it must stay type project');
    expect((await store.get('proj')).type).toBe('project');
    expect((await store.update('empty', { type: 'epic' })).type).toBe('epic');
  });

  it('rejects duplicate ids', async () => {
    const { store } = await createStore(backend);
    await store.create({ id: 'a', title: 'A' });
    await expect(store.create({ id: 'a', title: 'A again' })).rejects.toThrow('task already exists: a');
  });

  it('rejects dependency and parent cycles with the cycle path', async () => {
    const { store } = await createStore(backend);
    await store.create({ id: 'a', title: 'A' });
    await store.create({ id: 'b', title: 'B', dependsOn: ['a'] });

    const depErr = await store.update('a', { dependsOn: ['b'] }).catch((e: unknown) => e);
    expect(depErr).toBeInstanceOf(CycleDetectedError);
    if (depErr instanceof CycleDetectedError) {
      expect(depErr.cycle).toEqual(['a', 'b', 'a']);
      expect(depErr.edge).toBe('dependsOn');
    }

    await store.create({ id: 'p', title: 'Parent', type: 'epic' });
    await store.create({ id: 'c', title: 'Child', parent: 'p' });
    const parentErr = await store.update('p', { parent: 'c' }).catch((e: unknown) => e);
    expect(parentErr).toBeInstanceOf(CycleDetectedError);
    if (parentErr instanceof CycleDetectedError) {
      expect(parentErr.cycle).toEqual(['p', 'c', 'p']);
      expect(parentErr.edge).toBe('parent');
    }

    expect((await store.get('a')).dependsOn).toEqual([]);
    expect((await store.get('a')).version).toBe(1);
  });

  it('rejects references to missing tasks and soft self-references', async () => {
    const { store } = await createStore(backend);
    const err = await store.create({ title: 'Dangling', dependsOn: ['missing'] }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(NotFoundError);
    if (err instanceof NotFoundError) expect(err.id).toBe('missing');

    await store.create({ id: 'a', title: 'A' });
    await expect(store.update('a', { softDependsOn: ['a'] })).rejects.toThrow('task a cannot soft-depend on itself');
  });

  it('refuses to complete a parent with open children unless forced', async () => {
    const { store } = await createStore(backend);
    await store.create({ id: 'P', title: 'Parent', type: 'epic' });
    await store.create({ id: 'C1', title: 'Child', parent: 'P' });

    const err = await store.complete('P').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(HasIncompleteChildrenError);
    if (err instanceof HasIncompleteChildrenError) expect(err.children).toEqual(['C1']);

    await store.claim('C1', 'worker:a');
    await store.complete('C1');
    await store.claim('P', 'worker:a');
    expect((await store.complete('P')).status).toBe('done');
  });

  it('decomposes a task into children that inherit its project', async () => {
    const { store, audit } = await createStore(backend);
    await store.create({ id: 'proj', title: 'Project', type: 'project', project: 'proj' });
    await store.create({ id: 'E', title: 'Epic', type: 'epic', project: 'proj' });

    const children = await store.decompose(
      'E',
      [
        { id: 'e1', title: 'Outline' },
        { id: 'e2', title: 'Draft' },
        { id: 'e3', title: 'Revise', dependsOn: ['e1'] }
      ],
      { sequential: true, actor: 'worker:a' }
    );

    expect(children.map((c) => [c.id, c.parent, c.project, c.dependsOn])).toEqual([
      ['e1', 'E', 'proj', []],
      ['e2', 'E', 'proj', ['e1']],
      ['e3', 'E', 'proj', ['e1', 'e2']]
    ]);
    expect(audit.ofType('task_created').slice(-3).map((e) => [e.taskId, e.actor, e.data.parent])).toEqual([
      ['e1', 'worker:a', 'E'],
      ['e2', 'worker:a', 'E'],
      ['e3', 'worker:a', 'E']
    ]);
  });

  it('writes no child when any child of a decomposition is invalid', async () => {
    const { store } = await createStore(backend);
    await store.create({ id: 'E', title: 'Epic', type: 'epic' });

    const err = await store
      .decompose('E', [{ id: 'e1', title: 'Fine' }, { id: 'e2', title: 'Dangling', dependsOn: ['ghost'] }])
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(NotFoundError);
    await expect(store.get('e1')).rejects.toBeInstanceOf(NotFoundError);

    await expect(store.decompose('E', [])).rejects.toThrow('decomposing E needs at least one child');
    await expect(store.decompose('ghost', [{ title: 'Orphan' }])).rejects.toBeInstanceOf(NotFoundError);
    await store.update('E', { status: 'cancelled' });
    await expect(store.decompose('E', [{ title: 'Late' }])).rejects.toThrow(
      'cannot decompose E: status cancelled is terminal; create a new task that references this one instead'
    );
  });

  it('reports the tasks around a task in both directions', async () => {
    const { store } = await createStore(backend);
    await store.create({ id: 'P', title: 'Parent', type: 'epic' });
    await store.create({ id: 'a', title: 'A', parent: 'P' });
    await store.create({ id: 'b', title: 'B', dependsOn: ['a'] });
    await store.create({ id: 'c', title: 'C', softDependsOn: ['a'] });

    const hood = await store.neighborhood('a');
    expect(hood.task.id).toBe('a');
    expect(hood.parent?.id).toBe('P');
    expect(hood.children).toEqual([]);
    expect(hood.blocks.map((t) => t.id)).toEqual(['b']);
    expect(hood.softBlocks.map((t) => t.id)).toEqual(['c']);

    expect((await store.neighborhood('P')).children.map((t) => t.id)).toEqual(['a']);
    expect((await store.dependencies('b')).map((t) => t.id)).toEqual(['a']);
    expect((await store.neighborhood('c')).softDependsOn.map((t) => t.id)).toEqual(['a']);
    await expect(store.dependencies('zz')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('completes several tasks in order and reports each refusal', async () => {
    const { store } = await createStore(backend);
    await store.create({ id: 'P', title: 'Parent', type: 'epic' });
    await store.create({ id: 'C1', title: 'Child', parent: 'P' });
    await store.claim('P', 'worker:a');
    await store.claim('C1', 'worker:a');

    const results = await store.completeMany(['P', 'C1', 'ghost', 'P'], { actor: 'worker:a' });

    expect(results.map((r) => (r.ok ? [r.id, r.task.status] : [r.id, r.error.code]))).toEqual([
      ['P', 'has_incomplete_children'],
      ['C1', 'done'],
      ['ghost', 'not_found'],
      ['P', 'done']
    ]);
    expect(results[2]).toEqual({ id: 'ghost', ok: false, error: { code: 'not_found', message: 'task not found: ghost' } });
  });

  it('force-completes past open children', async () => {
    const { store, audit } = await createStore(backend);
    await store.create({ id: 'P', title: 'Parent', type: 'epic' });
    await store.create({ id: 'C1', title: 'Child', parent: 'P' });

    const done = await store.complete('P', { force: true, actor: 'human:ops' });
    expect(done.status).toBe('done');
    expect(audit.ofType('task_completed').at(-1)?.data).toMatchObject({ forced: true });
  });

  it('refuses to complete a task whose body lists unfinished work', async () => {
    const { store } = await createStore(backend);
    await store.create({ id: 't', title: 'T', body: '- [ ] write tests\n- [x] write code' });
    await store.claim('t', 'worker:a');

    const err = await store.complete('t').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(IncompleteChecklistError);
    if (err instanceof IncompleteChecklistError) expect(err.markers).toEqual(['unchecked item: write tests']);
    expect((await store.get('t')).status).toBe('in_progress');
  });

  it('lets exactly one of two concurrent claims win', async () => {
    const { store } = await createStore(backend);
    await store.create({ id: 't', title: 'Contended' });

    const results = await Promise.allSettled([store.claim('t', 'worker:a'), store.claim('t', 'worker:b')]);
    const won = results.filter((r) => r.status === 'fulfilled');
    const lost = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected');
    expect(won).toHaveLength(1);
    expect(lost).toHaveLength(1);
    expect(lost[0].reason).toBeInstanceOf(AlreadyClaimedError);

    const t = await store.get('t');
    expect(t.status).toBe('in_progress');
    expect(t.version).toBe(2);
  });

  it('refuses claims on tasks with unfinished hard dependencies', async () => {
    const { store } = await createStore(backend);
    await store.create({ id: 'a', title: 'A' });
    await store.create({ id: 'b', title: 'B', dependsOn: ['a'] });
    await expect(store.claim('b', 'worker:a')).rejects.toThrow('task b is not claimable; unfinished hard dependencies: a');
  });

  it('claims the ready queue in priority, weight, then insertion order', async () => {
    const { store } = await createStore(backend);
    await store.create({ id: 'a', title: 'A', priority: 2 });
    await store.create({ id: 'b', title: 'B', priority: 1 });
    await store.create({ id: 'c', title: 'C', priority: 2 });
    await store.create({ id: 'd', title: 'D', priority: 2, dependsOn: ['a'] });
    await store.create({ id: 'e', title: 'Epic', type: 'epic', priority: 0 });

    expect((await store.ready()).map((t) => t.id)).toEqual(['b', 'a', 'c']);
    expect((await store.get('a')).downstreamWeight).toBe(1);

    expect((await store.claimNext('worker:x'))?.id).toBe('b');
    expect((await store.claimNext('worker:x'))?.id).toBe('a');
    expect((await store.claimNext('worker:x'))?.id).toBe('c');
    expect(await store.claimNext('worker:x')).toBeNull();
  });

  it('moves a blocked dependent back to active when its blocker finishes', async () => {
    const { store, audit } = await createStore(backend);
    await store.create({ id: 'A', title: 'Blocker' });
    await store.create({ id: 'B', title: 'Dependent' });
    await store.claim('B', 'worker:b');
    await store.update('B', { dependsOn: ['A'], status: 'blocked' });

    await store.claim('A', 'worker:a');
    await store.complete('A');

    const b = await store.get('B');
    expect(b.status).toBe('active');
    const unblocked = audit.ofType('task_unblocked');
    expect(unblocked).toHaveLength(1);
    expect(unblocked[0]).toMatchObject({ actor: 'system', taskId: 'B' });
  });

  it('refuses to block a task on nothing', async () => {
    const { store } = await createStore(backend);
    await store.create({ id: 't', title: 'T' });
    await store.claim('t', 'worker:a');
    await expect(store.update('t', { status: 'blocked' })).rejects.toThrow(
      'blocking t requires dependsOn to name an unfinished task'
    );
  });

  it('reverts claims and resets stalled ones', async () => {
    const clock = manualClock();
    const { store, audit } = await createStore(backend, { clock: clock.now });
    await store.create({ id: 't1', title: 'Old claim' });
    await store.create({ id: 't2', title: 'Fresh claim' });

    await expect(store.revertClaim('t1')).rejects.toThrow('task t1 is active, not in_progress');

    await store.claim('t1', 'worker:a');
    clock.advance(3 * HOUR);
    await store.claim('t2', 'worker:b');
    clock.advance(2 * HOUR);

    const preview = await store.resetStalled({ olderThanMs: 4 * HOUR, dryRun: true });
    expect(preview.map((t) => t.id)).toEqual(['t1']);
    expect((await store.get('t1')).status).toBe('in_progress');

    const reset = await store.resetStalled({ olderThanMs: 4 * HOUR });
    expect(reset.map((t) => [t.id, t.status, t.assignee])).toEqual([['t1', 'active', null]]);
    expect((await store.get('t2')).status).toBe('in_progress');
    expect(audit.ofType('claim_reverted').map((e) => e.taskId)).toEqual(['t1']);
  });

  it('requires a claim to be reverted before it changes hands', async () => {
    const { store } = await createStore(backend);
    await store.create({ id: 't', title: 'T' });
    await store.claim('t', 'worker:a');
    await expect(store.update('t', { assignee: 'worker:b' })).rejects.toBeInstanceOf(AlreadyClaimedError);

    await store.revertClaim('t');
    expect((await store.claim('t', 'worker:b')).assignee).toBe('worker:b');
  });

  it('checks expectedVersion and guards full body rewrites', async () => {
    const { store } = await createStore(backend);
    await store.create({ id: 't', title: 'T', body: 'first' });

    const err = await store.update('t', { title: 'Renamed', expectedVersion: 5 }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ConcurrencyConflictError);
    if (err instanceof ConcurrencyConflictError) {
      expect(err.expectedVersion).toBe(5);
      expect(err.actualVersion).toBe(1);
    }

    await expect(store.update('t', { body: 'rewritten' })).rejects.toBeInstanceOf(ValidationError);

    const rewritten = await store.update('t', { body: 'rewritten', expectedVersion: 1 });
    expect(rewritten.body).toBe('rewritten');
    expect(rewritten.version).toBe(2);
  });

  it('appends to the body as a new paragraph', async () => {
    const { store } = await createStore(backend);
    await store.create({ id: 't', title: 'T', body: 'first' });
    await store.create({ id: 'e', title: 'Empty' });

    expect((await store.update('t', { appendBody: 'second' })).body).toBe('first\n\nsecond');
    expect((await store.update('e', { appendBody: 'only' })).body).toBe('only');
  });

  it('never moves a task out of a terminal status', async () => {
    const { store } = await createStore(backend);
    await store.create({ id: 't', title: 'T' });
    await store.update('t', { status: 'cancelled' });

    await expect(store.update('t', { status: 'active' }, { force: true })).rejects.toThrow(
      'cannot move t: status cancelled is terminal; create a new task that references this one instead'
    );
  });

  it('needs a branch for merge_ready and keeps merge_ready -> done for the orchestrator', async () => {
    const { store } = await createStore(backend);
    await store.create({ id: 't', title: 'T' });
    await store.claim('t', 'worker:a');

    await expect(store.update('t', { status: 'merge_ready' })).rejects.toThrow(
      'cannot move t: merge_ready requires the task to carry a branch'
    );
    const ready = await store.update('t', { status: 'merge_ready', branch: 'task/t' });
    expect(ready.status).toBe('merge_ready');

    await expect(store.update('t', { status: 'done' }, { force: true })).rejects.toThrow(
      'cannot move t: merge_ready -> done is reserved for the merge orchestrator'
    );
    expect((await store.update('t', { status: 'done' }, { actor: 'orchestrator' })).status).toBe('done');
  });

  it('keeps completing branch work for the orchestrator', async () => {
    const { store } = await createStore(backend);
    await store.create({ id: 't1', title: 'T' });
    await store.claim('t1', 'worker:a');
    await store.update('t1', { branch: 'task/t1' }, { actor: 'worker:a' });

    await expect(store.complete('t1', { actor: 'worker:a', force: true })).rejects.toThrow(
      'cannot move t1: work on branch task/t1 is marked done by the merge orchestrator after it merges'
    );
    await expect(store.update('t1', { status: 'done', branch: null }, { actor: 'worker:a' })).rejects.toThrow(
      'cannot move t1: work on branch task/t1 is marked done by the merge orchestrator after it merges'
    );
    expect((await store.get('t1')).status).toBe('in_progress');
    expect((await store.complete('t1', { actor: 'orchestrator' })).status).toBe('done');
  });

  it('reports a terminal parent as terminal before looking at its children', async () => {
    const { store } = await createStore(backend);
    await store.create({ id: 'P', title: 'Parent', type: 'epic' });
    await store.create({ id: 'C1', title: 'Child', parent: 'P' });
    await store.update('P', { status: 'cancelled' });

    await expect(store.complete('P')).rejects.toThrow(
      'cannot move P: status cancelled is terminal; create a new task that references this one instead'
    );
  });

  it('accepts hyphenated status spellings', async () => {
    const { store } = await createStore(backend);
    await store.create({ id: 't', title: 'T' });
    const t = await store.update('t', { status: 'in-progress', assignee: 'worker:a' });
    expect(t.status).toBe('in_progress');
    expect((await store.list({ status: 'in-progress' })).map((x) => x.id)).toEqual(['t']);
  });

  it('audits each write with the fields it changed', async () => {
    const { store, audit } = await createStore(backend);
    await store.create({ id: 't', title: 'T' });
    await store.update('t', { priority: 1 }, { actor: 'human:lee' });

    const [entry] = audit.ofType('task_updated');
    expect(entry.actor).toBe('human:lee');
    expect(entry.data).toEqual({ changes: { priority: { from: 2, to: 1 } } });
  });
});

describe('GraphStore (fs records, shared directory)', () => {
  it('keeps claims exclusive across two stores on one directory', async () => {
    const { store: first, dir } = await createStore('fs');
    if (!dir) throw new Error('fs store has a directory');
    const second = new GraphStore({
      records: new FsTaskRecordStore(join(dir, 'tasks')),
      audit: new MemoryAuditSink(),
      ids: sequentialIds()
    });
    await first.create({ id: 't', title: 'Shared' });

    const results = await Promise.allSettled([first.claim('t', 'worker:a'), second.claim('t', 'worker:b')]);
    expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1);
    const rejected = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected');
    expect(rejected).toHaveLength(1);
    expect(rejected[0].reason).toBeInstanceOf(AlreadyClaimedError);
    expect((await second.get('t')).version).toBe(2);
  });

  it('continues the insertion sequence across store instances', async () => {
    const { store: first, dir } = await createStore('fs');
    if (!dir) throw new Error('fs store has a directory');
    await first.create({ id: 'a', title: 'A' });
    const second = new GraphStore({ records: new FsTaskRecordStore(join(dir, 'tasks')), audit: new MemoryAuditSink() });
    expect((await second.create({ id: 'b', title: 'B' })).seq).toBe(2);
  });

  it('writes the derived index after every mutation and on reindex', async () => {
    const { store, audit, dir } = await createStore('fs');
    if (!dir) throw new Error('fs store has a directory');
    const indexPath = join(dir, 'index.json');

    await store.create({ id: 'a', title: 'A' });
    await store.create({ id: 'b', title: 'B', dependsOn: ['a'] });
    expect(existsSync(indexPath)).toBe(true);

    const index = await readGraphIndex(indexPath);
    expect(index.count).toBe(2);
    expect(index.byStatus.active).toEqual(['a', 'b']);
    expect(index.ready).toEqual(['a']);
    expect(index.weights).toEqual({ a: 1, b: 0 });

    const rebuilt = await store.reindex();
    expect(rebuilt.roots).toEqual(['a', 'b']);
    expect(audit.ofType('index_rebuilt')).toHaveLength(1);
  });
});
