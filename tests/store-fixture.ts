import { mkdtemp } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { FsTaskRecordStore } from '../src/core/graph/fs-record-store.js';
import { MemoryTaskRecordStore } from '../src/core/graph/memory-record-store.js';
import { GraphStore, type GraphStoreOptions } from '../src/core/graph/store.js';
import { MemoryAuditSink } from '../src/core/ledger/memory.js';
import type { Task, TaskRecord } from '../src/core/task/types.js';
import { TaskIdGenerator } from '../src/utils/id.js';

export type Backend = 'memory' | 'fs';

/** A clock that only moves when the test says so. */
export function manualClock(start = '2026-03-02T09:00:00.000Z'): { now: () => Date; advance: (ms: number) => void } {
  let t = Date.parse(start);
  return {
    now: () => new Date(t),
    advance: (ms: number) => {
      t += ms;
    }
  };
}

/** Ids `<prefix>-00000001`, `<prefix>-00000002`, ... in creation order. */
export function sequentialIds(): TaskIdGenerator {
  let n = 0;
  return new TaskIdGenerator((size) => {
    n += 1;
    const buf = Buffer.alloc(size);
    buf.writeUInt32BE(n, 0);
    return buf;
  });
}

export async function createStore(
  backend: Backend,
  opts: Partial<Omit<GraphStoreOptions, 'records' | 'audit'>> = {}
): Promise<{ store: GraphStore; audit: MemoryAuditSink; dir: string | null }> {
  const audit = new MemoryAuditSink();
  if (backend === 'memory') {
    const store = new GraphStore({ records: new MemoryTaskRecordStore(), audit, ids: sequentialIds(), ...opts });
    return { store, audit, dir: null };
  }
  const dir = await mkdtemp(join(tmpdir(), 'trellis-store-'));
  const store = new GraphStore({
    records: new FsTaskRecordStore(join(dir, 'tasks')),
    audit,
    ids: sequentialIds(),
    indexPath: join(dir, 'index.json'),
    ...opts
  });
  return { store, audit, dir };
}

let nextSeq = 0;

/** A task record with every optional field at its default; `seq` counts up per call. */
export function taskRecord(fields: Partial<TaskRecord> & { id: string }): TaskRecord {
  nextSeq += 1;
  return {
    title: fields.id,
    body: '',
    type: 'task',
    status: 'active',
    priority: 2,
    assignee: null,
    parent: null,
    project: null,
    dependsOn: [],
    softDependsOn: [],
    branch: null,
    tags: [],
    due: null,
    created: '2026-03-02T09:00:00.000Z',
    updated: '2026-03-02T09:00:00.000Z',
    version: 1,
    seq: nextSeq,
    ...fields
  };
}

export function task(fields: Partial<Task> & { id: string }): Task {
  return { downstreamWeight: 0, ...taskRecord(fields), ...fields };
}
