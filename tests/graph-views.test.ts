import { describe, expect, it } from 'vitest';

import { auditGraph } from '../src/core/graph/audit.js';
import { buildGraphIndex } from '../src/core/graph/indices.js';
import { buildTaskTree, flattenTree } from '../src/core/graph/tree.js';
import { task, taskRecord } from './store-fixture.js';

const NOW = new Date('2026-03-02T09:00:00.000Z');

describe('task tree', () => {
  const tasks = () => [
    task({ id: 'R', type: 'epic' }),
    task({ id: 'c1', parent: 'R' }),
    task({ id: 'c2', parent: 'R', priority: 1 }),
    task({ id: 'c3', parent: 'R', status: 'done' }),
    task({ id: 'g', parent: 'c1' })
  ];

  it('orders children by priority then insertion', () => {
    const all = tasks();
    const tree = buildTaskTree(all[0], all);
    expect(flattenTree(tree).map((n) => [n.task.id, n.depth])).toEqual([
      ['R', 0],
      ['c2', 1],
      ['c1', 1],
      ['g', 2],
      ['c3', 1]
    ]);
  });

  it('prunes excluded statuses and marks depth-truncated nodes', () => {
    const all = tasks();
    const tree = buildTaskTree(all[0], all, { excludeStatus: ['done'], maxDepth: 1 });
    expect(tree.children.map((c) => [c.task.id, c.truncated])).toEqual([
      ['c2', false],
      ['c1', true]
    ]);
  });
});

describe('graph index', () => {
  it('groups tasks and lists roots', () => {
    const tasks = [
      task({ id: 'proj', type: 'project' }),
      task({ id: 'a', project: 'proj', parent: 'proj', downstreamWeight: 2 }),
      task({ id: 'b', parent: 'ghost' }),
      task({ id: 'c', status: 'done' })
    ];
    const index = buildGraphIndex(tasks, [tasks[1]], NOW);
    expect(index).toEqual({
      version: 1,
      generatedAt: '2026-03-02T09:00:00.000Z',
      count: 4,
      byStatus: { active: ['proj', 'a', 'b'], done: ['c'] },
      byProject: { proj: ['a'] },
      roots: ['proj', 'b'],
      ready: ['a'],
      weights: { proj: 0, a: 2, b: 0, c: 0 }
    });
  });
});

describe('graph audit', () => {
  it('reports critical findings before warnings', () => {
    const findings = auditGraph(
      [
        taskRecord({ id: 'g', type: 'goal' }),
        taskRecord({ id: 't1', parent: 'g' }),
        taskRecord({ id: 't2' }),
        taskRecord({ id: 't3', parent: 'g', dependsOn: ['ghost'] })
      ],
      { now: NOW }
    );
    expect(findings).toEqual([
      { kind: 'dangling_reference', severity: 'critical', message: 't3 references missing task(s): ghost', taskIds: ['t3'] },
      { kind: 'orphan', severity: 'warning', message: '1 open task(s) have no parent', taskIds: ['t2'] }
    ]);
  });

  it('grades sibling explosions by size', () => {
    const kids = (n: number) => Array.from({ length: n }, (_, i) => taskRecord({ id: `k${i}`, parent: 'g' }));
    const warn = auditGraph([taskRecord({ id: 'g', type: 'goal' }), ...kids(11)], { now: NOW });
    expect(warn.find((f) => f.kind === 'sibling_explosion')).toEqual({
      kind: 'sibling_explosion',
      severity: 'warning',
      message: 'g has 11 open children; split it into intermediate tasks',
      taskIds: ['g']
    });
    const crit = auditGraph([taskRecord({ id: 'g', type: 'goal' }), ...kids(21)], { now: NOW });
    expect(crit.find((f) => f.kind === 'sibling_explosion')?.severity).toBe('critical');
  });

  it('flags priority inflation, stale claims and unresolved projects', () => {
    const findings = auditGraph(
      [
        taskRecord({ id: 'g', type: 'goal' }),
        taskRecord({ id: 'plain', parent: 'g' }),
        taskRecord({ id: 'hot', parent: 'g', priority: 1, project: 'plain' }),
        taskRecord({
          id: 'old',
          parent: 'g',
          status: 'in_progress',
          assignee: 'worker:a',
          updated: '2026-03-01T00:00:00.000Z'
        })
      ],
      { now: NOW }
    );
    expect(findings.map((f) => f.kind)).toEqual(['project_unresolved', 'stale_in_progress']);
    expect(findings[0].message).toBe('hot names project "plain" which is not a project task');
    expect(findings[1].message).toBe('1 in-progress task(s) untouched for more than 24h');

    const inflated = auditGraph(
      [taskRecord({ id: 'g', type: 'goal' }), taskRecord({ id: 'x', parent: 'g', priority: 1 })],
      { now: NOW }
    );
    expect(inflated).toEqual([
      { kind: 'priority_inflation', severity: 'warning', message: '1 of 2 open tasks are P1 (more than 25%)', taskIds: ['x'] }
    ]);
  });
});
