import { isTerminal, type TaskRecord, type TaskType } from '../task/types.js';

export type FindingSeverity = 'warning' | 'critical';

export type FindingKind =
  | 'orphan'
  | 'sibling_explosion'
  | 'priority_inflation'
  | 'stale_in_progress'
  | 'project_unresolved'
  | 'dangling_reference';

export interface GraphFinding {
  kind: FindingKind;
  severity: FindingSeverity;
  message: string;
  taskIds: string[];
}

export interface GraphAuditOptions {
  now?: Date;
  siblingWarn?: number;
  siblingCritical?: number;
  /** Share of open tasks at P1 above which priorities are inflated. */
  p1Ratio?: number;
  staleMs?: number;
}

/** Types that may sit at the top of the tree without a parent. */
const ROOT_TYPES: ReadonlySet<TaskType> = new Set<TaskType>(['goal', 'learn', 'project']);

/** Read-only health report over the task graph. Findings are ordered critical first. */
export function auditGraph(tasks: readonly TaskRecord[], opts: GraphAuditOptions = {}): GraphFinding[] {
  const now = (opts.now ?? new Date()).getTime();
  const siblingWarn = opts.siblingWarn ?? 10;
  const siblingCritical = opts.siblingCritical ?? 20;
  const p1Ratio = opts.p1Ratio ?? 0.25;
  const staleMs = opts.staleMs ?? 24 * 3_600_000;

  const byId = new Map(tasks.map((t) => [t.id, t] as const));
  const open = tasks.filter((t) => !isTerminal(t.status));
  const findings: GraphFinding[] = [];

  const orphans = open.filter((t) => !ROOT_TYPES.has(t.type) && (!t.parent || !byId.has(t.parent)));
  if (orphans.length) {
    findings.push({
      kind: 'orphan',
      severity: 'warning',
      message: `${orphans.length} open task(s) have no parent`,
      taskIds: orphans.map((t) => t.id)
    });
  }

  const children = new Map<string, string[]>();
  for (const t of open) {
    if (!t.parent) continue;
    const list = children.get(t.parent);
    if (list) list.push(t.id);
    else children.set(t.parent, [t.id]);
  }
  for (const [parent, kids] of children) {
    if (kids.length <= siblingWarn) continue;
    findings.push({
      kind: 'sibling_explosion',
      severity: kids.length > siblingCritical ? 'critical' : 'warning',
      message: `${parent} has ${kids.length} open children; split it into intermediate tasks`,
      taskIds: [parent]
    });
  }

  const p1 = open.filter((t) => t.priority === 1);
  if (open.length && p1.length / open.length > p1Ratio) {
    findings.push({
      kind: 'priority_inflation',
      severity: 'warning',
      message: `${p1.length} of ${open.length} open tasks are P1 (more than ${Math.round(p1Ratio * 100)}%)`,
      taskIds: p1.map((t) => t.id)
    });
  }

  const stale = open.filter((t) => t.status === 'in_progress' && now - Date.parse(t.updated) > staleMs);
  if (stale.length) {
    findings.push({
      kind: 'stale_in_progress',
      severity: 'warning',
      message: `${stale.length} in-progress task(s) untouched for more than ${Math.round(staleMs / 3_600_000)}h`,
      taskIds: stale.map((t) => t.id)
    });
  }

  for (const t of tasks) {
    if (t.project && t.project !== t.id && byId.get(t.project)?.type !== 'project') {
      findings.push({
        kind: 'project_unresolved',
        severity: 'critical',
        message: `${t.id} names project "${t.project}" which is not a project task`,
        taskIds: [t.id]
      });
    }
    const dangling = [t.parent, ...t.dependsOn, ...t.softDependsOn].filter((ref): ref is string => !!ref && !byId.has(ref));
    if (dangling.length) {
      findings.push({
        kind: 'dangling_reference',
        severity: 'critical',
        message: `${t.id} references missing task(s): ${dangling.join(', ')}`,
        taskIds: [t.id]
      });
    }
  }

  const rank = { critical: 0, warning: 1 } as const;
  return findings.sort((a, b) => rank[a.severity] - rank[b.severity]);
}
