import type { GraphFinding } from '../../core/graph/audit.js';
import { flattenTree, type TaskTreeNode } from '../../core/graph/tree.js';
import type { LedgerEntry } from '../../core/ledger/types.js';
import type { MergeOutcome, MergeReport } from '../../core/merge/types.js';
import type { Task } from '../../core/task/types.js';
import { theme, INDENT } from './theme.js';
import { formatTimestamp, horizontalRule, keyValue, padRight, statusLabel, taskLine } from './format.js';
import { startSpinner, type SpinnerHandle } from './spinner.js';

// ── Renderer Interface ──────────────────────────────────────────────────────

/**
 * The Renderer is the single output coordinator for the CLI.
 * All user-facing output routes through it, enabling:
 * - InteractiveRenderer for rich TTY output (colors, spinners)
 * - QuietRenderer for machine-friendly JSON lines (--quiet mode)
 */
export interface Renderer {
  // ── Tasks ──
  taskList(title: string, tasks: readonly Task[]): void;
  taskDetail(task: Task): void;
  taskTree(root: TaskTreeNode): void;

  // ── Graph health / history ──
  findings(findings: readonly GraphFinding[]): void;
  ledger(entries: readonly LedgerEntry[]): void;

  // ── Merge ──
  mergeReport(report: MergeReport): void;

  // ── Errors ──
  error(title: string, details: string, tip?: string): void;
  warn(message: string): void;

  // ── Spinners ──
  spinner(message: string): SpinnerHandle;

  // ── Generic ──
  /** Structured command result; written to stdout in quiet mode only. */
  data(value: unknown): void;
  text(message: string): void;
  blank(): void;
  info(message: string): void;
  success(message: string): void;
  dim(message: string): void;
}

// ── Interactive Renderer (Rich TTY Output) ──────────────────────────────────

export class InteractiveRenderer implements Renderer {
  private writeln(msg: string = ''): void {
    process.stderr.write(msg + '\n');
  }

  taskList(title: string, tasks: readonly Task[]): void {
    this.writeln(`${INDENT}${theme.bold(title)} ${theme.dim(`(${tasks.length})`)}`);
    this.writeln();
    if (tasks.length === 0) {
      this.dim('No tasks.');
      return;
    }
    const idWidth = Math.max(...tasks.map((t) => t.id.length));
    for (const t of tasks) this.writeln(taskLine(t, idWidth));
  }

  taskDetail(task: Task): void {
    this.writeln(`${INDENT}${theme.bold(task.title)} ${theme.dim(task.id)}`);
    this.writeln(horizontalRule());
    this.writeln(keyValue('Status', statusLabel(task).trimEnd()));
    this.writeln(keyValue('Type', task.type));
    this.writeln(keyValue('Priority', theme.priority(task.priority)(`P${task.priority}`)));
    this.writeln(keyValue('Weight', String(task.downstreamWeight)));
    if (task.assignee) this.writeln(keyValue('Assignee', task.assignee));
    if (task.parent) this.writeln(keyValue('Parent', task.parent));
    if (task.project) this.writeln(keyValue('Project', task.project));
    if (task.dependsOn.length) this.writeln(keyValue('Depends on', task.dependsOn.join(', ')));
    if (task.softDependsOn.length) this.writeln(keyValue('Soft deps', task.softDependsOn.join(', ')));
    if (task.branch) this.writeln(keyValue('Branch', task.branch));
    if (task.tags.length) this.writeln(keyValue('Tags', task.tags.join(', ')));
    if (task.due) this.writeln(keyValue('Due', task.due));
    this.writeln(keyValue('Updated', `${task.updated} ${theme.dim(`(v${task.version})`)}`));
    if (task.body.trim()) {
      this.writeln();
      for (const line of task.body.split('\n')) this.writeln(`${INDENT}${line}`);
    }
  }

  taskTree(root: TaskTreeNode): void {
    for (const { task, depth, truncated } of flattenTree(root)) {
      const pad = INDENT + '  '.repeat(depth);
      const more = truncated ? theme.dim(' …') : '';
      this.writeln(`${pad}${statusLabel(task)} ${task.title} ${theme.dim(task.id)}${more}`);
    }
  }

  findings(findings: readonly GraphFinding[]): void {
    if (findings.length === 0) {
      this.success('No findings.');
      return;
    }
    for (const f of findings) {
      const tag = f.severity === 'critical' ? theme.error('critical') : theme.warning('warning ');
      this.writeln(`${INDENT}${tag}  ${padRight(f.kind, 20)}${f.message}`);
    }
  }

  ledger(entries: readonly LedgerEntry[]): void {
    if (entries.length === 0) {
      this.dim('No ledger entries found.');
      return;
    }
    for (const e of entries) {
      const task = e.taskId ? `  ${e.taskId}` : '';
      this.writeln(`${INDENT}${theme.dim(padRight(String(e.seq), 6))}${theme.dim(formatTimestamp(e.timestamp))}  ${padRight(e.type, 18)}${theme.dim(e.actor)}${task}`);
    }
  }

  mergeReport(report: MergeReport): void {
    if (report.outcomes.length === 0) {
      this.dim(`Nothing to merge into ${report.mainBranch}.`);
      return;
    }
    for (const o of report.outcomes) this.writeln(outcomeLine(o));
    this.writeln();
    const failed = report.outcomes.filter((o) => o.kind === 'failed').length;
    if (failed) this.writeln(`${INDENT}${theme.error(`${failed} failed`)}`);
    else this.success(`All candidates settled into ${report.mainBranch}.`);
  }

  error(title: string, details: string, tip?: string): void {
    this.writeln();
    this.writeln(`${INDENT}${theme.error(theme.bold('ERROR'))}  ${title}`);
    this.writeln();
    for (const line of details.split('\n')) {
      this.writeln(`${INDENT}${line}`);
    }
    if (tip) {
      this.writeln();
      this.writeln(`${INDENT}${theme.dim('Tip:')} ${tip}`);
    }
    this.writeln();
  }

  warn(message: string): void {
    this.writeln(`${INDENT}${theme.warning('⚠')} ${message}`);
  }

  spinner(message: string): SpinnerHandle {
    return startSpinner(message);
  }

  data(): void {
    // Interactive output is the rendered view above.
  }

  text(message: string): void {
    this.writeln(message);
  }

  blank(): void {
    this.writeln();
  }

  info(message: string): void {
    this.writeln(`${INDENT}${theme.info('ℹ')} ${message}`);
  }

  success(message: string): void {
    this.writeln(`${INDENT}${theme.check} ${message}`);
  }

  dim(message: string): void {
    this.writeln(`${INDENT}${theme.dim(message)}`);
  }
}

function outcomeLine(o: MergeOutcome): string {
  const head = `${INDENT}${padRight(o.taskId, 14)}${theme.dim(padRight(o.branch, 28))}`;
  switch (o.kind) {
    case 'merged':
      return `${head}${theme.success('merged')} ${theme.dim(o.commit.slice(0, 7))}${o.pushed ? theme.dim(' (pushed)') : ''}`;
    case 'already_merged':
      return `${head}${theme.info('already merged')}${o.markedDone ? theme.dim(' (marked done)') : ''}`;
    case 'skipped':
      return `${head}${theme.muted('skipped')} ${theme.dim(o.reason)}`;
    case 'failed':
      return `${head}${theme.error(`failed: ${o.reason}`)} ${o.message}`;
  }
}

// ── Quiet Renderer (Machine-Friendly Output) ────────────────────────────────

export class QuietRenderer implements Renderer {
  private emit(type: string, data: Record<string, unknown> = {}): void {
    const event = { type, timestamp: new Date().toISOString(), ...data };
    process.stderr.write(JSON.stringify(event) + '\n');
  }

  taskList(): void { /* no-op; commands emit data() */ }
  taskDetail(): void { /* no-op */ }
  taskTree(): void { /* no-op */ }
  findings(): void { /* no-op */ }
  ledger(): void { /* no-op */ }
  mergeReport(): void { /* no-op */ }

  error(title: string, details: string, tip?: string): void {
    this.emit('error', { title, details, tip });
  }

  warn(message: string): void {
    this.emit('warning', { message });
  }

  spinner(message: string): SpinnerHandle {
    this.emit('spinner_start', { message });
    return {
      update: (text: string) => this.emit('spinner_update', { message: text }),
      stop: () => this.emit('spinner_stop', {})
    };
  }

  data(value: unknown): void {
    process.stdout.write(JSON.stringify(value) + '\n');
  }

  text(message: string): void {
    this.emit('text', { message });
  }

  blank(): void { /* no-op */ }

  info(message: string): void {
    this.emit('info', { message });
  }

  success(message: string): void {
    this.emit('success', { message });
  }

  dim(message: string): void {
    this.emit('dim', { message });
  }
}

// ── Factory ─────────────────────────────────────────────────────────────────

let _instance: Renderer | null = null;

/**
 * Get the global Renderer instance.
 * Defaults to InteractiveRenderer; use `setRenderer` to override.
 */
export function getRenderer(): Renderer {
  if (!_instance) {
    _instance = process.env.TRELLIS_QUIET === '1'
      ? new QuietRenderer()
      : new InteractiveRenderer();
  }
  return _instance;
}

/**
 * Override the global Renderer (e.g., for testing or --quiet mode).
 */
export function setRenderer(renderer: Renderer): void {
  _instance = renderer;
}

/**
 * Create the appropriate renderer based on flags.
 */
export function createRenderer(opts: { quiet?: boolean } = {}): Renderer {
  const r = opts.quiet ? new QuietRenderer() : new InteractiveRenderer();
  _instance = r;
  return r;
}
