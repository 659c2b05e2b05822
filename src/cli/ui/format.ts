import type { Task } from '../../core/task/types.js';
import { theme, INDENT, RULE_WIDTH, STATUS_LABEL_WIDTH } from './theme.js';

// ── Time Formatting ─────────────────────────────────────────────────────────

/** Time of day (24h) of an ISO timestamp, or its raw slice when unparsable. */
export function formatTimestamp(iso: string): string {
  const d = new Date(iso);
  if (Number.isNaN(d.getTime())) return iso.slice(11, 19);
  return d.toLocaleTimeString('en-US', { hour12: false, hour: '2-digit', minute: '2-digit', second: '2-digit' });
}

// ── Table Alignment ─────────────────────────────────────────────────────────

/**
 * Pad a string to a fixed width (right-pad with spaces).
 */
export function padRight(str: string, width: number): string {
  if (str.length >= width) return str;
  return str + ' '.repeat(width - str.length);
}

// ── Horizontal Rules ────────────────────────────────────────────────────────

/**
 * A solid dim horizontal rule: ──────────────────────
 */
export function horizontalRule(width: number = RULE_WIDTH): string {
  return theme.dim('─'.repeat(width));
}

// ── Key-Value Formatting ────────────────────────────────────────────────────

/**
 * Format a label-value pair with alignment:
 * "  Status      in_progress"
 */
export function keyValue(label: string, value: string, labelWidth: number = 14): string {
  return INDENT + theme.dim(padRight(label, labelWidth)) + value;
}

// ── Tasks ───────────────────────────────────────────────────────────────────

export function statusLabel(task: Pick<Task, 'status'>, width: number = STATUS_LABEL_WIDTH): string {
  return theme.status(task.status)(padRight(task.status, width));
}

/**
 * One line per task:
 *   P1  in_progress  ns-1a2b3c4d  Fix the parser  w=3  worker:alpha
 */
export function taskLine(task: Task, idWidth: number = 12): string {
  const prio = theme.priority(task.priority)(`P${task.priority}`);
  const weight = task.downstreamWeight > 0 ? theme.dim(`  w=${task.downstreamWeight}`) : '';
  const who = task.assignee ? theme.dim(`  ${task.assignee}`) : '';
  return `${INDENT}${prio}  ${statusLabel(task)} ${theme.dim(padRight(task.id, idWidth))}  ${task.title}${weight}${who}`;
}
