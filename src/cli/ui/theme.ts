import chalk, { type ChalkInstance } from 'chalk';

import type { TaskStatus } from '../../core/task/types.js';

// ── Semantic Colors ─────────────────────────────────────────────────────────
// Centralized color definitions. Respects NO_COLOR / FORCE_COLOR via chalk.

const STATUS_COLORS: Record<TaskStatus, ChalkInstance> = {
  inbox: chalk.dim,
  active: chalk.blue,
  in_progress: chalk.yellow,
  blocked: chalk.red,
  review: chalk.magenta,
  merge_ready: chalk.cyan,
  done: chalk.green,
  cancelled: chalk.dim
};

export const theme = {
  // Structural
  bold: chalk.bold,
  dim: chalk.dim,

  // Semantic
  success: chalk.green,
  warning: chalk.yellow,
  error: chalk.red,
  info: chalk.blue,
  muted: chalk.dim,

  // Symbols
  check: chalk.green('✔'),

  status: (status: TaskStatus): ChalkInstance => STATUS_COLORS[status],

  priority: (p: number): ChalkInstance => (p <= 0 ? chalk.bold.red : p === 1 ? chalk.red : p === 2 ? chalk.reset : chalk.dim)
} as const;

// ── Layout Constants ────────────────────────────────────────────────────────

/** Default indent for nested content (two spaces). */
export const INDENT = '  ';

/** Width used for horizontal rules. */
export const RULE_WIDTH = 56;

/** Column width for status labels in task lists. */
export const STATUS_LABEL_WIDTH = 12;
