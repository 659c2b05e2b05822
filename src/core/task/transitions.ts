import { ORCHESTRATOR_ACTOR, isTerminal, type TaskStatus } from './types.js';

export const TRANSITIONS: Readonly<Record<TaskStatus, readonly TaskStatus[]>> = {
  inbox: ['active', 'cancelled'],
  active: ['in_progress', 'cancelled'],
  in_progress: ['blocked', 'review', 'merge_ready', 'done', 'cancelled'],
  blocked: ['active', 'cancelled'],
  review: ['done', 'merge_ready', 'cancelled'],
  merge_ready: ['review', 'done', 'cancelled'],
  done: [],
  cancelled: []
};

export function isListedTransition(from: TaskStatus, to: TaskStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export interface TransitionContext {
  force: boolean;
  actor: string;
  /** Branch the task will carry after the write. */
  branch: string | null;
  /** Branch the task carried before the write. */
  priorBranch?: string | null;
}

export type TransitionCheck =
  | { ok: true; forced: boolean }
  | { ok: false; reason: string };

/** Why a task in `from` can never move, or null when it can. */
export function terminalRefusal(from: TaskStatus): string | null {
  return isTerminal(from) ? `status ${from} is terminal; create a new task that references this one instead` : null;
}

/**
 * Decide whether `from -> to` is permitted. Covers the table and the rules
 * that depend only on the task itself; graph-dependent rules (claims,
 * dependencies, children) are checked by the store.
 */
export function checkTransition(from: TaskStatus, to: TaskStatus, ctx: TransitionContext): TransitionCheck {
  if (from === to) return { ok: true, forced: false };

  const terminal = terminalRefusal(from);
  if (terminal) return { ok: false, reason: terminal };

  if (to === 'merge_ready' && !ctx.branch) {
    return { ok: false, reason: 'merge_ready requires the task to carry a branch' };
  }

  if (from === 'merge_ready' && (to === 'done' || to === 'review') && ctx.actor !== ORCHESTRATOR_ACTOR) {
    return { ok: false, reason: `merge_ready -> ${to} is reserved for the merge orchestrator` };
  }

  // Work on a branch is finished when it lands on main, not when a worker says so.
  const branch = ctx.branch ?? ctx.priorBranch ?? null;
  if (to === 'done' && branch && ctx.actor !== ORCHESTRATOR_ACTOR) {
    return { ok: false, reason: `work on branch ${branch} is marked done by the merge orchestrator after it merges` };
  }

  if (isListedTransition(from, to)) return { ok: true, forced: false };

  if (ctx.force) return { ok: true, forced: true };

  return {
    ok: false,
    reason: `transition ${from} -> ${to} is not allowed (allowed: ${TRANSITIONS[from].join(', ') || 'none'})`
  };
}
