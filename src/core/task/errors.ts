import type { ZodError } from 'zod';

export type TrellisErrorCode =
  | 'validation_error'
  | 'not_found'
  | 'already_claimed'
  | 'has_incomplete_children'
  | 'cycle_detected'
  | 'merge_conflict'
  | 'test_failure'
  | 'timeout'
  | 'gate_denied'
  | 'concurrency_conflict'
  | 'incomplete_checklist';

/**
 * Base class for every error the engine raises on purpose. `code` is a
 * stable string callers (and the CLI's JSON output) can switch on.
 */
export abstract class TrellisError extends Error {
  abstract readonly code: TrellisErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }

  toJSON(): Record<string, unknown> {
    return { code: this.code, message: this.message };
  }
}

export class ValidationError extends TrellisError {
  readonly code = 'validation_error' as const;

  constructor(message: string, readonly issues: string[] = []) {
    super(issues.length ? `${message}: ${issues.join('; ')}` : message);
  }

  static fromZod(context: string, err: ZodError): ValidationError {
    const issues = err.issues.map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message));
    return new ValidationError(context, issues);
  }
}

export class NotFoundError extends TrellisError {
  readonly code = 'not_found' as const;

  constructor(readonly id: string, what: string = 'task') {
    super(`${what} not found: ${id}`);
  }
}

export class AlreadyClaimedError extends TrellisError {
  readonly code = 'already_claimed' as const;

  constructor(readonly taskId: string, readonly claimedBy: string | null) {
    super(`task ${taskId} is already claimed${claimedBy ? ` by ${claimedBy}` : ''}`);
  }
}

export class HasIncompleteChildrenError extends TrellisError {
  readonly code = 'has_incomplete_children' as const;

  constructor(readonly taskId: string, readonly children: string[]) {
    super(`task ${taskId} has incomplete children: ${children.join(', ')}`);
  }
}

export class CycleDetectedError extends TrellisError {
  readonly code = 'cycle_detected' as const;

  /** `cycle` starts and ends on the same id. */
  constructor(readonly cycle: string[], readonly edge: 'dependsOn' | 'parent' = 'dependsOn') {
    super(`${edge} cycle detected: ${cycle.join(' -> ')}`);
  }
}

export class ConcurrencyConflictError extends TrellisError {
  readonly code = 'concurrency_conflict' as const;

  constructor(readonly taskId: string, readonly expectedVersion: number | null, readonly actualVersion: number | null) {
    super(
      `task ${taskId} changed concurrently (expected version ${expectedVersion ?? 'none'}, found ${actualVersion ?? 'none'})`
    );
  }
}

export class IncompleteChecklistError extends TrellisError {
  readonly code = 'incomplete_checklist' as const;

  constructor(readonly taskId: string, readonly markers: string[]) {
    super(`task ${taskId} body still lists unfinished work: ${markers.join('; ')}`);
  }
}

export class MergeConflictError extends TrellisError {
  readonly code = 'merge_conflict' as const;

  constructor(readonly branch: string, readonly output: string) {
    super(`merge conflict integrating ${branch}`);
  }
}

export class TestFailureError extends TrellisError {
  readonly code = 'test_failure' as const;

  constructor(readonly command: string, readonly exitCode: number | undefined, readonly output: string) {
    super(`test command failed (${command}, exit ${exitCode ?? 'unknown'})`);
  }
}

export class TimeoutError extends TrellisError {
  readonly code = 'timeout' as const;

  constructor(readonly command: string, readonly timeoutMs: number, readonly output: string = '') {
    super(`command timed out after ${timeoutMs}ms: ${command}`);
  }
}

export class GateDeniedError extends TrellisError {
  readonly code = 'gate_denied' as const;

  constructor(readonly missing: string[], readonly reason: string) {
    super(reason);
  }
}

export function isTrellisError(err: unknown): err is TrellisError {
  return err instanceof TrellisError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
