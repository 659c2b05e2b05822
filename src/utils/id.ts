import { randomBytes } from 'node:crypto';

export const TASK_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

export interface TaskIdParts {
  prefix: string;
  hex: string; // 8 lowercase hex chars
}

export function formatTaskId(parts: TaskIdParts): string {
  return `${parts.prefix}-${parts.hex}`;
}

export function parseTaskId(id: string): TaskIdParts | null {
  const m = /^(.+)-([0-9a-f]{8})$/.exec(id);
  if (!m) return null;
  return { prefix: m[1], hex: m[2] };
}

export function isValidTaskId(id: string): boolean {
  return TASK_ID_PATTERN.test(id);
}

/**
 * Generates `<project>-<8 hex>` ids; tasks without a project get the `ns` prefix.
 * The byte source is injectable so tests can produce predictable ids.
 */
export class TaskIdGenerator {
  constructor(private readonly bytes: (n: number) => Buffer = randomBytes) {}

  next(project?: string | null): string {
    const prefix = project && isValidTaskId(project) ? project : 'ns';
    return formatTaskId({ prefix, hex: this.bytes(4).toString('hex') });
  }
}
