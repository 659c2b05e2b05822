import type { OperationKind, ToolOperation } from './types.js';

export type ClassifiedKind = OperationKind | 'unknown';

export const READ_KINDS: ReadonlySet<ClassifiedKind> = new Set<ClassifiedKind>(['read', 'search', 'task_api', 'agent_spawn']);

const TOOL_KINDS = new Map<string, OperationKind>(
  Object.entries({
    read: 'read',
    read_file: 'read',
    view: 'read',
    ls: 'read',
    notebookread: 'read',
    grep: 'search',
    glob: 'search',
    search: 'search',
    websearch: 'search',
    webfetch: 'search',
    edit: 'file_write',
    multiedit: 'file_write',
    write: 'file_write',
    write_file: 'file_write',
    notebookedit: 'file_write',
    apply_patch: 'file_write',
    delete: 'file_delete',
    delete_file: 'file_delete',
    bash: 'shell',
    shell: 'shell',
    run_command: 'shell',
    exec: 'shell',
    create_task: 'task_api',
    update_task: 'task_api',
    complete_task: 'task_api',
    complete_tasks: 'task_api',
    claim_task: 'task_api',
    decompose_task: 'task_api',
    get_task: 'task_api',
    list_tasks: 'task_api',
    get_task_tree: 'task_api',
    get_dependencies: 'task_api',
    get_neighborhood: 'task_api',
    task: 'agent_spawn',
    agent: 'agent_spawn',
    spawn_agent: 'agent_spawn'
  } satisfies Record<string, OperationKind>)
);

const SHELL_REFINEMENTS: Array<{ pattern: RegExp; kind: OperationKind }> = [
  { pattern: /\bgit\s+push\b[^|;&]*\s(--force(-with-lease)?|-f)\b/, kind: 'force_push' },
  { pattern: /\bgit\s+reset\b[^|;&]*\s--hard\b/, kind: 'reset_hard' },
  { pattern: /\bgit\s+branch\b[^|;&]*\s(-D|-d|--delete)\b/, kind: 'branch_delete' },
  { pattern: /(^|[;&|]\s*)rm\s/, kind: 'file_delete' }
];

/**
 * Map a tool call onto the operation taxonomy. Tools we do not recognise
 * come back as `unknown`, which the gates treat as destructive.
 */
export function classifyOperation(op: ToolOperation): ClassifiedKind {
  if (op.kind) return op.kind;
  const kind = TOOL_KINDS.get(op.tool.trim().toLowerCase());
  if (!kind) return 'unknown';
  if (kind === 'shell' && op.command) {
    return SHELL_REFINEMENTS.find((r) => r.pattern.test(op.command ?? ''))?.kind ?? 'shell';
  }
  return kind;
}

export function isDestructive(kind: ClassifiedKind): boolean {
  return !READ_KINDS.has(kind);
}

export type TaskBindingEffect = 'bind' | 'unbind';

/**
 * How a task API call changes the task the session is working on: creating,
 * claiming or moving a task to in_progress binds it, completing it releases it.
 */
export function taskBindingEffect(op: ToolOperation): TaskBindingEffect | null {
  const tool = op.tool.trim().toLowerCase();
  if (tool === 'create_task' || tool === 'claim_task') return 'bind';
  if (tool === 'update_task') {
    const status = op.input?.status;
    return status === 'in_progress' || status === 'in-progress' ? 'bind' : null;
  }
  if (tool === 'complete_task' || tool === 'complete_tasks') return 'unbind';
  return null;
}

/** Task ids a task API call names in its input, in order. */
export function inputTaskIds(op: ToolOperation): string[] {
  const ids: string[] = [];
  const id = op.input?.id;
  if (typeof id === 'string') ids.push(id);
  const many = op.input?.ids;
  if (Array.isArray(many)) for (const item of many) if (typeof item === 'string') ids.push(item);
  return ids;
}
