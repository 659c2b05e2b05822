import type { RiskLevel } from '../../config/types.js';

export const GATE_FLAGS = ['taskBound', 'hydrated', 'criticReviewed', 'qaVerified', 'handoverComplete'] as const;
export type GateFlag = (typeof GATE_FLAGS)[number];

export type GateFlags = Record<GateFlag, boolean>;

/**
 * Everything the gates know about one agent session. Held in memory by the
 * caller and passed explicitly through every hook; never persisted.
 */
export interface SessionState {
  id: string;
  currentTask: string | null;
  flags: GateFlags;
  /** Classification of what the session is doing, e.g. `feature`, `question`, `high-risk`. */
  workflow: string;
  risk: RiskLevel;
  /** Every tool call observed. */
  toolCalls: number;
  /** Tool calls since the last full compliance check. */
  callsSinceCheck: number;
  /** A destructive operation was allowed and succeeded. */
  didWork: boolean;
  /** Explicit escape hatch; every use is logged. */
  gatesBypassed: boolean;
  /** Set when a compliance check found drift in block mode; cleared by a compliance run. */
  complianceHold: string | null;
  /** Fields the last handover was missing. */
  handoverMissing: string[];
  startedAt: string;
}

export const OPERATION_KINDS = [
  'read',
  'search',
  'task_api',
  'agent_spawn',
  'file_write',
  'file_delete',
  'branch_delete',
  'force_push',
  'reset_hard',
  'shell'
] as const;
export type OperationKind = (typeof OPERATION_KINDS)[number];

/** A tool invocation as seen by the hooks. */
export interface ToolOperation {
  /** Tool name as reported by the agent runtime, e.g. `Edit`, `Bash`, `create_task`. */
  tool: string;
  /** Explicit kind; classified from `tool` and `command` when absent. */
  kind?: OperationKind;
  /** Repo-relative paths the operation touches. */
  paths?: string[];
  /** Shell command line, for `shell` operations. */
  command?: string;
  /** Name of the spawned agent, for `agent_spawn`. */
  subagent?: string;
  /** Arguments the tool was called with, such as `{ id, status }` for `update_task`. */
  input?: Record<string, unknown>;
}

export interface ToolResult {
  ok: boolean;
  /** Task id created or claimed by a task API call. */
  taskId?: string;
  /** Text output; scanned for a handover section. */
  text?: string;
}

export type GateDecision =
  | { verdict: 'allow'; messages: string[] }
  | { verdict: 'warn'; reason: string; messages: string[] }
  | { verdict: 'deny'; reason: string; missing: GateFlag[]; remedy: string[] };

export function allow(messages: string[] = []): GateDecision {
  return { verdict: 'allow', messages };
}
