import type { RiskLevel } from '../../config/types.js';
import { type GateFlag, type GateFlags, type SessionState } from './types.js';

export interface NewSessionOptions {
  workflow?: string;
  risk?: RiskLevel;
  currentTask?: string | null;
  gatesBypassed?: boolean;
  now?: Date;
}

export function createSessionState(id: string, opts: NewSessionOptions = {}): SessionState {
  const currentTask = opts.currentTask ?? null;
  const flags: GateFlags = {
    taskBound: currentTask !== null,
    hydrated: false,
    criticReviewed: false,
    qaVerified: false,
    handoverComplete: false
  };
  return {
    id,
    currentTask,
    flags,
    workflow: opts.workflow ?? 'default',
    risk: opts.risk ?? 'low',
    toolCalls: 0,
    callsSinceCheck: 0,
    didWork: false,
    gatesBypassed: opts.gatesBypassed ?? false,
    complianceHold: null,
    handoverMissing: [],
    startedAt: (opts.now ?? new Date()).toISOString()
  };
}

export function missingFlags(session: SessionState, required: readonly GateFlag[]): GateFlag[] {
  return required.filter((f) => !session.flags[f]);
}

export function bindTask(session: SessionState, taskId: string): void {
  session.currentTask = taskId;
  session.flags.taskBound = true;
}

export function unbindTask(session: SessionState): void {
  session.currentTask = null;
  session.flags.taskBound = false;
}
