// Task model
export * from './core/task/types.js';
export * from './core/task/errors.js';
export { TRANSITIONS, checkTransition, isListedTransition, type TransitionCheck, type TransitionContext } from './core/task/transitions.js';
export { findIncompleteMarkers } from './core/task/markers.js';

// Graph
export {
  GraphStore,
  type ChildTaskInput,
  type CompletionResult,
  type DecomposeOptions,
  type GraphStoreOptions,
  type ResetStalledOptions,
  type TaskNeighborhood
} from './core/graph/store.js';
export type { TaskRecordStore } from './core/graph/record-store.js';
export { MemoryTaskRecordStore } from './core/graph/memory-record-store.js';
export { FsTaskRecordStore } from './core/graph/fs-record-store.js';
export {
  WeightResolver,
  WeightPolicySchema,
  DEFAULT_WEIGHT_POLICY,
  computeDownstreamWeights,
  compareReady,
  sortReady,
  type WeightPolicy
} from './core/graph/weight.js';
export { buildTaskTree, flattenTree, type TaskTreeNode, type TreeOptions } from './core/graph/tree.js';
export { buildGraphIndex, readGraphIndex, GraphIndexSchema, type GraphIndex } from './core/graph/indices.js';
export { auditGraph, type GraphFinding, type GraphAuditOptions } from './core/graph/audit.js';

// Audit ledger
export * from './core/ledger/types.js';
export { LedgerWriter } from './core/ledger/writer.js';
export { LedgerReader } from './core/ledger/reader.js';
export { MemoryAuditSink } from './core/ledger/memory.js';

// Gates
export * from './core/gate/types.js';
export { GateEngine, FLAG_REMEDIES, type GateEngineOptions } from './core/gate/engine.js';
export { createSessionState, bindTask, unbindTask, missingFlags, type NewSessionOptions } from './core/gate/session.js';
export {
  classifyOperation,
  inputTaskIds,
  isDestructive,
  taskBindingEffect,
  type ClassifiedKind,
  type TaskBindingEffect
} from './core/gate/operations.js';
export { parseHandover, HANDOVER_FIELDS, type HandoverCheck } from './core/gate/handover.js';
export {
  ComplianceSampler,
  TaskBindingChecker,
  DEFAULT_REMINDERS,
  type ComplianceChecker,
  type ComplianceVerdict,
  type ComplianceSamplerOptions
} from './core/gate/custodiet.js';
export { HookRouter, combine, type HookRouterOptions } from './core/gate/hooks.js';
export { HookEventSchema, HookSessionRegistry, type HookEvent, type HookReply } from './core/gate/protocol.js';

// Merge
export * from './core/merge/types.js';
export { MergeOrchestrator, type MergeOrchestratorOptions, type MergeStage } from './core/merge/orchestrator.js';
export { discoverCandidates, compileBranchPattern, taskIdForBranch } from './core/merge/discovery.js';
export { runTestCommand } from './core/merge/verify.js';

// Config & workspace
export * from './config/types.js';
export { loadConfig, applyEnvOverrides, resolveTestTimeoutMs, writeDefaultConfig } from './config/reader.js';
export { resolveWorkspace, initWorkspace, resolveRepoRoot, TRELLIS_DIR, type WorkspacePaths } from './workspace/layout.js';
export { openWorkspace, type TrellisWorkspace } from './workspace/open.js';
export { isProtectedPath, PROTECTED_PATH_PATTERNS } from './workspace/protected-paths.js';

// Utilities
export { Logger, createLogger, silentLogger, type LogLevel, type LoggerOptions } from './utils/logger.js';
export { TaskIdGenerator } from './utils/id.js';
