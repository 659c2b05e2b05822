export type CandidateClassification = 'needs_merge' | 'already_merged';

/** Derived, never stored: a task's branch found by comparing it against main. */
export interface MergeCandidate {
  taskId: string;
  branch: string;
  classification: CandidateClassification;
  /** Commits `git cherry` reports as not on main. */
  unmergedCommits: string[];
}

/** `error` covers a step that threw instead of reporting a result, such as a commit git refused. */
export type FailureReason = 'validation' | 'conflict' | 'test_failure' | 'timeout' | 'push' | 'error';

export type MergeOutcome =
  | { kind: 'merged'; taskId: string; branch: string; commit: string; pushed: boolean; cleanup: string[] }
  | { kind: 'already_merged'; taskId: string; branch: string; markedDone: boolean }
  | { kind: 'skipped'; taskId: string; branch: string; reason: string }
  | { kind: 'failed'; taskId: string; branch: string; reason: FailureReason; message: string; output: string };

export interface MergeReport {
  mainBranch: string;
  startedAt: string;
  finishedAt: string;
  outcomes: MergeOutcome[];
  /** 0 when nothing failed, 1 otherwise. */
  exitCode: number;
}

export interface VerificationResult {
  status: 'passed' | 'failed' | 'timeout';
  exitCode: number | undefined;
  output: string;
  durationMs: number;
}

export interface VerifyOptions {
  cwd: string;
  command: string;
  timeoutMs: number;
}

/** Runs the verification command; swappable in tests. */
export type TestRunner = (opts: VerifyOptions) => Promise<VerificationResult>;
