import { isTrellisError } from '../core/task/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { resolveRepoRoot } from '../workspace/layout.js';
import { openWorkspace, type TrellisWorkspace } from '../workspace/open.js';

export interface CommandResult {
  ok: boolean;
  details?: unknown;
}

/** Options every workspace-bound command accepts. */
export interface WorkspaceCommandOptions {
  repoRoot?: string;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

/**
 * CLI logging defaults to warnings only, since the renderer already reports
 * what happened; `--verbose` (or an explicit TRELLIS_LOG_LEVEL) opens it up.
 */
export function cliLogger(env: NodeJS.ProcessEnv): Logger {
  const level = env.TRELLIS_LOG_LEVEL ?? (env.TRELLIS_VERBOSE === '1' ? 'debug' : 'warn');
  return createLogger({ ...env, TRELLIS_LOG_LEVEL: level }, { scope: 'cli' });
}

/**
 * Open the workspace and run `fn` against it. Engine errors become a failed
 * result carrying the error's code and message; anything else propagates.
 */
export async function withWorkspace(
  opts: WorkspaceCommandOptions,
  fn: (ws: TrellisWorkspace) => Promise<CommandResult>
): Promise<CommandResult> {
  const env = opts.env ?? process.env;
  try {
    const ws = await openWorkspace(resolveRepoRoot(opts.repoRoot, env), { env, logger: opts.logger ?? cliLogger(env) });
    return await fn(ws);
  } catch (err) {
    if (isTrellisError(err)) return { ok: false, details: err.toJSON() };
    throw err;
  }
}

/** One-line description of a failed result's details. */
export function describeDetails(details: unknown): string {
  if (typeof details === 'string') return details;
  if (details instanceof Error) return details.message;
  if (details && typeof details === 'object' && 'message' in details && typeof details.message === 'string') {
    return details.message;
  }
  return details === undefined ? 'unknown error' : JSON.stringify(details);
}
