import { mkdir, stat } from 'node:fs/promises';
import { join, resolve } from 'node:path';

export const TRELLIS_DIR = '.trellis';

export interface WorkspacePaths {
  repoRoot: string;
  trellisDir: string;
  tasksDir: string;
  indexPath: string;
  auditPath: string;
  configPath: string;
}

export function resolveWorkspace(repoRoot: string): WorkspacePaths {
  const root = resolve(repoRoot);
  const trellisDir = join(root, TRELLIS_DIR);
  return {
    repoRoot: root,
    trellisDir,
    tasksDir: join(trellisDir, 'tasks'),
    indexPath: join(trellisDir, 'index.json'),
    auditPath: join(trellisDir, 'audit.jsonl'),
    configPath: join(trellisDir, 'config.yaml')
  };
}

export async function initWorkspace(repoRoot: string): Promise<WorkspacePaths> {
  const paths = resolveWorkspace(repoRoot);
  await mkdir(paths.tasksDir, { recursive: true });
  return paths;
}

export async function isTrellisRepo(repoRoot: string): Promise<boolean> {
  try {
    return (await stat(resolveWorkspace(repoRoot).tasksDir)).isDirectory();
  } catch {
    return false;
  }
}

/** `TRELLIS_ROOT` wins over the working directory. */
export function resolveRepoRoot(explicit?: string, env: NodeJS.ProcessEnv = process.env): string {
  return resolve(explicit ?? (env.TRELLIS_ROOT?.trim() || process.cwd()));
}
