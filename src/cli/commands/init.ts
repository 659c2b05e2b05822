import { writeDefaultConfig } from '../../config/reader.js';
import { fileExists } from '../../utils/fs.js';
import { initWorkspace, isTrellisRepo, resolveRepoRoot } from '../../workspace/layout.js';
import { getRenderer } from '../ui/renderer.js';
import { theme } from '../ui/theme.js';
import type { CommandResult } from '../workspace.js';

export interface InitCommandOptions {
  repoRoot?: string;
  env?: NodeJS.ProcessEnv;
  /** Main branch written into a new config. */
  mainBranch?: string;
  /** Test command written into a new config. */
  testCommand?: string;
}

/**
 * `trellis init`: create `.trellis/` and a default `config.yaml`.
 * An existing config is left alone, so running it twice is harmless.
 */
export async function runInitCommand(opts: InitCommandOptions = {}): Promise<CommandResult> {
  const r = getRenderer();
  const repoRoot = resolveRepoRoot(opts.repoRoot, opts.env ?? process.env);
  const existed = await isTrellisRepo(repoRoot);
  const paths = await initWorkspace(repoRoot);

  let wroteConfig = false;
  if (!(await fileExists(paths.configPath))) {
    const merge: { mainBranch?: string; testCommand?: string } = {};
    if (opts.mainBranch) merge.mainBranch = opts.mainBranch;
    if (opts.testCommand) merge.testCommand = opts.testCommand;
    await writeDefaultConfig(paths.configPath, { merge });
    wroteConfig = true;
  }

  if (existed) r.info(`Workspace already initialized at ${theme.bold(paths.trellisDir)}`);
  else r.success(`Initialized workspace at ${theme.bold(paths.trellisDir)}`);
  if (wroteConfig) r.dim(`Wrote ${paths.configPath}`);
  r.dim('Add .trellis/ to .gitignore; task state is not part of the tracked tree.');

  const details = { trellisDir: paths.trellisDir, configPath: paths.configPath, created: !existed, wroteConfig };
  r.data(details);
  return { ok: true, details };
}
