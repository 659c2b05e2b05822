import { loadConfig } from '../config/reader.js';
import type { TrellisConfig } from '../config/types.js';
import { FsTaskRecordStore } from '../core/graph/fs-record-store.js';
import { GraphStore } from '../core/graph/store.js';
import { LedgerReader } from '../core/ledger/reader.js';
import { LedgerWriter } from '../core/ledger/writer.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { initWorkspace, type WorkspacePaths } from './layout.js';

export interface TrellisWorkspace {
  paths: WorkspacePaths;
  config: TrellisConfig;
  logger: Logger;
  store: GraphStore;
  ledger: LedgerWriter;
  history: LedgerReader;
}

/**
 * Wire a GraphStore to the file backend, audit ledger and config under
 * `<repoRoot>/.trellis/`, creating the directories on first use.
 */
export async function openWorkspace(
  repoRoot: string,
  opts: { env?: NodeJS.ProcessEnv; logger?: Logger } = {}
): Promise<TrellisWorkspace> {
  const env = opts.env ?? process.env;
  const paths = await initWorkspace(repoRoot);
  const config = await loadConfig(paths.configPath, env);
  const logger = opts.logger ?? createLogger(env);
  const ledger = await LedgerWriter.open(paths.auditPath);

  const store = new GraphStore({
    records: new FsTaskRecordStore(paths.tasksDir),
    audit: ledger,
    weights: config.weights,
    indexPath: paths.indexPath,
    logger: logger.child('store')
  });

  return { paths, config, logger, store, ledger, history: new LedgerReader(paths.auditPath) };
}
