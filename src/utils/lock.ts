import { open, rm, stat } from 'node:fs/promises';
import { dirname } from 'node:path';

import { ensureDir, isErrnoException } from './fs.js';

export interface FileLockOptions {
  /** Give up after this long. */
  timeoutMs?: number;
  retryDelayMs?: number;
  /** A lock file older than this is considered abandoned by a dead process and removed. */
  staleMs?: number;
}

export class LockTimeoutError extends Error {
  constructor(readonly lockPath: string, readonly waitedMs: number) {
    super(`Timed out after ${waitedMs}ms waiting for lock ${lockPath}`);
    this.name = 'LockTimeoutError';
  }
}

/**
 * Run `fn` while holding an exclusive lock file (`open(path, 'wx')`).
 * Works across processes sharing a filesystem.
 */
export async function withFileLock<T>(lockPath: string, fn: () => Promise<T>, opts: FileLockOptions = {}): Promise<T> {
  const timeoutMs = opts.timeoutMs ?? 5_000;
  const retryDelayMs = opts.retryDelayMs ?? 10;
  const staleMs = opts.staleMs ?? 30_000;
  const started = Date.now();

  await ensureDir(dirname(lockPath));

  for (;;) {
    try {
      const fh = await open(lockPath, 'wx');
      try {
        await fh.writeFile(`${process.pid}\n`, 'utf8');
      } finally {
        await fh.close();
      }
      break;
    } catch (err) {
      if (!isErrnoException(err) || err.code !== 'EEXIST') throw err;
      if (await isStale(lockPath, staleMs)) {
        await rm(lockPath, { force: true });
        continue;
      }
      const waited = Date.now() - started;
      if (waited >= timeoutMs) throw new LockTimeoutError(lockPath, waited);
      await sleep(retryDelayMs);
    }
  }

  try {
    return await fn();
  } finally {
    await rm(lockPath, { force: true });
  }
}

async function isStale(lockPath: string, staleMs: number): Promise<boolean> {
  try {
    const st = await stat(lockPath);
    return Date.now() - st.mtimeMs > staleMs;
  } catch (err) {
    // Released between our open() and stat(); retry immediately.
    if (isErrnoException(err) && err.code === 'ENOENT') return true;
    throw err;
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * In-process mutex keyed by string. Each key has a promise chain; callers
 * run strictly one after another per key.
 */
export class KeyedMutex {
  private tails = new Map<string, Promise<void>>();

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }
}
