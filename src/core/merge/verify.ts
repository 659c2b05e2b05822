import { execa } from 'execa';

import { isErrnoException } from '../../utils/fs.js';
import type { VerificationResult, VerifyOptions } from './types.js';

/**
 * Run the test command through the shell with a hard timeout. Never throws
 * for a failing command; the caller decides what a failure means.
 *
 * The command runs in its own process group and a timeout kills the whole
 * group, so test runners and servers it forked cannot outlive it or hold its
 * output pipes open.
 */
export async function runTestCommand(opts: VerifyOptions): Promise<VerificationResult> {
  const started = Date.now();
  const subprocess = execa(opts.command, {
    cwd: opts.cwd,
    shell: true,
    all: true,
    reject: false,
    detached: true,
    env: { CI: '1' }
  });

  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    killGroup(subprocess.pid, () => subprocess.kill('SIGKILL'));
  }, opts.timeoutMs);

  try {
    const res = await subprocess;
    const durationMs = Date.now() - started;
    const output = res.all ?? '';

    if (timedOut) return { status: 'timeout', exitCode: res.exitCode, output, durationMs };
    return { status: res.exitCode === 0 ? 'passed' : 'failed', exitCode: res.exitCode, output, durationMs };
  } finally {
    clearTimeout(timer);
  }
}

function killGroup(pid: number | undefined, fallback: () => void): void {
  if (pid === undefined) return;
  try {
    process.kill(-pid, 'SIGKILL');
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ESRCH') return;
    fallback();
  }
}
