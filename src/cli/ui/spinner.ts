import ora from 'ora';

import { INDENT } from './theme.js';

/** Progress line for one long-running step, such as merging a single branch. */
export interface SpinnerHandle {
  update(text: string): void;
  /** Clear the line; the caller reports the result itself. */
  stop(): void;
}

/**
 * Start a progress line on stderr. Without a TTY (CI, pipes, `--quiet`) each
 * distinct text is printed once as a plain line instead of animating.
 */
export function startSpinner(text: string, stream: NodeJS.WriteStream = process.stderr): SpinnerHandle {
  if (!stream.isTTY || process.env.TRELLIS_QUIET === '1') {
    let last = '';
    const print = (t: string): void => {
      if (t === last) return;
      last = t;
      stream.write(`${INDENT}${t}\n`);
    };
    print(text);
    return { update: print, stop: () => undefined };
  }

  // CI turns ora off even on a TTY; this branch only runs with a real terminal.
  const spinner = ora({ text, stream, spinner: 'dots', indent: INDENT.length, isEnabled: true }).start();
  return {
    update: (t) => {
      spinner.text = t;
    },
    stop: () => {
      spinner.stop();
    }
  };
}
