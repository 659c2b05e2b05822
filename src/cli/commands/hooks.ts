import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';

import { ComplianceSampler, TaskBindingChecker } from '../../core/gate/custodiet.js';
import { GateEngine } from '../../core/gate/engine.js';
import { HookRouter } from '../../core/gate/hooks.js';
import { HookSessionRegistry, type HookReply } from '../../core/gate/protocol.js';
import { withWorkspace, type CommandResult, type WorkspaceCommandOptions } from '../workspace.js';

export interface HooksCommandOptions extends WorkspaceCommandOptions {
  /** Defaults to stdin. */
  input?: Readable;
  /** Receives one JSON line per event; defaults to stdout. */
  write?: (line: string) => void;
  /** Reminder sampling source. */
  random?: () => number;
}

/**
 * `trellis hooks`: serve the gate hooks over JSON lines. Each input line is a
 * hook event; each output line is the decision for it, in order. Runs until
 * the input closes.
 */
export async function runHooksCommand(opts: HooksCommandOptions = {}): Promise<CommandResult> {
  return await withWorkspace(opts, async ({ store, config, ledger, logger }) => {
    const write = opts.write ?? ((line: string) => process.stdout.write(line + '\n'));
    const gates = new GateEngine({ config: config.gates, logger: logger.child('gates'), audit: ledger });
    const sampler = new ComplianceSampler({
      config: config.custodiet,
      checker: new TaskBindingChecker(store),
      random: opts.random,
      logger: logger.child('custodiet'),
      audit: ledger
    });
    const registry = new HookSessionRegistry(new HookRouter({ gates, sampler, logger: logger.child('hooks') }), logger.child('hooks'));

    const counts = { events: 0, denied: 0, errors: 0 };
    const lines = createInterface({ input: opts.input ?? process.stdin, crlfDelay: Infinity });
    for await (const line of lines) {
      if (!line.trim()) continue;
      const reply: HookReply = await registry.handleLine(line);
      counts.events += 1;
      if (reply.verdict === 'deny') counts.denied += 1;
      if (reply.verdict === 'error') counts.errors += 1;
      write(JSON.stringify(reply));
    }
    return { ok: true, details: counts };
  });
}
