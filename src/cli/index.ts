#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { existsSync, readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { runAuditCommand } from './commands/audit.js';
import { runHistoryCommand } from './commands/history.js';
import { runHooksCommand } from './commands/hooks.js';
import { runInitCommand } from './commands/init.js';
import { runMergeCommand } from './commands/merge.js';
import { runReindexCommand } from './commands/reindex.js';
import {
  runTaskClaimCommand,
  runTaskCompleteCommand,
  runTaskCompleteManyCommand,
  runTaskCreateCommand,
  runTaskDecomposeCommand,
  runTaskDepsCommand,
  runTaskListCommand,
  runTaskResetStalledCommand,
  runTaskRevertCommand,
  runTaskShowCommand,
  runTaskTreeCommand,
  runTaskUpdateCommand
} from './commands/task.js';
import { createRenderer, getRenderer } from './ui/renderer.js';
import { describeDetails, type CommandResult } from './workspace.js';

export function buildCli(): Command {
  const program = new Command();
  const version = detectVersionSync() ?? '0.0.0';

  program
    .name('trellis')
    .description('Task-graph coordination for concurrent agent sessions: claims, gates and sequential merges')
    .version(version, '-v, --version');

  program
    .option('--verbose', 'Show debug output')
    .option('--quiet', 'Machine-friendly output (JSON lines)')
    .option('--root <path>', 'Repository root (defaults to TRELLIS_ROOT or the working directory)');

  program.hook('preAction', (thisCommand) => {
    const o = thisCommand.opts<{ verbose?: boolean; quiet?: boolean; root?: string }>();
    process.env.TRELLIS_VERBOSE = o.verbose ? '1' : '0';
    process.env.TRELLIS_QUIET = o.quiet ? '1' : '0';
    if (o.root) process.env.TRELLIS_ROOT = o.root;
    createRenderer({ quiet: !!o.quiet });
  });

  // ── Workspace ────────────────────────────────────────────────────────────

  program
    .command('init')
    .description('Create .trellis/ and a default config.yaml')
    .option('--main-branch <name>', 'Main branch for a new config')
    .option('--test-command <cmd>', 'Verification command for a new config')
    .action(async (opts: { mainBranch?: string; testCommand?: string }) => {
      report('Init', await runInitCommand(opts));
    });

  program
    .command('reindex')
    .description('Rebuild the derived index from the task records')
    .action(async () => {
      report('Reindex', await runReindexCommand());
    });

  program
    .command('audit')
    .description('Report graph health findings')
    .option('--strict', 'Exit 1 when any finding is critical')
    .action(async (opts: { strict?: boolean }) => {
      report('Audit', await runAuditCommand(opts));
    });

  program
    .command('history')
    .description('Show the tail of the audit ledger')
    .option('--tail <n>', 'Number of entries', parseInteger, 20)
    .option('--task <id>', 'Only entries about this task')
    .action(async (opts: { tail: number; task?: string }) => {
      report('History', await runHistoryCommand(opts));
    });

  // ── Tasks ────────────────────────────────────────────────────────────────

  const task = program.command('task').description('Create, update, claim and inspect tasks');

  task
    .command('create')
    .description('Create a task')
    .argument('<title>', 'Task title')
    .option('--id <id>', 'Explicit id (default: <project>-<random>)')
    .option('--type <type>', 'task | bug | feature | epic | project | goal | learn')
    .option('--status <status>', 'inbox | active')
    .option('--priority <n>', 'Priority 0 (highest) to 4')
    .option('--assignee <who>', 'worker:<name> or human:<name>')
    .option('--parent <id>', 'Parent task')
    .option('--project <id>', 'Project task')
    .option('--depends-on <id>', 'Hard dependency (repeatable)', collectRepeatable, [])
    .option('--soft-depends-on <id>', 'Soft dependency (repeatable)', collectRepeatable, [])
    .option('--tag <tag>', 'Tag (repeatable)', collectRepeatable, [])
    .option('--body <text>', 'Task body')
    .option('--branch <name>', 'Branch carrying the work')
    .option('--due <iso>', 'Due date (ISO 8601)')
    .action(async (title: string, opts: Omit<Parameters<typeof runTaskCreateCommand>[0], 'title' | 'tags'> & { tag: string[] }) => {
      const { tag, ...rest } = opts;
      report('Create', await runTaskCreateCommand({ ...rest, title, tags: tag }));
    });

  task
    .command('update')
    .description('Update a task')
    .argument('<id>', 'Task id')
    .option('--title <title>', 'New title')
    .option('--type <type>', 'New type')
    .option('--status <status>', 'New status (in-progress and merge-ready are accepted)')
    .option('--priority <n>', 'New priority')
    .option('--assignee <who>', 'New assignee')
    .option('--clear-assignee', 'Remove the assignee')
    .option('--parent <id>', 'New parent')
    .option('--project <id>', 'New project')
    .option('--depends-on <id>', 'Replace hard dependencies (repeatable)', collectRepeatable, [])
    .option('--soft-depends-on <id>', 'Replace soft dependencies (repeatable)', collectRepeatable, [])
    .option('--tag <tag>', 'Replace tags (repeatable)', collectRepeatable, [])
    .option('--branch <name>', 'Branch carrying the work')
    .option('--due <iso>', 'Due date')
    .option('--append <text>', 'Append a paragraph to the body')
    .option('--expected-version <n>', 'Fail unless the task is at this version')
    .option('--force', 'Override the guards that allow it')
    .action(async (id: string, opts: Omit<Parameters<typeof runTaskUpdateCommand>[0], 'id' | 'tags'> & { tag: string[] }) => {
      const { tag, ...rest } = opts;
      report('Update', await runTaskUpdateCommand({ ...rest, id, tags: tag }));
    });

  task
    .command('complete')
    .description('Mark a task done')
    .argument('<id>', 'Task id')
    .option('--force', 'Complete despite open children or an unfinished checklist')
    .action(async (id: string, opts: { force?: boolean }) => {
      report('Complete', await runTaskCompleteCommand({ id, force: opts.force }));
    });

  task
    .command('complete-many')
    .description('Mark several tasks done, in the order given')
    .argument('<ids...>', 'Task ids; list children before their parent')
    .option('--force', 'Complete despite open children or an unfinished checklist')
    .action(async (ids: string[], opts: { force?: boolean }) => {
      report('Complete', await runTaskCompleteManyCommand({ ids, force: opts.force }));
    });

  task
    .command('decompose')
    .description('Split a task into child tasks, one per title')
    .argument('<id>', 'Parent task id')
    .argument('<titles...>', 'Child titles')
    .option('--type <type>', 'Type for every child')
    .option('--priority <n>', 'Priority for every child')
    .option('--sequential', 'Each child depends on the one before it')
    .action(async (id: string, titles: string[], opts: { type?: string; priority?: string; sequential?: boolean }) => {
      report('Decompose', await runTaskDecomposeCommand({ id, titles, ...opts }));
    });

  task
    .command('deps')
    .description("Show a task's parent, children and dependency edges in both directions")
    .argument('<id>', 'Task id')
    .action(async (id: string) => {
      report('Deps', await runTaskDepsCommand({ id }));
    });

  task
    .command('list')
    .description('List tasks; --status ready prints the ready queue in claim order')
    .option('--status <status>', 'Status, or "ready"')
    .option('--project <id>', 'Project task id')
    .option('--type <type>', 'Task type')
    .option('--assignee <who>', 'Assignee')
    .option('--limit <n>', 'Maximum number of tasks', parseInteger)
    .action(async (opts: { status?: string; project?: string; type?: string; assignee?: string; limit?: number }) => {
      report('List', await runTaskListCommand(opts));
    });

  task
    .command('tree')
    .description('Show the subtree under a task')
    .argument('<id>', 'Root task id')
    .option('--exclude-status <status>', 'Prune subtrees in this status (repeatable)', collectRepeatable, [])
    .option('--max-depth <n>', 'Maximum depth', parseInteger)
    .action(async (id: string, opts: { excludeStatus: string[]; maxDepth?: number }) => {
      report('Tree', await runTaskTreeCommand({ id, ...opts }));
    });

  task
    .command('show')
    .description('Show one task')
    .argument('<id>', 'Task id')
    .action(async (id: string) => {
      report('Show', await runTaskShowCommand({ id }));
    });

  task
    .command('claim')
    .description('Claim a task for an assignee')
    .argument('<id>', 'Task id')
    .requiredOption('--assignee <who>', 'worker:<name> or human:<name>')
    .action(async (id: string, opts: { assignee: string }) => {
      report('Claim', await runTaskClaimCommand({ id, assignee: opts.assignee }));
    });

  task
    .command('claim-next')
    .description('Claim the head of the ready queue')
    .requiredOption('--assignee <who>', 'worker:<name> or human:<name>')
    .option('--project <id>', 'Only tasks in this project')
    .option('--type <type>', 'Only tasks of this type')
    .action(async (opts: { assignee: string; project?: string; type?: string }) => {
      report('Claim', await runTaskClaimCommand(opts));
    });

  task
    .command('revert')
    .description('Release an in-progress claim back to active')
    .argument('<id>', 'Task id')
    .action(async (id: string) => {
      report('Revert', await runTaskRevertCommand({ id }));
    });

  task
    .command('reset-stalled')
    .description('Release claims untouched for longer than --hours')
    .option('--hours <n>', 'Age threshold in hours', parseNumber, 4)
    .option('--dry-run', 'List without changing anything')
    .action(async (opts: { hours: number; dryRun?: boolean }) => {
      report('Reset', await runTaskResetStalledCommand(opts));
    });

  // ── Integration ──────────────────────────────────────────────────────────

  program
    .command('merge')
    .description('Squash-merge merge-ready task branches into main, one at a time')
    .option('--dry-run', 'List candidates without merging')
    .action(async (opts: { dryRun?: boolean }) => {
      report('Merge', await runMergeCommand(opts), 'Failed tasks were moved to review with the failure output in their body.');
    });

  program
    .command('hooks')
    .description('Serve gate hooks: JSON hook events on stdin, one decision per line on stdout')
    .action(async () => {
      report('Hooks', await runHooksCommand());
    });

  return program;
}

function report(what: string, res: CommandResult, tip?: string): void {
  if (res.ok) return;
  getRenderer().error(`${what} failed`, describeDetails(res.details), tip);
  process.exitCode = 1;
}

buildCli()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    getRenderer().error('Unexpected error', err instanceof Error ? err.stack ?? err.message : String(err), 'Run with --verbose for more details.');
    process.exitCode = 1;
  });

function detectVersionSync(): string | null {
  try {
    const startDir = dirname(fileURLToPath(import.meta.url));

    let current = startDir;
    for (let i = 0; i < 8; i++) {
      const candidate = resolve(current, 'package.json');
      if (existsSync(candidate)) {
        const content = readFileSync(candidate, 'utf8');
        const parsed: unknown = JSON.parse(content);
        if (parsed && typeof parsed === 'object' && 'version' in parsed && typeof parsed.version === 'string') {
          return parsed.version;
        }
        return null;
      }
      const parent = resolve(current, '..');
      if (parent === current) break;
      current = parent;
    }
    return null;
  } catch {
    return null;
  }
}

function collectRepeatable(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function parseInteger(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n)) throw new InvalidArgumentError(`expected an integer, got "${value}"`);
  return n;
}

function parseNumber(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n)) throw new InvalidArgumentError(`expected a number, got "${value}"`);
  return n;
}
