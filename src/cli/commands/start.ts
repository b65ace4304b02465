/**
 * CLI start command - provision a session for a work item.
 */

import { Command } from 'commander';
import { WorkSessionError } from '../../core/errors.js';
import { startSession } from '../../core/sessions/lifecycle.js';
import { parseWorkItemId } from '../../core/work-items/work-item.js';
import type { SessionConfig } from '../../types/config.js';
import { ExitCode } from '../../types/exit-codes.js';
import { getCliContext, requireRepository } from '../context.js';
import { toSessionEntry } from '../payloads.js';
import { cliOutput, exitWithError } from '../renderers/index.js';

export interface StartCommandFlags {
  title?: string;
  attach?: boolean;
  /** A command line, or false for --no-command. */
  command?: string | false;
  resume?: boolean;
}

/**
 * Session settings the flags override. `--command` is split on whitespace
 * into the command and its arguments, which keep `$1` / `$SANDBOX`.
 */
export function sessionOverrides(flags: StartCommandFlags): Partial<SessionConfig> {
  if (flags.command === false) return { noCommand: true };
  if (flags.command === undefined) return {};
  const [command = '', ...commandArgs] = flags.command.trim().split(/\s+/);
  if (!command) {
    throw new WorkSessionError(ExitCode.INVALID_INPUT, '--command cannot be empty', {
      fix: 'Pass a command line, or --no-command to start without one',
    });
  }
  return { command, commandArgs, noCommand: false };
}

export function registerStartCommand(program: Command): void {
  program
    .command('start <id>')
    .description('Create (or resume) the branch, worktree, terminal and sandbox for a work item')
    .option('--title <title>', 'Work item title, used in the branch name')
    .option('--attach', 'Attach to the terminal session afterwards')
    .option('--command <line>', 'Command to run in the terminal instead of the configured one')
    .option('--no-command', 'Start the terminal without running any command')
    .option('-r, --resume', 'Recreate a known session\'s missing resources without running its command')
    .action(async (id: string, opts: StartCommandFlags) => {
      try {
        const context = await getCliContext();
        const repositoryRoot = requireRepository(context);
        const item = parseWorkItemId(id);
        const result = await startSession(
          { item, title: opts.title, repositoryRoot, session: sessionOverrides(opts), resume: opts.resume },
          context.lifecycle,
        );
        cliOutput(
          { session: toSessionEntry(result.session), attached: result.attached, created: result.created },
          { command: 'start', operation: 'sessions.start' },
        );
        if (opts.attach) {
          await context.lifecycle.gateways.terminal.attach(result.session.terminalSession);
        }
      } catch (err) {
        exitWithError(err, 'sessions.start');
      }
    });
}
