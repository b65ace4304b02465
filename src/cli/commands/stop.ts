/**
 * CLI stop command - shut a session down.
 */

import { Command } from 'commander';
import { stopSession } from '../../core/sessions/lifecycle.js';
import { formatWorkItemId, parseWorkItemId } from '../../core/work-items/work-item.js';
import { getCliContext } from '../context.js';
import { cliOutput, exitWithError } from '../renderers/index.js';

interface StopFlags {
  deleteSandbox?: boolean;
  deleteBranch?: boolean;
  force?: boolean;
}

export function registerStopCommand(program: Command): void {
  program
    .command('stop <id>')
    .description('Kill the terminal session of a work item and mark it stopped')
    .option('--delete-sandbox', 'Also delete the sandbox')
    .option('--delete-branch', 'Also remove the worktree and delete the branch')
    .option('-f, --force', 'Delete the branch even when it is not merged')
    .action(async (id: string, opts: StopFlags) => {
      try {
        const context = await getCliContext();
        const namespacedId = formatWorkItemId(parseWorkItemId(id));
        const result = await stopSession(
          namespacedId,
          {
            deleteSandbox: opts.deleteSandbox ?? false,
            deleteBranch: opts.deleteBranch ?? false,
            force: opts.force ?? false,
          },
          context.lifecycle,
        );
        cliOutput(
          { id: namespacedId, stopped: result.stopped, skipped: result.skipped },
          { command: 'stop', operation: 'sessions.stop' },
        );
      } catch (err) {
        exitWithError(err, 'sessions.stop');
      }
    });
}
