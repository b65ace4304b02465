/**
 * CLI log command - show what a work session is doing.
 */

import { Command } from 'commander';
import { readSessionLog } from '../../core/sessions/lifecycle.js';
import { formatWorkItemId, parseWorkItemId } from '../../core/work-items/work-item.js';
import { getCliContext } from '../context.js';
import { cliOutput, exitWithError } from '../renderers/index.js';

export function registerLogCommand(program: Command): void {
  program
    .command('log <id>')
    .description("Run the worktree's .worksession/loghook, or capture the terminal pane when there is none")
    .action(async (id: string) => {
      try {
        const context = await getCliContext();
        const namespacedId = formatWorkItemId(parseWorkItemId(id));
        const log = await readSessionLog(namespacedId, context.lifecycle);
        cliOutput(log, { command: 'log', operation: 'sessions.log' });
      } catch (err) {
        exitWithError(err, 'sessions.log');
      }
    });
}
