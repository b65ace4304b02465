/**
 * CLI attach command - join the terminal session of a running work item.
 */

import { Command } from 'commander';
import { attachSession } from '../../core/sessions/lifecycle.js';
import { formatWorkItemId, parseWorkItemId } from '../../core/work-items/work-item.js';
import { getCliContext } from '../context.js';
import { cliOutput, exitWithError } from '../renderers/index.js';

export function registerAttachCommand(program: Command): void {
  program
    .command('attach <id>')
    .description('Attach to the terminal session of a running work item')
    .option('--print', 'Only print the terminal session name')
    .action(async (id: string, opts: { print?: boolean }) => {
      try {
        const context = await getCliContext();
        const namespacedId = formatWorkItemId(parseWorkItemId(id));
        const { terminalSession } = await attachSession(namespacedId, context.lifecycle);
        cliOutput({ id: namespacedId, terminalSession }, { command: 'attach', operation: 'sessions.attach' });
        if (!opts.print) {
          await context.lifecycle.gateways.terminal.attach(terminalSession);
        }
      } catch (err) {
        exitWithError(err, 'sessions.attach');
      }
    });
}
