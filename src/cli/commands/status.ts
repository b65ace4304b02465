/**
 * CLI status command - one session in detail.
 */

import { Command } from 'commander';
import { WorkSessionError } from '../../core/errors.js';
import { listSessions } from '../../core/sessions/lifecycle.js';
import { formatWorkItemId, parseWorkItemId } from '../../core/work-items/work-item.js';
import { ExitCode } from '../../types/exit-codes.js';
import { getCliContext } from '../context.js';
import { toSessionEntry } from '../payloads.js';
import { cliOutput, exitWithError } from '../renderers/index.js';

export function registerStatusCommand(program: Command): void {
  program
    .command('status <id>')
    .description('Show the status of one session')
    .action(async (id: string) => {
      try {
        const context = await getCliContext();
        const namespacedId = formatWorkItemId(parseWorkItemId(id));
        const views = await listSessions({ kind: 'global' }, context.lifecycle);
        const view = views.find(({ record }) => record.namespacedId === namespacedId);
        if (!view) {
          throw new WorkSessionError(ExitCode.SESSION_NOT_FOUND, `No session for ${namespacedId}`);
        }
        cliOutput(
          { session: toSessionEntry(view.record, { status: view.status }) },
          { command: 'status', operation: 'sessions.status' },
        );
      } catch (err) {
        exitWithError(err, 'sessions.status');
      }
    });
}
