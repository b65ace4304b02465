/**
 * CLI list command - sessions with their live status.
 */

import { Command } from 'commander';
import { buildDashboardCleanupOptions } from '../../core/sessions/cleanup-modes.js';
import { listSessions, runCleanup } from '../../core/sessions/lifecycle.js';
import { isQuiet } from '../format-context.js';
import { getCliContext, scopeFor } from '../context.js';
import { toCleanSummary, toSessionEntry, type ListPayload } from '../payloads.js';
import { cliOutput, exitWithError } from '../renderers/index.js';

export function registerListCommand(program: Command): void {
  program
    .command('list')
    .alias('ls')
    .description('List sessions and their status')
    .option('--global', 'Include sessions from every repository')
    .option('--auto-clean', 'Delete the sandboxes of stale sessions before listing')
    .action(async (opts: { global?: boolean; autoClean?: boolean }) => {
      try {
        const context = await getCliContext();
        const scope = scopeFor(context, opts.global ?? false);

        let cleanup: ListPayload['cleanup'];
        if (opts.autoClean) {
          const run = await runCleanup(buildDashboardCleanupOptions(scope, isQuiet()), context.lifecycle);
          cleanup = toCleanSummary(run);
        }

        const views = await listSessions(scope, context.lifecycle);
        cliOutput(
          {
            sessions: views.map(({ record, status }) => toSessionEntry(record, { status })),
            total: views.length,
            ...(cleanup && { cleanup }),
          },
          { command: 'list', operation: 'sessions.list' },
        );
      } catch (err) {
        exitWithError(err, 'sessions.list');
      }
    });
}
