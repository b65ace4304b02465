/**
 * CLI clean command - reconcile stale sessions and orphaned branches.
 *
 * Individual resource failures are part of the report; the exit code stays 0
 * once the batch has run.
 */

import { Command, InvalidArgumentError } from 'commander';
import { WorkSessionError } from '../../core/errors.js';
import { buildCliCleanupOptions, type CleanupFlags } from '../../core/sessions/cleanup-modes.js';
import { runCleanup, type CleanupPlan } from '../../core/sessions/lifecycle.js';
import { ExitCode } from '../../types/exit-codes.js';
import { getCliContext, scopeFor } from '../context.js';
import { toCleanPayload } from '../payloads.js';
import { confirm } from '../prompt.js';
import { cliOutput, exitWithError } from '../renderers/index.js';

export const MAX_CONCURRENCY = 16;

/** Commander parser for --concurrency. */
export function parseConcurrency(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1 || n > MAX_CONCURRENCY) {
    throw new InvalidArgumentError(`must be an integer from 1 to ${MAX_CONCURRENCY}`);
  }
  return n;
}

/** Lines shown before the confirmation prompt. */
export function describePlan(plan: CleanupPlan): string[] {
  const lines: string[] = [];
  if (plan.sessions.length > 0) {
    lines.push(`Stale sessions (${plan.sessions.length}):`);
    for (const record of plan.sessions) {
      lines.push(`  ${record.namespacedId} ${record.issueTitle}`.trimEnd());
    }
  }
  for (const { repoRoot, branches } of plan.branches) {
    lines.push(`Orphaned branches in ${repoRoot} (${branches.length}):`);
    for (const branch of branches) lines.push(`  ${branch}`);
  }
  return lines;
}

async function confirmPlan(plan: CleanupPlan): Promise<boolean> {
  if (!process.stdin.isTTY) {
    throw new WorkSessionError(ExitCode.INVALID_INPUT, 'Cleanup needs confirmation but stdin is not a terminal', {
      fix: 'Re-run with --force, or preview with --dry-run',
    });
  }
  for (const line of describePlan(plan)) process.stderr.write(`${line}\n`);
  return confirm('Proceed with cleanup?');
}

interface CleanCommandFlags extends CleanupFlags {
  global?: boolean;
}

export function registerCleanCommand(program: Command): void {
  program
    .command('clean')
    .description('Remove sandboxes, worktrees and branches left behind by sessions that ended')
    .option('-n, --dry-run', 'Show what would be cleaned without touching anything')
    .option('-f, --force', 'Skip confirmation and force-delete unmerged branches')
    .option('--stale', 'Clean stale sessions (sandboxes and worktrees)')
    .option('--orphaned', 'Clean only the sandboxes of stale sessions')
    .option('--branches', 'Delete issue branches with no live session')
    .option('--all', 'Stale sessions and orphaned branches')
    .option('--global', 'Reconcile sessions from every repository')
    .option('--concurrency <n>', 'Sessions cleaned in parallel', parseConcurrency)
    .action(async (opts: CleanCommandFlags) => {
      try {
        const context = await getCliContext();
        const scope = scopeFor(context, opts.global ?? false);
        const options = buildCliCleanupOptions(
          { ...opts, concurrency: opts.concurrency ?? context.config.cleanup.concurrency },
          scope,
        );
        const run = await runCleanup(options, context.lifecycle, { confirm: confirmPlan });
        cliOutput(toCleanPayload(run, options.dryRun), { command: 'clean', operation: 'sessions.clean' });
      } catch (err) {
        exitWithError(err, 'sessions.clean');
      }
    });
}
