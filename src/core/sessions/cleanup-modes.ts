/**
 * Cleanup modes and the option presets built from them.
 */

import type { SessionScope } from '../../types/session.js';

export type CleanupMode = 'default' | 'stale' | 'orphaned' | 'branches' | 'all' | 'stale-and-branches';

/** Resource switches; each is independent of the others. */
export interface CleanupOptions {
  /** The mode the switches were built from. */
  mode: CleanupMode;
  cleanSandboxes: boolean;
  cleanWorktrees: boolean;
  cleanBranches: boolean;
  dryRun: boolean;
  /** Force-delete branches and skip the confirmation prompt. */
  force: boolean;
  requireConfirmation: boolean;
  /** Collect no detail lines at all. */
  silent: boolean;
  /** Collect a detail line per resource checked. */
  verbose: boolean;
  scope: SessionScope;
  concurrency: number;
}

/** Mode selectors as given on the command line. */
export interface CleanupFlags {
  stale?: boolean;
  orphaned?: boolean;
  branches?: boolean;
  all?: boolean;
  dryRun?: boolean;
  force?: boolean;
  concurrency?: number;
}

export const MODE_RESOURCES: Readonly<Record<CleanupMode, { sandboxes: boolean; worktrees: boolean; branches: boolean }>> = {
  default: { sandboxes: true, worktrees: true, branches: false },
  stale: { sandboxes: true, worktrees: true, branches: false },
  orphaned: { sandboxes: true, worktrees: false, branches: false },
  branches: { sandboxes: false, worktrees: false, branches: true },
  all: { sandboxes: true, worktrees: true, branches: true },
  'stale-and-branches': { sandboxes: true, worktrees: true, branches: true },
};

/**
 * Pick the mode: all, then stale+branches, branches, orphaned, stale, default.
 */
export function resolveCleanupMode(flags: CleanupFlags): CleanupMode {
  if (flags.all) return 'all';
  if (flags.stale && flags.branches) return 'stale-and-branches';
  if (flags.branches) return 'branches';
  if (flags.orphaned) return 'orphaned';
  if (flags.stale) return 'stale';
  return 'default';
}

/**
 * Options for the `clean` command: verbose, confirmation unless forced
 * or dry-run.
 */
export function buildCliCleanupOptions(flags: CleanupFlags, scope: SessionScope): CleanupOptions {
  const mode = resolveCleanupMode(flags);
  const resources = MODE_RESOURCES[mode];
  const dryRun = flags.dryRun ?? false;
  const force = flags.force ?? false;
  return {
    mode,
    cleanSandboxes: resources.sandboxes,
    cleanWorktrees: resources.worktrees,
    cleanBranches: resources.branches,
    dryRun,
    force,
    requireConfirmation: !force && !dryRun,
    silent: false,
    verbose: true,
    scope,
    concurrency: flags.concurrency ?? 1,
  };
}

/**
 * Options for unattended cleanup from a dashboard refresh: sandboxes only,
 * forced, no confirmation.
 */
export function buildDashboardCleanupOptions(scope: SessionScope, silent: boolean): CleanupOptions {
  return {
    mode: 'orphaned',
    cleanSandboxes: true,
    cleanWorktrees: false,
    cleanBranches: false,
    dryRun: false,
    force: true,
    requireConfirmation: false,
    silent,
    verbose: false,
    scope,
    concurrency: 1,
  };
}
