/**
 * Tests for cleanup mode selection and option presets.
 */

import { describe, it, expect } from 'vitest';
import {
  MODE_RESOURCES,
  buildCliCleanupOptions,
  buildDashboardCleanupOptions,
  resolveCleanupMode,
} from '../cleanup-modes.js';

const GLOBAL = { kind: 'global' } as const;

describe('resolveCleanupMode', () => {
  it('applies the flag precedence', () => {
    expect(resolveCleanupMode({})).toBe('default');
    expect(resolveCleanupMode({ stale: true })).toBe('stale');
    expect(resolveCleanupMode({ orphaned: true, stale: true })).toBe('orphaned');
    expect(resolveCleanupMode({ orphaned: true })).toBe('orphaned');
    expect(resolveCleanupMode({ branches: true, orphaned: true })).toBe('branches');
    expect(resolveCleanupMode({ stale: true, branches: true })).toBe('stale-and-branches');
    expect(resolveCleanupMode({ all: true, stale: true, branches: true })).toBe('all');
  });

  it('maps orphaned to sandboxes only', () => {
    expect(MODE_RESOURCES.orphaned).toEqual({ sandboxes: true, worktrees: false, branches: false });
  });
});

describe('buildCliCleanupOptions', () => {
  it('asks for confirmation unless forced or dry-run', () => {
    expect(buildCliCleanupOptions({}, GLOBAL).requireConfirmation).toBe(true);
    expect(buildCliCleanupOptions({ force: true }, GLOBAL).requireConfirmation).toBe(false);
    expect(buildCliCleanupOptions({ dryRun: true }, GLOBAL).requireConfirmation).toBe(false);
  });

  it('sets the resource switches from the mode', () => {
    const options = buildCliCleanupOptions({ branches: true, concurrency: 4 }, GLOBAL);
    expect(options).toMatchObject({
      mode: 'branches',
      cleanSandboxes: false,
      cleanWorktrees: false,
      cleanBranches: true,
      verbose: true,
      silent: false,
      concurrency: 4,
    });
  });

  it('keeps the combined mode name for stale plus branches', () => {
    const options = buildCliCleanupOptions({ stale: true, branches: true }, GLOBAL);
    expect(options.mode).toBe('stale-and-branches');
    expect(options).toMatchObject({ cleanSandboxes: true, cleanWorktrees: true, cleanBranches: true });
  });

  it('keeps the stale mode name', () => {
    expect(buildCliCleanupOptions({ stale: true }, GLOBAL).mode).toBe('stale');
  });
});

describe('buildDashboardCleanupOptions', () => {
  it('cleans sandboxes only, forced and unconfirmed', () => {
    const scope = { kind: 'repository', root: '/repos/app' } as const;
    expect(buildDashboardCleanupOptions(scope, true)).toEqual({
      mode: 'orphaned',
      cleanSandboxes: true,
      cleanWorktrees: false,
      cleanBranches: false,
      dryRun: false,
      force: true,
      requireConfirmation: false,
      silent: true,
      verbose: false,
      scope,
      concurrency: 1,
    });
  });
});
