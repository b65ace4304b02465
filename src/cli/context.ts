/**
 * Per-invocation CLI context: repository detection, configuration and the
 * lifecycle context commands run against.
 */

import { existsSync, readFileSync, statSync } from 'node:fs';
import { basename, dirname, join, resolve } from 'node:path';
import { loadConfig } from '../core/config.js';
import { WorkSessionError } from '../core/errors.js';
import { createGateways } from '../core/gateways/index.js';
import { expandHome } from '../core/paths.js';
import type { LifecycleContext } from '../core/sessions/lifecycle.js';
import { SessionStore } from '../store/session-store.js';
import type { WorkSessionConfig } from '../types/config.js';
import { ExitCode } from '../types/exit-codes.js';
import type { SessionScope } from '../types/session.js';

export interface CliContext {
  config: WorkSessionConfig;
  /** Repository the command runs in, or null outside one. */
  repoRoot: string | null;
  lifecycle: LifecycleContext;
}

/**
 * Main repository of a linked worktree, from its `.git` file
 * (`gitdir: <main>/.git/worktrees/<name>`).
 */
function mainRepositoryOf(gitFile: string): string | null {
  const match = /^gitdir:\s*(.+)$/m.exec(readFileSync(gitFile, 'utf8'));
  const gitDir = match?.[1]?.trim();
  if (!gitDir) return null;
  const worktreesDir = dirname(resolve(dirname(gitFile), gitDir));
  if (basename(worktreesDir) !== 'worktrees') return null;
  return dirname(dirname(worktreesDir));
}

/**
 * Walk up from `start` to the repository root. Inside a linked worktree this
 * is the main repository.
 */
export function findRepositoryRoot(start: string = process.cwd()): string | null {
  let dir = resolve(start);
  for (;;) {
    const gitPath = join(dir, '.git');
    if (existsSync(gitPath)) {
      return statSync(gitPath).isFile() ? (mainRepositoryOf(gitPath) ?? dir) : dir;
    }
    const parent = dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

export function buildLifecycleContext(config: WorkSessionConfig): LifecycleContext {
  return {
    config,
    store: new SessionStore({
      workspaceRoots: config.store.workspaceRoots.map(expandHome),
      legacyScanDepth: config.store.legacyScanDepth,
    }),
    gateways: createGateways(config),
  };
}

let current: Promise<CliContext> | null = null;

/**
 * Load the context once per invocation.
 */
export function getCliContext(cwd: string = process.cwd()): Promise<CliContext> {
  current ??= (async () => {
    const repoRoot = findRepositoryRoot(cwd);
    const config = await loadConfig(repoRoot ?? undefined);
    return { config, repoRoot, lifecycle: buildLifecycleContext(config) };
  })();
  return current;
}

/** The repository root, or NOT_FOUND outside a repository. */
export function requireRepository(context: CliContext): string {
  if (!context.repoRoot) {
    throw new WorkSessionError(ExitCode.NOT_FOUND, 'Not inside a git repository', {
      fix: 'Run the command from a repository, or pass --global where supported',
    });
  }
  return context.repoRoot;
}

/** Global scope when asked or outside a repository; otherwise this repository. */
export function scopeFor(context: CliContext, global: boolean): SessionScope {
  if (global || !context.repoRoot) return { kind: 'global' };
  return { kind: 'repository', root: context.repoRoot };
}
