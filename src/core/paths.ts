/**
 * Path resolution for worksession.
 *
 * Environment variables:
 *   WORKSESSION_HOME - Global data directory (default: ~/.worksession)
 */

import { join, resolve } from 'node:path';
import { homedir } from 'node:os';

/** Repository-local directory holding per-repository files. */
export const REPO_DIR_NAME = '.worksession';

/**
 * Get the global worksession home directory.
 * Respects WORKSESSION_HOME env var, defaults to ~/.worksession.
 */
export function getWorksessionHome(): string {
  return process.env['WORKSESSION_HOME'] ?? join(homedir(), '.worksession');
}

/** Canonical session store file. */
export function getSessionsPath(): string {
  return join(getWorksessionHome(), 'sessions.json');
}

/** Global config file. */
export function getGlobalConfigPath(): string {
  return join(getWorksessionHome(), 'config.json');
}

/** Repository config file, layered over the global one. */
export function getRepoConfigPath(repoRoot: string): string {
  return join(resolve(repoRoot), REPO_DIR_NAME, 'config.json');
}

/** Session file written by releases that kept one store per repository. */
export function getLegacySessionsPath(repoRoot: string): string {
  return join(resolve(repoRoot), REPO_DIR_NAME, 'sessions.json');
}

/** Relative location of the shutdown artifact inside a worktree or sandbox. */
export const STOP_ARTIFACT_RELATIVE_PATH = `${REPO_DIR_NAME}/stop.json`;

/** Relative location of the optional log script inside a worktree. */
export const LOGHOOK_RELATIVE_PATH = `${REPO_DIR_NAME}/loghook`;

/**
 * Expand a leading `~` to the user's home directory.
 */
export function expandHome(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return path;
}
