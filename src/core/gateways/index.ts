/**
 * Gateway factory and re-exports.
 */

import { existsSync } from 'node:fs';
import { join } from 'node:path';
import type { WorkSessionConfig } from '../../types/config.js';
import { GitGateway } from './git.js';
import { SandboxCliGateway } from './sandbox.js';
import { TmuxGateway } from './tmux.js';
import type { Gateways } from './types.js';

export * from './types.js';
export { runCommand, commandFailed, type CommandResult, type CommandRunner, type RunOptions } from './exec.js';
export { GitGateway, parseBranchList, parseWorktreeList } from './git.js';
export { TmuxGateway } from './tmux.js';
export { SandboxCliGateway, listIncludesSandbox } from './sandbox.js';

/**
 * Build the real gateways from configuration. A repository can be opened
 * when its root holds a `.git` entry (directory, or file for worktrees).
 */
export function createGateways(config: WorkSessionConfig): Gateways {
  const { commandTimeoutMs } = config.gateways;
  return {
    terminal: new TmuxGateway({ binary: config.gateways.tmuxBinary, timeoutMs: commandTimeoutMs }),
    sandbox: new SandboxCliGateway({ binary: config.gateways.sandboxBinary, timeoutMs: commandTimeoutMs }),
    vcsFor(repoRoot: string) {
      if (!repoRoot || !existsSync(join(repoRoot, '.git'))) return null;
      return new GitGateway(repoRoot, { binary: config.gateways.gitBinary, timeoutMs: commandTimeoutMs });
    },
  };
}
