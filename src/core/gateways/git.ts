/**
 * Git-backed VcsGateway.
 */

import { rm } from 'node:fs/promises';
import { resolve } from 'node:path';
import { WorkSessionError } from '../errors.js';
import { getLogger } from '../logger.js';
import { ExitCode } from '../../types/exit-codes.js';
import { commandFailed, runCommand, type CommandResult, type CommandRunner } from './exec.js';
import type { VcsGateway, WorktreeInfo } from './types.js';

export interface GitGatewayOptions {
  binary?: string;
  timeoutMs?: number;
  run?: CommandRunner;
}

/**
 * Parse `git worktree list --porcelain` output.
 */
export function parseWorktreeList(output: string): WorktreeInfo[] {
  const worktrees: WorktreeInfo[] = [];
  let current: WorktreeInfo | null = null;

  for (const line of output.split('\n')) {
    if (line.startsWith('worktree ')) {
      current = { path: line.slice('worktree '.length), branch: '', head: '' };
      worktrees.push(current);
    } else if (current && line.startsWith('HEAD ')) {
      current.head = line.slice('HEAD '.length);
    } else if (current && line.startsWith('branch ')) {
      current.branch = line.slice('branch '.length).replace(/^refs\/heads\//, '');
    }
  }

  return worktrees;
}

/**
 * Parse `git branch --list` output into bare branch names.
 * Strips the `*` (current) and `+` (checked out elsewhere) markers.
 */
export function parseBranchList(output: string): string[] {
  return output
    .split('\n')
    .map((line) => line.replace(/^[*+]\s*/, '').trim())
    .filter((line) => line.length > 0);
}

export class GitGateway implements VcsGateway {
  readonly repoRoot: string;
  private readonly binary: string;
  private readonly timeoutMs: number;
  private readonly run: CommandRunner;

  constructor(repoRoot: string, options: GitGatewayOptions = {}) {
    this.repoRoot = resolve(repoRoot);
    this.binary = options.binary ?? 'git';
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.run = options.run ?? runCommand;
  }

  private git(args: string[]): Promise<CommandResult> {
    return this.run(this.binary, args, { cwd: this.repoRoot, timeoutMs: this.timeoutMs });
  }

  private async gitOk(args: string[], operation: string): Promise<string> {
    const result = await this.git(args);
    if (result.exitCode !== 0) {
      throw commandFailed(operation, result);
    }
    return result.stdout;
  }

  async branchExists(name: string): Promise<boolean> {
    const result = await this.git(['rev-parse', '--verify', '--quiet', `refs/heads/${name}`]);
    return result.exitCode === 0;
  }

  async createBranch(name: string): Promise<void> {
    await this.gitOk(['branch', name], `failed to create branch ${name}`);
  }

  async createWorktree(path: string, branch: string): Promise<void> {
    await this.gitOk(['worktree', 'add', path, branch], `failed to create worktree ${path}`);
  }

  async removeWorktree(path: string): Promise<void> {
    const result = await this.git(['worktree', 'remove', path, '--force']);
    if (result.exitCode === 0) return;

    // Not registered with git (or already half-removed): drop the directory
    // and let git forget any dangling administrative entry.
    getLogger('git').warn({ path, stderr: result.stderr.trim() }, 'git worktree remove failed, removing directory');
    try {
      await rm(path, { recursive: true, force: true });
    } catch (err) {
      throw new WorkSessionError(ExitCode.GATEWAY_FAILED, `failed to remove worktree ${path}`, { cause: err });
    }
    await this.gitOk(['worktree', 'prune'], 'failed to prune worktrees');
  }

  async listWorktrees(): Promise<WorktreeInfo[]> {
    const stdout = await this.gitOk(['worktree', 'list', '--porcelain'], 'failed to list worktrees');
    return parseWorktreeList(stdout);
  }

  async worktreeExists(path: string): Promise<boolean> {
    const target = resolve(path);
    const worktrees = await this.listWorktrees();
    return worktrees.some((w) => resolve(w.path) === target);
  }

  async listIssueBranches(): Promise<string[]> {
    const stdout = await this.gitOk(['branch', '--list', 'issue-*'], 'failed to list branches');
    return parseBranchList(stdout);
  }

  async currentBranch(): Promise<string> {
    const stdout = await this.gitOk(['rev-parse', '--abbrev-ref', 'HEAD'], 'failed to read current branch');
    return stdout.trim();
  }

  async deleteBranch(name: string, force = false): Promise<void> {
    const current = await this.currentBranch();
    if (current === name) {
      throw new WorkSessionError(ExitCode.BRANCH_PROTECTED, `cannot delete current branch: ${name}`, {
        fix: 'Check out another branch first',
      });
    }
    await this.gitOk(['branch', force ? '-D' : '-d', name], `failed to delete branch ${name}`);
  }
}
