/**
 * In-memory gateway doubles for tests.
 *
 * Each fake keeps its state in plain collections, records every mutating
 * call, and can be told to fail a named operation.
 */

import { resolve } from 'node:path';
import { WorkSessionError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { Gateways, SandboxGateway, TerminalGateway, VcsGateway, WorktreeInfo } from './types.js';

/** A call recorded by a fake: operation name plus its first argument. */
export interface FakeCall {
  op: string;
  target: string;
}

class FailureTable {
  private readonly failures = new Map<string, Error>();

  /** Make `op` fail, for every target or only for `target`. */
  set(op: string, target: string | null, error?: Error): void {
    this.failures.set(`${op}:${target ?? '*'}`, error ?? new WorkSessionError(ExitCode.GATEWAY_FAILED, `${op} failed`));
  }

  /** Stop failing `op`. */
  clear(op: string): void {
    for (const key of [...this.failures.keys()]) {
      if (key.startsWith(`${op}:`)) this.failures.delete(key);
    }
  }

  check(op: string, target: string): void {
    const failure = this.failures.get(`${op}:${target}`) ?? this.failures.get(`${op}:*`);
    if (failure) throw failure;
  }
}

export class FakeTerminalGateway implements TerminalGateway {
  readonly sessions = new Map<string, { workingDir: string; env: Record<string, string>; commands: string[] }>();
  /** capturePane output by session name. */
  readonly panes = new Map<string, string>();
  readonly calls: FakeCall[] = [];
  readonly failures = new FailureTable();

  constructor(existing: string[] = []) {
    for (const name of existing) {
      this.sessions.set(name, { workingDir: '', env: {}, commands: [] });
    }
  }

  async sessionExists(name: string): Promise<boolean> {
    this.failures.check('sessionExists', name);
    return this.sessions.has(name);
  }

  async createSession(name: string, workingDir: string, env: Record<string, string> = {}): Promise<void> {
    this.calls.push({ op: 'createSession', target: name });
    this.failures.check('createSession', name);
    this.sessions.set(name, { workingDir, env: { ...env }, commands: [] });
  }

  async killSession(name: string): Promise<void> {
    this.calls.push({ op: 'killSession', target: name });
    this.failures.check('killSession', name);
    this.sessions.delete(name);
  }

  async sendCommand(name: string, commandLine: string): Promise<void> {
    this.calls.push({ op: 'sendCommand', target: name });
    this.failures.check('sendCommand', name);
    const session = this.sessions.get(name);
    if (!session) throw new WorkSessionError(ExitCode.GATEWAY_FAILED, `no tmux session ${name}`);
    session.commands.push(commandLine);
  }

  async capturePane(name: string): Promise<string> {
    this.failures.check('capturePane', name);
    if (!this.sessions.has(name)) throw new WorkSessionError(ExitCode.GATEWAY_FAILED, `no tmux session ${name}`);
    return this.panes.get(name) ?? '';
  }

  async attach(name: string): Promise<void> {
    this.calls.push({ op: 'attach', target: name });
    this.failures.check('attach', name);
  }
}

export class FakeSandboxGateway implements SandboxGateway {
  readonly sandboxes = new Set<string>();
  /** Files by sandbox name, then path. */
  readonly files = new Map<string, Map<string, string>>();
  readonly calls: FakeCall[] = [];
  readonly failures = new FailureTable();

  constructor(existing: string[] = []) {
    for (const name of existing) this.sandboxes.add(name);
  }

  putFile(name: string, path: string, content: string): void {
    const files = this.files.get(name) ?? new Map<string, string>();
    files.set(path, content);
    this.files.set(name, files);
  }

  async sandboxExists(name: string): Promise<boolean> {
    this.calls.push({ op: 'sandboxExists', target: name });
    this.failures.check('sandboxExists', name);
    return this.sandboxes.has(name);
  }

  async deleteSandbox(name: string): Promise<void> {
    this.calls.push({ op: 'deleteSandbox', target: name });
    this.failures.check('deleteSandbox', name);
    this.sandboxes.delete(name);
  }

  async readFile(name: string, path: string): Promise<string> {
    this.calls.push({ op: 'readFile', target: name });
    this.failures.check('readFile', name);
    const content = this.files.get(name)?.get(path);
    if (content === undefined) {
      throw new WorkSessionError(ExitCode.GATEWAY_FAILED, `cat: ${path}: No such file or directory`);
    }
    return content;
  }
}

export class FakeVcsGateway implements VcsGateway {
  readonly repoRoot: string;
  readonly branches = new Set<string>();
  readonly worktrees = new Map<string, string>();
  readonly calls: FakeCall[] = [];
  readonly failures = new FailureTable();
  current: string;

  constructor(repoRoot: string, options: { branches?: string[]; current?: string; worktrees?: Record<string, string> } = {}) {
    this.repoRoot = resolve(repoRoot);
    this.current = options.current ?? 'main';
    this.branches.add(this.current);
    for (const branch of options.branches ?? []) this.branches.add(branch);
    for (const [path, branch] of Object.entries(options.worktrees ?? {})) {
      this.worktrees.set(resolve(path), branch);
    }
  }

  async branchExists(name: string): Promise<boolean> {
    this.failures.check('branchExists', name);
    return this.branches.has(name);
  }

  async createBranch(name: string): Promise<void> {
    this.calls.push({ op: 'createBranch', target: name });
    this.failures.check('createBranch', name);
    this.branches.add(name);
  }

  async createWorktree(path: string, branch: string): Promise<void> {
    this.calls.push({ op: 'createWorktree', target: path });
    this.failures.check('createWorktree', path);
    this.worktrees.set(resolve(path), branch);
  }

  async removeWorktree(path: string): Promise<void> {
    this.calls.push({ op: 'removeWorktree', target: path });
    this.failures.check('removeWorktree', path);
    this.worktrees.delete(resolve(path));
  }

  async listWorktrees(): Promise<WorktreeInfo[]> {
    return [...this.worktrees].map(([path, branch]) => ({ path, branch, head: '' }));
  }

  async worktreeExists(path: string): Promise<boolean> {
    this.failures.check('worktreeExists', path);
    return this.worktrees.has(resolve(path));
  }

  async listIssueBranches(): Promise<string[]> {
    this.failures.check('listIssueBranches', this.repoRoot);
    return [...this.branches].filter((b) => b.startsWith('issue-')).sort();
  }

  async currentBranch(): Promise<string> {
    return this.current;
  }

  async deleteBranch(name: string, force = false): Promise<void> {
    this.calls.push({ op: force ? 'forceDeleteBranch' : 'deleteBranch', target: name });
    if (name === this.current) {
      throw new WorkSessionError(ExitCode.BRANCH_PROTECTED, `cannot delete current branch: ${name}`);
    }
    this.failures.check('deleteBranch', name);
    this.branches.delete(name);
  }
}

/** Fake gateway set; repositories without a registered fake cannot be opened. */
export function createFakeGateways(options: {
  terminal?: FakeTerminalGateway;
  sandbox?: FakeSandboxGateway;
  repositories?: FakeVcsGateway[];
} = {}): Gateways & { terminal: FakeTerminalGateway; sandbox: FakeSandboxGateway } {
  const repositories = new Map((options.repositories ?? []).map((vcs) => [vcs.repoRoot, vcs]));
  return {
    terminal: options.terminal ?? new FakeTerminalGateway(),
    sandbox: options.sandbox ?? new FakeSandboxGateway(),
    vcsFor: (repoRoot: string) => (repoRoot ? repositories.get(resolve(repoRoot)) ?? null : null),
  };
}
