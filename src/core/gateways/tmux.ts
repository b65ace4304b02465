/**
 * tmux-backed TerminalGateway.
 */

import { spawn } from 'node:child_process';
import { WorkSessionError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import { commandFailed, runCommand, type CommandResult, type CommandRunner } from './exec.js';
import type { TerminalGateway } from './types.js';

export interface TmuxGatewayOptions {
  binary?: string;
  timeoutMs?: number;
  run?: CommandRunner;
}

export class TmuxGateway implements TerminalGateway {
  private readonly binary: string;
  private readonly timeoutMs: number;
  private readonly run: CommandRunner;

  constructor(options: TmuxGatewayOptions = {}) {
    this.binary = options.binary ?? 'tmux';
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.run = options.run ?? runCommand;
  }

  private tmux(args: string[]): Promise<CommandResult> {
    return this.run(this.binary, args, { timeoutMs: this.timeoutMs });
  }

  private async tmuxOk(args: string[], operation: string): Promise<void> {
    const result = await this.tmux(args);
    if (result.exitCode !== 0) {
      throw commandFailed(operation, result);
    }
  }

  /** Exit status 1 means no such session (or no server); anything else is an error. */
  async sessionExists(name: string): Promise<boolean> {
    const result = await this.tmux(['has-session', '-t', name]);
    if (result.exitCode === 0) return true;
    if (result.exitCode === 1) return false;
    throw commandFailed(`failed to check tmux session ${name}`, result);
  }

  async createSession(name: string, workingDir: string, env: Record<string, string> = {}): Promise<void> {
    await this.tmuxOk(['new-session', '-d', '-s', name, '-c', workingDir], `failed to create tmux session ${name}`);
    for (const [key, value] of Object.entries(env)) {
      await this.tmuxOk(['set-environment', '-t', name, key, value], `failed to set ${key} in tmux session ${name}`);
    }
  }

  async killSession(name: string): Promise<void> {
    await this.tmuxOk(['kill-session', '-t', name], `failed to kill tmux session ${name}`);
  }

  async sendCommand(name: string, commandLine: string): Promise<void> {
    await this.tmuxOk(['send-keys', '-t', name, commandLine, 'Enter'], `failed to send command to tmux session ${name}`);
  }

  async capturePane(name: string): Promise<string> {
    const result = await this.tmux(['capture-pane', '-p', '-t', name]);
    if (result.exitCode !== 0) {
      throw commandFailed(`failed to capture tmux session ${name}`, result);
    }
    return result.stdout;
  }

  /**
   * Attach the current terminal. Inside tmux this switches the client instead.
   */
  attach(name: string): Promise<void> {
    const args = process.env['TMUX'] ? ['switch-client', '-t', name] : ['attach-session', '-t', name];
    return new Promise((resolvePromise, reject) => {
      const child = spawn(this.binary, args, { stdio: 'inherit' });
      child.on('error', (err) => {
        reject(new WorkSessionError(ExitCode.GATEWAY_FAILED, `failed to attach to tmux session ${name}`, { cause: err }));
      });
      child.on('close', (code) => {
        if (code === 0) {
          resolvePromise();
        } else {
          reject(new WorkSessionError(ExitCode.GATEWAY_FAILED, `tmux exited with status ${code ?? 'unknown'} while attaching to ${name}`));
        }
      });
    });
  }
}
