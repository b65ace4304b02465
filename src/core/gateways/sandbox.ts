/**
 * Sandbox runtime gateway, driving the `sandbox` CLI.
 */

import { commandFailed, runCommand, type CommandRunner } from './exec.js';
import type { SandboxGateway } from './types.js';

export interface SandboxCliGatewayOptions {
  binary?: string;
  timeoutMs?: number;
  run?: CommandRunner;
}

/**
 * True when `sandbox list` output names the sandbox as a whole
 * whitespace-separated token on some line.
 */
export function listIncludesSandbox(output: string, name: string): boolean {
  return output
    .split('\n')
    .some((line) => line.trim().split(/\s+/).includes(name));
}

export class SandboxCliGateway implements SandboxGateway {
  private readonly binary: string;
  private readonly timeoutMs: number;
  private readonly run: CommandRunner;

  constructor(options: SandboxCliGatewayOptions = {}) {
    this.binary = options.binary ?? 'sandbox';
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.run = options.run ?? runCommand;
  }

  async sandboxExists(name: string): Promise<boolean> {
    const result = await this.run(this.binary, ['list'], { timeoutMs: this.timeoutMs });
    if (result.exitCode !== 0) {
      throw commandFailed('failed to list sandboxes', result);
    }
    return listIncludesSandbox(result.stdout, name);
  }

  async deleteSandbox(name: string): Promise<void> {
    const result = await this.run(this.binary, ['delete', name, '-y'], { timeoutMs: this.timeoutMs });
    if (result.exitCode !== 0) {
      throw commandFailed(`failed to delete sandbox ${name}`, result);
    }
  }

  async readFile(name: string, path: string, options: { timeoutMs?: number } = {}): Promise<string> {
    const result = await this.run(this.binary, ['--name', name, 'cat', path], {
      timeoutMs: options.timeoutMs ?? this.timeoutMs,
    });
    if (result.exitCode !== 0) {
      throw commandFailed(`failed to read ${path} from sandbox ${name}`, result);
    }
    return result.stdout;
  }
}
