/**
 * Time-bounded external command execution.
 *
 * Every gateway shells out through runCommand so each call is logged with
 * its arguments, duration and exit status.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { WorkSessionError, errorMessage } from '../errors.js';
import { getLogger } from '../logger.js';
import { ExitCode } from '../../types/exit-codes.js';

const execFileAsync = promisify(execFile);

/** Output of a command that ran to completion (any exit status). */
export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface RunOptions {
  cwd?: string;
  timeoutMs: number;
}

/** Signature shared by runCommand and the test doubles that replace it. */
export type CommandRunner = (binary: string, args: string[], options: RunOptions) => Promise<CommandResult>;

function readField(err: unknown, key: string): unknown {
  if (typeof err !== 'object' || err === null) return undefined;
  return Reflect.get(err, key);
}

function asText(value: unknown): string {
  if (typeof value === 'string') return value;
  if (Buffer.isBuffer(value)) return value.toString('utf8');
  return '';
}

/**
 * Run an external command. A non-zero exit status is returned, not thrown;
 * a missing binary, a spawn failure or a timeout is thrown.
 */
export async function runCommand(
  binary: string,
  args: string[],
  options: RunOptions,
): Promise<CommandResult> {
  const log = getLogger('gateway');
  const started = Date.now();
  const command = [binary, ...args].join(' ');

  try {
    const { stdout, stderr } = await execFileAsync(binary, args, {
      cwd: options.cwd,
      timeout: options.timeoutMs,
      encoding: 'utf8',
      maxBuffer: 16 * 1024 * 1024,
    });
    log.debug({ binary, args, durationMs: Date.now() - started, exitCode: 0 }, 'command finished');
    return { stdout, stderr, exitCode: 0 };
  } catch (err) {
    const durationMs = Date.now() - started;

    if (readField(err, 'killed') === true) {
      log.warn({ binary, args, durationMs, timeoutMs: options.timeoutMs }, 'command timed out');
      throw new WorkSessionError(
        ExitCode.COMMAND_TIMEOUT,
        `Command timed out after ${options.timeoutMs}ms: ${command}`,
        { cause: err },
      );
    }

    const code = readField(err, 'code');
    if (typeof code === 'number') {
      const result: CommandResult = {
        stdout: asText(readField(err, 'stdout')),
        stderr: asText(readField(err, 'stderr')),
        exitCode: code,
      };
      log.debug({ binary, args, durationMs, exitCode: code }, 'command exited with non-zero status');
      return result;
    }

    if (code === 'ENOENT') {
      log.warn({ binary, args }, 'command not found');
      throw new WorkSessionError(
        ExitCode.DEPENDENCY_ERROR,
        `Command not found: ${binary}`,
        { fix: `Install ${binary} or point the matching gateways.*Binary setting at it`, cause: err },
      );
    }

    log.warn({ binary, args, durationMs, err: errorMessage(err) }, 'command failed to run');
    throw new WorkSessionError(
      ExitCode.GATEWAY_FAILED,
      `Failed to run: ${command}`,
      { cause: err },
    );
  }
}

/**
 * Build a GATEWAY_FAILED error for a command that exited non-zero.
 */
export function commandFailed(operation: string, result: CommandResult): WorkSessionError {
  const detail = result.stderr.trim() || result.stdout.trim() || `exit status ${result.exitCode}`;
  return new WorkSessionError(ExitCode.GATEWAY_FAILED, `${operation}: ${detail}`);
}
