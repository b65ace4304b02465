/**
 * Shared CLI middleware for resolving output format from --human/--json/--quiet flags.
 *
 * Precedence: explicit flag, then the configured default, then TTY detection
 * (a terminal gets human output, a pipe gets JSON).
 */

import { WorkSessionError } from '../../core/errors.js';
import type { OutputFormat } from '../../types/config.js';
import { ExitCode } from '../../types/exit-codes.js';

/** Where the resolved format came from. */
export type FormatSource = 'flag' | 'config' | 'tty' | 'default';

export interface FlagResolution {
  format: OutputFormat;
  source: FormatSource;
  quiet: boolean;
}

/**
 * Resolve output format from Commander.js option values.
 */
export function resolveFormat(
  opts: Record<string, unknown>,
  defaults: { configDefault?: OutputFormat; isTTY?: boolean } = {},
): FlagResolution {
  const json = opts['json'] === true;
  const human = opts['human'] === true;
  const quiet = opts['quiet'] === true;

  if (json && human) {
    throw new WorkSessionError(ExitCode.INVALID_INPUT, '--json and --human cannot be combined');
  }
  if (json) return { format: 'json', source: 'flag', quiet };
  if (human) return { format: 'human', source: 'flag', quiet };
  if (defaults.configDefault) return { format: defaults.configDefault, source: 'config', quiet };
  if (defaults.isTTY !== undefined) {
    return { format: defaults.isTTY ? 'human' : 'json', source: 'tty', quiet };
  }
  return { format: 'json', source: 'default', quiet };
}
