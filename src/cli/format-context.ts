/**
 * CLI output format resolution context.
 *
 * Singleton that holds the resolved output format for the current CLI invocation.
 * Set once in the Commander.js preAction hook; read by cliOutput() and renderers.
 */

import type { FlagResolution } from './middleware/output-format.js';

/**
 * Current resolved format for this CLI invocation.
 * Defaults to JSON until resolved by the preAction hook.
 */
let currentResolution: FlagResolution = {
  format: 'json',
  source: 'default',
  quiet: false,
};

export function setFormatContext(resolution: FlagResolution): void {
  currentResolution = resolution;
}

export function getFormatContext(): FlagResolution {
  return currentResolution;
}

/**
 * Check if quiet mode is enabled (suppress non-essential output).
 */
export function isQuiet(): boolean {
  return currentResolution.quiet;
}
