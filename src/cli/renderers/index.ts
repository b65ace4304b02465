/**
 * Central output dispatch for CLI commands.
 *
 * Commands call:
 *   cliOutput(data, { command: 'list', message, operation })
 *
 * The resolved format picks either the JSON envelope (formatSuccess) or the
 * command's human renderer.
 */

import { toWorkSessionError, type WorkSessionError } from '../../core/errors.js';
import { formatError, formatSuccess } from '../../core/output.js';
import { getFormatContext } from '../format-context.js';
import type { CommandName, RenderPayloads } from '../payloads.js';
import {
  renderAttach,
  renderClean,
  renderConfigGet,
  renderConfigSet,
  renderList,
  renderLog,
  renderStart,
  renderStatus,
  renderStop,
  renderVersion,
} from './sessions.js';

// ---------------------------------------------------------------------------
// Renderer registry: maps command name to human renderer function
// ---------------------------------------------------------------------------

type HumanRenderers = {
  [C in CommandName]: (data: RenderPayloads[C], quiet: boolean) => string;
};

const renderers: HumanRenderers = {
  start: renderStart,
  attach: renderAttach,
  log: renderLog,
  stop: renderStop,
  list: renderList,
  status: renderStatus,
  clean: renderClean,
  'config-get': renderConfigGet,
  'config-set': renderConfigSet,
  version: renderVersion,
};

export interface CliOutputOptions<C extends CommandName> {
  /** Command name (picks the human renderer). */
  command: C;
  /** Optional success message for the JSON envelope. */
  message?: string;
  /** Operation name for _meta; defaults to the command name. */
  operation?: string;
}

/** Render `data` in the resolved format, without printing it. */
export function renderOutput<C extends CommandName>(data: RenderPayloads[C], opts: CliOutputOptions<C>): string {
  const ctx = getFormatContext();
  if (ctx.format === 'human') {
    const render: (data: RenderPayloads[C], quiet: boolean) => string = renderers[opts.command];
    return render(data, ctx.quiet);
  }
  return formatSuccess(data, opts.message, opts.operation ?? opts.command);
}

/**
 * Output data to stdout in the resolved format (JSON or human-readable).
 */
export function cliOutput<C extends CommandName>(data: RenderPayloads[C], opts: CliOutputOptions<C>): void {
  const text = renderOutput(data, opts);
  if (text) {
    console.log(text);
  }
}

/**
 * Print an error in the resolved format to stderr.
 * JSON: the error envelope. Human: `Error: message` plus the fix hint.
 */
export function cliError(error: WorkSessionError, operation?: string): void {
  const ctx = getFormatContext();
  if (ctx.format === 'human') {
    console.error(`Error: ${error.message}`);
    if (error.fix && !ctx.quiet) {
      console.error(`  Fix: ${error.fix}`);
    }
    return;
  }
  console.error(formatError(error, operation));
}

/**
 * Report a command failure and exit with its code.
 */
export function exitWithError(err: unknown, operation?: string): never {
  const error = toWorkSessionError(err);
  cliError(error, operation);
  process.exit(error.code);
}
