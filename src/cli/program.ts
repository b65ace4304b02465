/**
 * Commander program for the worksession CLI.
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { errorMessage } from '../core/errors.js';
import { getLogger, initLogger } from '../core/logger.js';
import { getWorksessionHome } from '../core/paths.js';
import { registerAttachCommand } from './commands/attach.js';
import { registerCleanCommand } from './commands/clean.js';
import { registerConfigCommand } from './commands/config.js';
import { registerListCommand } from './commands/list.js';
import { registerLogCommand } from './commands/log.js';
import { registerStartCommand } from './commands/start.js';
import { registerStatusCommand } from './commands/status.js';
import { registerStopCommand } from './commands/stop.js';
import { getCliContext } from './context.js';
import { setFormatContext } from './format-context.js';
import { resolveFormat } from './middleware/output-format.js';
import { cliOutput, exitWithError } from './renderers/index.js';

/** Read version from package.json (single source of truth). */
export function getPackageVersion(): string {
  try {
    // src/cli/program.ts and dist/cli/program.js both sit two levels below the root
    const pkgPath = fileURLToPath(new URL('../../package.json', import.meta.url));
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch (err) {
    getLogger('cli').debug({ err: errorMessage(err) }, 'package.json not readable');
  }
  return '0.0.0';
}

/** Commands that must run even when the configuration is invalid. */
const CONFIG_INDEPENDENT = new Set(['config', 'version']);

export function createProgram(): Command {
  const version = getPackageVersion();
  const program = new Command();

  program
    .name('worksession')
    .description('Per-work-item git worktrees, terminal sessions and sandboxes')
    .version(version)
    .option('--json', 'Output in JSON format')
    .option('--human', 'Output in human-readable format')
    .option('--quiet', 'Suppress non-essential output for scripting');

  program
    .command('version')
    .description('Display worksession version')
    .action(() => {
      cliOutput({ version }, { command: 'version' });
    });

  registerStartCommand(program);
  registerAttachCommand(program);
  registerLogCommand(program);
  registerStopCommand(program);
  registerListCommand(program);
  registerStatusCommand(program);
  registerCleanCommand(program);
  registerConfigCommand(program);

  // Resolve the output format, load configuration and start the file logger
  // before any command runs.
  program.hook('preAction', async (thisCommand, actionCommand) => {
    const opts = thisCommand.optsWithGlobals();
    try {
      setFormatContext(resolveFormat(opts, { isTTY: process.stdout.isTTY === true }));
    } catch (err) {
      exitWithError(err);
    }

    const topLevel = actionCommand.parent === thisCommand ? actionCommand.name() : (actionCommand.parent?.name() ?? '');
    try {
      const context = await getCliContext();
      setFormatContext(resolveFormat(opts, {
        configDefault: context.config.output.defaultFormat,
        isTTY: process.stdout.isTTY === true,
      }));
      initLogger(getWorksessionHome(), context.config.logging);
    } catch (err) {
      if (!CONFIG_INDEPENDENT.has(topLevel)) exitWithError(err);
      getLogger('cli').warn({ err: errorMessage(err) }, 'configuration not loaded');
    }
  });

  return program;
}
