/**
 * CLI config command - configuration management.
 */

import { Command } from 'commander';
import { getConfigValue, setConfigValue } from '../../core/config.js';
import { findRepositoryRoot } from '../context.js';
import { cliOutput, exitWithError } from '../renderers/index.js';

export function registerConfigCommand(program: Command): void {
  const config = program
    .command('config')
    .description('Configuration management');

  config
    .command('get <key>')
    .description('Get a configuration value and where it came from')
    .action(async (key: string) => {
      try {
        const resolved = await getConfigValue(key, findRepositoryRoot() ?? undefined);
        cliOutput(
          { key, value: resolved.value, source: resolved.source },
          { command: 'config-get', operation: 'config.get' },
        );
      } catch (err) {
        exitWithError(err, 'config.get');
      }
    });

  config
    .command('set <key> <value>')
    .description('Set a configuration value')
    .option('--global', 'Set in global config instead of repository config')
    .action(async (key: string, value: string, opts: { global?: boolean }) => {
      try {
        const result = await setConfigValue(key, value, {
          global: opts.global ?? false,
          repoRoot: findRepositoryRoot() ?? undefined,
        });
        cliOutput(result, { command: 'config-set', operation: 'config.set' });
      } catch (err) {
        exitWithError(err, 'config.set');
      }
    });
}
