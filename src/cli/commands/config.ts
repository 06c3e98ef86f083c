/**
 * Config Command
 *
 * Read-only view of the asn1x configuration:
 *   asn1x config list        - Show all configuration
 *   asn1x config get <key>   - Get a specific value
 *   asn1x config path        - Show config file location
 *   asn1x config template    - Print a commented config.toml
 *
 * Config errors propagate to the global handler (exit code 2).
 */

import { Command } from 'commander';
import chalk from 'chalk';
import {
  CONFIG_TEMPLATE,
  getConfigValue,
  listConfig,
  loadConfig,
  resolveConfigPath,
} from '../../config/index.js';
import { CLIError } from '../../errors/index.js';
import type { CommandContext } from '../types.js';

/**
 * Format a value for display
 */
function formatValue(value: unknown): string {
  if (typeof value === 'string') return value;
  return JSON.stringify(value);
}

/**
 * Create the config command with all subcommands
 */
export function createConfigCommand(getContext: () => CommandContext): Command {
  const configCmd = new Command('config')
    .description('Show configuration settings');

  // asn1x config get <key>
  configCmd
    .command('get <key>')
    .description('Get a configuration value (e.g., asn1x config get output.naming)')
    .action((key: string) => {
      const ctx = getContext();
      const value = getConfigValue(loadConfig(ctx.options.config), key);

      if (value === undefined) {
        throw new CLIError(
          `Unknown config key: ${key}`,
          'Run: asn1x config list  to see all available keys'
        );
      }

      if (ctx.options.json) {
        console.log(JSON.stringify({ key, value }));
      } else {
        ctx.log(formatValue(value));
      }
    });

  // asn1x config list
  configCmd
    .command('list')
    .alias('ls')
    .description('List all configuration values')
    .action(() => {
      const ctx = getContext();
      const configPath = resolveConfigPath(ctx.options.config).path;
      const entries = listConfig(loadConfig(ctx.options.config));

      if (ctx.options.json) {
        console.log(JSON.stringify(Object.fromEntries(entries), null, 2));
        return;
      }

      ctx.log(chalk.bold('Configuration:'));
      ctx.log('');

      // Blank line between top-level groups
      let currentGroup = '';
      for (const [key, value] of entries) {
        const group = key.split('.')[0] ?? '';
        if (group !== currentGroup) {
          if (currentGroup !== '') ctx.log('');
          currentGroup = group;
        }
        ctx.log(`  ${chalk.cyan(key)} = ${chalk.yellow(formatValue(value))}`);
      }

      ctx.log('');
      ctx.log(chalk.dim(`Config file: ${configPath}`));
    });

  // asn1x config path
  configCmd
    .command('path')
    .description('Show the config file location')
    .action(() => {
      const ctx = getContext();
      const configPath = resolveConfigPath(ctx.options.config).path;

      if (ctx.options.json) {
        console.log(JSON.stringify({ path: configPath }));
      } else {
        ctx.log(configPath);
      }
    });

  // asn1x config template
  configCmd
    .command('template')
    .description('Print a commented config.toml with the default values')
    .action(() => {
      process.stdout.write(CONFIG_TEMPLATE);
    });

  return configCmd;
}
