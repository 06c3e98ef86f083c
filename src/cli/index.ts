/**
 * asn1x CLI Entry Point
 *
 * Sets up Commander.js with global options and registers all subcommands.
 * `extract` is the default command, so `asn1x spec.txt` extracts spec.txt.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { GlobalOptions, CommandContext } from './types.js';
import { createExtractCommand } from './commands/extract.js';
import { createRegionsCommand } from './commands/regions.js';
import { createConfigCommand } from './commands/config.js';
import { handleError, createGlobalErrorHandler } from '../errors/index.js';

// Version injected at build time via tsup env
const VERSION = process.env.CLI_VERSION ?? '0.0.0';

const program = new Command();

program
  .name('asn1x')
  .description('Extract ASN.1 definitions between -- ASN1START and -- ASN1STOP markers')
  .version(VERSION, '-v, --version', 'Display version number')

  // Global options - available to ALL subcommands
  .option('--verbose', 'Enable verbose output for debugging', false)
  .option('--json', 'Output results as JSON', false)
  .option('-c, --config <path>', 'Config file (default: $ASN1X_CONFIG or ~/.asn1x/config.toml)')

  .addHelpText('after', `
${chalk.dim('Examples:')}
  ${chalk.cyan('asn1x 36331-j00.txt')}                 Write 36331-j00.asn
  ${chalk.cyan('asn1x extract spec.txt -o rrc.asn')}   Choose the output file
  ${chalk.cyan('asn1x extract spec.txt --split out')}  One file per region in ./out
  ${chalk.cyan('asn1x regions spec.txt')}              List regions without writing
  ${chalk.cyan('asn1x config list')}                   Show configuration
`);

/**
 * Create a command context with logging utilities
 * This is passed to all command handlers
 */
function createContext(options: GlobalOptions): CommandContext {
  return {
    options,
    log: (message: string) => {
      if (!options.json) {
        console.log(message);
      }
    },
    debug: (message: string) => {
      if (options.verbose && !options.json) {
        console.log(chalk.dim(`[debug] ${message}`));
      }
    },
    warn: (message: string) => {
      if (!options.json) {
        console.warn(chalk.yellow(`Warning: ${message}`));
      }
    },
    error: (message: string) => {
      if (options.json) {
        console.error(JSON.stringify({ error: message }));
      } else {
        console.error(chalk.red(`Error: ${message}`));
      }
    },
  };
}

/**
 * Get global options from the program
 * Commander stores options on the Command object after parsing
 */
function getGlobalOptions(): GlobalOptions {
  const opts = program.opts<Partial<GlobalOptions>>();
  return {
    verbose: opts.verbose ?? false,
    json: opts.json ?? false,
    config: opts.config,
  };
}

program.addCommand(createExtractCommand(() => createContext(getGlobalOptions())), {
  isDefault: true,
});
program.addCommand(createRegionsCommand(() => createContext(getGlobalOptions())));
program.addCommand(createConfigCommand(() => createContext(getGlobalOptions())));

async function main(): Promise<void> {
  const getErrorOptions = () => {
    const opts = getGlobalOptions();
    return { verbose: opts.verbose, json: opts.json };
  };

  // Catch errors that escape all try/catch blocks
  const globalHandler = createGlobalErrorHandler(getErrorOptions());
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getErrorOptions());
  }
}

void main();
