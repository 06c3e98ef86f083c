/**
 * Extract Command
 *
 * Pulls the ASN.1 definitions out of a specification text file:
 *   asn1x extract spec.txt            - Write spec.asn
 *   asn1x spec.txt                    - Same (extract is the default command)
 *   asn1x extract spec.txt -o out.asn - Explicit output path
 *   asn1x extract spec.txt --split    - One file per region in ./asn1_sections
 *   asn1x extract spec.txt --split-dir blocks - One file per region in ./blocks
 */

import { resolve } from 'node:path';
import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { loadConfig } from '../../config/index.js';
import { extractFile, splitFile } from '../../extractor/index.js';
import { ExtractArgsSchema, ExtractOptionsSchema, parseInput } from '../validation.js';

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? '' : 's'}`;
}

/**
 * Create the extract command
 */
export function createExtractCommand(getContext: () => CommandContext): Command {
  return new Command('extract')
    .description('Extract -- ASN1START / -- ASN1STOP regions into an .asn file')
    .argument('<input>', 'Specification text file')
    .option('-o, --output <path>', 'Output file (default: input path cut at its first "." + .asn)')
    .option('--naming <strategy>', 'Output naming: first-dot or last-dot')
    .option('--split', 'Write each region to its own file, named after the line above it')
    .option('--split-dir <dir>', 'Directory for --split files (implies --split)')
    .action((rawInput: string, rawOptions: unknown) => {
      const ctx = getContext();
      const { input } = parseInput(ExtractArgsSchema, { input: rawInput });
      const options = parseInput(ExtractOptionsSchema, rawOptions);
      const config = loadConfig(ctx.options.config);

      ctx.log(resolve(input));

      if (options.split === true || options.splitDir !== undefined) {
        const summary = splitFile({
          inputPath: input,
          outDir: options.splitDir ?? config.split.out_dir,
          extension: config.split.extension,
          encoding: config.input.encoding,
          logger: ctx,
        });

        if (ctx.options.json) {
          console.log(JSON.stringify(summary, null, 2));
          return;
        }

        ctx.log(
          `${chalk.green('✓')} Extracted ${plural(summary.files.length, 'block')} into ${chalk.cyan(summary.outDir)}`
        );
        return;
      }

      const summary = extractFile({
        inputPath: input,
        outputPath: options.output,
        naming: options.naming ?? config.output.naming,
        extension: config.output.extension,
        logger: ctx,
      });

      if (ctx.options.json) {
        console.log(JSON.stringify(summary, null, 2));
        return;
      }

      if (summary.regionCount === 0) {
        ctx.log(chalk.yellow(`No -- ASN1START marker found; wrote empty ${summary.outputPath}`));
        return;
      }

      ctx.log(
        `${chalk.green('✓')} Wrote ${plural(summary.linesWritten, 'line')} from ` +
          `${plural(summary.regionCount, 'region')} to ${chalk.cyan(summary.outputPath)}`
      );
    });
}
