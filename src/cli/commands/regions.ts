/**
 * Regions Command
 *
 * Lists the capture regions of a document without writing anything:
 *   asn1x regions spec.txt
 *   asn1x regions spec.txt --json
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { loadConfig } from '../../config/index.js';
import { scanFile } from '../../extractor/index.js';
import { formatTable, type Column } from '../../utils/table.js';
import { ExtractArgsSchema, parseInput } from '../validation.js';

/**
 * Shorten a header for the table
 */
function truncate(text: string, maxLength = 48): string {
  return text.length > maxLength ? `${text.slice(0, maxLength - 3)}...` : text;
}

/**
 * Create the regions command
 */
export function createRegionsCommand(getContext: () => CommandContext): Command {
  return new Command('regions')
    .description('List the ASN1START/ASN1STOP regions of a document')
    .argument('<input>', 'Specification text file')
    .action((rawInput: string) => {
      const ctx = getContext();
      const { input } = parseInput(ExtractArgsSchema, { input: rawInput });
      const config = loadConfig(ctx.options.config);

      const scan = scanFile(input, config.input.encoding);
      ctx.debug(`Scanned ${scan.totalLines} line(s)`);

      if (ctx.options.json) {
        const jsonOutput = {
          count: scan.regions.length,
          totalLines: scan.totalLines,
          regions: scan.regions.map((r) => ({
            header: r.header,
            startLine: r.startLine,
            endLine: r.endLine,
            lineCount: r.lines.length,
            terminated: r.terminated,
          })),
        };
        console.log(JSON.stringify(jsonOutput, null, 2));
        return;
      }

      if (scan.regions.length === 0) {
        ctx.log(chalk.yellow('No ASN.1 regions found.'));
        return;
      }

      const columns: Column[] = [
        { header: '#', key: 'index', align: 'right' },
        { header: 'Header', key: 'header' },
        { header: 'Start', key: 'start', align: 'right' },
        { header: 'Stop', key: 'stop', align: 'right' },
        { header: 'Lines', key: 'lines', align: 'right' },
      ];

      const rows = scan.regions.map((r, i) => ({
        index: i + 1,
        header: r.header === null ? chalk.dim('(none)') : truncate(r.header),
        start: r.startLine,
        stop: r.endLine ?? chalk.yellow('EOF'),
        lines: r.lines.length,
      }));

      ctx.log(formatTable(columns, rows));
      ctx.log('');
      ctx.log(
        chalk.dim(
          `${scan.regions.length} region${scan.regions.length === 1 ? '' : 's'}, ${scan.lines.length} captured line${scan.lines.length === 1 ? '' : 's'}`
        )
      );
    });
}
