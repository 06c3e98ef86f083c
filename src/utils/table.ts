/**
 * Table Formatting Utility
 *
 * Box-drawn tables for CLI output (used by `asn1x regions`).
 */

import chalk from 'chalk';

export type Alignment = 'left' | 'right';

export interface Column {
  /** Header text */
  header: string;
  /** Data key to look up in rows */
  key: string;
  /** Alignment (default: left) */
  align?: Alignment;
}

export type Row = Record<string, string | number | null | undefined>;

/**
 * Strip ANSI escape codes (for width calculation)
 */
function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1B\[[0-9;]*m/g, '');
}

function cellText(row: Row, key: string): string {
  const value = row[key];
  return value == null ? '' : String(value);
}

function pad(str: string, width: number, align: Alignment): string {
  const fill = ' '.repeat(Math.max(0, width - stripAnsi(str).length));
  return align === 'right' ? fill + str : str + fill;
}

/**
 * Format rows as a table.
 *
 * @example
 * ```ts
 * formatTable([{ header: 'Line', key: 'line', align: 'right' }], [{ line: 12 }]);
 * // ┌──────┐
 * // │ Line │
 * // ├──────┤
 * // │   12 │
 * // └──────┘
 * ```
 */
export function formatTable(columns: Column[], rows: Row[]): string {
  if (columns.length === 0) return '';

  const widths = columns.map((col) =>
    Math.max(col.header.length, ...rows.map((row) => stripAnsi(cellText(row, col.key)).length))
  );

  const rule = (left: string, middle: string, right: string): string =>
    left + widths.map((w) => '─'.repeat(w + 2)).join(middle) + right;

  const line = (cells: string[]): string =>
    '│' + cells.map((cell) => ` ${cell} `).join('│') + '│';

  const header = line(columns.map((col, i) => chalk.bold(pad(col.header, widths[i] ?? 0, 'left'))));
  const body = rows.map((row) =>
    line(columns.map((col, i) => pad(cellText(row, col.key), widths[i] ?? 0, col.align ?? 'left')))
  );

  return [rule('┌', '┬', '┐'), header, rule('├', '┼', '┤'), ...body, rule('└', '┴', '┘')].join('\n');
}
