/**
 * Table Formatting Utility
 *
 * Box-drawn tables for CLI listings such as `errlens kinds`.
 */

import chalk from 'chalk';

export type Alignment = 'left' | 'right';

export interface Column {
  /** Header text */
  header: string;
  /** Data key to look up in rows */
  key: string;
  /** Default: left */
  align?: Alignment;
}

export type Row = Record<string, string | number | null | undefined>;

// eslint-disable-next-line no-control-regex
const ANSI_PATTERN = /\x1B\[[0-9;]*m/g;

/** Printable width, ignoring ANSI styling */
function visibleLength(text: string): number {
  return text.replace(ANSI_PATTERN, '').length;
}

function pad(text: string, width: number, align: Alignment): string {
  const fill = ' '.repeat(Math.max(0, width - visibleLength(text)));
  return align === 'right' ? fill + text : text + fill;
}

function cell(row: Row, key: string): string {
  const value = row[key];
  return value == null ? '' : String(value);
}

/**
 * Format rows as a table:
 *
 * ```
 * ┌───┬──────────────────┐
 * │ # │ Kind             │
 * ├───┼──────────────────┤
 * │ 1 │ ResourceNotFound │
 * └───┴──────────────────┘
 * ```
 */
export function formatTable(columns: Column[], rows: Row[]): string {
  if (columns.length === 0) return '';

  const widths = columns.map((col) =>
    Math.max(visibleLength(col.header), ...rows.map((row) => visibleLength(cell(row, col.key))))
  );

  const rule = (left: string, join: string, right: string): string =>
    left + widths.map((w) => '─'.repeat(w + 2)).join(join) + right;

  const line = (values: string[], style: (s: string) => string = (s) => s): string =>
    '│' +
    columns
      .map((col, i) => ` ${style(pad(values[i] ?? '', widths[i] ?? 0, col.align ?? 'left'))} `)
      .join('│') +
    '│';

  return [
    rule('┌', '┬', '┐'),
    line(columns.map((col) => col.header), chalk.bold),
    rule('├', '┼', '┤'),
    ...rows.map((row) => line(columns.map((col) => cell(row, col.key)))),
    rule('└', '┴', '┘'),
  ].join('\n');
}
