/**
 * Box-drawn table of resolved values.
 *
 * @packageDocumentation
 */

import type { ResolvedOptions } from '../resolution/index.js';

export interface TableOptions {
  /** Draw borders with box-drawing characters instead of ASCII. */
  readonly unicode?: boolean;
}

interface BorderChars {
  readonly horizontal: string;
  readonly vertical: string;
  readonly top: readonly [string, string, string];
  readonly middle: readonly [string, string, string];
  readonly bottom: readonly [string, string, string];
}

const UNICODE_BORDERS: BorderChars = {
  horizontal: '─',
  vertical: '│',
  top: ['┌', '┬', '┐'],
  middle: ['├', '┼', '┤'],
  bottom: ['└', '┴', '┘'],
};

const ASCII_BORDERS: BorderChars = {
  horizontal: '-',
  vertical: '|',
  top: ['+', '+', '+'],
  middle: ['+', '+', '+'],
  bottom: ['+', '+', '+'],
};

const HEADER = ['Key', 'Type', 'Value', 'Source'] as const;

function ruleLine(
  widths: readonly number[],
  border: BorderChars,
  [left, cross, right]: readonly [string, string, string]
): string {
  return left + widths.map((width) => border.horizontal.repeat(width + 2)).join(cross) + right;
}

function rowLine(cells: readonly string[], widths: readonly number[], border: BorderChars): string {
  const padded = cells.map((cell, index) => ` ${cell.padEnd(widths[index] ?? 0)} `);
  return border.vertical + padded.join(border.vertical) + border.vertical;
}

/**
 * Renders resolved values as a table with key, type, printed value and source columns.
 *
 * Undeclared keys are marked with a trailing `*` on their source.
 */
export function renderValueTable(values: ResolvedOptions, options: TableOptions = {}): string {
  const border = options.unicode === true ? UNICODE_BORDERS : ASCII_BORDERS;

  const rows = values
    .detailedEntries()
    .map(([key, entry]) => [
      key,
      entry.value.printType(),
      entry.value.print(),
      entry.declared ? entry.source : `${entry.source}*`,
    ]);

  const widths = HEADER.map((title, column) =>
    Math.max(title.length, ...rows.map((row) => row[column]?.length ?? 0))
  );

  const lines = [
    ruleLine(widths, border, border.top),
    rowLine(HEADER, widths, border),
    ruleLine(widths, border, border.middle),
    ...rows.map((row) => rowLine(row, widths, border)),
    ruleLine(widths, border, border.bottom),
  ];
  return lines.join('\n') + '\n';
}
