import { bold, dim } from '../colors.js';

export interface TableOptions {
  columns: readonly string[];
  rows: readonly (readonly string[])[];
}

const GAP = '  ';

/**
 * Header, rule and rows, indented two spaces. Every column but the last
 * is padded to its widest cell.
 */
export function formatTable({ columns, rows }: TableOptions): string[] {
  const widths = columns.map((column, i) =>
    rows.reduce((widest, row) => Math.max(widest, (row[i] ?? '').length), column.length)
  );
  const last = columns.length - 1;
  const line = (cells: readonly string[]): string =>
    cells.map((cell, i) => (i === last ? cell : cell.padEnd(widths[i]))).join(GAP);

  return [
    GAP + bold(line(columns)),
    GAP + dim(widths.map((w) => '─'.repeat(w)).join(GAP)),
    ...rows.map((row) => GAP + line(row)),
  ];
}
