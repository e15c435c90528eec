/**
 * Fixed-width text tables for the dashboard panels
 */

import chalk from 'chalk';
import { fitToWidth } from '../utils/index.js';

export interface TableColumn {
  header: string;
  /** Display columns; longer cells are truncated with an ellipsis */
  width: number;
}

const GAP = '  ';

function renderRow(columns: readonly TableColumn[], cells: readonly string[]): string {
  return columns
    .map((column, i) => fitToWidth(cells[i] ?? '', column.width))
    .join(GAP)
    .trimEnd();
}

/** Header, rule and one line per row */
export function renderTable(columns: readonly TableColumn[], rows: readonly (readonly string[])[]): string[] {
  return [
    chalk.bold(renderRow(columns, columns.map((column) => column.header))),
    chalk.gray(columns.map((column) => '─'.repeat(column.width)).join(GAP)),
    ...rows.map((row) => renderRow(columns, row)),
  ];
}
