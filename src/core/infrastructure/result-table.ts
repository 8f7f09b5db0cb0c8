// src/core/infrastructure/result-table.ts
import type { CutPlan } from '../solvers/rod-solver/types';
import { formatLength } from '../math/rod-math/part-grouping';

export const RESULT_TABLE_HEAD = [
  'Rod #',
  'Used length',
  'Leftover',
  'Parts (count × effective length)',
];

export interface ResultTable {
  head: string[];
  body: string[][];
}

export function buildResultTable(plan: CutPlan): ResultTable {
  return {
    head: [...RESULT_TABLE_HEAD],
    body: plan.rows.map((row) => [
      String(row.rodId),
      formatLength(row.usedLength),
      formatLength(row.leftover),
      row.partsLabel,
    ]),
  };
}

/**
 * Plain-text rendering for the terminal. Columns are padded to their widest cell.
 */
export function renderTextTable(table: ResultTable): string {
  const widths = table.head.map((title, column) =>
    Math.max(title.length, ...table.body.map((row) => row[column].length))
  );
  const line = (cells: string[]) =>
    cells.map((cell, column) => cell.padEnd(widths[column])).join(' | ').trimEnd();

  return [
    line(table.head),
    widths.map((width) => '-'.repeat(width)).join('-+-'),
    ...table.body.map(line),
  ].join('\n');
}

export function formatUtilization(plan: CutPlan): string {
  return `${(plan.statistics.utilization * 100).toFixed(1)}%`;
}
