/**
 * Terminal table rendering of confusion matrices with chalk + cli-table3.
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import type { ConfusionMatrix } from '../matrix/confusion-matrix.js';

export interface RendererOptions {
  /** Drop labels whose row and column are both all zero. Defaults to true. */
  hideEmpty?: boolean;
  /** Header of the corner cell. */
  cornerLabel?: string;
}

/**
 * Render a confusion matrix as a labelled table. Rows are predicted labels,
 * columns actual labels; the diagonal is bold.
 */
export function renderConfusionMatrix(cm: ConfusionMatrix, opts?: RendererOptions): string {
  const hideEmpty = opts?.hideEmpty ?? true;
  const visible = cm.classLabels
    .map((label, i) => ({ label, i }))
    .filter(({ i }) => !hideEmpty || !isEmptyLabel(cm, i));

  const header: string[] = [chalk.bold(opts?.cornerLabel ?? 'Predicted \\ Actual')];
  for (const { label } of visible) header.push(chalk.bold(label));

  const table = new Table({
    head: header,
    style: { head: [], border: [] },
  });

  for (const row of visible) {
    const cells: string[] = [chalk.bold(row.label)];
    for (const col of visible) {
      const count = cell(cm, row.i, col.i);
      cells.push(row.i === col.i ? chalk.bold(String(count)) : String(count));
    }
    table.push(cells);
  }

  return `${cm.title}\n${table.toString()}`;
}

function cell(cm: ConfusionMatrix, row: number, col: number): number {
  return cm.matrix[row]?.[col] ?? 0;
}

function isEmptyLabel(cm: ConfusionMatrix, index: number): boolean {
  return cm.classLabels.every((_, j) => cell(cm, index, j) === 0 && cell(cm, j, index) === 0);
}
