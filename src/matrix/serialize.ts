/**
 * Plain-text form of a confusion matrix, as stored in `ConfusionMatrix.txt`.
 *
 * Each row is written on its own line; every count is followed by a tab.
 * There is no header, so files from earlier runs stay readable by the same
 * downstream tools when new matrices are appended.
 */

import { appendFileSync } from 'node:fs';
import { MatrixWriteError } from '../errors.js';
import type { ConfusionMatrix } from './confusion-matrix.js';

export function formatConfusionMatrix(cm: ConfusionMatrix): string {
  return cm.matrix.map((row) => `${row.map((count) => `${count}\t`).join('')}\n`).join('');
}

/**
 * Append the matrix to `path`, creating the file when it does not exist.
 * Existing content is never truncated.
 */
export function appendConfusionMatrix(path: string, cm: ConfusionMatrix): void {
  try {
    appendFileSync(path, formatConfusionMatrix(cm), 'utf-8');
  } catch (e) {
    throw new MatrixWriteError(path, e);
  }
}
