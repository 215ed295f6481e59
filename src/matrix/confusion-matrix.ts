/**
 * Confusion matrix accumulation for one subsample of two classification lists.
 */

import { SubsampleOutOfRangeError } from '../errors.js';
import { type ClassificationList, getSubsample, type SubsampleClassifications } from '../types.js';
import { DEFAULT_VOCABULARY, type LabelVocabulary } from './vocabulary.js';

export interface ConfusionMatrix {
  type: 'confusion_matrix';
  title: string;
  description?: string | null;
  /** Ordered list of class labels (used for both axes). */
  classLabels: readonly string[];
  /** matrix[predictedIdx][actualIdx] = count of patches. */
  matrix: number[][];
}

export interface BuildOptions {
  vocabulary?: LabelVocabulary;
  title?: string;
  description?: string | null;
}

/**
 * An all-zero matrix over the vocabulary.
 */
export function createConfusionMatrix(
  vocabulary: LabelVocabulary = DEFAULT_VOCABULARY,
  title = 'Confusion Matrix',
): ConfusionMatrix {
  const size = vocabulary.labels.length;
  return {
    type: 'confusion_matrix',
    title,
    classLabels: vocabulary.labels,
    matrix: Array.from({ length: size }, () => new Array<number>(size).fill(0)),
  };
}

/**
 * Compare the given subsample (one-based) of two lists patch by patch.
 *
 * Rows follow `predicted`, columns follow `actual`. Only the index-aligned
 * prefix shared by both subsamples is counted.
 */
export function buildConfusionMatrix(
  predicted: ClassificationList,
  actual: ClassificationList,
  subsample: number,
  opts?: BuildOptions,
): ConfusionMatrix {
  const vocabulary = opts?.vocabulary ?? DEFAULT_VOCABULARY;
  const predictedPatches = selectSubsample(predicted, subsample);
  const actualPatches = selectSubsample(actual, subsample);

  const result = createConfusionMatrix(vocabulary, opts?.title);
  const description = opts?.description;
  if (description !== undefined) result.description = description;

  const n = Math.min(predictedPatches.length, actualPatches.length);
  for (let i = 0; i < n; i++) {
    const p = predictedPatches[i];
    const a = actualPatches[i];
    if (p === undefined || a === undefined) break;
    increment(result, vocabulary.indexOf(p.classification), vocabulary.indexOf(a.classification));
  }

  return result;
}

/**
 * Sum of every cell.
 */
export function totalCount(cm: ConfusionMatrix): number {
  return cm.matrix.reduce((sum, row) => sum + row.reduce((s, v) => s + v, 0), 0);
}

function increment(cm: ConfusionMatrix, row: number, col: number): void {
  const cells = cm.matrix[row];
  const count = cells?.[col];
  if (cells === undefined || count === undefined) {
    throw new RangeError(`Cell [${row}][${col}] is outside the confusion matrix`);
  }
  cells[col] = count + 1;
}

function selectSubsample(list: ClassificationList, subsample: number): SubsampleClassifications {
  const patches = getSubsample(list, subsample);
  if (patches === undefined) {
    throw new SubsampleOutOfRangeError(subsample, list.length);
  }
  return patches;
}
