/**
 * The closed label vocabulary shared by both axes of a confusion matrix.
 */

import { NO_CLASSIFICATION } from '../types.js';

/**
 * Default particle classes, in matrix order. The final entry is the
 * catch-all that also receives unknown labels.
 */
export const DEFAULT_LABELS = [
  'RBC',
  'DRBC',
  'RBCC',
  'WBC',
  'WBCC',
  'BACT',
  'SQEP',
  'NSE',
  'TREP',
  'REEP',
  'CAOX',
  'URIC',
  'TPO4',
  'CAPH',
  'CYST',
  'LEUC',
  'AMOR',
  'CELL',
  'GRAN',
  'MUCS',
  'SPRM',
  'BYST',
  'HYST',
  'TRCH',
  'BUBB',
  NO_CLASSIFICATION,
] as const;

export interface LabelVocabulary {
  /** Ordered labels; the last one is the catch-all. */
  readonly labels: readonly string[];
  readonly catchAllIndex: number;
  /** Exact, case-sensitive lookup. Unmatched labels map to `catchAllIndex`. */
  indexOf(label: string): number;
}

export function createLabelVocabulary(labels: readonly string[]): LabelVocabulary {
  if (labels.length === 0) {
    throw new Error('A label vocabulary needs at least one label (the catch-all)');
  }
  const table = new Map<string, number>();
  labels.forEach((label, i) => {
    if (table.has(label)) {
      throw new Error(`Duplicate label in vocabulary: '${label}'`);
    }
    table.set(label, i);
  });
  const frozenLabels = Object.freeze([...labels]);
  const catchAllIndex = frozenLabels.length - 1;

  return Object.freeze({
    labels: frozenLabels,
    catchAllIndex,
    indexOf: (label: string) => table.get(label) ?? catchAllIndex,
  });
}

export const DEFAULT_VOCABULARY: LabelVocabulary = createLabelVocabulary(DEFAULT_LABELS);

/**
 * Map a label to its matrix index. Total: every string gets an index.
 */
export function labelIndex(label: string, vocabulary: LabelVocabulary = DEFAULT_VOCABULARY): number {
  return vocabulary.indexOf(label);
}
