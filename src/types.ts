/**
 * Core type definitions for patch classification lists.
 */

/**
 * Label recorded for a patch position that has no classification.
 */
export const NO_CLASSIFICATION = 'NONE';

/**
 * The classification assigned to a single patch.
 */
export interface PatchClassification {
  /** One-based number of the subsample the patch belongs to. */
  readonly subsampleNumber: number;
  /** Zero-based position of the patch within its subsample. */
  readonly patchIndex: number;
  /** The classifier- or expert-assigned label. */
  readonly classification: string;
}

/**
 * The classifications of one subsample, index-aligned with patch position.
 */
export type SubsampleClassifications = readonly PatchClassification[];

/**
 * All subsamples of a run file, in stream order. `list[0]` is subsample 1.
 */
export type ClassificationList = readonly SubsampleClassifications[];

export function createPatchClassification(
  subsampleNumber: number,
  patchIndex: number,
  classification: string,
): PatchClassification {
  return Object.freeze({ subsampleNumber, patchIndex, classification });
}

/**
 * Look up a subsample by its one-based number. Returns undefined when the
 * list has no such subsample.
 */
export function getSubsample(
  list: ClassificationList,
  subsample: number,
): SubsampleClassifications | undefined {
  if (!Number.isInteger(subsample) || subsample < 1) return undefined;
  return list[subsample - 1];
}
