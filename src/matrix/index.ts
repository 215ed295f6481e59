export type { BuildOptions, ConfusionMatrix } from './confusion-matrix.js';
export { buildConfusionMatrix, createConfusionMatrix, totalCount } from './confusion-matrix.js';
export { appendConfusionMatrix, formatConfusionMatrix } from './serialize.js';
export type { LabelVocabulary } from './vocabulary.js';
export {
  createLabelVocabulary,
  DEFAULT_LABELS,
  DEFAULT_VOCABULARY,
  labelIndex,
} from './vocabulary.js';
