/**
 * patch-confusion: confusion matrices between classifier output and expert
 * classifications of image patches.
 *
 * @example
 * ```ts
 * import { buildConfusionMatrix, formatConfusionMatrix, parseClassificationList } from 'patch-confusion';
 *
 * const predicted = parseClassificationList('<CLASS>RBC,WBC,BACT,<');
 * const actual = parseClassificationList('<CLASS>RBC,WBC,SQEP,<');
 *
 * const cm = buildConfusionMatrix(predicted, actual, 1);
 * process.stdout.write(formatConfusionMatrix(cm));
 * ```
 */

// Errors
export {
  ClassificationReadError,
  ConfigError,
  MatrixWriteError,
  RunListError,
  SubsampleOutOfRangeError,
} from './errors.js';
// Matrix
export type { BuildOptions, ConfusionMatrix, LabelVocabulary } from './matrix/index.js';
export {
  appendConfusionMatrix,
  buildConfusionMatrix,
  createConfusionMatrix,
  createLabelVocabulary,
  DEFAULT_LABELS,
  DEFAULT_VOCABULARY,
  formatConfusionMatrix,
  labelIndex,
  totalCount,
} from './matrix/index.js';
// Parsing
export type { ParserState } from './parsing/index.js';
export {
  ClassificationListParser,
  parseClassificationList,
  readClassificationList,
} from './parsing/index.js';
// Reporting
export type { Logger, RendererOptions } from './reporting/index.js';
export { consoleLogger, renderConfusionMatrix, silentLogger } from './reporting/index.js';
// Runs
export type {
  CompareConfig,
  CompareOptions,
  ComparisonSummary,
  ConfigOptions,
  RunComparison,
  RunFailure,
  RunFileExtensions,
  RunList,
} from './runs/index.js';
export {
  compareRun,
  compareRuns,
  compareRunsFromConfig,
  configSchema,
  DEFAULT_EXTENSIONS,
  DEFAULT_OUTPUT_FILE_NAME,
  loadConfigFromFile,
  loadConfigFromText,
  parseConfig,
  parseRunList,
  readRunList,
  runCli,
  runFilePaths,
  USAGE,
} from './runs/index.js';
// Core types
export type {
  ClassificationList,
  PatchClassification,
  SubsampleClassifications,
} from './types.js';
export { createPatchClassification, getSubsample, NO_CLASSIFICATION } from './types.js';
