export { USAGE, runCli } from './command.js';
export type { ComparisonSummary, CompareOptions, RunComparison, RunFailure } from './compare.js';
export {
  compareRun,
  compareRuns,
  compareRunsFromConfig,
  DEFAULT_OUTPUT_FILE_NAME,
} from './compare.js';
export type { CompareConfig, ConfigOptions } from './config.js';
export { configSchema, loadConfigFromFile, loadConfigFromText, parseConfig } from './config.js';
export type { RunFileExtensions, RunList } from './run-list.js';
export { DEFAULT_EXTENSIONS, parseRunList, readRunList, runFilePaths } from './run-list.js';
