/**
 * Per-run comparison of classifier output against expert classifications.
 *
 * For each run the predicted (`.pcl`) and actual (`.acl`) files are parsed,
 * a confusion matrix is built for the selected subsample, and the matrix is
 * appended to the shared output file in the destination directory.
 */

import { mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { MatrixWriteError } from '../errors.js';
import { buildConfusionMatrix, type ConfusionMatrix } from '../matrix/confusion-matrix.js';
import { appendConfusionMatrix } from '../matrix/serialize.js';
import {
  createLabelVocabulary,
  DEFAULT_VOCABULARY,
  type LabelVocabulary,
} from '../matrix/vocabulary.js';
import { readClassificationList } from '../parsing/loader.js';
import { consoleLogger, type Logger } from '../reporting/logger.js';
import { getSubsample } from '../types.js';
import type { CompareConfig } from './config.js';
import {
  DEFAULT_EXTENSIONS,
  type RunFileExtensions,
  type RunList,
  readRunList,
  runFilePaths,
} from './run-list.js';

export const DEFAULT_OUTPUT_FILE_NAME = 'ConfusionMatrix.txt';

export interface CompareOptions {
  /** One-based subsample to compare. */
  subsample: number;
  /** Directory holding the output file. Created when missing. */
  destination: string;
  outputFileName?: string;
  extensions?: RunFileExtensions;
  vocabulary?: LabelVocabulary;
  logger?: Logger;
  /** Called with every matrix once it has been written. */
  onMatrix?: (result: RunComparison) => void;
}

export interface RunComparison {
  run: string;
  matrix: ConfusionMatrix;
  outputPath: string;
}

export interface RunFailure {
  run: string;
  error: Error;
}

export interface ComparisonSummary {
  completed: RunComparison[];
  failed: RunFailure[];
}

/**
 * Compare one run and append its matrix to the output file.
 */
export function compareRun(
  inputDirectory: string,
  run: string,
  opts: CompareOptions,
): RunComparison {
  const paths = runFilePaths(inputDirectory, run, opts.extensions ?? DEFAULT_EXTENSIONS);
  const predicted = readClassificationList(paths.predicted);
  const actual = readClassificationList(paths.actual);

  const matrix = buildConfusionMatrix(predicted, actual, opts.subsample, {
    vocabulary: opts.vocabulary ?? DEFAULT_VOCABULARY,
    title: `Confusion Matrix: ${run} (subsample ${opts.subsample})`,
  });

  const predictedCount = getSubsample(predicted, opts.subsample)?.length ?? 0;
  const actualCount = getSubsample(actual, opts.subsample)?.length ?? 0;
  if (predictedCount !== actualCount) {
    (opts.logger ?? consoleLogger).warn(
      `Run '${run}' subsample ${opts.subsample}: ${predictedCount} predicted vs ` +
        `${actualCount} actual patches, counting the first ${Math.min(predictedCount, actualCount)}`,
    );
  }

  const outputPath = join(opts.destination, opts.outputFileName ?? DEFAULT_OUTPUT_FILE_NAME);
  appendConfusionMatrix(outputPath, matrix);

  const result = { run, matrix, outputPath };
  opts.onMatrix?.(result);
  return result;
}

/**
 * Compare every run of a run list in order. A failing run is logged and
 * recorded, and the next run is still processed.
 */
export function compareRuns(runList: RunList, opts: CompareOptions): ComparisonSummary {
  const logger = opts.logger ?? consoleLogger;
  try {
    mkdirSync(opts.destination, { recursive: true });
  } catch (e) {
    throw new MatrixWriteError(opts.destination, e);
  }

  const summary: ComparisonSummary = { completed: [], failed: [] };
  for (const run of runList.runs) {
    logger.info(`Processing -> ${run}`);
    try {
      summary.completed.push(compareRun(runList.inputDirectory, run, opts));
    } catch (e) {
      const error = e instanceof Error ? e : new Error(String(e));
      logger.error(`Run '${run}' failed: ${error.message}`);
      summary.failed.push({ run, error });
    }
  }

  logger.info(`Compared ${summary.completed.length} run(s), ${summary.failed.length} failed`);
  return summary;
}

/**
 * Read the configured run list and compare every run in it.
 */
export function compareRunsFromConfig(
  config: CompareConfig,
  opts?: Pick<CompareOptions, 'logger' | 'onMatrix'>,
): ComparisonSummary {
  const runList = readRunList(config.runList);
  return compareRuns(runList, {
    subsample: config.subsample,
    destination: config.destination,
    outputFileName: config.outputFileName,
    extensions: { predicted: config.predictedExtension, actual: config.actualExtension },
    vocabulary: config.labels ? createLabelVocabulary(config.labels) : DEFAULT_VOCABULARY,
    logger: opts?.logger,
    onMatrix: opts?.onMatrix,
  });
}
