/**
 * Run list files: the first line names the directory that holds the run
 * files, every following non-blank line names one run.
 *
 * ```text
 * /data/runs/
 * 20140312-0001
 * 20140312-0002
 * ```
 */

import { readFileSync } from 'node:fs';
import { RunListError } from '../errors.js';

export interface RunList {
  /** Prefix joined directly with each run name, so keep its trailing separator. */
  inputDirectory: string;
  runs: string[];
}

export interface RunFileExtensions {
  predicted: string;
  actual: string;
}

export const DEFAULT_EXTENSIONS: RunFileExtensions = Object.freeze({
  predicted: '.pcl',
  actual: '.acl',
});

export function parseRunList(content: string): RunList {
  const [first, ...rest] = content.split(/\r?\n/);
  const inputDirectory = first?.trim() ?? '';
  if (inputDirectory.length === 0) {
    throw new RunListError('Run list is empty: the first line must name the input directory');
  }
  const runs = rest.map((line) => line.trim()).filter((line) => line.length > 0);
  return { inputDirectory, runs };
}

export function readRunList(path: string): RunList {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    throw new RunListError(`Could not read run list '${path}': ${message}`, { cause: e });
  }
  return parseRunList(content);
}

export function runFilePaths(
  inputDirectory: string,
  run: string,
  extensions: RunFileExtensions = DEFAULT_EXTENSIONS,
): { predicted: string; actual: string } {
  return {
    predicted: `${inputDirectory}${run}${extensions.predicted}`,
    actual: `${inputDirectory}${run}${extensions.actual}`,
  };
}
