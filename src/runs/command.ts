/**
 * Command-line front end for batch comparisons.
 */

import { resolve } from 'node:path';
import { parseArgs } from 'node:util';
import { ConfigError } from '../errors.js';
import { consoleLogger, type Logger } from '../reporting/logger.js';
import { renderConfusionMatrix } from '../reporting/renderer.js';
import { compareRunsFromConfig } from './compare.js';
import { type CompareConfig, loadConfigFromFile, parseConfig } from './config.js';

export const USAGE = `Usage: patch-confusion [options]

Options:
  -c, --config <file>       YAML or JSON configuration file
  -r, --run-list <file>     run list (first line: input directory, then one run per line)
  -d, --destination <dir>   directory receiving ConfusionMatrix.txt
  -s, --subsample <n>       one-based subsample to compare (default 1)
  -p, --print               also print each matrix as a table
  -h, --help                show this message`;

/**
 * Run the command with the given arguments (without the node and script
 * entries). Returns the process exit code.
 */
export function runCli(argv: string[], logger: Logger = consoleLogger): number {
  let values: CliValues;
  let config: CompareConfig;
  try {
    values = parseCliArgs(argv);
    if (values.help) {
      logger.info(USAGE);
      return 0;
    }
    config = resolveConfig(values);
  } catch (e) {
    logger.error(messageOf(e));
    logger.info(USAGE);
    return 1;
  }

  const print = values.print;
  try {
    const summary = compareRunsFromConfig(config, {
      logger,
      onMatrix: print ? (result) => logger.info(renderConfusionMatrix(result.matrix)) : undefined,
    });
    return summary.failed.length === 0 ? 0 : 1;
  } catch (e) {
    logger.error(messageOf(e));
    return 1;
  }
}

type CliValues = ReturnType<typeof parseCliArgs>;

function parseCliArgs(argv: string[]) {
  const { values } = parseArgs({
    args: argv,
    strict: true,
    allowPositionals: false,
    options: {
      config: { type: 'string', short: 'c' },
      'run-list': { type: 'string', short: 'r' },
      destination: { type: 'string', short: 'd' },
      subsample: { type: 'string', short: 's' },
      print: { type: 'boolean', short: 'p', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });
  return values;
}

function resolveConfig(values: CliValues): CompareConfig {
  const overrides: Record<string, unknown> = {};
  if (values['run-list'] !== undefined) overrides.runList = resolve(values['run-list']);
  if (values.destination !== undefined) overrides.destination = resolve(values.destination);
  if (values.subsample !== undefined) {
    const subsample = Number(values.subsample);
    if (!Number.isInteger(subsample)) {
      throw new ConfigError(`--subsample must be a positive integer, got '${values.subsample}'`);
    }
    overrides.subsample = subsample;
  }

  if (values.config !== undefined) {
    return loadConfigFromFile(values.config, { overrides });
  }
  return parseConfig(overrides);
}

function messageOf(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
