/**
 * Minimal logging surface for batch runs.
 */

import chalk from 'chalk';

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const consoleLogger: Logger = {
  info(message) {
    // eslint-disable-next-line no-console
    console.log(message);
  },
  warn(message) {
    // eslint-disable-next-line no-console
    console.warn(chalk.yellow(message));
  },
  error(message) {
    // eslint-disable-next-line no-console
    console.error(chalk.red(message));
  },
};

/** A logger that drops everything. */
export const silentLogger: Logger = {
  info() {},
  warn() {},
  error() {},
};
