/**
 * Errors raised while reading classification files and writing matrices.
 */

/**
 * A subsample number that does not exist in one of the compared lists.
 */
export class SubsampleOutOfRangeError extends RangeError {
  readonly subsample: number;
  readonly available: number;

  constructor(subsample: number, available: number) {
    super(
      `Subsample ${subsample} is out of range: the classification list has ${available} subsample(s)`,
    );
    this.name = 'SubsampleOutOfRangeError';
    this.subsample = subsample;
    this.available = available;
  }
}

/**
 * A classification file that could not be read.
 */
export class ClassificationReadError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Could not read classification file '${path}': ${messageOf(cause)}`, { cause });
    this.name = 'ClassificationReadError';
    this.path = path;
  }
}

/**
 * A confusion matrix that could not be appended to its output file.
 */
export class MatrixWriteError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Could not append confusion matrix to '${path}': ${messageOf(cause)}`, { cause });
    this.name = 'MatrixWriteError';
    this.path = path;
  }
}

export class RunListError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RunListError';
  }
}

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

function messageOf(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
