/**
 * Custom error classes for the log splitter.
 */

/**
 * Base application error class.
 */
export class AppError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AppError';
  }
}

/** Render an unknown thrown value as a message. */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * The split tree cannot be written. Always fatal: no correct output can be produced.
 */
export class OutputError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OutputError';
  }

  static rootUnwritable(dir: string, cause: unknown): OutputError {
    return new OutputError(`Output directory '${dir}' is not writable: ${describeError(cause)}`, { cause });
  }

  static directoryFailed(dir: string, cause: unknown): OutputError {
    return new OutputError(`Could not create directory '${dir}': ${describeError(cause)}`, { cause });
  }

  static writeFailed(file: string, cause: unknown): OutputError {
    return new OutputError(`Could not write split file '${file}': ${describeError(cause)}`, { cause });
  }

  static closeFailed(file: string, cause: unknown): OutputError {
    return new OutputError(`Could not close split file '${file}': ${describeError(cause)}`, { cause });
  }
}

/**
 * The configured input root is missing or not a directory.
 */
export class InputDirectoryError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InputDirectoryError';
  }

  static notFound(dir: string, cause?: unknown): InputDirectoryError {
    return new InputDirectoryError(`Raw logs directory does not exist: ${dir}`, { cause });
  }

  static notADirectory(dir: string): InputDirectoryError {
    return new InputDirectoryError(`Raw logs path is not a directory: ${dir}`);
  }
}

/**
 * A single input file could not be opened or read. Absorbed per file.
 */
export class InputFileError extends AppError {
  readonly inputFile: string;

  constructor(inputFile: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InputFileError';
    this.inputFile = inputFile;
  }

  static unreadable(inputFile: string, cause: unknown): InputFileError {
    return new InputFileError(inputFile, `Cannot read ${inputFile}: ${describeError(cause)}`, { cause });
  }
}
