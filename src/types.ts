/**
 * Type definitions for the portal log splitter.
 */

/** Calendar date taken from the start of a log line (YYYY-MM-DD). */
export type DateKey = string;

/** Uppercase alphanumeric user token from a `[User: ...]` marker. */
export type UserKey = string;

/** Identifies one split file. */
export interface SplitKey {
  date: DateKey;
  user: UserKey;
}

/** Why a line was excluded from the split tree. */
export type SkipReason = 'missing-date' | 'missing-user' | 'missing-date-and-user';

/** Classification of a single raw line. */
export type LineClass =
  | ({ kind: 'assigned' } & SplitKey)
  | { kind: 'skipped'; reason: SkipReason };

/**
 * Counters for one run. Threaded through processing and returned at the end
 * instead of living in module state.
 */
export interface RunContext {
  /** Lines read across all input files. */
  linesProcessed: number;
  /** Lines written to a split file. */
  linesAssigned: number;
  /** Lines excluded because the date or user was missing. */
  linesSkipped: number;
  /** Input files drained completely. */
  filesProcessed: number;
  /** Input files that were missing or could not be read. */
  filesFailed: number;
}

/** Per-file result. */
export interface FileSummary {
  inputFile: string;
  linesRead: number;
  assigned: number;
  skipped: number;
  /** Present when the file was missing or reading stopped early. */
  error?: string;
}

/** Parameters for a split run. */
export interface SplitRequest {
  /** Directory scanned for raw logs when `inputFiles` is not given. */
  inputDir: string;
  /** Explicit files or glob patterns, processed in the given order. */
  inputFiles?: string[];
  /** Root of the split tree. */
  outputDir: string;
  /** Cap on simultaneously open split files. */
  maxOpenSinks?: number;
  /** Base for relative file arguments and patterns. Defaults to the process cwd. */
  cwd?: string;
}

/** Result of a split run. */
export interface SplitOutcome {
  outputDir: string;
  files: FileSummary[];
  context: RunContext;
}
