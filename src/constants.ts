/**
 * Centralized constants for the line grammar, paths and limits.
 */

/** Date+time anchor at the start of a line; group 1 is the date (YYYY-MM-DD). */
export const DATE_PATTERN = /^(\d{4}-\d{2}-\d{2})\s+\d{2}:\d{2}:\d{2}\.\d+/;

/** User marker anywhere in a line; group 1 is the user token. */
export const USER_PATTERN = /\[User:\s*([A-Z0-9]+)\]/;

/** Raw log extensions scanned in the input directory. Both are plain newline-delimited text. */
export const INPUT_EXTENSIONS = ['.log', '.arc'] as const;

/** Extension of every split file. */
export const SPLIT_FILE_EXTENSION = '.log';

/** A progress line is logged after every this many input lines. */
export const PROGRESS_INTERVAL = 10_000;

/** Default directory holding raw portal logs. */
export const DEFAULT_INPUT_DIR = 'logs/raw';

/** Default root of the split tree. */
export const DEFAULT_OUTPUT_DIR = 'logs/splits';

/** Environment variable overriding the input directory. */
export const INPUT_DIR_ENV = 'PORTAL_LOGS_RAW_DIR';

/** Environment variable overriding the output directory. */
export const OUTPUT_DIR_ENV = 'PORTAL_LOGS_SPLIT_DIR';

/** Upper bound on simultaneously open split files. */
export const MAX_OPEN_SINKS = 256;

/** Bytes requested per read from an input file (64 KiB). */
export const READ_CHUNK_SIZE = 64 * 1024;

/** Timestamp format for log output (matches the portal's own log style). */
export const LOG_TIMESTAMP_FORMAT = 'yyyy-MM-dd HH:mm:ss,SSS';
