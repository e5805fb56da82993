/**
 * Console logging with timestamps and levels.
 */

import { createColors, isColorSupported } from 'colorette';
import { format } from 'date-fns';
import { LOG_TIMESTAMP_FORMAT } from './constants.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface ConsoleLoggerOptions {
  /** Lowest level that is printed. Defaults to `info`. */
  level?: LogLevel;
  /** Colour the level name. Defaults to colorette's terminal detection. */
  color?: boolean;
  /** Clock used for timestamps. */
  now?: () => Date;
  /** Sink for debug and info lines. */
  out?: (line: string) => void;
  /** Sink for warn and error lines. */
  err?: (line: string) => void;
}

/** Format one log line: `2025-09-10 09:39:02,114 - INFO - message`. */
export function formatLogLine(timestamp: Date, level: LogLevel, message: string, paint: (text: string) => string = (text) => text): string {
  return `${format(timestamp, LOG_TIMESTAMP_FORMAT)} - ${paint(level.toUpperCase())} - ${message}`;
}

/**
 * Logger writing info to stdout and warnings/errors to stderr.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  const colors = createColors({ useColor: options.color ?? isColorSupported });
  const now = options.now ?? (() => new Date());
  const out = options.out ?? ((line: string) => console.log(line));
  const err = options.err ?? ((line: string) => console.error(line));

  const painters: Record<LogLevel, (text: string) => string> = {
    debug: colors.dim,
    info: colors.cyan,
    warn: colors.yellow,
    error: colors.red,
  };

  const emit = (level: LogLevel, message: string): void => {
    if (LEVEL_ORDER[level] < threshold) return;
    const line = formatLogLine(now(), level, message, painters[level]);
    if (level === 'warn' || level === 'error') {
      err(line);
    } else {
      out(line);
    }
  };

  return {
    debug: (message) => emit('debug', message),
    info: (message) => emit('info', message),
    warn: (message) => emit('warn', message),
    error: (message) => emit('error', message),
  };
}

export interface LogEntry {
  level: LogLevel;
  message: string;
}

/** Logger that records entries in memory. */
export function createMemoryLogger(): Logger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const record = (level: LogLevel) => (message: string) => {
    entries.push({ level, message });
  };
  return {
    entries,
    debug: record('debug'),
    info: record('info'),
    warn: record('warn'),
    error: record('error'),
  };
}
