/**
 * CLI interface using Commander.js
 */

import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { resolveConfig } from './config.js';
import { AppError } from './errors.js';
import { createConsoleLogger, type Logger, type LogLevel } from './logger.js';
import { executeSplit } from './split.js';

/** Parse and validate a positive integer option. */
function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError(`Expected a positive integer, got '${value}'.`);
  }
  return parsed;
}

/** Parsed arguments for the split command. */
export interface SplitArgs {
  files: string[];
  input?: string;
  output?: string;
  maxOpenSinks?: number;
  verbose: boolean;
  quiet: boolean;
  color: boolean;
}

/** Create and configure the CLI program. */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('portal-log-split')
    .description('Split personnel-portal application logs into one file per user per day')
    .version('0.1.0');

  program
    .command('split')
    .description('Append every dated, user-tagged line to <output>/<YYYY-MM-DD>/<USER>.log')
    .argument('[files...]', 'Raw log files or glob patterns; defaults to every .log/.arc file in --input')
    .option('--input <dir>', 'Directory scanned for raw logs (env PORTAL_LOGS_RAW_DIR, default logs/raw)')
    .option('--output <dir>', 'Root of the split tree (env PORTAL_LOGS_SPLIT_DIR, default logs/splits)')
    .option('--max-open-sinks <n>', 'Maximum split files held open at once', parsePositiveInt)
    .option('--verbose', 'Log every skipped line', false)
    .option('--quiet', 'Only log warnings and errors', false)
    .option('--no-color', 'Disable coloured log levels')
    .action(
      (
        files: string[],
        options: { input?: string; output?: string; maxOpenSinks?: number; verbose: boolean; quiet: boolean; color: boolean }
      ) => {
        // Store parsed args for later retrieval
        program.splitArgs = {
          files,
          input: options.input,
          output: options.output,
          maxOpenSinks: options.maxOpenSinks,
          verbose: options.verbose,
          quiet: options.quiet,
          color: options.color,
        };
      }
    );

  return program;
}

// Extend Command type to include our custom properties
declare module 'commander' {
  interface Command {
    splitArgs?: SplitArgs;
  }
}

/** Collaborators the CLI needs; replaced in tests. */
export interface CliDeps {
  env?: Record<string, string | undefined>;
  cwd?: string;
  /** Builds the logger once the verbosity flags are known. */
  createLogger?: (level: LogLevel, color: boolean) => Logger;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
}

function levelFor(args: SplitArgs): LogLevel {
  if (args.verbose) return 'debug';
  if (args.quiet) return 'warn';
  return 'info';
}

/**
 * Run the CLI with user arguments (no `node` / script prefix).
 * @returns the process exit status: 0 on success, 1 on a fatal error
 */
export async function run(args: string[], deps: CliDeps = {}): Promise<number> {
  const stdout = deps.stdout ?? ((text: string) => process.stdout.write(text));
  const stderr = deps.stderr ?? ((text: string) => process.stderr.write(text));
  const program = createProgram();
  program.exitOverride();
  program.configureOutput({ writeOut: stdout, writeErr: stderr });
  for (const command of program.commands) {
    command.exitOverride();
    command.configureOutput({ writeOut: stdout, writeErr: stderr });
  }

  try {
    await program.parseAsync(args, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  const splitArgs = program.splitArgs;
  if (!splitArgs) {
    program.outputHelp();
    return 0;
  }

  const level = levelFor(splitArgs);
  const logger = deps.createLogger
    ? deps.createLogger(level, splitArgs.color)
    : createConsoleLogger({ level, color: splitArgs.color ? undefined : false });

  const cwd = deps.cwd ?? process.cwd();
  const config = resolveConfig(
    { input: splitArgs.input, output: splitArgs.output, maxOpenSinks: splitArgs.maxOpenSinks },
    deps.env ?? process.env,
    cwd
  );

  try {
    const outcome = executeSplit(
      {
        inputDir: config.inputDir,
        inputFiles: splitArgs.files.length > 0 ? splitArgs.files : undefined,
        outputDir: config.outputDir,
        maxOpenSinks: config.maxOpenSinks,
        cwd,
      },
      logger
    );

    const { context } = outcome;
    stdout(
      `Split ${context.linesProcessed} lines from ${outcome.files.length} files into ${outcome.outputDir} ` +
        `(${context.linesAssigned} assigned, ${context.linesSkipped} skipped, ${context.filesFailed} failed)\n`
    );
    return 0;
  } catch (error) {
    if (error instanceof AppError) {
      logger.error(error.message);
      return 1;
    }
    throw error;
  }
}
