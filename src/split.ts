/**
 * Split command implementation - partitions raw portal logs by date and user.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { globSync, hasMagic } from 'glob';
import { classifyLine } from './classify.js';
import { INPUT_EXTENSIONS, PROGRESS_INTERVAL } from './constants.js';
import { InputDirectoryError, InputFileError, describeError } from './errors.js';
import type { Logger } from './logger.js';
import { SinkPool } from './sinks.js';
import type { FileSummary, RunContext, SplitOutcome, SplitRequest } from './types.js';
import { ensureWritableDirectory, readLines } from './utils/fileio.js';

/** Fresh counters for one run. */
export function createRunContext(): RunContext {
  return {
    linesProcessed: 0,
    linesAssigned: 0,
    linesSkipped: 0,
    filesProcessed: 0,
    filesFailed: 0,
  };
}

/** Glob matching every raw log extension, e.g. `*{.log,.arc}`. */
const INPUT_GLOB = `*{${INPUT_EXTENSIONS.join(',')}}`;

/**
 * List the raw logs directly inside `inputDir`, sorted by path.
 * @throws InputDirectoryError if the directory is missing or is a file
 */
export function discoverInputFiles(inputDir: string, logger: Logger): string[] {
  let stats: fs.Stats;
  try {
    stats = fs.statSync(inputDir);
  } catch (error) {
    throw InputDirectoryError.notFound(inputDir, error);
  }
  if (!stats.isDirectory()) {
    throw InputDirectoryError.notADirectory(inputDir);
  }

  const files = globSync(INPUT_GLOB, { cwd: inputDir, nodir: true, absolute: true, dot: true }).sort();
  if (files.length === 0) {
    logger.warn(`No ${INPUT_EXTENSIONS.join(' or ')} files found in ${inputDir}`);
  }
  return files;
}

/**
 * Resolve explicit file arguments. Glob patterns expand in sorted order;
 * literal paths are kept even when missing so they are reported per file.
 */
export function expandInputs(patterns: string[], logger: Logger, cwd: string = process.cwd()): string[] {
  const collected: string[] = [];

  for (const pattern of patterns) {
    if (!hasMagic(pattern)) {
      collected.push(path.resolve(cwd, pattern));
      continue;
    }

    const matches = globSync(pattern, { cwd, nodir: true, absolute: true }).sort();
    if (matches.length === 0) {
      logger.warn(`No files matched pattern '${pattern}'`);
    }
    collected.push(...matches);
  }

  return collected;
}

/** True when `file` lies at or below `dir`. */
function isWithin(dir: string, file: string): boolean {
  const relative = path.relative(path.resolve(dir), path.resolve(file));
  return relative !== '..' && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative);
}

/**
 * Drop inputs that live in the split tree. Reading a split file while
 * appending to it never reaches end of file.
 */
export function excludeOutputTree(inputs: string[], outputDir: string, logger: Logger): string[] {
  return inputs.filter((inputFile) => {
    if (!isWithin(outputDir, inputFile)) return true;
    logger.warn(`Ignoring ${inputFile}: it is inside the output directory ${outputDir}`);
    return false;
  });
}

/** Close every sink while another error is already on its way out. */
function releaseAfterFailure(pool: SinkPool, logger: Logger): void {
  try {
    pool.closeAll();
  } catch (closeError) {
    logger.error(describeError(closeError));
  }
}

/**
 * Split one raw log into the pool's output tree.
 *
 * A missing or unreadable input is reported in the summary and counted as
 * failed; output failures propagate. Either way, every sink opened for this
 * file is closed before returning.
 */
export function splitOneFile(
  inputFile: string,
  pool: SinkPool,
  context: RunContext,
  logger: Logger
): FileSummary {
  const summary: FileSummary = { inputFile, linesRead: 0, assigned: 0, skipped: 0 };
  logger.info(`Processing file: ${inputFile}`);

  try {
    for (const line of readLines(inputFile)) {
      summary.linesRead += 1;
      context.linesProcessed += 1;

      const result = classifyLine(line);
      if (result.kind === 'assigned') {
        // Split files stay newline-delimited even when the source ends without one.
        pool.append({ date: result.date, user: result.user }, line.endsWith('\n') ? line : `${line}\n`);
        summary.assigned += 1;
        context.linesAssigned += 1;
      } else {
        summary.skipped += 1;
        context.linesSkipped += 1;
        logger.debug(`Skipped ${inputFile}:${summary.linesRead} (${result.reason})`);
      }

      if (context.linesProcessed % PROGRESS_INTERVAL === 0) {
        logger.info(`Processed ${context.linesProcessed} lines...`);
      }
    }
    context.filesProcessed += 1;
  } catch (error) {
    if (!(error instanceof InputFileError)) {
      releaseAfterFailure(pool, logger);
      throw error;
    }
    summary.error = error.message;
    context.filesFailed += 1;
    logger.warn(error.message);
  }

  pool.closeAll();
  logger.info(`Completed ${inputFile}: ${summary.assigned} assigned, ${summary.skipped} skipped`);
  return summary;
}

/**
 * Execute a split run over every input, strictly in order.
 *
 * Output is appended: running twice over the same input duplicates lines.
 * @throws OutputError if the output tree cannot be written
 * @throws InputDirectoryError if the input directory is scanned and missing
 */
export function executeSplit(request: SplitRequest, logger: Logger): SplitOutcome {
  const candidates =
    request.inputFiles && request.inputFiles.length > 0
      ? expandInputs(request.inputFiles, logger, request.cwd)
      : discoverInputFiles(request.inputDir, logger);
  const inputs = excludeOutputTree(candidates, request.outputDir, logger);

  ensureWritableDirectory(request.outputDir);

  logger.info(`Found ${inputs.length} log files to process`);

  const pool = new SinkPool(request.outputDir, request.maxOpenSinks);
  const context = createRunContext();
  const files = inputs.map((inputFile) => splitOneFile(inputFile, pool, context, logger));

  logger.info(`Processing complete. Total lines processed: ${context.linesProcessed}`);

  return { outputDir: request.outputDir, files, context };
}
