/**
 * Runtime configuration: CLI options, then environment, then defaults.
 */

import * as path from 'node:path';
import {
  DEFAULT_INPUT_DIR,
  DEFAULT_OUTPUT_DIR,
  INPUT_DIR_ENV,
  MAX_OPEN_SINKS,
  OUTPUT_DIR_ENV,
} from './constants.js';

export interface SplitterConfig {
  /** Absolute directory scanned for raw logs. */
  inputDir: string;
  /** Absolute root of the split tree. */
  outputDir: string;
  maxOpenSinks: number;
}

export interface ConfigOverrides {
  input?: string;
  output?: string;
  maxOpenSinks?: number;
}

type Env = Record<string, string | undefined>;

function pick(...candidates: Array<string | undefined>): string | undefined {
  return candidates.find((value) => value !== undefined && value.trim() !== '');
}

/** Resolve the splitter configuration; relative paths resolve against `cwd`. */
export function resolveConfig(
  overrides: ConfigOverrides = {},
  env: Env = process.env,
  cwd: string = process.cwd()
): SplitterConfig {
  const inputDir = pick(overrides.input, env[INPUT_DIR_ENV]) ?? DEFAULT_INPUT_DIR;
  const outputDir = pick(overrides.output, env[OUTPUT_DIR_ENV]) ?? DEFAULT_OUTPUT_DIR;

  return {
    inputDir: path.resolve(cwd, inputDir),
    outputDir: path.resolve(cwd, outputDir),
    maxOpenSinks: overrides.maxOpenSinks ?? MAX_OPEN_SINKS,
  };
}
