#!/usr/bin/env node
/**
 * Main entry point for the portal-log-split CLI.
 */

import { run } from './cli.js';

async function main(): Promise<void> {
  try {
    process.exitCode = await run(process.argv.slice(2));
  } catch (error) {
    if (error instanceof Error) {
      console.error(`Error: ${error.message}`);
    } else {
      console.error('Error: An unknown error occurred');
    }
    process.exitCode = 1;
  }
}

void main();
