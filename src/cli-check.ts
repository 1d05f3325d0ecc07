#!/usr/bin/env node
/**
 * CLI Check Entry Point
 *
 * Usage:
 *   jlcheck script.jl
 *   cat script.jl | jlcheck -
 */

import * as fs from 'node:fs';
import { check, formatReport } from './check/index.js';

export const USAGE = 'Usage: jlcheck [file.jl] or | jlcheck -';

/**
 * Parsed command-line arguments for jlcheck
 */
export type ParsedCheckArgs =
  | { mode: 'usage' }
  | { mode: 'stdin' }
  | { mode: 'file'; file: string };

/**
 * Parse command-line arguments for jlcheck.
 * Only the first argument is read; `-` selects stdin.
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 */
export function parseCheckArgs(argv: readonly string[]): ParsedCheckArgs {
  const first = argv[0];
  if (first === undefined) {
    return { mode: 'usage' };
  }
  if (first === '-') {
    return { mode: 'stdin' };
  }
  return { mode: 'file', file: first };
}

/** Reads all of standard input as UTF-8 text */
function readStdin(): string {
  return fs.readFileSync(0, 'utf-8');
}

/**
 * Read the source text selected by the arguments.
 * Read failures (missing file, directory) propagate to the caller.
 */
export function readSource(
  args: Exclude<ParsedCheckArgs, { mode: 'usage' }>,
  stdin: () => string = readStdin
): string {
  if (args.mode === 'stdin') {
    return stdin();
  }
  return fs.readFileSync(args.file, 'utf-8');
}

// ============================================================
// MAIN ENTRY POINT
// ============================================================

/**
 * Main entry point for the jlcheck CLI.
 * A report with findings still exits 0; only read errors exit 1.
 */
export function main(
  argv: readonly string[] = process.argv.slice(2),
  stdin: () => string = readStdin
): void {
  try {
    const args = parseCheckArgs(argv);

    if (args.mode === 'usage') {
      console.log(USAGE);
      return;
    }

    const source = readSource(args, stdin);
    console.log(formatReport(check(source)));
  } catch (err) {
    if (err instanceof Error) {
      console.error(`Error: ${err.message}`);
    } else {
      console.error(`Error: ${String(err)}`);
    }
    process.exit(1);
  }
}

// Only run main if this is the entry point (not imported)
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  main();
}
