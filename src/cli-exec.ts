#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Implements parseArgs(), runFile() and main() for the decla binary.
 * With a file argument the file is run once; without one an interactive
 * session reads stdin.
 */

import * as fs from 'node:fs/promises';
import type { Readable } from 'node:stream';
import { createDefaultConfig, loadConfig } from './config.js';
import { isLogLevel, type LogLevel } from './logger.js';
import { runRepl } from './cli-repl.js';
import {
  formatError,
  processIO,
  readVersion,
  runSource,
  UsageError,
  USAGE,
  type CliIO,
} from './cli-shared.js';

/**
 * Parsed command-line arguments
 */
export type ParsedArgs =
  | { mode: 'help' | 'version' }
  | {
      mode: 'run';
      /** Source file, or null for an interactive session */
      file: string | null;
      /** Level given on the command line, overriding configuration */
      logLevel: LogLevel | null;
    };

function parseLogLevel(value: string): LogLevel {
  const level = /^-?\d+$/.test(value) ? Number.parseInt(value, 10) : NaN;
  if (!isLogLevel(level)) {
    throw new UsageError(`Invalid log level: ${value}`);
  }
  return level;
}

/**
 * Parse command-line arguments into structured command
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @throws {UsageError} On an unknown option, a bad log level or a second file
 */
export function parseArgs(argv: string[]): ParsedArgs {
  let file: string | null = null;
  let logLevel: LogLevel | null = null;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';

    if (arg === '--log-level' || arg === '-l') {
      const value = argv[i + 1];
      if (value === undefined) {
        throw new UsageError('Missing log level value');
      }
      logLevel = parseLogLevel(value);
      i++;
    } else if (arg === '--help' || arg === '-h') {
      return { mode: 'help' };
    } else if (arg === '--version' || arg === '-v') {
      return { mode: 'version' };
    } else if (arg.startsWith('-')) {
      throw new UsageError(`Unknown option: ${arg}`);
    } else {
      if (file !== null) {
        throw new UsageError('Only one file can be specified');
      }
      file = arg;
    }
  }

  return { mode: 'run', file, logLevel };
}

/**
 * Run a source file once, without echo.
 *
 * @returns false when the file cannot be read or the run fails
 */
export async function runFile(
  file: string,
  logLevel: LogLevel,
  io: CliIO = processIO
): Promise<boolean> {
  let source: string;
  try {
    source = await fs.readFile(file, 'utf-8');
  } catch {
    io.err(`Could not read file: ${file}\n`);
    return false;
  }
  return runSource(source, { logLevel, interactive: false, io });
}

export interface MainOptions {
  argv?: string[];
  /** Directory searched for .decla.yaml */
  cwd?: string;
  io?: CliIO;
  /** Interactive input (stdin by default) */
  input?: Readable;
}

/**
 * Entry point for the decla binary
 *
 * Command-line flags override .decla.yaml, which overrides the defaults.
 *
 * @returns Process exit code
 */
export async function main(options: MainOptions = {}): Promise<number> {
  const io = options.io ?? processIO;

  try {
    const parsed = parseArgs(options.argv ?? process.argv.slice(2));

    switch (parsed.mode) {
      case 'help':
        io.out(`${USAGE}\n`);
        return 0;

      case 'version':
        io.out(`${readVersion()}\n`);
        return 0;

      case 'run': {
        const config =
          loadConfig(options.cwd ?? process.cwd()) ?? createDefaultConfig();
        const logLevel = parsed.logLevel ?? config.logLevel;

        if (parsed.file !== null) {
          return (await runFile(parsed.file, logLevel, io)) ? 0 : 1;
        }

        await runRepl({
          input: options.input ?? process.stdin,
          io,
          logLevel,
          version: readVersion(),
          prompt: config.prompt,
          banner: config.banner,
        });
        return 0;
      }
    }
  } catch (err) {
    io.err(`${formatError(err)}\n`);
    return 1;
  }
}

// Only run main if not in test environment
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  void main().then((code) => {
    process.exitCode = code;
  });
}
