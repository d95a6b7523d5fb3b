/**
 * CLI Shared Utilities
 * Output plumbing, error formatting and the per-unit runner shared by
 * file execution and the interactive session.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { ConfigError } from './config.js';
import { DeclaError, Diagnostics } from './diagnostics.js';
import { createLogger, type LogLevel } from './logger.js';
import { execute } from './runtime/index.js';

// ============================================================
// OUTPUT
// ============================================================

/** Where the CLI writes; each call receives complete text including newlines */
export interface CliIO {
  out: (text: string) => void;
  err: (text: string) => void;
}

export const processIO: CliIO = {
  out: (text) => {
    process.stdout.write(text);
  },
  err: (text) => {
    process.stderr.write(text);
  },
};

export const USAGE = `Usage: decla [options] [file]
Options:
  -l, --log-level LEVEL  Set log level (0-4, default: 1)
  -h, --help             Show this help message
  -v, --version          Show version information

Log Levels:
  0: None
  1: Error (default)
  2: Warning
  3: Info
  4: Debug`;

/** Command-line mistakes; reported together with the usage text */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Version from package.json, or 0.0.0 if it cannot be read.
 * Resolved beside the source (src/ or dist/), one level up.
 */
export function readVersion(): string {
  try {
    const packageJsonPath = fileURLToPath(
      new URL('../package.json', import.meta.url)
    );
    const data: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (
      typeof data === 'object' &&
      data !== null &&
      'version' in data &&
      typeof data.version === 'string'
    ) {
      return data.version;
    }
  } catch {
    // fall through to the placeholder version
  }
  return '0.0.0';
}

/**
 * Format error for stderr output
 */
export function formatError(err: unknown): string {
  if (err instanceof DeclaError) {
    return err.format();
  }
  if (err instanceof UsageError) {
    return `${err.message}\n${USAGE}`;
  }
  if (err instanceof ConfigError) {
    return err.message;
  }
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}

// ============================================================
// RUNNING A UNIT
// ============================================================

export interface RunSourceOptions {
  logLevel: LogLevel;
  /** Echo the binding to `io.out` */
  interactive: boolean;
  io: CliIO;
}

/**
 * Run one compilation unit, printing its diagnostic on failure.
 * Log lines and diagnostics go to `io.err`.
 */
export function runSource(source: string, options: RunSourceOptions): boolean {
  const { io } = options;
  const diagnostics = new Diagnostics(io.err);
  const logger = createLogger(options.logLevel, (line) => io.err(`${line}\n`));

  const result = execute(source, {
    interactive: options.interactive,
    diagnostics,
    logger,
    callbacks: { onOutput: (line) => io.out(`${line}\n`) },
  });

  if (!result.success) {
    diagnostics.printError();
    return false;
  }
  return true;
}
