/**
 * Interactive Session
 * Reads one compilation unit per line until `exit` or end of input.
 */

import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';
import { DEFAULT_PROMPT } from './config.js';
import type { LogLevel } from './logger.js';
import { runSource, type CliIO } from './cli-shared.js';

export interface ReplOptions {
  input: Readable;
  io: CliIO;
  logLevel: LogLevel;
  version: string;
  prompt?: string;
  /** Print the banner first (default true) */
  banner?: boolean;
}

export function formatBanner(version: string): string {
  return `decla interpreter v${version}\nType 'exit' to quit\n`;
}

/**
 * Run the interactive loop.
 *
 * Every line is run as its own unit with echo on, so a session keeps no
 * bindings between lines. Diagnostics are printed and then dropped.
 *
 * @returns Number of lines run
 */
export async function runRepl(options: ReplOptions): Promise<number> {
  const { io } = options;
  const prompt = options.prompt ?? DEFAULT_PROMPT;

  if (options.banner ?? true) {
    io.out(formatBanner(options.version));
  }

  const rl = createInterface({
    input: options.input,
    crlfDelay: Infinity,
    terminal: false,
  });

  let count = 0;
  io.out(prompt);
  try {
    for await (const line of rl) {
      if (line === 'exit') break;
      runSource(line, { logLevel: options.logLevel, interactive: true, io });
      count++;
      io.out(prompt);
    }
  } finally {
    rl.close();
  }
  return count;
}
