/**
 * Leveled Logger
 * Messages at or below the configured level are written to a sink.
 */

export const LOG_LEVELS = {
  NONE: 0,
  ERROR: 1,
  WARNING: 2,
  INFO: 3,
  DEBUG: 4,
} as const;

export type LogLevel = (typeof LOG_LEVELS)[keyof typeof LOG_LEVELS];

export const DEFAULT_LOG_LEVEL: LogLevel = LOG_LEVELS.ERROR;

const LEVEL_PREFIXES: Record<Exclude<LogLevel, 0>, string> = {
  1: 'ERROR',
  2: 'WARNING',
  3: 'INFO',
  4: 'DEBUG',
};

/** Receives one formatted line per message, without trailing newline */
export type LogSink = (line: string) => void;

export interface Logger {
  readonly level: LogLevel;
  enabled(level: LogLevel): boolean;
  log(level: LogLevel, message: string): void;
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
}

const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

export function isLogLevel(value: unknown): value is LogLevel {
  return (
    typeof value === 'number' &&
    Number.isInteger(value) &&
    value >= LOG_LEVELS.NONE &&
    value <= LOG_LEVELS.DEBUG
  );
}

/**
 * Create a logger writing to `sink` (stderr by default).
 *
 * @example
 * ```typescript
 * const logger = createLogger(LOG_LEVELS.DEBUG);
 * logger.debug('Parsing declaration');
 * // [DEBUG] Parsing declaration
 * ```
 */
export function createLogger(
  level: LogLevel = DEFAULT_LOG_LEVEL,
  sink: LogSink = stderrSink
): Logger {
  const enabled = (at: LogLevel): boolean =>
    at !== LOG_LEVELS.NONE && at <= level;

  const log = (at: LogLevel, message: string): void => {
    if (at === LOG_LEVELS.NONE || !enabled(at)) return;
    sink(`[${LEVEL_PREFIXES[at]}] ${message}`);
  };

  return {
    level,
    enabled,
    log,
    error: (message) => log(LOG_LEVELS.ERROR, message),
    warn: (message) => log(LOG_LEVELS.WARNING, message),
    info: (message) => log(LOG_LEVELS.INFO, message),
    debug: (message) => log(LOG_LEVELS.DEBUG, message),
  };
}

/** Logger that discards everything */
export const silentLogger: Logger = createLogger(LOG_LEVELS.NONE, () => {});
