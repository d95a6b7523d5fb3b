/**
 * Decla Runtime Tests: Logger
 */

import { describe, expect, it } from 'vitest';
import {
  createLogger,
  isLogLevel,
  LOG_LEVELS,
  silentLogger,
} from '../../src/logger.js';

describe('createLogger', () => {
  it('writes messages at or below its level with a prefix', () => {
    const lines: string[] = [];
    const logger = createLogger(LOG_LEVELS.WARNING, (line) => lines.push(line));
    logger.error('e');
    logger.warn('w');
    logger.info('i');
    logger.debug('d');
    expect(lines).toEqual(['[ERROR] e', '[WARNING] w']);
  });

  it('uses all four prefixes at debug level', () => {
    const lines: string[] = [];
    const logger = createLogger(LOG_LEVELS.DEBUG, (line) => lines.push(line));
    logger.log(LOG_LEVELS.DEBUG, 'a');
    logger.log(LOG_LEVELS.INFO, 'b');
    logger.log(LOG_LEVELS.WARNING, 'c');
    logger.log(LOG_LEVELS.ERROR, 'd');
    logger.log(LOG_LEVELS.NONE, 'never');
    expect(lines).toEqual(['[DEBUG] a', '[INFO] b', '[WARNING] c', '[ERROR] d']);
  });

  it('writes nothing at level none', () => {
    const lines: string[] = [];
    const logger = createLogger(LOG_LEVELS.NONE, (line) => lines.push(line));
    logger.error('e');
    expect(lines).toEqual([]);
    expect(logger.enabled(LOG_LEVELS.ERROR)).toBe(false);
  });

  it('reports which levels are enabled', () => {
    const logger = createLogger(LOG_LEVELS.INFO, () => {});
    expect(logger.enabled(LOG_LEVELS.INFO)).toBe(true);
    expect(logger.enabled(LOG_LEVELS.DEBUG)).toBe(false);
    expect(silentLogger.enabled(LOG_LEVELS.ERROR)).toBe(false);
  });
});

describe('isLogLevel', () => {
  it('accepts integers from 0 to 4 only', () => {
    expect([0, 1, 2, 3, 4].every((n) => isLogLevel(n))).toBe(true);
    expect(isLogLevel(5)).toBe(false);
    expect(isLogLevel(-1)).toBe(false);
    expect(isLogLevel(1.5)).toBe(false);
    expect(isLogLevel('1')).toBe(false);
  });
});
