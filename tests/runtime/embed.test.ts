/**
 * Decla Runtime Tests: Embedding API
 */

import { describe, expect, it } from 'vitest';
import {
  createContext,
  executeInteractive,
  executeSource,
  freeContext,
  fromHostValue,
  getError,
  hostBool,
  hostFloat,
  hostInt,
  hostNull,
  hostString,
  lastValue,
  toHostValue,
} from '../../src/embed.js';
import { LOG_LEVELS, silentLogger } from '../../src/logger.js';
import { INT64_MIN, intValue, stringValue } from '../../src/values.js';

function quietContext(output: string[] = []) {
  return createContext(LOG_LEVELS.NONE, {
    logger: silentLogger,
    callbacks: { onOutput: (line) => output.push(line) },
  });
}

describe('embedding context', () => {
  it('creates a context at the given level', () => {
    const ctx = createContext(LOG_LEVELS.WARNING);
    expect(ctx.logLevel).toBe(LOG_LEVELS.WARNING);
    expect(ctx.logger.level).toBe(LOG_LEVELS.WARNING);
    expect(getError(ctx)).toBeNull();
    expect(lastValue(ctx)).toBeNull();
  });

  it('runs source and exposes the bound value', () => {
    const ctx = quietContext();
    expect(executeSource(ctx, 'let x: int = 42;')).toBe(true);
    expect(getError(ctx)).toBeNull();
    expect(lastValue(ctx)).toEqual({ kind: 'int', value: 42n });
  });

  it('keeps the diagnostic message of a failed run', () => {
    const ctx = quietContext();
    expect(executeSource(ctx, 'let b: bool = 42;')).toBe(false);
    expect(getError(ctx)).toBe(
      'Type mismatch: cannot assign int to variable of type bool'
    );
  });

  it('clears the previous diagnostic before each run', () => {
    const ctx = quietContext();
    executeSource(ctx, 'let x: int = ;');
    expect(executeSource(ctx, 'let x: int = 1;')).toBe(true);
    expect(getError(ctx)).toBeNull();
  });

  it('keeps the last successful value across a failed run', () => {
    const ctx = quietContext();
    executeSource(ctx, 'let s: string = "kept";');
    executeSource(ctx, 'let s: string = 1;');
    expect(lastValue(ctx)).toEqual({ kind: 'string', value: 'kept' });
  });

  it('echoes through the callback in interactive mode', () => {
    const output: string[] = [];
    const ctx = quietContext(output);
    executeSource(ctx, 'let a: bool = true;');
    executeInteractive(ctx, 'let b: bool = false;');
    expect(output).toEqual(['b: bool = false']);
  });

  it('drops the diagnostic and last value when freed', () => {
    const ctx = quietContext();
    executeSource(ctx, 'let x: int = 1;');
    executeSource(ctx, 'let x: int');
    freeContext(ctx);
    expect(getError(ctx)).toBeNull();
    expect(lastValue(ctx)).toBeNull();
  });
});

describe('host values', () => {
  it('constructs each kind', () => {
    expect(hostNull()).toEqual({ kind: 'null' });
    expect(hostInt(7)).toEqual({ kind: 'int', value: 7n });
    expect(hostFloat(0.5)).toEqual({ kind: 'float', value: 0.5 });
    expect(hostBool(false)).toEqual({ kind: 'bool', value: false });
    expect(hostString('x')).toEqual({ kind: 'string', value: 'x' });
  });

  it('wraps host ints into the signed 64-bit range', () => {
    expect(hostInt(2n ** 63n)).toEqual({ kind: 'int', value: INT64_MIN });
  });

  it('converts between host values and runtime values', () => {
    expect(toHostValue(intValue(3))).toEqual({ kind: 'int', value: 3n });
    expect(toHostValue(stringValue('s'))).toEqual({ kind: 'string', value: 's' });
    expect(fromHostValue(hostBool(true))).toEqual({ type: 'bool', value: true });
    expect(fromHostValue(hostNull())).toEqual({ type: 'null' });
    expect(fromHostValue(hostFloat(2.5))).toEqual({ type: 'float', value: 2.5 });
  });
});
