/**
 * Decla Runtime Tests: Pipeline execution
 */

import { describe, expect, it } from 'vitest';
import { DeclaError, Diagnostics } from '../../src/diagnostics.js';
import { createLogger, LOG_LEVELS } from '../../src/logger.js';
import { assertSuccess, execute } from '../../src/runtime/index.js';
import { runError, runFull, runInteractive } from '../helpers/runtime.js';

describe('execute', () => {
  it('returns the value and the bindings', () => {
    expect(runFull('let x: int = 42;')).toEqual({
      success: true,
      value: { type: 'int', value: 42n },
      variables: { x: { type: 'int', value: 42n } },
    });
  });

  it('starts each call with a fresh environment', () => {
    runFull('let a: int = 1;');
    const result = runFull('let b: int = 2;');
    if (!result.success) throw new Error(result.diagnostic.message);
    expect(Object.keys(result.variables)).toEqual(['b']);
  });

  it('stops at a syntax error', () => {
    expect(runError('let x: int = 1;;').message).toBe('Expected end of file.');
  });

  it('stops at a type error before interpretation', () => {
    const output: string[] = [];
    const result = execute('let b: bool = 42;', {
      interactive: true,
      callbacks: { onOutput: (line) => output.push(line) },
      logger: createLogger(LOG_LEVELS.NONE),
    });
    expect(result.success).toBe(false);
    expect(output).toEqual([]);
  });

  it('fails without running when a diagnostic is already pending', () => {
    const diagnostics = new Diagnostics();
    diagnostics.setError('syntax', 1, 1, 'left over');
    const result = runFull('let x: int = 1;', { diagnostics });
    expect(result).toEqual({
      success: false,
      diagnostic: {
        kind: 'syntax',
        line: 1,
        column: 1,
        message: 'left over',
        sourceLine: undefined,
        position: 0,
        length: 0,
      },
    });
  });

  it('echoes in interactive mode', () => {
    const { result, output } = runInteractive('let s: string = "hi";');
    expect(result.success).toBe(true);
    expect(output).toEqual(['s: string = "hi"']);
  });

  it('dumps the AST after analysis at debug level', () => {
    const lines: string[] = [];
    execute('let x: int = 42;', {
      logger: createLogger(LOG_LEVELS.DEBUG, (line) => lines.push(line)),
    });
    const analysisEnd = lines.indexOf('[DEBUG] Added symbol: x (type: int)');
    const dump = lines.findIndex((line) => line.startsWith('[DEBUG] AST:'));
    const interpretation = lines.indexOf('[DEBUG] Starting interpretation');
    expect(analysisEnd).toBeGreaterThan(-1);
    expect(dump).toBe(analysisEnd + 1);
    expect(interpretation).toBe(dump + 1);
    expect(lines[dump]).toBe(
      [
        '[DEBUG] AST:',
        'type: Program',
        'declaration:',
        '  type: VariableDeclaration',
        '  name: x',
        '  declaredType: int',
        '  initializer:',
        '    type: Literal',
        '    valueType: int',
        '    value: 42',
      ].join('\n')
    );
  });

  it('does not dump the AST below debug level', () => {
    const lines: string[] = [];
    execute('let x: int = 42;', {
      logger: createLogger(LOG_LEVELS.INFO, (line) => lines.push(line)),
    });
    expect(lines).toEqual([]);
  });
});

describe('assertSuccess', () => {
  it('passes a successful result through', () => {
    const result = runFull('let x: int = 1;');
    assertSuccess(result);
    expect(result.variables['x']).toEqual({ type: 'int', value: 1n });
  });

  it('throws the diagnostic as a DeclaError', () => {
    const result = runFull('let b: bool = 42;');
    expect(() => assertSuccess(result)).toThrow(DeclaError);
    expect(() => assertSuccess(result)).toThrow(
      'Type mismatch: cannot assign int to variable of type bool at 1:15'
    );
  });
});
