/**
 * Source Execution
 *
 * Runs one compilation unit through parse, analysis and interpretation.
 */

import { analyze } from '../../check/index.js';
import { DeclaError, Diagnostics } from '../../diagnostics.js';
import { createLogger, DEFAULT_LOG_LEVEL, LOG_LEVELS } from '../../logger.js';
import { formatAst, parse } from '../../parser/index.js';
import { Interpreter } from './interpreter.js';
import type { ExecutionResult, ExecutionSuccess, RunOptions } from './types.js';

/**
 * Execute decla source.
 *
 * Stops at the first stage that leaves a diagnostic pending. A diagnostic
 * already pending in `options.diagnostics` fails the run before anything
 * executes. Each call binds into a fresh environment.
 *
 * @example
 * ```typescript
 * const result = execute('let x: int = 42;');
 * if (result.success) {
 *   console.log(result.variables['x']); // { type: 'int', value: 42n }
 * }
 * ```
 */
export function execute(
  source: string,
  options: RunOptions = {}
): ExecutionResult {
  const diagnostics = options.diagnostics ?? new Diagnostics();
  const logger =
    options.logger ?? createLogger(options.logLevel ?? DEFAULT_LOG_LEVEL);

  const parsed = parse(source, { diagnostics, logger });
  if (!parsed.success) return parsed;

  const analysis = analyze(parsed.ast, { diagnostics, logger });
  if (!analysis.success) return analysis;

  if (logger.enabled(LOG_LEVELS.DEBUG)) {
    logger.debug(`AST:\n${formatAst(parsed.ast).trimEnd()}`);
  }

  const interpreter = new Interpreter({
    interactive: options.interactive ?? false,
    diagnostics,
    logger,
    callbacks: options.callbacks,
  });
  const value = interpreter.interpret(parsed.ast);

  if (diagnostics.hasError) {
    return { success: false, diagnostic: diagnostics.failure('Execution') };
  }
  return {
    success: true,
    value,
    variables: interpreter.environment.toRecord(),
  };
}

/**
 * Narrow a result to success, throwing its diagnostic as a DeclaError.
 *
 * @throws {DeclaError} When the run failed
 */
export function assertSuccess(
  result: ExecutionResult
): asserts result is ExecutionSuccess {
  if (!result.success) {
    throw new DeclaError(result.diagnostic);
  }
}
