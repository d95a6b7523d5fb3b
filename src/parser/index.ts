/**
 * Decla Parser
 * Main entry point and re-exports
 */

import { Diagnostics, type Diagnostic } from '../diagnostics.js';
import { silentLogger, type Logger } from '../logger.js';
import type { ProgramNode } from '../types.js';
import { Parser } from './parser.js';

// Import extension modules to register prototype methods on Parser.
// These must be imported AFTER parser.js to ensure the class is defined.
import './parser-script.js';
import './parser-literals.js';

// ============================================================
// MAIN ENTRY POINT
// ============================================================

export type ParseResult =
  | { readonly success: true; readonly ast: ProgramNode }
  | { readonly success: false; readonly diagnostic: Diagnostic };

export interface ParseOptions {
  /** Slot receiving the first syntax error (a fresh one by default) */
  diagnostics?: Diagnostics;
  logger?: Logger;
}

/**
 * Parse decla source into an AST.
 *
 * @example
 * ```typescript
 * const result = parse('let x: int = 42;');
 * if (result.success) {
 *   console.log(result.ast.declaration?.name); // "x"
 * }
 * ```
 */
export function parse(source: string, options: ParseOptions = {}): ParseResult {
  const diagnostics = options.diagnostics ?? new Diagnostics();
  const parser = new Parser(source, {
    diagnostics,
    logger: options.logger ?? silentLogger,
  });
  const ast = parser.parse();

  if (!ast || diagnostics.hasError) {
    return { success: false, diagnostic: diagnostics.failure('Parse') };
  }
  return { success: true, ast };
}

// ============================================================
// RE-EXPORTS
// ============================================================

export { createParserState, type ParserState } from './state.js';
export { Parser } from './parser.js';
export { formatAst } from './format.js';
