/**
 * Parser Class - Core
 *
 * Defines the Parser class structure. Methods are added via prototype
 * extension from separate modules, using TypeScript declaration merging
 * for type safety.
 */

import type { Diagnostics } from '../diagnostics.js';
import type { Logger } from '../logger.js';
import type { ProgramNode } from '../types.js';
import { type ParserState, createParserState } from './state.js';

/**
 * Recursive-descent parser with one token of lookahead.
 *
 * Methods are organized across multiple files:
 * - parser-script.ts: Program, declarations, type names
 * - parser-literals.ts: Initializer expressions and literals
 *
 * Parsing does not recover: the first syntax error aborts the parse.
 *
 * @example
 * ```typescript
 * const parser = new Parser('let x: int = 1;', { diagnostics, logger });
 * const ast = parser.parse(); // null on failure
 * ```
 */
export class Parser {
  /** Parser state including the lexer, lookahead and error flag */
  state: ParserState;

  constructor(
    source: string,
    options: { diagnostics: Diagnostics; logger: Logger }
  ) {
    this.state = createParserState(source, options);
  }

  /**
   * Parse the source into a program, or null if a syntax error occurred.
   */
  parse(): ProgramNode | null {
    return this.parseProgram();
  }

  get hadError(): boolean {
    return this.state.hadError;
  }
}
