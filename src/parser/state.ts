/**
 * Parser State
 * Core state management and token navigation utilities
 */

import type { Diagnostics } from '../diagnostics.js';
import {
  createLexerState,
  formatToken,
  nextToken,
  type LexerState,
} from '../lexer/index.js';
import type { Logger } from '../logger.js';
import type { SourceLocation, SourceSpan, Token, TokenType } from '../types.js';
import { TOKEN_TYPES } from '../types.js';

// ============================================================
// PARSER STATE
// ============================================================

export interface ParserState {
  readonly lexer: LexerState;
  readonly diagnostics: Diagnostics;
  readonly logger: Logger;
  /** Lookahead token */
  current: Token;
  /** Most recently consumed token */
  previous: Token;
  /** Set once any syntax error has been raised by the parser */
  hadError: boolean;
}

export interface ParserStateOptions {
  diagnostics: Diagnostics;
  logger: Logger;
}

/**
 * Create parser state over `source` and prime the lookahead
 * with the first token.
 */
export function createParserState(
  source: string,
  options: ParserStateOptions
): ParserState {
  const lexer = createLexerState(source, options.diagnostics);
  const origin: SourceLocation = { line: 1, column: 1, offset: 0 };
  const placeholder: Token = {
    type: TOKEN_TYPES.EOF,
    lexeme: '',
    span: { start: origin, end: origin },
  };
  const state: ParserState = {
    lexer,
    diagnostics: options.diagnostics,
    logger: options.logger,
    current: placeholder,
    previous: placeholder,
    hadError: false,
  };
  advance(state);
  return state;
}

// ============================================================
// TOKEN NAVIGATION
// ============================================================

/** @internal */
export function check(state: ParserState, ...types: TokenType[]): boolean {
  return types.includes(state.current.type);
}

/** @internal */
export function advance(state: ParserState): Token {
  state.previous = state.current;
  state.current = nextToken(state.lexer);
  state.logger.debug(`Advanced to ${formatToken(state.current)}`);
  return state.previous;
}

/**
 * Advance past the current token if it has one of `types`.
 * @internal
 */
export function match(state: ParserState, ...types: TokenType[]): boolean {
  if (!check(state, ...types)) return false;
  advance(state);
  return true;
}

/**
 * Advance past a token of the expected type, or record a syntax error
 * at the current token and stay put.
 * @internal
 */
export function consume(
  state: ParserState,
  type: TokenType,
  message: string
): boolean {
  if (match(state, type)) return true;
  errorAtCurrent(state, message);
  return false;
}

/**
 * Record a syntax error covering the current token's lexeme.
 * A pending diagnostic (for example from the lexer) is kept.
 * @internal
 */
export function errorAtCurrent(state: ParserState, message: string): void {
  state.hadError = true;
  state.diagnostics.report(
    'syntax',
    state.current.span,
    message,
    state.lexer.source
  );
}

/** @internal */
export function makeSpan(
  start: SourceLocation,
  end: SourceLocation
): SourceSpan {
  return { start, end };
}
