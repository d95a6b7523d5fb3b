/**
 * Lexer Errors
 * Lexical errors are recorded as diagnostics and surface as ERROR tokens,
 * which the parser treats as end of input.
 */

import type { SourceLocation, Token } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { makeToken } from './helpers.js';
import { currentLocation, type LexerState } from './state.js';

/**
 * Record a syntax diagnostic spanning `start` to the current position
 * and return an ERROR token over the same span.
 */
export function errorToken(
  state: LexerState,
  message: string,
  start: SourceLocation
): Token {
  const end = currentLocation(state);
  state.diagnostics.report('syntax', { start, end }, message, state.source);
  return makeToken(
    TOKEN_TYPES.ERROR,
    state.source.slice(start.offset, end.offset),
    start,
    end
  );
}
