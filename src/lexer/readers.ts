/**
 * Token Readers
 * Functions to read specific token types from source
 */

import type { Token } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { INT64_MAX } from '../values.js';
import { errorToken } from './errors.js';
import { isDigit, isIdentifierChar, makeToken } from './helpers.js';
import { KEYWORDS } from './operators.js';
import {
  advance,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
} from './state.js';

/**
 * Read a string literal. Content is copied verbatim: no escape
 * sequences, and newlines are allowed inside.
 */
export function readString(state: LexerState): Token {
  const start = currentLocation(state);
  advance(state); // consume opening "

  let value = '';
  while (!isAtEnd(state) && peek(state) !== '"') {
    value += advance(state);
  }

  if (isAtEnd(state)) {
    return errorToken(state, 'Unterminated string.', start);
  }

  advance(state); // consume closing "

  return makeToken(
    TOKEN_TYPES.STRING,
    state.source.slice(start.offset, state.pos),
    start,
    currentLocation(state),
    { type: 'string', value }
  );
}

/**
 * Read an int or float literal. Signs are not part of the grammar.
 * Ints beyond the signed 64-bit range saturate at its maximum; floats beyond
 * the double range saturate at the largest finite double.
 */
export function readNumber(state: LexerState): Token {
  const start = currentLocation(state);
  let lexeme = '';

  while (isDigit(peek(state))) {
    lexeme += advance(state);
  }

  if (peek(state) === '.' && isDigit(peek(state, 1))) {
    lexeme += advance(state); // consume .
    while (isDigit(peek(state))) {
      lexeme += advance(state);
    }
    const value = Number(lexeme);
    return makeToken(
      TOKEN_TYPES.FLOAT,
      lexeme,
      start,
      currentLocation(state),
      {
        type: 'float',
        value: Number.isFinite(value) ? value : Number.MAX_VALUE,
      }
    );
  }

  const parsed = BigInt(lexeme);
  return makeToken(TOKEN_TYPES.INT, lexeme, start, currentLocation(state), {
    type: 'int',
    value: parsed > INT64_MAX ? INT64_MAX : parsed,
  });
}

export function readIdentifier(state: LexerState): Token {
  const start = currentLocation(state);
  let lexeme = '';

  while (isIdentifierChar(peek(state))) {
    lexeme += advance(state);
  }

  const type = KEYWORDS.get(lexeme) ?? TOKEN_TYPES.IDENTIFIER;
  return makeToken(type, lexeme, start, currentLocation(state));
}
