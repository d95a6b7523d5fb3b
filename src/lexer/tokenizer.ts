/**
 * Tokenizer
 * Pull-based scanning: each call to nextToken() produces one token.
 */

import type { Token } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { Diagnostics } from '../diagnostics.js';
import { errorToken } from './errors.js';
import {
  advanceAndMakeToken,
  classify,
  isSkippable,
  makeToken,
} from './helpers.js';
import { PUNCTUATION } from './operators.js';
import { readIdentifier, readNumber, readString } from './readers.js';
import {
  advance,
  createLexerState,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
} from './state.js';

function skipWhitespace(state: LexerState): void {
  while (!isAtEnd(state) && isSkippable(peek(state))) {
    advance(state);
  }
}

/**
 * Scan the next token.
 * Returns EOF at end of input, and keeps returning EOF on later calls.
 * Lexical errors are recorded in the state's diagnostics and returned
 * as an ERROR token.
 */
export function nextToken(state: LexerState): Token {
  skipWhitespace(state);

  if (isAtEnd(state)) {
    const loc = currentLocation(state);
    return makeToken(TOKEN_TYPES.EOF, '', loc, loc);
  }

  const start = currentLocation(state);
  const ch = peek(state);

  switch (classify(ch)) {
    case 'alpha':
      return readIdentifier(state);
    case 'digit':
      return readNumber(state);
    case 'quote':
      return readString(state);
    default:
      break;
  }

  const punctuation = PUNCTUATION[ch];
  if (punctuation) {
    return advanceAndMakeToken(state, 1, punctuation, ch, start);
  }

  // Report the whole code point, not half a surrogate pair
  const unexpected = String.fromCodePoint(
    state.source.codePointAt(state.pos) ?? 0
  );
  for (let i = 0; i < unexpected.length; i++) advance(state);
  return errorToken(state, `Unexpected character: '${unexpected}'`, start);
}

/**
 * Scan a whole source into tokens, ending with EOF or the first ERROR.
 * For tooling and tests; the parser pulls tokens one at a time instead.
 */
export function tokenize(
  source: string,
  diagnostics: Diagnostics = new Diagnostics()
): Token[] {
  const state = createLexerState(source, diagnostics);
  const tokens: Token[] = [];
  let token: Token;

  do {
    token = nextToken(state);
    tokens.push(token);
  } while (token.type !== TOKEN_TYPES.EOF && token.type !== TOKEN_TYPES.ERROR);

  return tokens;
}
