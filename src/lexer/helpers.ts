/**
 * Lexer Helper Functions
 * Character classification and token construction
 */

import type {
  SourceLocation,
  Token,
  TokenLiteral,
  TokenType,
} from '../types.js';
import { advance, currentLocation, type LexerState } from './state.js';

// ============================================================
// CHARACTER CLASSES
// ============================================================

export type CharClass =
  | 'whitespace'
  | 'alpha'
  | 'digit'
  | 'quote'
  | 'newline'
  | 'end'
  | 'other';

/** ASCII classification table, indexed by char code */
const CHAR_CLASSES: readonly CharClass[] = buildCharClasses();

function buildCharClasses(): CharClass[] {
  const table = new Array<CharClass>(128).fill('other');
  for (const ch of [' ', '\t', '\v', '\f', '\r']) {
    table[ch.charCodeAt(0)] = 'whitespace';
  }
  for (let code = 0x61; code <= 0x7a; code++) table[code] = 'alpha'; // a-z
  for (let code = 0x41; code <= 0x5a; code++) table[code] = 'alpha'; // A-Z
  table['_'.charCodeAt(0)] = 'alpha';
  for (let code = 0x30; code <= 0x39; code++) table[code] = 'digit'; // 0-9
  table['"'.charCodeAt(0)] = 'quote';
  table['\n'.charCodeAt(0)] = 'newline';
  return table;
}

/** Classify a single character; the empty string marks end of input */
export function classify(ch: string): CharClass {
  if (ch === '') return 'end';
  return CHAR_CLASSES[ch.charCodeAt(0)] ?? 'other';
}

export function isDigit(ch: string): boolean {
  return classify(ch) === 'digit';
}

export function isIdentifierChar(ch: string): boolean {
  const cls = classify(ch);
  return cls === 'alpha' || cls === 'digit';
}

/** Whitespace and newlines both separate tokens */
export function isSkippable(ch: string): boolean {
  const cls = classify(ch);
  return cls === 'whitespace' || cls === 'newline';
}

// ============================================================
// TOKEN CONSTRUCTION
// ============================================================

export function makeToken(
  type: TokenType,
  lexeme: string,
  start: SourceLocation,
  end: SourceLocation,
  literal?: TokenLiteral
): Token {
  return literal
    ? { type, lexeme, span: { start, end }, literal }
    : { type, lexeme, span: { start, end } };
}

/** Advance n times and return a token */
export function advanceAndMakeToken(
  state: LexerState,
  n: number,
  type: TokenType,
  lexeme: string,
  start: SourceLocation
): Token {
  for (let i = 0; i < n; i++) advance(state);
  return makeToken(type, lexeme, start, currentLocation(state));
}

/** Debug rendering: Token: INT, Line: 1, Column: 14, Lexeme: '42' */
export function formatToken(token: Token): string {
  const { line, column } = token.span.start;
  return `Token: ${token.type}, Line: ${line}, Column: ${column}, Lexeme: '${token.lexeme}'`;
}
