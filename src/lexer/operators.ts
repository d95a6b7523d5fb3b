/**
 * Keyword and Punctuation Lookup Tables
 */

import type { TokenType } from '../types.js';
import { TOKEN_TYPES } from '../types.js';

/** Single-character punctuation lookup table */
export const PUNCTUATION: Readonly<Record<string, TokenType>> = {
  ':': TOKEN_TYPES.COLON,
  '=': TOKEN_TYPES.EQUAL,
  ';': TOKEN_TYPES.SEMICOLON,
};

/** Keyword lookup table */
export const KEYWORDS: ReadonlyMap<string, TokenType> = new Map<
  string,
  TokenType
>([
  ['let', TOKEN_TYPES.LET],
  ['true', TOKEN_TYPES.TRUE],
  ['false', TOKEN_TYPES.FALSE],
  ['null', TOKEN_TYPES.NULL],
  ['int', TOKEN_TYPES.TYPE_INT],
  ['float', TOKEN_TYPES.TYPE_FLOAT],
  ['bool', TOKEN_TYPES.TYPE_BOOL],
  ['string', TOKEN_TYPES.TYPE_STRING],
]);
