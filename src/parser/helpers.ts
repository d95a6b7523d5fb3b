/**
 * Parser Helpers
 * Token-to-type tables used by the declaration and literal parsers
 * @internal This module contains internal parser utilities
 */

import type { TokenType } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import type { DeclType } from '../values.js';

/**
 * Tokens accepted in type position.
 * `null` is a single keyword that names both the type and the literal.
 * @internal
 */
export const TYPE_TOKENS: ReadonlyMap<TokenType, DeclType> = new Map<
  TokenType,
  DeclType
>([
  [TOKEN_TYPES.TYPE_INT, 'int'],
  [TOKEN_TYPES.TYPE_FLOAT, 'float'],
  [TOKEN_TYPES.TYPE_BOOL, 'bool'],
  [TOKEN_TYPES.TYPE_STRING, 'string'],
  [TOKEN_TYPES.NULL, 'null'],
]);

/** @internal */
export const LITERAL_TOKENS: readonly TokenType[] = [
  TOKEN_TYPES.INT,
  TOKEN_TYPES.FLOAT,
  TOKEN_TYPES.STRING,
  TOKEN_TYPES.TRUE,
  TOKEN_TYPES.FALSE,
  TOKEN_TYPES.NULL,
];
