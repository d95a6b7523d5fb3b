/**
 * Decla Lexer
 */

export { nextToken, tokenize } from './tokenizer.js';
export { createLexerState, type LexerState } from './state.js';
export { classify, formatToken, type CharClass } from './helpers.js';
export { KEYWORDS } from './operators.js';
