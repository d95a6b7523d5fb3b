/**
 * Parser Extension: Literal Parsing
 * Initializer expressions. Only literals exist in the grammar.
 */

import { Parser } from './parser.js';
import type { ExpressionNode, LiteralNode, Token } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import {
  boolValue,
  floatValue,
  intValue,
  nullValue,
  stringValue,
  type Value,
} from '../values.js';
import { LITERAL_TOKENS } from './helpers.js';
import { advance, check, errorAtCurrent } from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseExpression(): ExpressionNode | null;
    parseLiteral(): LiteralNode | null;
  }
}

Parser.prototype.parseExpression = function (
  this: Parser
): ExpressionNode | null {
  this.state.logger.debug('Parsing expression');
  return this.parseLiteral();
};

/**
 * literal := INT | FLOAT | STRING | 'true' | 'false' | 'null'
 */
Parser.prototype.parseLiteral = function (this: Parser): LiteralNode | null {
  this.state.logger.debug('Parsing literal');
  const state = this.state;

  if (!check(state, ...LITERAL_TOKENS)) {
    errorAtCurrent(state, 'Expected literal value.');
    return null;
  }

  const token = state.current;
  const value = literalValue(token);
  if (!value) {
    state.hadError = true;
    state.diagnostics.reportAt(
      'internal',
      token.span.start,
      `Literal token ${token.type} has no payload`
    );
    return null;
  }

  advance(state);
  return { type: 'Literal', value, span: token.span };
};

/** Build the runtime value a literal token denotes */
function literalValue(token: Token): Value | null {
  switch (token.type) {
    case TOKEN_TYPES.TRUE:
      return boolValue(true);
    case TOKEN_TYPES.FALSE:
      return boolValue(false);
    case TOKEN_TYPES.NULL:
      return nullValue();
    default:
      break;
  }

  const literal = token.literal;
  if (!literal) return null;
  switch (literal.type) {
    case 'int':
      return intValue(literal.value);
    case 'float':
      return floatValue(literal.value);
    case 'string':
      return stringValue(literal.value);
  }
}
