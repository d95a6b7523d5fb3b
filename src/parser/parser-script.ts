/**
 * Parser Extension: Program Parsing
 * Program, declarations, and type names
 */

import { Parser } from './parser.js';
import type { ProgramNode, VariableDeclarationNode } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import type { DeclType } from '../values.js';
import { TYPE_TOKENS } from './helpers.js';
import { advance, check, consume, errorAtCurrent, makeSpan } from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseProgram(): ProgramNode | null;
    parseDeclaration(): VariableDeclarationNode | null;
    parseVariableDeclaration(): VariableDeclarationNode | null;
    parseTypeName(): DeclType | null;
  }
}

// ============================================================
// PROGRAM
// ============================================================

/**
 * program := declaration EOF
 *
 * Exactly one declaration per compilation unit. Anything after it is
 * a syntax error.
 */
Parser.prototype.parseProgram = function (this: Parser): ProgramNode | null {
  this.state.logger.debug('Starting parsing');
  const start = this.state.current.span.start;

  const declaration = this.parseDeclaration();
  if (!declaration) return null;

  if (!check(this.state, TOKEN_TYPES.EOF)) {
    errorAtCurrent(this.state, 'Expected end of file.');
    return null;
  }

  return {
    type: 'Program',
    declaration,
    span: makeSpan(start, declaration.span.end),
  };
};

// ============================================================
// DECLARATIONS
// ============================================================

Parser.prototype.parseDeclaration = function (
  this: Parser
): VariableDeclarationNode | null {
  this.state.logger.debug('Parsing declaration');
  return this.parseVariableDeclaration();
};

/**
 * varDecl := 'let' IDENT ':' type '=' literal ';'
 */
Parser.prototype.parseVariableDeclaration = function (
  this: Parser
): VariableDeclarationNode | null {
  this.state.logger.debug('Parsing variable declaration');
  const state = this.state;

  if (!consume(state, TOKEN_TYPES.LET, "Expected 'let' keyword.")) {
    return null;
  }
  const start = state.previous.span.start;

  if (!consume(state, TOKEN_TYPES.IDENTIFIER, 'Expected variable name.')) {
    return null;
  }
  const nameToken = state.previous;

  if (
    !consume(state, TOKEN_TYPES.COLON, "Expected ':' after variable name.")
  ) {
    return null;
  }

  const declaredType = this.parseTypeName();
  if (!declaredType) return null;

  if (!consume(state, TOKEN_TYPES.EQUAL, "Expected '=' after type.")) {
    return null;
  }

  const initializer = this.parseExpression();
  if (!initializer) return null;

  if (
    !consume(
      state,
      TOKEN_TYPES.SEMICOLON,
      "Expected ';' after variable declaration."
    )
  ) {
    return null;
  }

  return {
    type: 'VariableDeclaration',
    name: nameToken.lexeme,
    nameSpan: nameToken.span,
    declaredType,
    initializer,
    span: makeSpan(start, state.previous.span.end),
  };
};

/**
 * type := 'int' | 'float' | 'bool' | 'string' | 'null'
 */
Parser.prototype.parseTypeName = function (this: Parser): DeclType | null {
  const declared = TYPE_TOKENS.get(this.state.current.type);
  if (declared === undefined) {
    errorAtCurrent(
      this.state,
      'Expected type (int, float, bool, string, or null).'
    );
    return null;
  }
  advance(this.state);
  return declared;
};
