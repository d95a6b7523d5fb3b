/**
 * Decla AST and Token Types
 *
 * Grammar:
 *   program     := declaration EOF
 *   declaration := varDecl
 *   varDecl     := 'let' IDENT ':' type '=' literal ';'
 *   type        := 'int' | 'float' | 'bool' | 'string' | 'null'
 *   literal     := INT | FLOAT | STRING | 'true' | 'false' | 'null'
 */

import type { DeclType, Value } from './values.js';

// ============================================================
// SOURCE LOCATION
// ============================================================

export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}

// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  // Literals
  INT: 'INT',
  FLOAT: 'FLOAT',
  STRING: 'STRING',
  TRUE: 'TRUE',
  FALSE: 'FALSE',
  NULL: 'NULL',

  // Identifiers
  IDENTIFIER: 'IDENTIFIER',

  // Keywords
  LET: 'LET',

  // Type names
  TYPE_INT: 'TYPE_INT',
  TYPE_FLOAT: 'TYPE_FLOAT',
  TYPE_BOOL: 'TYPE_BOOL',
  TYPE_STRING: 'TYPE_STRING',

  // Punctuation
  COLON: 'COLON', // :
  EQUAL: 'EQUAL', // =
  SEMICOLON: 'SEMICOLON', // ;

  // Special
  ERROR: 'ERROR', // lexical error, treated as end of input by the parser
  EOF: 'EOF',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

/** Parsed payload carried by literal tokens */
export type TokenLiteral =
  | { readonly type: 'int'; readonly value: bigint }
  | { readonly type: 'float'; readonly value: number }
  | { readonly type: 'string'; readonly value: string };

export interface Token {
  readonly type: TokenType;
  /** Source text the token was scanned from (empty for EOF) */
  readonly lexeme: string;
  readonly span: SourceSpan;
  /** Present only on INT, FLOAT and STRING tokens */
  readonly literal?: TokenLiteral | undefined;
}

// ============================================================
// AST NODE TYPES
// ============================================================

export type NodeType = 'Program' | 'VariableDeclaration' | 'Literal';

interface BaseNode {
  readonly span: SourceSpan;
}

/**
 * Root of a compilation unit.
 * The grammar admits exactly one declaration; `null` marks a unit
 * with nothing to run.
 */
export interface ProgramNode extends BaseNode {
  readonly type: 'Program';
  readonly declaration: VariableDeclarationNode | null;
}

/** let name: type = literal; */
export interface VariableDeclarationNode extends BaseNode {
  readonly type: 'VariableDeclaration';
  readonly name: string;
  /** Location of the name identifier */
  readonly nameSpan: SourceSpan;
  readonly declaredType: DeclType;
  readonly initializer: ExpressionNode;
}

export interface LiteralNode extends BaseNode {
  readonly type: 'Literal';
  readonly value: Value;
}

/** Initializer expressions. Only literals exist today. */
export type ExpressionNode = LiteralNode;

export type ASTNode = ProgramNode | VariableDeclarationNode | LiteralNode;
