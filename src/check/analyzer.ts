/**
 * Semantic Analyzer
 * Single pass over the AST that checks declarations against a fresh
 * symbol table.
 */

import type { Diagnostic, Diagnostics } from '../diagnostics.js';
import type { Logger } from '../logger.js';
import type { ASTNode, ProgramNode } from '../types.js';
import { ANALYSIS_RULES } from './rules/index.js';
import { SymbolTable } from './symbols.js';
import type { AnalysisContext } from './types.js';
import { visitNode, type NodeVisitor } from './visitor.js';

export type AnalysisResult =
  | { readonly success: true; readonly symbols: SymbolTable }
  | { readonly success: false; readonly diagnostic: Diagnostic };

export interface AnalyzeOptions {
  diagnostics: Diagnostics;
  logger: Logger;
}

/**
 * Type-check a parsed program.
 *
 * Succeeds only if no rule rejected a node during the pass. The first
 * rejection is the one recorded in `diagnostics`.
 *
 * @example
 * ```typescript
 * const result = analyze(ast, { diagnostics, logger });
 * if (!result.success) console.log(result.diagnostic.message);
 * ```
 */
export function analyze(
  program: ProgramNode | null,
  options: AnalyzeOptions
): AnalysisResult {
  const context: AnalysisContext = {
    symbols: new SymbolTable(),
    diagnostics: options.diagnostics,
    logger: options.logger,
    failed: false,
  };

  context.logger.debug('Starting semantic analysis');

  if (program) {
    visitNode(program, context, ruleVisitor);
  }

  if (context.failed) {
    return {
      success: false,
      diagnostic: context.diagnostics.failure('Semantic analysis'),
    };
  }
  return { success: true, symbols: context.symbols };
}

/** Runs every applicable rule on entry; stops at the first rejection */
const ruleVisitor: NodeVisitor = {
  enter(node: ASTNode, ctx: AnalysisContext): boolean {
    if (ctx.failed) return false;

    if (node.type === 'VariableDeclaration') {
      ctx.logger.debug(`Analyzing variable declaration: ${node.name}`);
    }

    for (const rule of ANALYSIS_RULES) {
      if (!rule.nodeTypes.includes(node.type)) continue;
      if (!rule.check(node, ctx)) {
        ctx.failed = true;
        return false;
      }
    }
    return true;
  },

  exit(): void {},
};
