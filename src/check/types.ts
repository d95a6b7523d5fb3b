/**
 * Analysis Types
 * Context and rule shapes for the semantic analyzer.
 */

import type { Diagnostics } from '../diagnostics.js';
import type { Logger } from '../logger.js';
import type { ASTNode, NodeType } from '../types.js';
import type { SymbolTable } from './symbols.js';

/**
 * State for one analysis pass.
 * The symbol table is created fresh for every pass and discarded after it.
 */
export interface AnalysisContext {
  readonly symbols: SymbolTable;
  readonly diagnostics: Diagnostics;
  readonly logger: Logger;
  /** Set when any rule has rejected a node during this pass */
  failed: boolean;
}

/**
 * Analysis rule interface.
 * Rules record failures in the context's diagnostics and never throw.
 */
export interface AnalysisRule {
  /** Unique rule code (e.g., DUPLICATE_DECLARATION) */
  readonly code: string;

  /** Node types this rule applies to */
  readonly nodeTypes: NodeType[];

  /**
   * Check a node. Returns false when the node is rejected; later rules
   * are then skipped for the node.
   */
  check(node: ASTNode, context: AnalysisContext): boolean;
}
