/**
 * AST Visitor
 * Recursive traversal with enter/exit callbacks for analysis.
 */

import type { ASTNode } from '../types.js';
import type { AnalysisContext } from './types.js';

// ============================================================
// VISITOR INTERFACE
// ============================================================

/**
 * Visitor pattern interface for AST traversal.
 * Provides enter/exit callbacks invoked before and after visiting children.
 */
export interface NodeVisitor {
  /**
   * Called before visiting node's children.
   * Returning false skips the children and the exit callback.
   */
  enter(node: ASTNode, context: AnalysisContext): boolean;

  /** Called after visiting node's children. */
  exit(node: ASTNode, context: AnalysisContext): void;
}

// ============================================================
// VISITOR FUNCTION
// ============================================================

/**
 * Recursively visit AST nodes with enter/exit callbacks.
 *
 * Traversal order:
 * 1. visitor.enter(node)
 * 2. Recurse into children
 * 3. visitor.exit(node)
 */
export function visitNode(
  node: ASTNode,
  context: AnalysisContext,
  visitor: NodeVisitor
): void {
  if (!visitor.enter(node, context)) return;

  switch (node.type) {
    case 'Program':
      if (node.declaration) {
        visitNode(node.declaration, context, visitor);
      }
      break;

    case 'VariableDeclaration':
      visitNode(node.initializer, context, visitor);
      break;

    case 'Literal':
      // Leaf node - always valid on its own
      break;

    default:
      context.failed = true;
      context.diagnostics.setError(
        'internal',
        0,
        0,
        'Unknown node type in semantic analysis'
      );
      return;
  }

  visitor.exit(node, context);
}
