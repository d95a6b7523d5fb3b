/**
 * Declaration Rules
 * Name uniqueness and initializer type compatibility.
 */

import type { ASTNode } from '../../types.js';
import type { AnalysisContext, AnalysisRule } from '../types.js';
import { isCompatible } from '../compatibility.js';

// ============================================================
// DUPLICATE_DECLARATION
// ============================================================

/**
 * A name may be declared once per pass. The grammar only admits one
 * declaration per unit today, so this cannot fire yet; it guards
 * multi-statement programs.
 */
export const DUPLICATE_DECLARATION: AnalysisRule = {
  code: 'DUPLICATE_DECLARATION',
  nodeTypes: ['VariableDeclaration'],

  check(node: ASTNode, context: AnalysisContext): boolean {
    if (node.type !== 'VariableDeclaration') return true;

    if (!context.symbols.declare(node.name, node.declaredType)) {
      context.diagnostics.reportAt(
        'name',
        node.nameSpan.start,
        'Variable already declared'
      );
      return false;
    }

    context.logger.debug(
      `Added symbol: ${node.name} (type: ${node.declaredType})`
    );
    return true;
  },
};

// ============================================================
// INITIALIZER_TYPE
// ============================================================

export const INITIALIZER_TYPE: AnalysisRule = {
  code: 'INITIALIZER_TYPE',
  nodeTypes: ['VariableDeclaration'],

  check(node: ASTNode, context: AnalysisContext): boolean {
    if (node.type !== 'VariableDeclaration') return true;

    const actual = node.initializer.value.type;
    if (isCompatible(node.declaredType, actual)) return true;

    context.diagnostics.reportAt(
      'type',
      node.initializer.span.start,
      `Type mismatch: cannot assign ${actual} to variable of type ${node.declaredType}`
    );
    return false;
  },
};
