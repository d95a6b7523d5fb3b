/**
 * AST Dump
 * Renders a parsed program as YAML for debug logging.
 */

import { stringify } from 'yaml';
import type { ASTNode } from '../types.js';
import type { Value } from '../values.js';

type Plain =
  | string
  | number
  | boolean
  | null
  | readonly Plain[]
  | { readonly [key: string]: Plain };

/**
 * Render an AST node and its children as YAML.
 *
 * @example
 * ```typescript
 * formatAst(ast);
 * // type: Program
 * // declaration:
 * //   type: VariableDeclaration
 * //   name: x
 * //   ...
 * ```
 */
export function formatAst(node: ASTNode): string {
  return stringify(toPlain(node));
}

function toPlain(node: ASTNode): Plain {
  switch (node.type) {
    case 'Program':
      return {
        type: node.type,
        declaration: node.declaration ? toPlain(node.declaration) : null,
      };
    case 'VariableDeclaration':
      return {
        type: node.type,
        name: node.name,
        declaredType: node.declaredType,
        initializer: toPlain(node.initializer),
      };
    case 'Literal':
      return {
        type: node.type,
        valueType: node.value.type,
        value: plainValue(node.value),
      };
  }
}

/** Ints outside the safe integer range are dumped as decimal strings */
function plainValue(value: Value): Plain {
  switch (value.type) {
    case 'null':
      return null;
    case 'int':
      return Number.isSafeInteger(Number(value.value))
        ? Number(value.value)
        : value.value.toString();
    case 'float':
    case 'bool':
    case 'string':
      return value.value;
  }
}
