/**
 * Interpreter
 * Tree-walking evaluation of a checked program.
 */

import type {
  ASTNode,
  LiteralNode,
  ProgramNode,
  VariableDeclarationNode,
} from '../../types.js';
import {
  copyValue,
  formatValue,
  nullValue,
  typeName,
  type Value,
} from '../../values.js';
import { createRuntimeContext } from './context.js';
import type { Environment } from './environment.js';
import type { RuntimeContext, RuntimeOptions } from './types.js';

/**
 * Evaluates programs against its own environment.
 *
 * Values are bound as they are. A `null` initializer stays Null-tagged
 * whatever the declared type.
 *
 * @example
 * ```typescript
 * const interpreter = new Interpreter({ interactive: true });
 * interpreter.interpret(ast); // prints "x: int = 42"
 * interpreter.environment.get('x'); // { type: 'int', value: 42n }
 * ```
 */
export class Interpreter {
  readonly context: RuntimeContext;

  constructor(options: RuntimeOptions = {}) {
    this.context = createRuntimeContext(options);
  }

  get environment(): Environment {
    return this.context.environment;
  }

  /** Evaluate a program. An absent program evaluates to Null. */
  interpret(program: ProgramNode | null): Value {
    this.context.logger.debug('Starting interpretation');
    if (!program) return nullValue();
    return this.evaluate(program);
  }

  private evaluate(node: ASTNode): Value {
    switch (node.type) {
      case 'Program':
        return node.declaration
          ? this.evaluateDeclaration(node.declaration)
          : nullValue();
      case 'VariableDeclaration':
        return this.evaluateDeclaration(node);
      case 'Literal':
        return this.evaluateLiteral(node);
      default:
        this.context.diagnostics.setError(
          'internal',
          0,
          0,
          'Unknown node type in interpreter'
        );
        return nullValue();
    }
  }

  private evaluateDeclaration(node: VariableDeclarationNode): Value {
    const { environment, logger, callbacks } = this.context;
    logger.debug(`Evaluating variable declaration: ${node.name}`);

    const value = this.evaluate(node.initializer);
    if (environment.define(node.name, value)) {
      logger.debug(`Defined variable: ${node.name}`);
    }

    if (this.context.interactive) {
      callbacks.onOutput(
        `${node.name}: ${typeName(node.declaredType)} = ${formatValue(value)}`
      );
    }
    return value;
  }

  private evaluateLiteral(node: LiteralNode): Value {
    this.context.logger.debug('Evaluating literal');
    return copyValue(node.value);
  }
}
