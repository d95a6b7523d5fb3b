/**
 * Decla Runtime
 *
 * Module Structure:
 * - core/: Execution engine
 *   - types.ts: Public types (RuntimeOptions, RunOptions, ExecutionResult)
 *   - environment.ts: Name to value bindings
 *   - context.ts: Runtime context factory
 *   - interpreter.ts: Tree-walking evaluation
 *   - execute.ts: Whole-pipeline entry point
 */

// ============================================================
// PUBLIC TYPES
// ============================================================

export type {
  ExecutionResult,
  ExecutionSuccess,
  RunOptions,
  RuntimeCallbacks,
  RuntimeContext,
  RuntimeOptions,
} from './core/types.js';

// ============================================================
// EXECUTION
// ============================================================

export { createRuntimeContext } from './core/context.js';
export { Environment } from './core/environment.js';
export { Interpreter } from './core/interpreter.js';
export { assertSuccess, execute } from './core/execute.js';
