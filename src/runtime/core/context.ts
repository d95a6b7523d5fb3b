/**
 * Runtime Context Factory
 *
 * Creates and configures the runtime context for one interpreter.
 */

import { Diagnostics } from '../../diagnostics.js';
import { silentLogger } from '../../logger.js';
import { Environment } from './environment.js';
import type {
  RuntimeCallbacks,
  RuntimeContext,
  RuntimeOptions,
} from './types.js';

const defaultCallbacks: RuntimeCallbacks = {
  onOutput: (line) => {
    console.log(line);
  },
};

/**
 * Create a runtime context with an empty environment.
 * Callbacks not supplied fall back to writing to stdout.
 */
export function createRuntimeContext(
  options: RuntimeOptions = {}
): RuntimeContext {
  return {
    environment: new Environment(),
    diagnostics: options.diagnostics ?? new Diagnostics(),
    logger: options.logger ?? silentLogger,
    callbacks: { ...defaultCallbacks, ...options.callbacks },
    interactive: options.interactive ?? false,
  };
}
