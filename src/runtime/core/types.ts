/**
 * Runtime Types
 * Public types for runtime configuration and execution results
 */

import type { Diagnostic, Diagnostics } from '../../diagnostics.js';
import type { Logger, LogLevel } from '../../logger.js';
import type { Value } from '../../values.js';
import type { Environment } from './environment.js';

/** Callbacks for host integration */
export interface RuntimeCallbacks {
  /** Called with each echo line in interactive mode */
  onOutput: (line: string) => void;
}

/** Options for creating a runtime context */
export interface RuntimeOptions {
  /** Echo each binding as `name: type = value` */
  interactive?: boolean;
  /** Slot receiving runtime and internal errors */
  diagnostics?: Diagnostics;
  logger?: Logger;
  /** Callbacks for host integration */
  callbacks?: Partial<RuntimeCallbacks>;
}

/** Options for running one compilation unit through the whole pipeline */
export interface RunOptions extends RuntimeOptions {
  /** Level of the logger created when `logger` is not given */
  logLevel?: LogLevel;
}

export interface RuntimeContext {
  readonly environment: Environment;
  readonly diagnostics: Diagnostics;
  readonly logger: Logger;
  readonly callbacks: RuntimeCallbacks;
  readonly interactive: boolean;
}

/** Result of running a compilation unit */
export type ExecutionResult =
  | {
      readonly success: true;
      /** Value bound by the declaration (Null when there was none) */
      readonly value: Value;
      /** All bindings after the run */
      readonly variables: Record<string, Value>;
    }
  | { readonly success: false; readonly diagnostic: Diagnostic };

export type ExecutionSuccess = Extract<ExecutionResult, { success: true }>;
