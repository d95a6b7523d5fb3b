/**
 * Embedding API
 * Context-based adapter over execute() for host applications.
 */

import { Diagnostics } from './diagnostics.js';
import {
  createLogger,
  DEFAULT_LOG_LEVEL,
  type Logger,
  type LogLevel,
} from './logger.js';
import { execute } from './runtime/index.js';
import type { RuntimeCallbacks } from './runtime/index.js';
import {
  boolValue,
  floatValue,
  intValue,
  nullValue,
  stringValue,
  type Value,
} from './values.js';

// ============================================================
// HOST VALUES
// ============================================================

export type HostValue =
  | { readonly kind: 'null' }
  | { readonly kind: 'int'; readonly value: bigint }
  | { readonly kind: 'float'; readonly value: number }
  | { readonly kind: 'bool'; readonly value: boolean }
  | { readonly kind: 'string'; readonly value: string };

export function hostNull(): HostValue {
  return { kind: 'null' };
}

/** Wraps into the signed 64-bit range */
export function hostInt(value: bigint | number): HostValue {
  return { kind: 'int', value: intValue(value).value };
}

export function hostFloat(value: number): HostValue {
  return { kind: 'float', value };
}

export function hostBool(value: boolean): HostValue {
  return { kind: 'bool', value };
}

export function hostString(value: string): HostValue {
  return { kind: 'string', value };
}

export function toHostValue(value: Value): HostValue {
  switch (value.type) {
    case 'null':
      return hostNull();
    case 'int':
      return { kind: 'int', value: value.value };
    case 'float':
      return hostFloat(value.value);
    case 'bool':
      return hostBool(value.value);
    case 'string':
      return hostString(value.value);
  }
}

export function fromHostValue(host: HostValue): Value {
  switch (host.kind) {
    case 'null':
      return nullValue();
    case 'int':
      return intValue(host.value);
    case 'float':
      return floatValue(host.value);
    case 'bool':
      return boolValue(host.value);
    case 'string':
      return stringValue(host.value);
  }
}

// ============================================================
// CONTEXT
// ============================================================

export interface ContextOptions {
  /** Callbacks for host integration (interactive echo) */
  callbacks?: Partial<RuntimeCallbacks>;
  /** Logger to use instead of one created at `logLevel` */
  logger?: Logger;
}

/**
 * Execution context owned by one host.
 * Holds the diagnostic slot and the value of the last successful run;
 * bindings never carry over between runs.
 */
export class DeclaContext {
  readonly logLevel: LogLevel;
  readonly diagnostics = new Diagnostics();
  readonly logger: Logger;
  readonly callbacks: Partial<RuntimeCallbacks>;
  lastValue: Value | null = null;

  constructor(logLevel: LogLevel, options: ContextOptions = {}) {
    this.logLevel = logLevel;
    this.logger = options.logger ?? createLogger(logLevel);
    this.callbacks = options.callbacks ?? {};
  }
}

export function createContext(
  logLevel: LogLevel = DEFAULT_LOG_LEVEL,
  options: ContextOptions = {}
): DeclaContext {
  return new DeclaContext(logLevel, options);
}

function run(ctx: DeclaContext, source: string, interactive: boolean): boolean {
  ctx.diagnostics.clearError();
  const result = execute(source, {
    interactive,
    diagnostics: ctx.diagnostics,
    logger: ctx.logger,
    callbacks: ctx.callbacks,
  });
  if (!result.success) return false;
  ctx.lastValue = result.value;
  return true;
}

/** Run source without echo. A failure's diagnostic stays readable via getError. */
export function executeSource(ctx: DeclaContext, source: string): boolean {
  return run(ctx, source, false);
}

/** Run source, echoing the binding through the context's onOutput callback */
export function executeInteractive(ctx: DeclaContext, source: string): boolean {
  return run(ctx, source, true);
}

/** Message of the pending diagnostic, or null */
export function getError(ctx: DeclaContext): string | null {
  return ctx.diagnostics.current?.message ?? null;
}

/** Value bound by the last successful run, or null before any */
export function lastValue(ctx: DeclaContext): HostValue | null {
  return ctx.lastValue ? toHostValue(ctx.lastValue) : null;
}

/** Drop the context's pending diagnostic and last result */
export function freeContext(ctx: DeclaContext): void {
  ctx.diagnostics.clearError();
  ctx.lastValue = null;
}
