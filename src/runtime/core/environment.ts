/**
 * Environment
 * Name to value bindings owned by one interpreter
 */

import { copyValue, type Value } from '../../values.js';

export class Environment {
  private readonly bindings = new Map<string, Value>();

  /**
   * Bind `name`, replacing any earlier binding. Never fails.
   * @returns true when the name was not bound before
   */
  define(name: string, value: Value): boolean {
    const isNew = !this.bindings.has(name);
    this.bindings.set(name, copyValue(value));
    return isNew;
  }

  get(name: string): Value | undefined {
    return this.bindings.get(name);
  }

  has(name: string): boolean {
    return this.bindings.has(name);
  }

  get size(): number {
    return this.bindings.size;
  }

  /** Bindings in first-definition order */
  entries(): IterableIterator<[string, Value]> {
    return this.bindings.entries();
  }

  toRecord(): Record<string, Value> {
    return Object.fromEntries(this.bindings);
  }
}
