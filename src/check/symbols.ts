/**
 * Symbol Table
 * Pass-local record of declared names and their types.
 */

import type { DeclType } from '../values.js';

/**
 * Ordered name -> declared type map.
 * A name may be declared once per pass; redeclaration is refused.
 */
export class SymbolTable {
  private readonly symbols = new Map<string, DeclType>();

  /**
   * Declare `name` with `type`.
   * @returns false, leaving the table unchanged, if the name already exists
   */
  declare(name: string, type: DeclType): boolean {
    if (this.symbols.has(name)) return false;
    this.symbols.set(name, type);
    return true;
  }

  get size(): number {
    return this.symbols.size;
  }

  /** Entries in declaration order */
  entries(): [string, DeclType][] {
    return [...this.symbols.entries()];
  }
}
