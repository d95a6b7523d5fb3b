/**
 * Type Compatibility
 */

import type { DeclType } from '../values.js';

/**
 * Whether a value of type `actual` may initialize a variable declared `declared`.
 *
 * - identical types are compatible
 * - null is compatible with every declared type
 * - int widens to float
 */
export function isCompatible(declared: DeclType, actual: DeclType): boolean {
  if (declared === actual) return true;
  if (actual === 'null') return true;
  return declared === 'float' && actual === 'int';
}
