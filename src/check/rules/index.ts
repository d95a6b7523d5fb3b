/**
 * Analysis Rules Registry
 */

import type { AnalysisRule } from '../types.js';
import { DUPLICATE_DECLARATION, INITIALIZER_TYPE } from './declarations.js';

export { DUPLICATE_DECLARATION, INITIALIZER_TYPE } from './declarations.js';

/** Rules in the order they run for each node */
export const ANALYSIS_RULES: readonly AnalysisRule[] = [
  DUPLICATE_DECLARATION,
  INITIALIZER_TYPE,
];
