/**
 * Decla Semantic Analysis
 */

export { analyze, type AnalysisResult, type AnalyzeOptions } from './analyzer.js';
export { isCompatible } from './compatibility.js';
export { SymbolTable } from './symbols.js';
export { visitNode, type NodeVisitor } from './visitor.js';
export type { AnalysisContext, AnalysisRule } from './types.js';
export {
  ANALYSIS_RULES,
  DUPLICATE_DECLARATION,
  INITIALIZER_TYPE,
} from './rules/index.js';
