/**
 * Decla Module
 * Exports lexer, parser, analyzer, runtime, embedding API and AST types
 */

export { tokenize, formatToken } from './lexer/index.js';
export {
  parse,
  formatAst,
  type ParseOptions,
  type ParseResult,
} from './parser/index.js';
export {
  analyze,
  isCompatible,
  SymbolTable,
  type AnalysisResult,
  type AnalyzeOptions,
} from './check/index.js';
export {
  assertSuccess,
  createRuntimeContext,
  Environment,
  execute,
  Interpreter,
  type ExecutionResult,
  type ExecutionSuccess,
  type RunOptions,
  type RuntimeCallbacks,
  type RuntimeContext,
  type RuntimeOptions,
} from './runtime/index.js';
export {
  DeclaError,
  Diagnostics,
  formatDiagnostic,
  renderCaretUnderline,
  type Diagnostic,
  type DiagnosticKind,
  type DiagnosticSink,
} from './diagnostics.js';
export {
  createLogger,
  DEFAULT_LOG_LEVEL,
  LOG_LEVELS,
  silentLogger,
  type Logger,
  type LogLevel,
  type LogSink,
} from './logger.js';
export {
  ConfigError,
  createDefaultConfig,
  loadConfig,
  parseConfig,
  type DeclaConfig,
} from './config.js';
export {
  createContext,
  DeclaContext,
  executeInteractive,
  executeSource,
  fromHostValue,
  freeContext,
  getError,
  hostBool,
  hostFloat,
  hostInt,
  hostNull,
  hostString,
  lastValue,
  toHostValue,
  type ContextOptions,
  type HostValue,
} from './embed.js';
export {
  boolValue,
  copyValue,
  DECL_TYPES,
  floatValue,
  formatValue,
  intValue,
  nullValue,
  stringValue,
  typeName,
  valuesEqual,
  type DeclType,
  type Value,
} from './values.js';
export {
  TOKEN_TYPES,
  type ASTNode,
  type LiteralNode,
  type ProgramNode,
  type SourceLocation,
  type SourceSpan,
  type Token,
  type TokenType,
  type VariableDeclarationNode,
} from './types.js';
