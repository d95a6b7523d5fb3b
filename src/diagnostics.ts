/**
 * Diagnostics
 * Single-slot error state shared by the lexer, parser and analyzer.
 * The first recorded diagnostic wins until the slot is cleared.
 */

import type { SourceLocation, SourceSpan } from './types.js';

// ============================================================
// DIAGNOSTIC DATA
// ============================================================

export type DiagnosticKind = 'syntax' | 'type' | 'name' | 'runtime' | 'internal';

const KIND_NAMES: Record<DiagnosticKind, string> = {
  syntax: 'Syntax Error',
  type: 'Type Error',
  name: 'Name Error',
  runtime: 'Runtime Error',
  internal: 'Internal Error',
};

export interface Diagnostic {
  readonly kind: DiagnosticKind;
  readonly line: number;
  readonly column: number;
  readonly message: string;
  /** Text of the offending source line, when caret context is available */
  readonly sourceLine?: string | undefined;
  /** 0-based offset of the highlighted span within sourceLine */
  readonly position: number;
  /** Width of the highlighted span */
  readonly length: number;
}

/** Destination for rendered diagnostics */
export type DiagnosticSink = (text: string) => void;

const defaultSink: DiagnosticSink = (text) => {
  process.stderr.write(text);
};

export function kindName(kind: DiagnosticKind): string {
  return KIND_NAMES[kind];
}

// ============================================================
// DIAGNOSTIC SLOT
// ============================================================

export class Diagnostics {
  private pending: Diagnostic | null = null;
  private readonly sink: DiagnosticSink;

  constructor(sink: DiagnosticSink = defaultSink) {
    this.sink = sink;
  }

  get hasError(): boolean {
    return this.pending !== null;
  }

  /** The pending diagnostic, or null when the slot is empty */
  get current(): Diagnostic | null {
    return this.pending;
  }

  /**
   * Record a diagnostic unless one is already pending.
   * @returns true when this call filled the slot
   */
  setError(
    kind: DiagnosticKind,
    line: number,
    column: number,
    message: string,
    sourceLine?: string,
    position = 0,
    length = 0
  ): boolean {
    if (this.pending) return false;
    this.pending = {
      kind,
      line,
      column,
      message,
      sourceLine,
      position,
      length,
    };
    return true;
  }

  /**
   * Record a diagnostic covering `span`, attaching the source line that
   * contains the span start for caret rendering.
   */
  report(
    kind: DiagnosticKind,
    span: SourceSpan,
    message: string,
    source: string
  ): boolean {
    const lineText = sourceLineAt(source, span.start.line);
    const position = Math.min(span.start.column - 1, lineText.length);
    const length =
      span.start.line === span.end.line
        ? span.end.column - span.start.column
        : lineText.length - position;
    return this.setError(
      kind,
      span.start.line,
      span.start.column,
      message,
      lineText,
      position,
      length
    );
  }

  /** Record a diagnostic with a location but no source context */
  reportAt(
    kind: DiagnosticKind,
    location: SourceLocation,
    message: string
  ): boolean {
    return this.setError(kind, location.line, location.column, message);
  }

  /**
   * The diagnostic explaining a failed stage. A stage that fails without
   * recording one is a defect, reported as an internal error.
   */
  failure(stage: string): Diagnostic {
    if (!this.pending) {
      this.pending = {
        kind: 'internal',
        line: 0,
        column: 0,
        message: `${stage} failed without a diagnostic`,
        position: 0,
        length: 0,
      };
    }
    return this.pending;
  }

  /** Render the pending diagnostic, or an empty string if none */
  formatError(): string {
    return this.pending ? formatDiagnostic(this.pending) : '';
  }

  /** Write the pending diagnostic to the sink */
  printError(): void {
    if (!this.pending) return;
    this.sink(`${formatDiagnostic(this.pending)}\n`);
  }

  clearError(): void {
    this.pending = null;
  }
}

// ============================================================
// RENDERING
// ============================================================

/**
 * Render a diagnostic.
 *
 * ```
 * Syntax Error at line 1, column 17: Unterminated string.
 * let s: string = "abc
 *                 ^^^^
 * ```
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  const lines = [
    `${kindName(diagnostic.kind)} at line ${diagnostic.line}, column ${diagnostic.column}: ${diagnostic.message}`,
  ];
  if (diagnostic.sourceLine !== undefined) {
    lines.push(diagnostic.sourceLine);
    lines.push(renderCaretUnderline(diagnostic.position, diagnostic.length));
  }
  return lines.join('\n');
}

/** Spaces up to the span, then at least one caret */
export function renderCaretUnderline(position: number, length: number): string {
  return ' '.repeat(Math.max(0, position)) + '^'.repeat(Math.max(1, length));
}

function sourceLineAt(source: string, line: number): string {
  const text = source.split('\n')[line - 1] ?? '';
  return text.endsWith('\r') ? text.slice(0, -1) : text;
}

// ============================================================
// ERROR CLASS
// ============================================================

/**
 * Exception form of a diagnostic, for hosts that prefer throwing.
 * The message carries an ` at line:column` suffix; `toData()` strips it.
 */
export class DeclaError extends Error {
  readonly diagnostic: Diagnostic;

  constructor(diagnostic: Diagnostic) {
    super(`${diagnostic.message} at ${diagnostic.line}:${diagnostic.column}`);
    this.name = 'DeclaError';
    this.diagnostic = diagnostic;
  }

  get kind(): DiagnosticKind {
    return this.diagnostic.kind;
  }

  /** Get structured error data for custom formatting */
  toData(): Diagnostic {
    return this.diagnostic;
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: Diagnostic) => string): string {
    if (formatter) return formatter(this.toData());
    return formatDiagnostic(this.diagnostic);
  }
}
