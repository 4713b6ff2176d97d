// Structured diagnostics with error codes and spans

import type { Position, Span } from '../types.js';

export enum DiagnosticSeverity {
  Error = 'error',
}

export enum DiagnosticCode {
  // Pipeline configuration errors (E001-E099)
  E001_UnknownPass = 'E001',
  E002_DuplicatePass = 'E002',
}

export interface Diagnostic {
  readonly severity: DiagnosticSeverity;
  readonly code: DiagnosticCode;
  readonly message: string;
  readonly span: Span;
  readonly help?: string;
}

export class DiagnosticError extends Error {
  public readonly diagnostic: Diagnostic;

  constructor(diagnostic: Diagnostic) {
    super(diagnostic.message);
    this.diagnostic = diagnostic;
    this.name = 'DiagnosticError';
  }
}

export class DiagnosticBuilder {
  private severity: DiagnosticSeverity = DiagnosticSeverity.Error;
  private code: DiagnosticCode | null = null;
  private message: string | null = null;
  private readonly span: Span = { start: dummyPosition(), end: dummyPosition() };
  private help: string | null = null;

  static error(code: DiagnosticCode): DiagnosticBuilder {
    return new DiagnosticBuilder().withSeverity(DiagnosticSeverity.Error).withCode(code);
  }

  withSeverity(severity: DiagnosticSeverity): DiagnosticBuilder {
    this.severity = severity;
    return this;
  }

  withCode(code: DiagnosticCode): DiagnosticBuilder {
    this.code = code;
    return this;
  }

  withMessage(message: string): DiagnosticBuilder {
    this.message = message;
    return this;
  }

  withHelp(help: string): DiagnosticBuilder {
    this.help = help;
    return this;
  }

  build(): Diagnostic {
    if (this.code === null) throw new Error('Diagnostic code is required');
    if (this.message === null) throw new Error('Diagnostic message is required');

    return {
      severity: this.severity,
      code: this.code,
      message: this.message,
      span: this.span,
      ...(this.help !== null ? { help: this.help } : {}),
    };
  }

  throw(): never {
    throw new DiagnosticError(this.build());
  }
}

// Common diagnostic patterns
export const Diagnostics = {
  unknownPass: (name: string, known: readonly string[]): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.E001_UnknownPass)
      .withMessage(`Unknown elaboration pass '${name}'`)
      .withHelp(`Known passes: ${known.join(', ')}`),

  duplicatePass: (name: string): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.E002_DuplicatePass)
      .withMessage(`Elaboration pass '${name}' is listed more than once`),
};

// Utility to format diagnostics for display
export function formatDiagnostic(diagnostic: Diagnostic): string {
  const { severity, code, message, span } = diagnostic;
  const pos = `${span.start.line}:${span.start.col}`;

  let result = `${severity} ${code}: ${message} at ${pos}`;
  if (diagnostic.help !== undefined) {
    result += `\n  help: ${diagnostic.help}`;
  }
  return result;
}

// Utility to create a dummy position for diagnostics without source location
export function dummyPosition(): Position {
  return { line: 1, col: 1 };
}
