// Structured diagnostics with error codes and spans

import type { Position, Span } from '../types.js';

export enum DiagnosticSeverity {
  Error = 'error',
  Warning = 'warning',
  Info = 'info',
  Hint = 'hint',
}

export enum DiagnosticCode {
  // Label resolution (LBL001-LBL099)
  LBL001_NotConfigured = 'LBL001',
  LBL002_InvalidReference = 'LBL002',
  LBL003_LabelFileReadFailed = 'LBL003',

  // Layer manifest (LBL101-LBL199)
  LBL101_LayerManifestInvalid = 'LBL101',
  LBL102_LayerManifestNotFound = 'LBL102',
}

export interface Diagnostic {
  readonly severity: DiagnosticSeverity;
  readonly code: DiagnosticCode;
  readonly message: string;
  readonly span: Span;
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
  private code?: DiagnosticCode;
  private message?: string;
  private span?: Span;

  static error(code: DiagnosticCode): DiagnosticBuilder {
    return new DiagnosticBuilder().withSeverity(DiagnosticSeverity.Error).withCode(code);
  }

  static warning(code: DiagnosticCode): DiagnosticBuilder {
    return new DiagnosticBuilder().withSeverity(DiagnosticSeverity.Warning).withCode(code);
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

  withSpan(span: Span): DiagnosticBuilder {
    this.span = span;
    return this;
  }

  withPosition(pos: Position): DiagnosticBuilder {
    this.span = { start: pos, end: pos };
    return this;
  }

  build(): Diagnostic {
    if (!this.code) throw new Error('Diagnostic code is required');
    if (!this.message) throw new Error('Diagnostic message is required');
    if (!this.span) throw new Error('Diagnostic span is required');

    return {
      severity: this.severity,
      code: this.code,
      message: this.message,
      span: this.span,
    };
  }
}

// Common diagnostic patterns
export const Diagnostics = {
  notConfigured: (detail: string): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.LBL001_NotConfigured)
      .withMessage(`Label packages directory is not configured: ${detail}`)
      .withPosition(dummyPosition()),

  invalidReference: (reference: string): DiagnosticBuilder =>
    DiagnosticBuilder.warning(DiagnosticCode.LBL002_InvalidReference)
      .withMessage(`Invalid label reference '${reference}', expected @LabelFileId:LabelId`)
      .withSpan({
        start: { line: 1, col: 1 },
        end: { line: 1, col: reference.length + 1 },
      }),

  labelFileReadFailed: (filePath: string, reason: string): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.LBL003_LabelFileReadFailed)
      .withMessage(`Failed to read label file ${filePath}: ${reason}`)
      .withPosition(dummyPosition()),
};

export function isDiagnosticArray(value: unknown): value is Diagnostic[] {
  return (
    Array.isArray(value) &&
    value.length > 0 &&
    typeof value[0] === 'object' &&
    value[0] !== null &&
    'severity' in value[0] &&
    'code' in value[0]
  );
}

// Utility to create a dummy position for diagnostics without source location
export function dummyPosition(): Position {
  return { line: 1, col: 1 };
}
