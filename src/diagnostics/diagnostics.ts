// Structured diagnostics with error codes, spans, and a collecting sink

import type { SourceLocation, Span } from '../types.js';
import { pointSpan } from '../frontend/location.js';

export enum DiagnosticSeverity {
  Error = 'error',
  Warning = 'warning',
  Info = 'info',
}

export enum DiagnosticCode {
  // Lexer errors (L001-L099)
  L001_UnexpectedCharacter = 'L001',
  L002_UnterminatedString = 'L002',

  // Parser errors (P001-P099)
  P001_ExpectedExpression = 'P001',
  P002_ExpectedToken = 'P002',
  P003_ExpectedIdentifier = 'P003',
  P004_ExpectedType = 'P004',
  P005_UnknownType = 'P005',
  P006_InvalidAssignmentTarget = 'P006',
  P007_UnsupportedStatement = 'P007',

  // Semantic errors (S001-S099)
  S001_UndefinedVariable = 'S001',
  S002_UndefinedFunction = 'S002',
  S003_TypeMismatch = 'S003',
  S004_InvalidOperation = 'S004',
  S005_DuplicateDeclaration = 'S005',
  S006_ArityMismatch = 'S006',
  S007_ReturnOutsideFunction = 'S007',
  S008_NonBooleanCondition = 'S008',
  S009_AssignToConstant = 'S009',
  S010_MisplacedFunction = 'S010',
  S011_FunctionAsValue = 'S011',
  S012_InvalidValue = 'S012',

  // Lowering errors (G001-G099)
  G001_UnresolvedVariable = 'G001',
  G002_UnresolvedFunction = 'G002',
  G003_OperandFailure = 'G003',
  G004_MissingReturn = 'G004',
}

export interface Diagnostic {
  readonly severity: DiagnosticSeverity;
  readonly code: DiagnosticCode;
  readonly message: string;
  readonly span: Span;
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

  withLocation(loc: SourceLocation): DiagnosticBuilder {
    this.span = pointSpan(loc);
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

/**
 * 诊断收集器。
 *
 * 每个阶段的入口显式接收一个 sink，不存在进程级的全局日志/诊断状态。
 */
export class DiagnosticSink {
  private readonly diagnostics: Diagnostic[] = [];

  report(diagnostic: Diagnostic | DiagnosticBuilder): this {
    this.diagnostics.push(diagnostic instanceof DiagnosticBuilder ? diagnostic.build() : diagnostic);
    return this;
  }

  getDiagnostics(): Diagnostic[] {
    return [...this.diagnostics];
  }

  hasErrors(): boolean {
    return this.diagnostics.some(diag => diag.severity === DiagnosticSeverity.Error);
  }

  errorCount(): number {
    return this.diagnostics.filter(diag => diag.severity === DiagnosticSeverity.Error).length;
  }

  get size(): number {
    return this.diagnostics.length;
  }
}

// Common diagnostic patterns
export const Diagnostics = {
  unexpectedCharacter: (message: string, loc: SourceLocation): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.L001_UnexpectedCharacter)
      .withMessage(`Lexical error: ${message}`)
      .withLocation(loc),

  unterminatedString: (loc: SourceLocation): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.L002_UnterminatedString)
      .withMessage('Lexical error: Unterminated string')
      .withLocation(loc),

  expectedExpression: (loc: SourceLocation): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.P001_ExpectedExpression)
      .withMessage('Expect expression.')
      .withLocation(loc),

  expectedToken: (message: string, loc: SourceLocation): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.P002_ExpectedToken).withMessage(message).withLocation(loc),

  expectedIdentifier: (message: string, loc: SourceLocation): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.P003_ExpectedIdentifier).withMessage(message).withLocation(loc),

  expectedType: (loc: SourceLocation): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.P004_ExpectedType)
      .withMessage('Expect type name.')
      .withLocation(loc),

  unknownType: (name: string, loc: SourceLocation): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.P005_UnknownType)
      .withMessage(`Unknown type: ${name}`)
      .withLocation(loc),

  unsupportedStatement: (keyword: string, loc: SourceLocation): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.P007_UnsupportedStatement)
      .withMessage(`Unsupported statement: ${keyword}`)
      .withLocation(loc),

  invalidAssignmentTarget: (loc: SourceLocation): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.P006_InvalidAssignmentTarget)
      .withMessage('Invalid assignment target')
      .withLocation(loc),

  undefinedVariable: (name: string, loc: SourceLocation): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.S001_UndefinedVariable)
      .withMessage(`Undefined variable: ${name}`)
      .withLocation(loc),

  undefinedFunction: (name: string, loc: SourceLocation): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.S002_UndefinedFunction)
      .withMessage(`Undefined function: ${name}`)
      .withLocation(loc),

  typeMismatch: (message: string, loc: SourceLocation): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.S003_TypeMismatch).withMessage(message).withLocation(loc),

  invalidOperation: (message: string, loc: SourceLocation): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.S004_InvalidOperation).withMessage(message).withLocation(loc),

  alreadyDeclared: (what: 'Variable' | 'Function' | 'Parameter', name: string, loc: SourceLocation): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.S005_DuplicateDeclaration)
      .withMessage(`${what} already declared: ${name}`)
      .withLocation(loc),

  arityMismatch: (name: string, expected: number, actual: number, loc: SourceLocation): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.S006_ArityMismatch)
      .withMessage(`Function ${name} expects ${expected} arguments, got ${actual}`)
      .withLocation(loc),

  returnOutsideFunction: (loc: SourceLocation): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.S007_ReturnOutsideFunction)
      .withMessage('Return statement outside function')
      .withLocation(loc),

  nonBooleanCondition: (construct: 'If' | 'While', loc: SourceLocation): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.S008_NonBooleanCondition)
      .withMessage(`${construct} condition must be boolean`)
      .withLocation(loc),

  assignToConstant: (name: string, loc: SourceLocation): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.S009_AssignToConstant)
      .withMessage(`Cannot assign to constant: ${name}`)
      .withLocation(loc),

  misplacedFunction: (name: string, loc: SourceLocation): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.S010_MisplacedFunction)
      .withMessage(`Nested function declarations are not supported: ${name}`)
      .withLocation(loc),

  functionAsValue: (name: string, loc: SourceLocation): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.S011_FunctionAsValue)
      .withMessage(`Function ${name} cannot be used as a value`)
      .withLocation(loc),

  invalidValue: (message: string, loc: SourceLocation): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.S012_InvalidValue).withMessage(message).withLocation(loc),

  // Lowering errors
  unresolvedVariable: (name: string, loc: SourceLocation): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.G001_UnresolvedVariable)
      .withMessage(`Undefined variable: ${name}`)
      .withLocation(loc),

  unresolvedFunction: (name: string, loc: SourceLocation): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.G002_UnresolvedFunction)
      .withMessage(`Undefined function: ${name}`)
      .withLocation(loc),

  operandFailure: (what: string, loc: SourceLocation): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.G003_OperandFailure)
      .withMessage(`Failed to generate ${what}`)
      .withLocation(loc),

  missingReturn: (name: string, loc: SourceLocation): DiagnosticBuilder =>
    DiagnosticBuilder.warning(DiagnosticCode.G004_MissingReturn)
      .withMessage(`Function ${name} may reach end without returning a value`)
      .withLocation(loc),
};

// Utility to format diagnostics for display
export function formatDiagnostic(diagnostic: Diagnostic, source?: string): string {
  const { severity, code, message, span } = diagnostic;
  const pos = `${span.start.line}:${span.start.column}`;

  let result = `${severity} ${code}: ${message} at ${pos}`;

  if (source) {
    const lines = source.split(/\r?\n/);
    const line = lines[span.start.line - 1];
    if (line) {
      result += `\n> ${span.start.line}| ${line}`;
      result += `\n> ${' '.repeat(String(span.start.line).length)}  ${' '.repeat(span.start.column - 1)}^`;
    }
  }

  return result;
}
