// Structured diagnostics with error codes and source positions

import type { Position } from '../types.js';

export enum DiagnosticSeverity {
  Error = 'error',
  Warning = 'warning',
}

export enum DiagnosticCode {
  // Concrete-parser and structural errors (P001-P099)
  P001_SyntaxError = 'P001',
  P002_UnsupportedFeature = 'P002',
  P003_UnnamedFunctionStatement = 'P003',
  P004_InvalidForInTarget = 'P004',
  P005_InvalidForOfTarget = 'P005',
  P006_InvalidRegExpFlag = 'P006',
  P007_InvalidNumberLiteral = 'P007',
  P008_StringContinuation = 'P008',
  P009_ReservedWord = 'P009',
  P010_AccessorUnsupported = 'P010',
  P011_ExpectedToken = 'P011',

  // Type syntax (T001-T099)
  T001_TypeSyntaxNotEnabled = 'T001',
  T002_JsDocInlineConflict = 'T002',

  // Documentation comments (J001-J099)
  J001_BadTypeAnnotation = 'J001',
  J002_ExtraTag = 'J002',
  J003_SuspiciousComment = 'J003',
  J004_MisplacedTypeAnnotation = 'J004',
  J005_MisplacedFunctionAnnotation = 'J005',

  // Semantic validation (S001-S099)
  S001_InvalidAssignmentTarget = 'S001',
  S002_InvalidUpdateTarget = 'S002',
  S003_InvalidUpdateOperand = 'S003',
  S004_InvalidDeleteOperand = 'S004',
  S005_DuplicateParameter = 'S005',
  S006_DuplicateLabel = 'S006',
  S007_UnlabeledBreak = 'S007',
  S008_UnexpectedContinue = 'S008',
  S009_UnexpectedLabeledContinue = 'S009',
  S010_UnexpectedReturn = 'S010',
  S011_UndefinedLabel = 'S011',
  S012_StrictOctalLiteral = 'S012',
  S013_OctalEscape = 'S013',

  // Language mode gating (F001-F099)
  F001_Es6Feature = 'F001',
  F002_EsNextFeature = 'F002',
  F003_Es3PropertyName = 'F003',
  F004_BinaryLiteral = 'F004',
  F005_OctalLiteral = 'F005',

  // Configuration files (C001-C099)
  C001_ConfigReadError = 'C001',
  C002_ConfigSchemaViolation = 'C002',

  // Unclassified (G001-G099)
  G001_GenericError = 'G001',
  G002_GenericWarning = 'G002',
}

export interface Diagnostic {
  readonly severity: DiagnosticSeverity;
  readonly code: DiagnosticCode;
  readonly message: string;
  readonly position: Position;
  readonly sourceName: string;
}

export class DiagnosticError extends Error {
  public readonly diagnostic: Diagnostic;

  constructor(diagnostic: Diagnostic) {
    super(diagnostic.message);
    this.diagnostic = diagnostic;
    this.name = 'DiagnosticError';
  }

  get position(): Position {
    return this.diagnostic.position;
  }
}

export class DiagnosticBuilder {
  private severity: DiagnosticSeverity = DiagnosticSeverity.Error;
  private code?: DiagnosticCode;
  private message?: string;
  private position?: Position;
  private sourceName = '';

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

  withPosition(position: Position): DiagnosticBuilder {
    this.position = position;
    return this;
  }

  withSource(sourceName: string): DiagnosticBuilder {
    this.sourceName = sourceName;
    return this;
  }

  build(): Diagnostic {
    if (!this.code) throw new Error('Diagnostic code is required');
    if (!this.message) throw new Error('Diagnostic message is required');
    if (!this.position) throw new Error('Diagnostic position is required');

    return {
      severity: this.severity,
      code: this.code,
      message: this.message,
      position: this.position,
      sourceName: this.sourceName,
    };
  }

  throw(): never {
    throw new DiagnosticError(this.build());
  }
}

export type UpdateOperation = 'increment' | 'decrement';

const GETTER_SETTER_TAIL =
  'are not supported in older versions of JavaScript. ' +
  'If you are targeting newer versions of JavaScript, ' +
  'set the appropriate language_in option.';

// Common diagnostic patterns
export const Diagnostics = {
  syntaxError: (message: string, pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.P001_SyntaxError).withMessage(message).withPosition(pos),

  unsupportedFeature: (feature: string, pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.P002_UnsupportedFeature)
      .withMessage(`unsupported language feature: ${feature}`)
      .withPosition(pos),

  unnamedFunctionStatement: (pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.P003_UnnamedFunctionStatement)
      .withMessage('unnamed function statement')
      .withPosition(pos),

  invalidForInTarget: (pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.P004_InvalidForInTarget)
      .withMessage('Invalid LHS for a for-in loop')
      .withPosition(pos),

  invalidForOfTarget: (pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.P005_InvalidForOfTarget)
      .withMessage('Invalid LHS for a for-of loop')
      .withPosition(pos),

  invalidRegExpFlag: (flag: string, pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.P006_InvalidRegExpFlag)
      .withMessage(`Invalid RegExp flag '${flag}'`)
      .withPosition(pos),

  invalidNumberLiteral: (pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.P007_InvalidNumberLiteral)
      .withMessage('Invalid number literal.')
      .withPosition(pos),

  stringContinuationError: (pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.P008_StringContinuation)
      .withMessage('String continuations are not supported in this language mode.')
      .withPosition(pos),

  stringContinuationWarning: (pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.warning(DiagnosticCode.P008_StringContinuation)
      .withMessage('String continuations are not recommended.')
      .withPosition(pos),

  reservedWord: (pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.P009_ReservedWord)
      .withMessage('identifier is a reserved word')
      .withPosition(pos),

  getterUnsupported: (pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.P010_AccessorUnsupported)
      .withMessage(`getters ${GETTER_SETTER_TAIL}`)
      .withPosition(pos),

  setterUnsupported: (pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.P010_AccessorUnsupported)
      .withMessage(`setters ${GETTER_SETTER_TAIL}`)
      .withPosition(pos),

  expectedToken: (token: string, pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.P011_ExpectedToken)
      .withMessage(`'${token}' expected`)
      .withPosition(pos),

  // Type syntax
  typeSyntaxNotEnabled: (pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.warning(DiagnosticCode.T001_TypeSyntaxNotEnabled)
      .withMessage('support for type syntax is not enabled')
      .withPosition(pos),

  jsDocInlineConflict: (pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.T002_JsDocInlineConflict)
      .withMessage('Bad type syntax - can only have JSDoc or inline type annotations, not both')
      .withPosition(pos),

  // Documentation comments
  badTypeAnnotation: (detail: string, pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.warning(DiagnosticCode.J001_BadTypeAnnotation)
      .withMessage(`Bad type annotation. ${detail}`)
      .withPosition(pos),

  extraTag: (tag: string, pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.warning(DiagnosticCode.J002_ExtraTag)
      .withMessage(`extra @${tag} tag`)
      .withPosition(pos),

  suspiciousComment: (pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.warning(DiagnosticCode.J003_SuspiciousComment)
      .withMessage("Non-JSDoc comment has annotations. Did you mean to start it with '/**'?")
      .withPosition(pos),

  misplacedTypeAnnotation: (pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.warning(DiagnosticCode.J004_MisplacedTypeAnnotation)
      .withMessage('Type annotations are not allowed here. Are you missing parentheses?')
      .withPosition(pos),

  misplacedFunctionAnnotation: (pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.warning(DiagnosticCode.J005_MisplacedFunctionAnnotation)
      .withMessage('This JSDoc is not attached to a function node. Are you missing parentheses?')
      .withPosition(pos),

  // Semantic validation
  invalidAssignmentTarget: (pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.S001_InvalidAssignmentTarget)
      .withMessage('invalid assignment target')
      .withPosition(pos),

  invalidUpdateTarget: (op: UpdateOperation, pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.S002_InvalidUpdateTarget)
      .withMessage(`invalid ${op} target`)
      .withPosition(pos),

  invalidUpdateOperand: (op: UpdateOperation, pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.S003_InvalidUpdateOperand)
      .withMessage(`Invalid ${op} operand`)
      .withPosition(pos),

  invalidDeleteOperand: (pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.S004_InvalidDeleteOperand)
      .withMessage('Invalid delete operand. Only properties can be deleted.')
      .withPosition(pos),

  duplicateParameter: (name: string, pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.warning(DiagnosticCode.S005_DuplicateParameter)
      .withMessage(`Duplicate parameter name "${name}"`)
      .withPosition(pos),

  duplicateLabel: (name: string, pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.S006_DuplicateLabel)
      .withMessage(`Duplicate label "${name}"`)
      .withPosition(pos),

  unlabeledBreak: (pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.S007_UnlabeledBreak)
      .withMessage('unlabelled break must be inside loop or switch')
      .withPosition(pos),

  unexpectedContinue: (pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.S008_UnexpectedContinue)
      .withMessage('continue must be inside loop')
      .withPosition(pos),

  unexpectedLabeledContinue: (pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.S009_UnexpectedLabeledContinue)
      .withMessage('continue can only use labeles of iteration statements')
      .withPosition(pos),

  unexpectedReturn: (pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.S010_UnexpectedReturn)
      .withMessage('return must be inside function')
      .withPosition(pos),

  undefinedLabel: (name: string, pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.S011_UndefinedLabel)
      .withMessage(`undefined label "${name}"`)
      .withPosition(pos),

  strictOctalLiteral: (pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.warning(DiagnosticCode.S012_StrictOctalLiteral)
      .withMessage('Octal integer literals are not supported in Ecmascript 5 strict mode.')
      .withPosition(pos),

  octalEscape: (pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.warning(DiagnosticCode.S013_OctalEscape)
      .withMessage('Octal literals in strings are not supported in this language mode.')
      .withPosition(pos),

  // Language mode gating
  es6Feature: (feature: string, pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.warning(DiagnosticCode.F001_Es6Feature)
      .withMessage(`this language feature is only supported in es6 mode: ${feature}`)
      .withPosition(pos),

  esNextFeature: (feature: string, pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.warning(DiagnosticCode.F002_EsNextFeature)
      .withMessage(`this language feature is only supported in es_next mode: ${feature}`)
      .withPosition(pos),

  es3PropertyName: (pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.warning(DiagnosticCode.F003_Es3PropertyName)
      .withMessage(
        'Keywords and reserved words are not allowed as unquoted property ' +
          'names in older versions of JavaScript. ' +
          'If you are targeting newer versions of JavaScript, ' +
          'set the appropriate language_in option.'
      )
      .withPosition(pos),

  binaryLiteral: (pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.warning(DiagnosticCode.F004_BinaryLiteral)
      .withMessage('Binary integer literals are not supported in this language mode.')
      .withPosition(pos),

  octalLiteral: (pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.warning(DiagnosticCode.F005_OctalLiteral)
      .withMessage('Octal integer literals are not supported in this language mode.')
      .withPosition(pos),

  // Configuration
  configReadError: (message: string, pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.C001_ConfigReadError).withMessage(message).withPosition(pos),

  configSchemaViolation: (message: string, pos: Position): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.C002_ConfigSchemaViolation)
      .withMessage(message)
      .withPosition(pos),
};

// Utility to format diagnostics for display
export function formatDiagnostic(diagnostic: Diagnostic, source?: string): string {
  const { severity, code, message, position, sourceName } = diagnostic;
  const where = `${sourceName ? `${sourceName}:` : ''}${position.line}:${position.column}`;

  let result = `${severity} ${code}: ${message} at ${where}`;

  if (source) {
    const lines = source.split(/\r\n|\r|\n/);
    const line = lines[position.line - 1];
    if (line !== undefined) {
      const width = Math.max(1, Math.min(position.length, line.length - position.column));
      result += `\n> ${position.line}| ${line}`;
      result += `\n> ${' '.repeat(String(position.line).length)}  ${' '.repeat(position.column)}${'^'.repeat(width)}`;
    }
  }

  return result;
}

// Utility to create a position for diagnostics without source location
export function dummyPosition(): Position {
  return { line: 1, column: 0, length: 0, offset: 0 };
}
