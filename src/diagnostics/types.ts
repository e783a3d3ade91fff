export type Severity = 'error' | 'warning';

export type DiagnosticCode =
  | 'SyntaxError'
  | 'UnknownPropertyError'
  | 'InvalidIdentifierError'
  | 'InvalidValueError'
  | 'MissingReferenceError'
  | 'CyclicIncludeError';

export interface SourcePosition {
  file: string;
  line: number;
}

export interface Diagnostic {
  severity: Severity;
  code: DiagnosticCode;
  message: string;
  file?: string;
  line?: number;
  taskId?: string;
}

export interface DiagnosticSummary {
  errors: number;
  warnings: number;
}
