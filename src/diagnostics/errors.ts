import type { Diagnostic, DiagnosticCode, SourcePosition } from './types.js';

/**
 * Base class for problems found in a task document. Each error maps onto a
 * single diagnostic line.
 */
export class TaskFileError extends Error {
  constructor(
    public readonly code: DiagnosticCode,
    public readonly detail: string,
    public readonly position?: SourcePosition,
    public readonly taskId?: string
  ) {
    super(position ? `${position.file}:${position.line}: ${detail}` : detail);
    this.name = code;
  }

  toDiagnostic(): Diagnostic {
    return {
      severity: 'error',
      code: this.code,
      message: this.detail,
      file: this.position?.file,
      line: this.position?.line,
      taskId: this.taskId,
    };
  }
}

export class TaskSyntaxError extends TaskFileError {
  constructor(message: string, position?: SourcePosition) {
    super('SyntaxError', message, position);
  }
}

export class UnknownPropertyError extends TaskFileError {
  constructor(
    public readonly property: string,
    position?: SourcePosition,
    message = `Unknown task property '${property}'`
  ) {
    super('UnknownPropertyError', message, position);
  }
}

export class InvalidIdentifierError extends TaskFileError {
  constructor(message: string, position?: SourcePosition, taskId?: string) {
    super('InvalidIdentifierError', message, position, taskId);
  }
}

export class InvalidValueError extends TaskFileError {
  constructor(message: string, position?: SourcePosition, taskId?: string) {
    super('InvalidValueError', message, position, taskId);
  }
}

export class MissingReferenceError extends TaskFileError {
  constructor(message: string, position?: SourcePosition, taskId?: string) {
    super('MissingReferenceError', message, position, taskId);
  }
}

export class CyclicIncludeError extends TaskFileError {
  constructor(
    public readonly chain: string[],
    position?: SourcePosition
  ) {
    super('CyclicIncludeError', `Cyclic include: ${chain.join(' -> ')}`, position);
  }
}
