import type { Diagnostic, DiagnosticSummary } from './types.js';

export function hasErrors(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some((diagnostic) => diagnostic.severity === 'error');
}

export function summarizeDiagnostics(diagnostics: readonly Diagnostic[]): DiagnosticSummary {
  return {
    errors: diagnostics.filter((d) => d.severity === 'error').length,
    warnings: diagnostics.filter((d) => d.severity === 'warning').length,
  };
}

/**
 * Formats a diagnostic as `file:line: severity: message [Code]`. Diagnostics
 * without a location fall back to the task identifier they concern.
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  let location = '';
  if (diagnostic.file !== undefined) {
    location = diagnostic.line !== undefined ? `${diagnostic.file}:${diagnostic.line}: ` : `${diagnostic.file}: `;
  } else if (diagnostic.taskId !== undefined) {
    location = `task ${diagnostic.taskId}: `;
  }
  return `${location}${diagnostic.severity}: ${diagnostic.message} [${diagnostic.code}]`;
}

/**
 * Orders diagnostics by file and line; unlocated ones keep their relative
 * order at the end.
 */
export function sortDiagnostics(diagnostics: readonly Diagnostic[]): Diagnostic[] {
  return diagnostics
    .map((diagnostic, index) => ({ diagnostic, index }))
    .sort((a, b) => {
      const fileA = a.diagnostic.file;
      const fileB = b.diagnostic.file;
      if (fileA === undefined || fileB === undefined) {
        if (fileA === fileB) return a.index - b.index;
        return fileA === undefined ? 1 : -1;
      }
      if (fileA !== fileB) return fileA.localeCompare(fileB);
      const lineDiff = (a.diagnostic.line ?? 0) - (b.diagnostic.line ?? 0);
      return lineDiff !== 0 ? lineDiff : a.index - b.index;
    })
    .map(({ diagnostic }) => diagnostic);
}
