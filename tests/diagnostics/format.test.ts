import { describe, it, expect } from 'vitest';
import { formatDiagnostic, hasErrors, sortDiagnostics, summarizeDiagnostics } from '../../src/diagnostics/format.js';
import { CyclicIncludeError, InvalidValueError } from '../../src/diagnostics/errors.js';
import type { Diagnostic } from '../../src/diagnostics/types.js';

describe('formatDiagnostic', () => {
  it('leads with the location', () => {
    expect(
      formatDiagnostic({ severity: 'error', code: 'InvalidValueError', message: 'Bad value', file: 'a.md', line: 3 })
    ).toBe('a.md:3: error: Bad value [InvalidValueError]');
  });

  it('falls back to the task identifier', () => {
    expect(
      formatDiagnostic({ severity: 'warning', code: 'SyntaxError', message: 'Odd', taskId: '1.2' })
    ).toBe('task 1.2: warning: Odd [SyntaxError]');
  });
});

describe('TaskFileError', () => {
  it('prefixes the message with the position but not the diagnostic', () => {
    const error = new InvalidValueError('Bad priority', { file: 'a.md', line: 7 }, '2');

    expect(error.message).toBe('a.md:7: Bad priority');
    expect(error.name).toBe('InvalidValueError');
    expect(error.toDiagnostic()).toEqual({
      severity: 'error',
      code: 'InvalidValueError',
      message: 'Bad priority',
      file: 'a.md',
      line: 7,
      taskId: '2',
    });
  });

  it('describes include cycles', () => {
    expect(new CyclicIncludeError(['a.md', 'b.md', 'a.md']).message).toBe('Cyclic include: a.md -> b.md -> a.md');
  });
});

describe('diagnostic lists', () => {
  const diagnostics: Diagnostic[] = [
    { severity: 'warning', code: 'SyntaxError', message: 'late', file: 'b.md', line: 1 },
    { severity: 'error', code: 'SyntaxError', message: 'unlocated' },
    { severity: 'error', code: 'SyntaxError', message: 'second', file: 'a.md', line: 9 },
    { severity: 'error', code: 'SyntaxError', message: 'first', file: 'a.md', line: 2 },
  ];

  it('sorts by file and line with unlocated ones last', () => {
    expect(sortDiagnostics(diagnostics).map((d) => d.message)).toEqual(['first', 'second', 'late', 'unlocated']);
  });

  it('counts errors and warnings', () => {
    expect(summarizeDiagnostics(diagnostics)).toEqual({ errors: 3, warnings: 1 });
    expect(hasErrors(diagnostics.slice(0, 1))).toBe(false);
    expect(hasErrors(diagnostics)).toBe(true);
  });
});
