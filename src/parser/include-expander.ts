import fs from 'node:fs';
import path from 'node:path';
import type { Diagnostic } from '../diagnostics/types.js';
import { CyclicIncludeError, MissingReferenceError, TaskFileError } from '../diagnostics/errors.js';
import { parseBlocks } from './block-parser.js';
import type { IncludeRecord, ParsedRecord, TaskRecord } from './types.js';

/**
 * File access used while expanding includes. `read` returns null when the
 * path does not name a readable file.
 */
export interface IncludeReader {
  resolve(baseDir: string, includePath: string): string;
  read(resolvedPath: string): string | null;
}

export const fileIncludeReader: IncludeReader = {
  resolve(baseDir, includePath) {
    return path.resolve(baseDir, includePath);
  },
  read(resolvedPath) {
    try {
      const stat = fs.statSync(resolvedPath, { throwIfNoEntry: false });
      if (!stat?.isFile()) {
        return null;
      }
      return fs.readFileSync(resolvedPath, 'utf-8');
    } catch (error) {
      // ENOTDIR, EACCES and the like: the include cannot be read
      if (isErrnoException(error)) {
        return null;
      }
      throw error;
    }
  },
};

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export interface IncludeOptions {
  /** Directory every relative include path is joined against, at any depth. */
  baseDir: string;
  /** Resolved path of the root document, when it came from a file. */
  rootPath?: string;
  reader?: IncludeReader;
}

export interface IncludeExpansion {
  records: TaskRecord[];
  diagnostics: Diagnostic[];
  /** Set when an included file had unterminated front matter; expansion stopped there. */
  halted: boolean;
}

/**
 * Replaces include records with the records of the files they name, depth
 * first and in declaration order. An included file with unterminated front
 * matter is reported and stops the expansion; diagnostics collected before it
 * are kept.
 */
export function expandIncludes(records: readonly ParsedRecord[], options: IncludeOptions): IncludeExpansion {
  const reader = options.reader ?? fileIncludeReader;
  const expanded: TaskRecord[] = [];
  const diagnostics: Diagnostic[] = [];
  let halted = false;

  const expand = (current: readonly ParsedRecord[], expanding: readonly string[]): void => {
    for (const record of current) {
      if (halted) return;
      if (record.kind === 'task') {
        expanded.push(record);
        continue;
      }

      for (const includePath of record.paths) {
        if (halted) return;
        const nested = loadInclude(record, includePath, expanding);
        if (nested) {
          expand(nested.records, [...expanding, nested.resolved]);
        }
      }
    }
  };

  const loadInclude = (
    record: IncludeRecord,
    includePath: string,
    expanding: readonly string[]
  ): { resolved: string; records: ParsedRecord[] } | null => {
    const resolved = reader.resolve(options.baseDir, includePath);

    const cycleStart = expanding.indexOf(resolved);
    if (cycleStart !== -1) {
      diagnostics.push(new CyclicIncludeError([...expanding.slice(cycleStart), resolved], record.position).toDiagnostic());
      return null;
    }

    const content = reader.read(resolved);
    if (content === null) {
      diagnostics.push(
        new MissingReferenceError(`Included file '${includePath}' not found (resolved to ${resolved})`, record.position).toDiagnostic()
      );
      return null;
    }

    try {
      const parsed = parseBlocks(content, resolved);
      diagnostics.push(...parsed.diagnostics);
      return { resolved, records: parsed.records };
    } catch (error) {
      if (error instanceof TaskFileError) {
        diagnostics.push(error.toDiagnostic());
        halted = true;
        return null;
      }
      throw error;
    }
  };

  expand(records, options.rootPath ? [options.rootPath] : []);

  return { records: expanded, diagnostics, halted };
}
