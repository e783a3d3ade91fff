import path from 'node:path';
import type { Diagnostic } from './diagnostics/types.js';
import { TaskFileError, TaskSyntaxError } from './diagnostics/errors.js';
import { hasErrors, sortDiagnostics } from './diagnostics/format.js';
import { EXPORTERS } from './exporter/index.js';
import { parseBlocks } from './parser/block-parser.js';
import { expandIncludes, type IncludeReader } from './parser/include-expander.js';
import type { TaskRecord } from './parser/types.js';
import { ExportOptionsSchema, type ExporterName, type ExportOptionsInput } from './schema/index.js';
import { buildTaskTree } from './tree/tree-builder.js';
import { resolveProperties } from './tree/property-resolver.js';
import { validateReferences } from './tree/reference-validator.js';
import type { ResolvedTaskTree } from './tree/types.js';

export const STDIN_LABEL = '<stdin>';

export interface DocumentSource {
  content: string;
  /** Path of the root document; absent when it was read from standard input. */
  file?: string;
  /** Directory include paths are resolved against. Defaults to the file's directory, or the cwd. */
  baseDir?: string;
}

export interface LoadResult {
  tree: ResolvedTaskTree | null;
  diagnostics: Diagnostic[];
}

export interface RenderResult {
  report: string;
  diagnostics: Diagnostic[];
  ok: boolean;
}

/**
 * Parses, expands includes, builds and resolves the task tree, and validates
 * references. Every stage runs to completion so that one call reports as many
 * problems as possible; only an unterminated block stops early.
 */
export function loadTaskTree(source: DocumentSource, reader?: IncludeReader): LoadResult {
  const label = source.file ?? STDIN_LABEL;
  const rootPath = source.file !== undefined ? path.resolve(source.file) : undefined;
  const baseDir = source.baseDir ?? (rootPath !== undefined ? path.dirname(rootPath) : process.cwd());
  const diagnostics: Diagnostic[] = [];

  let records: TaskRecord[];
  try {
    const parsed = parseBlocks(source.content, label);
    diagnostics.push(...parsed.diagnostics);
    const expanded = expandIncludes(parsed.records, { baseDir, rootPath, reader });
    diagnostics.push(...expanded.diagnostics);
    if (expanded.halted) {
      return { tree: null, diagnostics: sortDiagnostics(diagnostics) };
    }
    records = expanded.records;
  } catch (error) {
    if (error instanceof TaskFileError) {
      diagnostics.push(error.toDiagnostic());
      return { tree: null, diagnostics: sortDiagnostics(diagnostics) };
    }
    throw error;
  }

  if (records.length === 0) {
    diagnostics.push(new TaskSyntaxError('Task file cannot be empty', { file: label, line: 1 }).toDiagnostic());
  }

  const built = buildTaskTree(records);
  diagnostics.push(...built.diagnostics);
  const tree = resolveProperties(built.tree);
  diagnostics.push(...validateReferences(tree));

  return { tree, diagnostics: sortDiagnostics(diagnostics) };
}

/**
 * Runs the whole pipeline and renders one report. The report is empty when
 * any error was found.
 */
export function renderReport(
  source: DocumentSource,
  exporter: ExporterName,
  options: ExportOptionsInput = {},
  reader?: IncludeReader
): RenderResult {
  const exportOptions = ExportOptionsSchema.parse(options);
  const { tree, diagnostics } = loadTaskTree(source, reader);

  if (!tree || hasErrors(diagnostics)) {
    return { report: '', diagnostics, ok: false };
  }

  return { report: EXPORTERS[exporter](tree, exportOptions), diagnostics, ok: true };
}
