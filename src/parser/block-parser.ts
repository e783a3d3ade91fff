import fs from 'node:fs';
import type { Diagnostic, SourcePosition } from '../diagnostics/types.js';
import { TaskFileError, TaskSyntaxError, UnknownPropertyError } from '../diagnostics/errors.js';
import { uniqueTaskIds, type TaskId } from '../model/task-id.js';
import type { NoneSentinel, Priority, TaskStatus } from '../schema/index.js';
import type { BlockParseResult, FrontMatterLine, ParsedRecord, RawBlock, TaskRecord } from './types.js';
import {
  INCLUDE_PROPERTY,
  REPEATABLE_PROPERTIES,
  isTaskProperty,
  parseDeadlineProperty,
  parseDependsProperty,
  parseIncludeProperty,
  parseLabelProperty,
  parsePriorityProperty,
  parseStatusProperty,
  parseTaskProperty,
} from './properties.js';

export const BLOCK_DELIMITER = '---';

const PROPERTY_LINE_REGEX = /^(\S+)(?:\s+(.*))?$/;

export function isDelimiterLine(line: string): boolean {
  return line.trim() === BLOCK_DELIMITER;
}

export function parseTaskFile(filePath: string): BlockParseResult {
  const content = fs.readFileSync(filePath, 'utf-8');
  return parseBlocks(content, filePath);
}

/**
 * Parses one source text into task and include records, in source order.
 *
 * Invalid property values are collected as diagnostics and the property is
 * dropped. An unterminated front matter region throws, since nothing after it
 * can be trusted.
 */
export function parseBlocks(content: string, file: string): BlockParseResult {
  const diagnostics: Diagnostic[] = [];
  const records: ParsedRecord[] = [];

  for (const block of splitBlocks(content, file, diagnostics)) {
    const record = parseBlock(block, file, diagnostics);
    if (record) {
      records.push(record);
    }
  }

  return { records, diagnostics };
}

/**
 * Splits text into front matter + notes blocks. Notes keep their exact text,
 * line endings included.
 */
export function splitBlocks(content: string, file: string, diagnostics: Diagnostic[] = []): RawBlock[] {
  const lines = content.split('\n');
  const lastIndex = lines.length - 1;
  const rawLine = (index: number): string => (lines[index] ?? '') + (index < lastIndex ? '\n' : '');

  const blocks: RawBlock[] = [];
  let index = 0;

  // Anything before the first delimiter belongs to no task
  let strayLine: number | null = null;
  while (index < lines.length && !isDelimiterLine(lines[index] ?? '')) {
    if (strayLine === null && (lines[index] ?? '').trim() !== '') {
      strayLine = index + 1;
    }
    index++;
  }
  if (strayLine !== null) {
    diagnostics.push(warning('Ignoring content that does not belong to a task', { file, line: strayLine }));
  }

  while (index < lines.length) {
    const startLine = index + 1;
    index++;

    const properties: FrontMatterLine[] = [];
    let closed = false;
    while (index < lines.length) {
      const line = lines[index] ?? '';
      const lineNumber = index + 1;
      index++;

      if (isDelimiterLine(line)) {
        closed = true;
        break;
      }

      const trimmed = line.trim();
      if (trimmed === '') {
        diagnostics.push(warning('Blank lines are not recommended within task blocks', { file, line: lineNumber }));
        continue;
      }

      const match = trimmed.match(PROPERTY_LINE_REGEX);
      if (match?.[1]) {
        properties.push({ key: match[1], value: (match[2] ?? '').trim(), line: lineNumber });
      }
    }

    if (!closed) {
      throw new TaskSyntaxError(`Unterminated front matter: no closing '${BLOCK_DELIMITER}' line`, {
        file,
        line: startLine,
      });
    }

    let notes = '';
    while (index < lines.length && !isDelimiterLine(lines[index] ?? '')) {
      notes += rawLine(index);
      index++;
    }

    blocks.push({ startLine, properties, notes });
  }

  return blocks;
}

function parseBlock(block: RawBlock, file: string, diagnostics: Diagnostic[]): ParsedRecord | null {
  const position: SourcePosition = { file, line: block.startLine };
  const keys = new Set(block.properties.map((property) => property.key));

  if (keys.size === 1 && keys.has(INCLUDE_PROPERTY)) {
    return parseIncludeBlock(block, position, diagnostics);
  }

  return parseTaskBlock(block, position, diagnostics);
}

function parseIncludeBlock(block: RawBlock, position: SourcePosition, diagnostics: Diagnostic[]): ParsedRecord {
  const paths: string[] = [];
  for (const property of block.properties) {
    const value = collect(diagnostics, () => parseIncludeProperty(property.value, at(position, property)));
    if (value !== undefined) {
      paths.push(value);
    }
  }

  if (block.notes.trim() !== '') {
    diagnostics.push(warning('Ignoring notes after an include block', position));
  }

  return { kind: 'include', paths, position };
}

function parseTaskBlock(block: RawBlock, position: SourcePosition, diagnostics: Diagnostic[]): TaskRecord | null {
  let id: TaskId | undefined;
  let label: string | undefined;
  let status: TaskStatus | undefined;
  let priority: Priority | NoneSentinel | undefined;
  let deadline: string | NoneSentinel | undefined;
  const depends: TaskId[] = [];
  let hasTaskKey = false;

  const seen = new Set<string>();
  for (const property of block.properties) {
    const propertyPosition = at(position, property);

    if (property.key === INCLUDE_PROPERTY) {
      diagnostics.push(
        new UnknownPropertyError(
          property.key,
          propertyPosition,
          `Property '${INCLUDE_PROPERTY}' cannot be combined with task properties`
        ).toDiagnostic()
      );
      continue;
    }

    if (!isTaskProperty(property.key)) {
      diagnostics.push(new UnknownPropertyError(property.key, propertyPosition).toDiagnostic());
      continue;
    }

    if (seen.has(property.key) && !REPEATABLE_PROPERTIES.has(property.key)) {
      diagnostics.push(
        new TaskSyntaxError(`Duplicate property '${property.key}' not allowed in task block`, propertyPosition).toDiagnostic()
      );
      continue;
    }
    seen.add(property.key);

    switch (property.key) {
      case 'task':
        hasTaskKey = true;
        id = collect(diagnostics, () => parseTaskProperty(property.value, propertyPosition));
        break;
      case 'label':
        label = collect(diagnostics, () => parseLabelProperty(property.value, propertyPosition));
        break;
      case 'status':
        status = collect(diagnostics, () => parseStatusProperty(property.value, propertyPosition));
        break;
      case 'priority':
        priority = collect(diagnostics, () => parsePriorityProperty(property.value, propertyPosition));
        break;
      case 'deadline':
        deadline = collect(diagnostics, () => parseDeadlineProperty(property.value, propertyPosition));
        break;
      case 'depends':
        depends.push(...(collect(diagnostics, () => parseDependsProperty(property.value, propertyPosition)) ?? []));
        break;
    }
  }

  if (!hasTaskKey) {
    diagnostics.push(new TaskSyntaxError("Task block must have a 'task' property", position).toDiagnostic());
    return null;
  }
  if (!id) {
    // The identifier was malformed and has already been reported
    return null;
  }

  return {
    kind: 'task',
    id,
    label,
    status,
    priority,
    deadline,
    depends: uniqueTaskIds(depends),
    notes: block.notes,
    position,
  };
}

function collect<T>(diagnostics: Diagnostic[], parse: () => T): T | undefined {
  try {
    return parse();
  } catch (error) {
    if (error instanceof TaskFileError) {
      diagnostics.push(error.toDiagnostic());
      return undefined;
    }
    throw error;
  }
}

function at(position: SourcePosition, property: FrontMatterLine): SourcePosition {
  return { file: position.file, line: property.line };
}

function warning(message: string, position: SourcePosition): Diagnostic {
  return {
    severity: 'warning',
    code: 'SyntaxError',
    message,
    file: position.file,
    line: position.line,
  };
}
