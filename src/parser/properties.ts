import type { SourcePosition } from '../diagnostics/types.js';
import { InvalidIdentifierError, InvalidValueError } from '../diagnostics/errors.js';
import { parseTaskId, uniqueTaskIds, type TaskId } from '../model/task-id.js';
import { NONE, TaskStatusSchema, type NoneSentinel, type Priority, type TaskStatus } from '../schema/index.js';
import { isIsoDate } from '../utils/date.js';

export const TASK_PROPERTIES = ['task', 'label', 'status', 'priority', 'deadline', 'depends'] as const;
export type TaskProperty = (typeof TASK_PROPERTIES)[number];

export const INCLUDE_PROPERTY = 'include';

// Keys that may appear more than once in a block; their values accumulate.
export const REPEATABLE_PROPERTIES: ReadonlySet<string> = new Set(['depends', INCLUDE_PROPERTY]);

export function isTaskProperty(key: string): key is TaskProperty {
  return TASK_PROPERTIES.some((property) => property === key);
}

// Property parsers throw a TaskFileError subclass on invalid input.

export function parseTaskProperty(value: string, position: SourcePosition): TaskId {
  const result = parseTaskId(value);
  if (!result.ok) {
    throw new InvalidIdentifierError(result.error, position);
  }
  return result.id;
}

export function parseLabelProperty(value: string, position: SourcePosition): string {
  if (!value) {
    throw new InvalidValueError('Task label cannot be empty', position);
  }
  return value;
}

export function parseStatusProperty(value: string, position: SourcePosition): TaskStatus {
  const result = TaskStatusSchema.safeParse(value.toUpperCase());
  if (!result.success) {
    throw new InvalidValueError(
      `Invalid status value '${value}' (expected one of ${TaskStatusSchema.options.join(', ')})`,
      position
    );
  }
  return result.data;
}

export function parsePriorityProperty(value: string, position: SourcePosition): Priority | NoneSentinel {
  if (value === NONE) {
    return NONE;
  }
  if (!/^[+-]?\d+$/.test(value)) {
    throw new InvalidValueError(`Priority value '${value}' must be an integer`, position);
  }
  const priority = Number.parseInt(value, 10);
  if (priority < 1 || priority > 5) {
    throw new InvalidValueError(`Priority value '${value}' not in range 1..5`, position);
  }
  return priority;
}

export function parseDeadlineProperty(value: string, position: SourcePosition): string | NoneSentinel {
  if (value === NONE) {
    return NONE;
  }
  if (!isIsoDate(value)) {
    throw new InvalidValueError(`Deadline value '${value}' not in format YYYY-MM-DD`, position);
  }
  return value;
}

export function parseDependsProperty(value: string, position: SourcePosition): TaskId[] {
  const tokens = value.split(/\s+/).filter((token) => token !== '');
  if (tokens.length === 0) {
    throw new InvalidValueError('Depends list should be left out if there are no dependent tasks', position);
  }

  const ids: TaskId[] = [];
  for (const token of tokens) {
    const result = parseTaskId(token);
    if (!result.ok) {
      throw new InvalidIdentifierError(`Issue with task ID ${token}: ${result.error}`, position);
    }
    ids.push(result.id);
  }
  return uniqueTaskIds(ids);
}

export function parseIncludeProperty(value: string, position: SourcePosition): string {
  if (!value) {
    throw new InvalidValueError('Include path cannot be empty', position);
  }
  return value;
}
