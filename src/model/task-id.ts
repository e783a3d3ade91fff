/**
 * Dotted task identifiers such as `1.1.2`.
 *
 * An identifier is kept as its list of positive integer segments; the dotted
 * string form doubles as the key of the task tree.
 */

export type TaskId = readonly number[];

export type TaskIdParseResult = { ok: true; id: TaskId } | { ok: false; error: string };

const SEGMENT_REGEX = /^\d+$/;

export function parseTaskId(text: string): TaskIdParseResult {
  if (text.trim() === '') {
    return { ok: false, error: 'Task ID cannot be empty' };
  }

  const segments: number[] = [];
  for (const part of text.trim().split('.')) {
    if (!SEGMENT_REGEX.test(part)) {
      return { ok: false, error: `Task ID part '${part}' must be an integer` };
    }
    const value = Number.parseInt(part, 10);
    if (value <= 0) {
      return { ok: false, error: `Task ID part '${part}' must be positive` };
    }
    if (!Number.isSafeInteger(value)) {
      return { ok: false, error: `Task ID part '${part}' is too large` };
    }
    segments.push(value);
  }

  return { ok: true, id: segments };
}

export function formatTaskId(id: TaskId): string {
  return id.join('.');
}

/**
 * Returns the parent identifier, or null for a root-level task.
 */
export function parentTaskId(id: TaskId): TaskId | null {
  return id.length > 1 ? id.slice(0, -1) : null;
}

export function ancestorTaskIds(id: TaskId): TaskId[] {
  const ancestors: TaskId[] = [];
  let parent = parentTaskId(id);
  while (parent) {
    ancestors.push(parent);
    parent = parentTaskId(parent);
  }
  return ancestors;
}

/**
 * Segment-wise numeric comparison, so `1.2` sorts before `1.10` and a parent
 * sorts before its children.
 */
export function compareTaskIds(a: TaskId, b: TaskId): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return a.length - b.length;
}

export function sortTaskIds(ids: Iterable<TaskId>): TaskId[] {
  return [...ids].sort(compareTaskIds);
}

/**
 * Collapses duplicate identifiers, keeping the first occurrence.
 */
export function uniqueTaskIds(ids: Iterable<TaskId>): TaskId[] {
  const seen = new Set<string>();
  const result: TaskId[] = [];
  for (const id of ids) {
    const key = formatTaskId(id);
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(id);
  }
  return result;
}
