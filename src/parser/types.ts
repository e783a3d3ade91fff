import type { Diagnostic, SourcePosition } from '../diagnostics/types.js';
import type { TaskId } from '../model/task-id.js';
import type { NoneSentinel, Priority, TaskStatus } from '../schema/index.js';

/**
 * One task block as declared in the document. Only explicitly written
 * properties are present; `none` is kept as the sentinel itself.
 */
export interface TaskRecord {
  readonly kind: 'task';
  readonly id: TaskId;
  readonly label?: string;
  readonly status?: TaskStatus;
  readonly priority?: Priority | NoneSentinel;
  readonly deadline?: string | NoneSentinel;
  readonly depends: readonly TaskId[];
  readonly notes: string;
  readonly position: SourcePosition;
}

export interface IncludeRecord {
  readonly kind: 'include';
  readonly paths: readonly string[];
  readonly position: SourcePosition;
}

export type ParsedRecord = TaskRecord | IncludeRecord;

export interface FrontMatterLine {
  key: string;
  value: string;
  line: number;
}

export interface RawBlock {
  startLine: number;
  properties: FrontMatterLine[];
  notes: string;
}

export interface BlockParseResult {
  records: ParsedRecord[];
  diagnostics: Diagnostic[];
}
