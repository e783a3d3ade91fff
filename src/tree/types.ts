import type { TaskId } from '../model/task-id.js';
import type { TaskRecord } from '../parser/types.js';
import type { TaskStatus } from '../schema/index.js';

export interface TaskNode {
  id: TaskId;
  key: string;
  parentKey: string | null;
  childKeys: string[];
  /** Null for an implicit node, synthesized only because a descendant needed it. */
  record: TaskRecord | null;
  label: string | null;
  status: TaskStatus;
  effectivePriority: number | null;
  effectiveDeadline: string | null;
}

export interface TaskTree {
  nodes: Map<string, TaskNode>;
  rootKeys: string[];
}

export type ResolvedTaskNode = Readonly<Omit<TaskNode, 'childKeys'>> & { readonly childKeys: readonly string[] };

/**
 * The tree handed to validation and the exporters, after property resolution.
 */
export interface ResolvedTaskTree {
  readonly nodes: ReadonlyMap<string, ResolvedTaskNode>;
  readonly rootKeys: readonly string[];
}
