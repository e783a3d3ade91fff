import type { Diagnostic } from '../diagnostics/types.js';
import { InvalidIdentifierError } from '../diagnostics/errors.js';
import { ancestorTaskIds, compareTaskIds, formatTaskId, parentTaskId, type TaskId } from '../model/task-id.js';
import type { TaskRecord } from '../parser/types.js';
import type { TaskNode, TaskTree } from './types.js';

export interface TreeBuildResult {
  tree: TaskTree;
  diagnostics: Diagnostic[];
}

export function buildTaskTree(records: readonly TaskRecord[]): TreeBuildResult {
  const nodes = new Map<string, TaskNode>();
  const diagnostics: Diagnostic[] = [];

  for (const record of records) {
    const key = formatTaskId(record.id);
    const existing = nodes.get(key);

    if (existing?.record) {
      const first = existing.record.position;
      diagnostics.push(
        new InvalidIdentifierError(
          `Duplicate task identifier '${key}' (first declared at ${first.file}:${first.line})`,
          record.position,
          key
        ).toDiagnostic()
      );
      continue;
    }

    if (existing) {
      // A descendant declared earlier already synthesized this node
      existing.record = record;
      existing.label = record.label ?? null;
      existing.status = record.status ?? 'TODO';
    } else {
      nodes.set(key, createNode(record.id, record));
    }

    for (const ancestor of ancestorTaskIds(record.id)) {
      const ancestorKey = formatTaskId(ancestor);
      if (nodes.has(ancestorKey)) break;
      nodes.set(ancestorKey, createNode(ancestor, null));
    }
  }

  // Second pass: child lists, built once every node exists
  const rootKeys: string[] = [];
  for (const node of nodes.values()) {
    if (node.parentKey === null) {
      rootKeys.push(node.key);
      continue;
    }
    nodes.get(node.parentKey)?.childKeys.push(node.key);
  }

  const byId = (a: string, b: string): number => compareTaskIds(idOf(nodes, a), idOf(nodes, b));
  rootKeys.sort(byId);
  for (const node of nodes.values()) {
    node.childKeys.sort(byId);
  }

  return { tree: { nodes, rootKeys }, diagnostics };
}

function createNode(id: TaskId, record: TaskRecord | null): TaskNode {
  const parent = parentTaskId(id);
  return {
    id,
    key: formatTaskId(id),
    parentKey: parent ? formatTaskId(parent) : null,
    childKeys: [],
    record,
    label: record?.label ?? null,
    status: record?.status ?? 'TODO',
    effectivePriority: null,
    effectiveDeadline: null,
  };
}

function idOf(nodes: Map<string, TaskNode>, key: string): TaskId {
  return nodes.get(key)?.id ?? [];
}
