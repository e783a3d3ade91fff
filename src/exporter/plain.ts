import { formatTaskId, sortTaskIds } from '../model/task-id.js';
import { BLOCK_DELIMITER } from '../parser/block-parser.js';
import type { TaskRecord } from '../parser/types.js';
import type { ResolvedTaskTree } from '../tree/types.js';
import { depthFirst } from '../tree/traversal.js';

/**
 * Writes the document back in task-file form: declared tasks in identifier
 * order, explicit properties only, notes unchanged. Implicit nodes are not
 * written, so they stay implicit on the next parse.
 */
export function exportPlain(tree: ResolvedTaskTree): string {
  let output = '';
  for (const node of depthFirst(tree)) {
    if (node.record) {
      output += serializeRecord(node.record);
    }
  }
  return output;
}

export function serializeRecord(record: TaskRecord): string {
  const lines = [BLOCK_DELIMITER, `task ${formatTaskId(record.id)}`];

  if (record.label !== undefined) {
    lines.push(`label ${record.label}`);
  }
  if (record.status !== undefined) {
    lines.push(`status ${record.status}`);
  }
  if (record.priority !== undefined) {
    lines.push(`priority ${record.priority}`);
  }
  if (record.deadline !== undefined) {
    lines.push(`deadline ${record.deadline}`);
  }
  if (record.depends.length > 0) {
    lines.push(`depends ${sortTaskIds(record.depends).map(formatTaskId).join(' ')}`);
  }
  lines.push(BLOCK_DELIMITER);

  // The next block's delimiter must start on its own line
  const notes = record.notes === '' || record.notes.endsWith('\n') ? record.notes : `${record.notes}\n`;
  return `${lines.join('\n')}\n${notes}`;
}
