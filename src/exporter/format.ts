/**
 * Shared text formatting for the report exporters
 */

import { formatTaskId, sortTaskIds } from '../model/task-id.js';
import type { TaskStatus } from '../schema/index.js';
import type { ResolvedTaskNode, ResolvedTaskTree } from '../tree/types.js';
import { paint, type AnsiColor } from '../utils/ansi.js';

const STATUS_STYLES: Record<TaskStatus, { marker: string; color: AnsiColor }> = {
  TODO: { marker: '[ ]', color: 'red' },
  'IN-PROGRESS': { marker: '[~]', color: 'yellow' },
  BLOCKED: { marker: '[!]', color: 'magenta' },
  DONE: { marker: '[x]', color: 'green' },
};

export function formatStatus(status: TaskStatus, color: boolean): string {
  const style = STATUS_STYLES[status];
  return paint(style.color, `${style.marker} ${status}`, color);
}

// Identifier followed by the label, when there is one
export function formatTitle(node: ResolvedTaskNode): string {
  return node.label ? `${node.key} ${node.label}` : node.key;
}

export function dependencyKeys(node: ResolvedTaskNode): string[] {
  return sortTaskIds(node.record?.depends ?? []).map(formatTaskId);
}

/**
 * Dependencies that are not DONE yet, in identifier order.
 */
export function openDependencyKeys(tree: ResolvedTaskTree, node: ResolvedTaskNode): string[] {
  return dependencyKeys(node).filter((key) => tree.nodes.get(key)?.status !== 'DONE');
}

export function joinLines(lines: readonly string[]): string {
  return `${lines.join('\n')}\n`;
}
