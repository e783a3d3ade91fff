import type { ResolvedTaskTree } from '../tree/types.js';
import { depthFirst } from '../tree/traversal.js';
import { dependencyKeys, formatStatus, formatTitle } from './format.js';

const UNASSIGNED = 'Unassigned';

/**
 * Full property listing of every task, in identifier order, followed by its
 * notes.
 */
export function renderSummary(tree: ResolvedTaskTree, color: boolean): string[] {
  const lines: string[] = ['Task Summary'];

  for (const node of depthFirst(tree)) {
    const dependencies = dependencyKeys(node);

    lines.push('');
    lines.push(formatTitle(node));
    lines.push(`  Status: ${formatStatus(node.status, color)}`);
    lines.push(`  Priority: ${node.effectivePriority ?? UNASSIGNED}`);
    lines.push(`  Deadline: ${node.effectiveDeadline ?? UNASSIGNED}`);
    lines.push(`  Depends on: ${dependencies.length > 0 ? dependencies.join(', ') : 'None'}`);
    if (node.childKeys.length > 0) {
      lines.push(`  Subtasks: ${node.childKeys.join(', ')}`);
    }

    const notes = (node.record?.notes ?? '').replace(/\r/g, '').trim();
    if (notes) {
      lines.push('  Notes:');
      for (const noteLine of notes.split('\n')) {
        lines.push(noteLine.trim() ? `    ${noteLine.trimEnd()}` : '');
      }
    }
  }

  return lines;
}
