import type { ExportOptions } from '../schema/index.js';
import type { ResolvedTaskNode, ResolvedTaskTree } from '../tree/types.js';
import { findFoldableKeys, walkTree } from '../tree/traversal.js';
import { dependencyKeys, formatStatus, formatTitle, joinLines, openDependencyKeys } from './format.js';
import { renderSummary } from './summary.js';

/**
 * Table of contents: one indented entry per task, in child order. With `fold`,
 * the subtree of a task whose direct children are all DONE is left out.
 */
export function renderTableOfContents(tree: ResolvedTaskTree, options: ExportOptions): string[] {
  const foldable = options.fold ? findFoldableKeys(tree) : new Set<string>();
  const lines: string[] = ['Table of Contents'];

  for (const { node, depth } of walkTree(tree, (candidate) => foldable.has(candidate.key))) {
    lines.push(`${'  '.repeat(depth)}${formatTitle(node)}: ${formatShortLine(tree, node, options.color)}`);
  }

  return lines;
}

export function formatShortLine(tree: ResolvedTaskTree, node: ResolvedTaskNode, color: boolean): string {
  const status = formatStatus(node.status, color);
  let line = status;

  switch (node.status) {
    case 'BLOCKED': {
      const blockers = openDependencyKeys(tree, node);
      if (blockers.length > 0) {
        line = `${status} on ${blockers.join(', ')}`;
      }
      break;
    }
    case 'TODO':
      if (node.effectiveDeadline) {
        line = `${status} by ${node.effectiveDeadline}`;
      }
      break;
    case 'IN-PROGRESS':
      if (node.effectiveDeadline) {
        line = `${status} due by ${node.effectiveDeadline}`;
      }
      break;
    case 'DONE':
      break;
  }

  const details: string[] = [];
  if (node.status !== 'DONE' && node.effectivePriority !== null) {
    details.push(`priority ${node.effectivePriority}`);
  }
  const dependencies = dependencyKeys(node);
  if (node.status !== 'BLOCKED' && dependencies.length > 0) {
    const done = dependencies.filter((key) => tree.nodes.get(key)?.status === 'DONE').length;
    details.push(`${done}/${dependencies.length} dependencies done`);
  }

  return details.length > 0 ? `${line} (${details.join(', ')})` : line;
}

export function exportSimple(tree: ResolvedTaskTree, options: ExportOptions): string {
  const lines = renderTableOfContents(tree, options);
  if (options.summary) {
    lines.push('', ...renderSummary(tree, options.color));
  }
  return joinLines(lines);
}
