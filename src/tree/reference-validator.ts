import type { Diagnostic } from '../diagnostics/types.js';
import { InvalidValueError, MissingReferenceError } from '../diagnostics/errors.js';
import { formatTaskId } from '../model/task-id.js';
import { depthFirst } from './traversal.js';
import type { ResolvedTaskTree } from './types.js';

/**
 * Reports every `depends` entry that names no task in the tree. Implicit
 * nodes count as existing.
 */
export function validateReferences(tree: ResolvedTaskTree): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];

  for (const node of depthFirst(tree)) {
    if (!node.record) continue;

    for (const dependency of node.record.depends) {
      const dependencyKey = formatTaskId(dependency);
      if (dependencyKey === node.key) {
        diagnostics.push(
          new InvalidValueError(`Task ${node.key} cannot depend on itself`, node.record.position, node.key).toDiagnostic()
        );
      } else if (!tree.nodes.has(dependencyKey)) {
        diagnostics.push(
          new MissingReferenceError(
            `Task ${node.key} depends on unknown task ${dependencyKey}`,
            node.record.position,
            node.key
          ).toDiagnostic()
        );
      }
    }
  }

  return diagnostics;
}
