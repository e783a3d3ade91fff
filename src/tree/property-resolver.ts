import { NONE, type NoneSentinel } from '../schema/index.js';
import type { ResolvedTaskTree, TaskNode, TaskTree } from './types.js';

/**
 * Computes the effective value of an inheritable property. An explicit `none`
 * resolves to absent and cuts off whatever the ancestors declared.
 */
export function resolveInherited<T>(own: T | NoneSentinel | undefined, inherited: T | null): T | null {
  if (own === undefined) return inherited;
  if (own === NONE) return null;
  return own;
}

/**
 * Writes effective priority and deadline onto every node, parents before
 * children, then freezes the tree.
 */
export function resolveProperties(tree: TaskTree): ResolvedTaskTree {
  const visit = (node: TaskNode, parent: TaskNode | null): void => {
    node.effectivePriority = resolveInherited(node.record?.priority, parent?.effectivePriority ?? null);
    node.effectiveDeadline = resolveInherited(node.record?.deadline, parent?.effectiveDeadline ?? null);

    for (const childKey of node.childKeys) {
      const child = tree.nodes.get(childKey);
      if (child) visit(child, node);
    }
  };

  for (const rootKey of tree.rootKeys) {
    const root = tree.nodes.get(rootKey);
    if (root) visit(root, null);
  }

  for (const node of tree.nodes.values()) {
    Object.freeze(node.childKeys);
    Object.freeze(node);
  }
  Object.freeze(tree.rootKeys);

  return tree;
}
