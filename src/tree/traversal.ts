import type { ResolvedTaskNode, ResolvedTaskTree } from './types.js';

export interface VisitedNode {
  node: ResolvedTaskNode;
  depth: number;
}

/**
 * Depth-first walk in child order. `skipChildren` decides whether a node's
 * subtree is left out.
 */
export function walkTree(
  tree: ResolvedTaskTree,
  skipChildren: (node: ResolvedTaskNode) => boolean = () => false
): VisitedNode[] {
  const visited: VisitedNode[] = [];

  const visit = (keys: readonly string[], depth: number): void => {
    for (const key of keys) {
      const node = tree.nodes.get(key);
      if (!node) continue;
      visited.push({ node, depth });
      if (!skipChildren(node)) {
        visit(node.childKeys, depth + 1);
      }
    }
  };

  visit(tree.rootKeys, 0);
  return visited;
}

// Every node in identifier order.
export function depthFirst(tree: ResolvedTaskTree): ResolvedTaskNode[] {
  return walkTree(tree).map(({ node }) => node);
}

export function childNodes(tree: ResolvedTaskTree, node: ResolvedTaskNode): ResolvedTaskNode[] {
  const children: ResolvedTaskNode[] = [];
  for (const key of node.childKeys) {
    const child = tree.nodes.get(key);
    if (child) children.push(child);
  }
  return children;
}

/**
 * A node folds when it has children and every direct child is DONE.
 * Grandchildren are not looked at.
 */
export function isFoldable(tree: ResolvedTaskTree, node: ResolvedTaskNode): boolean {
  const children = childNodes(tree, node);
  return children.length > 0 && children.every((child) => child.status === 'DONE');
}

export function findFoldableKeys(tree: ResolvedTaskTree): Set<string> {
  const foldable = new Set<string>();
  for (const node of tree.nodes.values()) {
    if (isFoldable(tree, node)) foldable.add(node.key);
  }
  return foldable;
}
