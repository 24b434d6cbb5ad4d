import { TEXT_NODE_TAG, type DocumentNode, type FlatToken } from './document.js';

/**
 * Document-order (pre-order) flattening of the whole tree, root included.
 * Every element and text node appears exactly once.
 */
export function flattenDocument(root: DocumentNode): FlatToken[] {
  const tokens: FlatToken[] = [];
  const stack: Array<{ node: DocumentNode; depth: number }> = [{ node: root, depth: 0 }];

  while (stack.length > 0) {
    const entry = stack.pop();
    if (!entry) break;
    const { node, depth } = entry;
    tokens.push({ node, tag: node.tag, depth, index: tokens.length });

    for (let i = node.children.length - 1; i >= 0; i -= 1) {
      stack.push({ node: node.children[i], depth: depth + 1 });
    }
  }

  return tokens;
}

/**
 * Collect descendants with the given tag. A matching node is returned as a
 * whole; its own descendants are not searched. The root is never a match.
 */
export function getNodes(root: DocumentNode, tag: string): DocumentNode[] {
  const result: DocumentNode[] = [];
  for (const child of root.children) {
    if (child.tag === tag) {
      result.push(child);
    } else {
      result.push(...getNodes(child, tag));
    }
  }
  return result;
}

export const getTextNodes = (root: DocumentNode): DocumentNode[] => getNodes(root, TEXT_NODE_TAG);
