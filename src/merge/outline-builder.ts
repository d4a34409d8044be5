/**
 * Builds the bookmark forest from the flat, ordered entry list.
 *
 * Open ancestors are kept on a stack of `(depth, node)` pairs.  A new
 * node closes every open node at its own depth or deeper, then attaches
 * to whatever is left on top of the stack (or to the root).
 *
 * Depth skips collapse: a node that jumps from depth 0 straight to
 * depth 2 becomes a direct child of the depth-0 node, and a first entry
 * deeper than 0 becomes a root.
 */

import type { OutlineNode } from '../types.js';

interface OpenNode {
  depth: number;
  node: OutlineNode;
}

export interface OutlineInsert {
  label: string;
  depth: number;
  targetPage: number;
  entryIndex: number;
}

export class OutlineTreeBuilder {
  private readonly roots: OutlineNode[] = [];
  private readonly open: OpenNode[] = [];

  insert(item: OutlineInsert): OutlineNode {
    const node: OutlineNode = {
      label: item.label,
      targetPage: item.targetPage,
      entryIndex: item.entryIndex,
      children: [],
    };

    while (this.open.length > 0 && this.open[this.open.length - 1].depth >= item.depth) {
      this.open.pop();
    }

    const parent = this.open[this.open.length - 1];
    if (parent) {
      parent.node.children.push(node);
    } else {
      this.roots.push(node);
    }

    this.open.push({ depth: item.depth, node });
    return node;
  }

  build(): OutlineNode[] {
    return this.roots;
  }
}

/**
 * Number of nodes in a forest, descendants included.
 */
export function countOutlineNodes(nodes: OutlineNode[]): number {
  let count = 0;
  for (const node of nodes) {
    count += 1 + countOutlineNodes(node.children);
  }
  return count;
}
