import type { MaskMode } from './puppetModel';
import type { NodeTree } from './nodeTree';

export interface DrawOrderEntry {
  node: number;
  /** Own zsort plus every ancestor's. */
  zsort: number;
  preorder: number;
}

export type DrawPlanGroup =
  | { kind: 'part'; node: number }
  | { kind: 'masked'; mode: MaskMode; maskSource: number; maskedParts: number[] };

/** zsort accumulated from the root down, per arena index. */
export const computeEffectiveZSort = (tree: NodeTree): Float64Array => {
  const out = new Float64Array(tree.size);
  tree.preorder().forEach((index) => {
    const node = tree.nodes[index];
    out[index] = node.parent === null ? node.zsort : out[node.parent] + node.zsort;
  });
  return out;
};

const compareEntries = (a: DrawOrderEntry, b: DrawOrderEntry): number => (
  a.zsort - b.zsort || a.preorder - b.preorder
);

/**
 * Every Part and Mask node ordered by effective zsort ascending, ties broken
 * by pre-order position. Pre-order positions are unique, so the order is total.
 */
export const sortDrawables = (tree: NodeTree): DrawOrderEntry[] => {
  const zsorts = computeEffectiveZSort(tree);
  return tree.preorder()
    .filter((index) => tree.nodes[index].kind !== 'composite')
    .map((index) => ({ node: index, zsort: zsorts[index], preorder: tree.preorderIndex(index) }))
    .sort(compareEntries);
};

/**
 * Groups the sorted drawables for compositing. A mask group takes the slot of
 * its first masked part; the mask source itself is only drawn inside its group.
 */
export const resolveDrawOrder = (tree: NodeTree): DrawPlanGroup[] => {
  const sorted = sortDrawables(tree);
  const maskOf = new Map<number, number>();
  tree.nodes.forEach((node, index) => {
    if (node.kind === 'mask') {
      node.maskedParts.forEach((part) => maskOf.set(part, index));
    }
  });

  const groups: DrawPlanGroup[] = [];
  const emittedMasks = new Set<number>();
  sorted.forEach(({ node }) => {
    const source = tree.nodes[node];
    if (source.kind !== 'part') {
      return;
    }
    const mask = maskOf.get(node);
    if (mask === undefined) {
      groups.push({ kind: 'part', node });
      return;
    }
    if (emittedMasks.has(mask)) {
      return;
    }
    emittedMasks.add(mask);
    const maskNode = tree.nodes[mask];
    groups.push({
      kind: 'masked',
      mode: maskNode.kind === 'mask' ? maskNode.mode : 'mask',
      maskSource: mask,
      maskedParts: sorted.filter((entry) => maskOf.get(entry.node) === mask).map((entry) => entry.node),
    });
  });
  return groups;
};
