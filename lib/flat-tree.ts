// lib/flat-tree.ts
import { ArgumentError } from "./errors";
import type { FlatNode, FlatTree, InternalNode } from "./newick";

/** Nested view of a flat tree, one object per node. */
export type NwNode = {
  name?: string;
  /** Edge length from parent to this node (root may have undefined) */
  length?: number;
  children?: NwNode[];
  attributes?: Record<string, string>;
};

export const isLeaf = (n: FlatNode): boolean => n.kind === "leaf";
const isInternal = (n: FlatNode): n is InternalNode => n.kind === "internal";

export function rootIndex(tree: FlatTree): number {
  if (tree.length === 0) throw new ArgumentError("Empty tree");
  return tree.length - 1;
}

function nodeAt(tree: FlatTree, index: number): FlatNode {
  const n = tree[index];
  if (!n) throw new ArgumentError(`No node at index ${index}`);
  return n;
}

/** Check the index invariants a parse guarantees, for trees from elsewhere. */
export function validateFlatTree(tree: FlatTree): void {
  if (tree.length === 0) throw new ArgumentError("Empty tree");
  tree.forEach((n, k) => {
    if (!isInternal(n)) return;
    if (n.children.length === 0) throw new ArgumentError(`Internal node ${k} has no children`);
    for (const c of n.children) {
      if (!Number.isInteger(c) || c < 0 || c >= k) {
        throw new ArgumentError(`Node ${k} refers to child ${c}; children must precede their parent`);
      }
    }
  });
}

/** Children before parents, left to right. */
export function postOrder(tree: FlatTree, from = rootIndex(tree)): number[] {
  const out: number[] = [];
  const walk = (k: number) => {
    const n = nodeAt(tree, k);
    if (isInternal(n)) for (const c of n.children) walk(c);
    out.push(k);
  };
  walk(from);
  return out;
}

/** Parents before children; with includeTaxa=false leaves are skipped. */
export function preOrder(tree: FlatTree, from = rootIndex(tree), includeTaxa = true): number[] {
  const out: number[] = [];
  const walk = (k: number) => {
    const n = nodeAt(tree, k);
    if (!isInternal(n)) {
      if (includeTaxa) out.push(k);
      return;
    }
    out.push(k);
    for (const c of n.children) walk(c);
  };
  walk(from);
  return out;
}

/** Leaf labels under `index`, left to right. */
export function clade(tree: FlatTree, index: number): string[] {
  return postOrder(tree, index)
    .map((k) => nodeAt(tree, k))
    .filter((n) => n.kind === "leaf")
    .map((n) => n.label);
}

export function taxa(tree: FlatTree): string[] {
  return clade(tree, rootIndex(tree));
}

/** Parent index of every node; -1 for the root and for unreachable nodes. */
export function parentIndices(tree: FlatTree): number[] {
  const parents = new Array<number>(tree.length).fill(-1);
  tree.forEach((n, k) => {
    if (isInternal(n)) for (const c of n.children) parents[c] = k;
  });
  return parents;
}

/**
 * Height of each node above its deepest tip: leaves are 0, an internal node
 * is the max of child height + child branch length (missing lengths count 0).
 */
export function nodeHeights(tree: FlatTree): number[] {
  const heights = new Array<number>(tree.length).fill(0);
  // children always precede parents, so one forward sweep is enough
  tree.forEach((n, k) => {
    if (!isInternal(n)) return;
    let h = 0;
    for (const c of n.children) {
      h = Math.max(h, heights[c] + (nodeAt(tree, c).branchLength ?? 0));
    }
    heights[k] = h;
  });
  return heights;
}

export function treeHeight(tree: FlatTree): number {
  return nodeHeights(tree)[rootIndex(tree)];
}

export function toNested(tree: FlatTree, from = rootIndex(tree)): NwNode {
  const build = (k: number): NwNode => {
    const n = nodeAt(tree, k);
    const out: NwNode = {};
    if (n.label) out.name = n.label;
    if (n.branchLength !== undefined) out.length = n.branchLength;
    if (n.annotations.length) out.attributes = Object.fromEntries(n.annotations);
    if (isInternal(n)) out.children = n.children.map(build);
    return out;
  };
  return build(from);
}
