// lib/unrooted-layout.ts
import { parseNewick, type FlatTree } from "./newick";

/* ---------- Undirected graph over the flat tree ---------- */

type Nbr = { v: number; w: number };
type NodeRec = { id: number; name?: string; isLeaf: boolean };

type Graph = {
  nodes: NodeRec[];
  adj: Nbr[][]; // adj[id] = neighbours with edge weight
};

function buildGraph(tree: FlatTree): Graph {
  // graph ids are the flat-tree indices; a synthetic root may be appended later
  const nodes: NodeRec[] = tree.map((n, id) => ({
    id,
    name: n.label || undefined,
    isLeaf: n.kind === "leaf",
  }));
  const adj: Nbr[][] = tree.map(() => []);

  tree.forEach((n, id) => {
    if (n.kind !== "internal") return;
    for (const c of n.children) {
      const w = tree[c].branchLength ?? 1;
      adj[id].push({ v: c, w });
      adj[c].push({ v: id, w });
    }
  });
  return { nodes, adj };
}

/** Distances and predecessors from `start`; paths in a tree are unique. */
function sweep(adj: Nbr[][], start: number) {
  const dist = new Array<number>(adj.length).fill(Infinity);
  const prev = new Array<number>(adj.length).fill(-1);
  dist[start] = 0;
  const stack = [start];
  for (let u = stack.pop(); u !== undefined; u = stack.pop()) {
    for (const { v, w } of adj[u]) {
      if (dist[v] !== Infinity) continue;
      dist[v] = dist[u] + (Number.isFinite(w) ? w : 1);
      prev[v] = u;
      stack.push(v);
    }
  }
  return { dist, prev };
}

const argmax = (xs: number[]) => xs.reduce((best, x, i) => (x > xs[best] ? i : best), 0);

function findDiameter(adj: Nbr[][]) {
  // farthest from 0, then farthest from that
  const s = argmax(sweep(adj, 0).dist);
  const { dist, prev } = sweep(adj, s);
  const t = argmax(dist);
  const path: number[] = [];
  for (let v = t; v !== -1; v = prev[v]) path.push(v);
  path.reverse();
  return { path, length: dist[t] };
}

/** Root at the midpoint of the diameter, splitting the edge it falls on. */
function midpointRoot(g: Graph, path: number[], length: number): number {
  const mid = length / 2;
  let accum = 0;
  for (let i = 0; i + 1 < path.length; i++) {
    const a = path[i], b = path[i + 1];
    const edge = g.adj[a].find((e) => e.v === b);
    const w = edge ? edge.w : 0;
    if (accum + w >= mid) {
      const wA = mid - accum;
      const wB = w - wA;
      if (wA <= 0) return a;
      if (wB <= 0) return b;
      const R = g.nodes.length;
      g.nodes.push({ id: R, isLeaf: false });
      g.adj[a] = g.adj[a].filter((e) => e.v !== b).concat({ v: R, w: wA });
      g.adj[b] = g.adj[b].filter((e) => e.v !== a).concat({ v: R, w: wB });
      g.adj.push([{ v: a, w: wA }, { v: b, w: wB }]);
      return R;
    }
    accum += w;
  }
  return path[(path.length / 2) | 0];
}

type Rooted = {
  children: number[];
  distFromRoot: number;
  leafCount: number;
  angle: number;
};

function orient(g: Graph, root: number): Rooted[] {
  const { dist, prev } = sweep(g.adj, root);
  const rooted: Rooted[] = g.nodes.map((n) => ({
    children: g.adj[n.id].filter((e) => e.v !== prev[n.id]).map((e) => e.v),
    distFromRoot: dist[n.id],
    leafCount: 0,
    angle: 0,
  }));

  const count = (u: number): number => {
    const r = rooted[u];
    r.leafCount = r.children.length ? r.children.reduce((acc, v) => acc + count(v), 0) : 1;
    return r.leafCount;
  };
  count(root);
  return rooted;
}

function assignAnglesEqualAngle(root: number, rooted: Rooted[]) {
  const walk = (u: number, start: number, span: number) => {
    const r = rooted[u];
    if (r.children.length === 0) {
      r.angle = start + span / 2;
      return;
    }
    let cursor = start;
    for (const v of r.children) {
      const childSpan = (span * rooted[v].leafCount) / r.leafCount;
      walk(v, cursor, childSpan);
      cursor += childSpan;
    }
    // internal node angle: average of children angles
    r.angle = r.children.reduce((a, v) => a + rooted[v].angle, 0) / r.children.length;
  };
  walk(root, 0, Math.PI * 2);
}

/* ---------- Public API ---------- */

export type LayoutPoint = {
  id: number;
  name?: string;
  isLeaf: boolean;
  x: number;
  y: number;
  r: number;        // radius from center (scaled)
  angle: number;    // angle in radians
};
export type LayoutEdge = { u: number; v: number };
export type UnrootedLayout = {
  nodes: LayoutPoint[];
  edges: LayoutEdge[];
  center: { x: number; y: number };
  bounds: { width: number; height: number };
};

export type LayoutOptions = { width?: number; height?: number; padding?: number };

/**
 * Equal-angle unrooted layout. Node ids are flat-tree indices; when the
 * diameter midpoint falls inside an edge a synthetic root gets id `tree.length`.
 */
export function layoutUnrooted(input: string | FlatTree, opts: LayoutOptions = {}): UnrootedLayout {
  const width = Math.max(10, opts.width ?? 800);
  const height = Math.max(10, opts.height ?? 600);
  const pad = Math.max(0, opts.padding ?? 24);
  const cx = width / 2, cy = height / 2;

  const tree = typeof input === "string" ? parseNewick(input) : input;
  const g = buildGraph(tree);

  const diam = findDiameter(g.adj);
  const root = midpointRoot(g, diam.path, diam.length);
  const rooted = orient(g, root);
  assignAnglesEqualAngle(root, rooted);

  // radii: cumulative branch length from root, scaled to fit
  const maxDist = Math.max(...rooted.map((r) => r.distFromRoot));
  const R = Math.max(1e-9, Math.min(width - 2 * pad, height - 2 * pad) / 2);
  const scale = maxDist > 0 ? R / maxDist : 1;

  const nodes: LayoutPoint[] = g.nodes.map((n) => {
    const r = rooted[n.id];
    const rr = r.distFromRoot * scale;
    return {
      id: n.id,
      name: n.name,
      isLeaf: n.isLeaf,
      x: cx + rr * Math.cos(r.angle),
      y: cy + rr * Math.sin(r.angle),
      r: rr,
      angle: r.angle,
    };
  });

  const edges: LayoutEdge[] = [];
  g.adj.forEach((nbrs, u) => {
    for (const { v } of nbrs) if (u < v) edges.push({ u, v });
  });

  return { nodes, edges, center: { x: cx, y: cy }, bounds: { width, height } };
}
