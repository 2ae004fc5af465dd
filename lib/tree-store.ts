// lib/tree-store.ts
import crypto from "node:crypto";
import { loadParseOptions } from "./config";
import { ArgumentError, errorMessage } from "./errors";
import { nodeHeights, taxa } from "./flat-tree";
import { parseNewick, type FlatTree, type ParseOptions } from "./newick";
import { query, type QueryFn } from "./db";

type YesNo = 0 | 1;

export type TreeFormat = "newick" | "nexus" | "json";

/** [parent, child, branch length]; unnamed nodes are called n<index> */
export type Edge = [string, string, number];

type TreeColumns = {
  [key: string]: unknown;
  id: number;
  job_id: string;
  source: string;
  method: string;
  label: string | null;
  format: TreeFormat;
  tree: string;
  n_leaves: number;
  n_edges: number;
  tree_height: number;
  is_current: YesNo;
  created_at: string;
  updated_at: string;
};

export type TreeRow = TreeColumns & { edge_list: Edge[] | null };

// driver may return the JSON column as a string
type StoredTreeRow = TreeColumns & { edge_list: unknown };

export type TreeInput = {
  job_id: string;
  tree: string;
  source: string;
  method: string;
  label: string | null;
  format: TreeFormat;
  is_current: YesNo;
};

export type TreeSummary = {
  nLeaves: number;
  nEdges: number;
  height: number;
  edges: Edge[];
  sha256: string;
};

export type ListOptions = { currentOnly?: boolean; limit?: number; offset?: number };

export interface TreeStore {
  save(body: Record<string, unknown>): Promise<{ id: number; sha256: string }>;
  get(id: number): Promise<TreeRow | null>;
  list(jobId: string, opts?: ListOptions): Promise<TreeRow[]>;
  setCurrent(id: number): Promise<boolean>;
  remove(id: number): Promise<void>;
}

/* ---------------- input coercion ---------------- */

function truthy(v: string | null): boolean {
  return v !== null && /^(1|true|yes|on)$/i.test(v);
}

export function clampInt(n: unknown, def: number, min: number, max: number): number {
  const x = Number.parseInt(String(n ?? ""), 10);
  if (!Number.isFinite(x)) return def;
  return Math.max(min, Math.min(x, max));
}

function coerceYesNo(v: unknown): YesNo {
  if (typeof v === "number") return v ? 1 : 0;
  if (typeof v === "boolean") return v ? 1 : 0;
  if (typeof v === "string") return truthy(v) ? 1 : 0;
  return 0;
}

function isFormat(v: string): v is TreeFormat {
  return v === "newick" || v === "nexus" || v === "json";
}

/** Validate a loosely typed request body. `newick` is accepted for `tree`. */
export function normalizeTreeInput(body: Record<string, unknown>): TreeInput {
  const job_id = String(body.job_id ?? "").trim();
  const tree = String(body.tree ?? body.newick ?? "").trim();
  if (!job_id || !tree) throw new ArgumentError("job_id and tree are required");

  const fmtRaw = String(body.format ?? "newick").toLowerCase();
  return {
    job_id,
    tree,
    source: String(body.source ?? "upload"),
    method: String(body.method ?? "unknown"),
    label: body.label == null ? null : String(body.label),
    format: isFormat(fmtRaw) ? fmtRaw : "newick",
    is_current: coerceYesNo(body.is_current),
  };
}

/* ---------------- derived columns ---------------- */

function nodeName(tree: FlatTree, k: number): string {
  return tree[k].label || `n${k}`;
}

export function edgeList(tree: FlatTree): Edge[] {
  const out: Edge[] = [];
  tree.forEach((n, k) => {
    if (n.kind !== "internal") return;
    for (const c of n.children) out.push([nodeName(tree, k), nodeName(tree, c), tree[c].branchLength ?? 0]);
  });
  return out;
}

export function normalizeEdgeList(raw: unknown): Edge[] | null {
  let x = raw;
  if (typeof x === "string") {
    try {
      x = JSON.parse(x);
    } catch {
      return null;
    }
  }
  if (!Array.isArray(x)) return null;
  const out: Edge[] = [];
  for (const e of x) {
    if (!Array.isArray(e) || e.length !== 3) return null;
    const [a, b] = e;
    const w = Number(e[2]);
    if (typeof a !== "string" || typeof b !== "string" || !Number.isFinite(w)) return null;
    out.push([a, b, w]);
  }
  return out;
}

function hydrate(row: StoredTreeRow): TreeRow {
  return { ...row, edge_list: normalizeEdgeList(row.edge_list) };
}

/** Parse (throws ParseError) and derive the stored counts and digest of the trimmed text. */
export function describeTree(newick: string, options: Partial<ParseOptions> = {}): TreeSummary {
  const tree = parseNewick(newick, options);
  const edges = edgeList(tree);
  return {
    nLeaves: taxa(tree).length,
    nEdges: edges.length,
    height: nodeHeights(tree)[tree.length - 1],
    edges,
    sha256: crypto.createHash("sha256").update(newick.trim()).digest("hex"),
  };
}

/* ---------------- store ---------------- */

type IdRow = { [k: string]: unknown; id: number };
type JobIdRow = { [k: string]: unknown; job_id: string };

/** Parser options default to the NEWICK_* environment settings. */
export function createTreeStore(
  run: QueryFn = query,
  parseOptions: Partial<ParseOptions> = loadParseOptions(),
): TreeStore {
  async function logged<T>(what: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (e) {
      console.error(`[tree-store] ${what} failed: ${errorMessage(e)}`);
      throw e;
    }
  }

  return {
    save: (body) =>
      logged("save", async () => {
        const input = normalizeTreeInput(body);
        const summary = describeTree(input.tree, parseOptions);

        await run(
          `
          INSERT INTO phylo_trees
            (job_id, source, method, label, format, tree, edge_list,
             n_leaves, n_edges, tree_height, is_current, tree_sha256)
          VALUES
            (?, ?, ?, ?, ?, ?, CAST(? AS JSON),
             ?, ?, ?, ?, UNHEX(?))
          `,
          [
            input.job_id, input.source, input.method, input.label, input.format,
            input.tree, JSON.stringify(summary.edges),
            summary.nLeaves, summary.nEdges, summary.height, input.is_current, summary.sha256,
          ],
        );

        const rows = await run<IdRow>(
          `SELECT id FROM phylo_trees WHERE job_id = ? AND tree_sha256 = UNHEX(?) ORDER BY id DESC LIMIT 1`,
          [input.job_id, summary.sha256],
        );
        const id = rows[0]?.id;
        if (!id) throw new Error("inserted row not found");

        if (input.is_current) {
          await run(`UPDATE phylo_trees SET is_current=0 WHERE job_id=? AND id<>?`, [input.job_id, id]);
        }
        return { id, sha256: summary.sha256 };
      }),

    get: (id) =>
      logged("get", async () => {
        const rows = await run<StoredTreeRow>(`SELECT * FROM phylo_trees WHERE id=?`, [id]);
        const row = rows[0];
        return row ? hydrate(row) : null;
      }),

    list: (jobId, opts = {}) =>
      logged("list", async () => {
        const job_id = jobId.trim();
        if (!job_id) throw new ArgumentError("job_id required");
        const limit = clampInt(opts.limit, 50, 1, 200);
        const offset = clampInt(opts.offset, 0, 0, 1_000_000);
        const where = `WHERE job_id = ? ${opts.currentOnly ? "AND is_current=1" : ""}`;
        const rows = await run<StoredTreeRow>(
          `SELECT * FROM phylo_trees ${where} ORDER BY created_at DESC LIMIT ? OFFSET ?`,
          [job_id, limit, offset],
        );
        return rows.map(hydrate);
      }),

    setCurrent: (id) =>
      logged("setCurrent", async () => {
        const rows = await run<JobIdRow>(`SELECT job_id FROM phylo_trees WHERE id=?`, [id]);
        const found = rows[0];
        if (!found) return false;
        await run(`UPDATE phylo_trees SET is_current=0 WHERE job_id=?`, [found.job_id]);
        await run(`UPDATE phylo_trees SET is_current=1 WHERE id=?`, [id]);
        return true;
      }),

    remove: (id) =>
      logged("remove", async () => {
        await run(`DELETE FROM phylo_trees WHERE id=?`, [id]);
      }),
  };
}
