import { afterEach, describe, expect, it, vi } from "vitest";
import { ArgumentError, ParseError } from "./errors";
import type { QueryFn, SQLParam } from "./db";
import { clampInt, createTreeStore, describeTree, normalizeEdgeList, normalizeTreeInput } from "./tree-store";

type Call = { sql: string; params: ReadonlyArray<SQLParam> };

/** In-process stand-in for the mysql2 pool: records statements, replays canned rows. */
function fakeDb(responses: Array<Array<Record<string, unknown>>>) {
  const calls: Call[] = [];
  const run: QueryFn = async <T extends Record<string, unknown>>(
    sql: string,
    params: ReadonlyArray<SQLParam> = [],
  ) => {
    calls.push({ sql: sql.replace(/\s+/g, " ").trim(), params });
    return (responses.shift() ?? []) as T[];
  };
  return { run, calls };
}

afterEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllEnvs();
});

describe("normalizeTreeInput", () => {
  it("fills defaults and accepts the newick alias", () => {
    expect(normalizeTreeInput({ job_id: " job-1 ", newick: "(a,b)", is_current: "yes" })).toEqual({
      job_id: "job-1",
      tree: "(a,b)",
      source: "upload",
      method: "unknown",
      label: null,
      format: "newick",
      is_current: 1,
    });
  });

  it("falls back to newick for unknown formats", () => {
    expect(normalizeTreeInput({ job_id: "j", tree: "x", format: "PHYLIP", is_current: 0 }).format).toBe("newick");
    expect(normalizeTreeInput({ job_id: "j", tree: "x", format: "NEXUS" }).format).toBe("nexus");
  });

  it("requires a job and a tree", () => {
    expect(() => normalizeTreeInput({ job_id: "j" })).toThrow(ArgumentError);
  });
});

describe("describeTree", () => {
  it("derives counts, height and named edges", () => {
    const d = describeTree("((a:1,b:2):0.5,c:3)");
    expect(d.nLeaves).toBe(3);
    expect(d.nEdges).toBe(4);
    expect(d.height).toBe(3);
    expect(d.edges).toEqual([
      ["n2", "a", 1],
      ["n2", "b", 2],
      ["n4", "n2", 0.5],
      ["n4", "c", 3],
    ]);
  });

  it("hashes the trimmed tree text", () => {
    const a = describeTree("(a,b)").sha256;
    expect(a).toMatch(/^[0-9a-f]{64}$/);
    expect(describeTree("  (a,b)\n").sha256).toBe(a);
    expect(describeTree("(a,b);").sha256).not.toBe(a);
  });

  it("refuses malformed trees", () => {
    expect(() => describeTree("(a,b")).toThrow(ParseError);
  });
});

describe("createTreeStore", () => {
  it("inserts, looks the id up and clears older current flags", async () => {
    const { run, calls } = fakeDb([[], [{ id: 7 }], []]);
    const store = createTreeStore(run);
    const res = await store.save({ job_id: "job-1", newick: "(a:1,b:2)", is_current: "yes" });

    expect(res.id).toBe(7);
    expect(calls).toHaveLength(3);
    expect(calls[0].sql.startsWith("INSERT INTO phylo_trees")).toBe(true);
    expect(calls[0].params).toEqual([
      "job-1", "upload", "unknown", null, "newick",
      "(a:1,b:2)", '[["n2","a",1],["n2","b",2]]',
      2, 2, 2, 1, res.sha256,
    ]);
    expect(calls[1].params).toEqual(["job-1", res.sha256]);
    expect(calls[2]).toEqual({
      sql: "UPDATE phylo_trees SET is_current=0 WHERE job_id=? AND id<>?",
      params: ["job-1", 7],
    });
  });

  it("stores a single-leaf tree without appending a semicolon", async () => {
    const { run, calls } = fakeDb([[], [{ id: 1 }]]);
    await createTreeStore(run).save({ job_id: "j", tree: " A " });
    expect(calls[0].params[5]).toBe("A");
  });

  it("parses with the NEWICK_* settings from the environment", async () => {
    vi.stubEnv("NEWICK_TRAILING", "ignore");
    const { run, calls } = fakeDb([[], [{ id: 1 }]]);
    const res = await createTreeStore(run).save({ job_id: "j", tree: "(a,b) junk" });
    expect(res.id).toBe(1);
    expect(calls[0].params[5]).toBe("(a,b) junk");
  });

  it("lets explicit parser options override the environment", async () => {
    vi.stubEnv("NEWICK_TRAILING", "ignore");
    vi.spyOn(console, "error").mockImplementation(() => {});
    const { run } = fakeDb([]);
    await expect(createTreeStore(run, { trailing: "reject" }).save({ job_id: "j", tree: "(a,b) junk" })).rejects.toThrow(
      "Extraneous characters at tree end: 'junk'",
    );
  });

  it("does not touch flags for a non-current tree", async () => {
    const { run, calls } = fakeDb([[], [{ id: 3 }]]);
    await createTreeStore(run).save({ job_id: "job-1", tree: "(a,b)" });
    expect(calls).toHaveLength(2);
  });

  it("logs and rethrows failures", async () => {
    const err = vi.spyOn(console, "error").mockImplementation(() => {});
    const { run, calls } = fakeDb([]);
    await expect(createTreeStore(run).save({ job_id: "job-1", tree: "(a," })).rejects.toBeInstanceOf(ParseError);
    expect(calls).toHaveLength(0);
    expect(err).toHaveBeenCalledWith("[tree-store] save failed: Unclosed '(' (at offset 3)");
  });

  it("fails when the inserted row cannot be found", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const { run } = fakeDb([[], []]);
    await expect(createTreeStore(run).save({ job_id: "j", tree: "x" })).rejects.toThrow("inserted row not found");
  });

  it("lists with clamped paging", async () => {
    const { run, calls } = fakeDb([[{ id: 1 }, { id: 2 }]]);
    const rows = await createTreeStore(run).list(" job-1 ", { currentOnly: true, limit: 500, offset: -5 });
    expect(rows.map((r) => r.id)).toEqual([1, 2]);
    expect(calls[0]).toEqual({
      sql: "SELECT * FROM phylo_trees WHERE job_id = ? AND is_current=1 ORDER BY created_at DESC LIMIT ? OFFSET ?",
      params: ["job-1", 200, 0],
    });
  });

  it("fetches one row or null", async () => {
    const { run } = fakeDb([[{ id: 9, job_id: "j", edge_list: '[["n2","a",1.5]]' }], []]);
    const store = createTreeStore(run);
    expect(await store.get(9)).toEqual({ id: 9, job_id: "j", edge_list: [["n2", "a", 1.5]] });
    expect(await store.get(10)).toBeNull();
  });

  it("moves the current flag within a job", async () => {
    const { run, calls } = fakeDb([[{ job_id: "job-1" }], [], []]);
    const store = createTreeStore(run);
    expect(await store.setCurrent(4)).toBe(true);
    expect(calls.map((c) => c.sql)).toEqual([
      "SELECT job_id FROM phylo_trees WHERE id=?",
      "UPDATE phylo_trees SET is_current=0 WHERE job_id=?",
      "UPDATE phylo_trees SET is_current=1 WHERE id=?",
    ]);
    expect(await store.setCurrent(5)).toBe(false);
  });

  it("deletes by id", async () => {
    const { run, calls } = fakeDb([[]]);
    await createTreeStore(run).remove(2);
    expect(calls).toEqual([{ sql: "DELETE FROM phylo_trees WHERE id=?", params: [2] }]);
  });
});

describe("normalizeEdgeList", () => {
  it("accepts arrays and JSON text of [parent, child, length]", () => {
    expect(normalizeEdgeList([["r", "a", "2"]])).toEqual([["r", "a", 2]]);
    expect(normalizeEdgeList('[["r","b",0]]')).toEqual([["r", "b", 0]]);
  });

  it("returns null for anything else", () => {
    expect(normalizeEdgeList(null)).toBeNull();
    expect(normalizeEdgeList("{not json")).toBeNull();
    expect(normalizeEdgeList([["r", "a"]])).toBeNull();
    expect(normalizeEdgeList([["r", 1, 2]])).toBeNull();
  });
});

describe("clampInt", () => {
  it("parses and clamps", () => {
    expect(clampInt("12", 5, 1, 10)).toBe(10);
    expect(clampInt(undefined, 5, 1, 10)).toBe(5);
    expect(clampInt("3.7", 5, 1, 10)).toBe(3);
  });
});
