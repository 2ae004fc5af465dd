import { describe, expect, it } from "vitest";
import { layoutUnrooted } from "./unrooted-layout";
import { parseNewick } from "./newick";

describe("layoutUnrooted", () => {
  it("keeps the original root when it is the diameter midpoint", () => {
    const lay = layoutUnrooted("(A:1,B:1)");
    expect(lay.nodes.map((n) => n.id)).toEqual([0, 1, 2]);
    expect(lay.edges).toEqual([
      { u: 0, v: 2 },
      { u: 1, v: 2 },
    ]);
    const [a, b, root] = lay.nodes;
    expect(root.r).toBe(0);
    expect(root.x).toBe(400);
    expect(root.y).toBe(300);
    // R = min(800 - 48, 600 - 48) / 2 = 276
    expect(a.r).toBeCloseTo(276);
    expect(a.x).toBeCloseTo(400);
    expect(a.y).toBeCloseTo(576);
    expect(b.y).toBeCloseTo(24);
    expect(a.name).toBe("A");
    expect(a.isLeaf).toBe(true);
  });

  it("splits the edge holding the midpoint with a synthetic root", () => {
    const lay = layoutUnrooted(parseNewick("(A:1,B:3)"), { width: 400, height: 400, padding: 0 });
    expect(lay.nodes).toHaveLength(4);
    expect(lay.nodes[3]).toMatchObject({ id: 3, isLeaf: false, r: 0, x: 200, y: 200 });
    expect(lay.nodes[0].r).toBeCloseTo(200);
    expect(lay.nodes[1].r).toBeCloseTo(200);
    expect(lay.edges).toEqual([
      { u: 0, v: 2 },
      { u: 1, v: 3 },
      { u: 2, v: 3 },
    ]);
  });

  it("places a lone leaf at the center", () => {
    const lay = layoutUnrooted("X", { width: 100, height: 50 });
    expect(lay.nodes).toEqual([{ id: 0, name: "X", isLeaf: true, x: 50, y: 25, r: 0, angle: Math.PI }]);
    expect(lay.edges).toEqual([]);
    expect(lay.bounds).toEqual({ width: 100, height: 50 });
  });
});
