import { describe, expect, it } from "vitest";
import { createNodePosition, type LayoutEdge } from "@/domain/graph/GraphTypes";
import { buildLaplacian, spectralLayout } from "@/domain/spectralLayout/spectralLayout";
import { symmetricEigen } from "@/domain/spectralLayout/symmetricEigen";

function edge(from: number, to: number, tag = 0): LayoutEdge {
  return { from, to, tag, curvature: 0 };
}

function row(count: number) {
  return Array.from({ length: count }, (_, index) => createNodePosition(index * 10, 0));
}

describe("symmetricEigen", () => {
  it("diagonalizes a 2x2 matrix", () => {
    const result = symmetricEigen([
      [2, 1],
      [1, 2]
    ]);
    expect(result.success).toBe(true);
    if (!result.success) {
      return;
    }
    expect(result.value.values[0]).toBeCloseTo(1, 9);
    expect(result.value.values[1]).toBeCloseTo(3, 9);
    const [first, second] = result.value.vectors;
    expect(Math.abs(first[0])).toBeCloseTo(Math.SQRT1_2, 9);
    expect(first[0] * first[1]).toBeCloseTo(-0.5, 9);
    expect(second[0] * second[1]).toBeCloseTo(0.5, 9);
  });

  it("fails when the sweep budget runs out", () => {
    const result = symmetricEigen(buildLaplacian([0, 1, 2], [edge(0, 1), edge(1, 2)]), { maxSweeps: 0 });
    expect(result).toEqual({ success: false, error: "[spectral-layout] eigen-decomposition did not converge in 0 sweeps" });
  });

  it("rejects a non-square matrix", () => {
    expect(symmetricEigen([[1, 2]]).success).toBe(false);
  });
});

describe("buildLaplacian", () => {
  it("adds parallel edges and skips self-loops", () => {
    expect(buildLaplacian([5, 7], [edge(5, 7), edge(7, 5), edge(5, 5), edge(5, 9)])).toEqual([
      [2, -2],
      [-2, 2]
    ]);
  });
});

describe("spectralLayout", () => {
  it("places a path on its Fiedler vector", () => {
    const result = spectralLayout({ positions: row(3), edges: [edge(0, 1), edge(1, 2)] });
    expect(result.success).toBe(true);
    if (!result.success) {
      return;
    }
    const [a, b, c] = result.value.map((node) => node.pos);
    expect(Math.abs(a.x)).toBeCloseTo(692.82, 1);
    expect(b.x).toBeCloseTo(0, 6);
    expect(c.x).toBeCloseTo(-a.x, 6);
    expect(Math.abs(a.y)).toBeCloseTo(400, 4);
    expect(Math.abs(b.y)).toBeCloseTo(800, 4);
    expect(c.y).toBeCloseTo(a.y, 6);
  });

  it("separates two bridged triangles along x", () => {
    const edges = [edge(0, 1), edge(1, 2), edge(2, 0), edge(2, 3), edge(3, 4), edge(4, 5), edge(5, 3)];
    const result = spectralLayout({ positions: row(6), edges });
    expect(result.success).toBe(true);
    if (!result.success) {
      return;
    }
    const xs = result.value.map((node) => node.pos.x);
    expect(Math.sign(xs[0])).toBe(Math.sign(xs[1]));
    expect(Math.sign(xs[4])).toBe(-Math.sign(xs[0]));
    expect(Math.sign(xs[5])).toBe(-Math.sign(xs[0]));
  });

  it("ignores hidden edges and keeps unselected nodes", () => {
    const positions = row(4);
    const result = spectralLayout({
      positions,
      edges: [edge(0, 1), edge(1, 2), edge(0, 3, 9)],
      hiddenTags: [9],
      selectedNodes: [0, 1, 2]
    });
    expect(result.success).toBe(true);
    if (!result.success) {
      return;
    }
    expect(result.value[3].pos).toEqual({ x: 30, y: 0 });
    expect(Math.abs(result.value[1].pos.y)).toBeCloseTo(800, 4);
  });

  it("fails when two nodes leave no second eigenvector", () => {
    const result = spectralLayout({ positions: row(2), edges: [edge(0, 1)] });
    expect(result).toEqual({ success: false, error: "[spectral-layout] not enough eigenvectors for 2 nodes" });
  });

  it("reports a solver failure", () => {
    const result = spectralLayout({ positions: row(3), edges: [edge(0, 1), edge(1, 2)], eigen: { maxSweeps: 0 } });
    expect(result.success).toBe(false);
  });
});
