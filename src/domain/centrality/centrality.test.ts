import { describe, expect, it, vi } from "vitest";
import { computeBetweennessCentrality, computeClosenessCentrality } from "@/domain/centrality/closenessCentrality";
import { computeDegreeCentrality, normalize } from "@/domain/centrality/degreeCentrality";
import { computeEigenvectorCentrality } from "@/domain/centrality/eigenvectorCentrality";
import { computeCoreNumbers } from "@/domain/centrality/kCore";
import { computePageRank } from "@/domain/centrality/pageRank";
import { runCentrality } from "@/domain/centrality/runCentrality";
import type { GraphSnapshot, LayoutEdge } from "@/domain/graph/GraphTypes";

function buildEdges(pairs: Array<[number, number]>, tag = 0): LayoutEdge[] {
  return pairs.map(([from, to]) => ({ from, to, tag, curvature: 0 }));
}

const STAR = buildEdges([
  [0, 1],
  [0, 2],
  [0, 3]
]);

const TRIANGLE = buildEdges([
  [0, 1],
  [1, 2],
  [2, 0]
]);

describe("centrality", () => {
  it("counts degree per endpoint on a star", () => {
    expect(computeDegreeCentrality(4, STAR)).toEqual([3, 1, 1, 1]);
  });

  it("normalizes by the maximum and leaves non-positive input alone", () => {
    expect(normalize([3, 1, 1, 1])).toEqual([1, 1 / 3, 1 / 3, 1 / 3]);
    expect(normalize([0, 0])).toEqual([0, 0]);
    expect(normalize([])).toEqual([]);
  });

  it("spreads PageRank evenly over a directed cycle", () => {
    const ranks = computePageRank(3, TRIANGLE);
    for (const rank of ranks) {
      expect(rank).toBeCloseTo(1 / 3, 9);
    }
  });

  it("keeps PageRank a probability distribution with dangling nodes", () => {
    const ranks = computePageRank(4, STAR);
    expect(ranks.reduce((sum, rank) => sum + rank, 0)).toBeCloseTo(1, 6);
    expect(ranks[1]).toBeGreaterThan(ranks[0]);
  });

  it("converges to the uniform eigenvector on a triangle", () => {
    const result = computeEigenvectorCentrality(3, TRIANGLE);
    expect(result.success).toBe(true);
    if (result.success) {
      for (const value of result.value) {
        expect(value).toBeCloseTo(1 / Math.sqrt(3), 6);
      }
    }
  });

  it("ranks the centre of a bipartite star above its leaves", () => {
    const result = computeEigenvectorCentrality(4, STAR);
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.value[0]).toBeCloseTo(Math.SQRT1_2, 5);
      for (const leaf of result.value.slice(1)) {
        expect(leaf).toBeCloseTo(1 / Math.sqrt(6), 5);
      }
    }
  });

  it("reports non-convergence when the iteration budget runs out", () => {
    const result = computeEigenvectorCentrality(4, STAR, { maxIterations: 1 });
    expect(result.success).toBe(false);
  });

  it("computes closeness and betweenness on a path", () => {
    const path = buildEdges([
      [0, 1],
      [1, 2]
    ]);
    expect(computeClosenessCentrality(3, path)).toEqual([2 / 3, 1, 2 / 3]);
    expect(computeBetweennessCentrality(3, path)).toEqual([0, 1, 0]);
    expect(computeBetweennessCentrality(4, STAR)).toEqual([3, 0, 0, 0]);
  });

  it("peels k-cores", () => {
    const edges = buildEdges([
      [0, 1],
      [1, 2],
      [2, 0],
      [2, 3]
    ]);
    expect(computeCoreNumbers(5, edges)).toEqual([2, 2, 2, 1, 0]);
  });

  it("follows the path shape for eigenvector centrality", () => {
    const snapshot: GraphSnapshot = {
      nodeCount: 5,
      edges: buildEdges([
        [0, 1],
        [1, 2],
        [2, 3],
        [3, 4]
      ]),
      hiddenTags: []
    };
    const expected = [0.5, Math.sqrt(3) / 2, 1, Math.sqrt(3) / 2, 0.5];
    runCentrality("eigenvector", snapshot).values.forEach((value, i) => {
      expect(value).toBeCloseTo(expected[i], 4);
    });
  });

  it("falls back to uniform values when the eigen-solve fails", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    try {
      const snapshot: GraphSnapshot = { nodeCount: 4, edges: STAR, hiddenTags: [] };
      const result = runCentrality("eigenvector", snapshot, { eigenvector: { maxIterations: 1 } });
      expect(result.values).toEqual([1, 1, 1, 1]);
      expect(warn).toHaveBeenCalledTimes(1);
    } finally {
      warn.mockRestore();
    }
  });

  it("skips hidden edges", () => {
    const snapshot: GraphSnapshot = {
      nodeCount: 4,
      edges: [...STAR, ...buildEdges([[1, 2]], 5)],
      hiddenTags: [5]
    };
    expect(runCentrality("degree", snapshot).values).toEqual([1, 1 / 3, 1 / 3, 1 / 3]);
  });
});
