import type { LayoutEdge } from "@/domain/graph/GraphTypes";
import { solved, unsolved, type SolveResult } from "@/lib/solveResult";

export type EigenvectorOptions = {
  maxIterations?: number;
  tolerance?: number;
};

/**
 * Power iteration on `A + I` for the undirected adjacency matrix `A`. The shift keeps
 * the dominant eigenvector of `A` and lets bipartite graphs (trees, even cycles, grids)
 * converge. Fails when the iterate is still moving after `maxIterations`.
 */
export function computeEigenvectorCentrality(
  nodeCount: number,
  edges: readonly Pick<LayoutEdge, "from" | "to">[],
  options: EigenvectorOptions = {}
): SolveResult<number[]> {
  const maxIterations = options.maxIterations ?? 100;
  const tolerance = options.tolerance ?? 1e-6;
  if (nodeCount === 0) {
    return solved([]);
  }
  const adjacency: number[][] = Array.from({ length: nodeCount }, () => []);
  for (const edge of edges) {
    adjacency[edge.from].push(edge.to);
    adjacency[edge.to].push(edge.from);
  }

  let centrality = new Float64Array(nodeCount).fill(1);
  let next = new Float64Array(nodeCount);
  for (let iteration = 0; iteration < maxIterations; iteration += 1) {
    let normSq = 0;
    for (let i = 0; i < nodeCount; i += 1) {
      let sum = centrality[i];
      for (const neighbor of adjacency[i]) {
        sum += centrality[neighbor];
      }
      next[i] = sum;
      normSq += sum * sum;
    }
    const norm = Math.sqrt(normSq);
    let diff = 0;
    for (let i = 0; i < nodeCount; i += 1) {
      if (norm > 0) {
        next[i] /= norm;
      }
      diff += Math.abs(next[i] - centrality[i]);
    }
    [centrality, next] = [next, centrality];
    if (diff < tolerance) {
      return solved(Array.from(centrality));
    }
  }
  return unsolved(`power iteration did not converge within ${maxIterations} iterations`);
}
