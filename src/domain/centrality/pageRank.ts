import type { LayoutEdge } from "@/domain/graph/GraphTypes";

export type PageRankOptions = {
  damping?: number;
  maxIterations?: number;
  tolerance?: number;
};

/** Directed PageRank; rank of nodes without out-edges is spread over every node. */
export function computePageRank(
  nodeCount: number,
  edges: readonly Pick<LayoutEdge, "from" | "to">[],
  options: PageRankOptions = {}
): number[] {
  if (nodeCount === 0) {
    return [];
  }
  const damping = options.damping ?? 0.85;
  const maxIterations = options.maxIterations ?? 100;
  const tolerance = options.tolerance ?? 1e-6;
  const outgoing: number[][] = Array.from({ length: nodeCount }, () => []);
  for (const edge of edges) {
    outgoing[edge.from].push(edge.to);
  }

  let rank = new Float64Array(nodeCount).fill(1 / nodeCount);
  let next = new Float64Array(nodeCount);
  for (let iteration = 0; iteration < maxIterations; iteration += 1) {
    next.fill((1 - damping) / nodeCount);
    let dangling = 0;
    for (let i = 0; i < nodeCount; i += 1) {
      const targets = outgoing[i];
      if (targets.length === 0) {
        dangling += (damping * rank[i]) / nodeCount;
        continue;
      }
      const share = (damping * rank[i]) / targets.length;
      for (const target of targets) {
        next[target] += share;
      }
    }
    let diff = 0;
    for (let i = 0; i < nodeCount; i += 1) {
      next[i] += dangling;
      diff += Math.abs(next[i] - rank[i]);
    }
    [rank, next] = [next, rank];
    if (diff < tolerance) {
      break;
    }
  }
  return Array.from(rank);
}
