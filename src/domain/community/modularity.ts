import type { CommunityEdge } from "@/domain/community/CommunityModel";

/**
 * Newman modularity of a partition over an unweighted, undirected edge list:
 * sum over communities of `in / m - (tot / 2m)^2`.
 */
export function computeModularity(nodeCount: number, edges: readonly CommunityEdge[], partition: readonly number[]): number {
  const m = edges.length;
  if (m === 0) {
    return 0;
  }
  const degree = new Float64Array(nodeCount);
  const inside = new Map<number, number>();
  const total = new Map<number, number>();
  for (const edge of edges) {
    degree[edge.from] += 1;
    degree[edge.to] += 1;
    if (partition[edge.from] === partition[edge.to]) {
      const community = partition[edge.from];
      inside.set(community, (inside.get(community) ?? 0) + 1);
    }
  }
  for (let node = 0; node < nodeCount; node += 1) {
    total.set(partition[node], (total.get(partition[node]) ?? 0) + degree[node]);
  }

  let q = 0;
  for (const [community, tot] of total) {
    const share = tot / (2 * m);
    q += (inside.get(community) ?? 0) / m - share * share;
  }
  return q;
}
