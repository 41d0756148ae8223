import type { LayoutEdge } from "@/domain/graph/GraphTypes";
import { buildAdjacency } from "@/domain/graph/graphFilters";

/** Core number of every node (Batagelj-Zaversnik bucket peeling). */
export function computeCoreNumbers(nodeCount: number, edges: readonly Pick<LayoutEdge, "from" | "to">[]): number[] {
  const adjacency = buildAdjacency(nodeCount, edges);
  const degree = Int32Array.from(adjacency, (neighbors) => neighbors.length);
  const maxDegree = degree.reduce((max, value) => Math.max(max, value), 0);

  const binStart = new Int32Array(maxDegree + 2);
  for (const value of degree) {
    binStart[value + 1] += 1;
  }
  for (let d = 1; d < binStart.length; d += 1) {
    binStart[d] += binStart[d - 1];
  }
  const order = new Int32Array(nodeCount);
  const position = new Int32Array(nodeCount);
  const fill = binStart.slice();
  for (let node = 0; node < nodeCount; node += 1) {
    position[node] = fill[degree[node]];
    order[position[node]] = node;
    fill[degree[node]] += 1;
  }

  const core = new Array<number>(nodeCount).fill(0);
  for (let i = 0; i < nodeCount; i += 1) {
    const node = order[i];
    core[node] = degree[node];
    for (const neighbor of adjacency[node]) {
      if (degree[neighbor] <= degree[node]) {
        continue;
      }
      const bucket = degree[neighbor];
      const first = binStart[bucket];
      const swapped = order[first];
      if (swapped !== neighbor) {
        order[position[neighbor]] = swapped;
        position[swapped] = position[neighbor];
        order[first] = neighbor;
        position[neighbor] = first;
      }
      binStart[bucket] += 1;
      degree[neighbor] -= 1;
    }
  }
  return core;
}
