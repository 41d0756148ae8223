import type { LayoutEdge } from "@/domain/graph/GraphTypes";
import { buildAdjacency } from "@/domain/graph/graphFilters";

function bfsDistances(adjacency: readonly number[][], source: number): Int32Array {
  const distances = new Int32Array(adjacency.length).fill(-1);
  const queue = [source];
  distances[source] = 0;
  for (let head = 0; head < queue.length; head += 1) {
    const node = queue[head];
    for (const neighbor of adjacency[node]) {
      if (distances[neighbor] < 0) {
        distances[neighbor] = distances[node] + 1;
        queue.push(neighbor);
      }
    }
  }
  return distances;
}

/** Reachable node count divided by the sum of hop distances to them. */
export function computeClosenessCentrality(nodeCount: number, edges: readonly Pick<LayoutEdge, "from" | "to">[]): number[] {
  const adjacency = buildAdjacency(nodeCount, edges);
  return adjacency.map((_, source) => {
    const distances = bfsDistances(adjacency, source);
    let total = 0;
    let reachable = 0;
    for (const distance of distances) {
      if (distance > 0) {
        total += distance;
        reachable += 1;
      }
    }
    return total > 0 ? reachable / total : 0;
  });
}

/** Brandes' algorithm on the undirected, unweighted graph. */
export function computeBetweennessCentrality(nodeCount: number, edges: readonly Pick<LayoutEdge, "from" | "to">[]): number[] {
  const adjacency = buildAdjacency(nodeCount, edges);
  const centrality = new Float64Array(nodeCount);
  for (let source = 0; source < nodeCount; source += 1) {
    const stack: number[] = [];
    const predecessors: number[][] = Array.from({ length: nodeCount }, () => []);
    const paths = new Float64Array(nodeCount);
    const distances = new Int32Array(nodeCount).fill(-1);
    paths[source] = 1;
    distances[source] = 0;
    const queue = [source];
    for (let head = 0; head < queue.length; head += 1) {
      const node = queue[head];
      stack.push(node);
      for (const neighbor of adjacency[node]) {
        if (distances[neighbor] < 0) {
          distances[neighbor] = distances[node] + 1;
          queue.push(neighbor);
        }
        if (distances[neighbor] === distances[node] + 1) {
          paths[neighbor] += paths[node];
          predecessors[neighbor].push(node);
        }
      }
    }
    const dependency = new Float64Array(nodeCount);
    for (let i = stack.length - 1; i >= 0; i -= 1) {
      const node = stack[i];
      for (const predecessor of predecessors[node]) {
        dependency[predecessor] += (paths[predecessor] / paths[node]) * (1 + dependency[node]);
      }
      if (node !== source) {
        centrality[node] += dependency[node];
      }
    }
  }
  // Each undirected path was counted from both ends.
  return Array.from(centrality, (value) => value / 2);
}
