import type { GraphSnapshot, LayoutEdge } from "@/domain/graph/GraphTypes";
import { SortedTagSet } from "@/domain/graph/SortedTagSet";

export type IndexedEdge = LayoutEdge & { edgeIndex: number };

export function hiddenTagSetOf(snapshot: GraphSnapshot): SortedTagSet {
  return new SortedTagSet(snapshot.hiddenTags);
}

/** Edges taking part in layout: tag not hidden and endpoints distinct. */
export function visibleEdges(edges: readonly LayoutEdge[], hiddenTags: SortedTagSet): IndexedEdge[] {
  const result: IndexedEdge[] = [];
  edges.forEach((edge, edgeIndex) => {
    if (edge.from === edge.to || hiddenTags.contains(edge.tag)) {
      return;
    }
    result.push({ ...edge, edgeIndex });
  });
  return result;
}

export function buildAdjacency(nodeCount: number, edges: readonly Pick<LayoutEdge, "from" | "to">[]): number[][] {
  const adjacency: number[][] = Array.from({ length: nodeCount }, () => []);
  for (const edge of edges) {
    adjacency[edge.from].push(edge.to);
    adjacency[edge.to].push(edge.from);
  }
  return adjacency;
}
