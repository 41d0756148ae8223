import { computeBetweennessCentrality, computeClosenessCentrality } from "@/domain/centrality/closenessCentrality";
import { computeDegreeCentrality, normalize } from "@/domain/centrality/degreeCentrality";
import { computeEigenvectorCentrality, type EigenvectorOptions } from "@/domain/centrality/eigenvectorCentrality";
import { computeCoreNumbers } from "@/domain/centrality/kCore";
import { computePageRank } from "@/domain/centrality/pageRank";
import { distributeToZoomLayers } from "@/domain/centrality/zoomLayers";
import type { GraphSnapshot } from "@/domain/graph/GraphTypes";
import { hiddenTagSetOf, visibleEdges } from "@/domain/graph/graphFilters";

export type CentralityKind = "degree" | "page-rank" | "eigenvector" | "closeness" | "betweenness" | "k-core";

export type CentralityResult = {
  kind: CentralityKind;
  /** Normalised to a maximum of 1. */
  values: number[];
  zoomLayers: number[];
};

export type CentralityOptions = {
  eigenvector?: EigenvectorOptions;
};

function computeRawCentrality(kind: CentralityKind, snapshot: GraphSnapshot, options: CentralityOptions): number[] {
  const edges = visibleEdges(snapshot.edges, hiddenTagSetOf(snapshot));
  const nodeCount = snapshot.nodeCount;
  switch (kind) {
    case "degree":
      return computeDegreeCentrality(nodeCount, edges);
    case "page-rank":
      return computePageRank(nodeCount, edges);
    case "eigenvector": {
      const result = computeEigenvectorCentrality(nodeCount, edges, options.eigenvector);
      if (result.success) {
        return result.value;
      }
      console.warn("[centrality] Eigenvector centrality fell back to uniform values", result.error);
      return new Array<number>(nodeCount).fill(1);
    }
    case "closeness":
      return computeClosenessCentrality(nodeCount, edges);
    case "betweenness":
      return computeBetweennessCentrality(nodeCount, edges);
    case "k-core":
      return computeCoreNumbers(nodeCount, edges);
  }
}

export function runCentrality(
  kind: CentralityKind,
  snapshot: GraphSnapshot,
  options: CentralityOptions = {}
): CentralityResult {
  const values = normalize(computeRawCentrality(kind, snapshot, options));
  return { kind, values, zoomLayers: distributeToZoomLayers(values) };
}
