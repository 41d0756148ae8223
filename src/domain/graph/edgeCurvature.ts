import { TAU } from "@/domain/layoutEngine/layoutMath";
import type { LayoutEdge } from "@/domain/graph/GraphTypes";
import type { SortedTagSet } from "@/domain/graph/SortedTagSet";

export const BEZIER_GAP = 30;

/**
 * Spreads the curvature of edges sharing the same endpoint pair so parallel edges
 * render as distinct curves. Self-loops in a group are spread over the full angle.
 * Returns a new edge array; hidden edges keep their curvature.
 */
export function assignEdgeCurvature(edges: readonly LayoutEdge[], hiddenTags: SortedTagSet): LayoutEdge[] {
  const result = edges.map((edge) => ({ ...edge }));
  const groups = new Map<string, number[]>();
  result.forEach((edge, index) => {
    if (hiddenTags.contains(edge.tag)) {
      return;
    }
    const key = edge.from > edge.to ? `${edge.from}:${edge.to}` : `${edge.to}:${edge.from}`;
    const group = groups.get(key);
    if (group) {
      group.push(index);
    } else {
      groups.set(key, [index]);
    }
  });

  for (const group of groups.values()) {
    if (group.length === 1) {
      result[group[0]].curvature = 0;
      continue;
    }
    const first = result[group[0]];
    if (first.from === first.to) {
      const step = TAU / group.length;
      group.forEach((edgeIndex, slot) => {
        result[edgeIndex].curvature = step * slot;
      });
      continue;
    }
    let distance = -((group.length - 1) * BEZIER_GAP) / 2;
    for (const edgeIndex of group) {
      const edge = result[edgeIndex];
      edge.curvature = edge.from > edge.to ? distance : -distance;
      distance += BEZIER_GAP;
    }
  }
  return result;
}
