import { findComponents } from "@/domain/circularLayout/components";
import { geneticOrdering, type GeneticOrderingOptions } from "@/domain/circularLayout/geneticOrdering";
import type { Vec2 } from "@/domain/geometry/Vec2";
import { cloneNodePosition, type LayoutEdge, type NodePosition } from "@/domain/graph/GraphTypes";
import { visibleEdges } from "@/domain/graph/graphFilters";
import { SortedTagSet } from "@/domain/graph/SortedTagSet";
import { TAU } from "@/domain/layoutEngine/layoutMath";

export type CircularLayoutInput = {
  positions: NodePosition[];
  edges: LayoutEdge[];
  hiddenTags?: number[];
  selectedNodes: number[];
  genetic?: GeneticOrderingOptions;
};

/** Used when every selected node sits on the same point. */
export const FALLBACK_CIRCLE_RADIUS = 100;

/** `count` points evenly spaced on a circle, the first one at the top. */
export function circlePositions(center: Vec2, radius: number, count: number): Vec2[] {
  return Array.from({ length: count }, (_, i) => {
    const angle = (TAU * i) / count - Math.PI / 2;
    return { x: center.x + radius * Math.cos(angle), y: center.y + radius * Math.sin(angle) };
  });
}

/**
 * Places the selected nodes on the circle circumscribing their bounding box. Each
 * connected component is ordered independently and the components are laid out
 * one after another around the circle. Unselected nodes are returned unchanged.
 */
export function circularLayout(input: CircularLayoutInput): NodePosition[] {
  const result = input.positions.map(cloneNodePosition);
  const selected = [...new Set(input.selectedNodes)]
    .filter((node) => Number.isInteger(node) && node >= 0 && node < result.length)
    .sort((a, b) => a - b);
  if (selected.length === 0) {
    return result;
  }
  const selectedSet = new Set(selected);
  const edges = visibleEdges(input.edges, new SortedTagSet(input.hiddenTags ?? [])).filter(
    (edge) => selectedSet.has(edge.from) && selectedSet.has(edge.to)
  );

  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (const node of selected) {
    const { x, y } = result[node].pos;
    minX = Math.min(minX, x);
    minY = Math.min(minY, y);
    maxX = Math.max(maxX, x);
    maxY = Math.max(maxY, y);
  }
  const center = { x: (minX + maxX) / 2, y: (minY + maxY) / 2 };
  const spanRadius = Math.hypot(center.x - minX, center.y - minY);
  const radius = spanRadius > 0 ? spanRadius : FALLBACK_CIRCLE_RADIUS;

  const order: number[] = [];
  for (const component of findComponents(edges, selected)) {
    if (component.length <= 2) {
      order.push(...component);
      continue;
    }
    const members = new Set(component);
    const componentEdges = edges.filter((edge) => members.has(edge.from));
    order.push(...geneticOrdering(componentEdges, input.genetic));
  }

  circlePositions(center, radius, order.length).forEach((pos, slot) => {
    result[order[slot]].pos = pos;
  });
  return result;
}
