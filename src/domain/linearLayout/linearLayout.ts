import { findComponents } from "@/domain/circularLayout/components";
import { depthFirstOrdering } from "@/domain/circularLayout/geneticOrdering";
import {
  cloneNodePosition,
  nodeSizeOf,
  type LayoutEdge,
  type NodePosition,
  type NodeSize
} from "@/domain/graph/GraphTypes";
import { visibleEdges } from "@/domain/graph/graphFilters";
import { SortedTagSet } from "@/domain/graph/SortedTagSet";
import { mulberry32 } from "@/lib/random";

export type LinearOrientation = "horizontal" | "vertical";

export type LinearLayoutInput = {
  positions: NodePosition[];
  edges: LayoutEdge[];
  nodeSizes?: NodeSize[];
  hiddenTags?: number[];
  /** With fewer than three selected nodes the whole graph is laid out. */
  selectedNodes?: number[];
  orientation?: LinearOrientation;
  spacing?: number;
  seed?: number;
};

export type LinearLayoutResult = {
  positions: NodePosition[];
  /** Input edges; edges inside reordered components get an arc height as curvature. */
  edges: LayoutEdge[];
};

export const LINEAR_NODE_SPACING = 50;
export const PARALLEL_ARC_STEP = 5;
const MIN_SELECTION = 3;

function resolveSelection(input: LinearLayoutInput): number[] {
  const count = input.positions.length;
  const selected = [...new Set(input.selectedNodes ?? [])]
    .filter((node) => Number.isInteger(node) && node >= 0 && node < count)
    .sort((a, b) => a - b);
  return selected.length < MIN_SELECTION ? input.positions.map((_, index) => index) : selected;
}

/**
 * Lines the selected nodes up along one axis, starting at the left (or top) of their
 * bounding box and centred on it across the axis. Components of more than two nodes are
 * ordered by a random depth-first traversal from their least connected node; edges in
 * those components arc over the nodes they skip.
 */
export function linearLayout(input: LinearLayoutInput): LinearLayoutResult {
  const positions = input.positions.map(cloneNodePosition);
  const edgesOut = input.edges.map((edge) => ({ ...edge }));
  const selected = resolveSelection(input);
  if (selected.length < 2) {
    return { positions, edges: edgesOut };
  }
  const orientation = input.orientation ?? "horizontal";
  const spacing = input.spacing ?? LINEAR_NODE_SPACING;
  const random = input.seed === undefined ? Math.random : mulberry32(input.seed);
  const selectedSet = new Set(selected);
  const edges = visibleEdges(input.edges, new SortedTagSet(input.hiddenTags ?? [])).filter(
    (edge) => selectedSet.has(edge.from) && selectedSet.has(edge.to)
  );

  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (const node of selected) {
    const { x, y } = positions[node].pos;
    minX = Math.min(minX, x);
    minY = Math.min(minY, y);
    maxX = Math.max(maxX, x);
    maxY = Math.max(maxY, y);
  }

  const order: number[] = [];
  for (const component of findComponents(edges, selected)) {
    if (component.length <= 2) {
      order.push(...component);
      continue;
    }
    const members = new Set(component);
    const componentEdges = edges.filter((edge) => members.has(edge.from));
    const componentOrder = depthFirstOrdering(componentEdges, random);
    const slotOf = new Map(componentOrder.map((node, slot) => [node, slot]));
    const arcsByPair = new Map<string, number>();
    for (const edge of componentEdges) {
      const key = `${edge.from}:${edge.to}`;
      const previous = arcsByPair.get(key) ?? 0;
      arcsByPair.set(key, previous + 1);
      const skipped = Math.abs((slotOf.get(edge.to) ?? 0) - (slotOf.get(edge.from) ?? 0)) - 1;
      edgesOut[edge.edgeIndex].curvature = spacing * skipped + PARALLEL_ARC_STEP * previous;
    }
    order.push(...componentOrder);
  }

  const centerX = (minX + maxX) / 2;
  const centerY = (minY + maxY) / 2;
  let cursor = orientation === "horizontal" ? minX : minY;
  for (const node of order) {
    const size = nodeSizeOf(input.nodeSizes, node);
    if (orientation === "horizontal") {
      positions[node].pos = { x: cursor + size.width / 2, y: centerY };
      cursor += size.width + spacing;
    } else {
      positions[node].pos = { x: centerX, y: cursor + size.height / 2 };
      cursor += size.height + spacing;
    }
  }
  return { positions, edges: edgesOut };
}
