import { copyRect, type Rect } from "@/domain/geometry/Rect";
import type { Vec2 } from "@/domain/geometry/Vec2";
import type { LayoutEdge } from "@/domain/graph/GraphTypes";
import { visibleEdges } from "@/domain/graph/graphFilters";
import { SortedTagSet } from "@/domain/graph/SortedTagSet";
import { DEFAULT_CHANNEL_MARGIN } from "@/domain/orthogonal/ChannelBuilder";
import { resizeChannels } from "@/domain/orthogonal/ChannelResizer";
import { findRoutes } from "@/domain/orthogonal/RouteFinder";
import { routeSegments } from "@/domain/orthogonal/routeSegments";
import { RoutingGraph } from "@/domain/orthogonal/RoutingGraph";
import { assignSlots } from "@/domain/orthogonal/SlotAssigner";

export const MIN_CHANNEL_WIDTH = 20;
export const LANE_WIDTH = 8;

export type OrthogonalRoutingInput = {
  boxes: Rect[];
  edges: LayoutEdge[];
  hiddenTags?: number[];
  margin?: number;
};

export type OrthogonalEdgeRoute = {
  edgeIndex: number;
  from: number;
  to: number;
  tag: number;
  /** Control points from the `from` box to the `to` box. */
  points: Vec2[];
  /** Lane taken in each channel the route passes, in route order. */
  lanes: number[];
};

export type OrthogonalRoutingResult = {
  boxes: Rect[];
  edges: OrthogonalEdgeRoute[];
  detectedCycles: number;
};

export function minChannelWidth(slots: number): number {
  return MIN_CHANNEL_WIDTH + slots * LANE_WIDTH;
}

/**
 * Routes every visible edge as a rectilinear polyline through the free channels between
 * boxes. Channels are widened to fit their lanes, which may push boxes apart; the moved
 * boxes are returned. Parallel edges between the same boxes share one route.
 */
export function routeOrthogonalEdges(input: OrthogonalRoutingInput): OrthogonalRoutingResult {
  const boxes = input.boxes.map(copyRect);
  const edges = visibleEdges(input.edges, new SortedTagSet(input.hiddenTags ?? []));
  for (const edge of edges) {
    if (Math.max(edge.from, edge.to) >= boxes.length || Math.min(edge.from, edge.to) < 0) {
      throw new RangeError(`[orthogonal-routing] Edge ${edge.edgeIndex} references a box outside [0, ${boxes.length})`);
    }
  }
  if (edges.length === 0 || boxes.length < 2) {
    return { boxes, edges: [], detectedCycles: 0 };
  }

  const graph = RoutingGraph.create(boxes, input.margin ?? DEFAULT_CHANNEL_MARGIN);
  const routes = findRoutes(graph, boxes, edges);
  const slots = assignSlots(graph, boxes, routes);
  if (slots.detectedCycles > 0) {
    console.warn("[orthogonal-routing] Conflicting route orders ignored", { count: slots.detectedCycles });
  }

  const widths = slots.channelSlots.map(minChannelWidth);
  resizeChannels(graph, boxes, widths.slice(0, graph.vertical.length), widths.slice(graph.vertical.length));
  const polylines = routeSegments(graph, boxes, routes, slots);

  const routeIndex = new Map(routes.map((route, index) => [`${route.from}:${route.to}`, index]));
  const routed: OrthogonalEdgeRoute[] = [];
  for (const edge of edges) {
    const low = Math.min(edge.from, edge.to);
    const high = Math.max(edge.from, edge.to);
    const index = routeIndex.get(`${low}:${high}`);
    if (index === undefined) {
      throw new Error(`[orthogonal-routing] Edge ${edge.edgeIndex} has no route`);
    }
    const reversed = edge.from > edge.to;
    const points = polylines[index].map((point) => ({ x: point.x, y: point.y }));
    const lanes = [...slots.routes[index].lanes];
    routed.push({
      edgeIndex: edge.edgeIndex,
      from: edge.from,
      to: edge.to,
      tag: edge.tag,
      points: reversed ? points.reverse() : points,
      lanes: reversed ? lanes.reverse() : lanes
    });
  }
  return { boxes, edges: routed, detectedCycles: slots.detectedCycles };
}
