import { rectIntersection, type Rect } from "@/domain/geometry/Rect";
import {
  oppositeOrientation,
  portKey,
  sameChannel,
  type AbstractRoute,
  type ChannelRef,
  type Orientation
} from "@/domain/orthogonal/orthogonalTypes";
import { routeElementPoint } from "@/domain/orthogonal/RouteFinder";
import { RouteOrderResolver } from "@/domain/orthogonal/RouteOrderResolver";
import type { RoutingGraph } from "@/domain/orthogonal/RoutingGraph";

/** Stretch of a route inside one channel, between two consecutive route elements. */
export type RouteLeg = {
  channel: ChannelRef;
  /** Extent along the channel run, including the full side of an attached box. */
  lo: number;
  hi: number;
};

export type RouteSlotAssignment = {
  legs: RouteLeg[];
  /** Lane per leg, counted from the channel's min side. */
  lanes: number[];
  startSlot: number;
  endSlot: number;
};

export type SlotAssignment = {
  /** Route indices in resolved drawing order. */
  order: number[];
  detectedCycles: number;
  /** Lanes needed per channel, vertical channels first. */
  channelSlots: number[];
  /** Attachments per node side, keyed by `portKey`. */
  portSlotTotals: Map<number, number>;
  routes: RouteSlotAssignment[];
};

type Span = { lo: number; hi: number };

function alongRun(point: { x: number; y: number }, orientation: Orientation): number {
  return orientation === "vertical" ? point.y : point.x;
}

function elementSpan(graph: RoutingGraph, boxes: readonly Rect[], id: number, orientation: Orientation): Span {
  const node = graph.nodes[id];
  if (node.kind === "port") {
    const box = boxes[node.nodeId];
    return orientation === "vertical" ? { lo: box.minY, hi: box.maxY } : { lo: box.minX, hi: box.maxX };
  }
  if (node.kind === "bend") {
    const crossing = rectIntersection(graph.vertical[node.vertical].rect, graph.horizontal[node.horizontal].rect);
    return orientation === "vertical" ? { lo: crossing.minY, hi: crossing.maxY } : { lo: crossing.minX, hi: crossing.maxX };
  }
  throw new Error(`[orthogonal-routing] Invalid route element ${id}: expected a port or bend`);
}

/** Splits a route into the channel stretches between its elements. */
export function routeLegs(graph: RoutingGraph, boxes: readonly Rect[], route: readonly number[]): RouteLeg[] {
  if (route.length < 2) {
    throw new Error(`[orthogonal-routing] Invalid route shape: ${route.length} elements`);
  }
  const legs: RouteLeg[] = [];
  let channel = graph.channelOf(route[0], "vertical");
  for (let i = 1; i < route.length; i += 1) {
    const start = elementSpan(graph, boxes, route[i - 1], channel.orientation);
    const end = elementSpan(graph, boxes, route[i], channel.orientation);
    legs.push({ channel, lo: Math.min(start.lo, end.lo), hi: Math.max(start.hi, end.hi) });
    if (i < route.length - 1) {
      channel = graph.channelOf(route[i], oppositeOrientation(channel.orientation));
    }
  }
  const last = graph.channelOf(route[route.length - 1], channel.orientation);
  if (!sameChannel(last, channel)) {
    throw new Error("[orthogonal-routing] Invalid route shape: end port is not on the last channel");
  }
  return legs;
}

type PortVisit = { route: number; far: number };

/**
 * Orders routes that share a node side by where their first leg heads, resolves
 * those orders into one drawing order, then hands out node-side slots and channel
 * lanes. Legs whose extents do not overlap may share a lane.
 */
export function assignSlots(graph: RoutingGraph, boxes: readonly Rect[], routes: readonly AbstractRoute[]): SlotAssignment {
  const legsByRoute = routes.map((route) => routeLegs(graph, boxes, route.route));

  const visitsByPort = new Map<number, PortVisit[]>();
  const visitPort = (routeIndex: number, portId: number, farId: number, orientation: Orientation) => {
    const port = graph.nodes[portId];
    if (port.kind !== "port") {
      throw new Error(`[orthogonal-routing] Invalid route shape: element ${portId} is not a port`);
    }
    const key = portKey(port.nodeId, port.side);
    const visit = { route: routeIndex, far: alongRun(routeElementPoint(graph, boxes, farId), orientation) };
    const visits = visitsByPort.get(key);
    if (visits) {
      visits.push(visit);
    } else {
      visitsByPort.set(key, [visit]);
    }
  };
  routes.forEach(({ route }, routeIndex) => {
    const legs = legsByRoute[routeIndex];
    visitPort(routeIndex, route[0], route[1], legs[0].channel.orientation);
    visitPort(routeIndex, route[route.length - 1], route[route.length - 2], legs[legs.length - 1].channel.orientation);
  });

  const resolver = new RouteOrderResolver(routes.length);
  for (const visits of visitsByPort.values()) {
    visits.sort((a, b) => a.far - b.far || a.route - b.route);
    for (let i = 1; i < visits.length; i += 1) {
      resolver.addRouteOrder(visits[i - 1].route, visits[i].route);
    }
  }
  const order = resolver.topologicalSort();
  const rank = new Array<number>(routes.length);
  order.forEach((route, index) => {
    rank[route] = index;
  });

  const assignments: RouteSlotAssignment[] = legsByRoute.map((legs) => ({
    legs,
    lanes: new Array<number>(legs.length).fill(0),
    startSlot: 0,
    endSlot: 0
  }));

  const portSlotTotals = new Map<number, number>();
  for (const [key, visits] of visitsByPort) {
    portSlotTotals.set(key, visits.length);
    [...visits]
      .sort((a, b) => rank[a.route] - rank[b.route])
      .forEach((visit, slot) => {
        const assignment = assignments[visit.route];
        const startPort = graph.nodes[routes[visit.route].route[0]];
        if (startPort.kind === "port" && portKey(startPort.nodeId, startPort.side) === key) {
          assignment.startSlot = slot;
        } else {
          assignment.endSlot = slot;
        }
      });
  }

  const legsByChannel: { route: number; leg: number; lo: number; hi: number }[][] = Array.from(
    { length: graph.channelCount },
    () => []
  );
  legsByRoute.forEach((legs, route) => {
    legs.forEach((leg, index) => {
      legsByChannel[graph.channelSlotIndex(leg.channel)].push({ route, leg: index, lo: leg.lo, hi: leg.hi });
    });
  });
  const channelSlots = legsByChannel.map((entries) => {
    entries.sort((a, b) => a.lo - b.lo || a.hi - b.hi || rank[a.route] - rank[b.route]);
    const laneEnds: number[] = [];
    for (const entry of entries) {
      let lane = laneEnds.findIndex((end) => end < entry.lo);
      if (lane < 0) {
        lane = laneEnds.length;
        laneEnds.push(entry.hi);
      } else {
        laneEnds[lane] = entry.hi;
      }
      assignments[entry.route].lanes[entry.leg] = lane;
    }
    return laneEnds.length;
  });

  return { order, detectedCycles: resolver.detectedCycles, channelSlots, portSlotTotals, routes: assignments };
}
