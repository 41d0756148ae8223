import { ZERO_VEC, type Vec2 } from "@/domain/geometry/Vec2";
import type { Rect } from "@/domain/geometry/Rect";
import { channelSlotPosition, nodePortSlotPosition } from "@/domain/orthogonal/channelGeometry";
import { portKey, type AbstractRoute, type ChannelRef } from "@/domain/orthogonal/orthogonalTypes";
import type { RoutingGraph } from "@/domain/orthogonal/RoutingGraph";
import type { SlotAssignment } from "@/domain/orthogonal/SlotAssigner";

function portPoint(graph: RoutingGraph, boxes: readonly Rect[], id: number, slot: number, slots: SlotAssignment): Vec2 {
  const port = graph.nodes[id];
  if (port.kind !== "port") {
    throw new Error(`[orthogonal-routing] Invalid route shape: element ${id} is not a port`);
  }
  const total = slots.portSlotTotals.get(portKey(port.nodeId, port.side)) ?? 1;
  return nodePortSlotPosition(boxes[port.nodeId], port.side, slot, total);
}

function lanePoint(graph: RoutingGraph, slots: SlotAssignment, channel: ChannelRef, lane: number, along: Vec2): Vec2 {
  return channelSlotPosition(graph.channel(channel), along, lane, slots.channelSlots[graph.channelSlotIndex(channel)]);
}

/**
 * Rectilinear polyline per route: the start port, its lane in the first channel, one
 * corner per bend, the lane in the last channel and the end port.
 */
export function routeSegments(
  graph: RoutingGraph,
  boxes: readonly Rect[],
  routes: readonly AbstractRoute[],
  slots: SlotAssignment
): Vec2[][] {
  return routes.map(({ route }, routeIndex) => {
    const { legs, lanes, startSlot, endSlot } = slots.routes[routeIndex];
    const start = portPoint(graph, boxes, route[0], startSlot, slots);
    const end = portPoint(graph, boxes, route[route.length - 1], endSlot, slots);
    const points: Vec2[] = [start, lanePoint(graph, slots, legs[0].channel, lanes[0], start)];

    for (let leg = 1; leg < legs.length; leg += 1) {
      const [vertical, horizontal] =
        legs[leg - 1].channel.orientation === "vertical" ? [leg - 1, leg] : [leg, leg - 1];
      const x = lanePoint(graph, slots, legs[vertical].channel, lanes[vertical], ZERO_VEC).x;
      const y = lanePoint(graph, slots, legs[horizontal].channel, lanes[horizontal], ZERO_VEC).y;
      points.push({ x, y });
    }

    const lastLeg = legs.length - 1;
    points.push(lanePoint(graph, slots, legs[lastLeg].channel, lanes[lastLeg], end), end);
    return points;
  });
}
