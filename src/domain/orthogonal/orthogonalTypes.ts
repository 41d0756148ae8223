import type { Rect } from "@/domain/geometry/Rect";

export type Side = "left" | "right" | "top" | "bottom";

export type Orientation = "vertical" | "horizontal";

export type BendDirection = "up-right" | "up-left" | "down-right" | "down-left";

export type ChannelRef = {
  index: number;
  orientation: Orientation;
};

/** Attachment on a channel boundary: either a node side or the crossing with an orthogonal channel. */
export type ChannelPort =
  | { kind: "node"; position: number; routingNode: number; nodeId: number; side: Side }
  | { kind: "bend"; position: number; routingNode: number; channelId: number };

/** Free-space corridor between node boxes. */
export type RChannel = {
  rect: Rect;
  orientation: Orientation;
  ports: ChannelPort[];
};

export type RoutingNode =
  | { kind: "node"; nodeId: number }
  | { kind: "port"; nodeId: number; channel: number; side: Side }
  | { kind: "bend"; vertical: number; horizontal: number };

/**
 * Route between two boxes through the routing graph: a start port, one bend point per
 * change of channel and an end port. Slots are not assigned yet.
 */
export type AbstractRoute = {
  from: number;
  to: number;
  route: number[];
  bendDirections: BendDirection[];
};

export const NO_CHANNEL = -1;

export const SIDES: readonly Side[] = ["left", "right", "top", "bottom"];

export function sideOrientation(side: Side): Orientation {
  return side === "left" || side === "right" ? "vertical" : "horizontal";
}

export function oppositeOrientation(orientation: Orientation): Orientation {
  return orientation === "vertical" ? "horizontal" : "vertical";
}

export function sameChannel(a: ChannelRef, b: ChannelRef): boolean {
  return a.index === b.index && a.orientation === b.orientation;
}

/** Key of a node side in per-port tables. */
export function portKey(nodeId: number, side: Side): number {
  return nodeId * 4 + SIDES.indexOf(side);
}
