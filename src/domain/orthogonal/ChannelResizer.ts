import type { Rect } from "@/domain/geometry/Rect";
import { channelWidth } from "@/domain/orthogonal/channelGeometry";
import { NO_CHANNEL, type RChannel, type Side } from "@/domain/orthogonal/orthogonalTypes";
import type { RoutingGraph } from "@/domain/orthogonal/RoutingGraph";

type PendingMove =
  | { kind: "move-box"; min: number; nodeId: number }
  | { kind: "move-channel"; min: number; channel: number }
  | { kind: "add-channel-width"; delta: number; channel: number };

/** Reads and shifts rectangles along one axis. */
type Axis = {
  channels(graph: RoutingGraph): RChannel[];
  crossChannels(graph: RoutingGraph): RChannel[];
  min(rect: Rect): number;
  max(rect: Rect): number;
  setMax(rect: Rect, value: number): void;
  /** Moves `rect` by `delta` and returns its new max. */
  translate(rect: Rect, delta: number): number;
  /** Side of a box facing the channel that grows towards it. */
  growingSide: Side;
  /** Side of a box whose channel follows it along the axis. */
  trailingSide: Side;
  /** Bend points as (channel on this axis, crossing channel). */
  bends(graph: RoutingGraph): [number, number][];
};

const X_AXIS: Axis = {
  channels: (graph) => graph.vertical,
  crossChannels: (graph) => graph.horizontal,
  min: (rect) => rect.minX,
  max: (rect) => rect.maxX,
  setMax: (rect, value) => {
    rect.maxX = value;
  },
  translate: (rect, delta) => {
    rect.minX += delta;
    rect.maxX += delta;
    return rect.maxX;
  },
  growingSide: "left",
  trailingSide: "right",
  bends: (graph) => graph.bendPoints().map((bend) => [bend.vertical, bend.horizontal])
};

const Y_AXIS: Axis = {
  channels: (graph) => graph.horizontal,
  crossChannels: (graph) => graph.vertical,
  min: (rect) => rect.minY,
  max: (rect) => rect.maxY,
  setMax: (rect, value) => {
    rect.maxY = value;
  },
  translate: (rect, delta) => {
    rect.minY += delta;
    rect.maxY += delta;
    return rect.maxY;
  },
  growingSide: "top",
  trailingSide: "bottom",
  bends: (graph) => graph.bendPoints().map((bend) => [bend.horizontal, bend.vertical])
};

function resizeAxis(axis: Axis, graph: RoutingGraph, boxes: Rect[], minWidths: readonly number[]): void {
  const channels = axis.channels(graph);
  if (minWidths.length !== channels.length) {
    throw new RangeError(
      `[orthogonal-routing] Expected ${channels.length} minimum widths, received ${minWidths.length}`
    );
  }

  const moves: PendingMove[] = [];
  minWidths.forEach((minWidth, channel) => {
    const delta = minWidth - channelWidth(channels[channel]);
    if (delta > 0) {
      moves.push({ kind: "add-channel-width", delta, channel });
    }
  });

  const trailingChannel = new Array<number>(boxes.length).fill(NO_CHANNEL);
  channels.forEach((channel, index) => {
    for (const port of channel.ports) {
      if (port.kind === "node" && port.side === axis.trailingSide) {
        trailingChannel[port.nodeId] = index;
      }
    }
  });

  // Crossing channels ending on the same outer line as this channel keep ending there.
  const alignedCrossChannels = new Map<number, number[]>();
  const crossChannels = axis.crossChannels(graph);
  for (const [channel, cross] of axis.bends(graph)) {
    if (axis.max(channels[channel].rect) === axis.max(crossChannels[cross].rect)) {
      const aligned = alignedCrossChannels.get(channel);
      if (aligned) {
        aligned.push(cross);
      } else {
        alignedCrossChannels.set(channel, [cross]);
      }
    }
  }

  const pushGrowingBoxes = (channel: RChannel, edge: number) => {
    for (const port of channel.ports) {
      if (port.kind === "node" && port.side === axis.growingSide && edge > axis.min(boxes[port.nodeId])) {
        moves.unshift({ kind: "move-box", min: edge, nodeId: port.nodeId });
      }
    }
  };

  for (let move = moves.shift(); move !== undefined; move = moves.shift()) {
    switch (move.kind) {
      case "move-box": {
        const box = boxes[move.nodeId];
        const delta = move.min - axis.min(box);
        if (delta <= 0) {
          break;
        }
        const edge = axis.translate(box, delta);
        const next = trailingChannel[move.nodeId];
        if (next !== NO_CHANNEL && edge > axis.min(channels[next].rect)) {
          moves.unshift({ kind: "move-channel", min: edge, channel: next });
        }
        break;
      }
      case "move-channel": {
        const channel = channels[move.channel];
        const delta = move.min - axis.min(channel.rect);
        if (delta > 0) {
          pushGrowingBoxes(channel, axis.translate(channel.rect, delta));
        }
        break;
      }
      case "add-channel-width": {
        const channel = channels[move.channel];
        const edge = axis.max(channel.rect) + move.delta;
        axis.setMax(channel.rect, edge);
        pushGrowingBoxes(channel, edge);
        break;
      }
    }
  }

  for (const [channel, aligned] of alignedCrossChannels) {
    const edge = axis.max(channels[channel].rect);
    for (const cross of aligned) {
      axis.setMax(crossChannels[cross].rect, edge);
    }
  }
}

/**
 * Widens channels to the requested minimum widths and pushes boxes and channels beyond
 * them outwards until nothing overlaps. Horizontal extents are settled first, then
 * vertical ones. Mutates the graph's channels and `boxes` in place.
 */
export function resizeChannels(
  graph: RoutingGraph,
  boxes: Rect[],
  minVerticalWidths: readonly number[],
  minHorizontalWidths: readonly number[]
): void {
  resizeAxis(X_AXIS, graph, boxes, minVerticalWidths);
  resizeAxis(Y_AXIS, graph, boxes, minHorizontalWidths);
}
