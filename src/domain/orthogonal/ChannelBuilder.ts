import { boundingRect, rectCenter, rectExpand, rectsIntersect, type Rect } from "@/domain/geometry/Rect";
import { createChannel, mergeChannels } from "@/domain/orthogonal/channelGeometry";
import type { Orientation, RChannel, Side } from "@/domain/orthogonal/orthogonalTypes";

export const DEFAULT_CHANNEL_MARGIN = 20;

const BOUNDARY = -1;

/** One box edge (or the outer boundary) seen as a line segment during the sweep. */
type AreaLimit = {
  coord: number;
  min: number;
  max: number;
  nodeId: number;
};

type ChannelSpan = {
  crossMin: number;
  crossMax: number;
  runMin: number;
  runMax: number;
};

export type ChannelSet = {
  vertical: RChannel[];
  horizontal: RChannel[];
};

function sortedLimits(limits: AreaLimit[]): AreaLimit[] {
  return limits.sort((a, b) => a.coord - b.coord);
}

function covers(limit: AreaLimit, coord: number): boolean {
  return coord >= limit.min && coord <= limit.max;
}

/**
 * Grows the free rectangle next to `anchor`: the nearest limit below the anchor's start,
 * the nearest one past its end, then the nearest facing limit across.
 * `facingBefore` is set when the anchor is the channel's far boundary.
 */
function findChannelSpan(
  anchor: AreaLimit,
  lower: readonly AreaLimit[],
  upper: readonly AreaLimit[],
  facing: readonly AreaLimit[],
  facingBefore: boolean
): ChannelSpan | null {
  for (let i = lower.length - 1; i >= 0; i -= 1) {
    const low = lower[i];
    if (low.coord > anchor.min || !covers(low, anchor.coord)) {
      continue;
    }
    for (const high of upper) {
      if (high.coord < anchor.max || !covers(high, anchor.coord)) {
        continue;
      }
      const opens = (limit: AreaLimit) => limit.min <= high.coord && low.coord <= limit.max;
      if (facingBefore) {
        for (let j = facing.length - 1; j >= 0; j -= 1) {
          const limit = facing[j];
          if (limit.coord <= anchor.coord && opens(limit)) {
            return { crossMin: limit.coord, crossMax: anchor.coord, runMin: low.coord, runMax: high.coord };
          }
        }
      } else {
        for (const limit of facing) {
          if (anchor.coord <= limit.coord && opens(limit)) {
            return { crossMin: anchor.coord, crossMax: limit.coord, runMin: low.coord, runMax: high.coord };
          }
        }
      }
    }
  }
  return null;
}

function spanToRect(span: ChannelSpan, orientation: Orientation): Rect {
  return orientation === "vertical"
    ? { minX: span.crossMin, maxX: span.crossMax, minY: span.runMin, maxY: span.runMax }
    : { minX: span.runMin, maxX: span.runMax, minY: span.crossMin, maxY: span.crossMax };
}

/** Adds `channel`, merging it with every channel it touches until none intersect. */
function insertChannel(channels: RChannel[], channel: RChannel): void {
  const hostIndex = channels.findIndex((existing) => rectsIntersect(existing.rect, channel.rect));
  if (hostIndex < 0) {
    channels.push(channel);
    return;
  }
  const host = channels[hostIndex];
  mergeChannels(host, channel);
  let merged = true;
  while (merged) {
    merged = false;
    for (let i = 0; i < channels.length; i += 1) {
      if (i !== channels.indexOf(host) && rectsIntersect(channels[i].rect, host.rect)) {
        mergeChannels(host, channels[i]);
        channels.splice(i, 1);
        merged = true;
        break;
      }
    }
  }
}

type Sweep = {
  anchors: readonly AreaLimit[];
  lower: readonly AreaLimit[];
  upper: readonly AreaLimit[];
  facing: readonly AreaLimit[];
  facingBefore: boolean;
  side: Side;
};

/**
 * Builds the vertical and horizontal routing channels around `boxes`. Every box side
 * gets exactly one port on the channel adjacent to it; the layout is surrounded by a
 * `margin` wide frame so outer sides have channels too.
 */
export function buildChannels(boxes: readonly Rect[], margin = DEFAULT_CHANNEL_MARGIN): ChannelSet {
  const bounds = boundingRect(boxes);
  if (!bounds) {
    return { vertical: [], horizontal: [] };
  }
  const frame = rectExpand(bounds, margin);

  const leftEdges: AreaLimit[] = [];
  const rightEdges: AreaLimit[] = [];
  const topEdges: AreaLimit[] = [];
  const bottomEdges: AreaLimit[] = [];
  boxes.forEach((box, nodeId) => {
    leftEdges.push({ coord: box.minX, min: box.minY, max: box.maxY, nodeId });
    rightEdges.push({ coord: box.maxX, min: box.minY, max: box.maxY, nodeId });
    topEdges.push({ coord: box.minY, min: box.minX, max: box.maxX, nodeId });
    bottomEdges.push({ coord: box.maxY, min: box.minX, max: box.maxX, nodeId });
  });
  // The frame bounds every sweep from the outside.
  leftEdges.push({ coord: frame.maxX, min: frame.minY, max: frame.maxY, nodeId: BOUNDARY });
  rightEdges.push({ coord: frame.minX, min: frame.minY, max: frame.maxY, nodeId: BOUNDARY });
  topEdges.push({ coord: frame.maxY, min: frame.minX, max: frame.maxX, nodeId: BOUNDARY });
  bottomEdges.push({ coord: frame.minY, min: frame.minX, max: frame.maxX, nodeId: BOUNDARY });
  sortedLimits(leftEdges);
  sortedLimits(rightEdges);
  sortedLimits(topEdges);
  sortedLimits(bottomEdges);

  const sweep = (orientation: Orientation, sweeps: Sweep[]): RChannel[] => {
    const channels: RChannel[] = [];
    for (const { anchors, lower, upper, facing, facingBefore, side } of sweeps) {
      for (const anchor of anchors) {
        const span = findChannelSpan(anchor, lower, upper, facing, facingBefore);
        if (!span) {
          continue;
        }
        const channel = createChannel(spanToRect(span, orientation), orientation);
        if (anchor.nodeId !== BOUNDARY) {
          const center = rectCenter(boxes[anchor.nodeId]);
          channel.ports.push({
            kind: "node",
            position: orientation === "vertical" ? center.y : center.x,
            routingNode: -1,
            nodeId: anchor.nodeId,
            side
          });
        }
        insertChannel(channels, channel);
      }
    }
    return channels;
  };

  const vertical = sweep("vertical", [
    { anchors: leftEdges, lower: bottomEdges, upper: topEdges, facing: rightEdges, facingBefore: true, side: "left" },
    { anchors: rightEdges, lower: bottomEdges, upper: topEdges, facing: leftEdges, facingBefore: false, side: "right" }
  ]);
  const horizontal = sweep("horizontal", [
    { anchors: topEdges, lower: rightEdges, upper: leftEdges, facing: bottomEdges, facingBefore: true, side: "top" },
    { anchors: bottomEdges, lower: rightEdges, upper: leftEdges, facing: topEdges, facingBefore: false, side: "bottom" }
  ]);
  return { vertical, horizontal };
}
