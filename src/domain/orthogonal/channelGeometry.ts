import type { Vec2 } from "@/domain/geometry/Vec2";
import { rectCenter, rectHeight, rectWidth, type Rect } from "@/domain/geometry/Rect";
import type { Orientation, RChannel, Side } from "@/domain/orthogonal/orthogonalTypes";

export function createChannel(rect: Rect, orientation: Orientation): RChannel {
  return { rect, orientation, ports: [] };
}

/**
 * Folds `other` into `target`: the run along the channel becomes the union of both,
 * the cross extent the intersection, so the result stays inside the free area of both.
 */
export function mergeChannels(target: RChannel, other: RChannel): void {
  const a = target.rect;
  const b = other.rect;
  if (target.orientation === "vertical") {
    target.rect = {
      minX: Math.max(a.minX, b.minX),
      maxX: Math.min(a.maxX, b.maxX),
      minY: Math.min(a.minY, b.minY),
      maxY: Math.max(a.maxY, b.maxY)
    };
  } else {
    target.rect = {
      minX: Math.min(a.minX, b.minX),
      maxX: Math.max(a.maxX, b.maxX),
      minY: Math.max(a.minY, b.minY),
      maxY: Math.min(a.maxY, b.maxY)
    };
  }
  target.ports.push(...other.ports);
  other.ports = [];
}

/** Extent across the channel, the room available for parallel lanes. */
export function channelWidth(channel: RChannel): number {
  return channel.orientation === "vertical" ? rectWidth(channel.rect) : rectHeight(channel.rect);
}

/** Projects `point` onto the channel's centre line. */
export function pointOnChannel(channel: RChannel, point: Vec2): Vec2 {
  const center = rectCenter(channel.rect);
  return channel.orientation === "vertical" ? { x: center.x, y: point.y } : { x: point.x, y: center.y };
}

/** Position of lane `slot` of `totalSlots` evenly spaced lanes, aligned with `point` along the run. */
export function channelSlotPosition(channel: RChannel, point: Vec2, slot: number, totalSlots: number): Vec2 {
  if (channel.orientation === "vertical") {
    const spacing = rectWidth(channel.rect) / (totalSlots + 1);
    return { x: channel.rect.minX + spacing * (slot + 1), y: point.y };
  }
  const spacing = rectHeight(channel.rect) / (totalSlots + 1);
  return { x: point.x, y: channel.rect.minY + spacing * (slot + 1) };
}

export function nodePortPosition(box: Rect, side: Side): Vec2 {
  const center = rectCenter(box);
  switch (side) {
    case "right":
      return { x: box.maxX, y: center.y };
    case "left":
      return { x: box.minX, y: center.y };
    case "top":
      return { x: center.x, y: box.minY };
    case "bottom":
      return { x: center.x, y: box.maxY };
  }
}

export function nodePortSlotPosition(box: Rect, side: Side, slot: number, totalSlots: number): Vec2 {
  if (side === "left" || side === "right") {
    const spacing = rectHeight(box) / (totalSlots + 1);
    return { x: side === "left" ? box.minX : box.maxX, y: box.minY + spacing * (slot + 1) };
  }
  const spacing = rectWidth(box) / (totalSlots + 1);
  return { x: box.minX + spacing * (slot + 1), y: side === "top" ? box.minY : box.maxY };
}
