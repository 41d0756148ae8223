import type { Vec2 } from "@/domain/geometry/Vec2";

export const TAU = Math.PI * 2;
export const EPS = 1e-9;

/** Quintic smootherstep inverted: 1 at x <= 0, 0 at x >= 1. */
export function smoothInvert(x: number): number {
  if (x <= 0) {
    return 1;
  }
  if (x >= 1) {
    return 0;
  }
  const x3 = x * x * x;
  const x4 = x3 * x;
  const x5 = x4 * x;
  return 1 - (6 * x5 - 15 * x4 + 10 * x3);
}

/** Largest distance any node moved between two snapshots of the same graph. */
export function maxDisplacementOf(before: readonly { pos: Vec2 }[], after: readonly { pos: Vec2 }[]): number {
  let max = 0;
  after.forEach((node, index) => {
    const from = before[index].pos;
    max = Math.max(max, Math.hypot(node.pos.x - from.x, node.pos.y - from.y));
  });
  return max;
}
