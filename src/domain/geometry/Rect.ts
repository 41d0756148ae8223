import type { Vec2 } from "@/domain/geometry/Vec2";

/** Axis-aligned rectangle stored as min/max corners. */
export type Rect = {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
};

export function rect(minX: number, minY: number, maxX: number, maxY: number): Rect {
  return { minX, minY, maxX, maxY };
}

export function rectFromCenterSize(center: Vec2, width: number, height: number): Rect {
  const hw = width * 0.5;
  const hh = height * 0.5;
  return { minX: center.x - hw, minY: center.y - hh, maxX: center.x + hw, maxY: center.y + hh };
}

export function rectWidth(r: Rect): number {
  return r.maxX - r.minX;
}

export function rectHeight(r: Rect): number {
  return r.maxY - r.minY;
}

export function rectCenter(r: Rect): Vec2 {
  return { x: (r.minX + r.maxX) * 0.5, y: (r.minY + r.maxY) * 0.5 };
}

export function copyRect(r: Rect): Rect {
  return { minX: r.minX, minY: r.minY, maxX: r.maxX, maxY: r.maxY };
}

/** Inclusive test: rectangles that only touch along an edge or corner intersect. */
export function rectsIntersect(a: Rect, b: Rect): boolean {
  return a.minX <= b.maxX && b.minX <= a.maxX && a.minY <= b.maxY && b.minY <= a.maxY;
}

/** Strict test: the shared region has positive area. */
export function rectsOverlap(a: Rect, b: Rect): boolean {
  return a.minX < b.maxX && b.minX < a.maxX && a.minY < b.maxY && b.minY < a.maxY;
}

export function rectIntersection(a: Rect, b: Rect): Rect {
  return {
    minX: Math.max(a.minX, b.minX),
    minY: Math.max(a.minY, b.minY),
    maxX: Math.min(a.maxX, b.maxX),
    maxY: Math.min(a.maxY, b.maxY)
  };
}

export function rectExpand(r: Rect, amount: number): Rect {
  return { minX: r.minX - amount, minY: r.minY - amount, maxX: r.maxX + amount, maxY: r.maxY + amount };
}

export function boundingRect(rects: readonly Rect[]): Rect | null {
  if (rects.length === 0) {
    return null;
  }
  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (const r of rects) {
    minX = Math.min(minX, r.minX);
    minY = Math.min(minY, r.minY);
    maxX = Math.max(maxX, r.maxX);
    maxY = Math.max(maxY, r.maxY);
  }
  return { minX, minY, maxX, maxY };
}
