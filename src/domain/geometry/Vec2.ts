export type Vec2 = {
  x: number;
  y: number;
};

export const ZERO_VEC: Readonly<Vec2> = Object.freeze({ x: 0, y: 0 });

export function isFiniteVec(a: Vec2): boolean {
  return Number.isFinite(a.x) && Number.isFinite(a.y);
}
