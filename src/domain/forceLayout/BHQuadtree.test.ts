import { describe, expect, it } from "vitest";
import { BHQuadtree, type ForceFn, type WeightedPoint } from "@/domain/forceLayout/BHQuadtree";
import type { Vec2 } from "@/domain/geometry/Vec2";
import { mulberry32 } from "@/lib/random";

const inverseDistance: ForceFn = (target, source) => {
  const dx = target.x - source.pos.x;
  const dy = target.y - source.pos.y;
  const d2 = dx * dx + dy * dy;
  if (d2 === 0) {
    return { x: 0, y: 0 };
  }
  return { x: (dx * source.mass) / d2, y: (dy * source.mass) / d2 };
};

function exhaustive(points: WeightedPoint[], target: Vec2): Vec2 {
  let x = 0;
  let y = 0;
  for (const point of points) {
    const force = inverseDistance(target, point);
    x += force.x;
    y += force.y;
  }
  return { x, y };
}

function uniformPoints(count: number, seed: number): WeightedPoint[] {
  const random = mulberry32(seed);
  return Array.from({ length: count }, () => ({
    pos: { x: random() * 100 - 50, y: random() * 100 - 50 },
    mass: 1
  }));
}

function clusteredPoints(seed: number): WeightedPoint[] {
  const random = mulberry32(seed);
  const centers = [
    { x: -100, y: -100 },
    { x: 100, y: -100 },
    { x: -100, y: 100 },
    { x: 100, y: 100 }
  ];
  const points: WeightedPoint[] = [];
  for (const center of centers) {
    for (let i = 0; i < 25; i += 1) {
      const angle = random() * Math.PI * 2;
      const radius = random() * 5;
      points.push({
        pos: { x: center.x + Math.cos(angle) * radius, y: center.y + Math.sin(angle) * radius },
        mass: 1 + random()
      });
    }
  }
  return points;
}

describe("BHQuadtree", () => {
  it("matches exhaustive summation when theta is zero", () => {
    const points = uniformPoints(200, 7);
    const tree = BHQuadtree.build(points, { theta: 0, leafCapacity: 5 });
    const targets = [...points.slice(0, 20).map((point) => point.pos), { x: 500, y: -20 }, { x: 0.5, y: 0.25 }];

    for (const target of targets) {
      const approx = tree.accumulate(target, inverseDistance);
      const exact = exhaustive(points, target);
      expect(approx.x).toBeCloseTo(exact.x, 6);
      expect(approx.y).toBeCloseTo(exact.y, 6);
    }
  });

  it("keeps the relative error under 5% for clustered points at theta 0.5", () => {
    const points = clusteredPoints(11);
    const tree = BHQuadtree.build(points, { theta: 0.5 });

    for (let i = 0; i < 16; i += 1) {
      const angle = (i / 16) * Math.PI * 2 + 0.1;
      const target = { x: Math.cos(angle) * 300, y: Math.sin(angle) * 300 };
      const approx = tree.accumulate(target, inverseDistance);
      const exact = exhaustive(points, target);
      const error = Math.hypot(approx.x - exact.x, approx.y - exact.y);
      expect(error / Math.hypot(exact.x, exact.y)).toBeLessThan(0.05);
    }
  });

  it("places every point in exactly one leaf", () => {
    const points = uniformPoints(137, 3);
    const tree = BHQuadtree.build(points, { leafCapacity: 4 });

    const seen = new Set<number>();
    let leafPoints = 0;
    for (const node of tree.nodes) {
      if (node.children !== 0) {
        continue;
      }
      for (const index of tree.pointIndicesOf(node)) {
        seen.add(index);
        leafPoints += 1;
      }
      expect(node.end - node.start).toBeLessThanOrEqual(4);
    }
    expect(leafPoints).toBe(137);
    expect(seen.size).toBe(137);
  });

  it("stores the mass-weighted child average as each internal center of mass", () => {
    const tree = BHQuadtree.build(clusteredPoints(5), { leafCapacity: 3 });
    const internal = tree.nodes.filter((node) => node.children !== 0);
    expect(internal.length).toBeGreaterThan(0);

    for (const node of internal) {
      const children = tree.nodes.slice(node.children, node.children + 4);
      const mass = children.reduce((sum, child) => sum + child.mass, 0);
      const cx = children.reduce((sum, child) => sum + child.centerX * child.mass, 0) / mass;
      const cy = children.reduce((sum, child) => sum + child.centerY * child.mass, 0) / mass;
      expect(node.mass).toBeCloseTo(mass, 9);
      expect(node.centerX).toBeCloseTo(cx, 9);
      expect(node.centerY).toBeCloseTo(cy, 9);
    }
  });

  it("rejects non-finite points instead of poisoning the aggregate", () => {
    const tree = BHQuadtree.build([
      { pos: { x: 0, y: 0 }, mass: 1 },
      { pos: { x: Number.NaN, y: 3 }, mass: 1 },
      { pos: { x: 4, y: 0 }, mass: 1 },
      { pos: { x: 1, y: 1 }, mass: Number.POSITIVE_INFINITY }
    ]);

    expect(tree.rejectedCount).toBe(2);
    expect(tree.size).toBe(2);
    expect(tree.nodes[0].centerX).toBe(2);
    expect(tree.nodes[0].centerY).toBe(0);
  });

  it("builds over coincident points without endless subdivision", () => {
    const points = Array.from({ length: 12 }, () => ({ pos: { x: 3, y: 3 }, mass: 1 }));
    const tree = BHQuadtree.build(points, { theta: 0, leafCapacity: 2 });
    let visits = 0;

    tree.accumulate({ x: 10, y: 3 }, (target, source) => {
      visits += 1;
      return inverseDistance(target, source);
    });

    expect(tree.nodes).toHaveLength(1);
    expect(visits).toBe(12);
  });

  it("returns a zero vector for an empty tree", () => {
    const tree = BHQuadtree.build([]);
    expect(tree.accumulate({ x: 1, y: 1 }, inverseDistance)).toEqual({ x: 0, y: 0 });
  });
});
