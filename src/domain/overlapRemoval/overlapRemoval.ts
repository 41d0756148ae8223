import { Delaunay } from "d3-delaunay";
import { rectCenter, rectFromCenterSize, rectHeight, rectsOverlap, rectWidth, type Rect } from "@/domain/geometry/Rect";
import type { Vec2 } from "@/domain/geometry/Vec2";
import { cloneNodePosition, nodeSizeOf, type NodePosition, type NodeSize } from "@/domain/graph/GraphTypes";
import { mulberry32, type RandomSource } from "@/lib/random";

export type OverlapRemovalInput = {
  positions: NodePosition[];
  nodeSizes?: NodeSize[];
  /** Defaults to every node. */
  selectedNodes?: number[];
  /** Extra clearance added to each node's width and height. */
  gap?: number;
  maxSteps?: number;
  seed?: number;
};

export type OverlapRemovalResult = {
  positions: NodePosition[];
  /** Grow steps that moved something; 0 when nothing overlapped. */
  steps: number;
};

export const DEFAULT_OVERLAP_GAP = 12;
export const DEFAULT_OVERLAP_MAX_STEPS = 1024;
export const DEFAULT_OVERLAP_SEED = 0xfeedf00d;

const EPS = 1e-8;
const UNREACHED_NUDGE = 0.01;

type WeightedPair = {
  u: number;
  v: number;
  weight: number;
};

type Separation = {
  dx: number;
  dy: number;
  wx: number;
  wy: number;
};

function separationOf(a: Rect, b: Rect): Separation {
  const ca = rectCenter(a);
  const cb = rectCenter(b);
  return {
    dx: Math.abs(ca.x - cb.x),
    dy: Math.abs(ca.y - cb.y),
    wx: (rectWidth(a) + rectWidth(b)) / 2,
    wy: (rectHeight(a) + rectHeight(b)) / 2
  };
}

function isCoincident({ dx, dy }: Separation): boolean {
  return dx < EPS && dy < EPS;
}

/** Scale on the centre offset that makes the two boxes touch. */
function translationFactor({ dx, dy, wx, wy }: Separation): number {
  const rx = dx < EPS ? Infinity : wx / dx;
  const ry = dy < EPS ? Infinity : wy / dy;
  return Math.min(rx, ry);
}

/** Negative for overlapping boxes (minus the push needed), else the gap between them. */
export function overlapCost(a: Rect, b: Rect): number {
  const separation = separationOf(a, b);
  if (rectsOverlap(a, b)) {
    if (isCoincident(separation)) {
      return -(separation.wx + separation.wy);
    }
    const s = Math.hypot(separation.dx, separation.dy);
    return s - translationFactor(separation) * s;
  }
  return Math.hypot(separation.dx - separation.wx, separation.dy - separation.wy);
}

function triangulationPairs(rects: readonly Rect[]): Array<[number, number]> {
  const coords = new Float64Array(rects.length * 2);
  rects.forEach((r, index) => {
    const center = rectCenter(r);
    coords[index * 2] = center.x;
    coords[index * 2 + 1] = center.y;
  });
  const { triangles, halfedges } = new Delaunay(coords);
  const pairs: Array<[number, number]> = [];
  for (let i = 0; i < halfedges.length; i += 1) {
    const j = halfedges[i];
    if (j === -1 || i < j) {
      const from = triangles[i];
      const to = triangles[i % 3 === 2 ? i - 2 : i + 1];
      pairs.push([Math.min(from, to), Math.max(from, to)]);
    }
  }
  if (pairs.length === 0) {
    for (let i = 0; i + 1 < rects.length; i += 1) {
      pairs.push([i, i + 1]);
    }
  }
  return pairs;
}

function minimumSpanningTree(count: number, pairs: readonly WeightedPair[]): WeightedPair[] {
  const parent = Array.from({ length: count }, (_, index) => index);
  const find = (x: number): number => {
    while (parent[x] !== x) {
      parent[x] = parent[parent[x]];
      x = parent[x];
    }
    return x;
  };
  const tree: WeightedPair[] = [];
  for (const pair of [...pairs].sort((a, b) => a.weight - b.weight)) {
    const ru = find(pair.u);
    const rv = find(pair.v);
    if (ru !== rv) {
      parent[ru] = rv;
      tree.push(pair);
      if (tree.length === count - 1) {
        break;
      }
    }
  }
  return tree;
}

/** Walks the tree from box 0, pushing each subtree out along every overlapping link. */
function grow(count: number, tree: readonly WeightedPair[], rects: readonly Rect[], random: RandomSource): Rect[] {
  const links: Array<Array<{ to: number; weight: number }>> = rects.map(() => []);
  for (const pair of tree) {
    links[pair.u].push({ to: pair.v, weight: pair.weight });
    links[pair.v].push({ to: pair.u, weight: pair.weight });
  }
  const noise = () => (random() * 2 - 1) * EPS;
  const moved: Array<Rect | undefined> = Array.from({ length: count }, () => undefined);
  const stack: Array<{ node: number; parent: number; shift: Vec2 }> = [{ node: 0, parent: -1, shift: { x: 0, y: 0 } }];
  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) {
      break;
    }
    const { node, parent, shift } = frame;
    const base = rects[node];
    const center = rectCenter(base);
    moved[node] = rectFromCenterSize({ x: center.x + shift.x, y: center.y + shift.y }, rectWidth(base), rectHeight(base));
    for (const link of links[node]) {
      if (link.to === parent) {
        continue;
      }
      if (link.weight > -EPS) {
        stack.push({ node: link.to, parent: node, shift });
        continue;
      }
      const separation = separationOf(base, rects[link.to]);
      const target = rectCenter(rects[link.to]);
      const push = isCoincident(separation)
        ? { x: separation.wx, y: 0 }
        : {
            x: (target.x - center.x) * (translationFactor(separation) - 1),
            y: (target.y - center.y) * (translationFactor(separation) - 1)
          };
      stack.push({
        node: link.to,
        parent: node,
        shift: { x: shift.x + push.x + noise(), y: shift.y + push.y + noise() }
      });
    }
  }
  return rects.map((r, index) => {
    const placed = moved[index];
    if (placed) {
      return placed;
    }
    const center = rectCenter(r);
    return rectFromCenterSize(
      { x: center.x + UNREACHED_NUDGE, y: center.y + UNREACHED_NUDGE },
      rectWidth(r),
      rectHeight(r)
    );
  });
}

function overlappingPairs(rects: readonly Rect[]): WeightedPair[] {
  const pairs: WeightedPair[] = [];
  for (let u = 0; u < rects.length; u += 1) {
    for (let v = u + 1; v < rects.length; v += 1) {
      if (rectsOverlap(rects[u], rects[v])) {
        pairs.push({ u, v, weight: overlapCost(rects[u], rects[v]) });
      }
    }
  }
  return pairs;
}

/** One round: weigh triangulation edges, add overlapping pairs if none is negative, grow the MST. */
function step(rects: readonly Rect[], random: RandomSource): Rect[] | null {
  let pairs: WeightedPair[] = triangulationPairs(rects).map(([u, v]) => ({
    u,
    v,
    weight: overlapCost(rects[u], rects[v])
  }));
  if (!pairs.some((pair) => pair.weight < -EPS)) {
    const extra = overlappingPairs(rects).filter((pair) => pair.weight < -EPS);
    if (extra.length === 0) {
      return null;
    }
    pairs = pairs.concat(extra);
  }
  return grow(rects.length, minimumSpanningTree(rects.length, pairs), rects, random);
}

/**
 * Node overlap removal after Nachmanson et al.: repeatedly grows a minimum spanning tree of
 * the Delaunay triangulation of node centres, weighted by overlap, until no boxes overlap.
 * Only the selected nodes move; boxes are node sizes plus `gap`.
 */
export function removeOverlaps(input: OverlapRemovalInput): OverlapRemovalResult {
  const count = input.positions.length;
  const positions = input.positions.map(cloneNodePosition);
  const selected =
    input.selectedNodes && input.selectedNodes.length > 0
      ? [...new Set(input.selectedNodes)].filter((node) => Number.isInteger(node) && node >= 0 && node < count)
      : positions.map((_, index) => index);
  const gap = input.gap ?? DEFAULT_OVERLAP_GAP;
  let rects = selected.map((node) => {
    const size = nodeSizeOf(input.nodeSizes, node);
    return rectFromCenterSize(positions[node].pos, size.width + gap, size.height + gap);
  });
  if (overlappingPairs(rects).length === 0) {
    return { positions, steps: 0 };
  }

  const random = mulberry32(input.seed ?? DEFAULT_OVERLAP_SEED);
  const maxSteps = input.maxSteps ?? DEFAULT_OVERLAP_MAX_STEPS;
  let steps = 0;
  while (steps < maxSteps) {
    const next = step(rects, random);
    if (!next) {
      break;
    }
    rects = next;
    steps += 1;
  }
  selected.forEach((node, index) => {
    positions[node].pos = rectCenter(rects[index]);
  });
  return { positions, steps };
}
