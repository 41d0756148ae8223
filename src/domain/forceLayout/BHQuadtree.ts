import type { Vec2 } from "@/domain/geometry/Vec2";

export type WeightedPoint = {
  pos: Vec2;
  mass: number;
};

export type ForceFn = (target: Vec2, source: WeightedPoint) => Vec2;

export type BHQuadtreeOptions = {
  leafCapacity?: number;
  theta?: number;
};

export type QuadtreeNode = {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
  /** Index of the first of four consecutive children, 0 for a leaf. */
  children: number;
  /** Node visited after this subtree is skipped, 0 terminates the walk. */
  next: number;
  centerX: number;
  centerY: number;
  mass: number;
  start: number;
  end: number;
};

export const DEFAULT_LEAF_CAPACITY = 5;
export const DEFAULT_THETA = 0.5;

// Cells narrower than this are never split, so coincident points end up in one leaf.
const MIN_CELL_SIZE = 1e-6;

/**
 * Barnes-Hut quadtree over weighted points, stored as a flat arena.
 * Rebuilt from scratch for every solver step.
 */
export class BHQuadtree {
  private readonly nodeArena: QuadtreeNode[] = [];
  private readonly xs: Float64Array;
  private readonly ys: Float64Array;
  private readonly masses: Float64Array;
  private readonly sourceIndex: Int32Array;
  private readonly pointCount: number;
  private readonly theta2: number;
  public readonly rejectedCount: number;

  private constructor(points: readonly WeightedPoint[], leafCapacity: number, theta: number) {
    this.xs = new Float64Array(points.length);
    this.ys = new Float64Array(points.length);
    this.masses = new Float64Array(points.length);
    this.sourceIndex = new Int32Array(points.length);
    this.theta2 = theta * theta;

    let count = 0;
    points.forEach((point, index) => {
      const { x, y } = point.pos;
      if (!Number.isFinite(x) || !Number.isFinite(y) || !Number.isFinite(point.mass) || point.mass < 0) {
        return;
      }
      this.xs[count] = x;
      this.ys[count] = y;
      this.masses[count] = point.mass;
      this.sourceIndex[count] = index;
      count += 1;
    });
    this.pointCount = count;
    this.rejectedCount = points.length - count;
    this.buildArena(Math.max(1, Math.floor(leafCapacity)));
  }

  public static build(points: readonly WeightedPoint[], options: BHQuadtreeOptions = {}): BHQuadtree {
    return new BHQuadtree(
      points,
      options.leafCapacity ?? DEFAULT_LEAF_CAPACITY,
      Math.max(0, options.theta ?? DEFAULT_THETA)
    );
  }

  public get size(): number {
    return this.pointCount;
  }

  public get nodes(): readonly Readonly<QuadtreeNode>[] {
    return this.nodeArena;
  }

  /** Original indices (into the `build` input) of the points held by a node. */
  public pointIndicesOf(node: Readonly<QuadtreeNode>): number[] {
    return Array.from(this.sourceIndex.subarray(node.start, node.end));
  }

  public accumulate(target: Vec2, forceFn: ForceFn): Vec2 {
    let fx = 0;
    let fy = 0;
    if (this.pointCount === 0) {
      return { x: fx, y: fy };
    }

    let n = 0;
    for (;;) {
      const node = this.nodeArena[n];
      if (node.end === node.start) {
        n = node.next;
      } else {
        const dx = node.centerX - target.x;
        const dy = node.centerY - target.y;
        const size = Math.max(node.maxX - node.minX, node.maxY - node.minY);
        if (size * size < this.theta2 * (dx * dx + dy * dy)) {
          const force = forceFn(target, { pos: { x: node.centerX, y: node.centerY }, mass: node.mass });
          fx += force.x;
          fy += force.y;
          n = node.next;
        } else if (node.children === 0) {
          for (let i = node.start; i < node.end; i += 1) {
            const force = forceFn(target, { pos: { x: this.xs[i], y: this.ys[i] }, mass: this.masses[i] });
            fx += force.x;
            fy += force.y;
          }
          n = node.next;
        } else {
          n = node.children;
        }
      }
      if (n === 0) {
        break;
      }
    }
    return { x: fx, y: fy };
  }

  private buildArena(leafCapacity: number): void {
    let minX = Infinity;
    let minY = Infinity;
    let maxX = -Infinity;
    let maxY = -Infinity;
    for (let i = 0; i < this.pointCount; i += 1) {
      minX = Math.min(minX, this.xs[i]);
      minY = Math.min(minY, this.ys[i]);
      maxX = Math.max(maxX, this.xs[i]);
      maxY = Math.max(maxY, this.ys[i]);
    }
    if (this.pointCount === 0) {
      minX = 0;
      minY = 0;
      maxX = 0;
      maxY = 0;
    }
    this.nodeArena.push(makeNode(minX, minY, maxX, maxY, 0, this.pointCount, 0));

    // Breadth-first: children are appended behind the cursor.
    for (let i = 0; i < this.nodeArena.length; i += 1) {
      const node = this.nodeArena[i];
      const cellSize = Math.max(node.maxX - node.minX, node.maxY - node.minY);
      if (node.end - node.start > leafCapacity && cellSize > MIN_CELL_SIZE) {
        this.subdivide(node);
      } else {
        for (let p = node.start; p < node.end; p += 1) {
          node.centerX += this.xs[p] * this.masses[p];
          node.centerY += this.ys[p] * this.masses[p];
          node.mass += this.masses[p];
        }
      }
    }

    for (let i = this.nodeArena.length - 1; i >= 0; i -= 1) {
      const node = this.nodeArena[i];
      if (node.children === 0) {
        continue;
      }
      for (let c = node.children; c < node.children + 4; c += 1) {
        const child = this.nodeArena[c];
        node.centerX += child.centerX;
        node.centerY += child.centerY;
        node.mass += child.mass;
      }
    }

    for (const node of this.nodeArena) {
      const divisor = Math.max(node.mass, Number.MIN_VALUE);
      node.centerX /= divisor;
      node.centerY /= divisor;
    }
  }

  private subdivide(node: QuadtreeNode): void {
    const cx = (node.minX + node.maxX) * 0.5;
    const cy = (node.minY + node.maxY) * 0.5;
    const ySplit = this.partition(node.start, node.end, (i) => this.ys[i] < cy);
    const topSplit = this.partition(node.start, ySplit, (i) => this.xs[i] < cx);
    const bottomSplit = this.partition(ySplit, node.end, (i) => this.xs[i] < cx);

    const first = this.nodeArena.length;
    node.children = first;
    this.nodeArena.push(
      makeNode(node.minX, node.minY, cx, cy, node.start, topSplit, first + 1),
      makeNode(cx, node.minY, node.maxX, cy, topSplit, ySplit, first + 2),
      makeNode(node.minX, cy, cx, node.maxY, ySplit, bottomSplit, first + 3),
      makeNode(cx, cy, node.maxX, node.maxY, bottomSplit, node.end, node.next)
    );
  }

  /** In-place partition of [start, end); returns the first index failing `predicate`. */
  private partition(start: number, end: number, predicate: (i: number) => boolean): number {
    let split = start;
    for (let i = start; i < end; i += 1) {
      if (predicate(i)) {
        this.swap(i, split);
        split += 1;
      }
    }
    return split;
  }

  private swap(a: number, b: number): void {
    if (a === b) {
      return;
    }
    const x = this.xs[a];
    const y = this.ys[a];
    const m = this.masses[a];
    const s = this.sourceIndex[a];
    this.xs[a] = this.xs[b];
    this.ys[a] = this.ys[b];
    this.masses[a] = this.masses[b];
    this.sourceIndex[a] = this.sourceIndex[b];
    this.xs[b] = x;
    this.ys[b] = y;
    this.masses[b] = m;
    this.sourceIndex[b] = s;
  }
}

function makeNode(
  minX: number,
  minY: number,
  maxX: number,
  maxY: number,
  start: number,
  end: number,
  next: number
): QuadtreeNode {
  return { minX, minY, maxX, maxY, children: 0, next, centerX: 0, centerY: 0, mass: 0, start, end };
}
