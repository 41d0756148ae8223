import { BHQuadtree, DEFAULT_LEAF_CAPACITY, DEFAULT_THETA, type ForceFn } from "@/domain/forceLayout/BHQuadtree";
import { AtomicMaxF32 } from "@/domain/forceLayout/AtomicMaxF32";
import { isFiniteVec } from "@/domain/geometry/Vec2";
import { cloneNodePosition, type LayoutEdge, type NodePosition, type NodeSize } from "@/domain/graph/GraphTypes";
import { EMPTY_TAG_SET, type SortedTagSet } from "@/domain/graph/SortedTagSet";
import { EPS, smoothInvert } from "@/domain/layoutEngine/layoutMath";

export type ForceLayoutConfig = {
  repulsionConstant: number;
  attractionFactor: number;
  gravityEffectRadius: number;
  theta: number;
  leafCapacity: number;
  /** Area the layout should fill; `k = sqrt(layoutArea / nodeCount)`. */
  layoutArea: number;
};

export const DEFAULT_FORCE_LAYOUT_CONFIG: ForceLayoutConfig = {
  repulsionConstant: 0.5,
  attractionFactor: 0.5,
  gravityEffectRadius: 250,
  theta: DEFAULT_THETA,
  leafCapacity: DEFAULT_LEAF_CAPACITY,
  layoutArea: 500 * 500
};

export const VELOCITY_DAMPING = 0.4;
export const FORCE_TO_VELOCITY = 0.01;
export const NODE_GAP = 4;
const ATTRACTION_SCALE = 111;
const TAPER_BAND = 0.2;

export type ForceStepInput = {
  positions: readonly NodePosition[];
  edges: readonly LayoutEdge[];
  nodeSizes?: readonly NodeSize[];
  hiddenTags?: SortedTagSet;
  config?: Partial<ForceLayoutConfig>;
  temperature: number;
  /**
   * Chunk count: the per-node phases are split into this many index ranges, run one
   * after another on the calling thread. Each range only reads shared state and writes
   * its own slots, so a host may hand ranges to workers; the result does not depend on it.
   */
  parallelism?: number;
};

export type ForceStepResult = {
  maxDisplacement: number;
  positions: NodePosition[];
};

export type NodeForces = {
  fx: Float64Array;
  fy: Float64Array;
};

export type IndexRange = {
  start: number;
  end: number;
};

export type ForceContext = {
  positions: NodePosition[];
  tree: BHQuadtree;
  repulsion: ForceFn;
};

export function resolveForceLayoutConfig(config: Partial<ForceLayoutConfig> | undefined): ForceLayoutConfig {
  return { ...DEFAULT_FORCE_LAYOUT_CONFIG, ...config };
}

export function splitIndexRanges(count: number, parts: number): IndexRange[] {
  const chunkCount = Math.max(1, Math.min(count, Math.floor(parts) || 1));
  const size = Math.ceil(count / chunkCount);
  const ranges: IndexRange[] = [];
  for (let start = 0; start < count; start += size) {
    ranges.push({ start, end: Math.min(count, start + size) });
  }
  return ranges;
}

/** Repulsion `mass * (c * k)^2 / d`, faded out over 20% beyond the effect radius. */
export function createRepulsionForce(repulsionFactor: number, effectRadius: number): ForceFn {
  const band = effectRadius * TAPER_BAND;
  return (target, source) => {
    const dx = target.x - source.pos.x;
    const dy = target.y - source.pos.y;
    if (dx === 0 && dy === 0) {
      return { x: 0, y: 0 };
    }
    const distance = Math.hypot(dx, dy);
    let scale = 1;
    if (distance > effectRadius) {
      scale = smoothInvert((distance - effectRadius) / band);
      if (scale === 0) {
        return { x: 0, y: 0 };
      }
    }
    const factor = (scale * source.mass * repulsionFactor) / (distance * distance);
    return { x: dx * factor, y: dy * factor };
  };
}

function sanitizePositions(positions: readonly NodePosition[]): NodePosition[] {
  let repaired = 0;
  const result = positions.map((node) => {
    const copy = cloneNodePosition(node);
    if (!isFiniteVec(copy.pos)) {
      copy.pos = { x: Number.isFinite(copy.pos.x) ? copy.pos.x : 0, y: Number.isFinite(copy.pos.y) ? copy.pos.y : 0 };
      copy.vel = { x: 0, y: 0 };
      repaired += 1;
    } else if (!isFiniteVec(copy.vel)) {
      copy.vel = { x: 0, y: 0 };
      repaired += 1;
    }
    return copy;
  });
  if (repaired > 0) {
    console.warn("[force-layout] Reset non-finite node state before building the quadtree", { repaired });
  }
  return result;
}

function buildContext(positions: NodePosition[], config: ForceLayoutConfig): ForceContext {
  const k = Math.sqrt(config.layoutArea / positions.length);
  const repulsionFactor = (config.repulsionConstant * k) ** 2;
  const tree = BHQuadtree.build(
    positions.map((node) => ({ pos: node.pos, mass: 1 })),
    { leafCapacity: config.leafCapacity, theta: config.theta }
  );
  return { positions, tree, repulsion: createRepulsionForce(repulsionFactor, config.gravityEffectRadius) };
}

/** Repulsion for nodes in `range`. Each index is written by exactly one chunk. */
export function computeRepulsionChunk(context: ForceContext, range: IndexRange, forces: NodeForces): void {
  for (let i = range.start; i < range.end; i += 1) {
    const force = context.tree.accumulate(context.positions[i].pos, context.repulsion);
    forces.fx[i] = force.x;
    forces.fy[i] = force.y;
  }
}

export function applySpringForces(
  positions: readonly NodePosition[],
  edges: readonly LayoutEdge[],
  nodeSizes: readonly NodeSize[] | undefined,
  hiddenTags: SortedTagSet,
  attractionFactor: number,
  forces: NodeForces
): void {
  const divisor = ATTRACTION_SCALE / attractionFactor;
  for (const edge of edges) {
    if (edge.from === edge.to || hiddenTags.contains(edge.tag)) {
      continue;
    }
    const from = positions[edge.from].pos;
    const to = positions[edge.to].pos;
    const dx = from.x - to.x;
    const dy = from.y - to.y;
    const length = Math.hypot(dx, dy);
    if (length < EPS) {
      continue;
    }
    const fromWidth = nodeSizes?.[edge.from]?.width ?? 0;
    const toWidth = nodeSizes?.[edge.to]?.width ?? 0;
    const stretch = length - fromWidth / 2 - toWidth / 2 - NODE_GAP;
    // Signed so overlapping endpoints are pushed apart.
    const magnitude = (stretch * Math.abs(stretch)) / divisor / length;
    forces.fx[edge.from] -= dx * magnitude;
    forces.fy[edge.from] -= dy * magnitude;
    forces.fx[edge.to] += dx * magnitude;
    forces.fy[edge.to] += dy * magnitude;
  }
}

export function integrateChunk(
  positions: readonly NodePosition[],
  forces: NodeForces,
  temperature: number,
  range: IndexRange,
  output: NodePosition[],
  maxMove: AtomicMaxF32
): void {
  for (let i = range.start; i < range.end; i += 1) {
    const node = positions[i];
    if (node.locked) {
      output[i] = cloneNodePosition(node);
      continue;
    }
    let vx = node.vel.x * VELOCITY_DAMPING + forces.fx[i] * FORCE_TO_VELOCITY;
    let vy = node.vel.y * VELOCITY_DAMPING + forces.fy[i] * FORCE_TO_VELOCITY;
    const speed = Math.hypot(vx, vy);
    let moved = speed;
    if (speed > temperature) {
      const scale = temperature / speed;
      vx *= scale;
      vy *= scale;
      moved = temperature;
    }
    maxMove.update(moved);
    output[i] = {
      pos: { x: node.pos.x + vx, y: node.pos.y + vy },
      vel: { x: vx, y: vy },
      locked: false
    };
  }
}

/** Combined repulsion and spring force for every node, before integration. */
export function computeNodeForces(input: Omit<ForceStepInput, "temperature">): NodeForces {
  const positions = sanitizePositions(input.positions);
  const config = resolveForceLayoutConfig(input.config);
  const forces: NodeForces = {
    fx: new Float64Array(positions.length),
    fy: new Float64Array(positions.length)
  };
  if (positions.length === 0) {
    return forces;
  }
  const context = buildContext(positions, config);
  for (const range of splitIndexRanges(positions.length, input.parallelism ?? 1)) {
    computeRepulsionChunk(context, range, forces);
  }
  applySpringForces(
    positions,
    input.edges,
    input.nodeSizes,
    input.hiddenTags ?? EMPTY_TAG_SET,
    config.attractionFactor,
    forces
  );
  return forces;
}

/**
 * One force-directed step: repulsion through the quadtree, springs along visible edges,
 * damped integration clamped to `temperature`. Returns the largest node displacement.
 */
export function forceLayoutStep(input: ForceStepInput): ForceStepResult {
  if (input.positions.length < 2) {
    return { maxDisplacement: 0, positions: input.positions.map(cloneNodePosition) };
  }
  const positions = sanitizePositions(input.positions);
  const forces = computeNodeForces({ ...input, positions });
  const ranges = splitIndexRanges(positions.length, input.parallelism ?? 1);
  const maxMove = new AtomicMaxF32();
  const output: NodePosition[] = new Array<NodePosition>(positions.length);
  const temperature = Math.max(0, input.temperature);
  for (const range of ranges) {
    integrateChunk(positions, forces, temperature, range, output, maxMove);
  }
  return { maxDisplacement: maxMove.value, positions: output };
}
