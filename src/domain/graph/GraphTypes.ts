import type { Vec2 } from "@/domain/geometry/Vec2";

export type LayoutEdge = {
  from: number;
  to: number;
  /** Predicate/type tag; edges whose tag is hidden are ignored by every computation. */
  tag: number;
  curvature: number;
};

export type NodeSize = {
  width: number;
  height: number;
};

export type NodePosition = {
  pos: Vec2;
  vel: Vec2;
  locked: boolean;
};

export type GraphSnapshot = {
  nodeCount: number;
  edges: LayoutEdge[];
  nodeSizes?: NodeSize[];
  /** Sorted ascending, no duplicates. */
  hiddenTags: number[];
};

export function createNodePosition(x: number, y: number, locked = false): NodePosition {
  return { pos: { x, y }, vel: { x: 0, y: 0 }, locked };
}

export function cloneNodePosition(node: NodePosition): NodePosition {
  return { pos: { x: node.pos.x, y: node.pos.y }, vel: { x: node.vel.x, y: node.vel.y }, locked: node.locked };
}

/** Size used for nodes the host has not measured. */
export const DEFAULT_NODE_SIZE: Readonly<NodeSize> = Object.freeze({ width: 40, height: 40 });

export function nodeSizeOf(nodeSizes: readonly NodeSize[] | undefined, index: number): NodeSize {
  const size = nodeSizes?.[index];
  return size ? { width: size.width, height: size.height } : { ...DEFAULT_NODE_SIZE };
}
