import type { LayoutEdge, NodePosition, NodeSize } from "@/domain/graph/GraphTypes";
import type { OrthogonalEdgeRoute } from "@/domain/orthogonal/OrthogonalRouter";

export type LayoutStrategy = string;

export type LayoutStrategyConfig = Record<string, unknown>;

export type LayoutInput = {
  positions: NodePosition[];
  edges: LayoutEdge[];
  nodeSizes?: NodeSize[];
  /** Tags whose edges are ignored. Need not be sorted. */
  hiddenTags?: number[];
  /** Nodes a selection-aware strategy arranges; the force step and orthogonal routing ignore it. */
  selectedNodes?: number[];
  /** Velocity clamp for a force step. */
  temperature?: number;
  strategyConfig?: LayoutStrategyConfig;
};

export type LayoutOutput = {
  positions: NodePosition[];
  maxDisplacement: number;
  metadata?: {
    routes?: OrthogonalEdgeRoute[];
    detectedCycles?: number;
    /** Input edges with updated curvature, when the strategy sets it. */
    edges?: LayoutEdge[];
  };
};
