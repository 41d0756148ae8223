export type { GraphSnapshot, LayoutEdge, NodePosition, NodeSize } from "@/domain/graph/GraphTypes";
export { cloneNodePosition, createNodePosition, DEFAULT_NODE_SIZE } from "@/domain/graph/GraphTypes";
export { SortedTagSet } from "@/domain/graph/SortedTagSet";
export { graphSnapshotSchema, parseGraphSnapshot } from "@/domain/graph/graphSnapshotSchema";
export { assignEdgeCurvature, BEZIER_GAP } from "@/domain/graph/edgeCurvature";
export { visibleEdges, type IndexedEdge } from "@/domain/graph/graphFilters";

export type { Vec2 } from "@/domain/geometry/Vec2";
export { rect, rectFromCenterSize, type Rect } from "@/domain/geometry/Rect";

export { BHQuadtree, type BHQuadtreeOptions, type ForceFn, type WeightedPoint } from "@/domain/forceLayout/BHQuadtree";
export { AtomicMaxF32 } from "@/domain/forceLayout/AtomicMaxF32";
export {
  DEFAULT_FORCE_LAYOUT_CONFIG,
  forceLayoutStep,
  type ForceLayoutConfig,
  type ForceStepInput,
  type ForceStepResult
} from "@/domain/forceLayout/forceLayoutStep";

export { CommunityModel, type CommunityEdge } from "@/domain/community/CommunityModel";
export {
  detectCommunities,
  LouvainDriver,
  runLouvain,
  type CommunityResult,
  type LouvainOptions
} from "@/domain/community/LouvainDriver";
export { computeModularity } from "@/domain/community/modularity";

export { runCentrality, type CentralityKind, type CentralityOptions, type CentralityResult } from "@/domain/centrality/runCentrality";
export { computeGeometricRatio, distributeToZoomLayers } from "@/domain/centrality/zoomLayers";

export { circularCostCrossingSweepline } from "@/domain/circularLayout/circularCost";
export { circularLayout, type CircularLayoutInput } from "@/domain/circularLayout/circularLayout";
export { geneticOrdering, type GeneticOrderingOptions } from "@/domain/circularLayout/geneticOrdering";

export { linearLayout, type LinearLayoutInput, type LinearLayoutResult } from "@/domain/linearLayout/linearLayout";
export { spectralLayout, buildLaplacian, type SpectralLayoutInput } from "@/domain/spectralLayout/spectralLayout";
export { symmetricEigen, type SymmetricEigenResult } from "@/domain/spectralLayout/symmetricEigen";
export { removeOverlaps, type OverlapRemovalInput, type OverlapRemovalResult } from "@/domain/overlapRemoval/overlapRemoval";

export { buildChannels, type ChannelSet } from "@/domain/orthogonal/ChannelBuilder";
export { resizeChannels } from "@/domain/orthogonal/ChannelResizer";
export { RouteOrderResolver } from "@/domain/orthogonal/RouteOrderResolver";
export { RoutingGraph } from "@/domain/orthogonal/RoutingGraph";
export {
  routeOrthogonalEdges,
  type OrthogonalEdgeRoute,
  type OrthogonalRoutingInput,
  type OrthogonalRoutingResult
} from "@/domain/orthogonal/OrthogonalRouter";

export { runLayoutStrategy } from "@/domain/layoutEngine/LayoutDispatcher";
export {
  createInitialStrategyConfig,
  DEFAULT_LAYOUT_STRATEGY,
  getLayoutStrategyDefinition,
  LAYOUT_STRATEGIES
} from "@/domain/layoutEngine/LayoutStrategyRegistry";
export type { LayoutInput, LayoutOutput, LayoutStrategy, LayoutStrategyConfig } from "@/domain/layoutEngine/LayoutTypes";

export { initLayoutPerfCollector, markLayoutPerf } from "@/lib/perf";
export type { SolveResult } from "@/lib/solveResult";
