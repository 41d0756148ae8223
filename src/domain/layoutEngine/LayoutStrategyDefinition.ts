import type { ILayoutAlgorithm } from "@/domain/layoutEngine/ILayoutAlgorithm";
import type { LayoutStrategy, LayoutStrategyConfig } from "@/domain/layoutEngine/LayoutTypes";

export type LayoutStrategyDefinition = {
  strategy: LayoutStrategy;
  createInitialConfig: () => LayoutStrategyConfig;
  createAlgorithm: () => ILayoutAlgorithm;
};
