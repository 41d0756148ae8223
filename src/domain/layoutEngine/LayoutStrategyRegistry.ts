import { CIRCULAR_STRATEGY_DEFINITION } from "@/domain/layoutEngine/CircularLayoutAlgorithm";
import { FORCE_STEP_STRATEGY_DEFINITION } from "@/domain/layoutEngine/ForceStepLayoutAlgorithm";
import type { ILayoutAlgorithm } from "@/domain/layoutEngine/ILayoutAlgorithm";
import type { LayoutStrategyDefinition } from "@/domain/layoutEngine/LayoutStrategyDefinition";
import type { LayoutStrategy, LayoutStrategyConfig } from "@/domain/layoutEngine/LayoutTypes";
import { LINEAR_STRATEGY_DEFINITION } from "@/domain/layoutEngine/LinearLayoutAlgorithm";
import { ORTHOGONAL_STRATEGY_DEFINITION } from "@/domain/layoutEngine/OrthogonalLayoutAlgorithm";
import { OVERLAP_REMOVAL_STRATEGY_DEFINITION } from "@/domain/layoutEngine/OverlapRemovalLayoutAlgorithm";
import { SPECTRAL_STRATEGY_DEFINITION } from "@/domain/layoutEngine/SpectralLayoutAlgorithm";

export const LAYOUT_STRATEGY_DEFINITIONS: LayoutStrategyDefinition[] = [
  FORCE_STEP_STRATEGY_DEFINITION,
  CIRCULAR_STRATEGY_DEFINITION,
  LINEAR_STRATEGY_DEFINITION,
  SPECTRAL_STRATEGY_DEFINITION,
  OVERLAP_REMOVAL_STRATEGY_DEFINITION,
  ORTHOGONAL_STRATEGY_DEFINITION
];

export const DEFAULT_LAYOUT_STRATEGY: LayoutStrategy = FORCE_STEP_STRATEGY_DEFINITION.strategy;

export const LAYOUT_STRATEGIES: LayoutStrategy[] = LAYOUT_STRATEGY_DEFINITIONS.map((definition) => definition.strategy);

const definitionByStrategy = new Map<LayoutStrategy, LayoutStrategyDefinition>(
  LAYOUT_STRATEGY_DEFINITIONS.map((definition) => [definition.strategy, definition])
);

export function getLayoutStrategyDefinition(strategy: LayoutStrategy): LayoutStrategyDefinition {
  const definition = definitionByStrategy.get(strategy);
  if (!definition) {
    throw new Error(`[layout-engine] Missing strategy definition for: ${strategy}`);
  }
  return definition;
}

export function createInitialStrategyConfig(strategy: LayoutStrategy): LayoutStrategyConfig {
  return getLayoutStrategyDefinition(strategy).createInitialConfig();
}

export function createLayoutAlgorithmByStrategy(): Map<LayoutStrategy, ILayoutAlgorithm> {
  return new Map<LayoutStrategy, ILayoutAlgorithm>(
    LAYOUT_STRATEGY_DEFINITIONS.map((definition) => [definition.strategy, definition.createAlgorithm()])
  );
}
