import type { ILayoutAlgorithm } from "@/domain/layoutEngine/ILayoutAlgorithm";
import { resolveIntegerConfig, resolveNumberConfig } from "@/domain/layoutEngine/layoutConfigUtils";
import { maxDisplacementOf } from "@/domain/layoutEngine/layoutMath";
import type { LayoutStrategyDefinition } from "@/domain/layoutEngine/LayoutStrategyDefinition";
import type { LayoutInput, LayoutOutput } from "@/domain/layoutEngine/LayoutTypes";
import {
  DEFAULT_OVERLAP_GAP,
  DEFAULT_OVERLAP_MAX_STEPS,
  DEFAULT_OVERLAP_SEED,
  removeOverlaps
} from "@/domain/overlapRemoval/overlapRemoval";

export class OverlapRemovalLayoutAlgorithm implements ILayoutAlgorithm {
  public readonly strategy = "overlap-removal";

  public run(input: LayoutInput): LayoutOutput {
    const config = input.strategyConfig;
    const seed = Number(config?.seed);
    const result = removeOverlaps({
      positions: input.positions,
      nodeSizes: input.nodeSizes,
      selectedNodes: input.selectedNodes,
      gap: resolveNumberConfig(config, "gap", DEFAULT_OVERLAP_GAP, 0, 500),
      maxSteps: resolveIntegerConfig(config, "maxSteps", DEFAULT_OVERLAP_MAX_STEPS, 1, 10_000),
      seed: Number.isFinite(seed) ? seed : DEFAULT_OVERLAP_SEED
    });
    return { positions: result.positions, maxDisplacement: maxDisplacementOf(input.positions, result.positions) };
  }
}

export const OVERLAP_REMOVAL_STRATEGY_DEFINITION: LayoutStrategyDefinition = {
  strategy: "overlap-removal",
  createInitialConfig: () => ({ gap: DEFAULT_OVERLAP_GAP, maxSteps: DEFAULT_OVERLAP_MAX_STEPS }),
  createAlgorithm: () => new OverlapRemovalLayoutAlgorithm()
};
