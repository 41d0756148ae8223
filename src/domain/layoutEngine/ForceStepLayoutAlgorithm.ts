import { DEFAULT_FORCE_LAYOUT_CONFIG, forceLayoutStep } from "@/domain/forceLayout/forceLayoutStep";
import { SortedTagSet } from "@/domain/graph/SortedTagSet";
import type { ILayoutAlgorithm } from "@/domain/layoutEngine/ILayoutAlgorithm";
import { resolveIntegerConfig, resolveNumberConfig } from "@/domain/layoutEngine/layoutConfigUtils";
import type { LayoutStrategyDefinition } from "@/domain/layoutEngine/LayoutStrategyDefinition";
import type { LayoutInput, LayoutOutput } from "@/domain/layoutEngine/LayoutTypes";

export const DEFAULT_TEMPERATURE = 10;
const DEFAULT_PARALLELISM = 1;

export class ForceStepLayoutAlgorithm implements ILayoutAlgorithm {
  public readonly strategy = "force-step";

  public run(input: LayoutInput): LayoutOutput {
    const config = input.strategyConfig;
    const result = forceLayoutStep({
      positions: input.positions,
      edges: input.edges,
      nodeSizes: input.nodeSizes,
      hiddenTags: new SortedTagSet(input.hiddenTags ?? []),
      temperature:
        input.temperature ?? resolveNumberConfig(config, "temperature", DEFAULT_TEMPERATURE, 0, 1000),
      parallelism: resolveIntegerConfig(config, "parallelism", DEFAULT_PARALLELISM, 1, 64),
      config: {
        repulsionConstant: resolveNumberConfig(
          config,
          "repulsionConstant",
          DEFAULT_FORCE_LAYOUT_CONFIG.repulsionConstant,
          0,
          10
        ),
        attractionFactor: resolveNumberConfig(
          config,
          "attractionFactor",
          DEFAULT_FORCE_LAYOUT_CONFIG.attractionFactor,
          0.01,
          10
        ),
        gravityEffectRadius: resolveNumberConfig(
          config,
          "gravityEffectRadius",
          DEFAULT_FORCE_LAYOUT_CONFIG.gravityEffectRadius,
          1,
          10_000
        ),
        theta: resolveNumberConfig(config, "theta", DEFAULT_FORCE_LAYOUT_CONFIG.theta, 0, 2),
        layoutArea: resolveNumberConfig(config, "layoutArea", DEFAULT_FORCE_LAYOUT_CONFIG.layoutArea, 1, 1e9)
      }
    });
    return { positions: result.positions, maxDisplacement: result.maxDisplacement };
  }
}

export const FORCE_STEP_STRATEGY_DEFINITION: LayoutStrategyDefinition = {
  strategy: "force-step",
  createInitialConfig: () => ({
    temperature: DEFAULT_TEMPERATURE,
    repulsionConstant: DEFAULT_FORCE_LAYOUT_CONFIG.repulsionConstant,
    attractionFactor: DEFAULT_FORCE_LAYOUT_CONFIG.attractionFactor,
    gravityEffectRadius: DEFAULT_FORCE_LAYOUT_CONFIG.gravityEffectRadius,
    theta: DEFAULT_FORCE_LAYOUT_CONFIG.theta,
    layoutArea: DEFAULT_FORCE_LAYOUT_CONFIG.layoutArea,
    parallelism: DEFAULT_PARALLELISM
  }),
  createAlgorithm: () => new ForceStepLayoutAlgorithm()
};
