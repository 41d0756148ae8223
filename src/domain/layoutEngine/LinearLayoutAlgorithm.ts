import type { ILayoutAlgorithm } from "@/domain/layoutEngine/ILayoutAlgorithm";
import { resolveBooleanConfig, resolveNumberConfig } from "@/domain/layoutEngine/layoutConfigUtils";
import { maxDisplacementOf } from "@/domain/layoutEngine/layoutMath";
import type { LayoutStrategyDefinition } from "@/domain/layoutEngine/LayoutStrategyDefinition";
import type { LayoutInput, LayoutOutput } from "@/domain/layoutEngine/LayoutTypes";
import { LINEAR_NODE_SPACING, linearLayout } from "@/domain/linearLayout/linearLayout";

export class LinearLayoutAlgorithm implements ILayoutAlgorithm {
  public readonly strategy = "linear";

  public run(input: LayoutInput): LayoutOutput {
    const config = input.strategyConfig;
    const seed = Number(config?.seed);
    const result = linearLayout({
      positions: input.positions,
      edges: input.edges,
      nodeSizes: input.nodeSizes,
      hiddenTags: input.hiddenTags,
      selectedNodes: input.selectedNodes,
      orientation: resolveBooleanConfig(config, "vertical", false) ? "vertical" : "horizontal",
      spacing: resolveNumberConfig(config, "spacing", LINEAR_NODE_SPACING, 0, 1000),
      seed: Number.isFinite(seed) ? seed : undefined
    });
    return {
      positions: result.positions,
      maxDisplacement: maxDisplacementOf(input.positions, result.positions),
      metadata: { edges: result.edges }
    };
  }
}

export const LINEAR_STRATEGY_DEFINITION: LayoutStrategyDefinition = {
  strategy: "linear",
  createInitialConfig: () => ({ vertical: false, spacing: LINEAR_NODE_SPACING }),
  createAlgorithm: () => new LinearLayoutAlgorithm()
};
