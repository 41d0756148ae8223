import { circularLayout } from "@/domain/circularLayout/circularLayout";
import { DEFAULT_GENETIC_ORDERING } from "@/domain/circularLayout/geneticOrdering";
import type { ILayoutAlgorithm } from "@/domain/layoutEngine/ILayoutAlgorithm";
import { resolveIntegerConfig, resolveNumberConfig } from "@/domain/layoutEngine/layoutConfigUtils";
import { maxDisplacementOf } from "@/domain/layoutEngine/layoutMath";
import type { LayoutStrategyDefinition } from "@/domain/layoutEngine/LayoutStrategyDefinition";
import type { LayoutInput, LayoutOutput } from "@/domain/layoutEngine/LayoutTypes";

export class CircularLayoutAlgorithm implements ILayoutAlgorithm {
  public readonly strategy = "circular";

  public run(input: LayoutInput): LayoutOutput {
    const config = input.strategyConfig;
    const seed = Number(config?.seed);
    const positions = circularLayout({
      positions: input.positions,
      edges: input.edges,
      hiddenTags: input.hiddenTags,
      // Without a selection the whole graph goes on the circle.
      selectedNodes: input.selectedNodes ?? input.positions.map((_, index) => index),
      genetic: {
        populationSize: resolveIntegerConfig(
          config,
          "populationSize",
          DEFAULT_GENETIC_ORDERING.populationSize,
          2,
          1000
        ),
        generations: resolveIntegerConfig(config, "generations", DEFAULT_GENETIC_ORDERING.generations, 0, 10_000),
        crossoverRate: resolveNumberConfig(config, "crossoverRate", DEFAULT_GENETIC_ORDERING.crossoverRate, 0, 1),
        mutationRate: resolveNumberConfig(config, "mutationRate", DEFAULT_GENETIC_ORDERING.mutationRate, 0, 1),
        maxStagnation: resolveIntegerConfig(
          config,
          "maxStagnation",
          DEFAULT_GENETIC_ORDERING.maxStagnation,
          1,
          10_000
        ),
        seed: Number.isFinite(seed) ? seed : undefined
      }
    });

    return { positions, maxDisplacement: maxDisplacementOf(input.positions, positions) };
  }
}

export const CIRCULAR_STRATEGY_DEFINITION: LayoutStrategyDefinition = {
  strategy: "circular",
  createInitialConfig: () => ({ ...DEFAULT_GENETIC_ORDERING }),
  createAlgorithm: () => new CircularLayoutAlgorithm()
};
