import { cloneNodePosition } from "@/domain/graph/GraphTypes";
import type { ILayoutAlgorithm } from "@/domain/layoutEngine/ILayoutAlgorithm";
import { resolveIntegerConfig, resolveNumberConfig } from "@/domain/layoutEngine/layoutConfigUtils";
import { maxDisplacementOf } from "@/domain/layoutEngine/layoutMath";
import type { LayoutStrategyDefinition } from "@/domain/layoutEngine/LayoutStrategyDefinition";
import type { LayoutInput, LayoutOutput } from "@/domain/layoutEngine/LayoutTypes";
import { DEFAULT_SPECTRAL_SCALE, spectralLayout } from "@/domain/spectralLayout/spectralLayout";
import { DEFAULT_MAX_SWEEPS } from "@/domain/spectralLayout/symmetricEigen";

export class SpectralLayoutAlgorithm implements ILayoutAlgorithm {
  public readonly strategy = "spectral";

  public run(input: LayoutInput): LayoutOutput {
    const config = input.strategyConfig;
    const result = spectralLayout({
      positions: input.positions,
      edges: input.edges,
      hiddenTags: input.hiddenTags,
      selectedNodes: input.selectedNodes,
      scale: resolveNumberConfig(config, "scale", DEFAULT_SPECTRAL_SCALE, 1, 100_000),
      eigen: { maxSweeps: resolveIntegerConfig(config, "maxSweeps", DEFAULT_MAX_SWEEPS, 0, 1000) }
    });
    if (!result.success) {
      console.warn("[spectral-layout] Keeping current positions", result.error);
      return { positions: input.positions.map(cloneNodePosition), maxDisplacement: 0 };
    }
    return { positions: result.value, maxDisplacement: maxDisplacementOf(input.positions, result.value) };
  }
}

export const SPECTRAL_STRATEGY_DEFINITION: LayoutStrategyDefinition = {
  strategy: "spectral",
  createInitialConfig: () => ({ scale: DEFAULT_SPECTRAL_SCALE, maxSweeps: DEFAULT_MAX_SWEEPS }),
  createAlgorithm: () => new SpectralLayoutAlgorithm()
};
