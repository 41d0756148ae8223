import type { LayoutInput, LayoutOutput, LayoutStrategy } from "@/domain/layoutEngine/LayoutTypes";
import { createLayoutAlgorithmByStrategy } from "@/domain/layoutEngine/LayoutStrategyRegistry";
import { markLayoutPerf } from "@/lib/perf";

const algorithmByStrategy = createLayoutAlgorithmByStrategy();

export function runLayoutStrategy(strategy: LayoutStrategy, input: LayoutInput): LayoutOutput {
  const algorithm = algorithmByStrategy.get(strategy);
  if (!algorithm) {
    throw new Error(`[layout-engine] Unknown strategy: ${strategy}`);
  }
  const startedAt = performance.now();
  const output = algorithm.run(input);
  markLayoutPerf(`layout:${strategy}`, performance.now() - startedAt);
  return output;
}
