import type { LayoutInput, LayoutOutput, LayoutStrategy } from "@/domain/layoutEngine/LayoutTypes";

export interface ILayoutAlgorithm {
  readonly strategy: LayoutStrategy;
  run(input: LayoutInput): LayoutOutput;
}
