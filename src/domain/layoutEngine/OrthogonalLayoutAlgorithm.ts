import { rectCenter, rectFromCenterSize } from "@/domain/geometry/Rect";
import { nodeSizeOf } from "@/domain/graph/GraphTypes";
import type { ILayoutAlgorithm } from "@/domain/layoutEngine/ILayoutAlgorithm";
import { resolveNumberConfig } from "@/domain/layoutEngine/layoutConfigUtils";
import type { LayoutStrategyDefinition } from "@/domain/layoutEngine/LayoutStrategyDefinition";
import type { LayoutInput, LayoutOutput } from "@/domain/layoutEngine/LayoutTypes";
import { DEFAULT_CHANNEL_MARGIN } from "@/domain/orthogonal/ChannelBuilder";
import { routeOrthogonalEdges } from "@/domain/orthogonal/OrthogonalRouter";

export class OrthogonalLayoutAlgorithm implements ILayoutAlgorithm {
  public readonly strategy = "orthogonal";

  public run(input: LayoutInput): LayoutOutput {
    const boxes = input.positions.map((node, index) => {
      const size = nodeSizeOf(input.nodeSizes, index);
      return rectFromCenterSize(node.pos, size.width, size.height);
    });
    const routing = routeOrthogonalEdges({
      boxes,
      edges: input.edges,
      hiddenTags: input.hiddenTags,
      margin: resolveNumberConfig(input.strategyConfig, "margin", DEFAULT_CHANNEL_MARGIN, 1, 500)
    });

    let maxDisplacement = 0;
    const positions = input.positions.map((node, index) => {
      const center = rectCenter(routing.boxes[index]);
      maxDisplacement = Math.max(maxDisplacement, Math.hypot(center.x - node.pos.x, center.y - node.pos.y));
      return { pos: center, vel: { x: node.vel.x, y: node.vel.y }, locked: node.locked };
    });
    return {
      positions,
      maxDisplacement,
      metadata: { routes: routing.edges, detectedCycles: routing.detectedCycles }
    };
  }
}

export const ORTHOGONAL_STRATEGY_DEFINITION: LayoutStrategyDefinition = {
  strategy: "orthogonal",
  createInitialConfig: () => ({ margin: DEFAULT_CHANNEL_MARGIN }),
  createAlgorithm: () => new OrthogonalLayoutAlgorithm()
};
