import { CommunityModel } from "@/domain/community/CommunityModel";
import type { GraphSnapshot } from "@/domain/graph/GraphTypes";
import { hiddenTagSetOf, visibleEdges } from "@/domain/graph/graphFilters";
import { mulberry32, randomInt, type RandomSource } from "@/lib/random";

export type LouvainOptions = {
  resolution?: number;
  /** Start each sweep at a random node instead of node 0. */
  randomize?: boolean;
  seed?: number;
};

export type CommunityResult = {
  communityCount: number;
  /** Dense community id per original node. */
  nodeCommunity: number[];
};

export const DEFAULT_LOUVAIN_RESOLUTION = 1;

export class LouvainDriver {
  private readonly random: RandomSource;
  private readonly randomize: boolean;

  public constructor(
    private readonly model: CommunityModel,
    options: Pick<LouvainOptions, "randomize" | "seed"> = {}
  ) {
    this.randomize = options.randomize ?? false;
    this.random = options.seed === undefined ? Math.random : mulberry32(options.seed);
  }

  /** One round-robin sweep over all nodes; returns the number of moves made. */
  public localMovePass(): number {
    const count = this.model.nodeCount;
    if (count === 0) {
      return 0;
    }
    let moves = 0;
    let nodeId = this.randomize ? randomInt(this.random, count) : 0;
    for (let step = 0; step < count; step += 1) {
      const best = this.model.findBestCommunity(nodeId);
      if (best !== null && best !== this.model.communityOf(nodeId)) {
        this.model.moveNode(nodeId, best);
        moves += 1;
      }
      nodeId = (nodeId + 1) % count;
    }
    return moves;
  }

  /** Sweeps until a full pass moves nothing. Returns whether any node moved. */
  public optimizeLocally(): boolean {
    let changed = false;
    while (this.localMovePass() > 0) {
      changed = true;
    }
    return changed;
  }

  public run(): CommunityResult {
    while (this.optimizeLocally()) {
      this.model.coarsen();
    }
    return {
      communityCount: this.model.communityCount,
      nodeCommunity: this.model.originAssignment()
    };
  }
}

export function runLouvain(
  nodeCount: number,
  edges: readonly { from: number; to: number }[],
  options: LouvainOptions = {}
): CommunityResult {
  const model = new CommunityModel(nodeCount, edges, options.resolution ?? DEFAULT_LOUVAIN_RESOLUTION);
  return new LouvainDriver(model, options).run();
}

/** Louvain over the visible, non-self-referencing edges of a snapshot. */
export function detectCommunities(snapshot: GraphSnapshot, options: LouvainOptions = {}): CommunityResult {
  const edges = visibleEdges(snapshot.edges, hiddenTagSetOf(snapshot));
  return runLouvain(snapshot.nodeCount, edges, { ...options, randomize: options.randomize ?? true });
}
