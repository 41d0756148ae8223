export type CommunityEdge = {
  from: number;
  to: number;
  weight?: number;
};

type WeightedNeighbor = {
  to: number;
  weight: number;
};

type CommunityNode = {
  communityId: number;
  degree: number;
  selfLoopWeight: number;
  /** Neighbouring community id -> shared edge weight. */
  communities: Map<number, number>;
};

type Community = {
  members: number[];
  totalDegree: number;
  nextId: number;
};

function createNode(communityId: number, selfLoopWeight = 0): CommunityNode {
  return { communityId, degree: 0, selfLoopWeight, communities: new Map<number, number>() };
}

function createCommunity(nodeId: number): Community {
  return { members: [nodeId], totalDegree: 0, nextId: 0 };
}

/**
 * Nodes, communities and per-node neighbour-community weight caches for Louvain.
 * Every edge is stored once per direction, so `totalWeight` starts at twice the edge weight sum.
 */
export class CommunityModel {
  private totalWeight = 0;
  private nodes: CommunityNode[];
  private communities: Community[];
  private adjacency: WeightedNeighbor[][];
  private readonly originCommunity: number[];

  public constructor(
    nodeCount: number,
    edges: readonly CommunityEdge[],
    public readonly resolution = 1
  ) {
    this.originCommunity = Array.from({ length: nodeCount }, (_, index) => index);
    this.nodes = Array.from({ length: nodeCount }, (_, index) => createNode(index));
    this.communities = Array.from({ length: nodeCount }, (_, index) => createCommunity(index));
    this.adjacency = Array.from({ length: nodeCount }, () => []);
    for (const edge of edges) {
      const weight = edge.weight ?? 1;
      if (edge.from === edge.to) {
        this.nodes[edge.from].selfLoopWeight += 2 * weight;
      } else {
        this.adjacency[edge.from].push({ to: edge.to, weight });
        this.adjacency[edge.to].push({ to: edge.from, weight });
      }
      this.totalWeight += 2 * weight;
    }
    this.initCaches();
  }

  public get nodeCount(): number {
    return this.nodes.length;
  }

  public get communityCount(): number {
    return this.communities.length;
  }

  public get weight(): number {
    return this.totalWeight;
  }

  public communityOf(nodeId: number): number {
    return this.nodes[nodeId].communityId;
  }

  public nodeDegree(nodeId: number): number {
    return this.nodes[nodeId].degree;
  }

  public selfLoopWeight(nodeId: number): number {
    return this.nodes[nodeId].selfLoopWeight;
  }

  public neighborCommunityWeights(nodeId: number): ReadonlyMap<number, number> {
    return this.nodes[nodeId].communities;
  }

  public neighborCount(nodeId: number): number {
    return this.adjacency[nodeId].length;
  }

  public communityMembers(communityId: number): readonly number[] {
    return this.communities[communityId].members;
  }

  public communityTotalDegree(communityId: number): number {
    return this.communities[communityId].totalDegree;
  }

  /**
   * Modularity change of placing `nodeId` in `communityId` given the edge weight it shares
   * with that community. For its own community the node's degree is taken out first.
   */
  public modularityGain(nodeId: number, communityId: number, sharedWeight: number): number {
    const node = this.nodes[nodeId];
    const community = this.communities[communityId];
    let otherDegree = community.totalDegree;
    if (node.communityId === communityId) {
      if (community.members.length === 1) {
        return 0;
      }
      otherDegree -= node.degree;
    }
    const m = this.totalWeight;
    return (this.resolution * sharedWeight * 2 - (node.degree * otherDegree) / (m * 0.5)) / m;
  }

  /** Best strictly positive candidate among neighbouring communities; first found wins ties. */
  public findBestCommunity(nodeId: number): number | null {
    let best = 0;
    let bestCommunity: number | null = null;
    for (const [communityId, shared] of this.nodes[nodeId].communities) {
      if (shared <= 0) {
        continue;
      }
      const gain = this.modularityGain(nodeId, communityId, shared);
      if (gain > best) {
        best = gain;
        bestCommunity = communityId;
      }
    }
    return bestCommunity;
  }

  public moveNode(nodeId: number, communityId: number): void {
    const node = this.nodes[nodeId];
    const oldCommunityId = node.communityId;
    if (oldCommunityId === communityId) {
      return;
    }
    const oldCommunity = this.communities[oldCommunityId];
    const position = oldCommunity.members.indexOf(nodeId);
    if (position < 0) {
      throw new Error(`[community] Node ${nodeId} not found in community ${oldCommunityId}`);
    }
    oldCommunity.members[position] = oldCommunity.members[oldCommunity.members.length - 1];
    oldCommunity.members.pop();
    oldCommunity.totalDegree -= node.degree;
    const newCommunity = this.communities[communityId];
    newCommunity.members.push(nodeId);
    newCommunity.totalDegree += node.degree;

    for (const neighbor of this.adjacency[nodeId]) {
      const cache = this.nodes[neighbor.to].communities;
      const previous = cache.get(oldCommunityId);
      if (previous !== undefined) {
        const remaining = previous - neighbor.weight;
        if (remaining === 0) {
          cache.delete(oldCommunityId);
        } else {
          cache.set(oldCommunityId, remaining);
        }
      }
      cache.set(communityId, (cache.get(communityId) ?? 0) + neighbor.weight);
    }
    node.communityId = communityId;
  }

  /** Community (at the current level) of every original node. */
  public currentPartition(): number[] {
    return this.originCommunity.map((nodeId) => this.nodes[nodeId].communityId);
  }

  /** Original node -> node index at the current coarsening level. */
  public originAssignment(): number[] {
    return [...this.originCommunity];
  }

  /**
   * Collapses every non-empty community into one node. Intra-community weight becomes
   * the new node's self-loop weight; inter-community weights are summed into edges.
   */
  public coarsen(): void {
    let nextCount = 0;
    for (const community of this.communities) {
      if (community.members.length > 0) {
        community.nextId = nextCount;
        nextCount += 1;
      }
    }

    const nextNodes: CommunityNode[] = [];
    const nextCommunities: Community[] = [];
    const nextAdjacency: WeightedNeighbor[][] = Array.from({ length: nextCount }, () => []);
    let totalWeight = 0;
    for (const community of this.communities) {
      if (community.members.length === 0) {
        continue;
      }
      const id = community.nextId;
      const weights = new Map<number, number>();
      let selfLoopWeight = 0;
      for (const member of community.members) {
        for (const neighbor of this.adjacency[member]) {
          const target = this.communities[this.nodes[neighbor.to].communityId].nextId;
          weights.set(target, (weights.get(target) ?? 0) + neighbor.weight);
        }
        selfLoopWeight += this.nodes[member].selfLoopWeight;
      }
      for (const [target, weight] of weights) {
        totalWeight += weight;
        if (target === id) {
          selfLoopWeight += weight;
        } else {
          nextAdjacency[id].push({ to: target, weight });
        }
      }
      totalWeight += selfLoopWeight - (weights.get(id) ?? 0);
      nextNodes.push(createNode(id, selfLoopWeight));
      nextCommunities.push(createCommunity(id));
    }

    for (let i = 0; i < this.originCommunity.length; i += 1) {
      const communityId = this.nodes[this.originCommunity[i]].communityId;
      this.originCommunity[i] = this.communities[communityId].nextId;
    }

    this.nodes = nextNodes;
    this.communities = nextCommunities;
    this.adjacency = nextAdjacency;
    this.totalWeight = totalWeight;
    this.initCaches();
  }

  private initCaches(): void {
    this.nodes.forEach((node, nodeId) => {
      node.communities.clear();
      let degree = node.selfLoopWeight;
      for (const neighbor of this.adjacency[nodeId]) {
        degree += neighbor.weight;
        const communityId = this.nodes[neighbor.to].communityId;
        node.communities.set(communityId, (node.communities.get(communityId) ?? 0) + neighbor.weight);
      }
      node.degree = degree;
    });
    for (const community of this.communities) {
      community.totalDegree = community.members.reduce((sum, member) => sum + this.nodes[member].degree, 0);
    }
  }
}
