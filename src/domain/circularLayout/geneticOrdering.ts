import { circularCostCrossingSweepline, type OrderEdge } from "@/domain/circularLayout/circularCost";
import { mulberry32, randomInt, shuffleInPlace, type RandomSource } from "@/lib/random";

export type GeneticOrderingOptions = {
  populationSize?: number;
  generations?: number;
  crossoverRate?: number;
  /** Scaled by `10 / n` before use. */
  mutationRate?: number;
  /** Generations without improvement before giving up. */
  maxStagnation?: number;
  seed?: number;
};

export const DEFAULT_GENETIC_ORDERING: Required<Omit<GeneticOrderingOptions, "seed">> = {
  populationSize: 50,
  generations: 100,
  crossoverRate: 0.5,
  mutationRate: 0.01,
  maxStagnation: 15
};

const TOURNAMENT_SIZE = 3;

function buildAdjacency(edges: readonly OrderEdge[]): Map<number, number[]> {
  const adjacency = new Map<number, number[]>();
  const link = (from: number, to: number) => {
    const targets = adjacency.get(from);
    if (targets) {
      targets.push(to);
    } else {
      adjacency.set(from, [to]);
    }
  };
  for (const edge of edges) {
    link(edge.from, edge.to);
    link(edge.to, edge.from);
  }
  return adjacency;
}

function leastConnectedNode(adjacency: ReadonlyMap<number, number[]>): number {
  let best = -1;
  let bestDegree = Infinity;
  for (const [node, neighbors] of adjacency) {
    if (neighbors.length < bestDegree) {
      best = node;
      bestDegree = neighbors.length;
      if (bestDegree === 1) {
        break;
      }
    }
  }
  return best;
}

function randomDepthFirstOrder(adjacency: ReadonlyMap<number, number[]>, start: number, random: RandomSource): number[] {
  const visited = new Set<number>();
  const stack = [start];
  const order: number[] = [];
  while (stack.length > 0) {
    const node = stack.pop();
    if (node === undefined || visited.has(node)) {
      continue;
    }
    visited.add(node);
    order.push(node);
    for (const neighbor of shuffleInPlace([...(adjacency.get(node) ?? [])], random)) {
      if (!visited.has(neighbor)) {
        stack.push(neighbor);
      }
    }
  }
  return order;
}

/** A single random depth-first traversal of the graph, started at its least connected node. */
export function depthFirstOrdering(edges: readonly OrderEdge[], random: RandomSource): number[] {
  const adjacency = buildAdjacency(edges);
  if (adjacency.size === 0) {
    return [];
  }
  return randomDepthFirstOrder(adjacency, leastConnectedNode(adjacency), random);
}

/** Keeps `first[a..b)` in place and fills the rest in `second`'s order. */
export function orderCrossover(first: readonly number[], second: readonly number[], random: RandomSource): number[] {
  const size = first.length;
  const i = randomInt(random, size);
  const j = randomInt(random, size);
  const [a, b] = i < j ? [i, j] : [j, i];
  const child = new Array<number>(size);
  const kept = new Set<number>();
  for (let k = a; k < b; k += 1) {
    child[k] = first[k];
    kept.add(first[k]);
  }
  const fill = second.filter((node) => !kept.has(node));
  let cursor = 0;
  for (let k = 0; k < size; k += 1) {
    if (k < a || k >= b) {
      child[k] = fill[cursor];
      cursor += 1;
    }
  }
  return child;
}

function mutate(individual: number[], rate: number, random: RandomSource): void {
  for (let i = 0; i < individual.length; i += 1) {
    if (random() < rate) {
      const j = randomInt(random, individual.length);
      const tmp = individual[i];
      individual[i] = individual[j];
      individual[j] = tmp;
    }
  }
}

function tournament(population: readonly number[][], fitness: readonly number[], random: RandomSource): number[] {
  const candidates = shuffleInPlace(
    population.map((_, index) => index),
    random
  ).slice(0, Math.min(TOURNAMENT_SIZE, population.length));
  let best = candidates[0];
  for (const candidate of candidates) {
    if (fitness[candidate] < fitness[best]) {
      best = candidate;
    }
  }
  return population[best];
}

/**
 * Orders the nodes touched by `edges` around a circle, minimising edge length plus
 * chord crossings with a genetic search seeded by random depth-first traversals.
 */
export function geneticOrdering(edges: readonly OrderEdge[], options: GeneticOrderingOptions = {}): number[] {
  const settings = { ...DEFAULT_GENETIC_ORDERING, ...options };
  const adjacency = buildAdjacency(edges);
  const n = adjacency.size;
  if (n === 0) {
    return [];
  }
  const random = options.seed === undefined ? Math.random : mulberry32(options.seed);
  const mutationRate = (settings.mutationRate * 10) / n;
  const start = leastConnectedNode(adjacency);
  const populationSize = Math.max(1, settings.populationSize);

  let population = Array.from({ length: populationSize }, () => randomDepthFirstOrder(adjacency, start, random));
  let best = population[0];
  let bestFitness = Infinity;
  let stagnation = 0;

  for (let generation = 0; generation < settings.generations; generation += 1) {
    const fitness = population.map((individual) => circularCostCrossingSweepline(individual, edges, n));
    let generationBest = 0;
    for (let i = 1; i < fitness.length; i += 1) {
      if (fitness[i] < fitness[generationBest]) {
        generationBest = i;
      }
    }
    if (fitness[generationBest] < bestFitness) {
      bestFitness = fitness[generationBest];
      best = [...population[generationBest]];
      stagnation = 0;
    } else {
      stagnation += 1;
      if (stagnation >= settings.maxStagnation) {
        break;
      }
    }

    const next: number[][] = [];
    while (next.length < populationSize) {
      const parent = tournament(population, fitness, random);
      const child =
        random() < settings.crossoverRate
          ? orderCrossover(parent, tournament(population, fitness, random), random)
          : [...parent];
      mutate(child, mutationRate, random);
      next.push(child);
    }
    population = next;
  }
  return best;
}
