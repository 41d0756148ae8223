import type { LayoutEdge } from "@/domain/graph/GraphTypes";

export function computeDegreeCentrality(nodeCount: number, edges: readonly Pick<LayoutEdge, "from" | "to">[]): number[] {
  const result = new Array<number>(nodeCount).fill(0);
  for (const edge of edges) {
    result[edge.from] += 1;
    result[edge.to] += 1;
  }
  return result;
}

/** Divides by the maximum when it is positive. */
export function normalize(values: readonly number[]): number[] {
  let max = -Infinity;
  for (const value of values) {
    if (value > max) {
      max = value;
    }
  }
  if (!(max > 0)) {
    return [...values];
  }
  return values.map((value) => value / max);
}
