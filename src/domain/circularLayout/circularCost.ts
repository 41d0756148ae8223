export type OrderEdge = {
  from: number;
  to: number;
};

export function circularDistance(i: number, j: number, n: number): number {
  const d = Math.abs(i - j);
  return Math.min(d, n - d);
}

export function positionsOf(order: readonly number[]): Map<number, number> {
  return new Map(order.map((node, index) => [node, index]));
}

function slotOf(pos: ReadonlyMap<number, number>, node: number): number {
  const slot = pos.get(node);
  if (slot === undefined) {
    throw new Error(`[circular-layout] Node ${node} is missing from the ordering`);
  }
  return slot;
}

/**
 * Sum of circular index distances over all edges plus the number of crossing chord
 * pairs, counted with a sweep over intervals sorted by start.
 */
export function circularCostCrossingSweepline(order: readonly number[], edges: readonly OrderEdge[], n: number): number {
  const pos = positionsOf(order);
  let total = 0;
  const intervals = edges.map((edge) => {
    const a = slotOf(pos, edge.from);
    const b = slotOf(pos, edge.to);
    total += circularDistance(a, b, n);
    return { start: Math.min(a, b), end: Math.max(a, b) };
  });
  intervals.sort((left, right) => left.start - right.start);

  let crossings = 0;
  let active: { start: number; end: number }[] = [];
  for (const interval of intervals) {
    for (const open of active) {
      if (open.start < interval.start && interval.start < open.end && interval.end > open.end) {
        crossings += 1;
      }
    }
    active.push(interval);
    active = active.filter((open) => open.end >= interval.start);
  }
  return total + crossings;
}
