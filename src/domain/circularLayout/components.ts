import type { OrderEdge } from "@/domain/circularLayout/circularCost";

/**
 * Connected components of `nodes` under `edges` (union-find with path compression).
 * Edges with an endpoint outside `nodes` are ignored. Components are listed in the
 * order of their first node.
 */
export function findComponents(edges: readonly OrderEdge[], nodes: readonly number[]): number[][] {
  const indexOf = new Map(nodes.map((node, index) => [node, index]));
  const parent = nodes.map((_, index) => index);
  const find = (x: number): number => {
    let root = x;
    while (parent[root] !== root) {
      root = parent[root];
    }
    while (parent[x] !== root) {
      const next = parent[x];
      parent[x] = root;
      x = next;
    }
    return root;
  };

  for (const edge of edges) {
    const from = indexOf.get(edge.from);
    const to = indexOf.get(edge.to);
    if (from === undefined || to === undefined) {
      continue;
    }
    const rootFrom = find(from);
    const rootTo = find(to);
    if (rootFrom !== rootTo) {
      parent[rootTo] = rootFrom;
    }
  }

  const byRoot = new Map<number, number[]>();
  nodes.forEach((node, index) => {
    const root = find(index);
    const component = byRoot.get(root);
    if (component) {
      component.push(node);
    } else {
      byRoot.set(root, [node]);
    }
  });
  return [...byRoot.values()];
}
