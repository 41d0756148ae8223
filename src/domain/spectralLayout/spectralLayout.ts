import { cloneNodePosition, type LayoutEdge, type NodePosition } from "@/domain/graph/GraphTypes";
import { visibleEdges } from "@/domain/graph/graphFilters";
import { SortedTagSet } from "@/domain/graph/SortedTagSet";
import { symmetricEigen, type SymmetricEigenOptions } from "@/domain/spectralLayout/symmetricEigen";
import { solved, unsolved, type SolveResult } from "@/lib/solveResult";

export type SpectralLayoutInput = {
  positions: NodePosition[];
  edges: LayoutEdge[];
  hiddenTags?: number[];
  /** Defaults to every node. */
  selectedNodes?: number[];
  /** Half-extent of the result: the farthest coordinate lands at this distance from the origin. */
  scale?: number;
  eigen?: SymmetricEigenOptions;
};

export const DEFAULT_SPECTRAL_SCALE = 800;
const ZERO_EIGENVALUE = 1e-9;

/** Graph Laplacian `D - A` over `nodes`; parallel edges add weight, self-loops are skipped. */
export function buildLaplacian(nodes: readonly number[], edges: readonly Pick<LayoutEdge, "from" | "to">[]): number[][] {
  const indexOf = new Map(nodes.map((node, index) => [node, index]));
  const laplacian = nodes.map(() => nodes.map(() => 0));
  for (const edge of edges) {
    const i = indexOf.get(edge.from);
    const j = indexOf.get(edge.to);
    if (i === undefined || j === undefined || i === j) {
      continue;
    }
    laplacian[i][j] -= 1;
    laplacian[j][i] -= 1;
    laplacian[i][i] += 1;
    laplacian[j][j] += 1;
  }
  return laplacian;
}

/** Centres both columns on the origin and scales them together so the largest magnitude is `scale`. */
function rescale(xs: number[], ys: number[], scale: number): void {
  const meanX = xs.reduce((sum, x) => sum + x, 0) / xs.length;
  const meanY = ys.reduce((sum, y) => sum + y, 0) / ys.length;
  let limit = 0;
  for (let i = 0; i < xs.length; i += 1) {
    xs[i] -= meanX;
    ys[i] -= meanY;
    limit = Math.max(limit, Math.abs(xs[i]), Math.abs(ys[i]));
  }
  const factor = limit > 0 ? scale / limit : 0;
  for (let i = 0; i < xs.length; i += 1) {
    xs[i] *= factor;
    ys[i] *= factor;
  }
}

/**
 * Places the selected nodes at the entries of the two Laplacian eigenvectors following
 * the null space. Unselected nodes keep their positions.
 */
export function spectralLayout(input: SpectralLayoutInput): SolveResult<NodePosition[]> {
  const count = input.positions.length;
  const positions = input.positions.map(cloneNodePosition);
  const selected = input.selectedNodes
    ? [...new Set(input.selectedNodes)].filter((node) => Number.isInteger(node) && node >= 0 && node < count)
    : positions.map((_, index) => index);
  const n = selected.length;
  if (n < 2) {
    return solved(positions);
  }

  const eigen = symmetricEigen(
    buildLaplacian(selected, visibleEdges(input.edges, new SortedTagSet(input.hiddenTags ?? []))),
    input.eigen
  );
  if (!eigen.success) {
    return eigen;
  }

  let start = eigen.value.values.findIndex((value) => Math.abs(value) > ZERO_EIGENVALUE);
  if (start === -1) {
    start = Math.min(1, n - 1);
  }
  if (start + 2 > n) {
    if (1 + 2 > n) {
      return unsolved(`[spectral-layout] not enough eigenvectors for ${n} nodes`);
    }
    start = 1;
  }

  const xs = [...eigen.value.vectors[start]];
  const ys = [...eigen.value.vectors[start + 1]];
  rescale(xs, ys, input.scale ?? DEFAULT_SPECTRAL_SCALE);
  selected.forEach((node, index) => {
    positions[node].pos = { x: xs[index], y: ys[index] };
  });
  return solved(positions);
}
