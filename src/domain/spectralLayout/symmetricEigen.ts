import { solved, unsolved, type SolveResult } from "@/lib/solveResult";

export type SymmetricEigenOptions = {
  maxSweeps?: number;
  /** Convergence threshold on the off-diagonal norm, relative to the matrix norm. */
  tolerance?: number;
};

export type SymmetricEigenResult = {
  /** Ascending. */
  values: number[];
  /** `vectors[k]` is the unit eigenvector of `values[k]`. */
  vectors: number[][];
};

export const DEFAULT_MAX_SWEEPS = 50;
export const DEFAULT_EIGEN_TOLERANCE = 1e-10;

function offDiagonalNorm(a: readonly number[][]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i += 1) {
    for (let j = 0; j < a.length; j += 1) {
      if (i !== j) {
        sum += a[i][j] * a[i][j];
      }
    }
  }
  return Math.sqrt(sum);
}

function rotate(a: number[][], v: number[][], p: number, q: number): void {
  const n = a.length;
  const theta = (a[q][q] - a[p][p]) / (2 * a[p][q]);
  const t = (theta >= 0 ? 1 : -1) / (Math.abs(theta) + Math.sqrt(theta * theta + 1));
  const c = 1 / Math.sqrt(t * t + 1);
  const s = t * c;
  for (let k = 0; k < n; k += 1) {
    const akp = a[k][p];
    const akq = a[k][q];
    a[k][p] = c * akp - s * akq;
    a[k][q] = s * akp + c * akq;
  }
  for (let k = 0; k < n; k += 1) {
    const apk = a[p][k];
    const aqk = a[q][k];
    a[p][k] = c * apk - s * aqk;
    a[q][k] = s * apk + c * aqk;
  }
  for (let k = 0; k < n; k += 1) {
    const vkp = v[k][p];
    const vkq = v[k][q];
    v[k][p] = c * vkp - s * vkq;
    v[k][q] = s * vkp + c * vkq;
  }
}

/**
 * Eigen-decomposition of a symmetric matrix by cyclic Jacobi rotations. Fails when the
 * off-diagonal mass is still above tolerance after `maxSweeps` sweeps.
 */
export function symmetricEigen(
  matrix: readonly (readonly number[])[],
  options: SymmetricEigenOptions = {}
): SolveResult<SymmetricEigenResult> {
  const n = matrix.length;
  if (matrix.some((row) => row.length !== n)) {
    return unsolved(`[spectral-layout] expected a square matrix of size ${n}`);
  }
  const maxSweeps = options.maxSweeps ?? DEFAULT_MAX_SWEEPS;
  const tolerance = options.tolerance ?? DEFAULT_EIGEN_TOLERANCE;
  const a = matrix.map((row) => [...row]);
  const v = matrix.map((_, i) => matrix.map((__, j) => (i === j ? 1 : 0)));
  const scale = Math.max(1, Math.sqrt(a.reduce((sum, row) => sum + row.reduce((s, x) => s + x * x, 0), 0)));

  let converged = offDiagonalNorm(a) <= tolerance * scale;
  for (let sweep = 0; sweep < maxSweeps && !converged; sweep += 1) {
    for (let p = 0; p < n - 1; p += 1) {
      for (let q = p + 1; q < n; q += 1) {
        if (Math.abs(a[p][q]) > Number.MIN_VALUE) {
          rotate(a, v, p, q);
        }
      }
    }
    converged = offDiagonalNorm(a) <= tolerance * scale;
  }
  if (!converged) {
    return unsolved(`[spectral-layout] eigen-decomposition did not converge in ${maxSweeps} sweeps`);
  }

  const order = a.map((_, index) => index).sort((x, y) => a[x][x] - a[y][y]);
  return solved({
    values: order.map((k) => a[k][k]),
    vectors: order.map((k) => v.map((row) => row[k]))
  });
}
