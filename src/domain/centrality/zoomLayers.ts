import { solved, unsolved, type SolveResult } from "@/lib/solveResult";

export const ZOOM_LAYER_COUNT = 10;

/**
 * Ratio `q` of a geometric series with first term `a` and `n` terms summing to `sum`,
 * found by bisection.
 */
export function computeGeometricRatio(
  sum: number,
  a: number,
  n: number,
  tolerance = 1e-10,
  maxIterations = 1000
): SolveResult<number> {
  if (n <= 0) {
    return unsolved("series must have at least one term");
  }
  if (Math.abs(sum - a) < tolerance) {
    return solved(1);
  }
  const residual = (q: number): number =>
    Math.abs(q - 1) < tolerance ? a * n - sum : (a * (1 - q ** n)) / (1 - q) - sum;

  let low = 0;
  let high = Math.max(2, sum / a);
  for (let iteration = 0; iteration < maxIterations; iteration += 1) {
    const mid = (low + high) / 2;
    const value = residual(mid);
    if (Math.abs(value) < tolerance) {
      return solved(mid);
    }
    if (residual(low) * value < 0) {
      high = mid;
    } else {
      low = mid;
    }
  }
  return unsolved(`no ratio found within ${maxIterations} iterations`);
}

type Range = [start: number, end: number];

function geometricRanges(length: number, firstSize: number, ratio: number): Range[] {
  const ranges: Range[] = [];
  let pos = 0;
  let size = firstSize;
  for (let layer = 0; layer < ZOOM_LAYER_COUNT; layer += 1) {
    const end = layer === ZOOM_LAYER_COUNT - 1 ? length - 1 : Math.floor(pos + size + 0.5) - 1;
    if (end >= length - 1) {
      ranges.push([pos, length - 1]);
      break;
    }
    ranges.push([pos, end]);
    pos = end + 1;
    size *= ratio;
  }
  return ranges;
}

/** Moves range borders so that equal values never land in different layers. */
function alignRangesToTies(ranges: readonly Range[], sorted: readonly number[]): Range[] {
  const aligned: Range[] = [];
  let carryStart = -1;
  for (let index = 0; index < ranges.length; index += 1) {
    let [start, end] = ranges[index];
    if (carryStart >= 0) {
      start = carryStart;
    }
    carryStart = -1;
    if (end < start) {
      end = start;
      carryStart = end + 1;
      if (carryStart > sorted.length - 1) {
        break;
      }
    }
    const previous = aligned[aligned.length - 1];
    if (previous && sorted[start] === sorted[previous[1]]) {
      if (sorted[start] === sorted[end]) {
        if (sorted[previous[0]] === sorted[previous[1]]) {
          carryStart = end + 1;
          previous[1] = end;
          continue;
        }
        let previousEnd = previous[1];
        while (sorted[previousEnd] === sorted[start] && previousEnd > previous[0]) {
          previousEnd -= 1;
        }
        previous[1] = previousEnd;
        start = previousEnd + 1;
      } else {
        while (sorted[previous[1]] === sorted[start] && start <= end) {
          start += 1;
        }
        previous[1] = start - 1;
      }
    }
    aligned.push([start, end]);
  }
  return aligned;
}

/**
 * Assigns each value a zoom layer from 10 (highest values, few of them) down to 1.
 * Layer sizes grow geometrically. Returns all zeros when no ratio can be found.
 */
export function distributeToZoomLayers(values: readonly number[]): number[] {
  const layers = new Array<number>(values.length).fill(0);
  if (values.length === 0) {
    return layers;
  }
  const order = values
    .map((value, index) => ({ value: Number.isNaN(value) ? -Infinity : value, index }))
    .sort((left, right) => (left.value === right.value ? 0 : left.value > right.value ? -1 : 1));
  const sorted = order.map((entry) => entry.value);
  const firstSize = values.length < 12 ? 1 : 4;
  const ratio = computeGeometricRatio(values.length, firstSize, ZOOM_LAYER_COUNT);
  if (!ratio.success) {
    console.warn("[centrality] Falling back to flat zoom layers", ratio.error);
    return layers;
  }

  const ranges = alignRangesToTies(geometricRanges(values.length, firstSize, Math.max(1, ratio.value)), sorted);
  ranges.forEach(([start, end], layer) => {
    for (let i = start; i <= end; i += 1) {
      layers[order[i].index] = ZOOM_LAYER_COUNT - layer;
    }
  });
  return layers;
}
