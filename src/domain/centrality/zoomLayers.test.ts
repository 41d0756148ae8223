import { describe, expect, it } from "vitest";
import { computeGeometricRatio, distributeToZoomLayers } from "@/domain/centrality/zoomLayers";

function histogram(layers: number[]): Map<number, number> {
  const result = new Map<number, number>();
  for (const layer of layers) {
    result.set(layer, (result.get(layer) ?? 0) + 1);
  }
  return result;
}

describe("computeGeometricRatio", () => {
  it("finds a ratio whose series hits the requested sum", () => {
    const result = computeGeometricRatio(52, 4, 10);
    expect(result.success).toBe(true);
    if (result.success) {
      const q = result.value;
      expect((4 * (1 - q ** 10)) / (1 - q)).toBeCloseTo(52, 6);
    }
  });

  it("returns 1 when the sum equals the first term", () => {
    expect(computeGeometricRatio(4, 4, 10)).toEqual({ success: true, value: 1 });
  });

  it("fails when the iteration cap is reached", () => {
    expect(computeGeometricRatio(52, 4, 10, 1e-10, 3).success).toBe(false);
  });
});

describe("distributeToZoomLayers", () => {
  it("gives each of ten distinct values its own layer", () => {
    const values = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9];
    expect(distributeToZoomLayers(values)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
  });

  it("never splits equal values across layers", () => {
    expect(distributeToZoomLayers([0.9, 0.9, 1, 0.9, 0.9, 0.9])).toEqual([9, 9, 10, 9, 9, 9]);
    expect(distributeToZoomLayers([0.5, 0.5, 0.5, 0.5, 0.5])).toEqual([10, 10, 10, 10, 10]);
  });

  it("grows layer sizes geometrically for large inputs", () => {
    const values = Array.from({ length: 1000 }, (_, i) => 1 - 0.0001 * (i + 1));
    const layers = distributeToZoomLayers(values);
    const counts = histogram(layers);

    expect(counts.get(10)).toBe(4);
    expect(counts.size).toBe(10);
    expect(Math.min(...layers)).toBe(1);
    for (let i = 1; i < layers.length; i += 1) {
      expect(layers[i - 1]).toBeGreaterThanOrEqual(layers[i]);
    }
  });

  it("returns nothing for no values", () => {
    expect(distributeToZoomLayers([])).toEqual([]);
  });
});
