import { describe, expect, it, vi } from "vitest";
import { createNodePosition, type LayoutEdge, type NodePosition } from "@/domain/graph/GraphTypes";
import { runLayoutStrategy } from "@/domain/layoutEngine/LayoutDispatcher";
import {
  createInitialStrategyConfig,
  DEFAULT_LAYOUT_STRATEGY,
  getLayoutStrategyDefinition,
  LAYOUT_STRATEGIES
} from "@/domain/layoutEngine/LayoutStrategyRegistry";
import { resolveBooleanConfig, resolveIntegerConfig, resolveNumberConfig } from "@/domain/layoutEngine/layoutConfigUtils";

function edge(from: number, to: number, tag = 0): LayoutEdge {
  return { from, to, tag, curvature: 0 };
}

function square(): NodePosition[] {
  return [createNodePosition(0, 0), createNodePosition(100, 0), createNodePosition(100, 100), createNodePosition(0, 100)];
}

describe("runLayoutStrategy", () => {
  it("throws for unknown strategy", () => {
    expect(() => runLayoutStrategy("spiral", { positions: [], edges: [] })).toThrow(
      "[layout-engine] Unknown strategy: spiral"
    );
  });

  it("leaves nodes in place when a force step runs at zero temperature", () => {
    const input = { positions: square(), edges: [edge(0, 1), edge(1, 2)], temperature: 0 };
    const output = runLayoutStrategy("force-step", input);
    expect(output.maxDisplacement).toBe(0);
    expect(output.positions.map((node) => node.pos)).toEqual(input.positions.map((node) => node.pos));
  });

  it("moves nodes by at most the temperature", () => {
    const positions = [createNodePosition(0, 0), createNodePosition(1, 0), createNodePosition(0, 1)];
    const output = runLayoutStrategy("force-step", { positions, edges: [edge(0, 1)], temperature: 2 });
    expect(output.maxDisplacement).toBeGreaterThan(0);
    expect(output.maxDisplacement).toBeLessThanOrEqual(2 + 1e-6);
    expect(positions[0].pos).toEqual({ x: 0, y: 0 });
  });

  it("puts every node on the circumscribed circle when nothing is selected", () => {
    const output = runLayoutStrategy("circular", { positions: square(), edges: [] });
    const r = 50 * Math.SQRT2;
    const expected = [
      [50, 50 - r],
      [50 + r, 50],
      [50, 50 + r],
      [50 - r, 50]
    ];
    output.positions.forEach((node, i) => {
      expect(node.pos.x).toBeCloseTo(expected[i][0], 6);
      expect(node.pos.y).toBeCloseTo(expected[i][1], 6);
    });
    expect(output.maxDisplacement).toBeCloseTo(Math.hypot(50, 50 - r), 6);
  });

  it("routes orthogonal edges and reports them in metadata", () => {
    const output = runLayoutStrategy("orthogonal", {
      positions: [createNodePosition(50, 50), createNodePosition(200, 200)],
      edges: [edge(0, 1)],
      nodeSizes: [
        { width: 100, height: 100 },
        { width: 100, height: 100 }
      ]
    });
    expect(output.maxDisplacement).toBe(0);
    expect(output.positions.map((node) => node.pos)).toEqual([
      { x: 50, y: 50 },
      { x: 200, y: 200 }
    ]);
    expect(output.metadata?.detectedCycles).toBe(0);
    expect(output.metadata?.routes?.[0].points).toEqual([
      { x: 100, y: 50 },
      { x: 125, y: 50 },
      { x: 125, y: 200 },
      { x: 150, y: 200 }
    ]);
  });
  it("lines nodes up along x and returns the edges it curved", () => {
    const output = runLayoutStrategy("linear", { positions: square(), edges: [edge(0, 1)] });
    expect(output.positions.map((node) => node.pos)).toEqual([
      { x: 20, y: 50 },
      { x: 110, y: 50 },
      { x: 200, y: 50 },
      { x: 290, y: 50 }
    ]);
    expect(output.maxDisplacement).toBeCloseTo(Math.hypot(290, 50), 9);
    expect(output.metadata?.edges).toEqual([edge(0, 1)]);
  });

  it("stacks nodes when the linear strategy is vertical", () => {
    const output = runLayoutStrategy("linear", {
      positions: square(),
      edges: [],
      strategyConfig: { vertical: true, spacing: 10 }
    });
    expect(output.positions.map((node) => node.pos)).toEqual([
      { x: 50, y: 20 },
      { x: 50, y: 70 },
      { x: 50, y: 120 },
      { x: 50, y: 170 }
    ]);
  });

  it("keeps positions and warns when the spectral solve fails", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    try {
      const positions = [createNodePosition(0, 0), createNodePosition(10, 0), createNodePosition(20, 0)];
      const output = runLayoutStrategy("spectral", {
        positions,
        edges: [edge(0, 1), edge(1, 2)],
        strategyConfig: { maxSweeps: 0 }
      });
      expect(output.maxDisplacement).toBe(0);
      expect(output.positions).toEqual(positions);
      expect(warn).toHaveBeenCalledTimes(1);
    } finally {
      warn.mockRestore();
    }
  });

  it("scales the spectral layout to the configured extent", () => {
    const output = runLayoutStrategy("spectral", {
      positions: [createNodePosition(0, 0), createNodePosition(10, 0), createNodePosition(20, 0)],
      edges: [edge(0, 1), edge(1, 2)],
      strategyConfig: { scale: 100 }
    });
    expect(Math.abs(output.positions[1].pos.y)).toBeCloseTo(100, 6);
  });

  it("pushes overlapping nodes apart", () => {
    const output = runLayoutStrategy("overlap-removal", {
      positions: [createNodePosition(0, 0), createNodePosition(10, 0)],
      edges: []
    });
    expect(output.positions[1].pos.x).toBeCloseTo(52, 6);
    expect(output.maxDisplacement).toBeCloseTo(42, 6);
  });
});

describe("layout strategy registry", () => {
  it("lists every strategy", () => {
    expect(LAYOUT_STRATEGIES).toEqual(["force-step", "circular", "linear", "spectral", "overlap-removal", "orthogonal"]);
    expect(DEFAULT_LAYOUT_STRATEGY).toBe("force-step");
  });

  it("creates initial configs", () => {
    expect(createInitialStrategyConfig("circular")).toEqual({
      populationSize: 50,
      generations: 100,
      crossoverRate: 0.5,
      mutationRate: 0.01,
      maxStagnation: 15
    });
    expect(createInitialStrategyConfig("orthogonal")).toEqual({ margin: 20 });
    expect(createInitialStrategyConfig("overlap-removal")).toEqual({ gap: 12, maxSteps: 1024 });
  });

  it("throws for a missing definition", () => {
    expect(() => getLayoutStrategyDefinition("spiral")).toThrow("[layout-engine] Missing strategy definition for: spiral");
  });
});

describe("layout config utils", () => {
  it("clamps finite numbers and falls back otherwise", () => {
    expect(resolveNumberConfig({ a: 5 }, "a", 1, 0, 3)).toBe(3);
    expect(resolveNumberConfig({ a: "2.5" }, "a", 1, 0, 3)).toBe(2.5);
    expect(resolveNumberConfig({ a: "x" }, "a", 1, 0, 3)).toBe(1);
    expect(resolveNumberConfig(undefined, "a", 1, 0, 3)).toBe(1);
    expect(resolveIntegerConfig({ a: 2.6 }, "a", 1, 0, 3)).toBe(3);
  });

  it("reads booleans", () => {
    expect(resolveBooleanConfig({ on: true }, "on", false)).toBe(true);
    expect(resolveBooleanConfig({ on: "false" }, "on", true)).toBe(false);
    expect(resolveBooleanConfig({ on: 1 }, "on", false)).toBe(true);
    expect(resolveBooleanConfig({ on: "maybe" }, "on", true)).toBe(true);
  });
});
