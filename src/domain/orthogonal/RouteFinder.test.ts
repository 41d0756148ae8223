import { describe, expect, it } from "vitest";
import { rect, rectFromCenterSize, type Rect } from "@/domain/geometry/Rect";
import { bendDirection, findRoutes, removeStraightElements } from "@/domain/orthogonal/RouteFinder";
import { RoutingGraph } from "@/domain/orthogonal/RoutingGraph";

const DIAGONAL: Rect[] = [rect(0, 0, 100, 100), rect(150, 150, 250, 250)];

describe("RoutingGraph", () => {
  it("numbers boxes, then ports, then bend points", () => {
    const graph = RoutingGraph.create(DIAGONAL);

    expect(graph.nodes).toHaveLength(19);
    expect(graph.nodes[0]).toEqual({ kind: "node", nodeId: 0 });
    expect(graph.nodes[4]).toEqual({ kind: "port", nodeId: 0, channel: 1, side: "right" });
    expect(graph.portId(1, "left")).toBe(3);
    expect(graph.portId(1, "bottom")).toBe(9);
    expect(graph.bendPoints()).toHaveLength(9);
    expect(graph.bendId(1, 1)).toBe(14);
    expect(graph.channelCount).toBe(6);
  });

  it("links each port to its box and its neighbours along the channel", () => {
    const graph = RoutingGraph.create(DIAGONAL);
    expect(graph.neighbors[0]).toEqual([2, 4, 6, 8]);
    expect(graph.neighbors[4]).toEqual([0, 13, 14]);
    expect(graph.neighbors[14]).toEqual([4, 3, 8, 7]);
  });

  it("resolves channels of ports and bends", () => {
    const graph = RoutingGraph.create(DIAGONAL);
    expect(graph.channelOf(4, "horizontal")).toEqual({ index: 1, orientation: "vertical" });
    expect(graph.channelOf(14, "horizontal")).toEqual({ index: 1, orientation: "horizontal" });
    expect(graph.channelSlotIndex({ index: 2, orientation: "horizontal" })).toBe(5);
    expect(() => graph.channelOf(0, "vertical")).toThrow("[orthogonal-routing] Routing node 0 is a box, not a channel element");
  });
});

describe("findRoutes", () => {
  it("routes two diagonal boxes through the shared vertical channel", () => {
    const graph = RoutingGraph.create(DIAGONAL);
    const routes = findRoutes(graph, DIAGONAL, [{ from: 1, to: 0 }]);
    expect(routes).toEqual([{ from: 0, to: 1, route: [4, 3], bendDirections: [] }]);
  });

  it("skips self-loops and duplicate pairs", () => {
    const graph = RoutingGraph.create(DIAGONAL);
    const routes = findRoutes(graph, DIAGONAL, [
      { from: 0, to: 1 },
      { from: 1, to: 0 },
      { from: 1, to: 1 }
    ]);
    expect(routes).toHaveLength(1);
  });

  it("routes every pair in a cluster with alternating channels", () => {
    const boxes = [
      rectFromCenterSize({ x: 20, y: 20 }, 30, 10),
      rectFromCenterSize({ x: 70, y: 22 }, 30, 10),
      rectFromCenterSize({ x: 20, y: 38 }, 25, 10),
      rectFromCenterSize({ x: 70, y: 40 }, 35, 10),
      rectFromCenterSize({ x: 40, y: 60 }, 55, 10)
    ];
    const graph = RoutingGraph.create(boxes);
    const pairs = [
      [0, 1],
      [0, 3],
      [0, 4],
      [2, 3],
      [1, 4],
      [1, 3],
      [2, 4]
    ];
    const routes = findRoutes(
      graph,
      boxes,
      pairs.map(([from, to]) => ({ from, to }))
    );

    expect(routes.map((route) => [route.from, route.to])).toEqual([
      [0, 1],
      [0, 3],
      [0, 4],
      [1, 3],
      [1, 4],
      [2, 3],
      [2, 4]
    ]);
    for (const route of routes) {
      const first = graph.nodes[route.route[0]];
      const last = graph.nodes[route.route[route.route.length - 1]];
      expect(first.kind === "port" && first.nodeId === route.from).toBe(true);
      expect(last.kind === "port" && last.nodeId === route.to).toBe(true);
      expect(route.route.slice(1, -1).every((id) => graph.nodes[id].kind === "bend")).toBe(true);
      expect(route.bendDirections).toHaveLength(route.route.length - 2);
    }
  });
});

describe("removeStraightElements", () => {
  it("drops a bend passed straight through", () => {
    const graph = RoutingGraph.create(DIAGONAL);
    expect(removeStraightElements(graph, [4, 14, 3])).toEqual([4, 3]);
  });

  it("keeps a real turn", () => {
    const graph = RoutingGraph.create(DIAGONAL);
    // A right -> crossing of V1/H1 -> B top
    expect(removeStraightElements(graph, [4, 14, 7])).toEqual([4, 14, 7]);
  });

  it("drops ports passed along the way", () => {
    const graph = RoutingGraph.create(DIAGONAL);
    expect(removeStraightElements(graph, [4, 14, 3, 15, 9])).toEqual([4, 15, 9]);
  });
});

describe("bendDirection", () => {
  it("classifies turns leaving a horizontal channel", () => {
    expect(bendDirection({ x: 10, y: 120 }, { x: 110, y: 60 }, "horizontal")).toBe("up-left");
    expect(bendDirection({ x: 110, y: 60 }, { x: 10, y: 120 }, "horizontal")).toBe("down-right");
    expect(bendDirection({ x: 10, y: 120 }, { x: 110, y: 150 }, "horizontal")).toBe("down-left");
    expect(bendDirection({ x: 10, y: 120 }, { x: 0, y: 150 }, "horizontal")).toBe("down-right");
    expect(bendDirection({ x: 10, y: 120 }, { x: 0, y: 60 }, "horizontal")).toBe("up-right");
  });

  it("classifies turns leaving a vertical channel", () => {
    expect(bendDirection({ x: 10, y: 120 }, { x: 110, y: 60 }, "vertical")).toBe("down-right");
    expect(bendDirection({ x: 110, y: 60 }, { x: 10, y: 120 }, "vertical")).toBe("up-left");
    expect(bendDirection({ x: 10, y: 120 }, { x: 110, y: 150 }, "vertical")).toBe("up-right");
    expect(bendDirection({ x: 10, y: 120 }, { x: 0, y: 150 }, "vertical")).toBe("up-left");
    expect(bendDirection({ x: 10, y: 120 }, { x: 0, y: 60 }, "vertical")).toBe("down-left");
  });
});
