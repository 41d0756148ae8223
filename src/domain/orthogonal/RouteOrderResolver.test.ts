import { describe, expect, it } from "vitest";
import { RouteOrderResolver } from "@/domain/orthogonal/RouteOrderResolver";
import { mulberry32, randomInt } from "@/lib/random";

describe("RouteOrderResolver", () => {
  it("sorts a diamond with the source first and the sink last", () => {
    const resolver = new RouteOrderResolver(4);
    expect(resolver.addRouteOrder(0, 1)).toBe(true);
    expect(resolver.addRouteOrder(0, 2)).toBe(true);
    expect(resolver.addRouteOrder(1, 3)).toBe(true);
    expect(resolver.addRouteOrder(2, 3)).toBe(true);

    const sorted = resolver.topologicalSort();
    expect(sorted[0]).toBe(0);
    expect(sorted[3]).toBe(3);
  });

  it("refuses an ordering that would close a cycle", () => {
    const resolver = new RouteOrderResolver(3);
    expect(resolver.addRouteOrder(0, 1)).toBe(true);
    expect(resolver.addRouteOrder(1, 2)).toBe(true);
    expect(resolver.addRouteOrder(2, 0)).toBe(false);
    expect(resolver.detectedCycles).toBe(1);
    expect(resolver.successorsOf(2)).toEqual([]);
    expect(resolver.topologicalSort()).toEqual([0, 1, 2]);
  });

  it("refuses self orderings", () => {
    const resolver = new RouteOrderResolver(2);
    expect(resolver.addRouteOrder(1, 1)).toBe(false);
    expect(resolver.detectedCycles).toBe(1);
  });

  it("keeps every accepted ordering in the sorted result", () => {
    const random = mulberry32(11);
    const resolver = new RouteOrderResolver(30);
    const accepted: [number, number][] = [];
    for (let i = 0; i < 200; i += 1) {
      const first = randomInt(random, 30);
      const second = randomInt(random, 30);
      if (resolver.addRouteOrder(first, second)) {
        accepted.push([first, second]);
      }
    }
    const sorted = resolver.topologicalSort();
    expect([...sorted].sort((a, b) => a - b)).toEqual(Array.from({ length: 30 }, (_, i) => i));
    const rank = new Map(sorted.map((route, index) => [route, index]));
    for (const [first, second] of accepted) {
      expect(rank.get(first) ?? -1).toBeLessThan(rank.get(second) ?? -1);
    }
  });

  it("throws on out-of-range routes", () => {
    const resolver = new RouteOrderResolver(2);
    expect(() => resolver.addRouteOrder(0, 2)).toThrow(RangeError);
    expect(() => resolver.addRouteOrder(-1, 0)).toThrow("[orthogonal-routing] Route index -1 outside [0, 2)");
  });

  it("treats a cycle introduced around the guard as fatal", () => {
    const resolver = RouteOrderResolver.fromOrderGraph([[1], [2], [0], []]);
    expect(() => resolver.topologicalSort()).toThrow("[orthogonal-routing] Cycle in route order graph: 3 routes left unsorted");
  });
});
