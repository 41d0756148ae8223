import { describe, expect, it } from "vitest";
import { rect, rectsOverlap, type Rect } from "@/domain/geometry/Rect";
import { channelWidth } from "@/domain/orthogonal/channelGeometry";
import { resizeChannels } from "@/domain/orthogonal/ChannelResizer";
import { RoutingGraph } from "@/domain/orthogonal/RoutingGraph";

function row(): Rect[] {
  return [rect(0, 0, 40, 40), rect(60, 0, 100, 40), rect(120, 0, 160, 40)];
}

describe("resizeChannels", () => {
  it("pushes boxes and channels along a row", () => {
    const boxes = row();
    const graph = RoutingGraph.create(boxes);
    expect(graph.vertical.map((channel) => [channel.rect.minX, channel.rect.maxX])).toEqual([
      [-20, 0],
      [40, 60],
      [100, 120],
      [160, 180]
    ]);

    resizeChannels(graph, boxes, [20, 50, 20, 20], [20, 20]);

    expect(boxes).toEqual([rect(0, 0, 40, 40), rect(90, 0, 130, 40), rect(150, 0, 190, 40)]);
    expect(graph.vertical.map((channel) => [channel.rect.minX, channel.rect.maxX])).toEqual([
      [-20, 0],
      [40, 90],
      [130, 150],
      [190, 210]
    ]);
    // Horizontal channels ending on the outer frame follow it.
    expect(graph.horizontal.map((channel) => channel.rect.maxX)).toEqual([210, 210]);
  });

  it("resolves the vertical axis independently", () => {
    const boxes = [rect(0, 0, 40, 40), rect(0, 60, 40, 100)];
    const graph = RoutingGraph.create(boxes);
    expect(graph.horizontal.map((channel) => [channel.rect.minY, channel.rect.maxY])).toEqual([
      [-20, 0],
      [40, 60],
      [100, 120]
    ]);

    resizeChannels(graph, boxes, [20, 20], [20, 36, 20]);

    expect(boxes).toEqual([rect(0, 0, 40, 40), rect(0, 76, 40, 116)]);
    expect(graph.horizontal.map((channel) => [channel.rect.minY, channel.rect.maxY])).toEqual([
      [-20, 0],
      [40, 76],
      [116, 136]
    ]);
    expect(graph.vertical.map((channel) => channel.rect.maxY)).toEqual([136, 136]);
  });

  it("meets every minimum width without overlapping boxes", () => {
    const boxes = row();
    const graph = RoutingGraph.create(boxes);
    const vertical = [36, 44, 52, 28];
    const horizontal = [28, 60];
    resizeChannels(graph, boxes, vertical, horizontal);

    graph.vertical.forEach((channel, i) => expect(channelWidth(channel)).toBeGreaterThanOrEqual(vertical[i]));
    graph.horizontal.forEach((channel, i) => expect(channelWidth(channel)).toBeGreaterThanOrEqual(horizontal[i]));
    for (let i = 0; i < boxes.length; i += 1) {
      for (let j = i + 1; j < boxes.length; j += 1) {
        expect(rectsOverlap(boxes[i], boxes[j])).toBe(false);
      }
    }
  });

  it("leaves wide channels alone", () => {
    const boxes = row();
    const graph = RoutingGraph.create(boxes);
    resizeChannels(graph, boxes, [10, 10, 10, 10], [10, 10]);
    expect(boxes).toEqual(row());
  });

  it("rejects a width table of the wrong length", () => {
    const boxes = row();
    const graph = RoutingGraph.create(boxes);
    expect(() => resizeChannels(graph, boxes, [20], [20, 20])).toThrow(
      "[orthogonal-routing] Expected 4 minimum widths, received 1"
    );
  });
});
