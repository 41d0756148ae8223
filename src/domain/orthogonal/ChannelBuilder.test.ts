import { describe, expect, it } from "vitest";
import { rect, rectFromCenterSize, rectsIntersect, type Rect } from "@/domain/geometry/Rect";
import { buildChannels } from "@/domain/orthogonal/ChannelBuilder";
import { channelWidth, mergeChannels } from "@/domain/orthogonal/channelGeometry";
import type { ChannelPort, RChannel } from "@/domain/orthogonal/orthogonalTypes";

function nodePorts(channel: RChannel): string[] {
  return channel.ports.flatMap((port: ChannelPort) => (port.kind === "node" ? [`${port.nodeId}:${port.side}`] : []));
}

const CLUSTER: Rect[] = [
  rectFromCenterSize({ x: 20, y: 20 }, 30, 10),
  rectFromCenterSize({ x: 70, y: 22 }, 30, 10),
  rectFromCenterSize({ x: 20, y: 38 }, 25, 10),
  rectFromCenterSize({ x: 70, y: 40 }, 35, 10),
  rectFromCenterSize({ x: 40, y: 60 }, 55, 10)
];

describe("buildChannels", () => {
  it("finds the corridors around two diagonal boxes", () => {
    const { vertical, horizontal } = buildChannels([rect(0, 0, 100, 100), rect(150, 150, 250, 250)]);

    expect(vertical.map((channel) => channel.rect)).toEqual([
      rect(-20, -20, 0, 270),
      rect(100, -20, 150, 270),
      rect(250, -20, 270, 270)
    ]);
    expect(vertical.map(nodePorts)).toEqual([["0:left"], ["1:left", "0:right"], ["1:right"]]);
    expect(horizontal.map((channel) => channel.rect)).toEqual([
      rect(-20, -20, 270, 0),
      rect(-20, 100, 270, 150),
      rect(-20, 250, 270, 270)
    ]);
    expect(horizontal.map(nodePorts)).toEqual([["0:top"], ["1:top", "0:bottom"], ["1:bottom"]]);
  });

  it("records the box centre as port position", () => {
    const { vertical } = buildChannels([rect(0, 0, 100, 100), rect(150, 150, 250, 250)]);
    expect(vertical[1].ports.map((port) => port.position)).toEqual([200, 50]);
  });

  it("honours a custom margin", () => {
    const { vertical } = buildChannels([rect(0, 0, 10, 10)], 5);
    expect(vertical.map((channel) => channel.rect)).toEqual([rect(-5, -5, 0, 15), rect(10, -5, 15, 15)]);
  });

  it("never returns intersecting channels of one orientation", () => {
    const { vertical, horizontal } = buildChannels(CLUSTER);
    for (const channels of [vertical, horizontal]) {
      for (let i = 0; i < channels.length; i += 1) {
        for (let j = i + 1; j < channels.length; j += 1) {
          expect(rectsIntersect(channels[i].rect, channels[j].rect)).toBe(false);
        }
      }
    }
  });

  it("gives every box side exactly one port", () => {
    const { vertical, horizontal } = buildChannels(CLUSTER);
    const verticalPorts = vertical.flatMap(nodePorts).sort();
    const horizontalPorts = horizontal.flatMap(nodePorts).sort();
    expect(verticalPorts).toEqual(CLUSTER.flatMap((_, i) => [`${i}:left`, `${i}:right`]).sort());
    expect(horizontalPorts).toEqual(CLUSTER.flatMap((_, i) => [`${i}:bottom`, `${i}:top`]).sort());
  });

  it("keeps channels clear of box interiors", () => {
    const { vertical, horizontal } = buildChannels(CLUSTER);
    for (const channel of [...vertical, ...horizontal]) {
      expect(channelWidth(channel)).toBeGreaterThanOrEqual(0);
      for (const box of CLUSTER) {
        const overlapX = Math.min(channel.rect.maxX, box.maxX) - Math.max(channel.rect.minX, box.minX);
        const overlapY = Math.min(channel.rect.maxY, box.maxY) - Math.max(channel.rect.minY, box.minY);
        expect(overlapX > 0 && overlapY > 0).toBe(false);
      }
    }
  });

  it("returns nothing for an empty layout", () => {
    expect(buildChannels([])).toEqual({ vertical: [], horizontal: [] });
  });
});

describe("mergeChannels", () => {
  it("unions the run and intersects the cross extent", () => {
    const target: RChannel = { rect: rect(0, 0, 10, 100), orientation: "vertical", ports: [] };
    const other: RChannel = {
      rect: rect(5, 50, 20, 200),
      orientation: "vertical",
      ports: [{ kind: "node", position: 120, routingNode: -1, nodeId: 3, side: "left" }]
    };
    mergeChannels(target, other);
    expect(target.rect).toEqual(rect(5, 0, 10, 200));
    expect(target.ports).toHaveLength(1);
    expect(other.ports).toEqual([]);
  });

  it("does the same across x for horizontal channels", () => {
    const target: RChannel = { rect: rect(0, 0, 100, 10), orientation: "horizontal", ports: [] };
    mergeChannels(target, { rect: rect(60, 4, 150, 30), orientation: "horizontal", ports: [] });
    expect(target.rect).toEqual(rect(0, 4, 150, 10));
  });
});
