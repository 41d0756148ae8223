import { rectCenter, rectIntersection, rectsIntersect, type Rect } from "@/domain/geometry/Rect";
import { buildChannels, DEFAULT_CHANNEL_MARGIN } from "@/domain/orthogonal/ChannelBuilder";
import {
  portKey,
  sideOrientation,
  type ChannelRef,
  type Orientation,
  type RChannel,
  type RoutingNode,
  type Side
} from "@/domain/orthogonal/orthogonalTypes";

export type BendPoint = {
  id: number;
  vertical: number;
  horizontal: number;
};

/**
 * Graph over boxes, their channel ports and the crossings of vertical and horizontal
 * channels. Ids are laid out as: one per box, then ports in channel order (vertical
 * channels first), then bend points.
 */
export class RoutingGraph {
  public readonly nodes: RoutingNode[] = [];
  public readonly neighbors: number[][] = [];
  private readonly portIds = new Map<number, number>();
  private readonly bendIds = new Map<string, number>();

  private constructor(
    public readonly vertical: RChannel[],
    public readonly horizontal: RChannel[],
    public readonly boxCount: number
  ) {}

  public static create(boxes: readonly Rect[], margin = DEFAULT_CHANNEL_MARGIN): RoutingGraph {
    const { vertical, horizontal } = buildChannels(boxes, margin);
    const graph = new RoutingGraph(vertical, horizontal, boxes.length);
    boxes.forEach((_, nodeId) => graph.addNode({ kind: "node", nodeId }));

    const attachPorts = (channels: RChannel[]) => {
      channels.forEach((channel, channelIndex) => {
        for (const port of channel.ports) {
          if (port.kind !== "node") {
            continue;
          }
          const id = graph.addNode({ kind: "port", nodeId: port.nodeId, channel: channelIndex, side: port.side });
          port.routingNode = id;
          graph.portIds.set(portKey(port.nodeId, port.side), id);
          graph.link(port.nodeId, id);
        }
      });
    };
    attachPorts(vertical);
    attachPorts(horizontal);

    vertical.forEach((vchannel, v) => {
      horizontal.forEach((hchannel, h) => {
        if (!rectsIntersect(vchannel.rect, hchannel.rect)) {
          return;
        }
        const crossing = rectCenter(rectIntersection(vchannel.rect, hchannel.rect));
        const id = graph.addNode({ kind: "bend", vertical: v, horizontal: h });
        graph.bendIds.set(`${v}:${h}`, id);
        vchannel.ports.push({ kind: "bend", position: crossing.y, routingNode: id, channelId: h });
        hchannel.ports.push({ kind: "bend", position: crossing.x, routingNode: id, channelId: v });
      });
    });

    // Consecutive attachments along a channel are adjacent.
    for (const channel of [...vertical, ...horizontal]) {
      channel.ports.sort((a, b) => a.position - b.position);
      for (let i = 1; i < channel.ports.length; i += 1) {
        graph.link(channel.ports[i - 1].routingNode, channel.ports[i].routingNode);
      }
    }
    return graph;
  }

  public get channelCount(): number {
    return this.vertical.length + this.horizontal.length;
  }

  public channel(ref: ChannelRef): RChannel {
    const channels = ref.orientation === "vertical" ? this.vertical : this.horizontal;
    const channel = channels[ref.index];
    if (!channel) {
      throw new RangeError(`[orthogonal-routing] No ${ref.orientation} channel ${ref.index}`);
    }
    return channel;
  }

  /** Index into tables holding vertical channels first, then horizontal ones. */
  public channelSlotIndex(ref: ChannelRef): number {
    return ref.orientation === "vertical" ? ref.index : this.vertical.length + ref.index;
  }

  public portId(nodeId: number, side: Side): number | undefined {
    return this.portIds.get(portKey(nodeId, side));
  }

  public bendId(vertical: number, horizontal: number): number | undefined {
    return this.bendIds.get(`${vertical}:${horizontal}`);
  }

  public bendPoints(): BendPoint[] {
    const bends: BendPoint[] = [];
    this.nodes.forEach((node, id) => {
      if (node.kind === "bend") {
        bends.push({ id, vertical: node.vertical, horizontal: node.horizontal });
      }
    });
    return bends;
  }

  /**
   * The channel a port lies in, or the channel of the given orientation through a bend.
   */
  public channelOf(id: number, orientation: Orientation): ChannelRef {
    const node = this.nodes[id];
    switch (node.kind) {
      case "port":
        return { index: node.channel, orientation: sideOrientation(node.side) };
      case "bend":
        return { index: orientation === "vertical" ? node.vertical : node.horizontal, orientation };
      case "node":
        throw new Error(`[orthogonal-routing] Routing node ${id} is a box, not a channel element`);
    }
  }

  private addNode(node: RoutingNode): number {
    this.nodes.push(node);
    this.neighbors.push([]);
    return this.nodes.length - 1;
  }

  private link(a: number, b: number): void {
    this.neighbors[a].push(b);
    this.neighbors[b].push(a);
  }
}
