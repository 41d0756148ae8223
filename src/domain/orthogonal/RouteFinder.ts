import type { Vec2 } from "@/domain/geometry/Vec2";
import { rectCenter, rectIntersection, type Rect } from "@/domain/geometry/Rect";
import { nodePortPosition, pointOnChannel } from "@/domain/orthogonal/channelGeometry";
import {
  oppositeOrientation,
  sameChannel,
  sideOrientation,
  type AbstractRoute,
  type BendDirection,
  type Orientation
} from "@/domain/orthogonal/orthogonalTypes";
import type { RoutingGraph } from "@/domain/orthogonal/RoutingGraph";

export type RouteRequest = {
  from: number;
  to: number;
};

/**
 * Direction of the turn at a bend, seen from the leg arriving in a channel of
 * `orientation` at `from` and leaving towards `to`.
 */
export function bendDirection(from: Vec2, to: Vec2, orientation: Orientation): BendDirection {
  const dx = to.x - from.x;
  const dy = to.y - from.y;
  if (orientation === "horizontal") {
    if (dx >= 0 && dy <= 0) {
      return "up-left";
    }
    if (dx < 0 && dy <= 0) {
      return "up-right";
    }
    return dx >= 0 ? "down-left" : "down-right";
  }
  if (dx >= 0 && dy <= 0) {
    return "down-right";
  }
  if (dx < 0 && dy <= 0) {
    return "down-left";
  }
  return dx >= 0 ? "up-right" : "up-left";
}

/** Representative point of a port or bend on its channel's centre line. */
export function routeElementPoint(graph: RoutingGraph, boxes: readonly Rect[], id: number): Vec2 {
  const node = graph.nodes[id];
  switch (node.kind) {
    case "port": {
      const channel = graph.channel({ index: node.channel, orientation: sideOrientation(node.side) });
      return pointOnChannel(channel, nodePortPosition(boxes[node.nodeId], node.side));
    }
    case "bend":
      return rectCenter(rectIntersection(graph.vertical[node.vertical].rect, graph.horizontal[node.horizontal].rect));
    case "node":
      throw new Error(`[orthogonal-routing] Invalid route element ${id}: expected a port or bend`);
  }
}

/**
 * Drops ports passed on the way and bend points where the route continues straight,
 * leaving one element per change of channel.
 */
export function removeStraightElements(graph: RoutingGraph, route: number[]): number[] {
  if (route.length < 2) {
    return [...route];
  }
  const result = [...route];
  let current = graph.channelOf(result[0], "vertical");
  let index = 1;
  while (index < result.length - 1) {
    const node = graph.nodes[result[index]];
    if (node.kind === "port") {
      result.splice(index, 1);
      continue;
    }
    const here = graph.channelOf(result[index], current.orientation);
    const next = graph.channelOf(result[index + 1], current.orientation);
    if (sameChannel(here, next)) {
      result.splice(index, 1);
      continue;
    }
    current = graph.channelOf(result[index], oppositeOrientation(current.orientation));
    index += 1;
  }
  return result;
}

export function computeBendDirections(graph: RoutingGraph, boxes: readonly Rect[], route: readonly number[]): BendDirection[] {
  const directions: BendDirection[] = [];
  if (route.length <= 2) {
    return directions;
  }
  const first = graph.nodes[route[0]];
  if (first.kind !== "port") {
    throw new Error("[orthogonal-routing] Invalid route: does not start with a port");
  }
  let orientation = sideOrientation(first.side);
  let last = routeElementPoint(graph, boxes, route[0]);
  for (let i = 1; i < route.length - 1 && graph.nodes[route[i]].kind === "bend"; i += 1) {
    const bend = routeElementPoint(graph, boxes, route[i]);
    directions.push(bendDirection(last, routeElementPoint(graph, boxes, route[i + 1]), orientation));
    orientation = oppositeOrientation(orientation);
    last = bend;
  }
  return directions;
}

/**
 * Breadth-first search from box `from` to every box in `targets`. At each element the
 * straight continuation along the current channel is queued before turning.
 */
function routeFromSource(graph: RoutingGraph, boxes: readonly Rect[], from: number, targets: readonly number[]): AbstractRoute[] {
  const visited = new Uint8Array(graph.nodes.length);
  const predecessor = new Int32Array(graph.nodes.length).fill(-1);
  const queue: { id: number; orientation: Orientation }[] = [];
  visited[from] = 1;
  for (const port of graph.neighbors[from]) {
    const node = graph.nodes[port];
    if (node.kind !== "port") {
      throw new Error(`[orthogonal-routing] Box ${from} is linked to a non-port element ${port}`);
    }
    visited[port] = 1;
    predecessor[port] = from;
    queue.push({ id: port, orientation: sideOrientation(node.side) });
  }

  const pending = new Set(targets);
  const routes: AbstractRoute[] = [];
  for (let head = 0; head < queue.length && pending.size > 0; head += 1) {
    const { id, orientation } = queue[head];
    const node = graph.nodes[id];
    if (node.kind === "node") {
      if (!pending.has(node.nodeId)) {
        continue;
      }
      pending.delete(node.nodeId);
      const path: number[] = [];
      for (let step = predecessor[id]; step !== from && step >= 0; step = predecessor[step]) {
        path.push(step);
      }
      path.reverse();
      const route = removeStraightElements(graph, path);
      routes.push({ from, to: node.nodeId, route, bendDirections: computeBendDirections(graph, boxes, route) });
      continue;
    }

    const channel = graph.channelOf(id, orientation);
    let turned = false;
    for (const next of graph.neighbors[id]) {
      if (visited[next]) {
        continue;
      }
      const target = graph.nodes[next];
      if (target.kind !== "node" && !sameChannel(channel, graph.channelOf(next, orientation))) {
        turned = true;
        continue;
      }
      visited[next] = 1;
      predecessor[next] = id;
      queue.push({ id: next, orientation });
    }
    if (turned) {
      const crossing = oppositeOrientation(orientation);
      for (const next of graph.neighbors[id]) {
        if (!visited[next]) {
          visited[next] = 1;
          predecessor[next] = id;
          queue.push({ id: next, orientation: crossing });
        }
      }
    }
  }

  if (pending.size > 0) {
    throw new Error(`[orthogonal-routing] No route from box ${from} to ${[...pending].join(", ")}`);
  }
  return routes;
}

/**
 * Routes every distinct unordered box pair once. Self-loops are skipped; routes run from
 * the lower box index to the higher one and are returned sorted by (from, to).
 */
export function findRoutes(graph: RoutingGraph, boxes: readonly Rect[], requests: readonly RouteRequest[]): AbstractRoute[] {
  const targetsBySource = new Map<number, Set<number>>();
  for (const { from, to } of requests) {
    if (from === to) {
      continue;
    }
    const low = Math.min(from, to);
    const high = Math.max(from, to);
    const targets = targetsBySource.get(low);
    if (targets) {
      targets.add(high);
    } else {
      targetsBySource.set(low, new Set([high]));
    }
  }

  const routes: AbstractRoute[] = [];
  for (const source of [...targetsBySource.keys()].sort((a, b) => a - b)) {
    const targets = [...(targetsBySource.get(source) ?? [])].sort((a, b) => a - b);
    routes.push(...routeFromSource(graph, boxes, source, targets));
  }
  return routes.sort((a, b) => a.from - b.from || a.to - b.to);
}
