/**
 * Directed "drawn before" relation between routes. Edges that would close a cycle are
 * refused, so the relation stays acyclic as long as it is only grown through
 * `addRouteOrder`.
 */
export class RouteOrderResolver {
  private readonly successors: number[][];
  private cycles = 0;

  public constructor(routeCount: number) {
    this.successors = Array.from({ length: routeCount }, () => []);
  }

  /** Wraps an existing adjacency list without checking it for cycles. */
  public static fromOrderGraph(successors: number[][]): RouteOrderResolver {
    const resolver = new RouteOrderResolver(successors.length);
    successors.forEach((targets, route) => {
      resolver.successors[route].push(...targets);
    });
    return resolver;
  }

  public get routeCount(): number {
    return this.successors.length;
  }

  /** Number of orderings refused because they would have closed a cycle. */
  public get detectedCycles(): number {
    return this.cycles;
  }

  public successorsOf(route: number): readonly number[] {
    this.assertRoute(route);
    return this.successors[route];
  }

  /** Records that `first` comes before `second`; returns false if the reverse already holds. */
  public addRouteOrder(first: number, second: number): boolean {
    this.assertRoute(first);
    this.assertRoute(second);
    if (this.hasPath(second, first)) {
      this.cycles += 1;
      return false;
    }
    this.successors[first].push(second);
    return true;
  }

  /** Kahn's algorithm; earlier routes come first. Throws if the relation has a cycle. */
  public topologicalSort(): number[] {
    const inDegree = new Array<number>(this.successors.length).fill(0);
    for (const targets of this.successors) {
      for (const target of targets) {
        inDegree[target] += 1;
      }
    }
    const ready: number[] = [];
    inDegree.forEach((degree, route) => {
      if (degree === 0) {
        ready.push(route);
      }
    });

    const sorted: number[] = [];
    for (let route = ready.pop(); route !== undefined; route = ready.pop()) {
      sorted.push(route);
      for (const target of this.successors[route]) {
        inDegree[target] -= 1;
        if (inDegree[target] === 0) {
          ready.push(target);
        }
      }
    }
    if (sorted.length !== this.successors.length) {
      throw new Error(
        `[orthogonal-routing] Cycle in route order graph: ${this.successors.length - sorted.length} routes left unsorted`
      );
    }
    return sorted;
  }

  private hasPath(start: number, end: number): boolean {
    if (start === end) {
      return true;
    }
    const visited = new Uint8Array(this.successors.length);
    const queue = [start];
    visited[start] = 1;
    for (let head = 0; head < queue.length; head += 1) {
      for (const next of this.successors[queue[head]]) {
        if (next === end) {
          return true;
        }
        if (!visited[next]) {
          visited[next] = 1;
          queue.push(next);
        }
      }
    }
    return false;
  }

  private assertRoute(route: number): void {
    if (!Number.isInteger(route) || route < 0 || route >= this.successors.length) {
      throw new RangeError(`[orthogonal-routing] Route index ${route} outside [0, ${this.successors.length})`);
    }
  }
}
