// Unweighted BFS over the sector adjacency graph (hop count, not distance)

import type { SectorIndex } from "../../world/SectorIndex";

export class SectorRouter {
  constructor(private readonly sectors: SectorIndex) {}

  /**
   * Sector ids to traverse after `startId`, ending with `endId`.
   * Empty when both ids are equal or when no route exists.
   */
  route(startId: number, endId: number): number[] {
    if (startId === endId) return [];
    if (!this.sectors.sector(startId) || !this.sectors.sector(endId)) {
      return [];
    }

    const parent = new Map<number, number>();
    const visited = new Set<number>([startId]);
    const queue: number[] = [startId];
    let head = 0;

    while (head < queue.length) {
      const current = queue[head++];

      if (current === endId) {
        return this.buildRoute(parent, endId);
      }

      for (const neighbor of this.sectors.neighbors(current)) {
        if (visited.has(neighbor)) continue;
        visited.add(neighbor);
        parent.set(neighbor, current);
        queue.push(neighbor);
      }
    }

    return [];
  }

  private buildRoute(parent: Map<number, number>, endId: number): number[] {
    const route: number[] = [];
    let node = endId;
    let prev = parent.get(node);

    while (prev !== undefined) {
      route.push(node);
      node = prev;
      prev = parent.get(node);
    }

    route.reverse();
    return route;
  }
}
