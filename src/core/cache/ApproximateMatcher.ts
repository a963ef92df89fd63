import type { Position } from "../world/Position";
import { distance } from "../world/Position";
import { CachedPath } from "./CachedPath";
import type { PathKey } from "./PathKey";

export interface ApproximateMatch {
  path: CachedPath;
  startDistance: number;
  endDistance: number;
}

/**
 * Finds the cached path whose endpoints both lie strictly within `radius`
 * of a query's endpoints, preferring the smallest combined offset and, on
 * equal offsets, the lower key.
 */
export class ApproximateMatcher {
  constructor(private readonly radius: number) {}

  nearest(
    paths: Iterable<CachedPath>,
    start: Position,
    end: Position,
  ): ApproximateMatch | null {
    let best: ApproximateMatch | null = null;
    let bestScore = Infinity;

    for (const path of paths) {
      const startDistance = distance(start, path.start);
      if (startDistance >= this.radius) continue;
      const endDistance = distance(end, path.end);
      if (endDistance >= this.radius) continue;

      const score = startDistance + endDistance;
      if (
        score < bestScore ||
        (score === bestScore && best !== null && path.key < best.path.key)
      ) {
        bestScore = score;
        best = { path, startDistance, endDistance };
      }
    }

    return best;
  }

  /**
   * Splices the query endpoints onto the matched route. The two connector
   * segments are not checked for traversability.
   */
  splice(
    match: ApproximateMatch,
    key: PathKey,
    start: Position,
    end: Position,
  ): CachedPath {
    return new CachedPath({
      key,
      name: `Approximate_${match.path.name}`,
      start,
      end,
      waypoints: [start, ...match.path.waypoints, end],
    });
  }
}
