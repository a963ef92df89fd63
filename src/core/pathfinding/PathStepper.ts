import type { CachedPath } from "../cache/CachedPath";
import type { Position } from "../world/Position";
import { approxEquals } from "../world/Position";
import type { PathResult, SteppingPathFinder } from "./types";
import { PathStatus } from "./types";

/** Anything that answers route queries the way the path store does. */
export interface PathSource {
  getPath(start: Position, end: Position, allowGeneration?: boolean): CachedPath;
}

/**
 * PathStepper - hands out a cached route one waypoint at a time.
 *
 * The route is fetched on the first step and again whenever the
 * destination changes or the caller drifts off the route.
 */
export class PathStepper implements SteppingPathFinder<Position> {
  private path: readonly Position[] | null = null;
  private pathIndex = 0;
  private lastTo: Position | null = null;

  constructor(
    private readonly source: PathSource,
    private readonly allowGeneration = true,
  ) {}

  next(from: Position, to: Position): PathResult<Position> {
    if (approxEquals(from, to)) {
      return { status: PathStatus.COMPLETE, node: to };
    }

    if (this.lastTo === null || !approxEquals(this.lastTo, to)) {
      this.path = null;
      this.lastTo = to;
    }

    // Off the route: fetch again from where the caller actually is
    const expected = this.path?.[this.pathIndex - 1];
    if (this.path === null || (expected && !approxEquals(from, expected))) {
      this.path = this.fetch(from, to);
    }

    if (this.pathIndex >= this.path.length) {
      return { status: PathStatus.COMPLETE, node: to };
    }

    const node = this.path[this.pathIndex];
    this.pathIndex++;
    return { status: PathStatus.NEXT, node };
  }

  invalidate(): void {
    this.path = null;
    this.pathIndex = 0;
    this.lastTo = null;
  }

  private fetch(from: Position, to: Position): readonly Position[] {
    const { waypoints } = this.source.getPath(from, to, this.allowGeneration);
    // Skip the first waypoint when it is where the caller already stands
    this.pathIndex = waypoints.length > 0 && approxEquals(waypoints[0], from) ? 1 : 0;
    return waypoints;
  }
}
