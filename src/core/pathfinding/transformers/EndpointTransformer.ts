import type { Position } from "../../world/Position";
import type { PathFinder } from "../types";

/**
 * Guarantees at least two waypoints. A local search that starts inside the
 * goal threshold returns only the start; the destination is appended then.
 */
export class EndpointTransformer implements PathFinder {
  constructor(private readonly inner: PathFinder) {}

  findPath(from: Position, to: Position): Position[] {
    const path = this.inner.findPath(from, to);
    if (path.length === 0) return [from, to];
    if (path.length === 1) return [path[0], to];
    return path;
  }
}
