import type { Position } from "../../world/Position";
import { distance } from "../../world/Position";
import type { PathFinder } from "../types";

/** Decides whether a straight segment can replace the waypoints between a and b. */
export type ClearanceCheck = (a: Position, b: Position) => boolean;

/**
 * Clearance by span only: there is no terrain to ray-cast against, so any
 * segment up to `maxSpan` units long counts as clear.
 */
export function spanClearance(maxSpan: number): ClearanceCheck {
  return (a, b) => distance(a, b) <= maxSpan;
}

/**
 * Drops a middle waypoint when the segment from the last kept waypoint to the
 * following one is clear. Endpoints are always kept.
 */
export function simplifyPath(
  path: readonly Position[],
  isClear: ClearanceCheck,
): Position[] {
  if (path.length <= 2) return [...path];

  const simplified: Position[] = [path[0]];
  for (let i = 1; i < path.length - 1; i++) {
    const prev = simplified[simplified.length - 1];
    if (!isClear(prev, path[i + 1])) {
      simplified.push(path[i]);
    }
  }
  simplified.push(path[path.length - 1]);
  return simplified;
}

export class SimplifyingTransformer implements PathFinder {
  constructor(
    private readonly inner: PathFinder,
    private readonly isClear: ClearanceCheck,
  ) {}

  findPath(from: Position, to: Position): Position[] {
    return simplifyPath(this.inner.findPath(from, to), this.isClear);
  }
}
