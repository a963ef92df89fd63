import type { Position } from "../../world/Position";
import { lerp } from "../../world/Position";
import type { PathFinder } from "../types";

/**
 * Reduces a route to exactly `targetCount` waypoints by interpolating along
 * the waypoint index. Routes already within budget pass through untouched.
 */
export function resamplePath(
  points: readonly Position[],
  targetCount: number,
): Position[] {
  if (points.length <= targetCount) return [...points];

  const resampled: Position[] = [];
  const step = (points.length - 1) / (targetCount - 1);

  for (let i = 0; i < targetCount; i++) {
    const index = i * step;
    const low = Math.floor(index);
    const high = Math.min(low + 1, points.length - 1);
    resampled.push(lerp(points[low], points[high], index - low));
  }

  // Pin the endpoints; interpolation can drift by an ulp.
  resampled[0] = points[0];
  resampled[targetCount - 1] = points[points.length - 1];
  return resampled;
}

export class ResamplingTransformer implements PathFinder {
  constructor(
    private readonly inner: PathFinder,
    private readonly maxPoints: number,
  ) {}

  findPath(from: Position, to: Position): Position[] {
    return resamplePath(this.inner.findPath(from, to), this.maxPoints);
  }
}
