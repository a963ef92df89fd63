import type { Position } from "../world/Position";
import { distance, lerp } from "../world/Position";

export interface DirectPathOptions {
  segmentLength: number;
  maxSegments: number;
}

/**
 * Straight line from `start` to `end`, split into evenly spaced waypoints:
 * one segment per `segmentLength` units, capped at `maxSegments`. Always
 * yields at least the two endpoints.
 */
export function directPath(
  start: Position,
  end: Position,
  options: DirectPathOptions,
): Position[] {
  const d = distance(start, end);
  const segments = Math.min(
    Math.floor(d / options.segmentLength) + 1,
    options.maxSegments,
  );

  const points: Position[] = [start];
  for (let i = 1; i < segments; i++) {
    points.push(lerp(start, end, i / segments));
  }
  points.push(end);
  return points;
}
