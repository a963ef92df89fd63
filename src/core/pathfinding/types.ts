import type { Position } from "../world/Position";

/**
 * Produces a route between two positions. Implementations never fail: when
 * nothing better is available they return a straight interpolated route.
 */
export interface PathFinder<T = Position> {
  findPath(from: T, to: T): T[];
}

export enum PathStatus {
  NEXT,
  COMPLETE,
}

export type PathResult<T> =
  | { status: PathStatus.NEXT; node: T }
  | { status: PathStatus.COMPLETE; node: T };

export interface SteppingPathFinder<T> {
  next(from: T, to: T): PathResult<T>;
  invalidate(): void;
}
