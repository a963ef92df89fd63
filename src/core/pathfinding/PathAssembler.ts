import type { Position } from "../world/Position";
import { approxEquals } from "../world/Position";
import type { SectorIndex } from "../world/SectorIndex";
import type { PathFinder } from "./types";

/**
 * PathAssembler - turns a coarse sector route into waypoints.
 *
 * For every routed sector it heads for the edge point closest to the final
 * destination and runs the local finder up to it; a last leg connects the
 * final exit with the destination. Exit choice is greedy, so the result is
 * usable but not guaranteed shortest.
 */
export class PathAssembler {
  constructor(
    private readonly sectors: SectorIndex,
    private readonly local: PathFinder,
  ) {}

  assemble(start: Position, end: Position, route: readonly number[]): Position[] {
    const waypoints: Position[] = [];
    let current = start;

    for (const sectorId of route) {
      const exit = this.sectors.nearestExit(sectorId, current, end);
      this.append(waypoints, this.local.findPath(current, exit));
      current = exit;
    }

    this.append(waypoints, this.local.findPath(current, end));
    return waypoints;
  }

  private append(waypoints: Position[], segment: readonly Position[]): void {
    // Skip the joint when the segment starts where the last one ended
    const last = waypoints[waypoints.length - 1];
    const offset =
      last !== undefined &&
      segment.length > 0 &&
      approxEquals(last, segment[0])
        ? 1
        : 0;
    for (let i = offset; i < segment.length; i++) {
      waypoints.push(segment[i]);
    }
  }
}
