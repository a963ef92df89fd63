import { createHash } from "crypto";
import type { Position } from "../world/Position";
import { formatPosition, pathLength, pos } from "../world/Position";
import type { PathKey } from "./PathKey";

export interface CachedPathInit {
  key: PathKey;
  name: string;
  start: Position;
  end: Position;
  waypoints: readonly Position[];
  createdAt?: Date;
  useCount?: number;
}

/** Rounds to float32, the precision keys and snapshots work in. */
function quantize(p: Position): Position {
  return pos(Math.fround(p.x), Math.fround(p.y), Math.fround(p.z));
}

/**
 * A reusable route. Waypoints are in route order and never change after
 * construction; `distance` is derived from them. `useCount` only grows.
 * Endpoints and waypoints are held at float32 precision.
 */
export class CachedPath {
  readonly key: PathKey;
  readonly name: string;
  readonly start: Position;
  readonly end: Position;
  readonly waypoints: readonly Position[];
  readonly distance: number;
  readonly createdAt: Date;
  private uses: number;

  constructor(init: CachedPathInit) {
    if (init.waypoints.length === 0) {
      throw new Error(`CachedPath ${init.name} has no waypoints`);
    }
    this.key = init.key;
    this.name = init.name;
    this.start = quantize(init.start);
    this.end = quantize(init.end);
    this.waypoints = Object.freeze(init.waypoints.map(quantize));
    this.distance = pathLength(this.waypoints);
    this.createdAt = init.createdAt ?? new Date();
    this.uses = Math.max(0, init.useCount ?? 0);
  }

  get useCount(): number {
    return this.uses;
  }

  recordUse(): void {
    this.uses++;
  }
}

export function defaultPathName(start: Position, end: Position): string {
  return `Path_${formatPosition(start)}_${formatPosition(end)}`;
}

/**
 * Content digest of a route: SHA-256 (base64) over the waypoints at two
 * decimals. Coordinates are rounded to float32 first, the precision the
 * binary snapshot keeps, so a reloaded path digests the same.
 */
export function pathDigest(path: Pick<CachedPath, "waypoints">): string {
  const hash = createHash("sha256");
  for (const p of path.waypoints) {
    hash.update(
      `${Math.fround(p.x).toFixed(2)},${Math.fround(p.y).toFixed(2)},${Math.fround(p.z).toFixed(2)};`,
    );
  }
  return hash.digest("base64");
}
