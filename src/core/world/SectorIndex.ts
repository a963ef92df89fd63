import type { Position } from "./Position";
import { distance } from "./Position";

export interface Sector {
  readonly id: number;
  readonly gridX: number;
  readonly gridY: number;
  readonly centerX: number;
  readonly centerY: number;
  readonly neighbors: readonly number[];
}

export interface SectorGridOptions {
  worldSize: number;
  sectorSize: number;
}

/**
 * SectorIndex - fixed square grid over the world, centred on the origin.
 * Sectors are built once and never change; adjacency is von Neumann
 * (west, east, south, north).
 */
export class SectorIndex {
  readonly sectorsPerAxis: number;
  readonly sectorSize: number;
  readonly worldSize: number;
  private readonly halfWorld: number;
  private readonly sectors: readonly Sector[];

  constructor(options: SectorGridOptions) {
    this.worldSize = options.worldSize;
    this.sectorSize = options.sectorSize;
    this.halfWorld = options.worldSize / 2;
    this.sectorsPerAxis = Math.max(
      1,
      Math.floor(options.worldSize / options.sectorSize),
    );
    this.sectors = this.buildSectors();
  }

  get sectorCount(): number {
    return this.sectors.length;
  }

  sectorId(p: Position): number {
    const gx = this.toGrid(p.x);
    const gy = this.toGrid(p.y);
    return gy * this.sectorsPerAxis + gx;
  }

  sector(id: number): Sector | undefined {
    return this.sectors[id];
  }

  neighbors(id: number): readonly number[] {
    return this.sectors[id]?.neighbors ?? [];
  }

  records(): readonly Sector[] {
    return this.sectors;
  }

  /**
   * Boundary point of `sectorId` to leave through when heading for `to`.
   * Candidates are the projections of `from` onto the four edges; the one
   * closest to `to` wins, earlier candidates on ties.
   */
  nearestExit(sectorId: number, from: Position, to: Position): Position {
    const sector = this.sectors[sectorId];
    if (!sector) return from;

    const half = this.sectorSize / 2;
    const candidates: Position[] = [
      { x: sector.centerX - half, y: from.y, z: from.z }, // west
      { x: sector.centerX + half, y: from.y, z: from.z }, // east
      { x: from.x, y: sector.centerY - half, z: from.z }, // south
      { x: from.x, y: sector.centerY + half, z: from.z }, // north
    ];

    let best = from;
    let bestDist = Infinity;
    for (const candidate of candidates) {
      const d = distance(candidate, to);
      if (d < bestDist) {
        bestDist = d;
        best = candidate;
      }
    }
    return best;
  }

  /** True when the snapshot describes the same grid as this index. */
  matches(records: readonly Sector[]): boolean {
    if (records.length !== this.sectors.length) return false;
    return records.every((r) => {
      const own = this.sectors[r.id];
      return (
        own !== undefined &&
        own.gridX === r.gridX &&
        own.gridY === r.gridY &&
        own.neighbors.length === r.neighbors.length &&
        own.neighbors.every((n, i) => n === r.neighbors[i])
      );
    });
  }

  private toGrid(coord: number): number {
    const cell = Math.floor((coord + this.halfWorld) / this.sectorSize);
    return Math.max(0, Math.min(this.sectorsPerAxis - 1, cell));
  }

  private buildSectors(): Sector[] {
    const n = this.sectorsPerAxis;
    const sectors: Sector[] = [];

    for (let gy = 0; gy < n; gy++) {
      for (let gx = 0; gx < n; gx++) {
        const id = gy * n + gx;
        const neighbors: number[] = [];
        if (gx > 0) neighbors.push(id - 1);
        if (gx < n - 1) neighbors.push(id + 1);
        if (gy > 0) neighbors.push(id - n);
        if (gy < n - 1) neighbors.push(id + n);

        sectors.push(
          Object.freeze({
            id,
            gridX: gx,
            gridY: gy,
            centerX: -this.halfWorld + (gx + 0.5) * this.sectorSize,
            centerY: -this.halfWorld + (gy + 0.5) * this.sectorSize,
            neighbors: Object.freeze(neighbors),
          }),
        );
      }
    }

    // Ids equal array indices, which sector() relies on.
    return sectors;
  }
}
