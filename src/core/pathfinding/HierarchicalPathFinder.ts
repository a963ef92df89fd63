import type { Logger } from "../Logger";
import { silentLogger } from "../Logger";
import type { Position } from "../world/Position";
import { formatPosition } from "../world/Position";
import type { SectorIndex } from "../world/SectorIndex";
import { SectorRouter } from "./algorithms/SectorRouter";
import type { DirectPathOptions } from "./DirectPath";
import { directPath } from "./DirectPath";
import { PathAssembler } from "./PathAssembler";
import type { PathFinder } from "./types";

export interface HierarchicalDebugInfo {
  startSector: number;
  endSector: number;
  sectorRoute: number[];
  rawWaypoints: number;
  timings: { [key: string]: number };
}

/**
 * Two-level search: a BFS over sectors picks the corridor, the local finder
 * fills in each leg. Same-sector queries go straight to the local finder.
 */
export class HierarchicalPathFinder implements PathFinder {
  private readonly router: SectorRouter;
  private readonly assembler: PathAssembler;

  public debugInfo: HierarchicalDebugInfo | null = null;

  constructor(
    private readonly sectors: SectorIndex,
    private readonly local: PathFinder,
    private readonly direct: DirectPathOptions,
    private readonly logger: Logger = silentLogger,
    private readonly debug = false,
  ) {
    this.router = new SectorRouter(sectors);
    this.assembler = new PathAssembler(sectors, local);
  }

  findPath(from: Position, to: Position): Position[] {
    const startSector = this.sectors.sectorId(from);
    const endSector = this.sectors.sectorId(to);

    if (this.debug) {
      this.debugInfo = {
        startSector,
        endSector,
        sectorRoute: [],
        rawWaypoints: 0,
        timings: {},
      };
    }

    if (startSector === endSector) {
      const path = this.local.findPath(from, to);
      if (this.debugInfo) this.debugInfo.rawWaypoints = path.length;
      return path;
    }

    let t0 = performance.now();
    const route = this.router.route(startSector, endSector);
    if (this.debugInfo) {
      this.debugInfo.timings.sectorRoute = performance.now() - t0;
      this.debugInfo.sectorRoute = route;
    }

    if (route.length === 0) {
      this.logger.warn(
        `[pathfinding] no sector route ${startSector} -> ${endSector}, using direct path`,
      );
      return directPath(from, to, this.direct);
    }

    if (this.debug) {
      this.logger.log(
        `  [DEBUG] Sector route ${formatPosition(from)} -> ${formatPosition(to)}: ${route.length} sectors`,
      );
    }

    t0 = performance.now();
    const path = this.assembler.assemble(from, to, route);
    if (this.debugInfo) {
      this.debugInfo.timings.assemble = performance.now() - t0;
      this.debugInfo.rawWaypoints = path.length;
      this.logger.log(`  [DEBUG] Assembled path: ${path.length} waypoints`);
    }

    return path;
  }
}
