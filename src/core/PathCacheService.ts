import { PathStore } from "./cache/PathStore";
import type {
  PathCacheConfig,
  PathCacheConfigInput,
} from "./configuration/PathCacheConfig";
import { resolveConfig } from "./configuration/PathCacheConfig";
import type { Logger } from "./Logger";
import { consoleLogger } from "./Logger";
import type { LoadedSnapshot } from "./persistence/PathPersistence";
import { PathPersistence } from "./persistence/PathPersistence";
import type { ClearanceCheck } from "./pathfinding/transformers/SimplifyingTransformer";
import { PathFinding } from "./pathfinding/PathFinding";
import { PathStepper } from "./pathfinding/PathStepper";
import type { PathFinder } from "./pathfinding/types";
import { PathBroadcastQueue } from "./sync/PathBroadcastQueue";
import { SectorIndex } from "./world/SectorIndex";

export interface PathCacheServiceOptions {
  config?: PathCacheConfigInput;
  logger?: Logger;
  debug?: boolean;
  clearance?: ClearanceCheck;
  /** Replaces the hierarchical finder, e.g. with a navmesh-backed one. */
  finder?: PathFinder;
  outboundCapacity?: number;
}

/**
 * Owns one path cache: the sector grid, the generation pipeline, the store,
 * its snapshots and the outbound update queue. Nothing touches the disk
 * until `load()` or `save()` is called.
 */
export class PathCacheService {
  readonly config: PathCacheConfig;
  readonly sectors: SectorIndex;
  readonly finder: PathFinder;
  readonly store: PathStore;
  readonly outbound: PathBroadcastQueue;
  readonly persistence: PathPersistence;
  private readonly logger: Logger;

  constructor(options: PathCacheServiceOptions = {}) {
    this.config = resolveConfig(options.config);
    this.logger = options.logger ?? consoleLogger;
    this.sectors = new SectorIndex(this.config);
    this.finder =
      options.finder ??
      PathFinding.Hierarchical(this.config, this.sectors, {
        logger: this.logger,
        debug: options.debug,
        clearance: options.clearance,
      });
    this.outbound = new PathBroadcastQueue(options.outboundCapacity);
    this.store = new PathStore({
      config: this.config,
      finder: this.finder,
      outbound: this.outbound,
      logger: this.logger,
    });
    this.persistence = new PathPersistence(
      this.config.cacheDirectory,
      this.logger,
    );
  }

  /**
   * Replaces the store content with the snapshot on disk. Throws
   * PersistenceError when a JSON snapshot exists but cannot be read.
   */
  async load(): Promise<LoadedSnapshot> {
    const snapshot = await this.persistence.load();
    if (snapshot.sectors.length > 0 && !this.sectors.matches(snapshot.sectors)) {
      this.logger.warn(
        `[pathcache] Snapshot sector grid differs from the configured one (${snapshot.sectors.length} vs ${this.sectors.sectorCount} sectors)`,
      );
    }
    this.store.restore(snapshot.paths);
    return snapshot;
  }

  save(): Promise<boolean> {
    return this.persistence.save(this.store.values(), this.sectors.records());
  }

  stepper(allowGeneration = true): PathStepper {
    return new PathStepper(this.store, allowGeneration);
  }
}
