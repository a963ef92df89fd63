import { setImmediate as yieldToEventLoop } from "timers/promises";
import type { PathCacheConfig } from "../configuration/PathCacheConfig";
import type { Logger } from "../Logger";
import { consoleLogger } from "../Logger";
import { directPath } from "../pathfinding/DirectPath";
import { directOptions } from "../pathfinding/PathFinding";
import type { PathFinder } from "../pathfinding/types";
import type { PathBroadcastQueue } from "../sync/PathBroadcastQueue";
import type { PathSet, SyncReport } from "../sync/PathSync";
import {
  computeKeyChecksum,
  mergeRemotePaths,
  validateDigests,
} from "../sync/PathSync";
import type { Position } from "../world/Position";
import { formatPosition } from "../world/Position";
import { ApproximateMatcher } from "./ApproximateMatcher";
import { CachedPath, defaultPathName } from "./CachedPath";
import { HotCache } from "./HotCache";
import type { PathKey } from "./PathKey";
import { pathKey } from "./PathKey";

export interface NamedLocation {
  name: string;
  position: Position;
}

export interface PreBakeOptions {
  signal?: AbortSignal;
}

export interface PreBakeResult {
  generated: number;
  skipped: number;
  cancelled: boolean;
}

export type LookupOutcome =
  | "hot"
  | "store"
  | "approximate"
  | "generated"
  | "direct";

export interface CacheStatistics {
  totalPaths: number;
  hotPaths: number;
  /** Estimated footprint of the stored paths in bytes. */
  approximateSize: number;
  oldest: Date | null;
  newest: Date | null;
  lookups: Record<LookupOutcome, number>;
}

export interface PathStoreOptions {
  config: PathCacheConfig;
  finder: PathFinder;
  outbound?: PathBroadcastQueue;
  logger?: Logger;
}

const PATH_OVERHEAD_BYTES = 100;
const BYTES_PER_WAYPOINT = 12;
const PREBAKE_PROGRESS_INTERVAL = 10;

/**
 * PathStore - authoritative map of cached paths, fronted by an LRU hot
 * cache. Lookups never throw; a failed generation degrades to a direct
 * interpolated path.
 */
export class PathStore implements PathSet {
  private readonly paths = new Map<PathKey, CachedPath>();
  private readonly hot: HotCache<PathKey, CachedPath>;
  private readonly matcher: ApproximateMatcher;
  private readonly config: PathCacheConfig;
  private readonly finder: PathFinder;
  private readonly outbound: PathBroadcastQueue | undefined;
  private readonly logger: Logger;
  private readonly lookups: Record<LookupOutcome, number> = {
    hot: 0,
    store: 0,
    approximate: 0,
    generated: 0,
    direct: 0,
  };

  constructor(options: PathStoreOptions) {
    this.config = options.config;
    this.finder = options.finder;
    this.outbound = options.outbound;
    this.logger = options.logger ?? consoleLogger;
    this.hot = new HotCache(options.config.hotCacheCapacity);
    this.matcher = new ApproximateMatcher(options.config.approximateRadius);
  }

  get size(): number {
    return this.paths.size;
  }

  key(start: Position, end: Position): PathKey {
    return pathKey(start, end, this.config.keyResolution);
  }

  /**
   * Resolves a route, in order: hot cache, store, approximate match,
   * generation (when allowed), direct fallback. Only the first two count
   * as uses of the returned path.
   */
  getPath(start: Position, end: Position, allowGeneration = true): CachedPath {
    const key = this.key(start, end);

    const hot = this.hot.get(key);
    if (hot) {
      hot.recordUse();
      this.lookups.hot++;
      return hot;
    }

    const stored = this.paths.get(key);
    if (stored) {
      stored.recordUse();
      this.hot.set(key, stored);
      this.lookups.store++;
      return stored;
    }

    const match = this.matcher.nearest(this.paths.values(), start, end);
    if (match) {
      this.lookups.approximate++;
      return this.matcher.splice(match, key, start, end);
    }

    if (allowGeneration) {
      const generated = this.generate(key, start, end, defaultPathName(start, end));
      if (generated) {
        this.insert(generated);
        this.outbound?.publish(generated);
        this.lookups.generated++;
        return generated;
      }
    }

    this.lookups.direct++;
    return new CachedPath({
      key,
      name: `Direct_${formatPosition(start)}_${formatPosition(end)}`,
      start,
      end,
      waypoints: directPath(start, end, directOptions(this.config)),
    });
  }

  /** Exact lookup with no side effects. */
  get(key: PathKey): CachedPath | undefined {
    return this.paths.get(key);
  }

  has(key: PathKey): boolean {
    return this.paths.has(key);
  }

  keys(): PathKey[] {
    return [...this.paths.keys()];
  }

  values(): CachedPath[] {
    return [...this.paths.values()];
  }

  insert(path: CachedPath): void {
    this.paths.set(path.key, path);
    this.hot.set(path.key, path);
  }

  /** Replaces the store content with a loaded snapshot. */
  restore(paths: Iterable<CachedPath>): void {
    this.paths.clear();
    this.hot.clear();
    for (const path of paths) {
      this.insert(path);
    }
  }

  /**
   * Generates routes for every ordered pair of distinct locations. Yields
   * to the event loop between pairs so live lookups keep being served.
   */
  async preBake(
    locations: readonly NamedLocation[],
    options: PreBakeOptions = {},
  ): Promise<PreBakeResult> {
    const unique = new Map<string, NamedLocation>();
    for (const location of locations) {
      if (!unique.has(location.name)) unique.set(location.name, location);
    }
    const points = [...unique.values()];
    const total = points.length * (points.length - 1);
    const result: PreBakeResult = { generated: 0, skipped: 0, cancelled: false };

    this.logger.log(`[pathcache] Pre-baking ${total} paths`);

    for (const from of points) {
      for (const to of points) {
        if (from === to) continue;

        if (options.signal?.aborted) {
          result.cancelled = true;
          this.logger.warn(
            `[pathcache] Pre-bake cancelled after ${result.generated} paths`,
          );
          return result;
        }

        const key = this.key(from.position, to.position);
        if (this.paths.has(key)) {
          result.skipped++;
        } else {
          const path = this.generate(
            key,
            from.position,
            to.position,
            `${from.name}_to_${to.name}`,
          );
          if (path) {
            this.insert(path);
            this.outbound?.publish(path);
            result.generated++;
          } else {
            result.skipped++;
          }
        }

        const done = result.generated + result.skipped;
        if (done % PREBAKE_PROGRESS_INTERVAL === 0) {
          this.logger.log(`[pathcache] Pre-baked ${done}/${total}`);
        }

        await yieldToEventLoop();
      }
    }

    this.logger.log(
      `[pathcache] Pre-bake finished: ${result.generated} generated, ${result.skipped} skipped`,
    );
    return result;
  }

  generateChecksum(): string {
    return computeKeyChecksum(this.paths.keys());
  }

  synchronize(
    remote: Iterable<CachedPath>,
    policy = this.config.conflictPolicy,
  ): SyncReport {
    const report = mergeRemotePaths(this, remote, policy);
    if (report.conflicts.length > 0) {
      this.logger.warn(
        `[pathcache] ${report.conflicts.length} conflicting paths (${policy}), ${report.replaced.length} replaced`,
      );
    }
    if (report.added.length > 0) {
      this.logger.log(`[pathcache] Synchronized ${report.added.length} paths`);
    }
    return report;
  }

  validate(remoteDigests: ReadonlyMap<PathKey, string>): PathKey[] {
    return validateDigests(this, remoteDigests);
  }

  statistics(): CacheStatistics {
    let approximateSize = 0;
    let oldest: Date | null = null;
    let newest: Date | null = null;

    for (const path of this.paths.values()) {
      approximateSize +=
        PATH_OVERHEAD_BYTES + path.waypoints.length * BYTES_PER_WAYPOINT;
      if (oldest === null || path.createdAt < oldest) oldest = path.createdAt;
      if (newest === null || path.createdAt > newest) newest = path.createdAt;
    }

    return {
      totalPaths: this.paths.size,
      hotPaths: this.hot.size,
      approximateSize,
      oldest,
      newest,
      lookups: { ...this.lookups },
    };
  }

  private generate(
    key: PathKey,
    start: Position,
    end: Position,
    name: string,
  ): CachedPath | null {
    try {
      const waypoints = this.finder.findPath(start, end);
      if (waypoints.length < 2) {
        this.logger.warn(
          `[pathcache] Finder returned ${waypoints.length} waypoints for ${name}`,
        );
        return null;
      }
      return new CachedPath({ key, name, start, end, waypoints });
    } catch (error) {
      this.logger.error(
        `[pathcache] Generation failed ${formatPosition(start)} -> ${formatPosition(end)}:`,
        error,
      );
      return null;
    }
  }
}
