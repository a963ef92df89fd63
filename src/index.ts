export { PathCacheService } from "./core/PathCacheService";
export type { PathCacheServiceOptions } from "./core/PathCacheService";
export type { Logger } from "./core/Logger";
export { consoleLogger, silentLogger } from "./core/Logger";

export {
  ConfigError,
  configFromEnv,
  resolveConfig,
} from "./core/configuration/PathCacheConfig";
export type {
  ConflictPolicy,
  PathCacheConfig,
  PathCacheConfigInput,
} from "./core/configuration/PathCacheConfig";

export type { Position } from "./core/world/Position";
export {
  approxEquals,
  distance,
  formatPosition,
  pathLength,
  pos,
  POSITION_EPSILON,
} from "./core/world/Position";
export { SectorIndex } from "./core/world/SectorIndex";
export type { Sector } from "./core/world/SectorIndex";

export { CachedPath, defaultPathName, pathDigest } from "./core/cache/CachedPath";
export type { PathKey } from "./core/cache/PathKey";
export { formatPathKey, parsePathKey, pathKey } from "./core/cache/PathKey";
export { PathStore } from "./core/cache/PathStore";
export type {
  CacheStatistics,
  NamedLocation,
  PreBakeOptions,
  PreBakeResult,
} from "./core/cache/PathStore";

export { PathFinding } from "./core/pathfinding/PathFinding";
export { PathStepper } from "./core/pathfinding/PathStepper";
export type { PathSource } from "./core/pathfinding/PathStepper";
export { PathStatus } from "./core/pathfinding/types";
export type { PathFinder, PathResult } from "./core/pathfinding/types";
export { spanClearance } from "./core/pathfinding/transformers/SimplifyingTransformer";
export type { ClearanceCheck } from "./core/pathfinding/transformers/SimplifyingTransformer";

export { PathPersistence } from "./core/persistence/PathPersistence";
export type { LoadedSnapshot } from "./core/persistence/PathPersistence";
export {
  PersistenceError,
  SnapshotVersionError,
} from "./core/persistence/PersistenceError";

export { PathBroadcastQueue } from "./core/sync/PathBroadcastQueue";
export type { PathUpdateMessage } from "./core/sync/PathBroadcastQueue";
export {
  computeKeyChecksum,
  decodeRemotePaths,
  mergeRemotePaths,
  needsSync,
} from "./core/sync/PathSync";
export type { SyncReport } from "./core/sync/PathSync";
