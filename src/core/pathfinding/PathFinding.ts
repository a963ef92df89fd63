import type { PathCacheConfig } from "../configuration/PathCacheConfig";
import type { Logger } from "../Logger";
import type { SectorIndex } from "../world/SectorIndex";
import { LocalAStar } from "./algorithms/LocalAStar";
import type { DirectPathOptions } from "./DirectPath";
import { HierarchicalPathFinder } from "./HierarchicalPathFinder";
import { EndpointTransformer } from "./transformers/EndpointTransformer";
import { ResamplingTransformer } from "./transformers/ResamplingTransformer";
import type { ClearanceCheck } from "./transformers/SimplifyingTransformer";
import {
  SimplifyingTransformer,
  spanClearance,
} from "./transformers/SimplifyingTransformer";
import type { PathFinder } from "./types";

export interface PathFindingOptions {
  logger?: Logger;
  debug?: boolean;
  clearance?: ClearanceCheck;
}

export function directOptions(config: PathCacheConfig): DirectPathOptions {
  return {
    segmentLength: config.directSegmentLength,
    maxSegments: config.maxDirectSegments,
  };
}

/**
 * Factory for the finders used by the cache.
 */
export class PathFinding {
  static Local(config: PathCacheConfig): LocalAStar {
    return new LocalAStar({
      stepSize: config.stepSize,
      goalThreshold: config.goalThreshold,
      searchMargin: config.searchMargin,
      maxIterations: config.maxSearchIterations,
      worldSize: config.worldSize,
      direct: directOptions(config),
    });
  }

  /**
   * Full generation pipeline:
   * sector BFS → assembly → simplification → resampling → endpoint guard
   */
  static Hierarchical(
    config: PathCacheConfig,
    sectors: SectorIndex,
    options: PathFindingOptions = {},
  ): PathFinder {
    const core = new HierarchicalPathFinder(
      sectors,
      PathFinding.Local(config),
      directOptions(config),
      options.logger,
      options.debug,
    );

    const simplified = new SimplifyingTransformer(
      core,
      options.clearance ?? spanClearance(config.clearSpan),
    );
    const resampled = new ResamplingTransformer(simplified, config.maxPathPoints);
    return new EndpointTransformer(resampled);
  }
}
