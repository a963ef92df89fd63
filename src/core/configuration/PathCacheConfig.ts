import { z } from "zod";

const PositiveNumber = z.number().positive();
const PositiveInt = z.number().int().positive();

export const ConflictPolicySchema = z.enum(["keep-local", "lowest-digest"]);
export type ConflictPolicy = z.infer<typeof ConflictPolicySchema>;

export const PathCacheConfigSchema = z
  .object({
    // World geometry
    worldSize: PositiveNumber.default(870_000),
    sectorSize: PositiveNumber.default(10_000),

    // Local search
    stepSize: PositiveNumber.default(500),
    goalThreshold: PositiveNumber.default(100),
    searchMargin: z.number().min(0).default(2_000),
    maxSearchIterations: PositiveInt.default(20_000),

    // Direct (interpolated) fallback
    directSegmentLength: PositiveNumber.default(1_000),
    maxDirectSegments: PositiveInt.default(10),

    // Post-processing
    clearSpan: z.number().min(0).default(5_000),
    maxPathPoints: z.number().int().min(2).default(256),

    // Cache
    approximateRadius: z.number().min(0).default(1_000),
    hotCacheCapacity: PositiveInt.default(1_000),
    keyResolution: z.number().min(0).default(0),

    // Persistence & sync
    cacheDirectory: z.string().min(1).default("pathcache"),
    conflictPolicy: ConflictPolicySchema.default("keep-local"),
  })
  .refine((c) => c.sectorSize <= c.worldSize, {
    message: "sectorSize must not exceed worldSize",
    path: ["sectorSize"],
  });

export type PathCacheConfig = z.output<typeof PathCacheConfigSchema>;
export type PathCacheConfigInput = z.input<typeof PathCacheConfigSchema>;

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly issues: z.ZodError["issues"],
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export function resolveConfig(
  overrides: PathCacheConfigInput = {},
): PathCacheConfig {
  const result = PathCacheConfigSchema.safeParse(overrides);
  if (!result.success) {
    throw new ConfigError(
      `Invalid path cache configuration:\n${z.prettifyError(result.error)}`,
      result.error.issues,
    );
  }
  return result.data;
}

const ENV_NUMBER_KEYS = {
  PATHCACHE_WORLD_SIZE: "worldSize",
  PATHCACHE_SECTOR_SIZE: "sectorSize",
  PATHCACHE_STEP_SIZE: "stepSize",
  PATHCACHE_GOAL_THRESHOLD: "goalThreshold",
  PATHCACHE_SEARCH_MARGIN: "searchMargin",
  PATHCACHE_MAX_SEARCH_ITERATIONS: "maxSearchIterations",
  PATHCACHE_CLEAR_SPAN: "clearSpan",
  PATHCACHE_MAX_PATH_POINTS: "maxPathPoints",
  PATHCACHE_APPROXIMATE_RADIUS: "approximateRadius",
  PATHCACHE_HOT_CACHE_CAPACITY: "hotCacheCapacity",
  PATHCACHE_KEY_RESOLUTION: "keyResolution",
} as const satisfies Record<string, keyof PathCacheConfigInput>;

/**
 * Reads PATHCACHE_* variables on top of `base`. Numeric values that do not
 * parse are passed through as NaN so validation reports them.
 */
export function configFromEnv(
  env: Readonly<Record<string, string | undefined>>,
  base: PathCacheConfigInput = {},
): PathCacheConfig {
  const overrides: PathCacheConfigInput = { ...base };

  for (const [name, key] of Object.entries(ENV_NUMBER_KEYS)) {
    const raw = env[name];
    if (raw !== undefined && raw.trim() !== "") {
      overrides[key] = Number(raw);
    }
  }

  const dir = env.PATHCACHE_DIR;
  if (dir !== undefined && dir !== "") {
    overrides.cacheDirectory = dir;
  }

  const policy = env.PATHCACHE_CONFLICT_POLICY;
  if (policy !== undefined && policy !== "") {
    const parsed = ConflictPolicySchema.safeParse(policy);
    if (!parsed.success) {
      throw new ConfigError(
        `Invalid PATHCACHE_CONFLICT_POLICY: ${policy}`,
        parsed.error.issues,
      );
    }
    overrides.conflictPolicy = parsed.data;
  }

  return resolveConfig(overrides);
}
