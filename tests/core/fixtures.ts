import type { Mock } from "vitest";
import { vi } from "vitest";
import { CachedPath } from "../../src/core/cache/CachedPath";
import { pathKey } from "../../src/core/cache/PathKey";
import type { PathCacheConfigInput } from "../../src/core/configuration/PathCacheConfig";
import { resolveConfig } from "../../src/core/configuration/PathCacheConfig";
import type { Logger } from "../../src/core/Logger";
import type { Position } from "../../src/core/world/Position";

/** A 4x4 sector grid, small enough to reason about by hand. */
export function smallWorld(overrides: PathCacheConfigInput = {}) {
  return resolveConfig({ worldSize: 40_000, sectorSize: 10_000, ...overrides });
}

export type MockLogger = Logger & { log: Mock; warn: Mock; error: Mock };

export function mockLogger(): MockLogger {
  return { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export function makePath(
  start: Position,
  end: Position,
  waypoints: readonly Position[] = [start, end],
  name = "test-path",
): CachedPath {
  return new CachedPath({
    key: pathKey(start, end),
    name,
    start,
    end,
    waypoints,
    createdAt: new Date("2024-01-01T00:00:00.000Z"),
  });
}
