import { describe, expect, test } from "vitest";
import { ApproximateMatcher } from "../../../src/core/cache/ApproximateMatcher";
import { CachedPath } from "../../../src/core/cache/CachedPath";
import type { Position } from "../../../src/core/world/Position";
import { pos } from "../../../src/core/world/Position";

function stored(key: bigint, start: Position, end: Position): CachedPath {
  return new CachedPath({
    key,
    name: `stored-${key}`,
    start,
    end,
    waypoints: [start, end],
  });
}

describe("ApproximateMatcher", () => {
  const matcher = new ApproximateMatcher(1_000);

  test("picks the path with the smallest combined offset", () => {
    const far = stored(1n, pos(0, 0, 0), pos(10_000, 0, 0));
    const near = stored(2n, pos(300, 0, 0), pos(10_300, 0, 0));

    const match = matcher.nearest([far, near], pos(200, 0, 0), pos(10_200, 0, 0));
    expect(match?.path).toBe(near);
    expect(match?.startDistance).toBe(100);
    expect(match?.endDistance).toBe(100);
  });

  test("requires both endpoints strictly inside the radius", () => {
    const path = stored(1n, pos(0, 0, 0), pos(10_000, 0, 0));
    expect(matcher.nearest([path], pos(1_000, 0, 0), pos(10_000, 0, 0))).toBeNull();
    expect(matcher.nearest([path], pos(0, 0, 0), pos(10_000, 5_000, 0))).toBeNull();
    expect(matcher.nearest([path], pos(999, 0, 0), pos(10_000, 0, 0))).not.toBeNull();
  });

  test("breaks ties on the lower key", () => {
    const high = stored(9n, pos(100, 0, 0), pos(10_000, 0, 0));
    const low = stored(3n, pos(-100, 0, 0), pos(10_000, 0, 0));

    expect(matcher.nearest([high, low], pos(0, 0, 0), pos(10_000, 0, 0))?.path).toBe(low);
    expect(matcher.nearest([low, high], pos(0, 0, 0), pos(10_000, 0, 0))?.path).toBe(low);
  });

  test("splices the query endpoints onto the match", () => {
    const path = stored(1n, pos(0, 0, 0), pos(10_000, 0, 0));
    const start = pos(200, 0, 0);
    const end = pos(10_200, 0, 0);
    const match = matcher.nearest([path], start, end);
    expect(match).not.toBeNull();
    if (!match) return;

    const spliced = matcher.splice(match, 77n, start, end);
    expect(spliced.key).toBe(77n);
    expect(spliced.name).toBe("Approximate_stored-1");
    expect(spliced.waypoints).toEqual([start, pos(0, 0, 0), pos(10_000, 0, 0), end]);
  });
});
