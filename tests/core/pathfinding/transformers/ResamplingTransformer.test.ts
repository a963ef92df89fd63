import { describe, expect, test } from "vitest";
import {
  ResamplingTransformer,
  resamplePath,
} from "../../../../src/core/pathfinding/transformers/ResamplingTransformer";
import { pos } from "../../../../src/core/world/Position";

describe("ResamplingTransformer", () => {
  test("interpolates along the waypoint index", () => {
    const path = [pos(0, 0, 0), pos(100, 0, 0), pos(200, 0, 0), pos(300, 0, 0)];
    expect(resamplePath(path, 3)).toEqual([pos(0, 0, 0), pos(150, 0, 0), pos(300, 0, 0)]);
  });

  test("passes routes within budget through", () => {
    const path = [pos(0, 0, 0), pos(100, 0, 0)];
    expect(resamplePath(path, 256)).toEqual(path);
  });

  test("caps long routes and keeps the exact endpoints", () => {
    const first = pos(0.123, 0.456, 7);
    const last = pos(999.9, 1_000.1, 7);
    const path = [first];
    for (let i = 1; i < 999; i++) path.push(pos(i, i, 7));
    path.push(last);

    const finder = new ResamplingTransformer({ findPath: () => path }, 256);
    const resampled = finder.findPath(first, last);

    expect(resampled).toHaveLength(256);
    expect(resampled[0]).toBe(first);
    expect(resampled[255]).toBe(last);
  });
});
