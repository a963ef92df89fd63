import { describe, expect, test } from "vitest";
import {
  approxEquals,
  distance,
  formatPosition,
  lerp,
  pathLength,
  pos,
} from "../../../src/core/world/Position";

describe("Position", () => {
  test("distance is euclidean in three dimensions", () => {
    expect(distance(pos(0, 0, 0), pos(3, 4, 0))).toBe(5);
    expect(distance(pos(1, 2, 3), pos(1, 2, 15))).toBe(12);
  });

  test("lerp interpolates every axis", () => {
    expect(lerp(pos(0, 0, 0), pos(10, 20, 30), 0.5)).toEqual({
      x: 5,
      y: 10,
      z: 15,
    });
  });

  describe("approxEquals", () => {
    test("accepts offsets below the tolerance", () => {
      expect(approxEquals(pos(0, 0, 0), pos(0.009, -0.009, 0.005))).toBe(true);
    });

    test("rejects an offset of exactly the tolerance", () => {
      expect(approxEquals(pos(0, 0, 0), pos(0.01, 0, 0))).toBe(false);
    });
  });

  test("formatPosition uses one decimal", () => {
    expect(formatPosition(pos(1.25, -2, 0))).toBe("(1.3, -2.0, 0.0)");
  });

  test("pathLength sums segment lengths", () => {
    expect(pathLength([pos(0, 0, 0), pos(3, 4, 0), pos(3, 4, 12)])).toBe(17);
    expect(pathLength([pos(5, 5, 5)])).toBe(0);
  });
});
