import { describe, expect, test } from "vitest";
import {
  decodeJsonSnapshot,
  encodeJsonSnapshot,
} from "../../../src/core/persistence/JsonSnapshot";
import { PersistenceError } from "../../../src/core/persistence/PersistenceError";
import { pos } from "../../../src/core/world/Position";
import { SectorIndex } from "../../../src/core/world/SectorIndex";
import { makePath } from "../fixtures";

const sectors = new SectorIndex({ worldSize: 20_000, sectorSize: 10_000 });

describe("JsonSnapshot", () => {
  test("writes keys as decimal strings and dates as ISO-8601", () => {
    const path = makePath(pos(0, 0, 0), pos(3, 4, 0));
    const parsed: unknown = JSON.parse(encodeJsonSnapshot([path], sectors.records()));

    expect(parsed).toMatchObject({
      version: 1,
      paths: [
        {
          key: path.key.toString(),
          name: "test-path",
          distance: 5,
          createdAt: "2024-01-01T00:00:00.000Z",
          useCount: 0,
        },
      ],
      sectors: [
        { id: 0, gridX: 0, gridY: 0, centerX: -5_000, centerY: -5_000, neighbors: [1, 2] },
        { id: 1, gridX: 1, gridY: 0, centerX: 5_000, centerY: -5_000, neighbors: [0, 3] },
        { id: 2, gridX: 0, gridY: 1, centerX: -5_000, centerY: 5_000, neighbors: [3, 0] },
        { id: 3, gridX: 1, gridY: 1, centerX: 5_000, centerY: 5_000, neighbors: [2, 1] },
      ],
    });
  });

  test("reads back what it writes", () => {
    const path = makePath(pos(0, 0, 0), pos(3, 4, 0), [pos(0, 0, 0), pos(1.5, 2, 0), pos(3, 4, 0)]);
    path.recordUse();

    const { paths, sectors: records } = decodeJsonSnapshot(
      encodeJsonSnapshot([path], sectors.records()),
    );

    expect(paths).toHaveLength(1);
    expect(paths[0].key).toBe(path.key);
    expect(paths[0].waypoints).toEqual(path.waypoints);
    expect(paths[0].useCount).toBe(1);
    expect(paths[0].createdAt).toEqual(path.createdAt);
    expect(sectors.matches(records)).toBe(true);
  });

  test("defaults missing lists to empty", () => {
    expect(decodeJsonSnapshot('{"version":1}')).toEqual({ paths: [], sectors: [] });
  });

  test("rejects another version", () => {
    expect(() => decodeJsonSnapshot('{"version":2,"paths":[]}')).toThrow(
      /JSON snapshot failed validation/,
    );
  });

  test("rejects keys that are not unsigned 64-bit integers", () => {
    const text = encodeJsonSnapshot([makePath(pos(0, 0, 0), pos(1, 0, 0))], []).replace(
      /"key": "\d+"/,
      '"key": "-5"',
    );
    expect(() => decodeJsonSnapshot(text)).toThrow(PersistenceError);
  });

  test("rejects text that is not JSON", () => {
    expect(() => decodeJsonSnapshot("not json")).toThrow("JSON snapshot is not valid JSON");
  });
});
