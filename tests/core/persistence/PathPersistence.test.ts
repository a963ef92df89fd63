import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { BinaryWriter } from "../../../src/core/persistence/BinaryCodec";
import { PathPersistence } from "../../../src/core/persistence/PathPersistence";
import { PersistenceError } from "../../../src/core/persistence/PersistenceError";
import { pos } from "../../../src/core/world/Position";
import { SectorIndex } from "../../../src/core/world/SectorIndex";
import { makePath, mockLogger } from "../fixtures";

const sectors = new SectorIndex({ worldSize: 20_000, sectorSize: 10_000 });
const paths = [
  makePath(pos(0, 0, 0), pos(3, 4, 0), [pos(0, 0, 0), pos(1, 2, 0), pos(3, 4, 0)], "a"),
  makePath(pos(-500, 250, 10), pos(700, -100, 10), undefined, "b"),
];

describe("PathPersistence", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "pathcache-test-"));
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  test("an empty directory is an empty snapshot", async () => {
    const persistence = new PathPersistence(dir, mockLogger());
    expect(await persistence.load()).toEqual({ source: "empty", paths: [], sectors: [] });
  });

  test("a directory that does not exist is an empty snapshot", async () => {
    const persistence = new PathPersistence(path.join(dir, "missing"), mockLogger());
    expect((await persistence.load()).source).toBe("empty");
  });

  test("saves both files and loads the binary one first", async () => {
    const logger = mockLogger();
    const persistence = new PathPersistence(path.join(dir, "cache"), logger);

    expect(await persistence.save(paths, sectors.records())).toBe(true);
    expect(fs.existsSync(persistence.binaryPath)).toBe(true);
    expect(fs.existsSync(persistence.jsonPath)).toBe(true);

    const loaded = await persistence.load();
    expect(loaded.source).toBe("binary");
    expect(loaded.paths.map((p) => p.key)).toEqual(paths.map((p) => p.key));
    expect(loaded.paths.map((p) => p.waypoints)).toEqual(paths.map((p) => p.waypoints));
    expect(loaded.paths.map((p) => p.name)).toEqual(["a", "b"]);
  });

  test("falls back to JSON when the binary file is corrupt", async () => {
    const logger = mockLogger();
    const persistence = new PathPersistence(dir, logger);
    await persistence.save(paths, sectors.records());
    await fs.promises.writeFile(persistence.binaryPath, new Uint8Array([1, 0, 0, 0, 9]));

    const loaded = await persistence.load();

    expect(loaded.source).toBe("json");
    expect(loaded.paths.map((p) => p.key)).toEqual(paths.map((p) => p.key));
    expect(loaded.paths[0].createdAt).toEqual(paths[0].createdAt);
    expect(sectors.matches(loaded.sectors)).toBe(true);
    expect(logger.warn).toHaveBeenCalledOnce();
  });

  test("falls back to JSON when the binary version differs", async () => {
    const logger = mockLogger();
    const persistence = new PathPersistence(dir, logger);
    await persistence.save(paths, sectors.records());
    await fs.promises.writeFile(
      persistence.binaryPath,
      new BinaryWriter().int32(99).int32(0).toBytes(),
    );

    expect((await persistence.load()).source).toBe("json");
    expect(logger.warn).toHaveBeenCalledWith(
      "[persistence] Error loading paths.bin, falling back to JSON: Unsupported snapshot version 99 (expected 1)",
    );
  });

  test("starts empty when the binary file is corrupt and there is no JSON", async () => {
    const logger = mockLogger();
    const persistence = new PathPersistence(dir, logger);
    await fs.promises.writeFile(persistence.binaryPath, new Uint8Array([1, 2, 3]));

    expect(await persistence.load()).toEqual({ source: "empty", paths: [], sectors: [] });
    expect(logger.warn).toHaveBeenCalledTimes(2);
    expect(logger.warn).toHaveBeenLastCalledWith(
      "[persistence] No paths.json to fall back to, starting with an empty cache",
    );
  });

  test("fails when the JSON file cannot be read", async () => {
    const persistence = new PathPersistence(dir, mockLogger());
    await fs.promises.mkdir(persistence.jsonPath);

    await expect(persistence.load()).rejects.toThrow(PersistenceError);
  });

  test("fails when both snapshots are unusable", async () => {
    const persistence = new PathPersistence(dir, mockLogger());
    await fs.promises.writeFile(persistence.binaryPath, new Uint8Array([1, 2, 3]));
    await fs.promises.writeFile(persistence.jsonPath, "{ broken", "utf-8");

    await expect(persistence.load()).rejects.toThrow("JSON snapshot is not valid JSON");
  });

  test("reports a failed save without throwing", async () => {
    const blocker = path.join(dir, "blocker");
    await fs.promises.writeFile(blocker, "not a directory", "utf-8");
    const logger = mockLogger();
    const persistence = new PathPersistence(path.join(blocker, "cache"), logger);

    expect(await persistence.save(paths, sectors.records())).toBe(false);
    expect(logger.error).toHaveBeenCalledOnce();
  });
});
