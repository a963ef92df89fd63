import * as fs from "fs";
import * as path from "path";
import type { CachedPath } from "../cache/CachedPath";
import type { Logger } from "../Logger";
import { consoleLogger } from "../Logger";
import type { Sector } from "../world/SectorIndex";
import { decodeBinarySnapshot, encodeBinarySnapshot } from "./BinaryCodec";
import type { SnapshotContents } from "./JsonSnapshot";
import { decodeJsonSnapshot, encodeJsonSnapshot } from "./JsonSnapshot";
import { PersistenceError } from "./PersistenceError";

export const BINARY_FILE = "paths.bin";
export const JSON_FILE = "paths.json";

export type SnapshotSource = "binary" | "json" | "empty";

export interface LoadedSnapshot extends SnapshotContents {
  source: SnapshotSource;
}

function isMissingFile(error: unknown): boolean {
  return (
    error instanceof Error && "code" in error && error.code === "ENOENT"
  );
}

/**
 * File-based snapshots of the path store: paths.bin for fast loads and
 * paths.json as the human-readable fallback. Writes are not atomic.
 */
export class PathPersistence {
  constructor(
    readonly directory: string,
    private readonly logger: Logger = consoleLogger,
  ) {}

  get binaryPath(): string {
    return path.join(this.directory, BINARY_FILE);
  }

  get jsonPath(): string {
    return path.join(this.directory, JSON_FILE);
  }

  /**
   * Writes both snapshots. Failures are logged and reported as `false`;
   * the in-memory store is unaffected.
   */
  async save(
    paths: Iterable<CachedPath>,
    sectors: readonly Sector[],
  ): Promise<boolean> {
    const list = [...paths];
    try {
      await fs.promises.mkdir(this.directory, { recursive: true });
      await fs.promises.writeFile(
        this.jsonPath,
        encodeJsonSnapshot(list, sectors),
        "utf-8",
      );
      await fs.promises.writeFile(this.binaryPath, encodeBinarySnapshot(list));
      this.logger.log(`[persistence] Saved ${list.length} paths to ${this.directory}`);
      return true;
    } catch (error) {
      this.logger.error(
        `[persistence] Error saving path cache: ${error instanceof Error ? error.message : String(error)}`,
      );
      return false;
    }
  }

  /**
   * Binary first, JSON second. With no usable binary snapshot and no JSON
   * file the snapshot is empty. Throws PersistenceError only when a JSON
   * file exists but cannot be read or decoded.
   */
  async load(): Promise<LoadedSnapshot> {
    const fromBinary = await this.loadBinary();
    if (fromBinary.snapshot) return fromBinary.snapshot;

    let text: string;
    try {
      text = await fs.promises.readFile(this.jsonPath, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) {
        if (fromBinary.failed) {
          this.logger.warn(
            `[persistence] No ${JSON_FILE} to fall back to, starting with an empty cache`,
          );
        }
        return { source: "empty", paths: [], sectors: [] };
      }
      throw new PersistenceError(`Cannot read ${this.jsonPath}`, {
        cause: error,
      });
    }

    const contents = decodeJsonSnapshot(text);
    this.logger.log(
      `[persistence] Loaded ${contents.paths.length} paths from ${JSON_FILE}`,
    );
    return { source: "json", ...contents };
  }

  private async loadBinary(): Promise<{
    snapshot: LoadedSnapshot | null;
    failed: boolean;
  }> {
    let bytes: Uint8Array;
    try {
      bytes = await fs.promises.readFile(this.binaryPath);
    } catch (error) {
      if (isMissingFile(error)) return { snapshot: null, failed: false };
      this.logger.warn(
        `[persistence] Cannot read ${BINARY_FILE}, falling back to JSON: ${String(error)}`,
      );
      return { snapshot: null, failed: true };
    }

    try {
      const paths = decodeBinarySnapshot(bytes);
      this.logger.log(`[persistence] Loaded ${paths.length} paths from ${BINARY_FILE}`);
      return { snapshot: { source: "binary", paths, sectors: [] }, failed: false };
    } catch (error) {
      this.logger.warn(
        `[persistence] Error loading ${BINARY_FILE}, falling back to JSON: ${error instanceof Error ? error.message : String(error)}`,
      );
      return { snapshot: null, failed: true };
    }
  }
}
