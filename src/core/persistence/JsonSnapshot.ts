import { z } from "zod";
import { CachedPath } from "../cache/CachedPath";
import { parsePathKey } from "../cache/PathKey";
import type { Sector } from "../world/SectorIndex";
import { PersistenceError } from "./PersistenceError";

export const JSON_SNAPSHOT_VERSION = 1;

const PositionSchema = z.object({
  x: z.number(),
  y: z.number(),
  z: z.number(),
});

export const PathRecordSchema = z.object({
  key: z
    .string()
    .refine((s) => parsePathKey(s) !== null, {
      message: "Path key must be an unsigned 64-bit decimal string",
    }),
  name: z.string(),
  start: PositionSchema,
  end: PositionSchema,
  waypoints: z.array(PositionSchema).min(1, { message: "Path has no waypoints" }),
  // Informational; distance is recomputed from the waypoints on load
  distance: z.number().optional(),
  createdAt: z.iso.datetime(),
  useCount: z.number().int().min(0),
});

export const SectorRecordSchema = z.object({
  id: z.number().int().min(0),
  gridX: z.number().int().min(0),
  gridY: z.number().int().min(0),
  centerX: z.number(),
  centerY: z.number(),
  neighbors: z.array(z.number().int().min(0)),
});

export const JsonSnapshotSchema = z.object({
  version: z.literal(JSON_SNAPSHOT_VERSION),
  paths: z.array(PathRecordSchema).default([]),
  sectors: z.array(SectorRecordSchema).default([]),
});

export type PathRecord = z.infer<typeof PathRecordSchema>;
export type SectorRecord = z.infer<typeof SectorRecordSchema>;

export interface SnapshotContents {
  paths: CachedPath[];
  sectors: Sector[];
}

export function toPathRecord(path: CachedPath): PathRecord {
  return {
    key: path.key.toString(),
    name: path.name,
    start: { x: path.start.x, y: path.start.y, z: path.start.z },
    end: { x: path.end.x, y: path.end.y, z: path.end.z },
    waypoints: path.waypoints.map((p) => ({ x: p.x, y: p.y, z: p.z })),
    distance: path.distance,
    createdAt: path.createdAt.toISOString(),
    useCount: path.useCount,
  };
}

export function fromPathRecord(record: PathRecord): CachedPath {
  const key = parsePathKey(record.key);
  if (key === null) {
    throw new PersistenceError(`Invalid path key ${record.key}`);
  }
  return new CachedPath({
    key,
    name: record.name,
    start: record.start,
    end: record.end,
    waypoints: record.waypoints,
    createdAt: new Date(record.createdAt),
    useCount: record.useCount,
  });
}

export function encodeJsonSnapshot(
  paths: Iterable<CachedPath>,
  sectors: readonly Sector[],
): string {
  const snapshot = {
    version: JSON_SNAPSHOT_VERSION,
    paths: Array.from(paths, toPathRecord),
    sectors: sectors.map((s) => ({
      id: s.id,
      gridX: s.gridX,
      gridY: s.gridY,
      centerX: s.centerX,
      centerY: s.centerY,
      neighbors: [...s.neighbors],
    })),
  };
  return JSON.stringify(snapshot, null, 2);
}

export function decodeJsonSnapshot(text: string): SnapshotContents {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new PersistenceError("JSON snapshot is not valid JSON", {
      cause: error,
    });
  }

  const result = JsonSnapshotSchema.safeParse(raw);
  if (!result.success) {
    throw new PersistenceError(
      `JSON snapshot failed validation:\n${z.prettifyError(result.error)}`,
    );
  }

  return {
    paths: result.data.paths.map(fromPathRecord),
    sectors: result.data.sectors,
  };
}

/**
 * Validates path records received from a peer.
 */
export function decodePathRecords(raw: unknown): CachedPath[] {
  const result = z.array(PathRecordSchema).safeParse(raw);
  if (!result.success) {
    throw new PersistenceError(
      `Remote paths failed validation:\n${z.prettifyError(result.error)}`,
    );
  }
  return result.data.map(fromPathRecord);
}
