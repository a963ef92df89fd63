// paths.bin layout, little-endian:
//   int32 version, int32 count, then per path:
//   uint64 key, string name (7-bit varint byte length + UTF-8),
//   float32[3] start, float32[3] end, float32 distance, int32 useCount,
//   int32 waypointCount, float32[3] * waypointCount

import { CachedPath } from "../cache/CachedPath";
import type { Position } from "../world/Position";
import { PersistenceError, SnapshotVersionError } from "./PersistenceError";

export const BINARY_SNAPSHOT_VERSION = 1;

const POSITION_BYTES = 12;
const INT32_MAX = 0x7fffffff;

const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8", { fatal: true });

export class BinaryWriter {
  private buffer: Uint8Array;
  private view: DataView;
  private offset = 0;

  constructor(initialCapacity = 1024) {
    this.buffer = new Uint8Array(initialCapacity);
    this.view = new DataView(this.buffer.buffer);
  }

  int32(value: number): this {
    this.ensure(4);
    this.view.setInt32(this.offset, value, true);
    this.offset += 4;
    return this;
  }

  uint64(value: bigint): this {
    this.ensure(8);
    this.view.setBigUint64(this.offset, value, true);
    this.offset += 8;
    return this;
  }

  float32(value: number): this {
    this.ensure(4);
    this.view.setFloat32(this.offset, value, true);
    this.offset += 4;
    return this;
  }

  position(p: Position): this {
    return this.float32(p.x).float32(p.y).float32(p.z);
  }

  string(value: string): this {
    const bytes = encoder.encode(value);
    this.varint(bytes.length);
    this.ensure(bytes.length);
    this.buffer.set(bytes, this.offset);
    this.offset += bytes.length;
    return this;
  }

  toBytes(): Uint8Array {
    return this.buffer.slice(0, this.offset);
  }

  private varint(value: number): void {
    let v = value >>> 0;
    while (v >= 0x80) {
      this.byte((v & 0x7f) | 0x80);
      v >>>= 7;
    }
    this.byte(v);
  }

  private byte(value: number): void {
    this.ensure(1);
    this.buffer[this.offset++] = value;
  }

  private ensure(bytes: number): void {
    const required = this.offset + bytes;
    if (required <= this.buffer.length) return;
    let capacity = this.buffer.length * 2;
    while (capacity < required) capacity *= 2;
    const next = new Uint8Array(capacity);
    next.set(this.buffer.subarray(0, this.offset));
    this.buffer = next;
    this.view = new DataView(next.buffer);
  }
}

export class BinaryReader {
  private readonly view: DataView;
  private offset = 0;

  constructor(private readonly bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get remaining(): number {
    return this.bytes.byteLength - this.offset;
  }

  int32(): number {
    this.require(4);
    const value = this.view.getInt32(this.offset, true);
    this.offset += 4;
    return value;
  }

  uint64(): bigint {
    this.require(8);
    const value = this.view.getBigUint64(this.offset, true);
    this.offset += 8;
    return value;
  }

  float32(): number {
    this.require(4);
    const value = this.view.getFloat32(this.offset, true);
    this.offset += 4;
    return value;
  }

  position(): Position {
    const x = this.float32();
    const y = this.float32();
    const z = this.float32();
    return { x, y, z };
  }

  string(): string {
    const length = this.varint();
    this.require(length);
    const slice = this.bytes.subarray(this.offset, this.offset + length);
    this.offset += length;
    try {
      return decoder.decode(slice);
    } catch (error) {
      throw new PersistenceError("Invalid UTF-8 in string field", {
        cause: error,
      });
    }
  }

  private varint(): number {
    let result = 0;
    let shift = 0;
    while (true) {
      this.require(1);
      const b = this.bytes[this.offset++];
      result |= (b & 0x7f) << shift;
      if ((b & 0x80) === 0) break;
      shift += 7;
      if (shift > 28) {
        throw new PersistenceError("String length prefix is too long");
      }
    }
    return result >>> 0;
  }

  private require(bytes: number): void {
    if (this.offset + bytes > this.bytes.byteLength) {
      throw new PersistenceError(
        `Binary snapshot truncated at byte ${this.offset} (needed ${bytes} more)`,
      );
    }
  }
}

export function encodeBinarySnapshot(paths: Iterable<CachedPath>): Uint8Array {
  const list = [...paths];
  const writer = new BinaryWriter();
  writer.int32(BINARY_SNAPSHOT_VERSION).int32(list.length);

  for (const path of list) {
    writer
      .uint64(path.key)
      .string(path.name)
      .position(path.start)
      .position(path.end)
      .float32(path.distance)
      .int32(Math.min(path.useCount, INT32_MAX))
      .int32(path.waypoints.length);
    for (const waypoint of path.waypoints) {
      writer.position(waypoint);
    }
  }

  return writer.toBytes();
}

/**
 * Decodes paths.bin. The format carries no creation time, so every path is
 * stamped with `loadedAt`. Stored distances are read and discarded.
 */
export function decodeBinarySnapshot(
  bytes: Uint8Array,
  loadedAt: Date = new Date(),
): CachedPath[] {
  const reader = new BinaryReader(bytes);

  const version = reader.int32();
  if (version !== BINARY_SNAPSHOT_VERSION) {
    throw new SnapshotVersionError(version, BINARY_SNAPSHOT_VERSION);
  }

  const count = reader.int32();
  if (count < 0) {
    throw new PersistenceError(`Negative path count ${count}`);
  }

  const paths: CachedPath[] = [];
  for (let i = 0; i < count; i++) {
    const key = reader.uint64();
    const name = reader.string();
    const start = reader.position();
    const end = reader.position();
    reader.float32(); // distance
    const useCount = reader.int32();
    const waypointCount = reader.int32();

    if (waypointCount < 1 || waypointCount * POSITION_BYTES > reader.remaining) {
      throw new PersistenceError(
        `Path ${i} declares ${waypointCount} waypoints, ${reader.remaining} bytes left`,
      );
    }

    const waypoints: Position[] = [];
    for (let j = 0; j < waypointCount; j++) {
      waypoints.push(reader.position());
    }

    paths.push(
      new CachedPath({
        key,
        name,
        start,
        end,
        waypoints,
        createdAt: loadedAt,
        useCount: Math.max(0, useCount),
      }),
    );
  }

  return paths;
}
