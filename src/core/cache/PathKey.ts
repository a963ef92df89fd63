/**
 * Path keys - FNV-1a 64-bit over the endpoints' float32 bit patterns.
 *
 * float32 is the precision paths are persisted and exchanged at, so a key
 * recomputed from a loaded path's endpoints matches the stored one. Two
 * queries closer than the position tolerance can still hash differently;
 * set a `resolution` to snap coordinates to a grid before hashing.
 */

import type { Position } from "../world/Position";

export type PathKey = bigint;

const FNV64_OFFSET_BASIS = 14695981039346656037n;
const FNV64_PRIME = 1099511628211n;
const MASK_64 = (1n << 64n) - 1n;

export const MAX_PATH_KEY: PathKey = MASK_64;

export class FNV64Hasher {
  private hash = FNV64_OFFSET_BASIS;

  updateBytes(data: Uint8Array): this {
    for (let i = 0; i < data.length; i++) {
      this.hash ^= BigInt(data[i]);
      this.hash = (this.hash * FNV64_PRIME) & MASK_64;
    }
    return this;
  }

  digest(): PathKey {
    return this.hash;
  }
}

function snap(value: number, resolution: number): number {
  const snapped = resolution > 0 ? Math.round(value / resolution) * resolution : value;
  // -0 and 0 must hash alike
  return snapped === 0 ? 0 : snapped;
}

export function pathKey(
  start: Position,
  end: Position,
  resolution = 0,
): PathKey {
  const buffer = new ArrayBuffer(24);
  const view = new DataView(buffer);
  const coords = [start.x, start.y, start.z, end.x, end.y, end.z];

  for (let i = 0; i < coords.length; i++) {
    view.setFloat32(i * 4, snap(coords[i], resolution), true);
  }

  return new FNV64Hasher().updateBytes(new Uint8Array(buffer)).digest();
}

export function comparePathKeys(a: PathKey, b: PathKey): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function formatPathKey(key: PathKey): string {
  return key.toString(16).padStart(16, "0");
}

export function parsePathKey(text: string): PathKey | null {
  if (!/^\d+$/.test(text)) return null;
  const key = BigInt(text);
  return key <= MAX_PATH_KEY ? key : null;
}
