import { createHash } from "crypto";
import type { CachedPath } from "../cache/CachedPath";
import { pathDigest } from "../cache/CachedPath";
import type { PathKey } from "../cache/PathKey";
import { comparePathKeys } from "../cache/PathKey";
import type { ConflictPolicy } from "../configuration/PathCacheConfig";
import { decodePathRecords } from "../persistence/JsonSnapshot";
import { PersistenceError } from "../persistence/PersistenceError";

/** The slice of a path store the sync protocol reads and writes. */
export interface PathSet {
  get(key: PathKey): CachedPath | undefined;
  keys(): Iterable<PathKey>;
  insert(path: CachedPath): void;
}

export interface SyncReport {
  /** Keys that were absent locally and are now stored. */
  added: PathKey[];
  /** Conflicting keys whose local content was replaced by the remote one. */
  replaced: PathKey[];
  /** Keys present on both sides with different waypoints. */
  conflicts: PathKey[];
}

/**
 * SHA-256 (base64) over the key set: keys sorted ascending, each written as
 * 8 little-endian bytes. Independent of insertion order.
 */
export function computeKeyChecksum(keys: Iterable<PathKey>): string {
  const sorted = [...keys].sort(comparePathKeys);
  const bytes = new Uint8Array(sorted.length * 8);
  const view = new DataView(bytes.buffer);
  sorted.forEach((key, i) => view.setBigUint64(i * 8, key, true));
  return createHash("sha256").update(bytes).digest("base64");
}

export function needsSync(localChecksum: string, peerChecksum: string): boolean {
  return localChecksum !== peerChecksum;
}

/**
 * Merges remote paths into `local`. Absent keys are inserted. A key present
 * on both sides with a different content digest is a conflict: it is always
 * reported; under "keep-local" the local path stays, under "lowest-digest"
 * the variant with the smaller digest wins on every peer.
 */
export function mergeRemotePaths(
  local: PathSet,
  remote: Iterable<CachedPath>,
  policy: ConflictPolicy,
): SyncReport {
  const report: SyncReport = { added: [], replaced: [], conflicts: [] };

  for (const path of remote) {
    const existing = local.get(path.key);
    if (existing === undefined) {
      local.insert(path);
      report.added.push(path.key);
      continue;
    }
    if (existing === path) continue;

    const localDigest = pathDigest(existing);
    const remoteDigest = pathDigest(path);
    if (localDigest === remoteDigest) continue;

    report.conflicts.push(path.key);
    if (policy === "lowest-digest" && remoteDigest < localDigest) {
      local.insert(path);
      report.replaced.push(path.key);
    }
  }

  return report;
}

/**
 * Keys whose local content differs from the digest a peer reported, or
 * that are missing locally.
 */
export function validateDigests(
  local: PathSet,
  remoteDigests: ReadonlyMap<PathKey, string>,
): PathKey[] {
  const mismatched: PathKey[] = [];
  for (const [key, digest] of remoteDigests) {
    const path = local.get(key);
    if (path === undefined || pathDigest(path) !== digest) {
      mismatched.push(key);
    }
  }
  return mismatched.sort(comparePathKeys);
}

/** Local paths a peer with `peerKeys` does not have, in key order. */
export function pathsMissingFrom(
  local: PathSet,
  peerKeys: Iterable<PathKey>,
): CachedPath[] {
  const known = new Set(peerKeys);
  const missing: CachedPath[] = [];
  for (const key of [...local.keys()].sort(comparePathKeys)) {
    if (known.has(key)) continue;
    const path = local.get(key);
    if (path) missing.push(path);
  }
  return missing;
}

/** Parses a peer's JSON array of path records. */
export function decodeRemotePaths(json: string): CachedPath[] {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new PersistenceError("Remote paths are not valid JSON", {
      cause: error,
    });
  }
  return decodePathRecords(raw);
}
