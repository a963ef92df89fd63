export class PersistenceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PersistenceError";
  }
}

/** The binary snapshot was written by a different format version. */
export class SnapshotVersionError extends PersistenceError {
  constructor(
    readonly found: number,
    readonly expected: number,
  ) {
    super(`Unsupported snapshot version ${found} (expected ${expected})`);
    this.name = "SnapshotVersionError";
  }
}
