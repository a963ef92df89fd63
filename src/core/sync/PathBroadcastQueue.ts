import type { CachedPath } from "../cache/CachedPath";

export interface PathUpdateMessage {
  type: "path_update";
  path: CachedPath;
}

/**
 * Outbound channel for newly generated paths. The store only publishes;
 * a networking component drains the queue and ships the messages.
 */
export class PathBroadcastQueue {
  private messages: PathUpdateMessage[] = [];

  constructor(private readonly capacity = Infinity) {}

  get pending(): number {
    return this.messages.length;
  }

  /** Returns false when the queue is full and the message was dropped. */
  publish(path: CachedPath): boolean {
    if (this.messages.length >= this.capacity) return false;
    this.messages.push({ type: "path_update", path });
    return true;
  }

  drain(): PathUpdateMessage[] {
    const drained = this.messages;
    this.messages = [];
    return drained;
  }
}
