import path from "node:path";
import type { ChangeWatcher } from "../fs/watcher.js";
import type { FileSystemEngine } from "../fs/operations.js";
import { FsError } from "../fs/errors.js";
import type { Connection } from "./connection.js";

/**
 * Connection-level view of the shared ChangeWatcher: each connection holds a directory at most once,
 * and the OS watch lives as long as any connection holds it.
 */
export class WatchRegistry {
  constructor(
    private readonly watcher: ChangeWatcher,
    private readonly engine: FileSystemEngine,
  ) {}

  async watch(conn: Connection, requested: string, requestId: string): Promise<string> {
    const dir = await this.engine.resolveDirectory(requested);
    if (conn.closed) return dir;
    if (!conn.watches.has(dir)) this.watcher.watch(dir);
    conn.watches.set(dir, requestId);
    return dir;
  }

  /** A path the connection is not watching is a no-op. */
  async unwatch(conn: Connection, requested: string): Promise<string> {
    const dir = await this.watchedKey(conn, requested);
    if (dir === null) return path.normalize(requested);
    conn.watches.delete(dir);
    await this.watcher.unwatch(dir);
    return dir;
  }

  async release(conn: Connection): Promise<void> {
    const dirs = [...conn.watches.keys()];
    conn.watches.clear();
    for (const dir of dirs) await this.watcher.unwatch(dir);
  }

  private async watchedKey(conn: Connection, requested: string): Promise<string | null> {
    const normalized = path.normalize(requested);
    if (conn.watches.has(normalized)) return normalized;
    try {
      const dir = await this.engine.resolveDirectory(requested);
      return conn.watches.has(dir) ? dir : null;
    } catch (err) {
      // The directory may be gone already; only the normalized spelling can match then.
      if (err instanceof FsError) return null;
      throw err;
    }
  }
}
