import fsp from "node:fs/promises";
import type { Stats } from "node:fs";
import path from "node:path";
import { watch as chokidarWatch } from "chokidar";
import { buildEntry, lstatIfPresent } from "./entries.js";
import type { SandboxPolicy } from "./policy.js";
import type { FileEntry } from "./types.js";
import { createLogger, errorMessage } from "../log.js";

const log = createLogger("watch");

export const DEFAULT_DEBOUNCE_MS = 250;
const MAX_BATCH_WAIT_MS = 1000;

export type RawKind = "add" | "addDir" | "change" | "unlink" | "unlinkDir";
export type ChangeKind = "created" | "modified" | "deleted" | "renamed";

export type ChangeEvent = {
  // Watched directory the event was observed under.
  dir: string;
  path: string;
  kind: ChangeKind;
  from?: string;
  entry?: FileEntry;
};

export type WatchBackend = { close: () => Promise<void> };

export type WatchBackendFactory = (
  dir: string,
  onRaw: (kind: RawKind, p: string) => void,
  onError: (err: unknown) => void,
) => WatchBackend;

const RAW_KINDS: ReadonlySet<string> = new Set<RawKind>(["add", "addDir", "change", "unlink", "unlinkDir"]);

function isRawKind(v: string): v is RawKind {
  return RAW_KINDS.has(v);
}

export const chokidarBackend: WatchBackendFactory = (dir, onRaw, onError) => {
  const w = chokidarWatch(dir, { depth: 0, ignoreInitial: true, persistent: true });
  w.on("all", (event: string, p: string) => {
    if (isRawKind(event)) onRaw(event, p);
  });
  w.on("error", onError);
  return { close: () => w.close() };
};

type Pending = { first: RawKind; last: RawKind };

type Watch = {
  dir: string;
  refs: number;
  backend: WatchBackend;
  pending: Map<string, Pending>;
  timer: ReturnType<typeof setTimeout> | null;
  batchStartedAt: number;
  // Last known inode per child; used to pair delete+create into a rename.
  inodes: Map<string, number>;
  flushing: Promise<void>;
};

export type ChangeWatcherOptions = {
  debounceMs?: number;
  backend?: WatchBackendFactory;
  // Paths rejected here never produce events (e.g. denied by sandbox policy).
  filter?: (p: string) => boolean;
  // Snapshot used to describe symlinks in emitted entries.
  policy?: () => SandboxPolicy;
};

/**
 * Reference-counted directory watches. One backend watch exists per directory regardless of how
 * many logical watchers ask for it; raw events are coalesced per path over a trailing window.
 */
export class ChangeWatcher {
  private readonly watches = new Map<string, Watch>();
  private readonly listeners = new Set<(ev: ChangeEvent) => void>();
  private readonly debounceMs: number;
  private readonly backend: WatchBackendFactory;
  private readonly filter: (p: string) => boolean;
  private readonly policy: (() => SandboxPolicy) | undefined;

  constructor(opts: ChangeWatcherOptions = {}) {
    this.debounceMs = opts.debounceMs ?? DEFAULT_DEBOUNCE_MS;
    this.backend = opts.backend ?? chokidarBackend;
    this.filter = opts.filter ?? (() => true);
    this.policy = opts.policy;
  }

  subscribe(fn: (ev: ChangeEvent) => void): () => void {
    this.listeners.add(fn);
    return () => this.listeners.delete(fn);
  }

  refCount(dir: string): number {
    return this.watches.get(dir)?.refs ?? 0;
  }

  watch(dir: string): number {
    const existing = this.watches.get(dir);
    if (existing) {
      existing.refs += 1;
      return existing.refs;
    }
    const w: Watch = {
      dir,
      refs: 1,
      backend: this.backend(
        dir,
        (kind, p) => this.onRaw(dir, kind, p),
        (err) => log.warn("watch error", dir, errorMessage(err)),
      ),
      pending: new Map(),
      timer: null,
      batchStartedAt: 0,
      inodes: new Map(),
      flushing: Promise.resolve(),
    };
    this.watches.set(dir, w);
    w.flushing = this.prime(w).catch((err: unknown) => log.warn("cannot prime watch", dir, errorMessage(err)));
    log.debug("watch", dir);
    return 1;
  }

  /** Returns the remaining reference count; the backend watch closes when it reaches zero. */
  async unwatch(dir: string): Promise<number> {
    const w = this.watches.get(dir);
    if (!w) return 0;
    w.refs -= 1;
    if (w.refs > 0) return w.refs;
    this.watches.delete(dir);
    if (w.timer) clearTimeout(w.timer);
    w.timer = null;
    w.pending.clear();
    log.debug("unwatch", dir);
    await w.backend.close();
    return 0;
  }

  async close(): Promise<void> {
    const all = [...this.watches.values()];
    this.watches.clear();
    for (const w of all) {
      if (w.timer) clearTimeout(w.timer);
      await w.backend.close();
    }
    this.listeners.clear();
  }

  private async prime(w: Watch): Promise<void> {
    let names: string[];
    try {
      names = await fsp.readdir(w.dir);
    } catch (err) {
      log.warn("cannot list watched directory", w.dir, errorMessage(err));
      return;
    }
    for (const name of names) {
      const p = path.join(w.dir, name);
      const st = await lstatIfPresent(p);
      if (st && !w.inodes.has(p)) w.inodes.set(p, st.ino);
    }
  }

  private onRaw(dir: string, kind: RawKind, p: string): void {
    const w = this.watches.get(dir);
    if (!w || !this.filter(p)) return;
    const prev = w.pending.get(p);
    if (prev) prev.last = kind;
    else w.pending.set(p, { first: kind, last: kind });

    const now = Date.now();
    if (!w.timer) w.batchStartedAt = now;
    else clearTimeout(w.timer);
    const waited = now - w.batchStartedAt;
    const delay = waited >= MAX_BATCH_WAIT_MS ? 0 : Math.min(this.debounceMs, MAX_BATCH_WAIT_MS - waited);
    w.timer = setTimeout(() => {
      w.timer = null;
      const batch = w.pending;
      w.pending = new Map();
      // Flushes for one directory run strictly in order.
      w.flushing = w.flushing
        .then(() => this.flush(w, batch))
        .catch((err: unknown) => log.warn("change batch dropped", w.dir, errorMessage(err)));
    }, delay);
  }

  private async flush(w: Watch, batch: Map<string, Pending>): Promise<void> {
    const deleted: Array<{ path: string; ino: number | undefined }> = [];
    const created: Array<{ path: string; st: Stats }> = [];
    const modified: string[] = [];

    for (const [p, pending] of batch) {
      const st = await lstatIfPresent(p);
      if (!st) {
        const ino = w.inodes.get(p);
        w.inodes.delete(p);
        // Created and removed again within one window: nothing observable happened.
        if ((pending.first === "add" || pending.first === "addDir") && ino === undefined) continue;
        deleted.push({ path: p, ino });
        continue;
      }
      const known = w.inodes.has(p);
      w.inodes.set(p, st.ino);
      if ((pending.first === "add" || pending.first === "addDir") && !known) created.push({ path: p, st });
      else modified.push(p);
    }

    const events: ChangeEvent[] = [];
    for (const d of deleted) {
      const idx = d.ino === undefined ? -1 : created.findIndex((c) => c.st.ino === d.ino);
      const twin = idx >= 0 ? created.splice(idx, 1)[0] : undefined;
      if (twin) events.push({ dir: w.dir, path: twin.path, kind: "renamed", from: d.path });
      else events.push({ dir: w.dir, path: d.path, kind: "deleted" });
    }
    for (const c of created) events.push({ dir: w.dir, path: c.path, kind: "created" });
    for (const p of modified) events.push({ dir: w.dir, path: p, kind: "modified" });

    for (const ev of events) {
      if (ev.kind !== "deleted") {
        const st = await lstatIfPresent(ev.path);
        if (st) ev.entry = await buildEntry(ev.path, st, this.policy?.());
      }
      this.emit(ev);
    }
  }

  private emit(ev: ChangeEvent): void {
    for (const fn of [...this.listeners]) {
      try {
        fn(ev);
      } catch (err) {
        log.error("change listener failed", errorMessage(err));
      }
    }
  }
}
