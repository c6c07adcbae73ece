import { afterEach, describe, expect, test } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { ChangeWatcher, type ChangeEvent, type RawKind, type WatchBackendFactory } from "../src/fs/watcher.js";
import { buildPolicy } from "../src/fs/policy.js";
import { sleep, testConfig, tmpDir, waitFor } from "./helpers.js";

const cleanup: string[] = [];

afterEach(() => {
  for (const d of cleanup.splice(0)) fs.rmSync(d, { recursive: true, force: true });
});

function fakeBackend() {
  const emitters = new Map<string, (kind: RawKind, p: string) => void>();
  const closed: string[] = [];
  let opened = 0;
  const factory: WatchBackendFactory = (dir, onRaw) => {
    opened += 1;
    emitters.set(dir, onRaw);
    return {
      close: async () => {
        closed.push(dir);
      },
    };
  };
  const emit = (dir: string, kind: RawKind, p: string) => {
    const fn = emitters.get(dir);
    if (!fn) throw new Error(`not watching ${dir}`);
    fn(kind, p);
  };
  return { factory, emit, closed, opened: () => opened };
}

async function setup(filter?: (p: string) => boolean, sandboxed = false) {
  const dir = tmpDir();
  cleanup.push(dir);
  const backend = fakeBackend();
  const policy = buildPolicy(testConfig({ filesystem: { roots: [dir] } }).filesystem);
  const watcher = new ChangeWatcher({
    debounceMs: 20,
    backend: backend.factory,
    filter,
    policy: sandboxed ? () => policy : undefined,
  });
  const events: ChangeEvent[] = [];
  watcher.subscribe((ev) => events.push(ev));
  return { dir, backend, watcher, events };
}

describe("ChangeWatcher", () => {
  test("one backend watch per directory, closed when the last reference goes", async () => {
    const { dir, backend, watcher } = await setup();
    expect(watcher.watch(dir)).toBe(1);
    expect(watcher.watch(dir)).toBe(2);
    expect(backend.opened()).toBe(1);
    await expect(watcher.unwatch(dir)).resolves.toBe(1);
    expect(backend.closed).toEqual([]);
    await expect(watcher.unwatch(dir)).resolves.toBe(0);
    expect(backend.closed).toEqual([dir]);
    expect(watcher.refCount(dir)).toBe(0);
    await watcher.close();
  });

  test("add followed by change within the window is one created event", async () => {
    const { dir, backend, watcher, events } = await setup();
    watcher.watch(dir);
    await sleep(30);
    const p = path.join(dir, "new.txt");
    fs.writeFileSync(p, "hi");
    backend.emit(dir, "add", p);
    backend.emit(dir, "change", p);
    await waitFor(() => events.length > 0);
    await sleep(60);
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({ dir, path: p, kind: "created", entry: { name: "new.txt", size: 2 } });
    await watcher.close();
  });

  test("delete plus create of the same inode is a rename", async () => {
    const { dir, backend, watcher, events } = await setup();
    const from = path.join(dir, "a.txt");
    const to = path.join(dir, "b.txt");
    fs.writeFileSync(from, "x");
    watcher.watch(dir);
    await sleep(30);
    fs.renameSync(from, to);
    backend.emit(dir, "unlink", from);
    backend.emit(dir, "add", to);
    await waitFor(() => events.length > 0);
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({ path: to, kind: "renamed", from });
    await watcher.close();
  });

  test("removals carry no entry and filtered paths never surface", async () => {
    const { dir, backend, watcher, events } = await setup((p) => !p.endsWith(".secret"));
    const gone = path.join(dir, "gone.txt");
    fs.writeFileSync(gone, "x");
    watcher.watch(dir);
    await sleep(30);
    fs.rmSync(gone);
    backend.emit(dir, "unlink", gone);
    const hidden = path.join(dir, "key.secret");
    fs.writeFileSync(hidden, "x");
    backend.emit(dir, "add", hidden);
    await waitFor(() => events.length > 0);
    await sleep(60);
    expect(events).toEqual([{ dir, path: gone, kind: "deleted" }]);
    await watcher.close();
  });

  test("a file created and removed inside one window produces nothing", async () => {
    const { dir, backend, watcher, events } = await setup();
    watcher.watch(dir);
    await sleep(30);
    const p = path.join(dir, "blip.txt");
    backend.emit(dir, "add", p);
    backend.emit(dir, "unlink", p);
    await sleep(100);
    expect(events).toEqual([]);
    await watcher.close();
  });

  test("a new link out of the sandbox is described without its target", async () => {
    const { dir, backend, watcher, events } = await setup(undefined, true);
    const outside = tmpDir();
    cleanup.push(outside);
    fs.writeFileSync(path.join(outside, "secret.txt"), "top secret");
    watcher.watch(dir);
    await sleep(30);
    const link = path.join(dir, "link");
    fs.symlinkSync(path.join(outside, "secret.txt"), link);
    backend.emit(dir, "add", link);
    await waitFor(() => events.length > 0);
    expect(events[0]).toMatchObject({ path: link, kind: "created", entry: { is_symlink: true, size: fs.lstatSync(link).size } });
    expect(events[0]?.entry?.symlink_target).toBeUndefined();
    await watcher.close();
  });
});
