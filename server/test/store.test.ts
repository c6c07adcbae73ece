import { afterEach, describe, expect, test } from "vitest";
import fs from "node:fs";
import { createStore, type StoreSessionRow } from "../src/store.js";
import { tmpDir } from "./helpers.js";

const cleanup: string[] = [];

afterEach(() => {
  for (const d of cleanup.splice(0)) fs.rmSync(d, { recursive: true, force: true });
});

function open() {
  const dir = tmpDir();
  cleanup.push(dir);
  return createStore(dir);
}

function row(id: string, createdAt: number): StoreSessionRow {
  return { id, name: id, command: "bash", projectPath: "/work", cliType: "terminal", createdAt, endedAt: null, exitCode: null };
}

describe("store", () => {
  test("lists newest sessions first", () => {
    const store = open();
    store.saveSession(row("a", 1));
    store.saveSession(row("b", 2));
    expect(store.listSessions().map((r) => r.id)).toEqual(["b", "a"]);
    expect(store.listSessions(1).map((r) => r.id)).toEqual(["b"]);
    store.close();
  });

  test("rename, cli type and end update the row in place", () => {
    const store = open();
    store.saveSession(row("a", 1));
    store.renameSession("a", "deploy");
    store.setSessionCliType("a", "claude");
    store.endSession("a", 3, 50);
    // A second end does not overwrite the first.
    store.endSession("a", 9, 60);
    expect(store.getSession("a")).toEqual({ ...row("a", 1), name: "deploy", cliType: "claude", endedAt: 50, exitCode: 3 });
    expect(store.getSession("zzz")).toBeNull();
    store.close();
  });

  test("orphans from an earlier run are closed and pruned", () => {
    const store = open();
    store.saveSession(row("a", 1));
    store.saveSession(row("b", 2));
    store.endSession("b", 0, 10);
    expect(store.endOrphanedSessions(20)).toBe(1);
    expect(store.getSession("a")?.endedAt).toBe(20);
    expect(store.pruneSessions(15)).toBe(1);
    expect(store.listSessions().map((r) => r.id)).toEqual(["a"]);
    store.deleteSession("a");
    expect(store.listSessions()).toEqual([]);
    store.close();
  });
});
