import { afterEach, describe, expect, test } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { PolicyStore, buildPolicy, isDenied, isUnderRoot } from "../src/fs/policy.js";
import { resolveEntry, resolveNew, validateExisting } from "../src/fs/path_validator.js";
import { testConfig, tmpDir } from "./helpers.js";

const cleanup: string[] = [];

function sandbox(extra: Record<string, unknown> = {}) {
  const root = tmpDir();
  const outside = tmpDir();
  cleanup.push(root, outside);
  const policy = buildPolicy(testConfig({ filesystem: { roots: [root], ...extra } }).filesystem);
  return { root, outside, policy };
}

afterEach(() => {
  for (const d of cleanup.splice(0)) fs.rmSync(d, { recursive: true, force: true });
});

describe("isUnderRoot", () => {
  test("matches the root itself and descendants only", () => {
    expect(isUnderRoot("/home/u/proj", "/home/u/proj")).toBe(true);
    expect(isUnderRoot("/home/u/proj/a/b", "/home/u/proj")).toBe(true);
    expect(isUnderRoot("/home/u/project", "/home/u/proj")).toBe(false);
    expect(isUnderRoot("/home/u", "/home/u/proj")).toBe(false);
  });

  test("a child whose name starts with two dots is still inside", () => {
    expect(isUnderRoot("/home/u/proj/..foo", "/home/u/proj")).toBe(true);
    expect(isUnderRoot("/home/u/proj/..", "/home/u/proj")).toBe(false);
    expect(isUnderRoot("/home/u/other", "/home/u/proj")).toBe(false);
  });
});

describe("validateExisting", () => {
  test("returns the canonical path of a file inside a root", async () => {
    const { root, policy } = sandbox();
    fs.writeFileSync(path.join(root, "a.txt"), "x");
    await expect(validateExisting(policy, path.join(root, "a.txt"))).resolves.toBe(path.join(root, "a.txt"));
  });

  test("rejects relative paths and parent components before touching disk", async () => {
    const { root, policy } = sandbox();
    await expect(validateExisting(policy, "a.txt")).rejects.toMatchObject({
      detail: { code: "path_traversal", attempted_path: "a.txt" },
    });
    const sneaky = `${root}/sub/../a.txt`;
    await expect(validateExisting(policy, sneaky)).rejects.toMatchObject({
      detail: { code: "path_traversal", attempted_path: sneaky },
    });
  });

  test("rejects paths outside every root", async () => {
    const { outside, policy } = sandbox();
    fs.writeFileSync(path.join(outside, "b.txt"), "x");
    await expect(validateExisting(policy, path.join(outside, "b.txt"))).rejects.toMatchObject({
      detail: { code: "permission_denied", reason: "outside allowed roots" },
    });
  });

  test("missing files inside a root are not_found", async () => {
    const { root, policy } = sandbox();
    const p = path.join(root, "nope.txt");
    await expect(validateExisting(policy, p)).rejects.toMatchObject({ detail: { code: "not_found", path: p } });
  });

  test("deny patterns win over allowed roots", async () => {
    const { root, policy } = sandbox();
    fs.writeFileSync(path.join(root, ".env"), "SECRET=1");
    expect(isDenied(policy, path.join(root, ".env"))).toBe(true);
    await expect(validateExisting(policy, path.join(root, ".env"))).rejects.toMatchObject({
      detail: { code: "permission_denied", reason: "matches a denied pattern" },
    });
  });

  test("a symlink leading out of the sandbox is a symlink_escape", async () => {
    const { root, outside, policy } = sandbox();
    fs.writeFileSync(path.join(outside, "secret.txt"), "x");
    fs.symlinkSync(path.join(outside, "secret.txt"), path.join(root, "link"));
    await expect(validateExisting(policy, path.join(root, "link"))).rejects.toMatchObject({
      detail: { code: "symlink_escape" },
    });
  });

  test("with follow_symlinks the escaping target is still outside the roots", async () => {
    const { root, outside, policy } = sandbox({ follow_symlinks: true });
    fs.writeFileSync(path.join(outside, "secret.txt"), "x");
    fs.symlinkSync(path.join(outside, "secret.txt"), path.join(root, "link"));
    await expect(validateExisting(policy, path.join(root, "link"))).rejects.toMatchObject({
      detail: { code: "permission_denied", reason: "outside allowed roots" },
    });
  });

  test("symlinks that stay inside the sandbox resolve to their target", async () => {
    const { root, policy } = sandbox();
    fs.mkdirSync(path.join(root, "real"));
    fs.symlinkSync(path.join(root, "real"), path.join(root, "alias"));
    await expect(validateExisting(policy, path.join(root, "alias"))).resolves.toBe(path.join(root, "real"));
  });
});

describe("resolveNew", () => {
  test("appends one missing component to the canonical parent", async () => {
    const { root, policy } = sandbox();
    await expect(resolveNew(policy, path.join(root, "new.txt"))).resolves.toBe(path.join(root, "new.txt"));
  });

  test("needs allowMissingParents for deeper missing paths", async () => {
    const { root, policy } = sandbox();
    const p = path.join(root, "a", "b", "c.txt");
    await expect(resolveNew(policy, p)).rejects.toMatchObject({ detail: { code: "not_found", path: path.join(root, "a", "b") } });
    await expect(resolveNew(policy, p, { allowMissingParents: true })).resolves.toBe(p);
  });

  test("new names matching a deny pattern are refused", async () => {
    const { root, policy } = sandbox();
    await expect(resolveNew(policy, path.join(root, "server.pem"))).rejects.toMatchObject({
      detail: { code: "permission_denied", reason: "matches a denied pattern" },
    });
  });
});

describe("resolveNew outside the sandbox", () => {
  test("targets outside every root are refused", async () => {
    const { outside, policy } = sandbox();
    await expect(resolveNew(policy, path.join(outside, "new.txt"))).rejects.toMatchObject({
      detail: { code: "permission_denied", reason: "outside allowed roots" },
    });
    await expect(resolveNew(policy, "/relayterm-nowhere/deep/new.txt", { allowMissingParents: true })).rejects.toMatchObject({
      detail: { code: "permission_denied", reason: "outside allowed roots" },
    });
  });

  test("a new name below an escaping symlink is refused", async () => {
    const { root, outside, policy } = sandbox();
    fs.symlinkSync(outside, path.join(root, "out"));
    const p = path.join(root, "out", "new.txt");
    await expect(resolveNew(policy, p)).rejects.toMatchObject({ detail: { code: "symlink_escape", path: p } });
    expect(fs.existsSync(path.join(outside, "new.txt"))).toBe(false);
  });
});

describe("resolveEntry", () => {
  test("names the link itself, even when it leads out of the sandbox", async () => {
    const { root, outside, policy } = sandbox();
    fs.writeFileSync(path.join(outside, "secret.txt"), "x");
    const link = path.join(root, "link");
    fs.symlinkSync(path.join(outside, "secret.txt"), link);
    await expect(resolveEntry(policy, link)).resolves.toBe(link);
    await expect(validateExisting(policy, link)).rejects.toMatchObject({ detail: { code: "symlink_escape" } });
  });

  test("roots resolve to themselves and missing entries are not_found", async () => {
    const { root, policy } = sandbox();
    await expect(resolveEntry(policy, root)).resolves.toBe(root);
    const p = path.join(root, "ghost");
    await expect(resolveEntry(policy, p)).rejects.toMatchObject({ detail: { code: "not_found", path: p } });
  });

  test("entries outside the roots are refused", async () => {
    const { outside, policy } = sandbox();
    fs.writeFileSync(path.join(outside, "b.txt"), "x");
    await expect(resolveEntry(policy, path.join(outside, "b.txt"))).rejects.toMatchObject({
      detail: { code: "permission_denied", reason: "outside allowed roots" },
    });
  });
});

describe("PolicyStore", () => {
  test("reload swaps the snapshot without touching the old one", () => {
    const a = tmpDir();
    const b = tmpDir();
    cleanup.push(a, b);
    const store = new PolicyStore(testConfig({ filesystem: { roots: [a] } }).filesystem);
    const before = store.current;
    store.reload(testConfig({ filesystem: { roots: [b] } }).filesystem);
    expect(before.roots).toEqual([a]);
    expect(store.current.roots).toEqual([b]);
    expect(Object.isFrozen(store.current)).toBe(true);
  });
});
