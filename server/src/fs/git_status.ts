import path from "node:path";
import { execCapture } from "../exec.js";

export type GitStatus = "modified" | "added" | "deleted" | "untracked" | "ignored";

export type GitStatusMap = {
  treeRoot: string;
  // Absolute path -> status. Directory entries reported by git ("dir/") are stored without the slash.
  entries: Map<string, GitStatus>;
  dirs: Set<string>;
};

function classify(xy: string): GitStatus | null {
  if (xy === "??") return "untracked";
  if (xy === "!!") return "ignored";
  const x = xy[0] ?? " ";
  const y = xy[1] ?? " ";
  if (x === "A" || y === "A") return "added";
  if (x === "D" || y === "D") return "deleted";
  if ("MRCUT".includes(x) && x !== " ") return "modified";
  if ("MRCUT".includes(y) && y !== " ") return "modified";
  return null;
}

export function parsePorcelain(treeRoot: string, raw: string): GitStatusMap {
  const entries = new Map<string, GitStatus>();
  const dirs = new Set<string>();
  const fields = raw.split("\u0000");
  for (let i = 0; i < fields.length; i++) {
    const rec = fields[i] ?? "";
    if (rec.length < 4) continue;
    const xy = rec.slice(0, 2);
    let rel = rec.slice(3);
    // Renames/copies carry the original path in the next field.
    if (xy[0] === "R" || xy[0] === "C") i += 1;
    const status = classify(xy);
    if (!status) continue;
    const isDir = rel.endsWith("/");
    if (isDir) rel = rel.slice(0, -1);
    const abs = path.join(treeRoot, rel);
    entries.set(abs, status);
    if (isDir) dirs.add(abs);
  }
  return { treeRoot, entries, dirs };
}

export async function gitTopLevel(dir: string): Promise<string | null> {
  const top = await execCapture("git", ["-C", dir, "rev-parse", "--show-toplevel"], { timeoutMs: 1200 });
  if (!top.ok) return null;
  const root = top.stdout.trim();
  return root && path.isAbsolute(root) ? root : null;
}

/** Porcelain status for the work tree containing `dir`, or null outside git (or without git installed). */
export async function loadGitStatus(dir: string): Promise<GitStatusMap | null> {
  const treeRoot = await gitTopLevel(dir);
  if (!treeRoot) return null;
  const r = await execCapture(
    "git",
    ["-C", treeRoot, "status", "--porcelain", "--ignored", "--untracked-files=normal", "-z"],
    { timeoutMs: 3000 },
  );
  if (!r.ok) return null;
  return parsePorcelain(treeRoot, r.stdout);
}

export function statusFor(map: GitStatusMap, absPath: string): GitStatus | undefined {
  const direct = map.entries.get(absPath);
  if (direct) return direct;
  // Untracked/ignored directories are reported once; their contents inherit the status.
  let cur = path.dirname(absPath);
  while (cur.length >= map.treeRoot.length && cur !== path.dirname(cur)) {
    if (map.dirs.has(cur)) {
      const s = map.entries.get(cur);
      if (s === "ignored" || s === "untracked") return s;
    }
    cur = path.dirname(cur);
  }
  return undefined;
}

export function isIgnored(map: GitStatusMap, absPath: string): boolean {
  return statusFor(map, absPath) === "ignored";
}
