import fsp from "node:fs/promises";
import type { Stats } from "node:fs";
import path from "node:path";
import { errnoCode } from "./errors.js";
import { mimeFromName } from "./mime.js";
import { isDenied, isInsideRoots, type SandboxPolicy } from "./policy.js";
import type { FileEntry, SortBy, SortOrder } from "./types.js";

export function permissionString(mode: number): string {
  const bits = ["r", "w", "x"];
  let out = "";
  for (let shift = 6; shift >= 0; shift -= 3) {
    const triplet = (mode >> shift) & 0o7;
    for (let i = 0; i < 3; i++) out += triplet & (0o4 >> i) ? bits[i] : "-";
  }
  return out;
}

function birthtime(st: Stats): number | undefined {
  const ms = st.birthtimeMs;
  return Number.isFinite(ms) && ms > 0 ? Math.floor(ms) : undefined;
}

async function linkTarget(absPath: string): Promise<string> {
  try {
    return await fsp.realpath(absPath);
  } catch (err) {
    if (!isGone(err)) throw err;
    return path.resolve(path.dirname(absPath), await fsp.readlink(absPath));
  }
}

/**
 * Builds the entry for `absPath` from its lstat. Symlinks report their target and, when the
 * target exists, its size and kind. Under a policy, a link whose target lies outside the roots
 * or matches a deny pattern is described by its own lstat only.
 */
export async function buildEntry(absPath: string, lst: Stats, policy?: SandboxPolicy): Promise<FileEntry> {
  const name = path.basename(absPath) || absPath;
  let st = lst;
  let symlinkTarget: string | undefined;
  if (lst.isSymbolicLink()) {
    let visible = true;
    if (policy) {
      const target = await linkTarget(absPath);
      visible = isInsideRoots(policy, target) && !isDenied(policy, target);
    }
    if (visible) {
      symlinkTarget = await fsp.readlink(absPath);
      // Dangling links keep their own lstat.
      try {
        st = await fsp.stat(absPath);
      } catch (err) {
        if (!isGone(err)) throw err;
      }
    }
  }
  const isDirectory = st.isDirectory();
  const entry: FileEntry = {
    name,
    path: absPath,
    is_directory: isDirectory,
    is_symlink: lst.isSymbolicLink(),
    is_hidden: name.startsWith("."),
    size: isDirectory ? 0 : st.size,
    modified: Math.floor(st.mtimeMs),
    permissions: permissionString(st.mode),
  };
  const created = birthtime(st);
  if (created !== undefined) entry.created = created;
  if (!isDirectory) {
    const mime = mimeFromName(name);
    if (mime) entry.mime_type = mime;
  }
  if (symlinkTarget !== undefined) entry.symlink_target = symlinkTarget;
  return entry;
}

function isGone(err: unknown): boolean {
  const code = errnoCode(err);
  return code === "ENOENT" || code === "ENOTDIR" || code === "ELOOP";
}

/** lstat that yields null when the path vanished between listing and stat. */
export async function lstatIfPresent(absPath: string): Promise<Stats | null> {
  try {
    return await fsp.lstat(absPath);
  } catch (err) {
    if (isGone(err)) return null;
    throw err;
  }
}

export async function statEntry(absPath: string, policy?: SandboxPolicy): Promise<FileEntry> {
  return await buildEntry(absPath, await fsp.lstat(absPath), policy);
}

function extension(name: string): string {
  const dot = name.lastIndexOf(".");
  return dot > 0 ? name.slice(dot + 1).toLowerCase() : "";
}

function byName(a: FileEntry, b: FileEntry): number {
  return a.name.toLowerCase().localeCompare(b.name.toLowerCase());
}

/** Directories always come first; `order` applies within each group. */
export function sortEntries(entries: FileEntry[], sortBy: SortBy, order: SortOrder): FileEntry[] {
  const dir = order === "desc" ? -1 : 1;
  const field = (a: FileEntry, b: FileEntry): number => {
    switch (sortBy) {
      case "size":
        return a.size - b.size || byName(a, b);
      case "modified":
        return a.modified - b.modified || byName(a, b);
      case "type":
        return extension(a.name).localeCompare(extension(b.name)) || byName(a, b);
      case "name":
        return byName(a, b);
    }
  };
  return entries.sort((a, b) => {
    if (a.is_directory !== b.is_directory) return a.is_directory ? -1 : 1;
    return dir * field(a, b);
  });
}
