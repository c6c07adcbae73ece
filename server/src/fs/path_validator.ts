import fsp from "node:fs/promises";
import type { Stats } from "node:fs";
import path from "node:path";
import {
  FsError,
  errnoCode,
  fromNodeError,
  notADirectory,
  notFound,
  pathTraversal,
  permissionDenied,
} from "./errors.js";
import { isDenied, isInsideRoots, type SandboxPolicy } from "./policy.js";

export type ResolveNewOptions = {
  // Permit more than one missing trailing component (create_parents / recursive mkdir).
  allowMissingParents?: boolean;
};

type Walk = {
  // Canonical form of the deepest existing prefix.
  canonical: string;
  // Components below `canonical` that do not exist yet.
  missing: string[];
};

function precheck(input: string): string {
  if (typeof input !== "string" || input.length === 0) throw pathTraversal(String(input ?? ""));
  if (input.includes("\u0000")) throw pathTraversal(input);
  if (!path.isAbsolute(input)) throw pathTraversal(input);
  if (input.split(/[\\/]+/).includes("..")) throw pathTraversal(input);
  return path.normalize(input);
}

function outsideRoots(input: string): FsError {
  return permissionDenied(input, "outside allowed roots");
}

function deniedPattern(input: string): FsError {
  return permissionDenied(input, "matches a denied pattern");
}

/**
 * Resolves `normalized` one component at a time, the way realpath would, so that symlinks living
 * inside the sandbox can be checked against policy before they are followed. Symlinks above the
 * roots (e.g. /tmp -> /private/tmp) are followed without checks.
 */
async function walk(policy: SandboxPolicy, normalized: string, input: string): Promise<Walk> {
  const parts = normalized.split(path.sep).filter(Boolean);
  let canonical = path.parse(normalized).root || path.sep;

  for (let i = 0; i < parts.length; i++) {
    const next = path.join(canonical, parts[i] ?? "");
    const isLast = i === parts.length - 1;
    let st: Stats;
    try {
      st = await fsp.lstat(next);
    } catch (err) {
      const code = errnoCode(err);
      if (code === "ENOENT") return { canonical, missing: parts.slice(i) };
      if (!isInsideRoots(policy, canonical)) throw outsideRoots(input);
      throw fromNodeError(err, input);
    }

    if (st.isSymbolicLink()) {
      let target: string;
      try {
        target = await fsp.realpath(next);
      } catch (err) {
        if (!isInsideRoots(policy, canonical)) throw outsideRoots(input);
        if (errnoCode(err) === "ENOENT") throw notFound(input);
        throw fromNodeError(err, input);
      }
      if (isInsideRoots(policy, canonical)) {
        if (isDenied(policy, target)) throw permissionDenied(input, "symlink target matches a denied pattern");
        if (!isInsideRoots(policy, target)) {
          if (policy.followSymlinks) throw outsideRoots(input);
          throw new FsError({ code: "symlink_escape", path: input });
        }
      }
      canonical = target;
      if (!isLast) {
        try {
          st = await fsp.stat(target);
        } catch (err) {
          throw fromNodeError(err, input);
        }
      }
    } else {
      canonical = next;
    }

    if (!isLast && !st.isDirectory()) {
      if (!isInsideRoots(policy, canonical)) throw outsideRoots(input);
      throw notADirectory(path.join(path.sep, ...parts.slice(0, i + 1)));
    }
  }

  return { canonical, missing: [] };
}

function ensureAllowed(policy: SandboxPolicy, canonical: string, normalized: string, input: string): void {
  if (!isInsideRoots(policy, canonical)) throw outsideRoots(input);
  if (isDenied(policy, canonical) || isDenied(policy, normalized)) throw deniedPattern(input);
}

/** Canonical path of an existing file or directory inside the sandbox. */
export async function validateExisting(policy: SandboxPolicy, input: string): Promise<string> {
  const normalized = precheck(input);
  const { canonical, missing } = await walk(policy, normalized, input);
  if (missing.length > 0) {
    if (!isInsideRoots(policy, canonical)) throw outsideRoots(input);
    throw notFound(input);
  }
  ensureAllowed(policy, canonical, normalized, input);
  return canonical;
}

/**
 * Canonical target for a create/rename destination. The deepest existing ancestor is canonicalized;
 * the missing suffix is re-appended verbatim and only checked textually.
 */
export async function resolveNew(policy: SandboxPolicy, input: string, opts: ResolveNewOptions = {}): Promise<string> {
  const normalized = precheck(input);
  const { canonical, missing } = await walk(policy, normalized, input);
  if (missing.length === 0) {
    ensureAllowed(policy, canonical, normalized, input);
    return canonical;
  }
  if (!isInsideRoots(policy, canonical)) throw outsideRoots(input);
  if (missing.length > 1 && !opts.allowMissingParents) throw notFound(path.dirname(normalized));

  const resolved = path.join(canonical, ...missing);
  ensureAllowed(policy, resolved, normalized, input);
  return resolved;
}

/**
 * Path of the directory entry `input` names, without following a final symlink. The parent is
 * canonicalized and must lie inside the sandbox; the entry itself must exist. A root reached
 * through an alias above the sandbox resolves to the root.
 */
export async function resolveEntry(policy: SandboxPolicy, input: string): Promise<string> {
  const normalized = precheck(input);
  const parentInput = path.dirname(normalized);
  if (parentInput === normalized) throw outsideRoots(input);
  const { canonical: parent, missing } = await walk(policy, parentInput, input);
  if (missing.length > 0) {
    if (!isInsideRoots(policy, parent)) throw outsideRoots(input);
    throw notFound(input);
  }
  const leaf = path.join(parent, path.basename(normalized));
  if (!isInsideRoots(policy, leaf)) return await validateExisting(policy, input);
  if (isDenied(policy, leaf) || isDenied(policy, normalized)) throw deniedPattern(input);
  try {
    await fsp.lstat(leaf);
  } catch (err) {
    if (errnoCode(err) === "ENOENT") throw notFound(input);
    throw fromNodeError(err, input);
  }
  return leaf;
}
