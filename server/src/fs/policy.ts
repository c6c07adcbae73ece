import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { Minimatch } from "minimatch";
import type { FilesystemConfig } from "../config.js";

export type SandboxPolicy = Readonly<{
  // Canonical (realpath'd) roots, in configured order.
  roots: readonly string[];
  deniedPatterns: readonly string[];
  readOnlyPatterns: readonly string[];
  maxReadBytes: number;
  maxWriteBytes: number;
  followSymlinks: boolean;
  maxListEntries: number;
  maxSearchResults: number;
  denied: readonly Minimatch[];
  readOnly: readonly Minimatch[];
}>;

export function expandHome(p: string): string {
  if (p === "~") return os.homedir();
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return p;
}

function canonicalRoot(p: string): string {
  const abs = path.resolve(expandHome(p));
  try {
    return fs.realpathSync(abs);
  } catch {
    // Missing roots still bound the sandbox; they simply match nothing until created.
    return abs;
  }
}

export function normalizeRoots(roots: readonly string[]): string[] {
  const out: string[] = [];
  for (const r of roots) {
    if (!r) continue;
    const rr = canonicalRoot(r);
    if (!out.includes(rr)) out.push(rr);
  }
  return out;
}

export function isUnderRoot(p: string, root: string): boolean {
  const rel = path.relative(root, p);
  if (rel === "") return true;
  return rel !== ".." && !rel.startsWith(`..${path.sep}`) && !path.isAbsolute(rel);
}

function stripLeadingSlash(p: string): string {
  return p.replace(/^\/+/, "");
}

function compile(patterns: readonly string[]): Minimatch[] {
  const out: Minimatch[] = [];
  for (const raw of patterns) {
    const pattern = stripLeadingSlash(raw.trim());
    if (!pattern) continue;
    out.push(new Minimatch(pattern, { dot: true }));
    // "dir/**" also covers the directory itself.
    if (pattern.endsWith("/**")) out.push(new Minimatch(pattern.slice(0, -3), { dot: true }));
  }
  return out;
}

export function buildPolicy(cfg: FilesystemConfig): SandboxPolicy {
  return Object.freeze({
    roots: Object.freeze(normalizeRoots(cfg.roots)),
    deniedPatterns: Object.freeze([...cfg.denied_patterns]),
    readOnlyPatterns: Object.freeze([...cfg.read_only_patterns]),
    maxReadBytes: cfg.max_read_bytes,
    maxWriteBytes: cfg.max_write_bytes,
    followSymlinks: cfg.follow_symlinks,
    maxListEntries: cfg.max_list_entries,
    maxSearchResults: cfg.max_search_results,
    denied: Object.freeze(compile(cfg.denied_patterns)),
    readOnly: Object.freeze(compile(cfg.read_only_patterns)),
  });
}

function matchesAny(matchers: readonly Minimatch[], p: string): boolean {
  const target = stripLeadingSlash(p);
  return matchers.some((m) => m.match(target));
}

export function isInsideRoots(policy: SandboxPolicy, p: string): boolean {
  return policy.roots.some((r) => isUnderRoot(p, r));
}

export function isDenied(policy: SandboxPolicy, p: string): boolean {
  return matchesAny(policy.denied, p);
}

export function isReadOnly(policy: SandboxPolicy, p: string): boolean {
  return matchesAny(policy.readOnly, p);
}

export function isRoot(policy: SandboxPolicy, p: string): boolean {
  return policy.roots.includes(p);
}

/**
 * Holds the current sandbox policy. Readers take one snapshot per request via `current`;
 * `reload` swaps in a freshly built snapshot, so no reader ever sees a half-updated policy.
 */
export class PolicyStore {
  private snapshot: SandboxPolicy;

  constructor(cfg: FilesystemConfig) {
    this.snapshot = buildPolicy(cfg);
  }

  get current(): SandboxPolicy {
    return this.snapshot;
  }

  reload(cfg: FilesystemConfig): SandboxPolicy {
    const next = buildPolicy(cfg);
    this.snapshot = next;
    return next;
  }
}
