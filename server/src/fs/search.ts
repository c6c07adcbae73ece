import fsp from "node:fs/promises";
import path from "node:path";
import { Minimatch } from "minimatch";
import { buildEntry, lstatIfPresent } from "./entries.js";
import { isIgnored, loadGitStatus, type GitStatusMap } from "./git_status.js";
import { decodeText } from "./encoding.js";
import { errnoCode } from "./errors.js";
import { isDenied, type SandboxPolicy } from "./policy.js";
import type { ContentMatch, SearchMatch, SearchResults } from "./types.js";

export const MAX_CONTENT_MATCHES_PER_FILE = 20;
const MAX_LINE_CHARS = 500;

export type SearchOptions = {
  pattern: string;
  contentPattern?: string;
  maxDepth?: number;
  maxResults?: number;
};

export function findContentMatches(text: string, needle: string): ContentMatch[] {
  const out: ContentMatch[] = [];
  if (!needle) return out;
  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length && out.length < MAX_CONTENT_MATCHES_PER_FILE; i++) {
    const line = lines[i] ?? "";
    const at = line.indexOf(needle);
    if (at < 0) continue;
    out.push({
      line_number: i + 1,
      line_content: line.length > MAX_LINE_CHARS ? line.slice(0, MAX_LINE_CHARS) : line,
      match_start: at,
      match_end: at + needle.length,
    });
  }
  return out;
}

async function contentMatches(policy: SandboxPolicy, file: string, size: number, needle: string): Promise<ContentMatch[]> {
  if (size > policy.maxReadBytes) return [];
  const text = decodeText(await fsp.readFile(file));
  if (text === null) return [];
  return findContentMatches(text, needle);
}

/**
 * Depth-first walk under `root` (already validated). Honors .gitignore through git itself, never
 * follows symlinks and stops as soon as `maxResults` matches are collected.
 */
export async function searchFiles(
  policy: SandboxPolicy,
  root: string,
  opts: SearchOptions,
  env: { gitIgnore: boolean },
): Promise<SearchResults> {
  const maxResults = Math.max(1, Math.min(opts.maxResults ?? policy.maxSearchResults, policy.maxSearchResults));
  const maxDepth = opts.maxDepth ?? Number.POSITIVE_INFINITY;
  const byPath = opts.pattern.includes("/");
  const matcher = new Minimatch(opts.pattern || "*", { dot: true, nocase: true });
  const git: GitStatusMap | null = env.gitIgnore ? await loadGitStatus(root) : null;

  const matches: SearchMatch[] = [];
  let truncated = false;
  const stack: Array<{ dir: string; depth: number }> = [{ dir: root, depth: 0 }];

  walk: while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) break;
    let names: string[];
    try {
      names = await fsp.readdir(frame.dir);
    } catch (err) {
      // Directories can vanish or be unreadable mid-walk; the rest of the tree is still searched.
      if (errnoCode(err) !== null) continue;
      throw err;
    }
    names.sort();
    const subdirs: string[] = [];

    for (const name of names) {
      const abs = path.join(frame.dir, name);
      if (name === ".git" || isDenied(policy, abs)) continue;
      if (git && isIgnored(git, abs)) continue;
      const lst = await lstatIfPresent(abs);
      if (!lst || lst.isSymbolicLink()) continue;

      const depth = frame.depth + 1;
      if (lst.isDirectory() && depth < maxDepth) subdirs.push(abs);

      const subject = byPath ? path.relative(root, abs) : name;
      if (!matcher.match(subject)) continue;

      const match: SearchMatch = { path: abs, entry: await buildEntry(abs, lst, policy) };
      if (opts.contentPattern) {
        if (!lst.isFile()) continue;
        const found = await contentMatches(policy, abs, lst.size, opts.contentPattern);
        if (found.length === 0) continue;
        match.content_matches = found;
      }
      matches.push(match);
      if (matches.length >= maxResults) {
        truncated = true;
        break walk;
      }
    }

    for (let i = subdirs.length - 1; i >= 0; i--) {
      const dir = subdirs[i];
      if (dir) stack.push({ dir, depth: frame.depth + 1 });
    }
  }

  return { query: opts.pattern, path: root, matches, truncated };
}
