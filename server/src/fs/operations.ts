import fsp from "node:fs/promises";
import { constants as fsConstants } from "node:fs";
import path from "node:path";
import { createHash } from "node:crypto";
import { nanoid } from "nanoid";
import { buildEntry, lstatIfPresent, sortEntries, statEntry } from "./entries.js";
import {
  FsError,
  alreadyExists,
  fromNodeError,
  ioError,
  notADirectory,
  notAFile,
  notFound,
  permissionDenied,
} from "./errors.js";
import { loadGitStatus, statusFor } from "./git_status.js";
import { decodeBase64Strict, decodeText } from "./encoding.js";
import { detectMime, isTextMime } from "./mime.js";
import { resolveEntry, resolveNew, validateExisting } from "./path_validator.js";
import { isDenied, isReadOnly, isRoot, isUnderRoot, type PolicyStore, type SandboxPolicy } from "./policy.js";
import { searchFiles, type SearchOptions } from "./search.js";
import type {
  ContentEncoding,
  DirectoryListing,
  FileChunk,
  FileContent,
  FileEntry,
  SearchResults,
  SortBy,
  SortOrder,
  WriteResult,
} from "./types.js";
import { uploadDestination } from "./uploads.js";
import { WorkerPool } from "./worker_pool.js";

export const DEFAULT_CHUNK_SIZE = 256 * 1024;
export const MAX_CHUNK_SIZE = 16 * 1024 * 1024;

export type ListOptions = {
  includeHidden?: boolean;
  sortBy?: SortBy;
  sortOrder?: SortOrder;
};

export type ReadOptions = {
  offset?: number;
  length?: number;
  encoding?: ContentEncoding;
};

export type WriteOptions = {
  encoding?: ContentEncoding;
  createParents?: boolean;
};

async function readRange(file: string, offset: number, length: number): Promise<Buffer> {
  const buf = Buffer.alloc(length);
  const fh = await fsp.open(file, "r");
  try {
    let filled = 0;
    while (filled < length) {
      const { bytesRead } = await fh.read(buf, filled, length - filled, offset + filled);
      if (bytesRead === 0) break;
      filled += bytesRead;
    }
    return filled === length ? buf : buf.subarray(0, filled);
  } finally {
    await fh.close();
  }
}

function ensureWritable(policy: SandboxPolicy, canonical: string, requested: string): void {
  if (isReadOnly(policy, canonical)) throw permissionDenied(requested, "path is read-only");
}

function ensureNotRoot(policy: SandboxPolicy, canonical: string, requested: string): void {
  if (isRoot(policy, canonical)) throw permissionDenied(requested, "allowed roots cannot be modified");
}

// Writes land only where the policy allows them, at every level of a tree.
function ensureCreatable(policy: SandboxPolicy, target: string): void {
  if (isDenied(policy, target)) throw permissionDenied(target, "matches a denied pattern");
  ensureWritable(policy, target, target);
}

type CopyStep = { kind: "dir"; to: string } | { kind: "file"; from: string; to: string; size: number };

async function atomicWrite(target: string, data: Buffer, mode?: number): Promise<void> {
  const tmp = path.join(path.dirname(target), `${path.basename(target)}.tmp-${nanoid()}`);
  try {
    await fsp.writeFile(tmp, data, { flag: "wx", mode: mode ?? 0o644 });
    await fsp.rename(tmp, target);
  } catch (err) {
    await fsp.rm(tmp, { force: true });
    throw err;
  }
}

export type FileSystemEngineOptions = {
  policies: PolicyStore;
  pool?: WorkerPool;
  gitStatus?: boolean;
};

/**
 * Every public operation captures one policy snapshot, validates all endpoints against it and then
 * runs on the bounded worker pool. OS errors are mapped into FsError on the way out.
 */
export class FileSystemEngine {
  private readonly policies: PolicyStore;
  private readonly pool: WorkerPool;
  private readonly gitStatus: boolean;

  constructor(opts: FileSystemEngineOptions) {
    this.policies = opts.policies;
    this.pool = opts.pool ?? new WorkerPool(8);
    this.gitStatus = opts.gitStatus ?? true;
  }

  get policy(): SandboxPolicy {
    return this.policies.current;
  }

  private async exec<T>(requested: string, fn: (policy: SandboxPolicy) => Promise<T>): Promise<T> {
    const policy = this.policies.current;
    try {
      return await this.pool.run(() => fn(policy));
    } catch (err) {
      throw fromNodeError(err, requested);
    }
  }

  listDirectory(requested: string, opts: ListOptions = {}): Promise<DirectoryListing> {
    return this.exec(requested, async (policy) => {
      const dir = await validateExisting(policy, requested);
      const st = await fsp.stat(dir);
      if (!st.isDirectory()) throw notADirectory(requested);

      const names = await fsp.readdir(dir);
      const entries: FileEntry[] = [];
      for (const name of names) {
        if (!opts.includeHidden && name.startsWith(".")) continue;
        const abs = path.join(dir, name);
        if (isDenied(policy, abs)) continue;
        const lst = await lstatIfPresent(abs);
        if (!lst) continue;
        entries.push(await buildEntry(abs, lst, policy));
      }

      if (this.gitStatus) {
        const git = await loadGitStatus(dir);
        if (git) {
          for (const e of entries) {
            const s = statusFor(git, e.path);
            if (s) e.git_status = s;
          }
        }
      }

      sortEntries(entries, opts.sortBy ?? "name", opts.sortOrder ?? "asc");
      const total = entries.length;
      const truncated = total > policy.maxListEntries;
      return {
        path: dir,
        entries: truncated ? entries.slice(0, policy.maxListEntries) : entries,
        total_count: total,
        truncated,
      };
    });
  }

  readFile(requested: string, opts: ReadOptions = {}): Promise<FileContent> {
    return this.exec(requested, async (policy) => {
      const file = await validateExisting(policy, requested);
      const st = await fsp.stat(file);
      if (st.isDirectory()) throw notAFile(requested);
      if (st.size > policy.maxReadBytes) {
        throw new FsError({ code: "file_too_large", path: requested, size: st.size, max_size: policy.maxReadBytes });
      }

      const offset = opts.offset ?? 0;
      if (!Number.isInteger(offset) || offset < 0) throw ioError("offset must be a non-negative integer");
      if (opts.length !== undefined && (!Number.isInteger(opts.length) || opts.length < 0)) {
        throw ioError("length must be a non-negative integer");
      }
      if (offset > st.size) throw ioError("offset beyond end of file");

      const remaining = st.size - offset;
      const want = opts.length === undefined ? remaining : Math.min(opts.length, remaining);
      const buf = await readRange(file, offset, want);
      const mime = detectMime(file, buf.subarray(0, 16));

      let encoding: ContentEncoding = "base64";
      let content = "";
      if ((opts.encoding ?? "utf8") === "utf8" && (isTextMime(mime) || mime === "application/octet-stream")) {
        const text = decodeText(buf);
        if (text !== null) {
          encoding = "utf8";
          content = text;
        }
      }
      if (encoding === "base64") content = buf.toString("base64");

      const out: FileContent = {
        path: file,
        content,
        encoding,
        mime_type: mime,
        size: st.size,
        modified: Math.floor(st.mtimeMs),
      };
      if (opts.length !== undefined && buf.length < opts.length) out.truncated_at = buf.length;
      return out;
    });
  }

  readFileChunk(requested: string, chunkIndex: number, chunkSize = DEFAULT_CHUNK_SIZE): Promise<FileChunk> {
    return this.exec(requested, async (policy) => {
      if (!Number.isInteger(chunkSize) || chunkSize < 1 || chunkSize > MAX_CHUNK_SIZE) {
        throw ioError(`chunk size must be between 1 and ${MAX_CHUNK_SIZE}`);
      }
      if (!Number.isInteger(chunkIndex) || chunkIndex < 0) throw ioError("chunk index must be a non-negative integer");

      const file = await validateExisting(policy, requested);
      const st = await fsp.stat(file);
      if (st.isDirectory()) throw notAFile(requested);

      const totalChunks = Math.max(1, Math.ceil(st.size / chunkSize));
      if (chunkIndex >= totalChunks) throw notFound(`${requested}#chunk${chunkIndex}`);
      const offset = chunkIndex * chunkSize;
      const data = await readRange(file, offset, Math.min(chunkSize, st.size - offset));
      return {
        path: file,
        chunk_index: chunkIndex,
        total_chunks: totalChunks,
        total_size: st.size,
        data: data.toString("base64"),
        checksum: createHash("md5").update(data).digest("hex"),
        is_last: chunkIndex === totalChunks - 1,
      };
    });
  }

  writeFile(requested: string, content: string, opts: WriteOptions = {}): Promise<WriteResult> {
    return this.exec(requested, (policy) => this.doWrite(policy, requested, content, opts));
  }

  private async doWrite(policy: SandboxPolicy, requested: string, content: string, opts: WriteOptions): Promise<WriteResult> {
    const createParents = opts.createParents ?? false;
    const target = await resolveNew(policy, requested, { allowMissingParents: createParents });
    ensureWritable(policy, target, requested);

    let data: Buffer;
    if ((opts.encoding ?? "utf8") === "base64") {
      const decoded = decodeBase64Strict(content);
      if (!decoded) throw new FsError({ code: "invalid_encoding", path: requested });
      data = decoded;
    } else {
      data = Buffer.from(content, "utf8");
    }
    if (data.length > policy.maxWriteBytes) {
      throw new FsError({ code: "file_too_large", path: requested, size: data.length, max_size: policy.maxWriteBytes });
    }

    const existing = await lstatIfPresent(target);
    if (existing?.isDirectory()) throw notAFile(requested);

    const parent = path.dirname(target);
    if (createParents) {
      try {
        await fsp.mkdir(parent, { recursive: true });
      } catch (err) {
        const mapped = fromNodeError(err, requested);
        if (mapped.code === "already_exists" || mapped.code === "not_a_directory") throw notADirectory(path.dirname(requested));
        throw mapped;
      }
    }

    await atomicWrite(target, data, existing ? existing.mode & 0o777 : undefined);
    return { path: target, bytes: data.length };
  }

  createDirectory(requested: string, recursive = false): Promise<WriteResult> {
    return this.exec(requested, async (policy) => {
      const target = await resolveNew(policy, requested, { allowMissingParents: recursive });
      ensureWritable(policy, target, requested);
      if (await lstatIfPresent(target)) throw alreadyExists(requested);
      await fsp.mkdir(target, { recursive });
      return { path: target, bytes: 0 };
    });
  }

  deletePath(requested: string, recursive = false): Promise<WriteResult> {
    return this.exec(requested, async (policy) => {
      const leaf = await resolveEntry(policy, requested);
      ensureNotRoot(policy, leaf, requested);
      ensureWritable(policy, leaf, requested);

      const st = await fsp.lstat(leaf);
      if (st.isDirectory()) {
        if (recursive) {
          await fsp.rm(leaf, { recursive: true });
        } else {
          const children = await fsp.readdir(leaf);
          if (children.length > 0) throw new FsError({ code: "not_empty", path: requested });
          await fsp.rmdir(leaf);
        }
      } else {
        await fsp.unlink(leaf);
      }
      return { path: leaf, bytes: 0 };
    });
  }

  renamePath(oldRequested: string, newRequested: string): Promise<WriteResult> {
    return this.exec(oldRequested, async (policy) => {
      const leaf = await resolveEntry(policy, oldRequested);
      ensureNotRoot(policy, leaf, oldRequested);
      const dest = await resolveNew(policy, newRequested);
      ensureWritable(policy, leaf, oldRequested);
      ensureWritable(policy, dest, newRequested);
      if (await lstatIfPresent(dest)) throw alreadyExists(newRequested);
      const st = await fsp.lstat(leaf);
      if (st.isDirectory()) {
        if (isUnderRoot(dest, leaf)) throw ioError("cannot move a directory into itself");
        await this.ensureTreeMovable(policy, leaf, dest);
      }
      await fsp.rename(leaf, dest);
      return { path: dest, bytes: 0 };
    });
  }

  // Every entry of a moved directory gets a new path; each one must be writable under the policy.
  private async ensureTreeMovable(policy: SandboxPolicy, src: string, dest: string): Promise<void> {
    for (const name of await fsp.readdir(src)) {
      const to = path.join(dest, name);
      ensureCreatable(policy, to);
      const lst = await lstatIfPresent(path.join(src, name));
      if (lst?.isDirectory()) await this.ensureTreeMovable(policy, path.join(src, name), to);
    }
  }

  copyPath(sourceRequested: string, destRequested: string, recursive = false): Promise<WriteResult> {
    return this.exec(sourceRequested, async (policy) => {
      const src = await validateExisting(policy, sourceRequested);
      const dest = await resolveNew(policy, destRequested);
      ensureWritable(policy, dest, destRequested);
      if (await lstatIfPresent(dest)) throw alreadyExists(destRequested);

      const st = await fsp.stat(src);
      if (st.isDirectory()) {
        if (!recursive) throw notAFile(sourceRequested);
        if (isUnderRoot(dest, src)) throw ioError("cannot copy a directory into itself");
        // The whole tree is checked before the first byte is written.
        const steps: CopyStep[] = [];
        await this.planCopy(policy, src, dest, steps);
        let bytes = 0;
        for (const step of steps) {
          if (step.kind === "dir") {
            await fsp.mkdir(step.to);
          } else {
            await fsp.copyFile(step.from, step.to, fsConstants.COPYFILE_EXCL);
            bytes += step.size;
          }
        }
        return { path: dest, bytes };
      }
      this.ensureCopySize(policy, st.size, sourceRequested);
      await fsp.copyFile(src, dest, fsConstants.COPYFILE_EXCL);
      return { path: dest, bytes: st.size };
    });
  }

  private ensureCopySize(policy: SandboxPolicy, size: number, requested: string): void {
    if (size > policy.maxWriteBytes) {
      throw new FsError({ code: "file_too_large", path: requested, size, max_size: policy.maxWriteBytes });
    }
  }

  private async planCopy(policy: SandboxPolicy, src: string, dest: string, steps: CopyStep[]): Promise<void> {
    steps.push({ kind: "dir", to: dest });
    for (const name of await fsp.readdir(src)) {
      const from = path.join(src, name);
      const to = path.join(dest, name);
      if (isDenied(policy, from)) continue;
      const lst = await lstatIfPresent(from);
      if (!lst) continue;

      let source = from;
      let st = lst;
      if (lst.isSymbolicLink()) {
        // Linked files are copied by content when the link validates; linked directories are skipped.
        try {
          source = await validateExisting(policy, from);
        } catch (err) {
          if (err instanceof FsError) continue;
          throw err;
        }
        st = await fsp.stat(source);
        if (st.isDirectory()) continue;
      }

      if (st.isDirectory()) {
        ensureCreatable(policy, to);
        await this.planCopy(policy, source, to, steps);
      } else if (st.isFile()) {
        ensureCreatable(policy, to);
        this.ensureCopySize(policy, st.size, from);
        steps.push({ kind: "file", from: source, to, size: st.size });
      }
    }
  }

  getFileInfo(requested: string): Promise<FileEntry> {
    return this.exec(requested, async (policy) => {
      const leaf = await resolveEntry(policy, requested);
      return await statEntry(leaf, policy);
    });
  }

  searchFiles(requested: string, opts: SearchOptions): Promise<SearchResults> {
    return this.exec(requested, async (policy) => {
      const root = await validateExisting(policy, requested);
      const st = await fsp.stat(root);
      if (!st.isDirectory()) throw notADirectory(requested);
      return await searchFiles(policy, root, opts, { gitIgnore: this.gitStatus });
    });
  }

  /** Writes an upload beneath `<project>/.relayterm/uploads/` with a sanitized, collision-free name. */
  uploadFile(projectPath: string, fileName: string, contentBase64: string): Promise<WriteResult> {
    return this.exec(projectPath, async (policy) => {
      const project = await validateExisting(policy, projectPath);
      const st = await fsp.stat(project);
      if (!st.isDirectory()) throw notADirectory(projectPath);
      const dest = uploadDestination(project, fileName);
      return await this.doWrite(policy, dest, contentBase64, { encoding: "base64", createParents: true });
    });
  }

  /** Canonical path of an existing directory inside the sandbox. */
  resolveDirectory(requested: string): Promise<string> {
    return this.exec(requested, async (policy) => {
      const dir = await validateExisting(policy, requested);
      const st = await fsp.stat(dir);
      if (!st.isDirectory()) throw notADirectory(requested);
      return dir;
    });
  }

  homeDirectory(home: string): string | null {
    const policy = this.policies.current;
    if (policy.roots.some((r) => isUnderRoot(home, r))) return home;
    return policy.roots[0] ?? null;
  }
}
