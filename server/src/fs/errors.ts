export type FsErrorDetail =
  | { code: "not_found"; path: string }
  | { code: "not_a_directory"; path: string }
  | { code: "not_a_file"; path: string }
  | { code: "already_exists"; path: string }
  | { code: "not_empty"; path: string }
  | { code: "file_too_large"; path: string; size: number; max_size: number }
  | { code: "permission_denied"; path: string; reason: string }
  | { code: "path_traversal"; attempted_path: string }
  | { code: "symlink_escape"; path: string }
  | { code: "invalid_encoding"; path: string }
  | { code: "io_error"; message: string }
  | { code: "rate_limited"; retry_after_ms: number };

export type FsErrorCode = FsErrorDetail["code"];

function describe(detail: FsErrorDetail): string {
  switch (detail.code) {
    case "not_found":
      return `not found: ${detail.path}`;
    case "not_a_directory":
      return `not a directory: ${detail.path}`;
    case "not_a_file":
      return `not a file: ${detail.path}`;
    case "already_exists":
      return `already exists: ${detail.path}`;
    case "not_empty":
      return `directory not empty: ${detail.path}`;
    case "file_too_large":
      return `file too large: ${detail.path} (${detail.size} > ${detail.max_size} bytes)`;
    case "permission_denied":
      return `permission denied: ${detail.path} (${detail.reason})`;
    case "path_traversal":
      return `path traversal rejected: ${detail.attempted_path}`;
    case "symlink_escape":
      return `symlink escapes allowed roots: ${detail.path}`;
    case "invalid_encoding":
      return `invalid encoding: ${detail.path}`;
    case "io_error":
      return `io error: ${detail.message}`;
    case "rate_limited":
      return `rate limited, retry after ${detail.retry_after_ms}ms`;
  }
}

export class FsError extends Error {
  readonly detail: FsErrorDetail;

  constructor(detail: FsErrorDetail) {
    super(describe(detail));
    this.name = "FsError";
    this.detail = detail;
  }

  get code(): FsErrorCode {
    return this.detail.code;
  }
}

export const notFound = (p: string) => new FsError({ code: "not_found", path: p });
export const notADirectory = (p: string) => new FsError({ code: "not_a_directory", path: p });
export const notAFile = (p: string) => new FsError({ code: "not_a_file", path: p });
export const alreadyExists = (p: string) => new FsError({ code: "already_exists", path: p });
export const permissionDenied = (p: string, reason: string) => new FsError({ code: "permission_denied", path: p, reason });
export const pathTraversal = (p: string) => new FsError({ code: "path_traversal", attempted_path: p });
export const ioError = (message: string) => new FsError({ code: "io_error", message });

const ERRNO_TEXT: Record<string, string> = {
  EIO: "input/output error",
  ENOSPC: "no space left on device",
  EROFS: "read-only file system",
  EMFILE: "too many open files",
  ENAMETOOLONG: "file name too long",
  EXDEV: "cross-device link not permitted",
  EBUSY: "resource busy",
  ELOOP: "too many levels of symbolic links",
  EINVAL: "invalid argument",
};

export function errnoCode(err: unknown): string | null {
  if (err instanceof Error && "code" in err && typeof err.code === "string") return err.code;
  return null;
}

// Maps an OS error raised while touching `p` into the wire taxonomy. Messages never carry host paths.
export function fromNodeError(err: unknown, p: string): FsError {
  if (err instanceof FsError) return err;
  const code = errnoCode(err);
  switch (code) {
    case "ENOENT":
      return notFound(p);
    case "ENOTDIR":
      return notADirectory(p);
    case "EISDIR":
      return notAFile(p);
    case "EEXIST":
      return alreadyExists(p);
    case "ENOTEMPTY":
      return new FsError({ code: "not_empty", path: p });
    case "EACCES":
    case "EPERM":
      return permissionDenied(p, "operating system denied access");
    case null:
      return ioError("unexpected failure");
    default:
      return ioError(`${code}: ${ERRNO_TEXT[code] ?? "operation failed"}`);
  }
}
