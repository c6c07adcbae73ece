import path from "node:path";
import table from "./mime_types.json" with { type: "json" };

const BY_EXTENSION = new Map<string, string>(Object.entries(table));

const TEXTUAL_APPLICATION = new Set([
  "application/json",
  "application/jsonl",
  "application/xml",
  "application/yaml",
  "application/toml",
  "application/sql",
  "application/graphql",
  "image/svg+xml",
]);

export function mimeFromName(name: string): string | undefined {
  const base = path.basename(name).toLowerCase();
  const dot = base.lastIndexOf(".");
  const ext = dot >= 0 ? base.slice(dot + 1) : base;
  return BY_EXTENSION.get(ext);
}

// Magic numbers for the binary formats clients preview most often.
export function mimeFromBytes(head: Uint8Array): string | undefined {
  const at = (i: number) => head[i] ?? -1;
  if (at(0) === 0x89 && at(1) === 0x50 && at(2) === 0x4e && at(3) === 0x47) return "image/png";
  if (at(0) === 0xff && at(1) === 0xd8 && at(2) === 0xff) return "image/jpeg";
  if (at(0) === 0x47 && at(1) === 0x49 && at(2) === 0x46 && at(3) === 0x38) return "image/gif";
  if (at(0) === 0x25 && at(1) === 0x50 && at(2) === 0x44 && at(3) === 0x46) return "application/pdf";
  if (at(0) === 0x50 && at(1) === 0x4b && at(2) === 0x03 && at(3) === 0x04) return "application/zip";
  if (at(0) === 0x1f && at(1) === 0x8b) return "application/gzip";
  if (at(8) === 0x57 && at(9) === 0x45 && at(10) === 0x42 && at(11) === 0x50) return "image/webp";
  return undefined;
}

export function detectMime(name: string, head?: Uint8Array): string {
  return mimeFromName(name) ?? (head ? mimeFromBytes(head) : undefined) ?? "application/octet-stream";
}

export function isTextMime(mime: string): boolean {
  return mime.startsWith("text/") || TEXTUAL_APPLICATION.has(mime);
}
