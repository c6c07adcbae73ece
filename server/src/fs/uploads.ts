import path from "node:path";
import { randomBytes } from "node:crypto";

export const UPLOAD_DIR_NAME = ".relayterm";

// Uploads land in <project>/.relayterm/uploads/<YYYYMMDD-HHMMSS>-<8 hex>-<name> and are then written
// atomically through a "<name>.tmp-<id>" sibling. The name budget keeps that temp component under
// conservative filesystem limits.
const COMPONENT_BUDGET_BYTES = 90;
const DEST_PREFIX_BYTES = 25;
const TEMP_SUFFIX_BYTES = 41;
export const MAX_UPLOAD_NAME_BYTES = COMPONENT_BUDGET_BYTES - DEST_PREFIX_BYTES - TEMP_SUFFIX_BYTES;

export const FALLBACK_UPLOAD_NAME = "attachment.bin";

const RESERVED = new Set([
  "CON",
  "PRN",
  "AUX",
  "NUL",
  ...Array.from({ length: 9 }, (_, i) => `COM${i + 1}`),
  ...Array.from({ length: 9 }, (_, i) => `LPT${i + 1}`),
]);

const byteLength = (s: string) => Buffer.byteLength(s, "utf8");

export function isWindowsReservedName(stem: string): boolean {
  return RESERVED.has(stem.trim().toUpperCase());
}

function trimDots(s: string): string {
  return s.replace(/^\.+/, "").replace(/\.+$/, "").trim();
}

export function truncateUtf8(input: string, maxBytes: number): string {
  let out = "";
  let used = 0;
  for (const ch of input) {
    const n = byteLength(ch);
    if (used + n > maxBytes) break;
    out += ch;
    used += n;
  }
  return out;
}

export function truncatePreservingExtension(input: string, maxBytes: number): string {
  if (byteLength(input) <= maxBytes) return input;
  const dot = input.lastIndexOf(".");
  if (dot <= 0 || dot === input.length - 1) return truncateUtf8(input, maxBytes);
  const ext = input.slice(dot);
  if (byteLength(ext) >= maxBytes) return truncateUtf8(input, maxBytes);
  const stem = trimDots(truncateUtf8(input.slice(0, dot), maxBytes - byteLength(ext)));
  if (!stem) return truncateUtf8(input, maxBytes);
  return stem + ext;
}

export function sanitizeUploadName(fileName: string): string {
  const trimmed = fileName.trim();
  const candidate = trimmed || FALLBACK_UPLOAD_NAME;

  // eslint-disable-next-line no-control-regex
  let name = candidate.replace(/[\/\\:*?"<>|\u0000-\u001f\u007f-\u009f]/g, "_");
  name = name.split(/\s+/).filter(Boolean).join("_");
  name = trimDots(name);
  if (!name) return FALLBACK_UPLOAD_NAME;

  const stem = (name.split(".")[0] ?? "").replace(/[ .]+$/, "");
  if (isWindowsReservedName(stem)) name += "_file";

  if (byteLength(name) > MAX_UPLOAD_NAME_BYTES) {
    name = trimDots(truncatePreservingExtension(name, MAX_UPLOAD_NAME_BYTES));
    if (!name) return FALLBACK_UPLOAD_NAME;
  }
  return name;
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

export function uploadStamp(d: Date): string {
  return (
    `${d.getUTCFullYear()}${pad(d.getUTCMonth() + 1)}${pad(d.getUTCDate())}` +
    `-${pad(d.getUTCHours())}${pad(d.getUTCMinutes())}${pad(d.getUTCSeconds())}`
  );
}

export function uploadsDir(projectPath: string): string {
  return path.join(projectPath, UPLOAD_DIR_NAME, "uploads");
}

export function uploadDestination(projectPath: string, fileName: string, now = new Date()): string {
  const unique = randomBytes(4).toString("hex");
  return path.join(uploadsDir(projectPath), `${uploadStamp(now)}-${unique}-${sanitizeUploadName(fileName)}`);
}
