import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { configDir } from "./config.js";
import { createLogger, errorMessage } from "./log.js";

const log = createLogger("pid");

const PidInfoSchema = z.object({
  pid: z.number().int().positive(),
  port: z.number().int().min(1).max(65535),
  bind: z.string().min(1),
  startedAt: z.number().int().default(0),
});

export type PidInfo = z.infer<typeof PidInfoSchema>;

export function pidPath(): string {
  return path.join(configDir(), "server.pid");
}

export function readPidInfo(p = pidPath()): PidInfo | null {
  let raw: string;
  try {
    raw = fs.readFileSync(p, "utf8");
  } catch (err) {
    log.debug("no pid file", p, errorMessage(err));
    return null;
  }
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (err) {
    log.warn("unreadable pid file", p, errorMessage(err));
    return null;
  }
  const parsed = PidInfoSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

export function writePidFile(info: PidInfo, p = pidPath()): void {
  fs.mkdirSync(path.dirname(p), { recursive: true });
  fs.writeFileSync(p, JSON.stringify(info), "utf8");
}

/** Removes the pid file only if it still names `pid`. */
export function clearPidFile(pid = process.pid, p = pidPath()): boolean {
  const info = readPidInfo(p);
  if (info && info.pid !== pid) return false;
  try {
    fs.unlinkSync(p);
    return true;
  } catch (err) {
    log.debug("pid file already gone", p, errorMessage(err));
    return false;
  }
}

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: alive, owned by someone else.
    return err instanceof Error && "code" in err && err.code === "EPERM";
  }
}
