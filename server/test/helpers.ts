import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { RawData, WebSocket } from "ws";
import { z } from "zod";
import { ConfigSchema, type Config } from "../src/config.js";

export function sleep(ms: number) {
  return new Promise((r) => setTimeout(r, ms));
}

export async function waitFor(fn: () => boolean, timeoutMs = 2000) {
  const start = Date.now();
  while (Date.now() - start < timeoutMs) {
    if (fn()) return;
    await sleep(20);
  }
  throw new Error("timeout waiting for condition");
}

/** A fresh directory, canonicalized (macOS tmp lives behind a symlink). */
export function tmpDir(prefix = "relayterm-test-") {
  return fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), prefix)));
}

export function testConfig(sections: Record<string, unknown> = {}): Config {
  return ConfigSchema.parse({ auth: { token: "test-secret" }, ...sections });
}

const FrameSchema = z.object({ type: z.string() }).passthrough();
export type Frame = z.infer<typeof FrameSchema>;

function rawText(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  return Buffer.from(new Uint8Array(data)).toString("utf8");
}

/** Collects every JSON frame a socket receives. */
export class FrameLog {
  readonly frames: Frame[] = [];
  closeCode: number | null = null;

  constructor(readonly ws: WebSocket) {
    ws.on("message", (data: RawData) => {
      const parsed = FrameSchema.safeParse(JSON.parse(rawText(data)));
      if (parsed.success) this.frames.push(parsed.data);
    });
    ws.on("close", (code: number) => {
      this.closeCode = code;
    });
  }

  send(msg: Record<string, unknown>) {
    this.ws.send(JSON.stringify(msg));
  }

  sendText(text: string) {
    this.ws.send(text);
  }

  of(type: string): Frame[] {
    return this.frames.filter((f) => f.type === type);
  }

  /** Waits until `count` frames of `type` arrived and returns the last of them. */
  async next(type: string, count = 1, timeoutMs = 2000): Promise<Frame> {
    await waitFor(() => this.of(type).length >= count, timeoutMs);
    const all = this.of(type);
    const f = all[count - 1];
    if (!f) throw new Error(`no ${type} frame`);
    return f;
  }

  async closed(timeoutMs = 2000): Promise<number> {
    await waitFor(() => this.closeCode !== null, timeoutMs);
    return this.closeCode ?? 0;
  }
}
