import type { RawData, WebSocket } from "ws";
import { nanoid } from "nanoid";
import { TokenBucket } from "./rate_limit.js";
import type { ServerMessage, WrapperServerMessage } from "../protocol.js";
import { createLogger, errorMessage } from "../log.js";

const log = createLogger("ws");

export const LAG_THRESHOLD_BYTES = 8 * 1024 * 1024;

export const CLOSE_UNAUTHORIZED = 4401;
export const CLOSE_FORBIDDEN = 4403;
export const CLOSE_CORRUPT_STREAM = 1007;
export const CLOSE_GOING_AWAY = 1001;

export type ConnectionKind = "pending" | "client" | "wrapper";

export function rawToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  return Buffer.from(new Uint8Array(data)).toString("utf8");
}

/**
 * One socket on /ws. Starts as "pending"; its first message makes it a remote client or a
 * wrapper. Sessions and watches are referenced by id/path only.
 */
export class Connection {
  readonly id = nanoid(10);
  kind: ConnectionKind = "pending";
  identified = false;
  clientVersion = "";
  // Wrapper connections own at most one session.
  sessionId: string | null = null;
  readonly subscriptions = new Set<string>();
  // Canonical directory -> request id of the watch_directory that created it.
  readonly watches = new Map<string, string>();
  private readonly lagging = new Set<string>();
  private open = true;

  constructor(
    private readonly socket: WebSocket,
    readonly remoteAddress: string | undefined,
    readonly headerToken: string | null,
    readonly bucket: TokenBucket,
  ) {}

  get closed(): boolean {
    return !this.open;
  }

  markClosed(): void {
    this.open = false;
  }

  send(msg: ServerMessage | WrapperServerMessage): boolean {
    return this.sendRaw(JSON.stringify(msg));
  }

  sendRaw(payload: string): boolean {
    if (!this.open || this.socket.readyState !== this.socket.OPEN) return false;
    this.socket.send(payload, (err) => {
      if (err) log.debug("send failed", this.id, errorMessage(err));
    });
    return true;
  }

  /** Live PTY bytes. Dropped while the peer is more than LAG_THRESHOLD_BYTES behind. */
  sendOutput(sessionId: string, chunk: Buffer): void {
    if (this.socket.bufferedAmount > LAG_THRESHOLD_BYTES) {
      if (!this.lagging.has(sessionId)) {
        this.lagging.add(sessionId);
        log.warn("output lagged", this.id, sessionId, this.socket.bufferedAmount);
        this.send({ type: "error", code: "output_lagged", message: "output dropped: client is too slow", session_id: sessionId });
      }
      return;
    }
    this.lagging.delete(sessionId);
    this.send({ type: "pty_bytes", session_id: sessionId, data: chunk.toString("base64") });
  }

  close(code: number, reason: string): void {
    if (!this.open) return;
    this.open = false;
    this.socket.close(code, reason);
  }
}
