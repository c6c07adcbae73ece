import path from "node:path";
import { nanoid } from "nanoid";
import WebSocket from "ws";
import { TOKEN_HEADER } from "../auth.js";
import { rawToString } from "../hub/connection.js";
import { WrapperServerMessageSchema, type WrapperMessage } from "../protocol.js";
import { PtySession, clampSize } from "../sessions/session_manager.js";
import { createLogger, errorMessage } from "../log.js";

const log = createLogger("wrap");

// Output produced before the hub confirms registration is held up to this many bytes.
export const PENDING_OUTPUT_BYTES = 256 * 1024;

export type PtyLike = Pick<PtySession, "write" | "resize">;

export type Size = { cols: number; rows: number };

type OutgoingWrapperMessage =
  | Extract<WrapperMessage, { type: "register_pty" }>
  | { type: "pty_output"; data: string }
  | { type: "session_ended"; exit_code: number | null }
  | { type: "ping" };

export type RegisterInfo = {
  sessionId: string;
  name: string;
  command: string;
  projectPath: string;
  token: string;
};

/**
 * Protocol half of the wrapper: turns PTY output into pty_output frames and applies the hub's
 * input and resize requests to the local PTY. `(0,0)` hands sizing back to the local terminal.
 */
export class WrapperLink {
  private registered = false;
  private pending: Buffer[] = [];
  private pendingBytes = 0;
  private remoteSize: Size | null = null;

  constructor(
    private readonly pty: PtyLike,
    private readonly send: (msg: OutgoingWrapperMessage) => void,
    private readonly localSize: () => Size,
  ) {}

  get isRegistered(): boolean {
    return this.registered;
  }

  /** True while a remote viewer dictates the PTY size. */
  get remotelySized(): boolean {
    return this.remoteSize !== null;
  }

  register(info: RegisterInfo): void {
    const size = this.localSize();
    this.send({
      type: "register_pty",
      session_id: info.sessionId,
      name: info.name,
      command: info.command,
      project_path: info.projectPath,
      cols: size.cols,
      rows: size.rows,
      auth_token: info.token,
    });
  }

  output(chunk: Buffer): void {
    if (this.registered) {
      this.send({ type: "pty_output", data: chunk.toString("base64") });
      return;
    }
    if (this.pendingBytes + chunk.length > PENDING_OUTPUT_BYTES) return;
    this.pending.push(chunk);
    this.pendingBytes += chunk.length;
  }

  ended(exitCode: number | null): void {
    this.send({ type: "session_ended", exit_code: exitCode });
  }

  /** Local terminal changed size; ignored while a remote viewer holds the size. */
  localResized(): void {
    if (this.remoteSize) return;
    const size = this.localSize();
    this.pty.resize(size.cols, size.rows);
  }

  /** Returns an error message from the hub, if the frame carried one. */
  handle(raw: string): string | null {
    let value: unknown;
    try {
      value = JSON.parse(raw);
    } catch (err) {
      log.warn("unparseable frame from hub", errorMessage(err));
      return null;
    }
    const parsed = WrapperServerMessageSchema.safeParse(value);
    if (!parsed.success) {
      log.debug("ignored frame", parsed.error.issues[0]?.message);
      return null;
    }
    const msg = parsed.data;
    switch (msg.type) {
      case "registered":
        this.registered = true;
        if (this.pending.length > 0) {
          this.send({ type: "pty_output", data: Buffer.concat(this.pending).toString("base64") });
        }
        this.pending = [];
        this.pendingBytes = 0;
        return null;
      case "input":
        this.pty.write(Buffer.from(msg.data, "base64"));
        return null;
      case "resize":
        if (msg.cols === 0 && msg.rows === 0) {
          this.remoteSize = null;
          const local = this.localSize();
          this.pty.resize(local.cols, local.rows);
        } else {
          this.remoteSize = clampSize(msg.cols, msg.rows);
          this.pty.resize(this.remoteSize.cols, this.remoteSize.rows);
        }
        return null;
      case "pong":
        return null;
      case "error":
        return `${msg.code}: ${msg.message}`;
    }
  }
}

export type WrapOptions = {
  command: string;
  args: string[];
  name?: string;
  cwd?: string;
  port: number;
  host?: string;
  token: string;
};

function terminalSize(): Size {
  return { cols: process.stdout.columns || 100, rows: process.stdout.rows || 30 };
}

/**
 * Runs `command` on a PTY attached to this terminal and mirrors it to the hub. Local use keeps
 * working if the hub is unreachable. Resolves with the child's exit code.
 */
export async function runWrapper(opts: WrapOptions): Promise<number> {
  const cwd = opts.cwd ?? process.cwd();
  const sessionId = nanoid(12);
  const local = terminalSize();
  const pty = new PtySession({
    id: sessionId,
    command: opts.command,
    args: opts.args,
    cwd,
    name: opts.name,
    cols: local.cols,
    rows: local.rows,
    env: { RELAYTERM_SESSION_ID: sessionId },
  });

  const host = opts.host ?? "127.0.0.1";
  const ws = new WebSocket(`ws://${host}:${opts.port}/ws`, {
    headers: { [TOKEN_HEADER]: opts.token },
    perMessageDeflate: false,
    handshakeTimeout: 5000,
  });
  const link = new WrapperLink(
    pty,
    (msg) => {
      if (ws.readyState !== WebSocket.OPEN) return;
      ws.send(JSON.stringify(msg), (err) => {
        if (err) log.debug("send failed", errorMessage(err));
      });
    },
    terminalSize,
  );

  ws.on("open", () => {
    link.register({
      sessionId,
      name: opts.name ?? path.basename(opts.command),
      command: [opts.command, ...opts.args].join(" "),
      projectPath: cwd,
      token: opts.token,
    });
  });
  ws.on("message", (data) => {
    const problem = link.handle(rawToString(data));
    if (problem) log.warn("hub:", problem);
  });
  ws.on("close", (code) => {
    if (link.isRegistered) log.warn(`hub connection closed (${code}); continuing locally`);
  });
  ws.on("error", (err) => log.warn("hub unreachable, running locally:", err.message));

  const stdin = process.stdin;
  const wasRaw = stdin.isTTY ? stdin.isRaw : false;
  if (stdin.isTTY) stdin.setRawMode(true);
  const onStdin = (chunk: Buffer) => pty.write(chunk);
  const onResize = () => link.localResized();
  stdin.on("data", onStdin);
  stdin.resume();
  process.stdout.on("resize", onResize);

  pty.onData((chunk) => {
    process.stdout.write(chunk);
    link.output(chunk);
  });

  const status = await pty.exited;
  link.ended(status.exitCode);

  stdin.off("data", onStdin);
  process.stdout.off("resize", onResize);
  if (stdin.isTTY) stdin.setRawMode(wasRaw);
  stdin.pause();
  ws.close(1000, "session ended");
  return status.exitCode ?? (status.signal === null ? 0 : 128 + status.signal);
}
