import os from "node:os";
import path from "node:path";
import type { IncomingHttpHeaders } from "node:http";
import { createHash } from "node:crypto";
import type { RawData, WebSocket } from "ws";
import type { Config } from "../config.js";
import { extractToken, isLoopback, tokenMatches } from "../auth.js";
import { FsError } from "../fs/errors.js";
import { FileSystemEngine } from "../fs/operations.js";
import { isDenied, type PolicyStore } from "../fs/policy.js";
import { ChangeWatcher, type ChangeEvent } from "../fs/watcher.js";
import { WorkerPool } from "../fs/worker_pool.js";
import { approvalInput, type WaitType } from "../detect/grammars.js";
import type { DetectorEvent } from "../detect/wait_detector.js";
import {
  ClientMessageSchema,
  FS_REQUEST_TYPES,
  WrapperMessageSchema,
  isFsRequest,
  type ClientMessage,
  type ServerMessage,
  type WrapperMessage,
} from "../protocol.js";
import { waitingNotification, type PushRegistry } from "../push.js";
import { allowedCommandSet, checkSpawnRequest } from "../sessions/command_policy.js";
import {
  SessionManager,
  clampSize,
  DEFAULT_COLS,
  DEFAULT_ROWS,
  type PtySession,
} from "../sessions/session_manager.js";
import { SessionTable, type Session } from "../sessions/session_table.js";
import type { Store } from "../store.js";
import { createLogger, errorMessage } from "../log.js";
import { TokenBucket } from "./rate_limit.js";
import {
  CLOSE_CORRUPT_STREAM,
  CLOSE_FORBIDDEN,
  CLOSE_GOING_AWAY,
  CLOSE_UNAUTHORIZED,
  Connection,
  rawToString,
} from "./connection.js";
import { handleFsRequest, type FsContext } from "./fs_handlers.js";
import { WatchRegistry } from "./watch_registry.js";

const log = createLogger("hub");
const wsLog = createLogger("ws");

export const SWEEP_INTERVAL_MS = 60_000;

export type HubOptions = {
  config: Config;
  policies: PolicyStore;
  push: PushRegistry;
  store?: Store | null;
  serverVersion: string;
  watcher?: ChangeWatcher;
  ptys?: SessionManager;
  homeDir?: string;
  deviceName?: string;
  // Which peers may register wrappers. Loopback only unless overridden.
  isLocalAddress?: (ip: string | undefined) => boolean;
};

export type PeerInfo = { ip: string | undefined; headers: IncomingHttpHeaders };

function messageType(value: unknown): string | null {
  if (typeof value !== "object" || value === null || !("type" in value)) return null;
  return typeof value.type === "string" ? value.type : null;
}

function stringField(value: unknown, key: string): string {
  if (typeof value !== "object" || value === null || !(key in value)) return "";
  const v: unknown = Reflect.get(value, key);
  return typeof v === "string" ? v : "";
}

const FS_TYPES: ReadonlySet<string> = new Set(FS_REQUEST_TYPES);

// Keystrokes from a touch keyboard end in "\n"; terminals expect CR.
export function normalizeInput(text: string, raw: boolean): string {
  if (raw) return text;
  if (text.endsWith("\r\n")) return `${text.slice(0, -2)}\r`;
  if (text.endsWith("\n")) return `${text.slice(0, -1)}\r`;
  return text;
}

/**
 * Connection state machines for remote clients and wrappers, plus the session table they share.
 * Everything runs on the event loop; sessions and connections refer to each other by id.
 */
export class Hub {
  readonly sessions: SessionTable;
  readonly engine: FileSystemEngine;
  private readonly connections = new Map<string, Connection>();
  private readonly watcher: ChangeWatcher;
  private readonly watches: WatchRegistry;
  private readonly ptys: SessionManager;
  private readonly push: PushRegistry;
  private readonly store: Store | null;
  private readonly policies: PolicyStore;
  private readonly serverVersion: string;
  private readonly homeDir: string;
  private readonly deviceName: string;
  private readonly deviceId: string;
  private readonly isLocalAddress: (ip: string | undefined) => boolean;
  private readonly unsubscribeWatcher: () => void;
  private config: Config;
  private sweepTimer: ReturnType<typeof setInterval> | null = null;

  constructor(opts: HubOptions) {
    this.config = opts.config;
    this.policies = opts.policies;
    this.push = opts.push;
    this.store = opts.store ?? null;
    this.serverVersion = opts.serverVersion;
    this.homeDir = opts.homeDir ?? os.homedir();
    this.deviceName = opts.deviceName ?? os.hostname();
    this.deviceId = createHash("sha256").update(`${os.hostname()}|${this.homeDir}`).digest("hex").slice(0, 16);
    this.isLocalAddress = opts.isLocalAddress ?? isLoopback;
    this.ptys = opts.ptys ?? new SessionManager();
    this.sessions = new SessionTable({
      scrollbackBytes: opts.config.sessions.scrollback_bytes,
      retentionMs: opts.config.sessions.retention_ms,
    });
    this.engine = new FileSystemEngine({
      policies: opts.policies,
      pool: new WorkerPool(opts.config.filesystem.workers),
    });
    this.watcher =
      opts.watcher ??
      new ChangeWatcher({ filter: (p) => !isDenied(this.policies.current, p), policy: () => this.policies.current });
    this.watches = new WatchRegistry(this.watcher, this.engine);
    this.unsubscribeWatcher = this.watcher.subscribe((ev) => this.onFileChange(ev));
  }

  start(): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => this.sweep(), SWEEP_INTERVAL_MS);
    this.sweepTimer.unref();
  }

  /** Applies a reloaded configuration: new sandbox snapshot, limits and allow-list. */
  reload(cfg: Config): void {
    this.config = cfg;
    this.policies.reload(cfg.filesystem);
    log.info("configuration reloaded");
  }

  get token(): string {
    return this.config.auth.token;
  }

  connectionCount(): number {
    return this.connections.size;
  }

  attach(socket: WebSocket, peer: PeerInfo): Connection {
    const limits = this.config.limits;
    const conn = new Connection(
      socket,
      peer.ip,
      extractToken(peer.headers).token,
      new TokenBucket(limits.requests_per_second, limits.burst),
    );
    this.connections.set(conn.id, conn);
    wsLog.debug("open", conn.id, peer.ip ?? "?");

    socket.on("message", (data: RawData, isBinary: boolean) => this.onFrame(conn, data, isBinary));
    socket.on("error", (err: Error) => wsLog.debug("socket error", conn.id, err.message));
    socket.on("close", (code: number) => {
      wsLog.debug("close", conn.id, code);
      this.detach(conn);
    });
    return conn;
  }

  sweep(): string[] {
    const purged = this.sessions.sweep();
    if (purged.length > 0) {
      log.debug("purged sessions", purged);
      this.broadcastSessions();
    }
    return purged;
  }

  async close(): Promise<void> {
    if (this.sweepTimer) clearInterval(this.sweepTimer);
    this.sweepTimer = null;
    for (const conn of this.connections.values()) conn.close(CLOSE_GOING_AWAY, "server shutting down");
    this.connections.clear();
    this.unsubscribeWatcher();
    this.ptys.dispose();
    for (const s of this.sessions.list()) {
      if (s.alive) this.store?.endSession(s.id, null);
    }
    this.sessions.clear();
    await this.watcher.close();
  }

  // ---- framing ----

  private onFrame(conn: Connection, data: RawData, isBinary: boolean): void {
    if (conn.closed) return;
    if (isBinary) {
      this.corrupt(conn, "binary frames are not accepted");
      return;
    }
    let value: unknown;
    try {
      value = JSON.parse(rawToString(data));
    } catch (err) {
      this.corrupt(conn, `frame is not valid JSON: ${errorMessage(err)}`);
      return;
    }
    if (conn.kind === "pending") conn.kind = messageType(value) === "register_pty" ? "wrapper" : "client";

    const task = conn.kind === "wrapper" ? this.onWrapperMessage(conn, value) : this.onClientMessage(conn, value);
    void task.catch((err: unknown) => {
      log.error("handler failed", conn.id, messageType(value), errorMessage(err));
      conn.send({ type: "error", code: "internal_error", message: "internal error" });
    });
  }

  private corrupt(conn: Connection, message: string): void {
    wsLog.debug("corrupt stream", conn.id, message);
    conn.send({ type: "error", code: "corrupt_stream", message });
    conn.close(CLOSE_CORRUPT_STREAM, "corrupt stream");
  }

  private detach(conn: Connection): void {
    conn.markClosed();
    if (!this.connections.delete(conn.id)) return;
    for (const id of [...conn.subscriptions]) this.leave(conn, id);
    void this.watches.release(conn).catch((err: unknown) => log.warn("watch release failed", conn.id, errorMessage(err)));
    if (conn.kind === "wrapper") {
      for (const s of this.sessions.sessionsOwnedBy(conn.id)) this.endSession(s.id, null);
    }
  }

  // ---- remote clients ----

  private rateLimited(conn: Connection, value: unknown): boolean {
    const type = messageType(value);
    if (type === "ping") return false;
    const taken = conn.bucket.tryTake();
    if (taken.ok) return false;
    if (type !== null && FS_TYPES.has(type)) {
      conn.send({
        type: "operation_error",
        request_id: stringField(value, "request_id"),
        operation: type,
        path: stringField(value, "path") || stringField(value, "old_path") || stringField(value, "source"),
        error: { code: "rate_limited", retry_after_ms: taken.retryAfterMs },
      });
    } else {
      conn.send({ type: "error", code: "rate_limited", message: "too many requests", retry_after_ms: taken.retryAfterMs });
    }
    return true;
  }

  private async onClientMessage(conn: Connection, value: unknown): Promise<void> {
    if (this.rateLimited(conn, value)) return;
    const type = messageType(value);
    if (!conn.identified && type !== "ping" && type !== "hello") {
      conn.send({ type: "error", code: "hello_required", message: "send hello first" });
      return;
    }
    const parsed = ClientMessageSchema.safeParse(value);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const message = issue ? `${issue.path.join(".") || "message"}: ${issue.message}` : "invalid message";
      conn.send({ type: "error", code: "invalid_message", message });
      return;
    }
    await this.handleClient(conn, parsed.data);
  }

  private async handleClient(conn: Connection, msg: ClientMessage): Promise<void> {
    if (isFsRequest(msg)) {
      const ctx: FsContext = { engine: this.engine, watches: this.watches, sessions: this.sessions, homeDir: this.homeDir };
      const reply = await handleFsRequest(ctx, conn, msg);
      // Results for connections that went away are dropped by send().
      conn.send(reply);
      return;
    }
    switch (msg.type) {
      case "hello":
        this.hello(conn, msg.auth_token, msg.client_version);
        return;
      case "ping":
        conn.send({ type: "pong" });
        return;
      case "get_sessions":
        conn.send({ type: "sessions", sessions: this.sessions.summaries() });
        return;
      case "subscribe":
        this.subscribe(conn, msg.session_id);
        return;
      case "unsubscribe":
        if (conn.subscriptions.has(msg.session_id)) this.leave(conn, msg.session_id);
        return;
      case "send_input":
        this.sendInput(conn, msg.session_id, normalizeInput(msg.text, msg.raw), msg.client_msg_id);
        return;
      case "pty_resize":
        this.resize(conn, msg.session_id, msg.cols, msg.rows);
        return;
      case "rename_session":
        this.rename(conn, msg.session_id, msg.name ?? msg.new_name);
        return;
      case "get_session_history": {
        const h = this.sessions.history(msg.session_id, msg.max_bytes);
        if (!h) return this.sessionNotFound(conn, msg.session_id);
        conn.send({ type: "session_history", session_id: msg.session_id, data: h.data.toString("base64"), total_bytes: h.totalBytes });
        return;
      }
      case "tool_approval":
        this.approve(conn, msg.session_id, msg.response);
        return;
      case "spawn_session":
        conn.send(await this.spawn(msg));
        return;
      case "register_push_token":
        this.push.register(msg.token, msg.token_type, msg.platform);
        conn.send({ type: "operation_success", request_id: "", operation: msg.type, path: "" });
        return;
      case "unregister_push_token": {
        const had = this.push.unregister(msg.token);
        conn.send({
          type: "operation_success",
          request_id: "",
          operation: msg.type,
          path: "",
          message: had ? "token removed" : "token was not registered",
        });
        return;
      }
    }
  }

  private hello(conn: Connection, authToken: string | undefined, clientVersion: string): void {
    const token = authToken ?? conn.headerToken;
    if (!tokenMatches(token, this.config.auth.token)) {
      log.warn("rejected client", conn.id, conn.remoteAddress ?? "?");
      conn.send({ type: "welcome", server_version: this.serverVersion, authenticated: false });
      conn.send({ type: "error", code: "unauthorized", message: "invalid or missing token" });
      conn.close(CLOSE_UNAUTHORIZED, "unauthorized");
      return;
    }
    conn.identified = true;
    conn.clientVersion = clientVersion;
    conn.send({
      type: "welcome",
      server_version: this.serverVersion,
      authenticated: true,
      device_id: this.deviceId,
      device_name: this.deviceName,
    });
    conn.send({ type: "sessions", sessions: this.sessions.summaries() });
    for (const s of this.sessions.list()) {
      const state = s.detector.state;
      if (state.kind === "waiting") conn.send(this.waitingMessage(s, state.match.prompt, state.match.waitType, state.since));
    }
  }

  private sessionNotFound(conn: Connection, sessionId: string): void {
    conn.send({ type: "error", code: "session_not_found", message: `no session ${sessionId}`, session_id: sessionId });
  }

  private subscribe(conn: Connection, sessionId: string): void {
    const s = this.sessions.get(sessionId);
    if (!s) return this.sessionNotFound(conn, sessionId);
    // Replay and registration happen in this one turn: no chunk is lost or repeated.
    const r = this.sessions.subscribe(sessionId, conn.id, (chunk) => conn.sendOutput(sessionId, chunk));
    if (!r.ok) return this.sessionNotFound(conn, sessionId);
    if (s.alive) conn.subscriptions.add(sessionId);
    conn.send({ type: "session_history", session_id: sessionId, data: r.history.toString("base64"), total_bytes: r.totalBytes });
    if (!s.alive) conn.send({ type: "session_ended", session_id: sessionId, exit_code: s.exitCode });
  }

  private leave(conn: Connection, sessionId: string): void {
    conn.subscriptions.delete(sessionId);
    const remaining = this.sessions.unsubscribe(sessionId, conn.id);
    if (remaining !== 0) return;
    const s = this.sessions.get(sessionId);
    // Last viewer gone: the wrapper goes back to its own terminal size.
    if (s?.alive && s.source.kind === "wrapper") this.toWrapper(s, { type: "resize", cols: 0, rows: 0 });
  }

  private liveSession(conn: Connection, sessionId: string): Session | null {
    const s = this.sessions.get(sessionId);
    if (!s) {
      this.sessionNotFound(conn, sessionId);
      return null;
    }
    if (!s.alive) {
      conn.send({ type: "error", code: "session_ended", message: `session ${sessionId} has ended`, session_id: sessionId });
      return null;
    }
    return s;
  }

  private sendInput(conn: Connection, sessionId: string, data: string, clientMsgId: string | undefined): void {
    const s = this.liveSession(conn, sessionId);
    if (!s) return;
    this.writeInput(s, data);
    if (clientMsgId !== undefined) conn.send({ type: "input_ack", session_id: sessionId, client_msg_id: clientMsgId });
  }

  private writeInput(s: Session, data: string): void {
    if (s.source.kind === "pty") s.source.handle.write(data);
    else this.toWrapper(s, { type: "input", data: Buffer.from(data, "utf8").toString("base64") });
    const ev = this.sessions.noteInput(s.id);
    if (ev) this.onDetectorEvent(s, ev);
  }

  private resize(conn: Connection, sessionId: string, cols: number, rows: number): void {
    if (!conn.subscriptions.has(sessionId)) {
      conn.send({ type: "error", code: "not_subscribed", message: "subscribe before resizing", session_id: sessionId });
      return;
    }
    const s = this.liveSession(conn, sessionId);
    if (!s) return;
    const size = s.source.kind === "pty" ? s.source.handle.resize(cols, rows) : clampSize(cols, rows);
    if (s.source.kind === "wrapper") this.toWrapper(s, { type: "resize", cols: size.cols, rows: size.rows });
    this.sessions.setSize(sessionId, size.cols, size.rows);
    const payload = JSON.stringify({ type: "pty_resized", session_id: sessionId, cols: size.cols, rows: size.rows });
    for (const id of this.sessions.subscriberIds(sessionId)) this.connections.get(id)?.sendRaw(payload);
  }

  private rename(conn: Connection, sessionId: string, name: string | undefined): void {
    if (!name) {
      conn.send({ type: "error", code: "invalid_message", message: "name: Required" });
      return;
    }
    const s = this.sessions.rename(sessionId, name);
    if (!s) return this.sessionNotFound(conn, sessionId);
    this.store?.renameSession(sessionId, name);
    this.broadcast({ type: "session_renamed", session_id: sessionId, new_name: name });
  }

  private approve(conn: Connection, sessionId: string, response: "yes" | "yes_always" | "no"): void {
    const s = this.liveSession(conn, sessionId);
    if (!s) return;
    const state = s.detector.state;
    if (state.kind !== "waiting") {
      conn.send({ type: "error", code: "not_waiting", message: "session is not waiting for approval", session_id: sessionId });
      return;
    }
    this.writeInput(s, approvalInput(state.match.approval, response));
  }

  private async spawn(msg: Extract<ClientMessage, { type: "spawn_session" }>): Promise<ServerMessage> {
    const fail = (error: string): ServerMessage => ({ type: "spawn_result", success: false, error });
    const check = checkSpawnRequest(
      { command: msg.command, args: msg.args, name: msg.name },
      allowedCommandSet(this.config.sessions.allowed_commands),
    );
    if (!check.ok) return fail(check.reason);

    if (msg.working_dir !== undefined && !path.isAbsolute(msg.working_dir)) {
      return fail("working directory must be an absolute path");
    }
    const requested = msg.working_dir ?? this.engine.homeDirectory(this.homeDir);
    if (requested === null) return fail("no allowed root to start in");
    let cwd: string;
    try {
      cwd = await this.engine.resolveDirectory(requested);
    } catch (err) {
      if (err instanceof FsError) return fail(`working directory rejected: ${err.message}`);
      throw err;
    }

    let handle: PtySession;
    try {
      handle = this.ptys.spawn({
        command: check.command,
        args: msg.args,
        cwd,
        name: msg.name,
        cols: msg.cols || DEFAULT_COLS,
        rows: msg.rows || DEFAULT_ROWS,
      });
    } catch (err) {
      log.warn("spawn failed", msg.command, errorMessage(err));
      return fail(`spawn failed: ${errorMessage(err)}`);
    }

    const created = this.sessions.create({
      id: handle.id,
      name: msg.name || path.basename(check.command),
      command: check.command,
      projectPath: cwd,
      cols: handle.cols,
      rows: handle.rows,
      source: { kind: "pty", handle },
    });
    if (!created.ok) {
      handle.dispose();
      return fail(created.reason);
    }
    const id = handle.id;
    handle.onData((chunk) => this.ingest(id, chunk));
    void handle.exited
      .then((st) => this.endSession(id, st.exitCode))
      .catch((err: unknown) => log.error("session end failed", id, errorMessage(err)));
    this.persist(created.session);
    this.broadcastSessions();
    return { type: "spawn_result", success: true, session_id: id };
  }

  // ---- wrappers ----

  private async onWrapperMessage(conn: Connection, value: unknown): Promise<void> {
    if (messageType(value) !== "pty_output" && this.rateLimited(conn, value)) return;
    const parsed = WrapperMessageSchema.safeParse(value);
    if (!parsed.success) {
      conn.send({ type: "error", code: "invalid_message", message: parsed.error.issues[0]?.message ?? "invalid message" });
      return;
    }
    this.handleWrapper(conn, parsed.data);
  }

  private handleWrapper(conn: Connection, msg: WrapperMessage): void {
    if (msg.type === "ping") {
      conn.send({ type: "pong" });
      return;
    }
    if (msg.type === "register_pty") {
      this.register(conn, msg);
      return;
    }
    const sessionId = conn.sessionId;
    if (sessionId === null) {
      conn.send({ type: "error", code: "invalid_message", message: "register_pty first" });
      return;
    }
    if (msg.type === "pty_output") this.ingest(sessionId, Buffer.from(msg.data, "base64"));
    else this.endSession(sessionId, msg.exit_code);
  }

  private register(conn: Connection, msg: Extract<WrapperMessage, { type: "register_pty" }>): void {
    if (conn.sessionId !== null) {
      conn.send({ type: "error", code: "invalid_message", message: "connection already registered a session" });
      return;
    }
    if (!this.isLocalAddress(conn.remoteAddress)) {
      log.warn("wrapper from non-local address rejected", conn.remoteAddress ?? "?");
      conn.send({ type: "error", code: "forbidden", message: "wrappers must connect from this machine" });
      conn.close(CLOSE_FORBIDDEN, "forbidden");
      return;
    }
    if (!tokenMatches(msg.auth_token ?? conn.headerToken, this.config.auth.token)) {
      conn.send({ type: "error", code: "unauthorized", message: "invalid or missing token" });
      conn.close(CLOSE_UNAUTHORIZED, "unauthorized");
      return;
    }
    const size = clampSize(msg.cols || DEFAULT_COLS, msg.rows || DEFAULT_ROWS);
    const created = this.sessions.create({
      id: msg.session_id,
      name: msg.name || path.basename(msg.command) || msg.session_id,
      command: msg.command,
      projectPath: msg.project_path,
      cols: size.cols,
      rows: size.rows,
      source: { kind: "wrapper", connectionId: conn.id },
    });
    if (!created.ok) {
      conn.send({ type: "error", code: "session_exists", message: `session ${msg.session_id} is already live` });
      return;
    }
    conn.sessionId = msg.session_id;
    log.info("wrapper registered", msg.session_id, msg.command);
    this.persist(created.session);
    conn.send({ type: "registered", session_id: msg.session_id });
    this.broadcastSessions();
  }

  private toWrapper(s: Session, msg: { type: "input"; data: string } | { type: "resize"; cols: number; rows: number }): void {
    if (s.source.kind !== "wrapper") return;
    this.connections.get(s.source.connectionId)?.send(msg);
  }

  // ---- session events ----

  private ingest(sessionId: string, chunk: Buffer): void {
    const s = this.sessions.get(sessionId);
    if (!s) return;
    const { event, failed } = this.sessions.appendOutput(sessionId, chunk);
    for (const id of failed) log.warn("output delivery failed", sessionId, id);
    if (event) this.onDetectorEvent(s, event);
  }

  private endSession(sessionId: string, exitCode: number | null): void {
    const wasWaiting = this.sessions.waitState(sessionId)?.kind === "waiting";
    const subscribers = this.sessions.subscriberIds(sessionId);
    const r = this.sessions.end(sessionId, exitCode);
    if (!r) return;
    for (const id of subscribers) this.connections.get(id)?.subscriptions.delete(sessionId);
    this.store?.setSessionCliType(sessionId, r.session.detector.cliType);
    this.store?.endSession(sessionId, exitCode);
    log.info("session ended", sessionId, exitCode);
    if (wasWaiting) this.broadcast({ type: "waiting_cleared", session_id: sessionId, timestamp: new Date().toISOString() });
    this.broadcast({ type: "session_ended", session_id: sessionId, exit_code: exitCode });
  }

  private waitingMessage(s: Session, prompt: string, waitType: WaitType, since: number): ServerMessage {
    return {
      type: "waiting_for_input",
      session_id: s.id,
      timestamp: new Date(since).toISOString(),
      prompt_content: prompt,
      wait_type: waitType,
      cli_type: s.detector.cliType,
    };
  }

  private onDetectorEvent(s: Session, ev: DetectorEvent): void {
    switch (ev.type) {
      case "waiting":
        log.info("waiting for input", s.id, ev.match.grammar, ev.match.waitType);
        this.store?.setSessionCliType(s.id, ev.cliType);
        this.broadcast(this.waitingMessage(s, ev.match.prompt, ev.match.waitType, ev.since));
        if (this.config.push.enabled) {
          void this.push.notify(waitingNotification(s.name, s.id, ev.match.waitType, ev.match.prompt));
        }
        return;
      case "cleared":
        this.broadcast({ type: "waiting_cleared", session_id: s.id, timestamp: new Date().toISOString() });
        return;
      case "ended":
        return;
    }
  }

  private onFileChange(ev: ChangeEvent): void {
    for (const conn of this.connections.values()) {
      if (!conn.identified) continue;
      const requestId = conn.watches.get(ev.dir) ?? conn.watches.get(ev.path);
      if (requestId === undefined) continue;
      const msg: Extract<ServerMessage, { type: "file_changed" }> = {
        type: "file_changed",
        request_id: requestId,
        path: ev.path,
        change_type: ev.kind,
      };
      if (ev.from !== undefined) msg.from = ev.from;
      if (ev.entry !== undefined) msg.new_entry = ev.entry;
      conn.send(msg);
    }
  }

  private persist(s: Session): void {
    this.store?.saveSession({
      id: s.id,
      name: s.name,
      command: s.command,
      projectPath: s.projectPath,
      cliType: s.detector.cliType,
      createdAt: s.createdAt,
      endedAt: null,
      exitCode: null,
    });
  }

  private broadcastSessions(): void {
    this.broadcast({ type: "sessions", sessions: this.sessions.summaries() });
  }

  /** Sends to every identified remote client. */
  private broadcast(msg: ServerMessage): void {
    const payload = JSON.stringify(msg);
    for (const conn of this.connections.values()) {
      if (conn.kind === "client" && conn.identified) conn.sendRaw(payload);
    }
  }
}
