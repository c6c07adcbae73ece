import { StringDecoder } from "node:string_decoder";
import { nanoid } from "nanoid";
import { Scrollback } from "./scrollback.js";
import { SessionChannel, type Subscriber } from "./channel.js";
import type { PtySession } from "./session_manager.js";
import { WaitDetector, type DetectorEvent, type WaitState } from "../detect/wait_detector.js";
import type { CliType } from "../detect/grammars.js";

export const DEFAULT_SCROLLBACK_BYTES = 64 * 1024;
export const DEFAULT_RETENTION_MS = 10 * 60 * 1000;

// Who owns the process: a wrapper connection (by id) or a PTY running inside the daemon.
export type SessionSource = { kind: "wrapper"; connectionId: string } | { kind: "pty"; handle: PtySession };

export type Session = {
  id: string;
  name: string;
  command: string;
  projectPath: string;
  createdAt: number;
  alive: boolean;
  endedAt: number | null;
  exitCode: number | null;
  cols: number;
  rows: number;
  source: SessionSource;
  scrollback: Scrollback;
  channel: SessionChannel<Buffer>;
  detector: WaitDetector;
  decoder: StringDecoder;
};

export type SessionSummary = {
  session_id: string;
  name: string;
  command: string;
  project_path: string;
  cli_type: CliType;
  started_at: string;
  alive: boolean;
  ended_at: string | null;
  exit_code: number | null;
  cols: number;
  rows: number;
  waiting: boolean;
};

export type NewSession = {
  id?: string;
  name: string;
  command: string;
  projectPath: string;
  cols: number;
  rows: number;
  source: SessionSource;
};

export type CreateResult = { ok: true; session: Session } | { ok: false; reason: "session_exists" };

export type SubscribeResult =
  | { ok: true; history: Buffer; totalBytes: number }
  | { ok: false; reason: "not_found" };

export type SessionTableOptions = {
  scrollbackBytes?: number;
  retentionMs?: number;
  now?: () => number;
};

export function summarize(s: Session): SessionSummary {
  return {
    session_id: s.id,
    name: s.name,
    command: s.command,
    project_path: s.projectPath,
    cli_type: s.detector.cliType,
    started_at: new Date(s.createdAt).toISOString(),
    alive: s.alive,
    ended_at: s.endedAt === null ? null : new Date(s.endedAt).toISOString(),
    exit_code: s.exitCode,
    cols: s.cols,
    rows: s.rows,
    waiting: s.detector.state.kind === "waiting",
  };
}

/**
 * Live and recently ended sessions. Owns each session's scrollback, broadcast channel and wait
 * detector; callers react to the detector transitions these methods return.
 */
export class SessionTable {
  private readonly sessions = new Map<string, Session>();
  private readonly scrollbackBytes: number;
  private readonly retentionMs: number;
  private readonly now: () => number;

  constructor(opts: SessionTableOptions = {}) {
    this.scrollbackBytes = opts.scrollbackBytes ?? DEFAULT_SCROLLBACK_BYTES;
    this.retentionMs = opts.retentionMs ?? DEFAULT_RETENTION_MS;
    this.now = opts.now ?? Date.now;
  }

  create(input: NewSession): CreateResult {
    const id = input.id ?? nanoid(12);
    const existing = this.sessions.get(id);
    if (existing?.alive) return { ok: false, reason: "session_exists" };
    if (existing) existing.channel.close();
    const session: Session = {
      id,
      name: input.name,
      command: input.command,
      projectPath: input.projectPath,
      createdAt: this.now(),
      alive: true,
      endedAt: null,
      exitCode: null,
      cols: input.cols,
      rows: input.rows,
      source: input.source,
      scrollback: new Scrollback(this.scrollbackBytes),
      channel: new SessionChannel<Buffer>(),
      detector: new WaitDetector(input.command, this.now),
      decoder: new StringDecoder("utf8"),
    };
    this.sessions.set(id, session);
    return { ok: true, session };
  }

  get(id: string): Session | null {
    return this.sessions.get(id) ?? null;
  }

  list(): Session[] {
    return [...this.sessions.values()].sort((a, b) => a.createdAt - b.createdAt);
  }

  summaries(): SessionSummary[] {
    return this.list().map(summarize);
  }

  waitState(id: string): WaitState | null {
    return this.sessions.get(id)?.detector.state ?? null;
  }

  /**
   * Appends to the scrollback and publishes to subscribers in the same turn, so a subscriber sees
   * each chunk either in its replay or live, never both. Returns ids whose delivery threw.
   */
  appendOutput(id: string, chunk: Buffer): { event: DetectorEvent | null; failed: string[] } {
    const s = this.sessions.get(id);
    if (!s || !s.alive || chunk.length === 0) return { event: null, failed: [] };
    s.scrollback.append(chunk);
    const failed = s.channel.publish(chunk);
    const event = s.detector.feed(s.decoder.write(chunk));
    return { event, failed };
  }

  noteInput(id: string): DetectorEvent | null {
    const s = this.sessions.get(id);
    if (!s || !s.alive) return null;
    return s.detector.onInput();
  }

  subscribe(id: string, connectionId: string, fn: Subscriber<Buffer>): SubscribeResult {
    const s = this.sessions.get(id);
    if (!s) return { ok: false, reason: "not_found" };
    const history = s.scrollback.snapshot();
    if (s.alive) s.channel.subscribe(connectionId, fn);
    return { ok: true, history, totalBytes: s.scrollback.totalBytes };
  }

  /** Returns the number of subscribers left, or null when the connection was not subscribed. */
  unsubscribe(id: string, connectionId: string): number | null {
    const s = this.sessions.get(id);
    if (!s || !s.channel.unsubscribe(connectionId)) return null;
    return s.channel.size;
  }

  subscriberIds(id: string): string[] {
    return this.sessions.get(id)?.channel.ids() ?? [];
  }

  history(id: string, maxBytes?: number): { data: Buffer; totalBytes: number } | null {
    const s = this.sessions.get(id);
    if (!s) return null;
    return { data: s.scrollback.snapshot(maxBytes), totalBytes: s.scrollback.totalBytes };
  }

  rename(id: string, name: string): Session | null {
    const s = this.sessions.get(id);
    if (!s) return null;
    s.name = name;
    return s;
  }

  setSize(id: string, cols: number, rows: number): void {
    const s = this.sessions.get(id);
    if (!s) return;
    s.cols = cols;
    s.rows = rows;
  }

  /** Marks the session dead. Returns null when it had already ended. */
  end(id: string, exitCode: number | null): { session: Session; event: DetectorEvent | null } | null {
    const s = this.sessions.get(id);
    if (!s || !s.alive) return null;
    const rest = s.decoder.end();
    if (rest) s.detector.feed(rest);
    s.alive = false;
    s.endedAt = this.now();
    s.exitCode = exitCode;
    s.channel.close();
    return { session: s, event: s.detector.onExit(exitCode) };
  }

  sessionsOwnedBy(connectionId: string): Session[] {
    return this.list().filter((s) => s.alive && s.source.kind === "wrapper" && s.source.connectionId === connectionId);
  }

  /** Drops ended sessions older than the retention window. */
  sweep(): string[] {
    const cutoff = this.now() - this.retentionMs;
    const purged: string[] = [];
    for (const [id, s] of this.sessions) {
      if (s.alive || s.endedAt === null || s.endedAt > cutoff) continue;
      this.sessions.delete(id);
      purged.push(id);
    }
    return purged;
  }

  clear(): void {
    for (const s of this.sessions.values()) s.channel.close();
    this.sessions.clear();
  }
}
