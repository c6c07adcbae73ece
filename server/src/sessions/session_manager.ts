import type { IPty } from "node-pty";
import pty from "node-pty";
import { nanoid } from "nanoid";
import { createLogger, errorMessage } from "../log.js";

const log = createLogger("pty");

export const DEFAULT_COLS = 100;
export const DEFAULT_ROWS = 30;

export type ExitStatus = {
  exitCode: number | null;
  signal: number | null;
};

type PtyStatus = ExitStatus & {
  running: boolean;
};

export type SpawnSpec = {
  id?: string;
  command: string;
  args?: string[];
  cwd: string;
  name?: string;
  cols?: number;
  rows?: number;
  env?: Record<string, string>;
};

export function clampSize(cols: number, rows: number): { cols: number; rows: number } {
  return {
    cols: Math.min(400, Math.max(12, Math.floor(cols))),
    rows: Math.min(220, Math.max(6, Math.floor(rows))),
  };
}

function inheritedEnv(): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(process.env)) {
    if (typeof v === "string") out[k] = v;
  }
  return out;
}

/**
 * One process attached to one pseudo-terminal. Output arrives as raw bytes; once the process has
 * exited, writes and resizes are ignored and `exited` is settled.
 */
export class PtySession {
  readonly id: string;
  readonly name: string;
  readonly command: string;
  readonly args: string[];
  readonly cwd: string;
  readonly exited: Promise<ExitStatus>;

  private readonly pty: IPty;
  private readonly dataListeners = new Set<(chunk: Buffer) => void>();
  private status: PtyStatus;
  private size: { cols: number; rows: number };
  private resolveExit: (s: ExitStatus) => void = () => undefined;

  constructor(spec: SpawnSpec) {
    this.id = spec.id ?? nanoid(12);
    this.command = spec.command;
    this.args = [...(spec.args ?? [])];
    this.cwd = spec.cwd;
    this.name = spec.name ?? spec.command;
    this.size = clampSize(spec.cols ?? DEFAULT_COLS, spec.rows ?? DEFAULT_ROWS);
    this.exited = new Promise<ExitStatus>((resolve) => {
      this.resolveExit = resolve;
    });

    this.pty = pty.spawn(spec.command, this.args, {
      name: "xterm-256color",
      cols: this.size.cols,
      rows: this.size.rows,
      cwd: spec.cwd,
      env: { ...inheritedEnv(), ...(spec.env ?? {}), TERM: "xterm-256color" },
    });
    this.status = { running: true, exitCode: null, signal: null };

    this.pty.onData((d) => {
      const chunk = Buffer.from(d, "utf8");
      for (const fn of [...this.dataListeners]) fn(chunk);
    });

    this.pty.onExit((e) => {
      this.status = {
        running: false,
        exitCode: typeof e.exitCode === "number" ? e.exitCode : null,
        signal: typeof e.signal === "number" && e.signal !== 0 ? e.signal : null,
      };
      log.debug("exit", this.id, this.status.exitCode, this.status.signal);
      this.resolveExit({ exitCode: this.status.exitCode, signal: this.status.signal });
    });
  }

  get running(): boolean {
    return this.status.running;
  }

  get cols(): number {
    return this.size.cols;
  }

  get rows(): number {
    return this.size.rows;
  }

  onData(fn: (chunk: Buffer) => void): () => void {
    this.dataListeners.add(fn);
    return () => this.dataListeners.delete(fn);
  }

  write(data: string | Buffer): void {
    if (!this.status.running) return;
    this.pty.write(typeof data === "string" ? data : data.toString("utf8"));
  }

  /** Applies immediately; node-pty delivers SIGWINCH to the foreground process group. */
  resize(cols: number, rows: number): { cols: number; rows: number } {
    const next = clampSize(cols, rows);
    if (!this.status.running) return this.size;
    this.pty.resize(next.cols, next.rows);
    this.size = next;
    return next;
  }

  kill(signal: NodeJS.Signals = "SIGHUP"): void {
    if (!this.status.running) return;
    try {
      this.pty.kill(signal);
    } catch (err) {
      log.warn("kill failed", this.id, errorMessage(err));
    }
  }

  dispose(): void {
    this.dataListeners.clear();
    this.kill();
  }
}

export class SessionManager {
  private readonly sessions = new Map<string, PtySession>();

  spawn(spec: SpawnSpec): PtySession {
    if (spec.id && this.sessions.has(spec.id)) throw new Error(`session already exists: ${spec.id}`);
    const s = new PtySession(spec);
    this.sessions.set(s.id, s);
    log.info("spawned", s.id, spec.command, spec.args ?? [], spec.cwd);
    void s.exited.then(() => this.sessions.delete(s.id));
    return s;
  }

  dispose(): void {
    for (const s of this.sessions.values()) s.dispose();
    this.sessions.clear();
  }
}
