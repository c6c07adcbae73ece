import { cleanChunk, collapseBackspaces, splitIncompleteEscape, tidyLines } from "./ansi.js";
import { CliTracker } from "./cli_type.js";
import { matchGrammars, type CliType, type GrammarMatch } from "./grammars.js";

export const DETECTION_BUFFER_CHARS = 4000;
// Output after a prompt must carry at least this much real text before the prompt counts as gone.
export const CLEAR_THRESHOLD_CHARS = 10;

export type WaitState =
  | { kind: "running" }
  | { kind: "waiting"; match: GrammarMatch; since: number }
  | { kind: "ended"; exitCode: number | null };

export type DetectorEvent =
  | { type: "waiting"; match: GrammarMatch; cliType: CliType; since: number }
  | { type: "cleared" }
  | { type: "ended"; exitCode: number | null };

// Redraws of a menu (options, pointer moves, key hints) are not evidence that the prompt went away.
const PROMPT_FURNITURE = [
  /^(?:[❯›>●]\s*)?\d{1,2}\.\s/,
  /^[❯›]/,
  /enter to (?:select|confirm)|to navigate|esc to (?:cancel|exit)|tab to amend/i,
];

function substantiveChars(text: string): number {
  let n = 0;
  for (const line of text.split("\n")) {
    if (PROMPT_FURNITURE.some((re) => re.test(line))) continue;
    n += line.replace(/[\s─-╿]/g, "").length;
  }
  return n;
}

function tail(s: string): string {
  return s.length > DETECTION_BUFFER_CHARS ? s.slice(s.length - DETECTION_BUFFER_CHARS) : s;
}

/**
 * Per-session wait-state machine: running -> waiting(match) -> running ... -> ended.
 * Feed it decoded PTY output; each call returns the transition it caused, if any.
 */
export class WaitDetector {
  private readonly cli: CliTracker;
  private readonly now: () => number;
  private current: WaitState = { kind: "running" };
  private carry = "";
  private detection = "";
  private sinceMatch = "";

  constructor(command: string, now: () => number = Date.now) {
    this.cli = new CliTracker(command);
    this.now = now;
  }

  get state(): WaitState {
    return this.current;
  }

  get cliType(): CliType {
    return this.cli.type;
  }

  feed(chunk: string): DetectorEvent | null {
    if (this.current.kind === "ended") return null;
    const [ready, carry] = splitIncompleteEscape(this.carry + chunk);
    this.carry = carry;
    const cleaned = cleanChunk(ready);
    if (!cleaned) return null;

    this.detection = tail(collapseBackspaces(this.detection + cleaned));
    this.cli.observe(this.detection);

    if (this.current.kind === "running") {
      const match = matchGrammars(tidyLines(this.detection), this.cli.type);
      if (!match) return null;
      return this.enterWaiting(match);
    }

    this.sinceMatch = tail(collapseBackspaces(this.sinceMatch + cleaned));
    const recent = tidyLines(this.sinceMatch);
    const match = matchGrammars(recent, this.cli.type);
    if (match) {
      if (match.signature === this.current.match.signature) {
        this.sinceMatch = "";
        return null;
      }
      return this.enterWaiting(match);
    }
    if (substantiveChars(recent) < CLEAR_THRESHOLD_CHARS) return null;
    // Later detection only looks at what came after the prompt.
    this.detection = this.sinceMatch;
    return this.clear();
  }

  /** Someone typed into the session. */
  onInput(): DetectorEvent | null {
    if (this.current.kind !== "waiting") return null;
    this.detection = "";
    return this.clear();
  }

  onExit(exitCode: number | null): DetectorEvent | null {
    if (this.current.kind === "ended") return null;
    this.current = { kind: "ended", exitCode };
    this.detection = "";
    this.sinceMatch = "";
    this.carry = "";
    return { type: "ended", exitCode };
  }

  private enterWaiting(match: GrammarMatch): DetectorEvent {
    const since = this.now();
    this.current = { kind: "waiting", match, since };
    this.sinceMatch = "";
    return { type: "waiting", match, cliType: this.cli.type, since };
  }

  private clear(): DetectorEvent {
    this.current = { kind: "running" };
    this.sinceMatch = "";
    return { type: "cleared" };
  }
}
