import path from "node:path";
import type { CliType } from "./grammars.js";

const KNOWN: Record<string, CliType> = {
  claude: "claude",
  codex: "codex",
  gemini: "gemini",
  opencode: "opencode",
};

// Only the program decides; `codex --full-auto` is codex.
export function cliTypeFromCommand(command: string): CliType | null {
  const program = command.trim().split(/\s+/)[0] ?? "";
  const base = path.basename(program).toLowerCase().replace(/\.(?:exe|cmd|bat|ps1)$/, "");
  return KNOWN[base] ?? null;
}

const BANNERS: Array<[RegExp, CliType]> = [
  [/Claude Code|Welcome to Claude/i, "claude"],
  [/OpenAI Codex|>_ Codex/i, "codex"],
  [/Gemini CLI/i, "gemini"],
  [/\bopencode\b/i, "opencode"],
];

export function cliTypeFromBanner(text: string): CliType | null {
  for (const [re, cli] of BANNERS) if (re.test(text)) return cli;
  return null;
}

/**
 * Tracks the CLI a session is running. The command decides when it names a known assistant;
 * otherwise the first recognized banner in the output does, and "terminal" until then.
 */
export class CliTracker {
  private current: CliType;
  private fixed: boolean;

  constructor(command: string) {
    const fromCommand = cliTypeFromCommand(command);
    this.current = fromCommand ?? "terminal";
    this.fixed = fromCommand !== null;
  }

  get type(): CliType {
    return this.current;
  }

  /** Returns true when the type changed. */
  observe(text: string): boolean {
    if (this.fixed) return false;
    const seen = cliTypeFromBanner(text);
    if (!seen) return false;
    this.current = seen;
    this.fixed = true;
    return true;
  }
}
