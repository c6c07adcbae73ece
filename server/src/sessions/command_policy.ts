import path from "node:path";

export const BASE_ALLOWED_COMMANDS = [
  "claude",
  "codex",
  "gemini",
  "opencode",
  "bash",
  "zsh",
  "sh",
  "fish",
  "nu",
  "pwsh",
  "python",
  "python3",
  "node",
  "ruby",
] as const;

// Shell metacharacters never reach a PTY through spawn_session, even though no shell parses argv.
const UNSAFE_TOKENS = ["\n", "\r", "\0", "`", "$(", ";", "&", "|", "<", ">"];

export type CommandCheck = { ok: true; command: string } | { ok: false; reason: string };

export function findUnsafeToken(value: string): string | null {
  for (const tok of UNSAFE_TOKENS) if (value.includes(tok)) return tok;
  return null;
}

export function allowedCommandSet(extra: readonly string[] = []): Set<string> {
  const out = new Set<string>(BASE_ALLOWED_COMMANDS);
  for (const name of extra) {
    const trimmed = name.trim();
    if (trimmed) out.add(path.basename(trimmed));
  }
  return out;
}

function describe(tok: string): string {
  return JSON.stringify(tok);
}

export function checkSpawnRequest(
  req: { command: string; args: readonly string[]; name?: string | undefined },
  allowed: ReadonlySet<string>,
): CommandCheck {
  const command = req.command.trim();
  if (!command) return { ok: false, reason: "command is required" };

  const fields: Array<[string, string]> = [["command", command], ...req.args.map((a, i): [string, string] => [`args[${i}]`, a])];
  if (req.name !== undefined) fields.push(["name", req.name]);
  for (const [label, value] of fields) {
    const tok = findUnsafeToken(value);
    if (tok) return { ok: false, reason: `${label} contains forbidden sequence ${describe(tok)}` };
  }

  const base = path.basename(command);
  if (!allowed.has(base)) return { ok: false, reason: `command not allowed: ${base}` };
  return { ok: true, command };
}
