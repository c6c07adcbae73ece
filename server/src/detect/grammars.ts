import { createHash } from "node:crypto";

export type CliType = "claude" | "codex" | "gemini" | "opencode" | "terminal";
export type WaitType = "tool_approval" | "plan_approval" | "clarifying_question" | "awaiting_response";
export type ApprovalResponse = "yes" | "yes_always" | "no";

export type ApprovalModel =
  | { kind: "numbered" }
  | { kind: "yes_no" }
  | { kind: "arrow" }
  | { kind: "keys"; yes: string; yes_always: string; no: string };

export type GrammarId =
  | "claude_plan"
  | "claude_permission"
  | "claude_question"
  | "codex_approval"
  | "gemini_confirm"
  | "opencode_permission"
  | "yes_no"
  | "arrow_menu";

// `anchor` identifies the prompt (the question line); `prompt` is the excerpt shown to people.
type Hit = { anchor: number; end?: number };

export type Grammar = {
  id: GrammarId;
  appliesTo: readonly CliType[] | "any";
  waitType: WaitType;
  approval: ApprovalModel;
  find: (lines: readonly string[]) => Hit | null;
};

export type GrammarMatch = {
  grammar: GrammarId;
  waitType: WaitType;
  approval: ApprovalModel;
  prompt: string;
  signature: string;
};

export const MAX_PROMPT_CHARS = 500;
// Prompts are looked for near the bottom of the screen only.
const WINDOW_LINES = 40;
const GENERIC_TAIL_LINES = 5;

const NUMBERED_YES = /^(?:[❯›>]\s*)?1\.\s*Yes\b/i;
const NUMBERED_OPTION = /^(?:[❯›>]\s*)?\d{1,2}\.\s+\S/;
const POINTER_LINE = /^[❯›]\s*\S/;

function lastIndex(lines: readonly string[], re: RegExp, from = lines.length - 1): number {
  for (let i = from; i >= 0; i--) if (re.test(lines[i] ?? "")) return i;
  return -1;
}

function anyAfter(lines: readonly string[], start: number, re: RegExp, span = 15): number {
  for (let i = start + 1; i < Math.min(lines.length, start + 1 + span); i++) if (re.test(lines[i] ?? "")) return i;
  return -1;
}

// Index of the last non-empty lines, newest first.
function tailIndexes(lines: readonly string[], n: number): number[] {
  const out: number[] = [];
  for (let i = lines.length - 1; i >= 0 && out.length < n; i--) if ((lines[i] ?? "").length > 0) out.push(i);
  return out;
}

function questionAbove(lines: readonly string[], from: number, span = 12): number {
  for (let i = from; i >= Math.max(0, from - span); i--) if ((lines[i] ?? "").includes("?")) return i;
  return -1;
}

const claudePlan: Grammar = {
  id: "claude_plan",
  appliesTo: ["claude"],
  waitType: "plan_approval",
  approval: { kind: "numbered" },
  find: (lines) => {
    const q = lastIndex(lines, /Would you like to proceed\?/i);
    if (q < 0 || anyAfter(lines, q, NUMBERED_OPTION) < 0) return null;
    const planWording = lines.slice(Math.max(0, q - 30), q + 8).some((l) => /\bplan\b/i.test(l));
    return planWording ? { anchor: q } : null;
  },
};

const claudePermission: Grammar = {
  id: "claude_permission",
  appliesTo: ["claude", "terminal"],
  waitType: "tool_approval",
  approval: { kind: "numbered" },
  find: (lines) => {
    const q = lastIndex(lines, /Do you want to [^?]{1,200}\?/);
    if (q < 0 || anyAfter(lines, q, NUMBERED_YES) < 0) return null;
    return { anchor: q };
  },
};

const claudeQuestion: Grammar = {
  id: "claude_question",
  appliesTo: ["claude"],
  waitType: "clarifying_question",
  approval: { kind: "arrow" },
  find: (lines) => {
    const hint = lastIndex(lines, /Enter to select/i);
    if (hint < 0) return null;
    const nav = lines.slice(Math.max(0, hint - 2), hint + 3).some((l) => /↑\s*\/\s*↓\s*to navigate/i.test(l));
    if (!nav) return null;
    const q = questionAbove(lines, hint, 20);
    return { anchor: q >= 0 ? q : hint };
  },
};

const CODEX_PROMPTS = [
  /Would you like to run the following command\?/,
  /Would you like to make the following edits\?/,
  /Do you want to approve access to "[^"]+"\?/,
  /\S[^\n]{0,60} needs your approval\./,
];

const codexApproval: Grammar = {
  id: "codex_approval",
  appliesTo: ["codex"],
  waitType: "tool_approval",
  approval: { kind: "keys", yes: "y", yes_always: "a", no: "n" },
  find: (lines) => {
    let best = -1;
    for (const re of CODEX_PROMPTS) best = Math.max(best, lastIndex(lines, re));
    return best >= 0 ? { anchor: best } : null;
  },
};

const geminiConfirm: Grammar = {
  id: "gemini_confirm",
  appliesTo: ["gemini"],
  waitType: "tool_approval",
  approval: { kind: "numbered" },
  find: (lines) => {
    const q = lastIndex(lines, /Allow execution|Apply this change\?|Do you want to proceed\?/);
    if (q < 0 || anyAfter(lines, q, /^(?:[❯›>●]\s*)?1\.\s*Yes, allow once/i) < 0) return null;
    return { anchor: q };
  },
};

const opencodePermission: Grammar = {
  id: "opencode_permission",
  appliesTo: ["opencode"],
  waitType: "tool_approval",
  approval: { kind: "keys", yes: "a", yes_always: "A", no: "d" },
  find: (lines) => {
    const q = lastIndex(lines, /Permission required/i);
    if (q < 0) return null;
    const around = lines.slice(q, q + 15).join("\n");
    if (!/\b(?:accept|allow)\b/i.test(around) || !/\bdeny\b/i.test(around)) return null;
    return { anchor: q };
  },
};

const YES_NO_SUFFIX = /(?:\(y\/n\)|\[y\/n\]|\(yes\/no\))\s*[:?]?$/i;

const yesNo: Grammar = {
  id: "yes_no",
  appliesTo: "any",
  waitType: "awaiting_response",
  approval: { kind: "yes_no" },
  find: (lines) => {
    for (const i of tailIndexes(lines, GENERIC_TAIL_LINES)) {
      if (YES_NO_SUFFIX.test(lines[i] ?? "")) return { anchor: i, end: i + 1 };
    }
    return null;
  },
};

const ARROW_HINT = /arrow keys|↑\s*\/\s*↓|use arrows|enter to confirm/i;

const arrowMenu: Grammar = {
  id: "arrow_menu",
  appliesTo: "any",
  waitType: "awaiting_response",
  approval: { kind: "arrow" },
  find: (lines) => {
    const recent = tailIndexes(lines, GENERIC_TAIL_LINES * 3);
    const pointer = recent.find((i) => POINTER_LINE.test(lines[i] ?? ""));
    const hinted = recent.some((i) => ARROW_HINT.test(lines[i] ?? ""));
    if (pointer === undefined || !hinted) return null;
    const q = questionAbove(lines, pointer);
    return { anchor: q >= 0 ? q : pointer };
  },
};

/** Evaluated in this order; the first grammar that applies and matches wins. */
export const GRAMMARS: readonly Grammar[] = [
  claudePlan,
  claudePermission,
  claudeQuestion,
  codexApproval,
  geminiConfirm,
  opencodePermission,
  yesNo,
  arrowMenu,
];

export function grammarApplies(g: Grammar, cli: CliType): boolean {
  return g.appliesTo === "any" || g.appliesTo.includes(cli);
}

export function promptSignature(grammar: GrammarId, anchorLine: string): string {
  return createHash("sha256").update(`${grammar}\n${anchorLine}`).digest("hex").slice(0, 16);
}

function excerpt(lines: readonly string[], hit: Hit): string {
  const text = lines
    .slice(hit.anchor, hit.end ?? lines.length)
    .filter((l) => l.length > 0)
    .join("\n");
  return text.length > MAX_PROMPT_CHARS ? text.slice(0, MAX_PROMPT_CHARS) : text;
}

/** `text` is normalized output (see normalizeOutput). */
export function matchGrammars(text: string, cli: CliType): GrammarMatch | null {
  const all = text.split("\n");
  const lines = all.slice(Math.max(0, all.length - WINDOW_LINES));
  for (const g of GRAMMARS) {
    if (!grammarApplies(g, cli)) continue;
    const hit = g.find(lines);
    if (!hit) continue;
    return {
      grammar: g.id,
      waitType: g.waitType,
      approval: g.approval,
      prompt: excerpt(lines, hit),
      signature: promptSignature(g.id, lines[hit.anchor] ?? ""),
    };
  }
  return null;
}

export function approvalInput(model: ApprovalModel, response: ApprovalResponse): string {
  switch (model.kind) {
    case "numbered":
      return response === "yes" ? "1\r" : response === "yes_always" ? "2\r" : "3\r";
    case "yes_no":
      return response === "no" ? "n\r" : "y\r";
    case "arrow":
      return response === "yes" ? "\r" : response === "yes_always" ? "\u001b[B\r" : "\u001b[B\u001b[B\r";
    case "keys":
      return model[response];
  }
}
