// Prompt detection works on plain text; these patterns only need to be good enough for that.
/* eslint-disable no-control-regex */
export function stripAnsi(s: string): string {
  return (
    s
      // OSC (ESC ]) terminated by BEL or ST (ESC \).
      .replace(/\u001b\][\s\S]*?(?:\u0007|\u001b\\)/g, "")
      // OSC in its C1 form, terminated by BEL or ST (0x9C).
      .replace(/\u009d[\s\S]*?(?:\u0007|\u009c)/g, "")
      // DCS (ESC P) uses the ST terminator.
      .replace(/\u001bP[\s\S]*?\u001b\\/g, "")
      .replace(/\u0090[\s\S]*?\u009c/g, "")
      .replace(/\u001b\[[0-9;?<=>]*[ -/]*[@-~]/g, "")
      .replace(/\u009b[0-9;?<=>]*[ -/]*[@-~]/g, "")
      // Remaining two-byte escapes (ESC =, ESC >, ESC 7, charset selection, ...).
      .replace(/\u001b[()*+][0-9A-Za-z]/g, "")
      .replace(/\u001b[ -~]/g, "")
  );
}

export function collapseBackspaces(s: string): string {
  let out = "";
  for (const ch of s) {
    if (ch === "\b" || ch === "\u007f") {
      out = out.slice(0, -1);
      continue;
    }
    out += ch;
  }
  return out;
}

/**
 * Escape-free text with CR treated as a line break (TUIs redraw lines with `\r`). Backspaces are
 * kept so they can erase text that arrived in an earlier chunk.
 */
export function cleanChunk(chunk: string): string {
  return stripAnsi(chunk)
    .replace(/\r\n/g, "\n")
    .replace(/\r/g, "\n")
    .replace(/[\u0000-\u0007\u000B\u000C\u000E-\u001F]/g, "");
}

export function tidyLines(text: string): string {
  return text
    .split("\n")
    .map((ln) => ln.replace(/[ \t]{2,}/g, " ").trim())
    .join("\n");
}

export function normalizeOutput(chunk: string): string {
  return tidyLines(collapseBackspaces(cleanChunk(chunk)));
}

const LONG_FORMS: Record<string, RegExp> = {
  "[": /^\u001b\[[0-9;?<=>]*[ -/]*[@-~]/,
  "]": /^\u001b\][\s\S]*?(?:\u0007|\u001b\\)/,
  P: /^\u001bP[\s\S]*?\u001b\\/,
  "(": /^\u001b\([0-9A-Za-z]/,
  ")": /^\u001b\)[0-9A-Za-z]/,
  "*": /^\u001b\*[0-9A-Za-z]/,
  "+": /^\u001b\+[0-9A-Za-z]/,
};

function escapeComplete(tail: string): boolean {
  const intro = tail.charAt(1);
  if (!intro) return false;
  const re = LONG_FORMS[intro];
  return re ? re.test(tail) : true;
}

/**
 * Splits off a trailing escape sequence that has not been terminated yet, so the rest of it can be
 * joined with the next chunk before stripping.
 */
export function splitIncompleteEscape(s: string, maxCarry = 256): [string, string] {
  const at = s.lastIndexOf("\u001b");
  if (at < 0 || s.length - at > maxCarry) return [s, ""];
  const tail = s.slice(at);
  if (escapeComplete(tail)) return [s, ""];
  return [s.slice(0, at), tail];
}
