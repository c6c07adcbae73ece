import { describe, expect, test } from "vitest";
import { approvalInput, matchGrammars, promptSignature } from "../src/detect/grammars.js";

const CLAUDE_PERMISSION = [
  "Bash command",
  "rm -rf build",
  "Do you want to proceed?",
  "❯ 1. Yes",
  "2. Yes, and don't ask again for this command",
  "3. No, and tell Claude what to do differently (esc)",
].join("\n");

describe("matchGrammars", () => {
  test("recognizes a numbered permission prompt", () => {
    const m = matchGrammars(CLAUDE_PERMISSION, "claude");
    expect(m).toEqual({
      grammar: "claude_permission",
      waitType: "tool_approval",
      approval: { kind: "numbered" },
      prompt: [
        "Do you want to proceed?",
        "❯ 1. Yes",
        "2. Yes, and don't ask again for this command",
        "3. No, and tell Claude what to do differently (esc)",
      ].join("\n"),
      signature: promptSignature("claude_permission", "Do you want to proceed?"),
    });
  });

  test("grammars only apply to their own CLI", () => {
    expect(matchGrammars(CLAUDE_PERMISSION, "codex")).toBeNull();
  });

  test("plan approval wins over the generic permission grammar", () => {
    const text = [
      "Here is the plan:",
      "1) add tests",
      "Would you like to proceed?",
      "❯ 1. Yes, and auto-accept edits",
      "2. No, keep planning",
    ].join("\n");
    const m = matchGrammars(text, "claude");
    expect(m?.grammar).toBe("claude_plan");
    expect(m?.waitType).toBe("plan_approval");
  });

  test("codex approvals answer with single keys", () => {
    const text = ["Would you like to run the following command?", "$ npm test", "› 1. Yes, proceed"].join("\n");
    const m = matchGrammars(text, "codex");
    expect(m?.grammar).toBe("codex_approval");
    expect(m?.approval).toEqual({ kind: "keys", yes: "y", yes_always: "a", no: "n" });
  });

  test("a trailing (y/n) prompt is recognized for any program", () => {
    const m = matchGrammars("Checking files...\nOverwrite config? (y/n)", "terminal");
    expect(m?.grammar).toBe("yes_no");
    expect(m?.waitType).toBe("awaiting_response");
    expect(m?.prompt).toBe("Overwrite config? (y/n)");
  });

  test("a (y/n) that scrolled away is not a prompt", () => {
    const text = ["Overwrite config? (y/n)", "y", "writing", "done", "step 4", "step 5", "$"].join("\n");
    expect(matchGrammars(text, "terminal")).toBeNull();
  });

  test("plain output matches nothing", () => {
    expect(matchGrammars("compiling...\n3 files written", "claude")).toBeNull();
  });
});

describe("approvalInput", () => {
  test("maps responses to keystrokes per approval model", () => {
    expect(approvalInput({ kind: "numbered" }, "yes")).toBe("1\r");
    expect(approvalInput({ kind: "numbered" }, "yes_always")).toBe("2\r");
    expect(approvalInput({ kind: "numbered" }, "no")).toBe("3\r");
    expect(approvalInput({ kind: "yes_no" }, "yes_always")).toBe("y\r");
    expect(approvalInput({ kind: "yes_no" }, "no")).toBe("n\r");
    expect(approvalInput({ kind: "arrow" }, "yes")).toBe("\r");
    expect(approvalInput({ kind: "arrow" }, "no")).toBe("\u001b[B\u001b[B\r");
    expect(approvalInput({ kind: "keys", yes: "a", yes_always: "A", no: "d" }, "no")).toBe("d");
  });
});
