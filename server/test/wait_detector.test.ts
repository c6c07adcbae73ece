import { describe, expect, test } from "vitest";
import { WaitDetector } from "../src/detect/wait_detector.js";
import { CliTracker, cliTypeFromCommand } from "../src/detect/cli_type.js";

describe("WaitDetector", () => {
  test("running -> waiting -> running -> ended", () => {
    const d = new WaitDetector("bash", () => 1000);
    expect(d.feed("$ ls\n")).toBeNull();
    expect(d.state.kind).toBe("running");

    const waiting = d.feed("Overwrite config? (y/n) ");
    expect(waiting).toMatchObject({
      type: "waiting",
      cliType: "terminal",
      since: 1000,
      match: { grammar: "yes_no", prompt: "Overwrite config? (y/n)" },
    });
    expect(d.state.kind).toBe("waiting");

    // A redraw of the same prompt is not a new prompt.
    expect(d.feed("\rOverwrite config? (y/n) ")).toBeNull();
    // The echoed answer alone is too little to count as new output.
    expect(d.feed("y\n")).toBeNull();
    expect(d.state.kind).toBe("waiting");

    expect(d.feed("Wrote config.toml successfully\n")).toEqual({ type: "cleared" });
    expect(d.state.kind).toBe("running");

    expect(d.onExit(0)).toEqual({ type: "ended", exitCode: 0 });
    expect(d.onExit(1)).toBeNull();
    expect(d.feed("Again? (y/n)")).toBeNull();
    expect(d.state).toEqual({ kind: "ended", exitCode: 0 });
  });

  test("typing into a waiting session clears it", () => {
    const d = new WaitDetector("bash");
    expect(d.feed("Continue? (y/n)")?.type).toBe("waiting");
    expect(d.onInput()).toEqual({ type: "cleared" });
    expect(d.onInput()).toBeNull();
  });

  test("escape sequences split across chunks are joined before matching", () => {
    const d = new WaitDetector("bash");
    expect(d.feed("\u001b[3")).toBeNull();
    const ev = d.feed("2mProceed? (y/n)\u001b[0m");
    expect(ev?.type === "waiting" ? ev.match.prompt : null).toBe("Proceed? (y/n)");
  });

  test("a banner identifies the CLI behind a generic command", () => {
    const d = new WaitDetector("node");
    expect(d.cliType).toBe("terminal");
    d.feed("Welcome to Claude Code!\n");
    expect(d.cliType).toBe("claude");
  });
});

describe("cli type", () => {
  test("the command name decides when it is a known assistant", () => {
    expect(cliTypeFromCommand("/usr/local/bin/claude")).toBe("claude");
    expect(cliTypeFromCommand("gemini.cmd")).toBe("gemini");
    expect(cliTypeFromCommand("vim")).toBeNull();
  });

  test("arguments after the program are ignored", () => {
    expect(cliTypeFromCommand("codex --full-auto")).toBe("codex");
    expect(cliTypeFromCommand("  /opt/bin/opencode run .")).toBe("opencode");
    expect(cliTypeFromCommand("bash -c codex")).toBeNull();
    expect(new WaitDetector("codex --full-auto").cliType).toBe("codex");
  });

  test("a known command is not overridden by a banner", () => {
    const t = new CliTracker("codex");
    expect(t.observe("Welcome to Claude Code")).toBe(false);
    expect(t.type).toBe("codex");
  });
});
