import { describe, expect, test } from "vitest";
import { allowedCommandSet, checkSpawnRequest } from "../src/sessions/command_policy.js";

const allowed = allowedCommandSet(["  /opt/bin/aider "]);

describe("checkSpawnRequest", () => {
  test("extra commands are matched by basename", () => {
    expect(allowed.has("aider")).toBe(true);
    expect(allowed.has("bash")).toBe(true);
    expect(checkSpawnRequest({ command: "aider", args: [] }, allowed)).toEqual({ ok: true, command: "aider" });
  });

  test("absolute paths to allowed programs pass", () => {
    expect(checkSpawnRequest({ command: " /bin/bash ", args: ["-l"] }, allowed)).toEqual({ ok: true, command: "/bin/bash" });
  });

  test("unknown programs are refused", () => {
    expect(checkSpawnRequest({ command: "vim", args: [] }, allowed)).toEqual({ ok: false, reason: "command not allowed: vim" });
  });

  test("shell metacharacters are refused anywhere in the request", () => {
    expect(checkSpawnRequest({ command: "bash", args: ["-c", "echo hi; rm"] }, allowed)).toEqual({
      ok: false,
      reason: 'args[1] contains forbidden sequence ";"',
    });
    expect(checkSpawnRequest({ command: "bash", args: [], name: "a$(b)" }, allowed)).toEqual({
      ok: false,
      reason: 'name contains forbidden sequence "$("',
    });
  });

  test("an empty command is refused", () => {
    expect(checkSpawnRequest({ command: "  ", args: [] }, allowed)).toEqual({ ok: false, reason: "command is required" });
  });
});
