import { describe, expect, test } from "vitest";
import { parseCommand } from "../src/args.js";

describe("parseCommand", () => {
  test("defaults to start and keeps the configured bind", () => {
    expect(parseCommand([])).toEqual({ kind: "start" });
    expect(parseCommand(["start"])).toEqual({ kind: "start" });
  });

  test("--lan and --local pick the bind address", () => {
    expect(parseCommand(["start", "--lan"])).toEqual({ kind: "start", bind: "0.0.0.0" });
    expect(parseCommand(["start", "--local"])).toEqual({ kind: "start", bind: "127.0.0.1" });
    expect(parseCommand(["start", "--lan", "--local"])).toEqual({ kind: "invalid", message: "Choose only one: --lan or --local" });
    expect(parseCommand(["start", "--public"])).toEqual({ kind: "invalid", message: "unknown start option: --public" });
  });

  test("simple commands", () => {
    expect(parseCommand(["stop"])).toEqual({ kind: "stop" });
    expect(parseCommand(["pair"])).toEqual({ kind: "pair" });
    expect(parseCommand(["-h"])).toEqual({ kind: "help" });
    expect(parseCommand(["launch"])).toEqual({ kind: "invalid", message: "unknown command: launch" });
  });

  test("wrap passes everything after the command through", () => {
    expect(parseCommand(["wrap", "claude", "--resume", "-p"])).toEqual({
      kind: "wrap",
      command: "claude",
      args: ["--resume", "-p"],
    });
    expect(parseCommand(["wrap", "--name", "api", "npm", "run", "dev"])).toEqual({
      kind: "wrap",
      name: "api",
      command: "npm",
      args: ["run", "dev"],
    });
    expect(parseCommand(["wrap", "--name=api", "--", "-weird"])).toEqual({ kind: "wrap", name: "api", command: "-weird", args: [] });
  });

  test("wrap errors", () => {
    expect(parseCommand(["wrap"])).toEqual({ kind: "invalid", message: "wrap needs a command" });
    expect(parseCommand(["wrap", "--name"])).toEqual({ kind: "invalid", message: "--name needs a value" });
    expect(parseCommand(["wrap", "--verbose", "bash"])).toEqual({ kind: "invalid", message: "unknown wrap option: --verbose" });
  });
});
