export type CliCommand =
  | { kind: "start"; bind?: "0.0.0.0" | "127.0.0.1" }
  | { kind: "stop" }
  | { kind: "status" }
  | { kind: "config" }
  | { kind: "pair" }
  | { kind: "wrap"; name?: string; command: string; args: string[] }
  | { kind: "help" }
  | { kind: "invalid"; message: string };

// Wrapper options end at the first non-option word: everything after it belongs to the command.
function parseWrap(args: string[]): CliCommand {
  let name: string | undefined;
  let i = 0;
  while (i < args.length) {
    const a = args[i] ?? "";
    if (a === "--") {
      i += 1;
      break;
    }
    if (a === "--name") {
      const v = args[i + 1];
      if (v === undefined || v === "") return { kind: "invalid", message: "--name needs a value" };
      name = v;
      i += 2;
      continue;
    }
    if (a.startsWith("--name=")) {
      name = a.slice("--name=".length);
      if (!name) return { kind: "invalid", message: "--name needs a value" };
      i += 1;
      continue;
    }
    if (a.startsWith("-")) return { kind: "invalid", message: `unknown wrap option: ${a}` };
    break;
  }
  const command = args[i];
  if (command === undefined || command === "") return { kind: "invalid", message: "wrap needs a command" };
  const out: Extract<CliCommand, { kind: "wrap" }> = { kind: "wrap", command, args: args.slice(i + 1) };
  if (name !== undefined) out.name = name;
  return out;
}

export function parseCommand(argv: string[]): CliCommand {
  const [cmd = "start", ...rest] = argv;
  switch (cmd) {
    case "start": {
      const unknown = rest.find((a) => a !== "--lan" && a !== "--local");
      if (unknown !== undefined) return { kind: "invalid", message: `unknown start option: ${unknown}` };
      if (rest.includes("--lan") && rest.includes("--local")) {
        return { kind: "invalid", message: "Choose only one: --lan or --local" };
      }
      if (rest.includes("--lan")) return { kind: "start", bind: "0.0.0.0" };
      if (rest.includes("--local")) return { kind: "start", bind: "127.0.0.1" };
      return { kind: "start" };
    }
    case "stop":
    case "status":
    case "config":
    case "pair":
      return { kind: cmd };
    case "wrap":
      return parseWrap(rest);
    case "help":
    case "--help":
    case "-h":
      return { kind: "help" };
    default:
      return { kind: "invalid", message: `unknown command: ${cmd}` };
  }
}
