#!/usr/bin/env node
import fs from "node:fs";
import qrcode from "qrcode-terminal";
import { configDir, configPath, loadOrCreateConfig, readConfigFile, type Config } from "../../server/src/config.js";
import { advertisedHost, connectionUrl, isLoopbackBind, pairingPayload } from "../../server/src/pairing.js";
import { clearPidFile, isProcessAlive, pidPath, readPidInfo } from "../../server/src/pidfile.js";
import { createStore } from "../../server/src/store.js";
import { runWrapper } from "../../server/src/wrapper/wrapper_client.js";
import { errorMessage } from "../../server/src/log.js";
import { parseCommand } from "./args.js";

function usage() {
  console.log(`relayterm

Commands:
  start        Run the daemon in the foreground
              Default: [server] bind from config.toml (127.0.0.1 unless changed)
              Options: --lan (bind 0.0.0.0), --local (bind 127.0.0.1)
  stop         Stop the running daemon
  status       Show whether the daemon is running, plus recent sessions
  config       Print config path
  pair         Show a QR code with the connection URL and token
  wrap [--name N] <command> [args...]
              Run a command here and share it with connected clients
`);
}

function requireConfig(): Config {
  if (!fs.existsSync(configPath())) {
    console.error("Config missing. Start the daemon once first: relayterm start");
    process.exit(1);
  }
  return readConfigFile();
}

async function fetchDoctor(port: number, token: string): Promise<unknown> {
  const ac = new AbortController();
  const t = setTimeout(() => ac.abort(), 800);
  try {
    const r = await fetch(`http://127.0.0.1:${port}/api/doctor`, {
      headers: { authorization: `Bearer ${token}` },
      signal: ac.signal,
    });
    if (!r.ok) return null;
    const j: unknown = await r.json();
    return j;
  } catch (err) {
    console.log(`Doctor endpoint unreachable: ${errorMessage(err)}`);
    return null;
  } finally {
    clearTimeout(t);
  }
}

async function status() {
  const cfg = requireConfig();
  const info = readPidInfo();
  if (!info || !isProcessAlive(info.pid)) {
    console.log("Not running.");
  } else {
    console.log(`Running: pid ${info.pid}, http://${info.bind}:${info.port}`);
    const doctor = await fetchDoctor(info.port, cfg.auth.token);
    if (doctor !== null) console.log(JSON.stringify(doctor, null, 2));
  }

  const store = createStore(configDir());
  try {
    const recent = store.listSessions(10);
    if (recent.length === 0) return;
    console.log("\nRecent sessions:");
    for (const s of recent) {
      const state = s.endedAt === null ? "alive" : `ended (${s.exitCode ?? "?"})`;
      console.log(`  ${s.id}  ${s.name}  [${s.cliType}]  ${state}  ${s.projectPath}`);
    }
  } finally {
    store.close();
  }
}

async function stop() {
  const pp = pidPath();
  const info = readPidInfo(pp);
  if (!info) {
    console.log("Not running.");
    return;
  }
  if (!isProcessAlive(info.pid)) {
    clearPidFile(info.pid, pp);
    console.log("Not running (stale pid file removed).");
    return;
  }
  process.kill(info.pid, "SIGTERM");

  const deadline = Date.now() + 4500;
  while (Date.now() < deadline) {
    if (!isProcessAlive(info.pid)) {
      clearPidFile(info.pid, pp);
      console.log("Stopped.");
      return;
    }
    await new Promise((r) => setTimeout(r, 120));
  }

  process.kill(info.pid, "SIGKILL");
  clearPidFile(info.pid, pp);
  console.log("Stopped (SIGKILL).");
}

function pair() {
  const cfg = requireConfig();
  const info = readPidInfo();
  const bind = info?.bind ?? cfg.server.bind;
  const port = info?.port ?? cfg.server.port;
  const host = advertisedHost(bind);

  console.log("\nScan on phone:\n");
  qrcode.generate(pairingPayload(host, port, cfg.auth.token), { small: true });
  console.log(`\nOr connect to: ${connectionUrl(host, port)}`);
  console.log(`Token:         ${cfg.auth.token}\n`);
  if (isLoopbackBind(bind)) {
    console.log("Note: the daemon only listens on this machine. Restart with `relayterm start --lan` to reach it over WiFi.\n");
  }
}

async function main() {
  const cmd = parseCommand(process.argv.slice(2));
  switch (cmd.kind) {
    case "help":
      usage();
      return;
    case "invalid":
      console.error(cmd.message);
      usage();
      process.exit(2);
    case "config":
      console.log(configPath());
      return;
    case "status":
      await status();
      return;
    case "stop":
      await stop();
      return;
    case "pair":
      pair();
      return;
    case "wrap": {
      const cfg = await loadOrCreateConfig();
      const port = readPidInfo()?.port ?? cfg.server.port;
      const code = await runWrapper({ command: cmd.command, args: cmd.args, name: cmd.name, port, token: cfg.auth.token });
      process.exit(code);
    }
    case "start":
      if (cmd.bind) process.env.RELAYTERM_BIND = cmd.bind;
      await import("../../server/src/index.js");
      return;
  }
}

main().catch((e: unknown) => {
  console.error(e);
  process.exit(1);
});
