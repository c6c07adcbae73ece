import { applyEnvOverrides, configPath, loadOrCreateConfig, readConfigFile } from "./config.js";
import { buildApp } from "./app.js";
import { advertisedHost, connectionUrl, isLoopbackBind } from "./pairing.js";
import { clearPidFile, writePidFile } from "./pidfile.js";
import { createLogger, errorMessage } from "./log.js";

const log = createLogger();

const cfg = await loadOrCreateConfig();
const { app, hub } = await buildApp({ config: cfg });

try {
  await app.listen({ host: cfg.server.bind, port: cfg.server.port });
} catch (err) {
  if (err instanceof Error && "code" in err && err.code === "EADDRINUSE") {
    console.error(`Port already in use: ${cfg.server.bind}:${cfg.server.port}`);
    console.error("If relayterm is already running: relayterm status");
    console.error(`To find the process: lsof -iTCP:${cfg.server.port} -sTCP:LISTEN -P`);
    process.exit(1);
  }
  throw err;
}

writePidFile({ pid: process.pid, port: cfg.server.port, bind: cfg.server.bind, startedAt: Date.now() });

// Only the sandbox policy, limits and allow-list take effect; bind and port need a restart.
process.on("SIGHUP", () => {
  try {
    hub.reload(applyEnvOverrides(readConfigFile()));
  } catch (err) {
    log.warn(`reload of ${configPath()} failed, keeping the previous configuration:`, errorMessage(err));
  }
});

let shuttingDown = false;
async function shutdown(signal: string) {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log(`\nShutting down (${signal})...`);
  try {
    await app.close();
  } catch (err) {
    log.error("shutdown failed", errorMessage(err));
  } finally {
    clearPidFile();
    process.exit(0);
  }
}
process.on("SIGINT", () => void shutdown("SIGINT"));
process.on("SIGTERM", () => void shutdown("SIGTERM"));

console.log(`relayterm listening on http://${cfg.server.bind}:${cfg.server.port}`);
console.log(`WebSocket endpoint: ${connectionUrl(advertisedHost(cfg.server.bind), cfg.server.port)}`);
if (isLoopbackBind(cfg.server.bind)) {
  console.log(`\nLocal-only mode (bind ${cfg.server.bind}). To reach it from a phone, set [server] bind or RELAYTERM_BIND.`);
}
console.log("Run `relayterm pair` to show the pairing code.\n");
