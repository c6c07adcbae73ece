import Fastify from "fastify";
import websocket from "@fastify/websocket";
import type { FastifyInstance } from "fastify";
import type { WebSocket } from "ws";
import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { addAuthGuard } from "./auth.js";
import { configDir, type Config } from "./config.js";
import { PolicyStore } from "./fs/policy.js";
import type { ChangeWatcher } from "./fs/watcher.js";
import { Hub } from "./hub/hub.js";
import { HttpPushTransport, PushRegistry, type PushTransport } from "./push.js";
import type { SessionManager } from "./sessions/session_manager.js";
import { createStore, type Store } from "./store.js";
import { createLogger, errorMessage } from "./log.js";

const log = createLogger("app");

export type AppOptions = {
  config: Config;
  // null: no persistence (sessions and push tokens live in memory only).
  dataDir?: string | null;
  pushTransport?: PushTransport | null;
  isLocalAddress?: (ip: string | undefined) => boolean;
  homeDir?: string;
  watcher?: ChangeWatcher;
  sessionManager?: SessionManager;
};

export type RelayApp = {
  app: FastifyInstance;
  hub: Hub;
  store: Store | null;
};

type PackageInfo = { name: string | null; version: string };

function readPackageInfo(): PackageInfo {
  const moduleDir = path.dirname(fileURLToPath(import.meta.url));
  // server/src in a checkout, dist/server/src once built.
  for (const up of [["..", ".."], ["..", "..", ".."]]) {
    const p = path.resolve(moduleDir, ...up, "package.json");
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(p, "utf8"));
    } catch (err) {
      log.debug("package.json not readable", p, errorMessage(err));
      continue;
    }
    if (typeof raw !== "object" || raw === null) continue;
    const name = "name" in raw && typeof raw.name === "string" ? raw.name : null;
    const version = "version" in raw && typeof raw.version === "string" ? raw.version : "0.0.0";
    return { name, version };
  }
  return { name: null, version: "0.0.0" };
}

export async function buildApp(opts: AppOptions): Promise<RelayApp> {
  const cfg = opts.config;
  const pkg = readPackageInfo();

  const app = Fastify({
    logger: false,
    bodyLimit: 10 * 1024 * 1024,
  });

  await app.register(websocket, { options: { maxPayload: cfg.limits.max_message_bytes } });

  const store = opts.dataDir === null ? null : createStore(opts.dataDir ?? configDir());
  if (store) {
    const orphans = store.endOrphanedSessions();
    if (orphans > 0) log.info("marked sessions from a previous run as ended", orphans);
  }

  const transport =
    opts.pushTransport !== undefined ? opts.pushTransport : cfg.push.enabled ? new HttpPushTransport(cfg.push.endpoint) : null;

  const hub = new Hub({
    config: cfg,
    policies: new PolicyStore(cfg.filesystem),
    push: new PushRegistry(store, transport),
    store,
    serverVersion: pkg.version,
    watcher: opts.watcher,
    ptys: opts.sessionManager,
    homeDir: opts.homeDir,
    isLocalAddress: opts.isLocalAddress,
  });
  hub.start();

  // The WebSocket endpoint authenticates in-band (hello / register_pty).
  addAuthGuard(app, () => hub.token, { onlyPrefixes: ["/api"] });

  app.get("/api/doctor", async () => {
    return {
      ok: true,
      app: { name: pkg.name, version: pkg.version },
      process: {
        pid: process.pid,
        node: process.version,
        platform: process.platform,
        arch: process.arch,
      },
      sessions: hub.sessions.list().filter((s) => s.alive).length,
      connections: hub.connectionCount(),
      store: store ? store.doctor() : null,
      roots: [...hub.engine.policy.roots],
    };
  });

  app.get("/api/sessions", async () => {
    return {
      live: hub.sessions.summaries(),
      recent: store ? store.listSessions(50) : [],
    };
  });

  app.get("/ws", { websocket: true }, (socket: WebSocket, req) => {
    hub.attach(socket, { ip: req.ip, headers: req.headers });
  });

  app.addHook("onClose", async () => {
    await hub.close();
    store?.close();
  });

  return { app, hub, store };
}
