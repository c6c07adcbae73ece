import { afterEach, describe, expect, test } from "vitest";
import fs from "node:fs";
import { buildApp, type RelayApp } from "../src/app.js";
import { TOKEN_HEADER, extractToken, isLoopback, tokenMatches } from "../src/auth.js";
import { testConfig, tmpDir } from "./helpers.js";

const cleanup: string[] = [];
const apps: RelayApp[] = [];

afterEach(async () => {
  for (const a of apps.splice(0)) await a.app.close();
  for (const d of cleanup.splice(0)) fs.rmSync(d, { recursive: true, force: true });
});

async function start() {
  const root = tmpDir();
  cleanup.push(root);
  const relay = await buildApp({ config: testConfig({ filesystem: { roots: [root] } }), dataDir: null, pushTransport: null });
  apps.push(relay);
  return { root, app: relay.app };
}

describe("token helpers", () => {
  test("bearer wins over the custom header", () => {
    expect(extractToken({ authorization: "Bearer abc", [TOKEN_HEADER]: "xyz" })).toEqual({ token: "abc", source: "bearer" });
    expect(extractToken({ [TOKEN_HEADER]: " xyz " })).toEqual({ token: "xyz", source: "header" });
    expect(extractToken({ authorization: "Basic Zm9v" })).toEqual({ token: null, source: "none" });
  });

  test("comparison needs an exact match", () => {
    expect(tokenMatches("test-secret", "test-secret")).toBe(true);
    expect(tokenMatches("test-secre", "test-secret")).toBe(false);
    expect(tokenMatches(null, "test-secret")).toBe(false);
  });

  test("loopback addresses", () => {
    expect(isLoopback("127.0.0.1")).toBe(true);
    expect(isLoopback("::ffff:127.0.0.1")).toBe(true);
    expect(isLoopback("192.168.1.4")).toBe(false);
    expect(isLoopback(undefined)).toBe(false);
  });
});

describe("http api", () => {
  test("requires the token", async () => {
    const { app } = await start();
    const res = await app.inject({ method: "GET", url: "/api/doctor" });
    expect(res.statusCode).toBe(401);
    expect(res.json()).toEqual({ error: "unauthorized" });
  });

  test("doctor reports the sandbox and counters", async () => {
    const { app, root } = await start();
    const res = await app.inject({ method: "GET", url: "/api/doctor", headers: { authorization: "Bearer test-secret" } });
    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.ok).toBe(true);
    expect(body.sessions).toBe(0);
    expect(body.connections).toBe(0);
    expect(body.store).toBeNull();
    expect(body.roots).toEqual([root]);
    expect(body.process.pid).toBe(process.pid);
  });

  test("sessions accept the custom header", async () => {
    const { app } = await start();
    const res = await app.inject({ method: "GET", url: "/api/sessions", headers: { [TOKEN_HEADER]: "test-secret" } });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ live: [], recent: [] });
  });
});
