import { afterEach, describe, expect, test } from "vitest";
import fs from "node:fs";
import path from "node:path";
import type { NetworkInterfaceInfo } from "node:os";
import { advertisedHost, connectionUrl, isLoopbackBind, localIp, pairingPayload } from "../src/pairing.js";
import { clearPidFile, isProcessAlive, readPidInfo, writePidFile } from "../src/pidfile.js";
import { tmpDir } from "./helpers.js";

const cleanup: string[] = [];

afterEach(() => {
  for (const d of cleanup.splice(0)) fs.rmSync(d, { recursive: true, force: true });
});

function iface(address: string, family: "IPv4" | "IPv6", internal: boolean): NetworkInterfaceInfo {
  if (family === "IPv4") return { address, family, internal, netmask: "255.255.255.0", mac: "00:00:00:00:00:00", cidr: null };
  return { address, family, internal, netmask: "ffff::", mac: "00:00:00:00:00:00", cidr: null, scopeid: 0 };
}

describe("pairing", () => {
  test("loopback binds are recognized", () => {
    expect(isLoopbackBind(" localhost ")).toBe(true);
    expect(isLoopbackBind("::1")).toBe(true);
    expect(isLoopbackBind("0.0.0.0")).toBe(false);
  });

  test("the first external IPv4 address is the LAN address", () => {
    const ifaces = {
      lo: [iface("127.0.0.1", "IPv4", true)],
      eth0: [iface("fe80::1", "IPv6", false), iface("192.168.1.20", "IPv4", false)],
    };
    expect(localIp(ifaces)).toBe("192.168.1.20");
    expect(localIp({ lo: [iface("127.0.0.1", "IPv4", true)] })).toBeNull();
  });

  test("wildcard binds advertise the LAN address", () => {
    expect(advertisedHost("0.0.0.0", "192.168.1.20")).toBe("192.168.1.20");
    expect(advertisedHost("::", null)).toBe("127.0.0.1");
    expect(advertisedHost("10.0.0.5", "192.168.1.20")).toBe("10.0.0.5");
  });

  test("URLs bracket IPv6 hosts", () => {
    expect(connectionUrl("192.168.1.20", 9847)).toBe("ws://192.168.1.20:9847/ws");
    expect(connectionUrl("fd00::2", 9847)).toBe("ws://[fd00::2]:9847/ws");
  });

  test("the QR payload carries the url and token", () => {
    expect(JSON.parse(pairingPayload("10.0.0.5", 9000, "test-secret"))).toEqual({
      url: "ws://10.0.0.5:9000/ws",
      token: "test-secret",
    });
  });
});

describe("pid file", () => {
  test("round trips and is only cleared by its owner", () => {
    const dir = tmpDir();
    cleanup.push(dir);
    const p = path.join(dir, "run", "server.pid");
    writePidFile({ pid: 4242, port: 9847, bind: "127.0.0.1", startedAt: 5 }, p);
    expect(readPidInfo(p)).toEqual({ pid: 4242, port: 9847, bind: "127.0.0.1", startedAt: 5 });
    expect(clearPidFile(1, p)).toBe(false);
    expect(fs.existsSync(p)).toBe(true);
    expect(clearPidFile(4242, p)).toBe(true);
    expect(readPidInfo(p)).toBeNull();
  });

  test("garbage is treated as no pid file", () => {
    const dir = tmpDir();
    cleanup.push(dir);
    const p = path.join(dir, "server.pid");
    fs.writeFileSync(p, "not json");
    expect(readPidInfo(p)).toBeNull();
    fs.writeFileSync(p, JSON.stringify({ pid: -1, port: 1, bind: "x" }));
    expect(readPidInfo(p)).toBeNull();
  });

  test("the current process is alive", () => {
    expect(isProcessAlive(process.pid)).toBe(true);
  });
});
