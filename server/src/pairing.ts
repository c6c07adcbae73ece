import os from "node:os";

export function isLoopbackBind(bind: string): boolean {
  const b = bind.trim().toLowerCase();
  return b === "127.0.0.1" || b === "::1" || b === "localhost";
}

export function localIp(interfaces = os.networkInterfaces()): string | null {
  for (const name of Object.keys(interfaces)) {
    for (const i of interfaces[name] ?? []) {
      if (i.internal) continue;
      if (i.family === "IPv4") return i.address;
    }
  }
  return null;
}

/** The host a phone should dial: wildcard binds resolve to the first LAN address. */
export function advertisedHost(bind: string, lan: string | null = localIp()): string {
  const b = bind.trim();
  if (b === "0.0.0.0" || b === "::") return lan ?? "127.0.0.1";
  return b || "127.0.0.1";
}

export function connectionUrl(host: string, port: number): string {
  const h = host.includes(":") && !host.startsWith("[") ? `[${host}]` : host;
  return `ws://${h}:${port}/ws`;
}

/** What the pairing QR code encodes: endpoint plus the shared token. */
export function pairingPayload(host: string, port: number, token: string): string {
  return JSON.stringify({ url: connectionUrl(host, port), token });
}
