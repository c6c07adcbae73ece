import { timingSafeEqual } from "node:crypto";
import type { FastifyInstance } from "fastify";
import type { IncomingHttpHeaders } from "node:http";

export const TOKEN_HEADER = "x-relayterm-token";

export type TokenSource = "none" | "bearer" | "header";

function headerValue(v: string | string[] | undefined): string {
  if (Array.isArray(v)) return v[0] ?? "";
  return typeof v === "string" ? v : "";
}

export function extractToken(headers: IncomingHttpHeaders): { token: string | null; source: TokenSource } {
  const auth = headerValue(headers.authorization);
  if (auth.toLowerCase().startsWith("bearer ")) {
    const t = auth.slice(7).trim();
    if (t) return { token: t, source: "bearer" };
  }
  const x = headerValue(headers[TOKEN_HEADER]).trim();
  if (x) return { token: x, source: "header" };
  return { token: null, source: "none" };
}

export function tokenMatches(candidate: string | null | undefined, expected: string): boolean {
  if (!candidate) return false;
  const a = Buffer.from(candidate, "utf8");
  const b = Buffer.from(expected, "utf8");
  return a.length === b.length && timingSafeEqual(a, b);
}

export function isLoopback(ip: string | undefined): boolean {
  if (!ip) return false;
  return ip === "127.0.0.1" || ip === "::1" || ip === "::ffff:127.0.0.1" || ip.startsWith("127.");
}

/** Bearer/header token check for HTTP routes under `prefixes`. The WebSocket endpoint authenticates in-band. */
export function addAuthGuard(app: FastifyInstance, getToken: () => string, opts?: { onlyPrefixes?: string[] }): void {
  const only = opts?.onlyPrefixes?.length ? opts.onlyPrefixes : null;
  app.addHook("preHandler", async (req, reply) => {
    if (only && !only.some((p) => req.url.startsWith(p))) return;
    const { token } = extractToken(req.headers);
    if (!tokenMatches(token, getToken())) {
      return reply.code(401).send({ error: "unauthorized" });
    }
  });
}
