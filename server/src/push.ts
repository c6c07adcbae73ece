import type { Store, PushTokenRow } from "./store.js";
import type { WaitType } from "./detect/grammars.js";
import { createLogger, errorMessage } from "./log.js";

const log = createLogger("push");

export const MAX_PUSH_BODY_CHARS = 180;

export type PushToken = {
  token: string;
  token_type: string;
  platform: string;
  registered_at: number;
};

export type PushNotification = {
  title: string;
  body: string;
  data: Record<string, string>;
};

export interface PushTransport {
  send(tokens: PushToken[], notification: PushNotification): Promise<void>;
}

type FetchLike = (url: string, init: { method: string; headers: Record<string, string>; body: string }) => Promise<{
  ok: boolean;
  status: number;
}>;

/** Expo-style HTTP push: one JSON array of messages per delivery. */
export class HttpPushTransport implements PushTransport {
  constructor(
    private readonly endpoint: string,
    private readonly fetchImpl: FetchLike = fetch,
  ) {}

  async send(tokens: PushToken[], n: PushNotification): Promise<void> {
    if (tokens.length === 0) return;
    const payload = tokens.map((t) => ({
      to: t.token,
      title: n.title,
      body: n.body,
      data: n.data,
      sound: "default",
      priority: "high",
    }));
    const res = await this.fetchImpl(this.endpoint, {
      method: "POST",
      headers: { "content-type": "application/json", accept: "application/json" },
      body: JSON.stringify(payload),
    });
    if (!res.ok) throw new Error(`push endpoint responded ${res.status}`);
  }
}

const TITLES: Record<WaitType, string> = {
  tool_approval: "Tool approval needed",
  plan_approval: "Plan ready for review",
  clarifying_question: "Question",
  awaiting_response: "Waiting for input",
};

export function waitingNotification(
  sessionName: string,
  sessionId: string,
  waitType: WaitType,
  prompt: string,
): PushNotification {
  const flat = prompt.replace(/\s+/g, " ").trim();
  const body = flat.length > MAX_PUSH_BODY_CHARS ? `${flat.slice(0, MAX_PUSH_BODY_CHARS - 1)}…` : flat;
  return {
    title: `${sessionName} · ${TITLES[waitType]}`,
    body: body || TITLES[waitType],
    data: { session_id: sessionId, wait_type: waitType },
  };
}

function fromRow(r: PushTokenRow): PushToken {
  return { token: r.token, token_type: r.tokenType, platform: r.platform, registered_at: r.registeredAt };
}

/** Device tokens, persisted so notifications reach a phone whose socket is gone. */
export class PushRegistry {
  private readonly tokens = new Map<string, PushToken>();

  constructor(
    private readonly store: Store | null,
    private readonly transport: PushTransport | null,
  ) {
    if (store) for (const r of store.listPushTokens()) this.tokens.set(r.token, fromRow(r));
  }

  register(token: string, tokenType: string, platform: string): PushToken {
    const entry: PushToken = { token, token_type: tokenType, platform, registered_at: Date.now() };
    this.tokens.set(token, entry);
    this.store?.savePushToken({ token, tokenType, platform, registeredAt: entry.registered_at });
    return entry;
  }

  unregister(token: string): boolean {
    const had = this.tokens.delete(token);
    this.store?.deletePushToken(token);
    return had;
  }

  list(): PushToken[] {
    return [...this.tokens.values()];
  }

  /** Never rejects: delivery failures are logged and otherwise ignored. */
  async notify(n: PushNotification): Promise<void> {
    if (!this.transport || this.tokens.size === 0) return;
    try {
      await this.transport.send(this.list(), n);
    } catch (err) {
      log.warn("push delivery failed", errorMessage(err));
    }
  }
}
