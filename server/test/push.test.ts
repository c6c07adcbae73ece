import { afterEach, describe, expect, test, vi } from "vitest";
import fs from "node:fs";
import { HttpPushTransport, MAX_PUSH_BODY_CHARS, PushRegistry, waitingNotification, type PushTransport } from "../src/push.js";
import { createStore } from "../src/store.js";
import { tmpDir } from "./helpers.js";

const cleanup: string[] = [];

afterEach(() => {
  for (const d of cleanup.splice(0)) fs.rmSync(d, { recursive: true, force: true });
});

function fakeTransport() {
  const send = vi.fn<PushTransport["send"]>(async () => undefined);
  const transport: PushTransport = { send };
  return { transport, send };
}

describe("waitingNotification", () => {
  test("titles by wait type and flattens the prompt", () => {
    expect(waitingNotification("build", "s1", "tool_approval", "Do you want\n  to proceed?")).toEqual({
      title: "build · Tool approval needed",
      body: "Do you want to proceed?",
      data: { session_id: "s1", wait_type: "tool_approval" },
    });
  });

  test("long prompts are cut with an ellipsis", () => {
    const n = waitingNotification("x", "s1", "plan_approval", "a".repeat(300));
    expect(n.body).toHaveLength(MAX_PUSH_BODY_CHARS);
    expect(n.body.endsWith("…")).toBe(true);
  });

  test("an empty prompt falls back to the title text", () => {
    expect(waitingNotification("x", "s1", "awaiting_response", "  ").body).toBe("Waiting for input");
  });
});

describe("PushRegistry", () => {
  test("sends nothing without tokens", async () => {
    const { transport, send } = fakeTransport();
    const reg = new PushRegistry(null, transport);
    await reg.notify(waitingNotification("x", "s1", "tool_approval", "ok?"));
    expect(send).not.toHaveBeenCalled();
  });

  test("delivers to every registered token", async () => {
    const { transport, send } = fakeTransport();
    const reg = new PushRegistry(null, transport);
    reg.register("tok-a", "expo", "ios");
    reg.register("tok-b", "expo", "android");
    const n = waitingNotification("x", "s1", "tool_approval", "ok?");
    await reg.notify(n);
    expect(send).toHaveBeenCalledTimes(1);
    expect(send.mock.calls[0]?.[0].map((t) => t.token)).toEqual(["tok-a", "tok-b"]);
    expect(send.mock.calls[0]?.[1]).toEqual(n);
  });

  test("delivery failures do not reject", async () => {
    const transport: PushTransport = {
      send: async () => {
        throw new Error("offline");
      },
    };
    const reg = new PushRegistry(null, transport);
    reg.register("tok-a", "expo", "ios");
    await expect(reg.notify(waitingNotification("x", "s1", "tool_approval", "ok?"))).resolves.toBeUndefined();
  });

  test("tokens survive a restart through the store", () => {
    const dir = tmpDir();
    cleanup.push(dir);
    const store = createStore(dir);
    const first = new PushRegistry(store, null);
    first.register("tok-a", "expo", "ios");
    first.register("tok-b", "fcm", "android");
    expect(first.unregister("tok-b")).toBe(true);
    expect(first.unregister("tok-b")).toBe(false);

    const second = new PushRegistry(store, null);
    expect(second.list().map((t) => [t.token, t.token_type, t.platform])).toEqual([["tok-a", "expo", "ios"]]);
    store.close();
  });
});

describe("HttpPushTransport", () => {
  const tokens = [{ token: "tok-a", token_type: "expo", platform: "ios", registered_at: 1 }];
  const n = { title: "t", body: "b", data: { session_id: "s1" } };

  test("posts one JSON array per delivery", async () => {
    const calls: Array<{ url: string; body: string; method: string }> = [];
    const transport = new HttpPushTransport("https://push.example.test/send", async (url, init) => {
      calls.push({ url, body: init.body, method: init.method });
      return { ok: true, status: 200 };
    });
    await transport.send(tokens, n);
    expect(calls).toHaveLength(1);
    expect(calls[0]?.url).toBe("https://push.example.test/send");
    expect(calls[0]?.method).toBe("POST");
    expect(JSON.parse(calls[0]?.body ?? "null")).toEqual([
      { to: "tok-a", title: "t", body: "b", data: { session_id: "s1" }, sound: "default", priority: "high" },
    ]);
  });

  test("non-2xx responses reject", async () => {
    const transport = new HttpPushTransport("https://push.example.test/send", async () => ({ ok: false, status: 502 }));
    await expect(transport.send(tokens, n)).rejects.toThrow("push endpoint responded 502");
  });

  test("no tokens means no request", async () => {
    const fetchImpl = vi.fn(async () => ({ ok: true, status: 200 }));
    await new HttpPushTransport("https://push.example.test/send", fetchImpl).send([], n);
    expect(fetchImpl).not.toHaveBeenCalled();
  });
});
