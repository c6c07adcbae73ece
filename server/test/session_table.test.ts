import { describe, expect, test } from "vitest";
import { SessionTable, type NewSession } from "../src/sessions/session_table.js";

function fixture(retentionMs = 100) {
  let t = 1000;
  const table = new SessionTable({ scrollbackBytes: 1024, retentionMs, now: () => t });
  const input: NewSession = {
    id: "s1",
    name: "build",
    command: "bash",
    projectPath: "/work/app",
    cols: 80,
    rows: 24,
    source: { kind: "wrapper", connectionId: "c1" },
  };
  return { table, input, setNow: (n: number) => (t = n) };
}

describe("SessionTable", () => {
  test("refuses a second live session with the same id", () => {
    const { table, input } = fixture();
    expect(table.create(input).ok).toBe(true);
    expect(table.create(input)).toEqual({ ok: false, reason: "session_exists" });
  });

  test("a late subscriber replays history then receives live output", () => {
    const { table, input } = fixture();
    table.create(input);
    table.appendOutput("s1", Buffer.from("hello"));

    const live: string[] = [];
    const sub = table.subscribe("s1", "c2", (b) => live.push(b.toString()));
    expect(sub).toEqual({ ok: true, history: Buffer.from("hello"), totalBytes: 5 });

    expect(table.appendOutput("s1", Buffer.from(" world"))).toEqual({ event: null, failed: [] });
    expect(live).toEqual([" world"]);
    expect(table.subscriberIds("s1")).toEqual(["c2"]);

    expect(table.unsubscribe("s1", "c2")).toBe(0);
    expect(table.unsubscribe("s1", "c2")).toBeNull();
  });

  test("subscribing to an unknown session fails", () => {
    const { table } = fixture();
    expect(table.subscribe("nope", "c2", () => undefined)).toEqual({ ok: false, reason: "not_found" });
  });

  test("summaries expose the wire shape", () => {
    const { table, input } = fixture();
    table.create(input);
    expect(table.summaries()).toEqual([
      {
        session_id: "s1",
        name: "build",
        command: "bash",
        project_path: "/work/app",
        cli_type: "terminal",
        started_at: "1970-01-01T00:00:01.000Z",
        alive: true,
        ended_at: null,
        exit_code: null,
        cols: 80,
        rows: 24,
        waiting: false,
      },
    ]);
  });

  test("output drives the wait state and input clears it", () => {
    const { table, input } = fixture();
    table.create(input);
    const { event } = table.appendOutput("s1", Buffer.from("Delete 3 files? (y/n) "));
    expect(event?.type).toBe("waiting");
    expect(table.summaries()[0]?.waiting).toBe(true);
    expect(table.noteInput("s1")).toEqual({ type: "cleared" });
    expect(table.waitState("s1")).toEqual({ kind: "running" });
  });

  test("ending keeps history for replay but stops delivery", () => {
    const { table, input, setNow } = fixture();
    table.create(input);
    table.appendOutput("s1", Buffer.from("bye"));
    setNow(1500);
    const ended = table.end("s1", 0);
    expect(ended?.event).toEqual({ type: "ended", exitCode: 0 });
    expect(ended?.session.endedAt).toBe(1500);
    expect(table.end("s1", 0)).toBeNull();

    expect(table.appendOutput("s1", Buffer.from("late"))).toEqual({ event: null, failed: [] });
    const sub = table.subscribe("s1", "c2", () => undefined);
    expect(sub.ok && sub.history.toString()).toBe("bye");
    expect(table.subscriberIds("s1")).toEqual([]);
    expect(table.sessionsOwnedBy("c1")).toEqual([]);
  });

  test("an ended id can be reused", () => {
    const { table, input } = fixture();
    table.create(input);
    table.end("s1", 1);
    expect(table.create(input).ok).toBe(true);
    expect(table.get("s1")?.alive).toBe(true);
  });

  test("sweep purges ended sessions past the retention window", () => {
    const { table, input, setNow } = fixture(100);
    table.create(input);
    table.create({ ...input, id: "s2" });
    table.end("s1", 0);
    setNow(1050);
    expect(table.sweep()).toEqual([]);
    setNow(1100);
    expect(table.sweep()).toEqual(["s1"]);
    expect(table.get("s1")).toBeNull();
    expect(table.get("s2")?.alive).toBe(true);
  });

  test("a throwing subscriber is reported back", () => {
    const { table, input } = fixture();
    table.create(input);
    table.subscribe("s1", "bad", () => {
      throw new Error("closed socket");
    });
    expect(table.appendOutput("s1", Buffer.from("x")).failed).toEqual(["bad"]);
  });
});
