import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";

export type StoreSessionRow = {
  id: string;
  name: string;
  command: string;
  projectPath: string;
  cliType: string;
  createdAt: number;
  endedAt: number | null;
  exitCode: number | null;
};

export type PushTokenRow = {
  token: string;
  tokenType: string;
  platform: string;
  registeredAt: number;
};

export type Store = ReturnType<typeof createStore>;

export function createStore(baseDir: string) {
  fs.mkdirSync(baseDir, { recursive: true });
  const dbPath = path.join(baseDir, "data.sqlite");
  const db = new Database(dbPath);

  db.pragma("journal_mode = WAL");

  db.exec(`
    CREATE TABLE IF NOT EXISTS sessions (
      id TEXT PRIMARY KEY,
      name TEXT NOT NULL,
      command TEXT NOT NULL,
      projectPath TEXT NOT NULL,
      cliType TEXT NOT NULL,
      createdAt INTEGER NOT NULL,
      endedAt INTEGER,
      exitCode INTEGER
    );
    CREATE INDEX IF NOT EXISTS idx_sessions_createdAt ON sessions(createdAt);

    CREATE TABLE IF NOT EXISTS push_tokens (
      token TEXT PRIMARY KEY,
      tokenType TEXT NOT NULL,
      platform TEXT NOT NULL,
      registeredAt INTEGER NOT NULL
    );
  `);

  const stmtUpsertSession = db.prepare<StoreSessionRow>(
    `INSERT INTO sessions (id, name, command, projectPath, cliType, createdAt, endedAt, exitCode)
     VALUES (@id, @name, @command, @projectPath, @cliType, @createdAt, @endedAt, @exitCode)
     ON CONFLICT(id) DO UPDATE SET name=excluded.name, command=excluded.command, projectPath=excluded.projectPath,
       cliType=excluded.cliType, createdAt=excluded.createdAt, endedAt=excluded.endedAt, exitCode=excluded.exitCode`,
  );
  const stmtListSessions = db.prepare<[number], StoreSessionRow>("SELECT * FROM sessions ORDER BY createdAt DESC LIMIT ?");
  const stmtGetSession = db.prepare<[string], StoreSessionRow>("SELECT * FROM sessions WHERE id = ?");
  const stmtRenameSession = db.prepare<[string, string]>("UPDATE sessions SET name = ? WHERE id = ?");
  const stmtSetCliType = db.prepare<[string, string]>("UPDATE sessions SET cliType = ? WHERE id = ?");
  const stmtEndSession = db.prepare<[number, number | null, string]>(
    "UPDATE sessions SET endedAt = ?, exitCode = ? WHERE id = ? AND endedAt IS NULL",
  );
  const stmtEndOrphans = db.prepare<[number]>("UPDATE sessions SET endedAt = ? WHERE endedAt IS NULL");
  const stmtDeleteSession = db.prepare<[string]>("DELETE FROM sessions WHERE id = ?");
  const stmtPruneSessions = db.prepare<[number]>("DELETE FROM sessions WHERE endedAt IS NOT NULL AND endedAt < ?");

  const stmtUpsertPushToken = db.prepare<PushTokenRow>(
    `INSERT INTO push_tokens (token, tokenType, platform, registeredAt) VALUES (@token, @tokenType, @platform, @registeredAt)
     ON CONFLICT(token) DO UPDATE SET tokenType=excluded.tokenType, platform=excluded.platform, registeredAt=excluded.registeredAt`,
  );
  const stmtListPushTokens = db.prepare<[], PushTokenRow>("SELECT * FROM push_tokens ORDER BY registeredAt ASC");
  const stmtDeletePushToken = db.prepare<[string]>("DELETE FROM push_tokens WHERE token = ?");

  function saveSession(row: StoreSessionRow) {
    stmtUpsertSession.run(row);
  }

  function listSessions(limit = 50): StoreSessionRow[] {
    return stmtListSessions.all(Math.max(1, Math.floor(limit)));
  }

  function getSession(id: string): StoreSessionRow | null {
    return stmtGetSession.get(id) ?? null;
  }

  function renameSession(id: string, name: string) {
    stmtRenameSession.run(name, id);
  }

  function setSessionCliType(id: string, cliType: string) {
    stmtSetCliType.run(cliType, id);
  }

  function endSession(id: string, exitCode: number | null, endedAt = Date.now()) {
    stmtEndSession.run(endedAt, exitCode, id);
  }

  // Sessions still open from an earlier daemon run cannot be alive anymore.
  function endOrphanedSessions(now = Date.now()): number {
    return stmtEndOrphans.run(now).changes;
  }

  function deleteSession(id: string) {
    stmtDeleteSession.run(id);
  }

  function pruneSessions(olderThan: number): number {
    return stmtPruneSessions.run(olderThan).changes;
  }

  function savePushToken(row: PushTokenRow) {
    stmtUpsertPushToken.run(row);
  }

  function listPushTokens(): PushTokenRow[] {
    return stmtListPushTokens.all();
  }

  function deletePushToken(token: string): boolean {
    return stmtDeletePushToken.run(token).changes > 0;
  }

  function doctor() {
    return {
      ok: true,
      dbPath,
    };
  }

  function close() {
    db.close();
  }

  return {
    saveSession,
    listSessions,
    getSession,
    renameSession,
    setSessionCliType,
    endSession,
    endOrphanedSessions,
    deleteSession,
    pruneSessions,
    savePushToken,
    listPushTokens,
    deletePushToken,
    doctor,
    close,
  };
}
