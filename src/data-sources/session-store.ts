import path from "path";
import type { SessionConfig } from "../core/config.js";
import { getErrorMessage, logInfo, logWarn } from "../core/logging.js";
import {
  createSession,
  sessionFromRecord,
  sessionToRecord,
  type Session,
} from "../domain/conversation/session.js";
import { SqliteDatabase, type Row } from "./sqlite-adapter.js";

const DB_FILENAME = "sessions.db";
const SECONDS_PER_DAY = 86_400;

export interface SessionStoreOptions {
  /** Directory for sessions.db; null keeps the store in memory. */
  dataDir: string | null;
  ttlDays: number;
  historyLimit: number;
  /** Clock in epoch seconds. */
  now?: () => number;
}

export function sessionStoreOptions(config: SessionConfig): SessionStoreOptions {
  return {
    dataDir: config.dataDir,
    ttlDays: config.ttlDays,
    historyLimit: config.historyLimit,
  };
}

/**
 * Persists conversation sessions as JSON rows with a sliding expiry.
 * Rows past `expires_at` are treated as absent and removed by purgeExpired().
 */
export class SessionStore {
  private db: SqliteDatabase | null = null;
  private options: SessionStoreOptions;
  private now: () => number;

  constructor(options: SessionStoreOptions) {
    this.options = options;
    this.now = options.now ?? (() => Date.now() / 1000);
  }

  initialize(): void {
    const { dataDir } = this.options;
    this.db =
      dataDir === null
        ? SqliteDatabase.inMemory()
        : SqliteDatabase.open(path.join(dataDir, DB_FILENAME));

    this.db.sqlExec(`
      CREATE TABLE IF NOT EXISTS sessions (
        session_id  TEXT PRIMARY KEY,
        record_json TEXT NOT NULL,
        updated_at  INTEGER NOT NULL,
        expires_at  INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_sessions_expires_at ON sessions(expires_at);
    `);

    this.db.persist();
    logInfo(`SessionStore initialized (ttl ${this.options.ttlDays}d)`);
  }

  isReady(): boolean {
    return this.db !== null;
  }

  get(sessionId: string): Session | null {
    const row = this.requireDb()
      .prepare(
        "SELECT record_json FROM sessions WHERE session_id = ? AND expires_at > ?",
      )
      .get(sessionId, Math.floor(this.now()));

    const json = row ? readText(row, "record_json") : null;
    if (json === null) return null;

    let raw: unknown;
    try {
      raw = JSON.parse(json);
    } catch (err) {
      logWarn(`Session ${sessionId} has unreadable JSON: ${getErrorMessage(err)}`);
      return null;
    }
    return sessionFromRecord(raw, sessionId, this.now());
  }

  /** Stored session, or a fresh one (not yet saved) under the same id. */
  getOrCreate(sessionId: string, language?: string): Session {
    return this.get(sessionId) ?? createSession(sessionId, language, this.now());
  }

  /** Upsert; every save pushes the expiry ttlDays into the future. */
  save(session: Session): void {
    const db = this.requireDb();
    const now = Math.floor(this.now());
    const record = sessionToRecord(session, this.options.historyLimit);

    db.prepare(
      `INSERT INTO sessions (session_id, record_json, updated_at, expires_at)
       VALUES (?, ?, ?, ?)
       ON CONFLICT(session_id) DO UPDATE SET
         record_json = excluded.record_json,
         updated_at  = excluded.updated_at,
         expires_at  = excluded.expires_at`,
    ).run(
      session.session_id,
      JSON.stringify(record),
      now,
      now + this.options.ttlDays * SECONDS_PER_DAY,
    );
    db.persist();
  }

  delete(sessionId: string): boolean {
    const db = this.requireDb();
    const { changes } = db
      .prepare("DELETE FROM sessions WHERE session_id = ?")
      .run(sessionId);
    db.persist();
    return changes > 0;
  }

  /** Remove expired rows; returns how many were removed. */
  purgeExpired(): number {
    const db = this.requireDb();
    const { changes } = db
      .prepare("DELETE FROM sessions WHERE expires_at <= ?")
      .run(Math.floor(this.now()));
    db.persist();
    if (changes > 0) logInfo(`Purged ${changes} expired session(s)`);
    return changes;
  }

  count(): number {
    const row = this.requireDb()
      .prepare("SELECT COUNT(*) AS n FROM sessions WHERE expires_at > ?")
      .get(Math.floor(this.now()));
    const n = row?.n;
    return typeof n === "number" ? n : 0;
  }

  close(): void {
    if (this.db) {
      try {
        this.db.close();
      } catch (err) {
        logWarn(`SessionStore.close(): ${getErrorMessage(err)}`);
      }
      this.db = null;
    }
  }

  private requireDb(): SqliteDatabase {
    if (!this.db) {
      throw new Error("SessionStore not initialized. Call initialize() first.");
    }
    return this.db;
  }
}

function readText(row: Row, column: string): string | null {
  const value = row[column];
  return typeof value === "string" ? value : null;
}
