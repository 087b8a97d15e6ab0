/**
 * Small synchronous SQLite wrapper over sql.js (WASM).
 *
 * The database lives in memory; file-backed handles write themselves back
 * to disk on persist() and close().
 */
import initSqlJs, {
  type Database as SqlJsDatabase,
  type ParamsObject,
  type SqlJsStatic,
  type SqlValue,
} from "sql.js";
import fs from "fs";
import path from "path";

export type Row = ParamsObject;
export type { SqlValue };

let SQL: SqlJsStatic | null = null;

/** Load the sql.js WASM binary once per process. */
export async function ensureSqlJs(): Promise<SqlJsStatic> {
  if (!SQL) {
    SQL = await initSqlJs();
  }
  return SQL;
}

function requireSqlJs(): SqlJsStatic {
  if (!SQL) throw new Error("Call ensureSqlJs() before opening a database");
  return SQL;
}

export class PreparedStatement {
  private db: SqlJsDatabase;
  private sql: string;
  private parent: SqliteDatabase;

  constructor(db: SqlJsDatabase, sql: string, parent: SqliteDatabase) {
    this.db = db;
    this.sql = sql;
    this.parent = parent;
  }

  /** INSERT/UPDATE/DELETE. Returns the number of rows changed. */
  run(...params: SqlValue[]): { changes: number } {
    const stmt = this.db.prepare(this.sql);
    try {
      if (params.length > 0) stmt.bind(params);
      stmt.step();
    } finally {
      stmt.free();
    }
    this.parent.markDirty();
    return { changes: this.db.getRowsModified() };
  }

  /** First row, or undefined. */
  get(...params: SqlValue[]): Row | undefined {
    const stmt = this.db.prepare(this.sql);
    try {
      if (params.length > 0) stmt.bind(params);
      return stmt.step() ? stmt.getAsObject() : undefined;
    } finally {
      stmt.free();
    }
  }

  all(...params: SqlValue[]): Row[] {
    const stmt = this.db.prepare(this.sql);
    const rows: Row[] = [];
    try {
      if (params.length > 0) stmt.bind(params);
      while (stmt.step()) {
        rows.push(stmt.getAsObject());
      }
    } finally {
      stmt.free();
    }
    return rows;
  }
}

export class SqliteDatabase {
  private db: SqlJsDatabase;
  private filePath: string | null;
  private dirty = false;

  private constructor(db: SqlJsDatabase, filePath: string | null) {
    this.db = db;
    this.filePath = filePath;
  }

  /**
   * Open a file-backed database, creating it when missing. Refuses files
   * without the SQLite header so a stray file is never overwritten.
   */
  static open(filePath: string): SqliteDatabase {
    const sql = requireSqlJs();
    if (!fs.existsSync(filePath)) {
      return new SqliteDatabase(new sql.Database(), filePath);
    }

    const buffer = fs.readFileSync(filePath);
    if (buffer.length < 100) {
      throw new Error(
        `Database file too small to be valid SQLite: ${filePath} (${buffer.length} bytes)`,
      );
    }
    if (buffer.subarray(0, 15).toString("utf8") !== "SQLite format 3") {
      throw new Error(`Not a valid SQLite database (bad header): ${filePath}`);
    }
    return new SqliteDatabase(new sql.Database(new Uint8Array(buffer)), filePath);
  }

  static inMemory(): SqliteDatabase {
    return new SqliteDatabase(new (requireSqlJs().Database)(), null);
  }

  /** Run DDL or other multi-statement SQL. */
  sqlExec(sql: string): void {
    this.db.run(sql);
    this.dirty = true;
  }

  prepare(sql: string): PreparedStatement {
    return new PreparedStatement(this.db, sql, this);
  }

  /** Write to disk via temp file + rename. No-op when in memory or clean. */
  persist(): void {
    if (!this.filePath || !this.dirty) return;
    const data = this.db.export();
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    const tmpPath = `${this.filePath}.tmp`;
    fs.writeFileSync(tmpPath, Buffer.from(data));
    fs.renameSync(tmpPath, this.filePath);
    this.dirty = false;
  }

  markDirty(): void {
    this.dirty = true;
  }

  close(): void {
    this.persist();
    this.db.close();
  }
}
