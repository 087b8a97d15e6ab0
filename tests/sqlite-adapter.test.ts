import { describe, it, expect, beforeAll, beforeEach, afterEach } from "vitest";
import fs from "fs";
import os from "os";
import path from "path";
import {
  ensureSqlJs,
  SqliteDatabase,
} from "../src/data-sources/sqlite-adapter.js";

function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "sqlite-adapter-test-"));
}

describe("SqliteDatabase", () => {
  let tmpDir: string;

  beforeAll(async () => {
    await ensureSqlJs();
  });

  beforeEach(() => {
    tmpDir = makeTempDir();
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe("open and basic operations", () => {
    it("creates a new file-backed database on close", () => {
      const dbPath = path.join(tmpDir, "nested", "test.db");
      const db = SqliteDatabase.open(dbPath);
      db.sqlExec("CREATE TABLE t (id INTEGER PRIMARY KEY, val TEXT)");
      db.prepare("INSERT INTO t (val) VALUES (?)").run("hello");
      db.close();

      expect(fs.existsSync(dbPath)).toBe(true);
      expect(fs.existsSync(`${dbPath}.tmp`)).toBe(false);
    });

    it("reopens an existing database file", () => {
      const dbPath = path.join(tmpDir, "reopen.db");
      const db1 = SqliteDatabase.open(dbPath);
      db1.sqlExec("CREATE TABLE t (id INTEGER PRIMARY KEY, val TEXT)");
      db1.prepare("INSERT INTO t (val) VALUES (?)").run("persisted");
      db1.close();

      const db2 = SqliteDatabase.open(dbPath);
      const row = db2.prepare("SELECT val FROM t WHERE id = 1").get();
      db2.close();

      expect(row).toEqual({ val: "persisted" });
    });

    it("works in memory without a file", () => {
      const db = SqliteDatabase.inMemory();
      db.sqlExec("CREATE TABLE t (x INT)");
      db.prepare("INSERT INTO t VALUES (?)").run(42);
      expect(db.prepare("SELECT x FROM t").get()).toEqual({ x: 42 });
      db.close();
    });

    it("rejects files without the SQLite header", () => {
      const dbPath = path.join(tmpDir, "corrupt.db");
      fs.writeFileSync(dbPath, "x".repeat(200));
      expect(() => SqliteDatabase.open(dbPath)).toThrow(/bad header/);
    });

    it("rejects empty files", () => {
      const dbPath = path.join(tmpDir, "empty.db");
      fs.writeFileSync(dbPath, Buffer.alloc(0));
      expect(() => SqliteDatabase.open(dbPath)).toThrow(/too small/);
    });
  });

  describe("statements", () => {
    it("reports changed rows from run()", () => {
      const db = SqliteDatabase.inMemory();
      db.sqlExec("CREATE TABLE t (k TEXT PRIMARY KEY, v INT)");
      const insert = db.prepare("INSERT INTO t VALUES (?, ?)");
      insert.run("a", 1);
      insert.run("b", 2);

      expect(db.prepare("DELETE FROM t WHERE v > ?").run(0)).toEqual({ changes: 2 });
      expect(db.prepare("DELETE FROM t WHERE k = ?").run("a")).toEqual({ changes: 0 });
      db.close();
    });

    it("returns undefined from get() when nothing matches and all rows from all()", () => {
      const db = SqliteDatabase.inMemory();
      db.sqlExec("CREATE TABLE t (k TEXT, v INT)");
      db.prepare("INSERT INTO t VALUES (?, ?)").run("a", 1);
      db.prepare("INSERT INTO t VALUES (?, ?)").run("b", 2);

      expect(db.prepare("SELECT v FROM t WHERE k = ?").get("zzz")).toBeUndefined();
      expect(db.prepare("SELECT k FROM t ORDER BY v DESC").all()).toEqual([
        { k: "b" },
        { k: "a" },
      ]);
      db.close();
    });
  });

  describe("persist", () => {
    it("does not write a file when nothing changed", () => {
      const dbPath = path.join(tmpDir, "clean.db");
      const db = SqliteDatabase.open(dbPath);
      db.persist();
      expect(fs.existsSync(dbPath)).toBe(false);
      db.close();
      expect(fs.existsSync(dbPath)).toBe(false);
    });
  });
});
