/**
 * SQLite database backend using sql.js (SQLite compiled to WebAssembly).
 *
 * The database lives in memory; a file-backed database is loaded on first
 * use and written back on close().
 */
import { existsSync } from "node:fs";
import { readFile, writeFile } from "node:fs/promises";
import { createRequire } from "node:module";
import type { Database, SqlJsStatic } from "sql.js";
import type {
  DatabaseBackend,
  DatabaseHandle,
  Row,
  SqlValue,
} from "./backend.js";
import { SQLITE_SCHEMA_SQL } from "./schema.js";

// sql.js is a CommonJS module whose export is the init function.
const require = createRequire(import.meta.url);
const initSqlJs: () => Promise<SqlJsStatic> = require("sql.js");

let engine: Promise<SqlJsStatic> | undefined;

function loadEngine(): Promise<SqlJsStatic> {
  engine ??= initSqlJs();
  return engine;
}

export class SQLiteBackend implements DatabaseBackend {
  private path: string;
  private db: Promise<Database>;

  constructor(path: string = ":memory:") {
    this.path = path;
    this.db = this.open();
  }

  private async open(): Promise<Database> {
    const SQL = await loadEngine();
    const data =
      this.path !== ":memory:" && existsSync(this.path)
        ? await readFile(this.path)
        : null;
    const db = new SQL.Database(data);
    db.run("PRAGMA foreign_keys = ON;");
    return db;
  }

  async initialize(): Promise<void> {
    (await this.db).exec(SQLITE_SCHEMA_SQL);
  }

  async execute(sql: string, params: SqlValue[] = []): Promise<void> {
    (await this.db).run(sql, params);
  }

  async query<T extends Row = Row>(
    sql: string,
    params: SqlValue[] = [],
  ): Promise<T[]> {
    const stmt = (await this.db).prepare(sql, params);
    try {
      const rows: T[] = [];
      while (stmt.step()) {
        rows.push(stmt.getAsObject() as T);
      }
      return rows;
    } finally {
      stmt.free();
    }
  }

  async queryOne<T extends Row = Row>(
    sql: string,
    params: SqlValue[] = [],
  ): Promise<T | null> {
    const rows = await this.query<T>(sql, params);
    return rows[0] ?? null;
  }

  async transaction<T>(fn: (tx: DatabaseHandle) => Promise<T>): Promise<T> {
    const db = await this.db;
    db.exec("BEGIN");
    try {
      const result = await fn(this);
      db.exec("COMMIT");
      return result;
    } catch (err) {
      db.exec("ROLLBACK");
      throw err;
    }
  }

  async close(): Promise<void> {
    const db = await this.db;
    if (this.path !== ":memory:") {
      await writeFile(this.path, db.export());
    }
    db.close();
  }
}
