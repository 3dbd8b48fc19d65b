/**
 * Unit tests for the SQLite backend and the scoped transaction helper.
 */
import { describe, test, expect } from "vitest";
import { join } from "node:path";
import { SQLiteBackend } from "../src/db/sqlite.js";
import { toNumberedPlaceholders } from "../src/db/postgres.js";
import { withDatabase } from "../src/db/session.js";
import { RecordingBackend, SharedSQLite, makeSqlite, makeTmpDir } from "./fixtures.js";

async function makeDb(): Promise<SQLiteBackend> {
  const db = new SQLiteBackend(":memory:");
  await db.initialize();
  return db;
}

describe("SQLiteBackend", () => {
  test("initialize creates tables", async () => {
    const db = await makeDb();
    const tables = await db.query<{ name: string }>(
      "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
    );
    expect(tables.map((t) => t.name)).toEqual(["ExperimentParameters", "Experiments"]);
    await db.close();
  });

  test("initialize is idempotent", async () => {
    const db = await makeDb();
    await db.initialize();
    const row = await db.queryOne<{ n: number }>(
      "SELECT COUNT(*) AS n FROM sqlite_master WHERE type='table' AND name = 'Experiments'",
    );
    expect(row).toEqual({ n: 1 });
    await db.close();
  });

  test("queryOne returns null when nothing matches", async () => {
    const db = await makeDb();
    const row = await db.queryOne('SELECT * FROM "Experiments" WHERE "UserDefinedID" = ?', [
      "missing",
    ]);
    expect(row).toBeNull();
    await db.close();
  });

  test("a file database keeps its rows across backends", async () => {
    const path = join(makeTmpDir(), "experiments.db");
    const first = new SQLiteBackend(path);
    await first.initialize();
    await first.execute('INSERT INTO "Experiments" ("UserDefinedID") VALUES (?)', ["E1"]);
    await first.close();

    const second = new SQLiteBackend(path);
    expect(await second.query('SELECT "UserDefinedID" FROM "Experiments"')).toEqual([
      { UserDefinedID: "E1" },
    ]);
    await second.close();
  });

  test("parameters must reference an experiment", async () => {
    const db = await makeDb();
    await expect(
      db.execute(
        'INSERT INTO "ExperimentParameters" ("ExperimentID", "ParameterName", "ParamValueTxt") VALUES (?, ?, ?)',
        [99, "p", "v"],
      ),
    ).rejects.toThrow(/FOREIGN KEY/);
    await db.close();
  });

  test("deleting an experiment removes its parameters", async () => {
    const db = await makeDb();
    await db.execute('INSERT INTO "Experiments" ("UserDefinedID") VALUES (?)', ["E1"]);
    await db.execute(
      'INSERT INTO "ExperimentParameters" ("ExperimentID", "ParameterName", "ParamValueTxt") VALUES (?, ?, ?)',
      [1, "p", "v"],
    );
    await db.execute('DELETE FROM "Experiments" WHERE "UserDefinedID" = ?', ["E1"]);
    expect(await db.query('SELECT * FROM "ExperimentParameters"')).toEqual([]);
    await db.close();
  });

  test("transaction rollback", async () => {
    const db = await makeDb();

    await expect(
      db.transaction(async (tx) => {
        await tx.execute('INSERT INTO "Experiments" ("UserDefinedID") VALUES (?)', ["E1"]);
        throw new Error("rollback test");
      }),
    ).rejects.toThrow("rollback test");

    const row = await db.queryOne('SELECT * FROM "Experiments" WHERE "UserDefinedID" = ?', [
      "E1",
    ]);
    expect(row).toBeNull();
    await db.close();
  });
});

describe("withDatabase", () => {
  test("commits and closes on success", async () => {
    const backend = new RecordingBackend();
    const result = await withDatabase(() => backend, async (db) => {
      await db.execute("UPDATE t SET x = ?", [1]);
      return "done";
    });
    expect(result).toBe("done");
    expect(backend.events).toEqual(["begin", "commit", "close"]);
  });

  test("rolls back, closes and rethrows the same error", async () => {
    const backend = new RecordingBackend();
    const failure = new Error("boom");
    await expect(
      withDatabase(() => backend, async () => {
        throw failure;
      }),
    ).rejects.toBe(failure);
    expect(backend.events).toEqual(["begin", "rollback", "close"]);
  });

  test("writes are visible after commit", async () => {
    const db = await makeSqlite();
    const shared = new SharedSQLite(db);
    await withDatabase(() => shared, (tx) =>
      tx.execute('INSERT INTO "Experiments" ("UserDefinedID", "Note") VALUES (?, ?)', [
        "E1",
        "x",
      ]),
    );
    expect(shared.closeCount).toBe(1);
    expect(
      await db.queryOne('SELECT "Note" FROM "Experiments" WHERE "UserDefinedID" = ?', ["E1"]),
    ).toEqual({ Note: "x" });
    await db.close();
  });
});

describe("toNumberedPlaceholders", () => {
  test("numbers each placeholder in order", () => {
    expect(toNumberedPlaceholders("INSERT INTO t (a, b, c) VALUES (?, ?, ?)")).toBe(
      "INSERT INTO t (a, b, c) VALUES ($1, $2, $3)",
    );
  });

  test("leaves statements without placeholders alone", () => {
    expect(toNumberedPlaceholders("SELECT 1")).toBe("SELECT 1");
  });
});
