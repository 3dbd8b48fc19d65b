/**
 * Shared test fixtures: experiment files, temp dirs, fake backends, captured output.
 */
import { mkdtempSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import type { CommandContext, Output } from "../src/commands.js";
import type {
  DatabaseBackend,
  DatabaseHandle,
  Row,
  SqlValue,
} from "../src/db/backend.js";
import { SQLiteBackend } from "../src/db/sqlite.js";
import { ExperimentRegistry } from "../src/index.js";

// ---------------------------------------------------------------------------
// Experiment files
// ---------------------------------------------------------------------------

export const MINIMAL_EXPERIMENT_TOML = `
[info]
UserDefinedID = "E1"
Note = "x"

[parameters]
p1 = "v1"
`;

export const FULL_EXPERIMENT_TOML = `
[info]
UserDefinedID = "baseline-2024"
Description = "Baseline run, operator's notes"

[parameters]
learning_rate = 0.01
epochs = 12
shuffle = true
optimizer = "adam"
`;

export function makeTmpDir(): string {
  return mkdtempSync(join(tmpdir(), "expctl-test-"));
}

export function writeExperimentFile(
  dir: string,
  text: string,
  name = "experiment.toml",
): string {
  const p = join(dir, name);
  writeFileSync(p, text);
  return p;
}

// ---------------------------------------------------------------------------
// Recording backend: remembers every statement, answers queries from a queue
// ---------------------------------------------------------------------------

export interface RecordedStatement {
  kind: "execute" | "query";
  sql: string;
  params: SqlValue[];
}

export class RecordingBackend implements DatabaseBackend {
  statements: RecordedStatement[] = [];
  events: string[] = [];
  /** Rows handed out, in order, by query() and queryOne(). */
  responses: Row[][];

  constructor(responses: Row[][] = []) {
    this.responses = responses;
  }

  async initialize(): Promise<void> {
    this.events.push("initialize");
  }

  async execute(sql: string, params: SqlValue[] = []): Promise<void> {
    this.statements.push({ kind: "execute", sql, params });
  }

  async query<T extends Row = Row>(
    sql: string,
    params: SqlValue[] = [],
  ): Promise<T[]> {
    this.statements.push({ kind: "query", sql, params });
    const rows = this.responses.shift() ?? [];
    return rows as T[];
  }

  async queryOne<T extends Row = Row>(
    sql: string,
    params: SqlValue[] = [],
  ): Promise<T | null> {
    const rows = await this.query<T>(sql, params);
    return rows[0] ?? null;
  }

  async transaction<T>(fn: (tx: DatabaseHandle) => Promise<T>): Promise<T> {
    this.events.push("begin");
    try {
      const result = await fn(this);
      this.events.push("commit");
      return result;
    } catch (err) {
      this.events.push("rollback");
      throw err;
    }
  }

  async close(): Promise<void> {
    this.events.push("close");
  }

  executed(): RecordedStatement[] {
    return this.statements.filter((s) => s.kind === "execute");
  }
}

// ---------------------------------------------------------------------------
// SQLite with an extra informational column
// ---------------------------------------------------------------------------

export async function makeSqlite(): Promise<SQLiteBackend> {
  const db = new SQLiteBackend(":memory:");
  await db.initialize();
  await db.execute('ALTER TABLE "Experiments" ADD COLUMN "Note" TEXT');
  return db;
}

/**
 * Wraps one in-memory database so every opened "connection" sees the same
 * rows; close() leaves it open for assertions.
 */
export class SharedSQLite implements DatabaseBackend {
  closeCount = 0;

  constructor(readonly db: SQLiteBackend) {}

  initialize(): Promise<void> {
    return this.db.initialize();
  }

  execute(sql: string, params?: SqlValue[]): Promise<void> {
    return this.db.execute(sql, params);
  }

  query<T extends Row = Row>(sql: string, params?: SqlValue[]): Promise<T[]> {
    return this.db.query<T>(sql, params);
  }

  queryOne<T extends Row = Row>(
    sql: string,
    params?: SqlValue[],
  ): Promise<T | null> {
    return this.db.queryOne<T>(sql, params);
  }

  transaction<T>(fn: (tx: DatabaseHandle) => Promise<T>): Promise<T> {
    return this.db.transaction(fn);
  }

  async close(): Promise<void> {
    this.closeCount++;
  }
}

// ---------------------------------------------------------------------------
// Command context
// ---------------------------------------------------------------------------

export class CapturedOutput implements Output {
  lines: string[] = [];

  log(message: string): void {
    this.lines.push(message);
  }
}

export function makeContext(
  registry: ExperimentRegistry,
  answers: string[] = [],
): { ctx: CommandContext; output: CapturedOutput; questions: string[] } {
  const output = new CapturedOutput();
  const questions: string[] = [];
  const ctx: CommandContext = {
    registry: () => registry,
    output,
    prompt: async (question) => {
      questions.push(question);
      return answers.shift() ?? "";
    },
  };
  return { ctx, output, questions };
}
