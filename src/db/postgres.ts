/**
 * PostgreSQL database backend using postgres-js.
 *
 * Statements are written with `?` placeholders, like the SQLite backend, and
 * rewritten to `$1, $2, …` before they reach the server.
 */
import postgres from "postgres";
import type {
  DatabaseBackend,
  DatabaseHandle,
  Row,
  SqlValue,
} from "./backend.js";
import { POSTGRES_SCHEMA_SQL } from "./schema.js";

/** Rewrite `?` placeholders as numbered `$n` parameters. */
export function toNumberedPlaceholders(sql: string): string {
  let n = 0;
  return sql.replace(/\?/g, () => `$${++n}`);
}

class PostgresHandle implements DatabaseHandle {
  constructor(private readonly sql: postgres.Sql) {}

  async execute(sql: string, params: SqlValue[] = []): Promise<void> {
    await this.sql.unsafe(toNumberedPlaceholders(sql), params);
  }

  async query<T extends Row = Row>(
    sql: string,
    params: SqlValue[] = [],
  ): Promise<T[]> {
    return await this.sql.unsafe<T[]>(toNumberedPlaceholders(sql), params);
  }

  async queryOne<T extends Row = Row>(
    sql: string,
    params: SqlValue[] = [],
  ): Promise<T | null> {
    const rows = await this.query<T>(sql, params);
    return rows[0] ?? null;
  }
}

export class PostgresBackend implements DatabaseBackend {
  private sql: postgres.Sql;
  private handle: PostgresHandle;

  constructor(connectionString: string) {
    this.sql = postgres(connectionString, { onnotice: () => {} });
    this.handle = new PostgresHandle(this.sql);
  }

  async initialize(): Promise<void> {
    await this.sql.unsafe(POSTGRES_SCHEMA_SQL);
  }

  execute(sql: string, params?: SqlValue[]): Promise<void> {
    return this.handle.execute(sql, params);
  }

  query<T extends Row = Row>(sql: string, params?: SqlValue[]): Promise<T[]> {
    return this.handle.query<T>(sql, params);
  }

  queryOne<T extends Row = Row>(
    sql: string,
    params?: SqlValue[],
  ): Promise<T | null> {
    return this.handle.queryOne<T>(sql, params);
  }

  /** Runs on one reserved connection so every statement shares the transaction. */
  async transaction<T>(fn: (tx: DatabaseHandle) => Promise<T>): Promise<T> {
    const reserved = await this.sql.reserve();
    try {
      await reserved.unsafe("BEGIN");
      try {
        const result = await fn(new PostgresHandle(reserved));
        await reserved.unsafe("COMMIT");
        return result;
      } catch (err) {
        await reserved.unsafe("ROLLBACK");
        throw err;
      }
    } finally {
      reserved.release();
    }
  }

  async close(): Promise<void> {
    await this.sql.end();
  }
}
