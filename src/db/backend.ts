/**
 * Abstract database backend interface.
 *
 * All implementations use raw SQL with `?` placeholders — no ORM.
 */

export type SqlValue = string | number | null;

export type Row = Record<string, unknown>;

/** Statement-level access, shared by a backend and its open transactions. */
export interface DatabaseHandle {
  /** Execute a write statement (INSERT, UPDATE, DELETE). */
  execute(sql: string, params?: SqlValue[]): Promise<void>;

  /** Run a SELECT and return all matching rows. */
  query<T extends Row = Row>(sql: string, params?: SqlValue[]): Promise<T[]>;

  /** Run a SELECT and return the first row, or null. */
  queryOne<T extends Row = Row>(
    sql: string,
    params?: SqlValue[],
  ): Promise<T | null>;
}

export interface DatabaseBackend extends DatabaseHandle {
  /** Create tables / indexes if they do not exist. */
  initialize(): Promise<void>;

  /**
   * Run `fn` inside a transaction. Commits when it resolves, rolls back and
   * rethrows when it rejects.
   */
  transaction<T>(fn: (tx: DatabaseHandle) => Promise<T>): Promise<T>;

  /** Close the connection / release resources. */
  close(): Promise<void>;
}

/** Opens a fresh backend; called once per command. */
export type BackendFactory = () => DatabaseBackend;
