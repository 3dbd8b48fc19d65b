/**
 * expctl – experiment records and database backups.
 */
import { isAbsolute, join, resolve } from "node:path";
import { backendFactory, parseConfig, type Config } from "./config.js";
import { readExperimentFile } from "./core/experiment-file.js";
import { insertExperiment } from "./core/experiments.js";
import { NotImplementedError } from "./core/exceptions.js";
import type {
  BackupFile,
  BackupFilter,
  CreateExperimentResult,
  ExperimentDefinition,
} from "./core/types.js";
import type { BackendFactory } from "./db/backend.js";
import { withDatabase } from "./db/session.js";
import { findBackups } from "./backups/catalog.js";

export * from "./core/exceptions.js";
export type * from "./core/types.js";
export type {
  BackendFactory,
  DatabaseBackend,
  DatabaseHandle,
  SqlValue,
} from "./db/backend.js";
export { parseArguments } from "./args.js";
export { toBindValue, toParameterText, toSqlLiteral } from "./core/values.js";
export { withDatabase } from "./db/session.js";
export { SQLiteBackend } from "./db/sqlite.js";
export { PostgresBackend } from "./db/postgres.js";

export class ExperimentRegistry {
  private openDb: BackendFactory;
  private backupDirectory: string | undefined;
  private backupExtension: string;

  constructor(
    openDb: BackendFactory,
    backups: { directory?: string; extension?: string } = {},
  ) {
    this.openDb = openDb;
    this.backupDirectory = backups.directory;
    this.backupExtension = backups.extension ?? ".bak";
  }

  /** Construct from a configuration object (validates with Zod). */
  static fromConfig(raw: unknown): ExperimentRegistry {
    const config: Config = parseConfig(raw);
    return new ExperimentRegistry(backendFactory(config.db), config.backups);
  }

  // ------------------------------------------------------------------
  // Public API
  // ------------------------------------------------------------------

  /** Create the experiment tables if they are missing. */
  async initialize(): Promise<void> {
    const backend = this.openDb();
    try {
      await backend.initialize();
    } finally {
      await backend.close();
    }
  }

  async createExperiment(
    definition: ExperimentDefinition,
  ): Promise<CreateExperimentResult> {
    return withDatabase(this.openDb, (db) => insertExperiment(db, definition));
  }

  async createExperimentFromFile(
    path: string,
  ): Promise<CreateExperimentResult> {
    const definition = await readExperimentFile(path);
    return this.createExperiment(definition);
  }

  async deleteExperiment(_userDefinedId: string): Promise<never> {
    throw new NotImplementedError(
      "delete-experiment",
      "the deletion procedure is not defined",
    );
  }

  async listBackups(filter: BackupFilter = {}): Promise<BackupFile[]> {
    return findBackups(
      this.requireBackupDirectory("list-backups"),
      filter,
      this.backupExtension,
    );
  }

  /** Absolute path of a backup; relative names are taken from the backup directory. */
  resolveBackup(path: string): string {
    if (isAbsolute(path)) return path;
    return join(resolve(this.requireBackupDirectory("restore-from-backup")), path);
  }

  async restoreFromBackup(_path: string): Promise<never> {
    throw new NotImplementedError(
      "restore-from-backup",
      "the restore procedure is not defined",
    );
  }

  // ------------------------------------------------------------------
  // Internals
  // ------------------------------------------------------------------

  private requireBackupDirectory(command: string): string {
    if (this.backupDirectory === undefined) {
      throw new NotImplementedError(
        command,
        "no backup directory is configured (set EXPCTL_BACKUP_DIR)",
      );
    }
    return this.backupDirectory;
  }
}
