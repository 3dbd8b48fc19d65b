/**
 * Configuration validation and backend factory.
 */
import { z } from "zod";
import type { BackendFactory, DatabaseBackend } from "./db/backend.js";
import { PostgresBackend } from "./db/postgres.js";
import { SQLiteBackend } from "./db/sqlite.js";
import { ConfigurationError } from "./core/exceptions.js";

// ---------------------------------------------------------------------------
// Config schema
// ---------------------------------------------------------------------------

const SqliteConfigSchema = z.object({
  provider: z.literal("sqlite"),
  config: z
    .object({ path: z.string().min(1).default("./experiments.db") })
    .default({}),
});

const PostgresConfigSchema = z.object({
  provider: z.literal("postgres"),
  config: z.object({ connectionString: z.string().min(1) }),
});

const DbConfigSchema = z.discriminatedUnion("provider", [
  SqliteConfigSchema,
  PostgresConfigSchema,
]);

const BackupConfigSchema = z.object({
  directory: z.string().min(1).optional(),
  extension: z.string().startsWith(".").default(".bak"),
});

export const ConfigSchema = z.object({
  db: DbConfigSchema.default({ provider: "sqlite" }),
  backups: BackupConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type DbConfig = z.infer<typeof DbConfigSchema>;

// ---------------------------------------------------------------------------
// Environment → raw config
// ---------------------------------------------------------------------------

/** Environment variable read for each config path, for error messages. */
const ENV_NAMES: Record<string, string> = {
  "db.provider": "EXPCTL_DB_PROVIDER",
  "db.config.path": "EXPCTL_SQLITE_PATH",
  "db.config.connectionString": "EXPCTL_DATABASE_URL",
  "backups.directory": "EXPCTL_BACKUP_DIR",
};

export function configFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
  const provider = env.EXPCTL_DB_PROVIDER ?? "sqlite";
  const db =
    provider === "postgres"
      ? { provider, config: { connectionString: env.EXPCTL_DATABASE_URL } }
      : { provider, config: { path: env.EXPCTL_SQLITE_PATH } };

  return {
    db,
    backups: { directory: env.EXPCTL_BACKUP_DIR || undefined },
  };
}

// ---------------------------------------------------------------------------
// Top-level config → backends
// ---------------------------------------------------------------------------

export function parseConfig(raw: unknown): Config {
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue.path.join(".");
    const source = ENV_NAMES[path] ?? path;
    throw new ConfigurationError(`${source}: ${issue.message}`);
  }
  return result.data;
}

export function buildDb(config: DbConfig): DatabaseBackend {
  switch (config.provider) {
    case "sqlite":
      return new SQLiteBackend(config.config.path);
    case "postgres":
      return new PostgresBackend(config.config.connectionString);
  }
}

export function backendFactory(config: DbConfig): BackendFactory {
  return () => buildDb(config);
}
