/**
 * Command dispatch for the expctl CLI.
 */
import { createInterface } from "node:readline/promises";
import { parseArguments } from "./args.js";
import { filterFromFlags, formatLocalDateTime } from "./backups/catalog.js";
import { configFromEnv } from "./config.js";
import { readExperimentFile } from "./core/experiment-file.js";
import { previewExperimentInsert } from "./core/experiments.js";
import {
  ArgumentSyntaxError,
  UnknownCommandError,
} from "./core/exceptions.js";
import { ExperimentRegistry } from "./index.js";

export const USAGE = `
expctl — manage experiment records

Usage:
  expctl new-experiment -f <file> [--dry-run yes]
  expctl delete-experiment -f <file>
  expctl list-backups [--start <date>] [--end <date>] [--regex <pattern>]
  expctl restore-from-backup <file>
  expctl init-db
  expctl help

Commands:
  new-experiment        Add an experiment from a TOML file with [info] and
                        [parameters] tables; info.UserDefinedID is required
  delete-experiment     Remove an experiment (not implemented)
  list-backups          Print backup files with their creation time, oldest first
  restore-from-backup   Restore the database from a backup file (not implemented)
  init-db               Create the experiment tables if they are missing
  help                  Show this help

list-backups options:
  --start <date>        Earliest creation time, e.g. 2023-02-11 or 2023-06-14T14:32:00
  --end <date>          Latest creation time, same format
  --regex <pattern>     Match against the file name without directory or extension,
                        anchored at its start (e.g. .*50_Percent.*)

Environment:
  EXPCTL_DB_PROVIDER    sqlite (default) or postgres
  EXPCTL_SQLITE_PATH    SQLite database file (default: ./experiments.db)
  EXPCTL_DATABASE_URL   PostgreSQL connection string
  EXPCTL_BACKUP_DIR     Directory holding .bak backup files
`.trim();

export interface Output {
  log(message: string): void;
}

/** Ask a question on the terminal and resolve with the answer. */
export type Prompt = (question: string) => Promise<string>;

export interface CommandContext {
  /** Built on first use, so `help` works without valid settings. */
  registry: () => ExperimentRegistry;
  output: Output;
  prompt: Prompt;
}

type Handler = (
  args: string[],
  flags: Record<string, string>,
  ctx: CommandContext,
) => Promise<void>;

export async function terminalPrompt(question: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return await rl.question(question);
  } finally {
    rl.close();
  }
}

export function defaultContext(
  env: NodeJS.ProcessEnv = process.env,
): CommandContext {
  let registry: ExperimentRegistry | undefined;
  return {
    registry: () => (registry ??= ExperimentRegistry.fromConfig(configFromEnv(env))),
    output: console,
    prompt: terminalPrompt,
  };
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function allowFlags(
  command: string,
  flags: Record<string, string>,
  allowed: string[],
): void {
  for (const flag of Object.keys(flags)) {
    if (!allowed.includes(flag)) {
      throw new ArgumentSyntaxError(`unknown flag '${flag}' for ${command}`);
    }
  }
}

function maxPositional(command: string, args: string[], max: number): void {
  if (args.length > max) {
    throw new ArgumentSyntaxError(`too many arguments given to ${command}`);
  }
}

function yesNo(flag: string, value: string | undefined): boolean {
  if (value === undefined || value === "no") return false;
  if (value === "yes") return true;
  throw new ArgumentSyntaxError(`${flag} expects 'yes' or 'no', got '${value}'`);
}

// ---------------------------------------------------------------------------
// Handlers
// ---------------------------------------------------------------------------

const newExperiment: Handler = async (args, flags, ctx) => {
  allowFlags("new-experiment", flags, ["-f", "--dry-run"]);
  maxPositional("new-experiment", args, flags["-f"] === undefined ? 1 : 0);

  const path = flags["-f"] ?? args[0];
  if (path === undefined) {
    throw new ArgumentSyntaxError(
      "new-experiment expects an experiment file: new-experiment -f <file>",
    );
  }

  const dryRun = yesNo("--dry-run", flags["--dry-run"]);
  const definition = await readExperimentFile(path);
  if (dryRun) {
    for (const line of previewExperimentInsert(definition)) {
      ctx.output.log(line);
    }
    return;
  }

  const result = await ctx.registry().createExperiment(definition);
  ctx.output.log(
    `Created experiment '${result.userDefinedId}' (ExperimentID ${result.experimentId}) ` +
      `with ${result.parameterCount} parameter(s)`,
  );
};

const deleteExperiment: Handler = async (args, flags, ctx) => {
  await ctx.registry().deleteExperiment(args[0] ?? flags["-f"] ?? "");
};

const listBackups: Handler = async (args, flags, ctx) => {
  allowFlags("list-backups", flags, ["--start", "--end", "--regex"]);
  maxPositional("list-backups", args, 0);

  const filter = filterFromFlags(flags);
  const backups = await ctx.registry().listBackups(filter);
  for (const backup of backups) {
    ctx.output.log(`${formatLocalDateTime(backup.createdAt)} - '${backup.path}'`);
  }
};

const restoreFromBackup: Handler = async (args, flags, ctx) => {
  allowFlags("restore-from-backup", flags, []);
  if (args.length !== 1) {
    throw new ArgumentSyntaxError(
      "restore-from-backup expects exactly one file: restore-from-backup <file>",
    );
  }

  const registry = ctx.registry();
  const path = registry.resolveBackup(args[0]);
  const answer = await ctx.prompt(
    `Are you sure that this is the correct filename? '${path}'\n` +
      "type 'yes' to confirm: ",
  );

  if (answer.trim() === "yes") {
    await registry.restoreFromBackup(path);
  } else {
    ctx.output.log("The database has not been changed.");
  }
};

const initDb: Handler = async (args, flags, ctx) => {
  allowFlags("init-db", flags, []);
  maxPositional("init-db", args, 0);
  await ctx.registry().initialize();
  ctx.output.log("Database schema is ready");
};

const help: Handler = async (_args, _flags, ctx) => {
  ctx.output.log(USAGE);
};

export const COMMANDS: Record<string, Handler> = {
  "new-experiment": newExperiment,
  "delete-experiment": deleteExperiment,
  "list-backups": listBackups,
  "restore-from-backup": restoreFromBackup,
  "init-db": initDb,
  help,
};

// ---------------------------------------------------------------------------
// Entry
// ---------------------------------------------------------------------------

export async function runCommand(
  argv: readonly string[],
  ctx: CommandContext = defaultContext(),
): Promise<void> {
  const { positional, flags } = parseArguments(argv);
  const [command, ...args] = positional;

  if (command === undefined) {
    throw new ArgumentSyntaxError("no command given");
  }
  const handler = Object.hasOwn(COMMANDS, command) ? COMMANDS[command] : undefined;
  if (!handler) {
    throw new UnknownCommandError(command);
  }

  await handler(args, flags, ctx);
}
