#!/usr/bin/env node
/**
 * CLI entrypoint for expctl.
 *
 * Usage:
 *   expctl new-experiment -f experiments/baseline.toml
 *   expctl list-backups --start 2023-02-11 --end 2023-04-01
 */
import { ArgumentSyntaxError, UnknownCommandError } from "./core/exceptions.js";
import { runCommand, USAGE } from "./commands.js";

try {
  await runCommand(process.argv.slice(2));
} catch (err) {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`error: ${message}`);
  if (err instanceof ArgumentSyntaxError || err instanceof UnknownCommandError) {
    console.error(`\n${USAGE}`);
  }
  process.exitCode = 1;
}
