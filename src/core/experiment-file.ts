/**
 * Experiment file loading: TOML with [info] and [parameters] tables.
 *
 *   [info]
 *   UserDefinedID = "E1"
 *   Description = "baseline run"
 *
 *   [parameters]
 *   learning_rate = 0.01
 *   shuffle = true
 */
import { readFile } from "node:fs/promises";
import { parse, TomlDate, TomlError } from "smol-toml";
import { z } from "zod";
import { ExperimentConfigError } from "./exceptions.js";
import type { ExperimentDefinition } from "./types.js";
import { isIdentifier } from "./values.js";

// Dates stay TomlDates so local dates, local times and offsets survive.
const ValueSchema = z.union(
  [z.string(), z.number(), z.boolean(), z.instanceof(TomlDate, { fatal: true })],
  {
    errorMap: () => ({ message: "expected a string, number, boolean or date" }),
  },
);

const ColumnName = z.string().refine(isIdentifier, (name) => ({
  message: `'${name}' is not a valid column name`,
}));

const ExperimentFileSchema = z.object({
  info: z
    .record(ColumnName, ValueSchema)
    .refine((info) => "UserDefinedID" in info, {
      message: "UserDefinedID is required",
    }),
  parameters: z.record(z.string().min(1), ValueSchema),
});

export function parseExperimentFile(
  text: string,
  path: string = "<inline>",
): ExperimentDefinition {
  let document: unknown;
  try {
    document = parse(text);
  } catch (err) {
    if (err instanceof TomlError) {
      throw new ExperimentConfigError(path, err.message);
    }
    throw err;
  }

  const result = ExperimentFileSchema.safeParse(document);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new ExperimentConfigError(path, `${where}${issue.message}`);
  }

  const { info, parameters } = result.data;
  const userDefinedId = info.UserDefinedID;
  if (typeof userDefinedId !== "string" || userDefinedId.length === 0) {
    throw new ExperimentConfigError(
      path,
      "info.UserDefinedID: must be a non-empty string",
    );
  }

  return { info, parameters, userDefinedId };
}

export async function readExperimentFile(
  path: string,
): Promise<ExperimentDefinition> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ExperimentConfigError(path, reason);
  }
  return parseExperimentFile(text, path);
}
