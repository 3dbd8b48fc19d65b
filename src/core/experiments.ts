/**
 * Experiment statements, run against an open transaction handle.
 */
import type { DatabaseHandle, SqlValue } from "../db/backend.js";
import {
  DuplicateExperimentError,
  ExperimentNotFoundError,
} from "./exceptions.js";
import type {
  ConfigValue,
  CreateExperimentResult,
  ExperimentDefinition,
  ExperimentRow,
} from "./types.js";
import {
  quoteIdentifier,
  toBindValue,
  toParameterText,
  toSqlLiteral,
} from "./values.js";

/** A statement and its bound values. */
export interface Statement {
  sql: string;
  params: SqlValue[];
}

export const INSERT_PARAMETER_SQL =
  'INSERT INTO "ExperimentParameters" ("ExperimentID", "ParameterName", "ParamValueTxt") VALUES (?, ?, ?)';

export const SELECT_EXPERIMENT_ID_SQL =
  'SELECT "ExperimentID", "UserDefinedID" FROM "Experiments" WHERE "UserDefinedID" = ?';

export function buildExperimentInsert(
  info: Record<string, ConfigValue>,
): Statement {
  const entries = Object.entries(info);
  const columns = entries.map(([name]) => quoteIdentifier(name)).join(", ");
  const placeholders = entries.map(() => "?").join(", ");
  return {
    sql: `INSERT INTO "Experiments" (${columns}) VALUES (${placeholders})`,
    params: entries.map(([, value]) => toBindValue(value)),
  };
}

export async function findExperimentId(
  db: DatabaseHandle,
  userDefinedId: string,
): Promise<number | null> {
  const row = await db.queryOne<ExperimentRow>(SELECT_EXPERIMENT_ID_SQL, [
    userDefinedId,
  ]);
  return row ? Number(row.ExperimentID) : null;
}

export async function insertExperiment(
  db: DatabaseHandle,
  definition: ExperimentDefinition,
): Promise<CreateExperimentResult> {
  const { userDefinedId } = definition;

  if ((await findExperimentId(db, userDefinedId)) !== null) {
    throw new DuplicateExperimentError(userDefinedId);
  }

  const insert = buildExperimentInsert(definition.info);
  await db.execute(insert.sql, insert.params);

  const experimentId = await findExperimentId(db, userDefinedId);
  if (experimentId === null) {
    throw new ExperimentNotFoundError(userDefinedId);
  }

  const parameters = Object.entries(definition.parameters);
  for (const [name, value] of parameters) {
    await db.execute(INSERT_PARAMETER_SQL, [
      experimentId,
      name,
      toParameterText(value),
    ]);
  }

  return { experimentId, userDefinedId, parameterCount: parameters.length };
}

/**
 * The statements insertExperiment() would run, with literals inlined for
 * display. The experiment id is shown as a subquery since it is not yet known.
 */
export function previewExperimentInsert(
  definition: ExperimentDefinition,
): string[] {
  const entries = Object.entries(definition.info);
  const columns = entries.map(([name]) => quoteIdentifier(name)).join(", ");
  const values = entries.map(([, value]) => toSqlLiteral(value)).join(", ");
  const idLookup = `(SELECT "ExperimentID" FROM "Experiments" WHERE "UserDefinedID" = ${toSqlLiteral(definition.userDefinedId)})`;

  const lines = [`INSERT INTO "Experiments" (${columns}) VALUES (${values});`];
  for (const [name, value] of Object.entries(definition.parameters)) {
    lines.push(
      `INSERT INTO "ExperimentParameters" ("ExperimentID", "ParameterName", "ParamValueTxt") VALUES (${idLookup}, ${toSqlLiteral(name)}, ${toSqlLiteral(toParameterText(value))});`,
    );
  }
  return lines;
}
