/**
 * Base schema for the experiment tables.
 *
 * Sites add their own informational columns to "Experiments"; an experiment
 * file's [info] table must only name columns that exist.
 */

export const SQLITE_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS "Experiments" (
  "ExperimentID" INTEGER PRIMARY KEY AUTOINCREMENT,
  "UserDefinedID" TEXT NOT NULL UNIQUE,
  "Description" TEXT,
  "CreatedAt" TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
);

CREATE TABLE IF NOT EXISTS "ExperimentParameters" (
  "ExperimentID" INTEGER NOT NULL
    REFERENCES "Experiments" ("ExperimentID") ON DELETE CASCADE,
  "ParameterName" TEXT NOT NULL,
  "ParamValueTxt" TEXT,
  PRIMARY KEY ("ExperimentID", "ParameterName")
);
`;

export const POSTGRES_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS "Experiments" (
  "ExperimentID" SERIAL PRIMARY KEY,
  "UserDefinedID" TEXT NOT NULL UNIQUE,
  "Description" TEXT,
  "CreatedAt" TIMESTAMPTZ NOT NULL DEFAULT now()
);

CREATE TABLE IF NOT EXISTS "ExperimentParameters" (
  "ExperimentID" INTEGER NOT NULL
    REFERENCES "Experiments" ("ExperimentID") ON DELETE CASCADE,
  "ParameterName" TEXT NOT NULL,
  "ParamValueTxt" TEXT,
  PRIMARY KEY ("ExperimentID", "ParameterName")
);
`;
