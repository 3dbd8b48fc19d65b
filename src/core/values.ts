/**
 * Conversions from experiment-file values to SQL values.
 */
import type { ConfigValue } from "./types.js";
import type { SqlValue } from "../db/backend.js";

/** Value bound to a statement placeholder. Booleans are stored as 0/1. */
export function toBindValue(value: ConfigValue): SqlValue {
  if (typeof value === "boolean") return value ? 1 : 0;
  if (value instanceof Date) return value.toISOString();
  return value;
}

/** Text stored in `ExperimentParameters.ParamValueTxt`. */
export function toParameterText(value: ConfigValue): string {
  if (typeof value === "boolean") return value ? "1" : "0";
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

/**
 * Render a value as SQL literal text, for statement previews.
 * Never used to build executed statements.
 */
export function toSqlLiteral(value: ConfigValue): string {
  if (typeof value === "boolean") return value ? "1" : "0";
  if (typeof value === "string") return quote(value);
  if (value instanceof Date) return quote(value.toISOString());
  return String(value);
}

function quote(text: string): string {
  return `'${text.replaceAll("'", "''")}'`;
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function isIdentifier(name: string): boolean {
  return IDENTIFIER.test(name);
}

/** Double-quote a column or table name already checked by isIdentifier(). */
export function quoteIdentifier(name: string): string {
  if (!isIdentifier(name)) {
    throw new TypeError(`Not a plain identifier: ${name}`);
  }
  return `"${name}"`;
}
