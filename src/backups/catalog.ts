/**
 * Backup file discovery and filtering.
 *
 * Backups are written once, so a file's modification time is used as its
 * creation time.
 */
import { readdir, stat } from "node:fs/promises";
import { join, resolve } from "node:path";
import { ArgumentSyntaxError } from "../core/exceptions.js";
import type { BackupFile, BackupFilter } from "../core/types.js";

export const DEFAULT_START = "1970-01-01T00:00:00";
export const DEFAULT_END = "9999-01-01T00:00:00";

const ISO_DATE_TIME =
  /^(\d{4})-(\d{2})-(\d{2})(?:T(\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,6}))?)?(Z|[+-]\d{2}:\d{2})?)?$/;

/** Minutes east of UTC for `Z` or `+HH:MM` / `-HH:MM`; null when out of range. */
function offsetMinutes(zone: string): number | null {
  if (zone === "Z") return 0;
  const hours = Number(zone.slice(1, 3));
  const minutes = Number(zone.slice(4, 6));
  if (hours > 23 || minutes > 59) return null;
  return (zone.startsWith("-") ? -1 : 1) * (hours * 60 + minutes);
}

/**
 * Parse `YYYY-MM-DD` or `YYYY-MM-DDTHH:MM[:SS[.ffffff]][Z|±HH:MM]`.
 * Without an offset the value is local time.
 */
export function parseIsoDateTime(text: string): Date {
  const match = ISO_DATE_TIME.exec(text);
  if (!match) {
    throw new ArgumentSyntaxError(`'${text}' is not an ISO 8601 date or date-time`);
  }
  const [, y, mo, d, h = "0", mi = "0", s = "0", frac = "0", zone] = match;
  const fields = [y, mo, d, h, mi, s].map(Number);
  fields[1] -= 1;
  const ms = Math.floor(Number(`0.${frac}`) * 1000);

  let date: Date;
  let actual: number[];
  if (zone === undefined) {
    date = new Date(
      fields[0],
      fields[1],
      fields[2],
      fields[3],
      fields[4],
      fields[5],
      ms,
    );
    actual = [
      date.getFullYear(),
      date.getMonth(),
      date.getDate(),
      date.getHours(),
      date.getMinutes(),
      date.getSeconds(),
    ];
  } else {
    const offset = offsetMinutes(zone);
    if (offset === null) {
      throw new ArgumentSyntaxError(`'${text}' has an invalid UTC offset`);
    }
    const wall = new Date(
      Date.UTC(fields[0], fields[1], fields[2], fields[3], fields[4], fields[5], ms),
    );
    actual = [
      wall.getUTCFullYear(),
      wall.getUTCMonth(),
      wall.getUTCDate(),
      wall.getUTCHours(),
      wall.getUTCMinutes(),
      wall.getUTCSeconds(),
    ];
    date = new Date(wall.getTime() - offset * 60_000);
  }

  // Date rolls invalid fields over (Feb 30 → Mar 2); reject those.
  if (actual.some((value, i) => value !== fields[i])) {
    throw new ArgumentSyntaxError(`'${text}' is not a valid date`);
  }
  return date;
}

/** Local-time `YYYY-MM-DDTHH:MM:SS`. */
export function formatLocalDateTime(date: Date): string {
  const pad = (n: number, width = 2) => String(n).padStart(width, "0");
  return (
    `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/** Compile a filename pattern so it only matches from the start of the stem. */
export function compileStemPattern(source: string): RegExp {
  try {
    return new RegExp(source, "y");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ArgumentSyntaxError(`invalid --regex pattern: ${reason}`);
  }
}

function matchesStem(pattern: RegExp, stem: string): boolean {
  pattern.lastIndex = 0;
  return pattern.test(stem);
}

/** Build a filter from `--start`, `--end` and `--regex` flag values. */
export function filterFromFlags(flags: Record<string, string>): BackupFilter {
  return {
    start: parseIsoDateTime(flags["--start"] ?? DEFAULT_START),
    end: parseIsoDateTime(flags["--end"] ?? DEFAULT_END),
    pattern: compileStemPattern(flags["--regex"] ?? ".*"),
  };
}

/**
 * List backup files in `directory` (not recursive) that pass `filter`,
 * oldest first.
 */
export async function findBackups(
  directory: string,
  filter: BackupFilter = {},
  extension: string = ".bak",
): Promise<BackupFile[]> {
  const base = resolve(directory);
  const names = await readdir(base);
  const start = filter.start?.getTime() ?? -Infinity;
  const end = filter.end?.getTime() ?? Infinity;

  const found: BackupFile[] = [];
  for (const name of names) {
    if (name.length <= extension.length || !name.endsWith(extension)) continue;

    const stem = name.slice(0, -extension.length);
    if (filter.pattern && !matchesStem(filter.pattern, stem)) continue;

    // stat() follows symlinks, so a link to a backup file counts.
    const path = join(base, name);
    const s = await stat(path);
    if (!s.isFile() || s.mtimeMs < start || s.mtimeMs > end) continue;

    found.push({ path, name, stem, createdAt: s.mtime });
  }

  return found.sort(
    (a, b) =>
      a.createdAt.getTime() - b.createdAt.getTime() ||
      a.name.localeCompare(b.name),
  );
}
