/**
 * @tally/ledger — ISO-8601 timestamp parsing.
 *
 * Rules:
 * - Only `YYYY-MM-DDTHH:MM[:SS[.fff…]][offset]` is accepted; free-form
 *   strings that Date.parse would take are rejected
 * - Offsets are `Z`, `±HH:MM`, `±HHMM` or `±HH`
 * - New input must carry an offset; a stored timestamp without one is UTC
 * - The result never depends on the host time zone
 */

const ISO_DATE_TIME =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?(Z|[+-]\d{2}(?::?\d{2})?)?$/;

export interface ParseTimestampOptions {
  /** Reject timestamps without an explicit offset. Default: false (read as UTC) */
  readonly requireOffset?: boolean | undefined;
}

function daysInMonth(year: number, month: number): number {
  const date = new Date(0);
  date.setUTCFullYear(year, month, 0);
  return date.getUTCDate();
}

/** Offset east of UTC in minutes, or undefined when out of range. */
function offsetMinutes(offset: string): number | undefined {
  if (offset === "Z") return 0;

  const sign = offset.startsWith("-") ? -1 : 1;
  const digits = offset.slice(1).replace(":", "");
  const hours = Number(digits.slice(0, 2));
  const minutes = digits.length > 2 ? Number(digits.slice(2)) : 0;

  if (hours > 23 || minutes > 59) return undefined;
  return sign * (hours * 60 + minutes);
}

/**
 * Parse an ISO-8601 date-time into epoch milliseconds.
 * Returns undefined for anything that is not a valid instant.
 *
 * parseTimestamp("2024-01-01T10:00:00")                            → 1704103200000
 * parseTimestamp("2024-01-01T11:00:00+01:00")                      → 1704103200000
 * parseTimestamp("2024-01-01T10:00:00", { requireOffset: true })   → undefined
 */
export function parseTimestamp(
  value: string,
  options: ParseTimestampOptions = {},
): number | undefined {
  const match = ISO_DATE_TIME.exec(value);
  if (match === null) return undefined;

  const [, y, mo, d, h, mi, s, frac, offset] = match;
  if (offset === undefined && options.requireOffset === true) return undefined;

  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s ?? "0");
  const millis = Number((frac ?? "").padEnd(3, "0").slice(0, 3));

  if (month < 1 || month > 12) return undefined;
  if (day < 1 || day > daysInMonth(year, month)) return undefined;
  if (hour > 23 || minute > 59 || second > 59) return undefined;

  const shift = offsetMinutes(offset ?? "Z");
  if (shift === undefined) return undefined;

  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, millis);
  return date.getTime() - shift * 60_000;
}
