/**
 * Anything accepted as an `after` / `before` bound: a Date, epoch seconds, or
 * a local-time string `YYYYMMDD` / `YYYYMMDDHHMM`.
 */
export type TimeIsh = Date | number | string | null | undefined;

const COMPACT_DATE = /^(\d{4})(\d{2})(\d{2})(?:(\d{2})(\d{2}))?$/;

/**
 * Converts a time bound to epoch seconds. Unparseable input yields undefined,
 * which callers treat as "no bound".
 */
export function parseTime(value: TimeIsh): number | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }
  if (value instanceof Date) {
    const ms = value.getTime();
    return isNaN(ms) ? undefined : Math.floor(ms / 1000);
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? Math.trunc(value) : undefined;
  }

  const match = COMPACT_DATE.exec(value);
  if (!match || (value.length !== 8 && value.length !== 12)) {
    return undefined;
  }

  const [, year, month, day, hours, minutes] = match;
  const date = new Date(
    Number(year),
    Number(month) - 1,
    Number(day),
    hours ? Number(hours) : 0,
    minutes ? Number(minutes) : 0
  );
  // Reject rollovers such as 20240231
  if (date.getMonth() !== Number(month) - 1 || date.getDate() !== Number(day)) {
    return undefined;
  }
  return Math.floor(date.getTime() / 1000);
}

/**
 * Slack expects timestamps as strings.
 */
export function toSlackTs(seconds: number | undefined): string | undefined {
  return seconds === undefined ? undefined : String(seconds);
}

/**
 * Date of a Slack message timestamp ("1712345678.000100").
 */
export function tsToDate(ts: string): Date {
  return new Date(parseFloat(ts) * 1000);
}
