/**
 * Stampboard — src/lib/time.ts
 * WHAT: Unix-seconds timestamps and calendar-date helpers.
 * FLOWS:
 *  - nowUtc() → current Unix seconds (INTEGER for SQLite)
 *  - tsToIso() / isoToTs() → ISO-8601 round trip for CSV
 *  - calendarDate() → YYYY-MM-DD in a time zone (the check-in date)
 * DOCS:
 *  - Intl.DateTimeFormat: https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Intl/DateTimeFormat
 *
 * NOTE: All stored timestamps are Unix seconds, not milliseconds.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

export const nowUtc = (): number => Math.floor(Date.now() / 1000);

/**
 * @example
 * tsToIso(1714550400) // "2024-05-01T08:00:00.000Z"
 */
export const tsToIso = (seconds: number): string => new Date(seconds * 1000).toISOString();

// Largest |ms| a Date can hold
const MAX_DATE_MS = 8.64e15;

/**
 * True for whole Unix seconds that a Date can represent.
 */
export function isValidTs(seconds: number): boolean {
  return Number.isSafeInteger(seconds) && Math.abs(seconds * 1000) <= MAX_DATE_MS;
}

/**
 * Parses an ISO-8601 string back to Unix seconds. Returns null when unparseable.
 */
export function isoToTs(iso: string): number | null {
  const ms = Date.parse(iso);
  return Number.isNaN(ms) ? null : Math.floor(ms / 1000);
}

const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * True for a real calendar date in YYYY-MM-DD form ("2024-02-30" is rejected).
 */
export function isIsoDate(value: string): boolean {
  const m = ISO_DATE_RE.exec(value);
  if (!m) return false;
  const [, y, mo, d] = m;
  const date = new Date(Date.UTC(Number(y), Number(mo) - 1, Number(d)));
  return (
    date.getUTCFullYear() === Number(y) &&
    date.getUTCMonth() === Number(mo) - 1 &&
    date.getUTCDate() === Number(d)
  );
}

// en-CA formats dates as YYYY-MM-DD
const dateFormatters = new Map<string, Intl.DateTimeFormat>();

function dateFormatter(timeZone: string): Intl.DateTimeFormat {
  let fmt = dateFormatters.get(timeZone);
  if (!fmt) {
    fmt = new Intl.DateTimeFormat("en-CA", {
      timeZone,
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
    });
    dateFormatters.set(timeZone, fmt);
  }
  return fmt;
}

/**
 * Calendar date of a Unix-seconds timestamp in the given IANA time zone.
 *
 * @example
 * calendarDate(1714604400, "UTC")         // "2024-05-01"
 * calendarDate(1714604400, "Asia/Taipei") // "2024-05-02"
 */
export function calendarDate(tsSec: number, timeZone: string): string {
  return dateFormatter(timeZone).format(new Date(tsSec * 1000));
}

/**
 * "2024-05-01 08:00 UTC" style display string for tables.
 */
export function formatUtc(tsSec: number): string {
  return new Date(tsSec * 1000)
    .toISOString()
    .replace("T", " ")
    .replace(/:\d{2}\.\d{3}Z$/, " UTC");
}
