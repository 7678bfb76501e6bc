const MONTHS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];

/**
 * Date with optional time, no zone: 2025-10-20, 2025-10-20 13:05,
 * 2025-10-20T13:05:09.250
 */
const NAIVE_TIMESTAMP =
  /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?$/;

function pad(n: number, width: number = 2): string {
  return String(n).padStart(width, "0");
}

/**
 * Parse a timestamp into epoch milliseconds.
 *
 * Zone-less values are read as UTC so that generated files and summaries do
 * not depend on the machine's time zone. Values carrying an offset or `Z` go
 * through Date.parse. Calendar rollovers (2025-02-30, 24:00:00) are rejected.
 * Returns null if not parseable.
 */
export function parseTimestamp(text: string): number | null {
  const trimmed = text.trim();
  const match = NAIVE_TIMESTAMP.exec(trimmed);
  if (match) {
    const [, y, mo, d, h = "0", mi = "0", s = "0", frac = ""] = match;
    const year = Number(y);
    const month = Number(mo) - 1;
    const day = Number(d);
    const hour = Number(h);
    const minute = Number(mi);
    const second = Number(s);
    const millis = frac ? Math.floor(Number(`0.${frac}`) * 1000) : 0;

    // setUTCFullYear keeps years 0-99 literal; Date.UTC shifts them into the 1900s
    const date = new Date(0);
    date.setUTCFullYear(year, month, day);
    date.setUTCHours(hour, minute, second, millis);
    const ms = date.getTime();
    if (
      date.getUTCFullYear() !== year ||
      date.getUTCMonth() !== month ||
      date.getUTCDate() !== day ||
      date.getUTCHours() !== hour ||
      date.getUTCMinutes() !== minute ||
      date.getUTCSeconds() !== second
    ) {
      return null;
    }
    return ms;
  }

  if (!/^\d{4}-\d{2}-\d{2}/.test(trimmed)) return null;
  const parsed = Date.parse(trimmed);
  return Number.isNaN(parsed) ? null : parsed;
}

/** YYYY-MM-DD HH:MM:SS in UTC */
export function formatDateTime(ms: number): string {
  const d = new Date(ms);
  return (
    `${pad(d.getUTCFullYear(), 4)}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())} ` +
    `${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}:${pad(d.getUTCSeconds())}`
  );
}

/** Syslog-style "Mon DD HH:MM:SS" in UTC */
export function formatSyslogTimestamp(ms: number): string {
  const d = new Date(ms);
  return (
    `${MONTHS[d.getUTCMonth()]} ${pad(d.getUTCDate())} ` +
    `${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}:${pad(d.getUTCSeconds())}`
  );
}
