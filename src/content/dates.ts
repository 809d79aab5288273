const ISO_DATE =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?(Z|[+-]\d{2}:?\d{2})?)?$/i;

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * An instant that remembers the UTC offset it was written with, so the
 * calendar day can be read in that offset rather than in UTC.
 */
export class OffsetDate extends Date {
  readonly offsetMinutes: number;

  constructor(timestamp: number, offsetMinutes = 0) {
    super(timestamp);
    this.offsetMinutes = offsetMinutes;
  }
}

function parseOffset(offset: string | undefined): number {
  if (!offset || offset.toUpperCase() === "Z") {
    return 0;
  }
  const sign = offset.startsWith("-") ? -1 : 1;
  const digits = offset.slice(1).replace(":", "");
  return sign * (Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2)));
}

function parseIsoString(value: string): OffsetDate | null {
  const match = ISO_DATE.exec(value.trim());
  if (!match) {
    return null;
  }

  const [, y, mo, d, h = "0", mi = "0", s = "0", frac = "", offset] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);

  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
    return null;
  }
  if (hour > 23 || minute > 59 || second > 59) {
    return null;
  }

  const millis = frac ? Math.floor(Number(`0.${frac}`) * 1000) : 0;
  const offsetMinutes = parseOffset(offset);
  const timestamp = Date.UTC(year, month - 1, day, hour, minute, second, millis);

  return new OffsetDate(timestamp - offsetMinutes * 60_000, offsetMinutes);
}

/**
 * Parse an ISO-8601 date or date-time.
 * Values without an offset are read as UTC. Returns null when unparsable.
 *
 * TOML dates arrive as Date instances whose `toISOString` keeps the form
 * they were written in (local date, local date-time or offset date-time),
 * so they go through the same string rules.
 */
export function parseIsoDate(value: unknown): OffsetDate | null {
  if (value instanceof OffsetDate) {
    return value;
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : parseIsoString(value.toISOString());
  }
  if (typeof value !== "string") {
    return null;
  }
  return parseIsoString(value);
}

/** YYYY-MM-DD in the offset the date was written with, UTC otherwise */
export function formatIsoDate(date: Date): string {
  const offsetMinutes = date instanceof OffsetDate ? date.offsetMinutes : 0;
  return new Date(date.getTime() + offsetMinutes * 60_000).toISOString().slice(0, 10);
}
