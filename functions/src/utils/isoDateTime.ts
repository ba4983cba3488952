/**
 * ISO-8601 parsing for client-supplied scheduled times.
 *
 * `new Date(str)` reads an offset-less date-time as local time, so the string is
 * decomposed here and an absent offset is taken as UTC.
 *
 * Instants keep microseconds: Firestore stores them, and a scheduled time read
 * back from the API must match the stored value exactly.
 */

/** Seconds since the epoch plus a nanosecond part, the shape of a Firestore Timestamp. */
export type UtcInstant = {
  seconds: number;
  nanoseconds: number;
};

const NANOS_PER_MILLI = 1_000_000;
const NANOS_PER_MICRO = 1_000;

const ISO_DATE_TIME_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2})(?::(\d{2})(?::(\d{2})(?:[.,](\d{1,6}))?)?)?(Z|[+-]\d{2}(?::?\d{2})?)?)?$/;

function daysInMonth(year: number, month: number): number {
  const probe = new Date(0);
  probe.setUTCFullYear(year, month, 0);
  return probe.getUTCDate();
}

function parseOffsetMinutes(offset: string | undefined): number | null {
  if (!offset || offset === 'Z') {
    return 0;
  }

  const sign = offset.startsWith('-') ? -1 : 1;
  const digits = offset.slice(1).replace(':', '');
  const hours = Number.parseInt(digits.slice(0, 2), 10);
  const minutes = digits.length > 2 ? Number.parseInt(digits.slice(2, 4), 10) : 0;

  if (hours > 23 || minutes > 59) {
    return null;
  }

  return sign * (hours * 60 + minutes);
}

/**
 * Parses an ISO-8601 date or date-time into a UTC instant.
 * Returns null when the string is not a valid calendar date-time.
 */
export function parseIsoDateTimeToUtc(input: string): UtcInstant | null {
  const match = ISO_DATE_TIME_PATTERN.exec(input);
  if (!match) {
    return null;
  }

  const [, yearRaw, monthRaw, dayRaw, hourRaw, minuteRaw, secondRaw, fractionRaw, offsetRaw] =
    match;

  const year = Number.parseInt(yearRaw, 10);
  const month = Number.parseInt(monthRaw, 10);
  const day = Number.parseInt(dayRaw, 10);
  const hour = hourRaw ? Number.parseInt(hourRaw, 10) : 0;
  const minute = minuteRaw ? Number.parseInt(minuteRaw, 10) : 0;
  const second = secondRaw ? Number.parseInt(secondRaw, 10) : 0;
  const nanoseconds = fractionRaw ? Number.parseInt(fractionRaw.padEnd(9, '0'), 10) : 0;

  if (year < 1 || month < 1 || month > 12) {
    return null;
  }
  if (day < 1 || day > daysInMonth(year, month)) {
    return null;
  }
  if (hour > 23 || minute > 59 || second > 59) {
    return null;
  }

  const offsetMinutes = parseOffsetMinutes(offsetRaw);
  if (offsetMinutes === null) {
    return null;
  }

  const local = new Date(0);
  local.setUTCFullYear(year, month - 1, day);
  local.setUTCHours(hour, minute, second, 0);

  return {
    seconds: (local.getTime() - offsetMinutes * 60 * 1000) / 1000,
    nanoseconds,
  };
}

export function instantFromDate(date: Date): UtcInstant {
  const millis = date.getTime();
  const seconds = Math.floor(millis / 1000);
  return { seconds, nanoseconds: (millis - seconds * 1000) * NANOS_PER_MILLI };
}

export function instantToDate(instant: UtcInstant): Date {
  return new Date(instant.seconds * 1000 + Math.floor(instant.nanoseconds / NANOS_PER_MILLI));
}

/**
 * UTC ISO-8601 with milliseconds, or microseconds when the instant has them.
 */
export function toIsoStringOrNull(value: UtcInstant | null): string | null {
  if (!value) {
    return null;
  }

  const iso = instantToDate(value).toISOString();
  const subMillis = Math.floor(value.nanoseconds / NANOS_PER_MICRO) % 1000;
  if (subMillis === 0) {
    return iso;
  }

  return `${iso.slice(0, -1)}${String(subMillis).padStart(3, '0')}Z`;
}
