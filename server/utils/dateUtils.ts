/**
 * Studio Timezone Utilities
 *
 * Every class schedule is compared on a single timeline: the studio's
 * reference timezone. Inputs may be naive (read as studio civil time) or
 * carry any offset; the absolute instant is always preserved.
 */
import { InvalidTimestampError } from '../core/errors';

export const STUDIO_TIMEZONE = 'Asia/Kolkata';

export interface StudioTimestamp {
  /** The absolute instant. */
  instant: Date;
  /** Civil time in the studio timezone, e.g. `2099-01-01T09:00:00+05:30`. */
  local: string;
}

const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?\s*(Z|z|[+-]\d{2}(?::?\d{2})?)?$/;

const offsetFormatter = new Intl.DateTimeFormat('en-US', {
  timeZone: STUDIO_TIMEZONE,
  timeZoneName: 'longOffset',
});

const partsFormatter = new Intl.DateTimeFormat('en-US', {
  timeZone: STUDIO_TIMEZONE,
  year: 'numeric',
  month: '2-digit',
  day: '2-digit',
  hour: '2-digit',
  minute: '2-digit',
  second: '2-digit',
  hourCycle: 'h23',
});

function pad(n: number): string {
  return n.toString().padStart(2, '0');
}

function formatOffset(offsetMinutes: number): string {
  const sign = offsetMinutes < 0 ? '-' : '+';
  const abs = Math.abs(offsetMinutes);
  return `${sign}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`;
}

/**
 * Offset of the studio timezone from UTC at the given instant, in minutes.
 */
export function getStudioOffsetMinutes(instant: Date): number {
  const zoneName = offsetFormatter.formatToParts(instant).find(p => p.type === 'timeZoneName')?.value ?? 'GMT';
  // "GMT" alone means UTC+0
  const match = zoneName.match(/GMT([+-])(\d{1,2})(?::(\d{2}))?/);
  if (!match) return 0;
  const minutes = parseInt(match[2], 10) * 60 + parseInt(match[3] ?? '0', 10);
  return match[1] === '-' ? -minutes : minutes;
}

/**
 * Format an instant as studio civil time with its offset.
 */
export function formatStudioISOString(instant: Date): string {
  const parts = partsFormatter.formatToParts(instant);
  const get = (type: Intl.DateTimeFormatPartTypes) => parts.find(p => p.type === type)?.value ?? '00';
  const offset = formatOffset(getStudioOffsetMinutes(instant));
  return `${get('year').padStart(4, '0')}-${get('month')}-${get('day')}T${get('hour')}:${get('minute')}:${get('second')}${offset}`;
}

function parseOffsetMinutes(designator: string): number {
  if (designator === 'Z' || designator === 'z') return 0;
  const sign = designator.startsWith('-') ? -1 : 1;
  const digits = designator.slice(1).replace(':', '');
  const hours = parseInt(digits.slice(0, 2), 10);
  const minutes = digits.length > 2 ? parseInt(digits.slice(2, 4), 10) : 0;
  if (hours > 23 || minutes > 59) {
    throw new InvalidTimestampError(designator);
  }
  return sign * (hours * 60 + minutes);
}

// Date.UTC maps years 0-99 onto 1900-1999; setUTCFullYear does not
function utcTime(year: number, month: number, day: number, hour = 0, minute = 0, second = 0, millis = 0): number {
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, millis);
  return date.getTime();
}

function daysInMonth(year: number, month: number): number {
  return new Date(utcTime(year, month + 1, 0)).getUTCDate();
}

function parseTimestamp(input: string): Date {
  const match = ISO_PATTERN.exec(input.trim());
  if (!match) {
    throw new InvalidTimestampError(input);
  }

  const year = parseInt(match[1], 10);
  const month = parseInt(match[2], 10);
  const day = parseInt(match[3], 10);
  const hour = parseInt(match[4] ?? '0', 10);
  const minute = parseInt(match[5] ?? '0', 10);
  const second = parseInt(match[6] ?? '0', 10);
  const millis = match[7] ? parseInt(match[7].slice(0, 3).padEnd(3, '0'), 10) : 0;

  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
    throw new InvalidTimestampError(input);
  }
  if (hour > 23 || minute > 59 || second > 59) {
    throw new InvalidTimestampError(input);
  }

  const wallClockAsUtc = utcTime(year, month, day, hour, minute, second, millis);

  if (match[8]) {
    return new Date(wallClockAsUtc - parseOffsetMinutes(match[8]) * 60_000);
  }

  // Naive input: studio civil time. Re-check the offset at the resulting
  // instant so zones with DST transitions resolve to the right side.
  const firstGuess = wallClockAsUtc - getStudioOffsetMinutes(new Date(wallClockAsUtc)) * 60_000;
  const settledOffset = getStudioOffsetMinutes(new Date(firstGuess));
  return new Date(wallClockAsUtc - settledOffset * 60_000);
}

/**
 * Convert a timestamp to the studio timezone, keeping the absolute instant.
 * Strings without an offset are read as studio civil time.
 */
export function normalizeToStudioTime(input: string | Date): StudioTimestamp {
  let instant: Date;
  if (input instanceof Date) {
    if (isNaN(input.getTime())) {
      throw new InvalidTimestampError(input);
    }
    instant = new Date(input.getTime());
  } else if (typeof input === 'string') {
    instant = parseTimestamp(input);
  } else {
    throw new InvalidTimestampError(input);
  }
  return { instant, local: formatStudioISOString(instant) };
}

export function nowInStudioTime(): StudioTimestamp {
  return normalizeToStudioTime(new Date());
}

/**
 * True when the timestamp is at or before `now`.
 */
export function isPastInStudioTime(timestamp: StudioTimestamp, now: Date = new Date()): boolean {
  return timestamp.instant.getTime() <= now.getTime();
}
