import { differenceInSeconds, format } from 'date-fns';

const SECONDS_PER_HOUR = 3600;

/** Whole seconds between two instants, never negative. */
export function durationSeconds(start: Date, end: Date): number {
  return Math.max(0, differenceInSeconds(end, start));
}

/**
 * Converts seconds to fractional hours, optionally rounding the duration to the
 * nearest `roundingMinutes` first.
 */
export function secondsToHours(seconds: number, roundingMinutes = 0): number {
  let total = seconds;
  if (roundingMinutes > 0) {
    const unit = roundingMinutes * 60;
    total = Math.round(seconds / unit) * unit;
  }
  return total / SECONDS_PER_HOUR;
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

/**
 * The `YYYY-MM-DD` calendar date of an instant, in the given IANA zone or in
 * the process's local zone when none is given.
 */
export function calendarDate(instant: Date, timeZone?: string): string {
  if (!timeZone) {
    return format(instant, 'yyyy-MM-dd');
  }

  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).formatToParts(instant);
  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((p) => p.type === type)?.value ?? '';

  return `${part('year')}-${part('month')}-${part('day')}`;
}

function zoneOffsetMs(instant: Date, timeZone: string): number {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    hourCycle: 'h23',
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
  }).formatToParts(instant);
  const part = (type: Intl.DateTimeFormatPartTypes): number =>
    Number(parts.find((p) => p.type === type)?.value ?? 0);

  const wallClock = Date.UTC(part('year'), part('month') - 1, part('day'), part('hour'), part('minute'), part('second'));
  return wallClock - (instant.getTime() - instant.getMilliseconds());
}

/**
 * Midnight at the start of `day`'s calendar date (its local year, month and
 * day) in the given IANA zone. The offset is looked up twice so a DST change
 * between UTC midnight and local midnight lands on the right side.
 */
export function startOfDayInZone(day: Date, timeZone: string): Date {
  const utcMidnight = Date.UTC(day.getFullYear(), day.getMonth(), day.getDate());
  const first = utcMidnight - zoneOffsetMs(new Date(utcMidnight), timeZone);
  return new Date(utcMidnight - zoneOffsetMs(new Date(first), timeZone));
}

/** Half-open interval overlap: `[start, end)` against an entry's span. */
export function overlaps(entryStart: Date, entryEnd: Date, start: Date, end: Date): boolean {
  return entryStart < end && entryEnd > start;
}
