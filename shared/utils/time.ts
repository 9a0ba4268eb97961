/**
 * Time Utility for the CAISO grid feed
 *
 * CAISO publishes the Today's Outlook files in Pacific local time and the OASIS
 * price files in GMT. Unlike fixed-offset markets, Pacific time observes DST, so
 * every conversion here goes through Intl with an IANA zone instead of adding a
 * constant offset.
 *
 * Conventions:
 * - Instants are epoch milliseconds internally.
 * - Zoned values leave this module as ISO-8601 strings with an explicit offset,
 *   e.g. "2023-01-01T00:00:00-08:00".
 * - Calendar dates are { year, month (1-12), day }.
 */

import { FormatError, InvalidTimeError } from './errors';

export const PACIFIC_TIMEZONE = 'America/Los_Angeles';

const MINUTE_MS = 60 * 1000;
const DAY_MS = 24 * 60 * MINUTE_MS;

export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

export interface WallTime extends CalendarDate {
  hour: number;
  minute: number;
  second?: number;
}

/** Anything the historical accessors accept as "the day to fetch". */
export type DateInput = string | CalendarDate | Date;

/**
 * How a wall time skipped by spring-forward resolves: `reject` throws,
 * `shiftForward` moves it later by the length of the gap (02:30 -> 03:30).
 */
export type GapPolicy = 'reject' | 'shiftForward';

const formatterCache = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timezone: string): Intl.DateTimeFormat {
  let formatter = formatterCache.get(timezone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone: timezone,
      hourCycle: 'h23',
      year: 'numeric', month: '2-digit', day: '2-digit',
      hour: '2-digit', minute: '2-digit', second: '2-digit'
    });
    formatterCache.set(timezone, formatter);
  }
  return formatter;
}

const pad = (value: number, width = 2) => String(value).padStart(width, '0');

export class TimeUtil {
  /**
   * Wall-clock fields of an instant in the given zone.
   */
  static wallTime(instantMs: number, timezone: string = PACIFIC_TIMEZONE): Required<WallTime> {
    const fields: Record<string, number> = {};
    for (const part of formatterFor(timezone).formatToParts(new Date(instantMs))) {
      if (part.type !== 'literal') {
        fields[part.type] = parseInt(part.value, 10);
      }
    }
    return {
      year: fields.year,
      month: fields.month,
      day: fields.day,
      hour: fields.hour,
      minute: fields.minute,
      second: fields.second
    };
  }

  /**
   * UTC offset of the zone at an instant, in minutes (Pacific is -480 or -420).
   */
  static offsetMinutes(instantMs: number, timezone: string = PACIFIC_TIMEZONE): number {
    const wholeSecond = Math.floor(instantMs / 1000) * 1000;
    const wall = TimeUtil.wallTime(wholeSecond, timezone);
    const wallAsUtc = Date.UTC(wall.year, wall.month - 1, wall.day, wall.hour, wall.minute, wall.second);
    return Math.round((wallAsUtc - wholeSecond) / MINUTE_MS);
  }

  /**
   * Resolve a local wall time to an instant.
   *
   * A wall time skipped by spring-forward throws InvalidTimeError, unless
   * `gap` is 'shiftForward'. A wall time repeated by fall-back resolves to its
   * first occurrence.
   */
  static zonedToInstant(
    wall: WallTime,
    timezone: string = PACIFIC_TIMEZONE,
    options: { gap?: GapPolicy } = {}
  ): number {
    TimeUtil.assertCalendarDate(wall);
    const wallAsUtc = Date.UTC(wall.year, wall.month - 1, wall.day, wall.hour, wall.minute, wall.second ?? 0);

    const offsetBefore = TimeUtil.offsetMinutes(wallAsUtc - DAY_MS, timezone);
    const offsets = new Set([
      offsetBefore,
      TimeUtil.offsetMinutes(wallAsUtc + DAY_MS, timezone)
    ]);

    const candidates: number[] = [];
    for (const offset of offsets) {
      const instant = wallAsUtc - offset * MINUTE_MS;
      if (TimeUtil.offsetMinutes(instant, timezone) === offset) {
        candidates.push(instant);
      }
    }

    if (candidates.length === 0) {
      if (options.gap === 'shiftForward') {
        return wallAsUtc - offsetBefore * MINUTE_MS;
      }
      throw new InvalidTimeError(
        `${TimeUtil.formatWall(wall)} does not exist in ${timezone}`
      );
    }
    return Math.min(...candidates);
  }

  /**
   * Format an instant as ISO-8601 with the zone's offset.
   * Example: 1672560000000 -> "2023-01-01T00:00:00-08:00"
   */
  static toZonedISO(instantMs: number, timezone: string = PACIFIC_TIMEZONE): string {
    const wall = TimeUtil.wallTime(instantMs, timezone);
    const offset = TimeUtil.offsetMinutes(instantMs, timezone);
    const sign = offset < 0 ? '-' : '+';
    const abs = Math.abs(offset);
    return `${TimeUtil.formatWall(wall)}${sign}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`;
  }

  /**
   * Convert an upstream GMT timestamp ("2023-01-01T08:00:00-00:00") to the zone.
   */
  static utcToZoned(utcText: string, timezone: string = PACIFIC_TIMEZONE): string {
    const instant = Date.parse(utcText.trim());
    if (isNaN(instant)) {
      throw new FormatError(`Invalid timestamp: ${utcText}`);
    }
    return TimeUtil.toZonedISO(instant, timezone);
  }

  /**
   * Format an instant for OASIS query strings: YYYYMMDDTHH:MM-0000 (UTC)
   */
  static formatOasisUTC(instantMs: number): string {
    const d = new Date(instantMs);
    return `${d.getUTCFullYear()}${pad(d.getUTCMonth() + 1)}${pad(d.getUTCDate())}` +
      `T${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}-0000`;
  }

  /**
   * Format a calendar date for the history archive path (YYYYMMDD)
   */
  static formatHistoryDate(date: CalendarDate): string {
    return `${pad(date.year, 4)}${pad(date.month)}${pad(date.day)}`;
  }

  /**
   * Build a zoned timestamp from a bare "HH:MM" and a reference day.
   *
   * The Outlook CSVs only carry the clock time; the day comes from the file
   * (historical) or from the status endpoint (live).
   */
  static makeTimestamp(time: string, date: CalendarDate, timezone: string = PACIFIC_TIMEZONE): string {
    const parts = time.split(':');
    if (parts.length !== 2 || !parts.every(p => /^\s*[+-]?\d+\s*$/.test(p))) {
      throw new FormatError(`Invalid time of day: "${time}" (expected HH:MM)`);
    }
    const [hour, minute] = parts.map(p => parseInt(p, 10));

    if (hour < 0 || hour > 23 || minute < 0 || minute > 59) {
      throw new InvalidTimeError(`Time of day out of range: "${time}"`);
    }

    const instant = TimeUtil.zonedToInstant({ ...date, hour, minute }, timezone);
    return TimeUtil.toZonedISO(instant, timezone);
  }

  /**
   * Parse the stats.txt slotDate ("2023-06-01" or "2023-06-01 14:35") as local time.
   */
  static parseSlotDate(slotDate: string, timezone: string = PACIFIC_TIMEZONE): string {
    const match = slotDate.trim().match(/^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{1,2}):(\d{2})(?::(\d{2}))?)?$/);
    if (!match) {
      throw new FormatError(`Invalid slotDate: ${slotDate}`);
    }
    const [, y, m, d, h = '0', min = '0', s = '0'] = match;
    const instant = TimeUtil.zonedToInstant({
      year: parseInt(y, 10),
      month: parseInt(m, 10),
      day: parseInt(d, 10),
      hour: parseInt(h, 10),
      minute: parseInt(min, 10),
      second: parseInt(s, 10)
    }, timezone);
    return TimeUtil.toZonedISO(instant, timezone);
  }

  /** Calendar day of a zoned ISO string, read from its own wall-clock fields. */
  static calendarDateOfZoned(zonedIso: string): CalendarDate {
    const match = zonedIso.match(/^(\d{4})-(\d{2})-(\d{2})/);
    if (!match) {
      throw new FormatError(`Invalid zoned timestamp: ${zonedIso}`);
    }
    return { year: parseInt(match[1], 10), month: parseInt(match[2], 10), day: parseInt(match[3], 10) };
  }

  static calendarDateOf(instantMs: number, timezone: string = PACIFIC_TIMEZONE): CalendarDate {
    const { year, month, day } = TimeUtil.wallTime(instantMs, timezone);
    return { year, month, day };
  }

  /**
   * Current calendar day in the zone.
   */
  static today(timezone: string = PACIFIC_TIMEZONE, nowMs: number = Date.now()): CalendarDate {
    return TimeUtil.calendarDateOf(nowMs, timezone);
  }

  static shiftCalendarDate(date: CalendarDate, days: number): CalendarDate {
    const shifted = new Date(Date.UTC(date.year, date.month - 1, date.day + days));
    return { year: shifted.getUTCFullYear(), month: shifted.getUTCMonth() + 1, day: shifted.getUTCDate() };
  }

  /**
   * Add whole calendar days in the zone, keeping the wall-clock time.
   * Across a DST change the result is 23 or 25 hours away, not 24. A wall
   * time that lands in a spring-forward gap moves forward past it.
   */
  static addCalendarDays(instantMs: number, days: number, timezone: string = PACIFIC_TIMEZONE): number {
    const wall = TimeUtil.wallTime(instantMs, timezone);
    const date = TimeUtil.shiftCalendarDate(wall, days);
    return TimeUtil.zonedToInstant({ ...wall, ...date }, timezone, { gap: 'shiftForward' });
  }

  /**
   * Turn a DateInput into a calendar day in the zone.
   * Strings: "YYYYMMDD", "YYYY-MM-DD" or "today" (read from `nowMs`).
   */
  static toCalendarDate(
    input: DateInput,
    timezone: string = PACIFIC_TIMEZONE,
    nowMs: number = Date.now()
  ): CalendarDate {
    if (input instanceof Date) {
      if (isNaN(input.getTime())) {
        throw new FormatError('Invalid Date');
      }
      return TimeUtil.calendarDateOf(input.getTime(), timezone);
    }

    if (typeof input !== 'string') {
      TimeUtil.assertCalendarDate(input);
      return { year: input.year, month: input.month, day: input.day };
    }

    const cleaned = input.trim();
    if (cleaned.toLowerCase() === 'today') {
      return TimeUtil.today(timezone, nowMs);
    }

    const match = cleaned.match(/^(\d{4})-?(\d{2})-?(\d{2})$/);
    if (!match) {
      throw new FormatError(`Invalid date: "${input}" (expected YYYYMMDD or YYYY-MM-DD)`);
    }
    const date = { year: parseInt(match[1], 10), month: parseInt(match[2], 10), day: parseInt(match[3], 10) };
    TimeUtil.assertCalendarDate(date);
    return date;
  }

  /**
   * Turn a DateInput into an instant. Calendar inputs resolve to local
   * midnight; a Date is already an instant and is used as-is.
   */
  static resolveDate(
    input: DateInput,
    timezone: string = PACIFIC_TIMEZONE,
    nowMs: number = Date.now()
  ): number {
    if (input instanceof Date) {
      if (isNaN(input.getTime())) {
        throw new FormatError('Invalid Date');
      }
      return input.getTime();
    }
    const date = TimeUtil.toCalendarDate(input, timezone, nowMs);
    return TimeUtil.zonedToInstant({ ...date, hour: 0, minute: 0 }, timezone);
  }

  /**
   * Get current time in UTC ISO format
   */
  static nowUTC(): string {
    return new Date().toISOString();
  }

  private static formatWall(wall: WallTime): string {
    return `${pad(wall.year, 4)}-${pad(wall.month)}-${pad(wall.day)}` +
      `T${pad(wall.hour)}:${pad(wall.minute)}:${pad(wall.second ?? 0)}`;
  }

  private static assertCalendarDate(date: CalendarDate): void {
    const probe = new Date(Date.UTC(date.year, date.month - 1, date.day));
    if (
      !Number.isInteger(date.year) || !Number.isInteger(date.month) || !Number.isInteger(date.day) ||
      probe.getUTCFullYear() !== date.year ||
      probe.getUTCMonth() !== date.month - 1 ||
      probe.getUTCDate() !== date.day
    ) {
      throw new InvalidTimeError(`Invalid calendar date: ${date.year}-${date.month}-${date.day}`);
    }
  }
}
