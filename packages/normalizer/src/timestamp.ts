import { TimestampParseError } from './errors';
import { intlZoneRules, type ZoneRules } from './zoneRules';

export const DEFAULT_SOURCE_TIME_ZONE = 'America/Los_Angeles';
export const DEFAULT_TARGET_TIME_ZONE = 'America/New_York';

const MINUTE_MS = 60 * 1000;
const DAY_MS = 24 * 60 * MINUTE_MS;

// M/D/YY h:mm:ss AM|PM; separators are ASCII whitespace only
const SOURCE_PATTERN =
  /^(\d{1,2})\/(\d{1,2})\/(\d{2})[ \t\n\r\f\v]+(\d{1,2}):(\d{1,2}):(\d{1,2})[ \t\n\r\f\v]+(AM|PM)$/i;

export type WallClockTime = {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
};

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function expandTwoDigitYear(value: number): number {
  return value < 69 ? 2000 + value : 1900 + value;
}

function checkRange(label: string, value: number, min: number, max: number): void {
  if (value < min || value > max) {
    throw new Error(`${label} ${value} is out of range ${min}-${max}`);
  }
}

/**
 * Parses `M/D/YY h:mm:ss AM|PM` into wall-clock fields. Throws a plain Error
 * describing the mismatch; callers wrap it.
 */
export function parseSourceTimestamp(value: string): WallClockTime {
  const match = SOURCE_PATTERN.exec(value);
  if (!match) {
    throw new Error("does not match format 'M/D/YY h:mm:ss AM|PM'");
  }
  const [, monthText, dayText, yearText, hourText, minuteText, secondText, meridiem] = match;
  const month = Number(monthText);
  const day = Number(dayText);
  const year = expandTwoDigitYear(Number(yearText));
  const hour12 = Number(hourText);
  const minute = Number(minuteText);
  const second = Number(secondText);

  checkRange('month', month, 1, 12);
  checkRange('day', day, 1, daysInMonth(year, month));
  checkRange('hour', hour12, 1, 12);
  checkRange('minute', minute, 0, 59);
  checkRange('second', second, 0, 59);

  const pm = meridiem?.toUpperCase() === 'PM';
  const hour = (hour12 % 12) + (pm ? 12 : 0);
  return { year, month, day, hour, minute, second };
}

function wallClockAsUtc(time: WallClockTime): number {
  return Date.UTC(time.year, time.month - 1, time.day, time.hour, time.minute, time.second);
}

/**
 * Resolves a wall-clock time in `timeZone` to an instant. A time repeated
 * when clocks go back resolves to the standard-time reading; a time skipped
 * when clocks go forward is read with the standard-time offset.
 */
export function resolveWallClock(time: WallClockTime, timeZone: string, rules: ZoneRules): number {
  const local = wallClockAsUtc(time);
  const offsetBefore = rules.offsetMinutes(timeZone, local - DAY_MS);
  const offsetAfter = rules.offsetMinutes(timeZone, local + DAY_MS);
  const candidates = Array.from(new Set([offsetBefore, offsetAfter])).filter(
    (offset) => rules.offsetMinutes(timeZone, local - offset * MINUTE_MS) === offset
  );
  const offset = candidates.length > 0 ? Math.min(...candidates) : Math.min(offsetBefore, offsetAfter);
  return local - offset * MINUTE_MS;
}

const pad = (value: number, width = 2): string => String(value).padStart(width, '0');

function formatOffset(offsetMinutes: number): string {
  const sign = offsetMinutes < 0 ? '-' : '+';
  const absolute = Math.abs(offsetMinutes);
  return `${sign}${pad(Math.floor(absolute / 60))}:${pad(absolute % 60)}`;
}

/**
 * `YYYY-MM-DDTHH:MM:SS±HH:MM` for the instant as seen in `timeZone`.
 */
export function formatInstant(epochMs: number, timeZone: string, rules: ZoneRules): string {
  const offset = rules.offsetMinutes(timeZone, epochMs);
  const wall = new Date(epochMs + offset * MINUTE_MS);
  const date = `${pad(wall.getUTCFullYear(), 4)}-${pad(wall.getUTCMonth() + 1)}-${pad(wall.getUTCDate())}`;
  const time = `${pad(wall.getUTCHours())}:${pad(wall.getUTCMinutes())}:${pad(wall.getUTCSeconds())}`;
  return `${date}T${time}${formatOffset(offset)}`;
}

export type TimestampNormalizerOptions = {
  sourceTimeZone?: string;
  targetTimeZone?: string;
  zoneRules?: ZoneRules;
};

export class TimestampNormalizer {
  readonly sourceTimeZone: string;
  readonly targetTimeZone: string;
  private readonly zoneRules: ZoneRules;

  constructor(options: TimestampNormalizerOptions = {}) {
    this.sourceTimeZone = options.sourceTimeZone ?? DEFAULT_SOURCE_TIME_ZONE;
    this.targetTimeZone = options.targetTimeZone ?? DEFAULT_TARGET_TIME_ZONE;
    this.zoneRules = options.zoneRules ?? intlZoneRules;
  }

  normalize(value: string): string {
    let wallClock: WallClockTime;
    try {
      wallClock = parseSourceTimestamp(value);
    } catch (error) {
      throw new TimestampParseError(value, error instanceof Error ? error : new Error(String(error)));
    }
    const instant = resolveWallClock(wallClock, this.sourceTimeZone, this.zoneRules);
    return formatInstant(instant, this.targetTimeZone, this.zoneRules);
  }
}
