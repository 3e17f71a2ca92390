// Date and time helpers
// Civil calendar arithmetic, literal parsing and formatting

import { floorDiv, floorMod } from "../common/utils";

export const NANOS_PER_SECOND = 1_000_000_000n;
export const NANOS_PER_MINUTE = 60n * NANOS_PER_SECOND;
export const NANOS_PER_HOUR = 60n * NANOS_PER_MINUTE;
export const NANOS_PER_DAY = 24n * NANOS_PER_HOUR;
export const SECONDS_PER_DAY = 86_400n;

/**
 * Largest permitted time zone offset, in seconds (18 hours).
 */
export const MAX_OFFSET_SECONDS = 18 * 3600;

export interface CivilDate {
  year: number;
  month: number;
  day: number;
}

// ---------------------------------------------------------------------------
// Calendar
// ---------------------------------------------------------------------------

/**
 * Days since 1970-01-01 of a proleptic Gregorian date.
 */
export function epochDayFromCivil(year: number, month: number, day: number): number {
  const y = month <= 2 ? year - 1 : year;
  const era = Math.floor(y / 400);
  const yoe = y - era * 400;
  const mp = (month + 9) % 12;
  const doy = Math.floor((153 * mp + 2) / 5) + day - 1;
  const doe = yoe * 365 + Math.floor(yoe / 4) - Math.floor(yoe / 100) + doy;
  return era * 146_097 + doe - 719_468;
}

/**
 * Proleptic Gregorian date of a day count since 1970-01-01.
 */
export function civilFromEpochDay(epochDay: number): CivilDate {
  const z = epochDay + 719_468;
  const era = Math.floor(z / 146_097);
  const doe = z - era * 146_097;
  const yoe = Math.floor((doe - Math.floor(doe / 1460) + Math.floor(doe / 36_524) - Math.floor(doe / 146_096)) / 365);
  const doy = doe - (365 * yoe + Math.floor(yoe / 4) - Math.floor(yoe / 100));
  const mp = Math.floor((5 * doy + 2) / 153);
  const day = doy - Math.floor((153 * mp + 2) / 5) + 1;
  const month = mp < 10 ? mp + 3 : mp - 9;
  const year = yoe + era * 400 + (month <= 2 ? 1 : 0);
  return { year, month, day };
}

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
  switch (month) {
    case 2:
      return isLeapYear(year) ? 29 : 28;
    case 4:
    case 6:
    case 9:
    case 11:
      return 30;
    default:
      return 31;
  }
}

/**
 * Seconds since the epoch of a local date and time observed at an offset.
 */
export function epochSeconds(epochDay: number, timeNanos: bigint, offsetSeconds: number): bigint {
  return BigInt(epochDay) * SECONDS_PER_DAY + timeNanos / NANOS_PER_SECOND - BigInt(offsetSeconds);
}

export function epochDayFromLocalSeconds(localSeconds: bigint): number {
  return Number(floorDiv(localSeconds, SECONDS_PER_DAY));
}

export function nanosFromLocalSeconds(localSeconds: bigint): bigint {
  return floorMod(localSeconds, SECONDS_PER_DAY) * NANOS_PER_SECOND;
}

export function normalizeNanosOfDay(nanos: bigint): bigint {
  return floorMod(nanos, NANOS_PER_DAY);
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

function pad(value: number, width: number): string {
  return String(value).padStart(width, "0");
}

export function formatDate(epochDay: number): string {
  const { year, month, day } = civilFromEpochDay(epochDay);
  const yearText = year < 0 ? `-${pad(-year, 4)}` : pad(year, 4);
  return `${yearText}-${pad(month, 2)}-${pad(day, 2)}`;
}

export function formatTime(nanos: bigint): string {
  const totalSeconds = Number(nanos / NANOS_PER_SECOND);
  const fraction = nanos % NANOS_PER_SECOND;
  const hour = Math.floor(totalSeconds / 3600);
  const minute = Math.floor(totalSeconds / 60) % 60;
  const second = totalSeconds % 60;
  let result = `${pad(hour, 2)}:${pad(minute, 2)}:${pad(second, 2)}`;
  if (fraction !== 0n) {
    result += `.${fraction.toString().padStart(9, "0").replace(/0+$/, "")}`;
  }
  return result;
}

export function formatOffset(offsetSeconds: number): string {
  const sign = offsetSeconds < 0 ? "-" : "+";
  const abs = Math.abs(offsetSeconds);
  const hours = Math.floor(abs / 3600);
  const minutes = Math.floor(abs / 60) % 60;
  const seconds = abs % 60;
  let result = `${sign}${pad(hours, 2)}`;
  if (minutes !== 0 || seconds !== 0) {
    result += `:${pad(minutes, 2)}`;
    if (seconds !== 0) {
      result += `:${pad(seconds, 2)}`;
    }
  }
  return result;
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

const DATE_PATTERN = /^([+-]?\d{1,9})-(\d{1,2})-(\d{1,2})$/;
const TIME_PATTERN = /^(\d{1,2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?$/;
const OFFSET_PATTERN = /^(?:(Z|UTC)|([+-])(\d{1,2})(?::?(\d{2})(?::?(\d{2}))?)?)$/i;

/**
 * Parse `YYYY-MM-DD` into an epoch day.
 */
export function parseDate(text: string): number | undefined {
  const match = DATE_PATTERN.exec(text);
  if (match === null) return undefined;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
    return undefined;
  }
  return epochDayFromCivil(year, month, day);
}

/**
 * Parse `HH:MM[:SS[.fffffffff]]` into nanoseconds of day.
 */
export function parseTime(text: string): bigint | undefined {
  const match = TIME_PATTERN.exec(text);
  if (match === null) return undefined;
  const hour = Number(match[1]);
  const minute = Number(match[2]);
  const second = match[3] === undefined ? 0 : Number(match[3]);
  if (hour > 23 || minute > 59 || second > 59) {
    return undefined;
  }
  const fraction = match[4] === undefined ? 0n : BigInt(match[4].padEnd(9, "0"));
  return BigInt(hour) * NANOS_PER_HOUR + BigInt(minute) * NANOS_PER_MINUTE + BigInt(second) * NANOS_PER_SECOND + fraction;
}

/**
 * Parse `Z`, `UTC` or `±HH[:MM[:SS]]` into offset seconds.
 */
export function parseOffset(text: string): number | undefined {
  const match = OFFSET_PATTERN.exec(text);
  if (match === null) return undefined;
  if (match[1] !== undefined) return 0;
  const hours = Number(match[3]);
  const minutes = match[4] === undefined ? 0 : Number(match[4]);
  const seconds = match[5] === undefined ? 0 : Number(match[5]);
  if (minutes > 59 || seconds > 59) return undefined;
  const total = hours * 3600 + minutes * 60 + seconds;
  if (total > MAX_OFFSET_SECONDS) return undefined;
  return match[2] === "-" ? -total : total;
}

const TIME_SOURCE = String.raw`\d{1,2}:\d{2}(?::\d{2}(?:\.\d{1,9})?)?`;
const OFFSET_SOURCE = String.raw`Z|UTC|[+-]\d{1,2}(?::?\d{2}(?::?\d{2})?)?`;
const TIME_LITERAL = new RegExp(`^(${TIME_SOURCE})\\s*(${OFFSET_SOURCE})?$`, "i");
const TIMESTAMP_LITERAL = new RegExp(
  `^([+-]?\\d{1,9}-\\d{1,2}-\\d{1,2})(?:[ T](${TIME_SOURCE}))?\\s*(${OFFSET_SOURCE})?$`,
  "i"
);

export interface TimeLiteral {
  nanos: bigint;
  /** Offset seconds, when the literal names one. */
  offset: number | undefined;
}

export interface TimestampLiteral {
  epochDay: number;
  timeNanos: bigint;
  offset: number | undefined;
}

/**
 * Parse `HH:MM[:SS[.f]][offset]`.
 */
export function parseTimeLiteral(text: string): TimeLiteral | undefined {
  const match = TIME_LITERAL.exec(text);
  if (match === null || match[1] === undefined) return undefined;
  const nanos = parseTime(match[1]);
  if (nanos === undefined) return undefined;
  if (match[2] === undefined) return { nanos, offset: undefined };
  const offset = parseOffset(match[2]);
  return offset === undefined ? undefined : { nanos, offset };
}

/**
 * Parse `YYYY-MM-DD[( |T)HH:MM[:SS[.f]]][offset]`.
 */
export function parseTimestampLiteral(text: string): TimestampLiteral | undefined {
  const match = TIMESTAMP_LITERAL.exec(text);
  if (match === null || match[1] === undefined) return undefined;
  const epochDay = parseDate(match[1]);
  if (epochDay === undefined) return undefined;
  const timeNanos = match[2] === undefined ? 0n : parseTime(match[2]);
  if (timeNanos === undefined) return undefined;
  if (match[3] === undefined) return { epochDay, timeNanos, offset: undefined };
  const offset = parseOffset(match[3]);
  return offset === undefined ? undefined : { epochDay, timeNanos, offset };
}
