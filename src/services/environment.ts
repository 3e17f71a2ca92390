// Cast environment
// Current timestamp and time zone offsets supplied by the caller

import { TimestampTzValue } from "../values/values";
import { civilFromEpochDay, formatOffset, NANOS_PER_SECOND } from "../values/datetime";

/**
 * Offset lookups for one time zone.
 */
export interface TimeZoneProvider {
  readonly id: string;

  /** Offset in seconds in effect at an instant (seconds since the epoch). */
  getTimeZoneOffsetUTC(epochSeconds: bigint): number;

  /** Offset in seconds in effect at a local date and time. */
  getTimeZoneOffsetLocal(epochDay: number, nanosOfDay: bigint): number;
}

/**
 * Environment capability threaded through temporal conversions. Nothing is
 * cached; callers that need one consistent "now" across several conversions
 * pass the same provider snapshot.
 */
export interface CastDataProvider {
  currentTimestamp(): TimestampTzValue;
  currentTimeZone(): TimeZoneProvider;
}

/**
 * Time zone with a constant offset.
 */
export class FixedOffsetTimeZone implements TimeZoneProvider {
  static readonly UTC = new FixedOffsetTimeZone(0);
  readonly id: string;

  constructor(readonly offsetSeconds: number) {
    this.id = offsetSeconds === 0 ? "UTC" : `UTC${formatOffset(offsetSeconds)}`;
  }

  getTimeZoneOffsetUTC(_epochSeconds: bigint): number {
    return this.offsetSeconds;
  }

  getTimeZoneOffsetLocal(_epochDay: number, _nanosOfDay: bigint): number {
    return this.offsetSeconds;
  }
}

/** Seconds east of UTC; local mean time offsets carry fractional minutes. */
function offsetOf(date: Date): number {
  const minutes = date.getTimezoneOffset();
  return minutes === 0 ? 0 : -Math.round(minutes * 60);
}

/**
 * The host's local time zone, as seen through `Date`.
 */
export class SystemTimeZone implements TimeZoneProvider {
  static readonly Instance = new SystemTimeZone();
  readonly id = "SYSTEM";

  private constructor() { }

  getTimeZoneOffsetUTC(epochSeconds: bigint): number {
    return offsetOf(new Date(Number(epochSeconds) * 1000));
  }

  getTimeZoneOffsetLocal(epochDay: number, nanosOfDay: bigint): number {
    const { year, month, day } = civilFromEpochDay(epochDay);
    const seconds = Number(nanosOfDay / NANOS_PER_SECOND);
    // The multi-argument Date constructor reads years 0-99 as 1900-1999.
    const local = new Date(0);
    local.setFullYear(year, month - 1, day);
    local.setHours(Math.floor(seconds / 3600), Math.floor(seconds / 60) % 60, seconds % 60, 0);
    return offsetOf(local);
  }
}

/**
 * Provider with a frozen "now", used per statement and in tests.
 */
export class StaticCastDataProvider implements CastDataProvider {
  constructor(
    private readonly now: TimestampTzValue,
    private readonly zone: TimeZoneProvider = new FixedOffsetTimeZone(now.offsetSeconds)
  ) { }

  currentTimestamp(): TimestampTzValue {
    return this.now;
  }

  currentTimeZone(): TimeZoneProvider {
    return this.zone;
  }
}

/**
 * Provider reading the host clock and time zone on every call.
 */
export class SystemCastDataProvider implements CastDataProvider {
  static readonly Instance = new SystemCastDataProvider();

  private constructor() { }

  currentTimestamp(): TimestampTzValue {
    const millis = Date.now();
    const offset = SystemTimeZone.Instance.getTimeZoneOffsetUTC(BigInt(Math.floor(millis / 1000)));
    return TimestampTzValue.fromEpochMillis(millis, offset);
  }

  currentTimeZone(): TimeZoneProvider {
    return SystemTimeZone.Instance;
  }
}

/**
 * Capture a consistent snapshot of the system provider.
 */
export function snapshotProvider(provider: CastDataProvider = SystemCastDataProvider.Instance): CastDataProvider {
  return new StaticCastDataProvider(provider.currentTimestamp(), provider.currentTimeZone());
}
