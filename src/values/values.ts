// SQL Runtime Values
// One immutable class per payload shape, discriminated by a literal kind

import {
  InvalidValueError,
  NumericOverflowError,
  UnsupportedOperationError,
  type ValueError,
} from "../common/errors";
import {
  bytesEqual,
  bytesToHex,
  combineHash,
  compareDoubles,
  hashBigInt,
  hashBytes,
  hashDouble,
  hashString,
  hexToBytes,
  floorDiv,
  floorMod,
  pow10,
  quoteSQL,
  utf8Decode,
  utf8Encode,
} from "../common/utils";
import { compareTo, compareTypeSafe, compareWithNull, type Incomparable } from "../comparison/compare";
import { convert, tryConvert, type ConvertOptions } from "../conversion/convert";
import type { CastDataProvider } from "../services/environment";
import type { DimensionSystem, GeometryCodec } from "../services/geometry";
import { SimpleResult, type ResultRows } from "../services/result";
import { GeometryTypeInfo, type EnumTypeInfo } from "../types/ext-type-info";
import type { IntervalKind, LobKind, StringKind, ValueKind } from "../types/kinds";
import { IntLimits, TypeInfo } from "../types/type-info";
import { Decimal } from "./decimal";
import {
  epochDayFromCivil,
  formatDate,
  formatOffset,
  formatTime,
  MAX_OFFSET_SECONDS,
  NANOS_PER_DAY,
  NANOS_PER_SECOND,
  SECONDS_PER_DAY,
} from "./datetime";
import {
  checkIntervalFields,
  formatInterval,
  hasRemaining,
  intervalFromAbsolute,
  intervalToAbsolute,
  kindQualifier,
  MAX_INTERVAL_LEADING,
  qualifierKind,
  remainingMultiplier,
  type IntervalFields,
  type IntervalQualifier,
} from "./interval";

// ---------------------------------------------------------------------------
// Base Value Class
// ---------------------------------------------------------------------------

/**
 * Base class for all SQL runtime values.
 */
export abstract class BaseValue {
  abstract readonly kind: ValueKind;

  /** Type descriptor of this value. */
  abstract getType(): TypeInfo;

  /** Canonical textual form. */
  abstract getString(): string;

  /** SQL literal that evaluates back to this value. */
  abstract getSQL(): string;

  /** Native JavaScript payload. */
  abstract value(): unknown;

  /** Structural equality: same kind and identical payload, no coercion. */
  abstract equals(other: Value): boolean;

  abstract hashCode(): number;

  getValueType(): ValueKind {
    return this.kind;
  }

  /**
   * Approximate in-memory footprint in bytes.
   */
  getMemory(): number {
    return 24;
  }

  toString(): string {
    return this.getSQL();
  }

  getSignum(): -1 | 0 | 1 {
    throw new UnsupportedOperationError(this.kind, "SIGNUM");
  }

  /**
   * True if this value is NULL or holds a NULL element.
   */
  containsNull(): boolean {
    return false;
  }

  checkPrecision(precision: number): boolean {
    return this.getType().precision <= precision;
  }

  /**
   * Adjust the number of fractional digits. Returns `this` when unchanged.
   */
  convertScale(this: Value, _onlyToSmallerScale: boolean, _targetScale: number): Value {
    return this;
  }

  /**
   * Reduce the value to at most `precision` digits, characters, bytes or
   * elements. Returns `this` when it already fits.
   */
  convertPrecision(this: Value, _precision: number): Value {
    return this;
  }

  /**
   * Single-row result holding this value in column `X`.
   */
  getResult(this: Value): ResultRows {
    return new SimpleResult([{ name: "X", type: this.getType() }], [[this]]);
  }

  /**
   * Bytes from a 1-based offset.
   */
  getBytesRange(this: Value, offset: number, length: number): Uint8Array {
    const bytes = this.asBytes();
    if (bytes === null) {
      throw new InvalidValueError("value", "NULL");
    }
    rangeCheck(offset - 1, length, bytes.length);
    return bytes.slice(offset - 1, offset - 1 + length);
  }

  /**
   * Characters from a 1-based offset.
   */
  getStringRange(this: Value, offset: number, length: number): string {
    const text = this.asString();
    if (text === null) {
      throw new InvalidValueError("value", "NULL");
    }
    rangeCheck(offset - 1, length, text.length);
    return text.slice(offset - 1, offset - 1 + length);
  }

  // -------------------------------------------------------------------------
  // Conversion-backed accessors (null for NULL)
  // -------------------------------------------------------------------------

  asBoolean(this: Value): boolean | null {
    const v = this.convertTo("BOOLEAN");
    return v.kind === "BOOLEAN" ? v.value() : null;
  }

  asByte(this: Value): number | null {
    const v = this.convertTo("TINYINT");
    return v.kind === "TINYINT" ? v.value() : null;
  }

  asShort(this: Value): number | null {
    const v = this.convertTo("SMALLINT");
    return v.kind === "SMALLINT" ? v.value() : null;
  }

  asInt(this: Value): number | null {
    const v = this.convertTo("INTEGER");
    return v.kind === "INTEGER" ? v.value() : null;
  }

  asLong(this: Value): bigint | null {
    const v = this.convertTo("BIGINT");
    return v.kind === "BIGINT" ? v.value() : null;
  }

  asDouble(this: Value): number | null {
    const v = this.convertTo("DOUBLE");
    return v.kind === "DOUBLE" ? v.value() : null;
  }

  asFloat(this: Value): number | null {
    const v = this.convertTo("REAL");
    return v.kind === "REAL" ? v.value() : null;
  }

  asDecimal(this: Value): Decimal | null {
    const v = this.convertTo("NUMERIC");
    return v.kind === "NUMERIC" ? v.decimal : null;
  }

  asBytes(this: Value): Uint8Array | null {
    const v = this.convertTo("VARBINARY");
    return v.kind === "VARBINARY" ? v.value() : null;
  }

  asString(this: Value): string | null {
    const v = this.convertTo("VARCHAR");
    return v.kind === "VARCHAR" ? v.getString() : null;
  }

  // -------------------------------------------------------------------------
  // Engines
  // -------------------------------------------------------------------------

  convertTo(this: Value, target: ValueKind, options?: ConvertOptions): Value {
    return convert(this, target, options);
  }

  tryConvertTo(this: Value, target: ValueKind, options?: ConvertOptions): Value | ValueError {
    return tryConvert(this, target, options);
  }

  compareTypeSafe(this: Value, other: Value): number {
    return compareTypeSafe(this, other);
  }

  compareTo(this: Value, other: Value, provider?: CastDataProvider): number {
    return compareTo(this, other, provider);
  }

  compareWithNull(this: Value, other: Value, forEquality: boolean, provider?: CastDataProvider): number | Incomparable {
    return compareWithNull(this, other, forEquality, provider);
  }
}

function rangeCheck(zeroBasedOffset: number, length: number, size: number): void {
  if (zeroBasedOffset < 0 || length < 0 || length > size - zeroBasedOffset) {
    if (zeroBasedOffset < 0 || zeroBasedOffset > size) {
      throw new InvalidValueError("offset", zeroBasedOffset + 1);
    }
    throw new InvalidValueError("length", length);
  }
}

function signum(value: number | bigint): -1 | 0 | 1 {
  if (value > 0) return 1;
  if (value < 0) return -1;
  return 0;
}

/**
 * Number of significant fractional digits in a nanosecond fraction.
 */
function fractionScale(nanos: bigint): number {
  let fraction = nanos % NANOS_PER_SECOND;
  if (fraction === 0n) return 0;
  let scale = 9;
  while (fraction % 10n === 0n) {
    fraction /= 10n;
    scale--;
  }
  return scale;
}

/**
 * Round nanoseconds half-up to `targetScale` fractional digits.
 */
function roundNanos(nanos: bigint, targetScale: number): bigint {
  const unit = pow10(9 - targetScale);
  const mod = nanos % unit;
  const base = nanos - mod;
  return mod * 2n >= unit ? base + unit : base;
}

function checkTargetScale(targetScale: number): void {
  if (!Number.isInteger(targetScale) || targetScale < 0) {
    throw new InvalidValueError("scale", targetScale);
  }
}

// ---------------------------------------------------------------------------
// NULL
// ---------------------------------------------------------------------------

/**
 * The SQL NULL. Renders as `NULL`; every accessor returns null.
 */
export class NullValue extends BaseValue {
  static readonly Instance = new NullValue();
  readonly kind = "NULL" as const;

  private constructor() {
    super();
  }

  getType(): TypeInfo {
    return TypeInfo.of("NULL");
  }

  getString(): string {
    return "NULL";
  }

  getSQL(): string {
    return "NULL";
  }

  value(): null {
    return null;
  }

  override containsNull(): boolean {
    return true;
  }

  equals(other: Value): boolean {
    return other === this;
  }

  hashCode(): number {
    return 0;
  }
}

// ---------------------------------------------------------------------------
// BOOLEAN
// ---------------------------------------------------------------------------

export class BooleanValue extends BaseValue {
  static readonly TRUE = new BooleanValue(true);
  static readonly FALSE = new BooleanValue(false);
  readonly kind = "BOOLEAN" as const;

  private constructor(private readonly val: boolean) {
    super();
  }

  static of(val: boolean): BooleanValue {
    return val ? BooleanValue.TRUE : BooleanValue.FALSE;
  }

  getType(): TypeInfo {
    return TypeInfo.of("BOOLEAN");
  }

  getString(): string {
    return this.val ? "TRUE" : "FALSE";
  }

  getSQL(): string {
    return this.getString();
  }

  value(): boolean {
    return this.val;
  }

  override getSignum(): -1 | 0 | 1 {
    return this.val ? 1 : 0;
  }

  equals(other: Value): boolean {
    return other.kind === "BOOLEAN" && other.val === this.val;
  }

  hashCode(): number {
    return this.val ? 1231 : 1237;
  }
}

// ---------------------------------------------------------------------------
// Exact numerics
// ---------------------------------------------------------------------------

/**
 * Integer kinds narrower than 64 bits, held as a JS number.
 */
abstract class SmallIntegerValue extends BaseValue {
  abstract override readonly kind: "TINYINT" | "SMALLINT" | "INTEGER";

  protected constructor(readonly val: number) {
    super();
  }

  getType(): TypeInfo {
    return TypeInfo.of(this.kind);
  }

  getString(): string {
    return String(this.val);
  }

  value(): number {
    return this.val;
  }

  override getSignum(): -1 | 0 | 1 {
    return signum(this.val);
  }

  equals(other: Value): boolean {
    return other instanceof SmallIntegerValue && other.kind === this.kind && other.val === this.val;
  }

  hashCode(): number {
    return this.val;
  }
}

function checkSmallInteger(val: number, min: number, max: number): void {
  if (!Number.isInteger(val) || val < min || val > max) {
    throw new NumericOverflowError(String(val));
  }
}

export class TinyintValue extends SmallIntegerValue {
  readonly kind = "TINYINT" as const;

  static of(val: number): TinyintValue {
    checkSmallInteger(val, IntLimits.TinyintMin, IntLimits.TinyintMax);
    return new TinyintValue(val);
  }

  getSQL(): string {
    return `CAST(${this.val} AS TINYINT)`;
  }
}

export class SmallintValue extends SmallIntegerValue {
  readonly kind = "SMALLINT" as const;

  static of(val: number): SmallintValue {
    checkSmallInteger(val, IntLimits.SmallintMin, IntLimits.SmallintMax);
    return new SmallintValue(val);
  }

  getSQL(): string {
    return `CAST(${this.val} AS SMALLINT)`;
  }
}

export class IntegerValue extends SmallIntegerValue {
  readonly kind = "INTEGER" as const;

  static of(val: number): IntegerValue {
    checkSmallInteger(val, IntLimits.IntegerMin, IntLimits.IntegerMax);
    return new IntegerValue(val);
  }

  getSQL(): string {
    return String(this.val);
  }
}

/**
 * 64-bit signed integer.
 */
export class BigintValue extends BaseValue {
  readonly kind = "BIGINT" as const;

  private constructor(private readonly val: bigint) {
    super();
  }

  static of(val: bigint | number): BigintValue {
    if (typeof val === "number" && !Number.isSafeInteger(val)) {
      throw new NumericOverflowError(String(val));
    }
    const big = BigInt(val);
    if (big < IntLimits.BigintMin || big > IntLimits.BigintMax) {
      throw new NumericOverflowError(big.toString());
    }
    return new BigintValue(big);
  }

  getType(): TypeInfo {
    return TypeInfo.of("BIGINT");
  }

  getString(): string {
    return this.val.toString();
  }

  getSQL(): string {
    const text = this.val.toString();
    if (this.val >= IntLimits.IntegerMin && this.val <= IntLimits.IntegerMax) {
      return `CAST(${text} AS BIGINT)`;
    }
    return text;
  }

  value(): bigint {
    return this.val;
  }

  override getSignum(): -1 | 0 | 1 {
    return signum(this.val);
  }

  equals(other: Value): boolean {
    return other.kind === "BIGINT" && other.val === this.val;
  }

  hashCode(): number {
    return hashBigInt(this.val);
  }
}

/**
 * Exact decimal. `1.0` and `1.00` compare equal but are not `equals`.
 */
export class DecimalValue extends BaseValue {
  static readonly ZERO = new DecimalValue(Decimal.ZERO);
  static readonly ONE = new DecimalValue(Decimal.ONE);
  readonly kind = "NUMERIC" as const;

  private constructor(readonly decimal: Decimal) {
    super();
  }

  static of(decimal: Decimal): DecimalValue {
    if (decimal.scale === 0) {
      if (decimal.unscaled === 0n) return DecimalValue.ZERO;
      if (decimal.unscaled === 1n) return DecimalValue.ONE;
    }
    return new DecimalValue(decimal);
  }

  static parse(text: string): DecimalValue | undefined {
    const decimal = Decimal.parse(text);
    return decimal === undefined ? undefined : DecimalValue.of(decimal);
  }

  getType(): TypeInfo {
    return new TypeInfo("NUMERIC", Math.max(this.decimal.precision(), this.decimal.scale), this.decimal.scale);
  }

  getString(): string {
    return this.decimal.toString();
  }

  getSQL(): string {
    const text = this.decimal.toString();
    if (this.decimal.scale === 0) {
      return `CAST(${text} AS NUMERIC(${this.decimal.precision()}))`;
    }
    return text;
  }

  value(): Decimal {
    return this.decimal;
  }

  override getMemory(): number {
    return 72 + this.decimal.precision();
  }

  override getSignum(): -1 | 0 | 1 {
    return this.decimal.signum();
  }

  override convertScale(onlyToSmallerScale: boolean, targetScale: number): Value {
    checkTargetScale(targetScale);
    const scale = this.decimal.scale;
    if (scale === targetScale || (onlyToSmallerScale && scale < targetScale)) {
      return this;
    }
    return DecimalValue.of(this.decimal.setScale(targetScale, "HALF_UP"));
  }

  /**
   * Drop fractional digits (half-up) until the value fits; the integral part
   * is never truncated.
   */
  override convertPrecision(precision: number): Value {
    const d = this.decimal;
    if (Math.max(d.precision(), d.scale) <= precision) {
      return this;
    }
    const integral = Math.max(d.precision() - d.scale, 0);
    if (integral > precision) {
      throw new NumericOverflowError(d.toString());
    }
    const rounded = d.setScale(precision - integral, "HALF_UP");
    if (Math.max(rounded.precision(), rounded.scale) > precision) {
      throw new NumericOverflowError(d.toString());
    }
    return DecimalValue.of(rounded);
  }

  equals(other: Value): boolean {
    return other.kind === "NUMERIC" && other.decimal.equals(this.decimal);
  }

  hashCode(): number {
    return this.decimal.hashCode();
  }
}

// ---------------------------------------------------------------------------
// Approximate numerics
// ---------------------------------------------------------------------------

/**
 * Render a double the way SQL clients expect: `1.0`, `1.5E-7`, `NaN`.
 */
export function formatDouble(value: number): string {
  if (Number.isNaN(value)) return "NaN";
  if (value === Infinity) return "Infinity";
  if (value === -Infinity) return "-Infinity";
  if (value === 0) return Object.is(value, -0) ? "-0.0" : "0.0";
  const text = String(value);
  const [mantissa = "", exponent] = text.split("e");
  const digits = mantissa.includes(".") ? mantissa : `${mantissa}.0`;
  return exponent === undefined ? digits : `${digits}E${Number(exponent)}`;
}

/**
 * Shortest rendering that reads back as the same single-precision value.
 */
export function formatReal(value: number): string {
  if (!Number.isFinite(value) || value === 0) {
    return formatDouble(value);
  }
  for (let digits = 1; digits <= 9; digits++) {
    const candidate = Number(value.toPrecision(digits));
    if (Math.fround(candidate) === value) {
      return formatDouble(candidate);
    }
  }
  return formatDouble(value);
}

abstract class FloatingValue extends BaseValue {
  abstract override readonly kind: "REAL" | "DOUBLE";

  protected constructor(readonly val: number) {
    super();
  }

  getType(): TypeInfo {
    return TypeInfo.of(this.kind);
  }

  value(): number {
    return this.val;
  }

  override getSignum(): -1 | 0 | 1 {
    if (this.val === 0 || Number.isNaN(this.val)) return 0;
    return this.val < 0 ? -1 : 1;
  }

  getSQL(): string {
    const type = this.kind === "DOUBLE" ? "DOUBLE PRECISION" : "REAL";
    const text = this.getString();
    return Number.isFinite(this.val) ? `CAST(${text} AS ${type})` : `CAST('${text}' AS ${type})`;
  }

  equals(other: Value): boolean {
    return other instanceof FloatingValue && other.kind === this.kind && compareDoubles(other.val, this.val) === 0;
  }

  hashCode(): number {
    return hashDouble(this.val);
  }
}

/**
 * Single-precision float; payloads are rounded with `Math.fround`.
 */
export class RealValue extends FloatingValue {
  static readonly ZERO = new RealValue(0);
  static readonly ONE = new RealValue(1);
  readonly kind = "REAL" as const;

  static of(val: number): RealValue {
    return new RealValue(Math.fround(val));
  }

  getString(): string {
    return formatReal(this.val);
  }
}

export class DoubleValue extends FloatingValue {
  static readonly ZERO = new DoubleValue(0);
  static readonly ONE = new DoubleValue(1);
  readonly kind = "DOUBLE" as const;

  static of(val: number): DoubleValue {
    return new DoubleValue(val);
  }

  getString(): string {
    return formatDouble(this.val);
  }
}

// ---------------------------------------------------------------------------
// Date and time
// ---------------------------------------------------------------------------

function checkNanosOfDay(nanos: bigint): void {
  if (nanos < 0n || nanos >= NANOS_PER_DAY) {
    throw new InvalidValueError("nanos of day", nanos);
  }
}

function checkOffset(offsetSeconds: number): void {
  if (!Number.isInteger(offsetSeconds) || Math.abs(offsetSeconds) > MAX_OFFSET_SECONDS) {
    throw new InvalidValueError("time zone offset", offsetSeconds);
  }
}

function checkEpochDay(epochDay: number): void {
  if (!Number.isSafeInteger(epochDay)) {
    throw new InvalidValueError("epoch day", epochDay);
  }
}

/**
 * Rounded timestamp fields, carrying into the next day.
 */
function roundTimestamp(epochDay: number, timeNanos: bigint, targetScale: number): [number, bigint] {
  const rounded = roundNanos(timeNanos, targetScale);
  return rounded >= NANOS_PER_DAY ? [epochDay + 1, rounded - NANOS_PER_DAY] : [epochDay, rounded];
}

export class DateValue extends BaseValue {
  readonly kind = "DATE" as const;

  private constructor(readonly epochDay: number) {
    super();
  }

  static of(epochDay: number): DateValue {
    checkEpochDay(epochDay);
    return new DateValue(epochDay);
  }

  static ofCivil(year: number, month: number, day: number): DateValue {
    return DateValue.of(epochDayFromCivil(year, month, day));
  }

  getType(): TypeInfo {
    return TypeInfo.of("DATE");
  }

  getString(): string {
    return formatDate(this.epochDay);
  }

  getSQL(): string {
    return `DATE '${this.getString()}'`;
  }

  value(): number {
    return this.epochDay;
  }

  equals(other: Value): boolean {
    return other.kind === "DATE" && other.epochDay === this.epochDay;
  }

  hashCode(): number {
    return this.epochDay | 0;
  }
}

export class TimeValue extends BaseValue {
  readonly kind = "TIME" as const;

  private constructor(readonly nanos: bigint) {
    super();
  }

  static of(nanos: bigint): TimeValue {
    checkNanosOfDay(nanos);
    return new TimeValue(nanos);
  }

  getType(): TypeInfo {
    const scale = fractionScale(this.nanos);
    return new TypeInfo("TIME", 8 + (scale > 0 ? scale + 1 : 0), scale);
  }

  getString(): string {
    return formatTime(this.nanos);
  }

  getSQL(): string {
    return `TIME '${this.getString()}'`;
  }

  value(): bigint {
    return this.nanos;
  }

  /**
   * Round fractional seconds; a result past midnight clamps to the last
   * representable instant of the day.
   */
  override convertScale(_onlyToSmallerScale: boolean, targetScale: number): Value {
    checkTargetScale(targetScale);
    if (targetScale >= 9) return this;
    let rounded = roundNanos(this.nanos, targetScale);
    if (rounded >= NANOS_PER_DAY) {
      rounded = NANOS_PER_DAY - pow10(9 - targetScale);
    }
    return rounded === this.nanos ? this : TimeValue.of(rounded);
  }

  equals(other: Value): boolean {
    return other.kind === "TIME" && other.nanos === this.nanos;
  }

  hashCode(): number {
    return hashBigInt(this.nanos);
  }
}

export class TimeTzValue extends BaseValue {
  readonly kind = "TIME_TZ" as const;

  private constructor(
    readonly nanos: bigint,
    readonly offsetSeconds: number
  ) {
    super();
  }

  static of(nanos: bigint, offsetSeconds: number): TimeTzValue {
    checkNanosOfDay(nanos);
    checkOffset(offsetSeconds);
    return new TimeTzValue(nanos, offsetSeconds);
  }

  getType(): TypeInfo {
    const scale = fractionScale(this.nanos);
    return new TypeInfo("TIME_TZ", 14 + (scale > 0 ? scale + 1 : 0), scale);
  }

  getString(): string {
    return `${formatTime(this.nanos)}${formatOffset(this.offsetSeconds)}`;
  }

  getSQL(): string {
    return `TIME WITH TIME ZONE '${this.getString()}'`;
  }

  value(): { nanos: bigint; offsetSeconds: number } {
    return { nanos: this.nanos, offsetSeconds: this.offsetSeconds };
  }

  override convertScale(_onlyToSmallerScale: boolean, targetScale: number): Value {
    checkTargetScale(targetScale);
    if (targetScale >= 9) return this;
    let rounded = roundNanos(this.nanos, targetScale);
    if (rounded >= NANOS_PER_DAY) {
      rounded = NANOS_PER_DAY - pow10(9 - targetScale);
    }
    return rounded === this.nanos ? this : TimeTzValue.of(rounded, this.offsetSeconds);
  }

  equals(other: Value): boolean {
    return other.kind === "TIME_TZ" && other.nanos === this.nanos && other.offsetSeconds === this.offsetSeconds;
  }

  hashCode(): number {
    return combineHash(hashBigInt(this.nanos), this.offsetSeconds);
  }
}

export class TimestampValue extends BaseValue {
  readonly kind = "TIMESTAMP" as const;

  private constructor(
    readonly epochDay: number,
    readonly timeNanos: bigint
  ) {
    super();
  }

  static of(epochDay: number, timeNanos: bigint): TimestampValue {
    checkEpochDay(epochDay);
    checkNanosOfDay(timeNanos);
    return new TimestampValue(epochDay, timeNanos);
  }

  getType(): TypeInfo {
    const scale = fractionScale(this.timeNanos);
    return new TypeInfo("TIMESTAMP", 19 + (scale > 0 ? scale + 1 : 0), scale);
  }

  getString(): string {
    return `${formatDate(this.epochDay)} ${formatTime(this.timeNanos)}`;
  }

  getSQL(): string {
    return `TIMESTAMP '${this.getString()}'`;
  }

  value(): { epochDay: number; timeNanos: bigint } {
    return { epochDay: this.epochDay, timeNanos: this.timeNanos };
  }

  override convertScale(_onlyToSmallerScale: boolean, targetScale: number): Value {
    checkTargetScale(targetScale);
    if (targetScale >= 9) return this;
    const [epochDay, timeNanos] = roundTimestamp(this.epochDay, this.timeNanos, targetScale);
    return timeNanos === this.timeNanos && epochDay === this.epochDay ? this : TimestampValue.of(epochDay, timeNanos);
  }

  equals(other: Value): boolean {
    return other.kind === "TIMESTAMP" && other.epochDay === this.epochDay && other.timeNanos === this.timeNanos;
  }

  hashCode(): number {
    return combineHash(this.epochDay | 0, hashBigInt(this.timeNanos));
  }
}

export class TimestampTzValue extends BaseValue {
  readonly kind = "TIMESTAMP_TZ" as const;

  private constructor(
    readonly epochDay: number,
    readonly timeNanos: bigint,
    readonly offsetSeconds: number
  ) {
    super();
  }

  static of(epochDay: number, timeNanos: bigint, offsetSeconds: number): TimestampTzValue {
    checkEpochDay(epochDay);
    checkNanosOfDay(timeNanos);
    checkOffset(offsetSeconds);
    return new TimestampTzValue(epochDay, timeNanos, offsetSeconds);
  }

  /**
   * Instant given in milliseconds since the epoch, observed at an offset.
   */
  static fromEpochMillis(millis: number, offsetSeconds: number): TimestampTzValue {
    const ms = BigInt(Math.floor(millis));
    const localSeconds = floorDiv(ms, 1000n) + BigInt(offsetSeconds);
    const epochDay = Number(floorDiv(localSeconds, SECONDS_PER_DAY));
    const timeNanos = floorMod(localSeconds, SECONDS_PER_DAY) * NANOS_PER_SECOND + floorMod(ms, 1000n) * 1_000_000n;
    return TimestampTzValue.of(epochDay, timeNanos, offsetSeconds);
  }

  getType(): TypeInfo {
    const scale = fractionScale(this.timeNanos);
    return new TypeInfo("TIMESTAMP_TZ", 25 + (scale > 0 ? scale + 1 : 0), scale);
  }

  getString(): string {
    return `${formatDate(this.epochDay)} ${formatTime(this.timeNanos)}${formatOffset(this.offsetSeconds)}`;
  }

  getSQL(): string {
    return `TIMESTAMP WITH TIME ZONE '${this.getString()}'`;
  }

  value(): { epochDay: number; timeNanos: bigint; offsetSeconds: number } {
    return { epochDay: this.epochDay, timeNanos: this.timeNanos, offsetSeconds: this.offsetSeconds };
  }

  override convertScale(_onlyToSmallerScale: boolean, targetScale: number): Value {
    checkTargetScale(targetScale);
    if (targetScale >= 9) return this;
    const [epochDay, timeNanos] = roundTimestamp(this.epochDay, this.timeNanos, targetScale);
    if (timeNanos === this.timeNanos && epochDay === this.epochDay) {
      return this;
    }
    return TimestampTzValue.of(epochDay, timeNanos, this.offsetSeconds);
  }

  equals(other: Value): boolean {
    return (
      other.kind === "TIMESTAMP_TZ" &&
      other.epochDay === this.epochDay &&
      other.timeNanos === this.timeNanos &&
      other.offsetSeconds === this.offsetSeconds
    );
  }

  hashCode(): number {
    return combineHash(this.epochDay | 0, hashBigInt(this.timeNanos), this.offsetSeconds);
  }
}

// ---------------------------------------------------------------------------
// Binary and character strings
// ---------------------------------------------------------------------------

/**
 * Variable-length binary string. The payload is copied on the way in and out.
 */
export class BytesValue extends BaseValue {
  readonly kind = "VARBINARY" as const;

  private constructor(private readonly data: Uint8Array) {
    super();
  }

  static of(bytes: Uint8Array): BytesValue {
    return new BytesValue(bytes.slice());
  }

  static fromHex(hex: string): BytesValue | undefined {
    const bytes = hexToBytes(hex);
    return bytes === undefined ? undefined : new BytesValue(bytes);
  }

  /**
   * Copy of the payload.
   */
  getBytes(): Uint8Array {
    return this.data.slice();
  }

  /**
   * The payload itself; callers must not write to it.
   * @internal
   */
  getBytesNoCopy(): Uint8Array {
    return this.data;
  }

  getType(): TypeInfo {
    return new TypeInfo("VARBINARY", this.data.length, 0);
  }

  getString(): string {
    return bytesToHex(this.data);
  }

  getSQL(): string {
    return `X'${this.getString()}'`;
  }

  value(): Uint8Array {
    return this.data.slice();
  }

  override getMemory(): number {
    return 24 + this.data.length;
  }

  override convertPrecision(precision: number): Value {
    return this.data.length <= precision ? this : new BytesValue(this.data.slice(0, precision));
  }

  equals(other: Value): boolean {
    return other.kind === "VARBINARY" && bytesEqual(other.data, this.data);
  }

  hashCode(): number {
    return hashBytes(this.data);
  }
}

/**
 * Character string. CHAR values drop trailing spaces on construction.
 */
export class StringValue extends BaseValue {
  private constructor(
    readonly kind: StringKind,
    private readonly text: string
  ) {
    super();
  }

  static of(text: string, kind: StringKind = "VARCHAR"): StringValue {
    return new StringValue(kind, kind === "CHAR" ? text.replace(/ +$/, "") : text);
  }

  getType(): TypeInfo {
    return new TypeInfo(this.kind, this.text.length, 0);
  }

  getString(): string {
    return this.text;
  }

  getSQL(): string {
    const literal = quoteSQL(this.text);
    switch (this.kind) {
      case "VARCHAR":
        return literal;
      case "VARCHAR_IGNORECASE":
        return `CAST(${literal} AS VARCHAR_IGNORECASE)`;
      case "CHAR":
        return `CAST(${literal} AS CHAR(${Math.max(this.text.length, 1)}))`;
    }
  }

  value(): string {
    return this.text;
  }

  override getMemory(): number {
    return 24 + 2 * this.text.length;
  }

  override convertPrecision(precision: number): Value {
    return this.text.length <= precision ? this : StringValue.of(this.text.slice(0, precision), this.kind);
  }

  equals(other: Value): boolean {
    return other instanceof StringValue && other.kind === this.kind && other.text === this.text;
  }

  hashCode(): number {
    return hashString(this.text);
  }
}

/**
 * Small, fully in-memory large object. CLOB payloads are UTF-8 text.
 */
export class LobValue extends BaseValue {
  private constructor(
    readonly kind: LobKind,
    private readonly data: Uint8Array
  ) {
    super();
  }

  static of(kind: LobKind, bytes: Uint8Array): LobValue {
    return new LobValue(kind, bytes.slice());
  }

  static clob(text: string): LobValue {
    return new LobValue("CLOB", utf8Encode(text));
  }

  static blob(bytes: Uint8Array): LobValue {
    return LobValue.of("BLOB", bytes);
  }

  /**
   * Copy of the payload.
   */
  getBytes(): Uint8Array {
    return this.data.slice();
  }

  /**
   * The payload itself; callers must not write to it.
   * @internal
   */
  getBytesNoCopy(): Uint8Array {
    return this.data;
  }

  getType(): TypeInfo {
    const length = this.kind === "CLOB" ? this.getString().length : this.data.length;
    return new TypeInfo(this.kind, length, 0);
  }

  getString(): string {
    return this.kind === "CLOB" ? utf8Decode(this.data) : bytesToHex(this.data);
  }

  getSQL(): string {
    if (this.kind === "CLOB") {
      return `CAST(${quoteSQL(this.getString())} AS CLOB)`;
    }
    return `CAST(X'${this.getString()}' AS BLOB)`;
  }

  value(): Uint8Array | string {
    return this.kind === "CLOB" ? this.getString() : this.data.slice();
  }

  override getMemory(): number {
    return 48 + this.data.length;
  }

  equals(other: Value): boolean {
    return other instanceof LobValue && other.kind === this.kind && bytesEqual(other.data, this.data);
  }

  hashCode(): number {
    return hashBytes(this.data);
  }
}

// ---------------------------------------------------------------------------
// Collections
// ---------------------------------------------------------------------------

abstract class CollectionValue extends BaseValue {
  abstract override readonly kind: "ARRAY" | "ROW";
  readonly elements: readonly Value[];

  protected constructor(elements: readonly Value[]) {
    super();
    this.elements = Object.freeze([...elements]);
  }

  value(): Value[] {
    return [...this.elements];
  }

  override getMemory(): number {
    return this.elements.reduce((total, element) => total + element.getMemory(), 72);
  }

  override containsNull(): boolean {
    return this.elements.some((element) => element.containsNull());
  }

  equals(other: Value): boolean {
    if (!(other instanceof CollectionValue) || other.kind !== this.kind) {
      return false;
    }
    return (
      other.elements.length === this.elements.length &&
      this.elements.every((element, index) => {
        const peer = other.elements[index];
        return peer !== undefined && element.equals(peer);
      })
    );
  }

  hashCode(): number {
    return combineHash(...this.elements.map((element) => element.hashCode()));
  }
}

export class ArrayValue extends CollectionValue {
  static readonly EMPTY = new ArrayValue([]);
  readonly kind = "ARRAY" as const;

  static of(elements: readonly Value[]): ArrayValue {
    return elements.length === 0 ? ArrayValue.EMPTY : new ArrayValue(elements);
  }

  getType(): TypeInfo {
    return new TypeInfo("ARRAY", this.elements.length, 0);
  }

  getString(): string {
    return `[${this.elements.map((element) => element.getString()).join(", ")}]`;
  }

  getSQL(): string {
    return `ARRAY [${this.elements.map((element) => element.getSQL()).join(", ")}]`;
  }

  /**
   * Keep at most `precision` elements.
   */
  override convertPrecision(precision: number): Value {
    return this.elements.length <= precision ? this : ArrayValue.of(this.elements.slice(0, precision));
  }
}

export class RowValue extends CollectionValue {
  readonly kind = "ROW" as const;

  static of(elements: readonly Value[]): RowValue {
    return new RowValue(elements);
  }

  getType(): TypeInfo {
    return new TypeInfo("ROW", this.elements.length, 0);
  }

  getString(): string {
    return `ROW (${this.elements.map((element) => element.getString()).join(", ")})`;
  }

  getSQL(): string {
    return `ROW (${this.elements.map((element) => element.getSQL()).join(", ")})`;
  }
}

/**
 * Rows produced by a subquery. Holds its own cursor; readers iterate copies.
 */
export class ResultSetValue extends BaseValue {
  readonly kind = "RESULT_SET" as const;

  private constructor(private readonly rows: ResultRows) {
    super();
  }

  static of(rows: ResultRows): ResultSetValue {
    return new ResultSetValue(rows.createCopy());
  }

  /**
   * Every row, read through a fresh cursor.
   */
  readRows(): (readonly Value[])[] {
    const cursor = this.rows.createCopy();
    const out: (readonly Value[])[] = [];
    while (cursor.next()) {
      out.push(cursor.currentRow());
    }
    return out;
  }

  getType(): TypeInfo {
    return TypeInfo.of("RESULT_SET");
  }

  getString(): string {
    const rows = this.readRows().map((row) => `(${row.map((value) => value.getString()).join(", ")})`);
    return `(${rows.join(", ")})`;
  }

  getSQL(): string {
    const rows = this.readRows().map((row) => `(${row.map((value) => value.getSQL()).join(", ")})`);
    return `(VALUES ${rows.join(", ")})`;
  }

  value(): ResultRows {
    return this.rows.createCopy();
  }

  override getResult(): ResultRows {
    return this.rows.createCopy();
  }

  equals(other: Value): boolean {
    return other === this;
  }

  hashCode(): number {
    return hashString(this.getString());
  }
}

// ---------------------------------------------------------------------------
// Other kinds
// ---------------------------------------------------------------------------

/**
 * Serialized host object. `object` is the deserialized form when known.
 */
export class ObjectValue extends BaseValue {
  readonly kind = "JAVA_OBJECT" as const;

  private constructor(
    private readonly data: Uint8Array,
    readonly object: unknown
  ) {
    super();
  }

  static of(bytes: Uint8Array, object?: unknown): ObjectValue {
    return new ObjectValue(bytes.slice(), object);
  }

  /**
   * Copy of the payload.
   */
  getBytes(): Uint8Array {
    return this.data.slice();
  }

  /**
   * The payload itself; callers must not write to it.
   * @internal
   */
  getBytesNoCopy(): Uint8Array {
    return this.data;
  }

  getType(): TypeInfo {
    return new TypeInfo("JAVA_OBJECT", this.data.length, 0);
  }

  getString(): string {
    return bytesToHex(this.data);
  }

  getSQL(): string {
    return `CAST(X'${this.getString()}' AS JAVA_OBJECT)`;
  }

  value(): unknown {
    return this.object ?? this.data.slice();
  }

  override getMemory(): number {
    return 40 + this.data.length;
  }

  equals(other: Value): boolean {
    return other.kind === "JAVA_OBJECT" && bytesEqual(other.data, this.data);
  }

  hashCode(): number {
    return hashBytes(this.data);
  }
}

const UUID_PATTERN = /^[0-9a-fA-F]{32}$/;

/**
 * 128-bit UUID as two unsigned 64-bit halves.
 */
export class UuidValue extends BaseValue {
  readonly kind = "UUID" as const;

  private constructor(
    readonly high: bigint,
    readonly low: bigint
  ) {
    super();
  }

  static of(high: bigint, low: bigint): UuidValue {
    return new UuidValue(BigInt.asUintN(64, high), BigInt.asUintN(64, low));
  }

  /**
   * Parse 32 hex digits; dashes anywhere are ignored.
   */
  static parse(text: string): UuidValue | undefined {
    const hex = text.trim().replaceAll("-", "");
    if (!UUID_PATTERN.test(hex)) {
      return undefined;
    }
    return UuidValue.of(BigInt(`0x${hex.slice(0, 16)}`), BigInt(`0x${hex.slice(16)}`));
  }

  static fromBytes(bytes: Uint8Array): UuidValue | undefined {
    return bytes.length === 16 ? UuidValue.parse(bytesToHex(bytes)) : undefined;
  }

  toBytes(): Uint8Array {
    return hexToBytes(this.hex()) ?? new Uint8Array(16);
  }

  private hex(): string {
    return `${this.high.toString(16).padStart(16, "0")}${this.low.toString(16).padStart(16, "0")}`;
  }

  getType(): TypeInfo {
    return TypeInfo.of("UUID");
  }

  getString(): string {
    const hex = this.hex();
    return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
  }

  getSQL(): string {
    return `UUID '${this.getString()}'`;
  }

  value(): string {
    return this.getString();
  }

  override getMemory(): number {
    return 32;
  }

  equals(other: Value): boolean {
    return other.kind === "UUID" && other.high === this.high && other.low === this.low;
  }

  hashCode(): number {
    return hashBigInt(this.high ^ this.low);
  }
}

/**
 * Geometry in EWKB form. Header fields are decoded once by the codec.
 */
export class GeometryValue extends BaseValue {
  readonly kind = "GEOMETRY" as const;

  private constructor(
    private readonly data: Uint8Array,
    readonly srid: number,
    readonly geometryType: number,
    readonly dimensionSystem: DimensionSystem,
    readonly codec: GeometryCodec
  ) {
    super();
  }

  /**
   * Validate EWKB through the codec. Throws whatever the codec throws.
   */
  static of(ewkb: Uint8Array, codec: GeometryCodec): GeometryValue {
    const info = codec.fromEwkb(ewkb);
    return new GeometryValue(ewkb.slice(), info.srid, info.geometryType, info.dimensionSystem, codec);
  }

  static fromText(text: string, codec: GeometryCodec): GeometryValue {
    return GeometryValue.of(codec.parse(text), codec);
  }

  /**
   * Copy of the payload.
   */
  getBytes(): Uint8Array {
    return this.data.slice();
  }

  /**
   * The payload itself; callers must not write to it.
   * @internal
   */
  getBytesNoCopy(): Uint8Array {
    return this.data;
  }

  getType(): TypeInfo {
    return new TypeInfo("GEOMETRY", this.data.length, 0, new GeometryTypeInfo(this.geometryType, this.srid));
  }

  getString(): string {
    return this.codec.toEwkt(this.data);
  }

  getSQL(): string {
    return `GEOMETRY ${quoteSQL(this.getString())}`;
  }

  value(): Uint8Array {
    return this.data.slice();
  }

  override getMemory(): number {
    return 40 + this.data.length;
  }

  equals(other: Value): boolean {
    return other.kind === "GEOMETRY" && bytesEqual(other.data, this.data);
  }

  hashCode(): number {
    return hashBytes(this.data);
  }
}

/**
 * Enumerator of an ENUM domain. Created only through {@link EnumTypeInfo}.
 */
export class EnumValue extends BaseValue {
  readonly kind = "ENUM" as const;

  private constructor(
    readonly label: string,
    readonly ordinal: number,
    readonly enumType: EnumTypeInfo
  ) {
    super();
  }

  static of(label: string, ordinal: number, enumType: EnumTypeInfo): EnumValue {
    return new EnumValue(label, ordinal, enumType);
  }

  getType(): TypeInfo {
    const precision = enumTypeWidth(this.enumType);
    return new TypeInfo("ENUM", precision, 0, this.enumType);
  }

  getString(): string {
    return this.label;
  }

  getSQL(): string {
    return quoteSQL(this.label);
  }

  value(): string {
    return this.label;
  }

  override getSignum(): -1 | 0 | 1 {
    return signum(this.ordinal);
  }

  equals(other: Value): boolean {
    return other.kind === "ENUM" && other.ordinal === this.ordinal && other.label === this.label;
  }

  hashCode(): number {
    return combineHash(hashString(this.label), this.ordinal);
  }
}

function enumTypeWidth(enumType: EnumTypeInfo): number {
  return enumType.labels.reduce((width, label) => Math.max(width, label.length), 0);
}

/**
 * Check whether text is a single JSON document.
 */
export function isValidJson(text: string): boolean {
  try {
    JSON.parse(text);
    return true;
  } catch (error) {
    if (error instanceof SyntaxError) {
      return false;
    }
    throw error;
  }
}

/**
 * JSON document stored as UTF-8 text.
 */
export class JsonValue extends BaseValue {
  static readonly NULL = new JsonValue(utf8Encode("null"));
  static readonly TRUE = new JsonValue(utf8Encode("true"));
  static readonly FALSE = new JsonValue(utf8Encode("false"));
  readonly kind = "JSON" as const;

  private constructor(private readonly data: Uint8Array) {
    super();
  }

  /**
   * Wrap UTF-8 JSON text. Throws InvalidValueError when it is not JSON.
   */
  static of(bytes: Uint8Array): JsonValue {
    const text = utf8Decode(bytes);
    if (!isValidJson(text)) {
      throw new InvalidValueError("JSON", text);
    }
    return new JsonValue(bytes.slice());
  }

  static fromText(text: string): JsonValue {
    return JsonValue.of(utf8Encode(text));
  }

  /**
   * JSON text of a boolean, number, decimal or string scalar.
   */
  static fromScalar(scalar: boolean | number | bigint | string | Decimal): JsonValue {
    if (typeof scalar === "boolean") {
      return scalar ? JsonValue.TRUE : JsonValue.FALSE;
    }
    if (typeof scalar === "string") {
      return new JsonValue(utf8Encode(JSON.stringify(scalar)));
    }
    return new JsonValue(utf8Encode(scalar.toString()));
  }

  /**
   * Copy of the payload.
   */
  getBytes(): Uint8Array {
    return this.data.slice();
  }

  /**
   * The payload itself; callers must not write to it.
   * @internal
   */
  getBytesNoCopy(): Uint8Array {
    return this.data;
  }

  getType(): TypeInfo {
    return new TypeInfo("JSON", this.data.length, 0);
  }

  getString(): string {
    return utf8Decode(this.data);
  }

  getSQL(): string {
    return `JSON ${quoteSQL(this.getString())}`;
  }

  value(): unknown {
    const parsed: unknown = JSON.parse(this.getString());
    return parsed;
  }

  override getMemory(): number {
    return 24 + this.data.length;
  }

  equals(other: Value): boolean {
    return other.kind === "JSON" && bytesEqual(other.data, this.data);
  }

  hashCode(): number {
    return hashBytes(this.data);
  }
}

// ---------------------------------------------------------------------------
// Intervals
// ---------------------------------------------------------------------------

/**
 * Interval of any qualifier: sign, leading field and combined trailing
 * fields.
 */
export class IntervalValue extends BaseValue {
  readonly kind: IntervalKind;

  private constructor(
    readonly qualifier: IntervalQualifier,
    readonly negative: boolean,
    readonly leading: bigint,
    readonly remaining: bigint
  ) {
    super();
    this.kind = qualifierKind(qualifier);
  }

  /**
   * Validate the fields. A leading field past 18 digits overflows.
   */
  static tryOf(
    qualifier: IntervalQualifier,
    negative: boolean,
    leading: bigint,
    remaining = 0n
  ): IntervalValue | ValueError {
    if (leading > MAX_INTERVAL_LEADING) {
      return new NumericOverflowError(`${negative ? "-" : ""}${leading}`);
    }
    const violation = checkIntervalFields(qualifier, { negative, leading, remaining });
    if (violation !== undefined) {
      return new InvalidValueError(qualifier, violation);
    }
    const zero = leading === 0n && remaining === 0n;
    return new IntervalValue(qualifier, negative && !zero, leading, remaining);
  }

  static of(qualifier: IntervalQualifier, negative: boolean, leading: bigint, remaining = 0n): IntervalValue {
    const result = IntervalValue.tryOf(qualifier, negative, leading, remaining);
    if (result instanceof IntervalValue) {
      return result;
    }
    throw result;
  }

  /**
   * Interval from signed months or nanoseconds; finer units are truncated.
   */
  static fromAbsolute(qualifier: IntervalQualifier, absolute: bigint): IntervalValue | ValueError {
    const { negative, leading, remaining } = intervalFromAbsolute(qualifier, absolute);
    return IntervalValue.tryOf(qualifier, negative, leading, remaining);
  }

  static ofKind(kind: IntervalKind, negative: boolean, leading: bigint, remaining = 0n): IntervalValue {
    return IntervalValue.of(kindQualifier(kind), negative, leading, remaining);
  }

  /**
   * Signed months or nanoseconds.
   */
  toAbsolute(): bigint {
    return intervalToAbsolute(this.qualifier, this.fields());
  }

  fields(): IntervalFields {
    return { negative: this.negative, leading: this.leading, remaining: this.remaining };
  }

  /**
   * Leading field, rounded half-up by the trailing fields.
   */
  toLong(): bigint {
    let leading = this.leading;
    if (hasRemaining(this.qualifier) && this.remaining !== 0n) {
      if (this.remaining >= remainingMultiplier(this.qualifier) / 2n) {
        leading++;
      }
    }
    return this.negative ? -leading : leading;
  }

  /**
   * Exact value in units of the leading field.
   */
  toDecimal(): Decimal {
    let result = Decimal.fromBigInt(this.leading);
    if (hasRemaining(this.qualifier) && this.remaining !== 0n) {
      const multiplier = Decimal.fromBigInt(remainingMultiplier(this.qualifier));
      const fraction = Decimal.fromBigInt(this.remaining).divide(multiplier, multiplier.precision(), "HALF_DOWN");
      result = result.add(fraction).stripTrailingZeros();
    }
    return this.negative ? result.negate() : result;
  }

  getType(): TypeInfo {
    const scale = this.kind.endsWith("SECOND") ? fractionScale(this.remaining) : 0;
    return new TypeInfo(this.kind, Math.max(this.leading.toString().length, 2), scale);
  }

  getString(): string {
    return formatInterval(this.qualifier, this.fields());
  }

  getSQL(): string {
    return this.getString();
  }

  value(): IntervalFields {
    return this.fields();
  }

  override getMemory(): number {
    return 48;
  }

  override getSignum(): -1 | 0 | 1 {
    if (this.negative) return -1;
    return this.leading === 0n && this.remaining === 0n ? 0 : 1;
  }

  equals(other: Value): boolean {
    return (
      other instanceof IntervalValue &&
      other.qualifier === this.qualifier &&
      other.negative === this.negative &&
      other.leading === this.leading &&
      other.remaining === this.remaining
    );
  }

  hashCode(): number {
    return combineHash(hashString(this.qualifier), this.negative ? 1 : 0, hashBigInt(this.leading), hashBigInt(this.remaining));
  }
}

// ---------------------------------------------------------------------------
// Union Type
// ---------------------------------------------------------------------------

/**
 * Every SQL runtime value.
 */
export type Value =
  | NullValue
  | BooleanValue
  | TinyintValue
  | SmallintValue
  | IntegerValue
  | BigintValue
  | DecimalValue
  | RealValue
  | DoubleValue
  | DateValue
  | TimeValue
  | TimeTzValue
  | TimestampValue
  | TimestampTzValue
  | BytesValue
  | StringValue
  | LobValue
  | ArrayValue
  | RowValue
  | ResultSetValue
  | ObjectValue
  | UuidValue
  | GeometryValue
  | EnumValue
  | JsonValue
  | IntervalValue;

// ---------------------------------------------------------------------------
// Type Guards
// ---------------------------------------------------------------------------

export function isValue(value: unknown): value is Value {
  return value instanceof BaseValue;
}

export function isNullValue(value: Value): value is NullValue {
  return value.kind === "NULL";
}

export function isStringValue(value: Value): value is StringValue {
  return value instanceof StringValue;
}

export function isIntervalValue(value: Value): value is IntervalValue {
  return value instanceof IntervalValue;
}

export function isCollectionValue(value: Value): value is ArrayValue | RowValue {
  return value.kind === "ARRAY" || value.kind === "ROW";
}
