// Conversion Engine
// Any-to-any conversion matrix between the value kinds

import type { ValueCache } from "../cache/value-cache";
import {
  DataConversionError,
  InvalidIntervalLiteralError,
  MalformedLiteralError,
  ScalarSubqueryCardinalityError,
  ValueError,
  type ColumnContext,
} from "../common/errors";
import { readSignedBigEndian, utf8Decode, utf8Encode, writeSignedBigEndian } from "../common/utils";
import { SystemCastDataProvider, type CastDataProvider } from "../services/environment";
import type { GeometryCodec } from "../services/geometry";
import { InMemoryLobStore, type LobStore } from "../services/lob";
import { SimpleResult } from "../services/result";
import { EnumTypeInfo, GeometryTypeInfo, type ExtTypeInfo } from "../types/ext-type-info";
import {
  assertNever,
  isIntervalKind,
  isYearMonthIntervalKind,
  type IntegerKind,
  type IntervalKind,
  type LobKind,
  type StringKind,
  type ValueKind,
} from "../types/kinds";
import {
  epochDayFromLocalSeconds,
  epochSeconds,
  NANOS_PER_DAY,
  NANOS_PER_HOUR,
  NANOS_PER_MINUTE,
  NANOS_PER_SECOND,
  nanosFromLocalSeconds,
  normalizeNanosOfDay,
  parseDate,
  parseTime,
  parseTimeLiteral,
  parseTimestampLiteral,
} from "../values/datetime";
import { Decimal } from "../values/decimal";
import { kindQualifier, parseInterval, type IntervalQualifier } from "../values/interval";
import {
  ArrayValue,
  BigintValue,
  BooleanValue,
  BytesValue,
  DateValue,
  DecimalValue,
  DoubleValue,
  GeometryValue,
  IntegerValue,
  IntervalValue,
  isValidJson,
  JsonValue,
  NullValue,
  ObjectValue,
  RealValue,
  ResultSetValue,
  RowValue,
  SmallintValue,
  StringValue,
  TimestampTzValue,
  TimestampValue,
  TimeTzValue,
  TimeValue,
  TinyintValue,
  UuidValue,
  type Value,
} from "../values/values";
import { decimalToBigint, doubleToBigint, narrowInteger } from "./guard";

/**
 * Collaborators some conversions need.
 */
export interface ConversionServices {
  /** Defaults to the in-memory store. */
  lobs?: LobStore;
  /** Required for conversions that produce a GEOMETRY. */
  geometry?: GeometryCodec;
}

export interface ConvertOptions {
  /** ENUM domain or GEOMETRY constraint of the target column. */
  extTypeInfo?: ExtTypeInfo;
  /** Defaults to the system clock and time zone. */
  provider?: CastDataProvider;
  /** Names the target column in overflow messages. */
  column?: ColumnContext;
  services?: ConversionServices;
  /** Interns the converted value when given. */
  cache?: ValueCache;
}

// ---------------------------------------------------------------------------
// Entry Points
// ---------------------------------------------------------------------------

/**
 * Convert a value to the target kind. NULL converts to NULL; a value of the
 * target kind is returned as is, or re-validated by `extTypeInfo` when one
 * is given.
 */
export function tryConvert(value: Value, target: ValueKind, options: ConvertOptions = {}): Value | ValueError {
  if (value.kind === "NULL") {
    return value;
  }
  if (value.kind === target) {
    return options.extTypeInfo === undefined ? value : options.extTypeInfo.cast(value, options.provider);
  }
  let result: Value | ValueError;
  try {
    result = convertTo(value, target, options);
  } catch (error) {
    if (error instanceof ValueError) {
      return error;
    }
    throw error;
  }
  if (result instanceof ValueError || options.cache === undefined) {
    return result;
  }
  return options.cache.intern(result);
}

/**
 * Throwing form of {@link tryConvert}.
 */
export function convert(value: Value, target: ValueKind, options?: ConvertOptions): Value {
  const result = tryConvert(value, target, options);
  if (result instanceof ValueError) {
    throw result;
  }
  return result;
}

function convertTo(value: Value, target: ValueKind, options: ConvertOptions): Value | ValueError {
  if (isIntervalKind(target)) {
    return isYearMonthIntervalKind(target)
      ? toYearMonthInterval(value, target, options)
      : toDayTimeInterval(value, target, options);
  }
  switch (target) {
    case "NULL":
      return NullValue.Instance;
    case "BOOLEAN":
      return toBoolean(value);
    case "TINYINT":
    case "SMALLINT":
    case "INTEGER":
    case "BIGINT":
      return toInteger(value, target, options.column);
    case "NUMERIC":
      return toDecimal(value);
    case "REAL":
    case "DOUBLE":
      return toFloating(value, target);
    case "DATE":
      return toDate(value, options);
    case "TIME":
      return toTime(value, options);
    case "TIME_TZ":
      return toTimeTz(value, options);
    case "TIMESTAMP":
      return toTimestamp(value, options);
    case "TIMESTAMP_TZ":
      return toTimestampTz(value, options);
    case "VARBINARY":
      return toBytes(value);
    case "VARCHAR":
    case "VARCHAR_IGNORECASE":
    case "CHAR":
      return toText(value, target);
    case "BLOB":
    case "CLOB":
      return toLob(value, target, options.services?.lobs ?? InMemoryLobStore.Instance);
    case "JAVA_OBJECT":
      return toJavaObject(value);
    case "ENUM":
      return toEnum(value, options.extTypeInfo);
    case "UUID":
      return toUuid(value);
    case "GEOMETRY":
      return toGeometry(value, options);
    case "JSON":
      return toJson(value);
    case "ARRAY":
      return toArray(value);
    case "ROW":
      return toRow(value);
    case "RESULT_SET":
      return toResultSet(value);
    default:
      return assertNever(target);
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function unsupported(value: Value, target: ValueKind, detail?: string): DataConversionError {
  return new DataConversionError(value.kind, target, detail);
}

function malformed(value: Value, target: ValueKind): MalformedLiteralError {
  return new MalformedLiteralError(value.kind, target, value.getString());
}

function providerOf(options: ConvertOptions): CastDataProvider {
  return options.provider ?? SystemCastDataProvider.Instance;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

const INTEGER_WIDTHS: Readonly<Record<IntegerKind, number>> = {
  TINYINT: 1,
  SMALLINT: 2,
  INTEGER: 4,
  BIGINT: 8,
};

const INTEGER_LITERAL = /^[+-]?\d+$/;
const FLOAT_LITERAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const FLOAT_SPECIAL = /^([+-]?)(NaN|Infinity)$/;

/**
 * Exact decimal of a numeric value, or undefined for NaN and infinities.
 */
function exactDecimal(value: Value): Decimal | undefined {
  switch (value.kind) {
    case "BOOLEAN":
      return value.value() ? Decimal.ONE : Decimal.ZERO;
    case "TINYINT":
    case "SMALLINT":
    case "INTEGER":
      return Decimal.fromBigInt(value.value());
    case "BIGINT":
      return Decimal.fromBigInt(value.value());
    case "NUMERIC":
      return value.decimal;
    case "REAL":
    case "DOUBLE":
      return Decimal.parse(value.getString());
    case "ENUM":
      return Decimal.fromBigInt(value.ordinal);
    default:
      return value instanceof IntervalValue ? value.toDecimal() : undefined;
  }
}

function parseFloating(text: string): number | undefined {
  const special = FLOAT_SPECIAL.exec(text);
  if (special !== null) {
    if (special[2] === "NaN") return Number.NaN;
    return special[1] === "-" ? -Infinity : Infinity;
  }
  return FLOAT_LITERAL.test(text) ? Number(text) : undefined;
}

// ---------------------------------------------------------------------------
// BOOLEAN
// ---------------------------------------------------------------------------

const TRUE_WORDS = new Set(["TRUE", "T", "YES", "Y"]);
const FALSE_WORDS = new Set(["FALSE", "F", "NO", "N"]);

function toBoolean(value: Value): Value | ValueError {
  switch (value.kind) {
    case "TINYINT":
    case "SMALLINT":
    case "INTEGER":
    case "BIGINT":
    case "NUMERIC":
    case "REAL":
    case "DOUBLE":
      return BooleanValue.of(value.getSignum() !== 0);
    case "TIME":
    case "DATE":
    case "TIMESTAMP":
    case "TIMESTAMP_TZ":
    case "VARBINARY":
    case "JAVA_OBJECT":
    case "UUID":
    case "ENUM":
      return unsupported(value, "BOOLEAN");
  }
  if (value instanceof IntervalValue) {
    return BooleanValue.of(value.getSignum() !== 0);
  }
  const text = value.getString().trim();
  const word = text.toUpperCase();
  if (TRUE_WORDS.has(word)) return BooleanValue.TRUE;
  if (FALSE_WORDS.has(word)) return BooleanValue.FALSE;
  const decimal = Decimal.parse(text);
  if (decimal === undefined) {
    return malformed(value, "BOOLEAN");
  }
  return BooleanValue.of(decimal.signum() !== 0);
}

// ---------------------------------------------------------------------------
// Integers
// ---------------------------------------------------------------------------

function integerOf(value: Value, target: IntegerKind, column?: ColumnContext): bigint | ValueError {
  if (value instanceof IntervalValue) {
    return value.toLong();
  }
  switch (value.kind) {
    case "BOOLEAN":
      return value.value() ? 1n : 0n;
    case "TINYINT":
    case "SMALLINT":
    case "INTEGER":
      return BigInt(value.value());
    case "BIGINT":
      return value.value();
    case "ENUM":
      return BigInt(value.ordinal);
    case "NUMERIC":
      return decimalToBigint(value.decimal, column);
    case "REAL":
    case "DOUBLE":
      return doubleToBigint(value.value(), column);
    case "VARBINARY": {
      const bytes = value.getBytesNoCopy();
      if (bytes.length === INTEGER_WIDTHS[target]) {
        return readSignedBigEndian(bytes);
      }
      break;
    }
    case "TIMESTAMP_TZ":
      return unsupported(value, target);
  }
  const text = value.getString().trim();
  if (!INTEGER_LITERAL.test(text)) {
    return malformed(value, target);
  }
  return BigInt(text);
}

function makeInteger(kind: IntegerKind, n: bigint): Value {
  switch (kind) {
    case "TINYINT":
      return TinyintValue.of(Number(n));
    case "SMALLINT":
      return SmallintValue.of(Number(n));
    case "INTEGER":
      return IntegerValue.of(Number(n));
    case "BIGINT":
      return BigintValue.of(n);
  }
}

function toInteger(value: Value, target: IntegerKind, column?: ColumnContext): Value | ValueError {
  const n = integerOf(value, target, column);
  if (n instanceof ValueError) {
    return n;
  }
  const narrowed = narrowInteger(n, target, column);
  return narrowed instanceof ValueError ? narrowed : makeInteger(target, narrowed);
}

// ---------------------------------------------------------------------------
// NUMERIC, REAL and DOUBLE
// ---------------------------------------------------------------------------

function toDecimal(value: Value): Value | ValueError {
  switch (value.kind) {
    case "BOOLEAN":
      return value.value() ? DecimalValue.ONE : DecimalValue.ZERO;
    case "TIMESTAMP_TZ":
      return unsupported(value, "NUMERIC");
    case "REAL":
    case "DOUBLE": {
      const decimal = exactDecimal(value);
      return decimal === undefined ? unsupported(value, "NUMERIC", value.getString()) : DecimalValue.of(decimal);
    }
  }
  const decimal = exactDecimal(value);
  if (decimal !== undefined) {
    return DecimalValue.of(decimal);
  }
  const parsed = Decimal.parse(value.getString().trim());
  return parsed === undefined ? malformed(value, "NUMERIC") : DecimalValue.of(parsed);
}

function toFloating(value: Value, target: "REAL" | "DOUBLE"): Value | ValueError {
  const make = (n: number): Value => (target === "REAL" ? RealValue.of(n) : DoubleValue.of(n));
  switch (value.kind) {
    case "BOOLEAN":
      if (target === "REAL") return value.value() ? RealValue.ONE : RealValue.ZERO;
      return value.value() ? DoubleValue.ONE : DoubleValue.ZERO;
    case "TINYINT":
    case "SMALLINT":
    case "INTEGER":
    case "REAL":
    case "DOUBLE":
      return make(value.value());
    case "BIGINT":
      return make(Number(value.value()));
    case "NUMERIC":
      return make(value.decimal.toNumber());
    case "ENUM":
    case "TIMESTAMP_TZ":
      return unsupported(value, target);
  }
  if (value instanceof IntervalValue) {
    return make(value.toDecimal().toNumber());
  }
  const parsed = parseFloating(value.getString().trim());
  return parsed === undefined ? malformed(value, target) : make(parsed);
}

// ---------------------------------------------------------------------------
// Date and time
// ---------------------------------------------------------------------------

/**
 * Local wall-clock seconds of a zoned timestamp in the session time zone.
 */
function sessionLocalSeconds(value: TimestampTzValue, provider: CastDataProvider): bigint {
  const seconds = epochSeconds(value.epochDay, value.timeNanos, value.offsetSeconds);
  return seconds + BigInt(provider.currentTimeZone().getTimeZoneOffsetUTC(seconds));
}

/**
 * Nanos of day of a TIME WITH TIME ZONE shifted to the session offset.
 */
function localTimeNanos(value: TimeTzValue, provider: CastDataProvider): bigint {
  const localOffset = provider.currentTimestamp().offsetSeconds;
  return normalizeNanosOfDay(value.nanos + BigInt(localOffset - value.offsetSeconds) * NANOS_PER_SECOND);
}

function toDate(value: Value, options: ConvertOptions): Value | ValueError {
  switch (value.kind) {
    case "TIMESTAMP":
      return DateValue.of(value.epochDay);
    case "TIMESTAMP_TZ":
      return DateValue.of(epochDayFromLocalSeconds(sessionLocalSeconds(value, providerOf(options))));
    case "TIME":
    case "TIME_TZ":
    case "ENUM":
      return unsupported(value, "DATE");
  }
  const epochDay = parseDate(value.getString().trim());
  return epochDay === undefined ? malformed(value, "DATE") : DateValue.of(epochDay);
}

function toTime(value: Value, options: ConvertOptions): Value | ValueError {
  switch (value.kind) {
    case "TIME_TZ":
      return TimeValue.of(localTimeNanos(value, providerOf(options)));
    case "TIMESTAMP":
      return TimeValue.of(value.timeNanos);
    case "TIMESTAMP_TZ": {
      const local = sessionLocalSeconds(value, providerOf(options));
      return TimeValue.of(nanosFromLocalSeconds(local) + (value.timeNanos % NANOS_PER_SECOND));
    }
    case "DATE":
    case "ENUM":
      return unsupported(value, "TIME");
  }
  const nanos = parseTime(value.getString().trim());
  return nanos === undefined ? malformed(value, "TIME") : TimeValue.of(nanos);
}

function toTimeTz(value: Value, options: ConvertOptions): Value | ValueError {
  switch (value.kind) {
    case "TIME":
      return TimeTzValue.of(value.nanos, providerOf(options).currentTimestamp().offsetSeconds);
    case "TIMESTAMP": {
      const offset = providerOf(options).currentTimeZone().getTimeZoneOffsetLocal(value.epochDay, value.timeNanos);
      return TimeTzValue.of(value.timeNanos, offset);
    }
    case "TIMESTAMP_TZ":
      return TimeTzValue.of(value.timeNanos, value.offsetSeconds);
    case "DATE":
    case "ENUM":
      return unsupported(value, "TIME_TZ");
  }
  const literal = parseTimeLiteral(value.getString().trim());
  if (literal === undefined) {
    return malformed(value, "TIME_TZ");
  }
  const offset = literal.offset ?? providerOf(options).currentTimestamp().offsetSeconds;
  return TimeTzValue.of(literal.nanos, offset);
}

function toTimestamp(value: Value, options: ConvertOptions): Value | ValueError {
  switch (value.kind) {
    case "TIME":
      return TimestampValue.of(providerOf(options).currentTimestamp().epochDay, value.nanos);
    case "TIME_TZ": {
      const provider = providerOf(options);
      return TimestampValue.of(provider.currentTimestamp().epochDay, localTimeNanos(value, provider));
    }
    case "DATE":
      return TimestampValue.of(value.epochDay, 0n);
    case "TIMESTAMP_TZ": {
      const local = sessionLocalSeconds(value, providerOf(options));
      return TimestampValue.of(
        epochDayFromLocalSeconds(local),
        nanosFromLocalSeconds(local) + (value.timeNanos % NANOS_PER_SECOND)
      );
    }
    case "ENUM":
      return unsupported(value, "TIMESTAMP");
  }
  const literal = parseTimestampLiteral(value.getString().trim());
  if (literal === undefined) {
    return malformed(value, "TIMESTAMP");
  }
  if (literal.offset === undefined) {
    return TimestampValue.of(literal.epochDay, literal.timeNanos);
  }
  const zoned = TimestampTzValue.of(literal.epochDay, literal.timeNanos, literal.offset);
  return toTimestamp(zoned, options);
}

function toTimestampTz(value: Value, options: ConvertOptions): Value | ValueError {
  let epochDay: number;
  let timeNanos: bigint;
  switch (value.kind) {
    case "TIME":
      epochDay = providerOf(options).currentTimestamp().epochDay;
      timeNanos = value.nanos;
      break;
    case "TIME_TZ":
      return TimestampTzValue.of(providerOf(options).currentTimestamp().epochDay, value.nanos, value.offsetSeconds);
    case "DATE":
      epochDay = value.epochDay;
      timeNanos = 0n;
      break;
    case "TIMESTAMP":
      epochDay = value.epochDay;
      timeNanos = value.timeNanos;
      break;
    case "ENUM":
      return unsupported(value, "TIMESTAMP_TZ");
    default: {
      const literal = parseTimestampLiteral(value.getString().trim());
      if (literal === undefined) {
        return malformed(value, "TIMESTAMP_TZ");
      }
      if (literal.offset !== undefined) {
        return TimestampTzValue.of(literal.epochDay, literal.timeNanos, literal.offset);
      }
      epochDay = literal.epochDay;
      timeNanos = literal.timeNanos;
    }
  }
  const offset = providerOf(options).currentTimeZone().getTimeZoneOffsetLocal(epochDay, timeNanos);
  return TimestampTzValue.of(epochDay, timeNanos, offset);
}

// ---------------------------------------------------------------------------
// Binary, character and large objects
// ---------------------------------------------------------------------------

/**
 * Raw bytes of the kinds that carry a byte payload.
 */
function payloadBytes(value: Value): Uint8Array | undefined {
  switch (value.kind) {
    case "VARBINARY":
    case "JAVA_OBJECT":
    case "JSON":
      return value.getBytesNoCopy();
    case "GEOMETRY":
      return value.getBytesNoCopy();
    case "BLOB":
      return value.getBytesNoCopy();
    case "UUID":
      return value.toBytes();
    default:
      return undefined;
  }
}

function toBytes(value: Value): Value | ValueError {
  switch (value.kind) {
    case "JAVA_OBJECT":
    case "BLOB":
    case "GEOMETRY":
    case "JSON":
    case "UUID":
      return BytesValue.of(payloadBytes(value) ?? new Uint8Array(0));
    case "TINYINT":
    case "SMALLINT":
    case "INTEGER":
      return BytesValue.of(writeSignedBigEndian(BigInt(value.value()), INTEGER_WIDTHS[value.kind]));
    case "BIGINT":
      return BytesValue.of(writeSignedBigEndian(value.value(), 8));
    case "ENUM":
    case "TIMESTAMP_TZ":
      return unsupported(value, "VARBINARY");
  }
  return BytesValue.of(utf8Encode(value.getString()));
}

function toText(value: Value, target: StringKind): Value {
  return StringValue.of(value.getString(), target);
}

function toLob(value: Value, target: LobKind, lobs: LobStore): Value | ValueError {
  if (target === "CLOB") {
    return lobs.createSmallLob("CLOB", utf8Encode(value.getString()));
  }
  switch (value.kind) {
    case "VARBINARY":
    case "GEOMETRY":
    case "JSON":
    case "UUID":
      return lobs.createSmallLob("BLOB", payloadBytes(value) ?? new Uint8Array(0));
    case "TIMESTAMP_TZ":
      return unsupported(value, "BLOB");
  }
  return lobs.createSmallLob("BLOB", utf8Encode(value.getString()));
}

function toJavaObject(value: Value): Value | ValueError {
  switch (value.kind) {
    case "VARBINARY":
    case "BLOB":
      return ObjectValue.of(value.getBytesNoCopy());
    case "GEOMETRY":
      return ObjectValue.of(value.getBytesNoCopy(), value);
    case "ENUM":
    case "TIMESTAMP_TZ":
      return unsupported(value, "JAVA_OBJECT");
  }
  const bytes = hexOf(value.getString().trim());
  return bytes === undefined ? malformed(value, "JAVA_OBJECT") : ObjectValue.of(bytes);
}

function hexOf(text: string): Uint8Array | undefined {
  const parsed = BytesValue.fromHex(text);
  return parsed?.getBytesNoCopy();
}

// ---------------------------------------------------------------------------
// ENUM, UUID, GEOMETRY and JSON
// ---------------------------------------------------------------------------

function toEnum(value: Value, ext: ExtTypeInfo | undefined): Value | ValueError {
  if (!(ext instanceof EnumTypeInfo)) {
    return unsupported(value, "ENUM", "no ENUM domain given");
  }
  switch (value.kind) {
    case "TINYINT":
    case "SMALLINT":
    case "INTEGER":
    case "BIGINT":
    case "NUMERIC": {
      const ordinal = integerOf(value, "INTEGER");
      if (ordinal instanceof ValueError) {
        return ordinal;
      }
      const narrowed = narrowInteger(ordinal, "INTEGER");
      return narrowed instanceof ValueError ? narrowed : ext.getValue(Number(narrowed), value.kind);
    }
    case "VARCHAR":
    case "VARCHAR_IGNORECASE":
    case "CHAR":
      return ext.getValue(value.getString(), value.kind);
    case "JAVA_OBJECT": {
      const object = value.object;
      if (typeof object === "string") {
        return ext.getValue(object, value.kind);
      }
      if (typeof object === "number" && Number.isInteger(object)) {
        return ext.getValue(object, value.kind);
      }
      break;
    }
  }
  return unsupported(value, "ENUM");
}

function toUuid(value: Value): Value | ValueError {
  switch (value.kind) {
    case "VARBINARY": {
      const bytes = value.getBytesNoCopy();
      return UuidValue.fromBytes(bytes) ?? unsupported(value, "UUID", `${bytes.length} bytes`);
    }
    case "JAVA_OBJECT": {
      const object = value.object;
      if (object instanceof UuidValue) {
        return object;
      }
      if (typeof object === "string") {
        return UuidValue.parse(object) ?? unsupported(value, "UUID");
      }
      return unsupported(value, "UUID");
    }
    case "TIMESTAMP_TZ":
      return unsupported(value, "UUID");
  }
  return UuidValue.parse(value.getString()) ?? malformed(value, "UUID");
}

function toGeometry(value: Value, options: ConvertOptions): Value | ValueError {
  const ext = options.extTypeInfo instanceof GeometryTypeInfo ? options.extTypeInfo : undefined;
  let result: Value | ValueError;
  if (value.kind === "JAVA_OBJECT" && value.object instanceof GeometryValue) {
    result = value.object;
  } else {
    const codec = options.services?.geometry;
    if (codec === undefined) {
      return unsupported(value, "GEOMETRY", "no geometry codec configured");
    }
    result = decodeGeometry(value, codec, ext);
  }
  if (result instanceof ValueError || ext === undefined) {
    return result;
  }
  return ext.cast(result, options.provider);
}

function decodeGeometry(value: Value, codec: GeometryCodec, ext: GeometryTypeInfo | undefined): Value | ValueError {
  switch (value.kind) {
    case "JAVA_OBJECT":
    case "TIMESTAMP_TZ":
      return unsupported(value, "GEOMETRY");
    case "VARBINARY":
      try {
        return GeometryValue.of(value.getBytesNoCopy(), codec);
      } catch (error) {
        return unsupported(value, "GEOMETRY", describe(error));
      }
    case "JSON":
      try {
        return GeometryValue.of(codec.geoJsonToEwkb(value.getBytesNoCopy(), ext?.srid ?? 0), codec);
      } catch (error) {
        return unsupported(value, "GEOMETRY", describe(error));
      }
  }
  try {
    return GeometryValue.fromText(value.getString(), codec);
  } catch (error) {
    if (error instanceof ValueError) {
      return error;
    }
    return malformed(value, "GEOMETRY");
  }
}

function toJson(value: Value): Value | ValueError {
  switch (value.kind) {
    case "BOOLEAN":
      return JsonValue.fromScalar(value.value());
    case "TINYINT":
    case "SMALLINT":
    case "INTEGER":
    case "BIGINT":
      return JsonValue.fromScalar(value.value());
    case "REAL":
    case "DOUBLE":
    case "NUMERIC": {
      const decimal = exactDecimal(value);
      return decimal === undefined ? unsupported(value, "JSON", value.getString()) : JsonValue.fromScalar(decimal);
    }
    case "VARBINARY":
    case "BLOB": {
      if (!isValidJson(utf8Decode(value.getBytesNoCopy()))) {
        return unsupported(value, "JSON", "invalid JSON text");
      }
      return JsonValue.of(value.getBytesNoCopy());
    }
    case "VARCHAR":
    case "VARCHAR_IGNORECASE":
    case "CHAR":
    case "CLOB":
      return JsonValue.fromScalar(value.getString());
    case "GEOMETRY":
      try {
        return JsonValue.of(value.codec.ewkbToGeoJson(value.getBytesNoCopy(), value.dimensionSystem));
      } catch (error) {
        return unsupported(value, "JSON", describe(error));
      }
    default:
      return unsupported(value, "JSON");
  }
}

// ---------------------------------------------------------------------------
// Intervals
// ---------------------------------------------------------------------------

/**
 * Interval with the given signed leading field and no trailing fields.
 */
function fromLeading(qualifier: IntervalQualifier, leading: bigint): Value | ValueError {
  return IntervalValue.tryOf(qualifier, leading < 0n, leading < 0n ? -leading : leading, 0n);
}

/**
 * Scale an exact decimal into the qualifier's absolute unit.
 */
function fromScaled(qualifier: IntervalQualifier, decimal: Decimal, multiplier: bigint): Value | ValueError {
  const absolute = decimal.multiply(Decimal.fromBigInt(multiplier)).setScale(0, "HALF_UP").unscaled;
  return IntervalValue.fromAbsolute(qualifier, absolute);
}

/**
 * Nanoseconds per unit of a fractional value for the day-time kinds that
 * accept one.
 */
function fractionalMultiplier(qualifier: IntervalQualifier): bigint | undefined {
  switch (qualifier) {
    case "SECOND":
      return NANOS_PER_SECOND;
    case "DAY_TO_HOUR":
    case "DAY_TO_MINUTE":
    case "DAY_TO_SECOND":
      return NANOS_PER_DAY;
    case "HOUR_TO_MINUTE":
    case "HOUR_TO_SECOND":
      return NANOS_PER_HOUR;
    case "MINUTE_TO_SECOND":
      return NANOS_PER_MINUTE;
    default:
      return undefined;
  }
}

function parseIntervalText(value: Value, target: IntervalKind): Value | ValueError {
  const qualifier = kindQualifier(target);
  const text = value.getString();
  const parsed = parseInterval(qualifier, text);
  if (parsed === undefined) {
    return new InvalidIntervalLiteralError(qualifier, text);
  }
  const { negative, leading, remaining } = parsed.fields;
  const interval = IntervalValue.tryOf(parsed.qualifier, negative, leading, remaining);
  if (interval instanceof ValueError) {
    return new InvalidIntervalLiteralError(qualifier, text);
  }
  if (interval.kind === target) {
    return interval;
  }
  const converted = intervalToInterval(interval, target);
  return converted instanceof ValueError ? new InvalidIntervalLiteralError(qualifier, text) : converted;
}

function intervalToInterval(value: IntervalValue, target: IntervalKind): Value | ValueError {
  if (isYearMonthIntervalKind(value.kind) !== isYearMonthIntervalKind(target)) {
    return unsupported(value, target);
  }
  return IntervalValue.fromAbsolute(kindQualifier(target), value.toAbsolute());
}

function toYearMonthInterval(value: Value, target: IntervalKind, options: ConvertOptions): Value | ValueError {
  const qualifier = kindQualifier(target);
  switch (value.kind) {
    case "TINYINT":
    case "SMALLINT":
    case "INTEGER":
      return fromLeading(qualifier, BigInt(value.value()));
    case "BIGINT":
      return fromLeading(qualifier, value.value());
    case "REAL":
    case "DOUBLE":
    case "NUMERIC": {
      if (qualifier === "YEAR_TO_MONTH") {
        const decimal = exactDecimal(value);
        return decimal === undefined ? unsupported(value, target, value.getString()) : fromScaled(qualifier, decimal, 12n);
      }
      const leading =
        value.kind === "NUMERIC"
          ? decimalToBigint(value.decimal, options.column)
          : doubleToBigint(value.value(), options.column);
      return leading instanceof ValueError ? leading : fromLeading(qualifier, leading);
    }
    case "VARCHAR":
    case "VARCHAR_IGNORECASE":
    case "CHAR":
      return parseIntervalText(value, target);
  }
  if (value instanceof IntervalValue) {
    return intervalToInterval(value, target);
  }
  return unsupported(value, target);
}

function toDayTimeInterval(value: Value, target: IntervalKind, options: ConvertOptions): Value | ValueError {
  const qualifier = kindQualifier(target);
  switch (value.kind) {
    case "TINYINT":
    case "SMALLINT":
    case "INTEGER":
      return fromLeading(qualifier, BigInt(value.value()));
    case "BIGINT":
      return fromLeading(qualifier, value.value());
    case "REAL":
    case "DOUBLE":
    case "NUMERIC": {
      const multiplier = fractionalMultiplier(qualifier);
      if (multiplier !== undefined) {
        const decimal = exactDecimal(value);
        return decimal === undefined
          ? unsupported(value, target, value.getString())
          : fromScaled(qualifier, decimal, multiplier);
      }
      const leading =
        value.kind === "NUMERIC"
          ? decimalToBigint(value.decimal, options.column)
          : doubleToBigint(value.value(), options.column);
      return leading instanceof ValueError ? leading : fromLeading(qualifier, leading);
    }
    case "VARCHAR":
    case "VARCHAR_IGNORECASE":
    case "CHAR":
      return parseIntervalText(value, target);
  }
  if (value instanceof IntervalValue) {
    return intervalToInterval(value, target);
  }
  return unsupported(value, target);
}

// ---------------------------------------------------------------------------
// Collections
// ---------------------------------------------------------------------------

function toArray(value: Value): Value {
  switch (value.kind) {
    case "ROW":
      return ArrayValue.of(value.elements);
    case "BLOB":
    case "CLOB":
    case "RESULT_SET":
      return ArrayValue.of([StringValue.of(value.getString())]);
    default:
      return ArrayValue.of([value]);
  }
}

/**
 * A result set collapses to its only row, or NULL when it has none.
 */
function toRow(value: Value): Value | ValueError {
  if (value.kind !== "RESULT_SET") {
    return RowValue.of([value]);
  }
  const rows = value.value();
  if (!rows.next()) {
    return NullValue.Instance;
  }
  const row = rows.currentRow();
  if (rows.hasNext()) {
    return new ScalarSubqueryCardinalityError();
  }
  return RowValue.of(row);
}

function toResultSet(value: Value): Value {
  const result = new SimpleResult();
  if (value.kind === "ROW") {
    value.elements.forEach((element, index) => result.addColumn(`C${index + 1}`, element.getType()));
    result.addRow(value.elements);
  } else {
    result.addColumn("X", value.getType());
    result.addRow([value]);
  }
  return ResultSetValue.of(result);
}
