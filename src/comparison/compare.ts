// Comparison Engine
// Same-kind ordering, mixed-kind coercion and NULL-aware comparison

import { DataConversionError, ValueError } from "../common/errors";
import { compareBytes, compareDoubles, compareNumbers } from "../common/utils";
import { tryConvert } from "../conversion/convert";
import type { CastDataProvider } from "../services/environment";
import { EnumTypeInfo } from "../types/ext-type-info";
import { tryGetHigherOrder } from "../types/order";
import { NANOS_PER_DAY, NANOS_PER_SECOND } from "../values/datetime";
import { IntervalValue, type Value } from "../values/values";

/**
 * Result of {@link compareWithNull} when a NULL makes the order unknown.
 */
export const INCOMPARABLE: unique symbol = Symbol("INCOMPARABLE");
export type Incomparable = typeof INCOMPARABLE;

export function isIncomparable(result: unknown): result is Incomparable {
  return result === INCOMPARABLE;
}

function sign(n: number): number {
  return n < 0 ? -1 : n > 0 ? 1 : 0;
}

function compareText(left: string, right: string): number {
  if (left === right) return 0;
  return left < right ? -1 : 1;
}

function kindMismatch(left: Value, right: Value): DataConversionError {
  return new DataConversionError(right.kind, left.kind, "operands of compareTypeSafe must have the same kind");
}

function utcNanos(epochDay: number, timeNanos: bigint, offsetSeconds: number): bigint {
  return BigInt(epochDay) * NANOS_PER_DAY + timeNanos - BigInt(offsetSeconds) * NANOS_PER_SECOND;
}

// ---------------------------------------------------------------------------
// Same-kind comparison
// ---------------------------------------------------------------------------

/**
 * Compare two values of the same kind. Returns -1, 0 or 1.
 */
export function tryCompareTypeSafe(left: Value, right: Value, provider?: CastDataProvider): number | ValueError {
  if (left.kind !== right.kind) {
    return kindMismatch(left, right);
  }
  switch (left.kind) {
    case "NULL":
      return 0;
    case "BOOLEAN":
      return right.kind === "BOOLEAN" ? compareNumbers(Number(left.value()), Number(right.value())) : kindMismatch(left, right);
    case "TINYINT":
    case "SMALLINT":
    case "INTEGER":
    case "BIGINT":
    case "DATE":
    case "TIME":
      return compareNumbers(orderKey(left), orderKey(right));
    case "NUMERIC":
      return right.kind === "NUMERIC" ? left.decimal.compare(right.decimal) : kindMismatch(left, right);
    case "REAL":
    case "DOUBLE":
      return right.kind === "REAL" || right.kind === "DOUBLE"
        ? compareDoubles(left.value(), right.value())
        : kindMismatch(left, right);
    case "VARCHAR":
    case "CHAR":
    case "CLOB":
      return compareText(left.getString(), right.getString());
    case "VARCHAR_IGNORECASE":
      return compareIgnoreCase(left.getString(), right.getString());
    case "VARBINARY":
    case "BLOB":
    case "JAVA_OBJECT":
    case "JSON":
      return right.kind === "VARBINARY" || right.kind === "BLOB" || right.kind === "JAVA_OBJECT" || right.kind === "JSON"
        ? compareBytes(left.getBytesNoCopy(), right.getBytesNoCopy())
        : kindMismatch(left, right);
    case "GEOMETRY":
      return right.kind === "GEOMETRY"
        ? compareBytes(left.getBytesNoCopy(), right.getBytesNoCopy())
        : kindMismatch(left, right);
    case "TIMESTAMP":
      if (right.kind !== "TIMESTAMP") return kindMismatch(left, right);
      return compareNumbers(left.epochDay, right.epochDay) || compareNumbers(left.timeNanos, right.timeNanos);
    case "TIME_TZ": {
      if (right.kind !== "TIME_TZ") return kindMismatch(left, right);
      const l = left.nanos - BigInt(left.offsetSeconds) * NANOS_PER_SECOND;
      const r = right.nanos - BigInt(right.offsetSeconds) * NANOS_PER_SECOND;
      return compareNumbers(l, r) || compareNumbers(right.offsetSeconds, left.offsetSeconds);
    }
    case "TIMESTAMP_TZ": {
      if (right.kind !== "TIMESTAMP_TZ") return kindMismatch(left, right);
      const l = utcNanos(left.epochDay, left.timeNanos, left.offsetSeconds);
      const r = utcNanos(right.epochDay, right.timeNanos, right.offsetSeconds);
      return compareNumbers(l, r) || compareNumbers(right.offsetSeconds, left.offsetSeconds);
    }
    case "UUID":
      if (right.kind !== "UUID") return kindMismatch(left, right);
      return compareNumbers(left.high, right.high) || compareNumbers(left.low, right.low);
    case "ENUM":
      return right.kind === "ENUM" ? compareNumbers(left.ordinal, right.ordinal) : kindMismatch(left, right);
    case "ARRAY":
      return right.kind === "ARRAY" ? compareElements(left.elements, right.elements, provider) : kindMismatch(left, right);
    case "ROW":
      if (right.kind !== "ROW") return kindMismatch(left, right);
      if (left.elements.length !== right.elements.length) {
        return new DataConversionError("ROW", "ROW", "rows have different numbers of fields");
      }
      return compareElements(left.elements, right.elements, provider);
    case "RESULT_SET":
      return compareText(left.getString(), right.getString());
    default:
      if (left instanceof IntervalValue && right instanceof IntervalValue) {
        return compareNumbers(left.toAbsolute(), right.toAbsolute());
      }
      return kindMismatch(left, right);
  }
}

/**
 * Integral ordering key of the kinds whose payload is a single number.
 */
function orderKey(value: Value): number | bigint {
  switch (value.kind) {
    case "TINYINT":
    case "SMALLINT":
    case "INTEGER":
    case "BIGINT":
      return value.value();
    case "DATE":
      return value.epochDay;
    case "TIME":
      return value.nanos;
    default:
      return 0;
  }
}

/**
 * Case mapping of a single UTF-16 code unit; mappings that change the length
 * leave the unit as it is.
 */
function mapCodeUnit(code: number, map: (text: string) => string): number {
  const mapped = map(String.fromCharCode(code));
  return mapped.length === 1 ? mapped.charCodeAt(0) : code;
}

function upperUnit(code: number): number {
  return mapCodeUnit(code, (text) => text.toUpperCase());
}

function lowerUnit(code: number): number {
  return mapCodeUnit(code, (text) => text.toLowerCase());
}

/**
 * Code unit by code unit: units that still differ after upper-casing are
 * ordered by the lower case of their upper case. Then the shorter string
 * first.
 */
function compareIgnoreCase(left: string, right: string): number {
  const length = Math.min(left.length, right.length);
  for (let i = 0; i < length; i++) {
    const l = left.charCodeAt(i);
    const r = right.charCodeAt(i);
    if (l === r) continue;
    const lu = upperUnit(l);
    const ru = upperUnit(r);
    if (lu === ru) continue;
    const diff = lowerUnit(lu) - lowerUnit(ru);
    if (diff !== 0) return sign(diff);
  }
  return sign(left.length - right.length);
}

/**
 * Element-wise comparison with coercion, then by length.
 */
function compareElements(
  left: readonly Value[],
  right: readonly Value[],
  provider?: CastDataProvider
): number | ValueError {
  const length = Math.min(left.length, right.length);
  for (let i = 0; i < length; i++) {
    const l = left[i];
    const r = right[i];
    if (l === undefined || r === undefined) break;
    const result = tryCompareTo(l, r, provider);
    if (result !== 0) {
      return result;
    }
  }
  return compareNumbers(left.length, right.length);
}

// ---------------------------------------------------------------------------
// Mixed-kind comparison
// ---------------------------------------------------------------------------

/**
 * Compare two non-NULL values, converting both to their higher kind first.
 * ENUM operands are compared within their shared enumerator domain.
 */
export function tryCompareWithCoercion(left: Value, right: Value, provider?: CastDataProvider): number | ValueError {
  let l: Value | ValueError = left;
  let r: Value | ValueError = right;
  if (left.kind !== right.kind || left.kind === "ENUM") {
    const kind = tryGetHigherOrder(left.kind, right.kind);
    if (kind instanceof ValueError) {
      return kind;
    }
    if (kind === "ENUM") {
      const extTypeInfo = EnumTypeInfo.forBinaryOperation(left, right);
      l = tryConvert(left, "ENUM", { extTypeInfo });
      r = tryConvert(right, "ENUM", { extTypeInfo });
    } else {
      l = tryConvert(left, kind, { provider });
      r = tryConvert(right, kind, { provider });
    }
  }
  if (l instanceof ValueError) return l;
  if (r instanceof ValueError) return r;
  return tryCompareTypeSafe(l, r, provider);
}

/**
 * Total order: identical values are equal, NULL sorts first, everything
 * else is compared with coercion.
 */
export function tryCompareTo(left: Value, right: Value, provider?: CastDataProvider): number | ValueError {
  if (left === right) return 0;
  if (left.kind === "NULL") return right.kind === "NULL" ? 0 : -1;
  if (right.kind === "NULL") return 1;
  const result = tryCompareWithCoercion(left, right, provider);
  return result instanceof ValueError ? result : sign(result);
}

/**
 * SQL three-valued comparison. Returns {@link INCOMPARABLE} when a NULL
 * leaves the result unknown. For ARRAY and ROW pairs a NULL element makes an
 * ordering comparison unknown at once; an equality check keeps looking for a
 * definite difference.
 */
export function tryCompareWithNull(
  left: Value,
  right: Value,
  forEquality: boolean,
  provider?: CastDataProvider
): number | Incomparable | ValueError {
  if (left.kind === "NULL" || right.kind === "NULL") {
    return INCOMPARABLE;
  }
  if ((left.kind === "ARRAY" && right.kind === "ARRAY") || (left.kind === "ROW" && right.kind === "ROW")) {
    const l = left.elements;
    const r = right.elements;
    if (left.kind === "ROW" && l.length !== r.length) {
      return new DataConversionError("ROW", "ROW", "rows have different numbers of fields");
    }
    let unknown = false;
    const length = Math.min(l.length, r.length);
    for (let i = 0; i < length; i++) {
      const le = l[i];
      const re = r[i];
      if (le === undefined || re === undefined) break;
      const result = tryCompareWithNull(le, re, forEquality, provider);
      if (result === INCOMPARABLE) {
        if (!forEquality) return INCOMPARABLE;
        unknown = true;
      } else if (result !== 0) {
        return result;
      }
    }
    if (l.length !== r.length) {
      return compareNumbers(l.length, r.length);
    }
    return unknown ? INCOMPARABLE : 0;
  }
  const result = tryCompareWithCoercion(left, right, provider);
  return result instanceof ValueError ? result : sign(result);
}

// ---------------------------------------------------------------------------
// Throwing forms
// ---------------------------------------------------------------------------

function unwrap<T>(result: T | ValueError): T {
  if (result instanceof ValueError) {
    throw result;
  }
  return result;
}

export function compareTypeSafe(left: Value, right: Value, provider?: CastDataProvider): number {
  return unwrap(tryCompareTypeSafe(left, right, provider));
}

export function compareWithCoercion(left: Value, right: Value, provider?: CastDataProvider): number {
  return unwrap(tryCompareWithCoercion(left, right, provider));
}

export function compareTo(left: Value, right: Value, provider?: CastDataProvider): number {
  return unwrap(tryCompareTo(left, right, provider));
}

export function compareWithNull(
  left: Value,
  right: Value,
  forEquality: boolean,
  provider?: CastDataProvider
): number | Incomparable {
  return unwrap(tryCompareWithNull(left, right, forEquality, provider));
}

/**
 * Comparator for sorting, NULL first.
 */
export function valueComparator(provider?: CastDataProvider): (left: Value, right: Value) => number {
  return (left, right) => compareTo(left, right, provider);
}
