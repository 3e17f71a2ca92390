// SQL Type Order
// Promotion ranks used to pick the common kind of two operands

import { UnknownTypeError } from "../common/errors";
import type { OrderKind, ValueKind } from "./kinds";

/**
 * Promotion rank per kind. Families occupy separate thousand-bands so new
 * kinds can be slotted in without renumbering neighbours.
 */
const ORDER: Readonly<Record<OrderKind, number>> = {
  UNKNOWN: 1_000,
  NULL: 2_000,
  VARCHAR: 10_000,
  CLOB: 11_000,
  CHAR: 12_000,
  VARCHAR_IGNORECASE: 13_000,
  BOOLEAN: 20_000,
  TINYINT: 21_000,
  SMALLINT: 22_000,
  INTEGER: 23_000,
  BIGINT: 24_000,
  NUMERIC: 25_000,
  REAL: 26_000,
  DOUBLE: 27_000,
  INTERVAL_YEAR: 28_000,
  INTERVAL_MONTH: 28_100,
  INTERVAL_YEAR_TO_MONTH: 28_200,
  INTERVAL_DAY: 29_000,
  INTERVAL_HOUR: 29_100,
  INTERVAL_DAY_TO_HOUR: 29_200,
  INTERVAL_MINUTE: 29_300,
  INTERVAL_HOUR_TO_MINUTE: 29_400,
  INTERVAL_DAY_TO_MINUTE: 29_500,
  INTERVAL_SECOND: 29_600,
  INTERVAL_MINUTE_TO_SECOND: 29_700,
  INTERVAL_HOUR_TO_SECOND: 29_800,
  INTERVAL_DAY_TO_SECOND: 29_900,
  TIME: 30_000,
  TIME_TZ: 30_500,
  DATE: 31_000,
  TIMESTAMP: 32_000,
  TIMESTAMP_TZ: 34_000,
  VARBINARY: 40_000,
  BLOB: 41_000,
  JAVA_OBJECT: 42_000,
  UUID: 43_000,
  GEOMETRY: 44_000,
  ENUM: 45_000,
  JSON: 46_000,
  ARRAY: 50_000,
  ROW: 51_000,
  RESULT_SET: 52_000,
};

/**
 * Get the promotion rank of a kind.
 */
export function getOrder(kind: OrderKind): number {
  return ORDER[kind];
}

/**
 * Get the higher of two kinds; the operand of the lower kind is converted to
 * it. A concrete kind paired with NULL or UNKNOWN wins; two placeholders have
 * no defined order.
 */
export function tryGetHigherOrder(t1: OrderKind, t2: OrderKind): ValueKind | UnknownTypeError {
  if (t1 === "UNKNOWN" || t2 === "UNKNOWN") {
    if (t1 === t2 || t1 === "NULL" || t2 === "NULL") {
      return UnknownTypeError.forPair(t1, t2);
    }
  }
  const higher = getOrder(t1) >= getOrder(t2) ? t1 : t2;
  if (higher === "UNKNOWN") {
    return UnknownTypeError.forPair(t1, t2);
  }
  return higher;
}

/**
 * Throwing form of {@link tryGetHigherOrder}.
 */
export function getHigherOrder(t1: OrderKind, t2: OrderKind): ValueKind {
  const result = tryGetHigherOrder(t1, t2);
  if (result instanceof UnknownTypeError) {
    throw result;
  }
  return result;
}
