// Numeric Guard
// Range checks applied whenever a conversion narrows a number

import { NumericOverflowError, type ColumnContext } from "../common/errors";
import type { IntegerKind } from "../types/kinds";
import { IntLimits } from "../types/type-info";
import { Decimal } from "../values/decimal";

const RANGES: Readonly<Record<IntegerKind, readonly [bigint, bigint]>> = {
  TINYINT: [BigInt(IntLimits.TinyintMin), BigInt(IntLimits.TinyintMax)],
  SMALLINT: [BigInt(IntLimits.SmallintMin), BigInt(IntLimits.SmallintMax)],
  INTEGER: [BigInt(IntLimits.IntegerMin), BigInt(IntLimits.IntegerMax)],
  BIGINT: [IntLimits.BigintMin, IntLimits.BigintMax],
};

const MIN_LONG_DECIMAL = Decimal.fromBigInt(IntLimits.BigintMin);
const MAX_LONG_DECIMAL = Decimal.fromBigInt(IntLimits.BigintMax);

// 2^63 as a double; every double at or above it is out of range.
const TWO_POW_63 = 9_223_372_036_854_775_808;

/**
 * Check that an integer fits the target kind.
 */
export function narrowInteger(value: bigint, kind: IntegerKind, column?: ColumnContext): bigint | NumericOverflowError {
  const [min, max] = RANGES[kind];
  if (value < min || value > max) {
    return new NumericOverflowError(value.toString(), column);
  }
  return value;
}

/**
 * Round a double to the nearest 64-bit integer, ties away from zero.
 * NaN and the infinities overflow.
 */
export function doubleToBigint(value: number, column?: ColumnContext): bigint | NumericOverflowError {
  if (value >= TWO_POW_63 || value < -TWO_POW_63 || Number.isNaN(value)) {
    return new NumericOverflowError(formatGuardDouble(value), column);
  }
  const rounded = Math.sign(value) * Math.round(Math.abs(value));
  return BigInt(rounded);
}

/**
 * Round a decimal half-up to a 64-bit integer after an exact range check.
 */
export function decimalToBigint(value: Decimal, column?: ColumnContext): bigint | NumericOverflowError {
  if (value.compare(MAX_LONG_DECIMAL) > 0 || value.compare(MIN_LONG_DECIMAL) < 0) {
    return new NumericOverflowError(value.toString(), column);
  }
  return value.setScale(0, "HALF_UP").unscaled;
}

function formatGuardDouble(value: number): string {
  if (Number.isNaN(value)) return "NaN";
  if (!Number.isFinite(value)) return value > 0 ? "Infinity" : "-Infinity";
  return String(value);
}
