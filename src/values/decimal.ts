// Exact decimal arithmetic
// Arbitrary-precision decimal as a bigint unscaled value and a scale

import { absBigInt, hashString, pow10 } from "../common/utils";

export type RoundingMode = "HALF_UP" | "HALF_DOWN" | "DOWN";

const DECIMAL_PATTERN = /^([+-]?)(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/;

/**
 * Immutable decimal number `unscaled * 10^-scale` with `scale >= 0`.
 */
export class Decimal {
  static readonly ZERO = new Decimal(0n, 0);
  static readonly ONE = new Decimal(1n, 0);

  private constructor(
    readonly unscaled: bigint,
    readonly scale: number
  ) { }

  static of(unscaled: bigint, scale = 0): Decimal {
    if (scale < 0) {
      return new Decimal(unscaled * pow10(-scale), 0);
    }
    if (scale === 0) {
      if (unscaled === 0n) return Decimal.ZERO;
      if (unscaled === 1n) return Decimal.ONE;
    }
    return new Decimal(unscaled, scale);
  }

  static fromBigInt(value: bigint | number): Decimal {
    return Decimal.of(typeof value === "number" ? BigInt(Math.trunc(value)) : value, 0);
  }

  /**
   * Exact decimal of the shortest round-trip rendering of a double.
   * Returns undefined for NaN and infinities.
   */
  static fromNumber(value: number): Decimal | undefined {
    if (!Number.isFinite(value)) {
      return undefined;
    }
    return Decimal.parse(String(value));
  }

  /**
   * Parse a decimal literal such as `12`, `-0.50`, `.5` or `1.5e-3`.
   */
  static parse(text: string): Decimal | undefined {
    const match = DECIMAL_PATTERN.exec(text);
    if (match === null) {
      return undefined;
    }
    const [, sign = "", intPart = "", fracPart = "", exponent] = match;
    if (intPart.length === 0 && fracPart.length === 0) {
      return undefined;
    }
    let unscaled = BigInt(`${intPart}${fracPart}` || "0");
    if (sign === "-") {
      unscaled = -unscaled;
    }
    let scale = fracPart.length;
    if (exponent !== undefined) {
      const exp = Number(exponent);
      if (!Number.isSafeInteger(exp) || Math.abs(exp) > 100_000) {
        return undefined;
      }
      scale -= exp;
    }
    return Decimal.of(unscaled, scale);
  }

  signum(): -1 | 0 | 1 {
    if (this.unscaled === 0n) return 0;
    return this.unscaled < 0n ? -1 : 1;
  }

  negate(): Decimal {
    return Decimal.of(-this.unscaled, this.scale);
  }

  abs(): Decimal {
    return this.unscaled < 0n ? this.negate() : this;
  }

  add(other: Decimal): Decimal {
    const scale = Math.max(this.scale, other.scale);
    return Decimal.of(this.rescaled(scale) + other.rescaled(scale), scale);
  }

  multiply(other: Decimal): Decimal {
    return Decimal.of(this.unscaled * other.unscaled, this.scale + other.scale);
  }

  /**
   * Divide, producing exactly `scale` fractional digits.
   */
  divide(other: Decimal, scale: number, rounding: RoundingMode): Decimal {
    if (other.unscaled === 0n) {
      throw new RangeError("division by zero");
    }
    // this / other = (u1 / 10^s1) / (u2 / 10^s2); scaled by 10^scale
    let numerator = this.unscaled * pow10(other.scale + scale);
    let denominator = other.unscaled * pow10(this.scale);
    if (denominator < 0n) {
      numerator = -numerator;
      denominator = -denominator;
    }
    return Decimal.of(roundQuotient(numerator, denominator, rounding), scale);
  }

  /**
   * Change the scale, rounding when digits are dropped.
   */
  setScale(scale: number, rounding: RoundingMode): Decimal {
    if (scale === this.scale) return this;
    if (scale > this.scale) {
      return Decimal.of(this.unscaled * pow10(scale - this.scale), scale);
    }
    return Decimal.of(roundQuotient(this.unscaled, pow10(this.scale - scale), rounding), scale);
  }

  stripTrailingZeros(): Decimal {
    let unscaled = this.unscaled;
    let scale = this.scale;
    while (scale > 0 && unscaled % 10n === 0n) {
      unscaled /= 10n;
      scale--;
    }
    return Decimal.of(unscaled, scale);
  }

  /**
   * Number of significant digits in the unscaled value.
   */
  precision(): number {
    return this.unscaled === 0n ? 1 : absBigInt(this.unscaled).toString().length;
  }

  compare(other: Decimal): number {
    const scale = Math.max(this.scale, other.scale);
    const left = this.rescaled(scale);
    const right = other.rescaled(scale);
    if (left < right) return -1;
    if (left > right) return 1;
    return 0;
  }

  /**
   * Structural equality: `1.0` and `1.00` are different decimals.
   */
  equals(other: Decimal): boolean {
    return this.unscaled === other.unscaled && this.scale === other.scale;
  }

  /**
   * Integral part, truncating toward zero.
   */
  toBigInt(): bigint {
    return this.unscaled / pow10(this.scale);
  }

  toNumber(): number {
    return Number(this.toString());
  }

  toString(): string {
    const digits = absBigInt(this.unscaled).toString();
    const sign = this.unscaled < 0n ? "-" : "";
    if (this.scale === 0) {
      return `${sign}${digits}`;
    }
    const padded = digits.padStart(this.scale + 1, "0");
    const cut = padded.length - this.scale;
    return `${sign}${padded.slice(0, cut)}.${padded.slice(cut)}`;
  }

  hashCode(): number {
    return (Math.imul(31, hashString(this.unscaled.toString())) + this.scale) | 0;
  }

  private rescaled(scale: number): bigint {
    return this.unscaled * pow10(scale - this.scale);
  }
}

/**
 * Integer quotient of `numerator / denominator` (denominator > 0) rounded per
 * the mode.
 */
function roundQuotient(numerator: bigint, denominator: bigint, rounding: RoundingMode): bigint {
  const quotient = numerator / denominator;
  const remainder = absBigInt(numerator % denominator);
  if (remainder === 0n || rounding === "DOWN") {
    return quotient;
  }
  const twice = remainder * 2n;
  const roundAway = rounding === "HALF_UP" ? twice >= denominator : twice > denominator;
  if (!roundAway) {
    return quotient;
  }
  return numerator < 0n ? quotient - 1n : quotient + 1n;
}
