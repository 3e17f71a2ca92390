import fc from "fast-check";
import { describe, expect, test } from "vitest";
import { DataConversionError, MalformedLiteralError } from "../src/common/errors";
import {
  compareTo,
  compareTypeSafe,
  compareWithCoercion,
  compareWithNull,
  INCOMPARABLE,
  isIncomparable,
  tryCompareTypeSafe,
  valueComparator,
} from "../src/comparison/compare";
import { EnumTypeInfo } from "../src/types/ext-type-info";
import {
  type EnumValue,
  ArrayValue,
  BigintValue,
  BytesValue,
  DateValue,
  DecimalValue,
  DoubleValue,
  IntegerValue,
  IntervalValue,
  NullValue,
  RowValue,
  StringValue,
  TimestampTzValue,
  TimestampValue,
  TimeTzValue,
  UuidValue,
  type Value,
} from "../src/values/values";
import { bytes, hours, ok, provider, SESSION_DAY } from "./utils";

function decimal(text: string): DecimalValue {
  const value = DecimalValue.parse(text);
  if (value === undefined) {
    throw new Error(`bad decimal ${text}`);
  }
  return value;
}

function ints(...values: (number | null)[]): Value[] {
  return values.map((n) => (n === null ? NullValue.Instance : IntegerValue.of(n)));
}

describe("Comparison", () => {
  describe("compareTypeSafe", () => {
    test("numbers", () => {
      expect(compareTypeSafe(IntegerValue.of(1), IntegerValue.of(2))).toBe(-1);
      expect(compareTypeSafe(decimal("1.0"), decimal("1.00"))).toBe(0);
      expect(compareTypeSafe(DoubleValue.of(Number.NaN), DoubleValue.of(1))).toBe(1);
      expect(compareTypeSafe(DoubleValue.of(-0), DoubleValue.of(0))).toBe(-1);
    });

    test("strings", () => {
      expect(compareTypeSafe(StringValue.of("a"), StringValue.of("b"))).toBe(-1);
      expect(compareTypeSafe(StringValue.of("B"), StringValue.of("a"))).toBe(-1);
      expect(
        compareTypeSafe(StringValue.of("abc", "VARCHAR_IGNORECASE"), StringValue.of("ABC", "VARCHAR_IGNORECASE"))
      ).toBe(0);
    });

    test("VARCHAR_IGNORECASE folds one code unit at a time", () => {
      const ic = (text: string): StringValue => StringValue.of(text, "VARCHAR_IGNORECASE");
      expect(compareTypeSafe(ic("_"), ic("b"))).toBe(-1);
      expect(compareTypeSafe(ic("b"), ic("_"))).toBe(1);
      expect(compareTypeSafe(ic("_"), ic("B"))).toBe(-1);
      expect(compareTypeSafe(ic("abc"), ic("ABD"))).toBe(-1);
      expect(compareTypeSafe(ic("Ab"), ic("aBc"))).toBe(-1);
      expect(compareTypeSafe(ic("stra\u00dfe"), ic("STRA\u00dfE"))).toBe(0);
    });

    test("bytes compare unsigned, shorter prefix first", () => {
      expect(compareTypeSafe(BytesValue.of(bytes(1)), BytesValue.of(bytes(1, 0)))).toBe(-1);
      expect(compareTypeSafe(BytesValue.of(bytes(0xff)), BytesValue.of(bytes(0x01)))).toBe(1);
    });

    test("zoned values compare by instant, larger offset first on ties", () => {
      const plusTwo = TimestampTzValue.of(SESSION_DAY, hours(12), 7200);
      const utc = TimestampTzValue.of(SESSION_DAY, hours(10), 0);
      expect(compareTypeSafe(plusTwo, utc)).toBe(-1);
      expect(compareTypeSafe(utc, plusTwo)).toBe(1);
      expect(compareTypeSafe(TimeTzValue.of(hours(12), 7200), TimeTzValue.of(hours(11), 0))).toBe(-1);
    });

    test("UUID halves are unsigned", () => {
      expect(compareTypeSafe(UuidValue.of(-1n, 0n), UuidValue.of(1n, 0n))).toBe(1);
    });

    test("intervals by absolute length", () => {
      expect(compareTypeSafe(IntervalValue.of("HOUR", false, 1n), IntervalValue.of("HOUR", true, 2n))).toBe(1);
    });

    test("arrays element-wise with coercion, then by length", () => {
      expect(compareTypeSafe(ArrayValue.of(ints(1, 2)), ArrayValue.of(ints(1, 2, 3)))).toBe(-1);
      const mixed = ArrayValue.of([IntegerValue.of(1), StringValue.of("3")]);
      expect(compareTypeSafe(mixed, ArrayValue.of(ints(1, 2)))).toBe(1);
    });

    test("rows must have the same number of fields", () => {
      expect(() => compareTypeSafe(RowValue.of(ints(1)), RowValue.of(ints(1, 2)))).toThrow(DataConversionError);
    });

    test("kinds must match", () => {
      const error = tryCompareTypeSafe(IntegerValue.of(1), BigintValue.of(1));
      expect(error instanceof DataConversionError && error.message).toBe(
        "data conversion error converting BIGINT to INTEGER: operands of compareTypeSafe must have the same kind"
      );
    });
  });

  describe("compareWithCoercion", () => {
    test("converts to the higher kind", () => {
      expect(compareWithCoercion(IntegerValue.of(7), StringValue.of("10"))).toBe(-1);
      expect(compareWithCoercion(decimal("1.5"), DoubleValue.of(1.5))).toBe(0);
      expect(compareWithCoercion(DateValue.of(SESSION_DAY), TimestampValue.of(SESSION_DAY, hours(1)))).toBe(-1);
      expect(
        compareWithCoercion(StringValue.of("abc"), StringValue.of("ABC", "VARCHAR_IGNORECASE"))
      ).toBe(0);
    });

    test("local timestamps take the session offset", () => {
      const local = TimestampValue.of(SESSION_DAY, hours(10));
      const utc = TimestampTzValue.of(SESSION_DAY, hours(8), 0);
      expect(compareWithCoercion(local, utc, provider)).toBe(-1);
    });

    test("conversion failures propagate", () => {
      expect(() => compareWithCoercion(DateValue.of(0), IntegerValue.of(1))).toThrow(MalformedLiteralError);
    });

    describe("ENUM", () => {
      const sizes = new EnumTypeInfo(["small", "medium", "large"]);
      const medium = ok<EnumValue>(sizes.getValue("medium"));

      test("strings resolve in the enumerator's domain", () => {
        expect(compareWithCoercion(medium, StringValue.of("LARGE"))).toBe(-1);
        expect(compareWithCoercion(StringValue.of("small"), medium)).toBe(-1);
      });

      test("different domains compare within their union", () => {
        const other = new EnumTypeInfo(["tiny", "medium"]);
        const tiny = ok<EnumValue>(other.getValue("tiny"));
        expect(compareWithCoercion(medium, tiny)).toBe(-1);
        expect(compareWithCoercion(medium, ok<EnumValue>(other.getValue("medium")))).toBe(0);
      });

      test("two domains merge the same way in either operand order", () => {
        const warm = new EnumTypeInfo(["RED", "GREEN"]);
        const cool = new EnumTypeInfo(["BLUE", "RED"]);
        const red = ok<EnumValue>(warm.getValue("RED"));
        const blue = ok<EnumValue>(cool.getValue("BLUE"));
        expect(compareTo(red, blue)).toBe(1);
        expect(compareTo(blue, red)).toBe(-1);

        const enumerators = [warm, cool].flatMap((domain) => domain.labels.map((label) => ok<EnumValue>(domain.getValue(label))));
        const any = fc.constantFrom(...enumerators);
        fc.assert(
          fc.property(any, any, (a, b) => Math.sign(compareTo(a, b)) === -Math.sign(compareTo(b, a)))
        );
      });

      test("labels outside the domain fail", () => {
        expect(() => compareWithCoercion(medium, StringValue.of("huge"))).toThrow(DataConversionError);
      });
    });
  });

  describe("compareTo", () => {
    test("NULL sorts first", () => {
      expect(compareTo(NullValue.Instance, IntegerValue.of(1))).toBe(-1);
      expect(compareTo(IntegerValue.of(1), NullValue.Instance)).toBe(1);
      expect(compareTo(NullValue.Instance, NullValue.Instance)).toBe(0);
    });

    test("results are -1, 0 or 1", () => {
      expect(compareTo(StringValue.of("b"), StringValue.of("a"))).toBe(1);
      expect(compareTo(IntegerValue.of(100), IntegerValue.of(-100))).toBe(1);
    });

    test("is antisymmetric across integer kinds", () => {
      fc.assert(
        fc.property(
          fc.integer(),
          fc.bigInt({ min: -(2n ** 63n), max: 2n ** 63n - 1n }),
          (a, b) => compareTo(IntegerValue.of(a), BigintValue.of(b)) === -compareTo(BigintValue.of(b), IntegerValue.of(a))
        )
      );
    });

    test("sorts with valueComparator", () => {
      const values: Value[] = [IntegerValue.of(3), NullValue.Instance, IntegerValue.of(1), StringValue.of("2")];
      expect(values.sort(valueComparator()).map((value) => value.getString())).toEqual(["NULL", "1", "2", "3"]);
    });
  });

  describe("compareWithNull", () => {
    test("a NULL operand is incomparable", () => {
      expect(compareWithNull(NullValue.Instance, IntegerValue.of(1), true)).toBe(INCOMPARABLE);
      expect(isIncomparable(compareWithNull(IntegerValue.of(1), NullValue.Instance, false))).toBe(true);
      expect(compareWithNull(IntegerValue.of(1), IntegerValue.of(2), false)).toBe(-1);
    });

    test("a NULL element makes ordering unknown at once", () => {
      const left = ArrayValue.of(ints(null, 1));
      const right = ArrayValue.of(ints(null, 2));
      expect(compareWithNull(left, right, false)).toBe(INCOMPARABLE);
    });

    test("equality keeps looking for a definite difference", () => {
      expect(compareWithNull(ArrayValue.of(ints(null, 1)), ArrayValue.of(ints(null, 2)), true)).toBe(-1);
      expect(compareWithNull(ArrayValue.of(ints(1, null)), ArrayValue.of(ints(1, 2)), true)).toBe(INCOMPARABLE);
    });

    test("a definite difference before the NULL decides", () => {
      expect(compareWithNull(ArrayValue.of(ints(1, null)), ArrayValue.of(ints(2, 2)), false)).toBe(-1);
    });

    test("arrays of different lengths", () => {
      expect(compareWithNull(ArrayValue.of(ints(1)), ArrayValue.of(ints(1, 2)), false)).toBe(-1);
    });

    test("rows of different lengths are an error", () => {
      expect(() => compareWithNull(RowValue.of(ints(1)), RowValue.of(ints(1, 2)), true)).toThrow(DataConversionError);
    });
  });
});
