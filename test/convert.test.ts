import fc from "fast-check";
import { describe, expect, test } from "vitest";
import { ValueCache } from "../src/cache/value-cache";
import {
  DataConversionError,
  InvalidIntervalLiteralError,
  MalformedLiteralError,
  NumericOverflowError,
  ScalarSubqueryCardinalityError,
} from "../src/common/errors";
import { utf8Encode } from "../src/common/utils";
import { compareTypeSafe } from "../src/comparison/compare";
import { convert, tryConvert } from "../src/conversion/convert";
import { SimpleResult } from "../src/services/result";
import { EnumTypeInfo, GeometryTypeInfo } from "../src/types/ext-type-info";
import { TypeInfo } from "../src/types/type-info";
import { NANOS_PER_SECOND } from "../src/values/datetime";
import {
  type EnumValue,
  BigintValue,
  BooleanValue,
  BytesValue,
  DateValue,
  DecimalValue,
  DoubleValue,
  GeometryValue,
  IntegerValue,
  IntervalValue,
  JsonValue,
  NullValue,
  RealValue,
  ResultSetValue,
  RowValue,
  StringValue,
  TimestampTzValue,
  TimestampValue,
  TimeTzValue,
  TimeValue,
  UuidValue,
  type Value,
} from "../src/values/values";
import { bytes, fakeGeometryCodec, hours, ok, provider, SESSION_DAY } from "./utils";

function decimal(text: string): DecimalValue {
  const value = DecimalValue.parse(text);
  if (value === undefined) {
    throw new Error(`bad decimal ${text}`);
  }
  return value;
}

function text(value: string): StringValue {
  return StringValue.of(value);
}

function rows(...values: number[][]): ResultSetValue {
  const result = new SimpleResult().addColumn("A", TypeInfo.of("INTEGER")).addColumn("B", TypeInfo.of("INTEGER"));
  for (const row of values) {
    result.addRow(row.map((n) => IntegerValue.of(n)));
  }
  return ResultSetValue.of(result);
}

describe("Conversion", () => {
  describe("entry points", () => {
    test("NULL converts to NULL", () => {
      expect(convert(NullValue.Instance, "INTEGER")).toBe(NullValue.Instance);
    });

    test("a value of the target kind is returned as is", () => {
      const value = IntegerValue.of(5);
      expect(convert(value, "INTEGER")).toBe(value);
    });

    test("tryConvert returns errors, convert throws them", () => {
      expect(tryConvert(text("x"), "INTEGER")).toBeInstanceOf(MalformedLiteralError);
      expect(() => convert(text("x"), "INTEGER")).toThrow(MalformedLiteralError);
    });
  });

  describe("BOOLEAN", () => {
    test("words and numerals", () => {
      expect(convert(text(" yes "), "BOOLEAN")).toBe(BooleanValue.TRUE);
      expect(convert(text("f"), "BOOLEAN")).toBe(BooleanValue.FALSE);
      expect(convert(text(" 0.0 "), "BOOLEAN")).toBe(BooleanValue.FALSE);
      expect(convert(text("-3"), "BOOLEAN")).toBe(BooleanValue.TRUE);
      expect(tryConvert(text("maybe"), "BOOLEAN")).toBeInstanceOf(MalformedLiteralError);
    });

    test("numbers and intervals by sign", () => {
      expect(convert(decimal("0.00"), "BOOLEAN")).toBe(BooleanValue.FALSE);
      expect(convert(DoubleValue.of(-0.5), "BOOLEAN")).toBe(BooleanValue.TRUE);
      expect(convert(IntervalValue.of("DAY", false, 0n), "BOOLEAN")).toBe(BooleanValue.FALSE);
      expect(convert(IntervalValue.of("HOUR", true, 2n), "BOOLEAN")).toBe(BooleanValue.TRUE);
    });

    test("dates have no truth value", () => {
      expect(tryConvert(DateValue.of(0), "BOOLEAN")).toBeInstanceOf(DataConversionError);
    });
  });

  describe("Integers", () => {
    test("text is trimmed", () => {
      expect(convert(text(" 42 "), "INTEGER").getSQL()).toBe("42");
    });

    test("fractional text is malformed", () => {
      const error = tryConvert(text("4.2"), "INTEGER");
      expect(error).toBeInstanceOf(MalformedLiteralError);
      if (error instanceof MalformedLiteralError) {
        expect(error.message).toBe('data conversion error converting VARCHAR to INTEGER: malformed literal "4.2"');
        expect(error.code).toBe("MALFORMED_LITERAL");
      }
    });

    test("narrowing overflows with the column name", () => {
      const error = tryConvert(BigintValue.of(300), "TINYINT", { column: "T.X" });
      expect(error).toBeInstanceOf(NumericOverflowError);
      if (error instanceof NumericOverflowError) {
        expect(error.value).toBe("300");
        expect(error.column).toBe("T.X");
      }
    });

    test("TINYINT holds 127 but not 128", () => {
      expect(convert(IntegerValue.of(127), "TINYINT").getString()).toBe("127");
      expect(tryConvert(IntegerValue.of(128), "TINYINT")).toBeInstanceOf(NumericOverflowError);
    });

    test("approximate and exact numbers round half away from zero", () => {
      expect(convert(DoubleValue.of(2.5), "INTEGER").getString()).toBe("3");
      expect(convert(DoubleValue.of(-2.5), "INTEGER").getString()).toBe("-3");
      expect(convert(decimal("2.5"), "SMALLINT").getString()).toBe("3");
      expect(tryConvert(DoubleValue.of(Number.NaN), "BIGINT")).toBeInstanceOf(NumericOverflowError);
    });

    test("booleans and intervals", () => {
      expect(convert(BooleanValue.TRUE, "INTEGER").getString()).toBe("1");
      expect(convert(IntervalValue.of("DAY_TO_HOUR", false, 2n, 12n), "BIGINT").getString()).toBe("3");
    });

    test("binary of the exact width is two's complement", () => {
      expect(convert(BytesValue.of(bytes(0, 0, 1, 0)), "INTEGER").getString()).toBe("256");
      expect(convert(BytesValue.of(bytes(0xff, 0xfe)), "SMALLINT").getString()).toBe("-2");
    });

    test("binary of another width is read as its hex text", () => {
      expect(convert(BytesValue.of(bytes(1, 2)), "INTEGER").getString()).toBe("102");
    });

    test("zoned timestamps have no integer form", () => {
      expect(tryConvert(TimestampTzValue.of(0, 0n, 0), "BIGINT")).toBeInstanceOf(DataConversionError);
    });

    test("every INTEGER widens to an equal BIGINT", () => {
      fc.assert(
        fc.property(fc.integer(), (n) => {
          const widened = convert(IntegerValue.of(n), "BIGINT");
          return widened.kind === "BIGINT" && widened.value() === BigInt(n);
        })
      );
    });
  });

  describe("NUMERIC, REAL and DOUBLE", () => {
    test("doubles become their shortest decimal", () => {
      expect(convert(DoubleValue.of(1), "NUMERIC").getString()).toBe("1.0");
      expect(convert(DoubleValue.of(0.1), "NUMERIC").getString()).toBe("0.1");
      expect(tryConvert(DoubleValue.of(Number.NaN), "NUMERIC")).toBeInstanceOf(DataConversionError);
    });

    test("text, booleans and intervals", () => {
      expect(convert(text("1e2"), "NUMERIC").getString()).toBe("100");
      expect(convert(BooleanValue.TRUE, "NUMERIC")).toBe(DecimalValue.ONE);
      expect(convert(IntervalValue.of("YEAR_TO_MONTH", false, 1n, 6n), "NUMERIC").getString()).toBe("1.5");
      expect(tryConvert(text("ten"), "NUMERIC")).toBeInstanceOf(MalformedLiteralError);
    });

    test("special floating point names", () => {
      const nan = convert(text("NaN"), "DOUBLE");
      expect(nan.kind === "DOUBLE" && Number.isNaN(nan.value())).toBe(true);
      expect(convert(text("-Infinity"), "DOUBLE").getString()).toBe("-Infinity");
      expect(tryConvert(text("abc"), "DOUBLE")).toBeInstanceOf(MalformedLiteralError);
    });

    test("numbers", () => {
      expect(convert(IntegerValue.of(3), "REAL").getString()).toBe("3.0");
      expect(convert(decimal("0.1"), "DOUBLE").getString()).toBe("0.1");
      expect(convert(BooleanValue.FALSE, "DOUBLE")).toBe(DoubleValue.ZERO);
    });
  });

  describe("Date and time", () => {
    test("TIME WITH TIME ZONE shifts to the session offset", () => {
      expect(convert(TimeTzValue.of(hours(12), 0), "TIME", { provider }).getString()).toBe("14:00:00");
    });

    test("zoned timestamps take the session date", () => {
      const late = TimestampTzValue.of(SESSION_DAY, hours(23), -3600);
      expect(convert(late, "DATE", { provider }).getString()).toBe("2024-03-16");
    });

    test("zoned timestamps keep their fraction as local time", () => {
      const value = TimestampTzValue.of(SESSION_DAY, hours(12) + NANOS_PER_SECOND / 2n, 0);
      expect(convert(value, "TIME", { provider }).getString()).toBe("14:00:00.5");
    });

    test("timestamp text with an offset is moved to the session zone", () => {
      expect(convert(text("2024-03-15 08:00:00+00"), "TIMESTAMP", { provider }).getString()).toBe(
        "2024-03-15 10:00:00"
      );
      expect(convert(text("2024-03-15 08:00"), "TIMESTAMP", { provider }).getString()).toBe("2024-03-15 08:00:00");
    });

    test("a time gains the session date", () => {
      expect(convert(TimeValue.of(hours(9)), "TIMESTAMP", { provider }).getString()).toBe("2024-03-15 09:00:00");
    });

    test("local values gain the session offset", () => {
      expect(convert(DateValue.of(SESSION_DAY), "TIMESTAMP_TZ", { provider }).getString()).toBe(
        "2024-03-15 00:00:00+02"
      );
      expect(convert(text("10:15"), "TIME_TZ", { provider }).getString()).toBe("10:15:00+02");
      expect(convert(TimestampValue.of(SESSION_DAY, hours(8)), "TIME_TZ", { provider }).getString()).toBe(
        "08:00:00+02"
      );
    });

    test("timestamp text with an offset keeps it", () => {
      expect(convert(text("2024-03-15T08:00-05"), "TIMESTAMP_TZ", { provider }).getString()).toBe(
        "2024-03-15 08:00:00-05"
      );
    });

    test("impossible pairs and malformed text", () => {
      expect(tryConvert(DateValue.of(0), "TIME")).toBeInstanceOf(DataConversionError);
      expect(tryConvert(text("2024-02-30"), "DATE")).toBeInstanceOf(MalformedLiteralError);
      expect(tryConvert(text("10:15+02"), "TIME")).toBeInstanceOf(MalformedLiteralError);
    });
  });

  describe("Binary and character strings", () => {
    test("text and integers to VARBINARY", () => {
      expect(convert(text("hi"), "VARBINARY").getString()).toBe("6869");
      expect(convert(IntegerValue.of(-2), "VARBINARY").getString()).toBe("fffffffe");
      expect(convert(BigintValue.of(1), "VARBINARY").getString()).toBe("0000000000000001");
    });

    test("UUID bytes", () => {
      const uuid = ok(tryConvert(text("00112233-4455-6677-8899-aabbccddeeff"), "UUID"));
      expect(convert(uuid, "VARBINARY").getString()).toBe("00112233445566778899aabbccddeeff");
    });

    test("anything renders to text", () => {
      expect(convert(DoubleValue.of(1), "VARCHAR").getString()).toBe("1.0");
      expect(convert(DateValue.of(SESSION_DAY), "VARCHAR").getString()).toBe("2024-03-15");
      expect(convert(BytesValue.of(bytes(0xca, 0xfe)), "VARCHAR").getString()).toBe("cafe");
      expect(convert(text("ab  "), "CHAR").getSQL()).toBe("CAST('ab' AS CHAR(2))");
    });

    test("large objects", () => {
      const clob = convert(text("note"), "CLOB");
      expect(clob.getSQL()).toBe("CAST('note' AS CLOB)");
      expect(convert(BytesValue.of(bytes(0xca, 0xfe)), "BLOB").getSQL()).toBe("CAST(X'cafe' AS BLOB)");
      expect(convert(text("ab"), "BLOB").getString()).toBe("6162");
    });

    test("host objects from hex text", () => {
      expect(convert(text("CAFE"), "JAVA_OBJECT").getString()).toBe("cafe");
      expect(tryConvert(text("xyz"), "JAVA_OBJECT")).toBeInstanceOf(MalformedLiteralError);
    });
  });

  describe("ENUM", () => {
    const sizes = new EnumTypeInfo(["small", "medium", "large"]);

    test("labels and ordinals resolve in the target domain", () => {
      const large = convert(text("LARGE"), "ENUM", { extTypeInfo: sizes });
      expect(large.kind === "ENUM" && large.ordinal).toBe(2);
      expect(convert(IntegerValue.of(1), "ENUM", { extTypeInfo: sizes }).getString()).toBe("medium");
      expect(tryConvert(IntegerValue.of(5), "ENUM", { extTypeInfo: sizes })).toBeInstanceOf(DataConversionError);
    });

    test("requires a domain", () => {
      const error = tryConvert(text("small"), "ENUM");
      expect(error).toBeInstanceOf(DataConversionError);
      expect(error instanceof DataConversionError && error.message).toBe(
        "data conversion error converting VARCHAR to ENUM: no ENUM domain given"
      );
    });

    test("an enumerator is re-validated against another domain", () => {
      const small = ok<EnumValue>(sizes.getValue("small"));
      const other = new EnumTypeInfo(["tiny", "small"]);
      const moved = convert(small, "ENUM", { extTypeInfo: other });
      expect(moved.kind === "ENUM" && moved.ordinal).toBe(1);
    });

    test("enumerators count as their ordinal", () => {
      expect(convert(ok<EnumValue>(sizes.getValue("large")), "INTEGER").getString()).toBe("2");
    });
  });

  describe("UUID", () => {
    test("from text and binary", () => {
      expect(convert(text(" 00112233445566778899AABBCCDDEEFF "), "UUID").getString()).toBe(
        "00112233-4455-6677-8899-aabbccddeeff"
      );
      const error = tryConvert(BytesValue.of(bytes(1, 2)), "UUID");
      expect(error instanceof DataConversionError && error.message).toBe(
        "data conversion error converting VARBINARY to UUID: 2 bytes"
      );
    });
  });

  describe("GEOMETRY", () => {
    const services = { geometry: fakeGeometryCodec };

    test("text is parsed by the codec", () => {
      const point = convert(text("POINT (1 2)"), "GEOMETRY", { services });
      expect(point).toBeInstanceOf(GeometryValue);
      expect(point.kind === "GEOMETRY" && point.srid).toBe(0);
      expect(tryConvert(text("CIRCLE (0 0)"), "GEOMETRY", { services })).toBeInstanceOf(MalformedLiteralError);
    });

    test("needs a codec", () => {
      expect(tryConvert(text("POINT (1 2)"), "GEOMETRY")).toBeInstanceOf(DataConversionError);
    });

    test("the column constraint is enforced", () => {
      const error = tryConvert(text("POINT (1 2)"), "GEOMETRY", {
        services,
        extTypeInfo: new GeometryTypeInfo(2),
      });
      expect(error instanceof DataConversionError && error.message).toBe(
        "data conversion error converting GEOMETRY to GEOMETRY: geometry type POINT does not match GEOMETRY(LINESTRING)"
      );
    });

    test("GeoJSON takes the column SRID", () => {
      const json = JsonValue.fromText('{"type":"Point","coordinates":[1,2]}');
      const point = convert(json, "GEOMETRY", { services, extTypeInfo: new GeometryTypeInfo(undefined, 4326) });
      expect(point.getString()).toBe("SRID=4326;POINT EMPTY");
    });
  });

  describe("JSON", () => {
    test("scalars", () => {
      expect(convert(IntegerValue.of(5), "JSON").getString()).toBe("5");
      expect(convert(text("x"), "JSON").getString()).toBe('"x"');
      expect(convert(DoubleValue.of(1.5), "JSON").getString()).toBe("1.5");
      expect(convert(BooleanValue.TRUE, "JSON")).toBe(JsonValue.TRUE);
    });

    test("binary must hold JSON text", () => {
      expect(convert(BytesValue.of(utf8Encode("{}")), "JSON").getSQL()).toBe("JSON '{}'");
      expect(tryConvert(BytesValue.of(utf8Encode("{")), "JSON")).toBeInstanceOf(DataConversionError);
    });

    test("geometries become GeoJSON", () => {
      const point = GeometryValue.fromText("SRID=4326;POINT (1 2)", fakeGeometryCodec);
      expect(convert(point, "JSON").getString()).toBe('{"type":"Point","srid":4326}');
    });

    test("dates have no JSON form", () => {
      expect(tryConvert(DateValue.of(0), "JSON")).toBeInstanceOf(DataConversionError);
    });
  });

  describe("Intervals", () => {
    test("integers fill the leading field", () => {
      expect(convert(IntegerValue.of(5), "INTERVAL_DAY").getString()).toBe("INTERVAL '5' DAY");
      expect(convert(IntegerValue.of(-5), "INTERVAL_DAY").getString()).toBe("INTERVAL '-5' DAY");
      expect(convert(IntegerValue.of(25), "INTERVAL_MONTH").getString()).toBe("INTERVAL '25' MONTH");
      expect(convert(IntegerValue.of(-25), "INTERVAL_MONTH").getString()).toBe("INTERVAL '-25' MONTH");
    });

    test("fractions spill into the trailing fields", () => {
      expect(convert(decimal("1.5"), "INTERVAL_YEAR_TO_MONTH").getString()).toBe("INTERVAL '1-6' YEAR TO MONTH");
      expect(convert(DoubleValue.of(1.5), "INTERVAL_HOUR_TO_MINUTE").getString()).toBe(
        "INTERVAL '1:30' HOUR TO MINUTE"
      );
    });

    test("text bodies and full literals", () => {
      expect(convert(text("2 12"), "INTERVAL_DAY_TO_HOUR").getString()).toBe("INTERVAL '2 12' DAY TO HOUR");
      expect(convert(text("INTERVAL '36' HOUR"), "INTERVAL_DAY_TO_HOUR").getString()).toBe(
        "INTERVAL '1 12' DAY TO HOUR"
      );
    });

    test("unparsable text", () => {
      const error = tryConvert(text("abc"), "INTERVAL_DAY");
      expect(error).toBeInstanceOf(InvalidIntervalLiteralError);
      expect(error instanceof InvalidIntervalLiteralError && error.message).toBe(
        'cannot parse INTERVAL DAY constant "abc"'
      );
    });

    test("within a family only", () => {
      expect(convert(IntervalValue.of("YEAR", false, 1n), "INTERVAL_MONTH").getString()).toBe("INTERVAL '12' MONTH");
      expect(tryConvert(IntervalValue.of("YEAR", false, 1n), "INTERVAL_DAY")).toBeInstanceOf(DataConversionError);
    });
  });

  describe("Collections", () => {
    test("ARRAY wraps scalars and unpacks rows", () => {
      expect(convert(IntegerValue.of(1), "ARRAY").getString()).toBe("[1]");
      expect(convert(RowValue.of([IntegerValue.of(1), IntegerValue.of(2)]), "ARRAY").getString()).toBe("[1, 2]");
    });

    test("ROW collapses a single-row result", () => {
      expect(convert(rows([1, 2]), "ROW").getString()).toBe("ROW (1, 2)");
      expect(convert(rows(), "ROW")).toBe(NullValue.Instance);
      expect(tryConvert(rows([1, 2], [3, 4]), "ROW")).toBeInstanceOf(ScalarSubqueryCardinalityError);
    });

    test("RESULT_SET from a row names its columns", () => {
      const value = convert(RowValue.of([IntegerValue.of(1), text("x")]), "RESULT_SET");
      expect(value.getString()).toBe("((1, x))");
      expect(value.getResult().columnName(1)).toBe("C2");
      expect(convert(IntegerValue.of(5), "RESULT_SET").getString()).toBe("((5))");
    });
  });

  describe("interning", () => {
    test("equal results share one instance", () => {
      const cache = new ValueCache({ retention: "strong" });
      const first = convert(text("7"), "INTEGER", { cache });
      const second = convert(text(" 7"), "INTEGER", { cache });
      expect(second).toBe(first);
      expect(cache.stats()).toEqual({ hits: 1, misses: 1, allocations: 1 });
    });

    test("errors are not cached", () => {
      const cache = new ValueCache({ retention: "strong" });
      expect(tryConvert(text("x"), "INTEGER", { cache })).toBeInstanceOf(MalformedLiteralError);
      expect(cache.stats().misses).toBe(0);
    });
  });

  test("text round-trips to an equal value", () => {
    const values: Value[] = [
      BooleanValue.TRUE,
      BigintValue.of(-9007199254740993n),
      decimal("12.30"),
      RealValue.of(0.1),
      DoubleValue.of(1.5e-7),
      DateValue.of(SESSION_DAY),
      TimeValue.of(hours(13, 5) + 7n * NANOS_PER_SECOND + NANOS_PER_SECOND / 2n),
      TimeTzValue.of(hours(12), -3600),
      TimestampValue.of(SESSION_DAY, hours(10, 30)),
      TimestampTzValue.of(SESSION_DAY, hours(8), 7200),
      IntervalValue.of("YEAR_TO_MONTH", true, 1n, 6n),
      IntervalValue.of("DAY_TO_SECOND", false, 3n, hours(4, 5) + 6n * NANOS_PER_SECOND),
      UuidValue.of(0x0123456789abcdefn, 0xfedcba9876543210n),
    ];
    for (const value of values) {
      const back = convert(convert(value, "VARCHAR", { provider }), value.kind, { provider });
      expect(compareTypeSafe(back, value)).toBe(0);
    }
  });

  test("UUID values pass through unchanged", () => {
    const uuid = UuidValue.of(1n, 2n);
    expect(convert(uuid, "UUID")).toBe(uuid);
  });
});
