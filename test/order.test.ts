import fc from "fast-check";
import { describe, expect, test } from "vitest";
import { UnknownTypeError } from "../src/common/errors";
import { VALUE_KINDS } from "../src/types/kinds";
import { getHigherOrder, getOrder, tryGetHigherOrder } from "../src/types/order";

describe("Type order", () => {
  test("numbers outrank strings", () => {
    expect(getHigherOrder("INTEGER", "VARCHAR")).toBe("INTEGER");
    expect(getHigherOrder("VARCHAR", "DOUBLE")).toBe("DOUBLE");
  });

  test("temporal kinds widen toward TIMESTAMP_TZ", () => {
    expect(getHigherOrder("DATE", "TIMESTAMP")).toBe("TIMESTAMP");
    expect(getHigherOrder("TIMESTAMP_TZ", "DATE")).toBe("TIMESTAMP_TZ");
    expect(getHigherOrder("TIME", "TIME_TZ")).toBe("TIME_TZ");
  });

  test("ENUM outranks character strings and integers", () => {
    expect(getHigherOrder("ENUM", "VARCHAR")).toBe("ENUM");
    expect(getHigherOrder("INTEGER", "ENUM")).toBe("ENUM");
  });

  test("NULL and UNKNOWN yield to a concrete kind", () => {
    expect(getHigherOrder("NULL", "BOOLEAN")).toBe("BOOLEAN");
    expect(getHigherOrder("UNKNOWN", "INTEGER")).toBe("INTEGER");
    expect(getHigherOrder("DATE", "UNKNOWN")).toBe("DATE");
  });

  test("two placeholders have no order", () => {
    const both = tryGetHigherOrder("UNKNOWN", "UNKNOWN");
    expect(both).toBeInstanceOf(UnknownTypeError);
    expect(both instanceof UnknownTypeError ? both.message : "").toBe('unknown data type: "?, ?"');

    const withNull = tryGetHigherOrder("NULL", "UNKNOWN");
    expect(withNull instanceof UnknownTypeError ? withNull.description : "").toBe("NULL, ?");

    expect(() => getHigherOrder("UNKNOWN", "NULL")).toThrow(UnknownTypeError);
  });

  test("interval kinds rank by granularity", () => {
    expect(getOrder("INTERVAL_YEAR")).toBeLessThan(getOrder("INTERVAL_MONTH"));
    expect(getOrder("INTERVAL_DAY")).toBeLessThan(getOrder("INTERVAL_HOUR"));
    expect(getHigherOrder("INTERVAL_DAY_TO_SECOND", "INTERVAL_SECOND")).toBe("INTERVAL_DAY_TO_SECOND");
  });

  test("promotion is symmetric and picks one of the operands", () => {
    const kind = fc.constantFrom(...VALUE_KINDS);
    fc.assert(
      fc.property(kind, kind, (a, b) => {
        const higher = getHigherOrder(a, b);
        return higher === getHigherOrder(b, a) && (higher === a || higher === b);
      })
    );
  });

  test("a kind promoted with itself is unchanged", () => {
    for (const kind of VALUE_KINDS) {
      expect(getHigherOrder(kind, kind)).toBe(kind);
    }
  });

  test("every kind has a distinct rank", () => {
    const ranks = new Set(VALUE_KINDS.map((kind) => getOrder(kind)));
    expect(ranks.size).toBe(VALUE_KINDS.length);
  });
});
