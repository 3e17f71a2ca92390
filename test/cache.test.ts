import fc from "fast-check";
import { describe, expect, test } from "vitest";
import { DEFAULT_CACHE_SIZE, ValueCache } from "../src/cache/value-cache";
import { InvalidValueError } from "../src/common/errors";
import { compareTo } from "../src/comparison/compare";
import { convert } from "../src/conversion/convert";
import { IntegerValue, StringValue, TinyintValue } from "../src/values/values";

describe("ValueCache", () => {
  test("defaults", () => {
    const cache = new ValueCache();
    expect(cache.size).toBe(DEFAULT_CACHE_SIZE);
    expect(cache.enabled).toBe(true);
    expect(cache.retention).toBe("weak");
  });

  test("size must be a power of two", () => {
    expect(() => new ValueCache({ size: 3 })).toThrow(InvalidValueError);
    expect(() => new ValueCache({ size: 0 })).toThrow(InvalidValueError);
  });

  test("equal values resolve to the first instance", () => {
    const cache = new ValueCache({ size: 16, retention: "strong" });
    const first = cache.intern(StringValue.of("k"));
    const second = cache.intern(StringValue.of("k"));
    expect(second).toBe(first);
    expect(cache.stats()).toEqual({ hits: 1, misses: 1, allocations: 1 });
  });

  test("a slot holds one value and a miss replaces it", () => {
    const cache = new ValueCache({ size: 16, retention: "strong" });
    const one = cache.intern(IntegerValue.of(1));
    const seventeen = cache.intern(IntegerValue.of(17));
    expect(seventeen.getString()).toBe("17");
    const again = cache.intern(IntegerValue.of(1));
    expect(again).not.toBe(one);
    expect(cache.stats().misses).toBe(3);
  });

  test("same slot, different kind is a miss", () => {
    const cache = new ValueCache({ size: 16, retention: "strong" });
    cache.intern(IntegerValue.of(5));
    const tiny = TinyintValue.of(5);
    expect(cache.intern(tiny)).toBe(tiny);
    expect(cache.stats()).toEqual({ hits: 0, misses: 2, allocations: 1 });
  });

  test("a disabled cache returns its argument", () => {
    const cache = new ValueCache({ enabled: false });
    const first = cache.intern(IntegerValue.of(1));
    const second = IntegerValue.of(1);
    expect(cache.intern(second)).toBe(second);
    expect(first).not.toBe(second);
    expect(cache.stats()).toEqual({ hits: 0, misses: 0, allocations: 0 });
  });

  test("clear drops the table", () => {
    const cache = new ValueCache({ size: 16, retention: "strong" });
    const first = cache.intern(IntegerValue.of(2));
    cache.clear();
    expect(cache.intern(IntegerValue.of(2))).not.toBe(first);
    expect(cache.stats().allocations).toBe(2);
  });

  test("weak retention still interns while the table is alive", () => {
    const cache = new ValueCache({ size: 16 });
    const first = cache.intern(IntegerValue.of(3));
    expect(cache.intern(IntegerValue.of(3))).toBe(first);
  });

  test("caching never changes equality or order", () => {
    const enabled = new ValueCache({ size: 16, retention: "strong" });
    const disabled = new ValueCache({ enabled: false });
    fc.assert(
      fc.property(fc.integer({ min: -1000, max: 1000 }), fc.integer({ min: -1000, max: 1000 }), (a, b) => {
        const cached = [a, b].map((n) => convert(StringValue.of(String(n)), "INTEGER", { cache: enabled }));
        const plain = [a, b].map((n) => convert(StringValue.of(String(n)), "INTEGER", { cache: disabled }));
        const [x, y] = cached;
        const [p, q] = plain;
        if (x === undefined || y === undefined || p === undefined || q === undefined) {
          return false;
        }
        return x.equals(p) && y.equals(q) && x.equals(y) === p.equals(q) && compareTo(x, y) === compareTo(p, q);
      })
    );
  });
});
