/**
 * sql-values: typed SQL values with conversion and comparison rules
 *
 * Every SQL datum is a {@link Value}, a tagged union keyed by `kind`.
 * Values convert between kinds with {@link convert}, compare with
 * {@link compareTo} or {@link compareWithNull}, and can be interned through
 * a {@link ValueCache}.
 *
 * @packageDocumentation
 * @module sql-values
 *
 * @example
 * ```typescript
 * import { StringValue, IntegerValue, convert, compareWithCoercion } from "sql-values";
 *
 * const n = convert(StringValue.of(" 42 "), "INTEGER");
 * console.log(n.getSQL()); // 42
 *
 * compareWithCoercion(IntegerValue.of(7), StringValue.of("10")); // -1
 * ```
 */

export * from "./types";
export * from "./values";
export * from "./conversion";
export * from "./comparison";
export * from "./cache";
export * from "./services";
export * from "./common";
