// SQL Value Kinds
// The closed set of kinds a runtime value can carry

// ---------------------------------------------------------------------------
// Kind Unions
// ---------------------------------------------------------------------------

/**
 * Exact integral kinds, narrowest first.
 */
export type IntegerKind = "TINYINT" | "SMALLINT" | "INTEGER" | "BIGINT";

/**
 * Approximate numeric kinds.
 */
export type FloatKind = "REAL" | "DOUBLE";

/**
 * All numeric kinds.
 */
export type NumericKind = IntegerKind | "NUMERIC" | FloatKind;

/**
 * Character string kinds sharing one payload shape.
 */
export type StringKind = "VARCHAR" | "VARCHAR_IGNORECASE" | "CHAR";

/**
 * Large object kinds.
 */
export type LobKind = "BLOB" | "CLOB";

/**
 * Date and time kinds.
 */
export type TemporalKind = "TIME" | "TIME_TZ" | "DATE" | "TIMESTAMP" | "TIMESTAMP_TZ";

/**
 * Year-month interval family.
 */
export type YearMonthIntervalKind = "INTERVAL_YEAR" | "INTERVAL_MONTH" | "INTERVAL_YEAR_TO_MONTH";

/**
 * Day-time interval family.
 */
export type DayTimeIntervalKind =
  | "INTERVAL_DAY"
  | "INTERVAL_HOUR"
  | "INTERVAL_MINUTE"
  | "INTERVAL_SECOND"
  | "INTERVAL_DAY_TO_HOUR"
  | "INTERVAL_DAY_TO_MINUTE"
  | "INTERVAL_DAY_TO_SECOND"
  | "INTERVAL_HOUR_TO_MINUTE"
  | "INTERVAL_HOUR_TO_SECOND"
  | "INTERVAL_MINUTE_TO_SECOND";

/**
 * All interval kinds.
 */
export type IntervalKind = YearMonthIntervalKind | DayTimeIntervalKind;

/**
 * Container kinds whose payload is a sequence of values.
 */
export type CompositeKind = "ARRAY" | "ROW" | "RESULT_SET";

/**
 * Every kind a value can have.
 */
export type ValueKind =
  | "NULL"
  | "BOOLEAN"
  | NumericKind
  | TemporalKind
  | "VARBINARY"
  | StringKind
  | LobKind
  | CompositeKind
  | "JAVA_OBJECT"
  | "UUID"
  | "GEOMETRY"
  | "ENUM"
  | "JSON"
  | IntervalKind;

/**
 * Kinds accepted by type promotion, including the untyped placeholder.
 */
export type OrderKind = ValueKind | "UNKNOWN";

// ---------------------------------------------------------------------------
// Kind Lists
// ---------------------------------------------------------------------------

export const INTEGER_KINDS: readonly IntegerKind[] = ["TINYINT", "SMALLINT", "INTEGER", "BIGINT"];

export const STRING_KINDS: readonly StringKind[] = ["VARCHAR", "VARCHAR_IGNORECASE", "CHAR"];

export const YEAR_MONTH_INTERVAL_KINDS: readonly YearMonthIntervalKind[] = [
  "INTERVAL_YEAR",
  "INTERVAL_MONTH",
  "INTERVAL_YEAR_TO_MONTH",
];

export const DAY_TIME_INTERVAL_KINDS: readonly DayTimeIntervalKind[] = [
  "INTERVAL_DAY",
  "INTERVAL_HOUR",
  "INTERVAL_MINUTE",
  "INTERVAL_SECOND",
  "INTERVAL_DAY_TO_HOUR",
  "INTERVAL_DAY_TO_MINUTE",
  "INTERVAL_DAY_TO_SECOND",
  "INTERVAL_HOUR_TO_MINUTE",
  "INTERVAL_HOUR_TO_SECOND",
  "INTERVAL_MINUTE_TO_SECOND",
];

export const INTERVAL_KINDS: readonly IntervalKind[] = [...YEAR_MONTH_INTERVAL_KINDS, ...DAY_TIME_INTERVAL_KINDS];

/**
 * All value kinds, in declaration order.
 */
export const VALUE_KINDS: readonly ValueKind[] = [
  "NULL",
  "BOOLEAN",
  ...INTEGER_KINDS,
  "NUMERIC",
  "REAL",
  "DOUBLE",
  "TIME",
  "TIME_TZ",
  "DATE",
  "TIMESTAMP",
  "TIMESTAMP_TZ",
  "VARBINARY",
  ...STRING_KINDS,
  "BLOB",
  "CLOB",
  "ARRAY",
  "ROW",
  "RESULT_SET",
  "JAVA_OBJECT",
  "UUID",
  "GEOMETRY",
  "ENUM",
  "JSON",
  ...INTERVAL_KINDS,
];

// ---------------------------------------------------------------------------
// Kind Guards
// ---------------------------------------------------------------------------

export function isIntegerKind(kind: OrderKind): kind is IntegerKind {
  return kind === "TINYINT" || kind === "SMALLINT" || kind === "INTEGER" || kind === "BIGINT";
}

export function isFloatKind(kind: OrderKind): kind is FloatKind {
  return kind === "REAL" || kind === "DOUBLE";
}

export function isNumericKind(kind: OrderKind): kind is NumericKind {
  return isIntegerKind(kind) || isFloatKind(kind) || kind === "NUMERIC";
}

export function isStringKind(kind: OrderKind): kind is StringKind {
  return kind === "VARCHAR" || kind === "VARCHAR_IGNORECASE" || kind === "CHAR";
}

export function isYearMonthIntervalKind(kind: OrderKind): kind is YearMonthIntervalKind {
  return kind === "INTERVAL_YEAR" || kind === "INTERVAL_MONTH" || kind === "INTERVAL_YEAR_TO_MONTH";
}

export function isDayTimeIntervalKind(kind: OrderKind): kind is DayTimeIntervalKind {
  return kind.startsWith("INTERVAL_") && !isYearMonthIntervalKind(kind);
}

export function isIntervalKind(kind: OrderKind): kind is IntervalKind {
  return kind.startsWith("INTERVAL_");
}

/**
 * Fail compilation when a switch over kinds misses a case.
 */
export function assertNever(value: never): never {
  throw new Error(`unexpected kind: ${String(value)}`);
}
