// Type System
// Kinds, ordering and column type descriptors

export {
  DAY_TIME_INTERVAL_KINDS,
  INTEGER_KINDS,
  INTERVAL_KINDS,
  STRING_KINDS,
  VALUE_KINDS,
  YEAR_MONTH_INTERVAL_KINDS,
  assertNever,
  isDayTimeIntervalKind,
  isFloatKind,
  isIntegerKind,
  isIntervalKind,
  isNumericKind,
  isStringKind,
  isYearMonthIntervalKind,
} from "./kinds";
export type {
  CompositeKind,
  DayTimeIntervalKind,
  FloatKind,
  IntegerKind,
  IntervalKind,
  LobKind,
  NumericKind,
  OrderKind,
  StringKind,
  TemporalKind,
  ValueKind,
  YearMonthIntervalKind,
} from "./kinds";

export { getHigherOrder, getOrder, tryGetHigherOrder } from "./order";

export {
  IntLimits,
  MAX_ARRAY_CARDINALITY,
  MAX_COLUMNS,
  MAX_LOB_LENGTH,
  MAX_NUMERIC_PRECISION,
  MAX_STRING_LENGTH,
  TypeInfo,
} from "./type-info";

export { EnumTypeInfo, GeometryTypeInfo } from "./ext-type-info";
/** Extension of a column type (enumerators, geometry constraints). */
export type { ExtTypeInfo } from "./ext-type-info";
