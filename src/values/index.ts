// Values
// The value union and its payload helpers

export {
  ArrayValue,
  BaseValue,
  BigintValue,
  BooleanValue,
  BytesValue,
  DateValue,
  DecimalValue,
  DoubleValue,
  EnumValue,
  GeometryValue,
  IntegerValue,
  IntervalValue,
  JsonValue,
  LobValue,
  NullValue,
  ObjectValue,
  RealValue,
  ResultSetValue,
  RowValue,
  SmallintValue,
  StringValue,
  TimeTzValue,
  TimeValue,
  TimestampTzValue,
  TimestampValue,
  TinyintValue,
  UuidValue,
  formatDouble,
  formatReal,
  isCollectionValue,
  isIntervalValue,
  isNullValue,
  isStringValue,
  isValidJson,
  isValue,
} from "./values";
/** Any SQL value. */
export type { Value } from "./values";

export { Decimal } from "./decimal";
export type { RoundingMode } from "./decimal";

export {
  MAX_INTERVAL_LEADING,
  formatInterval,
  kindQualifier,
  parseInterval,
  qualifierKind,
} from "./interval";
export type { IntervalFields, IntervalQualifier, ParsedInterval } from "./interval";

export {
  NANOS_PER_DAY,
  NANOS_PER_HOUR,
  NANOS_PER_MINUTE,
  NANOS_PER_SECOND,
  civilFromEpochDay,
  epochDayFromCivil,
  formatDate,
  formatOffset,
  formatTime,
} from "./datetime";
export type { CivilDate } from "./datetime";
