// Common
// Errors, configuration and logging

export {
  ConfigurationError,
  DataConversionError,
  InvalidIntervalLiteralError,
  InvalidValueError,
  MalformedLiteralError,
  NumericOverflowError,
  ScalarSubqueryCardinalityError,
  UnknownTypeError,
  UnsupportedOperationError,
  ValueError,
  isValueError,
} from "./errors";
export type { ColumnContext, ValueErrorCode } from "./errors";
export { ValueConfigSchema, createValueCache, loadValueConfig } from "./config";
export type { ValueConfig } from "./config";
export { logger } from "./logger";
