// SQL Value Errors
// Error taxonomy shared by the conversion and comparison engines

import type { IntervalQualifier } from "../values/interval";
import type { OrderKind, ValueKind } from "../types/kinds";

/**
 * Stable machine-readable error codes.
 */
export type ValueErrorCode =
  | "DATA_CONVERSION"
  | "MALFORMED_LITERAL"
  | "NUMERIC_OVERFLOW"
  | "INVALID_INTERVAL"
  | "SCALAR_SUBQUERY_CARDINALITY"
  | "UNKNOWN_TYPE"
  | "INVALID_VALUE"
  | "UNSUPPORTED_OPERATION"
  | "INVALID_CONFIGURATION";

/**
 * Column naming context, used only to enrich error messages.
 */
export type ColumnContext = string | { readonly name: string };

/**
 * Render a column context for messages ("" when absent).
 */
export function columnName(column?: ColumnContext): string {
  if (column === undefined) return "";
  return typeof column === "string" ? column : column.name;
}

/**
 * Base class for every error raised by the value core.
 */
export class ValueError extends Error {
  readonly code: ValueErrorCode;

  constructor(code: ValueErrorCode, message: string) {
    super(message);
    this.name = "ValueError";
    this.code = code;
  }
}

/**
 * No conversion rule connects the two kinds.
 */
export class DataConversionError extends ValueError {
  readonly fromKind: ValueKind;
  readonly toKind: ValueKind;

  constructor(fromKind: ValueKind, toKind: ValueKind, detail?: string, code: ValueErrorCode = "DATA_CONVERSION") {
    super(code, `data conversion error converting ${fromKind} to ${toKind}${detail ? `: ${detail}` : ""}`);
    this.name = "DataConversionError";
    this.fromKind = fromKind;
    this.toKind = toKind;
  }
}

/**
 * A textual numeral, boolean or temporal literal could not be parsed.
 */
export class MalformedLiteralError extends DataConversionError {
  readonly text: string;

  constructor(fromKind: ValueKind, toKind: ValueKind, text: string) {
    super(fromKind, toKind, `malformed literal "${text}"`, "MALFORMED_LITERAL");
    this.name = "MalformedLiteralError";
    this.text = text;
  }
}

/**
 * Value outside the representable range of the target kind.
 */
export class NumericOverflowError extends ValueError {
  readonly value: string;
  readonly column: string;

  constructor(value: string, column?: ColumnContext) {
    const name = columnName(column);
    super("NUMERIC_OVERFLOW", `numeric value out of range: "${value}"${name ? ` (column ${name})` : ""}`);
    this.name = "NumericOverflowError";
    this.value = value;
    this.column = name;
  }
}

/**
 * Interval text that does not match the qualifier grammar.
 */
export class InvalidIntervalLiteralError extends ValueError {
  readonly qualifier: IntervalQualifier;
  readonly text: string;

  constructor(qualifier: IntervalQualifier, text: string) {
    super("INVALID_INTERVAL", `cannot parse INTERVAL ${qualifier.replaceAll("_", " ")} constant "${text}"`);
    this.name = "InvalidIntervalLiteralError";
    this.qualifier = qualifier;
    this.text = text;
  }
}

/**
 * A result set collapsed to a row produced more than one row.
 */
export class ScalarSubqueryCardinalityError extends ValueError {
  constructor() {
    super("SCALAR_SUBQUERY_CARDINALITY", "scalar subquery contains more than one row");
    this.name = "ScalarSubqueryCardinalityError";
  }
}

/**
 * Promotion was requested without a concrete type on either side.
 */
export class UnknownTypeError extends ValueError {
  readonly description: string;

  constructor(description: string) {
    super("UNKNOWN_TYPE", `unknown data type: "${description}"`);
    this.name = "UnknownTypeError";
    this.description = description;
  }

  static forPair(left: OrderKind, right: OrderKind): UnknownTypeError {
    return new UnknownTypeError(`${placeholder(left)}, ${placeholder(right)}`);
  }
}

function placeholder(kind: OrderKind): string {
  return kind === "UNKNOWN" ? "?" : kind;
}

/**
 * Parameter outside its permitted range.
 */
export class InvalidValueError extends ValueError {
  readonly parameter: string;
  readonly value: string;

  constructor(parameter: string, value: string | number | bigint) {
    super("INVALID_VALUE", `invalid value "${String(value)}" for parameter "${parameter}"`);
    this.name = "InvalidValueError";
    this.parameter = parameter;
    this.value = String(value);
  }
}

/**
 * Operation not defined for a kind, such as SIGNUM of a string.
 */
export class UnsupportedOperationError extends ValueError {
  readonly kind: ValueKind;
  readonly operation: string;

  constructor(kind: ValueKind, operation: string) {
    super("UNSUPPORTED_OPERATION", `feature not supported: "${kind} ${operation}"`);
    this.name = "UnsupportedOperationError";
    this.kind = kind;
    this.operation = operation;
  }
}

/**
 * Configuration rejected by the schema.
 */
export class ConfigurationError extends ValueError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super("INVALID_CONFIGURATION", `invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

/**
 * Check if a result is an error rather than a value.
 */
export function isValueError(value: unknown): value is ValueError {
  return value instanceof ValueError;
}
