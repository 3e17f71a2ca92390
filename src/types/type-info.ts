// SQL Type Descriptors
// Kind, precision, scale and extended metadata of a value or column

import { UnknownTypeError } from "../common/errors";
import type { ExtTypeInfo } from "./ext-type-info";
import { isIntervalKind, type OrderKind, type ValueKind } from "./kinds";
import { getHigherOrder, tryGetHigherOrder } from "./order";

// ---------------------------------------------------------------------------
// Limits
// ---------------------------------------------------------------------------

export const MAX_NUMERIC_PRECISION = 100_000;
export const MAX_STRING_LENGTH = 1_000_000_000;
export const MAX_ARRAY_CARDINALITY = 65_536;
export const MAX_COLUMNS = 16_384;
export const MAX_LOB_LENGTH = Number.MAX_SAFE_INTEGER;

/**
 * Bounds of the integer kinds.
 */
export const IntLimits = {
  TinyintMin: -128,
  TinyintMax: 127,
  SmallintMin: -32_768,
  SmallintMax: 32_767,
  IntegerMin: -2_147_483_648,
  IntegerMax: 2_147_483_647,
  BigintMin: -(1n << 63n),
  BigintMax: (1n << 63n) - 1n,
} as const;

/**
 * Default precision and scale of a kind when nothing narrower is declared.
 */
function defaults(kind: OrderKind): [precision: number, scale: number] {
  switch (kind) {
    case "UNKNOWN":
      return [-1, -1];
    case "NULL":
    case "BOOLEAN":
      return [1, 0];
    case "TINYINT":
      return [3, 0];
    case "SMALLINT":
      return [5, 0];
    case "INTEGER":
      return [10, 0];
    case "BIGINT":
      return [19, 0];
    case "NUMERIC":
      return [MAX_NUMERIC_PRECISION, 0];
    case "REAL":
      return [7, 0];
    case "DOUBLE":
      return [17, 0];
    case "TIME":
      return [18, 9];
    case "TIME_TZ":
      return [24, 9];
    case "DATE":
      return [10, 0];
    case "TIMESTAMP":
      return [29, 9];
    case "TIMESTAMP_TZ":
      return [35, 9];
    case "VARBINARY":
    case "VARCHAR":
    case "VARCHAR_IGNORECASE":
    case "CHAR":
    case "JAVA_OBJECT":
    case "ENUM":
    case "JSON":
      return [MAX_STRING_LENGTH, 0];
    case "BLOB":
    case "CLOB":
    case "GEOMETRY":
    case "RESULT_SET":
      return [MAX_LOB_LENGTH, 0];
    case "UUID":
      return [16, 0];
    case "ARRAY":
      return [MAX_ARRAY_CARDINALITY, 0];
    case "ROW":
      return [MAX_COLUMNS, 0];
    default:
      if (isIntervalKind(kind)) {
        return [18, kind.endsWith("SECOND") ? 9 : 0];
      }
      return [0, 0];
  }
}

// ---------------------------------------------------------------------------
// TypeInfo
// ---------------------------------------------------------------------------

/**
 * Immutable type descriptor.
 */
export class TypeInfo {
  private static readonly byKind = new Map<OrderKind, TypeInfo>();

  readonly kind: OrderKind;
  readonly precision: number;
  readonly scale: number;
  readonly extTypeInfo: ExtTypeInfo | undefined;

  constructor(kind: OrderKind, precision: number, scale: number, extTypeInfo?: ExtTypeInfo) {
    this.kind = kind;
    this.precision = precision;
    this.scale = scale;
    this.extTypeInfo = extTypeInfo;
    Object.freeze(this);
  }

  /**
   * Shared descriptor of a kind with its default precision and scale.
   */
  static of(kind: OrderKind): TypeInfo {
    let info = TypeInfo.byKind.get(kind);
    if (info === undefined) {
      const [precision, scale] = defaults(kind);
      info = new TypeInfo(kind, precision, scale);
      TypeInfo.byKind.set(kind, info);
    }
    return info;
  }

  /**
   * Merge two descriptors for a binary operation: the higher kind, the larger
   * precision and scale, and the extended info of the operand whose kind won
   * (the first operand when both did).
   */
  static tryGetHigherType(t1: TypeInfo, t2: TypeInfo): TypeInfo | UnknownTypeError {
    const kind = tryGetHigherOrder(t1.kind, t2.kind);
    if (kind instanceof UnknownTypeError) {
      return kind;
    }
    return TypeInfo.merge(kind, t1, t2);
  }

  static getHigherType(t1: TypeInfo, t2: TypeInfo): TypeInfo {
    return TypeInfo.merge(getHigherOrder(t1.kind, t2.kind), t1, t2);
  }

  private static merge(kind: ValueKind, t1: TypeInfo, t2: TypeInfo): TypeInfo {
    const precision = Math.max(t1.precision, t2.precision);
    const scale = Math.max(t1.scale, t2.scale);
    let ext: ExtTypeInfo | undefined;
    if (kind === t1.kind && t1.extTypeInfo !== undefined) {
      ext = t1.extTypeInfo;
    } else if (kind === t2.kind) {
      ext = t2.extTypeInfo;
    }
    return new TypeInfo(kind, precision, scale, ext);
  }

  getValueType(): OrderKind {
    return this.kind;
  }

  /**
   * SQL rendering such as `NUMERIC(10, 2)` or `CHAR(3)`.
   */
  getSQL(): string {
    if (this.extTypeInfo !== undefined) {
      return this.extTypeInfo.getSQL();
    }
    switch (this.kind) {
      case "NUMERIC":
        return `NUMERIC(${this.precision}, ${this.scale})`;
      case "VARCHAR":
      case "VARCHAR_IGNORECASE":
      case "CHAR":
      case "VARBINARY":
        return `${this.kind}(${this.precision})`;
      case "TIME":
      case "TIMESTAMP":
        return `${this.kind}(${this.scale})`;
      case "TIME_TZ":
        return `TIME(${this.scale}) WITH TIME ZONE`;
      case "TIMESTAMP_TZ":
        return `TIMESTAMP(${this.scale}) WITH TIME ZONE`;
      case "DOUBLE":
        return "DOUBLE PRECISION";
      default:
        return isIntervalKind(this.kind) ? this.kind.replaceAll("_", " ") : this.kind;
    }
  }

  equals(other: TypeInfo): boolean {
    if (this === other) return true;
    if (this.kind !== other.kind || this.precision !== other.precision || this.scale !== other.scale) {
      return false;
    }
    if (this.extTypeInfo === undefined || other.extTypeInfo === undefined) {
      return this.extTypeInfo === other.extTypeInfo;
    }
    return this.extTypeInfo.equals(other.extTypeInfo);
  }

  toString(): string {
    return this.getSQL();
  }
}
