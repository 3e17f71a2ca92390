// Extended Type Information
// Kind-specific metadata attached to ENUM and GEOMETRY descriptors

import { DataConversionError, InvalidValueError, type ValueError } from "../common/errors";
import { quoteSQL } from "../common/utils";
import type { CastDataProvider } from "../services/environment";
import { EnumValue, type Value } from "../values/values";
import { isIntegerKind, isStringKind, type ValueKind } from "./kinds";

/**
 * Metadata shared by reference between a type descriptor and its values.
 * Implementations are frozen after construction.
 */
export interface ExtTypeInfo {
  /**
   * Re-validate a value of the described kind against this metadata.
   */
  cast(value: Value, provider?: CastDataProvider): Value | ValueError;
  getSQL(): string;
  equals(other: ExtTypeInfo): boolean;
}

// ---------------------------------------------------------------------------
// ENUM
// ---------------------------------------------------------------------------

function enumKey(label: string): string {
  return label.trim().toUpperCase();
}

/**
 * Ordered label set of an ENUM domain. Ordinals are 0-based; label lookup
 * ignores surrounding whitespace and case.
 */
export class EnumTypeInfo implements ExtTypeInfo {
  readonly labels: readonly string[];
  private readonly keys: ReadonlyMap<string, number>;
  private readonly values: EnumValue[] = [];

  constructor(labels: readonly string[]) {
    if (labels.length === 0) {
      throw new InvalidValueError("ENUM", "()");
    }
    const keys = new Map<string, number>();
    const cleaned: string[] = [];
    for (const raw of labels) {
      const label = raw.trim();
      const key = enumKey(label);
      if (label.length === 0 || keys.has(key)) {
        throw new InvalidValueError("ENUM", raw);
      }
      keys.set(key, cleaned.length);
      cleaned.push(label);
    }
    this.labels = Object.freeze(cleaned);
    this.keys = keys;
  }

  get size(): number {
    return this.labels.length;
  }

  /**
   * Look up an enumerator by ordinal or label.
   */
  getValue(key: number | string, fromKind?: ValueKind): EnumValue | DataConversionError {
    const ordinal = typeof key === "number" ? key : this.keys.get(enumKey(key));
    if (ordinal === undefined || !Number.isInteger(ordinal) || ordinal < 0 || ordinal >= this.labels.length) {
      const source = fromKind ?? (typeof key === "number" ? "INTEGER" : "VARCHAR");
      return new DataConversionError(source, "ENUM", `${JSON.stringify(key)} is not an enumerator of ${this.getSQL()}`);
    }
    return this.enumerator(ordinal);
  }

  cast(value: Value, _provider?: CastDataProvider): Value | ValueError {
    if (value.kind === "ENUM") {
      if (value.enumType === this) {
        return value;
      }
      return this.getValue(value.label, "ENUM");
    }
    if (isStringKind(value.kind)) {
      return this.getValue(value.getString(), value.kind);
    }
    if (value.kind === "NULL") {
      return value;
    }
    if (isIntegerKind(value.kind)) {
      return this.getValue(Number(value.getString()), value.kind);
    }
    return new DataConversionError(value.kind, "ENUM");
  }

  /**
   * Domain holding this domain's labels followed by the other's new ones.
   */
  union(other: EnumTypeInfo): EnumTypeInfo {
    if (other === this) {
      return this;
    }
    const added = other.labels.filter((label) => !this.keys.has(enumKey(label)));
    return added.length === 0 ? this : new EnumTypeInfo([...this.labels, ...added]);
  }

  /**
   * Shared domain for comparing two operands, at least one of them ENUM.
   * Two distinct domains are merged in the order of their SQL text, so the
   * result does not depend on which operand comes first.
   */
  static forBinaryOperation(left: Value, right: Value): EnumTypeInfo | undefined {
    const l = left.kind === "ENUM" ? left.enumType : undefined;
    const r = right.kind === "ENUM" ? right.enumType : undefined;
    if (l !== undefined && r !== undefined) {
      if (l.equals(r)) {
        return l;
      }
      return l.getSQL() < r.getSQL() ? l.union(r) : r.union(l);
    }
    return l ?? r;
  }

  getSQL(): string {
    return `ENUM(${this.labels.map(quoteSQL).join(", ")})`;
  }

  equals(other: ExtTypeInfo): boolean {
    if (other === this) return true;
    if (!(other instanceof EnumTypeInfo) || other.labels.length !== this.labels.length) {
      return false;
    }
    return this.labels.every((label, index) => label === other.labels[index]);
  }

  private enumerator(ordinal: number): EnumValue {
    let value = this.values[ordinal];
    if (value === undefined) {
      value = EnumValue.of(this.labels[ordinal] ?? "", ordinal, this);
      this.values[ordinal] = value;
    }
    return value;
  }
}

// ---------------------------------------------------------------------------
// GEOMETRY
// ---------------------------------------------------------------------------

const GEOMETRY_TYPE_NAMES: Readonly<Record<number, string>> = {
  1: "POINT",
  2: "LINESTRING",
  3: "POLYGON",
  4: "MULTIPOINT",
  5: "MULTILINESTRING",
  6: "MULTIPOLYGON",
  7: "GEOMETRYCOLLECTION",
};

/**
 * Required geometry type and SRID of a GEOMETRY column.
 */
export class GeometryTypeInfo implements ExtTypeInfo {
  constructor(
    readonly geometryType?: number,
    readonly srid?: number
  ) {
    Object.freeze(this);
  }

  cast(value: Value, _provider?: CastDataProvider): Value | ValueError {
    if (value.kind === "NULL") {
      return value;
    }
    if (value.kind !== "GEOMETRY") {
      return new DataConversionError(value.kind, "GEOMETRY");
    }
    if (this.geometryType !== undefined && value.geometryType !== this.geometryType) {
      return new DataConversionError(
        "GEOMETRY",
        "GEOMETRY",
        `geometry type ${GeometryTypeInfo.typeName(value.geometryType)} does not match ${this.getSQL()}`
      );
    }
    if (this.srid !== undefined && value.srid !== this.srid) {
      return new DataConversionError("GEOMETRY", "GEOMETRY", `SRID ${value.srid} does not match ${this.getSQL()}`);
    }
    return value;
  }

  static typeName(geometryType: number): string {
    return GEOMETRY_TYPE_NAMES[geometryType] ?? `GEOMETRY TYPE ${geometryType}`;
  }

  getSQL(): string {
    if (this.geometryType === undefined && this.srid === undefined) {
      return "GEOMETRY";
    }
    const type = this.geometryType === undefined ? "GEOMETRY" : GeometryTypeInfo.typeName(this.geometryType);
    return this.srid === undefined ? `GEOMETRY(${type})` : `GEOMETRY(${type}, ${this.srid})`;
  }

  equals(other: ExtTypeInfo): boolean {
    return other instanceof GeometryTypeInfo && other.geometryType === this.geometryType && other.srid === this.srid;
  }
}
