// Interval qualifiers
// Field layout, absolute conversion, literal parsing and formatting

import type { IntervalKind } from "../types/kinds";
import { absBigInt } from "../common/utils";
import { NANOS_PER_DAY, NANOS_PER_HOUR, NANOS_PER_MINUTE, NANOS_PER_SECOND } from "./datetime";

export type IntervalQualifier =
  | "YEAR"
  | "MONTH"
  | "DAY"
  | "HOUR"
  | "MINUTE"
  | "SECOND"
  | "YEAR_TO_MONTH"
  | "DAY_TO_HOUR"
  | "DAY_TO_MINUTE"
  | "DAY_TO_SECOND"
  | "HOUR_TO_MINUTE"
  | "HOUR_TO_SECOND"
  | "MINUTE_TO_SECOND";

/**
 * Sign and magnitudes of an interval: the leading field and the combined
 * remainder of the trailing fields (months, hours, minutes or nanoseconds).
 */
export interface IntervalFields {
  negative: boolean;
  leading: bigint;
  remaining: bigint;
}

/**
 * Largest leading field magnitude (18 digits).
 */
export const MAX_INTERVAL_LEADING = 999_999_999_999_999_999n;

const QUALIFIER_KINDS: Readonly<Record<IntervalQualifier, IntervalKind>> = {
  YEAR: "INTERVAL_YEAR",
  MONTH: "INTERVAL_MONTH",
  DAY: "INTERVAL_DAY",
  HOUR: "INTERVAL_HOUR",
  MINUTE: "INTERVAL_MINUTE",
  SECOND: "INTERVAL_SECOND",
  YEAR_TO_MONTH: "INTERVAL_YEAR_TO_MONTH",
  DAY_TO_HOUR: "INTERVAL_DAY_TO_HOUR",
  DAY_TO_MINUTE: "INTERVAL_DAY_TO_MINUTE",
  DAY_TO_SECOND: "INTERVAL_DAY_TO_SECOND",
  HOUR_TO_MINUTE: "INTERVAL_HOUR_TO_MINUTE",
  HOUR_TO_SECOND: "INTERVAL_HOUR_TO_SECOND",
  MINUTE_TO_SECOND: "INTERVAL_MINUTE_TO_SECOND",
};

export function qualifierKind(qualifier: IntervalQualifier): IntervalKind {
  return QUALIFIER_KINDS[qualifier];
}

export function kindQualifier(kind: IntervalKind): IntervalQualifier {
  switch (kind) {
    case "INTERVAL_YEAR":
      return "YEAR";
    case "INTERVAL_MONTH":
      return "MONTH";
    case "INTERVAL_DAY":
      return "DAY";
    case "INTERVAL_HOUR":
      return "HOUR";
    case "INTERVAL_MINUTE":
      return "MINUTE";
    case "INTERVAL_SECOND":
      return "SECOND";
    case "INTERVAL_YEAR_TO_MONTH":
      return "YEAR_TO_MONTH";
    case "INTERVAL_DAY_TO_HOUR":
      return "DAY_TO_HOUR";
    case "INTERVAL_DAY_TO_MINUTE":
      return "DAY_TO_MINUTE";
    case "INTERVAL_DAY_TO_SECOND":
      return "DAY_TO_SECOND";
    case "INTERVAL_HOUR_TO_MINUTE":
      return "HOUR_TO_MINUTE";
    case "INTERVAL_HOUR_TO_SECOND":
      return "HOUR_TO_SECOND";
    case "INTERVAL_MINUTE_TO_SECOND":
      return "MINUTE_TO_SECOND";
  }
}

/**
 * True when the qualifier carries trailing fields.
 */
export function hasRemaining(qualifier: IntervalQualifier): boolean {
  return qualifier.includes("_TO_") || qualifier === "SECOND";
}

/**
 * Units of `remaining` per unit of the leading field.
 */
export function remainingMultiplier(qualifier: IntervalQualifier): bigint {
  switch (qualifier) {
    case "YEAR":
    case "MONTH":
    case "DAY":
    case "HOUR":
    case "MINUTE":
      return 1n;
    case "SECOND":
      return NANOS_PER_SECOND;
    case "YEAR_TO_MONTH":
      return 12n;
    case "DAY_TO_HOUR":
      return 24n;
    case "DAY_TO_MINUTE":
      return 24n * 60n;
    case "DAY_TO_SECOND":
      return NANOS_PER_DAY;
    case "HOUR_TO_MINUTE":
      return 60n;
    case "HOUR_TO_SECOND":
      return NANOS_PER_HOUR;
    case "MINUTE_TO_SECOND":
      return NANOS_PER_MINUTE;
  }
}

/**
 * Months (year-month family) or nanoseconds (day-time family) in one unit of
 * the leading field and in one unit of the remainder.
 */
function units(qualifier: IntervalQualifier): { leading: bigint; remaining: bigint } {
  switch (qualifier) {
    case "YEAR":
      return { leading: 12n, remaining: 0n };
    case "MONTH":
      return { leading: 1n, remaining: 0n };
    case "YEAR_TO_MONTH":
      return { leading: 12n, remaining: 1n };
    case "DAY":
      return { leading: NANOS_PER_DAY, remaining: 0n };
    case "HOUR":
      return { leading: NANOS_PER_HOUR, remaining: 0n };
    case "MINUTE":
      return { leading: NANOS_PER_MINUTE, remaining: 0n };
    case "SECOND":
      return { leading: NANOS_PER_SECOND, remaining: 1n };
    case "DAY_TO_HOUR":
      return { leading: NANOS_PER_DAY, remaining: NANOS_PER_HOUR };
    case "DAY_TO_MINUTE":
      return { leading: NANOS_PER_DAY, remaining: NANOS_PER_MINUTE };
    case "DAY_TO_SECOND":
      return { leading: NANOS_PER_DAY, remaining: 1n };
    case "HOUR_TO_MINUTE":
      return { leading: NANOS_PER_HOUR, remaining: NANOS_PER_MINUTE };
    case "HOUR_TO_SECOND":
      return { leading: NANOS_PER_HOUR, remaining: 1n };
    case "MINUTE_TO_SECOND":
      return { leading: NANOS_PER_MINUTE, remaining: 1n };
  }
}

/**
 * Signed months or nanoseconds represented by the fields.
 */
export function intervalToAbsolute(qualifier: IntervalQualifier, fields: IntervalFields): bigint {
  const { leading, remaining } = units(qualifier);
  const magnitude = fields.leading * leading + fields.remaining * remaining;
  return fields.negative ? -magnitude : magnitude;
}

/**
 * Split signed months or nanoseconds into the qualifier's fields. Units finer
 * than the qualifier's last field are truncated.
 */
export function intervalFromAbsolute(qualifier: IntervalQualifier, absolute: bigint): IntervalFields {
  const { leading, remaining } = units(qualifier);
  const magnitude = absBigInt(absolute);
  return {
    negative: absolute < 0n,
    leading: magnitude / leading,
    remaining: remaining === 0n ? 0n : (magnitude % leading) / remaining,
  };
}

/**
 * Check the field ranges. Returns a description of the first violation.
 */
export function checkIntervalFields(qualifier: IntervalQualifier, fields: IntervalFields): string | undefined {
  if (fields.leading < 0n || fields.remaining < 0n) {
    return "interval fields must be non-negative";
  }
  if (fields.leading > MAX_INTERVAL_LEADING) {
    return `leading field ${fields.leading} exceeds 18 digits`;
  }
  const limit = hasRemaining(qualifier) ? remainingMultiplier(qualifier) : 1n;
  if (fields.remaining >= limit) {
    return `remaining field ${fields.remaining} out of range for ${qualifier}`;
  }
  return undefined;
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

function pad2(value: bigint): string {
  return value.toString().padStart(2, "0");
}

function formatSeconds(nanos: bigint): string {
  const seconds = nanos / NANOS_PER_SECOND;
  const fraction = nanos % NANOS_PER_SECOND;
  if (fraction === 0n) return pad2(seconds);
  return `${pad2(seconds)}.${fraction.toString().padStart(9, "0").replace(/0+$/, "")}`;
}

/**
 * Render the quoted body of an interval literal, e.g. `-1-6` for
 * `INTERVAL '-1-6' YEAR TO MONTH`.
 */
export function formatIntervalBody(qualifier: IntervalQualifier, fields: IntervalFields): string {
  const { leading, remaining } = fields;
  const sign = fields.negative ? "-" : "";
  switch (qualifier) {
    case "YEAR":
    case "MONTH":
    case "DAY":
    case "HOUR":
    case "MINUTE":
      return `${sign}${leading}`;
    case "SECOND": {
      const text = formatSeconds(remaining);
      return `${sign}${leading}${text === "00" ? "" : text.slice(2)}`;
    }
    case "YEAR_TO_MONTH":
      return `${sign}${leading}-${remaining}`;
    case "DAY_TO_HOUR":
      return `${sign}${leading} ${pad2(remaining)}`;
    case "DAY_TO_MINUTE":
      return `${sign}${leading} ${pad2(remaining / 60n)}:${pad2(remaining % 60n)}`;
    case "DAY_TO_SECOND":
      return `${sign}${leading} ${pad2(remaining / NANOS_PER_HOUR)}:${pad2((remaining / NANOS_PER_MINUTE) % 60n)}:${formatSeconds(remaining % NANOS_PER_MINUTE)}`;
    case "HOUR_TO_MINUTE":
      return `${sign}${leading}:${pad2(remaining)}`;
    case "HOUR_TO_SECOND":
      return `${sign}${leading}:${pad2(remaining / NANOS_PER_MINUTE)}:${formatSeconds(remaining % NANOS_PER_MINUTE)}`;
    case "MINUTE_TO_SECOND":
      return `${sign}${leading}:${formatSeconds(remaining)}`;
  }
}

export function qualifierSQL(qualifier: IntervalQualifier): string {
  return qualifier.replaceAll("_", " ");
}

export function formatInterval(qualifier: IntervalQualifier, fields: IntervalFields): string {
  return `INTERVAL '${formatIntervalBody(qualifier, fields)}' ${qualifierSQL(qualifier)}`;
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

const FULL_LITERAL = /^INTERVAL\s+([+-]?)\s*'([^']*)'\s+([A-Z]+(?:\s+TO\s+[A-Z]+)?)$/i;
const SECONDS = String.raw`(\d+)(?:\.(\d{1,9}))?`;

const BODY_PATTERNS: Readonly<Record<IntervalQualifier, RegExp>> = {
  YEAR: /^(\d+)$/,
  MONTH: /^(\d+)$/,
  DAY: /^(\d+)$/,
  HOUR: /^(\d+)$/,
  MINUTE: /^(\d+)$/,
  SECOND: new RegExp(`^${SECONDS}$`),
  YEAR_TO_MONTH: /^(\d+)-(\d+)$/,
  DAY_TO_HOUR: /^(\d+) +(\d+)$/,
  DAY_TO_MINUTE: /^(\d+) +(\d+):(\d+)$/,
  DAY_TO_SECOND: new RegExp(String.raw`^(\d+) +(\d+):(\d+):${SECONDS}$`),
  HOUR_TO_MINUTE: /^(\d+):(\d+)$/,
  HOUR_TO_SECOND: new RegExp(String.raw`^(\d+):(\d+):${SECONDS}$`),
  MINUTE_TO_SECOND: new RegExp(String.raw`^(\d+):${SECONDS}$`),
};

function isQualifier(name: string): name is IntervalQualifier {
  return Object.hasOwn(QUALIFIER_KINDS, name);
}

function parseQualifier(words: string): IntervalQualifier | undefined {
  const name = words.trim().toUpperCase().split(/\s+/).join("_");
  return isQualifier(name) ? name : undefined;
}

function fraction(text: string | undefined): bigint {
  return text === undefined ? 0n : BigInt(text.padEnd(9, "0"));
}

function parseBody(qualifier: IntervalQualifier, body: string): IntervalFields | undefined {
  let text = body.trim();
  let negative = false;
  if (text.startsWith("-") || text.startsWith("+")) {
    negative = text.startsWith("-");
    text = text.slice(1).trim();
  }
  const match = BODY_PATTERNS[qualifier].exec(text);
  if (match === null) return undefined;
  const parts = match.slice(1);
  const num = (index: number): bigint => BigInt(parts[index] ?? "0");
  let fields: IntervalFields;
  switch (qualifier) {
    case "YEAR":
    case "MONTH":
    case "DAY":
    case "HOUR":
    case "MINUTE":
      fields = { negative, leading: num(0), remaining: 0n };
      break;
    case "SECOND":
      fields = { negative, leading: num(0), remaining: fraction(parts[1]) };
      break;
    case "YEAR_TO_MONTH":
    case "DAY_TO_HOUR":
    case "HOUR_TO_MINUTE":
      fields = { negative, leading: num(0), remaining: num(1) };
      break;
    case "DAY_TO_MINUTE":
      if (num(2) >= 60n) return undefined;
      fields = { negative, leading: num(0), remaining: num(1) * 60n + num(2) };
      break;
    case "DAY_TO_SECOND":
      if (num(1) >= 24n || num(2) >= 60n || num(3) >= 60n) return undefined;
      fields = {
        negative,
        leading: num(0),
        remaining: num(1) * NANOS_PER_HOUR + num(2) * NANOS_PER_MINUTE + num(3) * NANOS_PER_SECOND + fraction(parts[4]),
      };
      break;
    case "HOUR_TO_SECOND":
      if (num(1) >= 60n || num(2) >= 60n) return undefined;
      fields = {
        negative,
        leading: num(0),
        remaining: num(1) * NANOS_PER_MINUTE + num(2) * NANOS_PER_SECOND + fraction(parts[3]),
      };
      break;
    case "MINUTE_TO_SECOND":
      if (num(1) >= 60n) return undefined;
      fields = { negative, leading: num(0), remaining: num(1) * NANOS_PER_SECOND + fraction(parts[2]) };
      break;
  }
  if (checkIntervalFields(qualifier, fields) !== undefined) {
    return undefined;
  }
  if (fields.leading === 0n && fields.remaining === 0n) {
    fields.negative = false;
  }
  return fields;
}

export interface ParsedInterval {
  qualifier: IntervalQualifier;
  fields: IntervalFields;
}

/**
 * Parse either a bare interval body (`'1-6'` for YEAR TO MONTH) or a full
 * `INTERVAL '…' <qualifier>` literal, which may name a different qualifier.
 */
export function parseInterval(qualifier: IntervalQualifier, text: string): ParsedInterval | undefined {
  const full = FULL_LITERAL.exec(text.trim());
  if (full !== null) {
    const named = parseQualifier(full[3] ?? "");
    if (named === undefined) return undefined;
    const fields = parseBody(named, full[2] ?? "");
    if (fields === undefined) return undefined;
    if (full[1] === "-" && (fields.leading !== 0n || fields.remaining !== 0n)) {
      fields.negative = !fields.negative;
    }
    return { qualifier: named, fields };
  }
  const fields = parseBody(qualifier, text);
  return fields === undefined ? undefined : { qualifier, fields };
}
