import type { DimensionSystem, GeometryCodec, GeometryInfo } from "../src/services/geometry";
import { StaticCastDataProvider } from "../src/services/environment";
import { ValueError } from "../src/common/errors";
import { utf8Decode, utf8Encode } from "../src/common/utils";
import { epochDayFromCivil, NANOS_PER_HOUR, NANOS_PER_MINUTE } from "../src/values/datetime";
import { TimestampTzValue } from "../src/values/values";

/** 2024-03-15, the session date of {@link provider}. */
export const SESSION_DAY = epochDayFromCivil(2024, 3, 15);

/**
 * Session frozen at 2024-03-15 10:30:00+02 in a fixed +02 zone.
 */
export const provider = new StaticCastDataProvider(
  TimestampTzValue.of(SESSION_DAY, 10n * NANOS_PER_HOUR + 30n * NANOS_PER_MINUTE, 7200)
);

export function hours(h: number, m = 0): bigint {
  return BigInt(h) * NANOS_PER_HOUR + BigInt(m) * NANOS_PER_MINUTE;
}

export function bytes(...values: number[]): Uint8Array {
  return Uint8Array.from(values);
}

const GEOMETRY_CODES: Readonly<Record<string, number>> = {
  POINT: 1,
  LINESTRING: 2,
  POLYGON: 3,
};

const EWKT = /^(?:SRID=(\d+);)?(POINT|LINESTRING|POLYGON)\b/;

function header(text: string): GeometryInfo {
  const match = EWKT.exec(text);
  const code = match?.[2] === undefined ? undefined : GEOMETRY_CODES[match[2]];
  if (match === null || code === undefined) {
    throw new Error(`not a geometry: ${text}`);
  }
  return { srid: Number(match[1] ?? "0"), geometryType: code, dimensionSystem: "XY" };
}

/**
 * In-process codec whose "EWKB" is simply the UTF-8 EWKT text.
 */
export const fakeGeometryCodec: GeometryCodec = {
  fromEwkb(ewkb: Uint8Array): GeometryInfo {
    return header(utf8Decode(ewkb));
  },
  parse(text: string): Uint8Array {
    header(text);
    return utf8Encode(text);
  },
  toEwkt(ewkb: Uint8Array): string {
    return utf8Decode(ewkb);
  },
  ewkbToGeoJson(ewkb: Uint8Array, _dimensionSystem: DimensionSystem): Uint8Array {
    const info = header(utf8Decode(ewkb));
    return utf8Encode(JSON.stringify({ type: info.geometryType === 1 ? "Point" : "Other", srid: info.srid }));
  },
  geoJsonToEwkb(json: Uint8Array, srid: number): Uint8Array {
    const parsed: unknown = JSON.parse(utf8Decode(json));
    if (typeof parsed !== "object" || parsed === null || !("type" in parsed) || parsed.type !== "Point") {
      throw new Error("unsupported GeoJSON");
    }
    return utf8Encode(`${srid === 0 ? "" : `SRID=${srid};`}POINT EMPTY`);
  },
};

/**
 * Unwrap an engine result, failing the test on an error.
 */
export function ok<T>(result: T | ValueError): T {
  if (result instanceof ValueError) {
    throw result;
  }
  return result;
}
