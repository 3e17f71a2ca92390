// Geometry codec
// Boundary to the EWKB / EWKT / GeoJSON encoders

/**
 * Coordinate dimensions of a geometry.
 */
export type DimensionSystem = "XY" | "XYZ" | "XYM" | "XYZM";

/**
 * Header information decoded from an EWKB payload.
 */
export interface GeometryInfo {
  /** 0 when the payload carries no SRID. */
  srid: number;
  /** OGC geometry type code (1 = POINT … 7 = GEOMETRYCOLLECTION). */
  geometryType: number;
  dimensionSystem: DimensionSystem;
}

/**
 * External geometry encoder. Methods throw on malformed input; the
 * conversion engine reports such failures as data conversion errors.
 */
export interface GeometryCodec {
  /** Validate EWKB and decode its header. */
  fromEwkb(ewkb: Uint8Array): GeometryInfo;
  /** Parse WKT or EWKT into EWKB. */
  parse(text: string): Uint8Array;
  /** Render EWKB as EWKT. */
  toEwkt(ewkb: Uint8Array): string;
  /** Render EWKB as GeoJSON text bytes. */
  ewkbToGeoJson(ewkb: Uint8Array, dimensionSystem: DimensionSystem): Uint8Array;
  /** Parse GeoJSON text bytes into EWKB with the given SRID. */
  geoJsonToEwkb(json: Uint8Array, srid: number): Uint8Array;
}
