/**
 * GCJ02 Offset Functions
 *
 * Fixed-coefficient polynomial + harmonic series producing the raw GCJ02
 * displacement, and the Krasovsky ellipsoid scaling that turns it into
 * degrees. Shared by the forward transform and its approximate inverse.
 */

import { KRASOVSKY_ELLIPSOID, OBFUSCATION_REGION, OFFSET_ORIGIN } from '../core/constants.js';

const PI = Math.PI;

/**
 * True when the point is certainly outside the obfuscated territory.
 * Points inside the rectangle are always treated as inside, even where the
 * rectangle spills over a border.
 */
export function isOutsideObfuscationRegion(longitude: number, latitude: number): boolean {
  return (
    longitude < OBFUSCATION_REGION.MIN_LONGITUDE ||
    longitude > OBFUSCATION_REGION.MAX_LONGITUDE ||
    latitude < OBFUSCATION_REGION.MIN_LATITUDE ||
    latitude > OBFUSCATION_REGION.MAX_LATITUDE
  );
}

/**
 * Raw latitude displacement at shifted coordinates (x = lon - 105, y = lat - 35)
 */
export function offsetLatitude(x: number, y: number): number {
  let ret = -100.0 + 2.0 * x + 3.0 * y + 0.2 * y * y + 0.1 * x * y + 0.2 * Math.sqrt(Math.abs(x));
  ret += ((20.0 * Math.sin(6.0 * x * PI) + 20.0 * Math.sin(2.0 * x * PI)) * 2.0) / 3.0;
  ret += ((20.0 * Math.sin(y * PI) + 40.0 * Math.sin((y / 3.0) * PI)) * 2.0) / 3.0;
  ret += ((160.0 * Math.sin((y / 12.0) * PI) + 320 * Math.sin((y * PI) / 30.0)) * 2.0) / 3.0;
  return ret;
}

/**
 * Raw longitude displacement at shifted coordinates (x = lon - 105, y = lat - 35)
 */
export function offsetLongitude(x: number, y: number): number {
  let ret = 300.0 + x + 2.0 * y + 0.1 * x * x + 0.1 * x * y + 0.1 * Math.sqrt(Math.abs(x));
  ret += ((20.0 * Math.sin(6.0 * x * PI) + 20.0 * Math.sin(2.0 * x * PI)) * 2.0) / 3.0;
  ret += ((20.0 * Math.sin(x * PI) + 40.0 * Math.sin((x / 3.0) * PI)) * 2.0) / 3.0;
  ret += ((150.0 * Math.sin((x / 12.0) * PI) + 300.0 * Math.sin((x / 30.0) * PI)) * 2.0) / 3.0;
  return ret;
}

/**
 * Displacement in degrees
 */
export interface DatumOffset {
  readonly dLongitude: number;
  readonly dLatitude: number;
}

/**
 * GCJ02 displacement (degrees) for a point, scaled by the ellipsoid at the
 * point's own latitude.
 */
export function gcj02Offset(longitude: number, latitude: number): DatumOffset {
  const a = KRASOVSKY_ELLIPSOID.SEMI_MAJOR_AXIS;
  const ee = KRASOVSKY_ELLIPSOID.ECCENTRICITY_SQUARED;

  const x = longitude - OFFSET_ORIGIN.LONGITUDE;
  const y = latitude - OFFSET_ORIGIN.LATITUDE;
  let dLat = offsetLatitude(x, y);
  let dLng = offsetLongitude(x, y);

  const radLat = (latitude / 180.0) * PI;
  let magic = Math.sin(radLat);
  magic = 1 - ee * magic * magic;
  const sqrtMagic = Math.sqrt(magic);

  dLat = (dLat * 180.0) / (((a * (1 - ee)) / (magic * sqrtMagic)) * PI);
  dLng = (dLng * 180.0) / ((a / sqrtMagic) * Math.cos(radLat) * PI);

  return { dLongitude: dLng, dLatitude: dLat };
}
