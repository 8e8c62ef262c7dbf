/**
 * Shared numeric constants for datum transforms and geometry predicates
 *
 * All values are read-only for the lifetime of the process.
 */

// ============================================================================
// Datum Transform Constants
// ============================================================================

/**
 * Krasovsky 1940 ellipsoid, used by the GCJ02 offset scaling
 */
export const KRASOVSKY_ELLIPSOID = {
  /** Semi-major axis (meters) */
  SEMI_MAJOR_AXIS: 6378245.0,
  /** Squared first eccentricity */
  ECCENTRICITY_SQUARED: 0.00669342162296594323,
} as const;

/**
 * π·3000/180, the angular factor of the BD09 polar perturbation
 */
export const BD09_X_PI = (Math.PI * 3000.0) / 180.0;

/**
 * BD09 perturbation and shift parameters
 */
export const BD09_PARAMS = {
  /** Amplitude of the sine term added to the polar magnitude */
  MAGNITUDE_PERTURBATION: 0.00002,
  /** Amplitude of the cosine term added to the polar angle */
  ANGLE_PERTURBATION: 0.000003,
  /** Constant longitude shift */
  LONGITUDE_SHIFT: 0.0065,
  /** Constant latitude shift */
  LATITUDE_SHIFT: 0.006,
} as const;

/**
 * Rectangle approximating the territory where GCJ02 obfuscation applies.
 *
 * The rectangle over-covers some neighbouring countries; points inside it
 * are obfuscated regardless.
 */
export const OBFUSCATION_REGION = {
  MIN_LONGITUDE: 72.004,
  MAX_LONGITUDE: 137.8347,
  MIN_LATITUDE: 0.8293,
  MAX_LATITUDE: 55.8271,
} as const;

/**
 * Origin the GCJ02 offset polynomials are evaluated around
 */
export const OFFSET_ORIGIN = {
  LONGITUDE: 105.0,
  LATITUDE: 35.0,
} as const;

// ============================================================================
// Geometry Constants
// ============================================================================

/**
 * Earth radius values (meters)
 */
export const EARTH_RADIUS = {
  /** WGS84 equatorial radius (default for haversine distance) */
  EQUATORIAL: 6378137,
  /** IUGG mean radius */
  MEAN: 6371008.8,
} as const;

export type EarthRadiusName = 'equatorial' | 'mean';

/**
 * Resolve a radius name to meters
 */
export function earthRadiusMeters(name: EarthRadiusName): number {
  return name === 'mean' ? EARTH_RADIUS.MEAN : EARTH_RADIUS.EQUATORIAL;
}

/**
 * Default on-segment tolerance in degrees (~1.1 cm at the equator)
 */
export const DEFAULT_SEGMENT_TOLERANCE = 1e-7;

/**
 * Minimum number of distinct vertices for a containment test
 */
export const MIN_POLYGON_VERTICES = 3;

/**
 * Valid coordinate domain
 */
export const COORDINATE_BOUNDS = {
  MIN_LONGITUDE: -180,
  MAX_LONGITUDE: 180,
  MIN_LATITUDE: -90,
  MAX_LATITUDE: 90,
} as const;
