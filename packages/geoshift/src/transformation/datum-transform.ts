/**
 * Datum Transform Engine
 *
 * Six directed conversions over WGS84, GCJ02 and BD09. Four are direct
 * (WGS84<->GCJ02, GCJ02<->BD09); WGS84<->BD09 composes through GCJ02.
 *
 * The GCJ02->WGS84 and BD09->GCJ02 inverses are the conventional
 * single-step approximations, kept in the same arithmetic form so results
 * match other tooling built on the same formulas.
 *
 * Every direct step normalizes its output: longitude wraps into
 * [-180, 180], latitude clamps into [-90, 90].
 */

import { BD09_PARAMS, BD09_X_PI, COORDINATE_BOUNDS } from '../core/constants.js';
import { CoordinatePoint, type LngLat } from '../core/coordinate-point.js';
import { assertNeverSystem, CoordinateSystem } from '../core/types/coordinate-system.js';
import { gcj02Offset, isOutsideObfuscationRegion } from './offsets.js';

// ============================================================================
// Output Normalization
// ============================================================================

/**
 * Wrap longitude into [-180, 180]. In-range values are returned unchanged.
 */
export function wrapLongitude(longitude: number): number {
  if (longitude >= COORDINATE_BOUNDS.MIN_LONGITUDE && longitude <= COORDINATE_BOUNDS.MAX_LONGITUDE) {
    return longitude;
  }
  const wrapped = (((longitude + 180) % 360) + 360) % 360 - 180;
  return wrapped === -180 && longitude > 0 ? 180 : wrapped;
}

/**
 * Clamp latitude into [-90, 90]
 */
export function clampLatitude(latitude: number): number {
  return Math.max(COORDINATE_BOUNDS.MIN_LATITUDE, Math.min(COORDINATE_BOUNDS.MAX_LATITUDE, latitude));
}

function normalized(longitude: number, latitude: number): LngLat {
  return [wrapLongitude(longitude), clampLatitude(latitude)];
}

// ============================================================================
// Raw Direct Transforms
// ============================================================================

export function wgs84ToGcj02(longitude: number, latitude: number): LngLat {
  if (isOutsideObfuscationRegion(longitude, latitude)) {
    return [longitude, latitude];
  }
  const { dLongitude, dLatitude } = gcj02Offset(longitude, latitude);
  return normalized(longitude + dLongitude, latitude + dLatitude);
}

/**
 * Approximate inverse: the forward offset is evaluated at the GCJ02
 * coordinates and the shifted point is reflected across the input.
 */
export function gcj02ToWgs84(longitude: number, latitude: number): LngLat {
  if (isOutsideObfuscationRegion(longitude, latitude)) {
    return [longitude, latitude];
  }
  const { dLongitude, dLatitude } = gcj02Offset(longitude, latitude);
  const shiftedLng = longitude + dLongitude;
  const shiftedLat = latitude + dLatitude;
  return normalized(longitude * 2 - shiftedLng, latitude * 2 - shiftedLat);
}

export function gcj02ToBd09(longitude: number, latitude: number): LngLat {
  const x = longitude;
  const y = latitude;
  const z = Math.sqrt(x * x + y * y) + BD09_PARAMS.MAGNITUDE_PERTURBATION * Math.sin(y * BD09_X_PI);
  const theta = Math.atan2(y, x) + BD09_PARAMS.ANGLE_PERTURBATION * Math.cos(x * BD09_X_PI);
  return normalized(
    z * Math.cos(theta) + BD09_PARAMS.LONGITUDE_SHIFT,
    z * Math.sin(theta) + BD09_PARAMS.LATITUDE_SHIFT
  );
}

/**
 * Approximate inverse: constant shifts removed first, then the polar
 * perturbation subtracted.
 */
export function bd09ToGcj02(longitude: number, latitude: number): LngLat {
  const x = longitude - BD09_PARAMS.LONGITUDE_SHIFT;
  const y = latitude - BD09_PARAMS.LATITUDE_SHIFT;
  const z = Math.sqrt(x * x + y * y) - BD09_PARAMS.MAGNITUDE_PERTURBATION * Math.sin(y * BD09_X_PI);
  const theta = Math.atan2(y, x) - BD09_PARAMS.ANGLE_PERTURBATION * Math.cos(x * BD09_X_PI);
  return normalized(z * Math.cos(theta), z * Math.sin(theta));
}

// ============================================================================
// Raw Composed Transforms
// ============================================================================

export function wgs84ToBd09(longitude: number, latitude: number): LngLat {
  const [gcjLng, gcjLat] = wgs84ToGcj02(longitude, latitude);
  return gcj02ToBd09(gcjLng, gcjLat);
}

export function bd09ToWgs84(longitude: number, latitude: number): LngLat {
  const [gcjLng, gcjLat] = bd09ToGcj02(longitude, latitude);
  return gcj02ToWgs84(gcjLng, gcjLat);
}

// ============================================================================
// Point Transforms
// ============================================================================

type RawTransform = (longitude: number, latitude: number) => LngLat;

function transformFrom(source: CoordinateSystem, target: CoordinateSystem): RawTransform | null {
  switch (source) {
    case CoordinateSystem.WGS84:
      switch (target) {
        case CoordinateSystem.WGS84:
          return null;
        case CoordinateSystem.GCJ02:
          return wgs84ToGcj02;
        case CoordinateSystem.BD09:
          return wgs84ToBd09;
        default:
          return assertNeverSystem(target);
      }
    case CoordinateSystem.GCJ02:
      switch (target) {
        case CoordinateSystem.WGS84:
          return gcj02ToWgs84;
        case CoordinateSystem.GCJ02:
          return null;
        case CoordinateSystem.BD09:
          return gcj02ToBd09;
        default:
          return assertNeverSystem(target);
      }
    case CoordinateSystem.BD09:
      switch (target) {
        case CoordinateSystem.WGS84:
          return bd09ToWgs84;
        case CoordinateSystem.GCJ02:
          return bd09ToGcj02;
        case CoordinateSystem.BD09:
          return null;
        default:
          return assertNeverSystem(target);
      }
    default:
      return assertNeverSystem(source);
  }
}

/**
 * Convert a point into the target datum.
 *
 * Same-datum conversion returns the input instance.
 */
export function convert(point: CoordinatePoint, target: CoordinateSystem): CoordinatePoint {
  const transform = transformFrom(point.system, target);
  if (transform === null) {
    return point;
  }
  const [longitude, latitude] = transform(point.longitude, point.latitude);
  return CoordinatePoint.of(longitude, latitude, target);
}

export function toWGS84(point: CoordinatePoint): CoordinatePoint {
  return convert(point, CoordinateSystem.WGS84);
}

export function toGCJ02(point: CoordinatePoint): CoordinatePoint {
  return convert(point, CoordinateSystem.GCJ02);
}

export function toBD09(point: CoordinatePoint): CoordinatePoint {
  return convert(point, CoordinateSystem.BD09);
}

/**
 * Convert every point of a sequence into the target datum
 */
export function convertAll(
  points: readonly CoordinatePoint[],
  target: CoordinateSystem
): CoordinatePoint[] {
  return points.map((point) => convert(point, target));
}
