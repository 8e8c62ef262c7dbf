/**
 * Great-circle distance and circle membership
 *
 * Operands are always normalized to WGS84 before the haversine formula is
 * applied; mixing datums without normalizing gives wrong distances.
 */

import { EARTH_RADIUS } from '../core/constants.js';
import { CoordinatePoint } from '../core/coordinate-point.js';
import { toWGS84 } from '../transformation/datum-transform.js';

const toRadians = (degrees: number): number => degrees * (Math.PI / 180);

/**
 * Haversine distance between raw degree coordinates.
 *
 * Symmetric in its two points: swapping them only flips the sign of the
 * deltas, which are squared.
 *
 * @param radius - Sphere radius in meters
 * @returns Distance in meters
 */
export function haversineMeters(
  longitude1: number,
  latitude1: number,
  longitude2: number,
  latitude2: number,
  radius: number = EARTH_RADIUS.EQUATORIAL
): number {
  const lat1 = toRadians(latitude1);
  const lat2 = toRadians(latitude2);
  const sinHalfDLat = Math.sin((lat2 - lat1) / 2);
  const sinHalfDLng = Math.sin((toRadians(longitude2) - toRadians(longitude1)) / 2);

  const h = sinHalfDLat * sinHalfDLat + Math.cos(lat1) * Math.cos(lat2) * sinHalfDLng * sinHalfDLng;

  // Rounding can push h slightly above 1 for antipodal points
  const clampedH = Math.min(1, h);

  return 2 * Math.asin(Math.sqrt(clampedH)) * radius;
}

/**
 * Distance between two points in meters
 */
export function distanceMeters(
  a: CoordinatePoint,
  b: CoordinatePoint,
  radius: number = EARTH_RADIUS.EQUATORIAL
): number {
  const wa = toWGS84(a);
  const wb = toWGS84(b);
  return haversineMeters(wa.longitude, wa.latitude, wb.longitude, wb.latitude, radius);
}

/**
 * Distance between two points in kilometers
 */
export function distanceKilometers(
  a: CoordinatePoint,
  b: CoordinatePoint,
  radius: number = EARTH_RADIUS.EQUATORIAL
): number {
  return distanceMeters(a, b, radius) / 1000;
}

/**
 * Distance in meters between two WGS84 positions given as raw degrees.
 * For decimal strings or arbitrary-precision values, build the points with
 * CoordinatePoint.parse or CoordinatePoint.fromDecimal and use distanceMeters.
 *
 * @throws InvalidCoordinateError when a value is outside the valid domain
 */
export function distanceMetersBetween(
  longitude1: number,
  latitude1: number,
  longitude2: number,
  latitude2: number
): number {
  return distanceMeters(CoordinatePoint.of(longitude1, latitude1), CoordinatePoint.of(longitude2, latitude2));
}

/**
 * Kilometer form of distanceMetersBetween
 *
 * @throws InvalidCoordinateError when a value is outside the valid domain
 */
export function distanceKilometersBetween(
  longitude1: number,
  latitude1: number,
  longitude2: number,
  latitude2: number
): number {
  return distanceMetersBetween(longitude1, latitude1, longitude2, latitude2) / 1000;
}

/**
 * Inclusive circle test: a point exactly `radiusMeters` away is inside
 */
export function isInCircle(
  point: CoordinatePoint,
  center: CoordinatePoint,
  radiusMeters: number,
  radius: number = EARTH_RADIUS.EQUATORIAL
): boolean {
  return distanceMeters(point, center, radius) <= radiusMeters;
}
