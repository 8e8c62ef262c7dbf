/**
 * Axis-aligned bounding boxes over coordinate points
 *
 * Boxes are computed on raw degrees and do not account for rings crossing
 * the antimeridian.
 */

import { CoordinatePoint } from '../core/coordinate-point.js';

/**
 * Bounding box type: [minLon, minLat, maxLon, maxLat]
 */
export type BoundingBox = readonly [number, number, number, number];

/**
 * Compute the bounding box of a point set
 *
 * @returns Bounding box or undefined for an empty set
 */
export function computeBoundingBox(points: readonly CoordinatePoint[]): BoundingBox | undefined {
  if (points.length === 0) {
    return undefined;
  }

  let minLon = Infinity;
  let minLat = Infinity;
  let maxLon = -Infinity;
  let maxLat = -Infinity;

  for (const { longitude, latitude } of points) {
    if (longitude < minLon) minLon = longitude;
    if (longitude > maxLon) maxLon = longitude;
    if (latitude < minLat) minLat = latitude;
    if (latitude > maxLat) maxLat = latitude;
  }

  return [minLon, minLat, maxLon, maxLat] as const;
}

/**
 * South-west corner of the box enclosing `vertices`, tagged with the first
 * vertex's system.
 *
 * @throws Error for an empty vertex list
 */
export function southWestCorner(vertices: readonly CoordinatePoint[]): CoordinatePoint {
  const bbox = computeBoundingBox(vertices);
  if (!bbox) {
    throw new Error('Cannot compute south-west corner: no vertices');
  }
  return CoordinatePoint.of(bbox[0], bbox[1], vertices[0].system);
}

/**
 * North-east corner of the box enclosing `vertices`, tagged with the first
 * vertex's system.
 *
 * @throws Error for an empty vertex list
 */
export function northEastCorner(vertices: readonly CoordinatePoint[]): CoordinatePoint {
  const bbox = computeBoundingBox(vertices);
  if (!bbox) {
    throw new Error('Cannot compute north-east corner: no vertices');
  }
  return CoordinatePoint.of(bbox[2], bbox[3], vertices[0].system);
}

/**
 * Inclusive box membership
 */
export function isInBoundingBox(point: CoordinatePoint, bbox: BoundingBox): boolean {
  const [minLon, minLat, maxLon, maxLat] = bbox;
  return (
    point.longitude >= minLon &&
    point.longitude <= maxLon &&
    point.latitude >= minLat &&
    point.latitude <= maxLat
  );
}

/**
 * Whether the point lies in the rectangle having p1 and p2 as opposite corners
 */
export function isWithinSegmentRectangle(
  point: CoordinatePoint,
  p1: CoordinatePoint,
  p2: CoordinatePoint
): boolean {
  return (
    point.longitude >= Math.min(p1.longitude, p2.longitude) &&
    point.longitude <= Math.max(p1.longitude, p2.longitude) &&
    point.latitude >= Math.min(p1.latitude, p2.latitude) &&
    point.latitude <= Math.max(p1.latitude, p2.latitude)
  );
}
