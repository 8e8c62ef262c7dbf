/**
 * GeoJSON Interop
 *
 * Converts CoordinatePoints and boundary rings to and from GeoJSON. GeoJSON
 * carries no datum, so the system travels in `properties.system` on the way
 * out and must be supplied by the caller on the way in.
 */

import { point as turfPoint, polygon as turfPolygon } from '@turf/helpers';
import type { Feature, Point, Polygon, Position } from 'geojson';

import { MIN_POLYGON_VERTICES } from '../core/constants.js';
import { CoordinatePoint } from '../core/coordinate-point.js';
import { InvalidCoordinateError } from '../core/errors.js';
import { CoordinateSystem } from '../core/types/coordinate-system.js';
import { openRing } from '../geometry/point-in-polygon.js';

export type SystemProperties = {
  readonly system: CoordinateSystem;
};

/**
 * Point feature carrying the point's datum in its properties
 */
export function pointToFeature(point: CoordinatePoint): Feature<Point, SystemProperties> {
  return turfPoint([point.longitude, point.latitude], { system: point.system });
}

/**
 * Build a point from a GeoJSON position ([lon, lat] or [lon, lat, alt])
 *
 * @throws InvalidCoordinateError for short positions or out-of-range values
 */
export function pointFromPosition(
  position: Position,
  system: CoordinateSystem = CoordinateSystem.WGS84
): CoordinatePoint {
  if (position.length < 2) {
    throw new InvalidCoordinateError(
      position.length === 0 ? 'longitude' : 'latitude',
      position,
      'position must have at least two elements'
    );
  }
  return CoordinatePoint.of(position[0], position[1], system);
}

/**
 * Closed polygon feature for a boundary ring.
 *
 * The ring is closed if the caller left it open; vertices keep their own
 * coordinates, so all of them should share one datum.
 *
 * @throws Error when fewer than three distinct vertices remain
 */
export function boundaryToPolygon(
  boundary: readonly CoordinatePoint[]
): Feature<Polygon, SystemProperties> {
  const ring = openRing(boundary);
  if (ring.length < MIN_POLYGON_VERTICES) {
    throw new Error(
      `Cannot build polygon: need at least ${MIN_POLYGON_VERTICES} vertices, got ${ring.length}`
    );
  }

  const positions: Position[] = ring.map((vertex) => [vertex.longitude, vertex.latitude]);
  positions.push([ring[0].longitude, ring[0].latitude]);

  return turfPolygon([positions], { system: ring[0].system });
}

/**
 * Exterior ring of a GeoJSON polygon as CoordinatePoints
 *
 * Interior rings (holes) are ignored. The closing position is kept; the
 * containment test drops it itself.
 */
export function boundaryFromPolygon(
  polygon: Polygon | Feature<Polygon>,
  system: CoordinateSystem = CoordinateSystem.WGS84
): CoordinatePoint[] {
  const geometry = polygon.type === 'Feature' ? polygon.geometry : polygon;
  const exterior = geometry.coordinates[0] ?? [];
  return exterior.map((position) => pointFromPosition(position, system));
}
