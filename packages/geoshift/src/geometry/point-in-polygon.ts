/**
 * Point-in-Polygon Testing
 *
 * Boundary-inclusive containment over a transient ring of CoordinatePoints:
 * bounding-box rejection, an on-edge check with a fixed tolerance, then
 * half-open ray casting (even-odd rule).
 */

import { DEFAULT_SEGMENT_TOLERANCE, MIN_POLYGON_VERTICES } from '../core/constants.js';
import type { CoordinatePoint } from '../core/coordinate-point.js';
import { convert } from '../transformation/datum-transform.js';
import { computeBoundingBox, isInBoundingBox } from './bounding-box.js';

export interface ContainmentOptions {
  /** On-edge tolerance in degrees (default 1e-7) */
  readonly tolerance?: number;
}

/**
 * How a containment decision was reached
 *
 * - degenerate: fewer than three vertices supplied
 * - outside-bbox: rejected by the bounding-box pre-filter
 * - on-boundary: point lies on an edge or vertex
 * - ray-cast: decided by crossing parity
 */
export type ContainmentPath = 'degenerate' | 'outside-bbox' | 'on-boundary' | 'ray-cast';

export interface ContainmentResult {
  readonly contained: boolean;
  readonly path: ContainmentPath;
  /** Ring actually tested, after closing-vertex removal and datum normalization */
  readonly ring: readonly CoordinatePoint[];
}

/**
 * Whether the point lies on segment p1-p2, within `tolerance`.
 *
 * Rectangle pre-check (expanded by the tolerance) followed by a cross-product
 * collinearity test.
 */
export function isOnSegment(
  point: CoordinatePoint,
  p1: CoordinatePoint,
  p2: CoordinatePoint,
  tolerance: number = DEFAULT_SEGMENT_TOLERANCE
): boolean {
  if (
    point.longitude < Math.min(p1.longitude, p2.longitude) - tolerance ||
    point.longitude > Math.max(p1.longitude, p2.longitude) + tolerance ||
    point.latitude < Math.min(p1.latitude, p2.latitude) - tolerance ||
    point.latitude > Math.max(p1.latitude, p2.latitude) + tolerance
  ) {
    return false;
  }

  // (x - x1)(y2 - y1) - (y - y1)(x2 - x1)
  const crossProduct =
    (point.longitude - p1.longitude) * (p2.latitude - p1.latitude) -
    (point.latitude - p1.latitude) * (p2.longitude - p1.longitude);

  return Math.abs(crossProduct) < tolerance;
}

/**
 * Drop a closing vertex equal to the first one, so the shared vertex is
 * not treated as two edges.
 */
export function openRing(boundary: readonly CoordinatePoint[]): readonly CoordinatePoint[] {
  if (boundary.length > 1 && boundary[boundary.length - 1].sameCoordinates(boundary[0])) {
    return boundary.slice(0, -1);
  }
  return boundary;
}

/**
 * Full containment evaluation, reporting the decision path
 */
export function evaluateContainment(
  point: CoordinatePoint,
  boundary: readonly CoordinatePoint[],
  options: ContainmentOptions = {}
): ContainmentResult {
  const tolerance = options.tolerance ?? DEFAULT_SEGMENT_TOLERANCE;

  if (boundary.length < MIN_POLYGON_VERTICES) {
    return { contained: false, path: 'degenerate', ring: boundary };
  }

  const normalized = boundary.every((vertex) => vertex.system === point.system)
    ? boundary
    : boundary.map((vertex) => convert(vertex, point.system));

  // A closed two-point ring keeps its edge: on-segment still applies, and
  // the ray crosses the doubled edge an even number of times.
  const ring = openRing(normalized);

  const bbox = computeBoundingBox(ring);
  if (!bbox || !isInBoundingBox(point, bbox)) {
    return { contained: false, path: 'outside-bbox', ring };
  }

  const { longitude, latitude } = point;
  let inside = false;

  for (let i = 0, j = ring.length - 1; i < ring.length; j = i++) {
    const p1 = ring[i];
    const p2 = ring[j];

    if (isOnSegment(point, p1, p2, tolerance)) {
      return { contained: true, path: 'on-boundary', ring };
    }

    // Half-open crossing: one endpoint strictly below, the other at or above.
    // Horizontal edges never qualify, so the division below is safe.
    if (
      (p1.latitude < latitude && p2.latitude >= latitude) ||
      (p2.latitude < latitude && p1.latitude >= latitude)
    ) {
      const intersectX =
        p1.longitude +
        ((latitude - p1.latitude) * (p2.longitude - p1.longitude)) / (p2.latitude - p1.latitude);

      if (longitude < intersectX) {
        inside = !inside;
      }
    }
  }

  return { contained: inside, path: 'ray-cast', ring };
}

/**
 * Boundary-inclusive point-in-polygon test.
 *
 * Returns false for rings of fewer than three supplied vertices. Boundary
 * vertices in a different datum are converted to the point's datum first.
 */
export function isInPolygon(
  point: CoordinatePoint,
  boundary: readonly CoordinatePoint[],
  options: ContainmentOptions = {}
): boolean {
  return evaluateContainment(point, boundary, options).contained;
}
