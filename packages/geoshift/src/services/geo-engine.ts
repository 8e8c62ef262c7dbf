/**
 * GeoEngine - configured facade over transforms and geometry predicates
 *
 * Holds an immutable GeoEngineConfig (earth radius, edge tolerance) and a
 * logger. The free functions exported by the package use the defaults;
 * construct an engine when either needs to change.
 *
 * @example
 * ```typescript
 * const engine = createGeoEngine({ earthRadius: 'mean' });
 * const office = engine.makePoint(116.404, 39.915, 'GCJ02');
 * engine.distanceMeters(office, engine.makePoint(116.40, 39.91));
 * ```
 */

import { resolveEngineConfig, type GeoEngineConfig } from '../core/config.js';
import { earthRadiusMeters } from '../core/constants.js';
import { CoordinatePoint } from '../core/coordinate-point.js';
import type { CoordinateSystem } from '../core/types/coordinate-system.js';
import { createLogger, type GeoLogger } from '../core/utils/logger.js';
import { computeBoundingBox, type BoundingBox } from '../geometry/bounding-box.js';
import { distanceKilometers, distanceMeters, isInCircle } from '../geometry/distance.js';
import { evaluateContainment, type ContainmentResult } from '../geometry/point-in-polygon.js';
import { convert } from '../transformation/datum-transform.js';

export interface GeoEngineOptions {
  readonly logger?: GeoLogger;
}

export class GeoEngine {
  readonly config: GeoEngineConfig;
  private readonly radiusMeters: number;
  private readonly log: GeoLogger;

  constructor(config: Partial<GeoEngineConfig> = {}, options: GeoEngineOptions = {}) {
    this.config = resolveEngineConfig(config);
    this.radiusMeters = earthRadiusMeters(this.config.earthRadius);
    this.log = options.logger ?? createLogger({ module: 'geo-engine' });
  }

  makePoint(longitude: number, latitude: number, system?: CoordinateSystem): CoordinatePoint {
    return CoordinatePoint.of(longitude, latitude, system);
  }

  convert(point: CoordinatePoint, target: CoordinateSystem): CoordinatePoint {
    return convert(point, target);
  }

  distanceMeters(a: CoordinatePoint, b: CoordinatePoint): number {
    return distanceMeters(a, b, this.radiusMeters);
  }

  distanceKilometers(a: CoordinatePoint, b: CoordinatePoint): number {
    return distanceKilometers(a, b, this.radiusMeters);
  }

  isInCircle(point: CoordinatePoint, center: CoordinatePoint, radiusMeters: number): boolean {
    return isInCircle(point, center, radiusMeters, this.radiusMeters);
  }

  isInPolygon(point: CoordinatePoint, boundary: readonly CoordinatePoint[]): boolean {
    return this.evaluateContainment(point, boundary).contained;
  }

  /**
   * Containment with the decision path, for diagnostics
   */
  evaluateContainment(point: CoordinatePoint, boundary: readonly CoordinatePoint[]): ContainmentResult {
    const mixed = boundary.some((vertex) => vertex.system !== point.system);
    if (mixed) {
      this.log.debug('Normalizing polygon vertices to point datum', {
        target: point.system,
        vertices: boundary.length,
      });
    }

    const result = evaluateContainment(point, boundary, {
      tolerance: this.config.segmentTolerance,
    });

    if (result.path === 'degenerate') {
      this.log.debug('Degenerate polygon treated as empty region', {
        vertices: boundary.length,
      });
    }

    return result;
  }

  /**
   * Bounding box of a ring after converting it to `system`
   */
  boundingBox(points: readonly CoordinatePoint[], system?: CoordinateSystem): BoundingBox | undefined {
    const target = system ?? points[0]?.system;
    if (target === undefined) {
      return undefined;
    }
    return computeBoundingBox(points.map((point) => convert(point, target)));
  }
}

/**
 * Create an engine, validating the configuration up front
 *
 * @throws ConfigurationError for invalid settings
 */
export function createGeoEngine(
  config: Partial<GeoEngineConfig> = {},
  options: GeoEngineOptions = {}
): GeoEngine {
  return new GeoEngine(config, options);
}
