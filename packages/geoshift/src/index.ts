/**
 * geoshift - WGS84 / GCJ02 / BD09 coordinate engine
 *
 * Public entry point. Free functions use the default configuration
 * (equatorial earth radius, 1e-7 degree edge tolerance); use GeoEngine for
 * other settings.
 */

// Core
export { CoordinatePoint, makePoint, type DecimalLike, type LngLat } from './core/coordinate-point.js';
export {
  CoordinateSystem,
  COORDINATE_SYSTEMS,
  isCoordinateSystem,
  parseCoordinateSystem,
} from './core/types/coordinate-system.js';
export {
  InvalidCoordinateError,
  isInvalidCoordinateError,
  ConfigurationError,
  type CoordinateField,
} from './core/errors.js';
export {
  DEFAULT_ENGINE_CONFIG,
  resolveEngineConfig,
  getEngineConfigFromEnv,
  type GeoEngineConfig,
} from './core/config.js';
export {
  EARTH_RADIUS,
  DEFAULT_SEGMENT_TOLERANCE,
  OBFUSCATION_REGION,
  type EarthRadiusName,
} from './core/constants.js';
export { Logger, logger, createLogger, type GeoLogger, type LogLevel, type LogMetadata } from './core/utils/logger.js';

// Validation
export { PointRecordSchema, type PointRecord } from './validation/coordinate-schemas.js';

// Transforms
export {
  convert,
  convertAll,
  toWGS84,
  toGCJ02,
  toBD09,
  wgs84ToGcj02,
  gcj02ToWgs84,
  gcj02ToBd09,
  bd09ToGcj02,
  wgs84ToBd09,
  bd09ToWgs84,
} from './transformation/datum-transform.js';
export { isOutsideObfuscationRegion } from './transformation/offsets.js';

// Geometry
export {
  distanceMeters,
  distanceKilometers,
  distanceMetersBetween,
  distanceKilometersBetween,
  haversineMeters,
  isInCircle,
} from './geometry/distance.js';
export {
  computeBoundingBox,
  southWestCorner,
  northEastCorner,
  isInBoundingBox,
  isWithinSegmentRectangle,
  type BoundingBox,
} from './geometry/bounding-box.js';
export {
  isInPolygon,
  isOnSegment,
  evaluateContainment,
  type ContainmentOptions,
  type ContainmentPath,
  type ContainmentResult,
} from './geometry/point-in-polygon.js';

// GeoJSON
export {
  pointToFeature,
  pointFromPosition,
  boundaryToPolygon,
  boundaryFromPolygon,
  type SystemProperties,
} from './geojson/adapter.js';

// Service
export { GeoEngine, createGeoEngine, type GeoEngineOptions } from './services/geo-engine.js';
