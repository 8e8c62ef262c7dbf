import { describe, it, expect } from 'vitest';
import type { Polygon } from 'geojson';
import { CoordinatePoint } from '../../../core/coordinate-point.js';
import { InvalidCoordinateError } from '../../../core/errors.js';
import { CoordinateSystem } from '../../../core/types/coordinate-system.js';
import {
  boundaryFromPolygon,
  boundaryToPolygon,
  pointFromPosition,
  pointToFeature,
} from '../../../geojson/adapter.js';
import { isInPolygon } from '../../../geometry/point-in-polygon.js';

const square = [
  CoordinatePoint.of(0, 0, CoordinateSystem.BD09),
  CoordinatePoint.of(0, 1, CoordinateSystem.BD09),
  CoordinatePoint.of(1, 1, CoordinateSystem.BD09),
  CoordinatePoint.of(1, 0, CoordinateSystem.BD09),
];

describe('pointToFeature', () => {
  it('should carry the datum in the properties', () => {
    const feature = pointToFeature(CoordinatePoint.of(116.404, 39.915, CoordinateSystem.GCJ02));

    expect(feature).toEqual({
      type: 'Feature',
      properties: { system: 'GCJ02' },
      geometry: { type: 'Point', coordinates: [116.404, 39.915] },
    });
  });
});

describe('pointFromPosition', () => {
  it('should ignore altitude', () => {
    const point = pointFromPosition([116.404, 39.915, 44.5], CoordinateSystem.BD09);

    expect(point.toRecord()).toEqual({ longitude: 116.404, latitude: 39.915, system: 'BD09' });
  });

  it('should default to WGS84', () => {
    expect(pointFromPosition([1, 2]).system).toBe('WGS84');
  });

  it('should reject short or out-of-range positions', () => {
    expect(() => pointFromPosition([1])).toThrow(InvalidCoordinateError);
    expect(() => pointFromPosition([])).toThrow(
      'Invalid longitude []: position must have at least two elements'
    );
    expect(() => pointFromPosition([0, 100])).toThrow('Invalid latitude 100');
  });
});

describe('boundaryToPolygon', () => {
  it('should close an open ring', () => {
    const feature = boundaryToPolygon(square);

    expect(feature.properties).toEqual({ system: 'BD09' });
    expect(feature.geometry.coordinates).toEqual([
      [
        [0, 0],
        [0, 1],
        [1, 1],
        [1, 0],
        [0, 0],
      ],
    ]);
  });

  it('should not double-close a closed ring', () => {
    const closed = [...square, CoordinatePoint.of(0, 0, CoordinateSystem.BD09)];

    expect(boundaryToPolygon(closed).geometry.coordinates[0]).toHaveLength(5);
  });

  it('should refuse degenerate rings', () => {
    expect(() => boundaryToPolygon(square.slice(0, 2))).toThrow(
      'Cannot build polygon: need at least 3 vertices, got 2'
    );
  });
});

describe('boundaryFromPolygon', () => {
  const geometry: Polygon = {
    type: 'Polygon',
    coordinates: [
      [
        [0, 0],
        [4, 0],
        [4, 4],
        [0, 4],
        [0, 0],
      ],
      [
        [1, 1],
        [2, 1],
        [2, 2],
        [1, 1],
      ],
    ],
  };

  it('should read the exterior ring of a geometry or feature', () => {
    const fromGeometry = boundaryFromPolygon(geometry, CoordinateSystem.GCJ02);
    const fromFeature = boundaryFromPolygon(
      { type: 'Feature', properties: null, geometry },
      CoordinateSystem.GCJ02
    );

    expect(fromGeometry).toHaveLength(5);
    expect(fromGeometry[2].toString()).toBe('GCJ02(4, 4)');
    expect(fromFeature.map((point) => point.toLngLat())).toEqual(
      fromGeometry.map((point) => point.toLngLat())
    );
  });

  it('should produce a ring usable for containment', () => {
    const boundary = boundaryFromPolygon(geometry);

    // Holes are not subtracted
    expect(isInPolygon(CoordinatePoint.of(1.5, 1.2), boundary)).toBe(true);
    expect(isInPolygon(CoordinatePoint.of(5, 1), boundary)).toBe(false);
  });

  it('should round-trip through boundaryToPolygon', () => {
    const feature = boundaryToPolygon(square);
    const ring = boundaryFromPolygon(feature, CoordinateSystem.BD09);

    expect(ring).toHaveLength(5);
    expect(ring[4].equals(ring[0])).toBe(true);
  });
});
