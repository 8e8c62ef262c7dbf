import { describe, it, expect } from 'vitest';
import { distance as turfDistance, point as turfPoint } from '@turf/turf';
import { EARTH_RADIUS } from '../../../core/constants.js';
import { CoordinatePoint } from '../../../core/coordinate-point.js';
import { InvalidCoordinateError } from '../../../core/errors.js';
import { CoordinateSystem } from '../../../core/types/coordinate-system.js';
import {
  distanceKilometers,
  distanceKilometersBetween,
  distanceMeters,
  distanceMetersBetween,
  haversineMeters,
  isInCircle,
} from '../../../geometry/distance.js';
import { toGCJ02 } from '../../../transformation/datum-transform.js';

/** One degree of arc on the equatorial sphere */
const EQUATORIAL_DEGREE_M = 111319.49079327357;

const ORIGIN = CoordinatePoint.of(0, 0);
const ONE_EAST = CoordinatePoint.of(1, 0);

describe('distanceMeters', () => {
  it('should be zero between a point and itself', () => {
    const point = CoordinatePoint.of(116.404, 39.915);

    expect(distanceMeters(point, point)).toBe(0);
  });

  it('should be symmetric', () => {
    const a = CoordinatePoint.of(2.3522, 48.8566);
    const b = CoordinatePoint.of(13.405, 52.52);

    expect(distanceMeters(a, b)).toBe(distanceMeters(b, a));
  });

  it('should be symmetric across datums', () => {
    const wgs = CoordinatePoint.of(116.404, 39.915);
    const bd = CoordinatePoint.of(121.4807, 31.2363, CoordinateSystem.BD09);

    expect(distanceMeters(wgs, bd)).toBe(distanceMeters(bd, wgs));
    expect(distanceMeters(bd, wgs)).toBeGreaterThan(0);
  });

  it('should measure one degree along the equator', () => {
    expect(distanceMeters(ORIGIN, ONE_EAST)).toBeCloseTo(EQUATORIAL_DEGREE_M, 3);
    expect(distanceKilometers(ORIGIN, ONE_EAST)).toBeCloseTo(EQUATORIAL_DEGREE_M / 1000, 6);
  });

  it('should use the mean radius when asked', () => {
    expect(distanceMeters(ORIGIN, ONE_EAST, EARTH_RADIUS.MEAN)).toBeCloseTo(111195.08023, 3);
  });

  it('should stay finite for antipodal points', () => {
    const distance = distanceMeters(CoordinatePoint.of(0, 0), CoordinatePoint.of(180, 0));

    expect(distance).toBeCloseTo(Math.PI * EARTH_RADIUS.EQUATORIAL, 3);
  });

  it('should normalize mixed datums before measuring', () => {
    const wgs = CoordinatePoint.of(116.404, 39.915);
    const gcj = toGCJ02(wgs);

    // Same place in two datums
    expect(distanceMeters(wgs, gcj)).toBeLessThan(5);
    // Raw degrees differ by several hundred meters
    expect(
      haversineMeters(wgs.longitude, wgs.latitude, gcj.longitude, gcj.latitude)
    ).toBeGreaterThan(400);
  });

  it('should agree with turf on the mean sphere', () => {
    const paris = CoordinatePoint.of(2.3522, 48.8566);
    const berlin = CoordinatePoint.of(13.405, 52.52);

    const expected = turfDistance(turfPoint([2.3522, 48.8566]), turfPoint([13.405, 52.52]), {
      units: 'meters',
    });

    expect(distanceMeters(paris, berlin, EARTH_RADIUS.MEAN)).toBeCloseTo(expected, 3);
  });
});

describe('distanceMetersBetween', () => {
  it('should measure raw WGS84 degrees', () => {
    expect(distanceMetersBetween(0, 0, 1, 0)).toBeCloseTo(EQUATORIAL_DEGREE_M, 3);
  });

  it('should validate its inputs', () => {
    expect(() => distanceMetersBetween(200, 0, 0, 0)).toThrow(InvalidCoordinateError);
  });
});

describe('distanceKilometersBetween', () => {
  it('should measure raw WGS84 degrees in kilometers', () => {
    expect(distanceKilometersBetween(0, 0, 1, 0)).toBeCloseTo(EQUATORIAL_DEGREE_M / 1000, 6);
    expect(distanceKilometersBetween(0, 0, 1, 0)).toBe(distanceMetersBetween(0, 0, 1, 0) / 1000);
  });

  it('should validate its inputs', () => {
    expect(() => distanceKilometersBetween(0, 0, 0, 91)).toThrow(InvalidCoordinateError);
  });
});

describe('isInCircle', () => {
  it('should include points exactly on the circle', () => {
    const radius = distanceMeters(ONE_EAST, ORIGIN);

    expect(isInCircle(ONE_EAST, ORIGIN, radius)).toBe(true);
    expect(isInCircle(ONE_EAST, ORIGIN, radius - 1)).toBe(false);
  });

  it('should include the center for a zero radius', () => {
    expect(isInCircle(ORIGIN, ORIGIN, 0)).toBe(true);
  });

  it('should compare points in different datums after normalizing', () => {
    const center = CoordinatePoint.of(116.404, 39.915);
    const sameSpot = toGCJ02(center);

    expect(isInCircle(sameSpot, center, 10)).toBe(true);
    expect(isInCircle(sameSpot.withSystem(CoordinateSystem.WGS84), center, 10)).toBe(false);
  });
});
