import { describe, it, expect } from 'vitest';
import {
  gcj02Offset,
  isOutsideObfuscationRegion,
  offsetLatitude,
  offsetLongitude,
} from '../../../transformation/offsets.js';

describe('isOutsideObfuscationRegion', () => {
  it('should treat the rectangle edges as inside', () => {
    expect(isOutsideObfuscationRegion(72.004, 30)).toBe(false);
    expect(isOutsideObfuscationRegion(137.8347, 30)).toBe(false);
    expect(isOutsideObfuscationRegion(100, 0.8293)).toBe(false);
    expect(isOutsideObfuscationRegion(100, 55.8271)).toBe(false);
  });

  it('should flag points beyond any edge', () => {
    expect(isOutsideObfuscationRegion(72.003, 30)).toBe(true);
    expect(isOutsideObfuscationRegion(137.8348, 30)).toBe(true);
    expect(isOutsideObfuscationRegion(100, 0.8292)).toBe(true);
    expect(isOutsideObfuscationRegion(100, 55.8272)).toBe(true);
  });
});

describe('offset series', () => {
  it('should reduce to the constant terms at the origin', () => {
    expect(offsetLatitude(0, 0)).toBe(-100);
    expect(offsetLongitude(0, 0)).toBe(300);
  });

  it('should produce degree offsets of the expected magnitude', () => {
    const { dLongitude, dLatitude } = gcj02Offset(116.404, 39.915);

    expect(dLongitude).toBeCloseTo(0.0062445, 6);
    expect(dLatitude).toBeCloseTo(0.0014043, 6);
  });
});
