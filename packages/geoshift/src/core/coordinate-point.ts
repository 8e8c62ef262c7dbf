/**
 * CoordinatePoint - immutable longitude/latitude value tagged with its datum
 *
 * Instances are frozen and never mutated; every transform returns a new
 * point. Equality is exact field equality; tolerance only exists inside the
 * geometry predicates.
 */

import {
  LatitudeSchema,
  LatitudeStringSchema,
  LongitudeSchema,
  LongitudeStringSchema,
  validateField,
  validatePointRecord,
  type PointRecord,
} from '../validation/coordinate-schemas.js';
import { CoordinateSystem } from './types/coordinate-system.js';

/**
 * [longitude, latitude] pair
 */
export type LngLat = readonly [number, number];

/**
 * Any arbitrary-precision decimal that can be narrowed to a double
 * (decimal.js, big.js and bignumber.js all satisfy this).
 */
export interface DecimalLike {
  toNumber(): number;
}

export class CoordinatePoint {
  private constructor(
    public readonly longitude: number,
    public readonly latitude: number,
    public readonly system: CoordinateSystem
  ) {
    Object.freeze(this);
  }

  /**
   * Build a point from raw degrees
   *
   * @throws InvalidCoordinateError when either value is out of range or not finite
   */
  static of(
    longitude: number,
    latitude: number,
    system: CoordinateSystem = CoordinateSystem.WGS84
  ): CoordinatePoint {
    return new CoordinatePoint(
      validateField(LongitudeSchema, 'longitude', longitude),
      validateField(LatitudeSchema, 'latitude', latitude),
      system
    );
  }

  /**
   * Build a point from decimal strings such as `"116.404"` or `" -33.86 "`
   *
   * @throws InvalidCoordinateError for non-numeric or out-of-range text
   */
  static parse(
    longitude: string,
    latitude: string,
    system: CoordinateSystem = CoordinateSystem.WGS84
  ): CoordinatePoint {
    return new CoordinatePoint(
      validateField(LongitudeStringSchema, 'longitude', longitude),
      validateField(LatitudeStringSchema, 'latitude', latitude),
      system
    );
  }

  /**
   * Build a point from arbitrary-precision decimals
   */
  static fromDecimal(
    longitude: DecimalLike,
    latitude: DecimalLike,
    system: CoordinateSystem = CoordinateSystem.WGS84
  ): CoordinatePoint {
    return CoordinatePoint.of(longitude.toNumber(), latitude.toNumber(), system);
  }

  /**
   * Rebuild a point from its serialized `{ longitude, latitude, system }` form
   */
  static fromRecord(record: unknown): CoordinatePoint {
    const { longitude, latitude, system } = validatePointRecord(record);
    return new CoordinatePoint(longitude, latitude, system);
  }

  /**
   * Same coordinates, different datum tag. No arithmetic is applied; use
   * convert() to move a point between datums.
   */
  withSystem(system: CoordinateSystem): CoordinatePoint {
    return system === this.system ? this : new CoordinatePoint(this.longitude, this.latitude, system);
  }

  equals(other: CoordinatePoint): boolean {
    return (
      this.longitude === other.longitude &&
      this.latitude === other.latitude &&
      this.system === other.system
    );
  }

  /**
   * Same position, ignoring the datum tag
   */
  sameCoordinates(other: CoordinatePoint): boolean {
    return this.longitude === other.longitude && this.latitude === other.latitude;
  }

  toLngLat(): LngLat {
    return [this.longitude, this.latitude];
  }

  toRecord(): PointRecord {
    return { longitude: this.longitude, latitude: this.latitude, system: this.system };
  }

  toJSON(): PointRecord {
    return this.toRecord();
  }

  toString(): string {
    return `${this.system}(${this.longitude}, ${this.latitude})`;
  }
}

/**
 * Functional alias of CoordinatePoint.of
 */
export function makePoint(
  longitude: number,
  latitude: number,
  system: CoordinateSystem = CoordinateSystem.WGS84
): CoordinatePoint {
  return CoordinatePoint.of(longitude, latitude, system);
}
