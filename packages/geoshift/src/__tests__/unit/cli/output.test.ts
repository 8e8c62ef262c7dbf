import { describe, it, expect } from 'vitest';
import { formatNumber, formatOutput, formatPoint } from '../../../cli/lib/output.js';
import { CoordinatePoint } from '../../../core/coordinate-point.js';

describe('formatNumber', () => {
  it('should trim trailing zeros', () => {
    expect(formatNumber(1.5, 3)).toBe('1.5');
    expect(formatNumber(2, 4)).toBe('2');
    expect(formatNumber(116.41024449916938, 8)).toBe('116.4102445');
  });

  it('should not print negative zero', () => {
    expect(formatNumber(-0.00000001, 4)).toBe('0');
  });

  it('should print integers unchanged at zero precision', () => {
    expect(formatNumber(12.6, 0)).toBe('13');
  });
});

describe('formatPoint', () => {
  it('should print system then coordinates', () => {
    expect(formatPoint(CoordinatePoint.of(-0.1276, 51.5072, 'GCJ02'), 8)).toBe('GCJ02 -0.1276 51.5072');
  });
});

describe('formatOutput', () => {
  it('should pick JSON or text', () => {
    expect(formatOutput('text', { a: 1 }, 'a is 1')).toBe('a is 1');
    expect(JSON.parse(formatOutput('json', { a: 1 }, 'a is 1'))).toEqual({ a: 1 });
  });
});
