/**
 * CLI Command Tests
 *
 * Commands are exercised through their run functions with an in-memory
 * log sink; the commander wiring in bin/ only forwards arguments.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { fileURLToPath } from 'node:url';
import { runCircleCommand } from '../../../cli/commands/circle.js';
import { runContainsCommand } from '../../../cli/commands/contains.js';
import { runConvertCommand } from '../../../cli/commands/convert.js';
import { runDistanceCommand } from '../../../cli/commands/distance.js';
import type { CLIConfig } from '../../../cli/lib/config.js';
import { createCommandContext, type CommandContext } from '../../../cli/lib/context.js';
import { EXIT_CODES, exitCodeFor } from '../../../cli/lib/exit-codes.js';
import { InputError } from '../../../cli/lib/input.js';
import { DEFAULT_ENGINE_CONFIG } from '../../../core/config.js';
import { ConfigurationError, InvalidCoordinateError } from '../../../core/errors.js';

const fixture = (name: string) => fileURLToPath(new URL(`../../fixtures/${name}`, import.meta.url));

const baseConfig: CLIConfig = {
  engine: DEFAULT_ENGINE_CONFIG,
  defaultSystem: 'WGS84',
  precision: 8,
  verbose: false,
  json: false,
  configPath: null,
};

describe('CLI commands', () => {
  let lines: string[];
  let ctx: CommandContext;

  beforeEach(() => {
    lines = [];
    ctx = createCommandContext(baseConfig, (line) => lines.push(line));
  });

  describe('convert', () => {
    it('should print the converted point', () => {
      const result = runConvertCommand('-0.1276', '51.5072', { to: 'gcj02' }, ctx);

      expect(result.text).toBe('GCJ02 -0.1276 51.5072');
      expect(result.data).toEqual({
        input: { longitude: -0.1276, latitude: 51.5072, system: 'WGS84' },
        output: { longitude: -0.1276, latitude: 51.5072, system: 'GCJ02' },
      });
    });

    it('should shift points inside the region', () => {
      const result = runConvertCommand('116.404', '39.915', { from: 'WGS84', to: 'GCJ02' }, ctx);

      expect(result.text).toBe('GCJ02 116.4102445 39.91640428');
    });

    it('should use the configured default source system', () => {
      const gcjCtx = createCommandContext({ ...baseConfig, defaultSystem: 'GCJ02' }, () => undefined);
      const result = runConvertCommand('10', '10', { to: 'WGS84' }, gcjCtx);

      expect(result.data).toEqual({
        input: { longitude: 10, latitude: 10, system: 'GCJ02' },
        output: { longitude: 10, latitude: 10, system: 'WGS84' },
      });
    });

    it('should reject unknown systems and bad coordinates', () => {
      expect(() => runConvertCommand('1', '2', { to: 'utm' }, ctx)).toThrow(InvalidCoordinateError);
      expect(() => runConvertCommand('200', '2', { to: 'BD09' }, ctx)).toThrow(
        'Invalid longitude "200": must be within [-180, 180]'
      );
    });
  });

  describe('distance', () => {
    it('should print meters by default', () => {
      const result = runDistanceCommand(['0', '0', '1', '0'], {}, ctx);

      expect(result.text).toBe('111319.491 m');
      expect(result.data).toMatchObject({ unit: 'm' });
    });

    it('should print kilometers on request', () => {
      expect(runDistanceCommand(['0', '0', '1', '0'], { unit: 'KM' }, ctx).text).toBe(
        '111.319491 km'
      );
    });

    it('should use the configured earth radius', () => {
      const meanCtx = createCommandContext(
        { ...baseConfig, engine: { ...DEFAULT_ENGINE_CONFIG, earthRadius: 'mean' } },
        () => undefined
      );

      expect(runDistanceCommand(['0', '0', '1', '0'], {}, meanCtx).text).toBe('111195.08 m');
    });

    it('should reject unknown units', () => {
      expect(() => runDistanceCommand(['0', '0', '1', '0'], { unit: 'mi' }, ctx)).toThrow(
        'Unit must be "m" or "km", got "mi"'
      );
    });
  });

  describe('circle', () => {
    it('should include points on the circle', () => {
      const inside = runCircleCommand('1', '0', { center: '0,0', radius: '111320' }, ctx);
      const outside = runCircleCommand('1', '0', { center: '0,0', radius: '111319' }, ctx);

      expect(inside.text).toBe('inside (111319.491 m from center)');
      expect(inside.data).toMatchObject({ inside: true, radiusMeters: 111320 });
      expect(outside.text).toBe('outside (111319.491 m from center)');
    });

    it('should reject negative radii', () => {
      expect(() => runCircleCommand('1', '0', { center: '0,0', radius: '-5' }, ctx)).toThrow(InputError);
    });
  });

  describe('contains', () => {
    it('should report containment and its decision path', () => {
      const polygon = fixture('unit-square.json');

      expect(runContainsCommand('0.5', '0.5', { polygon }, ctx).text).toBe('inside (ray-cast)');
      expect(runContainsCommand('0.5', '0', { polygon }, ctx).text).toBe('inside (on-boundary)');
      expect(runContainsCommand('2', '2', { polygon }, ctx).data).toEqual({
        contained: false,
        path: 'outside-bbox',
      });
    });

    it('should read GeoJSON features', () => {
      const polygon = fixture('l-shape.geojson');

      expect(runContainsCommand('1.5', '1.5', { polygon }, ctx).text).toBe('outside (ray-cast)');
      expect(runContainsCommand('0.5', '1.5', { polygon, system: 'gcj02' }, ctx).text).toBe(
        'inside (ray-cast)'
      );
    });

    it('should log the decision at debug level when verbose', () => {
      const verboseCtx = createCommandContext({ ...baseConfig, verbose: true, json: true }, (line) =>
        lines.push(line)
      );

      runContainsCommand('0.5', '0.5', { polygon: fixture('unit-square.json') }, verboseCtx);

      const entries = lines.map((line) => JSON.parse(line));
      expect(entries).toContainEqual(
        expect.objectContaining({ level: 'debug', message: 'Containment decided', path: 'ray-cast', vertices: 4 })
      );
    });

    it('should not log debug entries otherwise', () => {
      runContainsCommand('0.5', '0.5', { polygon: fixture('unit-square.json') }, ctx);

      expect(lines).toEqual([]);
    });
  });
});

describe('exitCodeFor', () => {
  it('should map errors to exit codes', () => {
    expect(exitCodeFor(new InvalidCoordinateError('latitude', 95, 'out of range'))).toBe(
      EXIT_CODES.INVALID_INPUT
    );
    expect(exitCodeFor(new InputError('bad radius'))).toBe(2);
    expect(exitCodeFor(new ConfigurationError('bad file'))).toBe(3);
    expect(exitCodeFor(new Error('boom'))).toBe(EXIT_CODES.ERRORS);
  });
});
