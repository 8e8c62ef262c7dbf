#!/usr/bin/env node
/**
 * geoshift CLI Entry Point
 *
 * Datum conversion, distance, circle and polygon checks from the shell.
 * Negative coordinates must follow `--` so they are not read as options:
 *
 *   geoshift distance -- 151.2093 -33.8688 144.9631 -37.8136
 *
 * @module geoshift-cli
 */

import { Command } from 'commander';
import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

import { runCircleCommand, type CircleOptions } from '../src/cli/commands/circle.js';
import { runContainsCommand, type ContainsOptions } from '../src/cli/commands/contains.js';
import { runConvertCommand, type ConvertOptions } from '../src/cli/commands/convert.js';
import { runDistanceCommand, type DistanceOptions } from '../src/cli/commands/distance.js';
import { loadConfig } from '../src/cli/lib/config.js';
import {
  createCommandContext,
  type CommandContext,
  type CommandResult,
} from '../src/cli/lib/context.js';
import { EXIT_CODES, exitCodeFor } from '../src/cli/lib/exit-codes.js';
import { formatOutput } from '../src/cli/lib/output.js';

interface GlobalOptions {
  verbose?: boolean;
  json?: boolean;
  config?: string;
  earthRadius?: string;
  tolerance?: number;
}

// ============================================================================
// Global State
// ============================================================================

let globalContext: CommandContext | null = null;

function getGlobalContext(): CommandContext {
  if (!globalContext) {
    throw new Error('Global context not initialized');
  }
  return globalContext;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// CLI Setup
// ============================================================================

const PackageJsonSchema = z.object({ version: z.string() });

function getVersion(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  // bin/ when run from source, dist/bin/ once built
  for (const candidate of [join(here, '..', 'package.json'), join(here, '..', '..', 'package.json')]) {
    if (existsSync(candidate)) {
      const parsed = PackageJsonSchema.safeParse(JSON.parse(readFileSync(candidate, 'utf-8')));
      if (parsed.success) {
        return parsed.data.version;
      }
    }
  }
  return '0.0.0';
}

function execute(run: (ctx: CommandContext) => CommandResult): void {
  const ctx = getGlobalContext();
  try {
    const result = run(ctx);
    process.stdout.write(
      `${formatOutput(ctx.config.json ? 'json' : 'text', result.data, result.text)}\n`
    );
  } catch (error) {
    ctx.logger.error(errorMessage(error));
    process.exitCode = exitCodeFor(error);
  }
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('geoshift')
    .description('WGS84 / GCJ02 / BD09 coordinate transforms and point-in-region tests')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .geoshiftrc)')
    .option('--earth-radius <name>', 'Sphere radius for distances: equatorial|mean')
    .option('--tolerance <degrees>', 'On-edge tolerance for polygon tests', (value) => Number(value))
    .hook('preAction', (thisCommand) => {
      const options = thisCommand.opts<GlobalOptions>();
      try {
        const config = loadConfig({
          configPath: options.config,
          overrides: {
            verbose: options.verbose,
            json: options.json,
            earthRadius: options.earthRadius,
            tolerance: options.tolerance,
          },
        });
        globalContext = createCommandContext(config);
        globalContext.logger.debug('Configuration loaded', {
          configPath: config.configPath,
          earthRadius: config.engine.earthRadius,
          segmentTolerance: config.engine.segmentTolerance,
        });
      } catch (error) {
        console.error(`Configuration error: ${errorMessage(error)}`);
        process.exit(exitCodeFor(error));
      }
    });

  program
    .command('convert')
    .description('Convert a point between coordinate systems')
    .argument('<lon>', 'Longitude in degrees')
    .argument('<lat>', 'Latitude in degrees')
    .requiredOption('--to <system>', 'Target system: WGS84|GCJ02|BD09')
    .option('--from <system>', 'Source system (default: configured default, WGS84)')
    .action((lon: string, lat: string, options: ConvertOptions) => {
      execute((ctx) => runConvertCommand(lon, lat, options, ctx));
    });

  program
    .command('distance')
    .description('Great-circle distance between two points')
    .argument('<lon1>', 'First longitude')
    .argument('<lat1>', 'First latitude')
    .argument('<lon2>', 'Second longitude')
    .argument('<lat2>', 'Second latitude')
    .option('--system <system>', 'Datum of both points')
    .option('--unit <unit>', 'Output unit: m|km', 'm')
    .action((lon1: string, lat1: string, lon2: string, lat2: string, options: DistanceOptions) => {
      execute((ctx) => runDistanceCommand([lon1, lat1, lon2, lat2], options, ctx));
    });

  program
    .command('circle')
    .description('Check whether a point lies within a radius of a center')
    .argument('<lon>', 'Longitude in degrees')
    .argument('<lat>', 'Latitude in degrees')
    .requiredOption('--center <lon,lat>', 'Circle center')
    .requiredOption('--radius <meters>', 'Circle radius in meters')
    .option('--system <system>', 'Datum of the point and center')
    .action((lon: string, lat: string, options: CircleOptions) => {
      execute((ctx) => runCircleCommand(lon, lat, options, ctx));
    });

  program
    .command('contains')
    .description('Check whether a point lies inside or on a polygon')
    .argument('<lon>', 'Longitude in degrees')
    .argument('<lat>', 'Latitude in degrees')
    .requiredOption('--polygon <file>', 'JSON ring or GeoJSON Polygon file')
    .option('--system <system>', 'Datum of the point and polygon')
    .action((lon: string, lat: string, options: ContainsOptions) => {
      execute((ctx) => runContainsCommand(lon, lat, options, ctx));
    });

  return program;
}

// ============================================================================
// Main Entry Point
// ============================================================================

try {
  createProgram().parse(process.argv);
} catch (error) {
  console.error(`Error: ${errorMessage(error)}`);
  process.exit(EXIT_CODES.ERRORS);
}
