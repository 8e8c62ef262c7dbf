/**
 * geoshift CLI Configuration Management
 *
 * Loads configuration from .geoshiftrc (YAML or JSON) with environment
 * variable overrides and defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (GEOSHIFT_*)
 * 3. Config file (.geoshiftrc or --config path)
 * 4. Default values
 *
 * @module cli/lib/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

import {
  DEFAULT_ENGINE_CONFIG,
  EarthRadiusNameSchema,
  getEngineConfigFromEnv,
  SegmentToleranceSchema,
  type GeoEngineConfig,
} from '../../core/config.js';
import { ConfigurationError } from '../../core/errors.js';
import { CoordinateSystem, parseCoordinateSystem } from '../../core/types/coordinate-system.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface CLIConfig {
  /** Engine settings */
  readonly engine: GeoEngineConfig;

  /** Datum assumed for positional coordinates when --system is omitted */
  readonly defaultSystem: CoordinateSystem;

  /** Decimal places printed for coordinates */
  readonly precision: number;

  // Runtime overrides (from CLI flags)
  /** Enable verbose output */
  readonly verbose: boolean;
  /** Output as JSON */
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

/**
 * Config file structure
 */
const ConfigFileSchema = z
  .object({
    engine: z
      .object({
        earth_radius: EarthRadiusNameSchema.optional(),
        segment_tolerance: SegmentToleranceSchema.optional(),
      })
      .optional(),
    defaults: z
      .object({
        system: z.string().optional(),
        precision: z.number().int().min(0).max(15).optional(),
      })
      .optional(),
  })
  .passthrough();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

export const DEFAULT_CLI_CONFIG: Omit<CLIConfig, 'verbose' | 'json' | 'configPath'> = {
  engine: DEFAULT_ENGINE_CONFIG,
  defaultSystem: CoordinateSystem.WGS84,
  precision: 8,
};

// ============================================================================
// Configuration Loading
// ============================================================================

/**
 * Standard config file names to search for
 */
export const CONFIG_FILE_NAMES = [
  '.geoshiftrc',
  '.geoshiftrc.yaml',
  '.geoshiftrc.yml',
  '.geoshiftrc.json',
];

/**
 * Find config file in the start directory or its parents
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = resolve(dir, '..');
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

/**
 * Parse and validate config file content
 */
export function parseConfigFile(filePath: string): ConfigFile {
  let raw: unknown;
  try {
    const content = readFileSync(filePath, 'utf-8');
    // YAML is a superset of JSON, so one parser covers every file name
    raw = parseYaml(content) ?? {};
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      filePath
    );
  }

  const result = ConfigFileSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.errors[0];
    const where = issue?.path.join('.') || '(root)';
    throw new ConfigurationError(
      `Invalid config file ${filePath} at ${where}: ${issue?.message ?? 'invalid value'}`,
      filePath
    );
  }
  return result.data;
}

function resolveSystem(value: string | undefined, source: string): CoordinateSystem | undefined {
  if (value === undefined) return undefined;
  const system = parseCoordinateSystem(value);
  if (!system) {
    throw new ConfigurationError(
      `Unknown coordinate system "${value}" (expected WGS84, GCJ02 or BD09)`,
      source
    );
  }
  return system;
}

/**
 * Load configuration options
 */
export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Directory to start the config search from (default: cwd) */
  cwd?: string;
  /** Environment (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** CLI flag overrides */
  overrides?: {
    verbose?: boolean;
    json?: boolean;
    earthRadius?: string;
    tolerance?: number;
  };
}

/**
 * Load and merge configuration from all sources
 *
 * @throws ConfigurationError for missing or invalid configuration
 */
export function loadConfig(options: LoadConfigOptions = {}): CLIConfig {
  const env = options.env ?? process.env;
  let configPath: string | null = null;
  let fileConfig: ConfigFile = {};

  if (options.configPath) {
    configPath = resolve(options.cwd ?? process.cwd(), options.configPath);
    if (!existsSync(configPath)) {
      throw new ConfigurationError(`Config file not found: ${configPath}`, configPath);
    }
    fileConfig = parseConfigFile(configPath);
  } else if (env.GEOSHIFT_CONFIG) {
    configPath = resolve(options.cwd ?? process.cwd(), env.GEOSHIFT_CONFIG);
    if (existsSync(configPath)) {
      fileConfig = parseConfigFile(configPath);
    }
  } else {
    configPath = findConfigFile(options.cwd ?? process.cwd());
    if (configPath) {
      fileConfig = parseConfigFile(configPath);
    }
  }

  const envEngine = getEngineConfigFromEnv(env);

  let flagRadius: GeoEngineConfig['earthRadius'] | undefined;
  if (options.overrides?.earthRadius !== undefined) {
    const parsed = EarthRadiusNameSchema.safeParse(options.overrides.earthRadius.toLowerCase());
    if (!parsed.success) {
      throw new ConfigurationError(
        `--earth-radius must be 'equatorial' or 'mean', got "${options.overrides.earthRadius}"`,
        'flags'
      );
    }
    flagRadius = parsed.data;
  }

  let flagTolerance: number | undefined;
  if (options.overrides?.tolerance !== undefined) {
    const parsed = SegmentToleranceSchema.safeParse(options.overrides.tolerance);
    if (!parsed.success) {
      throw new ConfigurationError(
        `--tolerance must be a positive number, got ${options.overrides.tolerance}`,
        'flags'
      );
    }
    flagTolerance = parsed.data;
  }

  return {
    engine: {
      earthRadius:
        flagRadius ??
        envEngine.earthRadius ??
        fileConfig.engine?.earth_radius ??
        DEFAULT_CLI_CONFIG.engine.earthRadius,
      segmentTolerance:
        flagTolerance ??
        envEngine.segmentTolerance ??
        fileConfig.engine?.segment_tolerance ??
        DEFAULT_CLI_CONFIG.engine.segmentTolerance,
    },
    defaultSystem:
      resolveSystem(env.GEOSHIFT_DEFAULT_SYSTEM || undefined, 'env') ??
      resolveSystem(fileConfig.defaults?.system, configPath ?? 'file') ??
      DEFAULT_CLI_CONFIG.defaultSystem,
    precision: fileConfig.defaults?.precision ?? DEFAULT_CLI_CONFIG.precision,
    verbose: options.overrides?.verbose ?? false,
    json: options.overrides?.json ?? false,
    configPath,
  };
}
