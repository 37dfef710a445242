/**
 * Restroom Finder CLI Configuration
 *
 * Loads configuration from .restroomrc (YAML or JSON) with environment
 * variable overrides and defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (RESTROOM_*)
 * 3. Config file (.restroomrc or --config path)
 * 4. Default values
 *
 * @module cli/lib/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { DEFAULT_CENTER, HOURS_LOOKUP_INTERVAL_MS } from '../../core/constants.js';
import type { GeoPoint } from '../../core/types.js';
import { DEFAULT_OVERPASS_ENDPOINT } from '../../enrichment/overpass-hours.js';
import { DEFAULT_NOMINATIM_ENDPOINT, DEFAULT_USER_AGENT } from '../../geocoding/nominatim.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface GeocoderConfig {
  readonly endpoint: string;
  readonly timeoutMs: number;
  /** Minimum spacing between geocoding requests */
  readonly minIntervalMs: number;
}

export interface OverpassConfig {
  readonly endpoint: string;
  readonly timeoutMs: number;
  /** Minimum spacing between hours lookups */
  readonly intervalMs: number;
}

export interface ServerConfig {
  readonly host: string;
  readonly port: number;
  readonly corsOrigins: readonly string[];
}

/**
 * Full CLI configuration
 */
export interface CLIConfig {
  /** SQLite database file */
  readonly databasePath: string;
  /** User-Agent sent to Nominatim and Overpass */
  readonly userAgent: string;
  readonly geocoder: GeocoderConfig;
  readonly overpass: OverpassConfig;
  readonly server: ServerConfig;
  /** Center for nearest queries without a usable point */
  readonly defaultCenter: GeoPoint;

  // Runtime overrides (from CLI flags)
  readonly verbose: boolean;
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

/**
 * Config file structure; snake_case keys, every section optional
 */
const ConfigFileSchema = z
  .object({
    database: z.object({ path: z.string().min(1).optional() }).optional(),
    user_agent: z.string().min(1).optional(),
    geocoder: z
      .object({
        endpoint: z.string().url().optional(),
        timeout_ms: z.number().int().positive().optional(),
        min_interval_ms: z.number().int().nonnegative().optional(),
      })
      .optional(),
    overpass: z
      .object({
        endpoint: z.string().url().optional(),
        timeout_ms: z.number().int().positive().optional(),
        interval_ms: z.number().int().nonnegative().optional(),
      })
      .optional(),
    server: z
      .object({
        host: z.string().min(1).optional(),
        port: z.number().int().min(0).max(65535).optional(),
        cors_origins: z.array(z.string()).optional(),
      })
      .optional(),
    default_center: z
      .object({
        lat: z.number().min(-90).max(90),
        lon: z.number().min(-180).max(180),
      })
      .optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * Error raised for unreadable or invalid configuration
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: Omit<CLIConfig, 'verbose' | 'json' | 'configPath'> = {
  databasePath: './restrooms.db',
  userAgent: DEFAULT_USER_AGENT,
  geocoder: {
    endpoint: DEFAULT_NOMINATIM_ENDPOINT,
    timeoutMs: 10_000,
    minIntervalMs: 1000,
  },
  overpass: {
    endpoint: DEFAULT_OVERPASS_ENDPOINT,
    timeoutMs: 5_000,
    intervalMs: HOURS_LOOKUP_INTERVAL_MS,
  },
  server: {
    host: '0.0.0.0',
    port: 8000,
    corsOrigins: ['*'],
  },
  defaultCenter: DEFAULT_CENTER,
};

// ============================================================================
// Configuration Loading
// ============================================================================

const CONFIG_FILE_NAMES = [
  '.restroomrc',
  '.restroomrc.yaml',
  '.restroomrc.yml',
  '.restroomrc.json',
];

/**
 * Find a config file in the directory or its parents
 */
function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Parse and validate config file content
 */
function parseConfigFile(filePath: string): ConfigFile {
  let raw: unknown;
  try {
    const content = readFileSync(filePath, 'utf-8');
    raw = filePath.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
  } catch (error) {
    throw new ConfigError(
      `Could not read config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  // An empty YAML document parses to null
  const parsed = ConfigFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config file ${filePath}: ${issues}`);
  }
  return parsed.data;
}

/**
 * Flag and env paths resolve against the working directory, file paths
 * against the config file's directory
 */
function resolveDatabasePath(
  runtimePath: string | undefined,
  filePath: string | undefined,
  cwd: string,
  baseDir: string
): string {
  const inMemory = (path: string): boolean => path === ':memory:';
  if (runtimePath) return inMemory(runtimePath) ? runtimePath : resolve(cwd, runtimePath);
  if (filePath) return inMemory(filePath) ? filePath : resolve(baseDir, filePath);
  return resolve(cwd, DEFAULT_CONFIG.databasePath);
}

type Env = Readonly<Record<string, string | undefined>>;

function envVar(env: Env, name: string): string | undefined {
  const value = env[`RESTROOM_${name}`];
  return value === undefined || value === '' ? undefined : value;
}

function envBool(env: Env, name: string): boolean | undefined {
  const value = envVar(env, name);
  if (value === undefined) return undefined;
  return value.toLowerCase() === 'true' || value === '1';
}

function envNumber(env: Env, name: string): number | undefined {
  const value = envVar(env, name);
  if (value === undefined) return undefined;
  const num = Number(value);
  if (!Number.isFinite(num)) {
    throw new ConfigError(`RESTROOM_${name} must be a number, got "${value}"`);
  }
  return num;
}

/**
 * Load configuration options
 */
export interface LoadConfigOptions {
  /** Explicit config file path */
  readonly configPath?: string;
  /** Directory to start the config file search from */
  readonly cwd?: string;
  /** Environment (defaults to process.env) */
  readonly env?: Env;
  /** CLI flag overrides */
  readonly overrides?: {
    readonly verbose?: boolean;
    readonly json?: boolean;
    readonly databasePath?: string;
    readonly port?: number;
    readonly host?: string;
  };
}

/**
 * Load and merge configuration from all sources
 *
 * @throws ConfigError when a file or variable is invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): CLIConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  let configPath: string | null = null;
  let file: ConfigFile = {};

  const explicitPath = options.configPath ?? envVar(env, 'CONFIG');
  if (explicitPath) {
    configPath = resolve(cwd, explicitPath);
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    file = parseConfigFile(configPath);
  } else {
    configPath = findConfigFile(cwd);
    if (configPath) {
      file = parseConfigFile(configPath);
    }
  }

  const baseDir = configPath ? dirname(configPath) : cwd;
  const overrides = options.overrides ?? {};

  const lat = envNumber(env, 'DEFAULT_LAT');
  const lon = envNumber(env, 'DEFAULT_LON');
  const envCenter = lat !== undefined && lon !== undefined ? { lat, lon } : undefined;

  const config: CLIConfig = {
    databasePath: resolveDatabasePath(
      overrides.databasePath ?? envVar(env, 'DB_PATH'),
      file.database?.path,
      cwd,
      baseDir
    ),
    userAgent: envVar(env, 'USER_AGENT') ?? file.user_agent ?? DEFAULT_CONFIG.userAgent,
    geocoder: {
      endpoint:
        envVar(env, 'GEOCODER_URL') ?? file.geocoder?.endpoint ?? DEFAULT_CONFIG.geocoder.endpoint,
      timeoutMs: file.geocoder?.timeout_ms ?? DEFAULT_CONFIG.geocoder.timeoutMs,
      minIntervalMs: file.geocoder?.min_interval_ms ?? DEFAULT_CONFIG.geocoder.minIntervalMs,
    },
    overpass: {
      endpoint:
        envVar(env, 'OVERPASS_URL') ?? file.overpass?.endpoint ?? DEFAULT_CONFIG.overpass.endpoint,
      timeoutMs: file.overpass?.timeout_ms ?? DEFAULT_CONFIG.overpass.timeoutMs,
      intervalMs: file.overpass?.interval_ms ?? DEFAULT_CONFIG.overpass.intervalMs,
    },
    server: {
      host: overrides.host ?? envVar(env, 'HOST') ?? file.server?.host ?? DEFAULT_CONFIG.server.host,
      port: overrides.port ?? envNumber(env, 'PORT') ?? file.server?.port ?? DEFAULT_CONFIG.server.port,
      corsOrigins: file.server?.cors_origins ?? DEFAULT_CONFIG.server.corsOrigins,
    },
    defaultCenter: envCenter ?? file.default_center ?? DEFAULT_CONFIG.defaultCenter,
    verbose: overrides.verbose ?? envBool(env, 'VERBOSE') ?? false,
    json: overrides.json ?? envBool(env, 'JSON') ?? false,
    configPath,
  };

  validateConfig(config);
  return config;
}

/**
 * Validate merged configuration
 *
 * @throws ConfigError if configuration is invalid
 */
export function validateConfig(config: CLIConfig): void {
  const { port } = config.server;
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(`Port must be an integer between 0 and 65535, got ${port}`);
  }

  const { lat, lon } = config.defaultCenter;
  if (lat < -90 || lat > 90 || lon < -180 || lon > 180) {
    throw new ConfigError(`Default center out of range (lat=${lat}, lon=${lon})`);
  }
}
