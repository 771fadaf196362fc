/**
 * Taxi Tracker Configuration Management
 *
 * Loads configuration from .taxi-trackerrc (YAML) with environment variable
 * overrides and defaults. Credentials only come from the environment (or a
 * .env file beside the working directory), never from the config file.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (TAXI_TRACKER_*)
 * 3. Config file (.taxi-trackerrc or --config path)
 * 4. Default values
 *
 * @module cli/lib/config
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseDotenv } from 'dotenv';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError } from '../../core/errors.js';

// ============================================================================
// Configuration Types
// ============================================================================

export const OUTPUT_FORMATS = ['table', 'json', 'csv'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/**
 * External service configuration
 */
export interface ServiceConfig {
  readonly url: string;
  readonly timeout: number;
}

export interface PlanningAreaServiceConfig extends ServiceConfig {
  /** Boundary vintage published by OneMap */
  readonly year: number;
}

export interface ServicesConfig {
  readonly taxiAvailability: ServiceConfig;
  readonly planningAreas: PlanningAreaServiceConfig;
  readonly reverseGeocoding: ServiceConfig;
}

export interface Credentials {
  /** OneMap token (ONE_MAP_API_TOKEN) */
  readonly oneMapToken: string;
  /** data.gov.sg API key (DATA_SG_API) */
  readonly dataGovApiKey: string;
}

export interface ReportDefaults {
  readonly topK: number;
  readonly format: OutputFormat;
  /** Reverse-geocode the top areas */
  readonly describe: boolean;
  /** Parallel reverse-geocoding requests */
  readonly describeConcurrency: number;
  /** Retry attempts for transient HTTP failures */
  readonly retries: number;
}

export interface TrackerConfig {
  readonly credentials: Credentials;
  readonly services: ServicesConfig;
  readonly report: ReportDefaults;
  /** Resolved config file path */
  readonly configPath: string | null;
}

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: Omit<TrackerConfig, 'credentials' | 'configPath'> = {
  services: {
    taxiAvailability: {
      url: 'https://api.data.gov.sg/v1/transport/taxi-availability',
      timeout: 15000,
    },
    planningAreas: {
      url: 'https://www.onemap.gov.sg/api/public/popapi/getAllPlanningarea',
      year: 2019,
      timeout: 15000,
    },
    reverseGeocoding: {
      url: 'https://nominatim.openstreetmap.org/reverse',
      timeout: 20000,
    },
  },

  report: {
    topK: 10,
    format: 'table',
    describe: true,
    describeConcurrency: 2,
    retries: 2,
  },
};

// ============================================================================
// Schemas
// ============================================================================

const positiveInt = z.number().int().positive();

const serviceFileSchema = z
  .object({
    url: z.string().url().optional(),
    timeout: positiveInt.optional(),
  })
  .strict();

/**
 * Config file structure (YAML)
 */
const configFileSchema = z
  .object({
    services: z
      .object({
        taxi_availability: serviceFileSchema.optional(),
        planning_areas: serviceFileSchema.extend({ year: positiveInt.optional() }).strict().optional(),
        reverse_geocoding: serviceFileSchema.optional(),
      })
      .strict()
      .optional(),
    report: z
      .object({
        top_k: positiveInt.optional(),
        format: z.enum(OUTPUT_FORMATS).optional(),
        describe: z.boolean().optional(),
        describe_concurrency: positiveInt.optional(),
        retries: z.number().int().min(0).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof configFileSchema>;

const serviceSchema = z.object({
  url: z.string().url(),
  timeout: positiveInt,
});

/**
 * Final merged configuration
 */
const trackerConfigSchema = z.object({
  credentials: z.object({
    oneMapToken: z.string().min(1, 'ONE_MAP_API_TOKEN environment variable not set'),
    dataGovApiKey: z.string().min(1, 'DATA_SG_API environment variable not set'),
  }),
  services: z.object({
    taxiAvailability: serviceSchema,
    planningAreas: serviceSchema.extend({ year: z.number().int().min(1998).max(2100) }),
    reverseGeocoding: serviceSchema,
  }),
  report: z.object({
    topK: positiveInt,
    format: z.enum(OUTPUT_FORMATS),
    describe: z.boolean(),
    describeConcurrency: positiveInt,
    retries: z.number().int().min(0),
  }),
  configPath: z.string().nullable(),
});

// ============================================================================
// Configuration Loading
// ============================================================================

const CONFIG_FILE_NAMES = [
  '.taxi-trackerrc',
  '.taxi-trackerrc.yaml',
  '.taxi-trackerrc.yml',
  '.taxi-trackerrc.json',
];

/**
 * Find config file in the start directory or its parents
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

    const parent = resolve(dir, '..');
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

/**
 * Parse and validate config file content (YAML also covers JSON)
 */
function parseConfigFile(filePath: string): ConfigFile {
  const content = readFileSync(filePath, 'utf-8');

  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (error) {
    throw new ConfigError(
      `Config file ${filePath} is not valid YAML: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  // Empty file parses as null
  const parsed = configFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigError(`Invalid config file ${filePath}`, formatIssues(parsed.error));
  }

  return parsed.data;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

type Env = Readonly<Record<string, string | undefined>>;

function getEnvVar(env: Env, name: string): string | undefined {
  const value = env[`TAXI_TRACKER_${name}`];
  return value === '' ? undefined : value;
}

function invalidEnv(name: string, value: string, expected: string): ConfigError {
  const issue = `TAXI_TRACKER_${name}: expected ${expected}, got "${value}"`;
  return new ConfigError(`Invalid configuration: ${issue}`, [issue]);
}

function getEnvNumber(env: Env, name: string): number | undefined {
  const value = getEnvVar(env, name);
  if (value === undefined) return undefined;
  const num = Number(value);
  if (Number.isNaN(num)) {
    throw invalidEnv(name, value, 'a number');
  }
  return num;
}

function getEnvBool(env: Env, name: string): boolean | undefined {
  const value = getEnvVar(env, name);
  if (value === undefined) return undefined;
  switch (value.toLowerCase()) {
    case 'true':
    case '1':
      return true;
    case 'false':
    case '0':
      return false;
    default:
      throw invalidEnv(name, value, 'true, false, 1 or 0');
  }
}

function getEnvFormat(env: Env): OutputFormat | undefined {
  const value = getEnvVar(env, 'FORMAT');
  if (value === undefined) return undefined;
  const format = OUTPUT_FORMATS.find((candidate) => candidate === value);
  if (!format) {
    throw invalidEnv('FORMAT', value, OUTPUT_FORMATS.join(' | '));
  }
  return format;
}

/**
 * Merge .env file values under the real environment (real values win)
 */
function withDotenv(env: Env, dotenvPath: string | false): Env {
  if (dotenvPath === false || !existsSync(dotenvPath)) {
    return env;
  }
  return { ...parseDotenv(readFileSync(dotenvPath)), ...env };
}

export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Environment to read (default: process.env) */
  env?: Env;
  /** Directory to search for config and .env files (default: process.cwd()) */
  cwd?: string;
  /** .env file to load, or false to skip (default: <cwd>/.env) */
  dotenvPath?: string | false;
  /** CLI flag overrides */
  overrides?: {
    topK?: number;
    format?: OutputFormat;
    describe?: boolean;
    year?: number;
    timeout?: number;
  };
}

/**
 * Load and merge configuration from all sources
 *
 * @throws {ConfigError} If a credential is missing or a value is invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): TrackerConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = withDotenv(options.env ?? process.env, options.dotenvPath ?? join(cwd, '.env'));
  const overrides = options.overrides ?? {};

  let configPath: string | null = null;
  let fileConfig: ConfigFile = {};

  const explicitPath = options.configPath ?? getEnvVar(env, 'CONFIG');
  if (explicitPath) {
    configPath = resolve(cwd, explicitPath);
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    configPath = findConfigFile(cwd);
    if (configPath) {
      fileConfig = parseConfigFile(configPath);
    }
  }

  const fileServices = fileConfig.services;
  const fileReport = fileConfig.report;
  const defaults = DEFAULT_CONFIG;
  const timeoutOverride = overrides.timeout ?? getEnvNumber(env, 'TIMEOUT');

  const merged: TrackerConfig = {
    credentials: {
      oneMapToken: env.ONE_MAP_API_TOKEN ?? '',
      dataGovApiKey: env.DATA_SG_API ?? '',
    },

    services: {
      taxiAvailability: {
        url: fileServices?.taxi_availability?.url ?? defaults.services.taxiAvailability.url,
        timeout:
          timeoutOverride ??
          fileServices?.taxi_availability?.timeout ??
          defaults.services.taxiAvailability.timeout,
      },
      planningAreas: {
        url: fileServices?.planning_areas?.url ?? defaults.services.planningAreas.url,
        year:
          overrides.year ??
          getEnvNumber(env, 'PLANNING_AREA_YEAR') ??
          fileServices?.planning_areas?.year ??
          defaults.services.planningAreas.year,
        timeout:
          timeoutOverride ??
          fileServices?.planning_areas?.timeout ??
          defaults.services.planningAreas.timeout,
      },
      reverseGeocoding: {
        url: fileServices?.reverse_geocoding?.url ?? defaults.services.reverseGeocoding.url,
        timeout:
          timeoutOverride ??
          fileServices?.reverse_geocoding?.timeout ??
          defaults.services.reverseGeocoding.timeout,
      },
    },

    report: {
      topK: overrides.topK ?? getEnvNumber(env, 'TOP_K') ?? fileReport?.top_k ?? defaults.report.topK,
      format: overrides.format ?? getEnvFormat(env) ?? fileReport?.format ?? defaults.report.format,
      describe:
        overrides.describe ?? getEnvBool(env, 'DESCRIBE') ?? fileReport?.describe ?? defaults.report.describe,
      describeConcurrency:
        fileReport?.describe_concurrency ?? defaults.report.describeConcurrency,
      retries: getEnvNumber(env, 'RETRIES') ?? fileReport?.retries ?? defaults.report.retries,
    },

    configPath,
  };

  const validated = trackerConfigSchema.safeParse(merged);
  if (!validated.success) {
    const issues = formatIssues(validated.error);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  return validated.data;
}
