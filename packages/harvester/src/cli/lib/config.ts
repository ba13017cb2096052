/**
 * geo-harvest CLI Configuration
 *
 * Loads configuration from .geo-harvestrc (YAML or JSON) with environment
 * variable overrides and defaults matching the public endpoints.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (GEO_HARVEST_*)
 * 3. Config file (.geo-harvestrc or --config path)
 * 4. Default values
 *
 * Credentials are never read from the config file, only from ONEMAP_TOKEN and
 * HF_TOKEN.
 *
 * @module cli/lib/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigValidationError } from '../../core/errors.js';
import { UPLOAD_TOKEN_ENV } from '../../export/hub-uploader.js';

export const SEARCH_TOKEN_ENV = 'ONEMAP_TOKEN';

const ENV_PREFIX = 'GEO_HARVEST_';

// ============================================================================
// Configuration Types
// ============================================================================

export interface SearchServiceConfig {
  readonly baseUrl: string;
  /** Send ONEMAP_TOKEN as the Authorization header */
  readonly useAuth: boolean;
  readonly maxAttempts: number;
  readonly backoffBaseMs: number;
  readonly backoffConstantMs: number;
}

export interface RateLimitSettings {
  readonly requestsPerSecond: number;
  readonly burst: number;
}

export interface OutputConfig {
  /** Directory the parquet files are written to */
  readonly dir: string;
  /** Upload written files to the dataset repository */
  readonly upload: boolean;
}

export interface Credentials {
  readonly searchToken?: string;
  readonly uploadToken?: string;
}

export interface HarvestConfig {
  readonly version: number;
  readonly search: SearchServiceConfig;
  readonly busStops: { readonly feedUrl: string };
  readonly rateLimit: RateLimitSettings;
  readonly dataset: { readonly repoId: string };
  readonly output: OutputConfig;
  /** Log a progress line every N completed postal codes */
  readonly progressInterval: number;
  readonly credentials: Credentials;

  // Runtime overrides
  readonly verbose: boolean;
  readonly json: boolean;
  /** Per-request timeout in milliseconds */
  readonly timeout: number;
  readonly concurrency: number;
  /** Resolved config file path */
  readonly configPath: string | null;
}

/**
 * Config file structure (YAML keys are snake_case)
 */
const ConfigFileSchema = z.object({
  version: z.number().optional(),
  search: z
    .object({
      base_url: z.string().optional(),
      use_auth: z.boolean().optional(),
      max_attempts: z.number().optional(),
      backoff_base_ms: z.number().optional(),
      backoff_constant_ms: z.number().optional(),
    })
    .optional(),
  bus_stops: z.object({ feed_url: z.string().optional() }).optional(),
  rate_limit: z
    .object({
      requests_per_second: z.number().optional(),
      burst: z.number().optional(),
    })
    .optional(),
  dataset: z.object({ repo_id: z.string().optional() }).optional(),
  output: z
    .object({
      dir: z.string().optional(),
      upload: z.boolean().optional(),
    })
    .optional(),
  defaults: z
    .object({
      timeout: z.number().optional(),
      concurrency: z.number().optional(),
      progress_interval: z.number().optional(),
    })
    .optional(),
});

type ConfigFile = z.infer<typeof ConfigFileSchema>;

const positiveInt = z.number().int().positive();

const HarvestConfigSchema = z.object({
  version: z.literal(1),
  search: z.object({
    baseUrl: z.string().url(),
    useAuth: z.boolean(),
    maxAttempts: positiveInt,
    backoffBaseMs: z.number().nonnegative(),
    backoffConstantMs: z.number().nonnegative(),
  }),
  busStops: z.object({ feedUrl: z.string().url() }),
  rateLimit: z.object({
    requestsPerSecond: z.number().positive(),
    burst: positiveInt,
  }),
  output: z.object({ dir: z.string().min(1), upload: z.boolean() }),
  progressInterval: positiveInt,
  timeout: positiveInt,
  concurrency: positiveInt.max(100),
});

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: Omit<
  HarvestConfig,
  'credentials' | 'verbose' | 'json' | 'configPath'
> = {
  version: 1,

  search: {
    baseUrl: 'https://www.onemap.gov.sg/api/common/elastic/search',
    useAuth: false,
    maxAttempts: 4,
    backoffBaseMs: 1000,
    backoffConstantMs: 2000,
  },

  busStops: {
    feedUrl: 'https://www.lta.gov.sg/map/busService/bus_stops.xml',
  },

  rateLimit: {
    requestsPerSecond: 6,
    burst: 6,
  },

  dataset: {
    repoId: '',
  },

  output: {
    dir: '.',
    upload: true,
  },

  progressInterval: 50,
  timeout: 20000,
  concurrency: 10,
};

// ============================================================================
// Configuration Loading
// ============================================================================

const CONFIG_FILE_NAMES = [
  '.geo-harvestrc',
  '.geo-harvestrc.yaml',
  '.geo-harvestrc.yml',
  '.geo-harvestrc.json',
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
 * Parse and shape-check a config file (YAML parser also accepts JSON)
 */
function parseConfigFile(filePath: string): ConfigFile {
  const raw: unknown = parseYaml(readFileSync(filePath, 'utf-8'));
  const result = ConfigFileSchema.safeParse(raw ?? {});

  if (!result.success) {
    throw new ConfigValidationError(formatIssues(result.error), filePath);
  }
  return result.data;
}

function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

type Env = Readonly<Record<string, string | undefined>>;

function getEnvVar(env: Env, name: string): string | undefined {
  const value = env[`${ENV_PREFIX}${name}`];
  return value === '' ? undefined : value;
}

function getEnvBool(env: Env, name: string): boolean | undefined {
  const value = getEnvVar(env, name);
  if (value === undefined) return undefined;
  return value.toLowerCase() === 'true' || value === '1';
}

function getEnvNumber(env: Env, name: string): number | undefined {
  const value = getEnvVar(env, name);
  if (value === undefined) return undefined;
  const num = Number(value);
  return Number.isNaN(num) ? undefined : num;
}

export interface ConfigOverrides {
  readonly verbose?: boolean;
  readonly json?: boolean;
  readonly timeout?: number;
  readonly concurrency?: number;
  readonly rate?: number;
  readonly outputDir?: string;
  readonly upload?: boolean;
}

export interface LoadConfigOptions {
  /** Explicit config file path */
  readonly configPath?: string;
  /** CLI flag overrides */
  readonly overrides?: ConfigOverrides;
  /** Defaults to process.env */
  readonly env?: Env;
  /** Directory the config file search starts from, defaults to process.cwd() */
  readonly cwd?: string;
}

/**
 * Load and merge configuration from all sources
 *
 * @throws ConfigValidationError when the file or the merged result is invalid
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<HarvestConfig> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const overrides = options.overrides ?? {};

  let configPath: string | null = null;
  let fileConfig: ConfigFile = {};

  const explicitPath = options.configPath ?? getEnvVar(env, 'CONFIG');
  if (explicitPath) {
    configPath = resolve(cwd, explicitPath);
    if (!existsSync(configPath)) {
      throw new ConfigValidationError([`config file not found: ${configPath}`]);
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    configPath = findConfigFile(cwd);
    if (configPath) {
      fileConfig = parseConfigFile(configPath);
    }
  }

  const requestsPerSecond =
    overrides.rate ??
    getEnvNumber(env, 'RATE') ??
    fileConfig.rate_limit?.requests_per_second ??
    DEFAULT_CONFIG.rateLimit.requestsPerSecond;

  const noUpload = getEnvBool(env, 'NO_UPLOAD');

  const config: HarvestConfig = {
    version: fileConfig.version ?? DEFAULT_CONFIG.version,

    search: {
      baseUrl:
        getEnvVar(env, 'SEARCH_URL') ?? fileConfig.search?.base_url ?? DEFAULT_CONFIG.search.baseUrl,
      useAuth:
        getEnvBool(env, 'USE_AUTH') ?? fileConfig.search?.use_auth ?? DEFAULT_CONFIG.search.useAuth,
      maxAttempts: fileConfig.search?.max_attempts ?? DEFAULT_CONFIG.search.maxAttempts,
      backoffBaseMs: fileConfig.search?.backoff_base_ms ?? DEFAULT_CONFIG.search.backoffBaseMs,
      backoffConstantMs:
        fileConfig.search?.backoff_constant_ms ?? DEFAULT_CONFIG.search.backoffConstantMs,
    },

    busStops: {
      feedUrl:
        getEnvVar(env, 'BUS_STOP_FEED_URL') ??
        fileConfig.bus_stops?.feed_url ??
        DEFAULT_CONFIG.busStops.feedUrl,
    },

    rateLimit: {
      requestsPerSecond,
      burst: fileConfig.rate_limit?.burst ?? Math.max(1, Math.ceil(requestsPerSecond)),
    },

    dataset: {
      repoId:
        getEnvVar(env, 'DATASET_REPO') ?? fileConfig.dataset?.repo_id ?? DEFAULT_CONFIG.dataset.repoId,
    },

    output: {
      dir:
        overrides.outputDir ??
        getEnvVar(env, 'OUTPUT_DIR') ??
        fileConfig.output?.dir ??
        DEFAULT_CONFIG.output.dir,
      upload:
        overrides.upload ??
        (noUpload !== undefined ? !noUpload : undefined) ??
        fileConfig.output?.upload ??
        DEFAULT_CONFIG.output.upload,
    },

    progressInterval:
      fileConfig.defaults?.progress_interval ?? DEFAULT_CONFIG.progressInterval,

    credentials: {
      searchToken: env[SEARCH_TOKEN_ENV] || undefined,
      uploadToken: env[UPLOAD_TOKEN_ENV] || undefined,
    },

    verbose: overrides.verbose ?? getEnvBool(env, 'VERBOSE') ?? false,
    json: overrides.json ?? getEnvBool(env, 'JSON') ?? false,
    timeout:
      overrides.timeout ??
      getEnvNumber(env, 'TIMEOUT') ??
      fileConfig.defaults?.timeout ??
      DEFAULT_CONFIG.timeout,
    concurrency:
      overrides.concurrency ??
      getEnvNumber(env, 'CONCURRENCY') ??
      fileConfig.defaults?.concurrency ??
      DEFAULT_CONFIG.concurrency,
    configPath,
  };

  validateConfig(config);
  return config;
}

/**
 * Validate a merged configuration
 *
 * @throws ConfigValidationError listing every invalid setting
 */
export function validateConfig(config: HarvestConfig): void {
  const issues: string[] = [];

  const result = HarvestConfigSchema.safeParse(config);
  if (!result.success) {
    issues.push(...formatIssues(result.error));
  }

  if (config.output.upload && config.dataset.repoId === '') {
    issues.push(
      `dataset.repoId: required when uploading (set dataset.repo_id or ${ENV_PREFIX}DATASET_REPO, or pass --no-upload)`
    );
  }
  if (config.output.upload && !config.credentials.uploadToken) {
    issues.push(
      `credentials.uploadToken: required when uploading (set ${UPLOAD_TOKEN_ENV}, or pass --no-upload)`
    );
  }

  if (issues.length > 0) {
    throw new ConfigValidationError(issues, config.configPath ?? undefined);
  }
}
