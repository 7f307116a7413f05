/**
 * Configuration loader for the AWS resource inventory.
 *
 * Merges built-in defaults, an optional YAML/JSON file, AWS_SCANNER_*
 * environment variables and CLI overrides (in that order of precedence),
 * validates the result and freezes it.
 */

import { readFile } from 'fs/promises';
import { LRUCache } from 'lru-cache';
import yaml from 'js-yaml';
import { z } from 'zod';
import type { ScannerConfig } from '@shared/types';
import { setupLogger } from '@shared/utils/logger';

const logger = setupLogger('aws-inventory:config');

export const DEFAULT_CONFIG_PATH = 'aws-scanner.yaml';
export const CONFIG_PATH_ENV = 'AWS_SCANNER_CONFIG';
const ENV_PREFIX = 'AWS_SCANNER_';

export const DEFAULT_CONFIG: ScannerConfig = Object.freeze({
  max_concurrent_regions: 10,
  max_concurrent_services: 5,
  max_retries: 3,
  retry_delay: 1.0,
  retry_backoff: 2.0,
  requests_per_second: 10,
  request_timeout: 30,
  skip_regions: Object.freeze([]),
  only_regions: Object.freeze([]),
  skip_services: Object.freeze([]),
  only_services: Object.freeze([]),
  report_format: 'markdown',
  report_path: 'aws-resources-report.md',
  log_level: 'info',
});

const NameListSchema = z.array(z.string().min(1));

/**
 * Configuration schema validation using Zod.
 *
 * Bounds keep the services x regions fan-out within what one account can
 * reasonably sustain.
 */
export const ConfigSchema = z
  .object({
    max_concurrent_regions: z.number().int().min(1).max(64),
    max_concurrent_services: z.number().int().min(1).max(32),
    max_retries: z.number().int().min(1).max(10),
    retry_delay: z.number().positive().max(60),
    retry_backoff: z.number().min(1).max(10),
    requests_per_second: z.number().positive().max(1000),
    request_timeout: z.number().positive().max(600),
    skip_regions: NameListSchema,
    only_regions: NameListSchema,
    skip_services: NameListSchema,
    only_services: NameListSchema,
    report_format: z.enum(['markdown', 'json', 'csv']),
    report_path: z.string().min(1),
    log_level: z.enum(['debug', 'info', 'warn', 'error', 'silent']),
  })
  .strict();

const PartialConfigSchema = ConfigSchema.partial();

export type PartialScannerConfig = z.infer<typeof PartialConfigSchema>;

type NumericKey =
  | 'max_concurrent_regions'
  | 'max_concurrent_services'
  | 'max_retries'
  | 'retry_delay'
  | 'retry_backoff'
  | 'requests_per_second'
  | 'request_timeout';

type ListKey = 'skip_regions' | 'only_regions' | 'skip_services' | 'only_services';

type TextKey = 'report_format' | 'report_path' | 'log_level';

const NUMERIC_KEYS: readonly NumericKey[] = [
  'max_concurrent_regions',
  'max_concurrent_services',
  'max_retries',
  'retry_delay',
  'retry_backoff',
  'requests_per_second',
  'request_timeout',
];

const LIST_KEYS: readonly ListKey[] = [
  'skip_regions',
  'only_regions',
  'skip_services',
  'only_services',
];

const TEXT_KEYS: readonly TextKey[] = ['report_format', 'report_path', 'log_level'];

/**
 * Base exception for configuration errors.
 */
export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/**
 * Raised when the configuration is missing required fields or is invalid.
 */
export class ConfigValidationError extends ConfigError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Parsed config files, keyed by path.
 */
const configCache = new LRUCache<string, PartialScannerConfig>({
  max: 32,
  ttl: 1000 * 60 * 5,
});

function describeIssues(error: z.ZodError): string {
  return error.errors
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

function parseWith<T extends z.ZodTypeAny>(schema: T, value: unknown, source: string): z.infer<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ConfigValidationError(
      `Configuration validation failed (${source}): ${describeIssues(result.error)}`,
      { cause: result.error }
    );
  }
  return result.data;
}

function isMissingFile(error: unknown): boolean {
  return (
    error !== null &&
    typeof error === 'object' &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}

/**
 * Split a comma-separated list, dropping blanks.
 */
export function parseList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Load a partial configuration from a YAML or JSON file.
 *
 * @param path - File path
 * @param options.required - Throw instead of returning `{}` when the file is missing
 * @returns Validated partial configuration
 *
 * @throws {ConfigError} If the file cannot be read or parsed
 * @throws {ConfigValidationError} If the file contents are invalid
 */
export async function loadConfigFile(
  path: string,
  options: { required?: boolean } = {}
): Promise<PartialScannerConfig> {
  const cached = configCache.get(path);
  if (cached) {
    logger.debug(`Using cached config for ${path}`);
    return cached;
  }

  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (error) {
    if (isMissingFile(error) && !options.required) {
      logger.info({ path }, 'No config file found, using defaults');
      return {};
    }
    throw new ConfigError(`Failed to read config file ${path}: ${String(error)}`, {
      cause: error,
    });
  }

  let document: unknown;
  try {
    document = yaml.load(raw);
  } catch (error) {
    throw new ConfigError(`Failed to parse config file ${path}: ${String(error)}`, {
      cause: error,
    });
  }

  const parsed = parseWith(PartialConfigSchema, document ?? {}, path);
  configCache.set(path, parsed);

  logger.info({ path }, 'Config file loaded');
  return parsed;
}

/**
 * Read AWS_SCANNER_* variables into a partial configuration.
 *
 * Numbers are parsed as floats; lists are comma-separated.
 *
 * @throws {ConfigValidationError} If a variable holds an invalid value
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): PartialScannerConfig {
  const values: Record<string, unknown> = {};

  for (const key of NUMERIC_KEYS) {
    const raw = env[`${ENV_PREFIX}${key.toUpperCase()}`];
    if (raw !== undefined && raw.trim() !== '') {
      values[key] = Number(raw);
    }
  }

  for (const key of LIST_KEYS) {
    const raw = env[`${ENV_PREFIX}${key.toUpperCase()}`];
    if (raw !== undefined) {
      values[key] = parseList(raw);
    }
  }

  for (const key of TEXT_KEYS) {
    const raw = env[`${ENV_PREFIX}${key.toUpperCase()}`];
    if (raw !== undefined && raw.trim() !== '') {
      values[key] = key === 'report_path' ? raw : raw.trim().toLowerCase();
    }
  }

  return parseWith(PartialConfigSchema, values, 'environment');
}

function withoutUndefined(overrides: Partial<ScannerConfig>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );
}

function freezeConfig(config: ScannerConfig): ScannerConfig {
  return Object.freeze({
    ...config,
    skip_regions: Object.freeze([...config.skip_regions]),
    only_regions: Object.freeze([...config.only_regions]),
    skip_services: Object.freeze([...config.skip_services]),
    only_services: Object.freeze([...config.only_services]),
  });
}

export interface ResolveConfigOptions {
  /**
   * Explicit config file. A missing explicit file is an error.
   */
  path?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: Partial<ScannerConfig>;
}

/**
 * Build the process-wide configuration.
 *
 * Precedence: defaults < file < environment < overrides.
 *
 * @throws {ConfigError} If the config file cannot be read or parsed
 * @throws {ConfigValidationError} If the merged configuration is invalid
 */
export async function resolveConfig(options: ResolveConfigOptions = {}): Promise<ScannerConfig> {
  const env = options.env ?? process.env;
  const explicitPath = options.path ?? env[CONFIG_PATH_ENV];
  const path = explicitPath ?? DEFAULT_CONFIG_PATH;

  const fromFile = await loadConfigFile(path, { required: explicitPath !== undefined });
  const fromEnv = loadConfigFromEnv(env);
  const fromOverrides = withoutUndefined(options.overrides ?? {});

  const merged = parseWith(
    ConfigSchema,
    { ...DEFAULT_CONFIG, ...fromFile, ...fromEnv, ...fromOverrides },
    'merged'
  );

  const config = freezeConfig(merged);
  logger.debug({ config }, 'Configuration resolved');
  return config;
}

/**
 * Clears the configuration cache.
 * Useful for testing or forcing a fresh config reload.
 */
export function clearConfigCache(): void {
  configCache.clear();
  logger.debug('Config cache cleared');
}
