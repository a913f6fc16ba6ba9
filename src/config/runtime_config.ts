/**
 * @fileoverview Runtime configuration
 *
 * Layers, lowest precedence first:
 *   1. schema defaults
 *   2. a YAML file
 *   3. LOOMWORK_* environment variables
 *   4. explicit overrides
 *
 * Layers are merged per section, then validated once. Every problem found
 * is listed in the thrown ConfigurationError.
 */

import { readFile } from 'node:fs/promises';
import YAML from 'yaml';
import { z } from 'zod';
import { ConfigurationError } from '../core/errors.js';
import { BACKOFF_STRATEGIES } from '../recovery/backoff.js';
import { LOG_LEVELS } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';

// ============================================================================
// SCHEMA
// ============================================================================

const positiveMs = z.number().finite().positive();
const nonNegativeMs = z.number().finite().nonnegative();

export const RetryConfigSchema = z
  .object({
    maxRetries: z.number().int().nonnegative().default(3),
    strategy: z.enum(BACKOFF_STRATEGIES).default('exponential'),
    baseDelayMs: nonNegativeMs.default(100),
    maxDelayMs: nonNegativeMs.default(10_000),
    jitter: z.boolean().default(true),
  })
  .strict()
  .refine((retry) => retry.baseDelayMs <= retry.maxDelayMs, {
    message: 'baseDelayMs must not exceed maxDelayMs',
    path: ['baseDelayMs'],
  });

export const RuntimeConfigSchema = z
  .object({
    logLevel: z.enum(LOG_LEVELS).default('warn'),
    retry: RetryConfigSchema.default({}),
    timeout: z.object({ timeoutMs: positiveMs.default(30_000) }).strict().default({}),
    cache: z
      .object({
        ttlMs: positiveMs.default(300_000),
        maxSize: z.number().int().positive().default(1000),
        singleFlight: z.boolean().default(true),
      })
      .strict()
      .default({}),
    circuitBreaker: z
      .object({
        failureThreshold: z.number().int().positive().default(5),
        recoveryTimeoutMs: positiveMs.default(60_000),
      })
      .strict()
      .default({}),
    memory: z
      .object({
        maxEntries: z.number().int().positive().default(10_000),
        windowMs: positiveMs.default(3_600_000),
      })
      .strict()
      .default({}),
  })
  .strict();

export type RuntimeConfig = z.output<typeof RuntimeConfigSchema>;
export type RuntimeConfigInput = z.input<typeof RuntimeConfigSchema>;

export const DEFAULT_RUNTIME_CONFIG: RuntimeConfig = RuntimeConfigSchema.parse({});

// ============================================================================
// ENVIRONMENT
// ============================================================================

export const ENV_PREFIX = 'LOOMWORK_';

type EnvKind = 'string' | 'number' | 'boolean';

/** Environment variable (without prefix) -> [section, field, kind]; section null for top-level. */
const ENV_BINDINGS: Record<string, [string | null, string, EnvKind]> = {
  LOG_LEVEL: [null, 'logLevel', 'string'],
  RETRY_MAX_RETRIES: ['retry', 'maxRetries', 'number'],
  RETRY_STRATEGY: ['retry', 'strategy', 'string'],
  RETRY_BASE_DELAY_MS: ['retry', 'baseDelayMs', 'number'],
  RETRY_MAX_DELAY_MS: ['retry', 'maxDelayMs', 'number'],
  RETRY_JITTER: ['retry', 'jitter', 'boolean'],
  TIMEOUT_MS: ['timeout', 'timeoutMs', 'number'],
  CACHE_TTL_MS: ['cache', 'ttlMs', 'number'],
  CACHE_MAX_SIZE: ['cache', 'maxSize', 'number'],
  CACHE_SINGLE_FLIGHT: ['cache', 'singleFlight', 'boolean'],
  CIRCUIT_FAILURE_THRESHOLD: ['circuitBreaker', 'failureThreshold', 'number'],
  CIRCUIT_RECOVERY_TIMEOUT_MS: ['circuitBreaker', 'recoveryTimeoutMs', 'number'],
  MEMORY_MAX_ENTRIES: ['memory', 'maxEntries', 'number'],
  MEMORY_WINDOW_MS: ['memory', 'windowMs', 'number'],
};

// Unparseable values are passed through as strings so validation reports them.
function coerceEnv(raw: string, kind: EnvKind): unknown {
  const value = raw.trim();
  if (kind === 'number') {
    const parsed = Number(value);
    return value.length > 0 && Number.isFinite(parsed) ? parsed : raw;
  }
  if (kind === 'boolean') {
    const lowered = value.toLowerCase();
    if (lowered === 'true' || lowered === '1') return true;
    if (lowered === 'false' || lowered === '0') return false;
    return raw;
  }
  return value;
}

export type Environment = Record<string, string | undefined>;

/** The configuration layer described by LOOMWORK_* variables. Empty values are ignored. */
export function readEnvConfig(env: Environment = process.env): Record<string, unknown> {
  const layer: Record<string, unknown> = {};
  for (const [name, [section, field, kind]] of Object.entries(ENV_BINDINGS)) {
    const raw = env[ENV_PREFIX + name];
    if (raw === undefined || raw.trim().length === 0) continue;
    const value = coerceEnv(raw, kind);
    if (section === null) {
      layer[field] = value;
      continue;
    }
    const existing = layer[section];
    const target: Record<string, unknown> = isRecord(existing) ? existing : {};
    target[field] = value;
    layer[section] = target;
  }
  return layer;
}

// ============================================================================
// RESOLUTION
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Later layers win; nested sections merge field by field. */
function mergeLayers(layers: readonly unknown[]): Record<string, unknown> {
  const merged: Record<string, unknown> = {};
  for (const layer of layers) {
    if (layer === undefined || layer === null) continue;
    if (!isRecord(layer)) {
      throw new ConfigurationError('Invalid runtime configuration', ['root: expected a mapping']);
    }
    for (const [key, value] of Object.entries(layer)) {
      const existing = merged[key];
      merged[key] = isRecord(existing) && isRecord(value) ? { ...existing, ...value } : value;
    }
  }
  return merged;
}

export interface ResolveConfigOptions {
  /** Parsed YAML document, if any */
  file?: unknown;
  env?: Environment;
  overrides?: RuntimeConfigInput;
}

export function resolveRuntimeConfig(options: ResolveConfigOptions = {}): RuntimeConfig {
  const merged = mergeLayers([options.file, readEnvConfig(options.env ?? process.env), options.overrides]);
  const parsed = RuntimeConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigurationError(
      'Invalid runtime configuration',
      parsed.error.errors.map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`),
    );
  }
  return parsed.data;
}

export function parseRuntimeConfigYaml(text: string, source = 'configuration'): unknown {
  try {
    return YAML.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Could not parse ${source} as YAML`, [getErrorMessage(error)]);
  }
}

export async function loadRuntimeConfigFile(
  path: string,
  options: Omit<ResolveConfigOptions, 'file'> = {},
): Promise<RuntimeConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Could not read configuration file ${path}`, [getErrorMessage(error)]);
  }
  return resolveRuntimeConfig({ ...options, file: parseRuntimeConfigYaml(text, path) });
}
