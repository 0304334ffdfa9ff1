// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG MODULE — Runtime Config Loading, Environment Overrides, Retry Buckets
// ═══════════════════════════════════════════════════════════════════════════════

import { ConfigError } from '../core/errors.js';
import type { RetryBucket, RetryOverrides } from '../types/module.js';
import { DEFAULT_RETRY_BUCKETS } from './defaults.js';
import {
  RuntimeConfigSchema,
  RuntimeSideSchema,
  formatConfigErrors,
  type RuntimeConfig,
} from './schema.js';

// ─────────────────────────────────────────────────────────────────────────────────
// ENVIRONMENT HELPERS
// ─────────────────────────────────────────────────────────────────────────────────

type Env = Readonly<Record<string, string | undefined>>;

function envBool(env: Env, key: string, defaultValue: boolean): boolean {
  const value = env[key]?.toLowerCase();
  if (value === undefined || value === '') return defaultValue;
  return value === 'true' || value === '1' || value === 'yes';
}

function envString(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

// ─────────────────────────────────────────────────────────────────────────────────
// RETRY BUCKETS
// ─────────────────────────────────────────────────────────────────────────────────

const RETRY_BUCKETS: readonly RetryBucket[] = [
  'general',
  'background',
  'load',
  'init',
  'start',
  'stop',
  'runtime',
];

/**
 * Field-wise merge of two bucket tables; `override` wins per field.
 */
export function mergeRetryBuckets(base: RetryOverrides, override: RetryOverrides): RetryOverrides {
  const merged: RetryOverrides = {};
  for (const bucket of RETRY_BUCKETS) {
    const lower = base[bucket];
    const upper = override[bucket];
    if (lower || upper) {
      merged[bucket] = { ...lower, ...upper };
    }
  }
  return merged;
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOADING
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Validate raw config, layer it over the built-in retry buckets and apply
 * `MODULE_RUNTIME_*` environment overrides.
 *
 * @throws ConfigError when the input or an override is malformed
 */
export function loadRuntimeConfig(input: unknown = {}, env: Env = process.env): RuntimeConfig {
  const parsed = RuntimeConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(formatConfigErrors(parsed.error));
  }
  const config = parsed.data;

  let side = config.side;
  const sideOverride = envString(env, 'MODULE_RUNTIME_SIDE');
  if (sideOverride !== undefined) {
    const sideResult = RuntimeSideSchema.safeParse(sideOverride);
    if (!sideResult.success) {
      throw new ConfigError([`MODULE_RUNTIME_SIDE: expected 'server' or 'client', got '${sideOverride}'`]);
    }
    side = sideResult.data;
  }

  return {
    ...config,
    side,
    retry: mergeRetryBuckets(DEFAULT_RETRY_BUCKETS, config.retry),
    strictValidation: envBool(env, 'MODULE_RUNTIME_STRICT', config.strictValidation),
    useRecoveryQueue: envBool(env, 'MODULE_RUNTIME_RECOVERY_QUEUE', config.useRecoveryQueue),
    criticalBackgroundRetries: envBool(
      env,
      'MODULE_RUNTIME_CRITICAL_BACKGROUND',
      config.criticalBackgroundRetries
    ),
    allowDuplicates: envBool(env, 'MODULE_RUNTIME_ALLOW_DUPLICATES', config.allowDuplicates),
  };
}

export {
  RuntimeConfigSchema,
  ModuleDescriptorSchema,
  RetryOptionsSchema,
  RetryOverridesSchema,
  validateRuntimeConfig,
  safeValidateRuntimeConfig,
  formatConfigErrors,
  type RuntimeConfig,
  type RuntimeConfigInput,
  type ModuleDescriptorInput,
  type FolderPaths,
} from './schema.js';

export {
  DEFAULT_RETRY_OPTIONS,
  DEFAULT_RETRY_BUCKETS,
  DEFAULT_FOLDER_PATHS,
  DEFAULT_RUNTIME_FLAGS,
} from './defaults.js';
