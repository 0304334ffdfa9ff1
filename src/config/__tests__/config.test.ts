// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION TESTS — Schema Validation, Defaults, Environment Overrides
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect } from 'vitest';
import { ConfigError } from '../../core/errors.js';
import {
  RuntimeConfigSchema,
  safeValidateRuntimeConfig,
  validateRuntimeConfig,
  formatConfigErrors,
} from '../schema.js';
import { DEFAULT_RETRY_BUCKETS } from '../defaults.js';
import { loadRuntimeConfig, mergeRetryBuckets } from '../index.js';

// ─────────────────────────────────────────────────────────────────────────────────
// SCHEMA TESTS
// ─────────────────────────────────────────────────────────────────────────────────

describe('Runtime Config Schema', () => {
  it('should fill defaults for an empty config', () => {
    const config = validateRuntimeConfig({});

    expect(config.side).toBe('server');
    expect(config.modules).toEqual({});
    expect(config.strictValidation).toBe(false);
    expect(config.useRecoveryQueue).toBe(false);
    expect(config.criticalBackgroundRetries).toBe(false);
    expect(config.allowDuplicates).toBe(false);
    expect(config.folderPaths).toEqual({ server: 'Systems', client: 'Core', shared: ['Managers'] });
  });

  it('should fill descriptor defaults', () => {
    const config = validateRuntimeConfig({ modules: { 'Data.Store': { location: 'server' } } });

    expect(config.modules['Data.Store']).toEqual({
      location: 'server',
      dependencies: [],
      critical: false,
      retry: {},
    });
  });

  it('should reject an unknown location', () => {
    const result = safeValidateRuntimeConfig({ modules: { A: { location: 'moon' } } });

    expect(result.success).toBe(false);
  });

  it('should reject maxAttempts below one with a path-prefixed message', () => {
    const result = RuntimeConfigSchema.safeParse({
      modules: { A: { location: 'server', retry: { init: { maxAttempts: 0 } } } },
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatConfigErrors(result.error)).toEqual([
        'modules.A.retry.init.maxAttempts: maxAttempts must be at least 1',
      ]);
    }
  });

  it('should reject unknown keys on a descriptor', () => {
    const result = safeValidateRuntimeConfig({
      modules: { A: { location: 'server', priority: 3 } },
    });

    expect(result.success).toBe(false);
  });

  it('should reject module names that are not dot paths', () => {
    expect(() => validateRuntimeConfig({ modules: { 'bad name': { location: 'server' } } })).toThrow();
  });

  it('should reject an unknown backoff strategy', () => {
    const result = safeValidateRuntimeConfig({ retry: { general: { backoffStrategy: 'linear' } } });

    expect(result.success).toBe(false);
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// BUCKET MERGING
// ─────────────────────────────────────────────────────────────────────────────────

describe('mergeRetryBuckets', () => {
  it('should merge per field within a bucket', () => {
    const merged = mergeRetryBuckets(
      { init: { initialDelayMs: 1000, maxAttempts: 5 } },
      { init: { maxAttempts: 2 } }
    );

    expect(merged).toEqual({ init: { initialDelayMs: 1000, maxAttempts: 2 } });
  });

  it('should keep buckets present on only one side', () => {
    const merged = mergeRetryBuckets({ start: { maxAttempts: 3 } }, { runtime: { jitter: true } });

    expect(merged).toEqual({ start: { maxAttempts: 3 }, runtime: { jitter: true } });
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// LOADING
// ─────────────────────────────────────────────────────────────────────────────────

describe('loadRuntimeConfig', () => {
  it('should layer input buckets over the built-in table', () => {
    const config = loadRuntimeConfig({ retry: { init: { maxAttempts: 2 } } }, {});

    expect(config.retry.init).toEqual({
      initialDelayMs: 1000,
      maxAttempts: 2,
      warn: true,
      jitter: false,
      backoffStrategy: 'exponential',
    });
    expect(config.retry.start).toEqual(DEFAULT_RETRY_BUCKETS.start);
    expect(config.retry.background?.maxAttempts).toBe(10);
  });

  it('should apply environment flag overrides', () => {
    const config = loadRuntimeConfig({}, {
      MODULE_RUNTIME_STRICT: 'true',
      MODULE_RUNTIME_RECOVERY_QUEUE: '1',
      MODULE_RUNTIME_CRITICAL_BACKGROUND: 'yes',
      MODULE_RUNTIME_ALLOW_DUPLICATES: 'TRUE',
      MODULE_RUNTIME_SIDE: 'client',
    });

    expect(config.strictValidation).toBe(true);
    expect(config.useRecoveryQueue).toBe(true);
    expect(config.criticalBackgroundRetries).toBe(true);
    expect(config.allowDuplicates).toBe(true);
    expect(config.side).toBe('client');
  });

  it('should let the environment turn a flag off', () => {
    const config = loadRuntimeConfig({ strictValidation: true }, { MODULE_RUNTIME_STRICT: 'false' });

    expect(config.strictValidation).toBe(false);
  });

  it('should ignore empty environment values', () => {
    const config = loadRuntimeConfig({ useRecoveryQueue: true }, { MODULE_RUNTIME_RECOVERY_QUEUE: '' });

    expect(config.useRecoveryQueue).toBe(true);
  });

  it('should reject an invalid side override', () => {
    expect(() => loadRuntimeConfig({}, { MODULE_RUNTIME_SIDE: 'edge' })).toThrow(ConfigError);
  });

  it('should throw ConfigError listing every issue', () => {
    let caught: unknown;
    try {
      loadRuntimeConfig({ modules: { A: { location: 'server', retry: { init: { maxAttempts: 0 } } } } }, {});
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.code).toBe('CONFIG_INVALID');
      expect(caught.issues).toEqual(['modules.A.retry.init.maxAttempts: maxAttempts must be at least 1']);
      expect(caught.message).toBe(
        'Config validation failed: modules.A.retry.init.maxAttempts: maxAttempts must be at least 1'
      );
    }
  });
});
