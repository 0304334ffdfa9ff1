// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG DEFAULTS — Built-in Retry Buckets and Runtime Flags
// ═══════════════════════════════════════════════════════════════════════════════

import type { RetryBucket, RetryOptions } from '../types/module.js';

/**
 * Options used when no bucket or module override sets a field.
 */
export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  initialDelayMs: 1000,
  maxAttempts: 5,
  warn: true,
  jitter: false,
  backoffStrategy: 'exponential',
};

/**
 * Default bucket table. Start and stop use fixed delays.
 */
export const DEFAULT_RETRY_BUCKETS: Partial<Record<RetryBucket, Partial<RetryOptions>>> = {
  general: { ...DEFAULT_RETRY_OPTIONS },
  background: {
    initialDelayMs: 2000,
    maxAttempts: 10,
    warn: true,
    jitter: true,
    backoffStrategy: 'exponential',
  },
  init: {
    initialDelayMs: 1000,
    maxAttempts: 5,
    warn: true,
    jitter: false,
    backoffStrategy: 'exponential',
  },
  start: {
    initialDelayMs: 1000,
    maxAttempts: 3,
    warn: true,
    jitter: false,
    backoffStrategy: 'fixed',
  },
  stop: {
    initialDelayMs: 1000,
    maxAttempts: 3,
    warn: true,
    jitter: false,
    backoffStrategy: 'fixed',
  },
};

export const DEFAULT_FOLDER_PATHS = {
  server: 'Systems',
  client: 'Core',
  shared: ['Managers'],
};

export const DEFAULT_RUNTIME_FLAGS = {
  strictValidation: false,
  useRecoveryQueue: false,
  criticalBackgroundRetries: false,
  allowDuplicates: false,
};
