// ═══════════════════════════════════════════════════════════════════════════════
// BACKOFF & OPTION RESOLUTION TESTS
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect } from 'vitest';
import { DEFAULT_RETRY_BUCKETS, DEFAULT_RETRY_OPTIONS } from '../../../config/defaults.js';
import type { ModuleDescriptor } from '../../../types/module.js';
import { calculateDelay, formatDelay, MIN_RETRY_DELAY_MS } from '../backoff.js';
import { resolveRetryOptions } from '../options.js';

// ─────────────────────────────────────────────────────────────────────────────────
// DELAYS
// ─────────────────────────────────────────────────────────────────────────────────

describe('calculateDelay', () => {
  const exponential = { initialDelayMs: 1000, backoffStrategy: 'exponential', jitter: false } as const;
  const fixed = { initialDelayMs: 1000, backoffStrategy: 'fixed', jitter: false } as const;

  it('should double the delay per attempt for exponential backoff', () => {
    expect(calculateDelay(exponential, 1)).toBe(1000);
    expect(calculateDelay(exponential, 2)).toBe(2000);
    expect(calculateDelay(exponential, 3)).toBe(4000);
  });

  it('should keep the base delay for fixed backoff', () => {
    expect(calculateDelay(fixed, 1)).toBe(1000);
    expect(calculateDelay(fixed, 4)).toBe(1000);
  });

  it('should apply jitter within ±10%', () => {
    const jittered = { ...exponential, jitter: true };

    expect(calculateDelay(jittered, 1, () => 0)).toBeCloseTo(900, 6);
    expect(calculateDelay(jittered, 1, () => 0.5)).toBeCloseTo(1000, 6);
    expect(calculateDelay(jittered, 1, () => 1)).toBeCloseTo(1100, 6);
    expect(calculateDelay(jittered, 2, () => 0.25)).toBeCloseTo(1900, 6);
  });

  it('should ignore the random source when jitter is off', () => {
    expect(calculateDelay(exponential, 1, () => 0)).toBe(1000);
  });

  it('should never go below the floor', () => {
    expect(MIN_RETRY_DELAY_MS).toBe(100);
    expect(calculateDelay({ ...fixed, initialDelayMs: 10 }, 1)).toBe(100);
    expect(calculateDelay({ ...exponential, initialDelayMs: 40 }, 2)).toBe(100);
    expect(calculateDelay({ ...exponential, initialDelayMs: 40 }, 3)).toBe(160);
  });
});

describe('formatDelay', () => {
  it('should format milliseconds, seconds and minutes', () => {
    expect(formatDelay(250)).toBe('250ms');
    expect(formatDelay(1500)).toBe('1.5s');
    expect(formatDelay(90000)).toBe('1.5m');
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// EFFECTIVE OPTIONS
// ─────────────────────────────────────────────────────────────────────────────────

function descriptor(retry: ModuleDescriptor['retry']): ModuleDescriptor {
  return { location: 'server', dependencies: [], critical: false, retry };
}

describe('resolveRetryOptions', () => {
  it('should fall back to the built-in defaults', () => {
    expect(resolveRetryOptions({}, 'init', undefined, false)).toEqual(DEFAULT_RETRY_OPTIONS);
  });

  it('should layer general, phase bucket, module general and module phase in the foreground', () => {
    const options = resolveRetryOptions(
      { general: { initialDelayMs: 500 }, init: { maxAttempts: 2, warn: false } },
      'init',
      descriptor({ general: { jitter: true, warn: true }, init: { backoffStrategy: 'fixed' } }),
      false
    );

    expect(options).toEqual({
      initialDelayMs: 500,
      maxAttempts: 2,
      warn: true,
      jitter: true,
      backoffStrategy: 'fixed',
    });
  });

  it('should ignore buckets of other phases', () => {
    const options = resolveRetryOptions({ start: { maxAttempts: 9 } }, 'init', undefined, false);

    expect(options.maxAttempts).toBe(5);
  });

  it('should replace the phase bucket with background once escalated', () => {
    const options = resolveRetryOptions(
      {
        general: { initialDelayMs: 500, maxAttempts: 4 },
        background: { initialDelayMs: 2000 },
        init: { backoffStrategy: 'fixed' },
      },
      'init',
      descriptor({ general: { jitter: true }, background: { warn: false } }),
      true
    );

    expect(options).toEqual({
      initialDelayMs: 2000,
      maxAttempts: 4,
      warn: false,
      jitter: true,
      backoffStrategy: 'exponential',
    });
  });

  it('should keep the module phase override on top once escalated', () => {
    const options = resolveRetryOptions(
      DEFAULT_RETRY_BUCKETS,
      'init',
      descriptor({
        background: { initialDelayMs: 700 },
        init: { initialDelayMs: 50, backoffStrategy: 'fixed' },
      }),
      true
    );

    expect(options).toEqual({
      initialDelayMs: 50,
      maxAttempts: 10,
      warn: true,
      jitter: true,
      backoffStrategy: 'fixed',
    });
  });
});
