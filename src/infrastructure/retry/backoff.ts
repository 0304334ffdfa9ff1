// ═══════════════════════════════════════════════════════════════════════════════
// BACKOFF — Exponential and Fixed Delays with Optional Jitter
// ═══════════════════════════════════════════════════════════════════════════════
//
// delay = initialDelayMs * 2^(attempt - 1)   (exponential)
// delay = initialDelayMs                     (fixed)
//
// Jitter multiplies the delay by a factor in [0.9, 1.1). The result is never
// shorter than MIN_RETRY_DELAY_MS.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { RetryOptions } from '../../types/module.js';

export const MIN_RETRY_DELAY_MS = 100;

const JITTER_SPREAD = 0.2;

/**
 * Delay before the next attempt, given how many attempts have been made.
 */
export function calculateDelay(
  options: Pick<RetryOptions, 'initialDelayMs' | 'backoffStrategy' | 'jitter'>,
  attempt: number,
  random: () => number = Math.random
): number {
  let delay = options.backoffStrategy === 'fixed'
    ? options.initialDelayMs
    : options.initialDelayMs * Math.pow(2, attempt - 1);

  if (options.jitter) {
    delay *= 1 - JITTER_SPREAD / 2 + random() * JITTER_SPREAD;
  }

  return Math.max(delay, MIN_RETRY_DELAY_MS);
}

/**
 * Format delay for logging.
 */
export function formatDelay(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  } else if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  } else {
    return `${(ms / 60000).toFixed(1)}m`;
  }
}
