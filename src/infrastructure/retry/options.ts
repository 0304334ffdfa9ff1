// ═══════════════════════════════════════════════════════════════════════════════
// EFFECTIVE OPTIONS — Layered Retry Option Resolution
// ═══════════════════════════════════════════════════════════════════════════════

import { DEFAULT_RETRY_OPTIONS } from '../../config/defaults.js';
import type {
  ModuleDescriptor,
  Phase,
  RetryOptions,
  RetryOverrides,
} from '../../types/module.js';

function layer(base: RetryOptions, patch: Partial<RetryOptions> | undefined): RetryOptions {
  if (!patch) return base;
  return {
    initialDelayMs: patch.initialDelayMs ?? base.initialDelayMs,
    maxAttempts: patch.maxAttempts ?? base.maxAttempts,
    warn: patch.warn ?? base.warn,
    jitter: patch.jitter ?? base.jitter,
    backoffStrategy: patch.backoffStrategy ?? base.backoffStrategy,
  };
}

/**
 * Resolve the options for one attempt cycle.
 *
 * Foreground: default < general < phase bucket < module general < module phase.
 * Background: default < general < background < module general < module
 * background < module phase. The background bucket stands in for the phase
 * bucket.
 */
export function resolveRetryOptions(
  buckets: RetryOverrides,
  phase: Phase,
  descriptor: ModuleDescriptor | undefined,
  background: boolean
): RetryOptions {
  const overrides = descriptor?.retry ?? {};
  const layers = background
    ? [buckets.general, buckets.background, overrides.general, overrides.background, overrides[phase]]
    : [buckets.general, buckets[phase], overrides.general, overrides[phase]];

  return layers.reduce<RetryOptions>(layer, DEFAULT_RETRY_OPTIONS);
}
