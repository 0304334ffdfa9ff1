// ═══════════════════════════════════════════════════════════════════════════════
// RETRY MODULE INDEX — Retry Engine Exports
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export type {
  RetryOutcome,
  RetryStatus,
  RetryRequest,
  FailureRecorder,
  RecoverySink,
  ErrorReporter,
  RetryEngineOptions,
  AttemptState,
} from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// BACKOFF
// ─────────────────────────────────────────────────────────────────────────────────

export {
  MIN_RETRY_DELAY_MS,
  calculateDelay,
  formatDelay,
} from './backoff.js';

export { resolveRetryOptions } from './options.js';

// ─────────────────────────────────────────────────────────────────────────────────
// ENGINE
// ─────────────────────────────────────────────────────────────────────────────────

export {
  RetryEngine,
  isRetryableError,
} from './engine.js';
