// ═══════════════════════════════════════════════════════════════════════════════
// RETRY TYPES — Outcomes, Requests and Collaborator Interfaces
// ═══════════════════════════════════════════════════════════════════════════════

import type {
  ModuleDescriptor,
  Phase,
  RetryOptions,
  RetryOverrides,
} from '../../types/module.js';
import type { QueueEntry } from '../recovery/queue.js';

// ─────────────────────────────────────────────────────────────────────────────────
// OUTCOMES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * How a retried operation ended, from the caller's point of view.
 *
 * - `fulfilled`: the operation succeeded in the foreground
 * - `failed`: retries exhausted on a non-critical module
 * - `queued`: the next attempt was handed to the recovery queue
 * - `deferred`: retries continue detached on timers
 * - `cancelled`: the engine was disposed while waiting
 */
export type RetryOutcome<T> =
  | { readonly status: 'fulfilled'; readonly value: T; readonly attempts: number }
  | { readonly status: 'failed'; readonly error: Error; readonly attempts: number }
  | { readonly status: 'queued'; readonly attempts: number }
  | { readonly status: 'deferred'; readonly attempts: number }
  | { readonly status: 'cancelled'; readonly attempts: number };

export type RetryStatus = RetryOutcome<unknown>['status'];

// ─────────────────────────────────────────────────────────────────────────────────
// REQUEST
// ─────────────────────────────────────────────────────────────────────────────────

export interface RetryRequest<T> {
  /** Runs once per attempt; throwing or rejecting counts as failure */
  readonly operation: () => T | Promise<T>;

  readonly moduleName: string;
  readonly phase: Phase;

  /** Supplies the critical flag and per-module overrides */
  readonly descriptor?: ModuleDescriptor;

  /** Called after every failed attempt (1-based) */
  readonly onRetry?: (attempt: number, message: string) => void;

  /** Called when a detached or queued attempt succeeds */
  readonly onLateSuccess?: (value: T) => void | Promise<void>;
}

// ─────────────────────────────────────────────────────────────────────────────────
// COLLABORATORS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Records terminal failures on the module's registry entry.
 */
export interface FailureRecorder {
  markError(name: string, message: string): void;
  invokeFailureHook(name: string, message: string): Promise<void>;
}

/**
 * Accepts captured recovery attempts.
 */
export interface RecoverySink {
  isAccepting(): boolean;
  enqueue(entry: QueueEntry): void;
}

export type ErrorReporter = (source: string, message: string) => void;

export interface RetryEngineOptions {
  readonly recorder: FailureRecorder;
  readonly reportError: ErrorReporter;

  /** Bucket table, already merged over the built-in defaults */
  readonly buckets?: RetryOverrides;

  readonly queue?: RecoverySink;
  readonly useRecoveryQueue?: boolean;

  /** Let critical modules escalate to background timing */
  readonly criticalBackgroundRetries?: boolean;

  /** Source of randomness for jitter */
  readonly random?: () => number;
}

/**
 * Mutable bookkeeping for one attempt cycle.
 */
export interface AttemptState {
  attempts: number;

  /** Fixed when the cycle starts; escalation does not change it */
  readonly maxAttempts: number;

  options: RetryOptions;
  background: boolean;
  detached: boolean;

  /** Clears the pending mark of a detached cycle; safe to call twice */
  release?: () => void;
}
