// ═══════════════════════════════════════════════════════════════════════════════
// RETRY ENGINE — Foreground Retries, Background Escalation, Deferred Recovery
// ═══════════════════════════════════════════════════════════════════════════════
//
// Each module operation runs in an attempt cycle:
// - The first attempt runs in the foreground; the caller waits.
// - After the first failure the cycle escalates to background timing (unless
//   the module is critical and critical background retries are off).
// - Escalated attempts go to the recovery queue when it is enabled, detach
//   onto timers for non-critical modules, or keep blocking for critical ones.
// - Exhausting the attempt budget marks the module as failed; critical
//   modules reject with PhaseError.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { ConfigError, CycleError, PhaseError, QueueError } from '../../core/errors.js';
import { getLogger } from '../../observability/logging/index.js';
import { PHASE_LABELS, type RetryOverrides } from '../../types/module.js';
import { settle } from '../../types/result.js';
import { calculateDelay, formatDelay } from './backoff.js';
import { resolveRetryOptions } from './options.js';
import type {
  AttemptState,
  ErrorReporter,
  FailureRecorder,
  RecoverySink,
  RetryEngineOptions,
  RetryOutcome,
  RetryRequest,
} from './types.js';

const CRITICAL_PRIORITY = 1;
const DEFAULT_PRIORITY = 5;

type Timer = ReturnType<typeof setTimeout>;

// ─────────────────────────────────────────────────────────────────────────────────
// RETRYABLE ERRORS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Cycles and config faults fail the same way on every attempt.
 */
export function isRetryableError(error: unknown): boolean {
  return !(error instanceof CycleError || error instanceof ConfigError);
}

// ─────────────────────────────────────────────────────────────────────────────────
// RETRY ENGINE
// ─────────────────────────────────────────────────────────────────────────────────

export class RetryEngine {
  private readonly logger = getLogger({ component: 'retry' });
  private readonly recorder: FailureRecorder;
  private readonly reportError: ErrorReporter;
  private readonly buckets: RetryOverrides;
  private readonly queue: RecoverySink | undefined;
  private readonly useRecoveryQueue: boolean;
  private readonly criticalBackgroundRetries: boolean;
  private readonly random: () => number;

  private readonly timers = new Map<Timer, () => void>();
  private readonly pending = new Map<string, number>();
  private readonly detachedRuns = new Set<Promise<void>>();
  private disposed = false;

  constructor(options: RetryEngineOptions) {
    this.recorder = options.recorder;
    this.reportError = options.reportError;
    this.buckets = options.buckets ?? {};
    this.queue = options.queue;
    this.useRecoveryQueue = options.useRecoveryQueue ?? false;
    this.criticalBackgroundRetries = options.criticalBackgroundRetries ?? false;
    this.random = options.random ?? Math.random;
  }

  /**
   * Run an operation with retries.
   *
   * @throws PhaseError when a critical module exhausts its attempts
   */
  async execute<T>(request: RetryRequest<T>): Promise<RetryOutcome<T>> {
    const options = resolveRetryOptions(this.buckets, request.phase, request.descriptor, false);
    return this.run(request, {
      attempts: 0,
      maxAttempts: options.maxAttempts,
      options,
      background: false,
      detached: false,
    });
  }

  /**
   * Whether a detached or queued retry for the module is still in flight.
   */
  isPending(moduleName: string): boolean {
    return (this.pending.get(moduleName) ?? 0) > 0;
  }

  /**
   * Resolves once every detached retry has finished.
   */
  async settled(): Promise<void> {
    while (this.detachedRuns.size > 0) {
      await Promise.allSettled([...this.detachedRuns]);
    }
  }

  /**
   * Cancel every pending wait. Cycles waiting on a timer end as `cancelled`;
   * the engine stays usable for new calls.
   */
  cancelPending(): void {
    for (const [timer, cancel] of this.timers) {
      clearTimeout(timer);
      cancel();
    }
    this.timers.clear();
  }

  /**
   * Cancel every pending wait and refuse further attempts.
   */
  dispose(): void {
    this.disposed = true;
    this.cancelPending();
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // ATTEMPT LOOP
  // ─────────────────────────────────────────────────────────────────────────────

  private async run<T>(request: RetryRequest<T>, state: AttemptState): Promise<RetryOutcome<T>> {
    const { moduleName, phase } = request;
    const critical = request.descriptor?.critical ?? false;

    for (;;) {
      if (this.disposed) {
        return { status: 'cancelled', attempts: state.attempts };
      }

      state.attempts += 1;
      if (state.attempts > 1) {
        this.logger.info(
          `Retry attempt ${state.attempts}/${state.maxAttempts} for ${phase} in ${moduleName}`,
          { module: moduleName, phase, background: state.background }
        );
      }

      const result = await settle(request.operation);
      if (result.ok) {
        if (state.detached) {
          state.release?.();
          await this.applyLateSuccess(request, result.value);
        }
        return { status: 'fulfilled', value: result.value, attempts: state.attempts };
      }

      const error = result.error;
      request.onRetry?.(state.attempts, error.message);

      if (state.options.warn) {
        const message = state.attempts === 1
          ? `Initial ${phase} failed for ${moduleName}: ${error.message}`
          : `Attempt ${state.attempts}/${state.maxAttempts} failed for ${phase} in ${moduleName}: ${error.message}`;
        this.logger.warn(message, { module: moduleName, phase, attempts: state.attempts });
      }

      if (state.attempts >= state.maxAttempts || !isRetryableError(error)) {
        return this.finalize(request, state, error, critical);
      }

      if (state.attempts === 1 && !state.background && (!critical || this.criticalBackgroundRetries)) {
        state.background = true;
        state.options = resolveRetryOptions(this.buckets, phase, request.descriptor, true);
      }

      const delayMs = calculateDelay(state.options, state.attempts, this.random);

      if (state.background && this.useRecoveryQueue && this.queue?.isAccepting()) {
        this.enqueue(this.queue, request, state, critical);
        return { status: 'queued', attempts: state.attempts };
      }

      if (state.background && !critical && !state.detached) {
        this.detach(request, state, delayMs);
        return { status: 'deferred', attempts: state.attempts };
      }

      this.logger.debug(`Waiting ${formatDelay(delayMs)} before next ${phase} attempt`, {
        module: moduleName,
        phase,
      });
      const proceed = await this.wait(delayMs);
      if (!proceed) {
        return { status: 'cancelled', attempts: state.attempts };
      }
    }
  }

  private async finalize<T>(
    request: RetryRequest<T>,
    state: AttemptState,
    error: Error,
    critical: boolean
  ): Promise<RetryOutcome<T>> {
    const { moduleName, phase } = request;

    this.recorder.markError(moduleName, error.message);
    await this.recorder.invokeFailureHook(moduleName, error.message);

    this.logger.error(`${PHASE_LABELS[phase]} failed for ${moduleName}`, error, {
      module: moduleName,
      phase,
      attempts: state.attempts,
      critical,
    });
    this.reportError(moduleName, `${PHASE_LABELS[phase]} failed for ${moduleName}: ${error.message}`);

    if (critical) {
      throw new PhaseError({
        moduleName,
        phase,
        attempts: state.attempts,
        critical,
        cause: error,
      });
    }
    return { status: 'failed', error, attempts: state.attempts };
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // DETACHED AND QUEUED ATTEMPTS
  // ─────────────────────────────────────────────────────────────────────────────

  private detach<T>(request: RetryRequest<T>, state: AttemptState, delayMs: number): void {
    const { moduleName, phase } = request;
    const release = this.track(moduleName);

    this.logger.debug(`Continuing ${phase} retries for ${moduleName} in background`, {
      module: moduleName,
      delay: formatDelay(delayMs),
    });

    const task: Promise<void> = this.wait(delayMs)
      .then(async (proceed) => {
        if (proceed) {
          await this.run(request, { ...state, detached: true, release });
        }
      })
      .catch((error: unknown) => {
        this.logger.error(`Background ${phase} retry for ${moduleName} ended abnormally`, error, {
          module: moduleName,
          phase,
        });
      })
      .finally(() => {
        release();
        this.detachedRuns.delete(task);
      });

    this.detachedRuns.add(task);
  }

  private enqueue<T>(
    queue: RecoverySink,
    request: RetryRequest<T>,
    state: AttemptState,
    critical: boolean
  ): void {
    const { moduleName, phase } = request;
    const release = this.track(moduleName);

    queue.enqueue({
      priority: critical ? CRITICAL_PRIORITY : DEFAULT_PRIORITY,
      moduleName,
      phase,
      retryCount: state.attempts,
      options: state.options,
      enqueuedAt: Date.now(),
      run: async () => {
        const result = await settle(request.operation);
        release();
        if (!result.ok) {
          this.recorder.markError(moduleName, result.error.message);
          await this.recorder.invokeFailureHook(moduleName, result.error.message);
          throw new QueueError(moduleName, phase, result.error);
        }
        await this.applyLateSuccess(request, result.value);
      },
    });

    this.logger.info(`Queued ${phase} recovery for ${moduleName}`, {
      module: moduleName,
      priority: critical ? CRITICAL_PRIORITY : DEFAULT_PRIORITY,
      retryCount: state.attempts,
    });
  }

  private async applyLateSuccess<T>(request: RetryRequest<T>, value: T): Promise<void> {
    const { moduleName, phase, onLateSuccess } = request;
    this.logger.info(`${PHASE_LABELS[phase]} recovered for ${moduleName}`, { module: moduleName, phase });
    if (!onLateSuccess) return;

    const result = await settle(() => onLateSuccess(value));
    if (!result.ok) {
      this.logger.error(`Late success handler failed for ${moduleName}`, result.error, {
        module: moduleName,
        phase,
      });
      this.reportError(moduleName, `${PHASE_LABELS[phase]} failed for ${moduleName}: ${result.error.message}`);
    }
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // TIMERS AND TRACKING
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Resolves `true` after the delay, or `false` if the engine is disposed first.
   */
  private wait(ms: number): Promise<boolean> {
    if (this.disposed) return Promise.resolve(false);
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.timers.delete(timer);
        resolve(true);
      }, ms);
      this.timers.set(timer, () => resolve(false));
    });
  }

  /**
   * Mark the module pending. The returned release is idempotent.
   */
  private track(moduleName: string): () => void {
    this.pending.set(moduleName, (this.pending.get(moduleName) ?? 0) + 1);
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.untrack(moduleName);
    };
  }

  private untrack(moduleName: string): void {
    const count = (this.pending.get(moduleName) ?? 0) - 1;
    if (count > 0) {
      this.pending.set(moduleName, count);
    } else {
      this.pending.delete(moduleName);
    }
  }
}
