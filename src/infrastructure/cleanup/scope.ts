// ═══════════════════════════════════════════════════════════════════════════════
// CLEANUP SCOPE — Prioritized Teardown Tasks
// ═══════════════════════════════════════════════════════════════════════════════
//
// Collects teardown tasks (signal subscriptions, timers, handles) and runs
// them on Stop:
// - Higher priority runs first; equal priorities run in registration order
// - Each task has a timeout
// - A failing task does not stop the others
//
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../../observability/logging/index.js';
import { toError } from '../../types/result.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Higher numbers run first.
 */
export type CleanupPriority = 'critical' | 'high' | 'normal' | 'low';

export const PRIORITY_VALUES: Record<CleanupPriority, number> = {
  critical: 100,
  high: 75,
  normal: 50,
  low: 25,
};

export type CleanupFn = () => Promise<void> | void;

export interface CleanupTask {
  readonly name: string;
  readonly fn: CleanupFn;
  readonly priority: CleanupPriority;

  /** 0 = scope default */
  readonly timeoutMs: number;
}

export interface CleanupTaskResult {
  readonly name: string;
  readonly success: boolean;
  readonly durationMs: number;
  readonly error?: Error;
  readonly timedOut?: boolean;
}

export interface CleanupResult {
  readonly success: boolean;
  readonly totalDurationMs: number;
  readonly tasks: CleanupTaskResult[];
  readonly failed: string[];
  readonly timedOut: string[];
}

export interface CleanupScopeOptions {
  readonly defaultTimeoutMs?: number;
}

class CleanupTimeoutError extends Error {
  readonly name = 'CleanupTimeoutError';

  constructor(taskName: string, timeoutMs: number) {
    super(`Cleanup task ${taskName} timed out after ${timeoutMs}ms`);
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// SCOPE
// ─────────────────────────────────────────────────────────────────────────────────

export class CleanupScope {
  private readonly logger = getLogger({ component: 'cleanup' });
  private readonly tasks: CleanupTask[] = [];
  private readonly defaultTimeoutMs: number;

  constructor(options: CleanupScopeOptions = {}) {
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? 5000;
  }

  /**
   * Register a task. Names need not be unique.
   */
  add(
    name: string,
    fn: CleanupFn,
    options?: { priority?: CleanupPriority; timeoutMs?: number }
  ): void {
    this.tasks.push({
      name,
      fn,
      priority: options?.priority ?? 'normal',
      timeoutMs: options?.timeoutMs ?? 0,
    });
  }

  get size(): number {
    return this.tasks.length;
  }

  /**
   * Run and remove every registered task.
   */
  async run(): Promise<CleanupResult> {
    const startTime = Date.now();
    const ordered = this.tasks
      .splice(0, this.tasks.length)
      .map((task, index) => ({ task, index }))
      .sort((a, b) =>
        PRIORITY_VALUES[b.task.priority] - PRIORITY_VALUES[a.task.priority] || a.index - b.index
      )
      .map(({ task }) => task);

    const results: CleanupTaskResult[] = [];
    for (const task of ordered) {
      results.push(await this.execute(task));
    }

    const failed = results.filter((r) => !r.success).map((r) => r.name);
    const timedOut = results.filter((r) => r.timedOut).map((r) => r.name);

    if (failed.length > 0) {
      this.logger.warn('Cleanup finished with failures', { failed, timedOut });
    } else {
      this.logger.debug('Cleanup finished', { tasks: results.length });
    }

    return {
      success: failed.length === 0,
      totalDurationMs: Date.now() - startTime,
      tasks: results,
      failed,
      timedOut,
    };
  }

  private async execute(task: CleanupTask): Promise<CleanupTaskResult> {
    const startTime = Date.now();
    const timeout = task.timeoutMs > 0 ? task.timeoutMs : this.defaultTimeoutMs;
    let timer: ReturnType<typeof setTimeout> | undefined;

    try {
      await Promise.race([
        Promise.resolve().then(task.fn),
        new Promise<never>((_, reject) => {
          timer = setTimeout(() => reject(new CleanupTimeoutError(task.name, timeout)), timeout);
        }),
      ]);
      return { name: task.name, success: true, durationMs: Date.now() - startTime };
    } catch (error) {
      const timedOut = error instanceof CleanupTimeoutError;
      this.logger.error('Cleanup task failed', error, { name: task.name, timedOut });
      return {
        name: task.name,
        success: false,
        durationMs: Date.now() - startTime,
        error: toError(error),
        timedOut,
      };
    } finally {
      clearTimeout(timer);
    }
  }
}
