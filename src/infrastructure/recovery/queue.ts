// ═══════════════════════════════════════════════════════════════════════════════
// RECOVERY QUEUE — Deferred Single-Pass Recovery Attempts
// ═══════════════════════════════════════════════════════════════════════════════
//
// Escalated retries can be captured here instead of running on timers. The
// queue is drained exactly once, after the Start phase: entries run in
// ascending priority (critical first), one at a time. Failed entries are
// reported and dropped.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { QueueError } from '../../core/errors.js';
import { getLogger } from '../../observability/logging/index.js';
import type { Phase, RetryOptions } from '../../types/module.js';
import { settle } from '../../types/result.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface QueueEntry {
  /** Lower runs first; critical modules use 1, others 5 */
  readonly priority: number;
  readonly moduleName: string;
  readonly phase: Phase;

  /** Attempts made before the entry was captured */
  readonly retryCount: number;

  readonly options: RetryOptions;
  readonly enqueuedAt: number;

  /** Single recovery attempt; rejects with QueueError on failure */
  readonly run: () => Promise<void>;
}

export interface DrainReport {
  readonly recovered: string[];
  readonly failed: string[];
}

export interface RecoveryQueueOptions {
  readonly reportError: (source: string, message: string) => void;
}

// ─────────────────────────────────────────────────────────────────────────────────
// QUEUE
// ─────────────────────────────────────────────────────────────────────────────────

export class RecoveryQueue {
  private readonly logger = getLogger({ component: 'recovery' });
  private readonly reportError: RecoveryQueueOptions['reportError'];
  private entries: QueueEntry[] = [];
  private drained = false;

  constructor(options: RecoveryQueueOptions) {
    this.reportError = options.reportError;
  }

  isAccepting(): boolean {
    return !this.drained;
  }

  get size(): number {
    return this.entries.length;
  }

  enqueue(entry: QueueEntry): void {
    if (this.drained) {
      this.logger.warn(`Recovery queue already drained; dropping ${entry.phase} for ${entry.moduleName}`);
      return;
    }
    this.entries.push(entry);
  }

  /**
   * Run every captured entry once. Later calls return an empty report.
   */
  async drain(): Promise<DrainReport> {
    if (this.drained) {
      return { recovered: [], failed: [] };
    }
    this.drained = true;

    // Array.prototype.sort is stable, so equal priorities keep enqueue order.
    const batch = [...this.entries].sort((a, b) => a.priority - b.priority);
    this.entries = [];

    const recovered: string[] = [];
    const failed: string[] = [];

    if (batch.length > 0) {
      this.logger.info(`Draining recovery queue (${batch.length} entries)`);
    }

    for (const entry of batch) {
      const result = await settle(entry.run);
      if (result.ok) {
        recovered.push(entry.moduleName);
        continue;
      }

      const error = result.error instanceof QueueError
        ? result.error
        : new QueueError(entry.moduleName, entry.phase, result.error);
      failed.push(entry.moduleName);
      this.logger.error(error.message, error.cause, {
        module: entry.moduleName,
        phase: entry.phase,
        attempts: entry.retryCount + 1,
      });
      this.reportError(entry.moduleName, error.message);
    }

    return { recovered, failed };
  }
}
