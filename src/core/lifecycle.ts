// ═══════════════════════════════════════════════════════════════════════════════
// LIFECYCLE ORCHESTRATOR — Sequential Init / Start / Stop Phases
// ═══════════════════════════════════════════════════════════════════════════════

import type { RetryEngine } from '../infrastructure/retry/engine.js';
import type { ErrorReporter, RetryStatus } from '../infrastructure/retry/types.js';
import { getLogger } from '../observability/logging/index.js';
import {
  PHASE_LABELS,
  PHASE_PRECONDITION,
  PHASE_SUCCESS_STATE,
  type LifecyclePhase,
  type ModuleDescriptor,
} from '../types/module.js';
import { toError } from '../types/result.js';
import { isCriticalPhaseError, type PhaseError } from './errors.js';
import type { ModuleRegistry } from './registry.js';

export type StepResult = 'skipped' | 'completed' | Exclude<RetryStatus, 'fulfilled'>;

export interface PhaseReport {
  readonly phase: LifecyclePhase;
  readonly completed: string[];
  readonly failed: string[];
  readonly pending: string[];
  readonly skipped: string[];

  /** Critical failures collected when the phase does not abort on them */
  readonly criticalFailures: PhaseError[];
}

export interface LifecycleOptions {
  readonly registry: ModuleRegistry;
  readonly engine: RetryEngine;
  readonly descriptorOf: (name: string) => ModuleDescriptor | undefined;
  readonly reportError: ErrorReporter;

  /** A detached or queued phase call succeeded after the chain moved on */
  readonly onRecovered?: (name: string, phase: LifecyclePhase) => void | Promise<void>;
}

export class LifecycleOrchestrator {
  private readonly logger = getLogger({ component: 'lifecycle' });

  constructor(private readonly options: LifecycleOptions) {}

  /**
   * Run one phase for one module.
   *
   * @throws PhaseError when a critical module exhausts its attempts
   */
  async runStep(name: string, phase: LifecyclePhase): Promise<StepResult> {
    const { registry, engine } = this.options;
    const entry = registry.get(name);

    if (!entry || entry.instance === undefined) {
      this.logger.debug(`Skipping ${phase} for ${name} (not loaded)`, { module: name });
      return 'skipped';
    }
    if (entry.state !== PHASE_PRECONDITION[phase]) {
      this.logger.debug(`Skipping ${phase} for ${name} (state ${entry.state})`, { module: name });
      return 'skipped';
    }
    if (engine.isPending(name)) {
      this.logger.debug(`Skipping ${phase} for ${name} (retry pending)`, { module: name });
      return 'skipped';
    }

    const hook = entry.capabilities[phase];
    if (!hook) {
      // Nothing to call; the module still moves through the phase.
      registry.transition(name, PHASE_SUCCESS_STATE[phase]);
      return 'skipped';
    }

    const outcome = await engine.execute({
      operation: hook,
      moduleName: name,
      phase,
      descriptor: this.options.descriptorOf(name),
      onLateSuccess: () => this.complete(name, phase, true),
    });

    if (outcome.status === 'fulfilled') {
      await this.complete(name, phase, false);
      return 'completed';
    }
    return outcome.status;
  }

  /**
   * Run a phase across `order`, one module at a time.
   *
   * @throws PhaseError for a critical failure when `abortOnCritical` is set
   */
  async runPhase(
    order: readonly string[],
    phase: LifecyclePhase,
    options: { abortOnCritical?: boolean } = {}
  ): Promise<PhaseReport> {
    const abortOnCritical = options.abortOnCritical ?? true;
    const report: PhaseReport = {
      phase,
      completed: [],
      failed: [],
      pending: [],
      skipped: [],
      criticalFailures: [],
    };

    for (const name of order) {
      let result: StepResult;
      try {
        result = await this.runStep(name, phase);
      } catch (error) {
        if (isCriticalPhaseError(error) && abortOnCritical) {
          this.logger.error(`${PHASE_LABELS[phase]} aborted at critical module ${name}`, error, {
            module: name,
            phase,
          });
          throw error;
        }
        if (isCriticalPhaseError(error)) {
          report.criticalFailures.push(error);
        } else {
          const fault = toError(error);
          this.logger.error(`${PHASE_LABELS[phase]} chain fault at ${name}; continuing`, fault, {
            module: name,
            phase,
          });
          this.options.reportError(name, `${PHASE_LABELS[phase]} chain failed: ${fault.message}`);
        }
        result = 'failed';
      }

      switch (result) {
        case 'completed':
          report.completed.push(name);
          break;
        case 'failed':
          report.failed.push(name);
          break;
        case 'queued':
        case 'deferred':
          report.pending.push(name);
          break;
        case 'skipped':
        case 'cancelled':
          report.skipped.push(name);
          break;
      }
    }

    this.logger.info(`${PHASE_LABELS[phase]} phase finished`, {
      completed: report.completed.length,
      failed: report.failed.length,
      pending: report.pending.length,
      skipped: report.skipped.length,
    });
    return report;
  }

  private async complete(name: string, phase: LifecyclePhase, late: boolean): Promise<void> {
    if (!this.options.registry.transition(name, PHASE_SUCCESS_STATE[phase])) return;
    this.logger.info(`${PHASE_LABELS[phase]} completed for ${name}`, { module: name, late });
    if (late) {
      await this.options.onRecovered?.(name, phase);
    }
  }
}
