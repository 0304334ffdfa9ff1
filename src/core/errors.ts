// ═══════════════════════════════════════════════════════════════════════════════
// RUNTIME ERRORS — Config, Cycle, Phase and Recovery Failures
// ═══════════════════════════════════════════════════════════════════════════════

import { PHASE_LABELS, type Phase } from '../types/module.js';

export type RuntimeErrorCode =
  | 'CONFIG_INVALID'
  | 'DEPENDENCY_CYCLE'
  | 'PHASE_FAILED'
  | 'RECOVERY_FAILED';

/**
 * Base class for every error the runtime raises.
 */
export abstract class RuntimeError extends Error {
  abstract readonly code: RuntimeErrorCode;
}

/**
 * Malformed descriptor, options or module layout.
 */
export class ConfigError extends RuntimeError {
  readonly name = 'ConfigError';
  readonly code = 'CONFIG_INVALID';
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Config validation failed: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

/**
 * Static or runtime-reentrant dependency cycle.
 */
export class CycleError extends RuntimeError {
  readonly name = 'CycleError';
  readonly code = 'DEPENDENCY_CYCLE';
  readonly members: readonly string[];

  constructor(members: readonly string[], message?: string) {
    super(message ?? `Dependency cycle detected involving: ${members.join(', ')}`);
    this.members = members;
  }
}

/**
 * A module's phase operation failed after exhausting retries.
 */
export class PhaseError extends RuntimeError {
  readonly name = 'PhaseError';
  readonly code = 'PHASE_FAILED';
  readonly moduleName: string;
  readonly phase: Phase;
  readonly attempts: number;
  readonly critical: boolean;

  constructor(options: {
    moduleName: string;
    phase: Phase;
    attempts: number;
    critical: boolean;
    cause: Error;
  }) {
    super(`${PHASE_LABELS[options.phase]} failed for ${options.moduleName}: ${options.cause.message}`);
    this.moduleName = options.moduleName;
    this.phase = options.phase;
    this.attempts = options.attempts;
    this.critical = options.critical;
    this.cause = options.cause;
  }
}

/**
 * A deferred recovery attempt failed on its single drain pass.
 */
export class QueueError extends RuntimeError {
  readonly name = 'QueueError';
  readonly code = 'RECOVERY_FAILED';
  readonly moduleName: string;
  readonly phase: Phase;

  constructor(moduleName: string, phase: Phase, cause: Error) {
    super(`Recovery failed for ${moduleName}: ${cause.message}`);
    this.moduleName = moduleName;
    this.phase = phase;
    this.cause = cause;
  }
}

export function isCriticalPhaseError(error: unknown): error is PhaseError {
  return error instanceof PhaseError && error.critical;
}
