// ═══════════════════════════════════════════════════════════════════════════════
// MODULE RUNTIME — Public API
// ═══════════════════════════════════════════════════════════════════════════════

// Bootstrap
export {
  ModuleRuntime,
  type ModuleRuntimeOptions,
  type ModuleSources,
  type StartupSummary,
  type GlobalErrorHandler,
} from './core/orchestrator.js';

// Authoring
export { defineModule, defineGroup, type DefineModuleOptions } from './discovery/index.js';

// Core components
export { resolveOrder, type ResolveOptions } from './core/resolver.js';
export { ModuleLoader, runsOnSide, type ModuleLoaderOptions } from './core/loader.js';
export {
  LifecycleOrchestrator,
  type LifecycleOptions,
  type PhaseReport,
  type StepResult,
} from './core/lifecycle.js';
export {
  ModuleRegistry,
  canTransition,
  detectCapabilities,
  type EntrySnapshot,
  type RegisterOptions,
} from './core/registry.js';
export {
  validateModules,
  collectValidationIssues,
  type ValidationIssue,
  type ValidationCategory,
} from './core/validate.js';

// Errors
export {
  RuntimeError,
  ConfigError,
  CycleError,
  PhaseError,
  QueueError,
  isCriticalPhaseError,
  type RuntimeErrorCode,
} from './core/errors.js';

// Infrastructure
export { RetryEngine, calculateDelay, resolveRetryOptions, type RetryOutcome } from './infrastructure/retry/index.js';
export { RecoveryQueue, type QueueEntry, type DrainReport } from './infrastructure/recovery/index.js';
export { Signal, type Connection } from './infrastructure/signal/index.js';
export { CleanupScope, type CleanupResult } from './infrastructure/cleanup/index.js';

// Config
export {
  loadRuntimeConfig,
  RuntimeConfigSchema,
  type RuntimeConfig,
  type RuntimeConfigInput,
} from './config/index.js';

// Logging
export { configureLogger, getLogger, type ILogger, type LogLevel } from './observability/logging/index.js';

// Types
export type * from './types/module.js';
export { ok, err, type Result } from './types/result.js';
