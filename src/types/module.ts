// ═══════════════════════════════════════════════════════════════════════════════
// MODULE TYPES — Phases, States, Descriptors, Capabilities
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// CORE LITERALS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Runtime side the process is running on.
 */
export type RuntimeSide = 'server' | 'client';

/**
 * Where a module is allowed to run.
 */
export type ModuleLocation = 'server' | 'client' | 'shared';

export type Phase = 'load' | 'init' | 'start' | 'stop' | 'runtime';

/**
 * Phases driven by the lifecycle orchestrator.
 */
export type LifecyclePhase = 'init' | 'start' | 'stop';

export type ModuleState =
  | 'registered'
  | 'loaded'
  | 'initialized'
  | 'started'
  | 'stopped'
  | 'error';

export const PHASE_LABELS: Record<Phase, string> = {
  load: 'Load',
  init: 'Init',
  start: 'Start',
  stop: 'Stop',
  runtime: 'Runtime',
};

/**
 * State a module must be in for a lifecycle phase to run.
 */
export const PHASE_PRECONDITION: Record<LifecyclePhase, ModuleState> = {
  init: 'loaded',
  start: 'initialized',
  stop: 'started',
};

/**
 * State a module moves to when a lifecycle phase succeeds.
 */
export const PHASE_SUCCESS_STATE: Record<LifecyclePhase, ModuleState> = {
  init: 'initialized',
  start: 'started',
  stop: 'stopped',
};

// ─────────────────────────────────────────────────────────────────────────────────
// RETRY OPTIONS
// ─────────────────────────────────────────────────────────────────────────────────

export type BackoffStrategy = 'exponential' | 'fixed';

/**
 * Effective retry options for one attempt cycle.
 */
export interface RetryOptions {
  /** Base delay before the first retry */
  readonly initialDelayMs: number;

  /** Total attempts including the first one */
  readonly maxAttempts: number;

  /** Log a warning for each failed attempt */
  readonly warn: boolean;

  /** Apply ±10% multiplicative jitter */
  readonly jitter: boolean;

  readonly backoffStrategy: BackoffStrategy;
}

/**
 * Buckets a retry override can target.
 */
export type RetryBucket = 'general' | 'background' | Phase;

export type RetryOverrides = Partial<Record<RetryBucket, Partial<RetryOptions>>>;

// ─────────────────────────────────────────────────────────────────────────────────
// DESCRIPTORS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Static description of a module, keyed by its dot-path name in config.
 */
export interface ModuleDescriptor {
  readonly location: ModuleLocation;
  readonly dependencies: readonly string[];
  readonly critical: boolean;
  readonly retry: RetryOverrides;
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOADABLE HANDLES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Handed to a module factory while it is being instantiated.
 */
export interface LoadContext {
  readonly moduleName: string;
  readonly side: RuntimeSide;

  /** Load another module through the runtime's cache */
  require(name: string): Promise<unknown>;
}

export type ModuleFactory = (context: LoadContext) => unknown;

/**
 * Opaque loadable handle for one module.
 */
export interface ModuleDefinition {
  readonly kind: 'module';
  readonly load: ModuleFactory;
  readonly disabled: boolean;
  readonly clientOnly: boolean;
}

/**
 * A named group of modules and nested groups.
 */
export interface ModuleGroup {
  readonly kind: 'group';
  readonly children: Readonly<Record<string, ModuleNode>>;
}

export type ModuleNode = ModuleDefinition | ModuleGroup;

// ─────────────────────────────────────────────────────────────────────────────────
// CAPABILITIES
// ─────────────────────────────────────────────────────────────────────────────────

export type LifecycleHook = () => unknown;
export type FailureHook = (message: string) => unknown;

/**
 * Capabilities a loaded module exposes. Presence is checked once, when the
 * module is loaded.
 */
export interface ModuleCapabilities {
  readonly init?: LifecycleHook;
  readonly start?: LifecycleHook;
  readonly stop?: LifecycleHook;
  readonly onError?: FailureHook;
}

/**
 * Shape module authors implement. Every member is optional.
 */
export interface LifecycleModule {
  init?(): unknown;
  start?(): unknown;
  stop?(): unknown;
  onError?(message: string): unknown;
}

// ─────────────────────────────────────────────────────────────────────────────────
// REGISTRY ENTRY
// ─────────────────────────────────────────────────────────────────────────────────

export interface RegistryEntry {
  readonly name: string;
  readonly handle: ModuleDefinition;
  instance?: unknown;
  capabilities: ModuleCapabilities;
  state: ModuleState;
  error?: string;
}
