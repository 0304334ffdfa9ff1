// ═══════════════════════════════════════════════════════════════════════════════
// MODULE REGISTRY — Entries, State Transitions, Capabilities
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../observability/logging/index.js';
import type {
  FailureHook,
  LifecycleHook,
  ModuleCapabilities,
  ModuleDefinition,
  ModuleState,
  RegistryEntry,
} from '../types/module.js';
import { settle } from '../types/result.js';

// ─────────────────────────────────────────────────────────────────────────────────
// STATE MACHINE
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Forward transitions. Any state may move sideways to `error` via markError.
 */
const ALLOWED_TRANSITIONS: Record<ModuleState, readonly ModuleState[]> = {
  registered: ['loaded'],
  loaded: ['initialized'],
  initialized: ['started'],
  started: ['stopped'],
  stopped: [],
  error: ['loaded'],
};

export function canTransition(from: ModuleState, to: ModuleState): boolean {
  return to === 'error' || ALLOWED_TRANSITIONS[from].includes(to);
}

// ─────────────────────────────────────────────────────────────────────────────────
// CAPABILITIES
// ─────────────────────────────────────────────────────────────────────────────────

function isObjectLike(value: unknown): value is object {
  return (typeof value === 'object' && value !== null) || typeof value === 'function';
}

function bindHook(instance: object, key: 'init' | 'start' | 'stop'): LifecycleHook | undefined {
  if (!(key in instance)) return undefined;
  const member: unknown = Reflect.get(instance, key);
  return typeof member === 'function' ? () => member.call(instance) : undefined;
}

function bindFailureHook(instance: object): FailureHook | undefined {
  if (!('onError' in instance)) return undefined;
  const member: unknown = Reflect.get(instance, 'onError');
  return typeof member === 'function' ? (message) => member.call(instance, message) : undefined;
}

/**
 * Detect which lifecycle members a loaded value exposes, bound to it.
 */
export function detectCapabilities(instance: unknown): ModuleCapabilities {
  if (!isObjectLike(instance)) return {};
  return {
    init: bindHook(instance, 'init'),
    start: bindHook(instance, 'start'),
    stop: bindHook(instance, 'stop'),
    onError: bindFailureHook(instance),
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// REGISTRY
// ─────────────────────────────────────────────────────────────────────────────────

export interface RegisterOptions {
  /** Overwrite an existing entry instead of rejecting the duplicate */
  readonly allowDuplicates?: boolean;
}

export interface EntrySnapshot {
  readonly name: string;
  readonly state: ModuleState;
  readonly error?: string;
}

export class ModuleRegistry {
  private readonly logger = getLogger({ component: 'registry' });
  private readonly entries = new Map<string, RegistryEntry>();

  /**
   * Add a discovered module. Returns false when a duplicate was rejected.
   */
  register(name: string, handle: ModuleDefinition, options: RegisterOptions = {}): boolean {
    if (this.entries.has(name)) {
      if (!options.allowDuplicates) {
        this.logger.warn(`Duplicate module name ${name}; keeping the first registration`, { module: name });
        return false;
      }
      this.logger.warn(`Duplicate module name ${name}; overwriting`, { module: name });
    }
    this.entries.set(name, { name, handle, capabilities: {}, state: 'registered' });
    return true;
  }

  get(name: string): RegistryEntry | undefined {
    return this.entries.get(name);
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  names(): string[] {
    return [...this.entries.keys()];
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Record a successful instantiation.
   */
  markLoaded(name: string, instance: unknown): void {
    const entry = this.entries.get(name);
    if (!entry) return;
    if (!canTransition(entry.state, 'loaded')) {
      this.logger.warn(`Ignoring load of ${name} in state ${entry.state}`, { module: name });
      return;
    }
    entry.instance = instance;
    entry.capabilities = detectCapabilities(instance);
    entry.state = 'loaded';
    entry.error = undefined;
  }

  /**
   * Move an entry forward. Returns false if the move is not allowed.
   */
  transition(name: string, to: ModuleState): boolean {
    const entry = this.entries.get(name);
    if (!entry) return false;
    if (!canTransition(entry.state, to)) {
      this.logger.warn(`Invalid transition for ${name}: ${entry.state} -> ${to}`, { module: name });
      return false;
    }
    entry.state = to;
    if (to !== 'error') {
      entry.error = undefined;
    }
    return true;
  }

  markError(name: string, message: string): void {
    const entry = this.entries.get(name);
    if (!entry) return;
    entry.state = 'error';
    entry.error = message;
  }

  /**
   * Call the module's onError member, if it has one. Faults are logged.
   */
  async invokeFailureHook(name: string, message: string): Promise<void> {
    const hook = this.entries.get(name)?.capabilities.onError;
    if (!hook) return;
    const result = await settle(() => hook(message));
    if (!result.ok) {
      this.logger.error(`onError hook failed for ${name}`, result.error, { module: name });
    }
  }

  remove(name: string): boolean {
    return this.entries.delete(name);
  }

  clear(): void {
    this.entries.clear();
  }

  snapshot(): EntrySnapshot[] {
    return [...this.entries.values()].map(({ name, state, error }) =>
      error === undefined ? { name, state } : { name, state, error }
    );
  }
}
