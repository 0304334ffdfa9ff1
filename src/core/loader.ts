// ═══════════════════════════════════════════════════════════════════════════════
// MODULE LOADER — Cached, Cycle-Guarded Instantiation
// ═══════════════════════════════════════════════════════════════════════════════
//
// Instantiates each module at most once per run. Instantiation goes through
// the retry engine; a module that loads late (background or recovery) gets
// the same bookkeeping as one that loads in the foreground.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { RetryEngine } from '../infrastructure/retry/engine.js';
import type { ErrorReporter } from '../infrastructure/retry/types.js';
import { getLogger } from '../observability/logging/index.js';
import type {
  LoadContext,
  ModuleDescriptor,
  ModuleLocation,
  RuntimeSide,
} from '../types/module.js';
import { CycleError, PhaseError } from './errors.js';
import type { ModuleRegistry } from './registry.js';

/**
 * Whether a module located at `location` runs on `side`.
 */
export function runsOnSide(location: ModuleLocation, side: RuntimeSide): boolean {
  return location === 'shared' || location === side;
}

export interface ModuleLoaderOptions {
  readonly registry: ModuleRegistry;
  readonly engine: RetryEngine;
  readonly side: RuntimeSide;
  readonly descriptorOf: (name: string) => ModuleDescriptor | undefined;
  readonly reportError: ErrorReporter;

  /** Called after every successful load; `late` is true for background or recovery loads */
  readonly onLoaded?: (name: string, value: unknown, late: boolean) => void;
}

export class ModuleLoader {
  private readonly logger = getLogger({ component: 'loader' });
  private readonly cache = new Map<string, unknown>();
  private readonly loading = new Set<string>();

  constructor(private readonly options: ModuleLoaderOptions) {}

  /**
   * Load a module, returning its value or `undefined` when it is absent,
   * skipped or failed.
   *
   * @throws CycleError when `name` is already being loaded further up the stack
   * @throws PhaseError for a critical module when `rethrowCritical` is set
   */
  async load(name: string, options: { rethrowCritical?: boolean } = {}): Promise<unknown> {
    const { registry, engine, side } = this.options;
    const entry = registry.get(name);
    if (!entry) {
      this.logger.warn(`Module ${name} is not registered; no retry attempted`, { module: name });
      return undefined;
    }

    if (this.cache.has(name)) {
      return this.cache.get(name);
    }

    if (this.loading.has(name)) {
      const chain = [...this.loading, name];
      const error = new CycleError(chain, `Circular load detected: ${chain.join(' -> ')}`);
      this.logger.warn(error.message, { module: name });
      this.options.reportError(name, error.message);
      throw error;
    }

    const descriptor = this.options.descriptorOf(name);
    if (descriptor && !runsOnSide(descriptor.location, side)) {
      this.logger.debug(`Skipping ${descriptor.location} module ${name} on ${side}`, { module: name });
      return undefined;
    }

    if (engine.isPending(name)) {
      this.logger.debug(`Load retry for ${name} still pending`, { module: name });
      return undefined;
    }

    this.loading.add(name);
    try {
      const outcome = await engine.execute({
        operation: () => this.instantiate(name),
        moduleName: name,
        phase: 'load',
        descriptor,
        onLateSuccess: (value) => this.commit(name, value, true),
      });

      if (outcome.status === 'fulfilled') {
        this.commit(name, outcome.value, false);
        return outcome.value;
      }
      return undefined;
    } catch (error) {
      if (error instanceof PhaseError && !options.rethrowCritical) {
        return undefined;
      }
      throw error;
    } finally {
      this.loading.delete(name);
    }
  }

  isCached(name: string): boolean {
    return this.cache.has(name);
  }

  isLoading(name: string): boolean {
    return this.loading.has(name);
  }

  /**
   * Drop every cached value.
   */
  clear(): void {
    this.cache.clear();
  }

  private async instantiate(name: string): Promise<unknown> {
    const entry = this.options.registry.get(name);
    if (!entry) {
      throw new Error(`Module ${name} was removed while loading`);
    }

    const context: LoadContext = {
      moduleName: name,
      side: this.options.side,
      require: (dependency) => this.load(dependency),
    };

    const value: unknown = await entry.handle.load(context);
    if (value === undefined) {
      throw new Error(`Module ${name} produced no value`);
    }
    return value;
  }

  private commit(name: string, value: unknown, late: boolean): void {
    if (this.cache.has(name)) return;
    this.cache.set(name, value);
    this.options.registry.markLoaded(name, value);
    this.logger.info(`Loaded ${name}`, { module: name, late });
    this.options.onLoaded?.(name, value, late);
  }
}
