// ═══════════════════════════════════════════════════════════════════════════════
// MODULE RUNTIME — Discovery, Resolution and Lifecycle Bootstrap
// ═══════════════════════════════════════════════════════════════════════════════
//
// Startup:  discover -> validate -> resolve -> Load -> Init -> Start
//           -> drain recovery queue -> catch-up Init/Start
// Shutdown: Stop (reverse order) -> cancel retries -> cleanup scope
//
// One runtime per host. Every subordinate component receives it (or the
// pieces it owns) by reference.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { loadRuntimeConfig, type RuntimeConfig, type RuntimeConfigInput } from '../config/index.js';
import { buildModuleCache, collectModules, type ModuleCache } from '../discovery/index.js';
import { CleanupScope } from '../infrastructure/cleanup/index.js';
import { RecoveryQueue } from '../infrastructure/recovery/index.js';
import { RetryEngine } from '../infrastructure/retry/index.js';
import { Signal } from '../infrastructure/signal/index.js';
import { getLogger } from '../observability/logging/index.js';
import type {
  LifecyclePhase,
  ModuleDescriptor,
  ModuleGroup,
  ModuleState,
  RuntimeSide,
} from '../types/module.js';
import { settle, toError } from '../types/result.js';
import { ConfigError, PhaseError } from './errors.js';
import { LifecycleOrchestrator } from './lifecycle.js';
import { ModuleLoader } from './loader.js';
import { ModuleRegistry, type EntrySnapshot } from './registry.js';
import { resolveOrder } from './resolver.js';
import { validateModules } from './validate.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Root groups the runtime discovers modules from. The side roots are used on
 * their own side; shared roots are picked by `folderPaths.shared`.
 */
export interface ModuleSources {
  readonly server?: ModuleGroup;
  readonly client?: ModuleGroup;
  readonly shared?: Readonly<Record<string, ModuleGroup>>;
}

export type GlobalErrorHandler = (source: string, message: string, side: RuntimeSide) => void;

export interface ModuleRuntimeOptions {
  readonly config?: RuntimeConfigInput;
  readonly sources: ModuleSources;

  /** Overrides `config.side` */
  readonly side?: RuntimeSide;

  readonly onGlobalError?: GlobalErrorHandler;

  /** Environment for `MODULE_RUNTIME_*` overrides; defaults to process.env */
  readonly env?: Readonly<Record<string, string | undefined>>;

  /** Source of randomness for retry jitter */
  readonly random?: () => number;
}

export interface StartupSummary {
  readonly order: string[];
  readonly loaded: string[];
  readonly failed: string[];
  readonly pending: string[];
}

// ─────────────────────────────────────────────────────────────────────────────────
// RUNTIME
// ─────────────────────────────────────────────────────────────────────────────────

const STARTUP_PHASES: readonly LifecyclePhase[] = ['init', 'start'];

export class ModuleRuntime {
  readonly config: RuntimeConfig;
  readonly side: RuntimeSide;
  readonly registry = new ModuleRegistry();
  readonly cleanup = new CleanupScope();

  readonly moduleLoaded = new Signal<[name: string, value: unknown]>('moduleLoaded');
  readonly globalError = new Signal<[source: string, message: string, side: RuntimeSide]>('globalError');

  private readonly logger = getLogger({ component: 'runtime' });
  private readonly sources: ModuleSources;
  private readonly onGlobalError: GlobalErrorHandler | undefined;
  private readonly queue: RecoveryQueue;
  private readonly engine: RetryEngine;
  private readonly loader: ModuleLoader;
  private readonly lifecycle: LifecycleOrchestrator;

  private readonly caches: ModuleCache[] = [];
  private readonly catchUp = new Set<string>();
  private readonly advancing = new Set<Promise<void>>();
  private order: string[] = [];
  private startPromise: Promise<StartupSummary> | undefined;
  private stopPromise: Promise<void> | undefined;
  private starting = false;

  /**
   * @throws ConfigError when the config is malformed
   */
  constructor(options: ModuleRuntimeOptions) {
    this.config = loadRuntimeConfig(options.config ?? {}, options.env ?? process.env);
    this.side = options.side ?? this.config.side;
    this.sources = options.sources;
    this.onGlobalError = options.onGlobalError;

    const reportError = (source: string, message: string) => this.reportError(source, message);
    const descriptorOf = (name: string) => this.descriptorOf(name);

    this.queue = new RecoveryQueue({ reportError });
    this.engine = new RetryEngine({
      recorder: this.registry,
      reportError,
      buckets: this.config.retry,
      queue: this.queue,
      useRecoveryQueue: this.config.useRecoveryQueue,
      criticalBackgroundRetries: this.config.criticalBackgroundRetries,
      random: options.random,
    });
    this.loader = new ModuleLoader({
      registry: this.registry,
      engine: this.engine,
      side: this.side,
      descriptorOf,
      reportError,
      onLoaded: (name, value, late) => {
        this.moduleLoaded.fire(name, value);
        if (late) this.scheduleAdvance(name);
      },
    });
    this.lifecycle = new LifecycleOrchestrator({
      registry: this.registry,
      engine: this.engine,
      descriptorOf,
      reportError,
      onRecovered: (name) => this.scheduleAdvance(name),
    });

    this.cleanup.add('signals', () => {
      this.moduleLoaded.disconnectAll();
      this.globalError.disconnectAll();
    }, { priority: 'low' });
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // STARTUP
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Discover, load, initialize and start every module. Repeated calls return
   * the same promise.
   *
   * @throws PhaseError when a critical module fails
   * @throws ConfigError on invalid config under strict validation
   */
  start(): Promise<StartupSummary> {
    if (!this.startPromise) {
      this.startPromise = this.performStart();
    }
    return this.startPromise;
  }

  private async performStart(): Promise<StartupSummary> {
    this.starting = true;
    const startTime = Date.now();
    try {
      await this.discover();

      validateModules({
        modules: this.config.modules,
        side: this.side,
        isDiscovered: (name) => this.registry.has(name),
        strict: this.config.strictValidation,
        reportError: (source, message) => this.reportError(source, message),
      });

      const names = this.workingSet();
      const resolved = resolveOrder({
        names,
        dependenciesOf: (name) => this.descriptorOf(name)?.dependencies ?? [],
        isDeclared: (name) => name in this.config.modules,
        strict: this.config.strictValidation,
      });
      if (!resolved.ok) {
        this.reportError('resolver', `Dependency cycle in modules: ${resolved.error.members.join(', ')}`);
        this.order = [];
        return this.summary();
      }
      this.order = resolved.value;
      this.logger.info('Resolved module order', { order: this.order });

      await this.loadAll();
      await this.lifecycle.runPhase(this.order, 'init');
      await this.lifecycle.runPhase(this.order, 'start');

      const report = await this.queue.drain();
      if (report.recovered.length > 0 || report.failed.length > 0) {
        this.logger.info('Recovery queue drained', { ...report });
      }

      await this.runCatchUp();

      const summary = this.summary();
      this.logger.time('Startup complete', startTime, {
        loaded: summary.loaded.length,
        failed: summary.failed.length,
        pending: summary.pending.length,
      });
      return summary;
    } catch (error) {
      this.logger.error('Startup aborted', error);
      if (!(error instanceof PhaseError)) {
        this.reportError('runtime', `Startup failed: ${toError(error).message}`);
      }
      throw error;
    } finally {
      this.starting = false;
    }
  }

  private async discover(): Promise<void> {
    const { folderPaths, allowDuplicates } = this.config;
    const rootName = this.side === 'server' ? folderPaths.server : folderPaths.client;
    const root = this.side === 'server' ? this.sources.server : this.sources.client;
    if (!root) {
      throw new ConfigError([`${rootName} root missing on ${this.side}`]);
    }

    this.caches.push(buildModuleCache({
      root,
      rootName,
      location: this.side,
      side: this.side,
      registry: this.registry,
      allowDuplicates,
    }));

    const shared = await Promise.allSettled(
      folderPaths.shared.map(async (folderName) => {
        const group = this.sources.shared?.[folderName];
        if (!group) {
          throw new Error(`Shared root missing: ${folderName}`);
        }
        return buildModuleCache({
          root: group,
          rootName: folderName,
          location: 'shared',
          side: this.side,
          registry: this.registry,
          allowDuplicates,
        });
      })
    );

    for (const result of shared) {
      if (result.status === 'fulfilled') {
        this.caches.push(result.value);
      } else {
        const error = toError(result.reason);
        this.logger.warn(`Shared discovery failed: ${error.message}`);
        this.reportError('discovery', error.message);
      }
    }
  }

  /**
   * Discovered modules that run on this side, in discovery order.
   */
  private workingSet(): string[] {
    const names: string[] = [];
    for (const cache of this.caches) {
      for (const cached of collectModules(cache)) {
        const location = this.descriptorOf(cached.path)?.location ?? cached.location;
        if (location === 'shared' || location === this.side) {
          names.push(cached.path);
        }
      }
    }
    return names;
  }

  private async loadAll(): Promise<void> {
    for (const name of this.order) {
      try {
        await this.loader.load(name, { rethrowCritical: true });
      } catch (error) {
        if (error instanceof PhaseError) {
          throw error;
        }
        const fault = toError(error);
        this.logger.error(`Load chain fault at ${name}; continuing`, fault, { module: name });
        this.reportError(name, `Load chain failed: ${fault.message}`);
      }
    }
  }

  /**
   * Advance every module that recovered during startup. Modules that recover
   * while the pass runs are picked up by the next round.
   */
  private async runCatchUp(): Promise<void> {
    while (this.catchUp.size > 0) {
      const names = this.order.filter((name) => this.catchUp.has(name));
      this.catchUp.clear();
      for (const name of names) {
        await this.advance(name);
      }
    }
    // Same tick as the final check; later recoveries advance immediately.
    this.starting = false;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // LATE RECOVERY
  // ─────────────────────────────────────────────────────────────────────────────

  private scheduleAdvance(name: string): void {
    if (this.starting) {
      this.catchUp.add(name);
      return;
    }
    if (this.stopPromise) return;

    const task: Promise<void> = this.advance(name)
      .catch((error: unknown) => {
        this.logger.error(`Catch-up failed for ${name}`, error, { module: name });
      })
      .finally(() => {
        this.advancing.delete(task);
      });
    this.advancing.add(task);
  }

  /**
   * Run the startup phases a late-recovered module missed. Phases whose
   * precondition is not met are skipped.
   */
  private async advance(name: string): Promise<void> {
    for (const phase of STARTUP_PHASES) {
      await this.lifecycle.runStep(name, phase);
    }
  }

  /**
   * Resolves once detached retries and late catch-up work have finished.
   */
  async settled(): Promise<void> {
    await this.engine.settled();
    while (this.advancing.size > 0) {
      await Promise.allSettled([...this.advancing]);
      await this.engine.settled();
    }
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // SHUTDOWN
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Stop started modules in reverse order, cancel pending retries and run the
   * cleanup scope. Every module is given the chance to stop before a
   * critical failure is rethrown.
   *
   * @throws PhaseError for the first critical module that failed to stop
   */
  stop(): Promise<void> {
    if (!this.stopPromise) {
      this.stopPromise = this.performStop();
    }
    return this.stopPromise;
  }

  private async performStop(): Promise<void> {
    this.engine.cancelPending();
    const pendingStart = this.startPromise;
    if (pendingStart) {
      const started = await settle(() => pendingStart);
      if (!started.ok) {
        this.logger.warn('Stopping after failed startup', { error: started.error.message });
      }
    }

    const report = await this.lifecycle.runPhase([...this.order].reverse(), 'stop', {
      abortOnCritical: false,
    });

    this.engine.dispose();
    await this.settled();

    const cleanup = await this.cleanup.run();
    if (!cleanup.success) {
      this.reportError('cleanup', `Cleanup failed for: ${cleanup.failed.join(', ')}`);
    }

    const [firstCritical] = report.criticalFailures;
    if (firstCritical) {
      throw firstCritical;
    }
    this.logger.info('Runtime stopped', { stopped: report.completed.length });
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // MODULE-FACING SURFACE
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Run module code with the runtime retry policy. Resolves `undefined` when
   * the operation did not succeed in the foreground.
   *
   * @throws PhaseError when a critical module exhausts its attempts
   */
  async runGuarded<T>(name: string, operation: () => T | Promise<T>): Promise<T | undefined> {
    const outcome = await this.engine.execute({
      operation,
      moduleName: name,
      phase: 'runtime',
      descriptor: this.descriptorOf(name),
    });
    return outcome.status === 'fulfilled' ? outcome.value : undefined;
  }

  /**
   * Global error sink: logs, fires `globalError` and calls `onGlobalError`.
   */
  reportError(source: string, message: string): void {
    this.logger.warn(message, { source, side: this.side });
    this.globalError.fire(source, message, this.side);

    const handler = this.onGlobalError;
    if (handler) {
      void settle(() => handler(source, message, this.side)).then((result) => {
        if (!result.ok) {
          this.logger.error('Global error handler failed', result.error, { source });
        }
      });
    }
  }

  /**
   * Load a module through the shared cache.
   */
  require(name: string): Promise<unknown> {
    return this.loader.load(name);
  }

  stateOf(name: string): ModuleState | undefined {
    return this.registry.get(name)?.state;
  }

  snapshot(): EntrySnapshot[] {
    return this.registry.snapshot();
  }

  get resolvedOrder(): readonly string[] {
    return this.order;
  }

  private descriptorOf(name: string): ModuleDescriptor | undefined {
    return this.config.modules[name];
  }

  private summary(): StartupSummary {
    const snapshot = this.registry.snapshot();
    return {
      order: [...this.order],
      loaded: this.order.filter((name) => this.loader.isCached(name)),
      failed: snapshot.filter((entry) => entry.state === 'error').map((entry) => entry.name),
      pending: this.order.filter((name) => this.engine.isPending(name)),
    };
  }
}
