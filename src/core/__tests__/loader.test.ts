// ═══════════════════════════════════════════════════════════════════════════════
// MODULE LOADER TESTS
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, vi } from 'vitest';
import { defineModule } from '../../discovery/define.js';
import { RetryEngine } from '../../infrastructure/retry/engine.js';
import type { ModuleDescriptor, ModuleFactory } from '../../types/module.js';
import { PhaseError } from '../errors.js';
import { ModuleLoader, runsOnSide } from '../loader.js';
import { ModuleRegistry } from '../registry.js';

function descriptor(overrides: Partial<ModuleDescriptor> = {}): ModuleDescriptor {
  return {
    location: 'server',
    dependencies: [],
    critical: false,
    retry: { load: { maxAttempts: 1 } },
    ...overrides,
  };
}

function createLoader(
  factories: Record<string, ModuleFactory>,
  descriptors: Record<string, ModuleDescriptor> = {}
) {
  const registry = new ModuleRegistry();
  const reports: Array<[string, string]> = [];
  const loaded: Array<[string, boolean]> = [];
  const reportError = (source: string, message: string) => {
    reports.push([source, message]);
  };

  for (const [name, load] of Object.entries(factories)) {
    registry.register(name, defineModule({ load }));
  }

  const engine = new RetryEngine({ recorder: registry, reportError });
  const loader = new ModuleLoader({
    registry,
    engine,
    side: 'server',
    descriptorOf: (name) => descriptors[name] ?? descriptor(),
    reportError,
    onLoaded: (name, _value, late) => {
      loaded.push([name, late]);
    },
  });

  return { loader, registry, reports, loaded };
}

describe('runsOnSide', () => {
  it('should run shared modules everywhere and others on their own side', () => {
    expect(runsOnSide('shared', 'client')).toBe(true);
    expect(runsOnSide('server', 'server')).toBe(true);
    expect(runsOnSide('server', 'client')).toBe(false);
    expect(runsOnSide('client', 'server')).toBe(false);
  });
});

describe('ModuleLoader', () => {
  it('should instantiate a module once and serve the cached value', async () => {
    const factory = vi.fn(() => ({ id: 'store' }));
    const { loader, registry, loaded } = createLoader({ Store: factory });

    const first = await loader.load('Store');
    const second = await loader.load('Store');

    expect(first).toEqual({ id: 'store' });
    expect(second).toBe(first);
    expect(factory).toHaveBeenCalledTimes(1);
    expect(loader.isCached('Store')).toBe(true);
    expect(registry.get('Store')?.state).toBe('loaded');
    expect(loaded).toEqual([['Store', false]]);
  });

  it('should pass a load context that resolves dependencies through the cache', async () => {
    const { loader, loaded } = createLoader({
      Db: () => ({ kind: 'db' }),
      Store: async ({ moduleName, side, require }) => ({
        name: moduleName,
        side,
        db: await require('Db'),
      }),
    });

    const store = await loader.load('Store');

    expect(store).toEqual({ name: 'Store', side: 'server', db: { kind: 'db' } });
    expect(loaded).toEqual([
      ['Db', false],
      ['Store', false],
    ]);
  });

  it('should return undefined for an unregistered module', async () => {
    const { loader } = createLoader({});

    await expect(loader.load('Ghost')).resolves.toBeUndefined();
  });

  it('should skip a module located on the other side', async () => {
    const factory = vi.fn(() => ({}));
    const { loader, registry } = createLoader(
      { Hud: factory },
      { Hud: descriptor({ location: 'client' }) }
    );

    await expect(loader.load('Hud')).resolves.toBeUndefined();
    expect(factory).not.toHaveBeenCalled();
    expect(registry.get('Hud')?.state).toBe('registered');
  });

  it('should fail a module whose factory produces no value', async () => {
    const { loader, registry, reports } = createLoader({ Empty: () => undefined });

    await expect(loader.load('Empty')).resolves.toBeUndefined();

    expect(registry.snapshot()).toEqual([
      { name: 'Empty', state: 'error', error: 'Module Empty produced no value' },
    ]);
    expect(reports).toEqual([['Empty', 'Load failed for Empty: Module Empty produced no value']]);
  });

  it('should swallow a critical failure unless asked to rethrow', async () => {
    const failing = () => {
      throw new Error('disk full');
    };
    const critical = { Core: descriptor({ critical: true }) };

    const quiet = createLoader({ Core: failing }, critical);
    await expect(quiet.loader.load('Core')).resolves.toBeUndefined();

    const loud = createLoader({ Core: failing }, critical);
    await expect(loud.loader.load('Core', { rethrowCritical: true })).rejects.toBeInstanceOf(PhaseError);
    expect(loud.loader.isLoading('Core')).toBe(false);
  });

  it('should break a reentrant load cycle at the module that closes it', async () => {
    const { loader, registry, reports } = createLoader({
      A: async ({ require }) => ({ b: await require('B') }),
      B: async ({ require }) => ({ a: await require('A') }),
    });

    const a = await loader.load('A');

    expect(a).toEqual({ b: undefined });
    expect(registry.get('A')?.state).toBe('loaded');
    expect(registry.get('B')?.state).toBe('error');
    expect(reports).toEqual([
      ['A', 'Circular load detected: A -> B -> A'],
      ['B', 'Load failed for B: Circular load detected: A -> B -> A'],
    ]);

    await expect(loader.load('B')).resolves.toEqual({ a: { b: undefined } });
    expect(registry.get('B')?.state).toBe('loaded');
    expect(loader.isLoading('A')).toBe(false);
  });

  it('should forget cached values on clear', async () => {
    const factory = vi.fn(() => ({}));
    const { loader } = createLoader({ Store: factory });

    await loader.load('Store');
    loader.clear();

    expect(loader.isCached('Store')).toBe(false);
  });
});
