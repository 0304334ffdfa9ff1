// ═══════════════════════════════════════════════════════════════════════════════
// LIFECYCLE ORCHESTRATOR TESTS
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, vi, afterEach } from 'vitest';
import { defineModule } from '../../discovery/define.js';
import { RetryEngine } from '../../infrastructure/retry/engine.js';
import type { LifecycleModule, ModuleDescriptor } from '../../types/module.js';
import { PhaseError } from '../errors.js';
import { LifecycleOrchestrator } from '../lifecycle.js';
import { ModuleRegistry } from '../registry.js';

function descriptor(overrides: Partial<ModuleDescriptor> = {}): ModuleDescriptor {
  return {
    location: 'server',
    dependencies: [],
    critical: false,
    retry: { init: { maxAttempts: 1 }, start: { maxAttempts: 1 }, stop: { maxAttempts: 1 } },
    ...overrides,
  };
}

function createLifecycle(
  instances: Record<string, LifecycleModule>,
  descriptors: Record<string, ModuleDescriptor> = {}
) {
  const registry = new ModuleRegistry();
  const reports: Array<[string, string]> = [];
  const recovered: Array<[string, string]> = [];
  const reportError = (source: string, message: string) => {
    reports.push([source, message]);
  };

  for (const [name, instance] of Object.entries(instances)) {
    registry.register(name, defineModule({ load: () => instance }));
    registry.markLoaded(name, instance);
  }

  const engine = new RetryEngine({
    recorder: registry,
    reportError,
    buckets: { background: { initialDelayMs: 500, jitter: false } },
  });
  const lifecycle = new LifecycleOrchestrator({
    registry,
    engine,
    descriptorOf: (name) => descriptors[name] ?? descriptor(),
    reportError,
    onRecovered: (name, phase) => {
      recovered.push([name, phase]);
    },
  });

  return { lifecycle, registry, engine, reports, recovered };
}

const failing = (message: string): LifecycleModule => ({
  init: () => {
    throw new Error(message);
  },
});

afterEach(() => {
  vi.useRealTimers();
});

describe('LifecycleOrchestrator.runStep', () => {
  it('should call the hook and advance the state', async () => {
    const init = vi.fn();
    const { lifecycle, registry } = createLifecycle({ A: { init } });

    await expect(lifecycle.runStep('A', 'init')).resolves.toBe('completed');

    expect(init).toHaveBeenCalledTimes(1);
    expect(registry.get('A')?.state).toBe('initialized');
  });

  it('should advance a module that has no hook for the phase', async () => {
    const { lifecycle, registry } = createLifecycle({ A: {} });

    await expect(lifecycle.runStep('A', 'init')).resolves.toBe('skipped');

    expect(registry.get('A')?.state).toBe('initialized');
  });

  it('should skip a module that is not in the required state', async () => {
    const start = vi.fn();
    const { lifecycle, registry } = createLifecycle({ A: { start } });

    await expect(lifecycle.runStep('A', 'start')).resolves.toBe('skipped');

    expect(start).not.toHaveBeenCalled();
    expect(registry.get('A')?.state).toBe('loaded');
  });

  it('should skip a module that never loaded', async () => {
    const { lifecycle, registry } = createLifecycle({});
    registry.register('Ghost', defineModule({ load: () => ({}) }));

    await expect(lifecycle.runStep('Ghost', 'init')).resolves.toBe('skipped');
    await expect(lifecycle.runStep('Missing', 'init')).resolves.toBe('skipped');
  });
});

describe('LifecycleOrchestrator.runPhase', () => {
  it('should continue past a non-critical failure', async () => {
    const { lifecycle, registry, reports } = createLifecycle({
      A: { init: vi.fn() },
      B: failing('boom'),
      C: { init: vi.fn() },
    });

    const report = await lifecycle.runPhase(['A', 'B', 'C'], 'init');

    expect(report.completed).toEqual(['A', 'C']);
    expect(report.failed).toEqual(['B']);
    expect(registry.snapshot()).toEqual([
      { name: 'A', state: 'initialized' },
      { name: 'B', state: 'error', error: 'boom' },
      { name: 'C', state: 'initialized' },
    ]);
    expect(reports).toEqual([['B', 'Init failed for B: boom']]);
  });

  it('should abort at a critical failure', async () => {
    const init = vi.fn();
    const { lifecycle, registry } = createLifecycle(
      { A: {}, B: failing('fatal'), C: { init } },
      { B: descriptor({ critical: true }) }
    );

    await expect(lifecycle.runPhase(['A', 'B', 'C'], 'init')).rejects.toBeInstanceOf(PhaseError);

    expect(init).not.toHaveBeenCalled();
    expect(registry.get('C')?.state).toBe('loaded');
  });

  it('should collect critical failures when not aborting', async () => {
    const { lifecycle } = createLifecycle(
      { A: failing('fatal'), B: {} },
      { A: descriptor({ critical: true }) }
    );

    const report = await lifecycle.runPhase(['A', 'B'], 'init', { abortOnCritical: false });

    expect(report.failed).toEqual(['A']);
    expect(report.skipped).toEqual(['B']);
    expect(report.criticalFailures.map((error) => error.message)).toEqual(['Init failed for A: fatal']);
  });

  it('should report a module left retrying in the background as pending', async () => {
    vi.useFakeTimers();
    let calls = 0;
    const { lifecycle, registry, engine, recovered } = createLifecycle(
      {
        Flaky: {
          init: () => {
            calls++;
            if (calls === 1) throw new Error('warming up');
          },
        },
      },
      { Flaky: descriptor({ retry: { init: { maxAttempts: 3 } } }) }
    );

    const report = await lifecycle.runPhase(['Flaky'], 'init');
    expect(report.pending).toEqual(['Flaky']);
    expect(registry.get('Flaky')?.state).toBe('loaded');

    await vi.advanceTimersByTimeAsync(500);
    await engine.settled();

    expect(registry.get('Flaky')?.state).toBe('initialized');
    expect(recovered).toEqual([['Flaky', 'init']]);
  });
});
