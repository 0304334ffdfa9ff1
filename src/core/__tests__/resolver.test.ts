import { describe, it, expect } from 'vitest';
import { ConfigError, CycleError } from '../errors.js';
import { resolveOrder } from '../resolver.js';

function graph(edges: Record<string, string[]>) {
  return (name: string): readonly string[] => edges[name] ?? [];
}

describe('resolveOrder', () => {
  it('should keep input order for independent modules', () => {
    const result = resolveOrder({ names: ['C', 'A', 'B'], dependenciesOf: graph({}), strict: false });

    expect(result).toEqual({ ok: true, value: ['C', 'A', 'B'] });
  });

  it('should place dependencies before dependents', () => {
    const result = resolveOrder({
      names: ['A', 'B', 'C'],
      dependenciesOf: graph({ B: ['C'], C: ['A'] }),
      strict: false,
    });

    expect(result).toEqual({ ok: true, value: ['A', 'C', 'B'] });
  });

  it('should release dependents in the order they become ready', () => {
    const result = resolveOrder({
      names: ['D', 'B', 'A'],
      dependenciesOf: graph({ B: ['A'] }),
      strict: false,
    });

    expect(result).toEqual({ ok: true, value: ['D', 'A', 'B'] });
  });

  it('should count a repeated dependency once', () => {
    const result = resolveOrder({
      names: ['B', 'A'],
      dependenciesOf: graph({ B: ['A', 'A'] }),
      strict: false,
    });

    expect(result).toEqual({ ok: true, value: ['A', 'B'] });
  });

  it('should skip declared modules outside the working set', () => {
    const result = resolveOrder({
      names: ['A'],
      dependenciesOf: graph({ A: ['Remote'] }),
      isDeclared: (name) => name === 'Remote',
      strict: true,
    });

    expect(result).toEqual({ ok: true, value: ['A'] });
  });

  it('should skip unknown dependencies outside strict mode', () => {
    const result = resolveOrder({ names: ['A'], dependenciesOf: graph({ A: ['Ghost'] }), strict: false });

    expect(result).toEqual({ ok: true, value: ['A'] });
  });

  it('should throw ConfigError for unknown dependencies in strict mode', () => {
    expect(() =>
      resolveOrder({ names: ['A'], dependenciesOf: graph({ A: ['Ghost'] }), strict: true })
    ).toThrow(new ConfigError(['A depends on unknown module Ghost']));
  });

  it('should return the cycle members in input order', () => {
    const result = resolveOrder({
      names: ['C', 'B', 'A'],
      dependenciesOf: graph({ A: ['B'], B: ['A'] }),
      strict: false,
    });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(CycleError);
      expect(result.error.members).toEqual(['B', 'A']);
      expect(result.error.message).toBe('Dependency cycle detected involving: B, A');
    }
  });

  it('should throw the cycle in strict mode', () => {
    expect(() =>
      resolveOrder({ names: ['A', 'B'], dependenciesOf: graph({ A: ['B'], B: ['A'] }), strict: true })
    ).toThrow(CycleError);
  });
});
