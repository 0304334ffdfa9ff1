// ═══════════════════════════════════════════════════════════════════════════════
// DEPENDENCY RESOLVER — Deterministic Topological Ordering
// ═══════════════════════════════════════════════════════════════════════════════
//
// Kahn's algorithm over edges dependency -> dependent. The ready queue is
// FIFO and seeded in input order, so independent modules keep the order the
// caller gave them.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../observability/logging/index.js';
import { err, ok, type Result } from '../types/result.js';
import { ConfigError, CycleError } from './errors.js';

const logger = getLogger({ component: 'resolver' });

export interface ResolveOptions {
  /** Working set, in the order ties should be broken */
  readonly names: readonly string[];

  readonly dependenciesOf: (name: string) => readonly string[];

  /**
   * Whether a name outside the working set is a known module (e.g. one
   * located on the other side). Known external dependencies are skipped
   * silently.
   */
  readonly isDeclared?: (name: string) => boolean;

  /** Throw instead of warning or returning an error */
  readonly strict: boolean;
}

/**
 * Order `names` so every module comes after its dependencies.
 *
 * @throws ConfigError under strict mode for an unknown dependency
 * @throws CycleError under strict mode when no order exists
 */
export function resolveOrder(options: ResolveOptions): Result<string[], CycleError> {
  const { names, dependenciesOf, isDeclared, strict } = options;
  const working = new Set(names);
  const inDegree = new Map<string, number>();
  const dependents = new Map<string, string[]>();

  for (const name of working) {
    inDegree.set(name, 0);
    dependents.set(name, []);
  }

  for (const name of working) {
    const seen = new Set<string>();
    for (const dependency of dependenciesOf(name)) {
      if (seen.has(dependency)) continue;
      seen.add(dependency);

      if (!working.has(dependency)) {
        if (isDeclared?.(dependency)) continue;
        if (strict) {
          throw new ConfigError([`${name} depends on unknown module ${dependency}`]);
        }
        logger.warn(`Skipping unknown dependency ${dependency} of ${name}`, { module: name });
        continue;
      }

      dependents.get(dependency)?.push(name);
      inDegree.set(name, (inDegree.get(name) ?? 0) + 1);
    }
  }

  const queue: string[] = [];
  for (const name of working) {
    if (inDegree.get(name) === 0) {
      queue.push(name);
    }
  }

  const order: string[] = [];
  let head = 0;
  while (head < queue.length) {
    const current = queue[head++];
    order.push(current);
    for (const dependent of dependents.get(current) ?? []) {
      const remaining = (inDegree.get(dependent) ?? 0) - 1;
      inDegree.set(dependent, remaining);
      if (remaining === 0) {
        queue.push(dependent);
      }
    }
  }

  if (order.length < working.size) {
    const emitted = new Set(order);
    const members = [...working].filter((name) => !emitted.has(name));
    const cycle = new CycleError(members);
    if (strict) {
      throw cycle;
    }
    logger.warn(cycle.message, { members });
    return err(cycle);
  }

  return ok(order);
}
