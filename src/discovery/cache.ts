// ═══════════════════════════════════════════════════════════════════════════════
// MODULE CACHE — Breadth-First Discovery into the Registry
// ═══════════════════════════════════════════════════════════════════════════════
//
// A root group is walked breadth-first. Every module leaf is keyed by its
// dot path below the root (shared roots keep their own name as the first
// segment) and registered as `registered`.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { ModuleRegistry } from '../core/registry.js';
import { getLogger } from '../observability/logging/index.js';
import type {
  ModuleDefinition,
  ModuleGroup,
  ModuleLocation,
  RuntimeSide,
} from '../types/module.js';
import { isModuleDefinition } from './define.js';

const logger = getLogger({ component: 'discovery' });

export interface CachedModule {
  readonly path: string;
  readonly handle: ModuleDefinition;
  readonly location: ModuleLocation;
}

export interface ModuleCache {
  readonly rootName: string;
  readonly location: ModuleLocation;

  /** Module leaves by dot path, in discovery order */
  readonly modules: Map<string, CachedModule>;

  /** Group paths, in discovery order */
  readonly groups: string[];
}

export interface BuildCacheOptions {
  readonly root: ModuleGroup;
  readonly rootName: string;
  readonly location: ModuleLocation;
  readonly side: RuntimeSide;
  readonly registry: ModuleRegistry;
  readonly allowDuplicates?: boolean;
}

export function buildModuleCache(options: BuildCacheOptions): ModuleCache {
  const { root, rootName, location, side, registry } = options;
  const cache: ModuleCache = { rootName, location, modules: new Map(), groups: [] };
  const prefix = location === 'shared' ? `${rootName}.` : '';

  const queue: Array<{ group: ModuleGroup; path: string }> = [{ group: root, path: prefix }];
  let head = 0;

  while (head < queue.length) {
    const { group, path } = queue[head++];

    for (const [childName, node] of Object.entries(group.children)) {
      if (childName.length === 0 || childName.includes('.')) {
        logger.warn(`Ignoring child "${childName}" of ${path || rootName}: names cannot be empty or contain dots`);
        continue;
      }
      const childPath = `${path}${childName}`;

      if (!isModuleDefinition(node)) {
        cache.groups.push(childPath);
        queue.push({ group: node, path: `${childPath}.` });
        continue;
      }

      if (cache.modules.has(childPath)) {
        logger.warn(`Duplicate module detected: ${childPath}; skipping`, { module: childPath });
        continue;
      }
      if (node.disabled) {
        logger.info(`Disabled module skipped: ${childPath}`, { module: childPath });
        continue;
      }
      if (node.clientOnly && side === 'server') {
        logger.info(`Client-only module skipped on server: ${childPath}`, { module: childPath });
        continue;
      }
      if (!registry.register(childPath, node, { allowDuplicates: options.allowDuplicates })) {
        continue;
      }

      cache.modules.set(childPath, { path: childPath, handle: node, location });
    }
  }

  logger.debug(`Discovered ${cache.modules.size} modules under ${rootName}`, { location });
  return cache;
}

export function collectModules(cache: ModuleCache): CachedModule[] {
  return [...cache.modules.values()];
}

export function findEntry(cache: ModuleCache, path: string): CachedModule | undefined {
  return cache.modules.get(path);
}

/**
 * Remove a root's modules from the registry and empty the cache.
 * Returns how many registry entries were removed.
 */
export function invalidateCache(cache: ModuleCache, registry: ModuleRegistry): number {
  let removed = 0;
  for (const path of cache.modules.keys()) {
    if (registry.get(path)?.handle === cache.modules.get(path)?.handle && registry.remove(path)) {
      removed++;
    }
  }
  cache.modules.clear();
  cache.groups.length = 0;
  return removed;
}
