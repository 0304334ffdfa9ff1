// ═══════════════════════════════════════════════════════════════════════════════
// MODULE DEFINITIONS — Authoring Helpers for Module Trees
// ═══════════════════════════════════════════════════════════════════════════════

import type {
  ModuleDefinition,
  ModuleFactory,
  ModuleGroup,
  ModuleNode,
} from '../types/module.js';

export interface DefineModuleOptions {
  readonly load: ModuleFactory;

  /** Excluded from discovery */
  readonly disabled?: boolean;

  /** Excluded from discovery on the server */
  readonly clientOnly?: boolean;
}

/**
 * Declare a loadable module.
 *
 * @example
 * ```typescript
 * const ProfileStore = defineModule({
 *   load: async ({ require }) => {
 *     const db = await require('Data.Connection');
 *     return createProfileStore(db);
 *   },
 * });
 * ```
 */
export function defineModule(options: DefineModuleOptions): ModuleDefinition {
  return {
    kind: 'module',
    load: options.load,
    disabled: options.disabled ?? false,
    clientOnly: options.clientOnly ?? false,
  };
}

export function defineGroup(children: Record<string, ModuleNode>): ModuleGroup {
  return { kind: 'group', children };
}

export function isModuleDefinition(node: ModuleNode): node is ModuleDefinition {
  return node.kind === 'module';
}
