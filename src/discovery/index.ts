export {
  defineModule,
  defineGroup,
  isModuleDefinition,
  type DefineModuleOptions,
} from './define.js';

export {
  buildModuleCache,
  collectModules,
  findEntry,
  invalidateCache,
  type CachedModule,
  type ModuleCache,
  type BuildCacheOptions,
} from './cache.js';
