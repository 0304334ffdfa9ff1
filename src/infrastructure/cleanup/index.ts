export {
  CleanupScope,
  PRIORITY_VALUES,
  type CleanupPriority,
  type CleanupFn,
  type CleanupTask,
  type CleanupTaskResult,
  type CleanupResult,
  type CleanupScopeOptions,
} from './scope.js';
