export {
  RecoveryQueue,
  type QueueEntry,
  type DrainReport,
  type RecoveryQueueOptions,
} from './queue.js';
