/**
 * Logging Module Index
 */

export {
  QueueLogger,
  createConsoleSubscriber,
  getQueueLogger,
  resetQueueLogger,
  type QueueLogEntry,
  type QueueLogLevel,
  type QueueLogCategory,
  type QueueLogSubscriber,
} from './queue-logger';
