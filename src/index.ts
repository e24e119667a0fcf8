/**
 * lease-queue
 *
 * Lease-based job queue over an atomic key-value/list store.
 */

export * from './queue';
export * from './store';
export * from './logging';
export * from './codec';
export {
  QUEUE_DEFAULTS,
  REGISTRY_KEY,
  validateQueueName,
  resolveQueueOptions,
  queueOptionsFromEnv,
  storeConfigFromEnv,
  type QueueOptions,
  type ResolvedQueueOptions,
} from './config/queue-config';
export { ErrorCode, ErrorCategory, getErrorMessage, getErrorCategory } from './errors/error-codes';
export {
  QueueError,
  ConfigurationError,
  CapabilityConflictError,
  JobNotFoundError,
  LockConflictError,
  DuplicateResultError,
  EmptyResultError,
  MalformedRecordError,
  StoreTypeError,
} from './errors/queue-error';
