/**
 * Queue Module
 *
 * Exports:
 * - LeaseQueue: job lifecycle engine
 * - JobHandle: consumer view of one job
 * - QueueWorker: polling consumer
 * - openQueue / openQueueFromEnv: factories
 */

export {
  LeaseQueue,
  listQueues,
  type LeaseQueueRuntime,
  type EnqueueOptions,
  type DequeueOptions,
  type RemoveOptions,
  type SettleOptions,
  type CompleteOutcome,
  type FailOutcome,
  type DeferOutcome,
  type RepairReport,
  type QueueRegistration,
} from './lease-queue';

export { JobHandle, type Settlement } from './job-handle';

export {
  QueueWorker,
  type JobDisposition,
  type JobProcessor,
  type QueueWorkerConfig,
  type QueueWorkerEvents,
  type QueueWorkerState,
} from './queue-worker';

export {
  ACK_TTL_SECONDS,
  RESULT_TTL_SECONDS,
  createQueueDescriptor,
  generateJobId,
  laneFromJobId,
  laneKey,
  ackKey,
  resultKey,
  type QueueDescriptor,
  type QueueKeys,
} from './queue-descriptor';

export {
  LANES,
  formatTimestamp,
  parseTimestamp,
  parseAttempts,
  parseLane,
  isLane,
  encodeDeadLetter,
  decodeDeadLetter,
  type DeadLetter,
  type JobRecord,
  type Lane,
} from './job-record';

import { queueOptionsFromEnv, type QueueOptions } from '../config/queue-config';
import type { StoreAdapter } from '../store/store-adapter';
import { LeaseQueue, type LeaseQueueRuntime } from './lease-queue';

/**
 * Open (and register) a queue on a store
 *
 * @example
 * ```typescript
 * const { store } = createDynamoDBStore(storeConfigFromEnv());
 * const queue = await openQueue(store, { name: 'emails', maxAttempts: 3 });
 * await queue.enqueue(encodeJson({ to: 'user@example.com' }));
 * ```
 */
export function openQueue(
  store: StoreAdapter,
  options: QueueOptions,
  runtime?: LeaseQueueRuntime
): Promise<LeaseQueue> {
  return LeaseQueue.open(store, options, runtime);
}

/**
 * Open a queue whose options come from LEASE_QUEUE_* environment variables
 */
export function openQueueFromEnv(
  store: StoreAdapter,
  name: string,
  env?: Record<string, string | undefined>,
  runtime?: LeaseQueueRuntime
): Promise<LeaseQueue> {
  return LeaseQueue.open(store, queueOptionsFromEnv(name, env), runtime);
}
