/**
 * Lease Queue - job lifecycle over a StoreAdapter
 *
 * States of a live job: pending (in a lane list), leased (in the lease
 * table), dead (in the dead-letter store), acknowledged (ack record).
 *
 * Rules:
 * - Lease acquisition is a single conditional create on the lease table
 * - The first lease creates the attempt counter at 1; afterwards only a
 *   failure retry charges an attempt (defer and reclaim never do)
 * - A lease is released by compare-and-delete on the value its holder
 *   read; a caller whose lease was reclaimed or replaced changes nothing
 * - Multi-key transitions are not atomic; the orphan sweep in `reclaim`
 *   requeues jobs left in no lane and no lease once the lease timeout
 *   has passed since they were first seen there
 */

import {
  CapabilityConflictError,
  ConfigurationError,
  DuplicateResultError,
  EmptyResultError,
  JobNotFoundError,
  LockConflictError,
} from '../errors/queue-error';
import { getQueueLogger, type QueueLogger } from '../logging/queue-logger';
import { REGISTRY_KEY, type QueueOptions } from '../config/queue-config';
import type { StoreAdapter, StoreCommand } from '../store/store-adapter';
import {
  ACK_TTL_SECONDS,
  RESULT_TTL_SECONDS,
  ackKey,
  createQueueDescriptor,
  generateJobId,
  laneFromJobId,
  laneKey,
  resultKey,
  type QueueDescriptor,
} from './queue-descriptor';
import {
  decodeDeadLetter,
  encodeDeadLetter,
  formatTimestamp,
  parseAttempts,
  parseLane,
  parseTimestamp,
  type DeadLetter,
  type Lane,
} from './job-record';
import { JobHandle } from './job-handle';

/**
 * Injectable collaborators
 */
export interface LeaseQueueRuntime {
  logger?: QueueLogger;
  /** Clock in epoch milliseconds (default: Date.now) */
  now?: () => number;
  /** Uniform [0, 1) source for lane selection (default: Math.random) */
  random?: () => number;
}

export interface EnqueueOptions {
  highPriority?: boolean;
}

export interface DequeueOptions {
  /** Pick uniformly among non-empty lanes instead of preferring the high lane */
  ignorePriority?: boolean;
}

export interface SettleOptions {
  /** Lane to requeue onto (default: the job's recorded lane) */
  lane?: Lane;
  /**
   * Lease the caller holds, in epoch milliseconds. When given, the call is
   * ignored unless the job still holds exactly this lease.
   */
  leasedAt?: number;
}

export interface RemoveOptions {
  completed?: boolean;
  failed?: boolean;
}

/**
 * Result of `error`: requeued for retry, retries exhausted, or ignored
 * because the caller's lease had already been reclaimed
 */
export type FailOutcome = 'requeued' | 'dead' | 'ignored';

export type DeferOutcome = 'requeued' | 'ignored';

export type CompleteOutcome = 'completed' | 'ignored';

export interface RepairReport {
  /** Live jobs in no lane and no lease, first seen on this pass */
  orphansFound: number;
  /** Orphans seen longer than the lease timeout, pushed back onto their lane */
  orphansRequeued: number;
  /** Lane-table entries whose payload no longer exists */
  staleEntriesPurged: number;
}

export interface QueueRegistration {
  name: string;
  /** Epoch milliseconds */
  createdAt: number;
}

type FeatureFlag = 'resultsEnabled' | 'ackEnabled' | 'deadLetterEnabled' | 'priorityEnabled';

const FEATURE_NAMES: Record<FeatureFlag, string> = {
  resultsEnabled: 'results',
  ackEnabled: 'acknowledgements',
  deadLetterEnabled: 'dead letters',
  priorityEnabled: 'priority',
};

const LEASE_LOST_CATEGORY = {
  complete: 'COMPLETE',
  error: 'RETRY',
  defer: 'DEFER',
} as const;

/**
 * Stored form of a lease taken at `leasedAt`
 */
function leaseValue(leasedAt: number | undefined): string | undefined {
  return leasedAt === undefined ? undefined : formatTimestamp(leasedAt);
}

export class LeaseQueue {
  readonly descriptor: QueueDescriptor;
  private readonly store: StoreAdapter;
  private readonly logger: QueueLogger;
  private readonly now: () => number;
  private readonly random: () => number;

  private constructor(store: StoreAdapter, descriptor: QueueDescriptor, runtime: LeaseQueueRuntime) {
    this.store = store;
    this.descriptor = descriptor;
    this.logger = runtime.logger ?? getQueueLogger();
    this.now = runtime.now ?? Date.now;
    this.random = runtime.random ?? Math.random;
  }

  /**
   * Validate options, derive the descriptor and register the queue name
   * @throws ConfigurationError on invalid options
   */
  static async open(
    store: StoreAdapter,
    options: QueueOptions,
    runtime: LeaseQueueRuntime = {}
  ): Promise<LeaseQueue> {
    const queue = new LeaseQueue(store, createQueueDescriptor(options), runtime);
    await queue.register();
    return queue;
  }

  get name(): string {
    return this.descriptor.name;
  }

  // Producer side

  async enqueue(payload: Buffer, options: EnqueueOptions = {}): Promise<JobHandle> {
    const lane: Lane = options.highPriority ? 'high' : 'normal';
    if (lane === 'high') {
      this.requireFeature('priorityEnabled');
    }

    const id = generateJobId(this.descriptor, lane);
    await this.store.batch([
      { op: 'hashSet', key: this.descriptor.keys.lanes, field: id, value: lane },
      { op: 'set', key: id, value: payload },
      { op: 'listPushLeft', key: laneKey(this.descriptor, lane), value: id },
    ]);

    this.logger.logEnqueue(this.name, id, lane);
    return new JobHandle(this, { id, payload, lane, leasedAt: null });
  }

  // Consumer side

  /**
   * Lease the next job, or null when the queue is drained
   * @throws LockConflictError when the popped job already holds a lease
   */
  async dequeue(options: DequeueOptions = {}): Promise<JobHandle | null> {
    await this.reclaim();

    for (;;) {
      const popped = await this.popNext(options.ignorePriority ?? false);
      if (!popped) {
        return null;
      }
      const { id, lane } = popped;

      const payload = await this.store.get(id);
      if (payload === null) {
        this.logger.log('warn', 'REPAIR', 'Dropped lane entry for a job whose payload is gone', {
          details: { lane },
          queue: this.name,
          jobId: id,
        });
        continue;
      }

      const leasedAt = this.now();
      const acquired = await this.store.hashSetIfAbsent(
        this.descriptor.keys.locked,
        id,
        formatTimestamp(leasedAt)
      );
      if (!acquired) {
        await this.store.listPushRight(laneKey(this.descriptor, lane), id);
        this.logger.logLockConflict(this.name, id, lane);
        throw new LockConflictError(id, lane);
      }

      const firstLease = await this.store.hashSetIfAbsent(this.descriptor.keys.attempts, id, '1');
      const attempts = firstLease ? 1 : await this.getAttempts(id);

      this.logger.logLease(this.name, id, { lane, attempts });
      return new JobHandle(this, { id, payload, lane, leasedAt });
    }
  }

  /**
   * Remove the job and record an ack when enabled. With `leasedAt` the call
   * is ignored unless the caller still holds that lease.
   */
  async complete(id: string, options: SettleOptions = {}): Promise<CompleteOutcome> {
    if (options.leasedAt === undefined) {
      await this.remove(id, { completed: true });
      return 'completed';
    }

    const lease = await this.releaseLease(id, formatTimestamp(options.leasedAt));
    if (lease === null) {
      this.logLeaseLost(id, 'complete');
      return 'ignored';
    }
    await this.restoreOnFailure(id, lease, () => this.remove(id, { completed: true }));
    return 'completed';
  }

  /**
   * Retry below the attempt ceiling, dead-letter at or above it
   */
  async error(id: string, options: SettleOptions = {}): Promise<FailOutcome> {
    const lease = await this.releaseLease(id, leaseValue(options.leasedAt));
    if (lease === null) {
      this.logLeaseLost(id, 'error');
      return 'ignored';
    }

    return this.restoreOnFailure(id, lease, async (): Promise<FailOutcome> => {
      const attempts = await this.getAttempts(id);
      if (attempts >= this.descriptor.maxAttempts) {
        await this.remove(id, { failed: true });
        return 'dead';
      }

      const target = options.lane ?? (await this.resolveLane(id));
      await this.store.batch([
        { op: 'hashIncrBy', key: this.descriptor.keys.attempts, field: id, by: 1 },
        { op: 'listPushLeft', key: laneKey(this.descriptor, target), value: id },
      ]);

      this.logger.logRetry(this.name, id, {
        lane: target,
        attempts: attempts + 1,
        maxAttempts: this.descriptor.maxAttempts,
      });
      return 'requeued';
    });
  }

  /**
   * Requeue without charging an attempt
   */
  async defer(id: string, options: SettleOptions = {}): Promise<DeferOutcome> {
    const lease = await this.releaseLease(id, leaseValue(options.leasedAt));
    if (lease === null) {
      this.logLeaseLost(id, 'defer');
      return 'ignored';
    }

    const target = await this.restoreOnFailure(id, lease, async () => {
      const lane = options.lane ?? (await this.resolveLane(id));
      await this.store.listPushLeft(laneKey(this.descriptor, lane), id);
      return lane;
    });
    this.logger.logDefer(this.name, id, target);
    return 'requeued';
  }

  /**
   * Remove a job's live keys, writing an ack (completed) or a dead-letter
   * entry (failed) when the queue has those features
   * @throws CapabilityConflictError when both completed and failed are set
   */
  async remove(id: string, options: RemoveOptions = {}): Promise<void> {
    const { completed = false, failed = false } = options;
    if (completed && failed) {
      throw new CapabilityConflictError(`cannot mark job ${id} both completed and failed`);
    }

    const keys = this.descriptor.keys;
    const commands: StoreCommand[] = [];
    const now = this.now();
    const recordDead = failed && this.descriptor.deadLetterEnabled;
    const retainPayload = failed && this.descriptor.retainDeadPayload;
    const attempts = failed ? await this.getAttempts(id) : 0;

    if (recordDead) {
      const lane = await this.resolveLane(id);
      commands.push({
        op: 'hashSet',
        key: keys.dead,
        field: id,
        value: encodeDeadLetter({ deadAt: now, lane, attempts }),
      });
    }

    if (completed && this.descriptor.ackEnabled) {
      commands.push({
        op: 'set',
        key: ackKey(id),
        value: Buffer.from(formatTimestamp(now)),
        ttlSeconds: ACK_TTL_SECONDS,
      });
    }

    if (!retainPayload) {
      commands.push({ op: 'delete', keys: [id] });
    }
    commands.push(
      { op: 'hashDelete', key: keys.locked, fields: [id] },
      { op: 'hashDelete', key: keys.attempts, fields: [id] },
      { op: 'hashDelete', key: keys.lanes, fields: [id] }
    );

    await this.store.batch(commands);

    if (completed) {
      this.logger.logComplete(this.name, id, this.descriptor.ackEnabled);
    } else if (failed) {
      this.logger.logDeadLetter(this.name, id, {
        attempts,
        recorded: recordDead,
        payloadRetained: retainPayload,
      });
    } else {
      this.logger.log('info', 'ADMIN', 'Job removed', { queue: this.name, jobId: id });
    }
  }

  // Recovery

  /**
   * Release leases older than the lease timeout and requeue their jobs
   * without charging an attempt, then sweep for orphaned jobs. Returns the
   * number of jobs requeued.
   */
  async reclaim(): Promise<number> {
    const keys = this.descriptor.keys;
    const leases = await this.store.hashGetAll(keys.locked);
    const now = this.now();
    const timeoutMs = this.descriptor.leaseTimeoutSeconds * 1000;
    let requeued = 0;

    for (const [id, raw] of leases) {
      const leasedAt = parseTimestamp(`${keys.locked}/${id}`, raw);
      if (leasedAt + timeoutMs >= now) {
        continue;
      }
      // The job may have been reclaimed and leased again since the snapshot
      if ((await this.releaseLease(id, raw)) === null) {
        continue;
      }

      if (await this.store.exists(id)) {
        const lane = await this.resolveLane(id);
        await this.store.listPushLeft(laneKey(this.descriptor, lane), id);
        requeued++;
        this.logger.logReclaim(this.name, id, { leasedAt, requeued: true });
      } else {
        await this.store.batch([
          { op: 'hashDelete', key: keys.attempts, fields: [id] },
          { op: 'hashDelete', key: keys.lanes, fields: [id] },
        ]);
        this.logger.logReclaim(this.name, id, { leasedAt, requeued: false });
      }
    }

    const report = await this.sweepOrphans();
    return requeued + report.orphansRequeued;
  }

  /**
   * Run the orphan sweep on its own and report what it did
   */
  async repair(): Promise<RepairReport> {
    return this.sweepOrphans();
  }

  // Administration

  /**
   * Pending jobs across lanes (after reclaiming stale leases)
   */
  async size(): Promise<number> {
    await this.reclaim();
    const normal = await this.store.listLength(this.descriptor.keys.normal);
    if (!this.descriptor.priorityEnabled) {
      return normal;
    }
    return normal + (await this.store.listLength(this.descriptor.keys.high));
  }

  /**
   * Drop every pending and leased job with its bookkeeping.
   * Dead letters, results and acks are left in place.
   */
  async reset(): Promise<void> {
    const keys = this.descriptor.keys;
    const [normalIds, highIds, leases, lanes] = await Promise.all([
      this.store.listRange(keys.normal),
      this.store.listRange(keys.high),
      this.store.hashGetAll(keys.locked),
      this.store.hashGetAll(keys.lanes),
    ]);
    const payloadKeys = Array.from(new Set([...normalIds, ...highIds, ...leases.keys(), ...lanes.keys()]));

    await this.store.batch([
      { op: 'delete', keys: [keys.attempts, keys.locked, keys.lanes, keys.orphans, keys.normal, keys.high] },
      { op: 'delete', keys: payloadKeys },
    ]);

    this.logger.log('warn', 'ADMIN', 'Queue reset', {
      details: { jobsDropped: payloadKeys.length },
      queue: this.name,
    });
  }

  /**
   * Reset, drop dead letters and unregister the queue name
   */
  async delete(): Promise<void> {
    await this.reset();
    await this.dropDeadLetters();
    await this.store.hashDelete(REGISTRY_KEY, [this.name]);
    this.logger.log('warn', 'ADMIN', 'Queue deleted', { queue: this.name });
  }

  async getAttempts(id: string): Promise<number> {
    const raw = await this.store.hashGet(this.descriptor.keys.attempts, id);
    return parseAttempts(`${this.descriptor.keys.attempts}/${id}`, raw);
  }

  // Results and acknowledgements

  /**
   * Store a write-once result, retained for 24 hours
   * @throws ConfigurationError, EmptyResultError, DuplicateResultError
   */
  async putResult(id: string, data: Buffer): Promise<void> {
    this.requireFeature('resultsEnabled');
    if (data.length === 0) {
      throw new EmptyResultError(id);
    }

    const written = await this.store.setIfAbsent(resultKey(id), data, RESULT_TTL_SECONDS);
    if (!written) {
      throw new DuplicateResultError(id);
    }
    this.logger.log('info', 'RESULT', 'Result stored', {
      details: { bytes: data.length },
      queue: this.name,
      jobId: id,
    });
  }

  async getResult(id: string): Promise<Buffer | null> {
    this.requireFeature('resultsEnabled');
    return this.store.get(resultKey(id));
  }

  /**
   * Completion time (epoch milliseconds) while the ack record is retained
   */
  async getAck(id: string): Promise<number | null> {
    this.requireFeature('ackEnabled');
    const key = ackKey(id);
    const raw = await this.store.get(key);
    return raw === null ? null : parseTimestamp(key, raw.toString('utf8'));
  }

  // Dead letters

  async deadLetters(): Promise<DeadLetter[]> {
    this.requireFeature('deadLetterEnabled');
    const key = this.descriptor.keys.dead;
    const raw = await this.store.hashGetAll(key);
    return Array.from(raw, ([id, value]) => decodeDeadLetter(key, id, value)).sort(
      (a, b) => a.deadAt - b.deadAt
    );
  }

  /**
   * Put a dead-lettered job back on its lane with a fresh attempt count
   * @throws JobNotFoundError when the job is not dead-lettered or its payload was not retained
   */
  async replayDeadLetter(id: string): Promise<JobHandle> {
    this.requireFeature('deadLetterEnabled');
    const keys = this.descriptor.keys;

    const raw = await this.store.hashGet(keys.dead, id);
    if (raw === null) {
      throw new JobNotFoundError(id, 'not in dead letters');
    }
    const entry = decodeDeadLetter(keys.dead, id, raw);
    const payload = await this.store.get(id);
    if (payload === null) {
      throw new JobNotFoundError(id, 'payload was not retained');
    }

    await this.store.hashSet(keys.lanes, id, entry.lane);
    if ((await this.store.hashDelete(keys.dead, [id])) === 0) {
      throw new JobNotFoundError(id, 'replayed concurrently');
    }
    await this.store.listPushLeft(laneKey(this.descriptor, entry.lane), id);

    this.logger.log('info', 'ADMIN', 'Dead letter replayed', {
      details: { lane: entry.lane, previousAttempts: entry.attempts },
      queue: this.name,
      jobId: id,
    });
    return new JobHandle(this, { id, payload, lane: entry.lane, leasedAt: null });
  }

  /**
   * Drop all dead letters and their retained payloads. Returns the number dropped.
   */
  async purgeDeadLetters(): Promise<number> {
    this.requireFeature('deadLetterEnabled');
    const dropped = await this.dropDeadLetters();
    this.logger.log('warn', 'ADMIN', 'Dead letters purged', {
      details: { dropped },
      queue: this.name,
    });
    return dropped;
  }

  // Internals

  private async register(): Promise<void> {
    const created = await this.store.hashSetIfAbsent(REGISTRY_KEY, this.name, formatTimestamp(this.now()));
    if (created) {
      this.logger.log('info', 'ADMIN', 'Queue registered', { queue: this.name });
    }
  }

  /**
   * Pop from the first non-empty lane in selection order
   */
  private async popNext(ignorePriority: boolean): Promise<{ id: string; lane: Lane } | null> {
    for (const lane of await this.laneOrder(ignorePriority)) {
      const id = await this.store.listPopRight(laneKey(this.descriptor, lane));
      if (id !== null) {
        return { id, lane };
      }
    }
    return null;
  }

  private async laneOrder(ignorePriority: boolean): Promise<Lane[]> {
    if (!this.descriptor.priorityEnabled) {
      return ['normal'];
    }
    if (!ignorePriority) {
      return ['high', 'normal'];
    }

    const [highLength, normalLength] = await Promise.all([
      this.store.listLength(this.descriptor.keys.high),
      this.store.listLength(this.descriptor.keys.normal),
    ]);
    if (highLength > 0 && normalLength > 0) {
      return this.random() < 0.5 ? ['high', 'normal'] : ['normal', 'high'];
    }
    return highLength > 0 ? ['high', 'normal'] : ['normal', 'high'];
  }

  /**
   * Remove the lease entry if it still holds `expected` (default: whatever
   * it holds now). Returns the released value, or null when nothing was
   * released.
   */
  private async releaseLease(id: string, expected?: string): Promise<string | null> {
    const key = this.descriptor.keys.locked;
    const lease = expected ?? (await this.store.hashGet(key, id));
    if (lease === null) {
      return null;
    }
    return (await this.store.hashDeleteIfEquals(key, id, lease)) ? lease : null;
  }

  /**
   * Run the rest of a transition after its lease was released, putting the
   * lease back when the transition fails
   */
  private async restoreOnFailure<T>(id: string, lease: string, transition: () => Promise<T>): Promise<T> {
    try {
      return await transition();
    } catch (error) {
      try {
        await this.store.hashSetIfAbsent(this.descriptor.keys.locked, id, lease);
      } catch (restoreError) {
        this.logger.logError('Lease restore failed', restoreError, { queue: this.name, jobId: id });
      }
      throw error;
    }
  }

  /**
   * Jobs with a lane-table entry that are in no lane list and hold no lease
   * are recorded on first sight and requeued once they are still orphaned
   * a lease timeout later. A job popped but not yet leased looks the same
   * for a moment, so a single sighting never requeues. Entries whose
   * payload is gone are purged at once.
   */
  private async sweepOrphans(): Promise<RepairReport> {
    const keys = this.descriptor.keys;
    const [lanes, normalIds, highIds, leases, sightings] = await Promise.all([
      this.store.hashGetAll(keys.lanes),
      this.store.listRange(keys.normal),
      this.store.listRange(keys.high),
      this.store.hashGetAll(keys.locked),
      this.store.hashGetAll(keys.orphans),
    ]);
    const queued = new Set([...normalIds, ...highIds]);
    const isOrphan = (id: string): boolean => lanes.has(id) && !queued.has(id) && !leases.has(id);
    const now = this.now();
    const timeoutMs = this.descriptor.leaseTimeoutSeconds * 1000;
    const report: RepairReport = { orphansFound: 0, orphansRequeued: 0, staleEntriesPurged: 0 };

    const recovered = Array.from(sightings.keys()).filter(id => !isOrphan(id));
    if (recovered.length > 0) {
      await this.store.hashDelete(keys.orphans, recovered);
    }

    for (const [id, rawLane] of lanes) {
      if (!isOrphan(id)) {
        continue;
      }

      if (!(await this.store.exists(id))) {
        await this.store.batch([
          { op: 'hashDelete', key: keys.lanes, fields: [id] },
          { op: 'hashDelete', key: keys.attempts, fields: [id] },
          { op: 'hashDelete', key: keys.orphans, fields: [id] },
        ]);
        report.staleEntriesPurged++;
        continue;
      }

      const firstSeen = sightings.get(id);
      if (firstSeen === undefined) {
        if (await this.store.hashSetIfAbsent(keys.orphans, id, formatTimestamp(now))) {
          report.orphansFound++;
          this.logger.log('warn', 'REPAIR', 'Job found in no lane and no lease', {
            queue: this.name,
            jobId: id,
          });
        }
        continue;
      }

      if (parseTimestamp(`${keys.orphans}/${id}`, firstSeen) + timeoutMs >= now) {
        continue;
      }
      // Only the sweeper that clears this sighting requeues the job
      if (!(await this.store.hashDeleteIfEquals(keys.orphans, id, firstSeen))) {
        continue;
      }

      const lane = parseLane(`${keys.lanes}/${id}`, rawLane);
      await this.store.listPushLeft(laneKey(this.descriptor, lane), id);
      report.orphansRequeued++;
      this.logger.log('warn', 'REPAIR', 'Orphaned job requeued', {
        details: { lane },
        queue: this.name,
        jobId: id,
      });
    }

    return report;
  }

  private async resolveLane(id: string): Promise<Lane> {
    const key = this.descriptor.keys.lanes;
    const raw = await this.store.hashGet(key, id);
    return raw === null ? laneFromJobId(this.descriptor, id) : parseLane(`${key}/${id}`, raw);
  }

  private async dropDeadLetters(): Promise<number> {
    const key = this.descriptor.keys.dead;
    const ids = Array.from((await this.store.hashGetAll(key)).keys());
    await this.store.batch([
      { op: 'delete', keys: ids },
      { op: 'delete', keys: [key] },
    ]);
    return ids.length;
  }

  private logLeaseLost(id: string, action: 'complete' | 'error' | 'defer'): void {
    this.logger.log('warn', LEASE_LOST_CATEGORY[action], `Lease no longer held; ${action} ignored`, {
      queue: this.name,
      jobId: id,
    });
  }

  private requireFeature(flag: FeatureFlag): void {
    if (!this.descriptor[flag]) {
      throw new ConfigurationError(`queue "${this.name}" was built without ${FEATURE_NAMES[flag]}`);
    }
  }
}

/**
 * Registered queue names with their creation time, sorted by name
 */
export async function listQueues(store: StoreAdapter): Promise<QueueRegistration[]> {
  const registry = await store.hashGetAll(REGISTRY_KEY);
  return Array.from(registry, ([name, raw]) => ({
    name,
    createdAt: parseTimestamp(`${REGISTRY_KEY}/${name}`, raw),
  })).sort((a, b) => a.name.localeCompare(b.name));
}
