/**
 * Job Handle
 *
 * A consumer's view of one job. Exactly one of complete / error / defer may
 * be called per handle; a second terminal call throws. A leased handle
 * settles only while its lease is still the job's current one.
 */

import { CapabilityConflictError } from '../errors/queue-error';
import type { CompleteOutcome, DeferOutcome, FailOutcome, LeaseQueue, SettleOptions } from './lease-queue';
import type { JobRecord, Lane } from './job-record';

export type Settlement = 'completed' | 'failed' | 'deferred';

export class JobHandle {
  readonly id: string;
  readonly lane: Lane;
  readonly payload: Buffer;
  /** Epoch milliseconds of the lease backing this handle; null for a handle from enqueue */
  readonly leasedAt: number | null;

  private readonly queue: LeaseQueue;
  private settledAs: Settlement | null = null;
  private cachedResult: Buffer | null = null;

  constructor(queue: LeaseQueue, record: JobRecord) {
    this.queue = queue;
    this.id = record.id;
    this.lane = record.lane;
    this.payload = record.payload;
    this.leasedAt = record.leasedAt;
  }

  get settlement(): Settlement | null {
    return this.settledAs;
  }

  isSettled(): boolean {
    return this.settledAs !== null;
  }

  async complete(): Promise<CompleteOutcome> {
    return this.settle('completed', () => this.queue.complete(this.id, this.settleOptions()));
  }

  async error(): Promise<FailOutcome> {
    return this.settle('failed', () => this.queue.error(this.id, this.settleOptions()));
  }

  async defer(): Promise<DeferOutcome> {
    return this.settle('deferred', () => this.queue.defer(this.id, this.settleOptions()));
  }

  async attempts(): Promise<number> {
    return this.queue.getAttempts(this.id);
  }

  /**
   * Stored result, fetched once and cached on the handle
   */
  async getResult(): Promise<Buffer | null> {
    if (this.cachedResult === null) {
      this.cachedResult = await this.queue.getResult(this.id);
    }
    return this.cachedResult;
  }

  async setResult(data: Buffer): Promise<void> {
    await this.queue.putResult(this.id, data);
    this.cachedResult = data;
  }

  toJSON(): { queue: string; id: string; lane: Lane; leasedAt: number | null } {
    return { queue: this.queue.name, id: this.id, lane: this.lane, leasedAt: this.leasedAt };
  }

  private settleOptions(): SettleOptions {
    return this.leasedAt === null ? { lane: this.lane } : { lane: this.lane, leasedAt: this.leasedAt };
  }

  private async settle<T>(as: Settlement, transition: () => Promise<T>): Promise<T> {
    if (this.settledAs !== null) {
      throw new CapabilityConflictError(`job ${this.id} is already ${this.settledAs}, cannot mark it ${as}`);
    }
    this.settledAs = as;
    try {
      return await transition();
    } catch (error) {
      // A failed transition leaves the handle open
      this.settledAs = null;
      throw error;
    }
  }
}
