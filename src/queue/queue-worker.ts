/**
 * Queue Worker - polls a LeaseQueue and runs a processor per job
 *
 * Features:
 * - Polling interval configurable (default 1000ms)
 * - 1 job per tick
 * - In-flight limit: 1 (no concurrent processing, including while dequeuing)
 * - A throwing processor fails the job (error path, retry or dead letter)
 * - A job whose lease was lost mid-processing is reported, not settled
 */

import { EventEmitter } from 'events';
import { LockConflictError } from '../errors/queue-error';
import { getQueueLogger, type QueueLogger } from '../logging/queue-logger';
import type { FailOutcome, LeaseQueue } from './lease-queue';
import type { JobHandle } from './job-handle';

/**
 * Processor outcome; returning nothing completes the job
 */
export type JobDisposition = 'complete' | 'error' | 'defer';

export type JobProcessor = (job: JobHandle) => Promise<JobDisposition | void>;

function isDisposition(value: unknown): value is JobDisposition {
  return value === 'complete' || value === 'error' || value === 'defer';
}

/**
 * Worker configuration
 */
export interface QueueWorkerConfig {
  /** Polling interval in milliseconds (default: 1000) */
  pollIntervalMs?: number;
  /** Pick lanes uniformly instead of preferring high priority (default: false) */
  ignorePriority?: boolean;
  logger?: QueueLogger;
}

/**
 * Worker state
 */
export interface QueueWorkerState {
  isRunning: boolean;
  inFlight: string | null;
  lastPollAt: string | null;
  jobsCompleted: number;
  jobsFailed: number;
  jobsDeferred: number;
  lockConflicts: number;
  leasesLost: number;
  pollErrors: number;
}

/**
 * Worker events
 */
export interface QueueWorkerEvents {
  started: [];
  stopped: [];
  leased: [JobHandle];
  completed: [JobHandle];
  failed: [JobHandle, Error | null, FailOutcome];
  deferred: [JobHandle];
  'lease-lost': [JobHandle];
  idle: [];
  'lock-conflict': [LockConflictError];
  'poll-error': [Error];
}

export class QueueWorker extends EventEmitter {
  private readonly queue: LeaseQueue;
  private readonly processor: JobProcessor;
  private readonly pollIntervalMs: number;
  private readonly ignorePriority: boolean;
  private readonly logger: QueueLogger;

  private pollTimer: ReturnType<typeof setInterval> | null = null;
  private inFlight: JobHandle | null = null;
  private isRunning: boolean = false;
  private polling: boolean = false;
  private lastPollAt: string | null = null;
  private jobsCompleted: number = 0;
  private jobsFailed: number = 0;
  private jobsDeferred: number = 0;
  private lockConflicts: number = 0;
  private leasesLost: number = 0;
  private pollErrors: number = 0;

  constructor(queue: LeaseQueue, processor: JobProcessor, config: QueueWorkerConfig = {}) {
    super();
    this.queue = queue;
    this.processor = processor;
    this.pollIntervalMs = config.pollIntervalMs ?? 1000;
    this.ignorePriority = config.ignorePriority ?? false;
    this.logger = config.logger ?? getQueueLogger();
  }

  /**
   * Start polling; the first poll runs before this resolves
   */
  async start(): Promise<void> {
    if (this.isRunning) {
      return;
    }

    this.isRunning = true;
    this.emit('started');

    this.pollTimer = setInterval(() => {
      void this.poll();
    }, this.pollIntervalMs);

    await this.poll();
  }

  /**
   * Stop polling. A job already in flight finishes on its own.
   */
  stop(): void {
    if (!this.isRunning) {
      return;
    }

    this.isRunning = false;

    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = null;
    }

    this.emit('stopped');
  }

  /**
   * Single poll iteration; never rejects; store failures surface as 'poll-error'
   */
  async poll(): Promise<void> {
    if (!this.isRunning || this.polling) {
      return;
    }

    this.polling = true;
    this.lastPollAt = new Date().toISOString();

    try {
      await this.processNext();
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      if (failure instanceof LockConflictError) {
        this.lockConflicts++;
        this.emit('lock-conflict', failure);
        return;
      }
      this.pollErrors++;
      this.logger.logError('Worker poll failed', failure, { queue: this.queue.name });
      this.emit('poll-error', failure);
    } finally {
      this.inFlight = null;
      this.polling = false;
    }
  }

  getState(): QueueWorkerState {
    return {
      isRunning: this.isRunning,
      inFlight: this.inFlight ? this.inFlight.id : null,
      lastPollAt: this.lastPollAt,
      jobsCompleted: this.jobsCompleted,
      jobsFailed: this.jobsFailed,
      jobsDeferred: this.jobsDeferred,
      lockConflicts: this.lockConflicts,
      leasesLost: this.leasesLost,
      pollErrors: this.pollErrors,
    };
  }

  isActive(): boolean {
    return this.isRunning;
  }

  private async processNext(): Promise<void> {
    const job = await this.queue.dequeue({ ignorePriority: this.ignorePriority });
    if (!job) {
      this.emit('idle');
      return;
    }

    this.inFlight = job;
    this.emit('leased', job);

    let disposition: JobDisposition;
    let processorError: Error | null = null;
    try {
      const returned = await this.processor(job);
      disposition = isDisposition(returned) ? returned : 'complete';
    } catch (error) {
      processorError = error instanceof Error ? error : new Error(String(error));
      disposition = 'error';
    }

    if (job.isSettled()) {
      // The processor settled the job through its handle
      return;
    }

    switch (disposition) {
      case 'complete':
        if ((await job.complete()) === 'ignored') {
          this.reportLeaseLost(job);
          break;
        }
        this.jobsCompleted++;
        this.emit('completed', job);
        break;
      case 'defer':
        if ((await job.defer()) === 'ignored') {
          this.reportLeaseLost(job);
          break;
        }
        this.jobsDeferred++;
        this.emit('deferred', job);
        break;
      case 'error': {
        const outcome = await job.error();
        if (outcome === 'ignored') {
          this.leasesLost++;
        } else {
          this.jobsFailed++;
        }
        if (processorError) {
          this.logger.logError('Job processor threw', processorError, {
            queue: this.queue.name,
            jobId: job.id,
          });
        }
        this.emit('failed', job, processorError, outcome);
        break;
      }
    }
  }

  private reportLeaseLost(job: JobHandle): void {
    this.leasesLost++;
    this.emit('lease-lost', job);
  }
}
