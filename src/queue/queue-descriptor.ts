/**
 * Queue Descriptor
 *
 * Immutable configuration of one named queue plus the store keys derived
 * from its name. Auxiliary keys are fixed suffixes of the queue name; per-job
 * keys are suffixes of the job id.
 */

import { v4 as uuidv4 } from 'uuid';
import { resolveQueueOptions, type QueueOptions, type ResolvedQueueOptions } from '../config/queue-config';
import type { Lane } from './job-record';

/** Retention of acknowledgement records */
export const ACK_TTL_SECONDS = 60 * 60;

/** Retention of stored results */
export const RESULT_TTL_SECONDS = 24 * 60 * 60;

export interface QueueKeys {
  /** Normal pending lane */
  normal: string;
  /** High-priority pending lane */
  high: string;
  /** Lease table: job id -> lease timestamp */
  locked: string;
  /** Attempt table: job id -> attempt count */
  attempts: string;
  /** Lane table: job id -> lane */
  lanes: string;
  /** Dead-letter store: job id -> dead-letter record */
  dead: string;
  /** Orphan sightings: job id -> first time seen in no lane and no lease */
  orphans: string;
}

export interface QueueDescriptor extends Readonly<ResolvedQueueOptions> {
  readonly keys: Readonly<QueueKeys>;
}

export function createQueueDescriptor(options: QueueOptions): QueueDescriptor {
  const resolved = resolveQueueOptions(options);
  const name = resolved.name;

  return Object.freeze({
    ...resolved,
    keys: Object.freeze({
      normal: name,
      high: `${name}:HIGH`,
      locked: `${name}:LOCKED`,
      attempts: `${name}:ATTEMPTS`,
      lanes: `${name}:LANES`,
      dead: `${name}:DEAD`,
      orphans: `${name}:ORPHANS`,
    }),
  });
}

/**
 * List key of a lane
 */
export function laneKey(descriptor: QueueDescriptor, lane: Lane): string {
  return lane === 'high' ? descriptor.keys.high : descriptor.keys.normal;
}

/**
 * Fresh job id; the lane key is its prefix
 */
export function generateJobId(descriptor: QueueDescriptor, lane: Lane): string {
  return `${laneKey(descriptor, lane)}:${uuidv4()}`;
}

/**
 * Lane encoded in a job id's prefix (fallback when the lane table has no entry)
 */
export function laneFromJobId(descriptor: QueueDescriptor, jobId: string): Lane {
  return jobId.startsWith(`${descriptor.keys.high}:`) ? 'high' : 'normal';
}

export function ackKey(jobId: string): string {
  return `${jobId}:ACK`;
}

export function resultKey(jobId: string): string {
  return `${jobId}:RESULT`;
}
