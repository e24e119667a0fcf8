/**
 * Job Record
 *
 * Shapes and strict parsers for the per-job values the queue keeps in the
 * store. Stored scalars are never evaluated: a value that does not match its
 * expected format raises MalformedRecordError.
 */

import { MalformedRecordError } from '../errors/queue-error';

/**
 * Pending list a job belongs to
 */
export type Lane = 'normal' | 'high';

export const LANES: readonly Lane[] = ['normal', 'high'];

/**
 * One message instance as seen by a consumer
 */
export interface JobRecord {
  id: string;
  payload: Buffer;
  lane: Lane;
  /** Epoch milliseconds the current lease was granted; null when not leased */
  leasedAt: number | null;
}

/**
 * Entry in the dead-letter store
 */
export interface DeadLetter {
  id: string;
  lane: Lane;
  attempts: number;
  /** Epoch milliseconds */
  deadAt: number;
}

const TIMESTAMP_PATTERN = /^\d+(\.\d{1,3})?$/;
const COUNTER_PATTERN = /^\d+$/;

/**
 * Format epoch milliseconds as epoch seconds with millisecond precision
 */
export function formatTimestamp(epochMs: number): string {
  return (epochMs / 1000).toFixed(3);
}

/**
 * Parse a stored epoch-seconds timestamp back to epoch milliseconds
 */
export function parseTimestamp(key: string, raw: string): number {
  if (!TIMESTAMP_PATTERN.test(raw)) {
    throw new MalformedRecordError(key, raw, 'epoch seconds');
  }
  return Math.round(Number(raw) * 1000);
}

/**
 * Parse a stored attempt counter; an absent counter is zero attempts
 */
export function parseAttempts(key: string, raw: string | null): number {
  if (raw === null) {
    return 0;
  }
  if (!COUNTER_PATTERN.test(raw)) {
    throw new MalformedRecordError(key, raw, 'non-negative integer');
  }
  return Number.parseInt(raw, 10);
}

export function isLane(value: unknown): value is Lane {
  return value === 'normal' || value === 'high';
}

export function parseLane(key: string, raw: string): Lane {
  if (!isLane(raw)) {
    throw new MalformedRecordError(key, raw, 'lane name');
  }
  return raw;
}

/**
 * Serialize a dead-letter entry for the dead-letter hash
 */
export function encodeDeadLetter(entry: Omit<DeadLetter, 'id'>): string {
  return JSON.stringify({
    dead_at: formatTimestamp(entry.deadAt),
    lane: entry.lane,
    attempts: entry.attempts,
  });
}

export function decodeDeadLetter(key: string, id: string, raw: string): DeadLetter {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new MalformedRecordError(key, raw, 'dead-letter record');
  }

  if (
    typeof parsed !== 'object' ||
    parsed === null ||
    !('dead_at' in parsed) ||
    !('lane' in parsed) ||
    !('attempts' in parsed) ||
    typeof parsed.dead_at !== 'string' ||
    !isLane(parsed.lane) ||
    typeof parsed.attempts !== 'number' ||
    !Number.isInteger(parsed.attempts) ||
    parsed.attempts < 0
  ) {
    throw new MalformedRecordError(key, raw, 'dead-letter record');
  }

  return {
    id,
    lane: parsed.lane,
    attempts: parsed.attempts,
    deadAt: parseTimestamp(key, parsed.dead_at),
  };
}
