/**
 * Queue Error - base error class and taxonomy for the lease queue
 *
 * Backend connectivity failures are never wrapped: they propagate to the
 * caller as thrown by the store client.
 */

import { ErrorCategory, ErrorCode, getErrorCategory, getErrorMessage } from './error-codes';
import type { Lane } from '../queue/job-record';

/**
 * Base error class for the lease queue
 */
export class QueueError extends Error {
  public readonly code: ErrorCode;
  public readonly category: ErrorCategory;
  public readonly context?: string;

  constructor(code: ErrorCode, context?: string) {
    const baseMessage = getErrorMessage(code);
    const fullMessage = context
      ? `[${code}] ${baseMessage}: ${context}`
      : `[${code}] ${baseMessage}`;

    super(fullMessage);
    this.name = 'QueueError';
    this.code = code;
    this.category = getErrorCategory(code);
    this.context = context;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Requested a feature (results, acks, priority, dead letters) the queue was
 * built without, or supplied invalid options.
 */
export class ConfigurationError extends QueueError {
  constructor(context: string, code: ErrorCode = ErrorCode.E101_FEATURE_DISABLED) {
    super(code, context);
    this.name = 'ConfigurationError';
  }
}

/**
 * Mutually exclusive transitions requested for the same job
 */
export class CapabilityConflictError extends QueueError {
  constructor(context: string) {
    super(ErrorCode.E201_CAPABILITY_CONFLICT, context);
    this.name = 'CapabilityConflictError';
  }
}

export class JobNotFoundError extends QueueError {
  public readonly jobId: string;

  constructor(jobId: string, context?: string) {
    super(ErrorCode.E202_JOB_NOT_FOUND, context ? `${jobId} (${context})` : jobId);
    this.name = 'JobNotFoundError';
    this.jobId = jobId;
  }
}

/**
 * A lease already existed for a freshly popped job.
 * The job has been pushed back onto its lane before this is thrown.
 */
export class LockConflictError extends QueueError {
  public readonly jobId: string;
  public readonly lane: Lane;

  constructor(jobId: string, lane: Lane) {
    super(ErrorCode.E301_LOCK_CONFLICT, `${jobId} (restored to ${lane} lane)`);
    this.name = 'LockConflictError';
    this.jobId = jobId;
    this.lane = lane;
  }
}

export class DuplicateResultError extends QueueError {
  public readonly jobId: string;

  constructor(jobId: string) {
    super(ErrorCode.E401_DUPLICATE_RESULT, jobId);
    this.name = 'DuplicateResultError';
    this.jobId = jobId;
  }
}

export class EmptyResultError extends QueueError {
  public readonly jobId: string;

  constructor(jobId: string) {
    super(ErrorCode.E402_EMPTY_RESULT, jobId);
    this.name = 'EmptyResultError';
    this.jobId = jobId;
  }
}

/**
 * A stored scalar (timestamp, counter, dead-letter record) failed strict parsing
 */
export class MalformedRecordError extends QueueError {
  public readonly key: string;
  public readonly raw: string;

  constructor(key: string, raw: string, expected: string) {
    super(ErrorCode.E501_MALFORMED_RECORD, `${key}: expected ${expected}, got ${JSON.stringify(raw)}`);
    this.name = 'MalformedRecordError';
    this.key = key;
    this.raw = raw;
  }
}

export class StoreTypeError extends QueueError {
  public readonly key: string;

  constructor(key: string, expected: string, actual: string) {
    super(ErrorCode.E502_WRONG_RECORD_TYPE, `${key} holds a ${actual}, expected a ${expected}`);
    this.name = 'StoreTypeError';
    this.key = key;
  }
}
