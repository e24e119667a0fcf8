/**
 * Error Codes for the lease queue
 *
 * E1xx: Configuration errors - surfaced immediately, never retried
 * E2xx: Job lifecycle errors - caller logic errors
 * E3xx: Locking errors - backend-level lease races
 * E4xx: Result store errors - write-once violations and empty writes
 * E5xx: Storage errors - malformed or mistyped records in the backend
 */

/**
 * Error Categories
 */
export enum ErrorCategory {
  CONFIGURATION = 'CONFIGURATION',
  LIFECYCLE = 'LIFECYCLE',
  LOCKING = 'LOCKING',
  RESULTS = 'RESULTS',
  STORAGE = 'STORAGE',
}

/**
 * Error Codes
 */
export enum ErrorCode {
  // E1xx: Configuration
  E101_FEATURE_DISABLED = 'E101',
  E102_INVALID_QUEUE_NAME = 'E102',
  E103_INVALID_QUEUE_OPTION = 'E103',

  // E2xx: Job lifecycle
  E201_CAPABILITY_CONFLICT = 'E201',
  E202_JOB_NOT_FOUND = 'E202',

  // E3xx: Locking
  E301_LOCK_CONFLICT = 'E301',

  // E4xx: Results
  E401_DUPLICATE_RESULT = 'E401',
  E402_EMPTY_RESULT = 'E402',

  // E5xx: Storage
  E501_MALFORMED_RECORD = 'E501',
  E502_WRONG_RECORD_TYPE = 'E502',
}

/**
 * Error messages for each error code
 */
const ERROR_MESSAGES: Record<ErrorCode, string> = {
  [ErrorCode.E101_FEATURE_DISABLED]: 'Feature is not enabled for this queue',
  [ErrorCode.E102_INVALID_QUEUE_NAME]: 'Invalid queue name',
  [ErrorCode.E103_INVALID_QUEUE_OPTION]: 'Invalid queue option',

  [ErrorCode.E201_CAPABILITY_CONFLICT]: 'Conflicting job transitions requested',
  [ErrorCode.E202_JOB_NOT_FOUND]: 'Job not found',

  [ErrorCode.E301_LOCK_CONFLICT]: 'Job is already leased',

  [ErrorCode.E401_DUPLICATE_RESULT]: 'Result exists already and cannot be overwritten',
  [ErrorCode.E402_EMPTY_RESULT]: 'Cannot store an empty result',

  [ErrorCode.E501_MALFORMED_RECORD]: 'Malformed record in store',
  [ErrorCode.E502_WRONG_RECORD_TYPE]: 'Operation against a key holding the wrong kind of value',
};

const ERROR_CATEGORIES: Record<ErrorCode, ErrorCategory> = {
  [ErrorCode.E101_FEATURE_DISABLED]: ErrorCategory.CONFIGURATION,
  [ErrorCode.E102_INVALID_QUEUE_NAME]: ErrorCategory.CONFIGURATION,
  [ErrorCode.E103_INVALID_QUEUE_OPTION]: ErrorCategory.CONFIGURATION,
  [ErrorCode.E201_CAPABILITY_CONFLICT]: ErrorCategory.LIFECYCLE,
  [ErrorCode.E202_JOB_NOT_FOUND]: ErrorCategory.LIFECYCLE,
  [ErrorCode.E301_LOCK_CONFLICT]: ErrorCategory.LOCKING,
  [ErrorCode.E401_DUPLICATE_RESULT]: ErrorCategory.RESULTS,
  [ErrorCode.E402_EMPTY_RESULT]: ErrorCategory.RESULTS,
  [ErrorCode.E501_MALFORMED_RECORD]: ErrorCategory.STORAGE,
  [ErrorCode.E502_WRONG_RECORD_TYPE]: ErrorCategory.STORAGE,
};

/**
 * Get the base message for an error code
 */
export function getErrorMessage(code: ErrorCode): string {
  return ERROR_MESSAGES[code];
}

/**
 * Get the category an error code belongs to
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  return ERROR_CATEGORIES[code];
}
