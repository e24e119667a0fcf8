import { describe, it } from 'mocha';
import { strict as assert } from 'assert';
import { ErrorCategory, ErrorCode, getErrorCategory, getErrorMessage } from '../../../src/errors/error-codes';
import {
  QueueError,
  ConfigurationError,
  CapabilityConflictError,
  JobNotFoundError,
  LockConflictError,
  DuplicateResultError,
  EmptyResultError,
  MalformedRecordError,
  StoreTypeError,
} from '../../../src/errors/queue-error';

describe('Error Codes', () => {
  it('maps every code to a category by its hundreds digit', () => {
    assert.equal(getErrorCategory(ErrorCode.E101_FEATURE_DISABLED), ErrorCategory.CONFIGURATION);
    assert.equal(getErrorCategory(ErrorCode.E103_INVALID_QUEUE_OPTION), ErrorCategory.CONFIGURATION);
    assert.equal(getErrorCategory(ErrorCode.E202_JOB_NOT_FOUND), ErrorCategory.LIFECYCLE);
    assert.equal(getErrorCategory(ErrorCode.E301_LOCK_CONFLICT), ErrorCategory.LOCKING);
    assert.equal(getErrorCategory(ErrorCode.E402_EMPTY_RESULT), ErrorCategory.RESULTS);
    assert.equal(getErrorCategory(ErrorCode.E502_WRONG_RECORD_TYPE), ErrorCategory.STORAGE);
  });

  it('has a base message for every code', () => {
    for (const code of Object.values(ErrorCode)) {
      assert.ok(getErrorMessage(code).length > 0, `${code} has no message`);
    }
  });
});

describe('QueueError', () => {
  it('formats the message as [code] base: context', () => {
    const error = new QueueError(ErrorCode.E202_JOB_NOT_FOUND, 'jobs:abc');
    assert.equal(error.message, '[E202] Job not found: jobs:abc');
    assert.equal(error.code, ErrorCode.E202_JOB_NOT_FOUND);
    assert.equal(error.category, ErrorCategory.LIFECYCLE);
    assert.equal(error.context, 'jobs:abc');
  });

  it('omits the context part when none is given', () => {
    const error = new QueueError(ErrorCode.E301_LOCK_CONFLICT);
    assert.equal(error.message, '[E301] Job is already leased');
    assert.equal(error.context, undefined);
  });

  it('keeps the prototype chain for instanceof checks', () => {
    const error = new LockConflictError('jobs:1', 'high');
    assert.ok(error instanceof LockConflictError);
    assert.ok(error instanceof QueueError);
    assert.ok(error instanceof Error);
    assert.equal(error.name, 'LockConflictError');
  });
});

describe('QueueError subclasses', () => {
  it('ConfigurationError defaults to E101 and accepts another configuration code', () => {
    assert.equal(new ConfigurationError('no results').code, ErrorCode.E101_FEATURE_DISABLED);
    const invalid = new ConfigurationError('bad name', ErrorCode.E102_INVALID_QUEUE_NAME);
    assert.equal(invalid.message, '[E102] Invalid queue name: bad name');
  });

  it('CapabilityConflictError carries E201', () => {
    assert.equal(new CapabilityConflictError('both').code, ErrorCode.E201_CAPABILITY_CONFLICT);
  });

  it('JobNotFoundError appends the reason after the job id', () => {
    const error = new JobNotFoundError('jobs:7', 'not in dead letters');
    assert.equal(error.message, '[E202] Job not found: jobs:7 (not in dead letters)');
    assert.equal(error.jobId, 'jobs:7');
    assert.equal(new JobNotFoundError('jobs:8').message, '[E202] Job not found: jobs:8');
  });

  it('LockConflictError records the job and the lane it was restored to', () => {
    const error = new LockConflictError('jobs:HIGH:1', 'high');
    assert.equal(error.message, '[E301] Job is already leased: jobs:HIGH:1 (restored to high lane)');
    assert.equal(error.jobId, 'jobs:HIGH:1');
    assert.equal(error.lane, 'high');
  });

  it('result errors carry the job id', () => {
    assert.equal(new DuplicateResultError('jobs:1').jobId, 'jobs:1');
    assert.equal(new EmptyResultError('jobs:2').message, '[E402] Cannot store an empty result: jobs:2');
  });

  it('MalformedRecordError quotes the raw value', () => {
    const error = new MalformedRecordError('jobs:LOCKED/jobs:1', 'soon', 'epoch seconds');
    assert.equal(
      error.message,
      '[E501] Malformed record in store: jobs:LOCKED/jobs:1: expected epoch seconds, got "soon"'
    );
    assert.equal(error.raw, 'soon');
  });

  it('StoreTypeError names both kinds', () => {
    const error = new StoreTypeError('jobs', 'hash', 'list');
    assert.equal(error.context, 'jobs holds a list, expected a hash');
    assert.equal(error.category, ErrorCategory.STORAGE);
  });
});
