import { describe, it } from 'mocha';
import { strict as assert } from 'assert';
import {
  QUEUE_DEFAULTS,
  REGISTRY_KEY,
  validateQueueName,
  resolveQueueOptions,
  queueOptionsFromEnv,
  storeConfigFromEnv,
} from '../../../src/config/queue-config';
import { ConfigurationError } from '../../../src/errors/queue-error';
import { ErrorCode } from '../../../src/errors/error-codes';

function assertConfigError(fn: () => unknown, code: ErrorCode): void {
  assert.throws(fn, (error: unknown) => error instanceof ConfigurationError && error.code === code);
}

describe('Queue Configuration', () => {
  describe('validateQueueName', () => {
    it('accepts letters, digits, underscore, dot and dash', () => {
      assert.equal(validateQueueName('emails'), undefined);
      assert.equal(validateQueueName('billing.v2_retry-queue'), undefined);
      assert.equal(validateQueueName('0day'), undefined);
    });

    it('rejects empty names', () => {
      assert.equal(validateQueueName(''), 'Queue name cannot be empty');
    });

    it('rejects names containing the key separator', () => {
      assert.ok(validateQueueName('a:b')?.startsWith('Invalid queue name: "a:b"'));
    });

    it('rejects names starting with punctuation', () => {
      assert.notEqual(validateQueueName('-jobs'), undefined);
      assert.notEqual(validateQueueName('.jobs'), undefined);
    });

    it('rejects names over 128 characters', () => {
      assert.equal(validateQueueName('a'.repeat(128)), undefined);
      assert.equal(validateQueueName('a'.repeat(129)), 'Queue name too long: 129 characters (max 128)');
    });

    it('reserves the registry key', () => {
      assert.equal(validateQueueName(REGISTRY_KEY), 'Reserved queue name: "QUEUEREGISTER"');
    });
  });

  describe('resolveQueueOptions', () => {
    it('applies defaults', () => {
      assert.deepEqual(resolveQueueOptions({ name: 'jobs' }), { name: 'jobs', ...QUEUE_DEFAULTS });
      assert.equal(QUEUE_DEFAULTS.maxAttempts, 5);
      assert.equal(QUEUE_DEFAULTS.leaseTimeoutSeconds, 3600);
    });

    it('keeps explicit values', () => {
      const resolved = resolveQueueOptions({
        name: 'jobs',
        maxAttempts: 2,
        leaseTimeoutSeconds: 0.5,
        deadLetterEnabled: true,
        retainDeadPayload: true,
      });
      assert.equal(resolved.maxAttempts, 2);
      assert.equal(resolved.leaseTimeoutSeconds, 0.5);
      assert.equal(resolved.retainDeadPayload, true);
      assert.equal(resolved.priorityEnabled, false);
    });

    it('rejects an invalid name with E102', () => {
      assertConfigError(() => resolveQueueOptions({ name: 'bad name' }), ErrorCode.E102_INVALID_QUEUE_NAME);
    });

    it('rejects a non-positive or fractional maxAttempts with E103', () => {
      assertConfigError(() => resolveQueueOptions({ name: 'jobs', maxAttempts: 0 }), ErrorCode.E103_INVALID_QUEUE_OPTION);
      assertConfigError(() => resolveQueueOptions({ name: 'jobs', maxAttempts: 1.5 }), ErrorCode.E103_INVALID_QUEUE_OPTION);
    });

    it('rejects a non-positive lease timeout', () => {
      assertConfigError(
        () => resolveQueueOptions({ name: 'jobs', leaseTimeoutSeconds: 0 }),
        ErrorCode.E103_INVALID_QUEUE_OPTION
      );
      assertConfigError(
        () => resolveQueueOptions({ name: 'jobs', leaseTimeoutSeconds: Number.POSITIVE_INFINITY }),
        ErrorCode.E103_INVALID_QUEUE_OPTION
      );
    });

    it('requires dead letters for retainDeadPayload', () => {
      assertConfigError(
        () => resolveQueueOptions({ name: 'jobs', retainDeadPayload: true }),
        ErrorCode.E103_INVALID_QUEUE_OPTION
      );
    });
  });

  describe('queueOptionsFromEnv', () => {
    it('leaves unset variables to the defaults', () => {
      assert.deepEqual(queueOptionsFromEnv('jobs', {}), { name: 'jobs' });
    });

    it('reads every variable', () => {
      const options = queueOptionsFromEnv('jobs', {
        LEASE_QUEUE_MAX_ATTEMPTS: '3',
        LEASE_QUEUE_LEASE_TIMEOUT_SECONDS: ' 60 ',
        LEASE_QUEUE_RESULTS: 'true',
        LEASE_QUEUE_ACK: '1',
        LEASE_QUEUE_DEAD_LETTER: 'TRUE',
        LEASE_QUEUE_RETAIN_DEAD_PAYLOAD: '0',
        LEASE_QUEUE_PRIORITY: 'false',
      });
      assert.deepEqual(options, {
        name: 'jobs',
        maxAttempts: 3,
        leaseTimeoutSeconds: 60,
        resultsEnabled: true,
        ackEnabled: true,
        deadLetterEnabled: true,
        retainDeadPayload: false,
        priorityEnabled: false,
      });
    });

    it('treats empty strings as unset', () => {
      assert.deepEqual(queueOptionsFromEnv('jobs', { LEASE_QUEUE_MAX_ATTEMPTS: '' }), { name: 'jobs' });
    });

    it('rejects malformed numbers and flags', () => {
      assertConfigError(
        () => queueOptionsFromEnv('jobs', { LEASE_QUEUE_MAX_ATTEMPTS: '3x' }),
        ErrorCode.E103_INVALID_QUEUE_OPTION
      );
      assertConfigError(
        () => queueOptionsFromEnv('jobs', { LEASE_QUEUE_ACK: 'yes' }),
        ErrorCode.E103_INVALID_QUEUE_OPTION
      );
    });
  });

  describe('storeConfigFromEnv', () => {
    it('reads endpoint, table and region', () => {
      assert.deepEqual(
        storeConfigFromEnv({
          LEASE_QUEUE_DYNAMODB_ENDPOINT: 'http://localhost:8000',
          LEASE_QUEUE_TABLE: 'queues-test',
          LEASE_QUEUE_REGION: 'local',
        }),
        { endpoint: 'http://localhost:8000', tableName: 'queues-test', region: 'local' }
      );
    });

    it('returns an empty config when nothing is set', () => {
      assert.deepEqual(storeConfigFromEnv({}), {});
    });
  });
});
