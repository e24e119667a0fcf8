import { describe, it } from 'mocha';
import { strict as assert } from 'assert';
import {
  DynamoDBItemTable,
  DEFAULT_TABLE_NAME,
  buildCondition,
  isConditionalCheckFailed,
  toTableItem,
} from '../../../src/store/dynamodb-table';
import { MalformedRecordError } from '../../../src/errors/queue-error';

describe('DynamoDB Item Table', () => {
  describe('buildCondition', () => {
    it('translates absent and present', () => {
      assert.deepEqual(buildCondition({ kind: 'absent' }), { ConditionExpression: 'attribute_not_exists(pk)' });
      assert.deepEqual(buildCondition({ kind: 'present' }), { ConditionExpression: 'attribute_exists(pk)' });
    });

    it('lets an expired item count as absent', () => {
      assert.deepEqual(buildCondition({ kind: 'absentOrExpired', nowSeconds: 1700000000 }), {
        ConditionExpression: 'attribute_not_exists(pk) OR expires_at <= :now',
        ExpressionAttributeValues: { ':now': 1700000000 },
      });
    });

    it('aliases the value attribute for compare-and-swap', () => {
      assert.deepEqual(buildCondition({ kind: 'valueEquals', value: '3' }), {
        ConditionExpression: '#v = :expected',
        ExpressionAttributeNames: { '#v': 'v' },
        ExpressionAttributeValues: { ':expected': '3' },
      });
    });
  });

  describe('isConditionalCheckFailed', () => {
    it('matches errors by name', () => {
      const rejected = Object.assign(new Error('The conditional request failed'), {
        name: 'ConditionalCheckFailedException',
      });
      assert.equal(isConditionalCheckFailed(rejected), true);
      assert.equal(isConditionalCheckFailed(new Error('timeout')), false);
      assert.equal(isConditionalCheckFailed('ConditionalCheckFailedException'), false);
      assert.equal(isConditionalCheckFailed(null), false);
    });
  });

  describe('toTableItem', () => {
    it('keeps string values and expiry', () => {
      assert.deepEqual(toTableItem({ pk: 'q', sk: 'F#a', v: '1', expires_at: 5 }), {
        pk: 'q',
        sk: 'F#a',
        v: '1',
        expires_at: 5,
      });
    });

    it('converts binary values to Buffers', () => {
      const item = toTableItem({ pk: 'q:1', sk: '#', v: new Uint8Array([104, 105]) });
      assert.ok(Buffer.isBuffer(item.v));
      assert.equal(item.v.toString(), 'hi');
    });

    it('accepts rows without a value', () => {
      assert.deepEqual(toTableItem({ pk: 'q', sk: '#' }), { pk: 'q', sk: '#' });
    });

    it('rejects rows with missing keys or unexpected attribute types', () => {
      assert.throws(() => toTableItem({ sk: '#' }), MalformedRecordError);
      assert.throws(() => toTableItem({ pk: 'q', sk: '#', v: 3 }), MalformedRecordError);
      assert.throws(() => toTableItem({ pk: 'q', sk: '#', expires_at: '5' }), MalformedRecordError);
    });
  });

  describe('DynamoDBItemTable', () => {
    it('defaults to the local endpoint and the default table', () => {
      const table = new DynamoDBItemTable();
      try {
        assert.equal(table.getTableName(), DEFAULT_TABLE_NAME);
        assert.equal(table.getEndpoint(), 'http://localhost:8000');
      } finally {
        table.destroy();
      }
    });

    it('takes endpoint and table from config', () => {
      const table = new DynamoDBItemTable({ endpoint: 'http://127.0.0.1:8001', tableName: 'queues-test' });
      try {
        assert.equal(table.getTableName(), 'queues-test');
        assert.equal(table.getEndpoint(), 'http://127.0.0.1:8001');
      } finally {
        table.destroy();
      }
    });
  });
});
