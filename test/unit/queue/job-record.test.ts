import { describe, it } from 'mocha';
import { strict as assert } from 'assert';
import {
  formatTimestamp,
  parseTimestamp,
  parseAttempts,
  parseLane,
  isLane,
  encodeDeadLetter,
  decodeDeadLetter,
} from '../../../src/queue/job-record';
import { MalformedRecordError } from '../../../src/errors/queue-error';

describe('Job Record', () => {
  describe('timestamps', () => {
    it('formats epoch milliseconds as epoch seconds with three decimals', () => {
      assert.equal(formatTimestamp(1700000000123), '1700000000.123');
      assert.equal(formatTimestamp(5000), '5.000');
    });

    it('parses seconds back to milliseconds', () => {
      assert.equal(parseTimestamp('k', '1700000000.123'), 1700000000123);
      assert.equal(parseTimestamp('k', '12'), 12000);
      assert.equal(parseTimestamp('k', '1.5'), 1500);
    });

    it('rejects anything that is not plain decimal seconds', () => {
      for (const raw of ['', 'soon', '-1', '1e3', '1.2345', ' 12', 'NaN']) {
        assert.throws(() => parseTimestamp('jobs:LOCKED/x', raw), MalformedRecordError, raw);
      }
    });
  });

  describe('parseAttempts', () => {
    it('treats an absent counter as zero', () => {
      assert.equal(parseAttempts('k', null), 0);
    });

    it('parses non-negative integers', () => {
      assert.equal(parseAttempts('k', '0'), 0);
      assert.equal(parseAttempts('k', '17'), 17);
    });

    it('rejects fractions, signs and text', () => {
      for (const raw of ['1.0', '-2', 'two', '']) {
        assert.throws(() => parseAttempts('k', raw), MalformedRecordError, raw);
      }
    });
  });

  describe('lanes', () => {
    it('recognises the two lanes', () => {
      assert.equal(isLane('normal'), true);
      assert.equal(isLane('high'), true);
      assert.equal(isLane('HIGH'), false);
      assert.equal(isLane(1), false);
    });

    it('parseLane fails on unknown lanes', () => {
      assert.equal(parseLane('k', 'high'), 'high');
      assert.throws(() => parseLane('k', 'low'), MalformedRecordError);
    });
  });

  describe('dead-letter records', () => {
    it('encodes the stored JSON shape', () => {
      assert.equal(
        encodeDeadLetter({ deadAt: 1500, lane: 'high', attempts: 2 }),
        '{"dead_at":"1.500","lane":"high","attempts":2}'
      );
    });

    it('decodes a stored record', () => {
      assert.deepEqual(decodeDeadLetter('jobs:DEAD', 'jobs:1', '{"dead_at":"1.500","lane":"high","attempts":2}'), {
        id: 'jobs:1',
        lane: 'high',
        attempts: 2,
        deadAt: 1500,
      });
    });

    it('rejects malformed records', () => {
      const malformed = [
        'not json',
        'null',
        '[]',
        '{"lane":"high","attempts":2}',
        '{"dead_at":"1.500","lane":"low","attempts":2}',
        '{"dead_at":"1.500","lane":"normal","attempts":-1}',
        '{"dead_at":"1.500","lane":"normal","attempts":"2"}',
        '{"dead_at":1.5,"lane":"normal","attempts":2}',
      ];
      for (const raw of malformed) {
        assert.throws(() => decodeDeadLetter('jobs:DEAD', 'jobs:1', raw), MalformedRecordError, raw);
      }
    });
  });
});
