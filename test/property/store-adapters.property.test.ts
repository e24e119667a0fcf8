/**
 * Property-based tests for the store adapters
 *
 * Random list and hash command sequences against the in-memory store and
 * the DynamoDB store agree with a plain array/Map model.
 */

import { describe, it } from 'mocha';
import { strict as assert } from 'assert';
import * as fc from 'fast-check';
import { InMemoryStore } from '../../src/store/in-memory-store';
import { DynamoDBStore } from '../../src/store/dynamodb-store';
import type { StoreAdapter } from '../../src/store/store-adapter';
import { FakeItemTable } from '../helpers/fake-item-table';

const MIN_RUNS = 100;

type ListOp = { op: 'pushLeft'; value: string } | { op: 'pushRight'; value: string } | { op: 'popRight' };

type HashOp =
  | { op: 'set'; field: string; value: string }
  | { op: 'setIfAbsent'; field: string; value: string }
  | { op: 'incr'; field: string; by: number }
  | { op: 'delete'; field: string }
  | { op: 'deleteIfEquals'; field: string; expected: string };

const value = fc.string({ minLength: 1, maxLength: 8 });
const field = fc.constantFrom('a', 'b', 'c');

const listOps = fc.array(
  fc.oneof(
    value.map((v): ListOp => ({ op: 'pushLeft', value: v })),
    value.map((v): ListOp => ({ op: 'pushRight', value: v })),
    fc.constant<ListOp>({ op: 'popRight' })
  ),
  { maxLength: 30 }
);

const hashOps = fc.array(
  fc.oneof(
    fc.tuple(field, fc.integer({ min: 0, max: 99 })).map(([f, n]): HashOp => ({ op: 'set', field: f, value: String(n) })),
    fc.tuple(field, fc.integer({ min: 0, max: 99 })).map(([f, n]): HashOp => ({ op: 'setIfAbsent', field: f, value: String(n) })),
    fc.tuple(field, fc.integer({ min: 1, max: 5 })).map(([f, by]): HashOp => ({ op: 'incr', field: f, by })),
    field.map((f): HashOp => ({ op: 'delete', field: f })),
    fc.tuple(field, fc.integer({ min: 0, max: 9 })).map(([f, n]): HashOp => ({ op: 'deleteIfEquals', field: f, expected: String(n) }))
  ),
  { maxLength: 30 }
);

const adapters: Array<[string, () => StoreAdapter]> = [
  ['InMemoryStore', () => new InMemoryStore()],
  ['DynamoDBStore', () => new DynamoDBStore(new FakeItemTable())],
];

describe('Store adapter properties (Property-based)', () => {
  for (const [name, create] of adapters) {
    describe(name, () => {
      it('list operations behave as a deque popped from the tail', async () => {
        await fc.assert(
          fc.asyncProperty(listOps, async ops => {
            const store = create();
            const model: string[] = [];

            for (const step of ops) {
              if (step.op === 'pushLeft') {
                await store.listPushLeft('l', step.value);
                model.unshift(step.value);
              } else if (step.op === 'pushRight') {
                await store.listPushRight('l', step.value);
                model.push(step.value);
              } else {
                assert.equal(await store.listPopRight('l'), model.pop() ?? null);
              }
            }

            assert.deepEqual(await store.listRange('l'), model);
            assert.equal(await store.listLength('l'), model.length);
          }),
          { numRuns: MIN_RUNS }
        );
      });

      it('hash operations match a Map', async () => {
        await fc.assert(
          fc.asyncProperty(hashOps, async ops => {
            const store = create();
            const model = new Map<string, string>();

            for (const step of ops) {
              switch (step.op) {
                case 'set':
                  await store.hashSet('h', step.field, step.value);
                  model.set(step.field, step.value);
                  break;
                case 'setIfAbsent': {
                  const written = await store.hashSetIfAbsent('h', step.field, step.value);
                  assert.equal(written, !model.has(step.field));
                  if (written) model.set(step.field, step.value);
                  break;
                }
                case 'incr': {
                  const next = Number(model.get(step.field) ?? '0') + step.by;
                  assert.equal(await store.hashIncrBy('h', step.field, step.by), next);
                  model.set(step.field, String(next));
                  break;
                }
                case 'delete':
                  assert.equal(await store.hashDelete('h', [step.field]), model.delete(step.field) ? 1 : 0);
                  break;
                case 'deleteIfEquals': {
                  const held = model.get(step.field) === step.expected;
                  assert.equal(await store.hashDeleteIfEquals('h', step.field, step.expected), held);
                  if (held) model.delete(step.field);
                  break;
                }
              }
            }

            const actual = await store.hashGetAll('h');
            assert.deepEqual(
              Array.from(actual).sort(),
              Array.from(model).sort()
            );
          }),
          { numRuns: MIN_RUNS }
        );
      });
    });
  }
});
