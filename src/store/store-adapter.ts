/**
 * Store Adapter
 *
 * The primitive operations the queue consumes from its backing store.
 * Every method is atomic with respect to the single key it touches;
 * nothing here is atomic across keys, `batch` included.
 *
 * Value kinds:
 * - scalar: opaque bytes, optionally expiring
 * - hash: string fields mapped to string values
 * - list: ordered strings; "left" is the head, "right" is the tail
 */

/**
 * Write command accepted by `batch`
 */
export type StoreCommand =
  | { op: 'set'; key: string; value: Buffer; ttlSeconds?: number }
  | { op: 'delete'; keys: string[] }
  | { op: 'expire'; key: string; ttlSeconds: number }
  | { op: 'hashSet'; key: string; field: string; value: string }
  | { op: 'hashDelete'; key: string; fields: string[] }
  | { op: 'hashIncrBy'; key: string; field: string; by: number }
  | { op: 'listPushLeft'; key: string; value: string }
  | { op: 'listPushRight'; key: string; value: string };

export interface StoreAdapter {
  /** Read a scalar; null when absent or expired */
  get(key: string): Promise<Buffer | null>;
  set(key: string, value: Buffer, ttlSeconds?: number): Promise<void>;
  /** Conditional create; false when the key already holds a live value */
  setIfAbsent(key: string, value: Buffer, ttlSeconds?: number): Promise<boolean>;
  exists(key: string): Promise<boolean>;
  /** Set expiry on a scalar; no-op when the key is absent */
  expire(key: string, ttlSeconds: number): Promise<void>;
  /** Remove keys of any kind */
  delete(keys: string[]): Promise<void>;

  hashGet(key: string, field: string): Promise<string | null>;
  hashGetAll(key: string): Promise<Map<string, string>>;
  hashSet(key: string, field: string, value: string): Promise<void>;
  /** Conditional create of a single field; false when it already exists */
  hashSetIfAbsent(key: string, field: string, value: string): Promise<boolean>;
  /** Atomic increment; a missing field counts as 0. Returns the new value */
  hashIncrBy(key: string, field: string, by: number): Promise<number>;
  /** Returns the number of fields actually removed */
  hashDelete(key: string, fields: string[]): Promise<number>;
  /** Remove a field only while it still holds `expected`; true when removed */
  hashDeleteIfEquals(key: string, field: string, expected: string): Promise<boolean>;

  listPushLeft(key: string, value: string): Promise<void>;
  listPushRight(key: string, value: string): Promise<void>;
  /** Remove and return the tail element; null when the list is empty */
  listPopRight(key: string): Promise<string | null>;
  listLength(key: string): Promise<number>;
  /** Whole list, head first */
  listRange(key: string): Promise<string[]>;

  /**
   * Submit several writes together. Latency optimization only:
   * a failure part-way leaves the earlier commands applied.
   */
  batch(commands: StoreCommand[]): Promise<void>;
}

/**
 * Apply batch commands one after another against the adapter's own primitives
 */
export async function applySequentially(
  store: StoreAdapter,
  commands: StoreCommand[]
): Promise<void> {
  for (const command of commands) {
    switch (command.op) {
      case 'set':
        await store.set(command.key, command.value, command.ttlSeconds);
        break;
      case 'delete':
        await store.delete(command.keys);
        break;
      case 'expire':
        await store.expire(command.key, command.ttlSeconds);
        break;
      case 'hashSet':
        await store.hashSet(command.key, command.field, command.value);
        break;
      case 'hashDelete':
        await store.hashDelete(command.key, command.fields);
        break;
      case 'hashIncrBy':
        await store.hashIncrBy(command.key, command.field, command.by);
        break;
      case 'listPushLeft':
        await store.listPushLeft(command.key, command.value);
        break;
      case 'listPushRight':
        await store.listPushRight(command.key, command.value);
        break;
    }
  }
}
