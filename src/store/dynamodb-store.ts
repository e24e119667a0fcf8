/**
 * DynamoDB Store - StoreAdapter over a single DynamoDB table
 *
 * Layout per store key (pk):
 * - sk '#'              scalar value, optional expires_at
 * - sk 'F#<field>'      hash field
 * - sk 'L#<position>'   list element; lowest position is the tail
 * - sk '#HEAD' '#TAIL'  list position counters
 *
 * Counters and hash increments are compare-and-swap loops on a single item.
 * Popping reads the lowest position and deletes it conditionally, retrying
 * when another consumer removed it first.
 */

import { StoreTypeError } from '../errors/queue-error';
import { applySequentially, type StoreAdapter, type StoreCommand } from './store-adapter';
import { DynamoDBItemTable, type DynamoDBStoreConfig, type ItemTable, type TableItem } from './dynamodb-table';

const SCALAR_SK = '#';
const HEAD_SK = '#HEAD';
const TAIL_SK = '#TAIL';
const FIELD_PREFIX = 'F#';
const ITEM_PREFIX = 'L#';

/** Midpoint of the position space: left pushes count up, right pushes count down */
const POSITION_OFFSET = 5_000_000_000_000_000;
const POSITION_WIDTH = 16;

const INTEGER_PATTERN = /^-?\d+$/;

/**
 * Sort key for a list element at the given position
 */
export function listItemSortKey(position: number): string {
  return ITEM_PREFIX + String(position).padStart(POSITION_WIDTH, '0');
}

export interface DynamoDBStoreOptions {
  /** Clock in epoch milliseconds (default: Date.now) */
  now?: () => number;
}

export class DynamoDBStore implements StoreAdapter {
  private readonly table: ItemTable;
  private readonly now: () => number;

  constructor(table: ItemTable, options: DynamoDBStoreOptions = {}) {
    this.table = table;
    this.now = options.now ?? Date.now;
  }

  async get(key: string): Promise<Buffer | null> {
    const item = await this.table.get(key, SCALAR_SK);
    if (!item || this.isExpired(item)) {
      return null;
    }
    return this.scalarValue(item);
  }

  async set(key: string, value: Buffer, ttlSeconds?: number): Promise<void> {
    await this.table.put(this.scalarItem(key, value, ttlSeconds));
  }

  async setIfAbsent(key: string, value: Buffer, ttlSeconds?: number): Promise<boolean> {
    return this.table.put(this.scalarItem(key, value, ttlSeconds), {
      kind: 'absentOrExpired',
      nowSeconds: this.nowSeconds(),
    });
  }

  async exists(key: string): Promise<boolean> {
    // '#', '#HEAD' and '#TAIL' sort first; a fourth row is always a field or element
    const items = await this.table.query(key, { limit: 4 });
    return items.some(item => {
      if (item.sk === HEAD_SK || item.sk === TAIL_SK) {
        return false;
      }
      return !this.isExpired(item);
    });
  }

  async expire(key: string, ttlSeconds: number): Promise<void> {
    await this.table.setExpiry(key, SCALAR_SK, this.expiryFor(ttlSeconds));
  }

  async delete(keys: string[]): Promise<void> {
    for (const key of keys) {
      const items = await this.table.query(key);
      for (const item of items) {
        await this.table.delete(item.pk, item.sk);
      }
    }
  }

  async hashGet(key: string, field: string): Promise<string | null> {
    const item = await this.table.get(key, FIELD_PREFIX + field);
    return item ? this.stringValue(item) : null;
  }

  async hashGetAll(key: string): Promise<Map<string, string>> {
    const items = await this.table.query(key, { prefix: FIELD_PREFIX });
    const fields = new Map<string, string>();
    for (const item of items) {
      fields.set(item.sk.slice(FIELD_PREFIX.length), this.stringValue(item));
    }
    return fields;
  }

  async hashSet(key: string, field: string, value: string): Promise<void> {
    await this.table.put({ pk: key, sk: FIELD_PREFIX + field, v: value });
  }

  async hashSetIfAbsent(key: string, field: string, value: string): Promise<boolean> {
    return this.table.put({ pk: key, sk: FIELD_PREFIX + field, v: value }, { kind: 'absent' });
  }

  async hashIncrBy(key: string, field: string, by: number): Promise<number> {
    return this.increment(key, FIELD_PREFIX + field, by);
  }

  async hashDelete(key: string, fields: string[]): Promise<number> {
    let removed = 0;
    for (const field of fields) {
      const old = await this.table.delete(key, FIELD_PREFIX + field);
      if (old) {
        removed++;
      }
    }
    return removed;
  }

  async hashDeleteIfEquals(key: string, field: string, expected: string): Promise<boolean> {
    const removed = await this.table.delete(key, FIELD_PREFIX + field, { kind: 'valueEquals', value: expected });
    return removed !== null;
  }

  async listPushLeft(key: string, value: string): Promise<void> {
    const head = await this.increment(key, HEAD_SK, 1);
    await this.table.put({ pk: key, sk: listItemSortKey(POSITION_OFFSET + head), v: value });
  }

  async listPushRight(key: string, value: string): Promise<void> {
    const tail = await this.increment(key, TAIL_SK, 1);
    await this.table.put({ pk: key, sk: listItemSortKey(POSITION_OFFSET - tail), v: value });
  }

  async listPopRight(key: string): Promise<string | null> {
    for (;;) {
      const [candidate] = await this.table.query(key, { prefix: ITEM_PREFIX, limit: 1, ascending: true });
      if (!candidate) {
        return null;
      }
      const removed = await this.table.delete(candidate.pk, candidate.sk, { kind: 'present' });
      if (removed) {
        return this.stringValue(removed);
      }
      // Another consumer popped this element first; try the next one
    }
  }

  async listLength(key: string): Promise<number> {
    return this.table.count(key, ITEM_PREFIX);
  }

  async listRange(key: string): Promise<string[]> {
    const items = await this.table.query(key, { prefix: ITEM_PREFIX, ascending: false });
    return items.map(item => this.stringValue(item));
  }

  async batch(commands: StoreCommand[]): Promise<void> {
    await applySequentially(this, commands);
  }

  /**
   * Compare-and-swap increment of an integer item
   */
  private async increment(pk: string, sk: string, by: number): Promise<number> {
    for (;;) {
      const current = await this.table.get(pk, sk);
      const currentValue = current ? this.stringValue(current) : null;
      if (currentValue !== null && !INTEGER_PATTERN.test(currentValue)) {
        throw new StoreTypeError(`${pk}/${sk}`, 'integer', 'non-integer value');
      }

      const next = (currentValue === null ? 0 : Number.parseInt(currentValue, 10)) + by;
      const written = await this.table.put(
        { pk, sk, v: String(next) },
        currentValue === null ? { kind: 'absent' } : { kind: 'valueEquals', value: currentValue }
      );
      if (written) {
        return next;
      }
    }
  }

  private scalarItem(key: string, value: Buffer, ttlSeconds?: number): TableItem {
    const item: TableItem = { pk: key, sk: SCALAR_SK, v: value };
    if (ttlSeconds !== undefined) {
      item.expires_at = this.expiryFor(ttlSeconds);
    }
    return item;
  }

  private scalarValue(item: TableItem): Buffer {
    if (!Buffer.isBuffer(item.v)) {
      throw new StoreTypeError(item.pk, 'scalar', 'non-binary value');
    }
    return item.v;
  }

  private stringValue(item: TableItem): string {
    if (typeof item.v !== 'string') {
      throw new StoreTypeError(`${item.pk}/${item.sk}`, 'string', 'non-string value');
    }
    return item.v;
  }

  private nowSeconds(): number {
    return Math.floor(this.now() / 1000);
  }

  private expiryFor(ttlSeconds: number): number {
    return this.nowSeconds() + ttlSeconds;
  }

  private isExpired(item: TableItem): boolean {
    return item.expires_at !== undefined && item.expires_at <= this.nowSeconds();
  }
}

/**
 * Create a DynamoDB-backed store
 *
 * @example
 * ```typescript
 * const table = new DynamoDBItemTable({ endpoint: 'http://localhost:8000' });
 * await table.ensureTable();
 * const store = new DynamoDBStore(table);
 * ```
 */
export function createDynamoDBStore(
  config: DynamoDBStoreConfig = {},
  options: DynamoDBStoreOptions = {}
): { store: DynamoDBStore; table: DynamoDBItemTable } {
  const table = new DynamoDBItemTable(config);
  return { store: new DynamoDBStore(table, options), table };
}
