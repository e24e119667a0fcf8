/**
 * In-Memory Store
 * Non-persistent StoreAdapter for tests and single-process use
 *
 * Features:
 * - Same contract as the DynamoDB store
 * - No external dependencies
 * - Data is lost when the process exits
 * - Expiry is evaluated lazily against an injectable clock
 */

import { StoreTypeError } from '../errors/queue-error';
import { applySequentially, type StoreAdapter, type StoreCommand } from './store-adapter';

type Entry =
  | { kind: 'scalar'; value: Buffer; expiresAt: number | null }
  | { kind: 'hash'; fields: Map<string, string> }
  | { kind: 'list'; items: string[] };

type EntryKind = Entry['kind'];

/**
 * In-Memory Store configuration
 */
export interface InMemoryStoreConfig {
  /** Clock in epoch milliseconds (default: Date.now) */
  now?: () => number;
}

export class InMemoryStore implements StoreAdapter {
  private readonly entries: Map<string, Entry> = new Map();
  private readonly now: () => number;

  constructor(config: InMemoryStoreConfig = {}) {
    this.now = config.now ?? Date.now;
  }

  /**
   * Live keys, expired scalars excluded (for inspection in tests)
   */
  keys(): string[] {
    return Array.from(this.entries.keys()).filter(key => this.read(key) !== undefined);
  }

  /**
   * Clear all data
   */
  clear(): void {
    this.entries.clear();
  }

  async get(key: string): Promise<Buffer | null> {
    const entry = this.readAs(key, 'scalar');
    return entry ? Buffer.from(entry.value) : null;
  }

  async set(key: string, value: Buffer, ttlSeconds?: number): Promise<void> {
    this.entries.set(key, {
      kind: 'scalar',
      value: Buffer.from(value),
      expiresAt: this.expiryFor(ttlSeconds),
    });
  }

  async setIfAbsent(key: string, value: Buffer, ttlSeconds?: number): Promise<boolean> {
    if (this.read(key) !== undefined) {
      return false;
    }
    await this.set(key, value, ttlSeconds);
    return true;
  }

  async exists(key: string): Promise<boolean> {
    return this.read(key) !== undefined;
  }

  async expire(key: string, ttlSeconds: number): Promise<void> {
    const entry = this.readAs(key, 'scalar');
    if (entry) {
      entry.expiresAt = this.expiryFor(ttlSeconds);
    }
  }

  async delete(keys: string[]): Promise<void> {
    for (const key of keys) {
      this.entries.delete(key);
    }
  }

  async hashGet(key: string, field: string): Promise<string | null> {
    return this.readAs(key, 'hash')?.fields.get(field) ?? null;
  }

  async hashGetAll(key: string): Promise<Map<string, string>> {
    return new Map(this.readAs(key, 'hash')?.fields ?? []);
  }

  async hashSet(key: string, field: string, value: string): Promise<void> {
    this.hashFor(key).fields.set(field, value);
  }

  async hashSetIfAbsent(key: string, field: string, value: string): Promise<boolean> {
    const hash = this.hashFor(key);
    if (hash.fields.has(field)) {
      return false;
    }
    hash.fields.set(field, value);
    return true;
  }

  async hashIncrBy(key: string, field: string, by: number): Promise<number> {
    const hash = this.hashFor(key);
    const current = hash.fields.get(field);
    const base = current === undefined ? 0 : Number(current);
    if (!Number.isInteger(base)) {
      throw new StoreTypeError(`${key}/${field}`, 'integer', 'non-integer value');
    }
    const next = base + by;
    hash.fields.set(field, String(next));
    return next;
  }

  async hashDelete(key: string, fields: string[]): Promise<number> {
    const hash = this.readAs(key, 'hash');
    if (!hash) {
      return 0;
    }
    let removed = 0;
    for (const field of fields) {
      if (hash.fields.delete(field)) {
        removed++;
      }
    }
    if (hash.fields.size === 0) {
      this.entries.delete(key);
    }
    return removed;
  }

  async hashDeleteIfEquals(key: string, field: string, expected: string): Promise<boolean> {
    const hash = this.readAs(key, 'hash');
    if (!hash || hash.fields.get(field) !== expected) {
      return false;
    }
    hash.fields.delete(field);
    if (hash.fields.size === 0) {
      this.entries.delete(key);
    }
    return true;
  }

  async listPushLeft(key: string, value: string): Promise<void> {
    this.listFor(key).items.unshift(value);
  }

  async listPushRight(key: string, value: string): Promise<void> {
    this.listFor(key).items.push(value);
  }

  async listPopRight(key: string): Promise<string | null> {
    const list = this.readAs(key, 'list');
    if (!list) {
      return null;
    }
    const value = list.items.pop() ?? null;
    if (list.items.length === 0) {
      this.entries.delete(key);
    }
    return value;
  }

  async listLength(key: string): Promise<number> {
    return this.readAs(key, 'list')?.items.length ?? 0;
  }

  async listRange(key: string): Promise<string[]> {
    return [...(this.readAs(key, 'list')?.items ?? [])];
  }

  async batch(commands: StoreCommand[]): Promise<void> {
    await applySequentially(this, commands);
  }

  private expiryFor(ttlSeconds?: number): number | null {
    return ttlSeconds === undefined ? null : this.now() + ttlSeconds * 1000;
  }

  /**
   * Read an entry, dropping it if it has expired
   */
  private read(key: string): Entry | undefined {
    const entry = this.entries.get(key);
    if (entry?.kind === 'scalar' && entry.expiresAt !== null && entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }

  private readAs<K extends EntryKind>(key: string, kind: K): Extract<Entry, { kind: K }> | undefined {
    const entry = this.read(key);
    if (entry === undefined) {
      return undefined;
    }
    const actual: EntryKind = entry.kind;
    if (!isKind(entry, kind)) {
      throw new StoreTypeError(key, kind, actual);
    }
    return entry;
  }

  private hashFor(key: string): Extract<Entry, { kind: 'hash' }> {
    const existing = this.readAs(key, 'hash');
    if (existing) {
      return existing;
    }
    const created: Extract<Entry, { kind: 'hash' }> = { kind: 'hash', fields: new Map() };
    this.entries.set(key, created);
    return created;
  }

  private listFor(key: string): Extract<Entry, { kind: 'list' }> {
    const existing = this.readAs(key, 'list');
    if (existing) {
      return existing;
    }
    const created: Extract<Entry, { kind: 'list' }> = { kind: 'list', items: [] };
    this.entries.set(key, created);
    return created;
  }
}

function isKind<K extends EntryKind>(entry: Entry, kind: K): entry is Extract<Entry, { kind: K }> {
  return entry.kind === kind;
}
