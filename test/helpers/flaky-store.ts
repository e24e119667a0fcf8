/**
 * In-memory store whose writes, pops or lease grants can be switched to fail,
 * with hooks to hold a pop or to run a competing consumer between a read and
 * the caller's next step
 */

import { InMemoryStore } from '../../src/store/in-memory-store';
import type { StoreCommand } from '../../src/store/store-adapter';

export class FlakyStore extends InMemoryStore {
  failBatches = false;
  failPops = false;
  /** Fail conditional creates on lease tables (keys ending in :LOCKED) */
  failLeases = false;
  /** Awaited before each pop */
  popGate: Promise<void> | null = null;
  /** Runs after each hashGetAll read, before its result is returned */
  afterHashGetAll: ((key: string) => Promise<void>) | null = null;

  async batch(commands: StoreCommand[]): Promise<void> {
    if (this.failBatches) {
      throw new Error('store unavailable');
    }
    await super.batch(commands);
  }

  async listPopRight(key: string): Promise<string | null> {
    if (this.popGate) {
      await this.popGate;
    }
    if (this.failPops) {
      throw new Error('store unavailable');
    }
    return super.listPopRight(key);
  }

  async hashSetIfAbsent(key: string, field: string, value: string): Promise<boolean> {
    if (this.failLeases && key.endsWith(':LOCKED')) {
      throw new Error('store unavailable');
    }
    return super.hashSetIfAbsent(key, field, value);
  }

  async hashGetAll(key: string): Promise<Map<string, string>> {
    const fields = await super.hashGetAll(key);
    if (this.afterHashGetAll) {
      await this.afterHashGetAll(key);
    }
    return fields;
  }
}
