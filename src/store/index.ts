/**
 * Store Module
 *
 * Exports:
 * - StoreAdapter: primitive operations the queue consumes
 * - InMemoryStore: in-process store
 * - DynamoDBStore / DynamoDBItemTable: DynamoDB-backed store
 */

export { applySequentially, type StoreAdapter, type StoreCommand } from './store-adapter';
export { InMemoryStore, type InMemoryStoreConfig } from './in-memory-store';
export {
  DynamoDBItemTable,
  DEFAULT_TABLE_NAME,
  buildCondition,
  isConditionalCheckFailed,
  toTableItem,
  type DynamoDBStoreConfig,
  type ItemTable,
  type ItemCondition,
  type QueryOptions,
  type TableItem,
} from './dynamodb-table';
export {
  DynamoDBStore,
  createDynamoDBStore,
  listItemSortKey,
  type DynamoDBStoreOptions,
} from './dynamodb-store';
