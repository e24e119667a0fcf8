/**
 * DynamoDB Item Table
 *
 * Single-table item access for the DynamoDB store:
 * - Composite key: pk (HASH) + sk (RANGE)
 * - expires_at: epoch-seconds TTL attribute
 * - Conditional writes report failure as `false` instead of throwing
 * - Any other client error propagates (fail-closed)
 */

import {
  DynamoDBClient,
  CreateTableCommand,
  DescribeTableCommand,
  UpdateTimeToLiveCommand,
  ResourceNotFoundException,
} from '@aws-sdk/client-dynamodb';
import {
  DynamoDBDocumentClient,
  PutCommand,
  GetCommand,
  QueryCommand,
  DeleteCommand,
  UpdateCommand,
} from '@aws-sdk/lib-dynamodb';
import { MalformedRecordError } from '../errors/queue-error';

/**
 * Default table name
 */
export const DEFAULT_TABLE_NAME = 'lease-queue';

/**
 * Raw table row
 */
export type TableItem = {
  pk: string;
  sk: string;
  v?: string | Buffer;
  /** Epoch seconds */
  expires_at?: number;
};

/**
 * Write precondition
 */
export type ItemCondition =
  | { kind: 'absent' }
  | { kind: 'present' }
  | { kind: 'absentOrExpired'; nowSeconds: number }
  | { kind: 'valueEquals'; value: string };

export interface QueryOptions {
  /** Sort key prefix */
  prefix?: string;
  limit?: number;
  /** Ascending by sort key (default: true) */
  ascending?: boolean;
}

/**
 * Item-level operations the DynamoDB store is written against
 */
export interface ItemTable {
  get(pk: string, sk: string): Promise<TableItem | null>;
  /** Returns false when the condition did not hold */
  put(item: TableItem, condition?: ItemCondition): Promise<boolean>;
  /** Returns the removed item, or null when nothing was removed */
  delete(pk: string, sk: string, condition?: ItemCondition): Promise<TableItem | null>;
  query(pk: string, options?: QueryOptions): Promise<TableItem[]>;
  count(pk: string, prefix: string): Promise<number>;
  /** Returns false when the item does not exist */
  setExpiry(pk: string, sk: string, expiresAt: number): Promise<boolean>;
}

/**
 * DynamoDB store configuration
 */
export interface DynamoDBStoreConfig {
  /** DynamoDB endpoint (default: http://localhost:8000) */
  endpoint?: string;
  /** Table name (default: lease-queue) */
  tableName?: string;
  /** AWS region (default: local) */
  region?: string;
}

interface ConditionParts {
  ConditionExpression: string;
  ExpressionAttributeNames?: Record<string, string>;
  ExpressionAttributeValues?: Record<string, string | number>;
}

/**
 * Translate a write precondition into DynamoDB condition expression parts
 */
export function buildCondition(condition: ItemCondition): ConditionParts {
  switch (condition.kind) {
    case 'absent':
      return { ConditionExpression: 'attribute_not_exists(pk)' };
    case 'present':
      return { ConditionExpression: 'attribute_exists(pk)' };
    case 'absentOrExpired':
      return {
        ConditionExpression: 'attribute_not_exists(pk) OR expires_at <= :now',
        ExpressionAttributeValues: { ':now': condition.nowSeconds },
      };
    case 'valueEquals':
      return {
        ConditionExpression: '#v = :expected',
        ExpressionAttributeNames: { '#v': 'v' },
        ExpressionAttributeValues: { ':expected': condition.value },
      };
  }
}

/**
 * Check for DynamoDB's conditional write rejection
 */
export function isConditionalCheckFailed(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'name' in error &&
    error.name === 'ConditionalCheckFailedException'
  );
}

/**
 * Narrow an unmarshalled DynamoDB item to a TableItem
 */
export function toTableItem(raw: Record<string, unknown>): TableItem {
  const { pk, sk, v, expires_at } = raw;
  if (typeof pk !== 'string' || typeof sk !== 'string') {
    throw new MalformedRecordError('table item', JSON.stringify(Object.keys(raw)), 'pk and sk strings');
  }

  const item: TableItem = { pk, sk };
  if (typeof v === 'string') {
    item.v = v;
  } else if (v instanceof Uint8Array) {
    item.v = Buffer.from(v);
  } else if (v !== undefined) {
    throw new MalformedRecordError(`${pk}/${sk}`, String(v), 'string or binary value');
  }

  if (typeof expires_at === 'number') {
    item.expires_at = expires_at;
  } else if (expires_at !== undefined) {
    throw new MalformedRecordError(`${pk}/${sk}`, String(expires_at), 'epoch seconds');
  }
  return item;
}

/**
 * ItemTable backed by DynamoDB (or DynamoDB Local)
 */
export class DynamoDBItemTable implements ItemTable {
  private readonly client: DynamoDBClient;
  private readonly docClient: DynamoDBDocumentClient;
  private readonly tableName: string;
  private readonly endpoint: string;

  constructor(config: DynamoDBStoreConfig = {}) {
    this.endpoint = config.endpoint || 'http://localhost:8000';
    this.tableName = config.tableName || DEFAULT_TABLE_NAME;
    const region = config.region || 'local';

    this.client = new DynamoDBClient({
      endpoint: this.endpoint,
      region: region,
      credentials: {
        accessKeyId: 'local',
        secretAccessKey: 'local',
      },
    });

    this.docClient = DynamoDBDocumentClient.from(this.client, {
      marshallOptions: {
        removeUndefinedValues: true,
      },
    });
  }

  getTableName(): string {
    return this.tableName;
  }

  getEndpoint(): string {
    return this.endpoint;
  }

  /**
   * Check if table exists
   */
  async tableExists(): Promise<boolean> {
    try {
      await this.client.send(new DescribeTableCommand({ TableName: this.tableName }));
      return true;
    } catch (error) {
      if (error instanceof ResourceNotFoundException) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Create the table and enable TTL on expires_at
   */
  async createTable(): Promise<void> {
    await this.client.send(
      new CreateTableCommand({
        TableName: this.tableName,
        KeySchema: [
          { AttributeName: 'pk', KeyType: 'HASH' },
          { AttributeName: 'sk', KeyType: 'RANGE' },
        ],
        AttributeDefinitions: [
          { AttributeName: 'pk', AttributeType: 'S' },
          { AttributeName: 'sk', AttributeType: 'S' },
        ],
        ProvisionedThroughput: {
          ReadCapacityUnits: 5,
          WriteCapacityUnits: 5,
        },
      })
    );
  }

  /**
   * Ensure table exists, create if not
   */
  async ensureTable(): Promise<void> {
    const exists = await this.tableExists();
    if (!exists) {
      await this.createTable();
      await this.waitForTableActive();
      await this.client.send(
        new UpdateTimeToLiveCommand({
          TableName: this.tableName,
          TimeToLiveSpecification: { AttributeName: 'expires_at', Enabled: true },
        })
      );
    }
  }

  private async waitForTableActive(maxWaitMs = 30000): Promise<void> {
    const startTime = Date.now();
    while (Date.now() - startTime < maxWaitMs) {
      try {
        const result = await this.client.send(
          new DescribeTableCommand({ TableName: this.tableName })
        );
        if (result.Table?.TableStatus === 'ACTIVE') {
          return;
        }
      } catch (error) {
        if (!(error instanceof ResourceNotFoundException)) {
          throw error;
        }
      }
      await new Promise(resolve => setTimeout(resolve, 100));
    }
    throw new Error(`Table ${this.tableName} did not become active within ${maxWaitMs}ms`);
  }

  async get(pk: string, sk: string): Promise<TableItem | null> {
    const result = await this.docClient.send(
      new GetCommand({
        TableName: this.tableName,
        Key: { pk, sk },
        ConsistentRead: true,
      })
    );
    return result.Item ? toTableItem(result.Item) : null;
  }

  async put(item: TableItem, condition?: ItemCondition): Promise<boolean> {
    try {
      await this.docClient.send(
        new PutCommand({
          TableName: this.tableName,
          Item: item,
          ...(condition ? buildCondition(condition) : {}),
        })
      );
      return true;
    } catch (error: unknown) {
      if (condition && isConditionalCheckFailed(error)) {
        return false;
      }
      throw error;
    }
  }

  async delete(pk: string, sk: string, condition?: ItemCondition): Promise<TableItem | null> {
    try {
      const result = await this.docClient.send(
        new DeleteCommand({
          TableName: this.tableName,
          Key: { pk, sk },
          ReturnValues: 'ALL_OLD',
          ...(condition ? buildCondition(condition) : {}),
        })
      );
      return result.Attributes ? toTableItem(result.Attributes) : null;
    } catch (error: unknown) {
      if (condition && isConditionalCheckFailed(error)) {
        return null;
      }
      throw error;
    }
  }

  async query(pk: string, options: QueryOptions = {}): Promise<TableItem[]> {
    const items: TableItem[] = [];
    let startKey: Record<string, unknown> | undefined;

    do {
      const result = await this.docClient.send(
        new QueryCommand({
          TableName: this.tableName,
          ConsistentRead: true,
          ScanIndexForward: options.ascending ?? true,
          Limit: options.limit,
          ExclusiveStartKey: startKey,
          ...this.keyCondition(pk, options.prefix),
        })
      );
      for (const raw of result.Items ?? []) {
        items.push(toTableItem(raw));
      }
      startKey = result.LastEvaluatedKey;
    } while (startKey && (options.limit === undefined || items.length < options.limit));

    return options.limit === undefined ? items : items.slice(0, options.limit);
  }

  async count(pk: string, prefix: string): Promise<number> {
    let total = 0;
    let startKey: Record<string, unknown> | undefined;

    do {
      const result = await this.docClient.send(
        new QueryCommand({
          TableName: this.tableName,
          ConsistentRead: true,
          Select: 'COUNT',
          ExclusiveStartKey: startKey,
          ...this.keyCondition(pk, prefix),
        })
      );
      total += result.Count ?? 0;
      startKey = result.LastEvaluatedKey;
    } while (startKey);

    return total;
  }

  async setExpiry(pk: string, sk: string, expiresAt: number): Promise<boolean> {
    try {
      await this.docClient.send(
        new UpdateCommand({
          TableName: this.tableName,
          Key: { pk, sk },
          UpdateExpression: 'SET expires_at = :expires',
          ConditionExpression: 'attribute_exists(pk)',
          ExpressionAttributeValues: { ':expires': expiresAt },
        })
      );
      return true;
    } catch (error: unknown) {
      if (isConditionalCheckFailed(error)) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Close the client connection
   */
  destroy(): void {
    this.client.destroy();
  }

  private keyCondition(pk: string, prefix?: string): {
    KeyConditionExpression: string;
    ExpressionAttributeValues: Record<string, string>;
  } {
    if (prefix) {
      return {
        KeyConditionExpression: 'pk = :pk AND begins_with(sk, :prefix)',
        ExpressionAttributeValues: { ':pk': pk, ':prefix': prefix },
      };
    }
    return {
      KeyConditionExpression: 'pk = :pk',
      ExpressionAttributeValues: { ':pk': pk },
    };
  }
}
