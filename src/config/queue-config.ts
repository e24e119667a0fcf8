/**
 * Queue Configuration
 *
 * Responsible for:
 * - Queue option defaults
 * - Queue name and option validation (fail-closed)
 * - Loading queue and store settings from environment variables
 */

import { ConfigurationError } from '../errors/queue-error';
import { ErrorCode } from '../errors/error-codes';
import type { DynamoDBStoreConfig } from '../store/dynamodb-table';

/**
 * Caller-facing queue options
 */
export interface QueueOptions {
  name: string;
  /** Retry ceiling (default: 5) */
  maxAttempts?: number;
  /** Seconds before an unresolved lease is reclaimable (default: 3600) */
  leaseTimeoutSeconds?: number;
  resultsEnabled?: boolean;
  ackEnabled?: boolean;
  deadLetterEnabled?: boolean;
  /** Keep the payload of dead-lettered jobs for replay (requires deadLetterEnabled) */
  retainDeadPayload?: boolean;
  priorityEnabled?: boolean;
}

export type ResolvedQueueOptions = Required<QueueOptions>;

export const QUEUE_DEFAULTS: Omit<ResolvedQueueOptions, 'name'> = {
  maxAttempts: 5,
  leaseTimeoutSeconds: 3600,
  resultsEnabled: false,
  ackEnabled: false,
  deadLetterEnabled: false,
  retainDeadPayload: false,
  priorityEnabled: false,
};

/**
 * Registry hash name; reserved as a queue name
 */
export const REGISTRY_KEY = 'QUEUEREGISTER';

const QUEUE_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;
const MAX_QUEUE_NAME_LENGTH = 128;

/**
 * Validate queue name
 * Returns error message if invalid, undefined if valid
 */
export function validateQueueName(name: string): string | undefined {
  if (!name) {
    return 'Queue name cannot be empty';
  }

  if (name.length > MAX_QUEUE_NAME_LENGTH) {
    return 'Queue name too long: ' + name.length + ' characters (max ' + MAX_QUEUE_NAME_LENGTH + ')';
  }

  if (!QUEUE_NAME_PATTERN.test(name)) {
    return 'Invalid queue name: "' + name + '". Use letters, digits, "_", "." and "-", starting with a letter or digit';
  }

  if (name === REGISTRY_KEY) {
    return 'Reserved queue name: "' + name + '"';
  }

  return undefined;
}

/**
 * Apply defaults and validate
 * @throws ConfigurationError on an invalid name or option
 */
export function resolveQueueOptions(options: QueueOptions): ResolvedQueueOptions {
  const nameError = validateQueueName(options.name);
  if (nameError) {
    throw new ConfigurationError(nameError, ErrorCode.E102_INVALID_QUEUE_NAME);
  }

  const resolved: ResolvedQueueOptions = {
    name: options.name,
    maxAttempts: options.maxAttempts ?? QUEUE_DEFAULTS.maxAttempts,
    leaseTimeoutSeconds: options.leaseTimeoutSeconds ?? QUEUE_DEFAULTS.leaseTimeoutSeconds,
    resultsEnabled: options.resultsEnabled ?? QUEUE_DEFAULTS.resultsEnabled,
    ackEnabled: options.ackEnabled ?? QUEUE_DEFAULTS.ackEnabled,
    deadLetterEnabled: options.deadLetterEnabled ?? QUEUE_DEFAULTS.deadLetterEnabled,
    retainDeadPayload: options.retainDeadPayload ?? QUEUE_DEFAULTS.retainDeadPayload,
    priorityEnabled: options.priorityEnabled ?? QUEUE_DEFAULTS.priorityEnabled,
  };

  if (!Number.isInteger(resolved.maxAttempts) || resolved.maxAttempts < 1) {
    throw new ConfigurationError(
      `maxAttempts must be a positive integer, got ${resolved.maxAttempts}`,
      ErrorCode.E103_INVALID_QUEUE_OPTION
    );
  }

  if (!Number.isFinite(resolved.leaseTimeoutSeconds) || resolved.leaseTimeoutSeconds <= 0) {
    throw new ConfigurationError(
      `leaseTimeoutSeconds must be a positive number, got ${resolved.leaseTimeoutSeconds}`,
      ErrorCode.E103_INVALID_QUEUE_OPTION
    );
  }

  if (resolved.retainDeadPayload && !resolved.deadLetterEnabled) {
    throw new ConfigurationError(
      'retainDeadPayload requires deadLetterEnabled',
      ErrorCode.E103_INVALID_QUEUE_OPTION
    );
  }

  return resolved;
}

type Env = Record<string, string | undefined>;

function readInteger(env: Env, variable: string): number | undefined {
  const raw = env[variable];
  if (raw === undefined || raw === '') {
    return undefined;
  }
  if (!/^\d+$/.test(raw.trim())) {
    throw new ConfigurationError(
      `${variable} must be a non-negative integer, got "${raw}"`,
      ErrorCode.E103_INVALID_QUEUE_OPTION
    );
  }
  return Number.parseInt(raw.trim(), 10);
}

function readFlag(env: Env, variable: string): boolean | undefined {
  const raw = env[variable];
  if (raw === undefined || raw === '') {
    return undefined;
  }
  const normalized = raw.trim().toLowerCase();
  if (normalized === '1' || normalized === 'true') {
    return true;
  }
  if (normalized === '0' || normalized === 'false') {
    return false;
  }
  throw new ConfigurationError(
    `${variable} must be one of 1, 0, true, false; got "${raw}"`,
    ErrorCode.E103_INVALID_QUEUE_OPTION
  );
}

/**
 * Read queue options from LEASE_QUEUE_* environment variables.
 * Unset variables leave the option to its default.
 */
export function queueOptionsFromEnv(name: string, env: Env = process.env): QueueOptions {
  const options: QueueOptions = { name };

  const maxAttempts = readInteger(env, 'LEASE_QUEUE_MAX_ATTEMPTS');
  if (maxAttempts !== undefined) options.maxAttempts = maxAttempts;

  const leaseTimeout = readInteger(env, 'LEASE_QUEUE_LEASE_TIMEOUT_SECONDS');
  if (leaseTimeout !== undefined) options.leaseTimeoutSeconds = leaseTimeout;

  const results = readFlag(env, 'LEASE_QUEUE_RESULTS');
  if (results !== undefined) options.resultsEnabled = results;

  const ack = readFlag(env, 'LEASE_QUEUE_ACK');
  if (ack !== undefined) options.ackEnabled = ack;

  const deadLetter = readFlag(env, 'LEASE_QUEUE_DEAD_LETTER');
  if (deadLetter !== undefined) options.deadLetterEnabled = deadLetter;

  const retainDeadPayload = readFlag(env, 'LEASE_QUEUE_RETAIN_DEAD_PAYLOAD');
  if (retainDeadPayload !== undefined) options.retainDeadPayload = retainDeadPayload;

  const priority = readFlag(env, 'LEASE_QUEUE_PRIORITY');
  if (priority !== undefined) options.priorityEnabled = priority;

  return options;
}

/**
 * Read DynamoDB store settings from LEASE_QUEUE_* environment variables
 */
export function storeConfigFromEnv(env: Env = process.env): DynamoDBStoreConfig {
  const config: DynamoDBStoreConfig = {};
  if (env.LEASE_QUEUE_DYNAMODB_ENDPOINT) config.endpoint = env.LEASE_QUEUE_DYNAMODB_ENDPOINT;
  if (env.LEASE_QUEUE_TABLE) config.tableName = env.LEASE_QUEUE_TABLE;
  if (env.LEASE_QUEUE_REGION) config.region = env.LEASE_QUEUE_REGION;
  return config;
}
