/**
 * Queue Logger - structured record of queue state transitions
 *
 * Features:
 * - Structured log entries with categories
 * - In-memory buffer for recent entries
 * - Subscriber pattern for forwarding (console, metrics, tests)
 * - Job-scoped and queue-scoped retrieval
 */

export type QueueLogLevel = 'info' | 'warn' | 'error' | 'debug';

export type QueueLogCategory =
  | 'ENQUEUE'
  | 'LEASE'
  | 'COMPLETE'
  | 'RETRY'
  | 'DEFER'
  | 'DEAD_LETTER'
  | 'RECLAIM'
  | 'REPAIR'
  | 'LOCK_CONFLICT'
  | 'RESULT'
  | 'ADMIN'
  | 'ERROR';

export interface QueueLogEntry {
  timestamp: string;
  level: QueueLogLevel;
  category: QueueLogCategory;
  message: string;
  details?: Record<string, unknown>;
  queue?: string;
  jobId?: string;
}

export interface QueueLogSubscriber {
  onLog(entry: QueueLogEntry): void;
}

interface EntryScope {
  queue?: string;
  jobId?: string;
}

export class QueueLogger {
  private entries: QueueLogEntry[] = [];
  private subscribers: Set<QueueLogSubscriber> = new Set();
  private maxEntries: number;

  constructor(options: { maxEntries?: number } = {}) {
    this.maxEntries = options.maxEntries ?? 1000;
  }

  log(
    level: QueueLogLevel,
    category: QueueLogCategory,
    message: string,
    options: EntryScope & { details?: Record<string, unknown> } = {}
  ): QueueLogEntry {
    const entry: QueueLogEntry = {
      timestamp: new Date().toISOString(),
      level,
      category,
      message,
      details: options.details,
      queue: options.queue,
      jobId: options.jobId,
    };

    this.entries.push(entry);

    if (this.entries.length > this.maxEntries) {
      this.entries = this.entries.slice(-this.maxEntries);
    }

    for (const subscriber of this.subscribers) {
      try {
        subscriber.onLog(entry);
      } catch (error) {
        // Subscriber failures never propagate into the logged operation
        // eslint-disable-next-line no-console
        console.error('[QueueLogger] Subscriber failed:', error);
      }
    }

    return entry;
  }

  // Convenience methods per category

  logEnqueue(queue: string, jobId: string, lane: string): QueueLogEntry {
    return this.log('info', 'ENQUEUE', `Enqueued job on ${lane} lane`, {
      details: { lane },
      queue,
      jobId,
    });
  }

  logLease(queue: string, jobId: string, options: { lane: string; attempts: number }): QueueLogEntry {
    return this.log('info', 'LEASE', `Leased job (attempt ${options.attempts})`, {
      details: { ...options },
      queue,
      jobId,
    });
  }

  logComplete(queue: string, jobId: string, acknowledged: boolean): QueueLogEntry {
    return this.log('info', 'COMPLETE', 'Job completed', {
      details: { acknowledged },
      queue,
      jobId,
    });
  }

  logRetry(
    queue: string,
    jobId: string,
    options: { lane: string; attempts: number; maxAttempts: number }
  ): QueueLogEntry {
    return this.log('info', 'RETRY', `Requeued after failure (attempt ${options.attempts} of ${options.maxAttempts})`, {
      details: { ...options },
      queue,
      jobId,
    });
  }

  logDefer(queue: string, jobId: string, lane: string): QueueLogEntry {
    return this.log('info', 'DEFER', 'Job deferred', { details: { lane }, queue, jobId });
  }

  logDeadLetter(
    queue: string,
    jobId: string,
    options: { attempts: number; recorded: boolean; payloadRetained: boolean }
  ): QueueLogEntry {
    return this.log(
      'warn',
      'DEAD_LETTER',
      options.recorded ? 'Retries exhausted, moved to dead letters' : 'Retries exhausted, job dropped',
      { details: { ...options }, queue, jobId }
    );
  }

  logReclaim(queue: string, jobId: string, options: { leasedAt: number; requeued: boolean }): QueueLogEntry {
    return this.log(
      'warn',
      'RECLAIM',
      options.requeued ? 'Stale lease reclaimed, job requeued' : 'Stale lease released, payload gone',
      {
        details: { leasedAt: new Date(options.leasedAt).toISOString(), requeued: options.requeued },
        queue,
        jobId,
      }
    );
  }

  logLockConflict(queue: string, jobId: string, lane: string): QueueLogEntry {
    return this.log('error', 'LOCK_CONFLICT', `Popped job already leased; restored to ${lane} lane`, {
      details: { lane },
      queue,
      jobId,
    });
  }

  logError(message: string, error: Error | unknown, scope: EntryScope = {}): QueueLogEntry {
    const errorMessage = error instanceof Error ? error.message : String(error);
    const errorStack = error instanceof Error ? error.stack : undefined;

    return this.log('error', 'ERROR', message, {
      details: {
        error: errorMessage,
        stack: errorStack,
      },
      ...scope,
    });
  }

  // Retrieval methods

  getAll(): QueueLogEntry[] {
    return [...this.entries];
  }

  getByJobId(jobId: string): QueueLogEntry[] {
    return this.entries.filter(e => e.jobId === jobId);
  }

  getByQueue(queue: string): QueueLogEntry[] {
    return this.entries.filter(e => e.queue === queue);
  }

  getByCategory(category: QueueLogCategory): QueueLogEntry[] {
    return this.entries.filter(e => e.category === category);
  }

  getRecent(count: number = 50): QueueLogEntry[] {
    return this.entries.slice(-count);
  }

  clear(): void {
    this.entries = [];
  }

  /**
   * Subscribe to log entries; returns the unsubscribe function
   */
  subscribe(subscriber: QueueLogSubscriber): () => void {
    this.subscribers.add(subscriber);
    return () => this.subscribers.delete(subscriber);
  }

  getSubscriberCount(): number {
    return this.subscribers.size;
  }
}

/**
 * Subscriber writing warn and error entries to stderr
 */
export function createConsoleSubscriber(
  options: { levels?: QueueLogLevel[]; write?: (line: string) => void } = {}
): QueueLogSubscriber {
  const levels = new Set<QueueLogLevel>(options.levels ?? ['warn', 'error']);
  // eslint-disable-next-line no-console
  const write = options.write ?? ((line: string) => console.error(line));

  return {
    onLog(entry: QueueLogEntry): void {
      if (!levels.has(entry.level)) {
        return;
      }
      const scope = [entry.queue, entry.jobId].filter(Boolean).join(' ');
      write(`[LeaseQueue] ${entry.level.toUpperCase()} ${entry.category}${scope ? ` ${scope}` : ''}: ${entry.message}`);
    },
  };
}

// Singleton instance for global access
let globalLogger: QueueLogger | null = null;

export function getQueueLogger(): QueueLogger {
  if (!globalLogger) {
    globalLogger = new QueueLogger();
  }
  return globalLogger;
}

export function resetQueueLogger(): void {
  globalLogger = null;
}
