/**
 * Request Queue - Keyed FIFO queues serializing bookkeeping work
 *
 * One queue per key (a session id, the governor, the cleanup lock). Items on the
 * same key never interleave; items on different keys run concurrently.
 */

import { DEFAULT_QUEUE_ITEM_TIMEOUT_MS } from '../config/defaults';

interface QueueItem<T> {
  fn: () => Promise<T>;
  resolve: (value: T) => void;
  reject: (error: Error) => void;
}

export class RequestQueue {
  private queue: QueueItem<unknown>[] = [];
  private processingPromise: Promise<void> | null = null;
  private key: string;
  private itemTimeoutMs: number | null;

  /**
   * @param itemTimeoutMs - null runs each item to completion. Use it where the next
   * item must never start while the previous one is still running.
   */
  constructor(key: string, itemTimeoutMs: number | null = DEFAULT_QUEUE_ITEM_TIMEOUT_MS) {
    this.key = key;
    this.itemTimeoutMs = itemTimeoutMs;
  }

  /**
   * Add a function to the queue and return a promise for its result
   */
  enqueue<T>(fn: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push({
        fn,
        resolve: resolve as (value: unknown) => void,
        reject,
      });
      this.triggerProcessing();
    });
  }

  private triggerProcessing(): void {
    if (this.processingPromise) {
      return;
    }
    this.processingPromise = this.processQueue();
  }

  private async runItem(item: QueueItem<unknown>): Promise<void> {
    const timeoutMs = this.itemTimeoutMs;
    let timer: NodeJS.Timeout | undefined;
    try {
      const result = timeoutMs === null
        ? await item.fn()
        : await Promise.race([
          item.fn(),
          new Promise<never>((_, reject) => {
            timer = setTimeout(
              () => reject(new Error(`Queue item on "${this.key}" timed out after ${timeoutMs}ms`)),
              timeoutMs,
            );
          }),
        ]);
      item.resolve(result);
    } catch (error) {
      item.reject(error instanceof Error ? error : new Error(String(error)));
    } finally {
      clearTimeout(timer);
    }
  }

  private async processQueue(): Promise<void> {
    try {
      let item = this.queue.shift();
      while (item) {
        await this.runItem(item);
        item = this.queue.shift();
      }
    } finally {
      this.processingPromise = null;

      if (this.queue.length > 0) {
        this.triggerProcessing();
      }
    }
  }

  get pending(): number {
    return this.queue.length;
  }

  get isProcessing(): boolean {
    return this.processingPromise !== null;
  }

  /**
   * Reject everything still waiting. The item in flight runs to completion.
   */
  clear(): void {
    const error = new Error('Queue cleared');
    const waiting = this.queue;
    this.queue = [];
    for (const item of waiting) {
      item.reject(error);
    }
  }

  getKey(): string {
    return this.key;
  }
}

export class RequestQueueManager {
  private queues: Map<string, RequestQueue> = new Map();
  private itemTimeoutMs: number;

  constructor(itemTimeoutMs: number = DEFAULT_QUEUE_ITEM_TIMEOUT_MS) {
    this.itemTimeoutMs = itemTimeoutMs;
  }

  getQueue(key: string): RequestQueue {
    let queue = this.queues.get(key);
    if (!queue) {
      queue = new RequestQueue(key, this.itemTimeoutMs);
      this.queues.set(key, queue);
    }
    return queue;
  }

  enqueue<T>(key: string, fn: () => Promise<T>): Promise<T> {
    return this.getQueue(key).enqueue(fn);
  }

  deleteQueue(key: string): void {
    const queue = this.queues.get(key);
    if (queue) {
      queue.clear();
      this.queues.delete(key);
    }
  }

  getStats(): Map<string, { pending: number; processing: boolean }> {
    const stats = new Map<string, { pending: number; processing: boolean }>();
    for (const [key, queue] of this.queues) {
      stats.set(key, {
        pending: queue.pending,
        processing: queue.isProcessing,
      });
    }
    return stats;
  }
}
