import { FactGraphError } from '../errors.js';

interface PendingGet<T> {
  resolve: (item: T) => void;
  reject: (error: Error) => void;
}

/**
 * Unbounded FIFO channel with task accounting.
 *
 * Every `put` raises the unfinished count and every `taskDone` lowers it, so
 * `join()` resolves once each item handed out has also been reported done.
 */
export class ProcessingQueue<T> {
  private items: T[] = [];
  private getters: PendingGet<T>[] = [];
  private drainWaiters: Array<() => void> = [];
  private unfinishedTasks = 0;

  /** Items queued or handed out but not yet marked done. */
  get unfinished(): number {
    return this.unfinishedTasks;
  }

  /** Items waiting to be taken. */
  get size(): number {
    return this.items.length;
  }

  put(item: T): void {
    this.unfinishedTasks++;
    const getter = this.getters.shift();
    if (getter) {
      getter.resolve(item);
    } else {
      this.items.push(item);
    }
  }

  /**
   * Take the next item, suspending while the queue is empty.
   * Rejects with a `closed` error when the signal aborts first.
   */
  get(signal?: AbortSignal): Promise<T> {
    if (signal?.aborted) {
      return Promise.reject(FactGraphError.closed('Processing queue consumer was cancelled'));
    }
    if (this.items.length > 0) {
      const item = this.items.shift();
      if (item !== undefined) return Promise.resolve(item);
    }

    return new Promise<T>((resolve, reject) => {
      const onAbort = () => {
        this.getters = this.getters.filter((g) => g !== getter);
        reject(FactGraphError.closed('Processing queue consumer was cancelled'));
      };
      const getter: PendingGet<T> = {
        resolve: (item) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(item);
        },
        reject,
      };
      this.getters.push(getter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  taskDone(): void {
    if (this.unfinishedTasks <= 0) {
      throw new Error('taskDone() called more times than there were items');
    }
    this.unfinishedTasks--;
    if (this.unfinishedTasks === 0) this.releaseDrainWaiters();
  }

  /** Resolves once the unfinished count reaches zero. */
  join(): Promise<void> {
    if (this.unfinishedTasks === 0) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.drainWaiters.push(resolve);
    });
  }

  /**
   * Drop everything still queued and forget in-flight accounting.
   * Pending `join()` callers are released.
   */
  clear(): void {
    this.items = [];
    this.unfinishedTasks = 0;
    this.releaseDrainWaiters();
  }

  private releaseDrainWaiters(): void {
    const waiters = this.drainWaiters;
    this.drainWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
