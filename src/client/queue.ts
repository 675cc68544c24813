// © Copyright 2025-2026, Query.Farm LLC - https://query.farm
// SPDX-License-Identifier: Apache-2.0

import { QueueTimeoutError } from "../errors.js";

interface Waiter<T> {
  resolve: (item: T) => void;
  timer: NodeJS.Timeout | null;
}

/**
 * Unbounded FIFO handing items from stream callbacks to an awaiting consumer.
 * Waiters are served in the order they called `get()`.
 */
export class CompletionQueue<T> {
  private _items: T[] = [];
  private _waiters: Waiter<T>[] = [];

  put(item: T): void {
    const waiter = this._waiters.shift();
    if (waiter) {
      if (waiter.timer) clearTimeout(waiter.timer);
      waiter.resolve(item);
      return;
    }
    this._items.push(item);
  }

  /**
   * Resolve with the next item. With `timeoutMs`, reject with
   * `QueueTimeoutError` if nothing arrives in time.
   */
  get(timeoutMs?: number): Promise<T> {
    if (this._items.length > 0) {
      const [item] = this._items.splice(0, 1);
      return Promise.resolve(item);
    }
    return new Promise<T>((resolve, reject) => {
      const waiter: Waiter<T> = { resolve, timer: null };
      if (timeoutMs !== undefined) {
        waiter.timer = setTimeout(() => {
          const idx = this._waiters.indexOf(waiter);
          if (idx >= 0) this._waiters.splice(idx, 1);
          reject(new QueueTimeoutError(timeoutMs));
        }, timeoutMs);
      }
      this._waiters.push(waiter);
    });
  }

  /** Items buffered and not yet taken. */
  get size(): number {
    return this._items.length;
  }

  /** Consumers currently waiting for an item. */
  get pending(): number {
    return this._waiters.length;
  }
}
