import type { Connection } from '../config/types.js';
import {
  connectionKey,
  decodeItem,
  serializeItem,
  type Delivery,
  type DequeueOptions,
  type QueueBackend,
  type QueueClient,
} from './types.js';

interface Waiter {
  inflight?: string;
  deliver(raw: string | null): void;
}

class MemoryStore {
  private lists = new Map<string, string[]>();
  private waiters = new Map<string, Waiter[]>();

  list(key: string): string[] {
    let list = this.lists.get(key);
    if (!list) {
      list = [];
      this.lists.set(key, list);
    }
    return list;
  }

  push(key: string, raw: string): void {
    const waiter = this.waiters.get(key)?.shift();
    if (waiter) {
      if (waiter.inflight) this.list(waiter.inflight).push(raw);
      waiter.deliver(raw);
      return;
    }
    this.list(key).push(raw);
  }

  take(key: string, inflight?: string): string | null {
    const raw = this.list(key).shift();
    if (raw === undefined) return null;
    if (inflight) this.list(inflight).push(raw);
    return raw;
  }

  wait(key: string, waiter: Waiter): () => void {
    let queue = this.waiters.get(key);
    if (!queue) {
      queue = [];
      this.waiters.set(key, queue);
    }
    queue.push(waiter);
    return () => {
      const waiting = this.waiters.get(key);
      const index = waiting?.indexOf(waiter) ?? -1;
      if (waiting && index >= 0) waiting.splice(index, 1);
    };
  }

  remove(key: string, raw: string): void {
    const list = this.list(key);
    const index = list.indexOf(raw);
    if (index >= 0) list.splice(index, 1);
  }
}

class MemoryQueueClient implements QueueClient {
  private closed = false;

  constructor(private store: MemoryStore) {}

  async enqueue(key: string, item: unknown): Promise<void> {
    this.assertOpen();
    this.store.push(key, serializeItem(item));
  }

  async dequeue(key: string, options: DequeueOptions): Promise<Delivery | null> {
    this.assertOpen();

    const raw = this.store.take(key, options.inflight);
    if (raw !== null) return { raw };
    if (options.timeoutMs <= 0 || options.signal?.aborted) return null;

    const delivered = await new Promise<string | null>((resolve) => {
      const signal = options.signal;
      const finish = (value: string | null) => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        cancel();
        resolve(value);
      };
      const onAbort = () => finish(null);
      const cancel = this.store.wait(key, { inflight: options.inflight, deliver: finish });
      const timer = setTimeout(() => finish(null), options.timeoutMs);
      signal?.addEventListener('abort', onAbort, { once: true });
    });

    return delivered === null ? null : { raw: delivered };
  }

  async ack(inflight: string, delivery: Delivery): Promise<void> {
    this.assertOpen();
    this.store.remove(inflight, delivery.raw);
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error('Connection is closed');
    }
  }
}

/**
 * Queues held in process memory. Connections naming the same host, port
 * and db share lists, as they would on a real server. Used by tests and
 * by `skrode run --memory`.
 */
export class MemoryQueueBackend implements QueueBackend {
  name = 'memory';
  private stores = new Map<string, MemoryStore>();

  open(connection: Connection): QueueClient {
    return new MemoryQueueClient(this.storeFor(connection));
  }

  /** Items waiting on a list, oldest first. */
  peek(connection: Connection, key: string): unknown[] {
    return this.storeFor(connection)
      .list(key)
      .map(decodeItem);
  }

  private storeFor(connection: Connection): MemoryStore {
    const id = connectionKey(connection);
    let store = this.stores.get(id);
    if (!store) {
      store = new MemoryStore();
      this.stores.set(id, store);
    }
    return store;
  }
}
