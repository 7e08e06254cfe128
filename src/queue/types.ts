import type { Connection } from '../config/types.js';
import type { Logger } from '../logger.js';

/**
 * A payload taken off a queue, exactly as the store held it. Decoding is
 * left to the consumer so a malformed payload fails as one item, not as a
 * queue error.
 */
export interface Delivery {
  raw: string;
}

export interface DequeueOptions {
  /** Longest time to block while the queue is empty. */
  timeoutMs: number;
  /** When set, the item is moved onto this list until acknowledged. */
  inflight?: string;
  /** Lets an idle wait end early. Ignored by stores that cannot cancel a blocking read. */
  signal?: AbortSignal;
}

/**
 * A handle on one connection. Runner tasks each open their own, so a
 * blocking dequeue never holds up another task's commands.
 */
export interface QueueClient {
  enqueue(key: string, item: unknown): Promise<void>;
  /** Resolves null when nothing arrived within the timeout. */
  dequeue(key: string, options: DequeueOptions): Promise<Delivery | null>;
  /** Remove a delivery from its in-flight list once handled. */
  ack(inflight: string, delivery: Delivery): Promise<void>;
  close(): Promise<void>;
}

export interface QueueBackend {
  name: string;
  /** Connection trouble that does not fail a command is reported to `logger`. */
  open(connection: Connection, logger: Logger): QueueClient;
}

export function serializeItem(item: unknown): string {
  const raw = JSON.stringify(item);
  if (raw === undefined) {
    throw new TypeError(`Queue items must be JSON-serializable, got ${typeof item}`);
  }
  return raw;
}

export function decodeItem(raw: string): unknown {
  return JSON.parse(raw);
}

/** Identity of the store behind a connection; connections naming the same store share data. */
export function connectionKey(connection: Connection): string {
  return `${connection.host}:${connection.port}/${connection.db}`;
}
