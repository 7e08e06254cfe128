import { Redis } from 'ioredis';
import type { Connection } from '../config/types.js';
import type { Logger } from '../logger.js';
import {
  serializeItem,
  type Delivery,
  type DequeueOptions,
  type QueueBackend,
  type QueueClient,
} from './types.js';

/**
 * The list commands the queue needs. Kept narrow so the client can be
 * exercised without a server.
 */
export interface ListCommands {
  lpush(key: string, value: string): Promise<number>;
  brpop(key: string, timeoutSeconds: number): Promise<[string, string] | null>;
  blmove(source: string, destination: string, timeoutSeconds: number): Promise<string | null>;
  lrem(key: string, value: string): Promise<number>;
  quit(): Promise<unknown>;
}

export function listCommands(redis: Redis): ListCommands {
  return {
    lpush: (key, value) => redis.lpush(key, value),
    brpop: (key, timeoutSeconds) => redis.brpop(key, timeoutSeconds),
    blmove: (source, destination, timeoutSeconds) =>
      redis.blmove(source, destination, 'RIGHT', 'LEFT', timeoutSeconds),
    lrem: (key, value) => redis.lrem(key, 1, value),
    quit: () => redis.quit(),
  };
}

/**
 * Work queue on a Redis list: LPUSH on one end, blocking pop on the other,
 * so items come out in the order they went in. With an in-flight list the
 * pop is a BLMOVE and the item stays recoverable until LREM acknowledges it.
 */
export class RedisQueueClient implements QueueClient {
  constructor(private commands: ListCommands) {}

  async enqueue(key: string, item: unknown): Promise<void> {
    await this.commands.lpush(key, serializeItem(item));
  }

  async dequeue(key: string, options: DequeueOptions): Promise<Delivery | null> {
    // Redis reads a timeout of 0 as "block forever".
    const timeoutSeconds = Math.max(options.timeoutMs, 1) / 1000;

    if (options.inflight) {
      const raw = await this.commands.blmove(key, options.inflight, timeoutSeconds);
      return raw === null ? null : { raw };
    }

    const popped = await this.commands.brpop(key, timeoutSeconds);
    return popped === null ? null : { raw: popped[1] };
  }

  async ack(inflight: string, delivery: Delivery): Promise<void> {
    await this.commands.lrem(inflight, delivery.raw);
  }

  async close(): Promise<void> {
    await this.commands.quit();
  }
}

export interface RedisBackendOptions {
  /** Attempts ioredis makes per command before rejecting; the runner retries above this. */
  maxRetriesPerRequest?: number;
}

/**
 * A lazily connected client for one connection. Connection errors are
 * logged here; the command that hit them rejects and the runner retries it.
 */
export function createRedis(connection: Connection, logger: Logger, options: RedisBackendOptions = {}): Redis {
  const redis = new Redis({
    host: connection.host,
    port: connection.port,
    db: connection.db,
    password: connection.password,
    maxRetriesPerRequest: options.maxRetriesPerRequest ?? 1,
    lazyConnect: true,
  });
  redis.on('error', (err: Error) => {
    logger.warn('Redis connection error', {
      connection: connection.name,
      host: connection.host,
      port: connection.port,
      error: err.message,
    });
  });
  return redis;
}

export class RedisQueueBackend implements QueueBackend {
  name = 'redis';

  constructor(private options: RedisBackendOptions = {}) {}

  open(connection: Connection, logger: Logger): QueueClient {
    return new RedisQueueClient(listCommands(createRedis(connection, logger, this.options)));
  }
}
