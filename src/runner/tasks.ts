import { errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import { decodeItem, serializeItem, type Delivery, type QueueClient } from '../queue/types.js';
import type { ConsumeFn, ProduceFn, TargetContext } from '../targets/types.js';
import type { ConsumerDefinition, ProducerDefinition, WorkerInstance } from '../topology/types.js';
import { Pacer } from './pacing.js';
import { withRetry, type RetryConfig } from './retry.js';
import type { TaskStats } from './types.js';

export interface TaskContext {
  instance: WorkerInstance;
  client: QueueClient;
  logger: Logger;
  signal: AbortSignal;
  retry: RetryConfig;
  stats: TaskStats;
}

function targetContext(ctx: TaskContext): TargetContext {
  return {
    worker: ctx.instance.definition.name,
    instance: ctx.instance.id,
    options: ctx.instance.definition.options,
    logger: ctx.logger,
    signal: ctx.signal,
  };
}

function logRetry(logger: Logger, operation: string) {
  return (attempt: number, error: Error, delayMs: number) => {
    logger.warn(`Queue ${operation} failed, retrying`, { attempt, delayMs, error: error.message });
  };
}

/**
 * Producer loop: wait for the next pacing slot, ask the target for an
 * item, enqueue it. Target errors are logged and skipped; an enqueue that
 * keeps failing past its retries ends the task.
 */
export async function runProducer(ctx: TaskContext, definition: ProducerDefinition, produce: ProduceFn): Promise<void> {
  const { queue } = definition;
  const pacer = new Pacer(definition.rate);
  const tctx = targetContext(ctx);

  while (await pacer.wait(ctx.signal)) {
    let item: unknown;
    try {
      item = await produce(tctx);
      if (item !== undefined) serializeItem(item);
    } catch (err) {
      ctx.stats.failed++;
      ctx.logger.error('Producer target failed', { target: definition.target, error: errorMessage(err) });
      continue;
    }

    if (item === undefined) continue;

    // Not cancelled by shutdown: the item already exists and must reach the queue.
    await withRetry(`enqueue to ${queue.key}`, () => ctx.client.enqueue(queue.key, item), ctx.retry, {
      onRetry: logRetry(ctx.logger, 'enqueue'),
    });
    ctx.stats.produced++;
  }
}

/**
 * Consumer loop: block on the source queue for up to `timeout` seconds,
 * hand any item to the target, acknowledge it when the queue keeps an
 * in-flight list. A payload that is not JSON counts as a failed item.
 * Shutdown is checked between items only, so an item that was dequeued
 * is always handled.
 */
export async function runConsumer(ctx: TaskContext, definition: ConsumerDefinition, consume: ConsumeFn): Promise<void> {
  const { source } = definition;
  const timeoutMs = definition.timeout * 1000;
  const tctx = targetContext(ctx);

  while (!ctx.signal.aborted) {
    let delivery: Delivery | null;
    try {
      delivery = await withRetry(
        `dequeue from ${source.key}`,
        () => ctx.client.dequeue(source.key, { timeoutMs, inflight: source.inflight, signal: ctx.signal }),
        ctx.retry,
        { signal: ctx.signal, onRetry: logRetry(ctx.logger, 'dequeue') },
      );
    } catch (err) {
      if (ctx.signal.aborted) break;
      throw err;
    }

    if (delivery === null) continue;
    const received: Delivery = delivery;

    let item: unknown;
    let decoded = false;
    try {
      item = decodeItem(received.raw);
      decoded = true;
    } catch (err) {
      ctx.stats.failed++;
      ctx.logger.error('Malformed queue item', { queue: source.key, raw: received.raw, error: errorMessage(err) });
    }

    if (decoded) {
      try {
        await consume(item, tctx);
        ctx.stats.processed++;
      } catch (err) {
        ctx.stats.failed++;
        ctx.logger.error('Consumer target failed', { target: definition.target, error: errorMessage(err) });
      }
    }

    const inflight = source.inflight;
    if (inflight) {
      await withRetry(`ack on ${inflight}`, () => ctx.client.ack(inflight, received), ctx.retry, {
        onRetry: logRetry(ctx.logger, 'ack'),
      });
    }
  }
}
