import type { Logger } from '../logger.js';

export interface TargetContext {
  worker: string;
  /** Topology instance id, e.g. `random_data_mapper#2`. */
  instance: string;
  /** Extra properties from the worker's declaration. */
  options: Record<string, unknown>;
  logger: Logger;
  /** Aborts when the topology is shutting down. */
  signal: AbortSignal;
}

/**
 * Called once per pacing slot. The returned item is enqueued; returning
 * undefined means there was nothing to produce this time.
 */
export type ProduceFn = (ctx: TargetContext) => unknown;

/** Called once per dequeued item. Its return value is ignored. */
export type ConsumeFn = (item: unknown, ctx: TargetContext) => unknown;

export type Target =
  | { kind: 'producer'; produce: ProduceFn; dispose?: () => void | Promise<void> }
  | { kind: 'consumer'; consume: ConsumeFn; dispose?: () => void | Promise<void> };

export function producer(produce: ProduceFn): Target {
  return { kind: 'producer', produce };
}

export function consumer(consume: ConsumeFn): Target {
  return { kind: 'consumer', consume };
}
