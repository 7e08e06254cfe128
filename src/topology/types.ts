import type { Queue } from '../config/types.js';

interface WorkerDefinitionBase {
  name: string;
  /** Handler key in `module:function` form. */
  target: string;
  /** Every other declared property, passed through to the target. */
  options: Record<string, unknown>;
}

/** A `custom` worker: calls its target and enqueues what it returns. */
export interface ProducerDefinition extends WorkerDefinitionBase {
  type: 'custom';
  queue: Queue;
  /** Upper bound on items enqueued per second. */
  rate: number;
}

/** A `map` worker: dequeues items and hands each one to its target. */
export interface ConsumerDefinition extends WorkerDefinitionBase {
  type: 'map';
  source: Queue;
  /** Seconds a single dequeue may block while the queue is empty. */
  timeout: number;
}

export type WorkerDefinition = ProducerDefinition | ConsumerDefinition;

export interface WorkerInstance {
  /** `<worker>#<position in the topology>` */
  id: string;
  index: number;
  definition: WorkerDefinition;
}
