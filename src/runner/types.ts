import type { RetrySettings, RunnerSettings, WorkerType } from '../config/types.js';

export interface TaskStats {
  id: string;
  worker: string;
  type: WorkerType;
  /** Items a producer enqueued. */
  produced: number;
  /** Items a consumer's target handled without throwing. */
  processed: number;
  /** Target calls that threw. */
  failed: number;
  restarts: number;
}

export interface RunReport {
  tasks: TaskStats[];
  /** Instances still running when the shutdown timeout expired. */
  timedOut: string[];
}

export type RunnerOverrides = Partial<Omit<RunnerSettings, 'retry'>> & {
  retry?: Partial<RetrySettings>;
};
