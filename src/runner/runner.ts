import { runnerSettingsSchema } from '../config/schema.js';
import type { RunnerSettings } from '../config/types.js';
import { TopologyFailedError, toError, type TaskFailure } from '../errors.js';
import type { Logger } from '../logger.js';
import type { QueueBackend } from '../queue/types.js';
import type { BoundTarget, TargetRegistry } from '../targets/registry.js';
import type { WorkerRegistry } from '../topology/registry.js';
import type { WorkerInstance } from '../topology/types.js';
import { sleep } from './pacing.js';
import { DEFAULT_RETRY_CONFIG, type RetryConfig } from './retry.js';
import { runConsumer, runProducer, type TaskContext } from './tasks.js';
import type { RunnerOverrides, RunReport, TaskStats } from './types.js';

export interface RunnerDeps {
  registry: WorkerRegistry;
  targets: TargetRegistry;
  backend: QueueBackend;
  logger: Logger;
  settings?: RunnerOverrides;
}

interface Task {
  instance: WorkerInstance;
  target: BoundTarget;
  stats: TaskStats;
  logger: Logger;
}

export function resolveRunnerSettings(overrides?: RunnerOverrides): RunnerSettings {
  const defaults = runnerSettingsSchema.parse({});
  return {
    ...defaults,
    ...overrides,
    retry: { ...defaults.retry, ...overrides?.retry },
  };
}

/**
 * Runs a validated topology: one task per topology entry, each with its
 * own queue client, until the caller's signal aborts or a task fails.
 *
 * Shutdown stops producers first and waits for them, then stops the
 * consumers, so items enqueued during the run are still drained by
 * consumers that are waiting on the queue.
 */
export class TopologyRunner {
  private readonly settings: RunnerSettings;
  private readonly retry: RetryConfig;

  constructor(private deps: RunnerDeps) {
    this.settings = resolveRunnerSettings(deps.settings);
    this.retry = {
      ...DEFAULT_RETRY_CONFIG,
      maxRetries: this.settings.retry.max_retries,
      baseDelayMs: this.settings.retry.base_delay_ms,
      maxDelayMs: this.settings.retry.max_delay_ms,
    };
  }

  async run(signal?: AbortSignal): Promise<RunReport> {
    const { logger, backend } = this.deps;

    // Bind every target up front: an unknown key stops the run before any task starts.
    const tasks: Task[] = this.deps.registry.instances().map((instance) => ({
      instance,
      target: this.deps.targets.bind(instance.definition),
      stats: {
        id: instance.id,
        worker: instance.definition.name,
        type: instance.definition.type,
        produced: 0,
        processed: 0,
        failed: 0,
        restarts: 0,
      },
      logger: logger.child({ worker: instance.definition.name, instance: instance.id }),
    }));

    const producers = new AbortController();
    const consumers = new AbortController();
    const failures: TaskFailure[] = [];
    const running = new Set<string>();

    const stopped = new Promise<void>((resolve) => {
      producers.signal.addEventListener('abort', () => resolve(), { once: true });
    });

    const onFailure = (failure: TaskFailure) => {
      failures.push(failure);
      producers.abort();
      consumers.abort();
    };

    logger.info('Starting topology', { backend: backend.name, instances: tasks.map((t) => t.instance.id) });

    const launch = (task: Task, taskSignal: AbortSignal) => {
      running.add(task.instance.id);
      return this.supervise(task, taskSignal, onFailure).finally(() => running.delete(task.instance.id));
    };

    const producerTasks = tasks.filter((t) => t.target.type === 'custom').map((t) => launch(t, producers.signal));
    const consumerTasks = tasks.filter((t) => t.target.type === 'map').map((t) => launch(t, consumers.signal));
    const all = Promise.all([...producerTasks, ...consumerTasks]);

    let draining: Promise<void> | undefined;
    const drain = async () => {
      logger.info('Shutting down topology');
      producers.abort();
      await Promise.all(producerTasks);
      consumers.abort();
    };
    const onAbort = () => {
      draining ??= drain();
    };

    if (signal?.aborted) onAbort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      await Promise.race([all, stopped]);
      const finished = await this.waitWithTimeout(Promise.all([all, draining]));
      if (!finished) {
        logger.warn('Shutdown timed out', { running: [...running] });
      }
    } finally {
      signal?.removeEventListener('abort', onAbort);
      // A producer stuck past the timeout leaves consumers without their stop signal.
      producers.abort();
      consumers.abort();
    }

    const report: RunReport = {
      tasks: tasks.map((t) => ({ ...t.stats })),
      timedOut: [...running],
    };

    if (failures.length > 0) {
      throw new TopologyFailedError(failures, report);
    }

    logger.info('Topology stopped', { tasks: report.tasks.length });
    return report;
  }

  /**
   * Keep one task running: relaunch it after a failure when restarts are
   * enabled, otherwise report the failure. Never rejects.
   */
  private async supervise(task: Task, signal: AbortSignal, onFailure: (failure: TaskFailure) => void): Promise<void> {
    for (;;) {
      try {
        await this.runOnce(task, signal);
        return;
      } catch (err) {
        const error = toError(err);

        if (signal.aborted) {
          task.logger.error('Task failed during shutdown', { error: error.message });
          return;
        }

        if (!this.settings.restart) {
          task.logger.error('Task failed', { error: error.message });
          onFailure({ instance: task.instance.id, error });
          return;
        }

        task.stats.restarts++;
        task.logger.warn('Task failed, restarting', {
          error: error.message,
          delayMs: this.settings.restart_delay_ms,
          restarts: task.stats.restarts,
        });
        if (!(await sleep(this.settings.restart_delay_ms, signal))) return;
      }
    }
  }

  private async runOnce(task: Task, signal: AbortSignal): Promise<void> {
    const { definition } = task.instance;
    const connection = definition.type === 'custom' ? definition.queue.connection : definition.source.connection;
    const client = this.deps.backend.open(connection, task.logger);

    const ctx: TaskContext = {
      instance: task.instance,
      client,
      logger: task.logger,
      signal,
      retry: this.retry,
      stats: task.stats,
    };

    task.logger.info('Task started', { type: definition.type, target: definition.target });
    try {
      if (definition.type === 'custom' && task.target.type === 'custom') {
        await runProducer(ctx, definition, task.target.produce);
      } else if (definition.type === 'map' && task.target.type === 'map') {
        await runConsumer(ctx, definition, task.target.consume);
      }
      task.logger.info('Task stopped', {
        produced: task.stats.produced,
        processed: task.stats.processed,
        failed: task.stats.failed,
      });
    } finally {
      try {
        await client.close();
      } catch (err) {
        task.logger.warn('Failed to close queue client', { error: toError(err).message });
      }
    }
  }

  /** Resolves false if `work` is still pending after the shutdown timeout. */
  private async waitWithTimeout(work: Promise<unknown>): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), this.settings.shutdown_timeout_ms);
    });
    try {
      return await Promise.race([work.then(() => true), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
