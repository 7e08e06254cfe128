export interface Connection {
  kind: 'connection';
  name: string;
  host: string;
  port: number;
  db: number;
  password?: string;
}

export interface Queue {
  kind: 'queue';
  name: string;
  connection: Connection;
  key: string;
  /** List holding items taken by a consumer but not yet finished with. */
  inflight?: string;
}

export type Declaration = Connection | Queue;

export const WORKER_TYPES = ['custom', 'map'] as const;

export type WorkerType = (typeof WORKER_TYPES)[number];

/**
 * A worker as written in the document. References in `properties` are
 * already resolved to their Connection or Queue records; checking that the
 * right properties are present is left to the worker registry.
 */
export interface WorkerDeclaration {
  name: string;
  type: WorkerType;
  properties: Record<string, unknown>;
}

export interface RetrySettings {
  max_retries: number;
  base_delay_ms: number;
  max_delay_ms: number;
}

export interface RunnerSettings {
  shutdown_timeout_ms: number;
  restart: boolean;
  restart_delay_ms: number;
  retry: RetrySettings;
}

export interface SkrodeConfig {
  connections: Map<string, Connection>;
  queues: Map<string, Queue>;
  workers: Map<string, WorkerDeclaration>;
  /** Worker names to launch, in order. A name may appear more than once. */
  topology: string[];
  runner: RunnerSettings;
}
