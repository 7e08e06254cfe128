import type { RunReport } from './runner/types.js';

/**
 * Raised when a topology document cannot be turned into a consistent
 * configuration. Fatal at startup: no worker runs after one of these.
 */
export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export class UnknownWorkerError extends ConfigError {
  constructor(readonly worker: string) {
    super(`Unknown worker: "${worker}"`);
    this.name = 'UnknownWorkerError';
  }
}

export class InvalidWorkerDefinitionError extends ConfigError {
  constructor(readonly errors: string[]) {
    super(`Invalid worker definitions:\n  - ${errors.join('\n  - ')}`);
    this.name = 'InvalidWorkerDefinitionError';
  }
}

export class UnknownTargetError extends ConfigError {
  constructor(readonly target: string) {
    super(`No target registered for "${target}"`);
    this.name = 'UnknownTargetError';
  }
}

export class RetryExhaustedError extends Error {
  constructor(
    readonly operation: string,
    readonly attempts: number,
    cause: unknown,
  ) {
    super(`${operation} failed after ${attempts} attempts: ${errorMessage(cause)}`, { cause });
    this.name = 'RetryExhaustedError';
  }
}

export interface TaskFailure {
  instance: string;
  error: Error;
}

export class TopologyFailedError extends Error {
  constructor(
    readonly failures: TaskFailure[],
    readonly report: RunReport,
  ) {
    super(
      `Topology stopped after task failure: ${failures
        .map((f) => `${f.instance} (${f.error.message})`)
        .join(', ')}`,
    );
    this.name = 'TopologyFailedError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
