import type { SkrodeConfig, WorkerType } from '../config/types.js';

const REQUIRED_PROPERTIES: Record<WorkerType, string[]> = {
  custom: ['target', 'queue', 'rate'],
  map: ['target', 'source'],
};

const TARGET_PATTERN = /^[\w.-]+:\w+$/;

export interface ValidationError {
  worker: string;
  message: string;
}

/**
 * Validate the worker declarations of a parsed config.
 * Returns an array of validation errors (empty if valid).
 */
export function validateWorkers(config: SkrodeConfig): ValidationError[] {
  const errors: ValidationError[] = [];

  for (const [name, worker] of config.workers) {
    const props = worker.properties;

    for (const prop of REQUIRED_PROPERTIES[worker.type]) {
      if (props[prop] === undefined || props[prop] === null) {
        errors.push({
          worker: name,
          message: `Worker "${name}" (type "${worker.type}") is missing required property: "${prop}"`,
        });
      }
    }

    if (props.target !== undefined && props.target !== null) {
      if (typeof props.target !== 'string' || !TARGET_PATTERN.test(props.target)) {
        errors.push({
          worker: name,
          message: `Worker "${name}" has a malformed target: expected "module:function", got ${JSON.stringify(props.target)}`,
        });
      }
    }

    if (worker.type === 'custom' && props.rate !== undefined && props.rate !== null) {
      if (typeof props.rate !== 'number' || !Number.isFinite(props.rate) || props.rate <= 0) {
        errors.push({
          worker: name,
          message: `Worker "${name}" must have a positive rate, got ${JSON.stringify(props.rate)}`,
        });
      }
    }

    if (worker.type === 'map' && props.timeout !== undefined) {
      if (typeof props.timeout !== 'number' || !Number.isFinite(props.timeout) || props.timeout <= 0) {
        errors.push({
          worker: name,
          message: `Worker "${name}" must have a positive timeout, got ${JSON.stringify(props.timeout)}`,
        });
      }
    }
  }

  return errors;
}
