import { loadConfig } from '../config/loader.js';
import type { Queue, SkrodeConfig, WorkerDeclaration } from '../config/types.js';
import { InvalidWorkerDefinitionError, UnknownWorkerError } from '../errors.js';
import type { WorkerDefinition, WorkerInstance } from './types.js';
import { validateWorkers } from './validator.js';

const DEFAULT_DEQUEUE_TIMEOUT_SECONDS = 1;

/** Properties that become typed fields of a definition instead of options. */
const BOUND_PROPERTIES = new Set(['target', 'queue', 'source', 'rate', 'timeout']);

export class WorkerRegistry {
  private constructor(
    private definitions: Map<string, WorkerDefinition>,
    readonly topology: readonly string[],
  ) {}

  /**
   * Validate a parsed config and build its definitions. Throws before
   * anything runs if the topology names an undeclared worker or any
   * declaration is invalid.
   */
  static fromConfig(config: SkrodeConfig): WorkerRegistry {
    for (const name of config.topology) {
      if (!config.workers.has(name)) {
        throw new UnknownWorkerError(name);
      }
    }

    const errors = validateWorkers(config);
    if (errors.length > 0) {
      throw new InvalidWorkerDefinitionError(errors.map((e) => e.message));
    }

    const definitions = new Map<string, WorkerDefinition>();
    for (const [name, declaration] of config.workers) {
      definitions.set(name, toDefinition(declaration));
    }

    return new WorkerRegistry(definitions, [...config.topology]);
  }

  resolve(name: string): WorkerDefinition {
    const definition = this.definitions.get(name);
    if (!definition) {
      throw new UnknownWorkerError(name);
    }
    return definition;
  }

  names(): string[] {
    return Array.from(this.definitions.keys());
  }

  /** One entry per topology position; repeated names give independent instances. */
  instances(): WorkerInstance[] {
    return this.topology.map((name, index) => ({
      id: `${name}#${index}`,
      index,
      definition: this.resolve(name),
    }));
  }
}

/**
 * Load a topology document and validate its workers.
 */
export function loadTopology(configPath: string): { config: SkrodeConfig; registry: WorkerRegistry } {
  const config = loadConfig(configPath);
  return { config, registry: WorkerRegistry.fromConfig(config) };
}

// Only called after validateWorkers reported nothing, so the required
// properties are present with the right types.
function toDefinition(declaration: WorkerDeclaration): WorkerDefinition {
  const props = declaration.properties;
  const options: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(props)) {
    if (!BOUND_PROPERTIES.has(key)) options[key] = value;
  }

  const target = String(props.target);

  if (declaration.type === 'custom') {
    return {
      name: declaration.name,
      type: 'custom',
      target,
      queue: asQueue(props.queue, declaration.name),
      rate: Number(props.rate),
      options,
    };
  }

  return {
    name: declaration.name,
    type: 'map',
    target,
    source: asQueue(props.source, declaration.name),
    timeout: typeof props.timeout === 'number' ? props.timeout : DEFAULT_DEQUEUE_TIMEOUT_SECONDS,
    options,
  };
}

function asQueue(value: unknown, worker: string): Queue {
  if (isQueue(value)) return value;
  throw new InvalidWorkerDefinitionError([`Worker "${worker}" is not bound to a queue`]);
}

function isQueue(value: unknown): value is Queue {
  return typeof value === 'object' && value !== null && 'kind' in value && value.kind === 'queue';
}
