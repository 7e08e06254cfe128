import { ConfigError, UnknownTargetError } from '../errors.js';
import type { WorkerDefinition } from '../topology/types.js';
import type { ConsumeFn, ProduceFn, Target } from './types.js';

export type BoundTarget =
  | { type: 'custom'; produce: ProduceFn }
  | { type: 'map'; consume: ConsumeFn };

/**
 * Maps `module:function` keys to handler capabilities. Workers name their
 * handler by key; the runner binds every key before any task starts.
 */
export class TargetRegistry {
  private targets = new Map<string, Target>();

  register(name: string, target: Target): this {
    if (this.targets.has(name)) {
      throw new Error(`Target "${name}" is already registered`);
    }
    this.targets.set(name, target);
    return this;
  }

  has(name: string): boolean {
    return this.targets.has(name);
  }

  get(name: string): Target {
    const target = this.targets.get(name);
    if (!target) {
      throw new UnknownTargetError(name);
    }
    return target;
  }

  names(): string[] {
    return Array.from(this.targets.keys());
  }

  /**
   * Look up a worker's target and check it can play the worker's role.
   */
  bind(definition: WorkerDefinition): BoundTarget {
    const target = this.get(definition.target);

    if (definition.type === 'custom') {
      if (target.kind !== 'producer') {
        throw new ConfigError(
          `Worker "${definition.name}" (type "custom") needs a producer target, but "${definition.target}" is a ${target.kind}`,
        );
      }
      return { type: 'custom', produce: target.produce };
    }

    if (target.kind !== 'consumer') {
      throw new ConfigError(
        `Worker "${definition.name}" (type "map") needs a consumer target, but "${definition.target}" is a ${target.kind}`,
      );
    }
    return { type: 'map', consume: target.consume };
  }

  /** Release whatever the registered targets hold open. */
  async dispose(): Promise<void> {
    for (const target of this.targets.values()) {
      await target.dispose?.();
    }
  }
}
