import { createGithubTargets } from '../ingesters/github.js';
import { testTargets } from '../ingesters/test.js';
import { TargetRegistry } from './registry.js';

/**
 * Registry holding every target that ships with skrode.
 */
export function createDefaultTargets(): TargetRegistry {
  const registry = new TargetRegistry();
  const builtins = { ...testTargets, ...createGithubTargets() };
  for (const [name, target] of Object.entries(builtins)) {
    registry.register(name, target);
  }
  return registry;
}
