import { consumer, producer, type Target } from '../targets/types.js';

/** Stand-in ingesters for exercising a topology end to end. */

export function random(): { value: number } {
  return { value: Math.floor(Math.random() * 1_000_000) };
}

export function doPrint(item: unknown): void {
  console.log(JSON.stringify(item));
}

export const testTargets: Record<string, Target> = {
  'skrode.ingesters.test:random': producer(random),
  'skrode.ingesters.test:do_print': consumer(doPrint),
};
