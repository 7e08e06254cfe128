import { setTimeout as delay } from 'node:timers/promises';

/** Longest delay a Node timer accepts; longer ones fire after 1ms. */
const MAX_TIMER_MS = 2 ** 31 - 1;

/**
 * Wait `ms` milliseconds, or at most MAX_TIMER_MS. Resolves false, early,
 * if the signal aborts.
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return false;
  try {
    await delay(Math.min(ms, MAX_TIMER_MS), undefined, { signal });
    return true;
  } catch (err) {
    if (signal?.aborted) return false;
    throw err;
  }
}

/**
 * Fixed-interval pacing for producers. The k-th call to `wait()` resolves
 * no earlier than `start + k * interval`, so after `t` seconds at most
 * `rate * t` items have been let through. A slow item pushes the schedule
 * back instead of allowing a burst to catch up.
 */
export class Pacer {
  private readonly intervalMs: number;
  private next: number;

  constructor(rate: number, private now: () => number = Date.now) {
    this.intervalMs = 1000 / rate;
    this.next = now() + this.intervalMs;
  }

  /** Resolves false if the signal aborted before the slot opened. */
  async wait(signal?: AbortSignal): Promise<boolean> {
    for (let remaining = this.next - this.now(); remaining > 0; remaining = this.next - this.now()) {
      if (!(await sleep(Math.ceil(remaining), signal))) return false;
    }
    if (signal?.aborted) return false;
    this.next = Math.max(this.next, this.now()) + this.intervalMs;
    return true;
  }
}
