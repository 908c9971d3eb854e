import type { Clock } from "../../src/core/poller";

/**
 * Clock whose sleeps advance time instantly
 */
export class FakeClock implements Clock {
  readonly sleeps: number[] = [];
  /** Called after each sleep, e.g. to abort mid-wait */
  onSleep?: (clock: FakeClock) => void;

  constructor(private current = 0) {}

  now(): number {
    return this.current;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new Error("sleep aborted");
    }
    this.sleeps.push(ms);
    this.current += ms;
    this.onSleep?.(this);
  }
}
