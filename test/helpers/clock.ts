// test/helpers/clock.ts
// Hand-driven clock and a microtask flush for tests of asynchronous work.

import type { ClockPort } from "../../src/ports/clock";

type Timer = { at: number; fn: () => void };

export class ManualClock implements ClockPort {
  private now = 0;
  private timers = new Set<Timer>();

  nowMs(): number {
    return this.now;
  }

  setTimer(ms: number, fn: () => void): () => void {
    const timer: Timer = { at: this.now + ms, fn };
    this.timers.add(timer);
    return () => {
      this.timers.delete(timer);
    };
  }

  /** Move time forward, firing every timer that comes due, earliest first. */
  advance(ms: number): void {
    const target = this.now + ms;
    for (;;) {
      const due = [...this.timers].filter((t) => t.at <= target).sort((a, b) => a.at - b.at);
      const [next] = due;
      if (!next) break;
      this.timers.delete(next);
      this.now = next.at;
      next.fn();
    }
    this.now = target;
  }

  get pendingTimers(): number {
    return this.timers.size;
  }
}

/** Let every queued promise callback run. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
