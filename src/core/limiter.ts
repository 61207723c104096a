// src/core/limiter.ts
// Per-service cap on in-flight requests; excess requests wait in FIFO order.

import { AbortedError } from "../adapters/abortable";

type Waiter = {
  grant: (release: () => void) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
};

type Slots = {
  active: number;
  queue: Waiter[];
};

export class ServiceLimiter {
  private readonly slots = new Map<string, Slots>();

  constructor(readonly maxPerService: number) {
    if (!Number.isInteger(maxPerService) || maxPerService < 1) {
      throw new RangeError(`maxPerService must be a positive integer, got ${maxPerService}`);
    }
  }

  /**
   * Wait for a slot on `service`. Resolves with a release function that
   * must be called exactly once; later calls are ignored. Rejects with
   * AbortedError if `signal` fires while still queued.
   */
  acquire(service: string, signal?: AbortSignal): Promise<() => void> {
    if (signal?.aborted) return Promise.reject(new AbortedError());
    const slots = this.slotsFor(service);
    if (slots.active < this.maxPerService) {
      slots.active++;
      return Promise.resolve(this.releaser(service));
    }
    return new Promise((resolve, reject) => {
      const waiter: Waiter = { grant: resolve, signal };
      if (signal) {
        waiter.onAbort = () => {
          const i = slots.queue.indexOf(waiter);
          if (i >= 0) slots.queue.splice(i, 1);
          this.prune(service);
          reject(new AbortedError());
        };
        signal.addEventListener("abort", waiter.onAbort, { once: true });
      }
      slots.queue.push(waiter);
    });
  }

  active(service: string): number {
    return this.slots.get(service)?.active ?? 0;
  }

  queued(service: string): number {
    return this.slots.get(service)?.queue.length ?? 0;
  }

  private slotsFor(service: string): Slots {
    let slots = this.slots.get(service);
    if (!slots) {
      slots = { active: 0, queue: [] };
      this.slots.set(service, slots);
    }
    return slots;
  }

  private releaser(service: string): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const slots = this.slotsFor(service);
      const next = slots.queue.shift();
      if (next) {
        // The slot passes straight to the next waiter.
        if (next.signal && next.onAbort) next.signal.removeEventListener("abort", next.onAbort);
        next.grant(this.releaser(service));
      } else {
        slots.active--;
        this.prune(service);
      }
    };
  }

  private prune(service: string): void {
    const slots = this.slots.get(service);
    if (slots && slots.active === 0 && slots.queue.length === 0) {
      this.slots.delete(service);
    }
  }
}
