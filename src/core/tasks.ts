// src/core/tasks.ts
// Background tasks: every bus round-trip runs here with a slot from the
// limiter, a timeout from the clock and an abort handle for cancellation.

import type { ClockPort } from "../ports/clock";
import type { TraceSink } from "../ports/types";
import type { Outcome } from "../outcome/outcome";
import type { Failure } from "../outcome/failure";
import { failure } from "../outcome/failure";
import { cancelled, done, fail, remoteError, timeout, transportError } from "../outcome/constructors";
import { makeDiagnostic } from "../outcome/codes";
import { IntrospectionFailure, RemoteError, SignatureError, errorMessage } from "../errors";
import { AbortedError } from "../adapters/abortable";
import type { ServiceLimiter } from "./limiter";

export type TaskId = number;

export type TaskKind = "list" | "introspect" | "call" | "get" | "getAll" | "set" | "subscribe" | "unsubscribe";

export type TaskSpec<T> = {
  kind: TaskKind;
  /** Target service; tasks without one bypass the per-service limit. */
  service?: string;
  run: (signal: AbortSignal) => Promise<T>;
};

export type TaskHandle = {
  id: TaskId;
  kind: TaskKind;
  /** Stop waiting. No outcome is delivered after this. Returns false if already settled. */
  cancel(): boolean;
};

/**
 * Map an error raised by a bus operation to the failure it stands for.
 */
export function failureFromError(e: unknown): Failure {
  if (e instanceof RemoteError) {
    return remoteError(e.errorName, e.message).failure;
  }
  if (e instanceof IntrospectionFailure) {
    return failure("introspection-failure", e.message, {
      diagnostics: [makeDiagnostic("E0304", { path: e.path })],
      context: { path: e.path, detail: e.detail },
      recoverable: true,
    });
  }
  if (e instanceof SignatureError) {
    return failure(e.kind === "MalformedSignature" ? "malformed-signature" : "signature-too-deep", e.message, {
      context: { offset: e.offset },
      recoverable: true,
    });
  }
  if (e instanceof AbortedError) {
    return cancelled().failure;
  }
  return transportError(errorMessage(e)).failure;
}

export class TaskRunner {
  private nextId = 1;
  private readonly running = new Set<Promise<void>>();

  constructor(
    private readonly clock: ClockPort,
    private readonly limiter: ServiceLimiter,
    private readonly trace: TraceSink,
    readonly timeoutMs: number
  ) {}

  /**
   * Start a task. `settle` is called exactly once with its outcome, unless the
   * task is cancelled first, in which case it is never called.
   */
  start<T>(spec: TaskSpec<T>, settle: (outcome: Outcome<T>) => void): TaskHandle {
    const id = this.nextId++;
    const controller = new AbortController();
    let settled = false;
    const finish = (outcome: Outcome<T>) => {
      if (settled) return;
      settled = true;
      settle(outcome);
    };

    const task = (async () => {
      let release: (() => void) | undefined;
      let stopTimer: (() => void) | undefined;
      const started = this.clock.nowMs();
      try {
        release = spec.service === undefined ? undefined : await this.limiter.acquire(spec.service, controller.signal);
        // The wait is bounded from dispatch; time spent queued does not count.
        stopTimer = this.clock.setTimer(this.timeoutMs, () => {
          if (settled) return;
          this.trace.emit({ tag: "E_Timeout", requestId: id, kind: spec.kind, ms: this.timeoutMs });
          finish(timeout(this.timeoutMs));
          controller.abort();
        });
        const value = await spec.run(controller.signal);
        finish(done(value, { durationMs: this.clock.nowMs() - started }));
      } catch (e) {
        // A cancelled or timed-out task has already settled; its error is moot.
        finish(fail(failureFromError(e), { durationMs: this.clock.nowMs() - started }));
      } finally {
        stopTimer?.();
        release?.();
      }
    })();

    this.running.add(task);
    void task.finally(() => this.running.delete(task));

    return {
      id,
      kind: spec.kind,
      cancel: () => {
        if (settled) return false;
        settled = true;
        this.trace.emit({ tag: "E_Cancel", requestId: id, kind: spec.kind });
        controller.abort();
        return true;
      },
    };
  }

  get inFlight(): number {
    return this.running.size;
  }

  /**
   * Resolves when every task started so far has finished, including ones
   * whose outcome was dropped.
   */
  async settled(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all([...this.running]);
    }
  }
}
