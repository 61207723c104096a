// src/core/orchestrator.ts
// Validates and dispatches calls, property access and signal subscriptions.
// Results come back through the channel; apply() turns them into session events.

import type { BusPort, PropertyTarget, SignalMatch, Unsubscribe } from "../ports/bus";
import type { Fail, Outcome } from "../outcome/outcome";
import { done, err, typeMismatch, arityMismatch } from "../outcome/constructors";
import { makeDiagnostic } from "../outcome/codes";
import type { ArgDescriptor, MethodDescriptor, PropertyDescriptor } from "../introspection/types";
import { isWritable } from "../introspection/types";
import type { TypeSignature } from "../signature/types";
import { describeSignature, renderSignature, renderSignatureList } from "../signature/render";
import type { Value } from "../value/value";
import { conforms, signatureOf } from "../value/value";
import type { Channel } from "./channel";
import type { BusMessage, RequestId, RequestKind, SessionEvent, SubscriptionId } from "./messages";
import type { TaskHandle, TaskRunner } from "./tasks";
import { AbortedError } from "../adapters/abortable";

export const DEFAULT_TIMEOUT_MS = 25_000;
export const DEFAULT_MAX_IN_FLIGHT_PER_SERVICE = 4;

export type CallTarget = {
  service: string;
  path: string;
  interface: string;
  member: string;
};

export type CallRequest = CallTarget & {
  args: readonly Value[];
};

export type PendingRequest = {
  id: RequestId;
  kind: RequestKind;
  /** Human-readable target, e.g. `com.example.Demo /obj com.example.Iface.Add`. */
  label: string;
  service: string;
  outArgs?: readonly ArgDescriptor[];
  startedAt: number;
  handle: TaskHandle;
};

export type SubscriptionInfo = {
  id: SubscriptionId;
  match: SignalMatch;
  /** False until the match is installed on the bus. */
  active: boolean;
  signals: number;
};

type SubscriptionRecord = SubscriptionInfo & {
  handle: TaskHandle;
  unsubscribe?: Unsubscribe;
};

export type OrchestratorDeps = {
  bus: BusPort;
  runner: TaskRunner;
  channel: Channel<BusMessage>;
  nowMs: () => number;
};

function containsUnixFd(sig: TypeSignature): boolean {
  switch (sig.tag) {
    case "Basic":
      return sig.code === "h";
    case "Array":
      return containsUnixFd(sig.element);
    case "Dict":
      return sig.key.code === "h" || containsUnixFd(sig.value);
    case "Struct":
      return sig.fields.some(containsUnixFd);
    case "Variant":
      return false;
  }
}

function unsupported(sig: TypeSignature) {
  const type = renderSignature(sig);
  return err("unsupported-type", `Values of type '${type}' cannot be sent`, {
    diagnostics: [makeDiagnostic("E0306", { type })],
    recoverable: true,
  });
}

/**
 * Check values against declared signatures before anything is sent.
 */
export function validateArgs(args: readonly Value[], sigs: readonly TypeSignature[]): Outcome<readonly Value[]> {
  if (args.length !== sigs.length) {
    return arityMismatch(sigs.length, args.length);
  }
  for (const [i, sig] of sigs.entries()) {
    if (containsUnixFd(sig)) return unsupported(sig);
    const arg = args[i];
    if (arg === undefined || !conforms(arg, sig)) {
      const actual = arg === undefined ? "nothing" : describeSignature(signatureOf(arg));
      return typeMismatch(describeSignature(sig), actual, { argument: i });
    }
  }
  return done(args);
}

export function notWritable(descriptor: PropertyDescriptor): Fail {
  return err("not-writable", `Property ${descriptor.name} is read-only`, {
    diagnostics: [makeDiagnostic("E0305", { name: descriptor.name })],
    recoverable: true,
  });
}

export function targetLabel(service: string, path: string, iface: string, member?: string): string {
  return member === undefined ? `${service} ${path} ${iface}` : `${service} ${path} ${iface}.${member}`;
}

export class CallOrchestrator {
  private readonly pendingRequests = new Map<RequestId, PendingRequest>();
  private readonly subs = new Map<SubscriptionId, SubscriptionRecord>();

  constructor(private readonly deps: OrchestratorDeps) {}

  // ───────────────────────────────────────────────────────────────
  // Intents
  // ───────────────────────────────────────────────────────────────

  /**
   * Send a method call. With a method descriptor the args are validated
   * against its in-args first, and the reply is labelled with its out-args.
   */
  submitCall(request: CallRequest, method?: MethodDescriptor): Outcome<RequestId> {
    let signature: string;
    if (method) {
      const sigs = method.inArgs.map((a) => a.signature);
      const checked = validateArgs(request.args, sigs);
      if (checked.tag === "Fail") return checked;
      signature = renderSignatureList(sigs);
    } else {
      signature = renderSignatureList(request.args.map(signatureOf));
    }
    const { bus } = this.deps;
    return done(
      this.dispatch(
        "call",
        request.service,
        targetLabel(request.service, request.path, request.interface, request.member),
        (signal) => bus.call({ ...request, signature }, { signal }),
        method?.outArgs
      )
    );
  }

  readProperty(target: PropertyTarget): Outcome<RequestId> {
    const { bus } = this.deps;
    return done(
      this.dispatch(
        "get",
        target.service,
        targetLabel(target.service, target.path, target.interface, target.name),
        async (signal) => [await bus.getProperty(target, { signal })]
      )
    );
  }

  readAllProperties(service: string, path: string, iface: string): Outcome<RequestId> {
    const { bus } = this.deps;
    return done(
      this.dispatch("getAll", service, targetLabel(service, path, iface), async (signal) => [
        await bus.getAllProperties(service, path, iface, { signal }),
      ])
    );
  }

  /**
   * Rejects read-only properties and values of the wrong type before dispatch.
   */
  writeProperty(target: PropertyTarget, value: Value, descriptor: PropertyDescriptor): Outcome<RequestId> {
    if (!isWritable(descriptor)) return notWritable(descriptor);
    const checked = validateArgs([value], [descriptor.signature]);
    if (checked.tag === "Fail") return checked;
    const { bus } = this.deps;
    return done(
      this.dispatch(
        "set",
        target.service,
        targetLabel(target.service, target.path, target.interface, target.name),
        async (signal) => {
          await bus.setProperty(target, value, { signal });
          return [];
        }
      )
    );
  }

  /**
   * Install a signal match. Signals are delivered until unsubscribe(id).
   */
  subscribe(match: SignalMatch): Outcome<SubscriptionId> {
    const { bus, channel, runner } = this.deps;
    let id = 0;
    const handle = runner.start(
      {
        kind: "subscribe",
        service: match.service,
        run: async (signal) => {
          // Not aborted midway: a match that lands after cancellation must still be removed.
          const unsubscribe = await bus.subscribe(match, (args) => {
            channel.send({ tag: "SignalReceived", id, args });
          });
          if (signal.aborted) {
            await unsubscribe();
            throw new AbortedError();
          }
          return unsubscribe;
        },
      },
      (outcome) => channel.send({ tag: "SubscriptionSettled", id, outcome })
    );
    id = handle.id;
    this.subs.set(id, { id, match, active: false, signals: 0, handle });
    return done(id);
  }

  /**
   * Stop a subscription, pending or active. Returns false for an unknown id.
   */
  unsubscribe(id: SubscriptionId): boolean {
    const record = this.subs.get(id);
    if (!record) return false;
    this.subs.delete(id);
    if (record.unsubscribe) {
      this.removeMatch(id, record.unsubscribe);
    } else {
      record.handle.cancel();
    }
    return true;
  }

  /**
   * Stop waiting for a request. Any reply that still arrives is dropped.
   */
  cancel(id: RequestId): boolean {
    const pending = this.pendingRequests.get(id);
    if (!pending) return false;
    this.pendingRequests.delete(id);
    pending.handle.cancel();
    return true;
  }

  pending(): PendingRequest[] {
    return [...this.pendingRequests.values()];
  }

  subscriptions(): SubscriptionInfo[] {
    return [...this.subs.values()].map(({ id, match, active, signals }) => ({ id, match, active, signals }));
  }

  /** Cancel every request and drop every subscription. */
  close(): void {
    for (const id of [...this.pendingRequests.keys()]) this.cancel(id);
    for (const id of [...this.subs.keys()]) this.unsubscribe(id);
  }

  // ───────────────────────────────────────────────────────────────
  // Results
  // ───────────────────────────────────────────────────────────────

  /**
   * Apply one request or subscription message. Returns the event to report,
   * or undefined when the message belongs to a cancelled request.
   */
  apply(msg: BusMessage): SessionEvent | undefined {
    switch (msg.tag) {
      case "RequestSettled": {
        const pending = this.pendingRequests.get(msg.id);
        if (!pending) return undefined;
        this.pendingRequests.delete(msg.id);
        const { id, kind, label, outArgs } = pending;
        return msg.outcome.tag === "Done"
          ? { tag: "RequestDone", id, kind, label, values: msg.outcome.value, outArgs, durationMs: msg.outcome.meta.durationMs }
          : { tag: "RequestFailed", id, kind, label, failure: msg.outcome.failure };
      }
      case "SubscriptionSettled": {
        const record = this.subs.get(msg.id);
        if (msg.outcome.tag === "Fail") {
          if (!record) return undefined;
          this.subs.delete(msg.id);
          const { service, path, interface: iface, member } = record.match;
          return {
            tag: "RequestFailed",
            id: msg.id,
            kind: "subscribe",
            label: targetLabel(service, path, iface, member),
            failure: msg.outcome.failure,
          };
        }
        if (!record) {
          // Unsubscribed while the match was being installed.
          this.removeMatch(msg.id, msg.outcome.value);
          return undefined;
        }
        record.active = true;
        record.unsubscribe = msg.outcome.value;
        return { tag: "Subscribed", id: msg.id, match: record.match };
      }
      case "SignalReceived": {
        const record = this.subs.get(msg.id);
        if (!record?.active) return undefined;
        record.signals++;
        return { tag: "Signal", id: msg.id, match: record.match, args: msg.args };
      }
      case "UnsubscribeFailed":
        return { tag: "Notice", message: `Removing subscription ${msg.id} failed: ${msg.failure.message}` };
      default:
        return undefined;
    }
  }

  // ───────────────────────────────────────────────────────────────
  // Internals
  // ───────────────────────────────────────────────────────────────

  private dispatch(
    kind: RequestKind,
    service: string,
    label: string,
    run: (signal: AbortSignal) => Promise<Value[]>,
    outArgs?: readonly ArgDescriptor[]
  ): RequestId {
    const { runner, channel, nowMs } = this.deps;
    let id = 0;
    const handle = runner.start({ kind, service, run }, (outcome) => {
      channel.send({ tag: "RequestSettled", id, outcome });
    });
    id = handle.id;
    this.pendingRequests.set(id, { id, kind, label, service, outArgs, startedAt: nowMs(), handle });
    return id;
  }

  private removeMatch(id: SubscriptionId, unsubscribe: Unsubscribe): void {
    const { runner, channel } = this.deps;
    runner.start({ kind: "unsubscribe", run: () => unsubscribe() }, (outcome) => {
      if (outcome.tag === "Fail") {
        channel.send({ tag: "UnsubscribeFailed", id, failure: outcome.failure });
      }
    });
  }
}
