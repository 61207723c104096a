// src/core/session.ts
// BusSession: the one object the presentation talks to. Intents schedule
// work; tick() applies finished work and reports what changed.

import type { BusPort, PropertyTarget, SignalMatch } from "../ports/bus";
import type { ClockPort } from "../ports/clock";
import { systemClock } from "../ports/clock";
import type { TraceSink } from "../ports/types";
import { nullTraceSink } from "../ports/sink";
import type { Fail, Outcome } from "../outcome/outcome";
import { transportError } from "../outcome/constructors";
import { renderFailure } from "../outcome/failure";
import { andThen } from "../outcome/matchers";
import type { MethodDescriptor, NodeDescription, PropertyDescriptor } from "../introspection/types";
import { isWritable } from "../introspection/types";
import { parseIntrospection } from "../introspection/xml";
import { DEFAULT_MAX_DEPTH } from "../signature/parse";
import type { Value } from "../value/value";
import { parseArguments, parseValue } from "../parser/parseValue";
import { Channel } from "./channel";
import type { BusMessage, RequestId, SessionEvent, SubscriptionId } from "./messages";
import { ServiceLimiter } from "./limiter";
import { TaskRunner } from "./tasks";
import type { TaskHandle } from "./tasks";
import type { FetchTicket, ObjectNode } from "./topology";
import { TopologyTree, childPath } from "./topology";
import type { CallRequest, CallTarget, PendingRequest, SubscriptionInfo } from "./orchestrator";
import { CallOrchestrator, DEFAULT_MAX_IN_FLIGHT_PER_SERVICE, DEFAULT_TIMEOUT_MS, notWritable } from "./orchestrator";

export type SessionOptions = {
  bus: BusPort;
  clock?: ClockPort;
  trace?: TraceSink;
  /** Bounded wait for every round-trip. */
  timeoutMs?: number;
  maxInFlightPerService?: number;
  /** Nesting limit for signatures read from introspection and typed values. */
  maxDepth?: number;
  /** Include services that can be started on demand. */
  includeActivatable?: boolean;
  /** Keep only service names containing this text. */
  filter?: string;
};

export type SessionListener = (event: SessionEvent) => void;

function sessionClosed(): Fail {
  return transportError("session is closed");
}

function fetchKey(service: string, path: string): string {
  return `${service}\u0000${path}`;
}

export class BusSession {
  readonly bus: BusPort;
  private readonly clock: ClockPort;
  private readonly maxDepth: number;
  private readonly includeActivatable: boolean;
  private readonly filter: string;
  private readonly channel = new Channel<BusMessage>();
  private readonly tree = new TopologyTree();
  private readonly runner: TaskRunner;
  private readonly orchestrator: CallOrchestrator;
  private readonly fetches = new Map<string, { ticket: FetchTicket; handle: TaskHandle }>();
  private readonly listeners = new Set<SessionListener>();
  /** Services being dumped, with the number of nodes fetched so far. */
  private readonly dumps = new Map<string, number>();
  /** Events produced outside a tick, reported by the next one. */
  private deferred: SessionEvent[] = [];
  private listing: TaskHandle | undefined;
  private closed = false;

  constructor(opts: SessionOptions) {
    this.bus = opts.bus;
    this.clock = opts.clock ?? systemClock;
    this.maxDepth = opts.maxDepth ?? DEFAULT_MAX_DEPTH;
    this.includeActivatable = opts.includeActivatable ?? false;
    this.filter = opts.filter ?? "";
    this.runner = new TaskRunner(
      this.clock,
      new ServiceLimiter(opts.maxInFlightPerService ?? DEFAULT_MAX_IN_FLIGHT_PER_SERVICE),
      opts.trace ?? nullTraceSink,
      opts.timeoutMs ?? DEFAULT_TIMEOUT_MS
    );
    this.orchestrator = new CallOrchestrator({
      bus: this.bus,
      runner: this.runner,
      channel: this.channel,
      nowMs: () => this.clock.nowMs(),
    });
  }

  // ─────────────────────────────────────────────────────────────────
  // Views
  // ─────────────────────────────────────────────────────────────────

  services(): readonly string[] {
    return this.tree.services();
  }

  node(service: string, path: string): Readonly<ObjectNode> | undefined {
    return this.tree.node(service, path);
  }

  children(service: string, path: string): Readonly<ObjectNode>[] {
    return this.tree.children(service, path);
  }

  walk(service: string): Readonly<ObjectNode>[] {
    return this.tree.walk(service);
  }

  pending(): PendingRequest[] {
    return this.orchestrator.pending();
  }

  subscriptions(): SubscriptionInfo[] {
    return this.orchestrator.subscriptions();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Background tasks still running. */
  get inFlight(): number {
    return this.runner.inFlight;
  }

  /** Messages waiting for the next tick. */
  get queued(): number {
    return this.channel.size;
  }

  // ─────────────────────────────────────────────────────────────────
  // Topology intents
  // ─────────────────────────────────────────────────────────────────

  /** Re-list bus names. A listing already in flight is reused. */
  refreshServices(): void {
    if (this.closed || this.listing) return;
    const { bus, includeActivatable } = this;
    this.listing = this.runner.start(
      {
        kind: "list",
        run: async (signal) => {
          const names = await bus.listNames({ signal });
          if (!includeActivatable) return names;
          return [...names, ...(await bus.listActivatableNames({ signal }))];
        },
      },
      (outcome) => this.channel.send({ tag: "ServicesListed", outcome })
    );
  }

  /**
   * Fetch a node that has never been fetched. Returns whether a fetch started.
   */
  expand(service: string, path: string): boolean {
    const node = this.tree.node(service, path);
    if (!node || node.state.tag !== "Unfetched") return false;
    return this.startFetch(service, path);
  }

  /**
   * Fetch a node again. A no-op while a fetch for it is in flight.
   */
  refresh(service: string, path: string): boolean {
    return this.startFetch(service, path);
  }

  /** Drop everything known about a service and fetch its root again. */
  refreshService(service: string): boolean {
    if (!this.tree.hasService(service)) return false;
    this.dropFetches(service);
    this.tree.resetService(service);
    this.dumps.delete(service);
    return this.startFetch(service, "/");
  }

  /**
   * Abandon an in-flight fetch; the node keeps its previous state. A dump of
   * the same service stops with it.
   */
  cancelFetch(service: string, path: string): boolean {
    const node = this.tree.cancelFetch(service, path);
    if (!node) return false;
    this.fetches.get(fetchKey(service, path))?.handle.cancel();
    this.fetches.delete(fetchKey(service, path));
    const fetched = this.dumps.get(service);
    if (fetched !== undefined) {
      this.dumps.delete(service);
      this.deferred.push({ tag: "DumpStopped", service, nodes: fetched });
    }
    return true;
  }

  /**
   * Fetch every node reachable from the root, breadth first, one
   * introspection per node. DumpComplete is reported when nothing is left.
   */
  dump(service: string): boolean {
    if (!this.tree.hasService(service)) return false;
    this.dumps.set(service, 0);
    this.deferred.push(...this.advanceDump(service));
    return true;
  }

  // ─────────────────────────────────────────────────────────────────
  // Request intents
  // ─────────────────────────────────────────────────────────────────

  call(request: CallRequest, method?: MethodDescriptor): Outcome<RequestId> {
    if (this.closed) return sessionClosed();
    return this.orchestrator.submitCall(request, method);
  }

  /**
   * Parse `text` against the method's in-args and submit the call.
   */
  callWithText(target: CallTarget, method: MethodDescriptor, text: string): Outcome<RequestId> {
    const args = parseArguments(
      text,
      method.inArgs.map((a) => a.signature),
      { maxDepth: this.maxDepth }
    );
    return andThen(args, (values) => this.call({ ...target, args: values }, method));
  }

  readProperty(target: PropertyTarget): Outcome<RequestId> {
    if (this.closed) return sessionClosed();
    return this.orchestrator.readProperty(target);
  }

  readAllProperties(service: string, path: string, iface: string): Outcome<RequestId> {
    if (this.closed) return sessionClosed();
    return this.orchestrator.readAllProperties(service, path, iface);
  }

  writeProperty(target: PropertyTarget, value: Value, descriptor: PropertyDescriptor): Outcome<RequestId> {
    if (this.closed) return sessionClosed();
    return this.orchestrator.writeProperty(target, value, descriptor);
  }

  writePropertyText(target: PropertyTarget, descriptor: PropertyDescriptor, text: string): Outcome<RequestId> {
    // Read-only is reported before any complaint about the text.
    if (!isWritable(descriptor)) return notWritable(descriptor);
    const value = parseValue(text, descriptor.signature, { maxDepth: this.maxDepth });
    return andThen(value, (v) => this.writeProperty(target, v, descriptor));
  }

  subscribe(match: SignalMatch): Outcome<SubscriptionId> {
    if (this.closed) return sessionClosed();
    return this.orchestrator.subscribe(match);
  }

  unsubscribe(id: SubscriptionId): boolean {
    return this.orchestrator.unsubscribe(id);
  }

  cancel(id: RequestId): boolean {
    return this.orchestrator.cancel(id);
  }

  // ─────────────────────────────────────────────────────────────────
  // Event loop
  // ─────────────────────────────────────────────────────────────────

  onEvent(listener: SessionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Run `wake` whenever a result is waiting, so the owner can schedule a tick. */
  onResult(wake: () => void): () => void {
    return this.channel.onSend(wake);
  }

  /**
   * Apply every result that has arrived. Never blocks. Returns the events
   * reported to listeners, in order.
   */
  tick(): SessionEvent[] {
    const events: SessionEvent[] = this.deferred;
    this.deferred = [];
    for (const msg of this.channel.drain()) {
      events.push(...this.apply(msg));
    }
    for (const event of events) {
      for (const listener of this.listeners) listener(event);
    }
    return events;
  }

  /**
   * Resolves once every task started so far has finished. Results still
   * need a tick() to be applied.
   */
  settled(): Promise<void> {
    return this.runner.settled();
  }

  /** Cancel all work, drop subscriptions and disconnect. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.listing?.cancel();
    for (const { handle } of this.fetches.values()) handle.cancel();
    this.fetches.clear();
    this.orchestrator.close();
    await this.runner.settled();
    this.channel.close();
    this.bus.disconnect();
  }

  /** Queue a message for the presentation, delivered on the next tick. */
  notice(message: string): void {
    this.channel.send({ tag: "Notice", message });
  }

  // ─────────────────────────────────────────────────────────────────
  // Internals
  // ─────────────────────────────────────────────────────────────────

  private accepts(service: string): boolean {
    return service.includes(this.filter);
  }

  private startFetch(service: string, path: string): boolean {
    if (this.closed) return false;
    const ticket = this.tree.beginFetch(service, path);
    if (!ticket) return false;
    const { bus, maxDepth } = this;
    const handle = this.runner.start(
      {
        kind: "introspect",
        service,
        run: async (signal) => parseIntrospection(await bus.introspect(service, path, { signal }), path, { maxDepth }),
      },
      (outcome) => this.channel.send({ tag: "FetchSettled", ticket, outcome })
    );
    this.fetches.set(fetchKey(service, path), { ticket, handle });
    return true;
  }

  /** Cancel every fetch of a service the tree is about to forget. */
  private dropFetches(service: string): void {
    for (const [key, { ticket, handle }] of this.fetches) {
      if (ticket.service !== service) continue;
      handle.cancel();
      this.fetches.delete(key);
    }
  }

  private apply(msg: BusMessage): SessionEvent[] {
    switch (msg.tag) {
      case "ServicesListed": {
        this.listing = undefined;
        if (msg.outcome.tag === "Fail") {
          return [{ tag: "ServicesFailed", failure: msg.outcome.failure }];
        }
        const { added, removed } = this.tree.setServices(msg.outcome.value.filter((name) => this.accepts(name)));
        for (const s of removed) {
          this.dropFetches(s);
          this.dumps.delete(s);
        }
        return [{ tag: "ServicesChanged", services: this.tree.services(), added, removed }];
      }
      case "FetchSettled":
        return this.applyFetch(msg.ticket, msg.outcome);
      case "Notice":
        return [{ tag: "Notice", message: msg.message }];
      default: {
        const event = this.orchestrator.apply(msg);
        return event ? [event] : [];
      }
    }
  }

  private applyFetch(ticket: FetchTicket, outcome: Outcome<NodeDescription>): SessionEvent[] {
    const key = fetchKey(ticket.service, ticket.path);
    if (this.fetches.get(key)?.ticket.id === ticket.id) this.fetches.delete(key);
    const node =
      outcome.tag === "Done"
        ? this.tree.completeFetch(ticket, outcome.value)
        : this.tree.failFetch(ticket, renderFailure(outcome.failure));
    if (!node) return [];
    const events: SessionEvent[] = [{ tag: "NodeChanged", node }];
    if (this.dumps.has(ticket.service)) {
      this.dumps.set(ticket.service, (this.dumps.get(ticket.service) ?? 0) + 1);
      events.push(...this.advanceDump(ticket.service));
    }
    return events;
  }

  /** Start fetches for the next unfetched nodes of a dump; report completion. */
  private advanceDump(service: string): SessionEvent[] {
    let busy = false;
    const queue = ["/"];
    // Breadth-first over what is known so far.
    while (queue.length > 0) {
      const path = queue.shift() ?? "/";
      const node = this.tree.node(service, path);
      if (!node) continue;
      if (node.state.tag === "Unfetched") {
        this.startFetch(service, path);
        busy = true;
      } else if (node.state.tag === "Fetching") {
        busy = true;
      }
      for (const segment of node.children) queue.push(childPath(path, segment));
    }
    if (busy) return [];
    const nodes = this.dumps.get(service) ?? 0;
    this.dumps.delete(service);
    return [{ tag: "DumpComplete", service, nodes }];
  }
}
