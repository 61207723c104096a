/**
 * In-process bus. Serves a model of services and objects through BusPort,
 * so the session can be driven without a daemon (tests and `--demo`).
 */

import type { BusCallOptions, BusPort, MethodCall, PropertyTarget, SignalHandler, SignalMatch, Unsubscribe } from "../ports/bus";
import type { PropertyAccess } from "../introspection/types";
import type { Value } from "../value/value";
import { conforms, dict, str, variant } from "../value/value";
import { basic, VARIANT } from "../signature/types";
import { parseSignature, parseSignatureList } from "../signature/parse";
import { renderSignatureList } from "../signature/render";
import { RemoteError } from "../errors";
import { abortable } from "./abortable";

export interface MemoryMethod {
  /** Signature of the in-args, e.g. "ii". */
  in: string;
  out: string;
  /** Names for the in-args and out-args, in order; unnamed when absent. */
  inNames?: string[];
  outNames?: string[];
  /** `signal` fires when the caller stops waiting for the reply. */
  handler: (args: readonly Value[], signal?: AbortSignal) => Value[] | Promise<Value[]>;
}

export interface MemoryProperty {
  signature: string;
  access: PropertyAccess;
  value: Value;
}

export interface MemoryInterface {
  methods?: Record<string, MemoryMethod>;
  properties?: Record<string, MemoryProperty>;
  /** Signal name to argument signature. */
  signals?: Record<string, string>;
}

export interface MemoryObject {
  interfaces: Record<string, MemoryInterface>;
}

export type MemoryOp =
  | "listNames"
  | "listActivatableNames"
  | "introspect"
  | "call"
  | "getProperty"
  | "getAllProperties"
  | "setProperty"
  | "subscribe";

export interface MemoryRequest {
  op: MemoryOp;
  service?: string;
  path?: string;
  member?: string;
}

interface Subscription {
  match: SignalMatch;
  handler: SignalHandler;
}

const DBUS_ERROR = "org.freedesktop.DBus.Error";

function escapeAttr(s: string): string {
  return s.replace(/&/g, "&amp;").replace(/"/g, "&quot;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

function argXml(signature: string, names: string[] | undefined, direction?: "in" | "out"): string[] {
  return parseSignatureList(signature).map((sig, i) => {
    const name = names?.[i];
    const parts = [
      name !== undefined ? `name="${escapeAttr(name)}"` : "",
      `type="${escapeAttr(renderSignatureList([sig]))}"`,
      direction ? `direction="${direction}"` : "",
    ].filter((p) => p !== "");
    return `<arg ${parts.join(" ")}/>`;
  });
}

export class MemoryBus implements BusPort {
  readonly label: string;

  /** Every request in arrival order. */
  readonly requests: MemoryRequest[] = [];

  private readonly services = new Map<string, Map<string, MemoryObject>>();
  private readonly activatable = new Set<string>();
  private readonly introspectFailures = new Map<string, RemoteError>();
  private readonly subscriptions = new Set<Subscription>();
  private held: Array<() => void> | undefined;
  private connected = true;

  constructor(label = "memory") {
    this.label = label;
  }

  // ── Model ──────────────────────────────────────────────────────────────

  addService(name: string, objects: Record<string, MemoryObject>): this {
    this.services.set(name, new Map(Object.entries(objects)));
    return this;
  }

  removeService(name: string): this {
    this.services.delete(name);
    return this;
  }

  addActivatable(name: string): this {
    this.activatable.add(name);
    return this;
  }

  /** Make Introspect of one object reply with an error. */
  failIntrospection(service: string, path: string, errorName: string, message: string): this {
    this.introspectFailures.set(`${service}\u0000${path}`, new RemoteError(errorName, message));
    return this;
  }

  /**
   * Hold every reply from now on until release() is called. Requests still
   * arrive (and are recorded) immediately.
   */
  hold(): void {
    this.held ??= [];
  }

  /** Deliver all held replies and stop holding. */
  release(): void {
    const pending = this.held ?? [];
    this.held = undefined;
    for (const resume of pending) resume();
  }

  get heldCount(): number {
    return this.held?.length ?? 0;
  }

  get subscriptionCount(): number {
    return this.subscriptions.size;
  }

  /** Deliver a signal to every matching subscriber. */
  emitSignal(service: string, path: string, iface: string, member: string, args: Value[]): void {
    for (const sub of [...this.subscriptions]) {
      const m = sub.match;
      if (m.service === service && m.path === path && m.interface === iface && m.member === member) {
        sub.handler(args);
      }
    }
  }

  // ── BusPort ────────────────────────────────────────────────────────────

  listNames(opts?: BusCallOptions): Promise<string[]> {
    return this.serve({ op: "listNames" }, opts, () => ["org.freedesktop.DBus", ...this.services.keys()]);
  }

  listActivatableNames(opts?: BusCallOptions): Promise<string[]> {
    return this.serve({ op: "listActivatableNames" }, opts, () => [...this.activatable]);
  }

  introspect(service: string, path: string, opts?: BusCallOptions): Promise<string> {
    return this.serve({ op: "introspect", service, path }, opts, () => {
      const failure = this.introspectFailures.get(`${service}\u0000${path}`);
      if (failure) throw failure;
      return this.introspectionXml(service, path);
    });
  }

  call(call: MethodCall, opts?: BusCallOptions): Promise<Value[]> {
    return this.serve({ op: "call", service: call.service, path: call.path, member: call.member }, opts, () => {
      const iface = this.lookupInterface(call.service, call.path, call.interface);
      const method = iface.methods?.[call.member];
      if (!method) {
        throw new RemoteError(`${DBUS_ERROR}.UnknownMethod`, `No such method '${call.member}'`);
      }
      const inSigs = parseSignatureList(method.in);
      const argsOk =
        call.args.length === inSigs.length &&
        call.args.every((a, i) => {
          const sig = inSigs[i];
          return sig !== undefined && conforms(a, sig);
        });
      if (!argsOk) {
        throw new RemoteError(
          `${DBUS_ERROR}.InvalidArgs`,
          `Call to '${call.member}' has wrong args (expected '${method.in}', got '${call.signature}')`,
        );
      }
      return method.handler(call.args, opts?.signal);
    });
  }

  getProperty(target: PropertyTarget, opts?: BusCallOptions): Promise<Value> {
    return this.serve({ op: "getProperty", service: target.service, path: target.path, member: target.name }, opts, () => {
      const prop = this.lookupProperty(target);
      if (prop.access === "write") {
        throw new RemoteError(`${DBUS_ERROR}.AccessDenied`, `Property '${target.name}' is not readable`);
      }
      return prop.value;
    });
  }

  getAllProperties(service: string, path: string, iface: string, opts?: BusCallOptions): Promise<Value> {
    return this.serve({ op: "getAllProperties", service, path }, opts, () => {
      const props = this.lookupInterface(service, path, iface).properties ?? {};
      const entries = Object.entries(props)
        .filter(([, p]) => p.access !== "write")
        .map(([name, p]) => [str(name), variant(p.value)] as const);
      return dict(basic("s"), VARIANT, entries);
    });
  }

  setProperty(target: PropertyTarget, value: Value, opts?: BusCallOptions): Promise<void> {
    return this.serve({ op: "setProperty", service: target.service, path: target.path, member: target.name }, opts, () => {
      const prop = this.lookupProperty(target);
      if (prop.access === "read") {
        throw new RemoteError(`${DBUS_ERROR}.PropertyReadOnly`, `Property '${target.name}' is read-only`);
      }
      if (!conforms(value, parseSignature(prop.signature))) {
        throw new RemoteError(`${DBUS_ERROR}.InvalidArgs`, `Property '${target.name}' has type '${prop.signature}'`);
      }
      prop.value = value;
    });
  }

  subscribe(match: SignalMatch, handler: SignalHandler, opts?: BusCallOptions): Promise<Unsubscribe> {
    return this.serve({ op: "subscribe", service: match.service, path: match.path, member: match.member }, opts, () => {
      const sub: Subscription = { match, handler };
      this.subscriptions.add(sub);
      return async () => {
        this.subscriptions.delete(sub);
      };
    });
  }

  disconnect(): void {
    this.connected = false;
    this.subscriptions.clear();
    this.release();
  }

  // ── Internals ──────────────────────────────────────────────────────────

  private serve<T>(request: MemoryRequest, opts: BusCallOptions | undefined, reply: () => T | Promise<T>): Promise<T> {
    this.requests.push(request);
    const run = async (): Promise<T> => {
      if (!this.connected) throw new Error("Connection closed");
      await this.gate();
      if (!this.connected) throw new Error("Connection closed");
      return reply();
    };
    return abortable(run(), opts?.signal);
  }

  private gate(): Promise<void> {
    const held = this.held;
    if (!held) return Promise.resolve();
    return new Promise((resolve) => held.push(resolve));
  }

  private objectsOf(service: string): Map<string, MemoryObject> {
    const objects = this.services.get(service);
    if (!objects) {
      throw new RemoteError(`${DBUS_ERROR}.ServiceUnknown`, `The name ${service} was not provided by any .service files`);
    }
    return objects;
  }

  private lookupInterface(service: string, path: string, iface: string): MemoryInterface {
    const obj = this.objectsOf(service).get(path);
    if (!obj) {
      throw new RemoteError(`${DBUS_ERROR}.UnknownObject`, `No such object path '${path}'`);
    }
    const found = obj.interfaces[iface];
    if (!found) {
      throw new RemoteError(`${DBUS_ERROR}.UnknownInterface`, `No such interface '${iface}' at object path '${path}'`);
    }
    return found;
  }

  private lookupProperty(target: PropertyTarget): MemoryProperty {
    const prop = this.lookupInterface(target.service, target.path, target.interface).properties?.[target.name];
    if (!prop) {
      throw new RemoteError(`${DBUS_ERROR}.UnknownProperty`, `No such property '${target.name}'`);
    }
    return prop;
  }

  private introspectionXml(service: string, path: string): string {
    const objects = this.objectsOf(service);
    const prefix = path === "/" ? "/" : `${path}/`;
    const children = new Set<string>();
    for (const objectPath of objects.keys()) {
      if (objectPath !== path && objectPath.startsWith(prefix)) {
        const [first] = objectPath.slice(prefix.length).split("/");
        if (first) children.add(first);
      }
    }
    const obj = objects.get(path);
    if (!obj && children.size === 0) {
      throw new RemoteError(`${DBUS_ERROR}.UnknownObject`, `No such object path '${path}'`);
    }

    const lines = ["<node>"];
    for (const [name, iface] of Object.entries(obj?.interfaces ?? {})) {
      lines.push(`  <interface name="${escapeAttr(name)}">`);
      for (const [mName, m] of Object.entries(iface.methods ?? {})) {
        lines.push(`    <method name="${escapeAttr(mName)}">`);
        for (const a of [...argXml(m.in, m.inNames, "in"), ...argXml(m.out, m.outNames, "out")]) {
          lines.push(`      ${a}`);
        }
        lines.push("    </method>");
      }
      for (const [pName, p] of Object.entries(iface.properties ?? {})) {
        lines.push(`    <property name="${escapeAttr(pName)}" type="${escapeAttr(p.signature)}" access="${p.access}"/>`);
      }
      for (const [sName, sig] of Object.entries(iface.signals ?? {})) {
        lines.push(`    <signal name="${escapeAttr(sName)}">`);
        for (const a of argXml(sig, undefined)) lines.push(`      ${a}`);
        lines.push("    </signal>");
      }
      lines.push("  </interface>");
    }
    for (const child of children) {
      lines.push(`  <node name="${escapeAttr(child)}"/>`);
    }
    lines.push("</node>");
    return lines.join("\n");
  }
}
