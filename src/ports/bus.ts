import type { Value } from "../value/value";

export interface BusCallOptions {
  /** Aborted when the initiator stops waiting for the reply. */
  signal?: AbortSignal;
}

export interface MethodCall {
  service: string;
  path: string;
  interface: string;
  member: string;
  /** Rendered signature of `args`. */
  signature: string;
  args: readonly Value[];
}

export interface PropertyTarget {
  service: string;
  path: string;
  interface: string;
  name: string;
}

export interface SignalMatch {
  service: string;
  path: string;
  interface: string;
  member: string;
}

export type SignalHandler = (args: Value[]) => void;

export type Unsubscribe = () => Promise<void>;

/**
 * Bus port interface.
 * Everything the core needs from a bus client. Error replies from a peer
 * reject with RemoteError; anything else that rejects is a transport failure.
 */
export interface BusPort {
  /** Which bus this is, for display and logs. */
  readonly label: string;

  listNames(opts?: BusCallOptions): Promise<string[]>;

  listActivatableNames(opts?: BusCallOptions): Promise<string[]>;

  /** Raw introspection XML of one object path. */
  introspect(service: string, path: string, opts?: BusCallOptions): Promise<string>;

  /** Invoke a method; resolves with the out-values in reply order. */
  call(call: MethodCall, opts?: BusCallOptions): Promise<Value[]>;

  /** Resolves with the property value, unwrapped from its variant. */
  getProperty(target: PropertyTarget, opts?: BusCallOptions): Promise<Value>;

  /** Resolves with the `a{sv}` dict returned by GetAll. */
  getAllProperties(service: string, path: string, iface: string, opts?: BusCallOptions): Promise<Value>;

  setProperty(target: PropertyTarget, value: Value, opts?: BusCallOptions): Promise<void>;

  /** Resolves once the match is installed on the bus. */
  subscribe(match: SignalMatch, handler: SignalHandler, opts?: BusCallOptions): Promise<Unsubscribe>;

  disconnect(): void;
}
