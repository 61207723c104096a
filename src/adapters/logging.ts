import type { BusCallOptions, BusPort, MethodCall, PropertyTarget, SignalHandler, SignalMatch, Unsubscribe } from "../ports/bus";
import type { TraceSink } from "../ports/types";
import type { Value } from "../value/value";
import { errorMessage } from "../errors";

function makeId(kind: string): string {
  const random = Math.random().toString(36).slice(2);
  return `${kind}:${Date.now()}:${random}`;
}

/**
 * Time an operation and hand the outcome to `record`, rethrowing any error.
 */
async function timed<T>(
  op: () => Promise<T>,
  record: (durationMs: number, result: { value?: T; error?: string }) => void,
): Promise<T> {
  const start = Date.now();
  try {
    const value = await op();
    record(Date.now() - start, { value });
    return value;
  } catch (error) {
    record(Date.now() - start, { error: errorMessage(error) });
    throw error;
  }
}

/**
 * Wrap bus port with logging.
 */
export function loggingBus(inner: BusPort, sink: TraceSink): BusPort {
  const listing = (fetch: (opts?: BusCallOptions) => Promise<string[]>) => (opts?: BusCallOptions) => {
    const id = makeId("names");
    return timed(
      () => fetch(opts),
      (durationMs, r) =>
        sink.emit({ tag: "E_ListNames", id, durationMs, count: r.value?.length, error: r.error }),
    );
  };

  return {
    label: inner.label,

    listNames: listing((opts) => inner.listNames(opts)),

    listActivatableNames: listing((opts) => inner.listActivatableNames(opts)),

    introspect(service: string, path: string, opts?: BusCallOptions): Promise<string> {
      const id = makeId("introspect");
      return timed(
        () => inner.introspect(service, path, opts),
        (durationMs, r) => sink.emit({ tag: "E_Introspect", id, service, path, durationMs, error: r.error }),
      );
    },

    call(call: MethodCall, opts?: BusCallOptions): Promise<Value[]> {
      const id = makeId("call");
      return timed(
        () => inner.call(call, opts),
        (durationMs, r) =>
          sink.emit({
            tag: "E_Call",
            id,
            service: call.service,
            path: call.path,
            interface: call.interface,
            member: call.member,
            durationMs,
            error: r.error,
          }),
      );
    },

    getProperty(target: PropertyTarget, opts?: BusCallOptions): Promise<Value> {
      const id = makeId("prop");
      return timed(
        () => inner.getProperty(target, opts),
        (durationMs, r) =>
          sink.emit({ tag: "E_Property", id, op: "get", ...target, durationMs, error: r.error }),
      );
    },

    getAllProperties(service: string, path: string, iface: string, opts?: BusCallOptions): Promise<Value> {
      const id = makeId("prop");
      return timed(
        () => inner.getAllProperties(service, path, iface, opts),
        (durationMs, r) =>
          sink.emit({ tag: "E_Property", id, op: "getAll", service, path, interface: iface, durationMs, error: r.error }),
      );
    },

    setProperty(target: PropertyTarget, value: Value, opts?: BusCallOptions): Promise<void> {
      const id = makeId("prop");
      return timed(
        () => inner.setProperty(target, value, opts),
        (durationMs, r) =>
          sink.emit({ tag: "E_Property", id, op: "set", ...target, durationMs, error: r.error }),
      );
    },

    async subscribe(match: SignalMatch, handler: SignalHandler, opts?: BusCallOptions): Promise<Unsubscribe> {
      const id = makeId("sub");
      const wrapped: SignalHandler = (args) => {
        sink.emit({ tag: "E_Signal", ...match, argCount: args.length });
        handler(args);
      };
      try {
        const unsubscribe = await inner.subscribe(match, wrapped, opts);
        sink.emit({ tag: "E_Subscribe", id, ...match });
        return unsubscribe;
      } catch (error) {
        sink.emit({ tag: "E_Subscribe", id, ...match, error: errorMessage(error) });
        throw error;
      }
    },

    disconnect(): void {
      inner.disconnect();
    },
  };
}
