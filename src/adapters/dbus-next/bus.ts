import * as dbus from "dbus-next";
import type { BusKind } from "../../core/config";
import type { BusCallOptions, BusPort, MethodCall, PropertyTarget, SignalHandler, SignalMatch, Unsubscribe } from "../../ports/bus";
import type { Value } from "../../value/value";
import { str, variant } from "../../value/value";
import { ConnectionFailure, errorMessage, RemoteError } from "../../errors";
import { abortable } from "../abortable";
import { bodyFromWire, toWire } from "./marshal";

const DBUS_NAME = "org.freedesktop.DBus";
const DBUS_PATH = "/org/freedesktop/DBus";
const PROPERTIES = "org.freedesktop.DBus.Properties";
const INTROSPECTABLE = "org.freedesktop.DBus.Introspectable";

export interface ConnectOptions {
  kind: BusKind;
  /** Explicit bus address; overrides `kind`. */
  address?: string;
  timeoutMs: number;
  /** Called for connection errors after the bus has been opened. */
  onError?: (detail: string) => void;
}

interface Request {
  destination: string;
  path: string;
  interface: string;
  member: string;
  signature?: string;
  body?: unknown[];
}

function stringsOf(values: Value[]): string[] {
  const [list] = values;
  if (list?.tag !== "Array") return [];
  return list.items.flatMap((v) => (v.tag === "Str" ? [v.value] : []));
}

function matchRule(match: SignalMatch): string {
  return [
    "type='signal'",
    `sender='${match.service}'`,
    `path='${match.path}'`,
    `interface='${match.interface}'`,
    `member='${match.member}'`,
  ].join(",");
}

/**
 * BusPort over a dbus-next message bus connection.
 */
export class DbusNextBus implements BusPort {
  constructor(
    private readonly bus: dbus.MessageBus,
    readonly label: string,
    onError: (detail: string) => void = () => undefined
  ) {
    bus.on("error", (e: unknown) => onError(errorMessage(e)));
  }

  private async invoke(req: Request, opts?: BusCallOptions): Promise<Value[]> {
    const message = new dbus.Message({
      destination: req.destination,
      path: req.path,
      interface: req.interface,
      member: req.member,
      signature: req.signature ?? "",
      body: req.body ?? [],
    });
    try {
      const reply = await abortable(this.bus.call(message), opts?.signal);
      if (!reply) return [];
      return bodyFromWire(reply.signature ?? "", reply.body ?? []);
    } catch (e) {
      if (e instanceof dbus.DBusError) {
        throw new RemoteError(e.type, e.text);
      }
      throw e;
    }
  }

  private daemon(member: string, signature: string, body: unknown[], opts?: BusCallOptions): Promise<Value[]> {
    return this.invoke({ destination: DBUS_NAME, path: DBUS_PATH, interface: DBUS_NAME, member, signature, body }, opts);
  }

  async listNames(opts?: BusCallOptions): Promise<string[]> {
    return stringsOf(await this.daemon("ListNames", "", [], opts));
  }

  async listActivatableNames(opts?: BusCallOptions): Promise<string[]> {
    return stringsOf(await this.daemon("ListActivatableNames", "", [], opts));
  }

  async introspect(service: string, path: string, opts?: BusCallOptions): Promise<string> {
    const [xml] = await this.invoke({ destination: service, path, interface: INTROSPECTABLE, member: "Introspect" }, opts);
    if (xml?.tag !== "Str") {
      throw new TypeError("Introspect did not return a string");
    }
    return xml.value;
  }

  call(call: MethodCall, opts?: BusCallOptions): Promise<Value[]> {
    return this.invoke(
      {
        destination: call.service,
        path: call.path,
        interface: call.interface,
        member: call.member,
        signature: call.signature,
        body: call.args.map(toWire),
      },
      opts
    );
  }

  async getProperty(target: PropertyTarget, opts?: BusCallOptions): Promise<Value> {
    const [value] = await this.invoke(
      {
        destination: target.service,
        path: target.path,
        interface: PROPERTIES,
        member: "Get",
        signature: "ss",
        body: [target.interface, target.name],
      },
      opts
    );
    if (value?.tag !== "Variant") {
      throw new TypeError("Properties.Get did not return a variant");
    }
    return value.inner;
  }

  async getAllProperties(service: string, path: string, iface: string, opts?: BusCallOptions): Promise<Value> {
    const [all] = await this.invoke(
      { destination: service, path, interface: PROPERTIES, member: "GetAll", signature: "s", body: [iface] },
      opts
    );
    if (all?.tag !== "Dict") {
      throw new TypeError("Properties.GetAll did not return a dict");
    }
    return all;
  }

  async setProperty(target: PropertyTarget, value: Value, opts?: BusCallOptions): Promise<void> {
    await this.invoke(
      {
        destination: target.service,
        path: target.path,
        interface: PROPERTIES,
        member: "Set",
        signature: "ssv",
        body: [target.interface, target.name, toWire(variant(value))],
      },
      opts
    );
  }

  async subscribe(match: SignalMatch, handler: SignalHandler, opts?: BusCallOptions): Promise<Unsubscribe> {
    // Signals carry the sender's unique name, so resolve well-known names first.
    const owner = match.service.startsWith(":")
      ? match.service
      : stringOf(await this.daemon("GetNameOwner", "s", [match.service], opts));
    const rule = matchRule(match);
    await this.daemon("AddMatch", "s", [rule], opts);

    const listener = (msg: dbus.Message) => {
      if (
        msg.type !== dbus.MessageType.SIGNAL ||
        msg.sender !== owner ||
        msg.path !== match.path ||
        msg.interface !== match.interface ||
        msg.member !== match.member
      ) {
        return;
      }
      let args: Value[];
      try {
        args = bodyFromWire(msg.signature ?? "", msg.body ?? []);
      } catch (e) {
        args = [str(`undecodable signal body: ${errorMessage(e)}`)];
      }
      handler(args);
    };
    this.bus.on("message", listener);

    return async () => {
      this.bus.removeListener("message", listener);
      await this.daemon("RemoveMatch", "s", [rule]);
    };
  }

  disconnect(): void {
    this.bus.disconnect();
  }
}

function stringOf(values: Value[]): string {
  const [first] = values;
  if (first?.tag !== "Str") {
    throw new TypeError("Expected a string reply");
  }
  return first.value;
}

/**
 * Open a connection and wait for the bus to accept it.
 *
 * @throws ConnectionFailure
 */
export function connectBus(opts: ConnectOptions): Promise<DbusNextBus> {
  const label = opts.address ?? opts.kind;
  let bus: dbus.MessageBus;
  try {
    if (opts.address !== undefined) {
      bus = dbus.sessionBus({ busAddress: opts.address });
    } else {
      bus = opts.kind === "system" ? dbus.systemBus() : dbus.sessionBus();
    }
  } catch (e) {
    return Promise.reject(new ConnectionFailure(label, errorMessage(e)));
  }

  return new Promise<DbusNextBus>((resolve, reject) => {
    const fail = (detail: string) => {
      clearTimeout(timer);
      bus.removeListener("connect", onConnect);
      bus.removeListener("error", onError);
      bus.disconnect();
      reject(new ConnectionFailure(label, detail));
    };
    const onConnect = () => {
      clearTimeout(timer);
      bus.removeListener("error", onError);
      resolve(new DbusNextBus(bus, label, opts.onError));
    };
    const onError = (e: unknown) => fail(errorMessage(e));
    const timer = setTimeout(() => fail(`no answer within ${opts.timeoutMs}ms`), opts.timeoutMs);
    bus.once("connect", onConnect);
    bus.once("error", onError);
  });
}
