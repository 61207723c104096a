import { MemoryBus } from "./memoryBus";
import type { MemoryObject } from "./memoryBus";
import type { Value } from "../value/value";
import { double, int, str, variant } from "../value/value";
import { RemoteError } from "../errors";

export const DEMO_SERVICE = "com.example.Demo";
export const DEMO_PATH = "/com/example/Demo";
export const DEMO_INTERFACE = "com.example.Calculator";

function intArg(args: readonly Value[], i: number): bigint {
  const v = args[i];
  if (v?.tag !== "Int") throw new RemoteError("org.freedesktop.DBus.Error.InvalidArgs", `argument ${i + 1} is not an integer`);
  return v.value;
}

function doubleArg(args: readonly Value[], i: number): number {
  const v = args[i];
  if (v?.tag !== "Double") throw new RemoteError("org.freedesktop.DBus.Error.InvalidArgs", `argument ${i + 1} is not a double`);
  return v.value;
}

function item(label: string): MemoryObject {
  return {
    interfaces: {
      "com.example.Item": {
        properties: { Label: { signature: "s", access: "read", value: str(label) } },
      },
    },
  };
}

/**
 * A bus with one well-known service to explore without a running daemon.
 */
export function createDemoBus(): MemoryBus {
  let counter = 0n;
  const bus = new MemoryBus("demo");

  const calculator: MemoryObject = {
    interfaces: {
      [DEMO_INTERFACE]: {
        methods: {
          Add: {
            in: "ii",
            out: "i",
            inNames: ["a", "b"],
            outNames: ["sum"],
            handler: (args) => {
              const sum = intArg(args, 0) + intArg(args, 1);
              if (sum > 2147483647n || sum < -2147483648n) {
                throw new RemoteError("com.example.Error.Overflow", "sum does not fit in int32");
              }
              return [int("i", sum)];
            },
          },
          Divide: {
            in: "dd",
            out: "d",
            inNames: ["dividend", "divisor"],
            outNames: ["quotient"],
            handler: (args) => {
              const divisor = doubleArg(args, 1);
              if (divisor === 0) throw new RemoteError("com.example.Error.DivisionByZero", "division by zero");
              return [double(doubleArg(args, 0) / divisor)];
            },
          },
          Echo: {
            in: "v",
            out: "v",
            inNames: ["value"],
            outNames: ["value"],
            handler: (args) => [...args],
          },
          MinMax: {
            in: "ai",
            out: "ii",
            inNames: ["values"],
            outNames: ["min", "max"],
            handler: (args) => {
              const list = args[0];
              const values = list?.tag === "Array" ? list.items.flatMap((v) => (v.tag === "Int" ? [v.value] : [])) : [];
              if (values.length === 0) throw new RemoteError("org.freedesktop.DBus.Error.InvalidArgs", "empty list");
              const sorted = [...values].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
              return [int("i", sorted[0] ?? 0n), int("i", sorted[sorted.length - 1] ?? 0n)];
            },
          },
          Sleep: {
            in: "u",
            out: "",
            inNames: ["ms"],
            handler: (args, signal) =>
              new Promise<Value[]>((resolve) => {
                const timer = setTimeout(() => resolve([]), Number(intArg(args, 0)));
                signal?.addEventListener(
                  "abort",
                  () => {
                    clearTimeout(timer);
                    resolve([]);
                  },
                  { once: true }
                );
              }),
          },
          Bump: {
            in: "",
            out: "u",
            outNames: ["counter"],
            handler: () => {
              counter += 1n;
              bus.emitSignal(DEMO_SERVICE, DEMO_PATH, DEMO_INTERFACE, "Bumped", [int("u", counter)]);
              return [int("u", counter)];
            },
          },
        },
        properties: {
          Name: { signature: "s", access: "read", value: str("demo calculator") },
          Precision: { signature: "y", access: "readwrite", value: int("y", 2) },
          Secret: { signature: "s", access: "write", value: str("") },
          Extra: { signature: "v", access: "readwrite", value: variant(str("nothing yet")) },
        },
        signals: { Bumped: "u" },
      },
    },
  };

  return bus
    .addService(DEMO_SERVICE, {
      [DEMO_PATH]: calculator,
      [`${DEMO_PATH}/Items/first`]: item("first item"),
      [`${DEMO_PATH}/Items/second`]: item("second item"),
    })
    .addActivatable("com.example.Sleepy");
}
