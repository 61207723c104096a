import { describe, expect, it } from "vitest";
import { loggingBus } from "../../src/adapters/logging";
import { createDemoBus, DEMO_INTERFACE, DEMO_PATH, DEMO_SERVICE } from "../../src/adapters/demoBus";
import { memoryTraceSink } from "../../src/ports/sink";
import type { Value } from "../../src/value/value";
import { int } from "../../src/value/value";

function setup() {
  const inner = createDemoBus();
  const trace = memoryTraceSink();
  return { inner, trace, bus: loggingBus(inner, trace) };
}

describe("loggingBus", () => {
  it("keeps the inner label", () => {
    expect(setup().bus.label).toBe("demo");
  });

  it("records name listings with their count", async () => {
    const { bus, trace } = setup();
    await bus.listNames();
    await bus.listActivatableNames();
    expect(trace.events.map((e) => (e.tag === "E_ListNames" ? e.count : undefined))).toEqual([2, 1]);
  });

  it("records a successful call", async () => {
    const { bus, trace } = setup();
    const reply = await bus.call({
      service: DEMO_SERVICE,
      path: DEMO_PATH,
      interface: DEMO_INTERFACE,
      member: "Add",
      signature: "ii",
      args: [int("i", 1), int("i", 2)],
    });
    expect(reply).toEqual([int("i", 3)]);
    expect(trace.events).toHaveLength(1);
    expect(trace.events[0]).toMatchObject({ tag: "E_Call", member: "Add", error: undefined });
  });

  it("records the error and rethrows it", async () => {
    const { bus, trace } = setup();
    await expect(bus.introspect(DEMO_SERVICE, "/nowhere")).rejects.toThrow("No such object path '/nowhere'");
    expect(trace.events[0]).toMatchObject({
      tag: "E_Introspect",
      service: DEMO_SERVICE,
      path: "/nowhere",
      error: "No such object path '/nowhere'",
    });
  });

  it("records property access by operation", async () => {
    const { bus, trace } = setup();
    const target = { service: DEMO_SERVICE, path: DEMO_PATH, interface: DEMO_INTERFACE, name: "Precision" };
    await bus.setProperty(target, int("y", 4));
    await bus.getProperty(target);
    await bus.getAllProperties(DEMO_SERVICE, DEMO_PATH, DEMO_INTERFACE);
    expect(trace.events.map((e) => (e.tag === "E_Property" ? e.op : e.tag))).toEqual(["set", "get", "getAll"]);
  });

  it("records subscriptions and every signal delivered", async () => {
    const { inner, bus, trace } = setup();
    const match = { service: DEMO_SERVICE, path: DEMO_PATH, interface: DEMO_INTERFACE, member: "Bumped" };
    const received: Value[][] = [];
    const unsubscribe = await bus.subscribe(match, (args) => received.push(args));

    inner.emitSignal(DEMO_SERVICE, DEMO_PATH, DEMO_INTERFACE, "Bumped", [int("u", 9)]);
    await unsubscribe();
    inner.emitSignal(DEMO_SERVICE, DEMO_PATH, DEMO_INTERFACE, "Bumped", [int("u", 10)]);

    expect(received).toEqual([[int("u", 9)]]);
    expect(trace.events.map((e) => e.tag)).toEqual(["E_Subscribe", "E_Signal"]);
    expect(trace.events[1]).toEqual({ tag: "E_Signal", ...match, argCount: 1 });
  });
});
