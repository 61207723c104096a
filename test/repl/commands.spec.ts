import { describe, expect, it } from "vitest";
import { createShellState, processCommand, resolveMember, resolvePath } from "../../src/repl/commands";
import type { ShellContext } from "../../src/repl/commands";
import { BusSession } from "../../src/core/session";
import type { SessionEvent } from "../../src/core/messages";
import type { ObjectNode } from "../../src/core/topology";
import type { InterfaceDescriptor } from "../../src/introspection/types";
import { createDemoBus, DEMO_SERVICE } from "../../src/adapters/demoBus";
import type { MemoryBus } from "../../src/adapters/memoryBus";
import { int } from "../../src/value/value";
import { ManualClock, flush } from "../helpers/clock";

type Shell = {
  ctx: ShellContext;
  bus: MemoryBus;
  /** Run one line and return what it printed. */
  run(line: string): string[];
  drain(): Promise<SessionEvent[]>;
};

function shell(filter?: string): Shell {
  const bus = createDemoBus();
  const clock = new ManualClock();
  const session = new BusSession({ bus, clock, filter });
  let lines: string[] = [];
  const ctx: ShellContext = {
    session,
    state: createShellState(),
    nowMs: () => clock.nowMs(),
    log: (message) => lines.push(message),
  };
  return {
    ctx,
    bus,
    run(line) {
      lines = [];
      processCommand(line, ctx);
      return lines;
    },
    async drain() {
      const events: SessionEvent[] = [];
      do {
        await session.settled();
        events.push(...session.tick());
      } while (session.inFlight > 0 || session.queued > 0);
      return events;
    },
  };
}

/** A shell pointed at the demo calculator with every object fetched. */
async function atCalculator(): Promise<Shell> {
  const sh = shell();
  sh.ctx.session.refreshServices();
  await sh.drain();
  sh.run(`:use ${DEMO_SERVICE}`);
  sh.run(":dump");
  await sh.drain();
  sh.run(":cd com/example/Demo");
  return sh;
}

function idOf(line: string | undefined): number {
  const m = /^\[#(\d+)\]/.exec(line ?? "");
  if (!m?.[1]) throw new Error(`no request id in ${line}`);
  return Number(m[1]);
}

describe("resolvePath", () => {
  it("resolves absolute, relative and parent paths", () => {
    expect(resolvePath("/a/b", "..")).toBe("/a");
    expect(resolvePath("/", "..")).toBe("/");
    expect(resolvePath("/a", "./b/../c")).toBe("/a/c");
    expect(resolvePath("/a", "/x/y")).toBe("/x/y");
    expect(resolvePath("/a", "")).toBe("/a");
  });
});

describe("resolveMember", () => {
  const iface = (name: string): InterfaceDescriptor => ({
    name,
    methods: [{ name: "Ping", inArgs: [], outArgs: [], annotations: [] }],
    properties: [],
    signals: [],
    annotations: [],
  });
  const node: ObjectNode = {
    service: "org.example.Svc",
    path: "/obj",
    children: [],
    interfaces: [iface("org.example.One"), iface("org.example.Two")],
    state: { tag: "Populated" },
  };

  it("needs the interface when a name is shared", () => {
    expect(resolveMember(node, "Ping", (i) => i.methods, "method")).toBe(
      "'Ping' is ambiguous: org.example.One.Ping, org.example.Two.Ping"
    );
    const found = resolveMember(node, "org.example.Two.Ping", (i) => i.methods, "method");
    expect(typeof found !== "string" && found.iface.name).toBe("org.example.Two");
  });

  it("reports what is missing", () => {
    expect(resolveMember(node, "org.example.One.Pong", (i) => i.methods, "method")).toBe(
      "No method 'Pong' in org.example.One"
    );
    expect(resolveMember(node, "Pong", (i) => i.methods, "method")).toBe("No method 'Pong' on /obj");
  });
});

describe("processCommand", () => {
  it("asks for the colon and exits on :quit", () => {
    const sh = shell();
    expect(sh.run("hello")).toEqual(["Commands start with ':'. Type :help for a list."]);
    expect(sh.run("   ")).toEqual([]);
    expect(processCommand(":q", sh.ctx)).toEqual({ shouldExit: true });
    expect(sh.run(":nope")).toEqual(["Unknown command :nope. Type :help for a list."]);
  });

  it("needs a service before navigating", () => {
    const sh = shell();
    expect(sh.run(":ls")).toEqual(["No service selected. Use :use <service>."]);
    expect(sh.run(":call Add (1, 2)")).toEqual(["No service selected. Use :use <service>."]);
  });

  it("lists services through the filter and the argument", async () => {
    const sh = shell("example");
    sh.ctx.session.refreshServices();
    await sh.drain();
    expect(sh.run(":services")).toEqual(["  com.example.Demo"]);
    expect(sh.run(":services Nothing")).toEqual(["  (no services)"]);
    expect(sh.run(":use org.freedesktop.DBus")).toEqual([
      "Unknown service: org.freedesktop.DBus. Use :services to list, :reload to list again.",
    ]);
  });

  it("selects a service and fetches its root", async () => {
    const sh = shell();
    sh.ctx.session.refreshServices();
    await sh.drain();
    expect(sh.run(":use org.example.Missing")).toEqual([
      "Unknown service: org.example.Missing. Use :services to list, :reload to list again.",
    ]);
    expect(sh.run(`:use ${DEMO_SERVICE}`)).toEqual(["using com.example.Demo"]);
    await sh.drain();
    expect(sh.run(":ls")).toEqual(["  /com +"]);
    expect(sh.run(":services")).toEqual(["  com.example.Demo *", "  org.freedesktop.DBus"]);
  });

  it("walks the tree after a dump", async () => {
    const sh = await atCalculator();
    expect(sh.ctx.state.path).toBe("/com/example/Demo");
    expect(sh.run(":tree")).toEqual([
      "/",
      "  com",
      "    example",
      "      Demo",
      "        Items",
      "          first",
      "          second",
    ]);
    expect(sh.run(":show Items/first")).toEqual([
      "com.example.Demo /com/example/Demo/Items/first",
      "  com.example.Item",
      "    Properties:",
      "      Label: s (read)",
    ]);
    expect(sh.run(":cd ..")).toEqual(["/com/example"]);
    expect(sh.run(":cd /nowhere")).toEqual(["No object /nowhere in com.example.Demo"]);
  });

  it("explains why a fetch did not start", async () => {
    const sh = await atCalculator();
    expect(sh.run(":expand")).toEqual(["/com/example/Demo is already loaded; use :refresh to fetch it again"]);
    expect(sh.run(":refresh")).toEqual(["fetching /com/example/Demo"]);
    expect(sh.run(":refresh")).toEqual(["/com/example/Demo is already being fetched"]);
    await sh.drain();
  });

  it("calls a method and reports the result through the session", async () => {
    const sh = await atCalculator();
    const [line] = sh.run(":call Add (2, 3)");
    expect(line).toMatch(/^\[#\d+\] com\.example\.Calculator\.Add$/);

    const events = await sh.drain();
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({ tag: "RequestDone", id: idOf(line), values: [int("i", 5)] });
  });

  it("reports members it cannot find and requests it refuses", async () => {
    const sh = await atCalculator();
    expect(sh.run(":call Nope")).toEqual(["No method 'Nope' on /com/example/Demo"]);
    expect(sh.run(":call com.example.Calculator.Nope")).toEqual(["No method 'Nope' in com.example.Calculator"]);
    expect(sh.run(":set Name other")).toEqual(["error: not-writable: Property Name is read-only"]);
    expect(sh.run(":set Name")).toEqual(["Usage: :set <[iface.]property> <value>"]);
    expect(sh.run(":get Secret")).toEqual(["Property Secret is write-only"]);
  });

  it("issues property reads and watches", async () => {
    const sh = await atCalculator();
    expect(sh.run(":get Precision")).toEqual([expect.stringMatching(/^\[#\d+\] get com\.example\.Calculator\.Precision$/)]);
    expect(sh.run(":getall")).toEqual([expect.stringMatching(/^\[#\d+\] getall com\.example\.Calculator$/)]);
    const [watch] = sh.run(":watch Bumped");
    await sh.drain();
    expect(sh.run(`:unwatch ${idOf(watch)}`)).toEqual([`stopped watch #${idOf(watch)}`]);
    expect(sh.run(":unwatch 999")).toEqual(["No watch #999"]);
    expect(sh.run(":unwatch soon")).toEqual(["Usage: :unwatch <id>"]);
    await sh.drain();
  });

  it("lists and cancels pending requests", async () => {
    const sh = await atCalculator();
    expect(sh.run(":pending")).toEqual(["  (nothing pending)"]);

    sh.bus.hold();
    const [line] = sh.run(":call Add (1, 1)");
    const id = idOf(line);
    await flush();
    expect(sh.run(":pending")).toEqual([
      `  #${id} call com.example.Demo /com/example/Demo com.example.Calculator.Add (0ms)`,
    ]);
    expect(sh.run(`:cancel #${id}`)).toEqual([`cancelled #${id}`]);
    expect(sh.run(`:cancel ${id}`)).toEqual([`No pending request #${id}`]);
    sh.bus.release();
    expect(await sh.drain()).toEqual([]);
  });

  it("cancels an object fetch by path", async () => {
    const sh = await atCalculator();
    expect(sh.run(":cancel /com")).toEqual(["/com is not being fetched"]);
    sh.bus.hold();
    sh.run(":refresh /com");
    await flush();
    expect(sh.run(":cancel /com")).toEqual(["stopped fetching /com"]);
    sh.bus.release();
    expect(await sh.drain()).toEqual([]);
  });
});
