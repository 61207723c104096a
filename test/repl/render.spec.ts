import { describe, expect, it } from "vitest";
import { renderEvent, renderInterface, renderNode, renderPending, renderTree } from "../../src/repl/render";
import type { ObjectNode } from "../../src/core/topology";
import type { InterfaceDescriptor } from "../../src/introspection/types";
import { basic, VARIANT } from "../../src/signature/types";
import { dict, int, str, variant } from "../../src/value/value";
import { remoteError } from "../../src/outcome/constructors";

function node(path: string, state: ObjectNode["state"], extra: Partial<ObjectNode> = {}): ObjectNode {
  return { service: "org.example.Svc", path, children: [], interfaces: [], state, ...extra };
}

const calculator: InterfaceDescriptor = {
  name: "com.example.Calculator",
  methods: [
    {
      name: "Add",
      inArgs: [
        { name: "a", signature: basic("i") },
        { name: "b", signature: basic("i") },
      ],
      outArgs: [{ name: "sum", signature: basic("i") }],
      annotations: [],
    },
  ],
  properties: [{ name: "Name", signature: basic("s"), access: "read", annotations: [] }],
  signals: [{ name: "Bumped", args: [{ signature: basic("u") }], annotations: [] }],
  annotations: [],
};

const match = { service: "org.example.Svc", path: "/obj", interface: "org.example.Iface", member: "Changed" };

describe("renderTree", () => {
  it("indents by depth and marks node state", () => {
    expect(
      renderTree([
        node("/", { tag: "Populated" }),
        node("/com", { tag: "Unfetched" }),
        node("/com/broken", { tag: "Errored", message: "remote-error: denied" }),
        node("/com/busy", { tag: "Fetching", previous: { tag: "Unfetched" } }),
      ])
    ).toEqual(["/", "  com +", "    broken ! remote-error: denied", "    busy …"]);
  });
});

describe("renderInterface", () => {
  it("lists members by kind", () => {
    expect(renderInterface(calculator)).toEqual([
      "com.example.Calculator",
      "  Methods:",
      "    Add(a: i, b: i) => sum: i",
      "  Properties:",
      "    Name: s (read)",
      "  Signals:",
      "    Bumped(u)",
    ]);
  });
});

describe("renderNode", () => {
  it("points at :expand for an unfetched node", () => {
    expect(renderNode(node("/x", { tag: "Unfetched" }), [])).toEqual([
      "org.example.Svc /x +",
      "  (not fetched yet; :expand to fetch)",
    ]);
  });

  it("shows interfaces and children", () => {
    const parent = node("/x", { tag: "Populated" }, { interfaces: [{ ...calculator, methods: [], signals: [] }] });
    expect(renderNode(parent, [node("/x/y", { tag: "Unfetched" })])).toEqual([
      "org.example.Svc /x",
      "  com.example.Calculator",
      "    Properties:",
      "      Name: s (read)",
      "  Children:",
      "    y +",
    ]);
  });
});

describe("renderEvent", () => {
  it("summarizes service changes", () => {
    expect(renderEvent({ tag: "ServicesChanged", services: ["a", "b", "c"], added: ["a", "b"], removed: ["z"] })).toEqual([
      "3 services (+2 -1)",
    ]);
    expect(renderEvent({ tag: "ServicesChanged", services: ["a"], added: [], removed: [] })).toEqual(["1 services"]);
  });

  it("names out-args of a call reply", () => {
    expect(
      renderEvent({
        tag: "RequestDone",
        id: 4,
        kind: "call",
        label: "svc /obj com.example.Calculator.Add",
        values: [int("i", 5)],
        outArgs: calculator.methods[0]?.outArgs,
      })
    ).toEqual(["[#4] svc /obj com.example.Calculator.Add", "  sum: i = 5"]);
  });

  it("numbers reply values without out-arg names", () => {
    expect(renderEvent({ tag: "RequestDone", id: 4, kind: "call", label: "L", values: [str("x")] })).toEqual([
      "[#4] L",
      '  [0] = "x"',
    ]);
    expect(renderEvent({ tag: "RequestDone", id: 5, kind: "call", label: "L", values: [] })).toEqual(["[#5] L: ok"]);
  });

  it("renders property replies", () => {
    expect(renderEvent({ tag: "RequestDone", id: 1, kind: "get", label: "L", values: [int("y", 7)] })).toEqual([
      "[#1] L = 7",
    ]);
    expect(renderEvent({ tag: "RequestDone", id: 2, kind: "set", label: "L", values: [] })).toEqual(["[#2] L: ok"]);
    const all = dict(basic("s"), VARIANT, [[str("Name"), variant(str("demo"))]]);
    expect(renderEvent({ tag: "RequestDone", id: 3, kind: "getAll", label: "L", values: [all] })).toEqual([
      "[#3] L",
      '  Name = "demo"',
    ]);
  });

  it("renders failures with the remote error name", () => {
    const { failure } = remoteError("com.example.Error.DivisionByZero", "division by zero");
    expect(renderEvent({ tag: "RequestFailed", id: 2, kind: "call", label: "L", failure })).toEqual([
      "[#2] L failed: com.example.Error.DivisionByZero: division by zero",
    ]);
  });

  it("renders signals, errored nodes and dumps", () => {
    expect(renderEvent({ tag: "Signal", id: 3, match, args: [int("u", 1), str("a")] })).toEqual([
      '[#3] org.example.Iface.Changed(1, "a")',
    ]);
    expect(renderEvent({ tag: "NodeChanged", node: node("/p", { tag: "Errored", message: "boom" }) })).toEqual([
      "org.example.Svc /p: error: boom",
    ]);
    expect(renderEvent({ tag: "DumpStopped", service: "org.example.Svc", nodes: 2 })).toEqual([
      "dump of org.example.Svc stopped after 2 node(s)",
    ]);
    expect(renderEvent({ tag: "DumpComplete", service: "org.example.Svc", nodes: 7 })).toEqual([
      "dump of org.example.Svc complete: 7 node(s) fetched",
    ]);
  });
});

describe("renderPending", () => {
  it("shows requests with their age and watches with their state", () => {
    const handle = { id: 2, kind: "call" as const, cancel: () => true };
    expect(
      renderPending(
        [{ id: 2, kind: "call", label: "L", service: "org.example.Svc", startedAt: 100, handle }],
        [
          { id: 3, match, active: false, signals: 0 },
          { id: 5, match, active: true, signals: 2 },
        ],
        350
      )
    ).toEqual([
      "  #2 call L (250ms)",
      "  #3 watch org.example.Svc /obj org.example.Iface.Changed (installing)",
      "  #5 watch org.example.Svc /obj org.example.Iface.Changed (2 signal(s))",
    ]);
  });

  it("says when nothing is pending", () => {
    expect(renderPending([], [], 0)).toEqual(["  (nothing pending)"]);
  });
});
