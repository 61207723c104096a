// test/core/topology.spec.ts
// Tests for the lazily discovered object tree

import { describe, it, expect } from "vitest";
import { TopologyTree, childPath } from "../../src/core/topology";
import type { FetchTicket } from "../../src/core/topology";
import type { NodeDescription } from "../../src/introspection/types";

function described(children: string[], interfaces: string[] = []): NodeDescription {
  return {
    children,
    interfaces: interfaces.map((name) => ({ name, methods: [], properties: [], signals: [], annotations: [] })),
  };
}

function ticket(t: FetchTicket | undefined): FetchTicket {
  if (!t) throw new Error("expected a fetch to start");
  return t;
}

describe("childPath", () => {
  it("joins below the root and below other nodes", () => {
    expect(childPath("/", "org")).toBe("/org");
    expect(childPath("/org", "example")).toBe("/org/example");
  });
});

describe("TopologyTree", () => {
  it("gives each new service an unfetched root", () => {
    const tree = new TopologyTree();
    expect(tree.setServices(["b.svc", "a.svc", "b.svc"])).toEqual({ added: ["a.svc", "b.svc"], removed: [] });
    expect(tree.services()).toEqual(["a.svc", "b.svc"]);
    expect(tree.node("a.svc", "/")?.state).toEqual({ tag: "Unfetched" });
  });

  it("reports services that came and went", () => {
    const tree = new TopologyTree();
    tree.setServices(["a", "b"]);
    expect(tree.setServices(["b", "c"])).toEqual({ added: ["c"], removed: ["a"] });
    expect(tree.hasService("a")).toBe(false);
  });

  it("keeps a node unfetched until it is fetched", () => {
    const tree = new TopologyTree();
    tree.setServices(["svc"]);
    const t = ticket(tree.beginFetch("svc", "/"));
    tree.completeFetch(t, described(["zeta", "alpha"]));

    expect(tree.node("svc", "/")?.children).toEqual(["alpha", "zeta"]);
    expect(tree.children("svc", "/").map((n) => [n.path, n.state.tag])).toEqual([
      ["/alpha", "Unfetched"],
      ["/zeta", "Unfetched"],
    ]);
    expect(tree.node("svc", "/alpha")?.parent).toBe("/");
  });

  it("starts one fetch per node at a time", () => {
    const tree = new TopologyTree();
    tree.setServices(["svc"]);
    const first = tree.beginFetch("svc", "/");
    expect(first).toBeDefined();
    expect(tree.beginFetch("svc", "/")).toBeUndefined();
    expect(tree.isInFlight("svc", "/")).toBe(true);
    expect(tree.node("svc", "/")?.state).toEqual({ tag: "Fetching", previous: { tag: "Unfetched" } });
  });

  it("does not fetch unknown nodes", () => {
    const tree = new TopologyTree();
    tree.setServices(["svc"]);
    expect(tree.beginFetch("svc", "/nowhere")).toBeUndefined();
    expect(tree.beginFetch("other", "/")).toBeUndefined();
  });

  it("keeps siblings visible when one fetch fails", () => {
    const tree = new TopologyTree();
    tree.setServices(["svc"]);
    const names = ["n0", "n1", "n2", "n3", "n4", "n5", "n6", "n7", "n8", "n9"];
    tree.completeFetch(ticket(tree.beginFetch("svc", "/")), described(names));

    for (const name of names) {
      const t = ticket(tree.beginFetch("svc", `/${name}`));
      if (name === "n4") {
        tree.failFetch(t, "remote-error: access denied");
      } else {
        tree.completeFetch(t, described([], ["com.example.Leaf"]));
      }
    }

    const states = tree.children("svc", "/").map((n) => n.state.tag);
    expect(states).toHaveLength(10);
    expect(states.filter((s) => s === "Populated")).toHaveLength(9);
    expect(tree.node("svc", "/n4")?.state).toEqual({ tag: "Errored", message: "remote-error: access denied" });
  });

  it("discards a result whose fetch was cancelled", () => {
    const tree = new TopologyTree();
    tree.setServices(["svc"]);
    const stale = ticket(tree.beginFetch("svc", "/"));
    expect(tree.cancelFetch("svc", "/")?.state).toEqual({ tag: "Unfetched" });
    expect(tree.completeFetch(stale, described(["x"]))).toBeUndefined();
    expect(tree.node("svc", "/")?.children).toEqual([]);
  });

  it("discards a result superseded by a newer fetch", () => {
    const tree = new TopologyTree();
    tree.setServices(["svc"]);
    const old = ticket(tree.beginFetch("svc", "/"));
    tree.cancelFetch("svc", "/");
    const current = ticket(tree.beginFetch("svc", "/"));
    expect(tree.failFetch(old, "late")).toBeUndefined();
    expect(tree.completeFetch(current, described(["a"]))?.state).toEqual({ tag: "Populated" });
  });

  it("refetch drops children that vanished along with their subtrees", () => {
    const tree = new TopologyTree();
    tree.setServices(["svc"]);
    tree.completeFetch(ticket(tree.beginFetch("svc", "/")), described(["a", "b"]));
    tree.completeFetch(ticket(tree.beginFetch("svc", "/a")), described(["deep"]));
    const deep = ticket(tree.beginFetch("svc", "/a/deep"));

    tree.completeFetch(ticket(tree.beginFetch("svc", "/")), described(["b", "c"]));

    expect(tree.walk("svc").map((n) => n.path)).toEqual(["/", "/b", "/c"]);
    expect(tree.node("svc", "/a/deep")).toBeUndefined();
    expect(tree.completeFetch(deep, described([]))).toBeUndefined();
  });

  it("keeps the state of children that are still there", () => {
    const tree = new TopologyTree();
    tree.setServices(["svc"]);
    tree.completeFetch(ticket(tree.beginFetch("svc", "/")), described(["a"]));
    tree.completeFetch(ticket(tree.beginFetch("svc", "/a")), described([], ["x.Y"]));
    tree.completeFetch(ticket(tree.beginFetch("svc", "/")), described(["a"]));
    expect(tree.node("svc", "/a")?.state).toEqual({ tag: "Populated" });
  });

  it("walks depth first in sorted order", () => {
    const tree = new TopologyTree();
    tree.setServices(["svc"]);
    tree.completeFetch(ticket(tree.beginFetch("svc", "/")), described(["b", "a"]));
    tree.completeFetch(ticket(tree.beginFetch("svc", "/a")), described(["y", "x"]));
    expect(tree.walk("svc").map((n) => n.path)).toEqual(["/", "/a", "/a/x", "/a/y", "/b"]);
  });

  it("resets a service to a fresh root", () => {
    const tree = new TopologyTree();
    tree.setServices(["svc"]);
    tree.completeFetch(ticket(tree.beginFetch("svc", "/")), described(["a"]));
    const pending = ticket(tree.beginFetch("svc", "/a"));

    expect(tree.resetService("svc")?.state).toEqual({ tag: "Unfetched" });
    expect(tree.walk("svc").map((n) => n.path)).toEqual(["/"]);
    expect(tree.isInFlight("svc", "/a")).toBe(false);
    expect(tree.completeFetch(pending, described([]))).toBeUndefined();
  });
});
