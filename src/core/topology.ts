// src/core/topology.ts
// Lazily discovered object tree per service. Only the session's tick mutates it.

import type { InterfaceDescriptor, NodeDescription } from "../introspection/types";

// ─────────────────────────────────────────────────────────────────
// Node types
// ─────────────────────────────────────────────────────────────────

/** A state a fetch can settle into, or the state before the first fetch. */
export type SettledState =
  | { tag: "Unfetched" }
  | { tag: "Populated" }
  | { tag: "Errored"; message: string };

export type FetchState = SettledState | { tag: "Fetching"; previous: SettledState };

export type ObjectNode = {
  service: string;
  path: string;
  /** Path of the parent node; absent for the root. */
  parent?: string;
  /** Child path segments, sorted. Empty until populated. */
  children: readonly string[];
  interfaces: readonly InterfaceDescriptor[];
  state: FetchState;
};

export type FetchTicket = {
  id: number;
  service: string;
  path: string;
};

export function childPath(path: string, segment: string): string {
  return path === "/" ? `/${segment}` : `${path}/${segment}`;
}

function key(service: string, path: string): string {
  return `${service}\u0000${path}`;
}

function isBelow(path: string, ancestor: string): boolean {
  return ancestor === "/" ? path !== "/" : path.startsWith(`${ancestor}/`);
}

// ─────────────────────────────────────────────────────────────────
// Tree
// ─────────────────────────────────────────────────────────────────

export class TopologyTree {
  private serviceList: string[] = [];
  private readonly nodes = new Map<string, Map<string, ObjectNode>>();
  /** In-flight fetches: (service, path) → ticket id. */
  private readonly inFlight = new Map<string, number>();
  private nextTicket = 1;

  /**
   * Replace the service list. New services get an unfetched root; services
   * that disappeared are dropped with all their nodes.
   */
  setServices(names: readonly string[]): { added: string[]; removed: string[] } {
    const next = [...new Set(names)].sort();
    const nextSet = new Set(next);
    const removed = this.serviceList.filter((s) => !nextSet.has(s));
    const added = next.filter((s) => !this.nodes.has(s));
    for (const s of removed) this.dropService(s);
    for (const s of added) this.nodes.set(s, new Map([["/", this.newNode(s, "/")]]));
    this.serviceList = next;
    return { added, removed };
  }

  /**
   * Mark a node Fetching and return its ticket. Returns undefined when the
   * node is unknown or a fetch for it is already in flight.
   */
  beginFetch(service: string, path: string): FetchTicket | undefined {
    const node = this.nodes.get(service)?.get(path);
    if (!node || node.state.tag === "Fetching") return undefined;
    const ticket: FetchTicket = { id: this.nextTicket++, service, path };
    node.state = { tag: "Fetching", previous: node.state };
    this.inFlight.set(key(service, path), ticket.id);
    return ticket;
  }

  /**
   * Apply a successful fetch. Interfaces are replaced; new children start
   * Unfetched, children that vanished are removed with their subtrees.
   * Returns the node, or undefined when the ticket is stale.
   */
  completeFetch(ticket: FetchTicket, description: NodeDescription): ObjectNode | undefined {
    const node = this.claim(ticket);
    if (!node) return undefined;
    const nodes = this.nodesOf(ticket.service);
    const children = [...new Set(description.children)].sort();
    const keep = new Set(children);
    for (const old of node.children) {
      if (!keep.has(old)) this.dropSubtree(ticket.service, childPath(node.path, old));
    }
    for (const segment of children) {
      const path = childPath(node.path, segment);
      if (!nodes.has(path)) nodes.set(path, this.newNode(ticket.service, path, node.path));
    }
    node.children = children;
    node.interfaces = description.interfaces;
    node.state = { tag: "Populated" };
    return node;
  }

  /** Mark the node Errored. Returns undefined when the ticket is stale. */
  failFetch(ticket: FetchTicket, message: string): ObjectNode | undefined {
    const node = this.claim(ticket);
    if (!node) return undefined;
    node.state = { tag: "Errored", message };
    return node;
  }

  /**
   * Abandon an in-flight fetch; the node returns to its previous state and
   * the outstanding ticket becomes stale.
   */
  cancelFetch(service: string, path: string): ObjectNode | undefined {
    const node = this.nodes.get(service)?.get(path);
    if (!node || node.state.tag !== "Fetching") return undefined;
    node.state = node.state.previous;
    this.inFlight.delete(key(service, path));
    return node;
  }

  /** Full refresh of one service: every node goes, a fresh root remains. */
  resetService(service: string): ObjectNode | undefined {
    if (!this.nodes.has(service)) return undefined;
    this.dropService(service);
    const root = this.newNode(service, "/");
    this.nodes.set(service, new Map([["/", root]]));
    return root;
  }

  isInFlight(service: string, path: string): boolean {
    return this.inFlight.has(key(service, path));
  }

  // ───────────────────────────────────────────────────────────────
  // Read-only views
  // ───────────────────────────────────────────────────────────────

  services(): readonly string[] {
    return this.serviceList;
  }

  hasService(service: string): boolean {
    return this.nodes.has(service);
  }

  node(service: string, path: string): Readonly<ObjectNode> | undefined {
    return this.nodes.get(service)?.get(path);
  }

  children(service: string, path: string): Readonly<ObjectNode>[] {
    const node = this.node(service, path);
    if (!node) return [];
    const nodes = this.nodesOf(service);
    return node.children.flatMap((segment) => {
      const child = nodes.get(childPath(path, segment));
      return child ? [child] : [];
    });
  }

  /** Depth-first, pre-order, children in sorted order. */
  walk(service: string): Readonly<ObjectNode>[] {
    const out: Readonly<ObjectNode>[] = [];
    const visit = (node: Readonly<ObjectNode>) => {
      out.push(node);
      for (const child of this.children(service, node.path)) visit(child);
    };
    const root = this.node(service, "/");
    if (root) visit(root);
    return out;
  }

  // ───────────────────────────────────────────────────────────────
  // Internals
  // ───────────────────────────────────────────────────────────────

  private newNode(service: string, path: string, parent?: string): ObjectNode {
    return { service, path, parent, children: [], interfaces: [], state: { tag: "Unfetched" } };
  }

  private nodesOf(service: string): Map<string, ObjectNode> {
    let nodes = this.nodes.get(service);
    if (!nodes) {
      nodes = new Map();
      this.nodes.set(service, nodes);
    }
    return nodes;
  }

  /** Resolve a ticket to its node and clear the in-flight entry, if still current. */
  private claim(ticket: FetchTicket): ObjectNode | undefined {
    const k = key(ticket.service, ticket.path);
    if (this.inFlight.get(k) !== ticket.id) return undefined;
    this.inFlight.delete(k);
    return this.nodes.get(ticket.service)?.get(ticket.path);
  }

  private dropSubtree(service: string, path: string): void {
    const nodes = this.nodesOf(service);
    for (const p of [...nodes.keys()]) {
      if (p === path || isBelow(p, path)) {
        nodes.delete(p);
        this.inFlight.delete(key(service, p));
      }
    }
  }

  private dropService(service: string): void {
    for (const p of this.nodes.get(service)?.keys() ?? []) {
      this.inFlight.delete(key(service, p));
    }
    this.nodes.delete(service);
  }
}
