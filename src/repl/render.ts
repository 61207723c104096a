/**
 * Text rendering for the shell. Everything here is pure: views and events in,
 * lines out.
 */

import type { InterfaceDescriptor } from "../introspection/types";
import { describeMethod, describeProperty, describeSignal } from "../introspection/describe";
import type { ObjectNode } from "../core/topology";
import type { SessionEvent } from "../core/messages";
import type { PendingRequest, SubscriptionInfo } from "../core/orchestrator";
import { renderFailure } from "../outcome/failure";
import { renderSignature } from "../signature/render";
import type { Value } from "../value/value";
import { formatValue } from "../value/format";

export function stateLabel(node: Readonly<ObjectNode>): string {
  switch (node.state.tag) {
    case "Unfetched":
      return "+";
    case "Fetching":
      return "…";
    case "Populated":
      return "";
    case "Errored":
      return `! ${node.state.message}`;
  }
}

function nodeName(node: Readonly<ObjectNode>): string {
  if (node.path === "/") return "/";
  return node.path.slice(node.path.lastIndexOf("/") + 1);
}

/** One line per node, indented by depth. */
export function renderTree(nodes: readonly Readonly<ObjectNode>[]): string[] {
  return nodes.map((node) => {
    const depth = node.path === "/" ? 0 : node.path.split("/").length - 1;
    const label = stateLabel(node);
    return `${"  ".repeat(depth)}${nodeName(node)}${label ? ` ${label}` : ""}`;
  });
}

export function renderInterface(iface: InterfaceDescriptor): string[] {
  const lines = [iface.name];
  const section = (title: string, entries: string[]) => {
    if (entries.length === 0) return;
    lines.push(`  ${title}:`);
    for (const e of entries) lines.push(`    ${e}`);
  };
  section("Methods", iface.methods.map(describeMethod));
  section("Properties", iface.properties.map(describeProperty));
  section("Signals", iface.signals.map(describeSignal));
  return lines;
}

/** Interfaces and children of one node. */
export function renderNode(node: Readonly<ObjectNode>, children: readonly Readonly<ObjectNode>[]): string[] {
  const lines = [`${node.service} ${node.path}${stateLabel(node) ? ` ${stateLabel(node)}` : ""}`];
  if (node.state.tag === "Unfetched") {
    lines.push("  (not fetched yet; :expand to fetch)");
    return lines;
  }
  for (const iface of node.interfaces) {
    lines.push(...renderInterface(iface).map((l) => `  ${l}`));
  }
  if (children.length > 0) {
    lines.push("  Children:");
    for (const child of children) {
      const label = stateLabel(child);
      lines.push(`    ${nodeName(child)}${label ? ` ${label}` : ""}`);
    }
  }
  return lines;
}

/** Entries of an `a{sv}` dict as `key = value`, variants unwrapped. */
function renderProperties(all: Value): string[] {
  if (all.tag !== "Dict") return [`  ${formatValue(all)}`];
  if (all.entries.length === 0) return ["  (no readable properties)"];
  return all.entries.map(([k, v]) => {
    const name = k.tag === "Str" ? k.value : formatValue(k);
    return `  ${name} = ${v.tag === "Variant" ? formatValue(v.inner) : formatValue(v)}`;
  });
}

type DoneEvent = Extract<SessionEvent, { tag: "RequestDone" }>;

function renderDone(event: DoneEvent): string[] {
  const head = `[#${event.id}] ${event.label}`;
  switch (event.kind) {
    case "set":
      return [`${head}: ok`];
    case "get": {
      const [value] = event.values;
      return [`${head} = ${value ? formatValue(value) : "(nothing)"}`];
    }
    case "getAll": {
      const [all] = event.values;
      return [head, ...(all ? renderProperties(all) : [])];
    }
    case "call":
      if (event.values.length === 0) return [`${head}: ok`];
      return [
        head,
        ...event.values.map((v, i) => {
          const arg = event.outArgs?.[i];
          const name = arg?.name ?? `[${i}]`;
          const sig = arg ? `: ${renderSignature(arg.signature)}` : "";
          return `  ${name}${sig} = ${formatValue(v)}`;
        }),
      ];
  }
}

export function renderEvent(event: SessionEvent): string[] {
  switch (event.tag) {
    case "ServicesChanged": {
      const delta = [
        event.added.length > 0 ? `+${event.added.length}` : "",
        event.removed.length > 0 ? `-${event.removed.length}` : "",
      ].filter((s) => s !== "");
      return [`${event.services.length} services${delta.length > 0 ? ` (${delta.join(" ")})` : ""}`];
    }
    case "ServicesFailed":
      return [`cannot list services: ${renderFailure(event.failure)}`];
    case "NodeChanged": {
      const { node } = event;
      if (node.state.tag === "Errored") return [`${node.service} ${node.path}: error: ${node.state.message}`];
      return [
        `${node.service} ${node.path}: ${node.children.length} children, ${node.interfaces.length} interfaces`,
      ];
    }
    case "RequestDone":
      return renderDone(event);
    case "RequestFailed":
      return [`[#${event.id}] ${event.label} failed: ${renderFailure(event.failure)}`];
    case "Subscribed": {
      const m = event.match;
      return [`[#${event.id}] watching ${m.service} ${m.path} ${m.interface}.${m.member}`];
    }
    case "Signal": {
      const m = event.match;
      return [`[#${event.id}] ${m.interface}.${m.member}(${event.args.map(formatValue).join(", ")})`];
    }
    case "DumpComplete":
      return [`dump of ${event.service} complete: ${event.nodes} node(s) fetched`];
    case "DumpStopped":
      return [`dump of ${event.service} stopped after ${event.nodes} node(s)`];
    case "Notice":
      return [event.message];
  }
}

export function renderPending(requests: readonly PendingRequest[], subs: readonly SubscriptionInfo[], nowMs: number): string[] {
  const lines: string[] = [];
  for (const r of requests) {
    lines.push(`  #${r.id} ${r.kind} ${r.label} (${Math.max(0, nowMs - r.startedAt)}ms)`);
  }
  for (const s of subs) {
    const m = s.match;
    const status = s.active ? `${s.signals} signal(s)` : "installing";
    lines.push(`  #${s.id} watch ${m.service} ${m.path} ${m.interface}.${m.member} (${status})`);
  }
  return lines.length > 0 ? lines : ["  (nothing pending)"];
}
