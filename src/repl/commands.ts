/**
 * Shell Commands
 *
 * Colon commands of the interactive shell: navigation (:use, :cd, :ls, :tree),
 * discovery (:expand, :refresh, :dump) and requests (:call, :get, :set, :watch).
 * Commands only issue intents; results are printed when the session reports them.
 */

import type { BusSession } from "../core/session";
import type { ObjectNode } from "../core/topology";
import type { InterfaceDescriptor } from "../introspection/types";
import { findInterface, isReadable } from "../introspection/types";
import type { Outcome } from "../outcome/outcome";
import { renderFailure } from "../outcome/failure";
import { match } from "../outcome/matchers";
import { renderNode, renderPending, renderTree, stateLabel } from "./render";

/**
 * Where the shell is pointed.
 */
export interface ShellState {
  service?: string;
  path: string;
}

/**
 * Context required for shell commands
 */
export interface ShellContext {
  session: BusSession;
  state: ShellState;

  nowMs(): number;

  /** Log output */
  log(message: string): void;
}

export type CommandResult = {
  shouldExit: boolean;
};

export function createShellState(): ShellState {
  return { path: "/" };
}

const HELP = [
  "Navigation:",
  "  :services [text]            List services, optionally only those containing text",
  "  :reload                     List services again",
  "  :use <service>              Select a service and fetch its root object",
  "  :cd <path>                  Move to an object path (absolute, relative or ..)",
  "  :ls                         List children of the current object",
  "  :show [path]                Show interfaces and members of an object",
  "  :tree                       Show every known object of the current service",
  "Discovery:",
  "  :expand [path]              Fetch an object that was never fetched",
  "  :refresh [path]             Fetch an object again",
  "  :reset                      Forget the current service's objects and start over",
  "  :dump [service]             Fetch every object of a service, breadth first",
  "Requests:",
  "  :call <[iface.]method> [args]   Call a method; several args are written as a struct, e.g. (2, 3)",
  "  :get <[iface.]property>     Read a property",
  "  :getall [iface]             Read every property of an interface",
  "  :set <[iface.]property> <value>  Write a property",
  "  :watch <[iface.]signal>     Print a signal each time it is emitted",
  "  :unwatch <id>               Stop watching",
  "  :pending                    Show requests still waiting and active watches",
  "  :cancel <id|path>           Stop waiting for a request, or for an object fetch",
  "Other:",
  "  :help                       Show this help",
  "  :quit, :q                   Exit",
];

// ─────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────

/** Resolve `target` against `current`: absolute, relative, `.` and `..`. */
export function resolvePath(current: string, target: string): string {
  const parts = target.startsWith("/") ? [] : current.split("/").filter((p) => p !== "");
  for (const seg of target.split("/")) {
    if (seg === "" || seg === ".") continue;
    if (seg === "..") parts.pop();
    else parts.push(seg);
  }
  return parts.length === 0 ? "/" : `/${parts.join("/")}`;
}

type Named = { name: string };

type Resolved<T> = { iface: InterfaceDescriptor; member: T };

/**
 * Find a member by `Interface.Member` or by bare `Member` when only one
 * interface has it. Returns an error message otherwise.
 */
export function resolveMember<T extends Named>(
  node: Readonly<ObjectNode>,
  ref: string,
  pick: (iface: InterfaceDescriptor) => readonly T[],
  what: string
): Resolved<T> | string {
  const dot = ref.lastIndexOf(".");
  if (dot > 0) {
    const ifaceName = ref.slice(0, dot);
    const name = ref.slice(dot + 1);
    const iface = findInterface(node.interfaces, ifaceName);
    if (iface) {
      const member = pick(iface).find((m) => m.name === name);
      return member ? { iface, member } : `No ${what} '${name}' in ${ifaceName}`;
    }
  }
  const matches: Resolved<T>[] = [];
  for (const iface of node.interfaces) {
    for (const member of pick(iface)) {
      if (member.name === ref) matches.push({ iface, member });
    }
  }
  const [only] = matches;
  if (only && matches.length === 1) return only;
  if (matches.length === 0) return `No ${what} '${ref}' on ${node.path}`;
  return `'${ref}' is ambiguous: ${matches.map((m) => `${m.iface.name}.${ref}`).join(", ")}`;
}

function splitFirst(args: string): [string, string] {
  const trimmed = args.trim();
  const space = trimmed.search(/\s/);
  return space < 0 ? [trimmed, ""] : [trimmed.slice(0, space), trimmed.slice(space + 1).trim()];
}

function reportId(ctx: ShellContext, outcome: Outcome<number>, what: string): void {
  ctx.log(
    match(outcome, {
      done: (d) => `[#${d.value}] ${what}`,
      fail: (f) => `error: ${renderFailure(f.failure)}`,
    })
  );
}

/** The current node, if a service is selected and the node has been fetched. */
function populated(ctx: ShellContext): Readonly<ObjectNode> | undefined {
  const { service, path } = ctx.state;
  if (service === undefined) {
    ctx.log("No service selected. Use :use <service>.");
    return undefined;
  }
  const node = ctx.session.node(service, path);
  if (!node) {
    ctx.log(`No object ${path} in ${service}`);
    return undefined;
  }
  if (node.state.tag !== "Populated") {
    ctx.log(`${path} is not loaded (${node.state.tag.toLowerCase()}); try :expand or :refresh`);
    return undefined;
  }
  return node;
}

function selected(ctx: ShellContext): string | undefined {
  if (ctx.state.service === undefined) ctx.log("No service selected. Use :use <service>.");
  return ctx.state.service;
}

// ─────────────────────────────────────────────────────────────────
// Command handlers
// ─────────────────────────────────────────────────────────────────

export function handleServices(ctx: ShellContext, args: string): void {
  const needle = args.trim();
  const names = ctx.session.services().filter((s) => s.includes(needle));
  if (names.length === 0) {
    ctx.log("  (no services)");
    return;
  }
  for (const name of names) {
    ctx.log(`  ${name}${name === ctx.state.service ? " *" : ""}`);
  }
}

export function handleUse(ctx: ShellContext, args: string): void {
  const service = args.trim();
  if (!service) {
    ctx.log("Usage: :use <service>");
    return;
  }
  if (!ctx.session.node(service, "/")) {
    ctx.log(`Unknown service: ${service}. Use :services to list, :reload to list again.`);
    return;
  }
  ctx.state.service = service;
  ctx.state.path = "/";
  ctx.session.expand(service, "/");
  ctx.log(`using ${service}`);
}

export function handleCd(ctx: ShellContext, args: string): void {
  const service = selected(ctx);
  if (service === undefined) return;
  const path = resolvePath(ctx.state.path, args.trim() || "/");
  if (!ctx.session.node(service, path)) {
    ctx.log(`No object ${path} in ${service}`);
    return;
  }
  ctx.state.path = path;
  ctx.session.expand(service, path);
  ctx.log(path);
}

export function handleLs(ctx: ShellContext): void {
  const service = selected(ctx);
  if (service === undefined) return;
  const children = ctx.session.children(service, ctx.state.path);
  if (children.length === 0) {
    ctx.log("  (no children)");
    return;
  }
  for (const child of children) {
    const label = stateLabel(child);
    ctx.log(`  ${child.path}${label ? ` ${label}` : ""}`);
  }
}

export function handleShow(ctx: ShellContext, args: string): void {
  const service = selected(ctx);
  if (service === undefined) return;
  const path = resolvePath(ctx.state.path, args.trim() || ".");
  const node = ctx.session.node(service, path);
  if (!node) {
    ctx.log(`No object ${path} in ${service}`);
    return;
  }
  for (const line of renderNode(node, ctx.session.children(service, path))) ctx.log(line);
}

export function handleTree(ctx: ShellContext): void {
  const service = selected(ctx);
  if (service === undefined) return;
  for (const line of renderTree(ctx.session.walk(service))) ctx.log(line);
}

export function handleFetch(ctx: ShellContext, args: string, mode: "expand" | "refresh"): void {
  const service = selected(ctx);
  if (service === undefined) return;
  const path = resolvePath(ctx.state.path, args.trim() || ".");
  const started = mode === "expand" ? ctx.session.expand(service, path) : ctx.session.refresh(service, path);
  if (started) {
    ctx.log(`fetching ${path}`);
    return;
  }
  const node = ctx.session.node(service, path);
  if (!node) ctx.log(`No object ${path} in ${service}`);
  else if (node.state.tag === "Fetching") ctx.log(`${path} is already being fetched`);
  else ctx.log(`${path} is already loaded; use :refresh to fetch it again`);
}

export function handleReset(ctx: ShellContext): void {
  const service = selected(ctx);
  if (service === undefined) return;
  ctx.session.refreshService(service);
  ctx.state.path = "/";
  ctx.log(`refetching ${service} from /`);
}

export function handleDump(ctx: ShellContext, args: string): void {
  const service = args.trim() || selected(ctx);
  if (service === undefined) return;
  if (!ctx.session.dump(service)) {
    ctx.log(`Unknown service: ${service}`);
    return;
  }
  ctx.log(`dumping ${service}`);
}

export function handleCall(ctx: ShellContext, args: string): void {
  const [ref, text] = splitFirst(args);
  if (!ref) {
    ctx.log("Usage: :call <[iface.]method> [args]");
    return;
  }
  const node = populated(ctx);
  if (!node) return;
  const found = resolveMember(node, ref, (i) => i.methods, "method");
  if (typeof found === "string") {
    ctx.log(found);
    return;
  }
  const target = { service: node.service, path: node.path, interface: found.iface.name, member: found.member.name };
  reportId(ctx, ctx.session.callWithText(target, found.member, text), `${found.iface.name}.${found.member.name}`);
}

export function handleGet(ctx: ShellContext, args: string): void {
  const ref = args.trim();
  if (!ref) {
    ctx.log("Usage: :get <[iface.]property>");
    return;
  }
  const node = populated(ctx);
  if (!node) return;
  const found = resolveMember(node, ref, (i) => i.properties, "property");
  if (typeof found === "string") {
    ctx.log(found);
    return;
  }
  if (!isReadable(found.member)) {
    ctx.log(`Property ${found.member.name} is write-only`);
    return;
  }
  const target = { service: node.service, path: node.path, interface: found.iface.name, name: found.member.name };
  reportId(ctx, ctx.session.readProperty(target), `get ${found.iface.name}.${found.member.name}`);
}

export function handleGetAll(ctx: ShellContext, args: string): void {
  const node = populated(ctx);
  if (!node) return;
  let ifaceName = args.trim();
  if (!ifaceName) {
    const withProps = node.interfaces.filter((i) => i.properties.length > 0);
    const [only] = withProps;
    if (!only || withProps.length > 1) {
      ctx.log("Usage: :getall <iface>");
      return;
    }
    ifaceName = only.name;
  }
  reportId(ctx, ctx.session.readAllProperties(node.service, node.path, ifaceName), `getall ${ifaceName}`);
}

export function handleSet(ctx: ShellContext, args: string): void {
  const [ref, text] = splitFirst(args);
  if (!ref || !text) {
    ctx.log("Usage: :set <[iface.]property> <value>");
    return;
  }
  const node = populated(ctx);
  if (!node) return;
  const found = resolveMember(node, ref, (i) => i.properties, "property");
  if (typeof found === "string") {
    ctx.log(found);
    return;
  }
  const target = { service: node.service, path: node.path, interface: found.iface.name, name: found.member.name };
  reportId(ctx, ctx.session.writePropertyText(target, found.member, text), `set ${found.iface.name}.${found.member.name}`);
}

export function handleWatch(ctx: ShellContext, args: string): void {
  const ref = args.trim();
  if (!ref) {
    ctx.log("Usage: :watch <[iface.]signal>");
    return;
  }
  const node = populated(ctx);
  if (!node) return;
  const found = resolveMember(node, ref, (i) => i.signals, "signal");
  if (typeof found === "string") {
    ctx.log(found);
    return;
  }
  const match = { service: node.service, path: node.path, interface: found.iface.name, member: found.member.name };
  reportId(ctx, ctx.session.subscribe(match), `watch ${found.iface.name}.${found.member.name}`);
}

function parseId(ctx: ShellContext, args: string, usage: string): number | undefined {
  const id = Number(args.trim().replace(/^#/, ""));
  if (!Number.isInteger(id) || id < 1) {
    ctx.log(usage);
    return undefined;
  }
  return id;
}

export function handleUnwatch(ctx: ShellContext, args: string): void {
  const id = parseId(ctx, args, "Usage: :unwatch <id>");
  if (id === undefined) return;
  ctx.log(ctx.session.unsubscribe(id) ? `stopped watch #${id}` : `No watch #${id}`);
}

export function handleCancel(ctx: ShellContext, args: string): void {
  const arg = args.trim();
  if (arg.startsWith("/") || arg === "." || arg.startsWith("..")) {
    const service = selected(ctx);
    if (service === undefined) return;
    const path = resolvePath(ctx.state.path, arg);
    ctx.log(ctx.session.cancelFetch(service, path) ? `stopped fetching ${path}` : `${path} is not being fetched`);
    return;
  }
  const id = parseId(ctx, arg, "Usage: :cancel <id|path>");
  if (id === undefined) return;
  ctx.log(ctx.session.cancel(id) ? `cancelled #${id}` : `No pending request #${id}`);
}

export function handlePending(ctx: ShellContext): void {
  for (const line of renderPending(ctx.session.pending(), ctx.session.subscriptions(), ctx.nowMs())) {
    ctx.log(line);
  }
}

// ─────────────────────────────────────────────────────────────────
// Dispatcher
// ─────────────────────────────────────────────────────────────────

/**
 * Run one line of shell input.
 */
export function processCommand(line: string, ctx: ShellContext): CommandResult {
  const trimmed = line.trim();
  if (trimmed === "") return { shouldExit: false };
  if (!trimmed.startsWith(":")) {
    ctx.log(`Commands start with ':'. Type :help for a list.`);
    return { shouldExit: false };
  }

  const [command, args] = splitFirst(trimmed.slice(1));
  switch (command) {
    case "help":
    case "h":
      for (const l of HELP) ctx.log(l);
      break;
    case "quit":
    case "q":
      return { shouldExit: true };
    case "services":
      handleServices(ctx, args);
      break;
    case "reload":
      ctx.session.refreshServices();
      ctx.log("listing services");
      break;
    case "use":
      handleUse(ctx, args);
      break;
    case "cd":
      handleCd(ctx, args);
      break;
    case "ls":
      handleLs(ctx);
      break;
    case "show":
      handleShow(ctx, args);
      break;
    case "tree":
      handleTree(ctx);
      break;
    case "expand":
      handleFetch(ctx, args, "expand");
      break;
    case "refresh":
      handleFetch(ctx, args, "refresh");
      break;
    case "reset":
      handleReset(ctx);
      break;
    case "dump":
      handleDump(ctx, args);
      break;
    case "call":
      handleCall(ctx, args);
      break;
    case "get":
      handleGet(ctx, args);
      break;
    case "getall":
      handleGetAll(ctx, args);
      break;
    case "set":
      handleSet(ctx, args);
      break;
    case "watch":
      handleWatch(ctx, args);
      break;
    case "unwatch":
      handleUnwatch(ctx, args);
      break;
    case "pending":
      handlePending(ctx);
      break;
    case "cancel":
      handleCancel(ctx, args);
      break;
    default:
      ctx.log(`Unknown command :${command}. Type :help for a list.`);
  }
  return { shouldExit: false };
}
