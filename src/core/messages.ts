// src/core/messages.ts
// What tasks post to the results channel, and what the session reports after applying it.

import type { Outcome } from "../outcome/outcome";
import type { Failure } from "../outcome/failure";
import type { ArgDescriptor, NodeDescription } from "../introspection/types";
import type { SignalMatch, Unsubscribe } from "../ports/bus";
import type { Value } from "../value/value";
import type { FetchTicket, ObjectNode } from "./topology";
import type { TaskId } from "./tasks";

export type RequestId = TaskId;

export type SubscriptionId = TaskId;

export type RequestKind = "call" | "get" | "getAll" | "set";

/**
 * BusMessage: results posted by background tasks. Applied only by the session's tick.
 */
export type BusMessage =
  | { tag: "ServicesListed"; outcome: Outcome<string[]> }
  | { tag: "FetchSettled"; ticket: FetchTicket; outcome: Outcome<NodeDescription> }
  | { tag: "RequestSettled"; id: RequestId; outcome: Outcome<Value[]> }
  | { tag: "SubscriptionSettled"; id: SubscriptionId; outcome: Outcome<Unsubscribe> }
  | { tag: "SignalReceived"; id: SubscriptionId; args: Value[] }
  | { tag: "UnsubscribeFailed"; id: SubscriptionId; failure: Failure }
  | { tag: "Notice"; message: string };

/**
 * SessionEvent: state changes the presentation should render.
 */
export type SessionEvent =
  | { tag: "ServicesChanged"; services: readonly string[]; added: string[]; removed: string[] }
  | { tag: "ServicesFailed"; failure: Failure }
  | { tag: "NodeChanged"; node: Readonly<ObjectNode> }
  | {
      tag: "RequestDone";
      id: RequestId;
      kind: RequestKind;
      label: string;
      values: Value[];
      /** Out-arg descriptors of the called method, when known. */
      outArgs?: readonly ArgDescriptor[];
      durationMs?: number;
    }
  | { tag: "RequestFailed"; id: RequestId; kind: RequestKind | "subscribe"; label: string; failure: Failure }
  | { tag: "Subscribed"; id: SubscriptionId; match: SignalMatch }
  | { tag: "Signal"; id: SubscriptionId; match: SignalMatch; args: Value[] }
  | { tag: "DumpComplete"; service: string; nodes: number }
  | { tag: "DumpStopped"; service: string; nodes: number }
  | { tag: "Notice"; message: string };
