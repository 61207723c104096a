// src/index.ts
// buslens - Public API
//
// Everything needed to explore a bus from code: a session over a bus port,
// typed values and signatures, and the text formats of both.

// ═══════════════════════════════════════════════════════════════════════════════
// SESSION
// ═══════════════════════════════════════════════════════════════════════════════

export { BusSession, type SessionOptions, type SessionListener } from "./core/session";
export type { BusMessage, SessionEvent, RequestId, RequestKind, SubscriptionId } from "./core/messages";
export type { CallTarget, CallRequest, PendingRequest, SubscriptionInfo } from "./core/orchestrator";
export { DEFAULT_TIMEOUT_MS, DEFAULT_MAX_IN_FLIGHT_PER_SERVICE, validateArgs } from "./core/orchestrator";
export { TopologyTree, childPath, type ObjectNode, type FetchState, type SettledState } from "./core/topology";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/config";

// ═══════════════════════════════════════════════════════════════════════════════
// PORTS & ADAPTERS
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./ports";
export { connectBus, DbusNextBus, type ConnectOptions } from "./adapters/dbus-next/bus";
export { MemoryBus } from "./adapters/memoryBus";
export { createDemoBus, DEMO_SERVICE, DEMO_PATH, DEMO_INTERFACE } from "./adapters/demoBus";
export { loggingBus } from "./adapters/logging";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES, VALUES & TEXT
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./signature";
export * from "./value";
export * from "./parser";
export * from "./introspection";
export * from "./outcome";
export * from "./errors";
