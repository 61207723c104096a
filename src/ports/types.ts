/**
 * Trace event types for the session log.
 */
export type TraceEvent =
  | { tag: "E_Connect"; bus: string; ok: boolean; error?: string }
  | { tag: "E_ListNames"; id: string; durationMs: number; count?: number; error?: string }
  | { tag: "E_Introspect"; id: string; service: string; path: string; durationMs: number; error?: string }
  | {
      tag: "E_Call";
      id: string;
      service: string;
      path: string;
      interface: string;
      member: string;
      durationMs: number;
      error?: string;
    }
  | {
      tag: "E_Property";
      id: string;
      op: "get" | "getAll" | "set";
      service: string;
      path: string;
      interface: string;
      name?: string;
      durationMs: number;
      error?: string;
    }
  | { tag: "E_Subscribe"; id: string; service: string; path: string; interface: string; member: string; error?: string }
  | { tag: "E_Signal"; service: string; path: string; interface: string; member: string; argCount: number }
  | { tag: "E_Cancel"; requestId: number; kind: string }
  | { tag: "E_Timeout"; requestId: number; kind: string; ms: number };

/**
 * Trace sink for logging events.
 */
export interface TraceSink {
  emit(event: TraceEvent): void;
}
