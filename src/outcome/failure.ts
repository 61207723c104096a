import type { Diagnostic } from "./diagnostic";

export type FailureReason =
  | "connection-failure"
  | "introspection-failure"
  | "malformed-signature"
  | "signature-too-deep"
  | "value-parse-error"
  | "integer-out-of-range"
  | "arity-mismatch"
  | "trailing-input"
  | "type-mismatch"
  | "unsupported-type"
  | "not-writable"
  | "remote-error"
  | "timeout"
  | "transport-error"
  | "cancelled"
  | "internal-error";

export interface Failure {
  reason: FailureReason;
  message: string;
  context?: Record<string, unknown>;
  diagnostics: Diagnostic[];
  cause?: Failure;
  recoverable: boolean;
}

export function failure(
  reason: FailureReason,
  message: string,
  opts?: Partial<Omit<Failure, "reason" | "message">>
): Failure {
  return {
    reason,
    message,
    diagnostics: opts?.diagnostics ?? [],
    recoverable: opts?.recoverable ?? false,
    context: opts?.context,
    cause: opts?.cause,
  };
}

export function wrapFailure(
  inner: Failure,
  message: string,
  context?: Record<string, unknown>
): Failure {
  return {
    ...inner,
    message,
    context: { ...inner.context, ...context },
    cause: inner,
  };
}

export function allDiagnostics(f: Failure, seen = new Set<Diagnostic>()): Diagnostic[] {
  const collected: Diagnostic[] = [];
  for (const diag of f.diagnostics) {
    if (!seen.has(diag)) {
      seen.add(diag);
      collected.push(diag);
    }
  }
  if (f.cause) {
    collected.push(...allDiagnostics(f.cause, seen));
  }
  return collected;
}

/**
 * One-line rendering for the shell: `reason: message`, with the remote
 * error name when the peer supplied one.
 */
export function renderFailure(f: Failure): string {
  const errorName = f.context?.errorName;
  if (f.reason === "remote-error" && typeof errorName === "string") {
    return `${errorName}: ${f.message}`;
  }
  return `${f.reason}: ${f.message}`;
}
