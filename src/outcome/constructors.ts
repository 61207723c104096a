import type { Done, Fail, OutcomeMeta } from "./outcome";
import type { Failure, FailureReason } from "./failure";
import { failure } from "./failure";
import { makeDiagnostic } from "./codes";

export function done<A>(value: A, meta: OutcomeMeta = {}): Done<A> {
  return { tag: "Done", value, meta };
}

export const ok = done;

export function fail(f: Failure, meta: OutcomeMeta = {}): Fail {
  return { tag: "Fail", failure: f, meta };
}

export function err(
  reason: FailureReason,
  message: string,
  opts?: Partial<Omit<Failure, "reason" | "message">>,
  meta: OutcomeMeta = {}
): Fail {
  return fail(failure(reason, message, opts), meta);
}

export function timeout(ms: number, meta: OutcomeMeta = {}): Fail {
  return fail(
    failure("timeout", `No reply after ${ms}ms`, {
      diagnostics: [makeDiagnostic("E0300", { ms })],
      context: { ms },
      recoverable: true,
    }),
    meta
  );
}

export function remoteError(name: string, message: string, meta: OutcomeMeta = {}): Fail {
  return fail(
    failure("remote-error", message, {
      diagnostics: [makeDiagnostic("E0301", { name })],
      context: { errorName: name },
      recoverable: true,
    }),
    meta
  );
}

export function transportError(detail: string, meta: OutcomeMeta = {}): Fail {
  return fail(
    failure("transport-error", detail, {
      diagnostics: [makeDiagnostic("E0302", { detail })],
      recoverable: true,
    }),
    meta
  );
}

export function typeMismatch(
  expected: string,
  actual: string,
  context?: Record<string, unknown>,
  meta: OutcomeMeta = {}
): Fail {
  return fail(
    failure("type-mismatch", `Expected ${expected}, got ${actual}`, {
      diagnostics: [makeDiagnostic("E0200", { expected, actual })],
      context,
      recoverable: true,
    }),
    meta
  );
}

export function arityMismatch(
  expected: number,
  actual: number,
  context?: Record<string, unknown>,
  meta: OutcomeMeta = {}
): Fail {
  return fail(
    failure("arity-mismatch", `Expected ${expected} value(s), got ${actual}`, {
      diagnostics: [makeDiagnostic("E0201", { expected, actual })],
      context,
      recoverable: true,
    }),
    meta
  );
}

export function cancelled(meta: OutcomeMeta = {}): Fail {
  return fail(failure("cancelled", "Cancelled by initiator", { recoverable: true }), meta);
}
