import { describe, it, expect } from "vitest";
import { isDone, isFail } from "../../src/outcome/outcome";
import { allDiagnostics, failure, renderFailure, wrapFailure } from "../../src/outcome/failure";
import { errorDiag, spanAt } from "../../src/outcome/diagnostic";
import { DIAGNOSTIC_CODES, makeDiagnostic } from "../../src/outcome/codes";
import {
  arityMismatch,
  cancelled,
  done,
  err,
  fail,
  remoteError,
  timeout,
  transportError,
  typeMismatch,
} from "../../src/outcome/constructors";
import { andThen, mapOutcome, match } from "../../src/outcome/matchers";

describe("Outcome ADT", () => {
  it("constructs Done outcomes with metadata", () => {
    const outcome = done("value", { durationMs: 12 });
    expect(outcome.tag).toBe("Done");
    expect(outcome.value).toBe("value");
    expect(outcome.meta).toEqual({ durationMs: 12 });
    expect(isDone(outcome)).toBe(true);
  });

  it("constructs Fail outcomes with failures", () => {
    const diag = errorDiag("E0100", "bad input", { span: spanAt(3, 2) });
    const outcome = fail(failure("value-parse-error", "bad input", { diagnostics: [diag] }));
    expect(isFail(outcome)).toBe(true);
    expect(outcome.failure.diagnostics[0]?.span).toEqual({ start: 3, end: 5 });
    expect(outcome.failure.recoverable).toBe(false);
  });

  it("builds the request failures", () => {
    expect(timeout(250).failure).toMatchObject({
      reason: "timeout",
      message: "No reply after 250ms",
      context: { ms: 250 },
    });
    expect(remoteError("com.example.Error.Nope", "no").failure.context).toEqual({
      errorName: "com.example.Error.Nope",
    });
    expect(transportError("socket closed").failure.diagnostics[0]?.message).toBe("Transport failure: socket closed");
    expect(cancelled().failure.reason).toBe("cancelled");
  });

  it("builds validation failures", () => {
    const mismatch = typeMismatch("int32", "string", { argument: 1 });
    expect(mismatch.failure.message).toBe("Expected int32, got string");
    expect(mismatch.failure.diagnostics[0]?.code).toBe("E0200");
    expect(mismatch.failure.context).toEqual({ argument: 1 });
    expect(arityMismatch(2, 3).failure.message).toBe("Expected 2 value(s), got 3");
  });
});

describe("Failures", () => {
  it("collects diagnostics through causes without repeats", () => {
    const shared = makeDiagnostic("E0102", { text: "300", expected: "byte" });
    const inner = failure("integer-out-of-range", "too big", { diagnostics: [shared] });
    const outer = wrapFailure(inner, "argument 1: too big", { argument: 0 });
    expect(outer.cause).toBe(inner);
    expect(outer.context).toEqual({ argument: 0 });
    expect(allDiagnostics(outer)).toEqual([shared]);
  });

  it("renders remote errors by name", () => {
    expect(renderFailure(remoteError("com.example.Error.Overflow", "sum does not fit").failure)).toBe(
      "com.example.Error.Overflow: sum does not fit"
    );
    expect(renderFailure(timeout(10).failure)).toBe("timeout: No reply after 10ms");
  });

  it("fills diagnostic templates", () => {
    const diag = makeDiagnostic("E0304", { path: "/a/b" });
    expect(diag.message).toBe("Introspection of /a/b failed");
    expect(diag.severity).toBe(DIAGNOSTIC_CODES.E0304.severity);
  });
});

describe("Outcome matchers", () => {
  it("matches on the tag", () => {
    const label = match(done(3), { done: (d) => `done ${d.value}`, fail: () => "fail" });
    expect(label).toBe("done 3");
  });

  it("maps only Done values", () => {
    const mapped = mapOutcome(done(2), (n) => n * 10);
    expect(mapped.tag === "Done" && mapped.value).toBe(20);
    const failed = err("transport-error", "gone");
    expect(mapOutcome(failed, (n: number) => n + 1)).toBe(failed);
  });

  it("keeps metadata when mapping", () => {
    expect(mapOutcome(done("x", { durationMs: 4 }), (s) => [s])).toEqual({ tag: "Done", value: ["x"], meta: { durationMs: 4 } });
  });

  it("stops a chain at the first failure", () => {
    let reached = false;
    const rejected = err("arity-mismatch", "too few");
    const chained = andThen(rejected, (n: number) => {
      reached = true;
      return done(n + 1);
    });
    expect(chained).toBe(rejected);
    expect(reached).toBe(false);
    const next = andThen(done(2), (n) => done(n + 1));
    expect(next.tag === "Done" && next.value).toBe(3);
  });
});
