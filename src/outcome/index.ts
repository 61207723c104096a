export type { Outcome, Done, Fail, OutcomeMeta } from "./outcome";
export { isDone, isFail } from "./outcome";
export type { Failure, FailureReason } from "./failure";
export { failure, wrapFailure, allDiagnostics, renderFailure } from "./failure";
export type { Diagnostic, DiagnosticSeverity, Span } from "./diagnostic";
export { errorDiag, spanAt } from "./diagnostic";
export { DIAGNOSTIC_CODES, makeDiagnostic, type DiagnosticCode } from "./codes";
export {
  done,
  ok,
  fail,
  err,
  timeout,
  remoteError,
  transportError,
  typeMismatch,
  arityMismatch,
  cancelled,
} from "./constructors";
export { match, mapOutcome, andThen } from "./matchers";
