import type { Failure, FailureReason } from "../outcome/failure";
import { failure } from "../outcome/failure";
import { makeDiagnostic, type DiagnosticCode } from "../outcome/codes";
import { spanAt } from "../outcome/diagnostic";

export type ValueParseErrorKind =
  | "UnexpectedToken"
  | "UnexpectedEnd"
  | "IntegerOutOfRange"
  | "ArityMismatch"
  | "TrailingInput"
  | "InvalidEscape"
  | "InvalidObjectPath"
  | "InvalidSignature"
  | "DuplicateKey"
  | "UnsupportedType"
  | "NestingTooDeep";

/**
 * Raised inside the recursive descent and turned into a Failure at the
 * parser's entry point; it never escapes parseValue.
 */
export class ValueParseError extends Error {
  constructor(
    public readonly kind: ValueParseErrorKind,
    public readonly offset: number,
    public readonly expected: string,
    public readonly text = ""
  ) {
    super(`${kind} at offset ${offset}: expected ${expected}`);
    this.name = "ValueParseError";
  }
}

const REASONS: Record<ValueParseErrorKind, FailureReason> = {
  UnexpectedToken: "value-parse-error",
  UnexpectedEnd: "value-parse-error",
  IntegerOutOfRange: "integer-out-of-range",
  ArityMismatch: "arity-mismatch",
  TrailingInput: "trailing-input",
  InvalidEscape: "value-parse-error",
  InvalidObjectPath: "value-parse-error",
  InvalidSignature: "value-parse-error",
  DuplicateKey: "value-parse-error",
  UnsupportedType: "unsupported-type",
  NestingTooDeep: "signature-too-deep",
};

const CODES: Record<ValueParseErrorKind, DiagnosticCode> = {
  UnexpectedToken: "E0100",
  UnexpectedEnd: "E0101",
  IntegerOutOfRange: "E0102",
  ArityMismatch: "E0201",
  TrailingInput: "E0103",
  InvalidEscape: "E0104",
  InvalidObjectPath: "E0105",
  InvalidSignature: "E0106",
  DuplicateKey: "E0107",
  UnsupportedType: "E0306",
  NestingTooDeep: "E0002",
};

export function parseErrorToFailure(e: ValueParseError): Failure {
  const params: Record<string, string | number> = {
    offset: e.offset,
    expected: e.expected,
    text: e.text,
    type: e.expected,
    actual: e.text,
    max: e.text,
  };
  const diag = makeDiagnostic(CODES[e.kind], params, spanAt(e.offset, Math.max(1, e.text.length)));
  return failure(REASONS[e.kind], diag.message, {
    diagnostics: [diag],
    context: { kind: e.kind, offset: e.offset, expected: e.expected },
    recoverable: true,
  });
}
