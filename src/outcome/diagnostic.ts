/**
 * Character range inside a piece of operator input or a signature string.
 * `end` is exclusive.
 */
export interface Span {
  start: number;
  end: number;
}

export type DiagnosticSeverity = "error" | "warning" | "info" | "hint";

export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  span?: Span;
  data?: Record<string, unknown>;
}

type DiagnosticOpts = Partial<Omit<Diagnostic, "code" | "message" | "severity">>;

export function errorDiag(code: string, message: string, opts?: DiagnosticOpts): Diagnostic {
  return { code, message, severity: "error", ...opts };
}

export function spanAt(offset: number, length = 1): Span {
  return { start: offset, end: offset + length };
}
