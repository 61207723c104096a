import type { Diagnostic, DiagnosticSeverity, Span } from "./diagnostic";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: string;
  template: string;
}

export const DIAGNOSTIC_CODES = {
  E0001: { code: "E0001", severity: "error", category: "Signature", template: "Malformed signature at offset {offset}: {detail}" },
  E0002: { code: "E0002", severity: "error", category: "Signature", template: "Signature nested deeper than {max} at offset {offset}" },

  E0100: { code: "E0100", severity: "error", category: "Input", template: "Expected {expected} at offset {offset}" },
  E0101: { code: "E0101", severity: "error", category: "Input", template: "Unexpected end of input, expected {expected}" },
  E0102: { code: "E0102", severity: "error", category: "Input", template: "Integer {text} out of range for {expected}" },
  E0103: { code: "E0103", severity: "error", category: "Input", template: "Unexpected trailing input at offset {offset}" },
  E0104: { code: "E0104", severity: "error", category: "Input", template: "Invalid escape sequence at offset {offset}" },
  E0105: { code: "E0105", severity: "error", category: "Input", template: "Invalid object path {text}" },
  E0106: { code: "E0106", severity: "error", category: "Input", template: "Invalid signature {text}" },
  E0107: { code: "E0107", severity: "error", category: "Input", template: "Duplicate dictionary key {text}" },

  E0200: { code: "E0200", severity: "error", category: "Validation", template: "Type mismatch: expected {expected}, got {actual}" },
  E0201: { code: "E0201", severity: "error", category: "Validation", template: "Wrong number of values: expected {expected}, got {actual}" },

  E0300: { code: "E0300", severity: "error", category: "Bus", template: "No reply within {ms}ms" },
  E0301: { code: "E0301", severity: "error", category: "Bus", template: "Remote error {name}" },
  E0302: { code: "E0302", severity: "error", category: "Bus", template: "Transport failure: {detail}" },
  E0303: { code: "E0303", severity: "error", category: "Bus", template: "Cannot connect to the {bus} bus" },
  E0304: { code: "E0304", severity: "error", category: "Bus", template: "Introspection of {path} failed" },
  E0305: { code: "E0305", severity: "error", category: "Bus", template: "Property {name} is not writable" },
  E0306: { code: "E0306", severity: "error", category: "Bus", template: "Values of type {type} cannot be entered" },
} satisfies Record<string, DiagCodeDef>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;

export function makeDiagnostic(
  code: DiagnosticCode,
  params?: Record<string, string | number>,
  span?: Span
): Diagnostic {
  const def: DiagCodeDef = DIAGNOSTIC_CODES[code];

  let message = def.template;
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      message = message.replace(`{${key}}`, String(value));
    }
  }

  return {
    code: def.code,
    severity: def.severity,
    message,
    span,
    data: params,
  };
}
