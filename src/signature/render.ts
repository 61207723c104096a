import type { TypeSignature } from "./types";
import { BASIC_NAMES } from "./types";

export function renderSignature(sig: TypeSignature): string {
  switch (sig.tag) {
    case "Basic":
      return sig.code;
    case "Variant":
      return "v";
    case "Array":
      return `a${renderSignature(sig.element)}`;
    case "Dict":
      return `a{${sig.key.code}${renderSignature(sig.value)}}`;
    case "Struct":
      return `(${sig.fields.map(renderSignature).join("")})`;
  }
}

export function renderSignatureList(sigs: readonly TypeSignature[]): string {
  return sigs.map(renderSignature).join("");
}

export function signatureEquals(a: TypeSignature, b: TypeSignature): boolean {
  switch (a.tag) {
    case "Basic":
      return b.tag === "Basic" && a.code === b.code;
    case "Variant":
      return b.tag === "Variant";
    case "Array":
      return b.tag === "Array" && signatureEquals(a.element, b.element);
    case "Dict":
      return b.tag === "Dict" && a.key.code === b.key.code && signatureEquals(a.value, b.value);
    case "Struct":
      return (
        b.tag === "Struct" &&
        a.fields.length === b.fields.length &&
        a.fields.every((f, i) => {
          const other = b.fields[i];
          return other !== undefined && signatureEquals(f, other);
        })
      );
  }
}

/** Human-readable description, used in parse errors. */
export function describeSignature(sig: TypeSignature): string {
  switch (sig.tag) {
    case "Basic":
      return BASIC_NAMES[sig.code];
    case "Variant":
      return "variant";
    case "Array":
      return `array of ${describeSignature(sig.element)}`;
    case "Dict":
      return `dict of ${describeSignature(sig.key)} to ${describeSignature(sig.value)}`;
    case "Struct":
      return `struct (${sig.fields.map(describeSignature).join(", ")})`;
  }
}
