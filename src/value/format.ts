import { renderSignature, renderSignatureList } from "../signature/render";
import type { Value } from "./value";

/**
 * Render a value in the input grammar, so the text can be fed back to
 * parseValue against the value's own signature.
 */
export function formatValue(v: Value): string {
  switch (v.tag) {
    case "Bool":
      return v.value ? "true" : "false";
    case "Int":
      return v.value.toString();
    case "Double":
      return Object.is(v.value, -0) ? "-0" : String(v.value);
    case "Str":
      return JSON.stringify(v.value);
    case "ObjectPath":
      return v.value;
    case "Signature":
      return JSON.stringify(renderSignatureList(v.value));
    case "Array":
      return `[${v.items.map(formatValue).join(", ")}]`;
    case "Struct":
      return `(${v.fields.map(formatValue).join(", ")})`;
    case "Dict":
      return `{${v.entries.map(([k, val]) => `${formatValue(k)}: ${formatValue(val)}`).join(", ")}}`;
    case "Variant":
      return `<${renderSignature(v.signature)}>${formatValue(v.inner)}`;
  }
}
