/**
 * Conversion between Value and the plain JS shapes dbus-next reads and writes:
 * numbers (bigint for 64-bit), strings, booleans, arrays for arrays and
 * structs, Buffer for `ay`, objects for dicts and Variant for variants.
 */

import { Variant } from "dbus-next";
import type { BasicSignature, TypeSignature } from "../../signature/types";
import { isIntegerCode } from "../../signature/types";
import { parseSignature, parseSignatureList } from "../../signature/parse";
import { renderSignature, renderSignatureList } from "../../signature/render";
import type { DictEntry, Value } from "../../value/value";
import { array, bool, dict, double, int, objectPath, signatureValue, str, struct } from "../../value/value";

export function toWire(v: Value): unknown {
  switch (v.tag) {
    case "Bool":
    case "Double":
    case "Str":
    case "ObjectPath":
      return v.value;
    case "Int":
      return v.width === 64 ? v.value : Number(v.value);
    case "Signature":
      return renderSignatureList(v.value);
    case "Array":
      if (v.element.tag === "Basic" && v.element.code === "y") {
        return Buffer.from(v.items.map((item) => (item.tag === "Int" ? Number(item.value) : 0)));
      }
      return v.items.map(toWire);
    case "Struct":
      return v.fields.map(toWire);
    case "Dict": {
      const out: Record<string, unknown> = {};
      for (const [k, val] of v.entries) {
        out[keyText(k)] = toWire(val);
      }
      return out;
    }
    case "Variant":
      return new Variant(renderSignature(v.signature), toWire(v.inner));
  }
}

function keyText(k: Value): string {
  switch (k.tag) {
    case "Bool":
    case "Double":
    case "Int":
      return String(k.value);
    case "Str":
    case "ObjectPath":
      return k.value;
    case "Signature":
      return renderSignatureList(k.value);
    default:
      throw new TypeError(`Dict key cannot be a ${k.tag}`);
  }
}

function mismatch(sig: TypeSignature, raw: unknown): TypeError {
  const shape = raw === null ? "null" : Array.isArray(raw) ? "array" : typeof raw;
  return new TypeError(`Reply value of type ${shape} does not match '${renderSignature(sig)}'`);
}

function isRecord(u: unknown): u is Record<string, unknown> {
  return typeof u === "object" && u !== null && !Array.isArray(u);
}

function basicFromWire(sig: BasicSignature, raw: unknown): Value {
  const code = sig.code;
  if (isIntegerCode(code)) {
    if (typeof raw === "bigint") return int(code, raw);
    if (typeof raw === "number" && Number.isInteger(raw)) return int(code, raw);
    // Dict keys arrive as object property names.
    if (typeof raw === "string" && /^-?\d+$/.test(raw)) return int(code, BigInt(raw));
    throw mismatch(sig, raw);
  }
  switch (code) {
    case "b":
      if (typeof raw === "boolean") return bool(raw);
      if (raw === "true" || raw === "false") return bool(raw === "true");
      throw mismatch(sig, raw);
    case "d":
      if (typeof raw === "number") return double(raw);
      if (typeof raw === "string" && raw.trim() !== "" && !Number.isNaN(Number(raw))) return double(Number(raw));
      throw mismatch(sig, raw);
    case "s":
      if (typeof raw === "string") return str(raw);
      throw mismatch(sig, raw);
    case "o":
      if (typeof raw === "string") return objectPath(raw);
      throw mismatch(sig, raw);
    case "g":
      if (typeof raw === "string") return signatureValue(parseSignatureList(raw));
      throw mismatch(sig, raw);
    case "h":
      throw new TypeError("Unix file descriptors are not supported");
  }
}

function entriesOf(raw: unknown): Array<[unknown, unknown]> | undefined {
  if (raw instanceof Map) return [...raw.entries()];
  if (isRecord(raw)) return Object.entries(raw);
  return undefined;
}

/**
 * Read a dbus-next value as `sig`.
 *
 * @throws TypeError when the shape does not match
 */
export function fromWire(sig: TypeSignature, raw: unknown): Value {
  switch (sig.tag) {
    case "Basic":
      return basicFromWire(sig, raw);
    case "Array": {
      if (raw instanceof Uint8Array) {
        return array(sig.element, [...raw].map((b) => fromWire(sig.element, b)));
      }
      if (!Array.isArray(raw)) throw mismatch(sig, raw);
      return array(sig.element, raw.map((item: unknown) => fromWire(sig.element, item)));
    }
    case "Struct": {
      if (!Array.isArray(raw) || raw.length !== sig.fields.length) throw mismatch(sig, raw);
      return struct(sig.fields.map((f, i): Value => fromWire(f, raw[i])));
    }
    case "Dict": {
      const entries = entriesOf(raw);
      if (!entries) throw mismatch(sig, raw);
      return dict(
        sig.key,
        sig.value,
        entries.map(([k, v]): DictEntry => [basicFromWire(sig.key, k), fromWire(sig.value, v)]),
      );
    }
    case "Variant": {
      if (!isRecord(raw) || typeof raw.signature !== "string") throw mismatch(sig, raw);
      const inner = parseSignature(raw.signature);
      return { tag: "Variant", signature: inner, inner: fromWire(inner, raw.value) };
    }
  }
}

/** Read a whole message body against its signature string. */
export function bodyFromWire(signature: string, body: readonly unknown[]): Value[] {
  const sigs = parseSignatureList(signature);
  if (sigs.length !== body.length) {
    throw new TypeError(`Reply has ${body.length} value(s) for signature '${signature}'`);
  }
  return sigs.map((s, i) => fromWire(s, body[i]));
}
