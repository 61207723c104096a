import type {
  BasicSignature,
  IntegerCode,
  IntegerWidth,
  TypeSignature,
} from "../signature/types";
import { INTEGER_LAYOUT, integerCodeFor, integerRange } from "../signature/types";
import { renderSignature, signatureEquals } from "../signature/render";

export interface BoolValue {
  readonly tag: "Bool";
  readonly value: boolean;
}

export interface IntValue {
  readonly tag: "Int";
  readonly width: IntegerWidth;
  readonly signed: boolean;
  readonly value: bigint;
}

export interface DoubleValue {
  readonly tag: "Double";
  readonly value: number;
}

export interface StrValue {
  readonly tag: "Str";
  readonly value: string;
}

export interface ObjectPathValue {
  readonly tag: "ObjectPath";
  readonly value: string;
}

export interface SignatureValue {
  readonly tag: "Signature";
  readonly value: readonly TypeSignature[];
}

export interface ArrayValue {
  readonly tag: "Array";
  readonly element: TypeSignature;
  readonly items: readonly Value[];
}

export interface StructValue {
  readonly tag: "Struct";
  readonly fields: readonly Value[];
}

export type DictEntry = readonly [Value, Value];

export interface DictValue {
  readonly tag: "Dict";
  readonly key: BasicSignature;
  readonly value: TypeSignature;
  readonly entries: readonly DictEntry[];
}

export interface VariantValue {
  readonly tag: "Variant";
  readonly signature: TypeSignature;
  readonly inner: Value;
}

export type Value =
  | BoolValue
  | IntValue
  | DoubleValue
  | StrValue
  | ObjectPathValue
  | SignatureValue
  | ArrayValue
  | StructValue
  | DictValue
  | VariantValue;

const OBJECT_PATH = /^\/$|^(\/[A-Za-z0-9_]+)+$/;

export function isObjectPath(s: string): boolean {
  return OBJECT_PATH.test(s);
}

/** The one signature a value conforms to. */
export function signatureOf(v: Value): TypeSignature {
  switch (v.tag) {
    case "Bool":
      return { tag: "Basic", code: "b" };
    case "Int": {
      const code = integerCodeFor(v);
      if (code === undefined) {
        throw new TypeError(`No integer type is ${v.width} bits ${v.signed ? "signed" : "unsigned"}`);
      }
      return { tag: "Basic", code };
    }
    case "Double":
      return { tag: "Basic", code: "d" };
    case "Str":
      return { tag: "Basic", code: "s" };
    case "ObjectPath":
      return { tag: "Basic", code: "o" };
    case "Signature":
      return { tag: "Basic", code: "g" };
    case "Array":
      return { tag: "Array", element: v.element };
    case "Dict":
      return { tag: "Dict", key: v.key, value: v.value };
    case "Struct":
      return { tag: "Struct", fields: v.fields.map(signatureOf) };
    case "Variant":
      return { tag: "Variant" };
  }
}

// Constructors. Each one rejects a shape that would not conform to its
// signature; reaching one of those throws is a programming error.

export function bool(value: boolean): BoolValue {
  return { tag: "Bool", value };
}

export function int(code: IntegerCode, value: bigint | number): IntValue {
  const layout = INTEGER_LAYOUT[code];
  const n = typeof value === "bigint" ? value : BigInt(value);
  const { min, max } = integerRange(layout);
  if (n < min || n > max) {
    throw new RangeError(`${n} does not fit signature '${code}'`);
  }
  return { tag: "Int", width: layout.width, signed: layout.signed, value: n };
}

export function double(value: number): DoubleValue {
  return { tag: "Double", value };
}

export function str(value: string): StrValue {
  if (value.includes("\u0000")) {
    throw new TypeError("Strings cannot contain NUL");
  }
  return { tag: "Str", value };
}

export function objectPath(value: string): ObjectPathValue {
  if (!isObjectPath(value)) {
    throw new TypeError(`Invalid object path: ${value}`);
  }
  return { tag: "ObjectPath", value };
}

export function signatureValue(value: readonly TypeSignature[]): SignatureValue {
  return { tag: "Signature", value };
}

export function array(element: TypeSignature, items: readonly Value[]): ArrayValue {
  for (const item of items) {
    assertConforms(item, element);
  }
  return { tag: "Array", element, items };
}

export function struct(fields: readonly Value[]): StructValue {
  if (fields.length === 0) {
    throw new TypeError("A struct has at least one field");
  }
  return { tag: "Struct", fields };
}

export function dict(key: BasicSignature, value: TypeSignature, entries: readonly DictEntry[]): DictValue {
  for (const [k, v] of entries) {
    assertConforms(k, key);
    assertConforms(v, value);
  }
  return { tag: "Dict", key, value, entries };
}

export function variant(inner: Value): VariantValue {
  return { tag: "Variant", signature: signatureOf(inner), inner };
}

function assertConforms(v: Value, sig: TypeSignature): void {
  if (!conforms(v, sig)) {
    throw new TypeError(`Value does not conform to '${renderSignature(sig)}'`);
  }
}

/**
 * Precondition gate for anything about to be sent on the wire.
 */
export function conforms(v: Value, sig: TypeSignature): boolean {
  switch (sig.tag) {
    case "Basic":
      switch (sig.code) {
        case "b":
          return v.tag === "Bool";
        case "d":
          return v.tag === "Double";
        case "s":
          return v.tag === "Str" && !v.value.includes("\u0000");
        case "o":
          return v.tag === "ObjectPath" && isObjectPath(v.value);
        case "g":
          return v.tag === "Signature";
        case "h":
          return false;
        default: {
          if (v.tag !== "Int") return false;
          const layout = INTEGER_LAYOUT[sig.code];
          if (v.width !== layout.width || v.signed !== layout.signed) return false;
          const { min, max } = integerRange(layout);
          return v.value >= min && v.value <= max;
        }
      }
    case "Variant":
      return v.tag === "Variant" && conforms(v.inner, v.signature);
    case "Array":
      return (
        v.tag === "Array" &&
        signatureEquals(v.element, sig.element) &&
        v.items.every((item) => conforms(item, sig.element))
      );
    case "Dict":
      return (
        v.tag === "Dict" &&
        v.key.code === sig.key.code &&
        signatureEquals(v.value, sig.value) &&
        v.entries.every(([k, val]) => conforms(k, sig.key) && conforms(val, sig.value))
      );
    case "Struct":
      return (
        v.tag === "Struct" &&
        v.fields.length === sig.fields.length &&
        v.fields.every((f, i) => {
          const fieldSig = sig.fields[i];
          return fieldSig !== undefined && conforms(f, fieldSig);
        })
      );
  }
}

