// Type grammar of the bus: basic codes plus array, dict, struct and variant containers.

export type IntegerCode = "y" | "n" | "q" | "i" | "u" | "x" | "t";

export type BasicCode = IntegerCode | "b" | "d" | "s" | "o" | "g" | "h";

export interface BasicSignature {
  readonly tag: "Basic";
  readonly code: BasicCode;
}

export interface ArraySignature {
  readonly tag: "Array";
  readonly element: TypeSignature;
}

/** `a{KV}`: an array of dict entries. A dict entry never appears on its own. */
export interface DictSignature {
  readonly tag: "Dict";
  readonly key: BasicSignature;
  readonly value: TypeSignature;
}

export interface StructSignature {
  readonly tag: "Struct";
  readonly fields: readonly TypeSignature[];
}

export interface VariantSignature {
  readonly tag: "Variant";
}

export type TypeSignature =
  | BasicSignature
  | ArraySignature
  | DictSignature
  | StructSignature
  | VariantSignature;

export type IntegerWidth = 8 | 16 | 32 | 64;

export interface IntegerLayout {
  width: IntegerWidth;
  signed: boolean;
}

export const INTEGER_LAYOUT: Record<IntegerCode, IntegerLayout> = {
  y: { width: 8, signed: false },
  n: { width: 16, signed: true },
  q: { width: 16, signed: false },
  i: { width: 32, signed: true },
  u: { width: 32, signed: false },
  x: { width: 64, signed: true },
  t: { width: 64, signed: false },
};

export const BASIC_NAMES: Record<BasicCode, string> = {
  y: "byte",
  b: "boolean",
  n: "int16",
  q: "uint16",
  i: "int32",
  u: "uint32",
  x: "int64",
  t: "uint64",
  d: "double",
  s: "string",
  o: "object path",
  g: "signature",
  h: "unix fd",
};

const BASIC_CODES = new Set<string>(Object.keys(BASIC_NAMES));

export function isBasicCode(c: string): c is BasicCode {
  return BASIC_CODES.has(c);
}

export function isIntegerCode(c: BasicCode): c is IntegerCode {
  return c in INTEGER_LAYOUT;
}

/** Inclusive bounds of an integer type. */
export function integerRange(layout: IntegerLayout): { min: bigint; max: bigint } {
  const bits = BigInt(layout.width);
  if (layout.signed) {
    return { min: -(1n << (bits - 1n)), max: (1n << (bits - 1n)) - 1n };
  }
  return { min: 0n, max: (1n << bits) - 1n };
}

/** Integer code for a width/sign pair; there is no signed 8-bit type. */
export function integerCodeFor(layout: IntegerLayout): IntegerCode | undefined {
  for (const [code, l] of Object.entries(INTEGER_LAYOUT)) {
    if (l.width === layout.width && l.signed === layout.signed && isBasicCode(code) && isIntegerCode(code)) {
      return code;
    }
  }
  return undefined;
}

// Constructors

export function basic(code: BasicCode): BasicSignature {
  return { tag: "Basic", code };
}

export function arrayOf(element: TypeSignature): ArraySignature {
  return { tag: "Array", element };
}

export function dictOf(key: BasicSignature, value: TypeSignature): DictSignature {
  return { tag: "Dict", key, value };
}

export function structOf(...fields: TypeSignature[]): StructSignature {
  return { tag: "Struct", fields };
}

export const VARIANT: VariantSignature = { tag: "Variant" };
