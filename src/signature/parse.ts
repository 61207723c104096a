import { SignatureError } from "../errors";
import type { BasicSignature, TypeSignature } from "./types";
import { VARIANT, arrayOf, basic, dictOf, isBasicCode, structOf } from "./types";

export const MAX_SIGNATURE_LENGTH = 255;
export const DEFAULT_MAX_DEPTH = 32;

export interface SignatureOptions {
  /** Maximum number of nested containers. */
  maxDepth?: number;
}

class SignatureReader {
  pos = 0;

  constructor(
    private readonly src: string,
    private readonly maxDepth: number
  ) {}

  atEnd(): boolean {
    return this.pos >= this.src.length;
  }

  malformed(detail: string, at = this.pos): SignatureError {
    return new SignatureError("MalformedSignature", at, detail);
  }

  enter(depth: number): void {
    if (depth >= this.maxDepth) {
      throw new SignatureError("SignatureTooDeep", this.pos, `more than ${this.maxDepth} nested containers`);
    }
  }

  readComplete(depth: number): TypeSignature {
    const c = this.src[this.pos];
    if (c === undefined) throw this.malformed("unexpected end of signature");

    if (isBasicCode(c)) {
      this.pos++;
      return basic(c);
    }

    switch (c) {
      case "v":
        this.pos++;
        return VARIANT;
      case "a":
        return this.readArray(depth);
      case "(":
        return this.readStruct(depth);
      case "{":
        throw this.malformed("dict entry outside an array");
      case ")":
      case "}":
        throw this.malformed(`unexpected '${c}'`);
      default:
        throw this.malformed(`unknown type code '${c}'`);
    }
  }

  private readArray(depth: number): TypeSignature {
    this.enter(depth);
    this.pos++;
    if (this.atEnd()) throw this.malformed("array without element type");
    if (this.src[this.pos] === "{") {
      return this.readDictEntry(depth + 1);
    }
    return arrayOf(this.readComplete(depth + 1));
  }

  private readDictEntry(depth: number): TypeSignature {
    this.enter(depth);
    const open = this.pos;
    this.pos++;
    const key = this.readDictKey();
    if (this.atEnd() || this.src[this.pos] === "}") {
      throw this.malformed("dict entry must contain exactly two types");
    }
    const value = this.readComplete(depth + 1);
    if (this.atEnd()) throw this.malformed("unterminated dict entry", open);
    if (this.src[this.pos] !== "}") {
      throw this.malformed("dict entry must contain exactly two types");
    }
    this.pos++;
    return dictOf(key, value);
  }

  private readDictKey(): BasicSignature {
    const c = this.src[this.pos];
    if (c === undefined) throw this.malformed("unterminated dict entry");
    if (c === "}") throw this.malformed("dict entry must contain exactly two types");
    if (!isBasicCode(c)) throw this.malformed("dict key must be a basic type");
    this.pos++;
    return basic(c);
  }

  private readStruct(depth: number): TypeSignature {
    this.enter(depth);
    const open = this.pos;
    this.pos++;
    const fields: TypeSignature[] = [];
    while (true) {
      if (this.atEnd()) throw this.malformed("unterminated struct", open);
      if (this.src[this.pos] === ")") {
        if (fields.length === 0) throw this.malformed("empty struct");
        this.pos++;
        return structOf(...fields);
      }
      fields.push(this.readComplete(depth + 1));
    }
  }
}

function checkLength(text: string): void {
  if (text.length > MAX_SIGNATURE_LENGTH) {
    throw new SignatureError(
      "MalformedSignature",
      MAX_SIGNATURE_LENGTH,
      `signature longer than ${MAX_SIGNATURE_LENGTH} characters`
    );
  }
}

/**
 * Parse a signature holding exactly one complete type.
 * @throws SignatureError
 */
export function parseSignature(text: string, opts: SignatureOptions = {}): TypeSignature {
  checkLength(text);
  const reader = new SignatureReader(text, opts.maxDepth ?? DEFAULT_MAX_DEPTH);
  if (reader.atEnd()) throw reader.malformed("empty signature");
  const sig = reader.readComplete(0);
  if (!reader.atEnd()) throw reader.malformed("expected a single complete type");
  return sig;
}

/**
 * Parse a signature holding zero or more complete types, as used for
 * method argument lists and `g` values.
 * @throws SignatureError
 */
export function parseSignatureList(text: string, opts: SignatureOptions = {}): TypeSignature[] {
  checkLength(text);
  const reader = new SignatureReader(text, opts.maxDepth ?? DEFAULT_MAX_DEPTH);
  const out: TypeSignature[] = [];
  while (!reader.atEnd()) {
    out.push(reader.readComplete(0));
  }
  return out;
}
