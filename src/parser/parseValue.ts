// Signature-directed parser for operator-entered values.
//
//   bool      true | false
//   integers  -?[0-9]+ | -?0x[0-9a-fA-F]+         (range-checked per width)
//   double    [+-]?(d+[.d*] | .d+)([eE][+-]?d+)? | NaN | Infinity | -Infinity
//   string    "..." with \\ \/ \" \b \f \n \r \t \uXXXX
//   objpath   "/a/b" or bare /a/b
//   signature "a{sv}"
//   array     [e, e, ...]
//   struct    (v1, ..., vn)                       (exactly n fields)
//   dict      {k: v, ...}
//   variant   <sig>value

import { SignatureError } from "../errors";
import type { Outcome } from "../outcome/outcome";
import { arityMismatch, done, fail } from "../outcome/constructors";
import { wrapFailure } from "../outcome/failure";
import { mapOutcome } from "../outcome/matchers";
import type { BasicSignature, DictSignature, IntegerCode, StructSignature, TypeSignature } from "../signature/types";
import { INTEGER_LAYOUT, integerRange, isIntegerCode, structOf } from "../signature/types";
import { DEFAULT_MAX_DEPTH, parseSignature, parseSignatureList } from "../signature/parse";
import { describeSignature } from "../signature/render";
import type { DictEntry, Value } from "../value/value";
import { isObjectPath } from "../value/value";
import { formatValue } from "../value/format";
import { ValueParseError, parseErrorToFailure } from "./errors";

export interface ParseValueOptions {
  /** Maximum container nesting of the entered value, variants included. */
  maxDepth?: number;
}

const WORD_CHAR = /[A-Za-z0-9_.+-]/;
const PATH_CHAR = /[A-Za-z0-9_/]/;
const INTEGER = /^(-?)(?:0x([0-9a-fA-F]+)|([0-9]+))$/;
const DOUBLE = /^[+-]?(?:[0-9]+(?:\.[0-9]*)?|\.[0-9]+)(?:[eE][+-]?[0-9]+)?$/;
const SPECIAL_DOUBLES = new Set(["NaN", "Infinity", "-Infinity", "+Infinity"]);

const SIMPLE_ESCAPES: Record<string, string> = {
  "\\": "\\",
  "/": "/",
  "\"": "\"",
  b: "\b",
  f: "\f",
  n: "\n",
  r: "\r",
  t: "\t",
};

class ValueReader {
  pos = 0;

  constructor(
    private readonly src: string,
    private readonly maxDepth: number
  ) {}

  atEnd(): boolean {
    return this.pos >= this.src.length;
  }

  skipWs(): void {
    while (this.pos < this.src.length && /\s/.test(this.src[this.pos] ?? "")) {
      this.pos++;
    }
  }

  private peek(): string | undefined {
    return this.src[this.pos];
  }

  private unexpected(expected: string): ValueParseError {
    const c = this.peek();
    if (c === undefined) {
      return new ValueParseError("UnexpectedEnd", this.pos, expected);
    }
    return new ValueParseError("UnexpectedToken", this.pos, expected, c);
  }

  private expect(c: string, expected: string): void {
    this.skipWs();
    if (this.peek() !== c) throw this.unexpected(expected);
    this.pos++;
  }

  private readWord(): string {
    const start = this.pos;
    while (this.pos < this.src.length && WORD_CHAR.test(this.src[this.pos] ?? "")) {
      this.pos++;
    }
    return this.src.slice(start, this.pos);
  }

  read(sig: TypeSignature, depth: number): Value {
    if (depth > this.maxDepth) {
      throw new ValueParseError("NestingTooDeep", this.pos, `at most ${this.maxDepth} nested values`, String(this.maxDepth));
    }
    this.skipWs();
    switch (sig.tag) {
      case "Basic":
        return this.readBasic(sig);
      case "Array":
        return this.readArray(sig.element, depth);
      case "Dict":
        return this.readDict(sig, depth);
      case "Struct":
        return this.readStruct(sig, depth);
      case "Variant":
        return this.readVariant(depth);
    }
  }

  private readBasic(sig: BasicSignature): Value {
    const code = sig.code;
    const expected = describeSignature(sig);
    switch (code) {
      case "b":
        return this.readBool();
      case "d":
        return this.readDouble();
      case "s":
        return { tag: "Str", value: this.readString() };
      case "o":
        return this.readObjectPath();
      case "g":
        return this.readSignature();
      case "h":
        throw new ValueParseError("UnsupportedType", this.pos, expected);
    }
    if (isIntegerCode(code)) {
      return this.readInteger(code, expected);
    }
    throw this.unexpected(expected);
  }

  private readBool(): Value {
    const start = this.pos;
    const word = this.readWord();
    if (word === "true") return { tag: "Bool", value: true };
    if (word === "false") return { tag: "Bool", value: false };
    this.pos = start;
    throw this.unexpected("boolean");
  }

  private readInteger(code: IntegerCode, expected: string): Value {
    const start = this.pos;
    const word = this.readWord();
    const m = INTEGER.exec(word);
    if (!m) {
      this.pos = start;
      throw this.unexpected(expected);
    }
    const magnitude = m[2] !== undefined ? BigInt(`0x${m[2]}`) : BigInt(m[3] ?? "0");
    const n = m[1] === "-" ? -magnitude : magnitude;
    const layout = INTEGER_LAYOUT[code];
    const { min, max } = integerRange(layout);
    if (n < min || n > max) {
      throw new ValueParseError("IntegerOutOfRange", start, expected, word);
    }
    return { tag: "Int", width: layout.width, signed: layout.signed, value: n };
  }

  private readDouble(): Value {
    const start = this.pos;
    const word = this.readWord();
    if (DOUBLE.test(word) || SPECIAL_DOUBLES.has(word)) {
      return { tag: "Double", value: Number(word) };
    }
    this.pos = start;
    throw this.unexpected("double");
  }

  private readString(): string {
    if (this.peek() !== "\"") throw this.unexpected("quoted string");
    this.pos++;
    let s = "";
    while (true) {
      const c = this.peek();
      if (c === undefined) throw new ValueParseError("UnexpectedEnd", this.pos, "closing '\"'");
      if (c === "\"") {
        this.pos++;
        return s;
      }
      if (c === "\u0000") throw new ValueParseError("UnexpectedToken", this.pos, "string character", c);
      if (c !== "\\") {
        s += c;
        this.pos++;
        continue;
      }
      s += this.readEscape();
    }
  }

  private readEscape(): string {
    const at = this.pos;
    const e = this.src[this.pos + 1];
    if (e === undefined) throw new ValueParseError("UnexpectedEnd", this.pos + 1, "escape sequence");
    const simple = SIMPLE_ESCAPES[e];
    if (simple !== undefined) {
      this.pos += 2;
      return simple;
    }
    if (e === "u") {
      const hex = this.src.slice(this.pos + 2, this.pos + 6);
      if (!/^[0-9a-fA-F]{4}$/.test(hex) || hex === "0000") {
        throw new ValueParseError("InvalidEscape", at, "escape sequence", `\\u${hex}`);
      }
      this.pos += 6;
      return String.fromCharCode(parseInt(hex, 16));
    }
    throw new ValueParseError("InvalidEscape", at, "escape sequence", `\\${e}`);
  }

  private readObjectPath(): Value {
    const start = this.pos;
    let path: string;
    if (this.peek() === "\"") {
      path = this.readString();
    } else if (this.peek() === "/") {
      while (this.pos < this.src.length && PATH_CHAR.test(this.src[this.pos] ?? "")) {
        this.pos++;
      }
      path = this.src.slice(start, this.pos);
    } else {
      throw this.unexpected("object path");
    }
    if (!isObjectPath(path)) {
      throw new ValueParseError("InvalidObjectPath", start, "object path", path);
    }
    return { tag: "ObjectPath", value: path };
  }

  private readSignature(): Value {
    const start = this.pos;
    const text = this.readString();
    try {
      return { tag: "Signature", value: parseSignatureList(text, { maxDepth: this.maxDepth }) };
    } catch (e) {
      if (e instanceof SignatureError) {
        throw new ValueParseError("InvalidSignature", start, "signature", text);
      }
      throw e;
    }
  }

  private readArray(element: TypeSignature, depth: number): Value {
    this.expect("[", "'['");
    const items: Value[] = [];
    this.skipWs();
    if (this.peek() === "]") {
      this.pos++;
      return { tag: "Array", element, items };
    }
    while (true) {
      items.push(this.read(element, depth + 1));
      this.skipWs();
      const c = this.peek();
      if (c === ",") {
        this.pos++;
        continue;
      }
      if (c === "]") {
        this.pos++;
        return { tag: "Array", element, items };
      }
      throw this.unexpected("',' or ']'");
    }
  }

  private readStruct(sig: StructSignature, depth: number): Value {
    this.expect("(", "'('");
    const arity = sig.fields.length;
    const fields: Value[] = [];
    for (const [i, fieldSig] of sig.fields.entries()) {
      this.skipWs();
      if (this.peek() === ")") {
        throw new ValueParseError("ArityMismatch", this.pos, `${arity} field(s)`, String(i));
      }
      if (i > 0) this.expect(",", "','");
      fields.push(this.read(fieldSig, depth + 1));
    }
    this.skipWs();
    if (this.peek() === ",") {
      throw new ValueParseError("ArityMismatch", this.pos, `${arity} field(s)`, `more than ${arity}`);
    }
    this.expect(")", "')'");
    return { tag: "Struct", fields };
  }

  private readDict(sig: DictSignature, depth: number): Value {
    this.expect("{", "'{'");
    const entries: DictEntry[] = [];
    const seen = new Set<string>();
    this.skipWs();
    if (this.peek() === "}") {
      this.pos++;
      return { tag: "Dict", key: sig.key, value: sig.value, entries };
    }
    while (true) {
      this.skipWs();
      const keyStart = this.pos;
      const key = this.read(sig.key, depth + 1);
      const keyText = formatValue(key);
      if (seen.has(keyText)) {
        throw new ValueParseError("DuplicateKey", keyStart, "distinct keys", keyText);
      }
      seen.add(keyText);
      this.expect(":", "':'");
      const value = this.read(sig.value, depth + 1);
      entries.push([key, value]);
      this.skipWs();
      const c = this.peek();
      if (c === ",") {
        this.pos++;
        continue;
      }
      if (c === "}") {
        this.pos++;
        return { tag: "Dict", key: sig.key, value: sig.value, entries };
      }
      throw this.unexpected("',' or '}'");
    }
  }

  private readVariant(depth: number): Value {
    this.expect("<", "'<' starting a variant signature");
    const start = this.pos;
    const close = this.src.indexOf(">", start);
    if (close < 0) throw new ValueParseError("UnexpectedEnd", this.src.length, "'>'");
    const text = this.src.slice(start, close).trim();
    let inner: TypeSignature;
    try {
      inner = parseSignature(text, { maxDepth: this.maxDepth });
    } catch (e) {
      if (e instanceof SignatureError) {
        throw new ValueParseError("InvalidSignature", start, "single complete type", text);
      }
      throw e;
    }
    this.pos = close + 1;
    return { tag: "Variant", signature: inner, inner: this.read(inner, depth + 1) };
  }
}

/**
 * Parse operator text against a target signature. Never throws for bad
 * input: every failure comes back as a Fail carrying the offset and what
 * was expected there.
 */
export function parseValue(text: string, sig: TypeSignature, opts: ParseValueOptions = {}): Outcome<Value> {
  const reader = new ValueReader(text, opts.maxDepth ?? DEFAULT_MAX_DEPTH);
  try {
    const value = reader.read(sig, 0);
    reader.skipWs();
    if (!reader.atEnd()) {
      throw new ValueParseError("TrailingInput", reader.pos, "end of input", text.slice(reader.pos));
    }
    return done(value, { span: { start: 0, end: text.length } });
  } catch (e) {
    if (e instanceof ValueParseError) {
      return fail(parseErrorToFailure(e));
    }
    throw e;
  }
}

/**
 * Parse a method's whole input from one field: nothing (or `()`) for no
 * arguments, the bare value for one, a struct literal for several.
 */
export function parseArguments(
  text: string,
  inArgs: readonly TypeSignature[],
  opts: ParseValueOptions = {}
): Outcome<Value[]> {
  const [first, ...rest] = inArgs;
  if (first === undefined) {
    const trimmed = text.trim();
    if (trimmed === "" || /^\(\s*\)$/.test(trimmed)) return done([]);
    const offset = text.length - text.trimStart().length;
    return fail(parseErrorToFailure(new ValueParseError("TrailingInput", offset, "no arguments", trimmed)));
  }
  if (rest.length === 0) {
    return mapOutcome(parseValue(text, first, opts), (v) => [v]);
  }
  return mapOutcome(parseValue(text, structOf(...inArgs), opts), (v) => (v.tag === "Struct" ? [...v.fields] : [v]));
}

/**
 * Parse one field per argument. A failure names the 0-based argument
 * index in its context.
 */
export function parseArgumentFields(
  texts: readonly string[],
  inArgs: readonly TypeSignature[],
  opts: ParseValueOptions = {}
): Outcome<Value[]> {
  if (texts.length !== inArgs.length) {
    return arityMismatch(inArgs.length, texts.length);
  }
  const values: Value[] = [];
  for (const [i, sig] of inArgs.entries()) {
    const parsed = parseValue(texts[i] ?? "", sig, opts);
    if (parsed.tag === "Fail") {
      return fail(wrapFailure(parsed.failure, `argument ${i + 1}: ${parsed.failure.message}`, { argument: i }));
    }
    values.push(parsed.value);
  }
  return done(values);
}
