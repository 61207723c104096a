// test/value/value.spec.ts
// Tests for typed values: constructors, conformance and formatting

import { describe, it, expect } from "vitest";
import {
  array,
  bool,
  conforms,
  dict,
  double,
  formatValue,
  int,
  isObjectPath,
  objectPath,
  signatureOf,
  signatureValue,
  str,
  struct,
  variant,
} from "../../src/value";
import type { Value } from "../../src/value";
import { parseValue } from "../../src/parser/parseValue";
import { basic, parseSignature, parseSignatureList, renderSignature, VARIANT } from "../../src/signature";

describe("value constructors", () => {
  it("range-checks integers", () => {
    expect(int("y", 255).value).toBe(255n);
    expect(() => int("y", 256)).toThrow(RangeError);
    expect(() => int("u", -1)).toThrow("-1 does not fit signature 'u'");
    expect(int("x", -9223372036854775808n).value).toBe(-9223372036854775808n);
  });

  it("rejects strings with NUL", () => {
    expect(() => str("a\u0000b")).toThrow("Strings cannot contain NUL");
  });

  it("validates object paths", () => {
    expect(isObjectPath("/")).toBe(true);
    expect(isObjectPath("/org/example/Obj_1")).toBe(true);
    expect(isObjectPath("/org/")).toBe(false);
    expect(isObjectPath("org/example")).toBe(false);
    expect(isObjectPath("/org//example")).toBe(false);
    expect(() => objectPath("/bad-name")).toThrow("Invalid object path: /bad-name");
  });

  it("rejects array items of another type", () => {
    expect(() => array(basic("i"), [str("x")])).toThrow("Value does not conform to 'i'");
  });

  it("rejects an empty struct", () => {
    expect(() => struct([])).toThrow("A struct has at least one field");
  });

  it("records the inner signature of a variant", () => {
    const v = variant(array(basic("s"), [str("a")]));
    expect(renderSignature(v.signature)).toBe("as");
  });
});

describe("conforms", () => {
  it("matches integers by width and sign", () => {
    expect(conforms(int("i", 5), basic("i"))).toBe(true);
    expect(conforms(int("i", 5), basic("u"))).toBe(false);
    expect(conforms(int("u", 5), basic("x"))).toBe(false);
  });

  it("checks container element signatures", () => {
    const ints = array(basic("i"), [int("i", 1), int("i", 2)]);
    expect(conforms(ints, parseSignature("ai"))).toBe(true);
    expect(conforms(ints, parseSignature("au"))).toBe(false);
  });

  it("checks struct arity", () => {
    const pair = struct([int("i", 1), str("a")]);
    expect(conforms(pair, parseSignature("(is)"))).toBe(true);
    expect(conforms(pair, parseSignature("(isi)"))).toBe(false);
  });

  it("accepts any conforming variant", () => {
    expect(conforms(variant(bool(true)), VARIANT)).toBe(true);
    expect(conforms(bool(true), VARIANT)).toBe(false);
  });

  it("never accepts values for unix fds", () => {
    expect(conforms(int("u", 3), basic("h"))).toBe(false);
  });

  it("agrees with signatureOf", () => {
    const samples = [
      bool(false),
      int("n", -3),
      double(1.5),
      str("x"),
      objectPath("/a"),
      signatureValue(parseSignatureList("a{sv}")),
      dict(basic("s"), VARIANT, [[str("k"), variant(int("t", 1))]]),
      struct([int("q", 1), array(basic("o"), [])]),
    ];
    for (const v of samples) {
      expect(conforms(v, signatureOf(v))).toBe(true);
    }
  });
});

describe("formatValue", () => {
  it("writes basic values in input syntax", () => {
    expect(formatValue(bool(true))).toBe("true");
    expect(formatValue(int("x", -12))).toBe("-12");
    expect(formatValue(double(0.25))).toBe("0.25");
    expect(formatValue(str('say "hi"\n'))).toBe('"say \\"hi\\"\\n"');
    expect(formatValue(objectPath("/org/example"))).toBe("/org/example");
    expect(formatValue(signatureValue(parseSignatureList("a{sv}i")))).toBe('"a{sv}i"');
  });

  it("writes containers", () => {
    expect(formatValue(array(basic("i"), [int("i", 1), int("i", 2)]))).toBe("[1, 2]");
    expect(formatValue(struct([int("i", 2), str("b")]))).toBe('(2, "b")');
    expect(formatValue(dict(basic("s"), basic("u"), [[str("a"), int("u", 1)]]))).toBe('{"a": 1}');
    expect(formatValue(variant(array(basic("y"), [int("y", 7)])))).toBe("<ay>[7]");
  });

  it("keeps the sign of negative zero", () => {
    expect(formatValue(double(-0))).toBe("-0");
    expect(formatValue(double(0))).toBe("0");
  });

  it("writes text that parses back to the same value", () => {
    const samples: Value[] = [
      bool(false),
      int("y", 255),
      int("n", -32768),
      int("t", 18446744073709551615n),
      double(-0),
      double(Number.NaN),
      double(Number.NEGATIVE_INFINITY),
      double(-2.5e-8),
      str('tab\there "quoted" back\\slash\nnext \u0001'),
      objectPath("/"),
      signatureValue(parseSignatureList("a{sv}(io)")),
      array(basic("s"), []),
      dict(basic("s"), VARIANT, [
        [str("inner"), variant(variant(int("q", 3)))],
        [str("list"), variant(array(basic("d"), [double(0.5)]))],
      ]),
      struct([int("i", -1), dict(basic("o"), basic("b"), [[objectPath("/a/b"), bool(true)]])]),
    ];
    for (const v of samples) {
      const back = parseValue(formatValue(v), signatureOf(v));
      expect(back.tag === "Done" && back.value).toEqual(v);
    }
  });
});
