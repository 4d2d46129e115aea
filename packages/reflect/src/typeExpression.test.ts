import { UNIT_SHAPE, primitiveShape } from "@scale-kit/codec";
import { describe, expect, it } from "vitest";
import { ScaleParseError } from "./errors";
import { parseTypeExpression } from "./typeExpression";

describe("parseTypeExpression", () => {
  it("parses primitives and strings", () => {
    expect(parseTypeExpression("u128")).toEqual(primitiveShape("u128"));
    expect(parseTypeExpression("String")).toEqual({ kind: "str" });
    expect(parseTypeExpression(" bool ")).toEqual(primitiveShape("bool"));
  });

  it("parses nested containers", () => {
    expect(parseTypeExpression("Option<Vec<(u8, bool)>>")).toEqual({
      kind: "option",
      inner: {
        kind: "sequence",
        element: { kind: "tuple", elements: [primitiveShape("u8"), primitiveShape("bool")] },
      },
    });
    expect(parseTypeExpression("Result<(), u32>")).toEqual({ kind: "result", ok: UNIT_SHAPE, err: primitiveShape("u32") });
  });

  it("parses fixed arrays and compact integers", () => {
    expect(parseTypeExpression("[u8; 32]")).toEqual({ kind: "fixed-array", element: primitiveShape("u8"), length: 32 });
    expect(parseTypeExpression("Compact<u64>")).toEqual({ kind: "compact", inner: primitiveShape("u64") });
  });

  it("distinguishes parentheses from one-element tuples", () => {
    expect(parseTypeExpression("(u16)")).toEqual(primitiveShape("u16"));
    expect(parseTypeExpression("(u16,)")).toEqual({ kind: "tuple", elements: [primitiveShape("u16")] });
    expect(parseTypeExpression("()")).toEqual(UNIT_SHAPE);
  });

  it("maps maps and sets onto sequences", () => {
    expect(parseTypeExpression("BTreeMap<u8, str>")).toEqual({
      kind: "sequence",
      element: { kind: "tuple", elements: [primitiveShape("u8"), { kind: "str" }] },
    });
    expect(parseTypeExpression("BTreeSet<u32>")).toEqual({ kind: "sequence", element: primitiveShape("u32") });
  });

  it("keeps the bound of bounded vectors", () => {
    expect(parseTypeExpression("BoundedVec<u8, 1_024>")).toEqual({
      kind: "sequence",
      element: primitiveShape("u8"),
      bound: 1024,
    });
    expect(parseTypeExpression("WeakBoundedVec<u8>")).toEqual({ kind: "sequence", element: primitiveShape("u8") });
  });

  it("unwraps boxes and erases phantom data", () => {
    expect(parseTypeExpression("Box<u8>")).toEqual(primitiveShape("u8"));
    expect(parseTypeExpression("PhantomData<AccountId>")).toEqual(UNIT_SHAPE);
  });

  it("turns unknown names into references and declared names into parameters", () => {
    expect(parseTypeExpression("gear_core::ids::GasNode<_0, u128>", ["_0"])).toEqual({
      kind: "type-ref",
      name: "GasNode",
      args: [{ kind: "param", name: "_0" }, primitiveShape("u128")],
    });
    expect(parseTypeExpression("_0")).toEqual({ kind: "type-ref", name: "_0", args: [] });
  });

  it("rejects malformed expressions with their position", () => {
    try {
      parseTypeExpression("Vec<u8");
      expect.fail("expected a parse error");
    } catch (error) {
      expect(error).toBeInstanceOf(ScaleParseError);
      if (error instanceof ScaleParseError) {
        expect(error.code).toBe("PARSE_ERROR");
        expect(error.details).toEqual({ expression: "Vec<u8", position: 6 });
      }
    }
    expect(() => parseTypeExpression("u8 u16")).toThrow("Unexpected 'u16' after type in type expression 'u8 u16'");
    expect(() => parseTypeExpression("u8$")).toThrow(ScaleParseError);
    expect(() => parseTypeExpression("")).toThrow("Unexpected end of type expression");
  });

  it("checks argument counts of built-ins", () => {
    expect(() => parseTypeExpression("Option<u8, u16>")).toThrow("'Option' takes 1 type arguments, got 2");
    expect(() => parseTypeExpression("u8<u16>")).toThrow("'u8' takes 0 type arguments, got 1");
    expect(() => parseTypeExpression("Vec<4>")).toThrow("'Vec' does not take a numeric argument");
  });
});
