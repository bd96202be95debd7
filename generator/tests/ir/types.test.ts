import { describe, expect, test } from "vitest";
import { SCALAR_TYPE, arrayDepth, arrayType, collectStructNames, structType, typeKey, typesEqual } from "../../src/ir/types.ts";

describe("types", () => {
  const s0 = structType("s0", [SCALAR_TYPE]);
  const s1 = structType("s1", [arrayType(s0, 2)]);

  test("arrays are structural, structs nominal", () => {
    expect(typesEqual(arrayType(SCALAR_TYPE, 3), arrayType(SCALAR_TYPE, 3))).toBe(true);
    expect(typesEqual(arrayType(SCALAR_TYPE, 3), arrayType(SCALAR_TYPE, 2))).toBe(false);
    expect(typesEqual(s0, structType("s0", [SCALAR_TYPE, SCALAR_TYPE]))).toBe(true);
    expect(typesEqual(s0, structType("s2", [SCALAR_TYPE]))).toBe(false);
  });

  test("keys spell the type", () => {
    expect(typeKey(SCALAR_TYPE)).toBe("f64");
    expect(typeKey(arrayType(arrayType(SCALAR_TYPE, 1), 3))).toBe("[[f64; 1]; 3]");
    expect(typeKey(s1)).toBe("s1");
  });

  test("collects nested struct names", () => {
    expect([...collectStructNames(s1)]).toEqual(["s1", "s0"]);
    expect(collectStructNames(SCALAR_TYPE).size).toBe(0);
  });

  test("measures array depth", () => {
    expect(arrayDepth(SCALAR_TYPE)).toBe(0);
    expect(arrayDepth(arrayType(arrayType(SCALAR_TYPE, 1), 3))).toBe(2);
    expect(arrayDepth(arrayType(s1, 1))).toBe(1);
  });
});
