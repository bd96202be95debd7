import { describe, expect, test } from "vitest";
import { collectValueStructs, formatScalar, initialValues } from "../../src/interp/values.ts";
import { SCALAR_TYPE, arrayType, structType } from "../../src/ir/types.ts";

describe("initialValues", () => {
  test("numbers scalar slots depth first across parameters", () => {
    const s0 = structType("s0", [SCALAR_TYPE, arrayType(SCALAR_TYPE, 1)]);
    expect(initialValues([SCALAR_TYPE, arrayType(SCALAR_TYPE, 2), s0])).toEqual([
      0,
      [1, 2],
      { struct: "s0", values: [3, [4]] },
    ]);
  });

  test("nested structs", () => {
    const inner = structType("s0", [SCALAR_TYPE]);
    const outer = structType("s1", [arrayType(inner, 2), SCALAR_TYPE]);
    const [value] = initialValues([outer]);
    expect(value).toEqual({
      struct: "s1",
      values: [[{ struct: "s0", values: [0] }, { struct: "s0", values: [1] }], 2],
    });
    const names = new Set<string>();
    collectValueStructs(value, names);
    expect([...names]).toEqual(["s1", "s0"]);
  });
});

describe("formatScalar", () => {
  test.each([
    [0, "0.0"],
    [3, "3.0"],
    [-4, "-4.0"],
    [2.5, "2.5"],
    [-0, "-0.0"],
    [1e21, "1e+21"],
    [Infinity, "inf"],
    [-Infinity, "-inf"],
    [NaN, "nan"],
  ])("%d prints as %s", (n, text) => {
    expect(formatScalar(n)).toBe(text);
  });
});
