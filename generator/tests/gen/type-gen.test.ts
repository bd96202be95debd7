import { describe, expect, test } from "vitest";
import { DEFAULT_CONFIG } from "../../src/config/index.ts";
import { MIN_ARRAY_BUDGET, generateType } from "../../src/gen/type-gen.ts";
import type { Type } from "../../src/ir/ir-types/index.ts";
import { SCALAR_TYPE, arrayDepth, structType } from "../../src/ir/types.ts";
import { Random } from "../../src/random/rng.ts";

function sample(seed: string, arrayBudget: number, n: number, structs = [structType("s0", [SCALAR_TYPE])]): Type[] {
  const rng = Random.fromSeed(seed);
  return Array.from({ length: n }, () =>
    generateType(rng, { weights: DEFAULT_CONFIG.typeWeights, arrayBudget, structs })
  );
}

describe("generateType", () => {
  test("no array below the minimum budget", () => {
    for (const t of sample("low", MIN_ARRAY_BUDGET - 1, 2000)) {
      expect(t.kind).not.toBe("array");
    }
  });

  test("a budget that halves below the minimum never nests arrays", () => {
    const types = sample("nest", 7, 2000);
    for (const t of types) {
      expect(arrayDepth(t)).toBeLessThanOrEqual(1);
      // length is drawn from [1, floor(7 / 2))
      if (t.kind === "array") expect([1, 2]).toContain(t.length);
    }
    expect(types.some((t) => t.kind === "array")).toBe(true);
  });

  test("the default budget allows at most two levels", () => {
    for (const t of sample("default", DEFAULT_CONFIG.arrayLimit, 2000)) {
      expect(arrayDepth(t)).toBeLessThanOrEqual(2);
      if (t.kind === "array" && t.element.kind === "array") {
        // inner arrays get budget 2, so their length is always 1
        expect(t.element.length).toBe(1);
      }
    }
  });

  test("structs only when some are declared", () => {
    for (const t of sample("nostruct", 8, 1000, [])) {
      expect(t.kind).not.toBe("struct");
    }
    const declared = structType("s3", [SCALAR_TYPE]);
    const types = sample("struct", 2, 500, [declared]);
    expect(types.filter((t) => t.kind === "struct").every((t) => t === declared)).toBe(true);
    expect(types.some((t) => t.kind === "struct")).toBe(true);
  });
});
