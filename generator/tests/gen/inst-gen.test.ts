import { describe, expect, test } from "vitest";
import { DEFAULT_CONFIG } from "../../src/config/index.ts";
import { type BodyContext, collectCandidates, generateInst, legalInstKinds } from "../../src/gen/inst-gen.ts";
import { NameEnv } from "../../src/gen/name-env.ts";
import type { FuncSignature, StructType } from "../../src/ir/ir-types/index.ts";
import { SCALAR_TYPE, arrayType, structType } from "../../src/ir/types.ts";
import { Random } from "../../src/random/rng.ts";

const f0: FuncSignature = { ordinal: 0, name: "f0", returnType: SCALAR_TYPE, params: [SCALAR_TYPE] };
const f1: FuncSignature = { ordinal: 1, name: "f1", returnType: SCALAR_TYPE, params: [SCALAR_TYPE] };

function context(signatures: FuncSignature[], structs: StructType[] = [], self = f0): BodyContext {
  const env = new NameEnv();
  for (const p of self.params) env.declare(p);
  return { rng: Random.fromSeed("inst"), config: DEFAULT_CONFIG, self, signatures, structs, env };
}

function legal(ctx: BodyContext): string[] {
  return [...legalInstKinds(collectCandidates(ctx))];
}

describe("legality gating", () => {
  test("a lone scalar allows only binary, var and new_array", () => {
    expect(legal(context([f0]))).toEqual(["binary", "var", "new_array"]);
  });

  test("calls need a higher ordinal with inhabited parameters", () => {
    expect(legal(context([f0, f1]))).toContain("call");
    expect(legal(context([f0, f1], [], f1))).not.toContain("call");
    const needsArray: FuncSignature = { ...f1, params: [arrayType(SCALAR_TYPE, 2)] };
    expect(legal(context([f0, needsArray]))).not.toContain("call");
  });

  test("assign needs a second inhabitant of the var's type", () => {
    const ctx = context([f0]);
    ctx.env.declare(SCALAR_TYPE, true);
    expect(legal(ctx)).toContain("assign");
  });

  test("aggregate kinds follow what is in scope", () => {
    const s0 = structType("s0", [SCALAR_TYPE, arrayType(SCALAR_TYPE, 4)]);
    const ctx = context([f0], [s0]);
    expect(legal(ctx)).not.toContain("new_struct");

    ctx.env.declare(arrayType(SCALAR_TYPE, 4), true);
    ctx.env.declare(s0, true);
    // one inhabitant per aggregate type, so neither var can be reassigned
    expect(legal(ctx)).toEqual([
      "binary",
      "var",
      "new_array",
      "array_get",
      "array_set",
      "new_struct",
      "struct_get",
      "struct_set",
    ]);
  });
});

describe("generateInst", () => {
  test("every operand exists and every new name joins the environment", () => {
    const s0 = structType("s0", [SCALAR_TYPE, arrayType(SCALAR_TYPE, 2)]);
    const ctx = context([f0, f1], [s0]);
    for (let i = 0; i < 300; i++) {
      const before = ctx.env.names.length;
      const inst = generateInst(ctx);
      expect(inst.kind).not.toBe("return");
      const defines = !["assign", "array_set", "struct_set"].includes(inst.kind);
      expect(ctx.env.names.length).toBe(before + (defines ? 1 : 0));
      if (inst.kind === "assign") expect(inst.value).not.toBe(inst.target);
      if (inst.kind === "call") expect(inst.callee).toBe(1);
    }
  });
});
