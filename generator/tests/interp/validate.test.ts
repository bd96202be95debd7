import { describe, expect, test } from "vitest";
import { DEFAULT_CONFIG, mergeConfigs } from "../../src/config/index.ts";
import { GenerationError } from "../../src/errors/index.ts";
import { Interpreter } from "../../src/interp/interpreter.ts";
import {
  type AttemptOutcome,
  generateValidProgram,
  validateProgram,
  validateUntilAccepted,
} from "../../src/interp/validate.ts";
import { initialValues } from "../../src/interp/values.ts";
import type { Inst, Program } from "../../src/ir/ir-types/index.ts";
import { nameOf } from "../../src/ir/program.ts";
import { structType } from "../../src/ir/types.ts";
import { Random } from "../../src/random/rng.ts";
import { SMALL_CONFIG } from "../gen/helpers.ts";
import {
  F64,
  PAIR,
  divisionProgram,
  kitchenSinkProgram,
  makeFunc,
  makeProgram,
  structGetProgram,
} from "../ir/helpers.ts";

const PERMISSIVE = mergeConfigs({ minOps: 0 });

function rerun(program: Program): number {
  const entry = program.functions[0];
  const args = initialValues(entry.params.map((id) => nameOf(entry, id).type));
  const result = new Interpreter(program, DEFAULT_CONFIG.opLimit).runEntry(args);
  if (typeof result !== "number") throw new Error("entry returned an aggregate");
  return result;
}

describe("validateProgram", () => {
  test("struct_get on the canonical input yields 0.0", () => {
    const result = validateProgram(structGetProgram(), PERMISSIVE);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.program.meta.result).toBe("0.0");
      expect(result.program.meta.totalCount).toBe(2);
    }
  });

  test("a short trace is too trivial under the default threshold", () => {
    expect(validateProgram(structGetProgram(), DEFAULT_CONFIG)).toEqual({
      ok: false,
      reason: "too_trivial",
      totalCount: 2,
    });
  });

  test("accepts a nonzero divisor and rejects a zero one", () => {
    // canonical inputs are v0 = 0.0 and v1 = 1.0
    const accepted = validateProgram(divisionProgram(0, 1), PERMISSIVE);
    expect(accepted.ok && accepted.program.meta.result).toBe("0.0");
    expect(validateProgram(divisionProgram(1, 0), PERMISSIVE)).toEqual({
      ok: false,
      reason: "division_by_zero",
      totalCount: 1,
    });
  });

  test("rejects a run over the operation budget", () => {
    const result = validateProgram(kitchenSinkProgram(), { ...DEFAULT_CONFIG, opLimit: 10, minOps: 5 });
    expect(result).toEqual({ ok: false, reason: "budget_exceeded", totalCount: 11 });
  });

  test("rejects a non-finite result", () => {
    // v2 = v1 + v1 = 2, then square ten times: 2^1024 overflows to Infinity
    const body: Inst[] = [{ kind: "binary", dest: 2, op: "+", lhs: 1, rhs: 1 }];
    for (let dest = 3; dest <= 12; dest++) {
      body.push({ kind: "binary", dest, op: "*", lhs: dest - 1, rhs: dest - 1 });
    }
    body.push({ kind: "return", value: 12 });
    const locals = Array.from({ length: 11 }, () => F64);
    const program = makeProgram([makeFunc(0, [F64, F64], locals, F64, body)]);
    expect(validateProgram(program, PERMISSIVE)).toEqual({
      ok: false,
      reason: "non_finite_result",
      totalCount: 12,
    });
  });

  test("narrows to called functions and instantiated structs", () => {
    const unusedStruct = structType("s1", [F64]);
    const f0 = makeFunc(0, [PAIR], [F64], F64, [
      { kind: "struct_get", dest: 1, struct: 0, index: 1 },
      { kind: "return", value: 1 },
    ]);
    const f1 = makeFunc(1, [F64], [], F64, [{ kind: "return", value: 0 }]);
    const result = validateProgram(makeProgram([f0, f1], [PAIR, unusedStruct]), PERMISSIVE);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.program.functions.map((fn) => fn.name)).toEqual(["f0"]);
      expect(result.program.structs.map((s) => s.name)).toEqual(["s0"]);
      expect(result.program.meta.result).toBe("1.0");
      expect(result.program.meta.opCounts.struct_get).toBe(1);
      expect(result.program.meta.opCounts.return).toBe(1);
    }
  });

  test("the full instruction set passes under the defaults", () => {
    const result = validateProgram(kitchenSinkProgram(), DEFAULT_CONFIG);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.program.meta.result).toBe("6.0");
      expect(result.program.meta.totalCount).toBe(16);
      expect(result.program.functions).toHaveLength(2);
    }
  });
});

describe("acceptance loop", () => {
  test("a rejected candidate is replaced by a different one", () => {
    const candidates = [divisionProgram(1, 0), divisionProgram(0, 1)];
    const outcomes: AttemptOutcome[] = [];
    const { program, attempts } = validateUntilAccepted(
      (attempt) => candidates[attempt - 1],
      PERMISSIVE,
      Infinity,
      (outcome) => outcomes.push(outcome)
    );
    expect(attempts).toBe(2);
    expect(outcomes.map((o) => (o.result.ok ? "ok" : o.result.reason))).toEqual(["division_by_zero", "ok"]);
    expect(program.functions[0].body[0]).toEqual({ kind: "binary", dest: 2, op: "/", lhs: 0, rhs: 1 });
  });

  test("gives up after maxAttempts", () => {
    const impossible = { ...SMALL_CONFIG, minOps: 1_000_000 };
    const seen: number[] = [];
    expect(() =>
      generateValidProgram(Random.fromSeed("never"), impossible, {
        maxAttempts: 3,
        onAttempt: ({ attempt }) => seen.push(attempt),
      })
    ).toThrow(GenerationError);
    expect(seen).toEqual([1, 2, 3]);
  });

  test("accepted programs terminate with a finite scalar, reproducibly", () => {
    for (const seed of ["alpha", "beta", "gamma", "delta"]) {
      const { program, attempts } = generateValidProgram(Random.fromSeed(seed), SMALL_CONFIG, {
        maxAttempts: 2000,
      });
      expect(attempts).toBeGreaterThanOrEqual(1);
      expect(program.meta.totalCount).toBeGreaterThan(SMALL_CONFIG.minOps);
      expect(program.meta.totalCount).toBeLessThanOrEqual(SMALL_CONFIG.opLimit);

      const value = rerun(program);
      expect(Number.isFinite(value)).toBe(true);
      expect(program.functions[0].ordinal).toBe(0);

      const again = generateValidProgram(Random.fromSeed(seed), SMALL_CONFIG, { maxAttempts: 2000 });
      expect(again.program).toEqual(program);
    }
  });
});
