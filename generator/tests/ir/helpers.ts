/**
 * Test utilities: hand-built IR.
 */

import type { Func, Inst, Program, StructDecl, StructType, Type } from "../../src/ir/ir-types/index.ts";
import { emptyMeta, funcName, localName } from "../../src/ir/program.ts";
import { SCALAR_TYPE, arrayType, structType } from "../../src/ir/types.ts";

export const F64 = SCALAR_TYPE;

/**
 * Build a function whose arena is `params` followed by `locals`, so
 * parameter `i` has handle `i` and local `j` has handle `params.length + j`.
 */
export function makeFunc(
  ordinal: number,
  params: Type[],
  locals: Type[],
  returnType: Type,
  body: Inst[]
): Func {
  const names = [...params, ...locals].map((type, id) => ({ id, ident: localName(id), type }));
  return {
    ordinal,
    name: funcName(ordinal),
    returnType,
    params: params.map((_, i) => i),
    names,
    body,
  };
}

export function makeProgram(functions: Func[], structs: StructType[] = []): Program {
  const decls: StructDecl[] = structs.map((type) => ({ name: type.name, type }));
  return { structs: decls, functions, meta: emptyMeta() };
}

/** `s0 { p0: f64, p1: f64 }` */
export const PAIR = structType("s0", [F64, F64]);

/** `f0(v0: s0) -> f64 { v1 = struct_get v0.p0; return v1 }` */
export function structGetProgram(): Program {
  const f0 = makeFunc(0, [PAIR], [F64], F64, [
    { kind: "struct_get", dest: 1, struct: 0, index: 0 },
    { kind: "return", value: 1 },
  ]);
  return makeProgram([f0], [PAIR]);
}

/** `f0(v0: f64, v1: f64) -> f64 { v2 = binary v0 / v1; return v2 }` */
export function divisionProgram(dividend: number, divisor: number): Program {
  const f0 = makeFunc(0, [F64, F64], [F64], F64, [
    { kind: "binary", dest: 2, op: "/", lhs: dividend, rhs: divisor },
    { kind: "return", value: 2 },
  ]);
  return makeProgram([f0]);
}

/** `s0 { p0: f64, p1: [f64; 2] }` */
export const MIXED = structType("s0", [F64, arrayType(F64, 2)]);

/**
 * Every instruction kind once. With inputs `v0 = 0.0` and
 * `v1 = s0(1.0, [2.0, 3.0])` the entry returns 6.0.
 */
export function kitchenSinkProgram(): Program {
  const pair = arrayType(F64, 2);
  const f1 = makeFunc(1, [F64], [F64], F64, [
    { kind: "binary", dest: 1, op: "*", lhs: 0, rhs: 0 },
    { kind: "return", value: 1 },
  ]);
  const f0 = makeFunc(
    0,
    [F64, MIXED],
    [pair, pair, F64, F64, pair, MIXED, MIXED, F64, F64, F64],
    F64,
    [
      { kind: "struct_get", dest: 2, struct: 1, index: 1 },
      { kind: "var", dest: 3, value: 2 },
      { kind: "array_set", array: 3, index: 1, value: 0 },
      { kind: "array_get", dest: 4, array: 3, index: 0 },
      { kind: "call", dest: 5, callee: 1, args: [4] },
      { kind: "new_array", dest: 6, elements: [0, 5] },
      { kind: "new_struct", dest: 7, values: [5, 6] },
      { kind: "var", dest: 8, value: 7 },
      { kind: "struct_set", struct: 8, index: 0, value: 4 },
      { kind: "var", dest: 9, value: 0 },
      { kind: "assign", target: 9, value: 5 },
      { kind: "struct_get", dest: 10, struct: 8, index: 0 },
      { kind: "binary", dest: 11, op: "+", lhs: 10, rhs: 9 },
      { kind: "return", value: 11 },
    ]
  );
  return makeProgram([f0, f1], [MIXED]);
}
