/**
 * Whole-program generation: struct declarations, the signature table,
 * then one body per function.
 */

import type { GeneratorConfig } from "../config/index.ts";
import type { FuncSignature, Program, StructDecl, StructType, Type } from "../ir/ir-types/index.ts";
import { emptyMeta, funcName, structName } from "../ir/program.ts";
import { SCALAR_TYPE, isScalarType, structType } from "../ir/types.ts";
import type { Random } from "../random/rng.ts";
import { weightedPick } from "../random/weighted.ts";
import { generateFunction } from "./func-gen.ts";
import { generateType } from "./type-gen.ts";

/**
 * Generate an unvalidated candidate. Every body has already been through
 * static dead-code elimination; `meta` is left empty for the validator.
 */
export function generateProgram(rng: Random, config: GeneratorConfig): Program {
  const structs = generateStructs(rng, config);
  const structTypes = structs.map((s) => s.type);
  const signatures = generateSignatures(rng, config, structTypes);
  const functions = signatures.map((sig) => generateFunction(rng, config, sig, signatures, structTypes));
  return { structs, functions, meta: emptyMeta() };
}

/** Struct `sN` may only mention `s0 .. s(N-1)`, so declarations never form a cycle. */
export function generateStructs(rng: Random, config: GeneratorConfig): StructDecl[] {
  const declared: StructType[] = [];
  const count = rng.nextInt(0, config.structLimit);
  for (let i = 0; i < count; i++) {
    const propertyCount = weightedPick(rng, config.propertyCountWeights);
    const properties: Type[] = [];
    for (let p = 0; p < propertyCount; p++) {
      properties.push(randomType(rng, config, declared));
    }
    declared.push(structType(structName(i), properties));
  }
  return declared.map((type) => ({ name: type.name, type }));
}

/**
 * Parameter lists and return types for every function. A function returns
 * the type of one of its own parameters, which guarantees its body can
 * always produce a return value. The entry point `f0` returns a scalar,
 * gaining an extra scalar parameter when it has none.
 */
export function generateSignatures(
  rng: Random,
  config: GeneratorConfig,
  structs: readonly StructType[]
): FuncSignature[] {
  const count = rng.nextInt(1, config.functionLimit);
  const params: Type[][] = [];
  for (let i = 0; i < count; i++) {
    const paramCount = weightedPick(rng, config.paramCountWeights);
    const types: Type[] = [];
    for (let p = 0; p < paramCount; p++) {
      types.push(randomType(rng, config, structs));
    }
    params.push(types);
  }

  return params.map((types, ordinal) => {
    let options = types;
    if (ordinal === 0) {
      options = types.filter(isScalarType);
      if (options.length === 0) {
        types.push(SCALAR_TYPE);
        options = [SCALAR_TYPE];
      }
    }
    return { ordinal, name: funcName(ordinal), returnType: rng.pick(options), params: types };
  });
}

function randomType(rng: Random, config: GeneratorConfig, structs: readonly StructType[]): Type {
  return generateType(rng, { weights: config.typeWeights, arrayBudget: config.arrayLimit, structs });
}
