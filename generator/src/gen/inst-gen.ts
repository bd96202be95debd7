/**
 * Legality gating and materialization of a single instruction.
 *
 * Each step first works out which instruction kinds can be built from the
 * names currently in scope, prunes the others from the weight table, then
 * samples a kind and its operands uniformly among the legal choices.
 */

import type { GeneratorConfig } from "../config/index.ts";
import { GenerationError } from "../errors/index.ts";
import {
  BINARY_OPS,
  GENERATED_INST_KINDS,
  type ArrayType,
  type FuncSignature,
  type GeneratedInstKind,
  type Inst,
  type LocalId,
  type Name,
  type ScalarType,
  type StructType,
} from "../ir/ir-types/index.ts";
import { arrayType, isNonEmptyArrayType, isScalarType, isStructType } from "../ir/types.ts";
import type { Random } from "../random/rng.ts";
import { weightedPick, withoutOptions } from "../random/weighted.ts";
import type { NameEnv } from "./name-env.ts";

export interface BodyContext {
  rng: Random;
  config: GeneratorConfig;
  /** Function whose body is being generated. */
  self: FuncSignature;
  /** Every signature in the program, in ordinal order. */
  signatures: readonly FuncSignature[];
  structs: readonly StructType[];
  env: NameEnv;
}

/** Everything the current environment allows, gathered once per step. */
export interface InstCandidates {
  callable: FuncSignature[];
  assignableVars: Name[];
  assignableArrays: Name[];
  assignableStructs: Name[];
  scalarTypes: ScalarType[];
  nonEmptyArrayTypes: ArrayType[];
  instantiableStructs: StructType[];
  inhabitedStructTypes: StructType[];
  anyInhabited: boolean;
}

export function collectCandidates(ctx: BodyContext): InstCandidates {
  const { env } = ctx;

  // Only higher ordinals are callable, which keeps the call graph a DAG.
  const callable = ctx.signatures.filter(
    (sig) => sig.ordinal > ctx.self.ordinal && sig.params.every((p) => env.isInhabited(p))
  );

  const assignableVars: Name[] = [];
  const assignableArrays: Name[] = [];
  const assignableStructs: Name[] = [];
  for (const v of env.mutableNames()) {
    // Assigning a variable to itself would be a no-op.
    if (env.isInhabited(v.type, 2)) assignableVars.push(v);
    if (v.type.kind === "array" && env.isInhabited(v.type.element)) assignableArrays.push(v);
    if (v.type.kind === "struct" && v.type.properties.some((p) => env.isInhabited(p))) {
      assignableStructs.push(v);
    }
  }

  return {
    callable,
    assignableVars,
    assignableArrays,
    assignableStructs,
    scalarTypes: env.inhabitedTypesWhere(isScalarType),
    nonEmptyArrayTypes: env.inhabitedTypesWhere(isNonEmptyArrayType),
    instantiableStructs: ctx.structs.filter((s) => s.properties.every((p) => env.isInhabited(p))),
    inhabitedStructTypes: env.inhabitedTypesWhere(isStructType),
    anyInhabited: env.inhabitedTypes().length > 0,
  };
}

/** Instruction kinds that can be materialized from `c`. */
export function legalInstKinds(c: InstCandidates): Set<GeneratedInstKind> {
  const legal: Record<GeneratedInstKind, boolean> = {
    call: c.callable.length > 0,
    binary: c.scalarTypes.length > 0,
    var: c.anyInhabited,
    assign: c.assignableVars.length > 0,
    new_array: c.anyInhabited,
    array_get: c.nonEmptyArrayTypes.length > 0,
    array_set: c.assignableArrays.length > 0,
    new_struct: c.instantiableStructs.length > 0,
    struct_get: c.inhabitedStructTypes.length > 0,
    struct_set: c.assignableStructs.length > 0,
  };
  return new Set(GENERATED_INST_KINDS.filter((kind) => legal[kind]));
}

/** Generate one instruction and bind its result (if any) in the environment. */
export function generateInst(ctx: BodyContext): Inst {
  const candidates = collectCandidates(ctx);
  const legal = legalInstKinds(candidates);
  const weights = withoutOptions(
    ctx.config.instWeights,
    GENERATED_INST_KINDS.filter((kind) => !legal.has(kind))
  );
  return materialize(ctx, weightedPick(ctx.rng, weights), candidates);
}

/**
 * Build an instruction of the given kind. Operands are sampled before the
 * destination is declared, so no instruction can read its own result.
 */
export function materialize(ctx: BodyContext, kind: GeneratedInstKind, c: InstCandidates): Inst {
  const { rng, env } = ctx;

  switch (kind) {
    case "binary": {
      const type = rng.pick(c.scalarTypes);
      const lhs = env.pickInhabitant(rng, type);
      const op = rng.pick(BINARY_OPS);
      const rhs = env.pickInhabitant(rng, type);
      return { kind, dest: env.declare(type).id, op, lhs, rhs };
    }
    case "call": {
      const callee = rng.pick(c.callable);
      const args = callee.params.map((p) => env.pickInhabitant(rng, p));
      return { kind, dest: env.declare(callee.returnType).id, callee: callee.ordinal, args };
    }
    case "var": {
      const type = rng.pick(env.inhabitedTypes());
      const value = env.pickInhabitant(rng, type);
      return { kind, dest: env.declare(type, true).id, value };
    }
    case "assign": {
      const target = rng.pick(c.assignableVars);
      const value = env.pickInhabitant(rng, target.type, target.id);
      return { kind, target: target.id, value };
    }
    case "new_array": {
      const element = rng.pick(env.inhabitedTypes());
      const length = rng.nextInt(1, ctx.config.arrayLimit);
      const elements: LocalId[] = [];
      for (let i = 0; i < length; i++) elements.push(env.pickInhabitant(rng, element));
      return { kind, dest: env.declare(arrayType(element, length)).id, elements };
    }
    case "array_get": {
      const type = rng.pick(c.nonEmptyArrayTypes);
      const array = env.pickInhabitant(rng, type);
      const index = rng.nextInt(0, type.length);
      return { kind, dest: env.declare(type.element).id, array, index };
    }
    case "array_set": {
      const target = rng.pick(c.assignableArrays);
      if (target.type.kind !== "array") {
        throw new GenerationError(`${target.ident} is not an array`);
      }
      const index = rng.nextInt(0, target.type.length);
      const value = env.pickInhabitant(rng, target.type.element);
      return { kind, array: target.id, index, value };
    }
    case "new_struct": {
      const type = rng.pick(c.instantiableStructs);
      const values = type.properties.map((p) => env.pickInhabitant(rng, p));
      return { kind, dest: env.declare(type).id, values };
    }
    case "struct_get": {
      const type = rng.pick(c.inhabitedStructTypes);
      const struct = env.pickInhabitant(rng, type);
      const index = rng.nextInt(0, type.properties.length);
      return { kind, dest: env.declare(type.properties[index]).id, struct, index };
    }
    case "struct_set": {
      const target = rng.pick(c.assignableStructs);
      if (target.type.kind !== "struct") {
        throw new GenerationError(`${target.ident} is not a struct`);
      }
      const settable: number[] = [];
      target.type.properties.forEach((p, index) => {
        if (env.isInhabited(p)) settable.push(index);
      });
      const index = rng.pick(settable);
      const value = env.pickInhabitant(rng, target.type.properties[index]);
      return { kind, struct: target.id, index, value };
    }
  }
}
