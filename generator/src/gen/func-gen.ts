/**
 * Function body generation: random straight-line code, a size-biased
 * return value, then static dead-code elimination.
 */

import type { GeneratorConfig } from "../config/index.ts";
import { GenerationError } from "../errors/index.ts";
import type { Func, FuncSignature, Inst, LocalId, StructType } from "../ir/ir-types/index.ts";
import { eliminateDeadCode } from "../ir/dce.ts";
import { computeSizes } from "../ir/uses.ts";
import type { Random } from "../random/rng.ts";
import { weightedPick } from "../random/weighted.ts";
import { type BodyContext, generateInst } from "./inst-gen.ts";
import { NameEnv } from "./name-env.ts";

export function generateFunction(
  rng: Random,
  config: GeneratorConfig,
  self: FuncSignature,
  signatures: readonly FuncSignature[],
  structs: readonly StructType[]
): Func {
  const env = new NameEnv();
  const params = self.params.map((type) => env.declare(type).id);
  if (!env.isInhabited(self.returnType)) {
    throw new GenerationError(`${self.name} has no parameter of its return type`);
  }

  const ctx: BodyContext = { rng, config, self, signatures, structs, env };
  const body: Inst[] = [];
  const count = rng.nextInt(config.instMin, config.instLimit);
  for (let i = 0; i < count; i++) {
    body.push(generateInst(ctx));
  }

  body.push({ kind: "return", value: pickReturnValue(rng, config, env, self, body) });

  return eliminateDeadCode({
    ordinal: self.ordinal,
    name: self.name,
    returnType: self.returnType,
    params,
    names: env.names,
    body,
  });
}

/**
 * Pick among the inhabitants of the return type, sorted by expression
 * size, counting back from the largest. Larger expressions are favoured
 * so that less of the body is eliminated afterwards.
 */
export function pickReturnValue(
  rng: Random,
  config: GeneratorConfig,
  env: NameEnv,
  self: FuncSignature,
  body: readonly Inst[]
): LocalId {
  const sizes = computeSizes(body);
  const sizeOf = (id: LocalId): number => sizes.get(id) ?? 1;
  // Array.prototype.sort is stable, so ties keep declaration order.
  const candidates = [...env.inhabitants(self.returnType)].sort((a, b) => sizeOf(a) - sizeOf(b));

  const offset = Math.max(-candidates.length, weightedPick(rng, config.returnOffsetWeights));
  const value = candidates[candidates.length + offset];
  if (value === undefined) {
    throw new GenerationError(`${self.name} has no value to return`);
  }
  return value;
}
