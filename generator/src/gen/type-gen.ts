/**
 * Random type generation with a halving array budget.
 */

import type { StructType, Type, TypeKind } from "../ir/ir-types/index.ts";
import { SCALAR_TYPE, arrayType } from "../ir/types.ts";
import type { Random } from "../random/rng.ts";
import { type WeightTable, weightOf, weightedPick, withWeight, withoutOptions } from "../random/weighted.ts";

/** Below this budget no further array may be generated. */
export const MIN_ARRAY_BUDGET = 4;

export interface TypeGenContext {
  weights: WeightTable<TypeKind>;
  arrayBudget: number;
  /** Structs that may be referenced; for a struct's own properties, only earlier ones. */
  structs: readonly StructType[];
}

/**
 * Sample a type. Arrays are dropped from the table once the budget falls
 * under {@link MIN_ARRAY_BUDGET}, structs while none is declared. Every
 * nested array halves both the array weight and the budget, and its
 * length is drawn from `[1, budget)` of the halved budget, which bounds
 * the size of emitted literals geometrically.
 */
export function generateType(rng: Random, ctx: TypeGenContext): Type {
  let weights = ctx.weights;
  if (ctx.arrayBudget < MIN_ARRAY_BUDGET) {
    weights = withoutOptions(weights, ["array"]);
  }
  if (ctx.structs.length === 0) {
    weights = withoutOptions(weights, ["struct"]);
  }

  const kind = weightedPick(rng, weights);
  switch (kind) {
    case "scalar":
      return SCALAR_TYPE;
    case "array": {
      const nestedWeights = withWeight(weights, "array", Math.floor(weightOf(weights, "array") / 2));
      const budget = Math.floor(ctx.arrayBudget / 2);
      const element = generateType(rng, { weights: nestedWeights, arrayBudget: budget, structs: ctx.structs });
      return arrayType(element, rng.nextInt(1, budget));
    }
    case "struct":
      return rng.pick(ctx.structs);
  }
}
