/**
 * genbench: random, validated benchmark programs rendered into C++,
 * Scala, Swift and MVS.
 */

export * from "./errors/index.ts";
export * from "./config/index.ts";
export type * from "./ir/ir-types/index.ts";
export { BINARY_OPS, GENERATED_INST_KINDS, INST_KINDS, TYPE_KINDS } from "./ir/ir-types/index.ts";
export { SCALAR_TYPE, arrayType, structType, typeKey, typesEqual } from "./ir/types.ts";
export { computeSizes, computeUses, instDest, instOperands, writeTarget } from "./ir/uses.ts";
export { eliminateDeadCode, eliminateDeadCodeInProgram, markLive } from "./ir/dce.ts";
export { printFunction, printInst, printProgram } from "./ir/printer.ts";
export { Random } from "./random/rng.ts";
export type { Seed } from "./random/rng.ts";
export { weightedPick, withoutOptions, withWeight, weightOf } from "./random/weighted.ts";
export type { WeightTable } from "./random/weighted.ts";
export * from "./gen/index.ts";
export * from "./interp/index.ts";
export * from "./backend/index.ts";
