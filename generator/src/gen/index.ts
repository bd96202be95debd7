export { NameEnv } from "./name-env.ts";
export { MIN_ARRAY_BUDGET, generateType } from "./type-gen.ts";
export type { TypeGenContext } from "./type-gen.ts";
export { collectCandidates, generateInst, legalInstKinds, materialize } from "./inst-gen.ts";
export type { BodyContext, InstCandidates } from "./inst-gen.ts";
export { generateFunction, pickReturnValue } from "./func-gen.ts";
export { generateProgram, generateSignatures, generateStructs } from "./program-gen.ts";
