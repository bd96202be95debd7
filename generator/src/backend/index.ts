export { DIALECT_IDS, FunctionScope, isDialectId, renderValue } from "./dialect.ts";
export type { Dialect, DialectId, HarnessArg, HarnessInput } from "./dialect.ts";
export { DIALECTS, emitAll, emitCpp, emitMvs, emitProgram, emitScala, emitSwift } from "./emitter.ts";
export type { EmitOptions } from "./emitter.ts";
export { cppDialect } from "./cpp-dialect.ts";
export { NOINLINE_PREFIX, mvsDialect } from "./mvs-dialect.ts";
export { SCALA_OBJECT, scalaDialect } from "./scala-dialect.ts";
export { swiftDialect } from "./swift-dialect.ts";
