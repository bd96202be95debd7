export { Interpreter } from "./interpreter.ts";
export type { CallState } from "./interpreter.ts";
export {
  collectValueStructs,
  formatScalar,
  initialValues,
  isArrayValue,
  isScalarValue,
  isStructValue,
} from "./values.ts";
export type { ArrayValue, ScalarValue, StructValue, Value } from "./values.ts";
export { generateValidProgram, validateProgram, validateUntilAccepted } from "./validate.ts";
export type {
  AttemptOutcome,
  GenerateOptions,
  GeneratedProgram,
  RejectReason,
  ValidationResult,
} from "./validate.ts";
