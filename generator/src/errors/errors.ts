/**
 * Error classes shared by the generator, validator, emitters and CLI.
 *
 * Only invariant violations are thrown. An invalid candidate (division by
 * zero, exhausted operation budget, trivial trace) is an ordinary outcome
 * and leaves the validator as a `ValidationResult`; the interpreter
 * signals it with `InterpreterFault`, which the validator always catches.
 */

export const ErrorCode = {
  Generation: "E_GENERATION",
  Emission: "E_EMISSION",
  Config: "E_CONFIG",
  Fault: "E_FAULT",
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

/** Base class; `code` is stable across releases. */
export class GenBenchError extends Error {
  readonly code: ErrorCodeValue;

  constructor(code: ErrorCodeValue, message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The generator reached a state its legality gating should have ruled out. */
export class GenerationError extends GenBenchError {
  constructor(message: string) {
    super(ErrorCode.Generation, message);
  }
}

/** An emitter met an IR node it does not know how to spell. */
export class EmissionError extends GenBenchError {
  readonly dialect: string;

  constructor(dialect: string, message: string) {
    super(ErrorCode.Emission, `${dialect}: ${message}`);
    this.dialect = dialect;
  }
}

/** A configuration file or object that does not describe a valid config. */
export class ConfigError extends GenBenchError {
  readonly source: string;
  readonly issues: readonly string[];

  constructor(source: string, issues: readonly string[]) {
    super(ErrorCode.Config, `invalid configuration in ${source}: ${issues.join("; ")}`);
    this.source = source;
    this.issues = issues;
  }
}

export type FaultReason = "division_by_zero" | "budget_exceeded";

/**
 * Raised inside the interpreter when a candidate misbehaves at run time.
 * The validator catches it and turns it into a rejection.
 */
export class InterpreterFault extends GenBenchError {
  readonly reason: FaultReason;

  constructor(reason: FaultReason, message: string) {
    super(ErrorCode.Fault, message);
    this.reason = reason;
  }
}

/** Exhaustiveness guard for switches over closed unions. */
export function unreachable(value: never, what: string): never {
  throw new GenerationError(`unknown ${what}: ${JSON.stringify(value)}`);
}
