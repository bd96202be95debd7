/**
 * Validation by execution, and the generate-and-test loop around it.
 */

import type { GeneratorConfig } from "../config/index.ts";
import { GenerationError, InterpreterFault } from "../errors/index.ts";
import type { Program } from "../ir/ir-types/index.ts";
import { entryFunction, nameOf } from "../ir/program.ts";
import { generateProgram } from "../gen/program-gen.ts";
import type { Random } from "../random/rng.ts";
import { Interpreter } from "./interpreter.ts";
import { type Value, formatScalar, initialValues, isScalarValue } from "./values.ts";

export type RejectReason = "division_by_zero" | "budget_exceeded" | "too_trivial" | "non_finite_result";

export type ValidationResult =
  | { ok: true; program: Program }
  | { ok: false; reason: RejectReason; totalCount: number };

/**
 * Execute `f0` on its canonical inputs. An accepted program is narrowed
 * to the functions that were entered and the structs that were
 * instantiated, in declaration order, and carries the run's counters.
 * Narrowing only removes declarations; it never changes a body.
 */
export function validateProgram(program: Program, config: GeneratorConfig): ValidationResult {
  const entry = entryFunction(program);
  const args = initialValues(entry.params.map((id) => nameOf(entry, id).type));
  const interpreter = new Interpreter(program, config.opLimit);

  let result: Value;
  try {
    result = interpreter.runEntry(args);
  } catch (error) {
    if (error instanceof InterpreterFault) {
      return { ok: false, reason: error.reason, totalCount: interpreter.totalCount };
    }
    throw error;
  }

  const { totalCount } = interpreter;
  if (totalCount <= config.minOps) {
    return { ok: false, reason: "too_trivial", totalCount };
  }
  if (!isScalarValue(result)) {
    throw new GenerationError("entry function returned a non-scalar value");
  }
  if (!Number.isFinite(result)) {
    return { ok: false, reason: "non_finite_result", totalCount };
  }

  return {
    ok: true,
    program: {
      structs: program.structs.filter((s) => interpreter.usedStructs.has(s.name)),
      functions: program.functions.filter((fn) => interpreter.called.has(fn.ordinal)),
      meta: {
        opCounts: { ...interpreter.opCounts },
        totalCount,
        result: formatScalar(result),
      },
    },
  };
}

export interface AttemptOutcome {
  /** 1-based attempt number. */
  attempt: number;
  result: ValidationResult;
}

export interface GenerateOptions {
  /** Give up with a GenerationError after this many rejected candidates. */
  maxAttempts?: number;
  /** Called after every attempt, accepted or not. */
  onAttempt?: (outcome: AttemptOutcome) => void;
}

export interface GeneratedProgram {
  program: Program;
  attempts: number;
}

/**
 * Generate candidates from `rng` until one validates. A rejected candidate
 * is discarded whole; the next one is drawn from the same stream, so it
 * differs from every earlier attempt.
 */
export function generateValidProgram(
  rng: Random,
  config: GeneratorConfig,
  options: GenerateOptions = {}
): GeneratedProgram {
  const { maxAttempts = Infinity, onAttempt } = options;
  return validateUntilAccepted(() => generateProgram(rng, config), config, maxAttempts, onAttempt);
}

/** The acceptance loop, over any source of candidates. */
export function validateUntilAccepted(
  nextCandidate: (attempt: number) => Program,
  config: GeneratorConfig,
  maxAttempts = Infinity,
  onAttempt?: (outcome: AttemptOutcome) => void
): GeneratedProgram {
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const result = validateProgram(nextCandidate(attempt), config);
    onAttempt?.({ attempt, result });
    if (result.ok) return { program: result.program, attempts: attempt };
  }
  throw new GenerationError(`no valid program after ${maxAttempts} attempts`);
}
