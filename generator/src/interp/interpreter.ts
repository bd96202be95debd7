/**
 * Direct execution of a program's IR under an operation budget.
 *
 * The entry call moves through `pending → running → returned`, or ends in
 * `faulted` (division by zero) or `budget_exceeded`. The first fault
 * aborts the whole run.
 */

import { GenerationError, InterpreterFault, unreachable } from "../errors/index.ts";
import type { BinaryOp, Func, FuncOrdinal, Inst, InstKind, LocalId, Program } from "../ir/ir-types/index.ts";
import { emptyOpCounts, functionMap, nameOf } from "../ir/program.ts";
import {
  type Value,
  collectValueStructs,
  elementAt,
  expectArray,
  expectScalar,
  expectStruct,
  replaceAt,
} from "./values.ts";

export type CallState = "pending" | "running" | "returned" | "faulted" | "budget_exceeded";

/** Activation record of one call. */
interface Frame {
  fn: Func;
  locals: Map<LocalId, Value>;
}

export class Interpreter {
  readonly opCounts: Record<InstKind, number> = emptyOpCounts();
  totalCount = 0;
  /** Ordinals of every function entered at least once. */
  readonly called = new Set<FuncOrdinal>();
  /** Struct names instantiated by `new_struct` or present in the entry arguments. */
  readonly usedStructs = new Set<string>();
  /** State of the most recent call to the entry function. */
  entryState: CallState = "pending";

  private readonly functions: Map<FuncOrdinal, Func>;
  private readonly opLimit: number;

  constructor(program: Program, opLimit: number) {
    this.functions = functionMap(program);
    this.opLimit = opLimit;
  }

  /** Run the entry function; throws `InterpreterFault` on a run-time fault. */
  runEntry(args: readonly Value[]): Value {
    for (const arg of args) collectValueStructs(arg, this.usedStructs);
    return this.call(0, args);
  }

  call(ordinal: FuncOrdinal, args: readonly Value[]): Value {
    const fn = this.functions.get(ordinal);
    if (fn === undefined) {
      throw new GenerationError(`call to unknown function f${ordinal}`);
    }
    if (args.length !== fn.params.length) {
      throw new GenerationError(`${fn.name} expects ${fn.params.length} arguments, got ${args.length}`);
    }

    const frame: Frame = { fn, locals: new Map() };
    fn.params.forEach((param, i) => frame.locals.set(param, args[i]));
    this.called.add(ordinal);
    this.transition(frame, "running");

    try {
      for (const inst of fn.body) {
        this.countOp(inst);
        if (inst.kind === "return") {
          this.transition(frame, "returned");
          return this.read(frame, inst.value);
        }
        this.step(frame, inst);
      }
    } catch (error) {
      if (error instanceof InterpreterFault) {
        this.transition(frame, error.reason === "budget_exceeded" ? "budget_exceeded" : "faulted");
      }
      throw error;
    }

    throw new GenerationError(`${fn.name} fell off the end of its body`);
  }

  private transition(frame: Frame, state: CallState): void {
    if (frame.fn.ordinal === 0) this.entryState = state;
  }

  private countOp(inst: Inst): void {
    this.opCounts[inst.kind] += 1;
    this.totalCount += 1;
    if (this.totalCount > this.opLimit) {
      throw new InterpreterFault("budget_exceeded", `executed more than ${this.opLimit} instructions`);
    }
  }

  private step(frame: Frame, inst: Exclude<Inst, { kind: "return" }>): void {
    const { locals } = frame;
    switch (inst.kind) {
      case "binary": {
        const lhs = expectScalar(this.read(frame, inst.lhs), this.ident(frame, inst.lhs));
        const rhs = expectScalar(this.read(frame, inst.rhs), this.ident(frame, inst.rhs));
        locals.set(inst.dest, this.arith(inst.op, lhs, rhs, frame));
        break;
      }
      case "call":
        locals.set(
          inst.dest,
          this.call(
            inst.callee,
            inst.args.map((arg) => this.read(frame, arg))
          )
        );
        break;
      case "var":
        locals.set(inst.dest, this.read(frame, inst.value));
        break;
      case "assign":
        locals.set(inst.target, this.read(frame, inst.value));
        break;
      case "new_array":
        locals.set(
          inst.dest,
          inst.elements.map((e) => this.read(frame, e))
        );
        break;
      case "array_get": {
        const what = this.ident(frame, inst.array);
        locals.set(inst.dest, elementAt(expectArray(this.read(frame, inst.array), what), inst.index, what));
        break;
      }
      case "array_set": {
        const what = this.ident(frame, inst.array);
        const array = expectArray(this.read(frame, inst.array), what);
        locals.set(inst.array, replaceAt(array, inst.index, this.read(frame, inst.value), what));
        break;
      }
      case "new_struct": {
        const type = nameOf(frame.fn, inst.dest).type;
        if (type.kind !== "struct") {
          throw new GenerationError(`${this.ident(frame, inst.dest)} is not a struct`);
        }
        this.usedStructs.add(type.name);
        locals.set(inst.dest, {
          struct: type.name,
          values: inst.values.map((v) => this.read(frame, v)),
        });
        break;
      }
      case "struct_get": {
        const what = this.ident(frame, inst.struct);
        const struct = expectStruct(this.read(frame, inst.struct), what);
        locals.set(inst.dest, elementAt(struct.values, inst.index, what));
        break;
      }
      case "struct_set": {
        const what = this.ident(frame, inst.struct);
        const struct = expectStruct(this.read(frame, inst.struct), what);
        locals.set(inst.struct, {
          struct: struct.struct,
          values: replaceAt(struct.values, inst.index, this.read(frame, inst.value), what),
        });
        break;
      }
    }
  }

  private arith(op: BinaryOp, lhs: number, rhs: number, frame: Frame): number {
    switch (op) {
      case "+":
        return lhs + rhs;
      case "-":
        return lhs - rhs;
      case "*":
        return lhs * rhs;
      case "/":
        if (rhs === 0) {
          throw new InterpreterFault("division_by_zero", `division by zero in ${frame.fn.name}`);
        }
        return lhs / rhs;
      default:
        return unreachable(op, "binary operator");
    }
  }

  private read(frame: Frame, id: LocalId): Value {
    const value = frame.locals.get(id);
    if (value === undefined) {
      throw new GenerationError(`${this.ident(frame, id)} read before it was defined in ${frame.fn.name}`);
    }
    return value;
  }

  private ident(frame: Frame, id: LocalId): string {
    return nameOf(frame.fn, id).ident;
  }
}
