// ─── Program helpers ────────────────────────────────────────────────────────

import { GenerationError } from "../errors/index.ts";
import type { Func, FuncOrdinal, InstKind, Name, Program, ProgramMeta } from "./ir-types/index.ts";

export function funcName(ordinal: FuncOrdinal): string {
  return `f${ordinal}`;
}

export function structName(index: number): string {
  return `s${index}`;
}

export function localName(id: number): string {
  return `v${id}`;
}

/** Zeroed counters, as carried by a candidate that has not been validated yet. */
export function emptyMeta(): ProgramMeta {
  return { opCounts: emptyOpCounts(), totalCount: 0, result: null };
}

export function emptyOpCounts(): Record<InstKind, number> {
  return {
    call: 0,
    binary: 0,
    var: 0,
    assign: 0,
    new_array: 0,
    array_get: 0,
    array_set: 0,
    new_struct: 0,
    struct_get: 0,
    struct_set: 0,
    return: 0,
  };
}

/** Index functions by ordinal; ordinals survive narrowing, array positions do not. */
export function functionMap(program: Program): Map<FuncOrdinal, Func> {
  const map = new Map<FuncOrdinal, Func>();
  for (const fn of program.functions) map.set(fn.ordinal, fn);
  return map;
}

export function entryFunction(program: Program): Func {
  const entry = program.functions[0];
  if (entry === undefined || entry.ordinal !== 0) {
    throw new GenerationError("program has no entry function f0");
  }
  return entry;
}

/** Look up a name in a function's arena. */
export function nameOf(fn: Func, id: number): Name {
  const name = fn.names[id];
  if (name === undefined) {
    throw new GenerationError(`${fn.name} has no name with handle ${id}`);
  }
  return name;
}
