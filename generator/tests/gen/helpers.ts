/**
 * Test utilities for the generator: a smaller configuration and
 * structural checks over generated functions.
 */

import { mergeConfigs } from "../../src/config/index.ts";
import type { Func, LocalId, Program } from "../../src/ir/ir-types/index.ts";
import { instDest, instOperands, writeTarget } from "../../src/ir/uses.ts";

/** Keeps generation fast while still exercising every instruction kind. */
export const SMALL_CONFIG = mergeConfigs({
  functionLimit: 12,
  structLimit: 6,
  instLimit: 48,
});

export const SEEDS = Array.from({ length: 12 }, (_, i) => `seed-${i}`);

/** Handles each instruction reads that were not defined before it. */
export function forwardReferences(fn: Func): LocalId[] {
  const defined = new Set<LocalId>(fn.params);
  const bad: LocalId[] = [];
  for (const inst of fn.body) {
    for (const id of instOperands(inst)) {
      if (!defined.has(id)) bad.push(id);
    }
    const dest = instDest(inst);
    if (dest !== null) defined.add(dest);
  }
  return bad;
}

/** Handles targeted by a write without having been declared by `var`. */
export function writesToImmutables(fn: Func): LocalId[] {
  const vars = new Set<LocalId>();
  const bad: LocalId[] = [];
  for (const inst of fn.body) {
    if (inst.kind === "var") vars.add(inst.dest);
    const target = writeTarget(inst);
    if (target !== null && !vars.has(target)) bad.push(target);
  }
  return bad;
}

/** `[caller, callee]` pairs that do not go from a lower to a higher ordinal. */
export function backwardCalls(program: Program): [number, number][] {
  const bad: [number, number][] = [];
  for (const fn of program.functions) {
    for (const inst of fn.body) {
      if (inst.kind === "call" && inst.callee <= fn.ordinal) bad.push([fn.ordinal, inst.callee]);
    }
  }
  return bad;
}
