/**
 * Def-use queries over straight-line bodies.
 *
 * Handles index the function's name arena, so use sets are plain arrays
 * keyed by small integers and never compare identifiers as strings.
 */

import { unreachable } from "../errors/index.ts";
import type { Func, Inst, LocalId } from "./ir-types/index.ts";

/** Handle an instruction defines, or null for `return` and in-place writes. */
export function instDest(inst: Inst): LocalId | null {
  switch (inst.kind) {
    case "binary":
    case "call":
    case "var":
    case "new_array":
    case "array_get":
    case "new_struct":
    case "struct_get":
      return inst.dest;
    case "return":
    case "assign":
    case "array_set":
    case "struct_set":
      return null;
    default:
      return unreachable(inst, "instruction");
  }
}

/** Handle an in-place write updates, or null for every other instruction. */
export function writeTarget(inst: Inst): LocalId | null {
  switch (inst.kind) {
    case "assign":
      return inst.target;
    case "array_set":
      return inst.array;
    case "struct_set":
      return inst.struct;
    default:
      return null;
  }
}

/** Handles an instruction reads, in operand order. */
export function instOperands(inst: Inst): LocalId[] {
  switch (inst.kind) {
    case "binary":
      return [inst.lhs, inst.rhs];
    case "return":
      return [inst.value];
    case "call":
      return [...inst.args];
    case "var":
      return [inst.value];
    case "assign":
      return [inst.value];
    case "new_array":
      return [...inst.elements];
    case "array_get":
      return [inst.array];
    case "array_set":
      return [inst.array, inst.value];
    case "new_struct":
      return [...inst.values];
    case "struct_get":
      return [inst.struct];
    case "struct_set":
      return [inst.struct, inst.value];
    default:
      return unreachable(inst, "instruction");
  }
}

/**
 * Map every defined handle to the handles its value depends on.
 *
 * A write adds its value to the target's dependencies, so anything that
 * keeps the target alive keeps the write's operand alive too. Parameters
 * map to an empty list.
 */
export function computeUses(fn: Pick<Func, "params" | "body">): Map<LocalId, LocalId[]> {
  const uses = computeBodyUses(fn.body);
  for (const param of fn.params) {
    if (!uses.has(param)) uses.set(param, []);
  }
  return uses;
}

export function computeBodyUses(body: readonly Inst[]): Map<LocalId, LocalId[]> {
  const uses = new Map<LocalId, LocalId[]>();
  const depsOf = (id: LocalId): LocalId[] => {
    let deps = uses.get(id);
    if (!deps) {
      deps = [];
      uses.set(id, deps);
    }
    return deps;
  };

  for (const inst of body) {
    switch (inst.kind) {
      case "return":
        break;
      case "assign":
        depsOf(inst.target).push(inst.value);
        break;
      case "array_set":
        depsOf(inst.array).push(inst.value);
        break;
      case "struct_set":
        depsOf(inst.struct).push(inst.value);
        break;
      default:
        uses.set(inst.dest, instOperands(inst));
    }
  }

  return uses;
}

/**
 * Approximate expression size per defined handle: one plus the sizes of
 * its dependencies. Handles without a computed size (parameters, values
 * defined later than a write that reads them) count as 1.
 */
export function computeSizes(body: readonly Inst[]): Map<LocalId, number> {
  const uses = computeBodyUses(body);
  const sizes = new Map<LocalId, number>();

  for (const inst of body) {
    const dest = instDest(inst);
    if (dest === null) continue;
    let total = 1;
    for (const dep of uses.get(dest) ?? []) {
      total += sizes.get(dep) ?? 1;
    }
    sizes.set(dest, total);
  }

  return sizes;
}
