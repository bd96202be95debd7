/**
 * Dead-code elimination: drop every instruction the return value does
 * not transitively depend on.
 *
 * Marking starts at the `return` operand and follows the def-use map.
 * Definitions survive when marked, writes survive when their target is
 * marked, and the `return` always survives. Running the pass on its own
 * output changes nothing.
 */

import { GenerationError } from "../errors/index.ts";
import type { Func, Inst, LocalId, Program } from "./ir-types/index.ts";
import { computeUses, instDest, writeTarget } from "./uses.ts";

export function eliminateDeadCodeInProgram(program: Program): Program {
  return {
    ...program,
    functions: program.functions.map(eliminateDeadCode),
  };
}

export function eliminateDeadCode(fn: Func): Func {
  const last = fn.body[fn.body.length - 1];
  if (last === undefined || last.kind !== "return") {
    throw new GenerationError(`${fn.name} does not end in a return`);
  }

  const live = markLive(fn, last.value);
  return {
    ...fn,
    body: fn.body.filter((inst) => isLive(inst, live)),
  };
}

/** Handles reachable from `root` through the def-use map. */
export function markLive(fn: Pick<Func, "params" | "body">, root: LocalId): Set<LocalId> {
  const uses = computeUses(fn);
  const live = new Set<LocalId>();
  const worklist: LocalId[] = [root];

  while (worklist.length > 0) {
    const id = worklist.pop();
    if (id === undefined || live.has(id)) continue;
    live.add(id);
    for (const dep of uses.get(id) ?? []) {
      if (!live.has(dep)) worklist.push(dep);
    }
  }

  return live;
}

function isLive(inst: Inst, live: Set<LocalId>): boolean {
  if (inst.kind === "return") return true;
  const target = writeTarget(inst);
  if (target !== null) return live.has(target);
  const dest = instDest(inst);
  return dest !== null && live.has(dest);
}
