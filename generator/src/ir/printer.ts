/**
 * IR text format printer: human-readable debug output, one instruction
 * per line:
 *
 *   fn f0(v0: s0) -> f64 {
 *     v1 = struct_get v0.p0
 *     return v1
 *   }
 */

import type { Func, Inst, Program, StructDecl } from "./ir-types/index.ts";
import { funcName, nameOf } from "./program.ts";
import { typeKey } from "./types.ts";

export function printProgram(program: Program): string {
  const lines: string[] = [];

  for (const decl of program.structs) {
    lines.push(printStruct(decl));
    lines.push("");
  }

  for (const fn of program.functions) {
    lines.push(printFunction(fn));
    lines.push("");
  }

  if (program.meta.result !== null) {
    lines.push(`; result ${program.meta.result} after ${program.meta.totalCount} instructions`);
  }

  return `${lines.join("\n").trimEnd()}\n`;
}

function printStruct(decl: StructDecl): string {
  const props = decl.type.properties.map((p, i) => `p${i}: ${typeKey(p)}`).join(", ");
  return `struct ${decl.name} { ${props} }`;
}

export function printFunction(fn: Func): string {
  const params = fn.params.map((id) => {
    const name = nameOf(fn, id);
    return `${name.ident}: ${typeKey(name.type)}`;
  });
  const lines = [`fn ${fn.name}(${params.join(", ")}) -> ${typeKey(fn.returnType)} {`];
  for (const inst of fn.body) {
    lines.push(`  ${printInst(fn, inst)}`);
  }
  lines.push("}");
  return lines.join("\n");
}

export function printInst(fn: Func, inst: Inst): string {
  const v = (id: number): string => nameOf(fn, id).ident;
  const list = (ids: readonly number[]): string => ids.map(v).join(", ");
  switch (inst.kind) {
    case "binary":
      return `${v(inst.dest)} = binary ${v(inst.lhs)} ${inst.op} ${v(inst.rhs)}`;
    case "return":
      return `return ${v(inst.value)}`;
    case "call":
      return `${v(inst.dest)} = call ${funcName(inst.callee)}(${list(inst.args)})`;
    case "var":
      return `var ${v(inst.dest)} = ${v(inst.value)}`;
    case "assign":
      return `${v(inst.target)} := ${v(inst.value)}`;
    case "new_array":
      return `${v(inst.dest)} = new_array [${list(inst.elements)}]`;
    case "array_get":
      return `${v(inst.dest)} = array_get ${v(inst.array)}[${inst.index}]`;
    case "array_set":
      return `array_set ${v(inst.array)}[${inst.index}] = ${v(inst.value)}`;
    case "new_struct":
      return `${v(inst.dest)} = new_struct ${typeKey(nameOf(fn, inst.dest).type)}(${list(inst.values)})`;
    case "struct_get":
      return `${v(inst.dest)} = struct_get ${v(inst.struct)}.p${inst.index}`;
    case "struct_set":
      return `struct_set ${v(inst.struct)}.p${inst.index} = ${v(inst.value)}`;
  }
}
