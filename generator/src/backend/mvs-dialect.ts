/**
 * The let/in expression form of the experimental language. A program is a
 * single expression: every declaration and statement ends in `in`, and a
 * body's last line is the bare returned name.
 *
 * The harness only evaluates the entry function once; the compiler's
 * `--benchmark N` mode runs it in a timed loop and prints the result
 * followed by the elapsed nanoseconds. `N` is the `iterations` field of
 * the program's metadata record.
 */

import type { Func, StructDecl, Type } from "../ir/ir-types/index.ts";
import type { Value } from "../interp/values.ts";
import { formatScalar } from "../interp/values.ts";
import { type Dialect, type FunctionScope, type HarnessInput, renderValue, unknownInst } from "./dialect.ts";

/** Prefix that keeps the optimizer from inlining the entry function. */
export const NOINLINE_PREFIX = "noinline_";

function typeName(type: Type): string {
  switch (type.kind) {
    case "scalar":
      return "Float";
    case "array":
      return `[${typeName(type.element)}]`;
    case "struct":
      return type.name;
  }
}

function literal(value: Value, type: Type): string {
  return renderValue(value, type, "mvs", {
    scalar: formatScalar,
    array: (elements) => `[${elements.join(", ")}]`,
    struct: (values, t) => `${t.name}(${values.join(", ")})`,
  });
}

function calleeName(name: string, ordinal: number): string {
  return ordinal === 0 ? NOINLINE_PREFIX + name : name;
}

export const mvsDialect: Dialect = {
  id: "mvs",
  extension: "mvs",
  memberIndent: "",
  typeName,
  literal,

  inst(inst, scope) {
    const v = (id: number): string => scope.ident(id);
    const def = (dest: number, expr: string, keyword = "let"): string =>
      `${keyword} ${v(dest)}: ${typeName(scope.typeOf(dest))} = ${expr} in`;
    switch (inst.kind) {
      case "binary":
        return def(inst.dest, `${v(inst.lhs)} ${inst.op} ${v(inst.rhs)}`);
      case "return":
        return v(inst.value);
      case "call":
        return def(inst.dest, `${calleeName(`f${inst.callee}`, inst.callee)}(${inst.args.map(v).join(", ")})`);
      case "var":
        return def(inst.dest, v(inst.value), "var");
      case "assign":
        return `${v(inst.target)} = ${v(inst.value)} in`;
      case "new_array":
        return def(inst.dest, `[${inst.elements.map(v).join(", ")}]`);
      case "array_get":
        return def(inst.dest, `${v(inst.array)}[${inst.index}]`);
      case "array_set":
        return `${v(inst.array)}[${inst.index}] = ${v(inst.value)} in`;
      case "new_struct":
        return def(inst.dest, `${typeName(scope.typeOf(inst.dest))}(${inst.values.map(v).join(", ")})`);
      case "struct_get":
        return def(inst.dest, `${v(inst.struct)}.p${inst.index}`);
      case "struct_set":
        return `${v(inst.struct)}.p${inst.index} = ${v(inst.value)} in`;
      default:
        return unknownInst("mvs", inst);
    }
  },

  prelude() {
    return [];
  },

  structDecl(decl: StructDecl) {
    const fields = decl.type.properties.map((p, i) => `  var p${i}: ${typeName(p)}`);
    return [`struct ${decl.name} {`, ...fields, "} in"];
  },

  functionHeader(fn: Func, scope: FunctionScope) {
    const params = scope.params();
    const types = params.map((p) => typeName(p.type)).join(", ");
    const named = params.map((p) => `${p.ident}: ${typeName(p.type)}`).join(", ");
    const ret = typeName(fn.returnType);
    return [`let ${calleeName(fn.name, fn.ordinal)}: (${types}) -> ${ret} = (${named}) -> ${ret} {`];
  },

  functionFooter() {
    return ["} in"];
  },

  harness({ entry, args }: HarnessInput) {
    const inputs = args.map((a) => `  let ${a.ident}: ${a.type} = ${a.literal} in`);
    const ret = typeName(entry.returnType);
    return [
      `let main: () -> ${ret} = () -> ${ret} {`,
      ...inputs,
      `  ${calleeName(entry.name, entry.ordinal)}(${args.map((a) => a.ident).join(", ")})`,
      "} in",
      "main()",
    ];
  },

  epilogue() {
    return [];
  },
};
