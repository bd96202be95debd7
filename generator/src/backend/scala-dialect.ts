/**
 * Scala: `Double`, `Vector[T]`, case classes. Writes rebind a `var`
 * to an updated copy, which keeps the value semantics of the IR.
 */

import type { Func, StructDecl, Type } from "../ir/ir-types/index.ts";
import type { Value } from "../interp/values.ts";
import { formatScalar } from "../interp/values.ts";
import { type Dialect, type FunctionScope, type HarnessInput, renderValue, unknownInst } from "./dialect.ts";

/** Name of the object wrapping the whole program. */
export const SCALA_OBJECT = "Gen";

function typeName(type: Type): string {
  switch (type.kind) {
    case "scalar":
      return "Double";
    case "array":
      return `Vector[${typeName(type.element)}]`;
    case "struct":
      return type.name;
  }
}

function literal(value: Value, type: Type): string {
  return renderValue(value, type, "scala", {
    scalar: formatScalar,
    array: (elements) => `Vector(${elements.join(", ")})`,
    struct: (values, t) => `${t.name}(${values.join(", ")})`,
  });
}

export const scalaDialect: Dialect = {
  id: "scala",
  extension: "scala",
  memberIndent: "  ",
  typeName,
  literal,

  inst(inst, scope) {
    const v = (id: number): string => scope.ident(id);
    const def = (dest: number, expr: string, keyword = "val"): string =>
      `${keyword} ${v(dest)}: ${typeName(scope.typeOf(dest))} = ${expr}`;
    switch (inst.kind) {
      case "binary":
        return def(inst.dest, `${v(inst.lhs)} ${inst.op} ${v(inst.rhs)}`);
      case "return":
        return v(inst.value);
      case "call":
        return def(inst.dest, `f${inst.callee}(${inst.args.map(v).join(", ")})`);
      case "var":
        return def(inst.dest, v(inst.value), "var");
      case "assign":
        return `${v(inst.target)} = ${v(inst.value)}`;
      case "new_array":
        return def(inst.dest, `Vector(${inst.elements.map(v).join(", ")})`);
      case "array_get":
        return def(inst.dest, `${v(inst.array)}(${inst.index})`);
      case "array_set":
        return `${v(inst.array)} = ${v(inst.array)}.updated(${inst.index}, ${v(inst.value)})`;
      case "new_struct":
        return def(inst.dest, `${typeName(scope.typeOf(inst.dest))}(${inst.values.map(v).join(", ")})`);
      case "struct_get":
        return def(inst.dest, `${v(inst.struct)}.p${inst.index}`);
      case "struct_set":
        return `${v(inst.struct)} = ${v(inst.struct)}.copy(p${inst.index} = ${v(inst.value)})`;
      default:
        return unknownInst("scala", inst);
    }
  },

  prelude() {
    return ["import java.lang.System.nanoTime", "", `object ${SCALA_OBJECT} extends App {`];
  },

  structDecl(decl: StructDecl) {
    const fields = decl.type.properties.map((p, i) => `p${i}: ${typeName(p)}`).join(", ");
    return [`case class ${decl.name}(${fields})`, ""];
  },

  functionHeader(fn: Func, scope: FunctionScope) {
    const params = scope
      .params()
      .map((p) => `${p.ident}: ${typeName(p.type)}`)
      .join(", ");
    const header = `def ${fn.name}(${params}): ${typeName(fn.returnType)} = {`;
    return fn.ordinal === 0 ? ["@noinline", header] : [header];
  },

  functionFooter() {
    return ["}", ""];
  },

  harness({ entry, args, iterations }: HarnessInput) {
    const inputs = args.map((a) => `  val ${a.ident}: ${a.type} = ${a.literal}`);
    const call = `${entry.name}(${args.map((a) => a.ident).join(", ")})`;
    return [
      "def benchmark(): Unit = {",
      ...inputs,
      "  val start = nanoTime()",
      `  var result: ${typeName(entry.returnType)} = 0.0`,
      `  (1 to ${iterations}).foreach { _ =>`,
      `    result = ${call}`,
      "  }",
      "  val end = nanoTime()",
      "  println(result)",
      "  println(end - start)",
      "}",
      "",
      "benchmark()",
    ];
  },

  epilogue() {
    return ["}"];
  },
};
