/**
 * Swift surface form: `Double`, `[T]`, value-type structs with labelled
 * memberwise initializers.
 */

import type { Func, StructDecl, Type } from "../ir/ir-types/index.ts";
import type { Value } from "../interp/values.ts";
import { formatScalar } from "../interp/values.ts";
import { type Dialect, type FunctionScope, type HarnessInput, renderValue, unknownInst } from "./dialect.ts";

function typeName(type: Type): string {
  switch (type.kind) {
    case "scalar":
      return "Double";
    case "array":
      return `[${typeName(type.element)}]`;
    case "struct":
      return type.name;
  }
}

function labelled(values: readonly string[]): string {
  return values.map((value, i) => `p${i}: ${value}`).join(", ");
}

function literal(value: Value, type: Type): string {
  return renderValue(value, type, "swift", {
    scalar: formatScalar,
    array: (elements) => `[${elements.join(", ")}]`,
    struct: (values, t) => `${t.name}(${labelled(values)})`,
  });
}

export const swiftDialect: Dialect = {
  id: "swift",
  extension: "swift",
  memberIndent: "",
  typeName,
  literal,

  inst(inst, scope) {
    const v = (id: number): string => scope.ident(id);
    const def = (dest: number, expr: string, keyword = "let"): string =>
      `${keyword} ${v(dest)}: ${typeName(scope.typeOf(dest))} = ${expr}`;
    switch (inst.kind) {
      case "binary":
        return def(inst.dest, `${v(inst.lhs)} ${inst.op} ${v(inst.rhs)}`);
      case "return":
        return `return ${v(inst.value)}`;
      case "call":
        return def(inst.dest, `f${inst.callee}(${inst.args.map(v).join(", ")})`);
      case "var":
        return def(inst.dest, v(inst.value), "var");
      case "assign":
        return `${v(inst.target)} = ${v(inst.value)}`;
      case "new_array":
        return def(inst.dest, `[${inst.elements.map(v).join(", ")}]`);
      case "array_get":
        return def(inst.dest, `${v(inst.array)}[${inst.index}]`);
      case "array_set":
        return `${v(inst.array)}[${inst.index}] = ${v(inst.value)}`;
      case "new_struct":
        return def(inst.dest, `${typeName(scope.typeOf(inst.dest))}(${labelled(inst.values.map(v))})`);
      case "struct_get":
        return def(inst.dest, `${v(inst.struct)}.p${inst.index}`);
      case "struct_set":
        return `${v(inst.struct)}.p${inst.index} = ${v(inst.value)}`;
      default:
        return unknownInst("swift", inst);
    }
  },

  prelude() {
    return ["import Dispatch", ""];
  },

  structDecl(decl: StructDecl) {
    const fields = decl.type.properties.map((p, i) => `  var p${i}: ${typeName(p)}`);
    return [`struct ${decl.name} {`, ...fields, "}", ""];
  },

  functionHeader(fn: Func, scope: FunctionScope) {
    const params = scope
      .params()
      .map((p) => `_ ${p.ident}: ${typeName(p.type)}`)
      .join(", ");
    const header = `func ${fn.name}(${params}) -> ${typeName(fn.returnType)} {`;
    return fn.ordinal === 0 ? ["@inline(never)", header] : [header];
  },

  functionFooter() {
    return ["}", ""];
  },

  harness({ entry, args, iterations }: HarnessInput) {
    const inputs = args.map((a) => `  let ${a.ident}: ${a.type} = ${a.literal}`);
    const call = `${entry.name}(${args.map((a) => a.ident).join(", ")})`;
    return [
      "func benchmark() {",
      ...inputs,
      "  let start = DispatchTime.now().uptimeNanoseconds",
      `  var result: ${typeName(entry.returnType)} = 0.0`,
      `  for _ in 1...${iterations} {`,
      `    result = ${call}`,
      "  }",
      "  let end = DispatchTime.now().uptimeNanoseconds",
      "  print(result)",
      "  print(end - start)",
      "}",
      "",
      "benchmark()",
    ];
  },

  epilogue() {
    return [];
  },
};
