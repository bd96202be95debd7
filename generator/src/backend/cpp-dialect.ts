/**
 * C++17: `double`, `std::vector<T>`, structs with a positional constructor.
 */

import type { Func, StructDecl, Type } from "../ir/ir-types/index.ts";
import type { Value } from "../interp/values.ts";
import { formatScalar } from "../interp/values.ts";
import { type Dialect, type FunctionScope, type HarnessInput, renderValue, unknownInst } from "./dialect.ts";

function typeName(type: Type): string {
  switch (type.kind) {
    case "scalar":
      return "double";
    case "array":
      return `std::vector<${typeName(type.element)}>`;
    case "struct":
      return type.name;
  }
}

function literal(value: Value, type: Type): string {
  return renderValue(value, type, "cpp", {
    scalar: formatScalar,
    array: (elements, t) => `${typeName(t)}{ ${elements.join(", ")} }`,
    struct: (values, t) => `${t.name}(${values.join(", ")})`,
  });
}

export const cppDialect: Dialect = {
  id: "cpp",
  extension: "cpp",
  memberIndent: "",
  typeName,
  literal,

  inst(inst, scope) {
    const v = (id: number): string => scope.ident(id);
    const def = (dest: number, expr: string): string =>
      `const ${typeName(scope.typeOf(dest))} ${v(dest)} = ${expr};`;
    switch (inst.kind) {
      case "binary":
        return def(inst.dest, `${v(inst.lhs)} ${inst.op} ${v(inst.rhs)}`);
      case "return":
        return `return ${v(inst.value)};`;
      case "call":
        return def(inst.dest, `f${inst.callee}(${inst.args.map(v).join(", ")})`);
      case "var":
        return `${typeName(scope.typeOf(inst.dest))} ${v(inst.dest)} = ${v(inst.value)};`;
      case "assign":
        return `${v(inst.target)} = ${v(inst.value)};`;
      case "new_array":
        return `const ${typeName(scope.typeOf(inst.dest))} ${v(inst.dest)} { ${inst.elements.map(v).join(", ")} };`;
      case "array_get":
        return def(inst.dest, `${v(inst.array)}[${inst.index}]`);
      case "array_set":
        return `${v(inst.array)}[${inst.index}] = ${v(inst.value)};`;
      case "new_struct":
        return `const ${typeName(scope.typeOf(inst.dest))} ${v(inst.dest)}(${inst.values.map(v).join(", ")});`;
      case "struct_get":
        return def(inst.dest, `${v(inst.struct)}.p${inst.index}`);
      case "struct_set":
        return `${v(inst.struct)}.p${inst.index} = ${v(inst.value)};`;
      default:
        return unknownInst("cpp", inst);
    }
  },

  prelude() {
    return [
      "#include <charconv>",
      "#include <chrono>",
      "#include <iostream>",
      "#include <string>",
      "#include <vector>",
      "",
    ];
  },

  structDecl(decl: StructDecl) {
    const props = decl.type.properties;
    const fields = props.map((p, i) => `  ${typeName(p)} p${i};`);
    const params = props.map((p, i) => `${typeName(p)} v${i}`).join(", ");
    const inits = props.map((_, i) => `p${i}(v${i})`).join(", ");
    return [`struct ${decl.name} {`, ...fields, `  ${decl.name}(${params}): ${inits} { }`, "};", ""];
  },

  functionHeader(fn: Func, scope: FunctionScope) {
    const params = scope
      .params()
      .map((p) => `const ${typeName(p.type)} &${p.ident}`)
      .join(", ");
    const header = `${typeName(fn.returnType)} ${fn.name}(${params}) {`;
    return fn.ordinal === 0 ? ["__attribute__((noinline))", header] : [header];
  },

  functionFooter() {
    return ["}", ""];
  },

  harness({ entry, args, iterations }: HarnessInput) {
    const inputs = args.map((a) => `  const ${a.type} ${a.ident} = ${a.literal};`);
    const call = `${entry.name}(${args.map((a) => a.ident).join(", ")})`;
    return [
      "void print_double(double value) {",
      "  char buffer[64];",
      "  auto end = std::to_chars(buffer, buffer + sizeof(buffer), value).ptr;",
      "  std::string text(buffer, end);",
      '  if (text.find_first_of(".eni") == std::string::npos) text += ".0";',
      '  std::cout << text << "\\n";',
      "}",
      "",
      "int main() {",
      ...inputs,
      `  ${typeName(entry.returnType)} result = 0.0;`,
      "  auto start = std::chrono::steady_clock::now();",
      `  for (int i = 0; i < ${iterations}; i++) {`,
      `    result = ${call};`,
      "  }",
      "  auto end = std::chrono::steady_clock::now();",
      "  print_double(result);",
      '  std::cout << std::chrono::duration_cast<std::chrono::nanoseconds>(end - start).count() << "\\n";',
      "  return 0;",
      "}",
    ];
  },

  epilogue() {
    return [];
  },
};
