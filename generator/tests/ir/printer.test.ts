import { describe, expect, test } from "vitest";
import { printProgram } from "../../src/ir/printer.ts";
import { divisionProgram, kitchenSinkProgram, structGetProgram } from "./helpers.ts";

describe("printer", () => {
  test("prints structs then functions", () => {
    expect(printProgram(structGetProgram())).toBe(
      [
        "struct s0 { p0: f64, p1: f64 }",
        "",
        "fn f0(v0: s0) -> f64 {",
        "  v1 = struct_get v0.p0",
        "  return v1",
        "}",
        "",
      ].join("\n")
    );
  });

  test("prints one line per instruction", () => {
    const lines = printProgram(kitchenSinkProgram()).split("\n");
    expect(lines).toContain("struct s0 { p0: f64, p1: [f64; 2] }");
    expect(lines).toContain("fn f0(v0: f64, v1: s0) -> f64 {");
    expect(lines).toContain("  var v3 = v2");
    expect(lines).toContain("  array_set v3[1] = v0");
    expect(lines).toContain("  v4 = array_get v3[0]");
    expect(lines).toContain("  v5 = call f1(v4)");
    expect(lines).toContain("  v6 = new_array [v0, v5]");
    expect(lines).toContain("  v7 = new_struct s0(v5, v6)");
    expect(lines).toContain("  struct_set v8.p0 = v4");
    expect(lines).toContain("  v9 := v5");
    expect(lines).toContain("  v11 = binary v10 + v9");
  });

  test("appends the recorded result", () => {
    const program = divisionProgram(0, 1);
    program.meta.result = "0.0";
    program.meta.totalCount = 2;
    const lines = printProgram(program).split("\n");
    expect(lines).toContain("  v2 = binary v0 / v1");
    expect(lines[lines.length - 2]).toBe("; result 0.0 after 2 instructions");
  });
});
