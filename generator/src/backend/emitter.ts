/**
 * Shared traversal: one walk over the program for every dialect.
 */

import { DEFAULT_CONFIG } from "../config/index.ts";
import type { Program } from "../ir/ir-types/index.ts";
import { entryFunction } from "../ir/program.ts";
import { initialValues } from "../interp/values.ts";
import { type Dialect, type DialectId, DIALECT_IDS, FunctionScope } from "./dialect.ts";
import { cppDialect } from "./cpp-dialect.ts";
import { mvsDialect } from "./mvs-dialect.ts";
import { scalaDialect } from "./scala-dialect.ts";
import { swiftDialect } from "./swift-dialect.ts";

export const DIALECTS: Record<DialectId, Dialect> = {
  cpp: cppDialect,
  scala: scalaDialect,
  swift: swiftDialect,
  mvs: mvsDialect,
};

export interface EmitOptions {
  /** Entry invocations inside the timed region. */
  iterations?: number;
}

const INDENT = "  ";

/**
 * Render a program: prelude, structs in declaration order, functions in
 * reverse ordinal order so callees precede callers, then the harness.
 */
export function emitProgram(program: Program, dialect: Dialect, options: EmitOptions = {}): string {
  const { iterations = DEFAULT_CONFIG.benchmarkIterations } = options;
  const member = (line: string): string => (line === "" ? line : dialect.memberIndent + line);
  const out: string[] = [...dialect.prelude()];

  for (const decl of program.structs) {
    out.push(...dialect.structDecl(decl).map(member));
  }

  for (const fn of [...program.functions].reverse()) {
    const scope = new FunctionScope(fn, dialect.id);
    out.push(...dialect.functionHeader(fn, scope).map(member));
    for (const inst of fn.body) {
      out.push(member(INDENT + dialect.inst(inst, scope)));
    }
    out.push(...dialect.functionFooter(fn).map(member));
  }

  const entry = entryFunction(program);
  const scope = new FunctionScope(entry, dialect.id);
  const params = scope.params();
  const values = initialValues(params.map((p) => p.type));
  const args = params.map((p, i) => ({
    ident: p.ident,
    type: dialect.typeName(p.type),
    literal: dialect.literal(values[i], p.type),
  }));
  out.push(...dialect.harness({ entry, args, iterations }).map(member));
  out.push(...dialect.epilogue());

  return out.join("\n") + "\n";
}

export function emitCpp(program: Program, options?: EmitOptions): string {
  return emitProgram(program, cppDialect, options);
}

export function emitScala(program: Program, options?: EmitOptions): string {
  return emitProgram(program, scalaDialect, options);
}

export function emitSwift(program: Program, options?: EmitOptions): string {
  return emitProgram(program, swiftDialect, options);
}

export function emitMvs(program: Program, options?: EmitOptions): string {
  return emitProgram(program, mvsDialect, options);
}

/** All four renderings, keyed by dialect id. */
export function emitAll(program: Program, options?: EmitOptions): Record<DialectId, string> {
  const out: Record<DialectId, string> = { cpp: "", scala: "", swift: "", mvs: "" };
  for (const id of DIALECT_IDS) {
    out[id] = emitProgram(program, DIALECTS[id], options);
  }
  return out;
}
