/**
 * The strategy interface every target dialect implements, plus the
 * per-function name scope the shared traversal hands to it.
 */

import { EmissionError } from "../errors/index.ts";
import type { ArrayType, Func, Inst, LocalId, Name, StructDecl, StructType, Type } from "../ir/ir-types/index.ts";
import { type Value, isArrayValue, isScalarValue, isStructValue } from "../interp/values.ts";

export const DIALECT_IDS = ["cpp", "scala", "swift", "mvs"] as const;

export type DialectId = (typeof DIALECT_IDS)[number];

export function isDialectId(s: string): s is DialectId {
  return DIALECT_IDS.some((id) => id === s);
}

/** One entry argument, already spelled in the target's syntax. */
export interface HarnessArg {
  ident: string;
  type: string;
  literal: string;
}

/** Inputs the benchmark harness is built around. */
export interface HarnessInput {
  entry: Func;
  /** Canonical arguments, one per entry parameter. */
  args: readonly HarnessArg[];
  iterations: number;
}

/**
 * Everything that differs between targets. Methods return lines without a
 * trailing newline; the traversal adds indentation for nesting.
 */
export interface Dialect {
  readonly id: DialectId;
  readonly extension: string;
  /** Prefix for every declaration; non-empty when declarations sit inside a wrapper. */
  readonly memberIndent: string;

  typeName(type: Type): string;
  literal(value: Value, type: Type): string;
  inst(inst: Inst, scope: FunctionScope): string;

  prelude(): string[];
  structDecl(decl: StructDecl): string[];
  functionHeader(fn: Func, scope: FunctionScope): string[];
  functionFooter(fn: Func): string[];
  harness(input: HarnessInput): string[];
  epilogue(): string[];
}

/** Resolves handles of one function to identifiers and types. */
export class FunctionScope {
  constructor(
    readonly fn: Func,
    private readonly dialect: DialectId
  ) {}

  ident(id: LocalId): string {
    return this.name(id).ident;
  }

  typeOf(id: LocalId): Type {
    return this.name(id).type;
  }

  params(): Name[] {
    return this.fn.params.map((id) => this.name(id));
  }

  private name(id: LocalId): Name {
    const name = this.fn.names[id];
    if (name === undefined) {
      throw new EmissionError(this.dialect, `${this.fn.name} has no name with handle ${id}`);
    }
    return name;
  }
}

/** Exhaustiveness guard for dialect switches over `Inst`. */
export function unknownInst(dialect: DialectId, inst: never): never {
  throw new EmissionError(dialect, `unknown instruction ${JSON.stringify(inst)}`);
}

/** Structs become `pN` fields, aggregates recurse; scalars go through `scalar`. */
export function renderValue(
  value: Value,
  type: Type,
  dialect: DialectId,
  render: {
    scalar: (n: number) => string;
    array: (elements: string[], type: ArrayType) => string;
    struct: (values: string[], type: StructType) => string;
  }
): string {
  switch (type.kind) {
    case "scalar":
      if (!isScalarValue(value)) break;
      return render.scalar(value);
    case "array":
      if (!isArrayValue(value)) break;
      return render.array(
        value.map((v) => renderValue(v, type.element, dialect, render)),
        type
      );
    case "struct": {
      if (!isStructValue(value)) break;
      return render.struct(
        value.values.map((v, i) => {
          const prop = type.properties[i];
          if (prop === undefined) {
            throw new EmissionError(dialect, `${type.name} has no property p${i}`);
          }
          return renderValue(v, prop, dialect, render);
        }),
        type
      );
    }
  }
  throw new EmissionError(dialect, `value does not match type ${type.kind}`);
}
