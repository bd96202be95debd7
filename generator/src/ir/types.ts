// ─── Type constructors, guards and utilities ────────────────────────────────

import type { ArrayType, ScalarType, StructType, Type } from "./ir-types/index.ts";

export const SCALAR_TYPE: ScalarType = { kind: "scalar" };

export function arrayType(element: Type, length: number): ArrayType {
  return { kind: "array", element, length };
}

export function structType(name: string, properties: Type[]): StructType {
  return { kind: "struct", name, properties };
}

export function isScalarType(t: Type): t is ScalarType {
  return t.kind === "scalar";
}

export function isArrayType(t: Type): t is ArrayType {
  return t.kind === "array";
}

export function isNonEmptyArrayType(t: Type): t is ArrayType {
  return t.kind === "array" && t.length > 0;
}

export function isStructType(t: Type): t is StructType {
  return t.kind === "struct";
}

/** Structural equality for arrays, nominal equality for structs. */
export function typesEqual(a: Type, b: Type): boolean {
  switch (a.kind) {
    case "scalar":
      return b.kind === "scalar";
    case "array":
      return b.kind === "array" && a.length === b.length && typesEqual(a.element, b.element);
    case "struct":
      return b.kind === "struct" && a.name === b.name;
  }
}

/**
 * Canonical spelling; two types have the same key iff `typesEqual`.
 * Indexes name environments and doubles as the IR printer's type syntax.
 */
export function typeKey(t: Type): string {
  switch (t.kind) {
    case "scalar":
      return "f64";
    case "array":
      return `[${typeKey(t.element)}; ${t.length}]`;
    case "struct":
      return t.name;
  }
}

/** Names of every struct a type mentions, outermost first. */
export function collectStructNames(t: Type, into: Set<string> = new Set()): Set<string> {
  switch (t.kind) {
    case "scalar":
      break;
    case "array":
      collectStructNames(t.element, into);
      break;
    case "struct":
      into.add(t.name);
      for (const prop of t.properties) collectStructNames(prop, into);
      break;
  }
  return into;
}

/** Array nesting depth: 0 for non-arrays, 1 for `[f64; n]`, 2 for `[[f64; m]; n]`. */
export function arrayDepth(t: Type): number {
  return t.kind === "array" ? 1 + arrayDepth(t.element) : 0;
}
